/**
 * Recipe file loading: YAML or JSON on disk -> validated Recipe.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { parseBaseImage } from '../domain/base-image';
import {
  aptInstall,
  pipInstall,
  pipUninstall,
  pipUpgrade,
  playwrightInstall,
  runCommand,
  setTimezone,
  type RunStepOptions,
} from '../domain/steps';
import { errorMessage } from '../errors';
import { Failure, Success, type BuildStep, type Recipe, type Result } from '../domain/types';
import { DEFAULT_BASE_TOOLS } from './agent-bench';
import { recipeFileSchema, type RecipeFile, type RecipeStepInput } from './schema';

function toStep(input: RecipeStepInput, index: number): BuildStep {
  const id = input.id ?? `${index + 1}-${input.kind}`;
  const options = input.description !== undefined ? { description: input.description } : {};

  switch (input.kind) {
    case 'apt-install':
      return aptInstall(id, input.packages, options);
    case 'timezone':
      return setTimezone(id, input.zone, options);
    case 'pip-upgrade':
      return pipUpgrade(id, input.packages, options);
    case 'pip-install':
      return pipInstall(id, input.packages, options);
    case 'pip-uninstall':
      return pipUninstall(id, input.packages, options);
    case 'playwright-install':
      return playwrightInstall(id, input.browsers, { ...options, withDeps: input.withDeps });
    case 'run': {
      const runOptions: RunStepOptions = { ...options, expectedExitCode: input.expectedExitCode };
      if (input.env) runOptions.env = input.env;
      if (input.stdoutTo) runOptions.stdoutTo = input.stdoutTo;
      if (input.provides) runOptions.provides = input.provides;
      return runCommand(id, input.command, input.args, runOptions);
    }
  }
}

/**
 * Convert a schema-checked recipe file into a Recipe.
 */
export function toRecipe(file: RecipeFile): Result<Recipe> {
  const base = parseBaseImage(file.baseImage);
  if (!base.ok) {
    return Failure(base.error);
  }

  return Success({
    name: file.name,
    baseImage: base.value,
    baseTools: file.baseTools ?? [...DEFAULT_BASE_TOOLS],
    labels: file.labels,
    steps: file.steps.map(toStep),
  });
}

/**
 * Parse recipe text. The format follows the file extension; anything but `.json` is read as YAML.
 */
export function parseRecipe(content: string, fileName = 'recipe.yaml'): Result<Recipe> {
  let raw: unknown;
  try {
    raw = path.extname(fileName).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    return Failure(`Cannot parse ${fileName}: ${errorMessage(error)}`);
  }

  const parsed = recipeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return Failure(`Invalid recipe ${fileName}: ${issues}`);
  }

  return toRecipe(parsed.data);
}

/**
 * Read and parse a recipe file.
 */
export async function loadRecipe(filePath: string): Promise<Result<Recipe>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    return Failure(`Cannot read recipe ${filePath}: ${errorMessage(error)}`);
  }
  return parseRecipe(content, filePath);
}
