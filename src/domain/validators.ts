/**
 * Static recipe validation.
 *
 * Checks what can be known before any package manager runs: step ids, package spec syntax,
 * timezone and browser names, and that every executable a step calls exists by the time the step
 * runs (either shipped with the base image or provided by an earlier step).
 */

import { parseBaseImage, isUnpinned, formatBaseImage } from './base-image';
import { parseAptSpec, parsePythonSpec, normalizePythonName } from './package-spec';
import { consoleScriptsFor } from './steps';
import type { BuildStep, Recipe } from './types';

export type RecipeIssueCode =
  | 'EMPTY_RECIPE'
  | 'INVALID_RECIPE_NAME'
  | 'INVALID_LABEL'
  | 'INVALID_BASE_IMAGE'
  | 'DUPLICATE_STEP_ID'
  | 'EMPTY_PACKAGES'
  | 'INVALID_PACKAGE_SPEC'
  | 'INVALID_TIMEZONE'
  | 'UNKNOWN_BROWSER'
  | 'MISSING_TOOL'
  | 'UNINSTALL_NOT_INSTALLED'
  | 'UNPINNED_BASE_IMAGE';

export interface RecipeIssue {
  code: RecipeIssueCode;
  message: string;
  stepId?: string;
}

export interface RecipeValidation {
  valid: boolean;
  errors: RecipeIssue[];
  warnings: RecipeIssue[];
}

export const SUPPORTED_BROWSERS = ['chromium', 'chrome', 'firefox', 'webkit', 'msedge'] as const;

const TIMEZONE_PATTERN = /^[A-Za-z][A-Za-z0-9_+-]*(?:\/[A-Za-z0-9_+-]+)*$/;

/** Recipe names end up in image labels and temporary directory names */
export const RECIPE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const LABEL_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._/-]*$/;

function packagesOf(step: BuildStep): string[] | undefined {
  switch (step.kind) {
    case 'apt-install':
    case 'pip-upgrade':
    case 'pip-install':
    case 'pip-uninstall':
      return step.packages;
    default:
      return undefined;
  }
}

function checkPackages(step: BuildStep, errors: RecipeIssue[]): void {
  const packages = packagesOf(step);
  if (packages === undefined) return;

  if (packages.length === 0) {
    errors.push({ code: 'EMPTY_PACKAGES', message: `Step ${step.id} names no packages`, stepId: step.id });
    return;
  }

  const parse = step.kind === 'apt-install' ? parseAptSpec : parsePythonSpec;
  for (const spec of packages) {
    if (!parse(spec)) {
      errors.push({
        code: 'INVALID_PACKAGE_SPEC',
        message: `Step ${step.id} has an invalid package spec: ${spec}`,
        stepId: step.id,
      });
    }
  }
}

/**
 * Validate a recipe without executing it.
 */
export function validateRecipe(recipe: Recipe): RecipeValidation {
  const errors: RecipeIssue[] = [];
  const warnings: RecipeIssue[] = [];

  const base = parseBaseImage(recipe.baseImage.ref);
  if (!base.ok) {
    errors.push({ code: 'INVALID_BASE_IMAGE', message: base.error });
  } else if (isUnpinned(base.value)) {
    warnings.push({
      code: 'UNPINNED_BASE_IMAGE',
      message: `Base image ${formatBaseImage(base.value)} is not pinned to a version tag or digest`,
    });
  }

  if (!RECIPE_NAME_PATTERN.test(recipe.name)) {
    errors.push({ code: 'INVALID_RECIPE_NAME', message: `Invalid recipe name: ${JSON.stringify(recipe.name)}` });
  }

  for (const key of Object.keys(recipe.labels)) {
    if (!LABEL_KEY_PATTERN.test(key)) {
      errors.push({ code: 'INVALID_LABEL', message: `Invalid label key: ${JSON.stringify(key)}` });
    }
  }

  if (recipe.steps.length === 0) {
    errors.push({ code: 'EMPTY_RECIPE', message: `Recipe ${recipe.name} has no steps` });
  }

  const seenIds = new Set<string>();
  const available = new Set(recipe.baseTools);
  const installedPython = new Set<string>();

  for (const step of recipe.steps) {
    if (seenIds.has(step.id)) {
      errors.push({ code: 'DUPLICATE_STEP_ID', message: `Duplicate step id: ${step.id}`, stepId: step.id });
    }
    seenIds.add(step.id);

    checkPackages(step, errors);

    for (const tool of step.requires) {
      if (!available.has(tool)) {
        errors.push({
          code: 'MISSING_TOOL',
          message: `Step ${step.id} runs ${tool}, which neither the base image nor an earlier step provides`,
          stepId: step.id,
        });
      }
    }

    switch (step.kind) {
      case 'timezone':
        if (!TIMEZONE_PATTERN.test(step.zone)) {
          errors.push({
            code: 'INVALID_TIMEZONE',
            message: `Step ${step.id} has an invalid timezone: ${step.zone}`,
            stepId: step.id,
          });
        }
        break;
      case 'playwright-install':
        if (step.browsers.length === 0) {
          errors.push({ code: 'EMPTY_PACKAGES', message: `Step ${step.id} names no browsers`, stepId: step.id });
        }
        for (const browser of step.browsers) {
          if (!(SUPPORTED_BROWSERS as readonly string[]).includes(browser)) {
            errors.push({
              code: 'UNKNOWN_BROWSER',
              message: `Step ${step.id} names an unknown browser engine: ${browser}`,
              stepId: step.id,
            });
          }
        }
        break;
      case 'pip-install':
      case 'pip-upgrade':
        for (const spec of step.packages) {
          const parsed = parsePythonSpec(spec);
          if (parsed) installedPython.add(normalizePythonName(parsed.name));
        }
        break;
      case 'pip-uninstall':
        for (const spec of step.packages) {
          const parsed = parsePythonSpec(spec);
          if (!parsed) continue;
          const name = normalizePythonName(parsed.name);
          if (!installedPython.has(name)) {
            warnings.push({
              code: 'UNINSTALL_NOT_INSTALLED',
              message: `Step ${step.id} uninstalls ${spec}, which no earlier step installed`,
              stepId: step.id,
            });
          }
          installedPython.delete(name);
          for (const script of consoleScriptsFor(spec)) available.delete(script);
        }
        break;
      default:
        break;
    }

    for (const tool of step.provides) available.add(tool);
  }

  return { valid: errors.length === 0, errors, warnings };
}
