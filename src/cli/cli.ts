#!/usr/bin/env node
/**
 * Image Provisioner CLI
 * Command-line interface for rendering, building, provisioning and verifying recipe images
 */

import { Command } from 'commander';
import { z } from 'zod';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createAppConfig } from '../config';
import { createLogger } from '../lib/logger';
import { assertSucceeded } from '../lib/sequence';
import { isApplicationError, errorMessage, StepFailureError } from '../errors';
import type { ProvisionReport, Result } from '../domain/types';
import type { ToolContext } from '../tools/types';
import { renderDockerfileFromRecipe, renderDockerfileSchema } from '../tools/render-dockerfile';
import { validateRecipeFile, validateRecipeSchema } from '../tools/validate-recipe';
import { planRecipe, planSchema } from '../tools/plan';
import { buildImage, buildImageSchema } from '../tools/build-image';
import { provision, provisionSchema } from '../tools/provision';
import { verifyImage, verifyImageSchema } from '../tools/verify-image';
import { compareImages, compareImagesSchema } from '../tools/compare-images';
import { recipeSchema } from '../tools/recipe-schema';
import {
  formatComparison,
  formatPlan,
  formatReport,
  formatValidation,
  formatVerification,
} from './format';

// src/cli and dist/cli both sit two levels below the package root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')));

interface GlobalOptions {
  logLevel?: string;
  pretty?: boolean;
  json?: boolean;
}

interface RecipeOptions {
  recipe?: string;
  baseImage?: string;
}

const program = new Command();

function createContext(): ToolContext {
  const globals = program.opts<GlobalOptions>();
  const config = createAppConfig();
  const logger = createLogger({
    name: 'cli',
    level: globals.logLevel ?? config.logLevel,
    pretty: globals.pretty ?? config.nodeEnv === 'development',
  });
  return { logger, config };
}

function print<T>(value: T, text: (value: T) => string): void {
  const output = program.opts<GlobalOptions>().json ? JSON.stringify(value, null, 2) : text(value);
  process.stdout.write(`${output}\n`);
}

/**
 * Unwrap a tool result; a Failure ends the command with exit status 1.
 */
function unwrap<T>(result: Result<T>): T | undefined {
  if (result.ok) return result.value;
  console.error(`Error: ${result.error}`);
  process.exitCode = 1;
  return undefined;
}

/**
 * Exit with the failing step's status.
 */
function finishRun(report: ProvisionReport): void {
  try {
    assertSucceeded(report);
  } catch (error) {
    if (error instanceof StepFailureError) {
      console.error(`Error: ${error.message}`);
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

program
  .name('image-provisioner')
  .description('Build and verify the agent benchmark environment from a declarative recipe')
  .version(packageJson.version)
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
  .option('--pretty', 'human-readable log output')
  .option('--json', 'print results as JSON')
  .addHelpText(
    'after',
    `

Examples:
  $ image-provisioner render --output build/Dockerfile     Write the Dockerfile of the built-in recipe
  $ image-provisioner validate --recipe recipe.yaml        Check a recipe without running it
  $ image-provisioner build --tag agent-bench:dev          Build through the Docker daemon
  $ image-provisioner provision --dry-run                  Show what provisioning this machine would run
  $ image-provisioner verify agent-bench:dev               Probe a built image
  $ image-provisioner compare agent-bench:a agent-bench:b  Check two builds install the same packages

Environment Variables:
  LOG_LEVEL                  Logging level
  DOCKER_SOCKET              Docker daemon socket path
  PROVISIONER_RECIPE         Recipe file used when --recipe is not given
  PROVISIONER_IMAGE_TAG      Tag for built images (default: agent-bench:latest)
  PROVISIONER_STEP_TIMEOUT   Per-command limit in ms for provision (default: 0, none)
  PROVISIONER_MAX_OUTPUT     Bytes of command output kept per stream
  PROVISIONER_KEEP_CONTEXT   Keep the temporary build context (true/false)
`,
  );

program
  .command('render')
  .description('Render the recipe as a Dockerfile')
  .option('--recipe <file>', 'recipe file (YAML or JSON)')
  .option('--base-image <ref>', 'override the base image')
  .option('--output <file>', 'write the Dockerfile to a file instead of stdout')
  .action(async (options: RecipeOptions & { output?: string }) => {
    const params = renderDockerfileSchema.parse({
      recipePath: options.recipe,
      baseImage: options.baseImage,
      output: options.output,
    });
    const result = unwrap(await renderDockerfileFromRecipe(params, createContext()));
    if (!result) return;
    if (result.path) {
      console.error(`Wrote ${result.path}`);
    } else {
      print(result, (value) => value.content.trimEnd());
    }
  });

program
  .command('validate')
  .description('Validate a recipe without running it')
  .option('--recipe <file>', 'recipe file (YAML or JSON)')
  .option('--base-image <ref>', 'override the base image')
  .action(async (options: RecipeOptions) => {
    const params = validateRecipeSchema.parse({ recipePath: options.recipe, baseImage: options.baseImage });
    const result = unwrap(await validateRecipeFile(params, createContext()));
    if (!result) return;
    print(result, formatValidation);
    if (!result.valid) process.exitCode = 1;
  });

program
  .command('plan')
  .description('List the steps of a recipe and the commands each one runs')
  .option('--recipe <file>', 'recipe file (YAML or JSON)')
  .option('--base-image <ref>', 'override the base image')
  .action(async (options: RecipeOptions) => {
    const params = planSchema.parse({ recipePath: options.recipe, baseImage: options.baseImage });
    const result = unwrap(await planRecipe(params, createContext()));
    if (result) print(result, formatPlan);
  });

program
  .command('build')
  .description('Build the image through the Docker daemon')
  .option('--recipe <file>', 'recipe file (YAML or JSON)')
  .option('--base-image <ref>', 'override the base image')
  .option('--tag <tag>', 'tag applied when every step succeeds')
  .option('--pull', 'always pull a newer base image')
  .option('--no-cache', 'do not reuse cached layers')
  .action(async (options: RecipeOptions & { tag?: string; pull?: boolean; cache: boolean }) => {
    const params = buildImageSchema.parse({
      recipePath: options.recipe,
      baseImage: options.baseImage,
      tag: options.tag,
      pull: options.pull,
      noCache: !options.cache,
    });
    const report = unwrap(await buildImage(params, createContext()));
    if (!report) return;
    print(report, formatReport);
    finishRun(report);
  });

program
  .command('provision')
  .description('Run the recipe steps directly on this machine')
  .option('--recipe <file>', 'recipe file (YAML or JSON)')
  .option('--dry-run', 'print the plan without running anything')
  .action(async (options: { recipe?: string; dryRun?: boolean }) => {
    const params = provisionSchema.parse({ recipePath: options.recipe, dryRun: options.dryRun });
    const result = unwrap(await provision(params, createContext()));
    if (!result) return;
    if (result.dryRun) {
      print(result.plan, formatPlan);
      return;
    }
    print(result.report, formatReport);
    finishRun(result.report);
  });

program
  .command('verify')
  .description('Check a built image against its recipe')
  .argument('<image>', 'image tag or ID')
  .option('--recipe <file>', 'recipe the image was built from')
  .option('--base-image <ref>', 'image to compare the installer version against')
  .action(async (image: string, options: RecipeOptions) => {
    const params = verifyImageSchema.parse({
      image,
      recipePath: options.recipe,
      baseImage: options.baseImage,
    });
    const report = unwrap(await verifyImage(params, createContext()));
    if (!report) return;
    print(report, formatVerification);
    if (!report.passed) process.exitCode = 1;
  });

program
  .command('compare')
  .description('Compare the installed packages of two images')
  .argument('<imageA>', 'first image')
  .argument('<imageB>', 'second image')
  .action(async (imageA: string, imageB: string) => {
    const params = compareImagesSchema.parse({ imageA, imageB });
    const result = unwrap(await compareImages(params, createContext()));
    if (!result) return;
    print(result, formatComparison);
    if (!result.identical) process.exitCode = 1;
  });

program
  .command('schema')
  .description('Print the JSON Schema of the recipe file format')
  .action(() => {
    const schema = unwrap(recipeSchema(createContext()));
    if (schema) process.stdout.write(`${JSON.stringify(schema, null, 2)}\n`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isApplicationError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else if (error instanceof z.ZodError) {
    console.error(`Invalid arguments: ${error.issues.map((issue) => issue.message).join('; ')}`);
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
});
