/**
 * Main export file for library consumers
 * Provides the provisioning tools, recipe helpers and domain types
 */

// Tools
export { renderDockerfileFromRecipe, renderDockerfileSchema } from './tools/render-dockerfile';
export { validateRecipeFile, validateRecipeSchema } from './tools/validate-recipe';
export { planRecipe, buildPlan, planSchema } from './tools/plan';
export { buildImage, buildImageSchema } from './tools/build-image';
export { provision, createLocalRunner, provisionSchema } from './tools/provision';
export { verifyImage, verifyImageSchema } from './tools/verify-image';
export { compareImages, compareImagesSchema } from './tools/compare-images';
export { recipeSchema } from './tools/recipe-schema';
export type { ToolContext } from './tools/types';
export type { RenderDockerfileResult } from './tools/render-dockerfile/tool';
export type { ValidateRecipeResult } from './tools/validate-recipe';
export type { PlanEntry, PlanResult } from './tools/plan';
export type { ProvisionResult } from './tools/provision';
export type { VerificationCheck, VerificationReport } from './tools/verify-image';
export type { CompareImagesResult } from './tools/compare-images';

// Recipes and steps
export * from './recipes';
export {
  aptInstall,
  setTimezone,
  pipUpgrade,
  pipInstall,
  pipUninstall,
  playwrightInstall,
  runCommand,
} from './domain/steps';
export { parseBaseImage, formatBaseImage } from './domain/base-image';
export { validateRecipe, type RecipeIssue, type RecipeValidation } from './domain/validators';
export { projectPackageState, summarizePackageState, type PackageState } from './domain/package-state';

// Execution
export { runSequence, assertSucceeded, type InvocationRunner } from './lib/sequence';
export { renderDockerfile, type RenderedDockerfile } from './lib/dockerfile';
export { createDockerClient, type DockerClient } from './infrastructure/docker/client';
export { CommandExecutor, type CommandRunner } from './infrastructure/command-executor';

// Ambient
export { createAppConfig, type AppConfig } from './config';
export { createLogger, createTimer } from './lib/logger';
export * from './errors';
export * from './domain/types';
