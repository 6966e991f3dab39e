/**
 * Core type definitions for the environment provisioner.
 * Provides the Result type for error handling and the recipe/step model.
 */

/**
 * Result type for functional error handling
 *
 * Operations that touch external systems (Docker, the filesystem, spawned processes) return a
 * Result instead of throwing, so callers handle the failure path explicitly.
 *
 * @example
 * ```typescript
 * const result = await loadRecipe('recipes/agent-bench.yaml');
 * if (!result.ok) {
 *   logger.error(result.error);
 *   return Failure('Cannot load recipe');
 * }
 * return Success(renderDockerfile(result.value));
 * ```
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/** Create a failure result */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

// ===== BASE IMAGE =====

/**
 * A parsed container image reference, e.g. `mcr.microsoft.com/devcontainers/python:3.11`.
 */
export interface BaseImage {
  /** Reference exactly as given */
  ref: string;
  /** Registry host, when the reference names one */
  registry?: string;
  /** Repository path without registry, tag or digest */
  repository: string;
  tag?: string;
  /** Content digest (`sha256:...`) */
  digest?: string;
}

// ===== BUILD STEPS =====

/**
 * One external command run as part of a build step.
 */
export interface CommandInvocation {
  command: string;
  args: string[];
  /** Exit status that counts as success */
  expectedExitCode: number;
  /** Extra environment variables for this command only */
  env?: Record<string, string>;
  /** File that receives the command's standard output */
  stdoutTo?: string;
}

export type StepKind =
  | 'apt-install'
  | 'timezone'
  | 'pip-upgrade'
  | 'pip-install'
  | 'pip-uninstall'
  | 'playwright-install'
  | 'run';

interface StepBase<K extends StepKind> {
  /** Unique identifier within a recipe */
  id: string;
  kind: K;
  /** Human-readable summary, rendered as a comment above the layer */
  description: string;
  /** Invocations run in order; all must exit with their expected status */
  run: CommandInvocation[];
  /** Executables this step invokes */
  requires: string[];
  /** Executables this step makes available to later steps */
  provides: string[];
}

export interface AptInstallStep extends StepBase<'apt-install'> {
  packages: string[];
}

export interface TimezoneStep extends StepBase<'timezone'> {
  zone: string;
}

export interface PipUpgradeStep extends StepBase<'pip-upgrade'> {
  packages: string[];
}

export interface PipInstallStep extends StepBase<'pip-install'> {
  packages: string[];
}

export interface PipUninstallStep extends StepBase<'pip-uninstall'> {
  packages: string[];
}

export interface PlaywrightInstallStep extends StepBase<'playwright-install'> {
  browsers: string[];
  withDeps: boolean;
}

export type RunStep = StepBase<'run'>;

/**
 * An ordered provisioning action. Each step becomes exactly one image layer.
 */
export type BuildStep =
  | AptInstallStep
  | TimezoneStep
  | PipUpgradeStep
  | PipInstallStep
  | PipUninstallStep
  | PlaywrightInstallStep
  | RunStep;

/**
 * A base image plus the total, ordered list of steps applied to it.
 */
export interface Recipe {
  name: string;
  baseImage: BaseImage;
  /** Executables the base image is known to ship */
  baseTools: string[];
  /** Image metadata labels */
  labels: Record<string, string>;
  steps: BuildStep[];
}

// ===== PROVISIONING =====

export type Backend = 'docker' | 'local';

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepOutcome {
  /** Zero-based position in the recipe */
  index: number;
  id: string;
  status: StepStatus;
  exitCode?: number;
  durationMs?: number;
  /** Captured output of the failing invocation, or build output for the layer */
  output?: string;
}

/**
 * Summary of one provisioning run, successful or not.
 */
export interface ProvisionReport {
  runId: string;
  recipe: string;
  backend: Backend;
  status: 'succeeded' | 'failed';
  steps: StepOutcome[];
  /** Id of the first step that did not exit as expected */
  failedStep?: string;
  /** Exit code of the failing invocation, 0 on success */
  exitCode: number;
  /** Docker backend only */
  imageId?: string;
  tag?: string;
  durationMs: number;
}
