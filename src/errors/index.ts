/**
 * Custom error types for the environment provisioner.
 * Thrown inside libraries and converted to Result failures at tool boundaries.
 */

import type { RecipeIssue } from '../domain/validators';

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    const json: ReturnType<ApplicationError['toJSON']> = {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
    };
    if (this.stack) json.stack = this.stack;
    return json;
  }
}

/**
 * Error thrown when a recipe fails static validation
 */
export class RecipeValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly issues: RecipeIssue[],
    context?: Record<string, unknown>,
  ) {
    super(message, 'RECIPE_INVALID', { ...context, issues });
    this.name = 'RecipeValidationError';
  }
}

/**
 * Error thrown when Docker operations fail
 */
export class DockerError extends ApplicationError {
  constructor(
    message: string,
    code: string = 'DOCKER_ERROR',
    public readonly operation?: string,
    public override readonly cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, operation });
    this.name = 'DockerError';
  }
}

/**
 * A build step exited with something other than its expected status
 */
export class StepFailureError extends ApplicationError {
  constructor(
    message: string,
    public readonly stepId: string,
    public readonly stepIndex: number,
    public readonly exitCode: number,
    context?: Record<string, unknown>,
  ) {
    super(message, 'STEP_FAILED', { ...context, stepId, stepIndex, exitCode });
    this.name = 'StepFailureError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string,
    public readonly actualValue?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey, actualValue });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
