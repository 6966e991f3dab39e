/**
 * Shared types for tools to prevent circular dependencies
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/app-config';
import type { DockerClient } from '../infrastructure/docker/client';
import type { CommandRunner } from '../infrastructure/command-executor';

/**
 * Dependencies handed to every tool. Docker and the command runner are created from the
 * configuration when not supplied.
 */
export interface ToolContext {
  logger: Logger;
  config: AppConfig;
  docker?: DockerClient;
  executor?: CommandRunner;
}

/**
 * Where a tool takes its recipe from
 */
export interface RecipeParams {
  /** YAML or JSON recipe file; the built-in recipe when omitted */
  recipePath?: string | undefined;
  /** Replaces the recipe's base image */
  baseImage?: string | undefined;
}
