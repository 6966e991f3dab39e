/**
 * Application configuration, read from environment variables and validated with Zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

const CONSTANTS = {
  DEFAULTS: {
    DOCKER_SOCKET: '/var/run/docker.sock',
    IMAGE_TAG: 'agent-bench:latest',
  },
  LIMITS: {
    MAX_OUTPUT: 64 * 1024 * 1024, // 64MB per stream
  },
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const AppConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  logLevel: LogLevelSchema,
  docker: z.object({
    socketPath: z.string().min(1).default(CONSTANTS.DEFAULTS.DOCKER_SOCKET),
  }),
  provisioner: z.object({
    /** Recipe file used when none is given on the command line */
    recipePath: z.string().min(1).optional(),
    imageTag: z.string().min(1).default(CONSTANTS.DEFAULTS.IMAGE_TAG),
    /** Per-invocation limit for the local backend; 0 means none */
    stepTimeout: z.coerce.number().int().min(0).default(0),
    maxOutput: z.coerce.number().int().positive().default(CONSTANTS.LIMITS.MAX_OUTPUT),
    /** Leave the temporary Docker build context on disk */
    keepContext: BooleanFlagSchema,
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Empty strings count as unset
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Create configuration from environment variables, validated and defaulted by Zod
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    nodeEnv: getEnvValue(env, 'NODE_ENV'),
    logLevel: getEnvValue(env, 'LOG_LEVEL'),
    docker: {
      socketPath: getEnvValue(env, 'DOCKER_SOCKET'),
    },
    provisioner: {
      recipePath: getEnvValue(env, 'PROVISIONER_RECIPE'),
      imageTag: getEnvValue(env, 'PROVISIONER_IMAGE_TAG'),
      stepTimeout: getEnvValue(env, 'PROVISIONER_STEP_TIMEOUT'),
      maxOutput: getEnvValue(env, 'PROVISIONER_MAX_OUTPUT'),
      keepContext: getEnvValue(env, 'PROVISIONER_KEEP_CONTEXT'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const first = result.error.issues[0];
    const key = first ? first.path.join('.') : undefined;
    throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`, key);
  }

  return result.data;
}
