/**
 * Application configuration
 *
 * Read once from the environment, validated, and overridable from the CLI.
 */

import { z } from 'zod';
import { autoDetectDockerSocket } from '@/infra/docker/socket-validation';
import { parseIntEnv, parseStringEnv } from './env-utils';

export const DEFAULT_TARGET_REGISTRY = 'localhost:5000';
export const DEFAULT_WORKER_POOL_SIZE = 4;

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const configSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    logLevel: logLevelSchema,
  }),
  transfer: z.object({
    /** Registry domain used when a request names none */
    targetRegistry: z.string().min(1),
  }),
  engine: z.object({
    socketPath: z.string().min(1),
    timeout: z.number().int().positive(),
    workerPoolSize: z.number().int().positive(),
  }),
  progress: z.object({
    pingIntervalMs: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Settings that may be overridden from the command line
 */
export interface ConfigOverrides {
  host?: string;
  port?: number;
  logLevel?: string;
  targetRegistry?: string;
  socketPath?: string;
  workerPoolSize?: number;
}

/**
 * Build the configuration from the environment, then apply overrides.
 * Throws a ZodError naming every invalid field.
 */
export function loadConfig(overrides: ConfigOverrides = {}): AppConfig {
  return configSchema.parse({
    server: {
      host: overrides.host ?? parseStringEnv('HOST', '0.0.0.0'),
      port: overrides.port ?? parseIntEnv('PORT', 8000),
      logLevel: overrides.logLevel ?? parseStringEnv('LOG_LEVEL', 'info'),
    },
    transfer: {
      targetRegistry:
        overrides.targetRegistry ??
        parseStringEnv(['NEW_DOMAIN', 'TARGET_REGISTRY'], DEFAULT_TARGET_REGISTRY),
    },
    engine: {
      socketPath:
        overrides.socketPath ??
        parseStringEnv(['DOCKER_SOCKET', 'DOCKER_HOST'], autoDetectDockerSocket()),
      timeout: parseIntEnv('DOCKER_TIMEOUT', 60000),
      workerPoolSize:
        overrides.workerPoolSize ?? parseIntEnv('ENGINE_WORKERS', DEFAULT_WORKER_POOL_SIZE),
    },
    progress: {
      pingIntervalMs: parseIntEnv('PROGRESS_PING_INTERVAL', 30000),
    },
  });
}
