#!/usr/bin/env node
/**
 * Registry relay CLI
 * Starts the HTTP/WebSocket relay or checks engine connectivity
 */

import { program, InvalidArgumentError } from 'commander';
import { exit, argv } from 'node:process';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ZodError } from 'zod';
import { loadConfig, type AppConfig, type ConfigOverrides } from '@/config';
import { createLogger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/error-utils';
import { createEngineClient } from '@/infra/docker/client';
import { installShutdownHandlers, startServer } from '@/server';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return String(parsed.version);
  }
  return '0.0.0';
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

interface CliOptions {
  port?: number;
  host?: string;
  targetRegistry?: string;
  logLevel?: string;
  dockerSocket?: string;
  workers?: number;
  healthCheck?: boolean;
}

program
  .name('registry-relay')
  .description('Pull images, re-tag them for a target registry and push them, with live progress')
  .version(readVersion())
  .option('--port <number>', 'port to listen on (default: 8000)', parseInteger)
  .option('--host <address>', 'address to bind (default: 0.0.0.0)')
  .option('--target-registry <domain>', 'registry used when a request names none')
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error')
  .option('--docker-socket <path>', 'Docker socket path or tcp:// address')
  .option('--workers <number>', 'engine calls allowed in flight (default: 4)', parseInteger)
  .option('--health-check', 'check Docker connectivity and exit')
  .addHelpText(
    'after',
    `

Examples:
  $ registry-relay                                   Start on 0.0.0.0:8000
  $ registry-relay --target-registry registry.local  Push to registry.local by default
  $ registry-relay --health-check                    Check Docker connectivity

Environment Variables:
  HOST, PORT                    Listen address
  NEW_DOMAIN, TARGET_REGISTRY   Default target registry (default: localhost:5000)
  DOCKER_SOCKET, DOCKER_HOST    Docker daemon address
  DOCKER_TIMEOUT                Docker request timeout in ms
  ENGINE_WORKERS                Engine calls allowed in flight
  PROGRESS_PING_INTERVAL        WebSocket keep-alive interval in ms
  LOG_LEVEL, LOG_FORMAT         Logging
`,
  );

program.parse(argv);

const options = program.opts<CliOptions>();

function toOverrides(opts: CliOptions): ConfigOverrides {
  return {
    host: opts.host,
    port: opts.port,
    logLevel: opts.logLevel,
    targetRegistry: opts.targetRegistry,
    socketPath: opts.dockerSocket,
    workerPoolSize: opts.workers,
  };
}

function resolveConfig(): AppConfig {
  try {
    return loadConfig(toOverrides(options));
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('Configuration errors:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      console.error('\nUse --help for usage information');
      exit(1);
    }
    throw error;
  }
}

async function runHealthCheck(config: AppConfig): Promise<void> {
  const logger = createLogger({ name: 'cli', level: config.server.logLevel });
  const engine = createEngineClient(logger, {
    socketPath: config.engine.socketPath,
    timeout: config.engine.timeout,
  });

  const healthy = await engine.testConnection();
  const diagnostic = await engine.getConnectionDiagnostic();
  console.error(`${healthy ? 'OK' : 'FAIL'} Docker (${config.engine.socketPath}): ${diagnostic}`);
  exit(healthy ? 0 : 1);
}

async function main(): Promise<void> {
  const config = resolveConfig();

  if (options.healthCheck) {
    await runHealthCheck(config);
    return;
  }

  const logger = createLogger({ level: config.server.logLevel });
  const running = await startServer(config, logger);
  installShutdownHandlers(running, logger);
}

main().catch((error: unknown) => {
  console.error(`Failed to start registry relay: ${extractErrorMessage(error)}`);
  exit(1);
});
