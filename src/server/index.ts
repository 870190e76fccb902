/**
 * Server bootstrap: wires configuration, engine, pipeline and transport
 */

import type { Server } from 'http';
import type { WebSocketServer } from 'ws';
import type { Logger } from 'pino';
import type { AppConfig } from '@/config';
import { createEngineClient, type EngineClient } from '@/infra/docker/client';
import { createPooledEngineClient } from '@/infra/docker/pooled-client';
import { createWorkerPool } from '@/lib/worker-pool';
import { createProgressBroadcaster, type ProgressBroadcaster } from '@/app/progress-broadcaster';
import { createTransferPipeline, type TransferPipeline } from '@/app/transfer-pipeline';
import { createHttpApp } from './http';
import { attachProgressSocket } from './progress-socket';

export interface RelayRuntime {
  engine: EngineClient;
  broadcaster: ProgressBroadcaster;
  pipeline: TransferPipeline;
}

export interface RunningServer {
  server: Server;
  wss: WebSocketServer;
  runtime: RelayRuntime;
  /** Close client sockets and stop accepting connections */
  close(): Promise<void>;
}

/**
 * Build the long-lived services. The engine is wrapped in the worker pool so
 * that engine calls never exceed `engine.workerPoolSize` in flight.
 */
export function createRelayRuntime(config: AppConfig, logger: Logger): RelayRuntime {
  const directEngine = createEngineClient(logger.child({ module: 'engine' }), {
    socketPath: config.engine.socketPath,
    timeout: config.engine.timeout,
  });
  const pool = createWorkerPool({ size: config.engine.workerPoolSize });
  const engine = createPooledEngineClient(directEngine, pool, logger);
  const broadcaster = createProgressBroadcaster(logger.child({ module: 'progress' }));
  const pipeline = createTransferPipeline({
    engine,
    broadcaster,
    logger,
    defaultTargetRegistry: config.transfer.targetRegistry,
  });

  return { engine, broadcaster, pipeline };
}

/**
 * Start the HTTP server and the progress channel
 */
export function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
  const runtime = createRelayRuntime(config, logger);
  const app = createHttpApp({
    pipeline: runtime.pipeline,
    engine: runtime.engine,
    logger,
    defaultTargetRegistry: config.transfer.targetRegistry,
  });

  return new Promise<RunningServer>((resolve, reject) => {
    const server = app.listen(config.server.port, config.server.host);

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);

      const wss = attachProgressSocket(server, {
        broadcaster: runtime.broadcaster,
        logger: logger.child({ module: 'progress-socket' }),
        pingIntervalMs: config.progress.pingIntervalMs,
      });

      logger.info(
        {
          host: config.server.host,
          port: config.server.port,
          targetRegistry: config.transfer.targetRegistry,
          engineWorkers: config.engine.workerPoolSize,
        },
        'Registry relay listening',
      );

      const close = async (): Promise<void> => {
        for (const client of wss.clients) {
          client.terminate();
        }
        await new Promise<void>((done) => wss.close(() => done()));
        await new Promise<void>((done, fail) =>
          server.close((error) => (error ? fail(error) : done())),
        );
      };

      resolve({ server, wss, runtime, close });
    });
  });
}

/**
 * Close the server on SIGINT/SIGTERM and log fatal process errors
 */
export function installShutdownHandlers(running: RunningServer, logger: Logger): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    try {
      await running.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
}
