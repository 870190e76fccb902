/**
 * Queued calling convention for the engine facade
 *
 * Every operation is dispatched onto a fixed-size worker pool and awaited, so
 * the number of engine calls in flight never exceeds the pool size no matter
 * how many transfers run concurrently.
 */

import type { Logger } from 'pino';
import type { WorkerPool } from '@/lib/worker-pool';
import type { EngineClient } from './client';

/**
 * Wrap an engine client so that each call runs on `pool`
 */
export function createPooledEngineClient(
  engine: EngineClient,
  pool: WorkerPool,
  logger: Logger,
): EngineClient {
  const dispatch = <T>(operation: string, task: () => Promise<T>): Promise<T> => {
    logger.trace({ operation, pool: pool.getStatus() }, 'Dispatching engine call');
    return pool.run(task);
  };

  return {
    ping: () => dispatch('ping', () => engine.ping()),

    testConnection: () => dispatch('ping', () => engine.testConnection()),

    getConnectionDiagnostic: () => dispatch('ping', () => engine.getConnectionDiagnostic()),

    getInfo: () => dispatch('info', () => engine.getInfo()),

    pullImage: (reference) => dispatch('pull', () => engine.pullImage(reference)),

    tagImage: (image, targetRegistry, bucket, repository, tag) =>
      dispatch('tag', () => engine.tagImage(image, targetRegistry, bucket, repository, tag)),

    pushImage: (reference, onStatus) =>
      dispatch('push', () => engine.pushImage(reference, onStatus)),

    listImages: () => dispatch('list', () => engine.listImages()),

    removeImage: (reference, force) =>
      dispatch('remove', () => engine.removeImage(reference, force)),
  };
}
