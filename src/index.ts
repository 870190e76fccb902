/**
 * Public API for embedding the registry relay
 */

/** @public */
export {
  loadConfig,
  configSchema,
  DEFAULT_TARGET_REGISTRY,
  DEFAULT_WORKER_POOL_SIZE,
} from './config';
/** @public */
export type { AppConfig, ConfigOverrides } from './config';

/** @public */
export { startServer, createRelayRuntime, installShutdownHandlers } from './server';
export type { RelayRuntime, RunningServer } from './server';
export { createHttpApp } from './server/http';
export {
  attachProgressSocket,
  handleProgressConnection,
  PROGRESS_SOCKET_PATH,
} from './server/progress-socket';

/** @public */
export { createTransferPipeline, PROGRESS } from './app/transfer-pipeline';
export type { TransferPipeline, TransferPipelineDeps } from './app/transfer-pipeline';
export {
  createProgressBroadcaster,
  createProgressEvent,
  systemClock,
} from './app/progress-broadcaster';
export type { ProgressBroadcaster, ProgressObserver, Clock } from './app/progress-broadcaster';

// Engine facade, direct and pooled
export { createEngineClient, shortImageId, EngineStreamError } from './infra/docker/client';
export type {
  EngineClient,
  EngineClientConfig,
  ImageHandle,
  LocalImage,
  EngineInfo,
} from './infra/docker/client';
export { createPooledEngineClient } from './infra/docker/pooled-client';
export { createWorkerPool } from './lib/worker-pool';
export type { WorkerPool, WorkerPoolStatus } from './lib/worker-pool';

export {
  parseImageReference,
  buildSourceReference,
  buildTargetReference,
  resolveTargetRegistry,
} from './lib/image-reference';
export { createLogger } from './lib/logger';

/** @public */
export { Success, Failure } from './types/core';
export type { Result, ErrorCode, ErrorGuidance } from './types/core';
export type {
  ImageReference,
  TransferRequest,
  TransferOutcome,
  TransferState,
  ProgressEvent,
} from './types/transfer';
