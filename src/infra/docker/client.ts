/**
 * Container engine facade over dockerode
 *
 * Every operation acquires its own engine handle, uses it for that one call and
 * releases it on every exit path. Failures come back as `Result` values carrying
 * the daemon's message verbatim.
 */

import Docker from 'dockerode';
import { Readable } from 'stream';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Success, Failure, type EngineErrorCode, type Result } from '@/types';
import { describeConnectionError, extractEngineErrorGuidance } from './errors';
import { autoDetectDockerSocket, toDockerOptions } from './socket-validation';

/**
 * Docker client configuration options.
 */
export interface EngineClientConfig {
  /** Socket path or daemon URL (defaults to auto-detection with Colima support) */
  socketPath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
  /** Factory for engine handles; one handle is created per operation */
  connect?: () => Docker;
}

/**
 * A local image produced by a pull
 */
export interface ImageHandle {
  /** Full content id, e.g. `sha256:4f1c...` */
  id: string;
  /** Abbreviated id as printed by the Docker CLI */
  shortId: string;
  /** Reference the image was pulled as */
  reference: string;
}

/**
 * Information about a locally stored image.
 */
export interface LocalImage {
  id: string;
  repoTags: string[];
  size: number;
  /** Unix timestamp (seconds) */
  created: number;
}

const engineInfoSchema = z
  .object({
    ID: z.string().optional(),
    Name: z.string().optional(),
    ServerVersion: z.string().optional(),
    OperatingSystem: z.string().optional(),
    Architecture: z.string().optional(),
    Images: z.number().optional(),
    Containers: z.number().optional(),
  })
  .passthrough();

export type EngineInfo = z.infer<typeof engineInfoSchema>;

/**
 * One record of a pull or push progress stream
 */
const progressRecordSchema = z
  .object({
    status: z.string().optional(),
    id: z.string().optional(),
    progress: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z.object({ message: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

type ProgressRecord = z.infer<typeof progressRecordSchema>;

/**
 * Receives each status line of a push. May return a promise, which is awaited
 * before the next line is delivered.
 */
export type StatusListener = (status: string) => void | Promise<void>;

/**
 * Container engine operations used by the transfer pipeline and the HTTP layer
 */
export interface EngineClient {
  /** Check that the daemon answers */
  ping: () => Promise<Result<void>>;

  /** `true` when the daemon answers a ping */
  testConnection: () => Promise<boolean>;

  /** Human-readable connectivity diagnostic */
  getConnectionDiagnostic: () => Promise<string>;

  /** Daemon metadata (`docker info`) */
  getInfo: () => Promise<Result<EngineInfo>>;

  /**
   * Pull an image from its registry.
   * @param reference - Source reference, e.g. `nginx:latest`
   */
  pullImage: (reference: string) => Promise<Result<ImageHandle>>;

  /**
   * Tag a local image as `targetRegistry/bucket/repository:tag`.
   */
  tagImage: (
    image: ImageHandle,
    targetRegistry: string,
    bucket: string,
    repository: string,
    tag: string,
  ) => Promise<Result<void>>;

  /**
   * Push an image, forwarding each status line to `onStatus`.
   * The first error record in the stream fails the push and the rest of the
   * stream is abandoned.
   */
  pushImage: (reference: string, onStatus?: StatusListener) => Promise<Result<void>>;

  /** List local images */
  listImages: () => Promise<Result<LocalImage[]>>;

  /** Remove a local image */
  removeImage: (reference: string, force?: boolean) => Promise<Result<void>>;
}

/**
 * Error record found in a progress stream
 */
export class EngineStreamError extends Error {
  constructor(
    message: string,
    readonly record: ProgressRecord,
  ) {
    super(message);
    this.name = 'EngineStreamError';
  }
}

function parseProgressRecord(raw: unknown): ProgressRecord {
  const parsed = progressRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

function recordError(record: ProgressRecord): string | undefined {
  return record.error ?? record.errorDetail?.message;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Abbreviated image id in the Docker CLI style
 */
export function shortImageId(id: string): string {
  return id.startsWith('sha256:') ? id.slice(0, 17) : id.slice(0, 10);
}

/**
 * Follow a progress stream to its end.
 *
 * Records are handed to `onRecord` one at a time, in order. The returned
 * promise rejects on the first error record, on a stream failure or when
 * `onRecord` throws. The stream is destroyed at that point and later records
 * are ignored.
 */
function followStream(
  docker: Docker,
  stream: NodeJS.ReadableStream,
  onRecord: (record: ProgressRecord) => void | Promise<void>,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let settled = false;
    let delivered: Promise<void> = Promise.resolve();

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      if (stream instanceof Readable) {
        stream.destroy();
      }
      reject(error);
    };

    docker.modem.followProgress(
      stream,
      (err: unknown) => {
        if (err) {
          fail(toError(err));
          return;
        }
        void delivered.then(() => {
          if (settled) return;
          settled = true;
          resolve();
        });
      },
      (raw: unknown) => {
        if (settled) return;
        const record = parseProgressRecord(raw);
        delivered = delivered
          .then(async () => {
            if (settled) return;
            const message = recordError(record);
            if (message !== undefined) {
              throw new EngineStreamError(message, record);
            }
            await onRecord(record);
          })
          .catch((error: unknown) => fail(toError(error)));
      },
    );
  });
}

/**
 * Create the engine facade
 * @param logger - Logger instance for debug output
 * @param config - Optional connection settings
 */
export const createEngineClient = (
  logger: Logger,
  config: EngineClientConfig = {},
): EngineClient => {
  const socketPath = config.socketPath ?? autoDetectDockerSocket();
  const dockerOptions = toDockerOptions(socketPath, config.timeout);
  const connect = config.connect ?? (() => new Docker(dockerOptions));

  logger.debug({ dockerOptions }, 'Engine client configured');

  const withConnection = async <T>(
    operation: string,
    fn: (docker: Docker) => Promise<T>,
  ): Promise<T> => {
    const docker = connect();
    logger.debug({ operation }, 'Engine connection acquired');
    try {
      return await fn(docker);
    } finally {
      logger.debug({ operation }, 'Engine connection released');
    }
  };

  const fail = <T>(
    code: EngineErrorCode,
    operation: string,
    error: unknown,
    context: Record<string, unknown>,
  ): Result<T> => {
    const guidance = extractEngineErrorGuidance(error);
    logger.error(
      {
        ...context,
        error: guidance.message,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
      },
      `Docker ${operation} failed`,
    );
    return Failure(guidance.message, guidance, code);
  };

  const ping = async (): Promise<Result<void>> => {
    try {
      await withConnection('ping', (docker) => docker.ping());
      return Success(undefined);
    } catch (error) {
      return fail('ENGINE_UNAVAILABLE', 'ping', error, {});
    }
  };

  return {
    ping,

    async testConnection(): Promise<boolean> {
      const result = await ping();
      return result.ok;
    },

    async getConnectionDiagnostic(): Promise<string> {
      try {
        await withConnection('ping', (docker) => docker.ping());
        return 'Docker connection is healthy';
      } catch (error) {
        logger.debug({ error }, 'Docker connectivity check failed');
        return describeConnectionError(error);
      }
    },

    async getInfo(): Promise<Result<EngineInfo>> {
      try {
        const raw: unknown = await withConnection('info', (docker) => docker.info());
        const parsed = engineInfoSchema.safeParse(raw);
        if (!parsed.success) {
          return fail('INFO_FAILED', 'info', new Error('Unexpected response from docker info'), {
            issues: parsed.error.issues,
          });
        }
        return Success(parsed.data);
      } catch (error) {
        return fail('INFO_FAILED', 'info', error, {});
      }
    },

    async pullImage(reference: string): Promise<Result<ImageHandle>> {
      try {
        logger.debug({ reference }, 'Starting Docker pull');

        const handle = await withConnection('pull', async (docker) => {
          const stream: NodeJS.ReadableStream = await docker.pull(reference);
          await followStream(docker, stream, (record) => {
            logger.debug(record, 'Docker pull progress');
          });
          const inspect = await docker.getImage(reference).inspect();
          return { id: inspect.Id, shortId: shortImageId(inspect.Id), reference };
        });

        logger.info({ reference, imageId: handle.id }, 'Image pulled successfully');
        return Success(handle);
      } catch (error) {
        return fail('PULL_FAILED', 'pull', error, { reference });
      }
    },

    async tagImage(
      image: ImageHandle,
      targetRegistry: string,
      bucket: string,
      repository: string,
      tag: string,
    ): Promise<Result<void>> {
      const repo = `${targetRegistry}/${bucket}/${repository}`;
      try {
        await withConnection('tag', (docker) => docker.getImage(image.id).tag({ repo, tag }));

        logger.info({ imageId: image.id, repository: repo, tag }, 'Image tagged successfully');
        return Success(undefined);
      } catch (error) {
        return fail('TAG_FAILED', 'tag', error, { imageId: image.id, repository: repo, tag });
      }
    },

    async pushImage(reference: string, onStatus?: StatusListener): Promise<Result<void>> {
      try {
        logger.debug({ reference }, 'Starting Docker push');

        await withConnection('push', async (docker) => {
          const stream = await docker.getImage(reference).push({});
          await followStream(docker, stream, async (record) => {
            logger.debug(record, 'Docker push progress');
            if (onStatus && record.status !== undefined) {
              await onStatus(record.status);
            }
          });
        });

        logger.info({ reference }, 'Image pushed successfully');
        return Success(undefined);
      } catch (error) {
        return fail('PUSH_FAILED', 'push', error, { reference });
      }
    },

    async listImages(): Promise<Result<LocalImage[]>> {
      try {
        const images = await withConnection('list', (docker) => docker.listImages());
        return Success(
          images.map((image) => ({
            id: image.Id,
            repoTags: image.RepoTags ?? [],
            size: image.Size,
            created: image.Created,
          })),
        );
      } catch (error) {
        return fail('LIST_FAILED', 'list images', error, {});
      }
    },

    async removeImage(reference: string, force = false): Promise<Result<void>> {
      try {
        await withConnection('remove', (docker) => docker.getImage(reference).remove({ force }));

        logger.info({ reference, force }, 'Image removed');
        return Success(undefined);
      } catch (error) {
        return fail('REMOVE_FAILED', 'remove image', error, { reference, force });
      }
    },
  };
};
