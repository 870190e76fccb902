/**
 * Transfer pipeline: pull, re-tag and push one image
 *
 * States: start -> parsing -> pulling -> tagging -> pushing -> done, with
 * `failed` reachable from every state after start. Each transition is
 * published as a progress event. The first failure ends the run; nothing is
 * retried.
 */

import type { Logger } from 'pino';
import {
  buildSourceReference,
  buildTargetReference,
  parseImageReference,
  resolveTargetRegistry,
} from '@/lib/image-reference';
import { createTimer } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/error-utils';
import type { EngineClient } from '@/infra/docker/client';
import type {
  ErrorCode,
  TransferOutcome,
  TransferRequest,
  TransferStage,
  TransferState,
} from '@/types';
import {
  createProgressEvent,
  systemClock,
  type Clock,
  type ProgressBroadcaster,
} from './progress-broadcaster';

export interface TransferPipelineDeps {
  /** Engine facade; the pooled calling convention in production */
  engine: EngineClient;
  broadcaster: ProgressBroadcaster;
  logger: Logger;
  /** Registry domain used when a request names none */
  defaultTargetRegistry: string;
  clock?: Clock;
}

export interface TransferPipeline {
  /** Run one transfer to completion. Never rejects. */
  run(request: TransferRequest): Promise<TransferOutcome>;
}

/**
 * Progress percentages reported at each step
 */
export const PROGRESS = {
  STARTED: 10,
  PULLING: 20,
  PULLED: 40,
  TAGGING: 60,
  TAGGED: 80,
  PUSHING: 90,
  PUSH_STATUS: 95,
  DONE: 100,
  FAILED: 0,
} as const;

/**
 * Stage to blame for an unexpected error raised while in `state`
 */
function stageOf(state: TransferState): TransferStage {
  switch (state) {
    case 'pulling':
    case 'tagging':
    case 'pushing':
      return state;
    default:
      return 'parsing';
  }
}

export function createTransferPipeline(deps: TransferPipelineDeps): TransferPipeline {
  const { engine, broadcaster, defaultTargetRegistry } = deps;
  const clock = deps.clock ?? systemClock;
  const baseLogger = deps.logger.child({ module: 'transfer-pipeline' });

  const notify = (message: string, progress: number): Promise<void> =>
    broadcaster.publish(createProgressEvent(message, progress, clock));

  return {
    async run(request: TransferRequest): Promise<TransferOutcome> {
      const targetRegistry = resolveTargetRegistry(request.targetRegistry, defaultTargetRegistry);
      const logger = baseLogger.child({ imageName: request.imageName, targetRegistry });
      const timer = createTimer(logger, 'transfer');

      let state: TransferState = 'start';
      let source: string | undefined;
      let target: string | undefined;

      const failed = async (
        stage: TransferStage,
        message: string,
        error: string,
        code?: ErrorCode,
      ): Promise<TransferOutcome> => {
        state = 'failed';
        timer.error(error, { stage, code });
        await notify(message, PROGRESS.FAILED);

        const outcome: TransferOutcome = {
          success: false,
          state: 'failed',
          failedAt: stage,
          error,
        };
        if (code !== undefined) outcome.code = code;
        if (source !== undefined) outcome.source = source;
        if (target !== undefined) outcome.target = target;
        return outcome;
      };

      try {
        state = 'parsing';
        const parsed = parseImageReference(request.imageName);
        if (!parsed.ok) {
          return await failed('parsing', `Error: ${parsed.error}`, parsed.error, parsed.code);
        }

        const { bucket, repository, tag } = parsed.value;
        source = buildSourceReference(parsed.value);
        target = buildTargetReference(targetRegistry, bucket, repository, tag);
        timer.checkpoint('parsed', { source, target });

        await notify(`Starting transfer: ${source} -> ${target}`, PROGRESS.STARTED);

        state = 'pulling';
        await notify('Pulling image...', PROGRESS.PULLING);
        const pulled = await engine.pullImage(source);
        if (!pulled.ok) {
          return await failed('pulling', `Pull failed: ${pulled.error}`, pulled.error, pulled.code);
        }
        await notify(`Image pulled: ${pulled.value.shortId}`, PROGRESS.PULLED);

        state = 'tagging';
        await notify('Re-tagging image...', PROGRESS.TAGGING);
        const tagged = await engine.tagImage(pulled.value, targetRegistry, bucket, repository, tag);
        if (!tagged.ok) {
          return await failed('tagging', `Tag failed: ${tagged.error}`, tagged.error, tagged.code);
        }
        await notify('Image re-tagged', PROGRESS.TAGGED);

        state = 'pushing';
        await notify('Pushing image to target registry...', PROGRESS.PUSHING);
        const pushed = await engine.pushImage(target, (status) =>
          notify(`Push status: ${status}`, PROGRESS.PUSH_STATUS),
        );
        if (!pushed.ok) {
          return await failed('pushing', `Push failed: ${pushed.error}`, pushed.error, pushed.code);
        }

        state = 'done';
        await notify(`Transfer complete: pushed ${target}`, PROGRESS.DONE);
        timer.end({ source, target });
        return { success: true, state: 'done', source, target };
      } catch (error) {
        const message = extractErrorMessage(error);
        return failed(
          stageOf(state),
          `Unexpected error during transfer: ${message}`,
          message,
          'UNEXPECTED',
        );
      }
    },
  };
}
