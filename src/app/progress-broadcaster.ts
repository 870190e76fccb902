/**
 * Progress fan-out to connected observers
 *
 * The observer set is process-wide state created empty at startup and changed
 * only through subscribe/unsubscribe. Node runs every mutation on the event
 * loop, so no lock guards it.
 */

import type { Logger } from 'pino';
import type { ProgressEvent } from '@/types';

/**
 * A connected client. The broadcaster holds a non-owning reference; the
 * transport layer owns the channel.
 */
export interface ProgressObserver {
  send(event: ProgressEvent): void | Promise<void>;
}

export interface ProgressBroadcaster {
  subscribe(observer: ProgressObserver): void;
  /** Removing an absent observer is a no-op */
  unsubscribe(observer: ProgressObserver): void;
  /**
   * Deliver `event` to every subscribed observer concurrently. Delivery
   * failures stay local to their observer; the returned promise never rejects.
   */
  publish(event: ProgressEvent): Promise<void>;
  size(): number;
}

export type Clock = () => number;

/** Wall-clock seconds since the epoch, fractional */
export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Build a progress event; `progress` is rounded and clamped to [0, 100]
 */
export function createProgressEvent(
  message: string,
  progress: number,
  clock: Clock = systemClock,
): ProgressEvent {
  const clamped = Math.min(100, Math.max(0, Math.round(progress)));
  return { message, progress: Number.isFinite(clamped) ? clamped : 0, timestamp: clock() };
}

export function createProgressBroadcaster(logger: Logger): ProgressBroadcaster {
  const observers = new Set<ProgressObserver>();

  const deliver = async (observer: ProgressObserver, event: ProgressEvent): Promise<void> => {
    await observer.send(event);
  };

  return {
    subscribe(observer) {
      observers.add(observer);
      logger.debug({ observers: observers.size }, 'Progress observer subscribed');
    },

    unsubscribe(observer) {
      if (observers.delete(observer)) {
        logger.debug({ observers: observers.size }, 'Progress observer unsubscribed');
      }
    },

    async publish(event) {
      if (observers.size === 0) return;

      // Snapshot so that (un)subscribes during delivery do not affect this event
      const targets = [...observers];
      const results = await Promise.allSettled(targets.map((observer) => deliver(observer, event)));

      const dropped = results.filter((result) => result.status === 'rejected').length;
      if (dropped > 0) {
        logger.debug(
          { dropped, observers: targets.length },
          'Progress event not delivered to some observers',
        );
      }
    },

    size: () => observers.size,
  };
}
