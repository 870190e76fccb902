/**
 * Fixed-size worker pool for engine calls.
 *
 * At most `size` tasks run at once; the rest wait in FIFO order. A slot is
 * handed straight to the next waiter on release, so a queued task cannot be
 * overtaken by one submitted later.
 */

export interface WorkerPoolStatus {
  size: number;
  active: number;
  waiting: number;
}

interface WorkerPoolOptions {
  size: number;
}

export interface WorkerPool {
  /** Run `task` once a slot is free and resolve with its result */
  run<T>(task: () => Promise<T>): Promise<T>;
  getStatus(): WorkerPoolStatus;
}

export const createWorkerPool = (options?: Partial<WorkerPoolOptions>): WorkerPool => {
  const size = options?.size ?? 4;
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Worker pool size must be a positive integer, got ${size}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < size) {
      active++;
      return;
    }
    // The releasing task keeps `active` unchanged and passes its slot on.
    await new Promise<void>((resolve) => queue.push(resolve));
  };

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  };

  const run = async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };

  return {
    run,
    getStatus: () => ({ size, active, waiting: queue.length }),
  };
};
