/**
 * WebSocket progress channel
 *
 * Each connected client becomes a progress observer. The server pings every
 * client periodically to keep idle connections open, and announces connects and
 * disconnects to everyone still subscribed. Messages are JSON objects of the
 * form `{ message, progress, timestamp }`.
 */

import type { Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import type { Logger } from 'pino';
import {
  createProgressEvent,
  systemClock,
  type Clock,
  type ProgressBroadcaster,
  type ProgressObserver,
} from '@/app/progress-broadcaster';

export const PROGRESS_SOCKET_PATH = '/ws';

/**
 * The part of a `ws` WebSocket the progress channel relies on
 */
export interface ProgressSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  on(event: 'close' | 'error', listener: (error?: Error) => void): unknown;
}

export interface ProgressSocketDeps {
  broadcaster: ProgressBroadcaster;
  logger: Logger;
  pingIntervalMs: number;
  clock?: Clock;
}

/**
 * Subscribe one connected socket and tie its lifetime to the broadcaster
 */
export function handleProgressConnection(
  socket: ProgressSocket,
  deps: ProgressSocketDeps,
): ProgressObserver {
  const { broadcaster, logger, pingIntervalMs } = deps;
  const clock = deps.clock ?? systemClock;

  const observer: ProgressObserver = {
    send: (event) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('Progress socket is not open'));
          return;
        }
        socket.send(JSON.stringify(event), (error) => (error ? reject(error) : resolve()));
      }),
  };

  const keepAlive = setInterval(() => {
    if (socket.readyState === WebSocket.OPEN) {
      socket.ping();
    }
  }, pingIntervalMs);
  keepAlive.unref();

  let closed = false;
  const disconnect = (): void => {
    if (closed) return;
    closed = true;
    clearInterval(keepAlive);
    broadcaster.unsubscribe(observer);
    logger.info({ observers: broadcaster.size() }, 'Progress client disconnected');
    void broadcaster.publish(createProgressEvent('Progress channel disconnected', 0, clock));
  };

  socket.on('close', disconnect);
  socket.on('error', (error) => {
    logger.debug({ error: error?.message }, 'Progress socket error');
    disconnect();
  });

  broadcaster.subscribe(observer);
  logger.info({ observers: broadcaster.size() }, 'Progress client connected');
  void broadcaster.publish(createProgressEvent('Progress channel connected', 0, clock));

  return observer;
}

/**
 * Serve the progress channel on `server` at {@link PROGRESS_SOCKET_PATH}
 */
export function attachProgressSocket(server: Server, deps: ProgressSocketDeps): WebSocketServer {
  const wss = new WebSocketServer({ server, path: PROGRESS_SOCKET_PATH });

  wss.on('connection', (socket: WebSocket) => {
    handleProgressConnection(socket, deps);
  });

  wss.on('error', (error: Error) => {
    deps.logger.error({ error: error.message }, 'Progress socket server error');
  });

  return wss;
}
