import { threadId, type MessagePort } from 'node:worker_threads';

import { RemoteTimerState } from '../common/consts.js';

import type { loopProtocol } from './loop-protocol.js';

export type RemoteTimerResult =
  | { status: 'fired' }
  | { status: 'released' }
  | { status: 'failed'; error: loopProtocol.SerializedError };

/**
 * Handle for a timer that lives on another thread's loop.
 */
export interface RemoteTimerHandle {
  readonly id: string;
  /**
   * Settles once: fired, released before firing, or failed on the loop side. Never rejects.
   */
  readonly done: Promise<RemoteTimerResult>;
  /**
   * Returns true when the task is guaranteed never to run. False means the loop already
   * claimed the timer (or it settled) and `done` reports what happened.
   */
  release(): boolean;
}

/**
 * Thread-side end of a port obtained from `EventLoop.connect()`.
 */
export interface LoopClient {
  newTimer(delaySeconds: number, task: loopProtocol.TaskRef): RemoteTimerHandle;
  /**
   * Releases what can still be released. The port stays open until timers the loop
   * already claimed have reported back.
   */
  close(): void;
}

interface PendingTimer {
  state: Int32Array;
  settle: (result: RemoteTimerResult) => void;
}

function isOutboundMessage(message: unknown): message is loopProtocol.OutboundMessage {
  return (
    typeof message === 'object' &&
    message !== null &&
    'type' in message &&
    (message.type === 'fired' || message.type === 'cancelled' || message.type === 'failed') &&
    'id' in message &&
    typeof message.id === 'string'
  );
}

function toResult(message: loopProtocol.OutboundMessage): RemoteTimerResult {
  switch (message.type) {
    case 'fired':
      return { status: 'fired' };
    case 'cancelled':
      return { status: 'released' };
    case 'failed':
      return { status: 'failed', error: message.error };
  }
}

/**
 * Swaps the shared cell to `Released` unless the loop got there first.
 */
function tryRelease(state: Int32Array): boolean {
  return (
    Atomics.compareExchange(state, 0, RemoteTimerState.Pending, RemoteTimerState.Released) ===
    RemoteTimerState.Pending
  );
}

export function createLoopClient(port: MessagePort): LoopClient {
  const pending = new Map<string, PendingTimer>();
  let counter = 0;
  let closed = false;

  port.on('message', (message: unknown) => {
    if (!isOutboundMessage(message)) {
      return;
    }

    const timer = pending.get(message.id);
    if (timer === undefined) {
      return;
    }

    pending.delete(message.id);
    timer.settle(toResult(message));

    if (closed && pending.size === 0) {
      port.close();
    }
  });

  port.unref();

  return {
    newTimer(delaySeconds, task) {
      if (closed) {
        throw new Error('loop client is closed');
      }

      if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
        throw new RangeError(`Invalid timer delay: ${delaySeconds}`);
      }

      const id = `${threadId.toString(36)}-${(counter++).toString(36)}`;
      const state = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
      const done = new Promise<RemoteTimerResult>((resolve) => {
        pending.set(id, { state, settle: resolve });
      });

      const message: loopProtocol.TimerMessage = {
        type: 'timer',
        id,
        delayMs: delaySeconds * 1000,
        task,
        state,
      };
      port.postMessage(message);

      return {
        id,
        done,
        release() {
          const timer = pending.get(id);
          if (timer === undefined || !tryRelease(timer.state)) {
            return false;
          }

          pending.delete(id);
          const cancel: loopProtocol.CancelMessage = { type: 'cancel', id };
          port.postMessage(cancel);
          timer.settle({ status: 'released' });
          return true;
        },
      };
    },

    close() {
      if (closed) {
        return;
      }

      closed = true;
      const timers = Array.from(pending.entries());
      for (let i = 0; i < timers.length; i++) {
        const [id, timer] = timers[i];
        if (tryRelease(timer.state)) {
          pending.delete(id);
          const cancel: loopProtocol.CancelMessage = { type: 'cancel', id };
          port.postMessage(cancel);
          timer.settle({ status: 'released' });
        }
      }

      if (pending.size === 0) {
        port.close();
      }
    },
  };
}
