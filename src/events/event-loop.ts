import { MessageChannel, threadId, type MessagePort } from 'node:worker_threads';

import { RemoteTimerState } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import { RpcError } from '../core/jsonrpc.js';

import { EventBridge } from './event-bridge.js';
import type { loopProtocol } from './loop-protocol.js';

/**
 * Callable owned by the loop thread, addressable by name from other threads.
 */
export type LoopTask = (args: unknown[]) => void;

function toSerializedError(error: unknown): loopProtocol.SerializedError {
  if (error instanceof RpcError) {
    return { name: error.name, message: error.message, code: error.code };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }

  return { name: 'Error', message: String(error) };
}

function isInboundMessage(message: unknown): message is loopProtocol.InboundMessage {
  if (typeof message !== 'object' || message === null || !('type' in message) || !('id' in message)) {
    return false;
  }

  if (typeof message.id !== 'string') {
    return false;
  }

  if (message.type === 'cancel') {
    return true;
  }

  if (message.type !== 'timer' || !('delayMs' in message) || !('task' in message) || !('state' in message)) {
    return false;
  }

  const { delayMs, task, state } = message;
  if (typeof delayMs !== 'number' || !Number.isFinite(delayMs) || delayMs < 0) {
    return false;
  }

  if (!(state instanceof Int32Array) || !(state.buffer instanceof SharedArrayBuffer) || state.length !== 1) {
    return false;
  }

  return typeof task === 'object' && task !== null && 'name' in task && typeof task.name === 'string';
}

/**
 * The I/O loop of the thread that created it. Every callback it holds runs on that thread;
 * other threads reach it only through ports handed out by `connect()`.
 */
export class EventLoop {
  /**
   * Thread that owns this loop.
   */
  public readonly threadId = threadId;

  private readonly bridges = new Set<EventBridge>();

  private readonly tasks = new Map<string, LoopTask>();

  private readonly ports = new Set<MessagePort>();

  private closed = false;

  /**
   * Number of live events.
   */
  get pending(): number {
    return this.bridges.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  attach(bridge: EventBridge): void {
    if (this.closed) {
      throw new Error('event loop is closed');
    }

    this.bridges.add(bridge);
  }

  detach(bridge: EventBridge): void {
    this.bridges.delete(bridge);
  }

  registerTask(name: string, task: LoopTask): void {
    if (this.tasks.has(name)) {
      throw new Error(`loop task already registered: ${name}`);
    }

    this.tasks.set(name, task);
  }

  unregisterTask(name: string): boolean {
    return this.tasks.delete(name);
  }

  runTask(name: string, args: unknown[] = []): void {
    const task = this.tasks.get(name);
    if (task === undefined) {
      throw new Error(`unknown loop task: ${name}`);
    }

    task(args);
  }

  /**
   * Opens a channel for another thread. Transfer the returned port to that thread.
   */
  connect(): MessagePort {
    if (this.closed) {
      throw new Error('event loop is closed');
    }

    const { port1, port2 } = new MessageChannel();
    const remoteTimers = new Map<string, EventBridge>();

    port1.on('message', (message: unknown) => {
      this.handlePortMessage(port1, remoteTimers, message);
    });

    // The other side owns these timers; once it is gone they count as released.
    port1.once('close', () => {
      this.ports.delete(port1);

      const orphans = Array.from(remoteTimers.values());
      remoteTimers.clear();
      for (let i = 0; i < orphans.length; i++) {
        orphans[i].dispose();
      }
    });

    port1.unref();
    this.ports.add(port1);

    return port2;
  }

  /**
   * Disposes all pending events and closes every port.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    const bridges = Array.from(this.bridges);
    for (let i = 0; i < bridges.length; i++) {
      bridges[i].dispose();
    }

    const ports = Array.from(this.ports);
    this.ports.clear();
    for (let i = 0; i < ports.length; i++) {
      ports[i].close();
    }

    this.tasks.clear();
  }

  private handlePortMessage(port: MessagePort, remoteTimers: Map<string, EventBridge>, message: unknown): void {
    if (!isInboundMessage(message)) {
      logJsonl('WARN', 'loop_message_invalid', {
        message: typeof message === 'object' ? JSON.stringify(message) : String(message),
      });
      return;
    }

    if (message.type === 'cancel') {
      const bridge = remoteTimers.get(message.id);
      remoteTimers.delete(message.id);
      bridge?.dispose();
      return;
    }

    const { id, delayMs, task, state } = message;

    if (this.closed || remoteTimers.has(id)) {
      const failed: loopProtocol.FailedMessage = {
        type: 'failed',
        id,
        error: { name: 'Error', message: this.closed ? 'event loop is closed' : `duplicate timer id: ${id}` },
      };
      port.postMessage(failed);
      return;
    }

    const bridge = new EventBridge(
      this,
      () => {
        remoteTimers.delete(id);

        // A cancel may still sit behind this timer in the port queue; the cell already says so.
        const previous = Atomics.compareExchange(state, 0, RemoteTimerState.Pending, RemoteTimerState.Claimed);
        if (previous !== RemoteTimerState.Pending) {
          const cancelled: loopProtocol.CancelledMessage = { type: 'cancelled', id };
          port.postMessage(cancelled);
          return;
        }

        let reply: loopProtocol.OutboundMessage;
        try {
          this.runTask(task.name, task.args ?? []);
          reply = { type: 'fired', id };
        } catch (error) {
          logJsonl('ERROR', 'timer_task_failed', {
            task: task.name,
            error: getErrorMessage(error),
          });
          reply = { type: 'failed', id, error: toSerializedError(error) };
        }

        port.postMessage(reply);
      },
      { deleteWhenTriggered: true },
    );

    remoteTimers.set(id, bridge);
    bridge.trigger(delayMs);
  }
}
