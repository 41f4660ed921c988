import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { EventLoop } from '../events/event-loop.js';

import type { ExecutorOptions } from './options.js';
import { resolveExecutorOptions } from './options.js';
import type { protocol } from './protocol.js';

export type WorkerErrorCode = 'WORKER_OVERLOADED' | 'WORKER_TIMEOUT' | 'WORKER_CLOSED' | 'WORKER_RESTARTED';

/**
 * Re-hydrated error from worker side. A numeric `code` is a JSON-RPC code chosen by the command.
 */
export class WorkerRuntimeError extends Error {
  public readonly code?: number | string;

  constructor(error: protocol.SerializedError) {
    super(error.message);
    this.name = error.name;
    this.code = error.code;
    this.stack = error.stack ?? this.stack;
  }
}

/**
 * Raised by the pool itself rather than by a command.
 */
export class WorkerPoolError extends Error {
  public readonly code: WorkerErrorCode;

  constructor(code: WorkerErrorCode, message: string) {
    super(message);
    this.name = 'WorkerPoolError';
    this.code = code;
  }
}

type WorkerReply = protocol.ResultMessage | protocol.InspectResultMessage;

interface InflightRequest {
  resolve: (reply: WorkerReply) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Diagnostics view of the pool.
 */
export interface CommandWorkerSnapshot {
  status: 'running' | 'stopped' | 'restarting' | 'closed';
  threadId?: number;
  inflight: number;
  restartCount: number;
  lastRestartReason?: string;
  lastRestartAt?: number;
  limits: {
    requestTimeoutMs: number;
    maxInflight: number;
    memorySoftLimitMb: number;
    memoryHardLimitMb: number;
    maxOldGenerationSizeMb: number;
  };
  memory?: {
    heapUsed: number;
    rss: number;
    sampledAt: number;
  };
}

/**
 * Resolves worker entry for tsx dev and compiled js runtime.
 */
function resolveWorkerEntry(): { url: URL; execArgv: string[] } {
  const currentExt = path.extname(fileURLToPath(import.meta.url));
  if (currentExt === '.ts') {
    return { url: new URL('./command-worker.ts', import.meta.url), execArgv: ['--import', 'tsx'] };
  }

  return { url: new URL('./command-worker.js', import.meta.url), execArgv: [] };
}

/**
 * Main-thread API for running commands off the loop thread.
 */
export interface CommandWorkerPool {
  execute(payload: protocol.Payload): Promise<protocol.ResultMessage>;
  /**
   * Names exported by the command module, sorted.
   */
  inspect(): Promise<string[]>;
  close(): Promise<void>;
  getSnapshot(): CommandWorkerSnapshot;
}

export interface CommandWorkerPoolOptions extends Partial<ExecutorOptions> {
  /**
   * Absolute path of the module whose default export maps method names to commands.
   */
  modulePath: string;
  /**
   * Loop that owns the timers the commands create.
   */
  loop: EventLoop;
}

export function createCommandWorkerPool(options: CommandWorkerPoolOptions): CommandWorkerPool {
  const { modulePath, loop, ...overrides } = options;
  return new CommandWorkerPoolImpl(modulePath, loop, resolveExecutorOptions(overrides));
}

class CommandWorkerPoolImpl implements CommandWorkerPool {
  private readonly entry = resolveWorkerEntry();

  private readonly inflight = new Map<string, InflightRequest>();

  private requestCounter = 0;

  private worker: Worker | undefined;

  private restarting: Promise<void> | undefined;

  private closed = false;

  private latestMemory: protocol.MemoryMessage | undefined;

  private latestMemoryAt: number | undefined;

  private restartCount = 0;

  private lastRestartReason: string | undefined;

  private lastRestartAt: number | undefined;

  constructor(
    private readonly modulePath: string,
    private readonly loop: EventLoop,
    private readonly options: ExecutorOptions,
  ) {}

  async execute(payload: protocol.Payload): Promise<protocol.ResultMessage> {
    const reply = await this.send((id) => ({ type: 'execute', id, payload }));
    if (reply.type !== 'result') {
      throw new Error('runtime worker answered execute with an inspect result');
    }

    return reply;
  }

  async inspect(): Promise<string[]> {
    const reply = await this.send((id) => ({ type: 'inspect', id }));
    if (reply.type !== 'inspect_result') {
      throw new Error('runtime worker answered inspect with an execute result');
    }

    if (!reply.ok) {
      throw new WorkerRuntimeError(reply.error ?? { name: 'Error', message: 'Unknown worker error' });
    }

    return reply.commands ?? [];
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.rejectInflight(new WorkerPoolError('WORKER_CLOSED', 'runtime worker closed'));

    const worker = this.worker;
    this.worker = undefined;

    if (worker === undefined) {
      return;
    }

    try {
      await worker.terminate();
    } catch (error) {
      logJsonl('WARN', 'runtime_worker_terminate_failed', {
        error: getErrorMessage(error),
      });
    }
  }

  getSnapshot(): CommandWorkerSnapshot {
    return {
      status: this.getStatus(),
      threadId: this.worker?.threadId,
      inflight: this.inflight.size,
      restartCount: this.restartCount,
      lastRestartReason: this.lastRestartReason,
      lastRestartAt: this.lastRestartAt,
      limits: {
        requestTimeoutMs: this.options.requestTimeoutMs,
        maxInflight: this.options.maxInflight,
        memorySoftLimitMb: this.options.memorySoftLimitMb,
        memoryHardLimitMb: this.options.memoryHardLimitMb,
        maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
      },
      memory:
        this.latestMemory === undefined || this.latestMemoryAt === undefined
          ? undefined
          : {
              heapUsed: this.latestMemory.heapUsed,
              rss: this.latestMemory.rss,
              sampledAt: this.latestMemoryAt,
            },
    };
  }

  /**
   * Enqueues a message into the worker with timeout protection.
   */
  private send(build: (id: string) => protocol.InboundMessage): Promise<WorkerReply> {
    if (this.closed) {
      return Promise.reject(new WorkerPoolError('WORKER_CLOSED', 'runtime worker is closed'));
    }

    if (this.inflight.size >= this.options.maxInflight) {
      return Promise.reject(new WorkerPoolError('WORKER_OVERLOADED', 'runtime worker overloaded'));
    }

    const worker = this.ensureWorker();

    return new Promise<WorkerReply>((resolve, reject) => {
      const id = `${Date.now().toString(36)}-${(this.requestCounter++).toString(36)}`;

      const timer = setTimeout(() => {
        this.inflight.delete(id);
        reject(new WorkerPoolError('WORKER_TIMEOUT', `runtime worker timeout after ${this.options.requestTimeoutMs}ms`));
        void this.restart('request_timeout');
      }, this.options.requestTimeoutMs);

      this.inflight.set(id, { resolve, reject, timer });
      worker.postMessage(build(id));
    });
  }

  /**
   * Starts worker on demand and wires supervisor hooks.
   */
  private ensureWorker(): Worker {
    if (this.worker !== undefined) {
      return this.worker;
    }

    const loopPort = this.loop.connect();
    const workerData: protocol.WorkerData = {
      modulePath: this.modulePath,
      loopPort,
      memorySampleIntervalMs: this.options.memorySampleIntervalMs,
    };

    const worker = new Worker(this.entry.url, {
      workerData,
      transferList: [loopPort],
      execArgv: this.entry.execArgv,
      resourceLimits: {
        maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
      },
    });

    worker.unref();

    worker.on('message', (message: protocol.OutboundMessage) => {
      // A dropped worker may still report until terminate() completes.
      if (this.worker !== worker) {
        return;
      }

      this.handleWorkerMessage(message);
    });

    worker.once('error', (error) => {
      logJsonl('ERROR', 'runtime_worker_error', {
        error: getErrorMessage(error),
      });

      if (this.worker !== worker) {
        return;
      }

      this.rejectInflight(new Error(`runtime worker error: ${getErrorMessage(error)}`));
      this.worker = undefined;
    });

    worker.once('exit', (code) => {
      if (this.worker !== worker) {
        return;
      }

      this.worker = undefined;

      if (this.closed) {
        return;
      }

      this.rejectInflight(new Error(`runtime worker exited with code ${code}`));
      void this.restart('worker_exit');
    });

    this.worker = worker;
    logJsonl('INFO', 'runtime_worker_started', {
      modulePath: this.modulePath,
      maxOldGenerationSizeMb: this.options.maxOldGenerationSizeMb,
    });
    return worker;
  }

  private handleWorkerMessage(message: protocol.OutboundMessage): void {
    if (message.type === 'memory') {
      this.handleMemoryMessage(message);
      return;
    }

    const inflight = this.inflight.get(message.id);
    if (inflight === undefined) {
      return;
    }

    this.inflight.delete(message.id);
    clearTimeout(inflight.timer);
    inflight.resolve(message);
  }

  /**
   * Updates memory sample and enforces soft/hard thresholds.
   */
  private handleMemoryMessage(message: protocol.MemoryMessage): void {
    this.latestMemory = message;
    this.latestMemoryAt = Date.now();

    const softLimitBytes = this.options.memorySoftLimitMb * 1024 * 1024;
    const hardLimitBytes = this.options.memoryHardLimitMb * 1024 * 1024;

    if (message.heapUsed >= hardLimitBytes) {
      logJsonl('WARN', 'runtime_worker_memory_hard_limit', {
        heapUsed: message.heapUsed,
        hardLimitBytes,
      });
      void this.restart('memory_hard_limit');
      return;
    }

    if (message.heapUsed >= softLimitBytes && this.inflight.size === 0) {
      logJsonl('WARN', 'runtime_worker_memory_soft_limit', {
        heapUsed: message.heapUsed,
        softLimitBytes,
      });
      void this.restart('memory_soft_limit');
    }
  }

  /**
   * Serializes restart operations to avoid duplicate restarts.
   */
  private async restart(reason: string): Promise<void> {
    if (this.closed) {
      return;
    }

    if (this.restarting !== undefined) {
      await this.restarting;
      return;
    }

    this.restarting = this.performRestart(reason).finally(() => {
      this.restarting = undefined;
    });

    await this.restarting;
  }

  /**
   * Drops the current worker. The next call starts a fresh one.
   */
  private async performRestart(reason: string): Promise<void> {
    const worker = this.worker;
    this.worker = undefined;
    this.restartCount += 1;
    this.lastRestartReason = reason;
    this.lastRestartAt = Date.now();

    this.rejectInflight(new WorkerPoolError('WORKER_RESTARTED', `runtime worker restarted: ${reason}`));

    if (worker !== undefined) {
      try {
        await worker.terminate();
      } catch (error) {
        logJsonl('WARN', 'runtime_worker_restart_terminate_failed', {
          reason,
          error: getErrorMessage(error),
        });
      }
    }

    logJsonl('WARN', 'runtime_worker_restarted', { reason });
  }

  private rejectInflight(error: Error): void {
    const requests = Array.from(this.inflight.values());
    this.inflight.clear();

    for (let i = 0; i < requests.length; i++) {
      const request = requests[i];
      clearTimeout(request.timer);
      request.reject(error);
    }
  }

  private getStatus(): CommandWorkerSnapshot['status'] {
    if (this.closed) {
      return 'closed';
    }

    if (this.restarting !== undefined) {
      return 'restarting';
    }

    if (this.worker === undefined) {
      return 'stopped';
    }

    return 'running';
  }
}
