import { RpcErrorCode } from '../common/consts.js';
import type { CommandTable } from '../core/command-table.js';
import { RpcError, toRpcErrorObject } from '../core/jsonrpc.js';

import {
  createCommandWorkerPool,
  WorkerPoolError,
  WorkerRuntimeError,
  type CommandWorkerPool,
  type CommandWorkerPoolOptions,
} from './command-worker-pool.js';

export interface WorkerCommandTable extends CommandTable {
  readonly pool: CommandWorkerPool;
  close(): Promise<void>;
}

/**
 * Maps what came back from the worker onto a JSON-RPC error.
 */
function toRpcError(error: unknown): RpcError {
  if (error instanceof WorkerRuntimeError && typeof error.code === 'number') {
    return new RpcError(error.code, error.message);
  }

  if (error instanceof WorkerPoolError) {
    return new RpcError(RpcErrorCode.InternalError, error.message);
  }

  const { code, message } = toRpcErrorObject(error);
  return new RpcError(code, message);
}

/**
 * Command table whose commands live in a module loaded by a worker thread.
 * Timers the commands create run their tasks on `options.loop`.
 */
export function createWorkerCommandTable(options: CommandWorkerPoolOptions): WorkerCommandTable {
  const pool = createCommandWorkerPool(options);

  return {
    pool,
    async execute(method, params) {
      const reply = await pool.execute({ method, params }).catch((error: unknown) => {
        throw toRpcError(error);
      });

      if (!reply.ok) {
        throw toRpcError(new WorkerRuntimeError(reply.error ?? { name: 'Error', message: 'Unknown worker error' }));
      }

      return reply.result;
    },
    listCommands: () => pool.inspect(),
    close: () => pool.close(),
  };
}
