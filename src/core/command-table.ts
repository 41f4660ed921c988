import { RpcErrorCode } from '../common/consts.js';
import type { TimerRegistry } from '../events/timer-registry.js';

import { RpcError, type RpcParams } from './jsonrpc.js';

/**
 * What a command can reach besides its params.
 */
export interface CommandContext {
  method: string;
  timers: TimerRegistry;
}

export type CommandHandler = (params: RpcParams, context: CommandContext) => unknown;

/**
 * Maps a method name to its handler and runs it.
 */
export interface CommandTable {
  execute(method: string, params: RpcParams): Promise<unknown>;
  listCommands(): Promise<string[]>;
  /**
   * Releases whatever runs the commands. Called once when the server closes.
   */
  close?(): Promise<void>;
}

export function methodNotFound(): RpcError {
  return new RpcError(RpcErrorCode.MethodNotFound, 'Method not found');
}

export function createCommandTable(commands: Record<string, CommandHandler>, timers: TimerRegistry): CommandTable {
  const table = new Map<string, CommandHandler>(Object.entries(commands));

  return {
    async execute(method, params) {
      const handler = table.get(method);
      if (handler === undefined) {
        throw methodNotFound();
      }

      return handler(params, { method, timers });
    },
    listCommands: async () => Array.from(table.keys()).sort(),
  };
}
