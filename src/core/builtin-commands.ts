import { RpcErrorCode } from '../common/consts.js';

import type { CommandHandler } from './command-table.js';
import { RpcError } from './jsonrpc.js';

export interface BuiltinCommandOptions {
  /**
   * Invoked by `stop`, on the loop thread, after the reply is written.
   */
  onStop: () => void;
  startedAt?: number;
}

/**
 * Commands served when no command module is configured.
 */
export function createBuiltinCommands(options: BuiltinCommandOptions): Record<string, CommandHandler> {
  const startedAt = options.startedAt ?? Date.now();

  const commands: Record<string, CommandHandler> = {
    ping: () => 'pong',
    uptime: () => Math.floor((Date.now() - startedAt) / 1000),
    echo: (params) => params,
    help: () => Object.keys(commands).sort().join('\n'),
    stop: (params, { timers }) => {
      const raw = Array.isArray(params) ? params[0] : params.delay;
      const delay = raw === undefined ? 0 : raw;
      if (typeof delay !== 'number' || !Number.isFinite(delay) || delay < 0) {
        throw new RpcError(RpcErrorCode.InvalidParams, 'delay must be a non-negative number of seconds');
      }

      timers.runLater('stop', options.onStop, delay);
      return 'RPC server stopping';
    },
  };

  return commands;
}
