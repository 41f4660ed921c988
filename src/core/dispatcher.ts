import { setTimeout as sleep } from 'node:timers/promises';

import { HttpCode, JSON_CONTENT_TYPE, RequestMethod, RpcErrorCode } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';

import type { AuthGate } from './auth-gate.js';
import type { CommandTable } from './command-table.js';
import {
  errorReply,
  isRecord,
  parseRpcRequest,
  readRpcId,
  RpcError,
  statusForRpcError,
  successReply,
  toRpcErrorObject,
  type RpcId,
  type RpcReply,
  type RpcResult,
} from './jsonrpc.js';
import type { ReadinessProvider } from './readiness.js';
import { RequestBodyTooLargeError, type HttpExchange } from './request-facade.js';

export interface DispatcherOptions {
  authGate: AuthGate;
  table: CommandTable;
  readiness: ReadinessProvider;
  /**
   * Fixed wait before answering a failed authorization.
   */
  authFailureDelayMs?: number;
}

export interface DispatchOutcome {
  handled: boolean;
  statusCode: number;
}

export interface Dispatcher {
  handle(exchange: HttpExchange): Promise<DispatchOutcome>;
}

function sendJson(exchange: HttpExchange, statusCode: number, payload: unknown): DispatchOutcome {
  exchange.writeHeader('Content-Type', JSON_CONTENT_TYPE);
  exchange.writeReply(statusCode, JSON.stringify(payload));
  return { handled: statusCode === HttpCode.Ok, statusCode };
}

function sendErrorReply(exchange: HttpExchange, error: RpcError, id: RpcId): DispatchOutcome {
  return sendJson(exchange, statusForRpcError(error.code), errorReply(error.toObject(), id));
}

function reject(exchange: HttpExchange, statusCode: number, body = ''): DispatchOutcome {
  exchange.writeReply(statusCode, body);
  return { handled: false, statusCode };
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { authGate, table, readiness } = options;
  const authFailureDelayMs = options.authFailureDelayMs ?? 250;

  /**
   * Runs one envelope. Never throws: every failure becomes the item's own error.
   */
  async function executeOne(value: unknown): Promise<RpcResult<unknown>> {
    const parsed = parseRpcRequest(value);
    if (!parsed.ok) {
      return parsed;
    }

    try {
      const result = await table.execute(parsed.value.method, parsed.value.params);
      return { ok: true, value: result };
    } catch (error) {
      return { ok: false, error: toRpcErrorObject(error) };
    }
  }

  async function executeBatch(items: unknown[]): Promise<RpcReply[]> {
    const replies: RpcReply[] = [];

    for (let i = 0; i < items.length; i++) {
      const item = items[i];
      const result = await executeOne(item);
      const id = readRpcId(item);
      replies.push(result.ok ? successReply(result.value, id) : errorReply(result.error, id));
    }

    return replies;
  }

  async function respond(exchange: HttpExchange): Promise<DispatchOutcome> {
    let id: RpcId = null;

    try {
      const body = await exchange.readBody();

      let request: unknown;
      try {
        request = JSON.parse(body);
      } catch {
        throw new RpcError(RpcErrorCode.ParseError, 'Parse error');
      }

      const { ready, status } = readiness.status();
      if (!ready) {
        throw new RpcError(RpcErrorCode.InWarmup, status);
      }

      if (isRecord(request)) {
        id = readRpcId(request);

        const result = await executeOne(request);
        if (!result.ok) {
          throw new RpcError(result.error.code, result.error.message);
        }

        return sendJson(exchange, HttpCode.Ok, successReply(result.value, id));
      }

      if (Array.isArray(request)) {
        const replies = await executeBatch(request);
        return sendJson(exchange, HttpCode.Ok, replies);
      }

      throw new RpcError(RpcErrorCode.InvalidRequest, 'Top-level object parse error');
    } catch (error) {
      if (error instanceof RequestBodyTooLargeError) {
        logJsonl('WARN', 'rpc_body_too_large', {
          peer: exchange.peer,
          maxRequestBytes: error.maxRequestBytes,
        });
        return sendJson(exchange, HttpCode.PayloadTooLarge, { message: 'request body too large' });
      }

      if (error instanceof RpcError) {
        return sendErrorReply(exchange, error, id);
      }

      logJsonl('ERROR', 'rpc_request_failed', {
        peer: exchange.peer,
        error: getErrorMessage(error),
      });
      return sendErrorReply(exchange, new RpcError(RpcErrorCode.ParseError, getErrorMessage(error)), id);
    }
  }

  return {
    async handle(exchange) {
      if (exchange.method !== RequestMethod.Post) {
        return reject(exchange, HttpCode.BadMethod, 'JSONRPC server handles only POST requests');
      }

      const [hasAuthorization, authorization] = exchange.getHeader('authorization');
      if (!hasAuthorization) {
        return reject(exchange, HttpCode.Unauthorized);
      }

      if (!authGate.authorize(authorization)) {
        logJsonl('WARN', 'rpc_auth_failed', {
          peer: exchange.peer,
          message: `incorrect password attempt from ${exchange.peer}`,
        });

        // Fixed delay against brute forcing, not a backoff.
        await sleep(authFailureDelayMs);
        return reject(exchange, HttpCode.Unauthorized);
      }

      return respond(exchange);
    },
  };
}
