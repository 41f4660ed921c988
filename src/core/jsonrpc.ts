import { HttpCode, RpcErrorCode } from '../common/consts.js';

/**
 * Whatever JSON value the client sent as `id`, echoed back untouched. `null` when absent.
 */
export type RpcId = unknown;

export type RpcParams = unknown[] | Record<string, unknown>;

export interface RpcErrorObject {
  code: number;
  message: string;
}

/**
 * Reply envelope. Exactly one of `result` and `error` is non-null.
 */
export interface RpcReply {
  result: unknown;
  error: RpcErrorObject | null;
  id: RpcId;
}

export interface RpcRequest {
  method: string;
  params: RpcParams;
  id: RpcId;
}

export type RpcResult<T> = { ok: true; value: T } | { ok: false; error: RpcErrorObject };

/**
 * Structured JSON-RPC failure. Command handlers throw it to choose the error code themselves.
 */
export class RpcError extends Error {
  public readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
  }

  toObject(): RpcErrorObject {
    return { code: this.code, message: this.message };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts anything thrown below the dispatcher into an error object.
 * Values that are not RpcError keep their message under the parse-error code.
 */
export function toRpcErrorObject(error: unknown): RpcErrorObject {
  if (error instanceof RpcError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    return { code: RpcErrorCode.ParseError, message: error.message };
  }

  return { code: RpcErrorCode.ParseError, message: String(error) };
}

function toRpcId(value: unknown): RpcId {
  return value === undefined ? null : value;
}

/**
 * Extracts the id before anything else so error replies can still be correlated.
 */
export function readRpcId(value: unknown): RpcId {
  return isRecord(value) ? toRpcId(value.id) : null;
}

export function parseRpcRequest(value: unknown): RpcResult<RpcRequest> {
  if (!isRecord(value)) {
    return { ok: false, error: { code: RpcErrorCode.InvalidRequest, message: 'Invalid Request object' } };
  }

  const method = value.method;
  if (method === undefined) {
    return { ok: false, error: { code: RpcErrorCode.InvalidRequest, message: 'Missing method' } };
  }

  if (typeof method !== 'string') {
    return { ok: false, error: { code: RpcErrorCode.InvalidRequest, message: 'Method must be a string' } };
  }

  const params = value.params;
  if (params === undefined || params === null) {
    return { ok: true, value: { method, params: [], id: toRpcId(value.id) } };
  }

  if (!Array.isArray(params) && !isRecord(params)) {
    return {
      ok: false,
      error: { code: RpcErrorCode.InvalidRequest, message: 'Params must be an array or object' },
    };
  }

  return { ok: true, value: { method, params, id: toRpcId(value.id) } };
}

export function successReply(result: unknown, id: RpcId): RpcReply {
  return { result: result === undefined ? null : result, error: null, id };
}

export function errorReply(error: RpcErrorObject, id: RpcId): RpcReply {
  return { result: null, error, id };
}

/**
 * Transport status for an error reply. Parse errors and warmup share the generic 500 with real failures.
 */
export function statusForRpcError(code: number): HttpCode {
  if (code === RpcErrorCode.InvalidRequest) {
    return HttpCode.BadRequest;
  }

  if (code === RpcErrorCode.MethodNotFound) {
    return HttpCode.NotFound;
  }

  return HttpCode.InternalServerError;
}
