export const DUMMY_BASE_URL = 'http://rpcgate.local';

export const JSON_CONTENT_TYPE = 'application/json';

export const enum HttpCode {
  Ok = 200,
  BadRequest = 400,
  Unauthorized = 401,
  NotFound = 404,
  BadMethod = 405,
  PayloadTooLarge = 413,
  InternalServerError = 500,
}

/**
 * JSON-RPC error codes understood by the gateway itself. Command handlers may use any other code.
 */
export const enum RpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  InWarmup = -28,
}

export const enum RequestMethod {
  Unknown = 'UNKNOWN',
  Get = 'GET',
  Post = 'POST',
  Head = 'HEAD',
  Put = 'PUT',
}

/**
 * Values of the shared cell that decides whether a remote timer runs. Whoever swaps it out of `Pending` wins.
 */
export const enum RemoteTimerState {
  Pending = 0,
  Released = 1,
  Claimed = 2,
}
