import { isLogLevel, type LogLevel } from './logger.js';

/**
 * Gateway settings resolved from the process environment.
 */
export interface GatewayConfig {
  host: string;
  port: number;
  rpcUser: string;
  rpcPassword: string;
  /**
   * Refuse to start when the password is empty or equal to the user name.
   */
  requirePassword: boolean;
  maxRequestBytes: number;
  /**
   * Fixed wait before answering a failed authorization.
   */
  authFailureDelayMs: number;
  /**
   * Optional command module executed on the worker pool.
   */
  commandModule?: string;
  workerTimeoutMs: number;
  workerMaxInflight: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid ${key}: ${raw}`);
  }

  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }

  if (raw === 'true' || raw === '1') {
    return true;
  }

  if (raw === 'false' || raw === '0') {
    return false;
  }

  throw new ConfigError(`Invalid ${key}: ${raw}`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.RPC_LOG_LEVEL?.trim().toUpperCase();
  if (raw === undefined || raw === '') {
    return 'INFO';
  }

  if (!isLogLevel(raw)) {
    throw new ConfigError(`Invalid RPC_LOG_LEVEL: ${raw}`);
  }

  return raw;
}

/**
 * Resolves gateway config with defaults.
 */
export function resolveGatewayConfig(env: Env = process.env): GatewayConfig {
  const port = readInteger(env, 'RPC_PORT', 8332, 0);
  if (port > 65535) {
    throw new ConfigError(`Invalid RPC_PORT: ${port}`);
  }

  const commandModule = env.RPC_COMMAND_MODULE?.trim();

  return {
    host: env.RPC_HOST?.trim() || '127.0.0.1',
    port,
    rpcUser: env.RPC_USER ?? '',
    rpcPassword: env.RPC_PASSWORD ?? '',
    requirePassword: readBoolean(env, 'RPC_REQUIRE_PASSWORD', true),
    maxRequestBytes: readInteger(env, 'RPC_MAX_REQUEST_BYTES', 1024 * 1024, 1),
    authFailureDelayMs: readInteger(env, 'RPC_AUTH_FAILURE_DELAY_MS', 250, 0),
    commandModule: commandModule === undefined || commandModule === '' ? undefined : commandModule,
    workerTimeoutMs: readInteger(env, 'RPC_WORKER_TIMEOUT_MS', 3000, 1),
    workerMaxInflight: readInteger(env, 'RPC_WORKER_MAX_INFLIGHT', 64, 1),
    logLevel: readLogLevel(env),
  };
}
