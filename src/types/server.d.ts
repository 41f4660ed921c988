import type http from 'node:http';

import type { CommandHandler, CommandTable } from '../core/command-table.js';
import type { GatewayContext, OperatorNotifier } from '../core/context.js';
import type { HttpHandler, HttpHandlerRegistry } from '../core/http-handlers.js';
import type { ReadinessProvider } from '../core/readiness.js';
import type { EventLoop } from '../events/event-loop.js';

export interface GatewayOptions {
  host: string;

  port: number;

  rpcUser: string;

  rpcPassword: string;

  /**
   * Refuse to start when the password is empty or equal to the user name. Defaults to true.
   */
  requirePassword?: boolean;

  /**
   * In-process commands. Ignored when `createTable` is given.
   */
  commands?: Record<string, CommandHandler>;

  /**
   * Builds the dispatch table once the context and the loop exist.
   */
  createTable?: (runtime: { context: GatewayContext; loop: EventLoop }) => CommandTable;

  /**
   * Warmup state. Without it the gateway is ready immediately.
   */
  readiness?: ReadinessProvider;

  maxRequestBytes?: number;

  authFailureDelayMs?: number;

  /**
   * Receives the startup warning when credentials are missing.
   */
  notify?: OperatorNotifier;
}

export interface GatewayServer {
  server: http.Server;
  context: GatewayContext;
  loop: EventLoop;
  /**
   * Path table. The JSON-RPC handler is bound to `/` only.
   */
  handlers: HttpHandlerRegistry;
  /**
   * The JSON-RPC handler, for binding it to further paths.
   */
  rpcHandler: HttpHandler;
  /**
   * Unregisters the loop timer provider, cancels pending timers and stops listening.
   */
  close(): Promise<void>;
}
