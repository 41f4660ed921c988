import http from 'node:http';

import { HttpCode, JSON_CONTENT_TYPE } from '../common/consts.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import { EventLoop } from '../events/event-loop.js';
import { createLoopTimerProvider } from '../events/timer-registry.js';
import type { GatewayOptions, GatewayServer } from '../types/server.js';

import { createAuthGate } from './auth-gate.js';
import { createCommandTable } from './command-table.js';
import { createGatewayContext, initRpcAuthentication } from './context.js';
import { createDispatcher } from './dispatcher.js';
import { createHttpHandlerRegistry, type HttpHandler } from './http-handlers.js';
import { createReadiness } from './readiness.js';
import { formatPeer, parseRequestMethod, RequestFacade } from './request-facade.js';
import { parseRequestPath } from './utils/request.js';

const DEFAULT_MAX_REQUEST_BYTES = 1024 * 1024;

/**
 * Last-resort reply for a response the dispatcher may already have started.
 */
function replyInternalError(res: http.ServerResponse): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  res.statusCode = HttpCode.InternalServerError;
  res.setHeader('Content-Type', JSON_CONTENT_TYPE);
  res.end(JSON.stringify({ message: http.STATUS_CODES[HttpCode.InternalServerError] }));
}

function closeHttpServer(server: http.Server): Promise<void> {
  if (!server.listening) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error !== undefined) {
        reject(error);
        return;
      }

      resolve();
    });
    server.closeIdleConnections();
  });
}

export function startServer(options: GatewayOptions): GatewayServer {
  const maxRequestBytes = options.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES;
  if (!Number.isInteger(maxRequestBytes) || maxRequestBytes <= 0) {
    throw new Error(`Invalid maxRequestBytes: ${maxRequestBytes}`);
  }

  const authentication = initRpcAuthentication(
    {
      rpcUser: options.rpcUser,
      rpcPassword: options.rpcPassword,
      requirePassword: options.requirePassword ?? true,
    },
    options.notify ?? ((message) => log('ERROR', message)),
  );
  if (!authentication.ok) {
    throw new Error('RPC credentials are not configured');
  }

  const loop = new EventLoop();
  const context = createGatewayContext(authentication.credential);
  const timerProvider = createLoopTimerProvider(loop, 'HTTP');
  context.timers.register(timerProvider);

  const table =
    options.createTable !== undefined
      ? options.createTable({ context, loop })
      : createCommandTable(options.commands ?? {}, context.timers);

  const dispatcher = createDispatcher({
    authGate: createAuthGate(context.credential),
    table,
    readiness: options.readiness ?? createReadiness({ ready: true }),
    authFailureDelayMs: options.authFailureDelayMs,
  });

  const handlers = createHttpHandlerRegistry((_req, res) => {
    res.statusCode = HttpCode.NotFound;
    res.end(http.STATUS_CODES[HttpCode.NotFound]);
  });

  const rpcHandler: HttpHandler = (req, res) => {
    const exchange = new RequestFacade(req, res, { maxRequestBytes });

    void dispatcher.handle(exchange).catch((error: unknown) => {
      logJsonl('ERROR', 'request_failed', {
        method: exchange.method,
        peer: exchange.peer,
        error: getErrorMessage(error),
      });

      replyInternalError(res);
    });
  };

  handlers.register('/', true, rpcHandler);

  const server = http.createServer((req, res) => {
    const path = parseRequestPath(req.url);
    const method = parseRequestMethod(req.method);
    const peer = formatPeer(req);

    log('DEBUG', `Request ${req.method ?? 'UNKNOWN'} ${path} from ${peer}`);
    logJsonl('INFO', 'request_received', { method, peer, path });

    res.once('finish', () => {
      logJsonl('INFO', 'request_completed', {
        method,
        peer,
        path,
        statusCode: res.statusCode,
      });
    });

    handlers.lookup(req, res);
  });

  let closing: Promise<void> | undefined;

  const close = (): Promise<void> => {
    if (closing !== undefined) {
      return closing;
    }

    handlers.unregister('/', true);
    context.timers.unregister(timerProvider);
    context.timers.clear();
    loop.close();

    closing = Promise.all([closeHttpServer(server), table.close?.()]).then(() => undefined);
    return closing;
  };

  server.on('close', () => {
    log('INFO', `Server closed at http://${options.host}:${options.port}`);
    logJsonl('INFO', 'server_closed', { host: options.host, port: options.port });
  });

  server.listen(options.port, options.host, () => {
    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : options.port;
    log('INFO', `Server started at http://${options.host}:${port}`);

    void table
      .listCommands()
      .then((commands) => {
        logJsonl('INFO', 'server_started', {
          host: options.host,
          port,
          commands,
        });
      })
      .catch((error) => {
        logJsonl('ERROR', 'command_table_load_failed', {
          error: getErrorMessage(error),
        });
      });
  });

  return { server, context, loop, handlers, rpcHandler, close };
}
