#!/usr/bin/env node
import path from 'node:path';

import { ConfigError, resolveGatewayConfig } from './common/config.js';
import { getErrorMessage, log, logJsonl, setLogLevel } from './common/logger.js';
import { createBuiltinCommands } from './core/builtin-commands.js';
import { createReadiness } from './core/readiness.js';
import { startServer } from './core/server.js';
import type { GatewayServer } from './types/server.js';
import { createWorkerCommandTable } from './workers/worker-command-table.js';

function main(): void {
  const config = resolveGatewayConfig();
  setLogLevel(config.logLevel);
  const readiness = createReadiness();
  const { commandModule } = config;

  let gateway: GatewayServer | undefined;

  const shutdown = (reason: string): void => {
    if (gateway === undefined) {
      return;
    }

    logJsonl('INFO', 'server_stopping', { reason });
    void gateway.close().catch((error: unknown) => {
      logJsonl('ERROR', 'server_close_failed', { error: getErrorMessage(error) });
      process.exitCode = 1;
    });
  };

  gateway = startServer({
    host: config.host,
    port: config.port,
    rpcUser: config.rpcUser,
    rpcPassword: config.rpcPassword,
    requirePassword: config.requirePassword,
    maxRequestBytes: config.maxRequestBytes,
    authFailureDelayMs: config.authFailureDelayMs,
    readiness,
    commands: createBuiltinCommands({ onStop: () => shutdown('rpc_stop') }),
    createTable:
      commandModule === undefined
        ? undefined
        : ({ loop }) =>
            createWorkerCommandTable({
              modulePath: path.resolve(commandModule),
              loop,
              requestTimeoutMs: config.workerTimeoutMs,
              maxInflight: config.workerMaxInflight,
            }),
  });

  gateway.server.once('listening', () => {
    readiness.finishWarmup();
  });

  gateway.server.once('error', (error) => {
    log('ERROR', `Unable to bind ${config.host}:${config.port}: ${getErrorMessage(error)}`);
    process.exitCode = 1;
    shutdown('listen_failed');
  });

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    log('ERROR', error.message);
  } else {
    log('ERROR', `Startup failed: ${getErrorMessage(error)}`);
  }

  process.exitCode = 1;
}
