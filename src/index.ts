export { resolveGatewayConfig, ConfigError, type GatewayConfig } from './common/config.js';
export { HttpCode, RpcErrorCode } from './common/consts.js';
export { authorize, createAuthGate, type AuthGate } from './core/auth-gate.js';
export { createBuiltinCommands, type BuiltinCommandOptions } from './core/builtin-commands.js';
export {
  createCommandTable,
  methodNotFound,
  type CommandContext,
  type CommandHandler,
  type CommandTable,
} from './core/command-table.js';
export {
  createGatewayContext,
  initRpcAuthentication,
  type CredentialResult,
  type CredentialSettings,
  type GatewayContext,
  type OperatorNotifier,
} from './core/context.js';
export {
  createHttpHandlerRegistry,
  ROUTED_METHODS,
  type HttpHandler,
  type HttpHandlerRegistry,
} from './core/http-handlers.js';
export { createDispatcher, type DispatchOutcome, type Dispatcher, type DispatcherOptions } from './core/dispatcher.js';
export {
  RpcError,
  type RpcErrorObject,
  type RpcId,
  type RpcParams,
  type RpcReply,
  type RpcResult,
} from './core/jsonrpc.js';
export { createReadiness, type Readiness, type ReadinessProvider, type ReadinessStatus } from './core/readiness.js';
export {
  RequestBodyTooLargeError,
  RequestFacade,
  RequestStateError,
  type HttpExchange,
  type RequestState,
} from './core/request-facade.js';
export { startServer } from './core/server.js';
export { EventBridge, type EventBridgeOptions } from './events/event-bridge.js';
export { EventLoop, type LoopTask } from './events/event-loop.js';
export { createLoopClient, type LoopClient, type RemoteTimerHandle, type RemoteTimerResult } from './events/loop-client.js';
export {
  createLoopTimerProvider,
  TimerRegistry,
  type TimerHandle,
  type TimerProvider,
} from './events/timer-registry.js';
export type { WorkerCommand, WorkerCommandContext } from './workers/command-worker.js';
export {
  createCommandWorkerPool,
  WorkerPoolError,
  WorkerRuntimeError,
  type CommandWorkerPool,
  type CommandWorkerSnapshot,
} from './workers/command-worker-pool.js';
export { resolveExecutorOptions, type ExecutorOptions } from './workers/options.js';
export { createWorkerCommandTable, type WorkerCommandTable } from './workers/worker-command-table.js';
export type { GatewayOptions, GatewayServer } from './types/server.js';
