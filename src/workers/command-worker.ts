import { pathToFileURL } from 'node:url';
import { parentPort, workerData } from 'node:worker_threads';

import { createLoopClient, type LoopClient } from '../events/loop-client.js';

import type { protocol } from './protocol.js';

/**
 * Context handed to every command running in the worker.
 */
export interface WorkerCommandContext {
  method: string;
  /**
   * Runs a task registered on the gateway loop after `delaySeconds`.
   */
  newTimer: LoopClient['newTimer'];
}

/**
 * Shape of a command exported by the module's default export.
 */
export type WorkerCommand = (params: protocol.Payload['params'], context: WorkerCommandContext) => unknown;

const METHOD_NOT_FOUND = -32601;

/**
 * Converts unknown errors to protocol error payload.
 */
function toWorkerError(error: unknown): protocol.SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error) };
  }

  const code: unknown = 'code' in error ? error.code : undefined;

  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code: typeof code === 'number' || typeof code === 'string' ? code : undefined,
  };
}

function isWorkerData(value: unknown): value is protocol.WorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'modulePath' in value &&
    typeof value.modulePath === 'string' &&
    'loopPort' in value &&
    typeof value.loopPort === 'object' &&
    value.loopPort !== null
  );
}

/**
 * ! Worker must run under parentPort; standalone run is invalid.
 */
if (parentPort === null) {
  throw new Error('command worker missing parent port');
}
const port = parentPort;

if (!isWorkerData(workerData)) {
  throw new Error('command worker missing module path or loop port');
}
const data = workerData;

const loopClient = createLoopClient(data.loopPort);

let commandsPromise: Promise<Map<string, WorkerCommand>> | undefined;

/**
 * Loads the command module once per worker lifetime.
 */
function loadCommands(): Promise<Map<string, WorkerCommand>> {
  if (commandsPromise === undefined) {
    commandsPromise = import(pathToFileURL(data.modulePath).href).then((loaded: { default?: unknown }) => {
      const exported = loaded.default;
      if (typeof exported !== 'object' || exported === null) {
        throw new TypeError(`Default export is not a command record: ${data.modulePath}`);
      }

      const commands = new Map<string, WorkerCommand>();
      for (const [name, value] of Object.entries(exported)) {
        if (typeof value === 'function') {
          commands.set(name, (params, context) => value(params, context));
        }
      }

      return commands;
    });
  }

  return commandsPromise;
}

async function execute(message: protocol.ExecuteMessage): Promise<protocol.ResultMessage> {
  const startedAt = Date.now();
  const { method, params } = message.payload;

  try {
    const commands = await loadCommands();
    const command = commands.get(method);

    if (command === undefined) {
      return {
        type: 'result',
        id: message.id,
        ok: false,
        elapsedMs: Date.now() - startedAt,
        error: { name: 'RpcError', message: 'Method not found', code: METHOD_NOT_FOUND },
      };
    }

    const result = await command(params, { method, newTimer: loopClient.newTimer });

    return {
      type: 'result',
      id: message.id,
      ok: true,
      elapsedMs: Date.now() - startedAt,
      result,
    };
  } catch (error) {
    return {
      type: 'result',
      id: message.id,
      ok: false,
      elapsedMs: Date.now() - startedAt,
      error: toWorkerError(error),
    };
  }
}

async function inspect(message: protocol.InspectMessage): Promise<protocol.InspectResultMessage> {
  try {
    const commands = await loadCommands();
    return { type: 'inspect_result', id: message.id, ok: true, commands: Array.from(commands.keys()).sort() };
  } catch (error) {
    return { type: 'inspect_result', id: message.id, ok: false, error: toWorkerError(error) };
  }
}

/**
 * Periodically reports worker memory usage.
 */
const memoryReporter = setInterval(() => {
  const usage = process.memoryUsage();

  const message: protocol.OutboundMessage = {
    type: 'memory',
    heapUsed: usage.heapUsed,
    rss: usage.rss,
  };

  port.postMessage(message);
}, typeof data.memorySampleIntervalMs === 'number' ? data.memorySampleIntervalMs : 5000);

memoryReporter.unref();

/**
 * Main worker message loop.
 */
port.on('message', (message: protocol.InboundMessage) => {
  const task = message.type === 'execute' ? execute(message) : inspect(message);

  void task.then((result) => {
    try {
      port.postMessage(result);
    } catch (error) {
      // Result was not structured-cloneable.
      const fallback: protocol.ResultMessage = {
        type: 'result',
        id: result.id,
        ok: false,
        elapsedMs: 0,
        error: { ...toWorkerError(error), code: undefined },
      };
      port.postMessage(fallback);
    }
  });
});
