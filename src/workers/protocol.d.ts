import type { MessagePort } from 'node:worker_threads';

/**
 * IPC protocol between the loop thread and the command worker.
 */
export namespace protocol {
  /**
   * Data handed to the worker at startup.
   */
  export interface WorkerData {
    /**
     * Absolute path of the command module.
     */
    modulePath: string;
    /**
     * Port from `EventLoop.connect()`, transferred to the worker.
     */
    loopPort: MessagePort;
    memorySampleIntervalMs: number;
  }

  /**
   * One JSON-RPC call.
   */
  export interface Payload {
    method: string;
    params: unknown[] | Record<string, unknown>;
  }

  /**
   * Main -> worker execute command.
   */
  export interface ExecuteMessage {
    type: 'execute';
    /**
     * Correlation id for this request.
     */
    id: string;
    payload: Payload;
  }

  /**
   * Main -> worker request for the exported command names.
   */
  export interface InspectMessage {
    type: 'inspect';
    id: string;
  }

  /**
   * Serialized runtime error. A numeric `code` is a JSON-RPC error code.
   */
  export interface SerializedError {
    name: string;
    message: string;
    stack?: string;
    code?: number | string;
  }

  /**
   * Worker -> main result event.
   */
  export interface ResultMessage {
    type: 'result';
    /**
     * Correlation id matching ExecuteMessage.id.
     */
    id: string;
    ok: boolean;
    /**
     * Command execution time in milliseconds.
     */
    elapsedMs: number;
    result?: unknown;
    error?: SerializedError;
  }

  /**
   * Worker -> main inspect result event.
   */
  export interface InspectResultMessage {
    type: 'inspect_result';
    id: string;
    ok: boolean;
    commands?: string[];
    error?: SerializedError;
  }

  /**
   * Worker -> main periodic memory report.
   */
  export interface MemoryMessage {
    type: 'memory';
    /**
     * V8 heap used bytes.
     */
    heapUsed: number;
    /**
     * Resident set size bytes.
     */
    rss: number;
  }

  export type InboundMessage = ExecuteMessage | InspectMessage;

  export type OutboundMessage = ResultMessage | InspectResultMessage | MemoryMessage;
}
