/**
 * Messages exchanged over a port returned by `EventLoop.connect()`.
 */
export namespace loopProtocol {
  /**
   * Reference to a task registered on the loop thread.
   */
  export interface TaskRef {
    name: string;
    args?: unknown[];
  }

  /**
   * Remote thread -> loop: run `task` once after `delayMs`.
   */
  export interface TimerMessage {
    type: 'timer';
    /**
     * Correlation id, unique per port.
     */
    id: string;
    delayMs: number;
    task: TaskRef;
    /**
     * One-element view over a `SharedArrayBuffer`, holding a `RemoteTimerState`.
     * The loop swaps it to `Claimed` before running the task; `release()` swaps it to `Released`.
     */
    state: Int32Array;
  }

  /**
   * Remote thread -> loop: drop a pending timer.
   */
  export interface CancelMessage {
    type: 'cancel';
    id: string;
  }

  export interface SerializedError {
    name: string;
    message: string;
    code?: number;
  }

  /**
   * Loop -> remote thread: the task ran.
   */
  export interface FiredMessage {
    type: 'fired';
    id: string;
  }

  /**
   * Loop -> remote thread: the deadline passed after the handle was released, so the task was skipped.
   */
  export interface CancelledMessage {
    type: 'cancelled';
    id: string;
  }

  /**
   * Loop -> remote thread: the timer could not run its task.
   */
  export interface FailedMessage {
    type: 'failed';
    id: string;
    error: SerializedError;
  }

  export type InboundMessage = TimerMessage | CancelMessage;

  export type OutboundMessage = FiredMessage | CancelledMessage | FailedMessage;
}
