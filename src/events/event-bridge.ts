import { getErrorMessage, logJsonl } from '../common/logger.js';

import type { EventLoop } from './event-loop.js';

/**
 * Largest delay a single Node timer accepts.
 */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface EventBridgeOptions {
  /**
   * Dispose the bridge right after its handler ran.
   */
  deleteWhenTriggered?: boolean;
}

/**
 * Event bound to one loop. Usable as an immediate trigger or as a timer.
 * The handler runs once per trigger; a pending trigger is replaced by a newer one.
 */
export class EventBridge {
  private readonly deleteWhenTriggered: boolean;

  private timeout: NodeJS.Timeout | undefined;

  private immediate: NodeJS.Immediate | undefined;

  private disposed = false;

  constructor(
    private readonly loop: EventLoop,
    private readonly handler: () => void,
    options: EventBridgeOptions = {},
  ) {
    this.deleteWhenTriggered = options.deleteWhenTriggered ?? false;
    loop.attach(this);
  }

  get pending(): boolean {
    return this.timeout !== undefined || this.immediate !== undefined;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Schedules the handler. Without a delay it runs on the next loop turn.
   */
  trigger(delayMs?: number): void {
    if (this.disposed) {
      throw new Error('event already disposed');
    }

    if (delayMs !== undefined && (!Number.isFinite(delayMs) || delayMs < 0)) {
      throw new RangeError(`Invalid event delay: ${delayMs}`);
    }

    this.cancelPending();

    if (delayMs === undefined) {
      this.immediate = setImmediate(() => {
        this.immediate = undefined;
        this.handle();
      });
      return;
    }

    this.arm(Date.now() + delayMs);
  }

  /**
   * Cancels a pending firing and detaches from the loop. Safe to call more than once.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.cancelPending();
    this.loop.detach(this);
  }

  /**
   * Node timers overflow past ~24.8 days, so long delays are re-armed in steps.
   */
  private arm(deadline: number): void {
    const remaining = Math.max(0, deadline - Date.now());

    this.timeout = setTimeout(() => {
      this.timeout = undefined;

      if (deadline > Date.now()) {
        this.arm(deadline);
        return;
      }

      this.handle();
    }, Math.min(remaining, MAX_TIMER_DELAY_MS));
  }

  private handle(): void {
    try {
      this.handler();
    } catch (error) {
      logJsonl('ERROR', 'event_handler_failed', {
        error: getErrorMessage(error),
      });
    } finally {
      if (this.deleteWhenTriggered) {
        this.dispose();
      }
    }
  }

  private cancelPending(): void {
    if (this.timeout !== undefined) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }

    if (this.immediate !== undefined) {
      clearImmediate(this.immediate);
      this.immediate = undefined;
    }
  }
}
