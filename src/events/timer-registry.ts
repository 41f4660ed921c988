import { EventBridge } from './event-bridge.js';
import type { EventLoop } from './event-loop.js';

/**
 * One deferred callback. Fires at most once; `release()` before that guarantees it never runs.
 */
export interface TimerHandle {
  readonly fired: boolean;
  readonly released: boolean;
  release(): void;
}

/**
 * Named timer capability. Whoever owns a loop registers one so that other subsystems can
 * defer work without knowing about the transport.
 */
export interface TimerProvider {
  readonly name: string;
  newTimer(delaySeconds: number, callback: () => void): TimerHandle;
}

function assertDelay(delaySeconds: number): void {
  if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
    throw new RangeError(`Invalid timer delay: ${delaySeconds}`);
  }
}

export function createLoopTimerProvider(loop: EventLoop, name = 'HTTP'): TimerProvider {
  return {
    name,
    newTimer(delaySeconds, callback) {
      assertDelay(delaySeconds);

      let fired = false;
      let released = false;
      const bridge = new EventBridge(
        loop,
        () => {
          fired = true;
          callback();
        },
        { deleteWhenTriggered: true },
      );
      bridge.trigger(delaySeconds * 1000);

      return {
        get fired() {
          return fired;
        },
        get released() {
          return released;
        },
        release() {
          if (released) {
            return;
          }

          released = true;
          bridge.dispose();
        },
      };
    },
  };
}

export class TimerRegistry {
  private readonly registered: TimerProvider[] = [];

  /**
   * Timers scheduled through `runLater`, one per name.
   */
  private readonly deadlines = new Map<string, TimerHandle>();

  register(provider: TimerProvider): void {
    if (this.registered.includes(provider)) {
      return;
    }

    this.registered.push(provider);
  }

  /**
   * Removes a provider. Timers it already created keep running.
   */
  unregister(provider: TimerProvider): boolean {
    const index = this.registered.indexOf(provider);
    if (index === -1) {
      return false;
    }

    this.registered.splice(index, 1);
    return true;
  }

  providers(): string[] {
    return this.registered.map((provider) => provider.name);
  }

  /**
   * The most recently registered provider schedules new timers.
   */
  active(): TimerProvider | undefined {
    return this.registered[this.registered.length - 1];
  }

  newTimer(delaySeconds: number, callback: () => void): TimerHandle {
    const provider = this.active();
    if (provider === undefined) {
      throw new Error('No timer handler registered for RPC');
    }

    return provider.newTimer(delaySeconds, callback);
  }

  /**
   * Runs `callback` after `delaySeconds`, replacing any pending timer of the same name.
   */
  runLater(name: string, callback: () => void, delaySeconds: number): TimerHandle {
    this.cancel(name);

    const handle = this.newTimer(delaySeconds, () => {
      if (this.deadlines.get(name) === handle) {
        this.deadlines.delete(name);
      }

      callback();
    });

    this.deadlines.set(name, handle);
    return handle;
  }

  cancel(name: string): boolean {
    const handle = this.deadlines.get(name);
    if (handle === undefined) {
      return false;
    }

    this.deadlines.delete(name);
    handle.release();
    return true;
  }

  /**
   * Releases every pending `runLater` timer.
   */
  clear(): void {
    const handles = Array.from(this.deadlines.values());
    this.deadlines.clear();
    for (let i = 0; i < handles.length; i++) {
      handles[i].release();
    }
  }
}
