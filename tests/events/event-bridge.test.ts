import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { EventBridge } from '@/events/event-bridge.js';
import { EventLoop } from '@/events/event-loop.js';

import { loggedEvents } from '../helpers/test-utils.js';

describe('event bridge', () => {
  let loop: EventLoop;
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.useFakeTimers();
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    loop = new EventLoop();
  });

  afterEach(() => {
    loop.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('runs on the next loop turn without a delay', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);

    bridge.trigger();
    expect(handler).not.toHaveBeenCalled();
    expect(bridge.pending).toBe(true);

    vi.runAllTimers();
    expect(handler).toHaveBeenCalledTimes(1);
    expect(bridge.pending).toBe(false);
  });

  it('never fires before its delay', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);

    bridge.trigger(1000);
    vi.advanceTimersByTime(999);
    expect(handler).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('replaces a pending trigger with a newer one', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);

    bridge.trigger(100);
    bridge.trigger(500);
    vi.advanceTimersByTime(100);
    expect(handler).not.toHaveBeenCalled();

    vi.advanceTimersByTime(400);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('can be triggered again after firing', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);

    bridge.trigger(10);
    vi.advanceTimersByTime(10);
    bridge.trigger(10);
    vi.advanceTimersByTime(10);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(loop.pending).toBe(1);
  });

  it('disposes itself after firing when asked to', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler, { deleteWhenTriggered: true });

    bridge.trigger(10);
    expect(loop.pending).toBe(1);
    vi.advanceTimersByTime(10);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(bridge.isDisposed).toBe(true);
    expect(loop.pending).toBe(0);
    expect(() => bridge.trigger()).toThrow('event already disposed');
  });

  it('never runs after dispose', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);

    bridge.trigger(10);
    bridge.dispose();
    bridge.dispose();
    vi.advanceTimersByTime(100);

    expect(handler).not.toHaveBeenCalled();
    expect(loop.pending).toBe(0);
  });

  it('re-arms delays longer than a single node timer accepts', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);
    const maxTimer = 2_147_483_647;

    bridge.trigger(maxTimer + 1000);
    vi.advanceTimersByTime(maxTimer);
    expect(handler).not.toHaveBeenCalled();
    expect(bridge.pending).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid delays', () => {
    const bridge = new EventBridge(loop, () => {});
    expect(() => bridge.trigger(-1)).toThrow(RangeError);
    expect(() => bridge.trigger(Number.NaN)).toThrow(RangeError);
  });

  it('logs a failing handler and keeps going', () => {
    const bridge = new EventBridge(
      loop,
      () => {
        throw new Error('handler broke');
      },
      { deleteWhenTriggered: true },
    );

    bridge.trigger();
    vi.runAllTimers();

    const failures = loggedEvents(consoleSpy).filter((entry) => entry.event === 'event_handler_failed');
    expect(failures).toHaveLength(1);
    expect(failures[0].error).toBe('handler broke');
    expect(bridge.isDisposed).toBe(true);
  });

  it('refuses to attach to a closed loop and is disposed when the loop closes', () => {
    const handler = vi.fn();
    const bridge = new EventBridge(loop, handler);
    bridge.trigger(10);

    loop.close();
    vi.advanceTimersByTime(10);

    expect(handler).not.toHaveBeenCalled();
    expect(bridge.isDisposed).toBe(true);
    expect(() => new EventBridge(loop, handler)).toThrow('event loop is closed');
  });
});
