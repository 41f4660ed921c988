import { MessageChannel, threadId, Worker, type MessagePort } from 'node:worker_threads';

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { RpcError } from '@/core/jsonrpc.js';
import { EventLoop } from '@/events/event-loop.js';
import { createLoopClient, type LoopClient, type RemoteTimerHandle } from '@/events/loop-client.js';

import { loggedEvents, sleep } from '../helpers/test-utils.js';

function timerState(value = 0): Int32Array {
  const state = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
  state[0] = value;
  return state;
}

function nextMessage(port: MessagePort): Promise<unknown> {
  return new Promise((resolve) => {
    port.once('message', resolve);
  });
}

describe('event loop and loop client', () => {
  let loop: EventLoop;
  let consoleSpy: MockInstance<typeof console.log>;
  const clients: LoopClient[] = [];
  const workers: Worker[] = [];

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    loop = new EventLoop();
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.close();
    }

    for (const worker of workers.splice(0)) {
      await worker.terminate();
    }

    loop.close();
    vi.restoreAllMocks();
  });

  function connectClient(): LoopClient {
    const client = createLoopClient(loop.connect());
    clients.push(client);
    return client;
  }

  it('runs a named task with its args once the delay passed', async () => {
    const runs: unknown[][] = [];
    loop.registerTask('record', (args) => {
      runs.push(args);
    });
    const client = connectClient();

    const startedAt = Date.now();
    const handle = client.newTimer(0.03, { name: 'record', args: ['a', 1] });

    await expect(handle.done).resolves.toEqual({ status: 'fired' });
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(25);
    expect(runs).toEqual([['a', 1]]);
    expect(loop.pending).toBe(0);
  });

  it('never runs a released timer', async () => {
    const task = vi.fn();
    loop.registerTask('record', task);
    const client = connectClient();

    const handle = client.newTimer(0.02, { name: 'record' });
    expect(handle.release()).toBe(true);
    expect(handle.release()).toBe(false);

    await expect(handle.done).resolves.toEqual({ status: 'released' });
    await sleep(60);
    expect(task).not.toHaveBeenCalled();
    expect(loop.pending).toBe(0);
  });

  it('reports an unknown task as failed', async () => {
    const client = connectClient();

    const handle = client.newTimer(0, { name: 'missing' });

    await expect(handle.done).resolves.toEqual({
      status: 'failed',
      error: { name: 'Error', message: 'unknown loop task: missing' },
    });
    expect(loggedEvents(consoleSpy).filter((entry) => entry.event === 'timer_task_failed')).toHaveLength(1);
  });

  it('keeps the code of an RpcError thrown by a task', async () => {
    loop.registerTask('reject', () => {
      throw new RpcError(-32603, 'task refused');
    });
    const client = connectClient();

    const handle = client.newTimer(0, { name: 'reject' });

    await expect(handle.done).resolves.toEqual({
      status: 'failed',
      error: { name: 'RpcError', message: 'task refused', code: -32603 },
    });
  });

  it('disposes the timers of a port whose other end closed', async () => {
    const task = vi.fn();
    loop.registerTask('record', task);
    const client = createLoopClient(loop.connect());

    const handle = client.newTimer(0.05, { name: 'record' });
    await vi.waitFor(() => expect(loop.pending).toBe(1));

    client.close();

    await expect(handle.done).resolves.toEqual({ status: 'released' });
    await vi.waitFor(() => expect(loop.pending).toBe(0));
    await sleep(80);
    expect(task).not.toHaveBeenCalled();
  });

  it('answers a duplicate timer id with a failure', async () => {
    loop.registerTask('record', () => {});
    const port = loop.connect();

    port.postMessage({ type: 'timer', id: 'dup', delayMs: 1000, task: { name: 'record' }, state: timerState() });
    const reply = nextMessage(port);
    port.postMessage({ type: 'timer', id: 'dup', delayMs: 1000, task: { name: 'record' }, state: timerState() });

    await expect(reply).resolves.toEqual({
      type: 'failed',
      id: 'dup',
      error: { name: 'Error', message: 'duplicate timer id: dup' },
    });
    port.close();
  });

  it('drops malformed messages', async () => {
    const port = loop.connect();

    port.postMessage({ type: 'timer', id: 'bad', delayMs: -5, task: { name: 'record' }, state: timerState() });
    port.postMessage({ type: 'timer', id: 'unshared', delayMs: 5, task: { name: 'record' }, state: new Int32Array(1) });

    await vi.waitFor(() =>
      expect(loggedEvents(consoleSpy).filter((entry) => entry.event === 'loop_message_invalid')).toHaveLength(2),
    );
    expect(loop.pending).toBe(0);
    port.close();
  });

  it('guards task registration and refuses to connect once closed', () => {
    loop.registerTask('once', () => {});
    expect(() => loop.registerTask('once', () => {})).toThrow('loop task already registered: once');
    expect(() => loop.runTask('other')).toThrow('unknown loop task: other');
    expect(loop.unregisterTask('once')).toBe(true);

    loop.close();
    expect(loop.isClosed).toBe(true);
    expect(() => loop.connect()).toThrow('event loop is closed');
  });

  it('settles pending handles as released when the client closes', async () => {
    loop.registerTask('record', () => {});
    const client = connectClient();

    const handle = client.newTimer(10, { name: 'record' });
    client.close();

    await expect(handle.done).resolves.toEqual({ status: 'released' });
    expect(() => client.newTimer(1, { name: 'record' })).toThrow('loop client is closed');
  });

  it('runs tasks scheduled from another thread on the loop thread', async () => {
    const runs: Array<{ label: unknown; threadId: number }> = [];
    loop.registerTask('record', (args) => {
      runs.push({ label: args[0], threadId });
    });

    const port = loop.connect();
    const worker = new Worker(
      [
        "const { workerData, threadId } = require('node:worker_threads');",
        'const port = workerData.port;',
        "port.on('message', (message) => {",
        "  if (message.type === 'fired') port.close();",
        '});',
        'const cell = () => new Int32Array(new SharedArrayBuffer(4));',
        "port.postMessage({ type: 'timer', id: threadId + '-0', delayMs: 20, task: { name: 'record', args: ['kept'] }, state: cell() });",
        'const dropped = cell();',
        "port.postMessage({ type: 'timer', id: threadId + '-1', delayMs: 20, task: { name: 'record', args: ['cancelled'] }, state: dropped });",
        'Atomics.store(dropped, 0, 1);',
        "port.postMessage({ type: 'cancel', id: threadId + '-1' });",
      ].join('\n'),
      { eval: true, workerData: { port }, transferList: [port] },
    );
    workers.push(worker);

    expect(worker.threadId).not.toBe(loop.threadId);
    await vi.waitFor(() => expect(runs).toHaveLength(1));
    await sleep(60);

    expect(runs).toEqual([{ label: 'kept', threadId: loop.threadId }]);
    expect(loop.pending).toBe(0);
  });

  it('skips a timer whose cell was released and answers cancelled', async () => {
    const task = vi.fn();
    loop.registerTask('record', task);
    const port = loop.connect();

    const reply = nextMessage(port);
    port.postMessage({ type: 'timer', id: 'late', delayMs: 0, task: { name: 'record' }, state: timerState(1) });

    await expect(reply).resolves.toEqual({ type: 'cancelled', id: 'late' });
    expect(task).not.toHaveBeenCalled();
    expect(loop.pending).toBe(0);
    port.close();
  });

  it('reports fired when release comes after the loop claimed the timer', async () => {
    const client = connectClient();
    const releases: boolean[] = [];
    let handle: RemoteTimerHandle | undefined;
    loop.registerTask('self-release', () => {
      if (handle !== undefined) {
        releases.push(handle.release());
      }
    });

    handle = client.newTimer(0.01, { name: 'self-release' });

    await expect(handle.done).resolves.toEqual({ status: 'fired' });
    expect(releases).toEqual([false]);
  });

  it('keeps the port open until a claimed timer reports back on close', async () => {
    const client = connectClient();
    const pendingHandle = client.newTimer(10, { name: 'close-client' });
    loop.registerTask('close-client', () => {
      client.close();
    });

    const handle = client.newTimer(0.01, { name: 'close-client' });

    await expect(handle.done).resolves.toEqual({ status: 'fired' });
    await expect(pendingHandle.done).resolves.toEqual({ status: 'released' });
    await vi.waitFor(() => expect(loop.pending).toBe(0));
  });

  it('never runs a task released before its deadline while the loop thread was busy', async () => {
    const task = vi.fn();
    loop.registerTask('record', task);

    const port = loop.connect();
    const state = timerState();
    const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const worker = new Worker(
      [
        "const { workerData, parentPort } = require('node:worker_threads');",
        'const { port, state, signal } = workerData;',
        "port.postMessage({ type: 'timer', id: 'busy', delayMs: 30, task: { name: 'record' }, state });",
        'Atomics.wait(signal, 0, 0);',
        'const won = Atomics.compareExchange(state, 0, 0, 1) === 0;',
        "port.postMessage({ type: 'cancel', id: 'busy' });",
        'parentPort.postMessage({ won });',
      ].join('\n'),
      { eval: true, workerData: { port, state, signal }, transferList: [port] },
    );
    workers.push(worker);
    const workerReply = new Promise<unknown>((resolve) => {
      worker.once('message', resolve);
    });

    await vi.waitFor(() => expect(loop.pending).toBe(1), { interval: 1 });

    Atomics.store(signal, 0, 1);
    Atomics.notify(signal, 0);

    // Hold the loop thread until the release landed and the deadline is well past.
    const busyUntil = Date.now() + 100;
    while ((Atomics.load(state, 0) === 0 || Date.now() < busyUntil) && Date.now() < busyUntil + 2000) {
      // spin
    }

    await expect(workerReply).resolves.toEqual({ won: true });
    await vi.waitFor(() => expect(loop.pending).toBe(0));
    await sleep(20);
    expect(task).not.toHaveBeenCalled();
  });
});
