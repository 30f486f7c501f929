import { describe, it, expect } from '@jest/globals';
import { ExtractionCancelledError, ExtractionTimeoutError } from '../../src/errors/index.js';
import { ExtractionPool } from '../../src/services/extraction/ExtractionPool.js';
import { deferred, flush } from '../utils/fakes.js';

describe('ExtractionPool', () => {
  it('runs at most maxConcurrent tasks and starts the rest in order', async () => {
    const pool = new ExtractionPool(2);
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      pool.run(
        () => {
          started.push(index);
          return gate.promise;
        },
        { timeoutMs: 5_000 }
      )
    );

    expect(started).toEqual([0, 1]);
    expect(pool.stats()).toEqual({ active: 2, queued: 1, maxConcurrent: 2 });

    gates[1]?.resolve('b');
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[0]?.resolve('a');
    gates[2]?.resolve('c');
    await expect(Promise.all(runs)).resolves.toEqual(['a', 'b', 'c']);
    expect(pool.stats()).toEqual({ active: 0, queued: 0, maxConcurrent: 2 });
  });

  it('releases the slot when a task rejects', async () => {
    const pool = new ExtractionPool(1);

    await expect(pool.run(() => Promise.reject(new Error('failed')), { timeoutMs: 5_000 })).rejects.toThrow('failed');
    await expect(pool.run(() => Promise.resolve(7), { timeoutMs: 5_000 })).resolves.toBe(7);
  });

  it('times out a running task and aborts its signal', async () => {
    const pool = new ExtractionPool(1);
    let sawAbort = false;

    const run = pool.run(
      ({ signal }) =>
        new Promise<never>((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            sawAbort = true;
            reject(new Error('killed'));
          });
        }),
      { timeoutMs: 20 }
    );

    await expect(run).rejects.toThrow(new ExtractionTimeoutError(20));
    expect(sawAbort).toBe(true);
    await flush();
    expect(pool.stats().active).toBe(0);
  });

  it('times out a task that is still queued', async () => {
    const pool = new ExtractionPool(1);
    const gate = deferred<string>();
    let secondStarted = false;

    const first = pool.run(() => gate.promise, { timeoutMs: 5_000 });
    const second = pool.run(
      () => {
        secondStarted = true;
        return Promise.resolve('late');
      },
      { timeoutMs: 20 }
    );

    await expect(second).rejects.toBeInstanceOf(ExtractionTimeoutError);
    expect(pool.stats().queued).toBe(0);

    gate.resolve('first');
    await expect(first).resolves.toBe('first');
    expect(secondStarted).toBe(false);
  });

  it('rejects with a cancellation when the caller aborts', async () => {
    const pool = new ExtractionPool(1);
    const controller = new AbortController();

    const run = pool.run(({ signal }) => new Promise<never>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('killed')));
    }), { timeoutMs: 5_000, signal: controller.signal });
    controller.abort();

    await expect(run).rejects.toBeInstanceOf(ExtractionCancelledError);
  });

  it('never starts a task whose signal is already aborted', async () => {
    const pool = new ExtractionPool(1);
    const controller = new AbortController();
    controller.abort();
    let called = false;

    await expect(
      pool.run(
        () => {
          called = true;
          return Promise.resolve(1);
        },
        { timeoutMs: 5_000, signal: controller.signal }
      )
    ).rejects.toThrow('Extraction cancelled by caller');
    expect(called).toBe(false);
  });

  it('reports the time left before the deadline', async () => {
    let clock = 100;
    const pool = new ExtractionPool(1, () => clock);

    const remaining = await pool.run(
      async ({ remainingMs }) => {
        clock = 400;
        return remainingMs();
      },
      { timeoutMs: 1_000 }
    );

    expect(remaining).toBe(700);
  });
});
