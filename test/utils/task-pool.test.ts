import { describe, it, expect } from 'vitest';
import { TaskPool } from '../../src/utils/task-pool.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('TaskPool', () => {
  it('rejects a concurrency below 1', () => {
    expect(() => new TaskPool({ concurrency: 0 })).toThrow(RangeError);
  });

  it('runs tasks one at a time, in order, with concurrency 1', async () => {
    const pool = new TaskPool({ concurrency: 1 });
    const events: string[] = [];

    const first = pool.run(async () => {
      events.push('first:start');
      await delay(10);
      events.push('first:end');
      return 1;
    });
    const second = pool.run(() => {
      events.push('second');
      return 2;
    });

    expect(pool.pending).toBe(1);
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('caps the number of running tasks', async () => {
    const pool = new TaskPool({ concurrency: 2 });
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        pool.run(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await delay(5);
          active--;
        })
      )
    );

    expect(maxActive).toBe(2);
    expect(pool.running).toBe(0);
  });

  it('propagates errors and keeps going', async () => {
    const pool = new TaskPool({ concurrency: 1 });

    await expect(pool.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(
      pool.run(() => {
        throw new Error('sync boom');
      })
    ).rejects.toThrow('sync boom');
    await expect(pool.run(() => 'ok')).resolves.toBe('ok');
  });

  it('settles every item', async () => {
    const pool = new TaskPool({ concurrency: 2 });
    const outcomes = await pool.settleAll([1, 2, 3], async (n) => {
      if (n === 2) throw new Error('two');
      return n * 10;
    });

    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 10 });
  });
});
