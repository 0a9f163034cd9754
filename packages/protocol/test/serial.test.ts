import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../src/index.js';

function tick(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('runs jobs one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const job = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await tick(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(job('a', 20)), queue.run(job('b', 1)), queue.run(job('c', 5))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps going after a failing job', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
    expect(queue.busy).toBe(false);
  });

  it('lets separate queues run in parallel', async () => {
    const a = new SerialQueue();
    const b = new SerialQueue();
    const events: string[] = [];

    await Promise.all([
      a.run(async () => {
        events.push('a start');
        await tick(20);
        events.push('a end');
      }),
      b.run(async () => {
        events.push('b start');
        await tick(1);
        events.push('b end');
      }),
    ]);

    expect(events).toEqual(['a start', 'b start', 'b end', 'a end']);
  });
});
