import logger from '../src/logger';
import { SerialQueue } from '../src/queues';

const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

describe('SerialQueue', () => {
  test('runs jobs one at a time in push order', async () => {
    const q = new SerialQueue();
    const timeline: string[] = [];
    let running = 0;
    let peak = 0;

    const job = (id: number, ms: number) => async () => {
      running++;
      peak = Math.max(peak, running);
      timeline.push(`start-${id}`);
      await sleep(ms);
      timeline.push(`end-${id}`);
      running--;
    };

    q.push(job(1, 15));
    q.push(job(2, 0));
    q.push(job(3, 5));
    await q.drain();

    expect(timeline).toEqual(['start-1', 'end-1', 'start-2', 'end-2', 'start-3', 'end-3']);
    expect(peak).toBe(1);
  });

  test('jobs never start inside push', async () => {
    const q = new SerialQueue();
    let ran = false;
    q.push(async () => {
      ran = true;
    });
    expect(ran).toBe(false);
    expect(q.size()).toBe(1);
    await q.drain();
    expect(ran).toBe(true);
    expect(q.size()).toBe(0);
  });

  test('drain resolves at once when idle', async () => {
    await expect(new SerialQueue().drain()).resolves.toBeUndefined();
  });

  test('drain waits for jobs pushed by other jobs', async () => {
    const q = new SerialQueue();
    const results: string[] = [];
    q.push(async () => {
      results.push('outer');
      q.push(async () => {
        await sleep(5);
        results.push('inner');
      });
    });
    await q.drain();
    expect(results).toEqual(['outer', 'inner']);
  });

  test('a failing job is logged and the queue keeps going', async () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
    const q = new SerialQueue();
    const results: string[] = [];
    q.push(async () => {
      throw new Error('boom');
    });
    q.push(async () => {
      results.push('after');
    });
    await q.drain();
    expect(results).toEqual(['after']);
    expect(warn).toHaveBeenCalledWith('Queue job failed: boom');
    warn.mockRestore();
  });
});
