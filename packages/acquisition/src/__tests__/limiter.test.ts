import { describe, expect, it } from 'vitest';
import { ConcurrencyLimiter } from '../limiter.js';
import { deferred } from './helpers.js';

describe('ConcurrencyLimiter', () => {
  it('rejects a non-positive budget', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });

  it('never runs more than the budget at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 6 }, () => limiter.run(task)));

    expect(peak).toBe(2);
    expect(limiter.activeCount).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  it('drops a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const controller = new AbortController();

    const first = limiter.run(() => gate.promise);
    const second = limiter.run(async () => 'never', controller.signal);
    expect(limiter.pendingCount).toBe(1);

    controller.abort(new Error('stop'));
    await expect(second).rejects.toThrow('stop');
    expect(limiter.pendingCount).toBe(0);

    gate.resolve();
    await first;
    expect(limiter.activeCount).toBe(0);
  });
});
