import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TransientConflictError } from '../../src/core/errors';
import { PerKeyMutex } from '../../src/utils/perKeyMutex';

const pause = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('PerKeyMutex', () => {
  let mutex: PerKeyMutex;

  beforeEach(() => {
    mutex = new PerKeyMutex();
  });

  describe('acquire', () => {
    it('should execute function immediately when no lock exists', async () => {
      const fn = vi.fn().mockResolvedValue('result');
      const result = await mutex.acquire('key1', fn);

      expect(result).toBe('result');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should serialize functions by key', async () => {
      const results: string[] = [];

      const first = mutex.acquire('key1', async () => {
        await pause(30);
        results.push('fn1');
      });
      const second = mutex.acquire('key1', async () => {
        results.push('fn2');
      });
      await Promise.all([first, second]);

      expect(results).toEqual(['fn1', 'fn2']);
    });

    it('should allow parallel execution for different keys', async () => {
      const results: string[] = [];

      const first = mutex.acquire('key1', async () => {
        await pause(30);
        results.push('fn1');
      });
      const second = mutex.acquire('key2', async () => {
        results.push('fn2');
      });
      await Promise.all([first, second]);

      expect(results).toEqual(['fn2', 'fn1']);
    });

    it('should serve waiters in arrival order', async () => {
      const order: number[] = [];
      await Promise.all(
        [1, 2, 3, 4].map((n) =>
          mutex.acquire('key1', async () => {
            await pause(5 - n);
            order.push(n);
          })
        )
      );

      expect(order).toEqual([1, 2, 3, 4]);
    });

    it('should release the lock when the function throws', async () => {
      await expect(mutex.acquire('key1', async () => {
        throw new Error('Function error');
      })).rejects.toThrow('Function error');

      await expect(mutex.acquire('key1', async () => 'next')).resolves.toBe('next');
    });
  });

  describe('lock with timeout', () => {
    it('should reject with a transient conflict when the holder keeps the lock too long', async () => {
      const release = await mutex.lock('key1');

      await expect(mutex.lock('key1', 10)).rejects.toBeInstanceOf(TransientConflictError);

      release();
    });

    it('should keep later waiters behind the holder after a timeout', async () => {
      const events: string[] = [];
      const release = await mutex.lock('key1');

      const timedOut = mutex.lock('key1', 10).catch(() => events.push('timeout'));
      const patient = mutex.lock('key1').then((releaseNext) => {
        events.push('acquired');
        releaseNext();
      });

      await timedOut;
      await pause(10);
      events.push('holder releases');
      release();
      await patient;

      expect(events).toEqual(['timeout', 'holder releases', 'acquired']);
    });

    it('should ignore a second release call', async () => {
      const release = await mutex.lock('key1');
      release();
      release();

      const next = await mutex.lock('key1');
      let waiterAcquired = false;
      const waiter = mutex.lock('key1').then((releaseWaiter) => {
        waiterAcquired = true;
        releaseWaiter();
      });

      await pause(10);
      expect(waiterAcquired).toBe(false);

      next();
      await waiter;
      expect(waiterAcquired).toBe(true);
    });
  });
});
