import { TransientConflictError } from '../core/errors';

export type Release = () => void;

// Per-key async mutex. Waiters on the same key are served in arrival order.
export class PerKeyMutex {
  private locks = new Map<string, Promise<void>>();

  /**
   * Take the lock for `key` and hand back its release function.
   * With a timeout, waiting longer than `timeoutMs` rejects with a
   * TransientConflictError and leaves the queue intact for later waiters.
   */
  async lock(key: string, timeoutMs?: number): Promise<Release> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    let releaseSlot: () => void = () => undefined;
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve;
    });
    const tail = previous.then(() => slot);
    this.locks.set(key, tail);

    const cleanup = () => {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    };

    let released = false;
    const release: Release = () => {
      if (released) {
        return;
      }
      released = true;
      releaseSlot();
      cleanup();
    };

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
          if (settled) return;
          settled = true;
          // Give up our place without letting later waiters skip the current holder
          released = true;
          releaseSlot();
          void tail.then(cleanup);
          reject(TransientConflictError.lockTimeout(key, timeoutMs));
        }, timeoutMs);

      void previous.then(() => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        resolve();
      });
    });

    return release;
  }

  async acquire<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.lock(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
