import { Injectable } from '@nestjs/common';

interface Lock {
  promise: Promise<void>;
  resolve: () => void;
}

export interface LockHandle {
  release: () => void;
  waitTimeMs: number;
}

export class LockTimeoutError extends Error {
  constructor(readonly key: string) {
    super('Lock timeout');
    this.name = 'LockTimeoutError';
  }
}

@Injectable()
export class LockManagerService {
  private locks = new Map<string, Lock>();

  /**
   * Acquire a lock for the given key, waiting up to `timeoutMs` in total for
   * the current holder(s) to release it.
   */
  async acquire(key: string, timeoutMs: number = 5000): Promise<LockHandle> {
    const startedAt = Date.now();

    let existing = this.locks.get(key);
    while (existing) {
      const remainingMs = timeoutMs - (Date.now() - startedAt);
      const released = await this.waitForRelease(existing.promise, remainingMs);
      if (!released) {
        throw new LockTimeoutError(key);
      }
      existing = this.locks.get(key);
    }

    // No await between the check above and the set below
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((res) => {
      resolve = res;
    });
    const lock: Lock = { promise, resolve };
    this.locks.set(key, lock);

    return {
      waitTimeMs: Date.now() - startedAt,
      release: () => {
        lock.resolve();
        if (this.locks.get(key) === lock) {
          this.locks.delete(key);
        }
      },
    };
  }

  /**
   * Clear all locks (useful for testing)
   */
  clear(): void {
    for (const lock of this.locks.values()) {
      lock.resolve();
    }
    this.locks.clear();
  }

  private async waitForRelease(
    promise: Promise<void>,
    timeoutMs: number,
  ): Promise<boolean> {
    if (timeoutMs <= 0) {
      return false;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([promise.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
