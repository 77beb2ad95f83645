import { err, ok, type Result } from 'neverthrow';

export class PermitAbortedError extends Error {
  constructor() {
    super('Aborted while waiting for a permit');
    this.name = 'PermitAbortedError';
  }
}

export type ReleasePermit = () => void;

interface Waiter {
  grant: (release: ReleasePermit) => void;
}

/**
 * Counting semaphore for bounding concurrent outbound calls.
 *
 * Waiters are served in FIFO order. A waiter whose signal aborts leaves the
 * queue and gets `PermitAbortedError`; a granted permit is released exactly once.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  get availablePermits(): number {
    return this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<Result<ReleasePermit, PermitAbortedError>> {
    if (signal?.aborted) {
      return Promise.resolve(err(new PermitAbortedError()));
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(ok(this.createRelease()));
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(ok(release));
        },
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(err(new PermitAbortedError()));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Run `task` while holding a permit.
   */
  async run<T, E>(
    task: () => Promise<Result<T, E>>,
    signal?: AbortSignal
  ): Promise<Result<T, E | PermitAbortedError>> {
    const permit = await this.acquire(signal);
    if (permit.isErr()) {
      return err(permit.error);
    }

    try {
      return await task();
    } finally {
      permit.value();
    }
  }

  private createRelease(): ReleasePermit {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter
        next.grant(this.createRelease());
      } else {
        this.available = Math.min(this.available + 1, this.permits);
      }
    };
  }
}
