import { ErrorCode, InfrastructureError } from '../types/error.types';

/**
 * Per-key exclusive locks built on promise chains.
 *
 * Each key maps to the tail of a chain; an acquirer appends itself and waits
 * for its predecessor to release. The get-and-append step is synchronous, so
 * two callers can never both observe an empty chain.
 */
export class LockManager {
  private locks: Map<string, Promise<void>> = new Map();

  constructor(private defaultTimeoutMs: number) {}

  has(key: string): boolean {
    return this.locks.has(key);
  }

  /**
   * Wait for `key` and return its release function.
   *
   * A wait longer than `timeoutMs` throws LOCK_TIMEOUT. The abandoned slot
   * passes straight through once its predecessor releases.
   */
  async acquire(key: string, timeoutMs: number = this.defaultTimeoutMs): Promise<() => void> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const tail = previous.then(() => held);
    this.locks.set(key, tail);

    // Only drop the entry if nobody queued behind us
    const forget = (): void => {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    };
    const unlock = (): void => {
      release();
      forget();
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([previous.then(() => 'acquired' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      // The slot stays queued until the current holder lets go, so later
      // waiters never overtake it
      release();
      void tail.then(forget);
      throw new InfrastructureError(
        ErrorCode.LOCK_TIMEOUT,
        `Timed out after ${timeoutMs}ms waiting for lock on ${key}`
      );
    }

    return unlock;
  }
}
