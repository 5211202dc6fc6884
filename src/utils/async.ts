/**
 * Async Utility Functions
 *
 * Deadlines, retries with backoff and the synchronization primitives the
 * coordinator is built on.
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Deadline
// =============================================================================

/**
 * Runs `fn` with an AbortSignal that fires after `ms`. Rejects with the
 * error built by `onExpire` as soon as the deadline passes, whether or not
 * `fn` honours the signal. A non-finite `ms` means no deadline.
 *
 * @param fn - Work to run; receives the signal to pass down to I/O
 * @param ms - Deadline in milliseconds
 * @param onExpire - Builds the rejection reason
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onExpire: () => Error
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(ms)) {
    return fn(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const reason = onExpire();
      controller.abort(reason);
      reject(reason);
    }, ms);
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  get locked(): boolean {
    return this._locked;
  }

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// =============================================================================
// Keyed Mutex
// =============================================================================

/**
 * One FIFO mutex per key. Keys with no holder take no memory.
 */
export class KeyedMutex<K = string> {
  /** Present while the key is held; holds the queued waiters */
  private readonly queues = new Map<K, Array<(acquired: boolean) => void>>();

  isLocked(key: K): boolean {
    return this.queues.has(key);
  }

  waiting(key: K): number {
    return this.queues.get(key)?.length ?? 0;
  }

  /** Acquires `key` only if nobody holds it */
  tryAcquire(key: K): boolean {
    if (this.queues.has(key)) return false;
    this.queues.set(key, []);
    return true;
  }

  /**
   * Acquires `key`, waiting behind earlier callers. Resolves false if
   * `timeoutMs` passes first; the caller then holds nothing.
   */
  async acquire(key: K, timeoutMs = Number.POSITIVE_INFINITY): Promise<boolean> {
    if (this.tryAcquire(key)) return true;
    const queue = this.queues.get(key);
    if (!queue) return this.acquire(key, timeoutMs);

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter = (acquired: boolean): void => {
        clearTimeout(timer);
        resolve(acquired);
      };
      queue.push(waiter);

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          const index = queue.indexOf(waiter);
          if (index >= 0) {
            queue.splice(index, 1);
            resolve(false);
          }
        }, timeoutMs);
      }
    });
  }

  /** Hands `key` to the next waiter, or frees it */
  release(key: K): void {
    const queue = this.queues.get(key);
    if (!queue) return;
    const next = queue.shift();
    if (next) {
      next(true);
    } else {
      this.queues.delete(key);
    }
  }

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }
}

// =============================================================================
// Semaphore
// =============================================================================

/**
 * Counting semaphore bounding how many callers may hold a resource at once.
 * Waiters are served FIFO.
 */
export class Semaphore {
  private _available: number;
  private _waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this._available = capacity;
  }

  get available(): number {
    return this._available;
  }

  get waiting(): number {
    return this._waiters.length;
  }

  async acquire(): Promise<void> {
    if (this._available > 0) {
      this._available--;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._available = Math.min(this._available + 1, this.capacity);
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  /** Optional predicate to determine if error is retryable */
  retryIf?: (error: unknown) => boolean;
  /** Optional callback on each retry */
  onRetry?: (error: unknown, attempt: number) => void;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Retries a function with exponential backoff.
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      if (attempt === opts.maxAttempts || opts.signal?.aborted) {
        throw error;
      }

      opts.onRetry?.(error, attempt);

      await sleep(delay);
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw lastError;
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs promises in parallel with a concurrency limit.
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(concurrency, 1), items.length) }, () => worker());

  await Promise.all(workers);
  return results;
}
