export class TimeoutError extends Error {
  constructor(message = "timeout") {
    super(message);
    this.name = "TimeoutError";
  }
}

export class BulkheadTimeoutError extends Error {
  constructor(message = "bulkhead_timeout") {
    super(message);
    this.name = "BulkheadTimeoutError";
  }
}

/**
 * Abort signal that fires a TimeoutError after `ms`.
 * Call `cleanup` once the guarded work settles so the timer does not keep the process alive.
 */
export const createTimeoutSignal = (ms: number): { signal: AbortSignal; cleanup: () => void } => {
  const controller = new AbortController();
  if (!Number.isFinite(ms) || ms <= 0) {
    controller.abort(new TimeoutError());
    return { signal: controller.signal, cleanup: () => undefined };
  }
  const timeout = setTimeout(() => controller.abort(new TimeoutError(`timeout after ${ms}ms`)), ms);
  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) };
};

/**
 * Race `work` against a timer. The work itself is not cancelled (tfjs inference cannot be),
 * only abandoned.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, label = "operation"): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timeout after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

type SemaphoreWaiter = {
  resolve: (release: () => void) => void;
  reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
};

export class Semaphore {
  private available: number;
  private readonly queue: SemaphoreWaiter[] = [];

  constructor(max: number) {
    this.available = max;
  }

  async acquire(options: { timeoutMs?: number } = {}): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return this.releaseOnce();
    }

    return new Promise((resolve, reject) => {
      const waiter: SemaphoreWaiter = { resolve, reject };

      if (options.timeoutMs && options.timeoutMs > 0) {
        waiter.timeout = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index >= 0) {
            this.queue.splice(index, 1);
          }
          reject(new BulkheadTimeoutError());
        }, options.timeoutMs);
      }

      this.queue.push(waiter);
    });
  }

  async run<T>(task: () => Promise<T>, options: { timeoutMs?: number } = {}): Promise<T> {
    const release = await this.acquire(options);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaseOnce(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.available += 1;
      this.dispatch();
    };
  }

  private dispatch(): void {
    while (this.available > 0 && this.queue.length > 0) {
      const waiter = this.queue.shift();
      if (!waiter) return;
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      this.available -= 1;
      waiter.resolve(this.releaseOnce());
    }
  }
}

/**
 * Map with per-entry expiry. Expired entries are dropped on read, and all of them are swept on the
 * first write after the earliest stored expiry, so keys that are never read again do not pile up.
 */
export class TtlCache<K, V> {
  private readonly store = new Map<K, { expiresAt: number; value: V }>();
  private nextExpiryAt = Number.POSITIVE_INFINITY;

  get(key: K): V | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: K, value: V, ttlMs: number): void {
    if (ttlMs <= 0) return;
    const now = Date.now();
    if (now >= this.nextExpiryAt) {
      this.prune(now);
    }
    const expiresAt = now + ttlMs;
    this.store.set(key, { value, expiresAt });
    this.nextExpiryAt = Math.min(this.nextExpiryAt, expiresAt);
  }

  prune(now = Date.now()): void {
    let next = Number.POSITIVE_INFINITY;
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
      } else {
        next = Math.min(next, entry.expiresAt);
      }
    }
    this.nextExpiryAt = next;
  }

  get size(): number {
    return this.store.size;
  }
}
