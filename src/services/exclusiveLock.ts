import { GuardTimeoutError, LockPoisonedError } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import {
  exclusiveAcquisitionsTotal,
  exclusiveWaitSeconds,
  exclusiveWaiters,
} from '../metrics/index.js';

export interface AcquireOptions {
  /** Give up after this many ms; 0 or absent waits forever. */
  timeoutMs?: number;
}

interface Waiter {
  resolve: (guard: SerializationGuard) => void;
  reject: (err: Error) => void;
  start: bigint;
  timer: NodeJS.Timeout | null;
}

/** Token for exclusive use of the global logger. Released at most once. */
export class SerializationGuard {
  private released = false;

  constructor(
    readonly ticket: number,
    private readonly onRelease: (guard: SerializationGuard) => void,
  ) {}

  get active(): boolean {
    return !this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease(this);
  }
}

/**
 * FIFO mutual exclusion for tests that need the global logger to themselves.
 * A release hands the lock straight to the oldest waiter, so late arrivals
 * cannot overtake anyone already queued.
 */
export class ExclusiveLock {
  private holder: SerializationGuard | null = null;
  private readonly queue: Waiter[] = [];
  private tickets = 0;
  private poisonedBy: { cause: unknown } | null = null;

  get held(): boolean {
    return this.holder !== null;
  }

  get waiting(): number {
    return this.queue.length;
  }

  get poisoned(): boolean {
    return this.poisonedBy !== null;
  }

  acquire(opts: AcquireOptions = {}): Promise<SerializationGuard> {
    if (this.poisonedBy) {
      exclusiveAcquisitionsTotal.inc({ result: 'poisoned' });
      return Promise.reject(new LockPoisonedError(this.poisonedBy.cause));
    }
    const start = process.hrtime.bigint();
    if (!this.holder) {
      return Promise.resolve(this.grant(start));
    }
    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, start, timer: null };
      const timeoutMs = opts.timeoutMs ?? 0;
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => this.expire(waiter, timeoutMs), timeoutMs);
      }
      this.queue.push(waiter);
      exclusiveWaiters.set(this.queue.length);
    });
  }

  /** Runs `fn` holding the guard; the guard is released on every exit path. */
  async run<T>(fn: (guard: SerializationGuard) => T | Promise<T>, opts: AcquireOptions = {}): Promise<T> {
    const guard = await this.acquire(opts);
    try {
      return await fn(guard);
    } finally {
      guard.release();
    }
  }

  /**
   * Marks the lock as unusable. Queued and future acquirers fail with
   * LockPoisonedError once the current holder (if any) releases.
   */
  poison(cause: unknown): void {
    if (this.poisonedBy) return;
    this.poisonedBy = { cause };
    getLogger().error({ err: cause }, 'exclusive logging lock poisoned');
    if (!this.holder) this.failQueued();
  }

  private grant(start: bigint): SerializationGuard {
    const guard = new SerializationGuard(++this.tickets, (g) => this.handOff(g));
    this.holder = guard;
    exclusiveWaitSeconds.observe(Number(process.hrtime.bigint() - start) / 1e9);
    exclusiveAcquisitionsTotal.inc({ result: 'acquired' });
    return guard;
  }

  private handOff(guard: SerializationGuard): void {
    if (this.holder !== guard) return;
    this.holder = null;
    if (this.poisonedBy) {
      this.failQueued();
      return;
    }
    const next = this.queue.shift();
    exclusiveWaiters.set(this.queue.length);
    if (next) {
      if (next.timer) clearTimeout(next.timer);
      next.resolve(this.grant(next.start));
    }
  }

  private expire(waiter: Waiter, timeoutMs: number): void {
    const idx = this.queue.indexOf(waiter);
    if (idx === -1) return;
    this.queue.splice(idx, 1);
    exclusiveWaiters.set(this.queue.length);
    exclusiveAcquisitionsTotal.inc({ result: 'timeout' });
    waiter.reject(new GuardTimeoutError(timeoutMs));
  }

  private failQueued(): void {
    const cause = this.poisonedBy?.cause;
    for (const waiter of this.queue.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      exclusiveAcquisitionsTotal.inc({ result: 'poisoned' });
      waiter.reject(new LockPoisonedError(cause));
    }
    exclusiveWaiters.set(0);
  }
}
