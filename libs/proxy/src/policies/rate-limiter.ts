/**
 * Rate Limiter
 *
 * Fixed rolling window per client IP: the first request after a window has
 * expired (`now - windowStart >= window`) opens a new window with count 1.
 * Within a window every request is counted, and the (limit + 1)-th and later
 * requests are rejected until the window rolls over.
 *
 * Sessions run on one event loop and `admit()` never yields, so each
 * read-modify-write of an IP's window completes before any other session
 * touches it. No lock spans more than a single entry.
 */

import { performance } from 'node:perf_hooks';
import type { RateLimitedDecision } from '@portcullis/ipc';

export interface RateWindowState {
  windowStart: number;
  count: number;
  lastSeen: number;
}

export interface RateAdmitted {
  admitted: true;
  count: number;
  remaining: number;
}

export interface RateRejected {
  admitted: false;
  count: number;
  limit: number;
  windowMs: number;
  retryAfterMs: number;
}

export type RateDecision = RateAdmitted | RateRejected;

export interface RateLimiterOptions {
  /** Requests admitted per window */
  limit: number;
  windowMs: number;
  /** Inactivity after which an entry may be reclaimed (default: 6 windows) */
  staleAfterMs?: number;
  /** How often the background sweep runs (default: one window) */
  sweepIntervalMs?: number;
  /** Monotonic millisecond clock */
  clock?: () => number;
}

export class RateLimiter {
  private readonly windows = new Map<string, RateWindowState>();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly staleAfterMs: number;
  private readonly sweepIntervalMs: number;
  private readonly clock: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${options.limit}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`);
    }

    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.staleAfterMs = options.staleAfterMs ?? this.windowMs * 6;
    this.sweepIntervalMs = options.sweepIntervalMs ?? this.windowMs;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Count a request from `clientIp` and decide whether it may proceed.
   */
  admit(clientIp: string): RateDecision {
    const now = this.clock();
    const state = this.windows.get(clientIp);

    if (!state || now - state.windowStart >= this.windowMs) {
      this.windows.set(clientIp, { windowStart: now, count: 1, lastSeen: now });
      return { admitted: true, count: 1, remaining: this.limit - 1 };
    }

    state.count += 1;
    state.lastSeen = now;

    if (state.count <= this.limit) {
      return { admitted: true, count: state.count, remaining: this.limit - state.count };
    }

    return {
      admitted: false,
      count: state.count,
      limit: this.limit,
      windowMs: this.windowMs,
      retryAfterMs: Math.max(0, state.windowStart + this.windowMs - now),
    };
  }

  /**
   * Express a rejection as the access decision attached to a session.
   */
  static toDecision(rejected: RateRejected): RateLimitedDecision {
    return {
      verdict: 'rate_limited',
      limit: rejected.limit,
      windowMs: rejected.windowMs,
      count: rejected.count,
      retryAfterMs: rejected.retryAfterMs,
    };
  }

  /**
   * Drop entries idle for longer than the stale threshold. Returns how many were removed.
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [ip, state] of this.windows) {
      if (now - state.lastSeen >= this.staleAfterMs) {
        this.windows.delete(ip);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Start the periodic sweep. The timer does not keep the process alive.
   */
  startSweeper(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Snapshot of one client's window, if tracked.
   */
  getState(clientIp: string): Readonly<RateWindowState> | undefined {
    const state = this.windows.get(clientIp);
    return state ? { ...state } : undefined;
  }

  reset(clientIp?: string): void {
    if (clientIp === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(clientIp);
    }
  }

  get size(): number {
    return this.windows.size;
  }
}
