/**
 * Candidate Cache
 *
 * TTL cache for provider results with single-flight population: concurrent
 * misses for one key share a single upstream call. A waiter that is
 * cancelled detaches; when the last waiter leaves, the call is aborted and
 * the key released. Only successful loads are stored.
 */

import type { CandidateOption } from '../engine/types';
import { waitFor } from '../utils/deadline';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

interface PendingLoad<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

export interface CandidateCacheOptions {
  now?: () => number;
  sweepIntervalMs?: number;
}

export interface CacheLookup<T> {
  value: T;
  fromCache: boolean;
}

export class CandidateCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private pending = new Map<string, PendingLoad<T>>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private readonly sweepIntervalMs: number;

  constructor(options: CandidateCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  get size(): number {
    return this.entries.size;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async getOrLoad(
    key: string,
    ttlMs: number,
    loader: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<CacheLookup<T>> {
    const hit = this.get(key);
    if (hit !== undefined) return { value: hit, fromCache: true };
    signal?.throwIfAborted();

    const load = this.pending.get(key) ?? this.startLoad(key, ttlMs, loader);
    load.waiters++;
    try {
      const value = await waitFor(load.promise, signal);
      return { value, fromCache: false };
    } finally {
      load.waiters--;
      if (load.waiters === 0 && this.pending.get(key) === load) {
        this.pending.delete(key);
        load.controller.abort();
      }
    }
  }

  private startLoad(key: string, ttlMs: number, loader: (signal: AbortSignal) => Promise<T>): PendingLoad<T> {
    const controller = new AbortController();
    const promise = Promise.resolve().then(() => loader(controller.signal));
    const load: PendingLoad<T> = { promise, controller, waiters: 0 };
    this.pending.set(key, load);

    promise.then(
      (value) => {
        if (this.pending.get(key) !== load) return;
        this.pending.delete(key);
        this.set(key, value, ttlMs);
      },
      () => {
        if (this.pending.get(key) === load) this.pending.delete(key);
      }
    );
    return load;
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  clear(): void {
    this.entries.clear();
  }
}

let sharedCache: CandidateCache<CandidateOption[]> | null = null;

/**
 * Process-wide candidate cache shared by every planning run. The sweep
 * timer is unref'd and never keeps the process alive.
 */
export function sharedCandidateCache(sweepIntervalMs?: number): CandidateCache<CandidateOption[]> {
  if (!sharedCache) {
    sharedCache = new CandidateCache<CandidateOption[]>({ sweepIntervalMs });
    sharedCache.start();
  }
  return sharedCache;
}
