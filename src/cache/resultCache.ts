import type { CachedAudio } from '../types.js';

interface CacheEntry extends CachedAudio {
  storedAt: number;
}

export interface ResultCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

export interface ResultStore {
  put(jobId: string, samples: Int16Array, sampleRate: number, now?: number): void;
  get(jobId: string, now?: number): CachedAudio | null;
}

/**
 * Finished generations keyed by job id. Map iteration order is insertion
 * order, so the first key is always the oldest insert.
 *
 * Node runs each call to completion on one thread; no caller can observe the
 * map between the insert and the eviction sweep.
 */
export class ResultCache implements ResultStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;

  constructor(options: ResultCacheOptions) {
    this.ttlMs = Math.max(1, options.ttlMs);
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
  }

  get size(): number {
    return this.entries.size;
  }

  put(jobId: string, samples: Int16Array, sampleRate: number, now = Date.now()): void {
    // re-inserting moves the job to the newest position
    this.entries.delete(jobId);
    this.entries.set(jobId, { samples, sampleRate, storedAt: now });
    this.sweep(now);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(oldest);
    }
  }

  get(jobId: string, now = Date.now()): CachedAudio | null {
    const entry = this.entries.get(jobId);
    if (!entry) return null;
    if (this.isExpired(entry, now)) {
      this.entries.delete(jobId);
      return null;
    }
    return { samples: entry.samples.slice(), sampleRate: entry.sampleRate };
  }

  /** Drops every expired entry; returns how many were removed. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [jobId, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(jobId);
        removed += 1;
      }
    }
    return removed;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt > this.ttlMs;
  }
}
