import type { CacheSettings } from '../../shared/config';
import { hashString } from '../../shared/crypto';
import type { InsightDocument } from './providers/types';

interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

interface Flight<V> {
  promise: Promise<V>;
  controller: AbortController;
  /** Callers still waiting; a caller without a signal never leaves. */
  waiters: number;
}

export interface TtlCacheOptions {
  name: string;
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

export interface CacheStats {
  name: string;
  size: number;
  inFlight: number;
  hits: number;
  misses: number;
}

/**
 * Keyed memo with time- and size-based eviction and single-flight loading.
 *
 * Entries are replaced, never mutated. Recency is tracked through Map insertion
 * order: a hit moves the key to the back, so the front is always the least
 * recently used entry. While a key is being computed every caller for it awaits
 * the same promise; a rejected computation leaves nothing cached.
 *
 * A caller's own signal only detaches that caller. The computation gets a
 * signal of its own, aborted once every caller that could leave has left.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Flight<V>>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(private readonly options: TtlCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get name(): string {
    return this.options.name;
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt > this.options.ttlMs;
  }

  private lookup(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  get(key: string): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: now });
    if (this.entries.size > this.options.maxEntries) {
      this.evictExpired(now);
    }
    while (this.entries.size > this.options.maxEntries) {
      const eldest = this.entries.keys().next();
      if (eldest.done) break;
      this.entries.delete(eldest.value);
    }
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
      }
    }
  }

  getOrCompute(key: string, compute: (signal: AbortSignal) => Promise<V>, signal?: AbortSignal): Promise<V> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const cached = this.lookup(key);
    if (cached) {
      this.hits += 1;
      return Promise.resolve(cached.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits += 1;
      return this.follow(key, pending, signal);
    }

    this.misses += 1;
    const controller = new AbortController();
    // compute starts on the next microtask, after the flight is registered.
    const promise: Promise<V> = Promise.resolve()
      .then(() => compute(controller.signal))
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === flight) {
          this.inFlight.delete(key);
        }
      });
    const flight: Flight<V> = { promise, controller, waiters: 0 };
    this.inFlight.set(key, flight);
    return this.follow(key, flight, signal);
  }

  private follow(key: string, flight: Flight<V>, signal?: AbortSignal): Promise<V> {
    flight.waiters += 1;
    if (!signal) {
      return flight.promise;
    }

    return new Promise<V>((resolve, reject) => {
      const onAbort = () => {
        flight.waiters -= 1;
        if (flight.waiters === 0) {
          if (this.inFlight.get(key) === flight) {
            this.inFlight.delete(key);
          }
          flight.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      flight.promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return {
      name: this.options.name,
      size: this.entries.size,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}

export const createTtlCache = <V>(name: string, settings: CacheSettings, now?: () => number): TtlCache<V> =>
  new TtlCache<V>({ name, ttlMs: settings.ttlSeconds * 1000, maxEntries: settings.maxEntries, now });

/** Order-sensitive digest of document identities and content. */
export const documentsFingerprint = (documents: InsightDocument[]): string =>
  hashString(JSON.stringify(documents.map((doc) => [doc.id, doc.name, doc.type, doc.content])));

export const insightCacheKey = (query: string, documents: InsightDocument[]): string =>
  `${query}_${documentsFingerprint(documents)}`;
