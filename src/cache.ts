import { QuoteResult } from './types';
import { recordCacheLookup, setCacheEntries } from './metrics';

/** Cached quote with the time it was fetched */
interface CacheEntry {
  quote: QuoteResult;
  fetchedAt: number;
}

/** Options for the quote cache */
export interface QuoteCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
}

function cacheKey(symbol: string, interval: string): string {
  return `${symbol}:${interval}`;
}

/**
 * TTL cache of quotes keyed by (symbol, interval).
 *
 * Concurrent lookups for a key that is being fetched share the in-flight
 * promise, so a key never has more than one outstanding provider call.
 * Failed fetches are not cached.
 */
export class QuoteCache {
  private entries: Map<string, CacheEntry> = new Map();
  private inFlight: Map<string, Promise<QuoteResult>> = new Map();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: QuoteCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /** Return the live quote for the key, fetching (or joining a fetch) on miss */
  getOrFetch(
    symbol: string,
    interval: string,
    fetchFn: () => Promise<QuoteResult>
  ): Promise<QuoteResult> {
    const cached = this.get(symbol, interval);
    if (cached) {
      recordCacheLookup('hit');
      return Promise.resolve(cached);
    }

    const key = cacheKey(symbol, interval);
    const pending = this.inFlight.get(key);
    if (pending) {
      recordCacheLookup('coalesced');
      return pending;
    }

    recordCacheLookup('miss');

    const request = fetchFn()
      .then((quote) => {
        this.set(key, quote);
        return quote;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }

  /** Get quote by key, returns null if not found or expired */
  get(symbol: string, interval: string): QuoteResult | null {
    const entry = this.entries.get(cacheKey(symbol, interval));
    if (!entry) {
      return null;
    }

    if (this.now() - entry.fetchedAt >= this.ttlMs) {
      return null;
    }

    return entry.quote;
  }

  /** Remove expired quotes from cache */
  cleanupExpired(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.entries) {
      if (now - entry.fetchedAt >= this.ttlMs) {
        this.entries.delete(key);
        cleaned++;
      }
    }

    setCacheEntries(this.entries.size);
    return cleaned;
  }

  /** Get current number of cached quotes */
  size(): number {
    return this.entries.size;
  }

  private set(key: string, quote: QuoteResult): void {
    // Overwrites move the key to the end so eviction stays oldest-first
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    this.entries.set(key, { quote, fetchedAt: this.now() });
    setCacheEntries(this.entries.size);
  }
}
