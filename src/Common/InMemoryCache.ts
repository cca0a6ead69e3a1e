import type { Clock } from './Clock.js';
import { systemClock } from './Clock.js';

/** Optional hit/miss sink, satisfied by MetricsService. */
export interface CacheMetricsSink {
    IncCacheHit(): void;
    IncCacheMiss(): void;
}

export interface InMemoryCacheOptions {
    ttlMs?: number; // default 5 minutes
    maxSize?: number; // default 100 entries
    metrics?: CacheMetricsSink;
    clock?: Clock;
}

/**
 * InMemoryCache provides a simple TTL-based LRU cache for storing objects in memory.
 * Used to collapse repeated remote listings and feed downloads into one call per window.
 *
 * @template T - The type of value to cache.
 */
export class InMemoryCache<T> {
    /** key -> { value, expiresAt } in LRU order (oldest first) */
    private _cache: Map<string, { value: T; expiresAt: number }> = new Map();
    private _ttl: number;
    private _maxSize: number;
    private _metrics?: CacheMetricsSink;
    private _clock: Clock;

    constructor(options: InMemoryCacheOptions = {}) {
        this._ttl = options.ttlMs ?? 5 * 60 * 1000;
        this._maxSize = options.maxSize ?? 100;
        this._metrics = options.metrics;
        this._clock = options.clock ?? systemClock;
    }

    /**
     * Set a value in the cache, updating LRU order and evicting if needed.
     * @param key string - Cache key
     * @param value T - Value to cache
     * @param ttlOverrideMs number - Optional TTL override (ms)
     */
    public Set(key: string, value: T, ttlOverrideMs?: number): void {
        const expiresAt = this._clock.Now() + (ttlOverrideMs ?? this._ttl);

        if (this._cache.has(key)) {
            this._cache.delete(key); // re-insert for LRU
        }
        this._cache.set(key, { value, expiresAt });

        if (this._cache.size > this._maxSize) {
            const oldest = this._cache.keys().next();

            if (!oldest.done) {
                this._cache.delete(oldest.value);
            }
        }
    }

    /**
     * Get a value from the cache if not expired, updating LRU order.
     * @returns T | undefined - Cached value or undefined if expired/missing
     */
    public Get(key: string): T | undefined {
        const entry = this._cache.get(key);

        if (!entry) {
            this._metrics?.IncCacheMiss();
            return undefined;
        }

        if (this._clock.Now() >= entry.expiresAt) {
            this._cache.delete(key);
            this._metrics?.IncCacheMiss(); // expired counts as miss
            return undefined;
        }
        this._cache.delete(key);
        this._cache.set(key, entry);
        this._metrics?.IncCacheHit();
        return entry.value;
    }

    /** Unexpired value without touching LRU order or metrics. */
    public Peek(key: string): T | undefined {
        const entry = this._cache.get(key);

        if (!entry || this._clock.Now() >= entry.expiresAt) {
            return undefined;
        }
        return entry.value;
    }

    /**
     * Returns the cached value or computes, stores and returns a fresh one.
     * A failed loader stores nothing.
     * @example
     * const index = await cache.GetOrLoad(folderId, () => listFolder(folderId));
     */
    public async GetOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
        const cached = this.Get(key);

        if (cached !== undefined) {
            return cached;
        }
        const value = await loader();
        this.Set(key, value);
        return value;
    }

    /** Remove a value from the cache. */
    public Delete(key: string): void {
        this._cache.delete(key);
    }

    /** Clear all cache entries. */
    public Clear(): void {
        this._cache.clear();
    }
}
