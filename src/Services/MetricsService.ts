/**
 * MetricsService provides in-memory counters for the sync engine.
 * Extremely lightweight; intentionally synchronous. Snapshots are what the console `status` command prints.
 */

export interface MetricsSnapshot {
    cacheHits: number; // successful cache lookups (folder index, metadata feed)
    cacheMisses: number; // failed or expired cache lookups
    remoteCalls: number; // calls admitted through the rate limiter
    retries: number; // transient failures that were retried
    rateLimitDelays: number; // times the QPS guard slept before a call
    appendFallbacks: number; // appends that fell back to cached content
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

type Counter = Exclude<keyof MetricsSnapshot, `eventsPublished` | `collectedAt`>;

function EmptyCounters(): Record<Counter, number> {
    return {
        cacheHits: 0,
        cacheMisses: 0,
        remoteCalls: 0,
        retries: 0,
        rateLimitDelays: 0,
        appendFallbacks: 0,
    };
}

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _counters: Record<Counter, number> = EmptyCounters();
    private _events: Record<string, number> = {};

    public IncCacheHit(): void {
        this._counters.cacheHits++;
    }
    public IncCacheMiss(): void {
        this._counters.cacheMisses++;
    }
    public IncRemoteCall(): void {
        this._counters.remoteCalls++;
    }
    public IncRetry(): void {
        this._counters.retries++;
    }
    public IncRateLimitDelay(): void {
        this._counters.rateLimitDelays++;
    }
    public IncAppendFallback(): void {
        this._counters.appendFallbacks++;
    }
    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._events[eventName] = (this._events[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            ...this._counters,
            eventsPublished: { ...this._events },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._counters = EmptyCounters();
        this._events = {};
    }
}

/** Global singleton instance used when a component is not handed its own. */
export const metricsService = new MetricsService();
