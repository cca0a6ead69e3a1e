import type { Clock } from '../Common/Clock.js';
import { InMemoryCache } from '../Common/InMemoryCache.js';
import { log } from '../Common/Log.js';
import type { JsonObject, MetadataRecord, RemoteObjectStore } from '../Domain/index.js';
import type { AppendOnlyLogStore } from './AppendOnlyLogStore.js';
import { SplitLines } from './AppendOnlyLogStore.js';
import { ParseJsonLines } from './CompletionIndex.js';
import { metricsService, type MetricsService } from './MetricsService.js';
import type { RetryingTransport } from './RetryingTransport.js';

function IsMetadataRecord(row: JsonObject): row is MetadataRecord {
    return typeof row.hypo_id === `string` && typeof row.adversarial_id === `string`;
}

/**
 * Parses a metadata feed. Lines that are not JSON objects, or that lack string `hypo_id` and
 * `adversarial_id`, are skipped.
 * @example
 * ParseMetadataFeed('{"hypo_id":"h1.jpg","adversarial_id":"a1.jpg"}\nnot json'); // one record
 */
export function ParseMetadataFeed(text: string): MetadataRecord[] {
    return ParseJsonLines(SplitLines(text)).filter(IsMetadataRecord);
}

/**
 * Holds each category's metadata feed in memory. The feed is append-only upstream, so a cached
 * copy stays valid until `Invalidate()` or TTL expiry.
 */
export class MetadataCache {
    private _store: RemoteObjectStore;
    private _transport: RetryingTransport;
    private _texts: AppendOnlyLogStore;
    private _cache: InMemoryCache<MetadataRecord[]>;

    constructor(
        store: RemoteObjectStore,
        transport: RetryingTransport,
        texts: AppendOnlyLogStore,
        ttlMs: number = 60 * 60 * 1000,
        clock?: Clock,
        metrics: MetricsService = metricsService,
    ) {
        this._store = store;
        this._transport = transport;
        this._texts = texts;
        this._cache = new InMemoryCache<MetadataRecord[]>({ ttlMs, maxSize: 32, metrics, clock });
    }

    /**
     * Returns the parsed feed, loading it on first use.
     * @throws NotFoundError / PermanentError when the feed object is not accessible
     */
    public async Load(feedId: string): Promise<MetadataRecord[]> {
        return this._cache.GetOrLoad(feedId, async () => {
            // fail loudly on a wrong feed id instead of showing an empty category
            await this._transport.Call(() => this._store.Stat(feedId), `Stat ${feedId}`);
            const records = ParseMetadataFeed(await this._texts.ReadText(feedId));
            log.info(`Loaded ${records.length} pair(s)`, `MetadataCache`, feedId);
            return records;
        });
    }

    /** Drops one cached feed, or all of them. */
    public Invalidate(feedId?: string): void {
        if (feedId === undefined) {
            this._cache.Clear();
            return;
        }
        this._cache.Delete(feedId);
    }
}
