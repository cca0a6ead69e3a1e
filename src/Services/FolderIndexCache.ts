import type { Clock } from '../Common/Clock.js';
import { InMemoryCache } from '../Common/InMemoryCache.js';
import { log } from '../Common/Log.js';
import type { RemoteObjectStore } from '../Domain/index.js';
import { metricsService, type MetricsService } from './MetricsService.js';
import type { RetryingTransport } from './RetryingTransport.js';

export interface FolderIndexCacheOptions {
    ttlMs: number;
    maxFolders: number;
    pageSize: number;
}

export const DEFAULT_FOLDER_INDEX_OPTIONS: FolderIndexCacheOptions = {
    ttlMs: 60 * 60 * 1000,
    maxFolders: 64,
    pageSize: 1000,
};

/**
 * Caches a folder's complete name -> object id map for a TTL window. One full listing replaces a
 * remote lookup per filename; a name missing from a cached listing stays missing until expiry, so
 * newly added files become visible eventually.
 */
export class FolderIndexCache {
    private _store: RemoteObjectStore;
    private _transport: RetryingTransport;
    private _options: FolderIndexCacheOptions;
    private _cache: InMemoryCache<Map<string, string>>;

    constructor(
        store: RemoteObjectStore,
        transport: RetryingTransport,
        options: Partial<FolderIndexCacheOptions> = {},
        clock?: Clock,
        metrics: MetricsService = metricsService,
    ) {
        this._store = store;
        this._transport = transport;
        this._options = { ...DEFAULT_FOLDER_INDEX_OPTIONS, ...options };
        this._cache = new InMemoryCache<Map<string, string>>({
            ttlMs: this._options.ttlMs,
            maxSize: this._options.maxFolders,
            metrics,
            clock,
        });
    }

    /**
     * Resolves a filename inside a folder to its object id.
     * @returns Promise<string | undefined> - Object id, or undefined when the name is not listed
     * @example
     * const sourceId = await folderIndex.Resolve(cfg.sources.hypothesis, 'h1.jpg');
     */
    public async Resolve(folderId: string, filename: string): Promise<string | undefined> {
        if (!filename) {
            return undefined;
        }
        const index = await this._cache.GetOrLoad(folderId, () => this.__listFolder(folderId));
        return index.get(filename);
    }

    /**
     * Patches a cached listing after this process created or deleted an object, so the next lookup
     * neither misses the new pointer nor returns a deleted one. Uncached folders are left alone.
     * @param objectId string | undefined - New id, or undefined when the name was removed
     */
    public Record(folderId: string, filename: string, objectId: string | undefined): void {
        const index = this._cache.Peek(folderId);

        if (!index) {
            return;
        }
        if (objectId === undefined) {
            index.delete(filename);
        } else {
            index.set(filename, objectId);
        }
    }

    /** Drops the cached listing of one folder, or of every folder when none is given. */
    public Invalidate(folderId?: string): void {
        if (folderId === undefined) {
            this._cache.Clear();
            return;
        }
        this._cache.Delete(folderId);
    }

    private async __listFolder(folderId: string): Promise<Map<string, string>> {
        const index = new Map<string, string>();
        let cursor: string | undefined;

        do {
            const page = await this._transport.Call(
                () => this._store.List(folderId, { cursor, pageSize: this._options.pageSize }),
                `List ${folderId}`,
            );

            for (const entry of page.objects) {
                index.set(entry.name, entry.id);
            }
            cursor = page.nextCursor;
        } while (cursor);

        log.debug(`Indexed ${index.size} object(s)`, `FolderIndexCache`, folderId);
        return index;
    }
}
