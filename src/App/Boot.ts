import type { Clock } from '../Common/Clock.js';
import { systemClock } from '../Common/Clock.js';
import { ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { RemoteObjectStore } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import { InMemoryObjectStore } from '../Repository/InMemoryObjectStore.js';
import { Neo4jClient } from '../Repository/Neo4jClient.js';
import { Neo4jObjectStore } from '../Repository/Neo4jObjectStore.js';
import { AppendOnlyLogStore } from '../Services/AppendOnlyLogStore.js';
import { StaticCredentialVerifier } from '../Services/CredentialVerifier.js';
import { DecisionReconciler } from '../Services/DecisionReconciler.js';
import { FolderIndexCache } from '../Services/FolderIndexCache.js';
import { MetadataCache } from '../Services/MetadataCache.js';
import { metricsService, type MetricsService } from '../Services/MetricsService.js';
import { ProgressTracker } from '../Services/ProgressTracker.js';
import { RateLimiter } from '../Services/RateLimiter.js';
import { RetryingTransport } from '../Services/RetryingTransport.js';
import { SessionController } from '../Services/SessionController.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Store adapter plus the hook that releases its connections. */
export interface StoreHandle {
    store: RemoteObjectStore;
    Close(): Promise<void>;
}

/** Everything a console session needs, built once per process. */
export interface Engine {
    store: RemoteObjectStore;
    metrics: MetricsService;
    NewSession(): SessionController;
    Close(): Promise<void>;
}

/**
 * Opens the configured store backend. The neo4j backend connects and ensures its schema.
 */
export async function OpenStore(config: ValidatedConfig): Promise<StoreHandle> {
    if (config.backend === `memory`) {
        const store = config.memorySeedPath
            ? await InMemoryObjectStore.FromSeedFile(config.memorySeedPath)
            : new InMemoryObjectStore();
        log.info(`Using in-memory store${config.memorySeedPath ? ` seeded from ${config.memorySeedPath}` : ``}`, `Boot`);
        return { store, Close: async() => {} };
    }
    if (!config.neo4j) {
        throw new ValidationError(`neo4j backend selected without neo4j settings`);
    }
    const client = new Neo4jClient(config.neo4j);
    await client.Init();
    const store = new Neo4jObjectStore(client);
    await store.EnsureSchema();
    log.info(`Connected to Neo4j at ${config.neo4j.uri}`, `Boot`);
    return { store, Close: () => client.Close() };
}

/**
 * Wires the sync engine over an opened store. Caches and the rate limiter are shared by every
 * session of the process.
 */
export function BuildEngine(
    config: ValidatedConfig,
    handle: StoreHandle,
    events?: MainEventBus,
    clock: Clock = systemClock,
    metrics: MetricsService = metricsService,
): Engine {
    const store = handle.store;
    const limiter = new RateLimiter(config.rateLimit, clock, metrics, events);
    const transport = new RetryingTransport(limiter, config.retry, clock, metrics, events);
    const folderIndex = new FolderIndexCache(store, transport, { ttlMs: config.folderIndexTtlMs }, clock, metrics);
    const logs = new AppendOnlyLogStore(store, transport, config.append, clock, metrics, events);
    const metadata = new MetadataCache(store, transport, logs, config.metadataTtlMs, clock, metrics);
    const reconciler = new DecisionReconciler(store, transport, folderIndex, events);
    const progressFolders = Object.fromEntries(
        Object.entries(config.categories).map(([name, category]) => [name, category.progressFolderId]),
    );
    const progress = new ProgressTracker(store, transport, logs, progressFolders, events);
    const verifier = new StaticCredentialVerifier(config.users);

    return {
        store,
        metrics,
        NewSession: () =>
            new SessionController({
                categories: config.categories,
                verifier,
                metadata,
                logs,
                folderIndex,
                reconciler,
                progress,
                clock,
                events,
            }),
        Close: () => handle.Close(),
    };
}
