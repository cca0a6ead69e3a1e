import type { LogLevelName } from '../Common/Log.js';
import type { PerSide } from '../Domain/index.js';
import type { Neo4jConfig } from '../Repository/Neo4jClient.js';
import type { AnnotatorAccount } from '../Services/CredentialVerifier.js';
import type { AppendOptions } from '../Services/AppendOnlyLogStore.js';
import type { RateLimiterOptions } from '../Services/RateLimiter.js';
import type { RetryOptions } from '../Services/RetryingTransport.js';

export type StoreBackend = `neo4j` | `memory`;

/** Remote locations of one category; every id is already normalized. */
export interface CategoryConfig {
    metadataFeedId: string;
    sources: PerSide<string>; // folders holding the source assets
    destinations: PerSide<string>; // folders receiving pointer objects
    logs: PerSide<string>; // LogFile text objects
    progressFolderId: string; // where progress hints live
}

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    logLevel: LogLevelName;
    backend: StoreBackend;
    neo4j?: Neo4jConfig; // required when backend is neo4j
    memorySeedPath?: string; // optional seed document for the memory backend
    categories: Record<string, CategoryConfig>;
    users: AnnotatorAccount[];
    rateLimit: RateLimiterOptions;
    retry: RetryOptions;
    append: AppendOptions;
    folderIndexTtlMs: number;
    metadataTtlMs: number;
}
