import Joi from 'joi';
import { readConfigFile } from '../Common/ConfigReader.js';
import { Configurator } from '../Common/Configurator.js';
import { DescribeError, ValidationError } from '../Common/Errors.js';
import type { LogLevelName } from '../Common/Log.js';
import { EVENT_NAMES, SIDES, type PerSide } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import type { CategoryConfig, StoreBackend, ValidatedConfig } from '../Types/Config.js';
import { DEFAULT_APPEND_OPTIONS, type AppendOptions } from './AppendOnlyLogStore.js';
import { DEFAULT_RATE_LIMITER_OPTIONS, type RateLimiterOptions } from './RateLimiter.js';
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from './RetryingTransport.js';

/** Config path used when CONFIG_PATH is not set. */
export const DEFAULT_CONFIG_PATH = `./config/config.json`;

interface RawCategory {
    metadataFeedId: string;
    sources: PerSide<string>;
    destinations: PerSide<string>;
    logs: PerSide<string>;
    progressFolderId?: string;
}

/** Configuration document as written on disk, before id normalization and defaults. */
interface RawConfig {
    logLevel?: LogLevelName;
    backend?: StoreBackend;
    neo4j?: { uri: string; username: string; password: string; database?: string };
    memorySeedPath?: string;
    progressFolderId?: string;
    categories: Record<string, RawCategory>;
    users: { name: string; secretSha256: string; categories?: string[] }[];
    rateLimit?: Partial<RateLimiterOptions>;
    retry?: Partial<RetryOptions>;
    append?: Partial<AppendOptions>;
    folderIndexTtlSeconds?: number;
    metadataTtlSeconds?: number;
}

const perSide = Joi.object({
    hypothesis: Joi.string().trim().min(1).required(),
    adversarial: Joi.string().trim().min(1).required(),
});

const RAW_CONFIG_SCHEMA = Joi.object<RawConfig>({
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`, `silent`),
    backend: Joi.string().valid(`neo4j`, `memory`),
    neo4j: Joi.object({
        uri: Joi.string().required(),
        username: Joi.string().required(),
        password: Joi.string().required(),
        database: Joi.string().optional(),
    }),
    memorySeedPath: Joi.string(),
    progressFolderId: Joi.string().trim().min(1),
    categories: Joi.object()
        .pattern(
            Joi.string().pattern(/^[A-Za-z0-9_-]+$/),
            Joi.object({
                metadataFeedId: Joi.string().trim().min(1).required(),
                sources: perSide.required(),
                destinations: perSide.required(),
                logs: perSide.required(),
                progressFolderId: Joi.string().trim().min(1),
            }),
        )
        .min(1)
        .required(),
    users: Joi.array()
        .items(
            Joi.object({
                name: Joi.string().trim().min(1).required(),
                secretSha256: Joi.string().hex().length(64).required(),
                categories: Joi.array().items(Joi.string()).min(1),
            }),
        )
        .min(1)
        .required(),
    rateLimit: Joi.object({
        maxQps: Joi.number().positive(),
        windowSize: Joi.number().integer().min(2),
        maxDelayMs: Joi.number().integer().min(0),
        scaleMs: Joi.number().min(0),
    }),
    retry: Joi.object({
        attempts: Joi.number().integer().min(1),
        baseDelayMs: Joi.number().integer().min(0),
        maxDelayMs: Joi.number().integer().min(0),
    }),
    append: Joi.object({
        retries: Joi.number().integer().min(1),
        linearBackoffMs: Joi.number().integer().min(0),
    }),
    folderIndexTtlSeconds: Joi.number().min(0),
    metadataTtlSeconds: Joi.number().min(0),
}).unknown(true);

/** Share-link shapes accepted wherever an object or folder id is expected. */
const ID_PATTERNS = [/\/d\/([A-Za-z0-9_-]+)/, /\/folders\/([A-Za-z0-9_-]+)/, /[?&]id=([A-Za-z0-9_-]+)/];

/**
 * Normalizes an id that may have been pasted as a share URL.
 * @example
 * ExtractObjectId('https://store.example/drive/folders/abc_123?usp=sharing'); // 'abc_123'
 * ExtractObjectId(' abc_123 '); // 'abc_123'
 */
export function ExtractObjectId(value: string): string {
    const trimmed = value.trim();

    for (const pattern of ID_PATTERNS) {
        const match = pattern.exec(trimmed);

        if (match?.[1]) {
            return match[1];
        }
    }
    return trimmed;
}

function NormalizeSides(value: PerSide<string>): PerSide<string> {
    return { hypothesis: ExtractObjectId(value.hypothesis), adversarial: ExtractObjectId(value.adversarial) };
}

function IsRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Applies environment overrides (highest precedence) to the parsed document before validation.
 */
export function ApplyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
    if (!IsRecord(raw)) {
        return raw;
    }
    const merged: Record<string, unknown> = { ...raw };

    if (env.ANNOTATION_BACKEND) {
        merged.backend = env.ANNOTATION_BACKEND;
    }
    if (env.ANNOTATION_LOG_LEVEL) {
        merged.logLevel = env.ANNOTATION_LOG_LEVEL;
    }
    if (env.NEO4J_URI || env.NEO4J_USER || env.NEO4J_PASSWORD) {
        const neo4j: Record<string, unknown> = IsRecord(raw.neo4j) ? { ...raw.neo4j } : {};

        if (env.NEO4J_URI) {
            neo4j.uri = env.NEO4J_URI;
        }
        if (env.NEO4J_USER) {
            neo4j.username = env.NEO4J_USER;
        }
        if (env.NEO4J_PASSWORD) {
            neo4j.password = env.NEO4J_PASSWORD;
        }
        merged.neo4j = neo4j;
    }
    return merged;
}

/**
 * Turns a schema-valid document into ValidatedConfig: normalizes ids, resolves each category's
 * progress folder, applies defaults and checks cross references.
 * @throws ValidationError for references the schema cannot express
 */
export function BuildValidatedConfig(raw: RawConfig): ValidatedConfig {
    const backend = raw.backend ?? `neo4j`;

    if (backend === `neo4j` && !raw.neo4j) {
        throw new ValidationError(`Config validation error: "neo4j" is required for the neo4j backend`);
    }
    const categories: Record<string, CategoryConfig> = {};

    for (const [name, category] of Object.entries(raw.categories)) {
        const destinations = NormalizeSides(category.destinations);
        const progressFolder = category.progressFolderId ?? raw.progressFolderId;
        categories[name] = {
            metadataFeedId: ExtractObjectId(category.metadataFeedId),
            sources: NormalizeSides(category.sources),
            destinations,
            logs: NormalizeSides(category.logs),
            progressFolderId: progressFolder ? ExtractObjectId(progressFolder) : destinations.hypothesis,
        };
    }
    const known = Object.keys(categories);
    const users = raw.users.map(user => {
        const allowed = user.categories ?? known;
        const missing = allowed.filter(category => !categories[category]);

        if (missing.length > 0) {
            throw new ValidationError(
                `Config validation error: user '${user.name}' references unknown categories ${missing.join(`, `)}`,
                { user: user.name, categories: missing },
            );
        }
        return { name: user.name, secretSha256: user.secretSha256.toLowerCase(), categories: [...allowed] };
    });

    return {
        logLevel: raw.logLevel ?? `info`,
        backend,
        neo4j: raw.neo4j,
        memorySeedPath: raw.memorySeedPath,
        categories,
        users,
        rateLimit: { ...DEFAULT_RATE_LIMITER_OPTIONS, ...raw.rateLimit },
        retry: { ...DEFAULT_RETRY_OPTIONS, ...raw.retry },
        append: { ...DEFAULT_APPEND_OPTIONS, ...raw.append },
        folderIndexTtlMs: (raw.folderIndexTtlSeconds ?? 3600) * 1000,
        metadataTtlMs: (raw.metadataTtlSeconds ?? 3600) * 1000,
    };
}

/** Loaded per-side store locations, keyed by side, for quick listing in logs. */
export function DescribeCategory(name: string, category: CategoryConfig): string {
    return `${name}: ${SIDES.map(side => `${side} log=${category.logs[side]}`).join(`, `)}`;
}

/**
 * Service responsible for loading and validating application configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;
    private _env: NodeJS.ProcessEnv;

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded` / `config.error`.
     * @param env NodeJS.ProcessEnv - Environment consulted for overrides.
     */
    constructor(eventBus: MainEventBus, env: NodeJS.ProcessEnv = process.env) {
        this._eventBus = eventBus;
        this._env = env;
    }

    /** Config path from CONFIG_PATH, or the default. */
    public ResolvePath(): string {
        return this._env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * @param path string - Filesystem path to the config file. Example: './config/config.json'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws ValidationError if loading or validation fails.
     * @example
     * const configService = new ConfigService(MAIN_EVENT_BUS);
     * const config = await configService.Load(configService.ResolvePath());
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        try {
            const parsed = await readConfigFile(path);
            const validated = this.FromObject(parsed);
            this._eventBus.Emit(EVENT_NAMES.configLoaded, { path });
            return validated;
        } catch(err) {
            const message = DescribeError(err);
            this._eventBus.Emit(EVENT_NAMES.configError, { path, message });

            if (err instanceof ValidationError) {
                throw new ValidationError(`Failed to load config from '${path}': ${message}`, err.details);
            }
            throw new ValidationError(`Failed to load config from '${path}': ${message}`, { path });
        }
    }

    /**
     * Validates an already parsed document (env overrides applied first).
     * @throws ValidationError when the document is invalid
     */
    public FromObject(parsed: unknown): ValidatedConfig {
        const raw = new Configurator(RAW_CONFIG_SCHEMA, ApplyEnvOverrides(parsed, this._env)).getConfig();
        return BuildValidatedConfig(raw);
    }
}
