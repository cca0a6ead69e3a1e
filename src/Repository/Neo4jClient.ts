/**
 * Lightweight Neo4j driver wrapper used by the object store adapter.
 * Provides lifecycle management, a typed session helper and driver error mapping.
 */
import neo4j, { auth, type Driver, type Record as Neo4jRecord, type Session } from 'neo4j-driver';
import { DescribeError, PermanentError, TransientError } from '../Common/Errors.js';

export interface Neo4jConfig {
    uri: string; // bolt://host:port or neo4j://host
    username: string; // db user
    password: string; // db password
    database?: string; // optional database name
}

export type Neo4jAccessMode = `READ` | `WRITE`;

/** Driver-side codes that mean "try again later" rather than "this will never work". */
const TRANSIENT_DRIVER_CODES = new Set([`ServiceUnavailable`, `SessionExpired`]);

/**
 * Maps a driver failure onto the store error taxonomy: `Neo.TransientError.*` and lost connections
 * become TransientError, everything else PermanentError.
 * @example
 * MapNeo4jError(Object.assign(new Error('busy'), { code: 'Neo.TransientError.General.DatabaseUnavailable' }));
 */
export function MapNeo4jError(err: unknown, query: string): Error {
    if (err instanceof TransientError || err instanceof PermanentError) {
        return err;
    }
    const code = typeof err === `object` && err !== null ? Reflect.get(err, `code`) : undefined;
    const details = { code: typeof code === `string` ? code : undefined, query };

    if (typeof code === `string` && (code.startsWith(`Neo.TransientError.`) || TRANSIENT_DRIVER_CODES.has(code))) {
        return new TransientError(`Neo4j unavailable: ${DescribeError(err)}`, details, err, 503);
    }
    return new PermanentError(`Neo4j query failed: ${DescribeError(err)}`, details, err);
}

/**
 * Small client holding a singleton-like driver instance with explicit init/close.
 */
export class Neo4jClient {
    private _driver: Driver | null = null; // underlying driver instance
    private _config: Neo4jConfig; // connection settings

    /**
     * Initialize client with provided configuration (does not connect yet).
     * @param config Neo4jConfig – connection settings
     */
    constructor(config: Neo4jConfig) {
        this._config = config;
    }

    /**
     * Establish a driver connection if not already created.
     */
    async Init(): Promise<void> {
        if (this._driver) {
            return;
        }
        const token = auth.basic(this._config.username, this._config.password);
        const driver = neo4j.driver(this._config.uri, token);

        try {
            await driver.verifyConnectivity();
        } catch(err) {
            await driver.close();
            throw MapNeo4jError(err, `verifyConnectivity`);
        }
        this._driver = driver;
    }

    /**
     * Acquire a session bound to configured database (if provided).
     */
    async GetSession(mode: Neo4jAccessMode = `WRITE`): Promise<Session> {
        await this.Init();

        if (!this._driver) {
            throw new PermanentError(`Neo4jClient not initialized`);
        }
        return this._driver.session({
            database: this._config.database,
            defaultAccessMode: mode === `READ` ? neo4j.session.READ : neo4j.session.WRITE,
        });
    }

    /**
     * Runs one query in its own session and returns the records; driver errors are mapped.
     * @example
     * const rows = await client.Run(`MATCH (o:StoreObject {id: $id}) RETURN o.name AS name`, { id }, `READ`);
     */
    async Run(query: string, params: Record<string, unknown> = {}, mode: Neo4jAccessMode = `WRITE`): Promise<Neo4jRecord[]> {
        const session = await this.GetSession(mode);

        try {
            const result = await session.run(query, params);
            return result.records;
        } catch(err) {
            throw MapNeo4jError(err, query);
        } finally {
            await session.close();
        }
    }

    /**
     * Close underlying driver and free sockets.
     */
    async Close(): Promise<void> {
        if (this._driver) {
            await this._driver.close();
            this._driver = null;
        }
    }
}
