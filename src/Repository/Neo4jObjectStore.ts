/**
 * Neo4j-backed implementation of RemoteObjectStore.
 * Data model: folders are (:StoreFolder {id}); every object is a (:StoreObject {id, name, kind, content, targetId})
 * linked to its folder via [:IN]. Pointer objects carry the id of the asset they reference in `targetId`.
 */
import { randomUUID } from 'crypto';
import neo4j, { type Record as Neo4jRecord } from 'neo4j-driver';
import { NotFoundError, PermanentError } from '../Common/Errors.js';
import type {
    ListOptions,
    ListPage,
    RemoteObjectStore,
    StoredObjectInfo,
    StoredObjectKind,
} from '../Domain/index.js';
import type { Neo4jAccessMode, Neo4jClient } from './Neo4jClient.js';

/** Part of Neo4jClient the store needs; lets tests substitute a scripted runner. */
export type Neo4jRunner = Pick<Neo4jClient, `Run`>;

const OBJECT_FIELDS = `o.id AS id, o.name AS name, o.kind AS kind, o.targetId AS targetId, f.id AS folderId`;

function ReadString(record: Neo4jRecord, key: string): string | undefined {
    if (!record.has(key)) {
        return undefined;
    }
    const value: unknown = record.get(key);
    return typeof value === `string` ? value : undefined;
}

function IsObjectKind(value: string | undefined): value is StoredObjectKind {
    return value === `asset` || value === `text` || value === `pointer`;
}

function ToObjectInfo(record: Neo4jRecord): StoredObjectInfo {
    const id = ReadString(record, `id`);
    const kind = ReadString(record, `kind`);

    if (!id || !IsObjectKind(kind)) {
        throw new PermanentError(`Malformed StoreObject row`, { id, kind });
    }
    const targetId = ReadString(record, `targetId`);
    return {
        id,
        name: ReadString(record, `name`) ?? ``,
        folderId: ReadString(record, `folderId`) ?? ``,
        kind,
        ...(targetId ? { targetId } : {}),
    };
}

export class Neo4jObjectStore implements RemoteObjectStore {
    private _client: Neo4jRunner;

    constructor(client: Neo4jRunner) {
        this._client = client;
    }

    /** Creates the id uniqueness constraints. Safe to call multiple times. */
    async EnsureSchema(): Promise<void> {
        await this.__run(`CREATE CONSTRAINT store_object_id IF NOT EXISTS FOR (o:StoreObject) REQUIRE o.id IS UNIQUE`);
        await this.__run(`CREATE CONSTRAINT store_folder_id IF NOT EXISTS FOR (f:StoreFolder) REQUIRE f.id IS UNIQUE`);
    }

    async Stat(objectId: string): Promise<StoredObjectInfo> {
        const rows = await this.__run(
            `MATCH (o:StoreObject { id: $id })-[:IN]->(f:StoreFolder) RETURN ${OBJECT_FIELDS}`,
            { id: objectId },
            `READ`,
        );
        return ToObjectInfo(this.__single(rows, objectId));
    }

    async GetText(objectId: string): Promise<string> {
        const rows = await this.__run(
            `MATCH (o:StoreObject { id: $id, kind: 'text' }) RETURN o.content AS content`,
            { id: objectId },
            `READ`,
        );
        return ReadString(this.__single(rows, objectId), `content`) ?? ``;
    }

    async PutText(objectId: string, content: string): Promise<void> {
        const rows = await this.__run(
            `MATCH (o:StoreObject { id: $id, kind: 'text' }) SET o.content = $content RETURN o.id AS id`,
            { id: objectId, content },
        );
        this.__single(rows, objectId);
    }

    async CreateText(folderId: string, name: string, content: string): Promise<string> {
        const id = randomUUID();
        await this.__run(
            `MERGE (f:StoreFolder { id: $folderId })
             CREATE (o:StoreObject { id: $id, name: $name, kind: 'text', content: $content })-[:IN]->(f)`,
            { folderId, id, name, content },
        );
        return id;
    }

    async CreatePointer(sourceObjectId: string, folderId: string, name: string): Promise<string> {
        const rows = await this.__run(
            `MATCH (src:StoreObject { id: $sourceId })
             MERGE (f:StoreFolder { id: $folderId })
             CREATE (o:StoreObject { id: $id, name: $name, kind: 'pointer', targetId: $sourceId })-[:IN]->(f)
             RETURN o.id AS id`,
            { sourceId: sourceObjectId, folderId, id: randomUUID(), name },
        );
        const created = ReadString(this.__single(rows, sourceObjectId), `id`);

        if (!created) {
            throw new PermanentError(`Pointer creation returned no id`, { sourceObjectId, folderId });
        }
        return created;
    }

    async Delete(objectId: string): Promise<void> {
        const rows = await this.__run(
            `MATCH (o:StoreObject { id: $id }) DETACH DELETE o RETURN $id AS id`,
            { id: objectId },
        );
        this.__single(rows, objectId);
    }

    async List(folderId: string, options: ListOptions = {}): Promise<ListPage> {
        const offset = options.cursor ? Number.parseInt(options.cursor, 10) || 0 : 0;
        const pageSize = Math.max(1, options.pageSize ?? 1000);
        const rows = await this.__run(
            `MATCH (o:StoreObject)-[:IN]->(f:StoreFolder { id: $folderId })
             WHERE $name IS NULL OR o.name = $name
             RETURN ${OBJECT_FIELDS}
             ORDER BY o.name, o.id
             SKIP $skip LIMIT $limit`,
            {
                folderId,
                name: options.name ?? null,
                skip: neo4j.int(offset),
                limit: neo4j.int(pageSize + 1), // one extra row tells whether another page exists
            },
            `READ`,
        );
        const objects = rows.slice(0, pageSize).map(ToObjectInfo);
        return rows.length > pageSize ? { objects, nextCursor: String(offset + pageSize) } : { objects };
    }

    private async __run(query: string, params: Record<string, unknown> = {}, mode: Neo4jAccessMode = `WRITE`): Promise<Neo4jRecord[]> {
        return this._client.Run(query, params, mode);
    }

    private __single(rows: Neo4jRecord[], objectId: string): Neo4jRecord {
        const row = rows[0];

        if (!row) {
            throw new NotFoundError(`Object '${objectId}' not found`, { objectId });
        }
        return row;
    }
}
