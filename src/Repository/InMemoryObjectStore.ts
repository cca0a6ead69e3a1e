import { readFile } from 'fs/promises';
import { NotFoundError, ValidationError } from '../Common/Errors.js';
import type {
    ListOptions,
    ListPage,
    RemoteObjectStore,
    StoredObjectInfo,
    StoredObjectKind,
} from '../Domain/index.js';

/** One object of a seed document; ids are generated when omitted. */
export interface SeedObject {
    id?: string;
    name: string;
    folderId: string;
    kind?: StoredObjectKind; // default `asset`
    content?: string; // text objects only
}

export interface StoreSeed {
    objects: SeedObject[];
}

interface StoredObject extends StoredObjectInfo {
    content: string;
}

function IsRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

function ToSeedObject(value: unknown, position: number): SeedObject {
    if (!IsRecord(value) || typeof value.name !== `string` || typeof value.folderId !== `string`) {
        throw new ValidationError(`Seed object #${position} needs string 'name' and 'folderId'`);
    }
    const kind = value.kind;

    if (kind !== undefined && kind !== `asset` && kind !== `text` && kind !== `pointer`) {
        throw new ValidationError(`Seed object #${position} has unknown kind '${String(kind)}'`);
    }
    return {
        id: typeof value.id === `string` ? value.id : undefined,
        name: value.name,
        folderId: value.folderId,
        kind,
        content: typeof value.content === `string` ? value.content : undefined,
    };
}

/**
 * Validates a parsed seed document.
 * @throws ValidationError when the shape is wrong
 */
export function ParseStoreSeed(value: unknown): StoreSeed {
    if (!IsRecord(value) || !Array.isArray(value.objects)) {
        throw new ValidationError(`Seed must be an object with an 'objects' array`);
    }
    return { objects: value.objects.map((entry, index) => ToSeedObject(entry, index)) };
}

/**
 * In-process RemoteObjectStore. Backs the `memory` backend and the test suites; listings are
 * returned in insertion order and paged with a numeric cursor.
 */
export class InMemoryObjectStore implements RemoteObjectStore {
    private _objects: Map<string, StoredObject> = new Map();
    private _nextId = 1;

    constructor(seed?: StoreSeed) {
        if (seed) {
            this.Seed(seed);
        }
    }

    /**
     * Builds a store from a JSON seed file.
     * @example
     * const store = await InMemoryObjectStore.FromSeedFile('./config/seed.example.json');
     */
    static async FromSeedFile(path: string): Promise<InMemoryObjectStore> {
        const raw = await readFile(path, `utf-8`);
        const parsed: unknown = JSON.parse(raw);
        return new InMemoryObjectStore(ParseStoreSeed(parsed));
    }

    /** Adds seed objects and returns their ids in order. */
    Seed(seed: StoreSeed): string[] {
        return seed.objects.map(entry =>
            this.__insert({
                id: entry.id ?? this.__newId(),
                name: entry.name,
                folderId: entry.folderId,
                kind: entry.kind ?? `asset`,
                content: entry.content ?? ``,
            }),
        );
    }

    async Stat(objectId: string): Promise<StoredObjectInfo> {
        const { content: _content, ...info } = this.__get(objectId);
        return info;
    }

    async GetText(objectId: string): Promise<string> {
        return this.__get(objectId).content;
    }

    async PutText(objectId: string, content: string): Promise<void> {
        this.__get(objectId).content = content;
    }

    async CreateText(folderId: string, name: string, content: string): Promise<string> {
        return this.__insert({ id: this.__newId(), name, folderId, kind: `text`, content });
    }

    async CreatePointer(sourceObjectId: string, folderId: string, name: string): Promise<string> {
        this.__get(sourceObjectId);
        return this.__insert({ id: this.__newId(), name, folderId, kind: `pointer`, targetId: sourceObjectId, content: `` });
    }

    async Delete(objectId: string): Promise<void> {
        if (!this._objects.delete(objectId)) {
            throw new NotFoundError(`Object '${objectId}' not found`, { objectId });
        }
    }

    async List(folderId: string, options: ListOptions = {}): Promise<ListPage> {
        const matches = [...this._objects.values()].filter(
            entry => entry.folderId === folderId && (options.name === undefined || entry.name === options.name),
        );
        const offset = options.cursor ? Number.parseInt(options.cursor, 10) || 0 : 0;
        const pageSize = Math.max(1, options.pageSize ?? 1000);
        const objects = matches.slice(offset, offset + pageSize).map(({ content: _content, ...info }) => info);
        const end = offset + pageSize;
        return end < matches.length ? { objects, nextCursor: String(end) } : { objects };
    }

    /** Objects currently inside a folder, for inspection. */
    ObjectsIn(folderId: string): StoredObjectInfo[] {
        return [...this._objects.values()]
            .filter(entry => entry.folderId === folderId)
            .map(({ content: _content, ...info }) => info);
    }

    private __get(objectId: string): StoredObject {
        const entry = this._objects.get(objectId);

        if (!entry) {
            throw new NotFoundError(`Object '${objectId}' not found`, { objectId });
        }
        return entry;
    }

    private __insert(entry: StoredObject): string {
        this._objects.set(entry.id, entry);
        return entry.id;
    }

    private __newId(): string {
        let id = `obj-${this._nextId++}`;

        while (this._objects.has(id)) {
            id = `obj-${this._nextId++}`;
        }
        return id;
    }
}
