import { describe, it, expect, beforeEach } from 'vitest';
import neo4j, { Record as Neo4jRecord } from 'neo4j-driver';
import { NotFoundError, PermanentError, TransientError } from '../src/Common/Errors.js';
import type { Neo4jAccessMode } from '../src/Repository/Neo4jClient.js';
import { MapNeo4jError } from '../src/Repository/Neo4jClient.js';
import { Neo4jObjectStore, type Neo4jRunner } from '../src/Repository/Neo4jObjectStore.js';

interface RunCall {
    query: string;
    params: Record<string, unknown>;
    mode: Neo4jAccessMode;
}

/** Runner answering every query with the rows produced by `respond`. */
class ScriptedRunner implements Neo4jRunner {
    public calls: RunCall[] = [];
    public respond: (call: RunCall) => Neo4jRecord[] = () => [];

    async Run(query: string, params: Record<string, unknown> = {}, mode: Neo4jAccessMode = 'WRITE'): Promise<Neo4jRecord[]> {
        const call = { query, params, mode };
        this.calls.push(call);
        return this.respond(call);
    }
}

const OBJECT_KEYS = ['id', 'name', 'kind', 'targetId', 'folderId'];

function ObjectRow(id: string, name: string, kind: string, targetId: string | null = null): Neo4jRecord {
    return new Neo4jRecord(OBJECT_KEYS, [id, name, kind, targetId, 'f']);
}

describe('Neo4jObjectStore', () => {
    let runner: ScriptedRunner;
    let store: Neo4jObjectStore;

    beforeEach(() => {
        runner = new ScriptedRunner();
        store = new Neo4jObjectStore(runner);
    });

    it('should map object rows', async () => {
        runner.respond = () => [ObjectRow('p1', 'a.jpg', 'pointer', 's1')];

        expect(await store.Stat('p1')).toEqual({ id: 'p1', name: 'a.jpg', folderId: 'f', kind: 'pointer', targetId: 's1' });
        expect(runner.calls[0]?.params).toEqual({ id: 'p1' });
        expect(runner.calls[0]?.mode).toBe('READ');
    });

    it('should omit an absent target', async () => {
        runner.respond = () => [ObjectRow('a1', 'a.jpg', 'asset')];

        expect(await store.Stat('a1')).toEqual({ id: 'a1', name: 'a.jpg', folderId: 'f', kind: 'asset' });
    });

    it('should reject rows with an unknown kind', async () => {
        runner.respond = () => [ObjectRow('x', 'x', 'folder')];

        await expect(store.Stat('x')).rejects.toBeInstanceOf(PermanentError);
    });

    it('should report missing objects as NotFoundError', async () => {
        await expect(store.Stat('nope')).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.GetText('nope')).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.PutText('nope', 'x')).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.Delete('nope')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should read and write text content', async () => {
        runner.respond = call => (call.mode === 'READ' ? [new Neo4jRecord(['content'], ['r1\n'])] : [new Neo4jRecord(['id'], ['t1'])]);

        expect(await store.GetText('t1')).toBe('r1\n');
        await store.PutText('t1', 'r1\nr2\n');
        expect(runner.calls[1]?.params).toEqual({ id: 't1', content: 'r1\nr2\n' });
    });

    it('should return the id of a created pointer', async () => {
        runner.respond = call => [new Neo4jRecord(['id'], [call.params.id])];

        const pointerId = await store.CreatePointer('s1', 'dst', 'a.jpg');

        expect(pointerId).toBe(runner.calls[0]?.params.id);
        expect(runner.calls[0]?.params).toMatchObject({ sourceId: 's1', folderId: 'dst', name: 'a.jpg' });
    });

    it('should page with one extra row', async () => {
        runner.respond = () => [ObjectRow('a', 'a', 'asset'), ObjectRow('b', 'b', 'asset'), ObjectRow('c', 'c', 'asset')];

        const page = await store.List('f', { pageSize: 2, cursor: '4' });

        expect(page.objects.map(entry => entry.id)).toEqual(['a', 'b']);
        expect(page.nextCursor).toBe('6');
        expect(runner.calls[0]?.params).toEqual({ folderId: 'f', name: null, skip: neo4j.int(4), limit: neo4j.int(3) });
    });

    it('should end paging when no extra row comes back', async () => {
        runner.respond = () => [ObjectRow('a', 'a', 'asset')];

        expect(await store.List('f', { pageSize: 2, name: 'a' })).toEqual({
            objects: [{ id: 'a', name: 'a', folderId: 'f', kind: 'asset' }],
        });
    });

    it('should create both uniqueness constraints', async () => {
        await store.EnsureSchema();

        expect(runner.calls.map(call => call.query)).toEqual([
            'CREATE CONSTRAINT store_object_id IF NOT EXISTS FOR (o:StoreObject) REQUIRE o.id IS UNIQUE',
            'CREATE CONSTRAINT store_folder_id IF NOT EXISTS FOR (f:StoreFolder) REQUIRE f.id IS UNIQUE',
        ]);
    });
});

describe('MapNeo4jError', () => {
    const driverError = (code: string) => Object.assign(new Error('driver failure'), { code });

    it('should treat transient driver codes as retryable', () => {
        const mapped = MapNeo4jError(driverError('Neo.TransientError.General.DatabaseUnavailable'), 'MATCH (n) RETURN n');

        expect(mapped).toBeInstanceOf(TransientError);
        expect(mapped instanceof TransientError && mapped.status).toBe(503);
        expect(MapNeo4jError(driverError('ServiceUnavailable'), 'q')).toBeInstanceOf(TransientError);
    });

    it('should treat everything else as permanent', () => {
        const mapped = MapNeo4jError(driverError('Neo.ClientError.Statement.SyntaxError'), 'q');

        expect(mapped).toBeInstanceOf(PermanentError);
        expect(mapped instanceof PermanentError && mapped.details).toEqual({ code: 'Neo.ClientError.Statement.SyntaxError', query: 'q' });
        expect(MapNeo4jError('boom', 'q')).toBeInstanceOf(PermanentError);
    });

    it('should pass mapped errors through', () => {
        const original = new TransientError('busy');

        expect(MapNeo4jError(original, 'q')).toBe(original);
    });
});
