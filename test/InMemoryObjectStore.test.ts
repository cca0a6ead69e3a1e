import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { NotFoundError, ValidationError } from '../src/Common/Errors.js';
import { InMemoryObjectStore, ParseStoreSeed } from '../src/Repository/InMemoryObjectStore.js';
import { ParseMetadataFeed } from '../src/Services/MetadataCache.js';

describe('InMemoryObjectStore', () => {
    it('should generate ids that skip seeded ones', () => {
        const store = new InMemoryObjectStore();

        expect(store.Seed({ objects: [{ id: 'obj-1', name: 'a.jpg', folderId: 'f' }, { name: 'b.jpg', folderId: 'f' }] })).toEqual([
            'obj-1',
            'obj-2',
        ]);
    });

    it('should expose metadata without content', async () => {
        const store = new InMemoryObjectStore({ objects: [{ id: 't', name: 'log.jsonl', folderId: 'logs', kind: 'text', content: 'x' }] });

        expect(await store.Stat('t')).toEqual({ id: 't', name: 'log.jsonl', folderId: 'logs', kind: 'text' });
        await store.PutText('t', 'y');
        expect(await store.GetText('t')).toBe('y');
    });

    it('should report missing objects as NotFoundError', async () => {
        const store = new InMemoryObjectStore();

        await expect(store.GetText('nope')).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.CreatePointer('nope', 'dst', 'a.jpg')).rejects.toBeInstanceOf(NotFoundError);
        await expect(store.Delete('nope')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should create pointers referencing their source', async () => {
        const store = new InMemoryObjectStore({ objects: [{ id: 'src-1', name: 'a.jpg', folderId: 'src' }] });

        const pointerId = await store.CreatePointer('src-1', 'dst', 'a.jpg');

        expect(await store.Stat(pointerId)).toEqual({ id: pointerId, name: 'a.jpg', folderId: 'dst', kind: 'pointer', targetId: 'src-1' });
    });

    it('should page listings and filter by name', async () => {
        const store = new InMemoryObjectStore({
            objects: ['a', 'b', 'c'].map(name => ({ id: `id-${name}`, name, folderId: 'f' })),
        });

        const first = await store.List('f', { pageSize: 2 });
        const second = await store.List('f', { pageSize: 2, cursor: first.nextCursor });
        const named = await store.List('f', { name: 'b' });

        expect(first.objects.map(entry => entry.id)).toEqual(['id-a', 'id-b']);
        expect(first.nextCursor).toBe('2');
        expect(second).toEqual({ objects: [{ id: 'id-c', name: 'c', folderId: 'f', kind: 'asset' }] });
        expect(named.objects.map(entry => entry.id)).toEqual(['id-b']);
    });

    it('should validate seed documents', () => {
        expect(() => ParseStoreSeed([])).toThrow(ValidationError);
        expect(() => ParseStoreSeed({ objects: [{ name: 'a' }] })).toThrow(`Seed object #0 needs string 'name' and 'folderId'`);
        expect(() => ParseStoreSeed({ objects: [{ name: 'a', folderId: 'f', kind: 'folder' }] })).toThrow(
            `Seed object #0 has unknown kind 'folder'`,
        );
    });

    it('should load the example seed file', async () => {
        const store = await InMemoryObjectStore.FromSeedFile(path.resolve(process.cwd(), 'config/seed.example.json'));

        expect(ParseMetadataFeed(await store.GetText('feed-animals'))).toHaveLength(3);
        expect(store.ObjectsIn('src-animals-h').map(entry => entry.name)).toEqual(['cat_h.jpg', 'dog_h.jpg', 'owl_h.jpg']);
    });
});
