import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { FileSessionStore, MemorySessionStore } from '../session-store.js';
import { FilesystemError } from '../errors.js';
import { makeTempDir, removeDir } from './test-helpers.js';
import type { UploadSession } from '@/types.js';

function sampleSession(id: string, objectKey = 'pkg/item_000/a.pdf'): UploadSession {
    return {
        id,
        container: 'c',
        objectKey,
        sizeBytes: 18,
        chunkSize: 4,
        segmentCount: 5,
        mode: 'segmented',
        committed: [{ index: 0, etag: 'e0', size: 4 }],
        highestContiguous: 0,
        manifestCommitted: false,
        createdAt: '2024-05-01T10:00:00.000Z',
        updatedAt: '2024-05-01T10:05:00.000Z'
    };
}

describe('MemorySessionStore', () => {
    it('hands out copies', async () => {
        const store = new MemorySessionStore();
        const session = sampleSession('s1');
        await store.save(session);
        session.committed.push({ index: 1, etag: 'e1', size: 4 });

        const loaded = await store.load('s1');
        expect(loaded?.committed).toEqual([{ index: 0, etag: 'e0', size: 4 }]);
        loaded?.committed.push({ index: 2, etag: 'e2', size: 4 });
        expect((await store.load('s1'))?.committed).toHaveLength(1);
    });

    it('lists and deletes', async () => {
        const store = new MemorySessionStore();
        await store.save(sampleSession('s1'));
        await store.save(sampleSession('s2'));
        await store.delete('s1');
        expect((await store.list()).map(s => s.id)).toEqual(['s2']);
        expect(await store.load('s1')).toBeNull();
    });
});

describe('FileSessionStore', () => {
    let dir: string;
    let store: FileSessionStore;

    beforeEach(async () => {
        dir = await makeTempDir();
        store = new FileSessionStore(path.join(dir, 'state'));
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('saves one JSON file per session and reads it back', async () => {
        const session = sampleSession('abc-123');
        await store.save(session);
        expect(await readdir(path.join(dir, 'state'))).toEqual(['abc-123.json']);
        expect(await store.load('abc-123')).toEqual(session);
    });

    it('overwrites on save', async () => {
        const session = sampleSession('s1');
        await store.save(session);
        session.committed.push({ index: 1, etag: 'e1', size: 4 });
        session.highestContiguous = 1;
        await store.save(session);
        expect((await store.load('s1'))?.highestContiguous).toBe(1);
    });

    it('returns null for unknown sessions and an empty list for a missing directory', async () => {
        expect(await store.load('missing')).toBeNull();
        expect(await store.list()).toEqual([]);
    });

    it('rejects ids that are not plain file names', async () => {
        await expect(store.load('../escape')).rejects.toBeInstanceOf(FilesystemError);
        await expect(store.save(sampleSession('a/b'))).rejects.toThrow("Invalid session id 'a/b'");
    });

    it('rejects session files that do not match the schema', async () => {
        await store.save(sampleSession('s1'));
        await writeFile(path.join(dir, 'state', 's1.json'), JSON.stringify({ ...sampleSession('s1'), segmentCount: 0 }));
        await expect(store.load('s1')).rejects.toThrow('Session file is malformed at segmentCount');
        await writeFile(path.join(dir, 'state', 's1.json'), '{not json');
        await expect(store.load('s1')).rejects.toThrow(/not valid JSON/);
    });

    it('lists readable sessions in file name order, skipping broken ones', async () => {
        await store.save(sampleSession('b'));
        await store.save(sampleSession('a'));
        await writeFile(path.join(dir, 'state', 'broken.json'), '[]');
        await writeFile(path.join(dir, 'state', 'notes.txt'), 'ignored');
        expect((await store.list()).map(s => s.id)).toEqual(['a', 'b']);
    });

    it('deletes session files', async () => {
        await store.save(sampleSession('s1'));
        await store.delete('s1');
        await store.delete('s1');
        expect(await store.load('s1')).toBeNull();
    });
});
