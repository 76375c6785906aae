import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { collectScan, readDirectoryListing } from '../directory-scanner.js';
import { CancelledError, FilesystemError } from '../errors.js';
import { ProgressStream } from '../progress.js';
import { makeTempDir, removeDir, writeTree } from './test-helpers.js';

describe('directory scanner', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeTree(root, {
            'batch.csv': 'filename\na.pdf\n',
            'a.pdf': 'A',
            '.notes.csv': 'hidden',
            '2023/01/m.csv': 'filename\nx.pdf\n',
            '2023/01/x.pdf': 'X',
            '2023/02/y.pdf': 'Y',
            '.hidden/h.csv': 'filename\n',
            'SimpleArchiveFormat/item_000/s.csv': 'filename\n',
            'b/UPPER.CSV': 'filename\n',
            'b/Doc.PDF': 'D'
        });
        await mkdir(path.join(root, 'empty'));
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('yields candidate directories at any depth in sorted order', async () => {
        const entries = await collectScan(root);
        expect(entries.map(e => e.relativePath)).toEqual(['.', path.join('2023', '01'), 'b']);
        expect(entries.every(e => e.kind === 'directory')).toBe(true);
    });

    it('lists metadata files and documents per directory, ignoring hidden entries', async () => {
        const [first, , third] = await collectScan(root);
        expect(first).toMatchObject({ kind: 'directory', metadataFiles: ['batch.csv'], documents: ['a.pdf'] });
        expect(third).toMatchObject({ metadataFiles: ['UPPER.CSV'], documents: ['Doc.PDF'] });
    });

    it('stays at the root when recursion is off', async () => {
        const entries = await collectScan(root, { recursive: false });
        expect(entries.map(e => e.relativePath)).toEqual(['.']);
    });

    it('emits one scan event per candidate directory', async () => {
        const events = new ProgressStream(true);
        await collectScan(root, { events });
        expect(events.ofType('scan.directory').map(e => e.metadataFiles)).toEqual([1, 1, 1]);
    });

    it('rejects a missing root and a file root', async () => {
        await expect(collectScan(path.join(root, 'nope'))).rejects.toBeInstanceOf(FilesystemError);
        await expect(collectScan(path.join(root, 'a.pdf'))).rejects.toThrow(/Not a directory/);
    });

    it('stops once the signal fires', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(collectScan(root, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    });

    it.skipIf(process.getuid?.() === 0)('reports unreadable directories and keeps scanning', async () => {
        const locked = path.join(root, 'locked');
        await mkdir(locked);
        await writeFile(path.join(locked, 'z.csv'), 'filename\n');
        await chmod(locked, 0o000);
        try {
            const entries = await collectScan(root);
            const denied = entries.find(e => e.kind === 'access-denied');
            expect(denied?.relativePath).toBe('locked');
            expect(entries.map(e => e.relativePath)).toContain('b');
        } finally {
            await chmod(locked, 0o755);
        }
    });

    it('reads a single directory listing', async () => {
        const listing = await readDirectoryListing(path.join(root, '2023', '01'));
        expect(listing).toEqual({ metadataFiles: ['m.csv'], documents: ['x.pdf'] });
    });
});
