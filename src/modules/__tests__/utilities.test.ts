import { describe, it, expect, vi, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
    Semaphore,
    compareStrings,
    containsXmlInvalidChars,
    escapeXml,
    formatFileSize,
    hashBytes,
    hashFile,
    normalizeDocumentName,
    runPool,
    systemClock,
    throwIfAborted,
    unescapeXml,
    withTimeout
} from '../utilities.js';
import { CancelledError } from '../errors.js';
import { makeTempDir, md5, removeDir } from './test-helpers.js';

describe('formatting', () => {
    it('formats byte counts', () => {
        expect(formatFileSize(0)).toBe('0 B');
        expect(formatFileSize(500)).toBe('500 B');
        expect(formatFileSize(1536)).toBe('1.5 KB');
        expect(formatFileSize(1024 * 1024)).toBe('1 MB');
    });

    it('compares by code point, not locale', () => {
        expect(['b', 'a', 'B', 'é'].sort(compareStrings)).toEqual(['B', 'a', 'b', 'é']);
        expect(compareStrings('x', 'x')).toBe(0);
    });
});

describe('XML escaping', () => {
    it('escapes the five predefined entities', () => {
        expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
    });

    it('drops characters XML cannot carry and keeps tabs and newlines', () => {
        expect(escapeXml('a\u0000b\u0008c\u000Bd\u001Fe\tf\ng\rh')).toBe('abcde\tf\ng\rh');
        expect(containsXmlInvalidChars('bell\u0007')).toBe(true);
        expect(containsXmlInvalidChars('tab\tnewline\n')).toBe(false);
    });

    it('unescapes named and numeric entities', () => {
        expect(unescapeXml('&lt;&#65;&#x42;&amp;lt;')).toBe('<AB&lt;');
    });
});

describe('normalizeDocumentName', () => {
    it('folds whitespace, drops unsafe characters and lower-cases the extension', () => {
        expect(normalizeDocumentName('My Report (final).PDF')).toBe('My_Report_final.pdf');
        expect(normalizeDocumentName('café.pdf')).toBe('caf.pdf');
    });

    it('keeps only the base name', () => {
        expect(normalizeDocumentName('dir/sub\\x.pdf')).toBe('x.pdf');
    });

    it('never yields a hidden or empty name', () => {
        expect(normalizeDocumentName('...hidden.pdf')).toBe('hidden.pdf');
        expect(normalizeDocumentName('???')).toBe('document');
    });
});

describe('hashing', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await removeDir(dir);
        dir = undefined;
    });

    it('hashes whole files and byte ranges', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'f.bin');
        await writeFile(file, 'hello world');
        expect(await hashFile(file)).toBe(hashBytes(new TextEncoder().encode('hello world')));
        expect(await hashFile(file, 'md5', { start: 6, length: 5 })).toBe(md5('world'));
        expect(await hashFile(file, 'md5', { start: 3, length: 0 })).toBe(md5(''));
    });
});

describe('cancellation and time', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('throws CancelledError only for an aborted signal', () => {
        expect(() => throwIfAborted(undefined)).not.toThrow();
        const controller = new AbortController();
        expect(() => throwIfAborted(controller.signal)).not.toThrow();
        controller.abort();
        expect(() => throwIfAborted(controller.signal)).toThrow(CancelledError);
    });

    it('rejects a sleep when the signal fires', async () => {
        const controller = new AbortController();
        const sleeping = systemClock.sleep(60_000, controller.signal);
        controller.abort();
        await expect(sleeping).rejects.toBeInstanceOf(CancelledError);
    });

    it('aborts a timeout signal after the deadline or with its parent', () => {
        vi.useFakeTimers();
        const timed = withTimeout(undefined, 100);
        vi.advanceTimersByTime(99);
        expect(timed.signal.aborted).toBe(false);
        vi.advanceTimersByTime(1);
        expect(timed.signal.aborted).toBe(true);

        const parent = new AbortController();
        const child = withTimeout(parent.signal, 100);
        parent.abort();
        expect(child.signal.aborted).toBe(true);
        child.dispose();
    });

    it('stops the timer on dispose', () => {
        vi.useFakeTimers();
        const timed = withTimeout(undefined, 100);
        timed.dispose();
        vi.advanceTimersByTime(500);
        expect(timed.signal.aborted).toBe(false);
    });
});

describe('Semaphore', () => {
    it('requires at least one permit', () => {
        expect(() => new Semaphore(0)).toThrow(RangeError);
    });

    it('hands permits to waiters in arrival order', async () => {
        const semaphore = new Semaphore(1);
        const order: string[] = [];
        const release = await semaphore.acquire();
        const first = semaphore.acquire().then(r => { order.push('first'); return r; });
        const second = semaphore.acquire().then(r => { order.push('second'); return r; });
        release();
        const releaseFirst = await first;
        expect(order).toEqual(['first']);
        releaseFirst();
        (await second)();
        expect(order).toEqual(['first', 'second']);
    });
});

describe('runPool', () => {
    it('keeps item order and bounds concurrency', async () => {
        let active = 0;
        let peak = 0;
        const results = await runPool([30, 10, 20, 0], 2, async (ms) => {
            active++;
            peak = Math.max(peak, active);
            await new Promise(resolve => setTimeout(resolve, ms));
            active--;
            return ms * 2;
        });
        expect(results).toEqual([
            { status: 'fulfilled', value: 60 },
            { status: 'fulfilled', value: 20 },
            { status: 'fulfilled', value: 40 },
            { status: 'fulfilled', value: 0 }
        ]);
        expect(peak).toBe(2);
    });

    it('records rejections without stopping other items', async () => {
        const boom = new Error('boom');
        const results = await runPool([1, 2, 3], 1, async (n) => {
            if (n === 2) throw boom;
            return n;
        });
        expect(results).toEqual([
            { status: 'fulfilled', value: 1 },
            { status: 'rejected', reason: boom },
            { status: 'fulfilled', value: 3 }
        ]);
    });

    it('skips items once shouldStop or the signal says so', async () => {
        let stop = false;
        const results = await runPool([1, 2, 3], 1, async (n) => {
            if (n === 1) stop = true;
            return n;
        }, { shouldStop: () => stop });
        expect(results.map(r => r.status)).toEqual(['fulfilled', 'skipped', 'skipped']);

        const controller = new AbortController();
        controller.abort();
        const none = await runPool([1, 2], 2, async n => n, { signal: controller.signal });
        expect(none).toEqual([{ status: 'skipped' }, { status: 'skipped' }]);
    });
});
