/**
 * Utility Functions Module
 *
 * Centralized helpers shared by the scanner, validator, assembler and upload pipeline:
 * - Logging (re-exported)
 * - XML escaping and document name normalization
 * - File hashing
 * - Cancellation, clocks and bounded concurrency
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { Logger } from './logger.js';
import { CancelledError } from './errors.js';

// =============================================================================
// FORMATTING
// =============================================================================

function formatFileSize(bytes: number): string {
    if (bytes === 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/** Ordinal comparison; locale-aware sorting would make reports machine dependent. */
function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// XML
// =============================================================================

// Characters XML 1.0 does not allow, escaped or not
const XML_INVALID_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;
const XML_INVALID_CHARS = new RegExp(XML_INVALID_CHAR.source, 'g');

function containsXmlInvalidChars(text: string): boolean {
    return XML_INVALID_CHAR.test(text);
}

/** Escape the predefined entities and drop characters XML cannot carry. */
function escapeXml(text: string): string {
    return text
        .replace(XML_INVALID_CHARS, '')
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

function unescapeXml(text: string): string {
    return text
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&quot;/g, '"')
        .replace(/&apos;/g, "'")
        .replace(/&#(\d+);/g, (_m, code: string) => String.fromCodePoint(parseInt(code, 10)))
        .replace(/&#x([0-9a-fA-F]+);/g, (_m, code: string) => String.fromCodePoint(parseInt(code, 16)))
        .replace(/&amp;/g, '&');
}

// =============================================================================
// FILE NAMES
// =============================================================================

/**
 * Normalize a document file name for use inside a package.
 * Keeps the base name only, folds whitespace to underscores, drops characters
 * outside [A-Za-z0-9._-] and lower-cases the extension.
 */
function normalizeDocumentName(filename: string): string {
    const base = filename.replace(/\\/g, '/').split('/').pop() ?? '';
    let name = base.normalize('NFC').trim().replace(/\s+/g, '_');
    name = name.replace(/[^A-Za-z0-9._-]/g, '');
    // No hidden files, no bare dots
    name = name.replace(/^\.+/, '');

    const dot = name.lastIndexOf('.');
    if (dot > 0) {
        name = name.slice(0, dot) + name.slice(dot).toLowerCase();
    }
    if (name.length === 0) {
        name = 'document';
    }
    return name.length > 255 ? name.slice(name.length - 255) : name;
}

// =============================================================================
// HASHING
// =============================================================================

/** Hash a whole file, or `length` bytes of it from `start`. */
async function hashFile(
    path: string,
    algorithm: 'sha256' | 'md5' = 'sha256',
    range?: { start: number; length: number }
): Promise<string> {
    const hash = createHash(algorithm);
    if (range && range.length === 0) return hash.digest('hex');
    const stream = range
        ? createReadStream(path, { start: range.start, end: range.start + range.length - 1 })
        : createReadStream(path);
    for await (const chunk of stream) {
        hash.update(chunk);
    }
    return hash.digest('hex');
}

function hashBytes(data: Uint8Array, algorithm: 'sha256' | 'md5' = 'sha256'): string {
    return createHash(algorithm).update(data).digest('hex');
}

// =============================================================================
// CANCELLATION & TIME
// =============================================================================

function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

/** Time source for anything that waits; tests inject a fake. */
interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms, signal) => new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    })
};

/**
 * Signal that fires when the parent fires or after timeoutMs.
 * Call dispose() once the guarded request settles.
 */
function withTimeout(parent: AbortSignal | undefined, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onAbort, { once: true });
    }
    const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
    return {
        signal: controller.signal,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onAbort);
        }
    };
}

// =============================================================================
// CONCURRENCY
// =============================================================================

/** Counting semaphore; waiters are served in arrival order. */
class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    async acquire(): Promise<() => void> {
        if (this.available > 0) {
            this.available--;
        } else {
            await new Promise<void>(resolve => this.waiters.push(resolve));
        }
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this.waiters.shift();
            if (next) {
                next();
            } else {
                this.available++;
            }
        };
    }
}

type PoolResult<R> =
    | { status: 'fulfilled'; value: R }
    | { status: 'rejected'; reason: unknown }
    | { status: 'skipped' };

interface PoolOptions {
    signal?: AbortSignal;
    /** Checked before each new submission; returning true stops the pool taking more work. */
    shouldStop?: () => boolean;
}

/**
 * Run worker over items with at most `limit` in flight.
 * Items not started because of cancellation or shouldStop() come back as 'skipped'.
 * Results keep item order, whatever the completion order.
 */
async function runPool<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
    options: PoolOptions = {}
): Promise<PoolResult<R>[]> {
    const results: PoolResult<R>[] = items.map(() => ({ status: 'skipped' }));
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length) {
            if (options.signal?.aborted || options.shouldStop?.()) return;
            const index = next++;
            try {
                results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
            } catch (reason) {
                results[index] = { status: 'rejected', reason };
            }
        }
    };

    const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane());
    await Promise.all(lanes);
    return results;
}

// =============================================================================
// EXPORTS
// =============================================================================

export {
    // Logging system
    Logger,

    // Formatting
    formatFileSize,
    compareStrings,

    // XML
    containsXmlInvalidChars,
    escapeXml,
    unescapeXml,

    // File names & hashing
    normalizeDocumentName,
    hashFile,
    hashBytes,

    // Cancellation & time
    throwIfAborted,
    systemClock,
    withTimeout,

    // Concurrency
    Semaphore,
    runPool
};

export type { Clock, PoolResult, PoolOptions };
