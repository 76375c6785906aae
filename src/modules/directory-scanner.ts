/**
 * Directory Scanner
 *
 * Finds candidate directories (those holding at least one metadata CSV) under a
 * root, at any depth: flat batches, year/month trees, or anything else.
 * Read-only. An unreadable directory is reported as an 'access-denied' entry and
 * the scan carries on with its siblings.
 */

import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { SCAN, VALIDATION } from './constants.js';
import { AccessDeniedError, FilesystemError, isNodeError, toError } from './errors.js';
import { Logger, compareStrings, throwIfAborted } from './utilities.js';
import type { ProgressStream } from './progress.js';

const log = Logger.getLogger('directory-scanner');

export interface DirectoryListing {
    /** File names (not paths), sorted. */
    metadataFiles: string[];
    documents: string[];
}

export type ScanEntry =
    | ({ kind: 'directory'; directory: string; relativePath: string } & DirectoryListing)
    | { kind: 'access-denied'; directory: string; relativePath: string; error: AccessDeniedError };

export interface ListingOptions {
    metadataExtensions?: readonly string[];
    documentExtensions?: readonly string[];
}

export interface ScanOptions extends ListingOptions {
    /** Descend into subdirectories. Default: true */
    recursive?: boolean;
    /** Directory names never entered. */
    skipDirectories?: readonly string[];
    signal?: AbortSignal;
    events?: ProgressStream;
}

function hasExtension(name: string, extensions: readonly string[]): boolean {
    const ext = path.extname(name).toLowerCase();
    return extensions.some(e => e.toLowerCase() === ext);
}

function isAccessError(err: unknown): boolean {
    return isNodeError(err) && (err.code === 'EACCES' || err.code === 'EPERM');
}

async function isRegularFile(dir: string, entry: Dirent): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return (await stat(path.join(dir, entry.name))).isFile();
    } catch {
        // Dangling link
        return false;
    }
}

function splitListing(names: string[], options: ListingOptions): DirectoryListing {
    const metadataExtensions = options.metadataExtensions ?? SCAN.METADATA_EXTENSIONS;
    const documentExtensions = options.documentExtensions ?? VALIDATION.DOCUMENT_EXTENSIONS;
    const sorted = [...names].sort(compareStrings);
    return {
        metadataFiles: sorted.filter(n => hasExtension(n, metadataExtensions)),
        documents: sorted.filter(n => hasExtension(n, documentExtensions))
    };
}

/**
 * List the metadata files and documents directly inside one directory.
 * Hidden entries are ignored. Throws AccessDeniedError or FilesystemError.
 */
export async function readDirectoryListing(directory: string, options: ListingOptions = {}): Promise<DirectoryListing> {
    let entries: Dirent[];
    try {
        entries = await readdir(directory, { withFileTypes: true });
    } catch (err) {
        if (isAccessError(err)) throw new AccessDeniedError(directory, { cause: err });
        throw new FilesystemError(directory, `Cannot read directory ${directory}: ${toError(err).message}`, { cause: err });
    }

    const files: string[] = [];
    for (const entry of entries) {
        if (entry.name.startsWith('.')) continue;
        if (await isRegularFile(directory, entry)) files.push(entry.name);
    }
    return splitListing(files, options);
}

/**
 * Lazily yield every candidate directory under root, in sorted path order
 * (a directory comes before its subdirectories).
 */
export async function* scanDirectories(root: string, options: ScanOptions = {}): AsyncGenerator<ScanEntry> {
    const recursive = options.recursive ?? SCAN.RECURSIVE;
    const skip = new Set<string>(options.skipDirectories ?? SCAN.SKIP_DIRECTORIES);
    const base = path.resolve(root);

    try {
        const info = await stat(base);
        if (!info.isDirectory()) {
            throw new FilesystemError(base, `Not a directory: ${base}`);
        }
    } catch (err) {
        if (err instanceof FilesystemError) throw err;
        if (!isAccessError(err)) {
            throw new FilesystemError(base, `Directory '${base}' does not exist`, { cause: err });
        }
    }

    const stack: string[] = [base];
    while (stack.length > 0) {
        throwIfAborted(options.signal);
        const current = stack.pop();
        if (current === undefined) break;
        const relativePath = path.relative(base, current) || '.';

        let entries: Dirent[];
        try {
            entries = await readdir(current, { withFileTypes: true });
        } catch (err) {
            if (!isAccessError(err)) {
                throw new FilesystemError(current, `Cannot read directory ${current}: ${toError(err).message}`, { cause: err });
            }
            const error = new AccessDeniedError(current, { cause: err });
            log.warn(error.message);
            options.events?.emit({ type: 'scan.access-denied', directory: current, message: error.message });
            yield { kind: 'access-denied', directory: current, relativePath, error };
            continue;
        }

        const files: string[] = [];
        const subdirectories: string[] = [];
        for (const entry of entries) {
            if (entry.name.startsWith('.')) continue;
            if (entry.isDirectory()) {
                if (recursive && !skip.has(entry.name)) subdirectories.push(entry.name);
            } else if (await isRegularFile(current, entry)) {
                files.push(entry.name);
            }
        }

        // Reverse-sorted push so the stack pops in ascending order
        subdirectories.sort(compareStrings).reverse();
        for (const name of subdirectories) stack.push(path.join(current, name));

        const listing = splitListing(files, options);
        if (listing.metadataFiles.length === 0) continue;

        log.debug(`Found ${listing.metadataFiles.length} metadata file(s) in ${relativePath}`);
        options.events?.emit({
            type: 'scan.directory',
            directory: current,
            metadataFiles: listing.metadataFiles.length,
            documents: listing.documents.length
        });
        yield { kind: 'directory', directory: current, relativePath, ...listing };
    }
}

/** Drain scanDirectories into an array. */
export async function collectScan(root: string, options: ScanOptions = {}): Promise<ScanEntry[]> {
    const entries: ScanEntry[] = [];
    for await (const entry of scanDirectories(root, options)) {
        entries.push(entry);
    }
    return entries;
}
