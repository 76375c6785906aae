/**
 * Upload session persistence.
 *
 * Sessions are saved after every committed segment so an interrupted transfer
 * can resume. They hold no credentials.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { FilesystemError, isNodeError, toError } from './errors.js';
import { Logger } from './utilities.js';
import type { UploadSession } from '../types.js';

const log = Logger.getLogger('session-store');

export interface SessionStore {
    load(id: string): Promise<UploadSession | null>;
    save(session: UploadSession): Promise<void>;
    delete(id: string): Promise<void>;
    list(): Promise<UploadSession[]>;
}

const sessionSchema = z.object({
    id: z.string().min(1),
    container: z.string().min(1),
    objectKey: z.string().min(1),
    sizeBytes: z.number().int().nonnegative(),
    chunkSize: z.number().int().positive(),
    segmentCount: z.number().int().positive(),
    mode: z.enum(['single', 'segmented']),
    committed: z.array(z.object({
        index: z.number().int().nonnegative(),
        etag: z.string(),
        size: z.number().int().nonnegative()
    })),
    highestContiguous: z.number().int().min(-1),
    manifestCommitted: z.boolean(),
    createdAt: z.string(),
    updatedAt: z.string()
});

/** Deep copy so callers never share mutable state with the store. */
function cloneSession(session: UploadSession): UploadSession {
    return { ...session, committed: session.committed.map(c => ({ ...c })) };
}

export class MemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, UploadSession>();

    async load(id: string): Promise<UploadSession | null> {
        const session = this.sessions.get(id);
        return session ? cloneSession(session) : null;
    }

    async save(session: UploadSession): Promise<void> {
        this.sessions.set(session.id, cloneSession(session));
    }

    async delete(id: string): Promise<void> {
        this.sessions.delete(id);
    }

    async list(): Promise<UploadSession[]> {
        return [...this.sessions.values()].map(cloneSession);
    }
}

/**
 * One `<id>.json` file per session in a state directory. Writes go through a
 * temporary file and a rename.
 */
export class FileSessionStore implements SessionStore {
    constructor(readonly directory: string) {}

    private fileFor(id: string): string {
        if (!/^[A-Za-z0-9_-]+$/.test(id)) {
            throw new FilesystemError(this.directory, `Invalid session id '${id}'`);
        }
        return path.join(this.directory, `${id}.json`);
    }

    private parse(file: string, raw: string): UploadSession {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new FilesystemError(file, `Session file is not valid JSON: ${toError(err).message}`, { cause: err });
        }
        const parsed = sessionSchema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new FilesystemError(file, `Session file is malformed at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`);
        }
        return parsed.data;
    }

    async load(id: string): Promise<UploadSession | null> {
        const file = this.fileFor(id);
        let raw: string;
        try {
            raw = await readFile(file, 'utf-8');
        } catch (err) {
            if (isNodeError(err) && err.code === 'ENOENT') return null;
            throw new FilesystemError(file, `Cannot read session ${id}: ${toError(err).message}`, { cause: err });
        }
        return this.parse(file, raw);
    }

    async save(session: UploadSession): Promise<void> {
        const file = this.fileFor(session.id);
        const temp = `${file}.tmp`;
        try {
            await mkdir(this.directory, { recursive: true });
            await writeFile(temp, JSON.stringify(session, null, 2) + '\n', 'utf-8');
            await rename(temp, file);
        } catch (err) {
            throw new FilesystemError(file, `Cannot save session ${session.id}: ${toError(err).message}`, { cause: err });
        }
    }

    async delete(id: string): Promise<void> {
        await rm(this.fileFor(id), { force: true });
    }

    async list(): Promise<UploadSession[]> {
        let names: string[];
        try {
            names = await readdir(this.directory);
        } catch (err) {
            if (isNodeError(err) && err.code === 'ENOENT') return [];
            throw new FilesystemError(this.directory, `Cannot list sessions: ${toError(err).message}`, { cause: err });
        }
        const sessions: UploadSession[] = [];
        for (const name of names.filter(n => n.endsWith('.json')).sort()) {
            try {
                sessions.push(this.parse(name, await readFile(path.join(this.directory, name), 'utf-8')));
            } catch (err) {
                log.warn(`Ignoring unreadable session file ${name}:`, toError(err).message);
            }
        }
        return sessions;
    }
}
