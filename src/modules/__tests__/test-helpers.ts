/**
 * Shared fixtures for the test suites: temp directories, a fake clock and an
 * in-memory object store with scripted failures.
 */
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { AuthError, CancelledError, ContainerMissingError, TransientTransportError } from '../errors.js';
import { readBody, type ManifestSegment, type ObjectBody, type ObjectStore, type PutObjectOptions } from '../object-store.js';
import type { Clock } from '../utilities.js';
import type { RemoteObject } from '@/types.js';

// ===== Filesystem =====

export async function makeTempDir(prefix = 'saf-test-'): Promise<string> {
    return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/** Write a tree of files; keys are relative paths, values file contents. */
export async function writeTree(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
    for (const [rel, content] of Object.entries(files)) {
        const target = path.join(root, rel);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, content);
    }
}

export function md5(data: Uint8Array | string): string {
    return createHash('md5').update(data).digest('hex');
}

// ===== Clock =====

export class FakeClock implements Clock {
    readonly sleeps: number[] = [];
    private current = 0;

    now(): number {
        return this.current;
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new CancelledError();
        this.sleeps.push(ms);
        this.current += ms;
    }
}

// ===== Object store =====

interface StoredObject {
    bytes: Uint8Array;
    etag: string;
}

interface FailureRule {
    prefix: string;
    error: () => Error;
    remaining: number;
}

export class MemoryObjectStore implements ObjectStore {
    readonly containers = new Map<string, Map<string, StoredObject>>();
    readonly manifests = new Map<string, ManifestSegment[]>();
    readonly calls: string[] = [];
    inFlight = 0;
    maxInFlight = 0;
    accountValid = true;
    /** Awaited inside every PUT; lets a test hold uploads open. */
    putGate: (() => Promise<void>) | null = null;
    private readonly failures: FailureRule[] = [];

    constructor(containers: string[] = []) {
        for (const name of containers) this.containers.set(name, new Map());
    }

    /** Make the next `times` operations whose description starts with prefix throw. */
    failNext(prefix: string, error: () => Error, times = 1): void {
        this.failures.push({ prefix, error, remaining: times });
    }

    transient(prefix: string, times = 1, status = 503): void {
        this.failNext(prefix, () => new TransientTransportError(`simulated ${status}`, status), times);
    }

    private record(op: string): void {
        this.calls.push(op);
        const rule = this.failures.find(r => r.remaining > 0 && op.startsWith(r.prefix));
        if (rule) {
            rule.remaining--;
            throw rule.error();
        }
    }

    private bucket(container: string): Map<string, StoredObject> {
        const bucket = this.containers.get(container);
        if (!bucket) throw new ContainerMissingError(container);
        return bucket;
    }

    object(container: string, name: string): StoredObject | undefined {
        return this.containers.get(container)?.get(name);
    }

    async verifyAccount(): Promise<void> {
        this.record('ACCOUNT');
        if (!this.accountValid) throw new AuthError('rejected', 401);
    }

    async containerExists(container: string): Promise<boolean> {
        this.record(`EXISTS ${container}`);
        return this.containers.has(container);
    }

    async createContainer(container: string): Promise<void> {
        this.record(`CREATE ${container}`);
        if (!this.containers.has(container)) this.containers.set(container, new Map());
    }

    async putObject(container: string, name: string, body: ObjectBody, options: PutObjectOptions = {}): Promise<{ etag: string }> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await new Promise<void>(resolve => setImmediate(resolve));
            if (this.putGate) await this.putGate();
            if (options.signal?.aborted) throw new TransientTransportError('aborted');
            this.record(`PUT ${container}/${name}`);
            const bucket = this.bucket(container);
            const bytes = await readBody(body);
            const etag = md5(bytes);
            if (options.etag && options.etag !== etag) {
                throw new TransientTransportError('checksum mismatch', 422);
            }
            bucket.set(name, { bytes, etag });
            return { etag };
        } finally {
            this.inFlight--;
        }
    }

    async putManifest(container: string, name: string, segments: ManifestSegment[]): Promise<void> {
        await new Promise<void>(resolve => setImmediate(resolve));
        this.record(`MANIFEST ${container}/${name}`);
        this.bucket(container);
        this.manifests.set(`${container}/${name}`, segments.map(s => ({ ...s })));
    }

    async listObjects(container: string, prefix: string): Promise<RemoteObject[]> {
        this.record(`LIST ${container}`);
        const bucket = this.bucket(container);
        return [...bucket.entries()]
            .filter(([name]) => name.startsWith(prefix))
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([name, obj]) => ({ name, bytes: obj.bytes.byteLength, etag: obj.etag }));
    }

    async headObject(container: string, name: string): Promise<RemoteObject | null> {
        this.record(`HEAD ${container}/${name}`);
        const obj = this.containers.get(container)?.get(name);
        if (obj) return { name, bytes: obj.bytes.byteLength, etag: obj.etag };
        return this.manifests.has(`${container}/${name}`) ? { name, bytes: 0, etag: '' } : null;
    }

    async deleteObject(container: string, name: string): Promise<void> {
        this.record(`DELETE ${container}/${name}`);
        this.containers.get(container)?.delete(name);
    }
}
