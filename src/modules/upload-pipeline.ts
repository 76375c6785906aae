/**
 * Upload Pipeline
 *
 * Chunked, resumable transfer of packages to object storage.
 *
 * Objects at or below the segment threshold go up in one PUT. Larger objects
 * are split into fixed-size segments stored at `<objectKey>/segment-<index>`,
 * then stitched together by a static large object manifest PUT at
 * `<objectKey>`. Segment PUTs are idempotent and may complete in any order;
 * the session records which indices are committed and is persisted after each
 * one so a restart can resume.
 *
 * A committed session is removed from the session store. A holder of an
 * older copy that finalizes afterwards finds the record gone and the object
 * present, and does not write the manifest again.
 *
 * Failure handling:
 * - transient errors (network, timeouts, 408/429/5xx) retry per RetryPolicy
 * - authentication errors surface at once
 * - a missing container is created once and the operation retried once
 */

import { randomUUID } from 'node:crypto';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { UPLOAD } from './constants.js';
import {
    CancelledError,
    ContainerMissingError,
    FatalTransportError,
    SafError,
    StateInconsistencyError,
    TransientTransportError,
    isRetryable,
    toError,
    type StateDivergence
} from './errors.js';
import { SwiftObjectStore, bodySize, fileSlice, type ManifestSegment, type ObjectBody, type ObjectStore } from './object-store.js';
import { MemorySessionStore, type SessionStore } from './session-store.js';
import { RetryPolicy } from './retry-policy.js';
import { requireCredentials } from './config.js';
import {
    Logger,
    Semaphore,
    compareStrings,
    hashBytes,
    hashFile,
    runPool,
    systemClock,
    throwIfAborted,
    withTimeout,
    type Clock
} from './utilities.js';
import type { ProgressStream } from './progress.js';
import type { CommittedSegment, Credentials, RemoteObject, ResumeResolution, UploadSession } from '../types.js';

const log = Logger.getLogger('upload-pipeline');

// =============================================================================
// TYPES
// =============================================================================

export type ChunkStatus = 'committed' | 'retryable_error' | 'fatal_error';

export interface ChunkResult {
    status: ChunkStatus;
    index: number;
    attempts: number;
    etag?: string;
    error?: SafError;
}

export type FinalizeResult =
    | { status: 'manifest_committed' }
    | { status: 'incomplete'; missing: number[] };

export interface UploadPipelineOptions {
    store: ObjectStore;
    sessions?: SessionStore;
    retry?: RetryPolicy;
    clock?: Clock;
    /** Segment PUTs in flight across the pipeline. Default: UPLOAD.CONCURRENCY */
    concurrency?: number;
    /** Per attempt. Default: UPLOAD.CHUNK_TIMEOUT_MS */
    chunkTimeoutMs?: number;
    /** Objects larger than this are segmented. Default: UPLOAD.SEGMENT_THRESHOLD */
    segmentThreshold?: number;
    /** Default: UPLOAD.SEGMENT_SIZE */
    segmentSize?: number;
    events?: ProgressStream;
    newSessionId?: () => string;
}

export interface SignalOptions {
    signal?: AbortSignal;
}

export interface ResumeOptions extends SignalOptions {
    /**
     * 'strict' raises StateInconsistencyError on divergence; 'trust-remote'
     * rebuilds from the listing. For uploadFile, 'trust-remote' also re-sends
     * committed segments whose local bytes no longer match.
     */
    resolution?: ResumeResolution;
}

export interface UploadFileOptions extends ResumeOptions {
    /** Resume this session instead of looking one up by container and key. */
    sessionId?: string;
}

export type FileUploadOutcome =
    | { path: string; objectKey: string; sizeBytes: number; status: 'uploaded'; segmentCount: number }
    | { path: string; objectKey: string; sizeBytes: number; status: 'failed'; error: SafError }
    | { path: string; objectKey: string; sizeBytes: number; status: 'cancelled' };

export interface DirectoryUploadReport {
    container: string;
    source: string;
    total: number;
    uploaded: number;
    failed: number;
    cancelled: number;
    files: FileUploadOutcome[];
}

// =============================================================================
// SESSION LAYOUT
// =============================================================================

export function segmentName(session: Pick<UploadSession, 'objectKey' | 'mode'>, index: number): string {
    return session.mode === 'single' ? session.objectKey : `${session.objectKey}/${UPLOAD.SEGMENT_INFIX}${index}`;
}

export function expectedSegmentSize(session: Pick<UploadSession, 'sizeBytes' | 'chunkSize' | 'segmentCount' | 'mode'>, index: number): number {
    if (session.mode === 'single') return session.sizeBytes;
    return index < session.segmentCount - 1
        ? session.chunkSize
        : session.sizeBytes - session.chunkSize * (session.segmentCount - 1);
}

export function missingSegments(session: Pick<UploadSession, 'committed' | 'segmentCount'>): number[] {
    const committed = new Set(session.committed.map(c => c.index));
    const missing: number[] = [];
    for (let i = 0; i < session.segmentCount; i++) {
        if (!committed.has(i)) missing.push(i);
    }
    return missing;
}

function highestContiguous(committed: CommittedSegment[]): number {
    const indices = new Set(committed.map(c => c.index));
    let highest = -1;
    while (indices.has(highest + 1)) highest++;
    return highest;
}

function recordCommitted(session: UploadSession, segments: CommittedSegment[]): void {
    session.committed = [...segments].sort((a, b) => a.index - b.index);
    session.highestContiguous = highestContiguous(session.committed);
    session.updatedAt = new Date().toISOString();
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function asSafError(err: unknown): SafError {
    return err instanceof SafError ? err : new FatalTransportError(toError(err).message, null, { cause: err });
}

async function listLocalFiles(root: string, relative = ''): Promise<string[]> {
    const entries = await readdir(path.join(root, relative), { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries.sort((a, b) => compareStrings(a.name, b.name))) {
        if (entry.name.startsWith('.')) continue;
        const rel = relative ? `${relative}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            files.push(...await listLocalFiles(root, rel));
        } else if (entry.isFile()) {
            files.push(rel);
        }
    }
    return files;
}

// Finalize calls in flight, shared by every pipeline over the same session store
const finalizing = new WeakMap<SessionStore, Map<string, Promise<FinalizeResult>>>();

// =============================================================================
// PIPELINE
// =============================================================================

export class UploadPipeline {
    private readonly store: ObjectStore;
    private readonly sessions: SessionStore;
    private readonly retry: RetryPolicy;
    private readonly clock: Clock;
    private readonly slots: Semaphore;
    private readonly concurrency: number;
    private readonly chunkTimeoutMs: number;
    private readonly segmentThreshold: number;
    private readonly segmentSize: number;
    private readonly events: ProgressStream | undefined;
    private readonly newSessionId: () => string;

    private readonly saveChains = new Map<string, Promise<void>>();

    constructor(options: UploadPipelineOptions) {
        this.store = options.store;
        this.sessions = options.sessions ?? new MemorySessionStore();
        this.retry = options.retry ?? new RetryPolicy();
        this.clock = options.clock ?? systemClock;
        this.concurrency = options.concurrency ?? UPLOAD.CONCURRENCY;
        this.slots = new Semaphore(this.concurrency);
        this.chunkTimeoutMs = options.chunkTimeoutMs ?? UPLOAD.CHUNK_TIMEOUT_MS;
        this.segmentThreshold = options.segmentThreshold ?? UPLOAD.SEGMENT_THRESHOLD;
        this.segmentSize = options.segmentSize ?? UPLOAD.SEGMENT_SIZE;
        this.events = options.events;
        this.newSessionId = options.newSessionId ?? randomUUID;
    }

    /**
     * Pipeline against a Swift account. Throws AuthUnavailableError when no
     * credentials were resolved.
     */
    static connect(credentials: Credentials | null | undefined, options: Omit<UploadPipelineOptions, 'store'> = {}): UploadPipeline {
        const store = new SwiftObjectStore(requireCredentials(credentials));
        return new UploadPipeline({ ...options, store });
    }

    // -------------------------------------------------------------------------
    // Helpers
    // -------------------------------------------------------------------------

    /** Saves for one session run one after another, in call order. */
    private async persist(session: UploadSession): Promise<void> {
        const save = () => this.sessions.save(session);
        const previous = this.saveChains.get(session.id) ?? Promise.resolve();
        const current = previous.then(save, save);
        this.saveChains.set(session.id, current);
        try {
            await current;
        } finally {
            if (this.saveChains.get(session.id) === current) this.saveChains.delete(session.id);
        }
    }

    private async withContainerRecovery<T>(container: string, signal: AbortSignal | undefined, operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (err) {
            if (!(err instanceof ContainerMissingError)) throw err;
            log.warn(`Container ${container} is missing; creating it and retrying once`);
            await this.retry.execute(() => this.store.createContainer(container, { signal }), { clock: this.clock, signal });
            this.events?.emit({ type: 'upload.container-created', container });
            return operation();
        }
    }

    private retrying<T>(sessionId: string, index: number | null, signal: AbortSignal | undefined, operation: (attempt: number) => Promise<T>): Promise<T> {
        return this.retry.execute(operation, {
            clock: this.clock,
            signal,
            onRetry: (error, attempt, delayMs) => {
                const message = toError(error).message;
                log.warn(`Attempt ${attempt} failed${index === null ? '' : ` for segment ${index}`}, retrying in ${delayMs}ms: ${message}`);
                this.events?.emit({ type: 'upload.retry', sessionId, index, attempt, delayMs, message });
            }
        });
    }

    async ensureContainer(container: string, options: SignalOptions = {}): Promise<boolean> {
        const exists = await this.retry.execute(() => this.store.containerExists(container, options), { clock: this.clock, signal: options.signal });
        if (exists) return false;
        await this.retry.execute(() => this.store.createContainer(container, options), { clock: this.clock, signal: options.signal });
        this.events?.emit({ type: 'upload.container-created', container });
        return true;
    }

    /** One authenticated request; throws AuthError when the token is rejected. */
    async verifyCredentials(options: SignalOptions = {}): Promise<void> {
        await this.retry.execute(() => this.store.verifyAccount(options), { clock: this.clock, signal: options.signal });
    }

    // -------------------------------------------------------------------------
    // Session lifecycle
    // -------------------------------------------------------------------------

    /**
     * Plan and persist a new transfer. With an explicit chunkSize the object is
     * segmented whenever it is larger than one chunk. Without one, objects at
     * or below the segment threshold become a one-segment 'single' session and
     * larger ones use the configured segment size.
     */
    async beginSession(container: string, objectKey: string, sizeBytes: number, chunkSize?: number): Promise<UploadSession> {
        if (!container || !objectKey) {
            throw new RangeError('Container and object key must be non-empty');
        }
        if (!Number.isInteger(sizeBytes) || sizeBytes < 0) {
            throw new RangeError(`Invalid object size ${sizeBytes}`);
        }
        if (chunkSize !== undefined && (!Number.isInteger(chunkSize) || chunkSize < 1)) {
            throw new RangeError(`Invalid chunk size ${chunkSize}`);
        }

        const segmentSize = chunkSize ?? this.segmentSize;
        const single = sizeBytes <= (chunkSize ?? this.segmentThreshold);
        const now = new Date().toISOString();
        const session: UploadSession = {
            id: this.newSessionId(),
            container,
            objectKey,
            sizeBytes,
            chunkSize: single ? Math.max(1, sizeBytes) : segmentSize,
            segmentCount: single ? 1 : Math.ceil(sizeBytes / segmentSize),
            mode: single ? 'single' : 'segmented',
            committed: [],
            highestContiguous: -1,
            manifestCommitted: false,
            createdAt: now,
            updatedAt: now
        };
        await this.persist(session);

        log.debug(`Session ${session.id}: ${objectKey} in ${session.segmentCount} ${session.mode} segment(s)`);
        this.events?.emit({ type: 'upload.session', sessionId: session.id, objectKey, segmentCount: session.segmentCount, resumed: false });
        return session;
    }

    /**
     * PUT one segment. Re-sending a committed index with the same content is a
     * no-op; different content is a fatal state inconsistency.
     */
    async uploadChunk(session: UploadSession, index: number, body: ObjectBody, options: SignalOptions = {}): Promise<ChunkResult> {
        if (!Number.isInteger(index) || index < 0 || index >= session.segmentCount) {
            throw new RangeError(`Segment index ${index} is outside [0, ${session.segmentCount})`);
        }
        const size = bodySize(body);
        const expected = expectedSegmentSize(session, index);
        if (size !== expected) {
            throw new RangeError(`Segment ${index} of ${session.objectKey} must be ${expected} bytes, got ${size}`);
        }

        const etag = body instanceof Uint8Array
            ? hashBytes(body, 'md5')
            : await hashFile(body.path, 'md5', { start: body.start, length: body.length });

        const existing = session.committed.find(c => c.index === index);
        if (existing) {
            if (existing.etag === etag) {
                return { status: 'committed', index, attempts: 0, etag };
            }
            const error = new StateInconsistencyError(
                session.id,
                `Segment ${index} of ${session.objectKey} was already committed with different content`,
                { missingRemote: [], sizeMismatch: [], contentMismatch: [index], manifestMissing: false }
            );
            this.events?.emit({ type: 'upload.segment', sessionId: session.id, index, status: 'fatal_error', bytes: size, attempts: 0 });
            return { status: 'fatal_error', index, attempts: 0, error };
        }

        let attempts = 0;
        const release = await this.slots.acquire();
        try {
            throwIfAborted(options.signal);
            const name = segmentName(session, index);
            await this.withContainerRecovery(session.container, options.signal, () =>
                this.retrying(session.id, index, options.signal, async (attempt) => {
                    attempts++;
                    log.debug(`PUT ${name} (attempt ${attempt})`);
                    const timeout = withTimeout(options.signal, this.chunkTimeoutMs);
                    try {
                        const result = await this.store.putObject(session.container, name, body, { etag, signal: timeout.signal });
                        if (result.etag && result.etag !== etag) {
                            throw new TransientTransportError(`ETag mismatch for ${name}: sent ${etag}, stored ${result.etag}`);
                        }
                    } finally {
                        timeout.dispose();
                    }
                })
            );
        } catch (err) {
            const error = options.signal?.aborted ? new CancelledError() : asSafError(err);
            const status: ChunkStatus = isRetryable(error) || error instanceof CancelledError ? 'retryable_error' : 'fatal_error';
            if (status === 'fatal_error') log.error(`Segment ${index} of ${session.objectKey} failed:`, error.message);
            this.events?.emit({ type: 'upload.segment', sessionId: session.id, index, status, bytes: size, attempts });
            return { status, index, attempts, error };
        } finally {
            release();
        }

        if (!session.committed.some(c => c.index === index)) {
            recordCommitted(session, [...session.committed, { index, etag, size }]);
        }
        await this.persist(session);
        this.events?.emit({ type: 'upload.segment', sessionId: session.id, index, status: 'committed', bytes: size, attempts });
        return { status: 'committed', index, attempts, etag };
    }

    /**
     * Commit the manifest once every segment is in. Concurrent calls for one
     * session share a single in-flight attempt, across every pipeline using
     * the same session store.
     */
    async finalize(session: UploadSession, options: SignalOptions = {}): Promise<FinalizeResult> {
        let running = finalizing.get(this.sessions);
        if (!running) {
            running = new Map<string, Promise<FinalizeResult>>();
            finalizing.set(this.sessions, running);
        }
        const calls = running;

        let run = calls.get(session.id);
        if (!run) {
            const started = this.runFinalize(session, options).finally(() => {
                if (calls.get(session.id) === started) calls.delete(session.id);
            });
            calls.set(session.id, started);
            run = started;
        }
        const result = await run;
        if (result.status === 'manifest_committed') session.manifestCommitted = true;
        return result;
    }

    private async runFinalize(session: UploadSession, options: SignalOptions): Promise<FinalizeResult> {
        if (session.manifestCommitted) return { status: 'manifest_committed' };

        // Gone from the store: committed or abandoned through another copy
        if (!(await this.sessions.load(session.id))) {
            const head = await this.retry.execute(
                () => this.store.headObject(session.container, session.objectKey, options),
                { clock: this.clock, signal: options.signal }
            );
            if (!head) {
                throw new StateInconsistencyError(session.id, `Session ${session.id} is no longer persisted and ${session.objectKey} is not in the store`, {
                    missingRemote: [], sizeMismatch: [], contentMismatch: [], manifestMissing: true
                });
            }
            log.debug(`Session ${session.id}: ${session.objectKey} was already committed`);
            session.manifestCommitted = true;
            return { status: 'manifest_committed' };
        }

        const missing = missingSegments(session);
        if (missing.length > 0) {
            return { status: 'incomplete', missing };
        }

        if (session.mode === 'segmented') {
            const segments: ManifestSegment[] = session.committed.map(c => ({
                path: `/${session.container}/${segmentName(session, c.index)}`,
                etag: c.etag,
                size_bytes: c.size
            }));
            await this.withContainerRecovery(session.container, options.signal, () =>
                this.retrying(session.id, null, options.signal, () =>
                    this.store.putManifest(session.container, session.objectKey, segments, options)
                )
            );
        }

        session.manifestCommitted = true;
        session.updatedAt = new Date().toISOString();
        await this.sessions.delete(session.id);

        log.info(`Committed ${session.objectKey} (${session.segmentCount} segment(s))`);
        this.events?.emit({ type: 'upload.finalized', sessionId: session.id, objectKey: session.objectKey, segmentCount: session.segmentCount });
        return { status: 'manifest_committed' };
    }

    /**
     * Reload a persisted session and reconcile it with the store's listing.
     * Remote segments of the right size that the session does not know are
     * adopted. Local claims the store cannot confirm raise
     * StateInconsistencyError unless resolution is 'trust-remote'.
     */
    async resume(sessionId: string, options: ResumeOptions = {}): Promise<UploadSession> {
        const resolution = options.resolution ?? 'strict';
        const session = await this.sessions.load(sessionId);
        if (!session) {
            throw new StateInconsistencyError(sessionId, `No persisted upload session '${sessionId}'`, {
                missingRemote: [], sizeMismatch: [], contentMismatch: [], manifestMissing: false
            });
        }

        const remote = await this.listRemoteSegments(session, options.signal);
        const divergence: StateDivergence = { missingRemote: [], sizeMismatch: [], contentMismatch: [], manifestMissing: false };

        if (session.manifestCommitted) {
            const head = await this.retry.execute(() => this.store.headObject(session.container, session.objectKey, options), { clock: this.clock, signal: options.signal });
            if (!head) divergence.manifestMissing = true;
        }

        const local = new Map<number, CommittedSegment>(session.committed.map(c => [c.index, c]));
        for (const claim of session.committed) {
            const found = remote.get(claim.index);
            if (!found) {
                divergence.missingRemote.push(claim.index);
            } else if (found.bytes !== claim.size) {
                divergence.sizeMismatch.push(claim.index);
            }
        }

        const adopted: CommittedSegment[] = [];
        const remoteValid: CommittedSegment[] = [];
        for (const [index, object] of remote) {
            if (object.bytes !== expectedSegmentSize(session, index)) {
                if (!local.has(index)) divergence.sizeMismatch.push(index);
                continue;
            }
            const segment = { index, etag: local.get(index)?.etag ?? object.etag, size: object.bytes };
            remoteValid.push(segment);
            if (!local.has(index)) adopted.push(segment);
        }
        divergence.sizeMismatch.sort((a, b) => a - b);

        const diverged = divergence.missingRemote.length > 0 || divergence.sizeMismatch.length > 0 || divergence.manifestMissing;
        if (diverged) {
            const summary = `missing remotely [${divergence.missingRemote.join(', ')}], size mismatch [${divergence.sizeMismatch.join(', ')}]${divergence.manifestMissing ? ', manifest missing' : ''}`;
            if (resolution === 'strict') {
                throw new StateInconsistencyError(session.id, `Session ${session.id} diverges from the store: ${summary}`, divergence);
            }
            log.warn(`Session ${session.id}: rebuilding from the store listing (${summary})`);
            recordCommitted(session, remoteValid);
            if (divergence.manifestMissing) session.manifestCommitted = false;
        } else {
            recordCommitted(session, [...session.committed, ...adopted]);
        }

        if (adopted.length > 0) {
            log.info(`Session ${session.id}: adopted ${adopted.length} segment(s) found in the store`);
        }
        await this.persist(session);
        this.events?.emit({ type: 'upload.session', sessionId: session.id, objectKey: session.objectKey, segmentCount: session.segmentCount, resumed: true });
        return session;
    }

    private async listRemoteSegments(session: UploadSession, signal: AbortSignal | undefined): Promise<Map<number, RemoteObject>> {
        const found = new Map<number, RemoteObject>();
        try {
            if (session.mode === 'single') {
                const head = await this.retry.execute(() => this.store.headObject(session.container, session.objectKey, { signal }), { clock: this.clock, signal });
                if (head) found.set(0, head);
                return found;
            }
            const prefix = `${session.objectKey}/${UPLOAD.SEGMENT_INFIX}`;
            const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)$`);
            const objects = await this.retry.execute(() => this.store.listObjects(session.container, prefix, { signal }), { clock: this.clock, signal });
            for (const object of objects) {
                const match = pattern.exec(object.name);
                if (!match) continue;
                const index = parseInt(match[1], 10);
                if (index < session.segmentCount) found.set(index, object);
            }
        } catch (err) {
            // No container means nothing was ever stored
            if (!(err instanceof ContainerMissingError)) throw err;
        }
        return found;
    }

    /**
     * Drop a session: delete its uploaded segments (unless the object was
     * committed) and forget the persisted record.
     */
    async abandon(sessionId: string, options: SignalOptions = {}): Promise<void> {
        const session = await this.sessions.load(sessionId);
        if (!session) return;
        if (!session.manifestCommitted) {
            for (const segment of session.committed) {
                await this.retry.execute(
                    () => this.store.deleteObject(session.container, segmentName(session, segment.index), options),
                    { clock: this.clock, signal: options.signal }
                );
            }
        }
        await this.sessions.delete(sessionId);
        log.info(`Abandoned session ${sessionId} (${session.objectKey})`);
    }

    // -------------------------------------------------------------------------
    // Files and directories
    // -------------------------------------------------------------------------

    /**
     * Re-hash the local bytes behind every committed segment. Segments whose
     * content changed are dropped for re-upload under 'trust-remote' and raise
     * StateInconsistencyError otherwise.
     */
    private async checkLocalContent(session: UploadSession, localPath: string, options: ResumeOptions): Promise<void> {
        const changed: number[] = [];
        for (const segment of session.committed) {
            throwIfAborted(options.signal);
            const local = await hashFile(localPath, 'md5', { start: segment.index * session.chunkSize, length: segment.size });
            if (local !== segment.etag) changed.push(segment.index);
        }
        if (changed.length === 0) return;

        if ((options.resolution ?? 'strict') === 'strict') {
            throw new StateInconsistencyError(
                session.id,
                `${localPath} no longer matches committed segments [${changed.join(', ')}] of session ${session.id}`,
                { missingRemote: [], sizeMismatch: [], contentMismatch: changed, manifestMissing: false }
            );
        }
        log.warn(`${localPath} changed since session ${session.id}; re-sending segments [${changed.join(', ')}]`);
        recordCommitted(session, session.committed.filter(c => !changed.includes(c.index)));
        await this.persist(session);
    }

    private async findSession(container: string, objectKey: string): Promise<UploadSession | null> {
        const sessions = await this.sessions.list();
        return sessions.find(s => s.container === container && s.objectKey === objectKey && !s.manifestCommitted) ?? null;
    }

    /**
     * Upload one local file: resume a matching session or begin a new one,
     * PUT every pending segment, then finalize. Stops submitting segments on
     * the first fatal error or on cancellation; the session stays persisted.
     */
    async uploadFile(container: string, localPath: string, objectKey: string, options: UploadFileOptions = {}): Promise<UploadSession> {
        const { size } = await stat(localPath);

        let session: UploadSession | null = null;
        if (options.sessionId) {
            session = await this.resume(options.sessionId, options);
        } else {
            const previous = await this.findSession(container, objectKey);
            if (previous && previous.sizeBytes === size) {
                session = await this.resume(previous.id, options);
            } else if (previous) {
                log.warn(`${localPath} changed size since session ${previous.id}; starting over`);
                await this.abandon(previous.id, options);
            }
        }
        if (session) {
            await this.checkLocalContent(session, localPath, options);
        } else {
            session = await this.beginSession(container, objectKey, size);
        }
        const active = session;

        const fatal: ChunkResult[] = [];
        const pending = missingSegments(active);
        const results = await runPool(pending, this.concurrency, async (index) => {
            const start = index * active.chunkSize;
            const result = await this.uploadChunk(active, index, fileSlice(localPath, start, expectedSegmentSize(active, index)), options);
            if (result.status === 'fatal_error') fatal.push(result);
            return result;
        }, { signal: options.signal, shouldStop: () => fatal.length > 0 });

        const firstFatal = fatal[0];
        if (firstFatal) {
            throw firstFatal.error ?? new FatalTransportError(`Segment ${firstFatal.index} of ${objectKey} failed`);
        }
        throwIfAborted(options.signal);
        for (const result of results) {
            if (result.status === 'rejected') throw asSafError(result.reason);
            if (result.status === 'fulfilled' && result.value.status !== 'committed') {
                throw result.value.error ?? new TransientTransportError(`Segment ${result.value.index} of ${objectKey} was not committed`);
            }
        }

        const outcome = await this.finalize(active, options);
        if (outcome.status === 'incomplete') {
            throw new StateInconsistencyError(active.id, `Segments [${outcome.missing.join(', ')}] of ${objectKey} are still missing`, {
                missingRemote: outcome.missing, sizeMismatch: [], contentMismatch: [], manifestMissing: false
            });
        }
        return active;
    }

    /**
     * Upload every file under sourceDir, in sorted order, as
     * `<basename(sourceDir)>/<relative path>`. One file's failure does not stop
     * the rest; cancellation does.
     */
    async uploadDirectory(sourceDir: string, container: string, options: SignalOptions & { resolution?: ResumeResolution } = {}): Promise<DirectoryUploadReport> {
        const source = path.resolve(sourceDir);
        const files = await listLocalFiles(source);
        await this.ensureContainer(container, options);

        const outcomes: FileUploadOutcome[] = [];
        const base = path.basename(source);
        for (const [i, rel] of files.entries()) {
            const localPath = path.join(source, rel);
            const objectKey = `${base}/${rel}`;
            const { size } = await stat(localPath);

            if (options.signal?.aborted) {
                outcomes.push({ path: localPath, objectKey, sizeBytes: size, status: 'cancelled' });
                continue;
            }
            try {
                const session = await this.uploadFile(container, localPath, objectKey, options);
                outcomes.push({ path: localPath, objectKey, sizeBytes: size, status: 'uploaded', segmentCount: session.segmentCount });
                this.events?.emit({ type: 'upload.file', path: localPath, objectKey, status: 'uploaded', sizeBytes: size });
            } catch (err) {
                if (err instanceof CancelledError || options.signal?.aborted) {
                    outcomes.push({ path: localPath, objectKey, sizeBytes: size, status: 'cancelled' });
                    this.events?.emit({ type: 'upload.file', path: localPath, objectKey, status: 'cancelled', sizeBytes: size });
                    continue;
                }
                const error = asSafError(err);
                log.error(`Failed to upload ${localPath}:`, error.message);
                outcomes.push({ path: localPath, objectKey, sizeBytes: size, status: 'failed', error });
                this.events?.emit({ type: 'upload.file', path: localPath, objectKey, status: 'failed', sizeBytes: size, message: error.message });
            }
            this.events?.emit({ type: 'batch.progress', phase: 'upload', processed: i + 1, total: files.length });
        }

        const count = (status: FileUploadOutcome['status']) => outcomes.filter(o => o.status === status).length;
        const report: DirectoryUploadReport = {
            container,
            source,
            total: files.length,
            uploaded: count('uploaded'),
            failed: count('failed'),
            cancelled: count('cancelled'),
            files: outcomes
        };
        log.info(`Uploaded ${report.uploaded}/${report.total} file(s) from ${source} to ${container}`);
        return report;
    }
}
