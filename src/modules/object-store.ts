/**
 * Object Store
 *
 * The handful of OpenStack Swift calls the upload pipeline needs: account and
 * container checks, object PUT, static large object manifest PUT, listing and
 * delete. Every response is mapped onto the transport error taxonomy:
 *
 *   401/403                    -> AuthError (never retried)
 *   404 on a container path    -> ContainerMissingError
 *   408, 422, 429, 5xx, network -> TransientTransportError
 *   anything else              -> FatalTransportError
 */

import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import { z } from 'zod';
import { UPLOAD } from './constants.js';
import {
    AuthError,
    ContainerMissingError,
    FatalTransportError,
    TransientTransportError,
    toError
} from './errors.js';
import { Logger, withTimeout } from './utilities.js';
import type { Credentials, RemoteObject } from '../types.js';

const log = Logger.getLogger('object-store');

// =============================================================================
// BODIES
// =============================================================================

/** A byte range of a local file, streamed rather than held in memory. */
export interface FileSlice {
    kind: 'file-slice';
    path: string;
    start: number;
    length: number;
}

export type ObjectBody = Uint8Array | FileSlice;

export function fileSlice(path: string, start: number, length: number): FileSlice {
    return { kind: 'file-slice', path, start, length };
}

export function bodySize(body: ObjectBody): number {
    return body instanceof Uint8Array ? body.byteLength : body.length;
}

/** Load a body fully into memory. */
export async function readBody(body: ObjectBody): Promise<Uint8Array> {
    if (body instanceof Uint8Array) return body;
    const buffer = new Uint8Array(body.length);
    const handle = await open(body.path, 'r');
    try {
        let offset = 0;
        while (offset < body.length) {
            const { bytesRead } = await handle.read(buffer, offset, body.length - offset, body.start + offset);
            if (bytesRead === 0) break;
            offset += bytesRead;
        }
        return offset === body.length ? buffer : buffer.subarray(0, offset);
    } finally {
        await handle.close();
    }
}

// =============================================================================
// INTERFACE
// =============================================================================

/** One entry of a static large object manifest. */
export interface ManifestSegment {
    /** `/<container>/<object name>` */
    path: string;
    etag: string;
    size_bytes: number;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

export interface PutObjectOptions extends RequestOptions {
    /** MD5 hex digest; the store rejects the body if it does not match. */
    etag?: string;
    contentType?: string;
}

export interface ObjectStore {
    /** One authenticated request against the account. Throws AuthError on rejection. */
    verifyAccount(options?: RequestOptions): Promise<void>;
    containerExists(container: string, options?: RequestOptions): Promise<boolean>;
    createContainer(container: string, options?: RequestOptions): Promise<void>;
    putObject(container: string, name: string, body: ObjectBody, options?: PutObjectOptions): Promise<{ etag: string }>;
    putManifest(container: string, name: string, segments: ManifestSegment[], options?: RequestOptions): Promise<void>;
    /** Objects whose names start with prefix, sorted by name. */
    listObjects(container: string, prefix: string, options?: RequestOptions): Promise<RemoteObject[]>;
    /** null when the object does not exist. */
    headObject(container: string, name: string, options?: RequestOptions): Promise<RemoteObject | null>;
    /** Deleting an absent object is not an error. */
    deleteObject(container: string, name: string, options?: RequestOptions): Promise<void>;
}

// =============================================================================
// SWIFT
// =============================================================================

const listingSchema = z.array(z.object({
    name: z.string(),
    bytes: z.number().int().nonnegative(),
    hash: z.string()
}).passthrough());

export interface SwiftObjectStoreOptions {
    /** Per request, excluding object bodies which the caller times out. Default: UPLOAD.REQUEST_TIMEOUT_MS */
    requestTimeoutMs?: number;
    fetch?: typeof fetch;
}

type ResponseContext = 'account' | 'container' | 'object';

function stripQuotes(etag: string | null): string {
    return (etag ?? '').replace(/^"|"$/g, '');
}

export function encodeObjectName(name: string): string {
    return name.split('/').map(encodeURIComponent).join('/');
}

export class SwiftObjectStore implements ObjectStore {
    private readonly base: string;
    private readonly requestTimeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly credentials: Credentials, options: SwiftObjectStoreOptions = {}) {
        this.base = credentials.endpoint.replace(/\/+$/, '');
        this.requestTimeoutMs = options.requestTimeoutMs ?? UPLOAD.REQUEST_TIMEOUT_MS;
        this.fetchImpl = options.fetch ?? fetch;
    }

    private containerUrl(container: string): string {
        return `${this.base}/${encodeURIComponent(container)}`;
    }

    private objectUrl(container: string, name: string): string {
        return `${this.containerUrl(container)}/${encodeObjectName(name)}`;
    }

    private async request(
        method: string,
        url: string,
        init: { headers?: Record<string, string>; body?: ObjectBody | string; signal?: AbortSignal; timeoutMs?: number | null } = {}
    ): Promise<Response> {
        // Object bodies are timed out by the caller's per-attempt signal
        const timeout = init.timeoutMs === null ? null : withTimeout(init.signal, init.timeoutMs ?? this.requestTimeoutMs);
        const headers = { 'X-Auth-Token': this.credentials.token, ...init.headers };
        const signal = timeout?.signal ?? init.signal;
        try {
            const body = init.body;
            if (body !== undefined && typeof body !== 'string' && !(body instanceof Uint8Array)) {
                // Stream the slice; a fresh stream per request so retries resend from the start
                const stream = body.length === 0
                    ? new Uint8Array(0)
                    : createReadStream(body.path, { start: body.start, end: body.start + body.length - 1 });
                return await this.fetchImpl(url, { method, headers, body: stream, signal, duplex: 'half' });
            }
            return await this.fetchImpl(url, { method, headers, body, signal });
        } catch (err) {
            throw new TransientTransportError(`${method} ${url} failed: ${toError(err).message}`, null, { cause: err });
        } finally {
            timeout?.dispose();
        }
    }

    private async fail(response: Response, method: string, url: string, context: ResponseContext, container?: string): Promise<never> {
        const detail = await response.text().catch(() => response.statusText);
        const message = `${method} ${url} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`;
        const status = response.status;
        if (status === 401 || status === 403) {
            throw new AuthError(message, status);
        }
        if (status === 404 && context !== 'account' && container !== undefined) {
            throw new ContainerMissingError(container);
        }
        if (status === 408 || status === 422 || status === 429 || status >= 500) {
            throw new TransientTransportError(message, status);
        }
        throw new FatalTransportError(message, status);
    }

    async verifyAccount(options: RequestOptions = {}): Promise<void> {
        const response = await this.request('HEAD', this.base, { signal: options.signal });
        if (!response.ok) await this.fail(response, 'HEAD', this.base, 'account');
        log.debug(`Account ${this.credentials.project} verified`);
    }

    async containerExists(container: string, options: RequestOptions = {}): Promise<boolean> {
        const url = this.containerUrl(container);
        const response = await this.request('HEAD', url, { signal: options.signal });
        if (response.status === 404) return false;
        if (!response.ok) await this.fail(response, 'HEAD', url, 'account');
        return true;
    }

    async createContainer(container: string, options: RequestOptions = {}): Promise<void> {
        const url = this.containerUrl(container);
        const response = await this.request('PUT', url, { signal: options.signal });
        if (!response.ok) await this.fail(response, 'PUT', url, 'account');
        log.info(`Created container ${container}`);
    }

    async putObject(container: string, name: string, body: ObjectBody, options: PutObjectOptions = {}): Promise<{ etag: string }> {
        const url = this.objectUrl(container, name);
        const headers: Record<string, string> = {
            'Content-Type': options.contentType ?? 'application/octet-stream',
            'Content-Length': String(bodySize(body))
        };
        if (options.etag) headers.ETag = options.etag;
        const response = await this.request('PUT', url, { headers, body, signal: options.signal, timeoutMs: null });
        if (!response.ok) await this.fail(response, 'PUT', url, 'object', container);
        return { etag: stripQuotes(response.headers.get('etag')) || options.etag || '' };
    }

    async putManifest(container: string, name: string, segments: ManifestSegment[], options: RequestOptions = {}): Promise<void> {
        const url = `${this.objectUrl(container, name)}?multipart-manifest=put`;
        const response = await this.request('PUT', url, {
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(segments),
            signal: options.signal
        });
        if (!response.ok) await this.fail(response, 'PUT', url, 'object', container);
    }

    async listObjects(container: string, prefix: string, options: RequestOptions = {}): Promise<RemoteObject[]> {
        const objects: RemoteObject[] = [];
        let marker = '';
        for (;;) {
            const query = new URLSearchParams({ format: 'json', prefix });
            if (marker) query.set('marker', marker);
            const url = `${this.containerUrl(container)}?${query}`;
            const response = await this.request('GET', url, { signal: options.signal });
            if (response.status === 204) break;
            if (!response.ok) await this.fail(response, 'GET', url, 'container', container);

            const parsed = listingSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new FatalTransportError(`Unexpected listing format from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, response.status);
            }
            if (parsed.data.length === 0) break;
            for (const entry of parsed.data) {
                objects.push({ name: entry.name, bytes: entry.bytes, etag: entry.hash });
            }
            marker = parsed.data[parsed.data.length - 1].name;
        }
        return objects;
    }

    async headObject(container: string, name: string, options: RequestOptions = {}): Promise<RemoteObject | null> {
        const url = this.objectUrl(container, name);
        const response = await this.request('HEAD', url, { signal: options.signal });
        if (response.status === 404) return null;
        if (!response.ok) await this.fail(response, 'HEAD', url, 'object', container);
        return {
            name,
            bytes: Number(response.headers.get('content-length') ?? 0),
            etag: stripQuotes(response.headers.get('etag'))
        };
    }

    async deleteObject(container: string, name: string, options: RequestOptions = {}): Promise<void> {
        const url = this.objectUrl(container, name);
        const response = await this.request('DELETE', url, { signal: options.signal });
        if (response.status === 404) return;
        if (!response.ok) await this.fail(response, 'DELETE', url, 'object', container);
    }
}
