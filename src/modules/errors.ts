/**
 * Error taxonomy.
 *
 * Validation anomalies are data (ValidationIssue), not exceptions. Everything
 * here is thrown, and batch runners turn it into per-directory or per-session
 * report entries.
 */

import type { PackageDescriptor, ValidationIssue } from '../types.js';

export type SafErrorCode =
    | 'VALIDATION_GATE'
    | 'FILESYSTEM'
    | 'ACCESS_DENIED'
    | 'PACKAGE_ALREADY_EXISTS'
    | 'ASSEMBLY_INTERRUPTED'
    | 'TRANSIENT_TRANSPORT'
    | 'FATAL_TRANSPORT'
    | 'AUTH'
    | 'AUTH_UNAVAILABLE'
    | 'CONTAINER_MISSING'
    | 'STATE_INCONSISTENCY'
    | 'CANCELLED';

export class SafError extends Error {
    readonly code: SafErrorCode;

    constructor(code: SafErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SafError';
        this.code = code;
    }
}

/** Assembly refused because blocking validation issues remain. */
export class ValidationGateError extends SafError {
    readonly directory: string;
    readonly blocking: ValidationIssue[];

    constructor(directory: string, blocking: ValidationIssue[]) {
        super('VALIDATION_GATE', `Validation failed for ${directory}: ${blocking.length} blocking issue(s)`);
        this.name = 'ValidationGateError';
        this.directory = directory;
        this.blocking = blocking;
    }
}

export class FilesystemError extends SafError {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super('FILESYSTEM', message, options);
        this.name = 'FilesystemError';
        this.path = path;
    }
}

export class AccessDeniedError extends SafError {
    readonly path: string;

    constructor(path: string, options?: { cause?: unknown }) {
        super('ACCESS_DENIED', `Access denied: ${path}`, options);
        this.name = 'AccessDeniedError';
        this.path = path;
    }
}

export class PackageAlreadyExistsError extends SafError {
    readonly packageDir: string;
    readonly partial: boolean;
    /** Set when a complete package was built from something other than the current row. */
    readonly mismatch: string | null;

    constructor(packageDir: string, partial: boolean, mismatch: string | null = null) {
        super(
            'PACKAGE_ALREADY_EXISTS',
            partial
                ? `Incomplete package already exists at ${packageDir}; remove it before rebuilding`
                : mismatch
                    ? `Package at ${packageDir} does not match its row (${mismatch}); remove it before rebuilding`
                    : `Package already exists at ${packageDir}`
        );
        this.name = 'PackageAlreadyExistsError';
        this.packageDir = packageDir;
        this.partial = partial;
        this.mismatch = mismatch;
    }
}

/** A fatal error stopped an assembly loop; packages finished before it stay on disk. */
export class AssemblyInterruptedError extends SafError {
    readonly completed: PackageDescriptor[];

    constructor(completed: PackageDescriptor[], cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('ASSEMBLY_INTERRUPTED', `Assembly stopped after ${completed.length} package(s): ${reason}`, { cause });
        this.name = 'AssemblyInterruptedError';
        this.completed = completed;
    }
}

export class TransportError extends SafError {
    readonly status: number | null;

    constructor(code: SafErrorCode, message: string, status: number | null, options?: { cause?: unknown }) {
        super(code, message, options);
        this.name = 'TransportError';
        this.status = status;
    }
}

/** Network failures, timeouts, 408/429 and 5xx responses. Retried per policy. */
export class TransientTransportError extends TransportError {
    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super('TRANSIENT_TRANSPORT', message, status, options);
        this.name = 'TransientTransportError';
    }
}

/** Any non-retryable transport failure. */
export class FatalTransportError extends TransportError {
    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super('FATAL_TRANSPORT', message, status, options);
        this.name = 'FatalTransportError';
    }
}

export class AuthError extends TransportError {
    constructor(message: string, status: number | null = null) {
        super('AUTH', message, status);
        this.name = 'AuthError';
    }
}

export class ContainerMissingError extends TransportError {
    readonly container: string;

    constructor(container: string) {
        super('CONTAINER_MISSING', `Container '${container}' does not exist`, 404);
        this.name = 'ContainerMissingError';
        this.container = container;
    }
}

export class AuthUnavailableError extends SafError {
    constructor(message = 'No storage credentials were supplied') {
        super('AUTH_UNAVAILABLE', message);
        this.name = 'AuthUnavailableError';
    }
}

export interface StateDivergence {
    /** Segments the local session lists as committed but the store does not have. */
    missingRemote: number[];
    /** Segments present remotely with a size that does not match the session layout. */
    sizeMismatch: number[];
    /** Segments re-sent with content that differs from what was committed. */
    contentMismatch: number[];
    /** The session claims a committed manifest the store does not have. */
    manifestMissing: boolean;
}

export class StateInconsistencyError extends SafError {
    readonly sessionId: string;
    readonly divergence: StateDivergence;

    constructor(sessionId: string, message: string, divergence: StateDivergence) {
        super('STATE_INCONSISTENCY', message);
        this.name = 'StateInconsistencyError';
        this.sessionId = sessionId;
        this.divergence = divergence;
    }
}

export class CancelledError extends SafError {
    constructor(message = 'Operation cancelled') {
        super('CANCELLED', message);
        this.name = 'CancelledError';
    }
}

export function isRetryable(error: unknown): error is TransientTransportError {
    return error instanceof TransientTransportError;
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
