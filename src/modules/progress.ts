/**
 * Progress events.
 *
 * Every long-running operation reports through a ProgressStream: a sequence of
 * frozen event records that any front end (CLI, service, GUI) can subscribe to.
 * Core logic never holds a reference to a UI object.
 */

import { Logger } from './logger.js';

const log = Logger.getLogger('progress');

// =============================================================================
// EVENT TYPES
// =============================================================================

export type ProgressEventBody =
    | { type: 'scan.directory'; directory: string; metadataFiles: number; documents: number }
    | { type: 'scan.access-denied'; directory: string; message: string }
    | { type: 'validation.completed'; directory: string; issues: number; blocking: number; validRows: number; totalRows: number }
    | { type: 'assembly.started'; directory: string; rows: number }
    | { type: 'assembly.package'; directory: string; packageId: string; filename: string; status: 'written' | 'skipped' }
    | { type: 'assembly.completed'; directory: string; written: number; skipped: number }
    | { type: 'assembly.failed'; directory: string; code: string; message: string }
    | { type: 'batch.progress'; phase: 'validate' | 'assemble' | 'upload'; processed: number; total: number }
    | { type: 'upload.container-created'; container: string }
    | { type: 'upload.session'; sessionId: string; objectKey: string; segmentCount: number; resumed: boolean }
    | { type: 'upload.segment'; sessionId: string; index: number; status: 'committed' | 'retryable_error' | 'fatal_error'; bytes: number; attempts: number }
    | { type: 'upload.retry'; sessionId: string; index: number | null; attempt: number; delayMs: number; message: string }
    | { type: 'upload.finalized'; sessionId: string; objectKey: string; segmentCount: number }
    | { type: 'upload.file'; path: string; objectKey: string; status: 'uploaded' | 'failed' | 'cancelled'; sizeBytes: number; message?: string };

export type ProgressEvent = Readonly<ProgressEventBody & { seq: number; at: string }>;
export type ProgressEventType = ProgressEventBody['type'];
export type ProgressListener = (event: ProgressEvent) => void;

// =============================================================================
// STREAM
// =============================================================================

export class ProgressStream {
    private readonly listeners = new Set<ProgressListener>();
    private readonly history: ProgressEvent[] = [];
    private seq = 0;

    /**
     * @param record - keep an append-only log of every event, readable via events()
     */
    constructor(private readonly record = false) {}

    subscribe(listener: ProgressListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    emit(body: ProgressEventBody): ProgressEvent {
        const event: ProgressEvent = Object.freeze({ ...body, seq: this.seq++, at: new Date().toISOString() });
        if (this.record) this.history.push(event);
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (err) {
                // Listener failures are logged, never propagated to the emitter
                log.warn(`Progress listener threw on ${event.type}:`, err);
            }
        }
        return event;
    }

    events(): readonly ProgressEvent[] {
        return this.history;
    }

    ofType<T extends ProgressEventType>(type: T): Array<Extract<ProgressEvent, { type: T }>> {
        return this.history.filter((e): e is Extract<ProgressEvent, { type: T }> => e.type === type);
    }
}
