/**
 * Consistency Validator
 *
 * Reconciles the metadata CSVs of a directory against the documents beside
 * them. Validation is exhaustive: every anomaly becomes a ValidationIssue and
 * nothing short-circuits. Reports are independent of filesystem enumeration
 * order.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { VALIDATION } from './constants.js';
import { mapMetadataFile, type SchemaOptions } from './metadata-schema.js';
import { readDirectoryListing, scanDirectories, type ListingOptions, type ScanOptions } from './directory-scanner.js';
import { FilesystemError, SafError, toError } from './errors.js';
import { Logger, compareStrings, throwIfAborted } from './utilities.js';
import type { ProgressStream } from './progress.js';
import type {
    DuplicateFilenameIssue,
    IssueKind,
    MetadataRow,
    ValidationIssue,
    ValidationReport
} from '../types.js';

const log = Logger.getLogger('consistency-validator');

// =============================================================================
// GATE POLICY
// =============================================================================

/** Which issue kinds block assembly. Orphans never block unless listed. */
export interface GatePolicy {
    blocking: readonly IssueKind[];
}

export const DEFAULT_GATE_POLICY: GatePolicy = {
    blocking: VALIDATION.BLOCKING_KINDS
};

export function blockingIssues(report: ValidationReport, policy: GatePolicy = DEFAULT_GATE_POLICY): ValidationIssue[] {
    return report.issues.filter(issue => policy.blocking.includes(issue.kind));
}

export function passesGate(report: ValidationReport, policy: GatePolicy = DEFAULT_GATE_POLICY): boolean {
    return blockingIssues(report, policy).length === 0;
}

// =============================================================================
// ORDERING
// =============================================================================

function issueFilename(issue: ValidationIssue): string {
    switch (issue.kind) {
        case 'missing-file':
        case 'duplicate-filename':
            return issue.filename;
        case 'orphan-file':
            return issue.path;
        case 'malformed-row':
            return '';
    }
}

function issueSource(issue: ValidationIssue): string {
    if (issue.kind === 'missing-file' || issue.kind === 'malformed-row') return issue.source;
    if (issue.kind === 'duplicate-filename') return issue.occurrences[0]?.source ?? '';
    return '';
}

function issueRow(issue: ValidationIssue): number {
    if (issue.kind === 'missing-file') return issue.rowIndex;
    if (issue.kind === 'malformed-row') return issue.rowIndex ?? -1;
    if (issue.kind === 'duplicate-filename') return issue.rowIndices[0] ?? -1;
    return -1;
}

/** Stable order: filename, then issue kind, then source CSV, then row. */
export function compareIssues(a: ValidationIssue, b: ValidationIssue): number {
    return compareStrings(issueFilename(a), issueFilename(b))
        || VALIDATION.KIND_ORDER[a.kind] - VALIDATION.KIND_ORDER[b.kind]
        || compareStrings(issueSource(a), issueSource(b))
        || issueRow(a) - issueRow(b);
}

// =============================================================================
// VALIDATE
// =============================================================================

export interface ValidateOptions extends ListingOptions, SchemaOptions {
    events?: ProgressStream;
    gate?: GatePolicy;
}

function emptyCounts(): Record<IssueKind, number> {
    return { 'missing-file': 0, 'orphan-file': 0, 'malformed-row': 0, 'duplicate-filename': 0 };
}

function findDuplicates(rows: MetadataRow[]): DuplicateFilenameIssue[] {
    const byName = new Map<string, MetadataRow[]>();
    for (const row of rows) {
        const list = byName.get(row.filename) ?? [];
        list.push(row);
        byName.set(row.filename, list);
    }
    const duplicates: DuplicateFilenameIssue[] = [];
    for (const [filename, list] of byName) {
        if (list.length < 2) continue;
        duplicates.push({
            kind: 'duplicate-filename',
            filename,
            rowIndices: list.map(r => r.rowIndex),
            occurrences: list.map(r => ({ source: r.source, rowIndex: r.rowIndex }))
        });
    }
    return duplicates;
}

/**
 * Validate one directory. Never throws on data anomalies; throws
 * FilesystemError/AccessDeniedError only when the directory itself cannot be read.
 */
export async function validate(directoryPath: string, options: ValidateOptions = {}): Promise<ValidationReport> {
    const directory = path.resolve(directoryPath);
    const listing = await readDirectoryListing(directory, options);

    const issues: ValidationIssue[] = [];
    const rows: MetadataRow[] = [];
    let totalRows = 0;
    let malformedRows = 0;

    // 1. Parse every metadata file
    for (const source of listing.metadataFiles) {
        const filePath = path.join(directory, source);
        let bytes: Uint8Array;
        try {
            bytes = await readFile(filePath);
        } catch (err) {
            issues.push({ kind: 'malformed-row', source, rowIndex: null, line: null, reason: `unreadable: ${toError(err).message}` });
            continue;
        }
        const mapped = mapMetadataFile(bytes, source, options);
        totalRows += mapped.totalRows;
        malformedRows += mapped.malformed.filter(m => m.rowIndex !== null).length;
        issues.push(...mapped.malformed);
        rows.push(...mapped.rows);
    }

    // 2. Documents present
    const documents = new Set(listing.documents);

    // 3. Missing and orphaned files; exact, case-sensitive names only
    const referenced = new Set<string>();
    let validRows = 0;
    for (const row of rows) {
        referenced.add(row.filename);
        if (documents.has(row.filename)) {
            validRows++;
        } else {
            issues.push({
                kind: 'missing-file',
                source: row.source,
                rowIndex: row.rowIndex,
                filename: row.filename,
                expectedPath: path.join(directory, row.filename)
            });
        }
    }
    for (const doc of listing.documents) {
        if (!referenced.has(doc)) issues.push({ kind: 'orphan-file', path: doc });
    }
    issues.push(...findDuplicates(rows));

    // 4. Order-stable report
    issues.sort(compareIssues);
    const byKind = emptyCounts();
    for (const issue of issues) byKind[issue.kind]++;

    const report: ValidationReport = {
        directory,
        metadataFiles: listing.metadataFiles,
        documents: listing.documents,
        issues,
        rows,
        counts: { totalRows, validRows, malformedRows, byKind }
    };

    const blocking = blockingIssues(report, options.gate).length;
    log.debug(`${directory}: ${issues.length} issue(s), ${blocking} blocking, ${validRows}/${totalRows} valid rows`);
    options.events?.emit({
        type: 'validation.completed',
        directory,
        issues: issues.length,
        blocking,
        validRows,
        totalRows
    });
    return report;
}

// =============================================================================
// TREE VALIDATION
// =============================================================================

export type DirectoryValidation =
    | { directory: string; relativePath: string; status: 'validated'; report: ValidationReport; passed: boolean }
    | { directory: string; relativePath: string; status: 'error'; error: SafError };

export interface TreeValidationReport {
    root: string;
    directories: DirectoryValidation[];
    totals: Record<IssueKind, number> & { directories: number; failed: number; errors: number };
}

/**
 * Scan root and validate every candidate directory. One directory's failure is
 * recorded and the walk continues.
 */
export async function validateTree(root: string, options: ValidateOptions & ScanOptions = {}): Promise<TreeValidationReport> {
    const directories: DirectoryValidation[] = [];
    const totals = { ...emptyCounts(), directories: 0, failed: 0, errors: 0 };

    for await (const entry of scanDirectories(root, options)) {
        throwIfAborted(options.signal);
        totals.directories++;
        if (entry.kind === 'access-denied') {
            directories.push({ directory: entry.directory, relativePath: entry.relativePath, status: 'error', error: entry.error });
            totals.errors++;
            continue;
        }
        try {
            const report = await validate(entry.directory, options);
            const passed = passesGate(report, options.gate);
            for (const issue of report.issues) totals[issue.kind]++;
            if (!passed) totals.failed++;
            directories.push({ directory: entry.directory, relativePath: entry.relativePath, status: 'validated', report, passed });
        } catch (err) {
            const error = err instanceof SafError
                ? err
                : new FilesystemError(entry.directory, toError(err).message, { cause: err });
            log.error(`Validation of ${entry.directory} failed:`, error.message);
            directories.push({ directory: entry.directory, relativePath: entry.relativePath, status: 'error', error });
            totals.errors++;
        }
        options.events?.emit({ type: 'batch.progress', phase: 'validate', processed: directories.length, total: directories.length });
    }

    return { root: path.resolve(root), directories, totals };
}
