// ===== Union Types =====

export type IssueKind = 'missing-file' | 'orphan-file' | 'malformed-row' | 'duplicate-filename';
export type ExistingPackagePolicy = 'skip' | 'fail';
export type UploadMode = 'single' | 'segmented';
export type ResumeResolution = 'strict' | 'trust-remote';

// ===== CSV Schema =====

/** How a CSV column header is interpreted. */
export type FieldDescriptor =
    | { kind: 'filename'; column: string }
    | {
        kind: 'metadata';
        column: string;
        schema: string;
        element: string;
        qualifier: string | null;
        language: string | null;
    }
    | { kind: 'extension'; column: string };

/** One schema/element/qualifier/language/value tuple destined for a metadata descriptor. */
export interface MetadataValue {
    schema: string;
    element: string;
    qualifier: string | null;
    language: string | null;
    value: string;
}

/** A column the schema table does not recognize, carried through untouched. */
export interface ExtensionValue {
    column: string;
    value: string;
}

export interface MetadataRow {
    /** Name of the CSV file the row came from. */
    source: string;
    /** 0-based index among the data rows of its CSV. */
    rowIndex: number;
    /** 1-based line in the CSV where the row starts. */
    line: number;
    filename: string;
    /** Non-empty values keyed by column header, in column order. */
    fields: Record<string, string>;
    metadata: MetadataValue[];
    extensions: ExtensionValue[];
}

// ===== Validation =====

export interface MissingFileIssue {
    kind: 'missing-file';
    source: string;
    rowIndex: number;
    filename: string;
    expectedPath: string;
}

export interface OrphanFileIssue {
    kind: 'orphan-file';
    path: string;
}

export interface MalformedRowIssue {
    kind: 'malformed-row';
    source: string;
    /** null when the whole file is unusable (empty, or no data rows and no filename column). */
    rowIndex: number | null;
    line: number | null;
    reason: string;
}

export interface DuplicateFilenameIssue {
    kind: 'duplicate-filename';
    filename: string;
    rowIndices: number[];
    occurrences: Array<{ source: string; rowIndex: number }>;
}

export type ValidationIssue = MissingFileIssue | OrphanFileIssue | MalformedRowIssue | DuplicateFilenameIssue;

export interface ValidationCounts {
    totalRows: number;
    validRows: number;
    malformedRows: number;
    byKind: Record<IssueKind, number>;
}

export interface ValidationReport {
    directory: string;
    metadataFiles: string[];
    documents: string[];
    issues: ValidationIssue[];
    /** Well-formed rows, in CSV order. */
    rows: MetadataRow[];
    counts: ValidationCounts;
}

// ===== Packages =====

export interface PackageDescriptor {
    id: string;
    sequence: number;
    /** Absolute path of the package directory. */
    directory: string;
    /** Absolute path of the document the row referenced. */
    sourceDocument: string;
    sourceFilename: string;
    /** Name of the copied document inside the package. */
    documentName: string;
    fields: MetadataValue[];
    extensions: ExtensionValue[];
}

export interface PackageManifest {
    package_id: string;
    /** Relative names in fixed order: metadata descriptor, then document. */
    files: string[];
    source_filename: string;
    /** Absolute path the document was copied from. */
    source_document: string;
    extension_fields: ExtensionValue[];
    integrity: {
        algorithm: 'SHA-256';
        assets: Record<string, string>;
    };
    _creation_date: string;
}

// ===== Upload =====

export interface Credentials {
    /** Storage URL of the account, e.g. https://swift.example.org/v1/AUTH_project */
    endpoint: string;
    project: string;
    token: string;
}

export interface CommittedSegment {
    index: number;
    etag: string;
    size: number;
}

export interface UploadSession {
    id: string;
    container: string;
    objectKey: string;
    sizeBytes: number;
    chunkSize: number;
    segmentCount: number;
    mode: UploadMode;
    /** Sorted by index. */
    committed: CommittedSegment[];
    /** Highest index i such that every segment in [0, i] is committed; -1 when none. */
    highestContiguous: number;
    manifestCommitted: boolean;
    createdAt: string;
    updatedAt: string;
}

export interface RemoteObject {
    name: string;
    bytes: number;
    etag: string;
}

export interface RetryPolicyOptions {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction of the computed delay that is randomized, 0 to 1. */
    jitter: number;
}
