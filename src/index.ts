export * from './types.js';
export * from './modules/errors.js';
export { Logger, LogLevel, parseLogLevel } from './modules/logger.js';
export type { LogLevelValue, ModuleLogger } from './modules/logger.js';
export { ProgressStream } from './modules/progress.js';
export type { ProgressEvent, ProgressEventBody, ProgressEventType, ProgressListener } from './modules/progress.js';
export { SCAN, VALIDATION, SAF, BATCH, UPLOAD, RETRY } from './modules/constants.js';
export { normalizeDocumentName, escapeXml, unescapeXml, containsXmlInvalidChars, Semaphore, runPool, systemClock } from './modules/utilities.js';
export type { Clock, PoolResult } from './modules/utilities.js';

export { parseCsv } from './modules/csv-parser.js';
export type { CsvRecord, ParsedCsv } from './modules/csv-parser.js';
export { parseColumnHeader, formatColumnHeader, mapMetadataFile } from './modules/metadata-schema.js';
export type { SchemaOptions, MappedMetadataFile } from './modules/metadata-schema.js';
export { scanDirectories, collectScan, readDirectoryListing } from './modules/directory-scanner.js';
export type { ScanEntry, ScanOptions, DirectoryListing } from './modules/directory-scanner.js';

export {
    validate,
    validateTree,
    blockingIssues,
    passesGate,
    compareIssues,
    DEFAULT_GATE_POLICY
} from './modules/consistency-validator.js';
export type { GatePolicy, ValidateOptions, TreeValidationReport, DirectoryValidation } from './modules/consistency-validator.js';

export { buildDescriptorXml, parseDescriptorXml, descriptorFileName } from './modules/dublin-core.js';
export {
    assemble,
    assembleBatch,
    readPackage,
    zipPackages,
    isCompletePackage,
    passedDuplicates,
    formatPackageId
} from './modules/package-assembler.js';
export type { AssembleOptions, BatchOptions, BatchOutcome, BatchReport } from './modules/package-assembler.js';

export { RetryPolicy, DEFAULT_RETRY_OPTIONS } from './modules/retry-policy.js';
export { SwiftObjectStore, fileSlice, readBody, bodySize } from './modules/object-store.js';
export type { ObjectStore, ObjectBody, FileSlice, ManifestSegment, SwiftObjectStoreOptions } from './modules/object-store.js';
export { FileSessionStore, MemorySessionStore } from './modules/session-store.js';
export type { SessionStore } from './modules/session-store.js';
export { UploadPipeline, segmentName, expectedSegmentSize, missingSegments } from './modules/upload-pipeline.js';
export type {
    ChunkResult,
    ChunkStatus,
    FinalizeResult,
    UploadPipelineOptions,
    UploadFileOptions,
    DirectoryUploadReport,
    FileUploadOutcome
} from './modules/upload-pipeline.js';
export { credentialsFromEnv, requireCredentials } from './modules/config.js';
