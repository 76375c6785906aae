/**
 * Application Constants
 *
 * Centralized configuration values for scanning, validation, package
 * assembly and upload. Operation options override these per call.
 */

// =============================================================================
// DIRECTORY SCANNING
// =============================================================================

export const SCAN = {
    METADATA_EXTENSIONS: ['.csv'],
    RECURSIVE: true,
    // Generated output is never treated as input
    SKIP_DIRECTORIES: ['SimpleArchiveFormat', 'node_modules']
} as const;

// =============================================================================
// VALIDATION
// =============================================================================

export const VALIDATION = {
    DOCUMENT_EXTENSIONS: ['.pdf'],
    FILENAME_COLUMN: 'filename',
    // Issue kinds that block assembly unless the gate policy says otherwise
    BLOCKING_KINDS: ['missing-file', 'malformed-row'],
    // Sort rank used after filename when ordering issues
    KIND_ORDER: {
        'malformed-row': 0,
        'duplicate-filename': 1,
        'missing-file': 2,
        'orphan-file': 3
    }
} as const;

// =============================================================================
// SIMPLE ARCHIVE FORMAT
// =============================================================================

export const SAF = {
    OUTPUT_DIR_NAME: 'SimpleArchiveFormat',
    DESCRIPTOR_FILE: 'dublin_core.xml',
    MANIFEST_FILE: 'manifest.json',
    // Read by the repository's item importer to find the item's files
    CONTENTS_FILE: 'contents',
    ID_PREFIX: 'item_',
    ID_START: 0,
    ID_PAD: 3,
    STAGING_PREFIX: '.',
    STAGING_SUFFIX: '.partial',
    DEFAULT_SCHEMA: 'dc',
    EXISTING_POLICY: 'skip',
    ZIP_LEVEL: 6,
    // Documents are already compressed; stored as-is in the zip
    ZIP_STORE_EXTENSIONS: ['pdf', 'jpg', 'jpeg', 'png', 'zip']
} as const;

// =============================================================================
// BATCH PROCESSING
// =============================================================================

export const BATCH = {
    ASSEMBLY_CONCURRENCY: 2
} as const;

// =============================================================================
// UPLOAD
// =============================================================================

const GiB = 1024 * 1024 * 1024;
const MiB = 1024 * 1024;

export const UPLOAD = {
    // Objects larger than this are split into segments
    SEGMENT_THRESHOLD: 5 * GiB,
    SEGMENT_SIZE: 4 * GiB + 500 * MiB,
    SEGMENT_INFIX: 'segment-',
    CONCURRENCY: 4,
    // Per attempt, large segments on slow links need the headroom
    CHUNK_TIMEOUT_MS: 4 * 60 * 60 * 1000,
    REQUEST_TIMEOUT_MS: 30 * 1000,
    DEFAULT_CONTAINER: 'saf-transfer'
} as const;

export const RETRY = {
    MAX_ATTEMPTS: 5,
    BASE_DELAY_MS: 1000,
    MAX_DELAY_MS: 30 * 1000,
    JITTER: 0.2
} as const;
