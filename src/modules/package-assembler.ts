/**
 * Package Assembler
 *
 * Turns a validated directory into Simple Archive Format packages:
 *
 *   <output>/
 *     item_000/
 *       dublin_core.xml
 *       <normalized document name>
 *       contents
 *       manifest.json
 *     item_001/
 *       ...
 *
 * Each package is written into a hidden staging directory and renamed into
 * place once complete, so a package directory is either fully formed or absent.
 */

import { copyFile, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { Zip, ZipDeflate, ZipPassThrough, type DeflateOptions } from 'fflate';
import { BATCH, SAF } from './constants.js';
import { validate, blockingIssues, type ValidateOptions } from './consistency-validator.js';
import { buildDescriptorXml, descriptorFileName, groupBySchema, parseDescriptorXml } from './dublin-core.js';
import { collectScan, type ScanOptions } from './directory-scanner.js';
import {
    AssemblyInterruptedError,
    CancelledError,
    FilesystemError,
    PackageAlreadyExistsError,
    SafError,
    ValidationGateError,
    isNodeError,
    toError
} from './errors.js';
import { Logger, compareStrings, hashFile, normalizeDocumentName, runPool, throwIfAborted } from './utilities.js';
import type {
    DuplicateFilenameIssue,
    ExistingPackagePolicy,
    MetadataRow,
    MetadataValue,
    PackageDescriptor,
    PackageManifest,
    ValidationReport
} from '../types.js';

const log = Logger.getLogger('package-assembler');

// =============================================================================
// MANIFEST
// =============================================================================

const manifestSchema = z.object({
    package_id: z.string().min(1),
    files: z.array(z.string().min(1)).min(2),
    source_filename: z.string(),
    source_document: z.string(),
    extension_fields: z.array(z.object({ column: z.string(), value: z.string() })),
    integrity: z.object({
        algorithm: z.literal('SHA-256'),
        assets: z.record(z.string())
    }),
    _creation_date: z.string()
});

async function readManifest(packageDir: string): Promise<PackageManifest> {
    const manifestPath = path.join(packageDir, SAF.MANIFEST_FILE);
    const raw = await readFile(manifestPath, 'utf-8');
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new FilesystemError(manifestPath, `Manifest is not valid JSON: ${toError(err).message}`, { cause: err });
    }
    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) {
        throw new FilesystemError(manifestPath, `Manifest is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
}

/**
 * A package counts as fully formed when its manifest parses and every file it
 * lists is present with the recorded SHA-256.
 */
export async function isCompletePackage(packageDir: string): Promise<boolean> {
    let manifest: PackageManifest;
    try {
        manifest = await readManifest(packageDir);
    } catch (err) {
        log.debug(`No usable manifest in ${packageDir}:`, toError(err).message);
        return false;
    }
    for (const file of manifest.files) {
        const expected = manifest.integrity.assets[file];
        if (!expected) return false;
        try {
            if (await hashFile(path.join(packageDir, file)) !== expected) return false;
        } catch (err) {
            log.debug(`Cannot hash ${file} in ${packageDir}:`, toError(err).message);
            return false;
        }
    }
    return true;
}

// =============================================================================
// ASSEMBLE
// =============================================================================

export interface AssembleOptions extends ValidateOptions {
    /** What to do when a target package directory already exists. Default: 'skip' */
    existing?: ExistingPackagePolicy;
    idPrefix?: string;
    idStart?: number;
    idPad?: number;
    signal?: AbortSignal;
    /** Reuse a report from an earlier validate() of the same directory. */
    report?: ValidationReport;
}

/** Duplicate filenames of a report; after a passed gate these are non-blocking. */
export function passedDuplicates(report: ValidationReport): DuplicateFilenameIssue[] {
    return report.issues.filter((issue): issue is DuplicateFilenameIssue => issue.kind === 'duplicate-filename');
}

export function formatPackageId(sequence: number, prefix: string = SAF.ID_PREFIX, pad: number = SAF.ID_PAD): string {
    return prefix + String(sequence).padStart(pad, '0');
}

function documentNameFor(filename: string): string {
    const name = normalizeDocumentName(filename);
    const reserved = name === SAF.MANIFEST_FILE
        || name === SAF.DESCRIPTOR_FILE
        || name === SAF.CONTENTS_FILE
        || /^metadata_.*\.xml$/.test(name);
    return reserved ? `document_${name}` : name;
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await stat(target);
        return true;
    } catch (err) {
        if (isNodeError(err) && err.code === 'ENOENT') return false;
        throw new FilesystemError(target, `Cannot stat ${target}: ${toError(err).message}`, { cause: err });
    }
}

function freezeDescriptor(descriptor: PackageDescriptor): PackageDescriptor {
    descriptor.fields.forEach(f => Object.freeze(f));
    descriptor.extensions.forEach(e => Object.freeze(e));
    Object.freeze(descriptor.fields);
    Object.freeze(descriptor.extensions);
    return Object.freeze(descriptor);
}

function fieldKey(field: MetadataValue): string {
    return JSON.stringify([field.schema, field.element, field.qualifier, field.language, field.value]);
}

/**
 * Compare a complete package on disk with the row now assigned its id.
 * Returns a description of the first difference, or null when they agree.
 */
async function describeMismatch(descriptor: PackageDescriptor): Promise<string | null> {
    const manifest = await readManifest(descriptor.directory);
    if (manifest.source_filename !== descriptor.sourceFilename) {
        return `built from ${manifest.source_filename}, row names ${descriptor.sourceFilename}`;
    }
    const existing = await readPackage(descriptor.directory);
    if (existing.documentName !== descriptor.documentName) {
        return `document is ${existing.documentName}, expected ${descriptor.documentName}`;
    }
    // Descriptor files hold values grouped by schema
    const expectedFields = groupBySchema(descriptor.fields).flatMap(([, fields]) => fields).map(fieldKey);
    const actualFields = existing.fields.map(fieldKey);
    if (JSON.stringify(actualFields) !== JSON.stringify(expectedFields)) {
        return 'metadata values differ';
    }
    if (JSON.stringify(existing.extensions) !== JSON.stringify(descriptor.extensions)) {
        return 'extension fields differ';
    }
    if (manifest.integrity.assets[descriptor.documentName] !== await hashFile(descriptor.sourceDocument)) {
        return `${descriptor.sourceFilename} has changed since it was packaged`;
    }
    return null;
}

async function writePackage(descriptor: PackageDescriptor, stagingDir: string): Promise<void> {
    await mkdir(stagingDir);

    const files: string[] = [];
    for (const [schema, fields] of groupBySchema(descriptor.fields)) {
        const name = descriptorFileName(schema);
        await writeFile(path.join(stagingDir, name), buildDescriptorXml(schema, fields), 'utf-8');
        files.push(name);
    }
    // A row with no structured values still gets an (empty) dublin_core.xml
    if (!files.includes(SAF.DESCRIPTOR_FILE)) {
        await writeFile(path.join(stagingDir, SAF.DESCRIPTOR_FILE), buildDescriptorXml(SAF.DEFAULT_SCHEMA, []), 'utf-8');
        files.unshift(SAF.DESCRIPTOR_FILE);
    }

    await copyFile(descriptor.sourceDocument, path.join(stagingDir, descriptor.documentName), fsConstants.COPYFILE_EXCL);
    files.push(descriptor.documentName);

    await writeFile(path.join(stagingDir, SAF.CONTENTS_FILE), `${descriptor.documentName}\n`, { encoding: 'utf-8', flag: 'wx' });
    files.push(SAF.CONTENTS_FILE);

    const assets: Record<string, string> = {};
    for (const file of files) {
        assets[file] = await hashFile(path.join(stagingDir, file));
    }

    const manifest: PackageManifest = {
        package_id: descriptor.id,
        files,
        source_filename: descriptor.sourceFilename,
        source_document: descriptor.sourceDocument,
        extension_fields: descriptor.extensions,
        integrity: { algorithm: 'SHA-256', assets },
        _creation_date: new Date().toISOString()
    };
    await writeFile(path.join(stagingDir, SAF.MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', { encoding: 'utf-8', flag: 'wx' });

    await rename(stagingDir, descriptor.directory);
}

/**
 * Validate directoryPath and, if the gate passes, write one package per valid
 * row into outputPath. Returns the descriptors of every package present for
 * those rows afterwards, written now or skipped as already complete. A package
 * is only skipped when it was built from the same document and values as the
 * row that now maps to its id.
 *
 * Throws ValidationGateError (before any write), PackageAlreadyExistsError,
 * CancelledError, or AssemblyInterruptedError carrying the packages finished
 * before a filesystem failure.
 */
export async function assemble(directoryPath: string, outputPath: string, options: AssembleOptions = {}): Promise<PackageDescriptor[]> {
    const directory = path.resolve(directoryPath);
    const output = path.resolve(outputPath);
    const policy = options.existing ?? SAF.EXISTING_POLICY;
    const idStart = options.idStart ?? SAF.ID_START;

    throwIfAborted(options.signal);
    const report = options.report ?? await validate(directory, options);
    const blocking = blockingIssues(report, options.gate);
    if (blocking.length > 0) {
        throw new ValidationGateError(directory, blocking);
    }

    for (const duplicate of passedDuplicates(report)) {
        log.warn(`${directory}: ${duplicate.filename} is listed in rows ${duplicate.rowIndices.join(', ')}; each row gets its own package`);
    }

    const documents = new Set(report.documents);
    const rows: MetadataRow[] = report.rows.filter(row => documents.has(row.filename));

    log.info(`Assembling ${rows.length} package(s) from ${directory} into ${output}`);
    options.events?.emit({ type: 'assembly.started', directory, rows: rows.length });

    try {
        await mkdir(output, { recursive: true });
    } catch (err) {
        throw new FilesystemError(output, `Cannot create output directory ${output}: ${toError(err).message}`, { cause: err });
    }

    const completed: PackageDescriptor[] = [];
    let written = 0;
    let skipped = 0;

    for (const [k, row] of rows.entries()) {
        throwIfAborted(options.signal);

        const sequence = idStart + k;
        const id = formatPackageId(sequence, options.idPrefix, options.idPad);
        const descriptor: PackageDescriptor = {
            id,
            sequence,
            directory: path.join(output, id),
            sourceDocument: path.join(directory, row.filename),
            sourceFilename: row.filename,
            documentName: documentNameFor(row.filename),
            fields: row.metadata.map(f => ({ ...f })),
            extensions: row.extensions.map(e => ({ ...e }))
        };

        try {
            if (await pathExists(descriptor.directory)) {
                if (policy === 'fail') {
                    throw new PackageAlreadyExistsError(descriptor.directory, false);
                }
                if (!(await isCompletePackage(descriptor.directory))) {
                    throw new PackageAlreadyExistsError(descriptor.directory, true);
                }
                const mismatch = await describeMismatch(descriptor);
                if (mismatch) {
                    throw new PackageAlreadyExistsError(descriptor.directory, false, mismatch);
                }
                log.debug(`Skipping complete package ${id}`);
                completed.push(freezeDescriptor(descriptor));
                skipped++;
                options.events?.emit({ type: 'assembly.package', directory, packageId: id, filename: row.filename, status: 'skipped' });
                continue;
            }

            const stagingDir = path.join(output, `${SAF.STAGING_PREFIX}${id}${SAF.STAGING_SUFFIX}`);
            // Leftover staging from an interrupted run never became a package
            await rm(stagingDir, { recursive: true, force: true });
            try {
                await writePackage(descriptor, stagingDir);
            } catch (err) {
                await rm(stagingDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
                    log.warn(`Could not remove staging directory ${stagingDir}:`, toError(cleanupErr).message);
                });
                throw new FilesystemError(stagingDir, `Failed to write package ${id}: ${toError(err).message}`, { cause: err });
            }
        } catch (err) {
            if (err instanceof PackageAlreadyExistsError) throw err;
            log.error(`Assembly of ${directory} stopped at ${id}:`, toError(err).message);
            throw new AssemblyInterruptedError([...completed], err);
        }

        completed.push(freezeDescriptor(descriptor));
        written++;
        options.events?.emit({ type: 'assembly.package', directory, packageId: id, filename: row.filename, status: 'written' });
    }

    log.info(`${directory}: ${written} written, ${skipped} skipped`);
    options.events?.emit({ type: 'assembly.completed', directory, written, skipped });
    return completed;
}

// =============================================================================
// READ BACK
// =============================================================================

/**
 * Read a package directory back into its descriptor.
 * Reproduces the structured fields, extension fields and document reference of
 * the row it was built from.
 */
export async function readPackage(packageDir: string): Promise<PackageDescriptor> {
    const directory = path.resolve(packageDir);
    let manifest: PackageManifest;
    try {
        manifest = await readManifest(directory);
    } catch (err) {
        if (err instanceof SafError) throw err;
        throw new FilesystemError(directory, `Cannot read package ${directory}: ${toError(err).message}`, { cause: err });
    }

    const descriptorFiles = manifest.files.filter(f => f === SAF.DESCRIPTOR_FILE || /^metadata_.*\.xml$/.test(f));
    const documentName = manifest.files.find(f => !descriptorFiles.includes(f) && f !== SAF.CONTENTS_FILE);
    if (!documentName) {
        throw new FilesystemError(directory, `Package ${manifest.package_id} lists no document`);
    }

    const fields: MetadataValue[] = [];
    for (const file of descriptorFiles) {
        const xml = await readFile(path.join(directory, file), 'utf-8');
        try {
            fields.push(...parseDescriptorXml(xml));
        } catch (err) {
            throw new FilesystemError(path.join(directory, file), toError(err).message, { cause: err });
        }
    }

    const trailing = /(\d+)$/.exec(manifest.package_id);
    return freezeDescriptor({
        id: manifest.package_id,
        sequence: trailing ? parseInt(trailing[1], 10) : -1,
        directory,
        sourceDocument: manifest.source_document,
        sourceFilename: manifest.source_filename,
        documentName,
        fields,
        extensions: manifest.extension_fields.map(e => ({ ...e }))
    });
}

// =============================================================================
// ZIP
// =============================================================================

async function listFiles(root: string, relative = ''): Promise<string[]> {
    const entries = await readdir(path.join(root, relative), { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries.sort((a, b) => compareStrings(a.name, b.name))) {
        if (entry.name.startsWith('.')) continue;
        const rel = relative ? `${relative}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            files.push(...await listFiles(root, rel));
        } else if (entry.isFile()) {
            files.push(rel);
        }
    }
    return files;
}

/**
 * Zip an output directory to `<outputPath>.zip`. Entries are rooted at the
 * output directory's own name. Returns the zip path.
 */
export async function zipPackages(outputPath: string, options: { level?: DeflateOptions['level'] } = {}): Promise<string> {
    const root = path.resolve(outputPath);
    const zipPath = `${root}.zip`;
    const rootName = path.basename(root);
    const level = options.level ?? SAF.ZIP_LEVEL;
    const files = await listFiles(root);

    const chunks: Uint8Array[] = [];
    const zipErrors: Error[] = [];
    const zipStream = new Zip((err, chunk) => {
        if (err) {
            zipErrors.push(err);
            return;
        }
        chunks.push(chunk);
    });

    for (const file of files) {
        const ext = file.split('.').pop()?.toLowerCase() ?? '';
        const stored = SAF.ZIP_STORE_EXTENSIONS.some(e => e === ext);
        const entryName = `${rootName}/${file}`;
        const entry = stored ? new ZipPassThrough(entryName) : new ZipDeflate(entryName, { level });
        zipStream.add(entry);
        entry.push(await readFile(path.join(root, file)), true);
    }
    zipStream.end();
    if (zipErrors.length > 0) throw new FilesystemError(zipPath, `Zip failed: ${zipErrors[0].message}`, { cause: zipErrors[0] });

    let totalLen = 0;
    for (const c of chunks) totalLen += c.length;
    const zipResult = new Uint8Array(totalLen);
    let offset = 0;
    for (const c of chunks) {
        zipResult.set(c, offset);
        offset += c.length;
    }

    await writeFile(zipPath, zipResult);
    log.info(`Wrote ${zipPath} (${files.length} file(s))`);
    return zipPath;
}

// =============================================================================
// BATCH
// =============================================================================

export interface BatchOptions extends AssembleOptions, ScanOptions {
    /** Directories assembled at once. Default: BATCH.ASSEMBLY_CONCURRENCY */
    concurrency?: number;
    /** Also write `<output>.zip` for every assembled directory. */
    zip?: boolean;
}

interface BatchEntryBase {
    directory: string;
    relativePath: string;
    outputPath: string;
}

export type BatchOutcome =
    | (BatchEntryBase & {
        status: 'assembled';
        packages: PackageDescriptor[];
        zipPath: string | null;
        /** Filenames listed more than once that did not block the directory. */
        duplicates: DuplicateFilenameIssue[];
    })
    | (BatchEntryBase & { status: 'gate-failed'; error: ValidationGateError })
    | (BatchEntryBase & { status: 'failed'; error: SafError })
    | (BatchEntryBase & { status: 'cancelled' });

export interface BatchReport {
    root: string;
    outputRoot: string;
    outcomes: BatchOutcome[];
    assembled: number;
    gateFailed: number;
    failed: number;
    cancelled: number;
}

/**
 * Scan root and assemble every candidate directory with a bounded worker pool.
 * Each directory goes to `<outputRoot>/<relative dir>/SimpleArchiveFormat`.
 * One directory's failure never stops the others; cancellation stops new
 * directories from starting.
 */
export async function assembleBatch(root: string, outputRoot: string, options: BatchOptions = {}): Promise<BatchReport> {
    const base = path.resolve(root);
    const outBase = path.resolve(outputRoot);
    const entries = await collectScan(base, options);
    const total = entries.length;
    let processed = 0;

    const outputFor = (relativePath: string) => path.join(outBase, relativePath === '.' ? '' : relativePath, SAF.OUTPUT_DIR_NAME);

    const results = await runPool(entries, options.concurrency ?? BATCH.ASSEMBLY_CONCURRENCY, async (entry): Promise<BatchOutcome> => {
        const common: BatchEntryBase = {
            directory: entry.directory,
            relativePath: entry.relativePath,
            outputPath: outputFor(entry.relativePath)
        };
        try {
            if (entry.kind === 'access-denied') {
                return { ...common, status: 'failed', error: entry.error };
            }
            // Each worker gets its own validation pass and id sequence
            const report = await validate(entry.directory, options);
            const packages = await assemble(entry.directory, common.outputPath, { ...options, report });
            const zipPath = options.zip && packages.length > 0 ? await zipPackages(common.outputPath) : null;
            return { ...common, status: 'assembled', packages, zipPath, duplicates: passedDuplicates(report) };
        } catch (err) {
            if (err instanceof ValidationGateError) {
                log.warn(err.message);
                return { ...common, status: 'gate-failed', error: err };
            }
            if (err instanceof CancelledError) {
                return { ...common, status: 'cancelled' };
            }
            const error = err instanceof SafError
                ? err
                : new FilesystemError(entry.directory, toError(err).message, { cause: err });
            log.error(`Directory ${entry.relativePath} failed:`, error.message);
            options.events?.emit({ type: 'assembly.failed', directory: entry.directory, code: error.code, message: error.message });
            return { ...common, status: 'failed', error };
        } finally {
            processed++;
            options.events?.emit({ type: 'batch.progress', phase: 'assemble', processed, total });
        }
    }, { signal: options.signal });

    const outcomes = results.map((result, i): BatchOutcome => {
        const entry = entries[i];
        const common = { directory: entry.directory, relativePath: entry.relativePath, outputPath: outputFor(entry.relativePath) };
        if (result.status === 'fulfilled') return result.value;
        if (result.status === 'skipped') return { ...common, status: 'cancelled' };
        const error = result.reason instanceof SafError
            ? result.reason
            : new FilesystemError(entry.directory, toError(result.reason).message, { cause: result.reason });
        return { ...common, status: 'failed', error };
    });

    const count = (status: BatchOutcome['status']) => outcomes.filter(o => o.status === status).length;
    return {
        root: base,
        outputRoot: outBase,
        outcomes,
        assembled: count('assembled'),
        gateFailed: count('gate-failed'),
        failed: count('failed'),
        cancelled: count('cancelled')
    };
}
