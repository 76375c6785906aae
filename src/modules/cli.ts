/**
 * Command-line front end.
 *
 *   saf-packager validate <dir> [--flat] [--block <kind,...>]
 *   saf-packager build <dir> --output <dir> [--zip] [--concurrency <n>] [--existing skip|fail]
 *   saf-packager upload <dir> [--container <name>] [--state-dir <dir>] [--trust-remote]
 *   saf-packager auth
 *
 * Global flags: --verbose, --quiet, --help.
 * Exit codes: 0 success, 1 partial success or validation failures, 2 usage, 3 fatal.
 */

import path from 'node:path';
import { BATCH, SAF } from './constants.js';
import { validateTree, DEFAULT_GATE_POLICY, type GatePolicy } from './consistency-validator.js';
import { assembleBatch } from './package-assembler.js';
import { UploadPipeline } from './upload-pipeline.js';
import { FileSessionStore } from './session-store.js';
import { credentialsFromEnv, containerFromEnv, type Environment } from './config.js';
import { ProgressStream, type ProgressEvent } from './progress.js';
import { SafError, toError } from './errors.js';
import { Logger, formatFileSize } from './utilities.js';
import type { ExistingPackagePolicy, IssueKind, ValidationIssue } from '../types.js';

const log = Logger.getLogger('cli');

export const EXIT = {
    OK: 0,
    PARTIAL: 1,
    USAGE: 2,
    FATAL: 3
} as const;

export type ExitCode = typeof EXIT[keyof typeof EXIT];

export const USAGE = `Usage:
  saf-packager validate <dir> [--flat] [--block <kind,...>]
  saf-packager build <dir> --output <dir> [--zip] [--concurrency <n>] [--existing skip|fail]
  saf-packager upload <dir> [--container <name>] [--state-dir <dir>] [--trust-remote]
  saf-packager auth

Flags:
  --verbose        debug logging
  --quiet          warnings and errors only
  --help           show this message

Credentials are read from SAF_STORAGE_URL (or OS_STORAGE_URL), OS_PROJECT_NAME and OS_AUTH_TOKEN.`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export interface ParsedArgs {
    command: string | null;
    positionals: string[];
    flags: Record<string, string | true>;
}

const VALUE_FLAGS = new Set(['output', 'concurrency', 'existing', 'container', 'state-dir', 'block']);
const BOOLEAN_FLAGS = new Set(['zip', 'flat', 'trust-remote', 'verbose', 'quiet', 'help']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Record<string, string | true> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '-h') {
            flags.help = true;
            continue;
        }
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
        if (BOOLEAN_FLAGS.has(name)) {
            if (eq !== -1) throw new UsageError(`--${name} takes no value`);
            flags[name] = true;
        } else if (VALUE_FLAGS.has(name)) {
            const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
            if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
                throw new UsageError(`--${name} needs a value`);
            }
            flags[name] = value;
        } else {
            throw new UsageError(`Unknown flag --${name}`);
        }
    }

    return { command: positionals.shift() ?? null, positionals, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
    const value = args.flags[name];
    return typeof value === 'string' ? value : undefined;
}

function requireDirectory(args: ParsedArgs): string {
    const [dir, ...extra] = args.positionals;
    if (!dir) throw new UsageError(`${args.command} needs a directory`);
    if (extra.length > 0) throw new UsageError(`Unexpected argument '${extra[0]}'`);
    return dir;
}

const ISSUE_KINDS: readonly IssueKind[] = ['missing-file', 'orphan-file', 'malformed-row', 'duplicate-filename'];

function isIssueKind(value: string): value is IssueKind {
    return ISSUE_KINDS.some(kind => kind === value);
}

export function parseGatePolicy(value: string | undefined): GatePolicy {
    if (value === undefined) return DEFAULT_GATE_POLICY;
    const kinds = value.split(',').map(k => k.trim()).filter(Boolean);
    const blocking: IssueKind[] = [];
    for (const kind of kinds) {
        if (!isIssueKind(kind)) throw new UsageError(`Unknown issue kind '${kind}' (expected one of ${ISSUE_KINDS.join(', ')})`);
        blocking.push(kind);
    }
    return { blocking };
}

function parseExisting(value: string | undefined): ExistingPackagePolicy {
    if (value === undefined) return SAF.EXISTING_POLICY;
    if (value === 'skip' || value === 'fail') return value;
    throw new UsageError(`--existing must be 'skip' or 'fail', got '${value}'`);
}

function parseConcurrency(value: string | undefined): number {
    if (value === undefined) return BATCH.ASSEMBLY_CONCURRENCY;
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new UsageError(`--concurrency must be a positive integer, got '${value}'`);
    return n;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function describeIssue(issue: ValidationIssue): string {
    switch (issue.kind) {
        case 'missing-file':
            return `missing file: ${issue.filename} (${issue.source} row ${issue.rowIndex})`;
        case 'orphan-file':
            return `orphan file: ${issue.path}`;
        case 'malformed-row':
            return issue.rowIndex === null
                ? `malformed: ${issue.source}: ${issue.reason}`
                : `malformed row: ${issue.source} row ${issue.rowIndex}: ${issue.reason}`;
        case 'duplicate-filename':
            return `duplicate filename: ${issue.filename} (rows ${issue.rowIndices.join(', ')})`;
    }
}

function logEvent(event: ProgressEvent): void {
    switch (event.type) {
        case 'assembly.completed':
            log.info(`${event.directory}: ${event.written} package(s) written, ${event.skipped} skipped`);
            break;
        case 'upload.file':
            log.info(`${event.status}: ${event.objectKey} (${formatFileSize(event.sizeBytes)})`);
            break;
        case 'upload.container-created':
            log.info(`Created container ${event.container}`);
            break;
        case 'batch.progress':
            log.debug(`${event.phase}: ${event.processed}/${event.total}`);
            break;
        default:
            break;
    }
}

// =============================================================================
// COMMANDS
// =============================================================================

export interface RunContext {
    env?: Environment;
    signal?: AbortSignal;
    /** Where results are printed. Default: console.log */
    print?: (line: string) => void;
    cwd?: string;
}

type CommandContext = Required<Omit<RunContext, 'signal'>> & Pick<RunContext, 'signal'>;

async function runValidate(args: ParsedArgs, ctx: CommandContext, events: ProgressStream): Promise<ExitCode> {
    const dir = requireDirectory(args);
    const gate = parseGatePolicy(stringFlag(args, 'block'));
    const report = await validateTree(path.resolve(ctx.cwd, dir), {
        recursive: args.flags.flat !== true,
        gate,
        events,
        signal: ctx.signal
    });

    for (const entry of report.directories) {
        if (entry.status === 'error') {
            ctx.print(`${entry.relativePath}: ERROR ${entry.error.message}`);
            continue;
        }
        const { counts } = entry.report;
        ctx.print(`${entry.relativePath}: ${entry.passed ? 'OK' : 'FAILED'} (${counts.validRows}/${counts.totalRows} valid rows, ${entry.report.issues.length} issue(s))`);
        for (const issue of entry.report.issues) {
            ctx.print(`  ${describeIssue(issue)}`);
        }
    }
    const { totals } = report;
    ctx.print(`${totals.directories} director${totals.directories === 1 ? 'y' : 'ies'}, ${totals.failed} failed, ${totals.errors} unreadable`);
    return totals.failed > 0 || totals.errors > 0 ? EXIT.PARTIAL : EXIT.OK;
}

async function runBuild(args: ParsedArgs, ctx: CommandContext, events: ProgressStream): Promise<ExitCode> {
    const dir = requireDirectory(args);
    const output = stringFlag(args, 'output');
    if (!output) throw new UsageError('build needs --output <dir>');

    const report = await assembleBatch(path.resolve(ctx.cwd, dir), path.resolve(ctx.cwd, output), {
        recursive: args.flags.flat !== true,
        zip: args.flags.zip === true,
        concurrency: parseConcurrency(stringFlag(args, 'concurrency')),
        existing: parseExisting(stringFlag(args, 'existing')),
        gate: parseGatePolicy(stringFlag(args, 'block')),
        events,
        signal: ctx.signal
    });

    for (const outcome of report.outcomes) {
        switch (outcome.status) {
            case 'assembled':
                ctx.print(`${outcome.relativePath}: ${outcome.packages.length} package(s) in ${outcome.outputPath}${outcome.zipPath ? ` (${outcome.zipPath})` : ''}`);
                for (const issue of outcome.duplicates) ctx.print(`  warning: ${describeIssue(issue)}, one package per row`);
                break;
            case 'gate-failed':
                ctx.print(`${outcome.relativePath}: refused, ${outcome.error.blocking.length} blocking issue(s)`);
                for (const issue of outcome.error.blocking) ctx.print(`  ${describeIssue(issue)}`);
                break;
            case 'failed':
                ctx.print(`${outcome.relativePath}: FAILED ${outcome.error.message}`);
                break;
            case 'cancelled':
                ctx.print(`${outcome.relativePath}: cancelled`);
                break;
        }
    }
    ctx.print(`${report.assembled} assembled, ${report.gateFailed} refused, ${report.failed} failed, ${report.cancelled} cancelled`);
    return report.assembled === report.outcomes.length ? EXIT.OK : EXIT.PARTIAL;
}

async function runUpload(args: ParsedArgs, ctx: CommandContext, events: ProgressStream): Promise<ExitCode> {
    const dir = requireDirectory(args);
    const container = stringFlag(args, 'container') ?? containerFromEnv(ctx.env);
    const stateDir = path.resolve(ctx.cwd, stringFlag(args, 'state-dir') ?? '.saf-sessions');

    const pipeline = UploadPipeline.connect(credentialsFromEnv(ctx.env), {
        sessions: new FileSessionStore(stateDir),
        events
    });
    const report = await pipeline.uploadDirectory(path.resolve(ctx.cwd, dir), container, {
        signal: ctx.signal,
        resolution: args.flags['trust-remote'] === true ? 'trust-remote' : 'strict'
    });

    for (const file of report.files) {
        if (file.status === 'failed') ctx.print(`FAILED ${file.objectKey}: ${file.error.message}`);
    }
    ctx.print(`${report.uploaded}/${report.total} file(s) uploaded to ${container}, ${report.failed} failed, ${report.cancelled} cancelled`);
    return report.uploaded === report.total ? EXIT.OK : EXIT.PARTIAL;
}

async function runAuth(ctx: CommandContext): Promise<ExitCode> {
    const pipeline = UploadPipeline.connect(credentialsFromEnv(ctx.env));
    await pipeline.verifyCredentials({ signal: ctx.signal });
    ctx.print('Credentials accepted');
    return EXIT.OK;
}

/** Run one command line; never throws. */
export async function run(argv: readonly string[], context: RunContext = {}): Promise<ExitCode> {
    const ctx: CommandContext = {
        env: context.env ?? process.env,
        print: context.print ?? ((line: string) => console.log(line)),
        cwd: context.cwd ?? process.cwd(),
        signal: context.signal
    };

    let args: ParsedArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        ctx.print(`${toError(err).message}\n\n${USAGE}`);
        return EXIT.USAGE;
    }

    if (args.flags.verbose) Logger.setLevel('debug');
    if (args.flags.quiet) Logger.setLevel('warn');
    if (args.flags.help || args.command === null || args.command === 'help') {
        ctx.print(USAGE);
        return args.command === null && !args.flags.help ? EXIT.USAGE : EXIT.OK;
    }

    const events = new ProgressStream();
    const unsubscribe = events.subscribe(logEvent);
    try {
        switch (args.command) {
            case 'validate':
                return await runValidate(args, ctx, events);
            case 'build':
                return await runBuild(args, ctx, events);
            case 'upload':
                return await runUpload(args, ctx, events);
            case 'auth':
                return await runAuth(ctx);
            default:
                throw new UsageError(`Unknown command '${args.command}'`);
        }
    } catch (err) {
        if (err instanceof UsageError) {
            ctx.print(`${err.message}\n\n${USAGE}`);
            return EXIT.USAGE;
        }
        const error = toError(err);
        const code = err instanceof SafError ? ` [${err.code}]` : '';
        log.error(`${error.message}${code}`);
        ctx.print(`Error: ${error.message}`);
        return EXIT.FATAL;
    } finally {
        unsubscribe();
    }
}
