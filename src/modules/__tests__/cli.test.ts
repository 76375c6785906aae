import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import path from 'node:path';
import { EXIT, USAGE, UsageError, describeIssue, parseArgs, parseGatePolicy, run } from '../cli.js';
import { Logger } from '../logger.js';
import { makeTempDir, removeDir, writeTree } from './test-helpers.js';

describe('parseArgs', () => {
    it('splits command, positionals and flags', () => {
        expect(parseArgs(['build', 'in', '--output', 'out', '--zip', '--concurrency=3'])).toEqual({
            command: 'build',
            positionals: ['in'],
            flags: { output: 'out', zip: true, concurrency: '3' }
        });
    });

    it('treats -h as --help', () => {
        expect(parseArgs(['-h']).flags).toEqual({ help: true });
        expect(parseArgs([]).command).toBeNull();
    });

    it('rejects unknown flags and missing values', () => {
        expect(() => parseArgs(['validate', '--nope'])).toThrow('Unknown flag --nope');
        expect(() => parseArgs(['build', 'in', '--output'])).toThrow('--output needs a value');
        expect(() => parseArgs(['build', 'in', '--output', '--zip'])).toThrow(UsageError);
        expect(() => parseArgs(['build', '--zip=yes'])).toThrow('--zip takes no value');
    });
});

describe('parseGatePolicy', () => {
    it('defaults to missing files and malformed rows', () => {
        expect(parseGatePolicy(undefined).blocking).toEqual(['missing-file', 'malformed-row']);
    });

    it('parses a comma-separated list of issue kinds', () => {
        expect(parseGatePolicy('orphan-file, duplicate-filename')).toEqual({ blocking: ['orphan-file', 'duplicate-filename'] });
        expect(parseGatePolicy('')).toEqual({ blocking: [] });
        expect(() => parseGatePolicy('typo')).toThrow(/Unknown issue kind 'typo'/);
    });
});

describe('describeIssue', () => {
    it('renders one line per issue kind', () => {
        expect(describeIssue({ kind: 'missing-file', source: 'm.csv', rowIndex: 2, filename: 'x.pdf', expectedPath: '/d/x.pdf' }))
            .toBe('missing file: x.pdf (m.csv row 2)');
        expect(describeIssue({ kind: 'orphan-file', path: 'y.pdf' })).toBe('orphan file: y.pdf');
        expect(describeIssue({ kind: 'malformed-row', source: 'm.csv', rowIndex: null, line: null, reason: 'metadata file is empty' }))
            .toBe('malformed: m.csv: metadata file is empty');
        expect(describeIssue({ kind: 'duplicate-filename', filename: 'z.pdf', rowIndices: [0, 3], occurrences: [] }))
            .toBe('duplicate filename: z.pdf (rows 0, 3)');
    });
});

describe('run', () => {
    let cwd: string;
    let lines: string[];
    let level: ReturnType<typeof Logger.getLevel>;

    beforeAll(() => {
        level = Logger.getLevel();
    });

    afterAll(() => {
        Logger.setLevel(level);
    });

    beforeEach(async () => {
        cwd = await makeTempDir();
        lines = [];
        Logger.setLevel('none');
    });

    afterEach(async () => {
        await removeDir(cwd);
    });

    const invoke = (...argv: string[]) => run(argv, { cwd, env: {}, print: line => lines.push(line) });

    it('prints usage and exits 2 without a command', async () => {
        expect(await invoke()).toBe(EXIT.USAGE);
        expect(lines).toEqual([USAGE]);
    });

    it('prints usage and exits 0 for --help', async () => {
        expect(await invoke('build', '--help')).toBe(EXIT.OK);
        expect(lines).toEqual([USAGE]);
    });

    it('exits 2 on usage errors', async () => {
        expect(await invoke('frobnicate')).toBe(EXIT.USAGE);
        expect(lines[0]).toBe(`Unknown command 'frobnicate'\n\n${USAGE}`);
        expect(await invoke('build', 'in')).toBe(EXIT.USAGE);
        expect(await invoke('build', 'in', '--output', 'out', '--concurrency', '0')).toBe(EXIT.USAGE);
    });

    it('validates a tree and reports each issue', async () => {
        await writeTree(cwd, { 'in/meta.csv': 'filename\na.pdf\nb.pdf\n', 'in/a.pdf': 'a' });
        expect(await invoke('validate', 'in')).toBe(EXIT.PARTIAL);
        expect(lines).toEqual([
            '.: FAILED (1/2 valid rows, 1 issue(s))',
            '  missing file: b.pdf (meta.csv row 1)',
            '1 directory, 1 failed, 0 unreadable'
        ]);
    });

    it('passes validation when orphans are not blocking', async () => {
        await writeTree(cwd, { 'in/meta.csv': 'filename\na.pdf\n', 'in/a.pdf': 'a', 'in/extra.pdf': 'e' });
        expect(await invoke('validate', 'in')).toBe(EXIT.OK);
        expect(await invoke('validate', 'in', '--block', 'orphan-file')).toBe(EXIT.PARTIAL);
    });

    it('builds packages for every directory', async () => {
        await writeTree(cwd, { 'in/x/meta.csv': 'filename,dc.title\na.pdf,A\n', 'in/x/a.pdf': 'a' });
        expect(await invoke('build', 'in', '--output', 'out')).toBe(EXIT.OK);
        expect(lines).toEqual([
            `x: 1 package(s) in ${path.join(cwd, 'out', 'x', 'SimpleArchiveFormat')}`,
            '1 assembled, 0 refused, 0 failed, 0 cancelled'
        ]);
    });

    it('warns about duplicate filenames that did not block the build', async () => {
        await writeTree(cwd, { 'in/x/meta.csv': 'filename,dc.title\na.pdf,A\na.pdf,B\n', 'in/x/a.pdf': 'a' });
        expect(await invoke('build', 'in', '--output', 'out')).toBe(EXIT.OK);
        expect(lines).toEqual([
            `x: 2 package(s) in ${path.join(cwd, 'out', 'x', 'SimpleArchiveFormat')}`,
            '  warning: duplicate filename: a.pdf (rows 0, 1), one package per row',
            '1 assembled, 0 refused, 0 failed, 0 cancelled'
        ]);
    });

    it('exits 3 when uploading without credentials', async () => {
        await writeTree(cwd, { 'pkg/a.txt': 'a' });
        expect(await invoke('upload', 'pkg')).toBe(EXIT.FATAL);
        expect(lines).toEqual(['Error: No storage credentials: set SAF_STORAGE_URL and OS_AUTH_TOKEN']);
        expect(await invoke('auth')).toBe(EXIT.FATAL);
    });
});
