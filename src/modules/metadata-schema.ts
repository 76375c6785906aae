/**
 * CSV Schema Mapper
 *
 * Turns a metadata CSV into typed MetadataRows. Column headers are resolved
 * through an explicit schema table:
 *
 *   filename              -> the document reference (required)
 *   dc.title              -> schema=dc element=title
 *   dc.date.issued        -> schema=dc element=date qualifier=issued
 *   dc.publisher[en]      -> schema=dc element=publisher language=en
 *   dc.subject.lcsh[en]   -> schema=dc element=subject qualifier=lcsh language=en
 *   anything else         -> opaque extension field, carried through untouched
 *
 * Rows that cannot be used become MalformedRow issues instead of exceptions.
 */

import { parseCsv } from './csv-parser.js';
import { SAF, VALIDATION } from './constants.js';
import { containsXmlInvalidChars } from './utilities.js';
import type {
    ExtensionValue,
    FieldDescriptor,
    MalformedRowIssue,
    MetadataRow,
    MetadataValue
} from '../types.js';

export interface SchemaOptions {
    /** Metadata schemas recognized as structured fields. Default: ['dc'] */
    schemas?: readonly string[];
    filenameColumn?: string;
}

export interface MappedMetadataFile {
    source: string;
    headers: string[];
    descriptors: FieldDescriptor[];
    /** Well-formed rows in CSV order. */
    rows: MetadataRow[];
    malformed: MalformedRowIssue[];
    /** Data rows seen, well-formed or not. */
    totalRows: number;
}

const QUALIFIED_FIELD = /^([A-Za-z][\w-]*)\.([A-Za-z][\w-]*)(?:\.([A-Za-z][\w.-]*))?(?:\[([^\][]+)\])?$/;

/**
 * Resolve one column header against the schema table.
 */
export function parseColumnHeader(header: string, options: SchemaOptions = {}): FieldDescriptor {
    const column = header.trim();
    const filenameColumn = options.filenameColumn ?? VALIDATION.FILENAME_COLUMN;
    const schemas: readonly string[] = options.schemas ?? [SAF.DEFAULT_SCHEMA];

    if (column === filenameColumn) {
        return { kind: 'filename', column };
    }

    const match = QUALIFIED_FIELD.exec(column);
    if (match && schemas.includes(match[1])) {
        return {
            kind: 'metadata',
            column,
            schema: match[1],
            element: match[2],
            qualifier: match[3] ?? null,
            language: match[4]?.trim() || null
        };
    }

    return { kind: 'extension', column };
}

/** Inverse of parseColumnHeader for structured fields. */
export function formatColumnHeader(field: Pick<MetadataValue, 'schema' | 'element' | 'qualifier' | 'language'>): string {
    let header = `${field.schema}.${field.element}`;
    if (field.qualifier) header += `.${field.qualifier}`;
    if (field.language) header += `[${field.language}]`;
    return header;
}

function decodeUtf8(bytes: Uint8Array): { text: string; valid: boolean } {
    try {
        return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes), valid: true };
    } catch {
        // Undecodable sequences become U+FFFD; the rows holding them are reported below
        return { text: new TextDecoder('utf-8').decode(bytes), valid: false };
    }
}

/**
 * Map the raw bytes of one metadata file into rows and malformed-row issues.
 *
 * @param source - file name recorded on every row and issue
 */
export function mapMetadataFile(bytes: Uint8Array, source: string, options: SchemaOptions = {}): MappedMetadataFile {
    const { text, valid: encodingValid } = decodeUtf8(bytes);
    const parsed = parseCsv(text);
    const descriptors = parsed.headers.map(h => parseColumnHeader(h, options));
    const filenameIndex = descriptors.findIndex(d => d.kind === 'filename');

    const result: MappedMetadataFile = {
        source,
        headers: parsed.headers,
        descriptors,
        rows: [],
        malformed: [],
        totalRows: parsed.rows.length
    };

    const malformed = (rowIndex: number | null, line: number | null, reason: string) => {
        result.malformed.push({ kind: 'malformed-row', source, rowIndex, line, reason });
    };

    if (parsed.headers.length === 0) {
        malformed(null, null, 'metadata file is empty');
        return result;
    }

    if (filenameIndex === -1) {
        const reason = `no "${options.filenameColumn ?? VALIDATION.FILENAME_COLUMN}" column (columns: ${parsed.headers.join(', ')})`;
        if (parsed.rows.length === 0) {
            malformed(null, parsed.headerLine, reason);
        }
        parsed.rows.forEach((row, rowIndex) => malformed(rowIndex, row.line, reason));
        return result;
    }

    parsed.rows.forEach((record, rowIndex) => {
        if (!encodingValid && record.values.some(v => v.includes('\uFFFD'))) {
            malformed(rowIndex, record.line, 'invalid UTF-8 encoding');
            return;
        }
        if (record.values.length !== descriptors.length) {
            malformed(rowIndex, record.line, `has ${record.values.length} columns, expected ${descriptors.length}`);
            return;
        }

        const filename = record.values[filenameIndex].trim();
        if (!filename) {
            malformed(rowIndex, record.line, 'filename is empty');
            return;
        }

        // Structured values end up in descriptor XML
        const unwritable = descriptors.find((descriptor, col) => descriptor.kind === 'metadata' && containsXmlInvalidChars(record.values[col]));
        if (unwritable) {
            malformed(rowIndex, record.line, `${unwritable.column} contains a control character not allowed in XML`);
            return;
        }

        const fields: Record<string, string> = {};
        const metadata: MetadataValue[] = [];
        const extensions: ExtensionValue[] = [];

        descriptors.forEach((descriptor, col) => {
            const value = record.values[col].trim();
            if (!value) return;
            if (!Object.hasOwn(fields, descriptor.column)) {
                fields[descriptor.column] = value;
            }
            if (descriptor.kind === 'metadata') {
                metadata.push({
                    schema: descriptor.schema,
                    element: descriptor.element,
                    qualifier: descriptor.qualifier,
                    language: descriptor.language,
                    value
                });
            } else if (descriptor.kind === 'extension') {
                extensions.push({ column: descriptor.column, value });
            }
        });

        result.rows.push({ source, rowIndex, line: record.line, filename, fields, metadata, extensions });
    });

    return result;
}
