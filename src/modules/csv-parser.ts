/**
 * RFC 4180 CSV parsing: quoted fields, doubled quotes, CRLF/LF/CR line
 * endings, a leading BOM, and a single trailing blank line.
 */

export interface CsvRecord {
    /** 1-based line where the record starts. */
    line: number;
    values: string[];
}

export interface ParsedCsv {
    headerLine: number;
    headers: string[];
    rows: CsvRecord[];
}

const stripBom = (text: string) => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

export function parseCsv(csvText: string): ParsedCsv {
    const text = stripBom(csvText).replace(/\r\n/g, '\n').replace(/\r/g, '\n');
    const records: CsvRecord[] = [];

    let current: string[] = [];
    let field = '';
    let inQuotes = false;
    let line = 1;
    let recordStartLine = 1;

    const pushField = () => {
        current.push(field);
        field = '';
    };

    const pushRecord = () => {
        records.push({ line: recordStartLine, values: current });
        current = [];
    };

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (ch === '"') {
            if (inQuotes && text[i + 1] === '"') {
                field += '"';
                i++;
            } else {
                inQuotes = !inQuotes;
            }
            continue;
        }

        if (ch === ',' && !inQuotes) {
            pushField();
            continue;
        }

        if (ch === '\n') {
            line++;
            if (!inQuotes) {
                pushField();
                pushRecord();
                recordStartLine = line;
                continue;
            }
        }

        field += ch;
    }

    if (field.length > 0 || current.length > 0) {
        pushField();
        pushRecord();
    }

    // Blank lines between records carry no data
    const nonBlank = records.filter(r => !(r.values.length === 1 && r.values[0] === ''));
    const header = nonBlank.shift();

    return {
        headerLine: header?.line ?? 1,
        headers: (header?.values ?? []).map(h => h.trim()),
        rows: nonBlank
    };
}
