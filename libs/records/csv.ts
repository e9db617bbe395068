/**
 * RFC 4180 CSV reading and writing.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: string): string {
    return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvLine(fields: readonly string[]): string {
    return fields.map(formatCsvField).join(',') + '\r\n';
}

/**
 * Incremental parser over text chunks. Yields one array of fields per
 * record; a trailing line break does not produce an empty record.
 */
export async function* parseCsv(chunks: AsyncIterable<string> | Iterable<string>): AsyncGenerator<string[]> {
    let field = '';
    let record: string[] = [];
    let inQuotes = false;
    let pendingQuote = false;
    let pendingCr = false;
    let sawAny = false;
    let first = true;

    for await (const rawChunk of chunks) {
        let chunk = rawChunk;
        if (first) {
            first = false;
            if (chunk.charCodeAt(0) === 0xfeff) {
                chunk = chunk.slice(1);
            }
        }

        for (const char of chunk) {
            if (pendingCr) {
                pendingCr = false;
                if (char === '\n') {
                    continue;
                }
            }

            if (inQuotes) {
                if (pendingQuote) {
                    pendingQuote = false;
                    if (char === '"') {
                        field += '"';
                        continue;
                    }
                    inQuotes = false;
                } else if (char === '"') {
                    pendingQuote = true;
                    continue;
                } else {
                    field += char;
                    continue;
                }
            }

            if (char === '"' && field === '') {
                inQuotes = true;
                sawAny = true;
            } else if (char === ',') {
                record.push(field);
                field = '';
                sawAny = true;
            } else if (char === '\n' || char === '\r') {
                record.push(field);
                yield record;
                record = [];
                field = '';
                sawAny = false;
                pendingCr = char === '\r';
            } else {
                field += char;
                sawAny = true;
            }
        }
    }

    if (sawAny || field !== '' || record.length > 0) {
        record.push(field);
        yield record;
    }
}
