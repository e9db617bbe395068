import { createReadStream } from 'node:fs';
import { parseCsv } from './csv.js';

export interface InputRow {
    /** 1-based position among the data rows, for messages only */
    readonly index: number;
    readonly fields: Readonly<Record<string, string>>;
}

/**
 * Lazy, finite, single-pass sequence of rows.
 */
export type RowSource = Iterable<InputRow> | AsyncIterable<InputRow>;

export function rowsFromRecords(records: readonly Record<string, string>[]): InputRow[] {
    return records.map((fields, i) => ({ index: i + 1, fields }));
}

/**
 * Rows of a header-first CSV file. Blank lines are skipped; a short line
 * gets `''` for its missing trailing columns.
 */
export async function* csvRowSource(path: string): AsyncGenerator<InputRow> {
    const stream = createReadStream(path, { encoding: 'utf-8' });
    let header: string[] | undefined;
    let index = 0;

    for await (const record of parseCsv(stream)) {
        if (record.every((field) => field.trim() === '')) {
            continue;
        }
        if (header === undefined) {
            header = record.map((name) => name.trim());
            continue;
        }

        const fields: Record<string, string> = {};
        header.forEach((name, column) => {
            fields[name] = record[column] ?? '';
        });
        index += 1;
        yield { index, fields };
    }
}
