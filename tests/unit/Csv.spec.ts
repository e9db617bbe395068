/**
 * Unit Tests: CSV reading, row sources and sinks
 *
 * @see libs/records/csv.ts
 * @see libs/records/rowSource.ts
 * @see libs/records/sink.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { formatCsvLine, parseCsv } from '../../libs/records/csv.js';
import { csvRowSource, type InputRow } from '../../libs/records/rowSource.js';
import { MemorySink, withCsvSinks, writeRow, type CsvFileSink } from '../../libs/records/sink.js';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of source) {
        items.push(item);
    }
    return items;
}

describe('CSV records', () => {
    let dir: string;

    before(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'worldcat-batch-'));
    });

    after(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('quotes fields that need it', () => {
        assert.strictEqual(formatCsvLine(['a', 'b,c', 'say "hi"', '']), 'a,"b,c","say ""hi""",\r\n');
    });

    it('parses quoted fields across chunk boundaries', async () => {
        const records = await collect(parseCsv(['\uFEFFh1,h2\r\n1,"x', ',y"\n2,"multi\nline"\n']));

        assert.deepStrictEqual(records, [['h1', 'h2'], ['1', 'x,y'], ['2', 'multi\nline']]);
    });

    it('keeps an escaped quote and a final line without a break', async () => {
        const records = await collect(parseCsv(['a,"b ""c"""\nd,e']));

        assert.deepStrictEqual(records, [['a', 'b "c"'], ['d', 'e']]);
    });

    it('reads a header-first file into rows, skipping blank lines and padding short ones', async () => {
        const file = path.join(dir, 'input.csv');
        writeFileSync(file, 'MMS ID,OCLC Number\n990001,123\n\n990002\n');

        const rows: InputRow[] = await collect(csvRowSource(file));

        assert.deepStrictEqual(rows, [
            { index: 1, fields: { 'MMS ID': '990001', 'OCLC Number': '123' } },
            { index: 2, fields: { 'MMS ID': '990002', 'OCLC Number': '' } }
        ]);
    });

    it('writes a header only into an empty sink', () => {
        const sink = new MemorySink();
        writeRow(sink, ['A', 'B'], ['1', '2']);
        writeRow(sink, ['A', 'B'], ['3', '4']);

        assert.deepStrictEqual(sink.rows, [['A', 'B'], ['1', '2'], ['3', '4']]);
    });

    it('appends to existing files without repeating the header and closes them', async () => {
        const file = path.join(dir, 'out', 'errors.csv');

        for (const id of ['1', '2']) {
            await withCsvSinks(async (open) => {
                writeRow(open(file), ['OCLC Number', 'Error'], [id, 'Problem, with comma']);
            });
        }

        assert.strictEqual(
            readFileSync(file, 'utf-8'),
            'OCLC Number,Error\r\n1,"Problem, with comma"\r\n2,"Problem, with comma"\r\n'
        );
    });

    it('closes the sinks when the body fails', async () => {
        const state: { sink?: CsvFileSink } = {};

        await assert.rejects(
            withCsvSinks(async (open) => {
                state.sink = open(path.join(dir, 'failing.csv'));
                throw new Error('boom');
            }),
            { message: 'boom' }
        );
        assert.throws(() => state.sink?.append(['x']), { message: `Sink ${path.join(dir, 'failing.csv')} is closed` });
    });
});
