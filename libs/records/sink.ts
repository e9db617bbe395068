import { closeSync, fstatSync, mkdirSync, openSync, writeSync } from 'node:fs';
import path from 'node:path';
import { formatCsvLine } from './csv.js';

/**
 * Appendable destination for outcome rows.
 */
export interface Sink {
    isEmpty(): boolean;
    append(row: readonly string[]): void;
}

/**
 * Append `row`, preceded by `header` when the sink is still empty.
 */
export function writeRow(sink: Sink, header: readonly string[], row: readonly string[]): void {
    if (sink.isEmpty()) {
        sink.append(header);
    }
    sink.append(row);
}

export class MemorySink implements Sink {
    readonly rows: string[][] = [];

    isEmpty(): boolean {
        return this.rows.length === 0;
    }

    append(row: readonly string[]): void {
        this.rows.push([...row]);
    }
}

/**
 * CSV file opened for appending. Emptiness is read from the file size, so a
 * file that already holds rows from an earlier run does not get a second
 * header.
 */
export class CsvFileSink implements Sink {
    private fd: number | undefined;

    constructor(readonly filePath: string) {
        mkdirSync(path.dirname(filePath), { recursive: true });
        this.fd = openSync(filePath, 'a');
    }

    isEmpty(): boolean {
        return fstatSync(this.openFd()).size === 0;
    }

    append(row: readonly string[]): void {
        writeSync(this.openFd(), formatCsvLine(row));
    }

    close(): void {
        if (this.fd !== undefined) {
            closeSync(this.fd);
            this.fd = undefined;
        }
    }

    private openFd(): number {
        if (this.fd === undefined) {
            throw new Error(`Sink ${this.filePath} is closed`);
        }
        return this.fd;
    }
}

/**
 * Scoped acquisition: every sink opened through `open` is closed once `fn`
 * settles, whether or not it succeeded.
 */
export async function withCsvSinks<T>(fn: (open: (filePath: string) => CsvFileSink) => Promise<T>): Promise<T> {
    const opened: CsvFileSink[] = [];
    const open = (filePath: string): CsvFileSink => {
        const sink = new CsvFileSink(filePath);
        opened.push(sink);
        return sink;
    };

    try {
        return await fn(open);
    } finally {
        for (const sink of opened) {
            sink.close();
        }
    }
}
