import { createWriteStream, promises as fs, type WriteStream } from 'fs';
import { once } from 'events';
import { MalformedInputError } from '../utils/errors.js';
import { readLines } from '../utils/line-reader.js';

/**
 * One motif occurrence assigned to one window. A hit spanning several
 * windows produces one record per window, all sharing the original interval.
 */
export interface BinRecord {
    binId: number;
    datasetId: string;
    motifId: string;
    chromosome: string;
    start: number;
    end: number;
    score?: number;
}

export const BIN_RECORD_COLUMNS = ['bin_id', 'dataset_id', 'motif_id', 'chromosome', 'start', 'end', 'score'] as const;

export function formatBinRecord(record: BinRecord): string {
    return [
        record.binId,
        record.datasetId,
        record.motifId,
        record.chromosome,
        record.start,
        record.end,
        record.score === undefined ? '.' : record.score,
    ].join('\t');
}

export function parseBinRecord(line: string, source: string, lineNumber?: number): BinRecord {
    const columns = line.split('\t');
    if (columns.length !== BIN_RECORD_COLUMNS.length) {
        throw new MalformedInputError(
            `Expected ${BIN_RECORD_COLUMNS.length} columns, found ${columns.length}`, source, lineNumber, line);
    }

    const [binText, datasetId, motifId, chromosome, startText, endText, scoreText] = columns;
    const binId = Number(binText);
    const start = Number(startText);
    const end = Number(endText);
    if (!Number.isSafeInteger(binId) || !Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
        throw new MalformedInputError('Bin id and coordinates must be integers', source, lineNumber, line);
    }

    const record: BinRecord = { binId, datasetId, motifId, chromosome, start, end };
    if (scoreText !== '.') {
        const score = Number(scoreText);
        if (scoreText === '' || Number.isNaN(score)) {
            throw new MalformedInputError(`Score '${scoreText}' is not numeric`, source, lineNumber, line);
        }
        record.score = score;
    }
    return record;
}

export async function* readBinRecords(filePath: string): AsyncGenerator<BinRecord> {
    let lineNumber = 0;
    for await (const line of readLines(filePath)) {
        lineNumber++;
        if (!line) continue;
        yield parseBinRecord(line, filePath, lineNumber);
    }
}

/**
 * Line writer for record artifacts that honours stream backpressure.
 */
export class BinRecordWriter {
    private readonly stream: WriteStream;
    private count = 0;
    private failure: Error | null = null;

    constructor(readonly filePath: string) {
        this.stream = createWriteStream(filePath, { encoding: 'utf8' });
        this.stream.on('error', (error) => {
            this.failure = error;
        });
    }

    get recordsWritten(): number {
        return this.count;
    }

    async write(record: BinRecord): Promise<void> {
        if (this.failure) throw this.failure;
        this.count++;
        if (!this.stream.write(formatBinRecord(record) + '\n')) {
            await once(this.stream, 'drain');
        }
    }

    async close(): Promise<void> {
        if (!this.stream.closed) {
            await this.settle(() => this.stream.end());
        }
        if (this.failure) throw this.failure;
    }

    /**
     * Closes without waiting for buffered data; used on failure paths before
     * the partial file is removed. Errors raised by dropped writes are
     * recorded by the stream listener and never reject here.
     */
    async abort(): Promise<void> {
        if (this.stream.closed) return;
        await this.settle(() => this.stream.destroy());
    }

    private settle(action: () => void): Promise<void> {
        return new Promise<void>(resolve => {
            this.stream.once('close', () => resolve());
            action();
        });
    }
}

/**
 * Writes through `<path>.partial` and renames on success; the partial file
 * is removed on failure.
 */
export async function writeAtomically(
    filePath: string,
    body: (writer: BinRecordWriter) => Promise<void>
): Promise<number> {
    const partialPath = `${filePath}.partial`;
    const writer = new BinRecordWriter(partialPath);
    try {
        await body(writer);
        await writer.close();
        await fs.rename(partialPath, filePath);
        return writer.recordsWritten;
    } catch (error) {
        try {
            await writer.abort();
        } finally {
            await fs.rm(partialPath, { force: true });
        }
        throw error;
    }
}
