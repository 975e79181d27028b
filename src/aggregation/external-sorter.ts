import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import { BinRecordWriter, readBinRecords, writeAtomically, type BinRecord } from '../records/bin-record.js';
import { MinHeap } from './min-heap.js';

export interface ExternalSortOptions {
    /** Records held in memory before a sorted run is spilled to disk */
    memoryRecords: number;
    scratchDir: string;
}

export interface SortStats {
    records: number;
    runs: number;
    elapsedTime: number;
}

interface RunCursor {
    head: BinRecord;
    rest: AsyncIterator<BinRecord>;
}

const byBinId = (a: BinRecord, b: BinRecord): number => a.binId - b.binId;

/**
 * Disk-backed merge sort of bin records by `binId`.
 *
 * Input is read in chunks of `memoryRecords`; each chunk is sorted and
 * spilled as a run file, and the runs are k-way merged into the output.
 * Input that fits in one chunk is sorted in memory without touching the
 * scratch directory. Ties on `binId` come out in no particular order.
 */
export class ExternalSorter extends EventEmitter {
    constructor(private readonly options: ExternalSortOptions) {
        super();
    }

    async sort(input: AsyncIterable<BinRecord>, outputPath: string): Promise<SortStats> {
        const startTime = Date.now();
        await fs.mkdir(this.options.scratchDir, { recursive: true });
        const runDir = await fs.mkdtemp(path.join(this.options.scratchDir, 'sort-'));
        const runs: string[] = [];
        let buffer: BinRecord[] = [];
        let records = 0;

        try {
            for await (const record of input) {
                buffer.push(record);
                records++;
                if (buffer.length >= this.options.memoryRecords) {
                    runs.push(await this.spill(buffer, runDir, runs.length));
                    buffer = [];
                }
            }

            if (runs.length === 0) {
                await this.writeSorted(buffer, outputPath);
            } else {
                if (buffer.length > 0) {
                    runs.push(await this.spill(buffer, runDir, runs.length));
                    buffer = [];
                }
                await this.merge(runs, outputPath);
            }
        } finally {
            await fs.rm(runDir, { recursive: true, force: true });
        }

        return { records, runs: runs.length, elapsedTime: Date.now() - startTime };
    }

    private async spill(buffer: BinRecord[], runDir: string, index: number): Promise<string> {
        const runPath = path.join(runDir, `run-${String(index).padStart(5, '0')}.tsv`);
        buffer.sort(byBinId);
        await writeAll(buffer, runPath);
        this.emit('spill', { run: index, records: buffer.length, path: runPath });
        return runPath;
    }

    private async writeSorted(buffer: BinRecord[], outputPath: string): Promise<void> {
        buffer.sort(byBinId);
        await writeAtomically(outputPath, async (writer) => {
            for (const record of buffer) {
                await writer.write(record);
            }
        });
    }

    private async merge(runs: string[], outputPath: string): Promise<void> {
        const iterators: AsyncIterator<BinRecord>[] = runs.map(run => readBinRecords(run)[Symbol.asyncIterator]());
        const heap = new MinHeap<RunCursor>((a, b) => byBinId(a.head, b.head));

        try {
            for (const rest of iterators) {
                const first = await rest.next();
                if (!first.done) {
                    heap.push({ head: first.value, rest });
                }
            }

            await writeAtomically(outputPath, async (writer) => {
                for (let cursor = heap.pop(); cursor; cursor = heap.pop()) {
                    await writer.write(cursor.head);
                    const next = await cursor.rest.next();
                    if (!next.done) {
                        heap.push({ head: next.value, rest: cursor.rest });
                    }
                }
            });
        } finally {
            await Promise.all(iterators.map(iterator => iterator.return?.()));
        }
    }
}

async function writeAll(records: BinRecord[], filePath: string): Promise<void> {
    const writer = new BinRecordWriter(filePath);
    try {
        for (const record of records) {
            await writer.write(record);
        }
        await writer.close();
    } catch (error) {
        await writer.abort();
        throw error;
    }
}
