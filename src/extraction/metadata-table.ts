import { promises as fs } from 'fs';
import path from 'path';
import { MalformedInputError } from '../utils/errors.js';
import { readLines } from '../utils/line-reader.js';

/**
 * Descriptive record for one motif dataset, as supplied by the dataset
 * source. `sourceInfo` names the matrix or consensus the track was scanned
 * with.
 */
export interface MotifDataset {
    datasetId: string;
    species: string;
    name: string;
    sourceInfo: string;
}

export type MetadataRow = MotifDataset;

const COLUMN_COUNT = 4;

function sanitizeField(value: string): string {
    return value.replace(/[\t\r\n]+/g, ' ').trim() || '.';
}

export function formatMetadataRow(row: MetadataRow): string {
    return [row.datasetId, row.species, row.name, row.sourceInfo].map(sanitizeField).join('\t');
}

/**
 * Append-only, tab-delimited dataset table shared by all extraction tasks of
 * a run. Appends are queued so concurrent writers never interleave rows.
 * Re-running an extraction appends a second row for the same dataset;
 * `readRows` keeps the last one.
 */
export class MetadataTable {
    private writeQueue: Promise<void> = Promise.resolve();
    private appended = 0;

    constructor(readonly filePath: string) {}

    append(row: MetadataRow): Promise<void> {
        const line = formatMetadataRow(row) + '\n';
        const next = this.writeQueue.then(async () => {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.appendFile(this.filePath, line, 'utf8');
            this.appended++;
        });
        // A failed append must not block the rows queued behind it
        this.writeQueue = next.catch(() => undefined);
        return next;
    }

    get appendedRows(): number {
        return this.appended;
    }

    async readAllRows(): Promise<MetadataRow[]> {
        const rows: MetadataRow[] = [];
        let lineNumber = 0;

        try {
            await fs.access(this.filePath);
        } catch {
            return rows;
        }

        for await (const line of readLines(this.filePath)) {
            lineNumber++;
            if (!line.trim()) continue;

            const columns = line.split('\t');
            if (columns.length !== COLUMN_COUNT) {
                throw new MalformedInputError(
                    `Expected ${COLUMN_COUNT} metadata columns, found ${columns.length}`,
                    this.filePath, lineNumber, line);
            }
            const [datasetId, species, name, sourceInfo] = columns;
            rows.push({ datasetId, species, name, sourceInfo });
        }
        return rows;
    }

    /**
     * One row per dataset id, last append wins, in first-seen order.
     */
    async readRows(): Promise<MetadataRow[]> {
        const byId = new Map<string, MetadataRow>();
        for (const row of await this.readAllRows()) {
            byId.set(row.datasetId, row);
        }
        return [...byId.values()];
    }

    async clear(): Promise<void> {
        await this.writeQueue;
        await fs.rm(this.filePath, { force: true });
    }
}
