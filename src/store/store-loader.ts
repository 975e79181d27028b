import Database from 'better-sqlite3';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import type { MetadataRow } from '../extraction/metadata-table.js';
import { readBinRecords, type BinRecord } from '../records/bin-record.js';
import { MalformedInputError, StoreWriteError } from '../utils/errors.js';
import { createStoreIndexes, createStoreTables, STORE_SCHEMA_VERSION } from './store-schema.js';

export interface StoreLoadOptions {
    storePath: string;
    /** Zero-byte completion marker, created only after a successful commit */
    sentinelPath?: string;
    species: string;
    windowSize: number;
    batchSize: number;
}

export interface StoreLoadStats {
    records: number;
    datasets: number;
    bins: number;
    elapsedTime: number;
    storePath: string;
}

export interface StoreLoadProgress {
    records: number;
    currentBin: number;
}

type HitRow = [number, string, string, string, number, number, number | null];

/**
 * Builds the motif store from a bin-sorted artifact.
 *
 * The database is written to a temporary file beside the target, validated,
 * synced and then renamed over the target, so readers see either the previous
 * store or the complete new one. Any failure removes the temporary file and
 * leaves an existing store untouched.
 */
export class StoreLoader extends EventEmitter {
    constructor(private readonly options: StoreLoadOptions) {
        super();
    }

    async load(sortedPath: string, metadata: readonly MetadataRow[]): Promise<StoreLoadStats> {
        const startTime = Date.now();
        const { storePath, sentinelPath } = this.options;
        const tempPath = `${storePath}.tmp-${process.pid}-${startTime}`;

        this.emit('start', { storePath, tempPath });

        let db: Database.Database | null = null;
        let counts: { records: number; datasets: number; bins: number };
        try {
            if (sentinelPath) {
                await fs.rm(sentinelPath, { force: true });
            }
            await fs.mkdir(path.dirname(storePath), { recursive: true });
            await fs.rm(tempPath, { force: true });

            db = new Database(tempPath);
            db.pragma('journal_mode = MEMORY');
            createStoreTables(db);

            const { records, bins } = await this.insertHits(db, sortedPath);
            const datasets = this.insertMetadata(db, metadata);
            this.insertStoreInfo(db, records, datasets);
            createStoreIndexes(db);
            this.validate(db, records);

            db.close();
            db = null;

            await syncFile(tempPath);
            await fs.rename(tempPath, storePath);
            counts = { records, datasets, bins };
        } catch (error) {
            if (db?.open) {
                db.close();
            }
            await fs.rm(tempPath, { force: true });
            await fs.rm(`${tempPath}-journal`, { force: true });

            throw error instanceof StoreWriteError
                ? error
                : new StoreWriteError('Failed to write motif store', storePath, error);
        }

        // The store is committed from here on; a sentinel failure leaves it in place.
        if (sentinelPath) {
            try {
                await fs.writeFile(sentinelPath, '');
            } catch (error) {
                throw new StoreWriteError(
                    `Motif store committed but the completion sentinel ${sentinelPath} could not be written`,
                    storePath, error);
            }
        }

        const stats: StoreLoadStats = {
            ...counts,
            elapsedTime: Date.now() - startTime,
            storePath,
        };
        this.emit('complete', stats);
        return stats;
    }

    private async insertHits(db: Database.Database, sortedPath: string): Promise<{ records: number; bins: number }> {
        const insert = db.prepare<HitRow>(
            'INSERT INTO motif_hits (bin_id, dataset_id, motif_id, chromosome, start, "end", score) VALUES (?, ?, ?, ?, ?, ?, ?)');
        const insertBatch = db.transaction((rows: HitRow[]) => {
            for (const row of rows) {
                insert.run(...row);
            }
        });

        let batch: HitRow[] = [];
        let records = 0;
        let bins = 0;
        let previousBin = -1;

        for await (const record of readBinRecords(sortedPath)) {
            if (record.binId < previousBin) {
                throw new MalformedInputError(
                    `Records are not sorted by bin id (${record.binId} follows ${previousBin})`,
                    sortedPath, records + 1);
            }
            if (record.binId !== previousBin) {
                bins++;
                previousBin = record.binId;
            }

            batch.push(toHitRow(record));
            records++;

            if (batch.length >= this.options.batchSize) {
                insertBatch(batch);
                batch = [];
                this.emit('progress', { records, currentBin: record.binId } satisfies StoreLoadProgress);
            }
        }

        if (batch.length > 0) {
            insertBatch(batch);
        }

        return { records, bins };
    }

    private insertMetadata(db: Database.Database, metadata: readonly MetadataRow[]): number {
        const insert = db.prepare(
            'INSERT OR REPLACE INTO motif_datasets (dataset_id, species, name, source_info) VALUES (?, ?, ?, ?)');
        const insertAll = db.transaction((rows: readonly MetadataRow[]) => {
            for (const row of rows) {
                insert.run(row.datasetId, row.species, row.name, row.sourceInfo);
            }
        });
        insertAll(metadata);

        return countRows(db, 'motif_datasets');
    }

    private insertStoreInfo(db: Database.Database, records: number, datasets: number): void {
        const insert = db.prepare('INSERT OR REPLACE INTO store_info (key, value) VALUES (?, ?)');
        const info: Record<string, string> = {
            schema_version: String(STORE_SCHEMA_VERSION),
            species: this.options.species,
            window_size: String(this.options.windowSize),
            record_count: String(records),
            dataset_count: String(datasets),
            created_at: new Date().toISOString(),
        };
        db.transaction(() => {
            for (const [key, value] of Object.entries(info)) {
                insert.run(key, value);
            }
        })();
    }

    private validate(db: Database.Database, expectedRecords: number): void {
        const { storePath } = this.options;

        const count = countRows(db, 'motif_hits');
        if (count !== expectedRecords) {
            throw new StoreWriteError(`Store holds ${count} hits, expected ${expectedRecords}`, storePath);
        }

        const orphans = db.prepare<[], { dataset_id: string }>(
            'SELECT DISTINCT dataset_id FROM motif_hits WHERE dataset_id NOT IN (SELECT dataset_id FROM motif_datasets)'
        ).all().map(row => row.dataset_id);
        if (orphans.length > 0) {
            throw new StoreWriteError(`Datasets without metadata: ${orphans.join(', ')}`, storePath);
        }

        const integrity = db.pragma('integrity_check', { simple: true });
        if (integrity !== 'ok') {
            throw new StoreWriteError(`Integrity check failed: ${String(integrity)}`, storePath);
        }
    }
}

function countRows(db: Database.Database, table: 'motif_hits' | 'motif_datasets'): number {
    const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    return row?.count ?? 0;
}

function toHitRow(record: BinRecord): HitRow {
    return [
        record.binId,
        record.datasetId,
        record.motifId,
        record.chromosome,
        record.start,
        record.end,
        record.score ?? null,
    ];
}

async function syncFile(filePath: string): Promise<void> {
    const handle = await fs.open(filePath, 'r+');
    try {
        await handle.sync();
    } finally {
        await handle.close();
    }
}
