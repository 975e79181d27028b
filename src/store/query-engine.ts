import Database from 'better-sqlite3';
import { existsSync, statSync } from 'fs';
import type { IntervalBinner } from '../binning/interval-binner.js';
import type { MetadataRow } from '../extraction/metadata-table.js';
import type { BinRecord } from '../records/bin-record.js';
import { InvalidIntervalError, StoreNotFoundError } from '../utils/errors.js';

export interface BinRangeQuery {
    fromBin: number;
    toBin: number;
    datasetIds?: string[];
    limit?: number;
}

export interface RegionQuery {
    chromosome: string;
    start: number;
    end: number;
    datasetIds?: string[];
    limit?: number;
}

export interface StoreStats {
    totalHits: number;
    distinctBins: number;
    datasets: number;
    binRange: [number, number] | null;
    species: string | null;
    windowSize: number | null;
    createdAt: string | null;
    storeSize: string;
}

interface HitRowResult {
    bin_id: number;
    dataset_id: string;
    motif_id: string;
    chromosome: string;
    start: number;
    end: number;
    score: number | null;
}

interface DatasetRowResult {
    dataset_id: string;
    species: string;
    name: string;
    source_info: string;
}

const HIT_COLUMNS = 'bin_id, dataset_id, motif_id, chromosome, start, "end", score';

/**
 * Read-only access to a loaded motif store.
 */
export class MotifStoreQuery {
    private readonly db: Database.Database;

    constructor(readonly storePath: string) {
        if (!existsSync(storePath)) {
            throw new StoreNotFoundError(storePath);
        }
        this.db = new Database(storePath, { readonly: true, fileMustExist: true });
    }

    queryBin(binId: number): BinRecord[] {
        return this.queryBinRange({ fromBin: binId, toBin: binId });
    }

    /**
     * Hits in bins `fromBin..toBin` inclusive, ordered by bin id.
     */
    queryBinRange(query: BinRangeQuery): BinRecord[] {
        if (query.fromBin > query.toBin) {
            throw new InvalidIntervalError(`Bin range ${query.fromBin}..${query.toBin} is inverted`);
        }

        const params: (number | string)[] = [query.fromBin, query.toBin];
        let sql = `SELECT ${HIT_COLUMNS} FROM motif_hits WHERE bin_id BETWEEN ? AND ?`;

        if (query.datasetIds && query.datasetIds.length > 0) {
            sql += ` AND dataset_id IN (${query.datasetIds.map(() => '?').join(', ')})`;
            params.push(...query.datasetIds);
        }
        sql += ' ORDER BY bin_id, dataset_id, start, motif_id';
        if (query.limit !== undefined) {
            sql += ' LIMIT ?';
            params.push(query.limit);
        }

        return this.db.prepare<(number | string)[], HitRowResult>(sql).all(...params).map(toBinRecord);
    }

    /**
     * Hits overlapping `[start, end)` on one chromosome. A hit spanning
     * several bins is reported once, from the first bin in range that holds
     * it. Hits with identical fields (both strands of one site, repeated
     * track rows) sit in the same bins, so each copy is kept.
     */
    queryRegion(binner: IntervalBinner, query: RegionQuery): BinRecord[] {
        const [fromBin, toBin] = binner.binRange(query.chromosome, query.start, query.end);
        const firstBin = new Map<string, number>();
        const hits: BinRecord[] = [];

        for (const record of this.queryBinRange({ fromBin, toBin, datasetIds: query.datasetIds })) {
            if (record.start >= query.end || record.end <= query.start) continue;

            const key = `${record.datasetId}\t${record.motifId}\t${record.chromosome}\t${record.start}\t${record.end}`;
            const first = firstBin.get(key);
            if (first === undefined) {
                firstBin.set(key, record.binId);
            } else if (first !== record.binId) {
                continue;
            }

            hits.push(record);
            if (query.limit !== undefined && hits.length >= query.limit) break;
        }
        return hits;
    }

    getDataset(datasetId: string): MetadataRow | null {
        const row = this.db.prepare<[string], DatasetRowResult>(
            'SELECT dataset_id, species, name, source_info FROM motif_datasets WHERE dataset_id = ?'
        ).get(datasetId);
        return row ? toMetadataRow(row) : null;
    }

    listDatasets(): MetadataRow[] {
        return this.db.prepare<[], DatasetRowResult>(
            'SELECT dataset_id, species, name, source_info FROM motif_datasets ORDER BY dataset_id'
        ).all().map(toMetadataRow);
    }

    getStats(): StoreStats {
        const counts = this.db.prepare<[], { total: number; bins: number; minBin: number | null; maxBin: number | null }>(
            'SELECT COUNT(*) AS total, COUNT(DISTINCT bin_id) AS bins, MIN(bin_id) AS minBin, MAX(bin_id) AS maxBin FROM motif_hits'
        ).get();
        const datasets = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM motif_datasets').get();
        const info = new Map(this.db.prepare<[], { key: string; value: string }>('SELECT key, value FROM store_info')
            .all().map(row => [row.key, row.value] as const));

        const windowSize = info.get('window_size');
        return {
            totalHits: counts?.total ?? 0,
            distinctBins: counts?.bins ?? 0,
            datasets: datasets?.count ?? 0,
            binRange: counts && counts.minBin !== null && counts.maxBin !== null ? [counts.minBin, counts.maxBin] : null,
            species: info.get('species') ?? null,
            windowSize: windowSize !== undefined ? parseInt(windowSize, 10) : null,
            createdAt: info.get('created_at') ?? null,
            storeSize: formatBytes(statSync(this.storePath).size),
        };
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }
}

function toBinRecord(row: HitRowResult): BinRecord {
    const record: BinRecord = {
        binId: row.bin_id,
        datasetId: row.dataset_id,
        motifId: row.motif_id,
        chromosome: row.chromosome,
        start: row.start,
        end: row.end,
    };
    if (row.score !== null) {
        record.score = row.score;
    }
    return record;
}

function toMetadataRow(row: DatasetRowResult): MetadataRow {
    return {
        datasetId: row.dataset_id,
        species: row.species,
        name: row.name,
        sourceInfo: row.source_info,
    };
}

export function formatBytes(bytes: number): string {
    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }
    return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}
