import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import type { IntervalBinner } from '../binning/interval-binner.js';
import { TrackParser, type MotifHit } from '../parser/track-parser.js';
import { writeAtomically, type BinRecord } from '../records/bin-record.js';
import type { MetadataTable, MotifDataset } from './metadata-table.js';

export interface ExtractionStats {
    datasetId: string;
    hits: number;
    records: number;
    chromosomes: string[];
    elapsedTime: number;
    artifactPath: string;
}

export interface ExtractionProgress {
    datasetId: string;
    hits: number;
    records: number;
}

/**
 * Turns one dataset's motif track into bin records.
 *
 * `records()` is the lazy view; `extract()` materializes it into the
 * per-dataset artifact and appends the dataset's metadata row. The artifact
 * is written under a temporary name and only renamed into place once the
 * whole track has been binned, so a failed extraction leaves nothing behind.
 */
export class MotifHitExtractor extends EventEmitter {
    constructor(
        private readonly binner: IntervalBinner,
        private readonly metadata: MetadataTable,
        private readonly progressInterval: number = 100000
    ) {
        super();
    }

    async *records(dataset: MotifDataset, trackPath: string): AsyncGenerator<BinRecord> {
        const parser = new TrackParser(dataset.datasetId, this.progressInterval);
        for await (const hit of parser.parseFile(trackPath)) {
            yield* this.toRecords(hit);
        }
    }

    toRecords(hit: MotifHit): BinRecord[] {
        return this.binner.binsFor(hit.chromosome, hit.start, hit.end).map((binId) => {
            const record: BinRecord = {
                binId,
                datasetId: hit.datasetId,
                motifId: hit.motifId,
                chromosome: hit.chromosome,
                start: hit.start,
                end: hit.end,
            };
            if (hit.score !== undefined) {
                record.score = hit.score;
            }
            return record;
        });
    }

    async extract(dataset: MotifDataset, trackPath: string, artifactPath: string): Promise<ExtractionStats> {
        const startTime = Date.now();
        this.emit('start', dataset);

        await fs.mkdir(path.dirname(artifactPath), { recursive: true });
        await fs.rm(artifactPath, { force: true });
        const parser = new TrackParser(dataset.datasetId, this.progressInterval);
        const chromosomes = new Set<string>();
        let hits = 0;
        let records = 0;

        try {
            records = await writeAtomically(artifactPath, async (writer) => {
                for await (const hit of parser.parseFile(trackPath)) {
                    for (const record of this.toRecords(hit)) {
                        await writer.write(record);
                    }
                    chromosomes.add(hit.chromosome);
                    hits++;

                    if (hits % this.progressInterval === 0) {
                        this.emit('progress', {
                            datasetId: dataset.datasetId,
                            hits,
                            records: writer.recordsWritten,
                        } satisfies ExtractionProgress);
                    }
                }
            });
        } catch (error) {
            this.emit('failed', { datasetId: dataset.datasetId, error });
            throw error;
        }

        await this.metadata.append(dataset);

        const stats: ExtractionStats = {
            datasetId: dataset.datasetId,
            hits,
            records,
            chromosomes: [...chromosomes],
            elapsedTime: Date.now() - startTime,
            artifactPath,
        };
        this.emit('complete', stats);
        return stats;
    }
}
