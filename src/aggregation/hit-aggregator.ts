import { EventEmitter } from 'events';
import { existsSync, promises as fs } from 'fs';
import path from 'path';
import { datasetArtifactPath, type PipelineConfig, type PipelinePaths } from '../config/index.js';
import { readBinRecords, writeAtomically, type BinRecord } from '../records/bin-record.js';
import { MissingArtifactError } from '../utils/errors.js';
import { ExternalSorter, type SortStats } from './external-sorter.js';

export interface ConcatenationStats {
    datasets: number;
    records: number;
    outputPath: string;
}

export interface AggregationStats extends SortStats {
    datasets: number;
    outputPath: string;
}

/**
 * Combines the per-dataset artifacts of the configured motif set into one
 * file sorted by bin id.
 *
 * Per-dataset artifacts follow their track's line order, not bin order, so
 * aggregation is a plain concatenation followed by a full external sort
 * rather than a streaming merge.
 */
export class HitAggregator extends EventEmitter {
    constructor(
        private readonly pipelineConfig: PipelineConfig,
        private readonly paths: PipelinePaths
    ) {
        super();
    }

    /**
     * Artifact paths for every configured dataset. All of them must exist;
     * aggregation never proceeds over a partial dataset set.
     */
    resolveInputs(): string[] {
        return this.pipelineConfig.motifs.map((datasetId) => {
            const artifactPath = datasetArtifactPath(this.paths, datasetId);
            if (!existsSync(artifactPath)) {
                throw new MissingArtifactError(
                    `Extraction artifact for dataset '${datasetId}' is missing`, artifactPath, datasetId);
            }
            return artifactPath;
        });
    }

    async *concatenated(inputs: readonly string[]): AsyncGenerator<BinRecord> {
        for (const input of inputs) {
            yield* readBinRecords(input);
        }
    }

    async concatenate(): Promise<ConcatenationStats> {
        const inputs = this.resolveInputs();
        const outputPath = this.paths.unsortedArtifact;
        await fs.mkdir(path.dirname(outputPath), { recursive: true });

        const records = await writeAtomically(outputPath, async (writer) => {
            for await (const record of this.concatenated(inputs)) {
                await writer.write(record);
            }
        });

        const stats: ConcatenationStats = { datasets: inputs.length, records, outputPath };
        this.emit('concatenated', stats);
        return stats;
    }

    async sort(unsortedPath: string = this.paths.unsortedArtifact): Promise<SortStats> {
        if (!existsSync(unsortedPath)) {
            throw new MissingArtifactError('Concatenated artifact is missing', unsortedPath);
        }

        const sorter = new ExternalSorter({
            memoryRecords: this.pipelineConfig.sortMemoryRecords,
            scratchDir: this.paths.scratchDir,
        });
        sorter.on('spill', (spill) => this.emit('spill', spill));

        const stats = await sorter.sort(readBinRecords(unsortedPath), this.paths.combinedArtifact);
        this.emit('sorted', stats);
        return stats;
    }

    async aggregate(): Promise<AggregationStats> {
        const concatenation = await this.concatenate();
        const sortStats = await this.sort(concatenation.outputPath);
        return {
            ...sortStats,
            datasets: concatenation.datasets,
            outputPath: this.paths.combinedArtifact,
        };
    }
}
