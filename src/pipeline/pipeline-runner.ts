import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import { ChromosomeOffsetTable } from '../binning/chromosome-offsets.js';
import { IntervalBinner } from '../binning/interval-binner.js';
import { datasetArtifactPath, pipelinePaths, type PipelineConfig, type PipelinePaths } from '../config/index.js';
import { HitAggregator } from '../aggregation/hit-aggregator.js';
import { MetadataTable } from '../extraction/metadata-table.js';
import { MotifHitExtractor, type ExtractionStats } from '../extraction/motif-hit-extractor.js';
import type { DatasetSource, FetchedDataset } from '../sources/dataset-source.js';
import { StoreLoader } from '../store/store-loader.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { describeError } from '../utils/errors.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { PipelineStateMachine, type PipelineStage, type StageTransition } from './pipeline-state.js';

export interface PipelineSummary {
    species: string;
    windowSize: number;
    datasets: number;
    hits: number;
    records: number;
    bins: number;
    sortRuns: number;
    elapsedTime: number;
    storePath: string;
    sentinelPath: string;
}

export interface PipelineFailure {
    stage: PipelineStage;
    error: unknown;
}

/**
 * Drives one (species, window size) build through
 * FETCHING → EXTRACTING → AGGREGATING → SORTING → LOADING → DONE.
 *
 * Stages run strictly in sequence; only extraction fans out, one task per
 * dataset. A failure in any stage moves the run to FAILED and rethrows; the
 * completion sentinel is written by the loader only after the store commit.
 */
export class PipelineRunner extends EventEmitter {
    readonly paths: PipelinePaths;
    private readonly state = new PipelineStateMachine();

    constructor(
        private readonly pipelineConfig: PipelineConfig,
        private readonly source: DatasetSource,
        private readonly log: Logger = defaultLogger
    ) {
        super();
        this.paths = pipelinePaths(pipelineConfig);
    }

    get stage(): PipelineStage {
        return this.state.stage;
    }

    get transitions(): readonly StageTransition[] {
        return this.state.transitions;
    }

    async run(): Promise<PipelineSummary> {
        const startTime = Date.now();
        const { species, windowSize, motifs } = this.pipelineConfig;

        try {
            return await this.log.section(`Building motif index for ${species} (window ${windowSize})`, async () => {
                await fs.rm(this.paths.sentinel, { force: true });
                await fs.mkdir(this.paths.datasetsDir, { recursive: true });

                this.transition('FETCHING');
                const offsets = await ChromosomeOffsetTable.fromFile(this.pipelineConfig.chromSizesPath, windowSize);
                this.log.info(`${offsets.chromosomes().length} chromosomes, ${offsets.totalBins} bins`);
                const fetched = await mapWithConcurrency(motifs, this.pipelineConfig.concurrency,
                    datasetId => this.source.fetch(species, datasetId));

                this.transition('EXTRACTING');
                const extractions = await this.extractAll(new IntervalBinner(offsets), fetched);

                this.transition('AGGREGATING');
                const aggregator = new HitAggregator(this.pipelineConfig, this.paths);
                aggregator.on('spill', ({ run, records }: { run: number; records: number }) =>
                    this.log.debug(`Spilled sort run ${run} (${records} records)`));
                const concatenation = await aggregator.concatenate();
                this.log.info(`Concatenated ${concatenation.records} records from ${concatenation.datasets} datasets`);

                this.transition('SORTING');
                const sortStats = await aggregator.sort(concatenation.outputPath);
                this.log.info(`Sorted ${sortStats.records} records (${sortStats.runs} spilled runs)`);

                this.transition('LOADING');
                const metadata = await new MetadataTable(this.paths.metadataTable).readRows();
                const loader = new StoreLoader({
                    storePath: this.paths.store,
                    sentinelPath: this.paths.sentinel,
                    species,
                    windowSize,
                    batchSize: this.pipelineConfig.batchSize,
                });
                loader.on('progress', progress => this.emit('load-progress', progress));
                const loadStats = await loader.load(this.paths.combinedArtifact, metadata);
                this.log.info(`Loaded ${loadStats.records} records across ${loadStats.bins} bins`);

                if (!this.pipelineConfig.keepIntermediates) {
                    try {
                        await this.removeIntermediates();
                    } catch (error) {
                        // The store and sentinel are already in place.
                        this.log.warn(`Could not remove intermediate artifacts: ${describeError(error)}`);
                    }
                }

                this.transition('DONE');
                const summary: PipelineSummary = {
                    species,
                    windowSize,
                    datasets: extractions.length,
                    hits: extractions.reduce((sum, stats) => sum + stats.hits, 0),
                    records: loadStats.records,
                    bins: loadStats.bins,
                    sortRuns: sortStats.runs,
                    elapsedTime: Date.now() - startTime,
                    storePath: this.paths.store,
                    sentinelPath: this.paths.sentinel,
                };
                this.log.success(`Motif index complete: ${summary.records} records in ${summary.elapsedTime}ms`);
                this.emit('complete', summary);
                return summary;
            });
        } catch (error) {
            const failedStage = this.state.stage;
            if (!this.state.isTerminal()) {
                this.recordTransition(this.state.fail());
            }
            this.log.error(`Pipeline failed during ${failedStage}: ${describeError(error)}`);
            this.emit('failed', { stage: failedStage, error } satisfies PipelineFailure);
            throw error;
        }
    }

    private async extractAll(binner: IntervalBinner, fetched: FetchedDataset[]): Promise<ExtractionStats[]> {
        const metadata = new MetadataTable(this.paths.metadataTable);
        await metadata.clear();

        return mapWithConcurrency(fetched, this.pipelineConfig.concurrency, async ({ dataset, trackPath }) => {
            const extractor = new MotifHitExtractor(binner, metadata);
            this.emit('dataset-start', dataset);
            const stats = await extractor.extract(dataset, trackPath, datasetArtifactPath(this.paths, dataset.datasetId));
            this.log.info(`${dataset.datasetId}: ${stats.hits} hits -> ${stats.records} bin records`);
            this.emit('dataset', stats);
            return stats;
        });
    }

    private async removeIntermediates(): Promise<void> {
        await fs.rm(this.paths.datasetsDir, { recursive: true, force: true });
        await fs.rm(this.paths.scratchDir, { recursive: true, force: true });
        await fs.rm(this.paths.unsortedArtifact, { force: true });
        await fs.rm(this.paths.combinedArtifact, { force: true });
        await fs.rm(this.paths.metadataTable, { force: true });
    }

    private transition(to: PipelineStage): void {
        this.recordTransition(this.state.advance(to));
    }

    private recordTransition(transition: StageTransition): void {
        this.log.debug(`${transition.from} -> ${transition.to}`);
        this.emit('stage', transition);
    }
}
