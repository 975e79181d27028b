#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { ChromosomeOffsetTable } from '../binning/chromosome-offsets.js';
import { IntervalBinner } from '../binning/interval-binner.js';
import { config, createPipelineConfig, pipelinePaths } from '../config/index.js';
import type { ExtractionStats } from '../extraction/motif-hit-extractor.js';
import type { MotifDataset } from '../extraction/metadata-table.js';
import { PipelineRunner, type PipelineFailure } from '../pipeline/pipeline-runner.js';
import type { StageTransition } from '../pipeline/pipeline-state.js';
import type { BinRecord } from '../records/bin-record.js';
import { LocalDatasetSource } from '../sources/dataset-source.js';
import { MotifStoreQuery } from '../store/query-engine.js';
import { describeError, MotifIndexError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { PipelineProgress } from '../utils/progress.js';

interface StoreOptions {
    species: string;
    windowSize: number;
    workspace: string;
}

function parseInteger(value: string): number {
    if (!/^-?\d+$/.test(value)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parseInt(value, 10);
}

function splitList(value: string, previous: string[] = []): string[] {
    return previous.concat(value.split(',').map(item => item.trim()).filter(Boolean));
}

function readMotifList(filePath: string): string[] {
    return readFileSync(filePath, 'utf8')
        .split('\n')
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'));
}

function fail(error: unknown): never {
    const message = error instanceof MotifIndexError ? error.toString() : describeError(error);
    console.error(chalk.red('❌ Error:'), message);
    process.exit(1);
}

function openStore(options: StoreOptions): MotifStoreQuery {
    return new MotifStoreQuery(pipelinePaths(options).store);
}

function printRecords(records: BinRecord[]): void {
    console.log(chalk.blue(`📊 Found ${records.length} hits`));
    console.log('─'.repeat(80));
    for (const record of records) {
        const score = record.score === undefined ? 'N/A' : record.score;
        console.log(chalk.green(`bin ${record.binId}  ${record.chromosome}:${record.start}-${record.end}`));
        console.log(chalk.gray(`  Dataset: ${record.datasetId} | Motif: ${record.motifId} | Score: ${score}`));
    }
}

function withStoreOptions(command: Command): Command {
    return command
        .requiredOption('-s, --species <species>', 'Species / genome assembly (e.g. hg38)')
        .requiredOption('-w, --window-size <bp>', 'Window size in base pairs', parseInteger)
        .option('--workspace <dir>', 'Workspace directory', config.workspace.root);
}

const program = new Command();

program
    .name('motif-index')
    .description('Bin genomic motif tracks into fixed-size windows and load them into an indexed store')
    .version('1.0.0');

program
    .command('build')
    .description('Extract, aggregate, sort and load motif hits for one species and window size')
    .requiredOption('-s, --species <species>', 'Species / genome assembly (e.g. hg38)')
    .requiredOption('-w, --window-size <bp>', 'Window size in base pairs', parseInteger)
    .option('-m, --motifs <ids>', 'Motif dataset ids (comma-separated, repeatable)', splitList)
    .option('--motifs-file <file>', 'File listing motif dataset ids, one per line')
    .option('--source-dir <dir>', 'Directory holding <dataset>.bed[.gz] tracks', config.workspace.sourceDir)
    .option('--chrom-sizes <file>', 'Chromosome sizes reference (default: <source-dir>/<species>.chrom.sizes)')
    .option('--workspace <dir>', 'Workspace directory', config.workspace.root)
    .option('-t, --threads <number>', 'Datasets extracted in parallel', parseInteger, config.workers.maxThreads)
    .option('--sort-memory <records>', 'Records sorted in memory before spilling to disk', parseInteger, config.sort.memoryRecords)
    .option('-b, --batch-size <number>', 'Rows per store insert transaction', parseInteger, config.store.batchSize)
    .option('--clean', 'Remove intermediate artifacts after a successful build')
    .option('--no-progress', 'Disable progress bars')
    .action(async (options) => {
        try {
            const motifs: string[] = [
                ...(options.motifs ?? []),
                ...(options.motifsFile ? readMotifList(options.motifsFile) : []),
            ];

            const pipelineConfig = createPipelineConfig({
                species: options.species,
                windowSize: options.windowSize,
                motifs,
                workspace: options.workspace,
                sourceDir: options.sourceDir,
                chromSizesPath: options.chromSizes,
                concurrency: options.threads,
                sortMemoryRecords: options.sortMemory,
                batchSize: options.batchSize,
                keepIntermediates: !options.clean,
            });

            console.log(chalk.blue('🧬 Starting motif index build...'));
            console.log(chalk.gray(`📁 Sources: ${pipelineConfig.sourceDir}`));
            console.log(chalk.gray(`🧩 Datasets: ${pipelineConfig.motifs.length}`));
            console.log(chalk.gray(`🔄 Threads: ${pipelineConfig.concurrency}`));

            const progress = options.progress ? new PipelineProgress(pipelineConfig.species, pipelineConfig.windowSize) : null;
            const runner = new PipelineRunner(
                pipelineConfig,
                new LocalDatasetSource(pipelineConfig.sourceDir),
                new Logger(progress ? 'warn' : config.logging.level)
            );

            runner.on('stage', (transition: StageTransition) => progress?.stage(transition.to));
            runner.on('dataset-start', (dataset: MotifDataset) => progress?.datasetStarted(dataset.datasetId));
            runner.on('dataset', (stats: ExtractionStats) => progress?.datasetFinished(stats.datasetId, stats.records));
            runner.on('failed', (failure: PipelineFailure) => {
                progress?.error(`${failure.stage}: ${describeError(failure.error)}`);
                progress?.stop();
            });

            const summary = await runner.run();
            progress?.complete();
            progress?.stop();

            console.log(chalk.green('✅ Build complete!'));
            console.log(chalk.gray(`📊 Hits: ${summary.hits} | Bin records: ${summary.records} | Bins: ${summary.bins}`));
            console.log(chalk.gray(`🗄️  Store: ${summary.storePath}`));
            console.log(chalk.gray(`⏱️  Time: ${Math.round(summary.elapsedTime / 1000)}s`));
        } catch (error) {
            fail(error);
        }
    });

withStoreOptions(program
    .command('query')
    .description('Query motif hits by bin id or bin range'))
    .option('-b, --bin <id>', 'Single bin id', parseInteger)
    .option('--from <id>', 'First bin id of a range', parseInteger)
    .option('--to <id>', 'Last bin id of a range (inclusive)', parseInteger)
    .option('-d, --datasets <ids>', 'Restrict to dataset ids (comma-separated)', splitList)
    .option('-l, --limit <number>', 'Maximum results', parseInteger, 100)
    .action((options) => {
        try {
            const fromBin: number | undefined = options.bin ?? options.from;
            const toBin: number | undefined = options.bin ?? options.to ?? fromBin;
            if (fromBin === undefined || toBin === undefined) {
                throw new InvalidArgumentError('Provide --bin or --from/--to');
            }

            const store = openStore(options);
            try {
                printRecords(store.queryBinRange({
                    fromBin,
                    toBin,
                    datasetIds: options.datasets,
                    limit: options.limit,
                }));
            } finally {
                store.close();
            }
        } catch (error) {
            fail(error);
        }
    });

withStoreOptions(program
    .command('region')
    .description('Query motif hits overlapping a genomic region'))
    .requiredOption('-c, --chrom <chromosome>', 'Chromosome')
    .requiredOption('--start <position>', 'Start (0-based, inclusive)', parseInteger)
    .requiredOption('--end <position>', 'End (exclusive)', parseInteger)
    .option('--chrom-sizes <file>', 'Chromosome sizes reference used to build the store')
    .option('--source-dir <dir>', 'Directory holding the chromosome sizes reference', config.workspace.sourceDir)
    .option('-d, --datasets <ids>', 'Restrict to dataset ids (comma-separated)', splitList)
    .option('-l, --limit <number>', 'Maximum results', parseInteger, 100)
    .action(async (options) => {
        try {
            const chromSizesPath: string = options.chromSizes
                ?? config.workspace.chromSizesPath
                ?? `${options.sourceDir}/${options.species}.chrom.sizes`;
            const binner = new IntervalBinner(await ChromosomeOffsetTable.fromFile(chromSizesPath, options.windowSize));

            const store = openStore(options);
            try {
                printRecords(store.queryRegion(binner, {
                    chromosome: options.chrom,
                    start: options.start,
                    end: options.end,
                    datasetIds: options.datasets,
                    limit: options.limit,
                }));
            } finally {
                store.close();
            }
        } catch (error) {
            fail(error);
        }
    });

withStoreOptions(program
    .command('metadata')
    .description('Show motif dataset metadata')
    .argument('[dataset]', 'Dataset id (all datasets when omitted)'))
    .action((dataset: string | undefined, options: StoreOptions) => {
        try {
            const store = openStore(options);
            try {
                const rows = dataset !== undefined ? [store.getDataset(dataset)] : store.listDatasets();
                for (const row of rows) {
                    if (!row) {
                        console.log(chalk.yellow(`Dataset '${dataset}' not found`));
                        continue;
                    }
                    console.log(chalk.green(row.datasetId) + chalk.gray(`  ${row.name} | ${row.sourceInfo} | ${row.species}`));
                }
            } finally {
                store.close();
            }
        } catch (error) {
            fail(error);
        }
    });

withStoreOptions(program
    .command('stats')
    .description('Show motif store statistics'))
    .action((options: StoreOptions) => {
        try {
            const store = openStore(options);
            try {
                const stats = store.getStats();
                console.log(chalk.blue('📊 Motif Store Statistics'));
                console.log('─'.repeat(50));
                console.log(chalk.green(`Species: ${stats.species ?? 'unknown'}`));
                console.log(chalk.green(`Window size: ${stats.windowSize ?? 'unknown'}`));
                console.log(chalk.green(`Total hits: ${stats.totalHits.toLocaleString()}`));
                console.log(chalk.green(`Occupied bins: ${stats.distinctBins.toLocaleString()}`));
                if (stats.binRange) {
                    console.log(chalk.green(`Bin range: ${stats.binRange[0]} - ${stats.binRange[1]}`));
                }
                console.log(chalk.green(`Datasets: ${stats.datasets}`));
                console.log(chalk.green(`Store size: ${stats.storeSize}`));
                console.log(chalk.gray(`Created: ${stats.createdAt ?? 'unknown'}`));
            } finally {
                store.close();
            }
        } catch (error) {
            fail(error);
        }
    });

program.configureOutput({
    outputError: (str, write) => write(chalk.red(str))
});

program.parseAsync().catch(fail);
