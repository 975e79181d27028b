import dotenv from 'dotenv';
import { cpus } from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface Config {
    workspace: {
        root: string;
        sourceDir: string;
        chromSizesPath?: string;
    };
    workers: {
        maxThreads: number;
    };
    sort: {
        memoryRecords: number;
    };
    store: {
        batchSize: number;
    };
    logging: {
        level: LogLevel;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(candidate => candidate === value);
    return level ?? 'info';
}

export const config: Config = {
    workspace: {
        root: process.env.MOTIF_INDEX_WORKSPACE || './motif_workspace',
        sourceDir: process.env.MOTIF_SOURCE_DIR || './motif_sources',
        chromSizesPath: process.env.MOTIF_CHROM_SIZES || undefined,
    },
    workers: {
        maxThreads: parseInt(process.env.MAX_WORKER_THREADS || cpus().length.toString()),
    },
    sort: {
        memoryRecords: parseInt(process.env.SORT_MEMORY_RECORDS || '500000'),
    },
    store: {
        batchSize: parseInt(process.env.BATCH_SIZE || '10000'),
    },
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
    },
};

// Ids become file and directory names and tab-delimited columns.
const PATH_SAFE_ID = /^(?:[\w-][\w.-]*)?$/;
const PATH_SAFE_HINT = 'may only contain letters, digits, "_", "-" and ".", and must not start with "."';

const PipelineConfigSchema = z.object({
    species: z.string().trim().min(1, 'species must not be empty').regex(PATH_SAFE_ID, `species ${PATH_SAFE_HINT}`),
    windowSize: z.number().int('windowSize must be an integer').positive('windowSize must be positive'),
    motifs: z.array(z.string().trim().min(1, 'motif ids must not be empty').regex(PATH_SAFE_ID, `motif ids ${PATH_SAFE_HINT}`))
        .min(1, 'at least one motif dataset is required')
        .refine(ids => new Set(ids).size === ids.length, 'motif ids must be unique'),
    workspace: z.string().min(1),
    sourceDir: z.string().min(1),
    chromSizesPath: z.string().min(1),
    concurrency: z.number().int().positive(),
    sortMemoryRecords: z.number().int().positive(),
    batchSize: z.number().int().positive(),
    keepIntermediates: z.boolean(),
});

/**
 * Immutable settings for one (species, window size) pipeline run. Built once
 * at start-up and handed to every component's constructor.
 */
export type PipelineConfig = Readonly<Omit<z.infer<typeof PipelineConfigSchema>, 'motifs'>> & {
    readonly motifs: readonly string[];
};

export interface PipelineConfigInput {
    species: string;
    windowSize: number;
    motifs: readonly string[];
    workspace?: string;
    sourceDir?: string;
    chromSizesPath?: string;
    concurrency?: number;
    sortMemoryRecords?: number;
    batchSize?: number;
    keepIntermediates?: boolean;
}

export function createPipelineConfig(input: PipelineConfigInput): PipelineConfig {
    const sourceDir = input.sourceDir ?? config.workspace.sourceDir;
    const result = PipelineConfigSchema.safeParse({
        species: input.species,
        windowSize: input.windowSize,
        motifs: [...input.motifs],
        workspace: input.workspace ?? config.workspace.root,
        sourceDir,
        chromSizesPath: input.chromSizesPath
            ?? config.workspace.chromSizesPath
            ?? path.join(sourceDir, `${input.species}.chrom.sizes`),
        concurrency: input.concurrency ?? config.workers.maxThreads,
        sortMemoryRecords: input.sortMemoryRecords ?? config.sort.memoryRecords,
        batchSize: input.batchSize ?? config.store.batchSize,
        keepIntermediates: input.keepIntermediates ?? true,
    });

    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
        throw new ConfigError('Invalid pipeline configuration', issues);
    }

    const { motifs, ...rest } = result.data;
    return Object.freeze({ ...rest, motifs: Object.freeze([...motifs]) });
}

export interface PipelinePaths {
    root: string;
    datasetsDir: string;
    scratchDir: string;
    metadataTable: string;
    unsortedArtifact: string;
    combinedArtifact: string;
    store: string;
    sentinel: string;
}

export function datasetArtifactPath(paths: PipelinePaths, datasetId: string): string {
    return path.join(paths.datasetsDir, `${datasetId}.bins.tsv`);
}

export type StoreLocation = Pick<PipelineConfig, 'workspace' | 'species' | 'windowSize'>;

export function pipelinePaths(pipelineConfig: StoreLocation): PipelinePaths {
    const root = path.join(pipelineConfig.workspace, pipelineConfig.species, String(pipelineConfig.windowSize));
    return {
        root,
        datasetsDir: path.join(root, 'datasets'),
        scratchDir: path.join(root, 'sort-runs'),
        metadataTable: path.join(root, 'metadata.tsv'),
        unsortedArtifact: path.join(root, 'combined.unsorted.tsv'),
        combinedArtifact: path.join(root, 'combined.sorted.tsv'),
        store: path.join(root, 'motifs.sqlite'),
        sentinel: path.join(root, `${pipelineConfig.species}_${pipelineConfig.windowSize}.done`),
    };
}
