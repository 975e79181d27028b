export { ChromosomeOffsetTable, readChromosomeSizes, ChromosomeSize, ChromosomeOffset } from './binning/chromosome-offsets.js';
export { IntervalBinner, GenomicWindow } from './binning/interval-binner.js';
export { TrackParser, MotifHit, Strand } from './parser/track-parser.js';
export { BinRecord, BinRecordWriter, formatBinRecord, parseBinRecord, readBinRecords } from './records/bin-record.js';
export { MetadataTable, MetadataRow, MotifDataset } from './extraction/metadata-table.js';
export { MotifHitExtractor, ExtractionStats } from './extraction/motif-hit-extractor.js';
export { HitAggregator, AggregationStats } from './aggregation/hit-aggregator.js';
export { ExternalSorter, SortStats } from './aggregation/external-sorter.js';
export { StoreLoader, StoreLoadOptions, StoreLoadStats } from './store/store-loader.js';
export { MotifStoreQuery, StoreStats } from './store/query-engine.js';
export { PipelineRunner, PipelineSummary } from './pipeline/pipeline-runner.js';
export { PipelineStateMachine, PipelineStage } from './pipeline/pipeline-state.js';
export { DatasetSource, FetchedDataset, LocalDatasetSource } from './sources/dataset-source.js';
export { config, createPipelineConfig, pipelinePaths, PipelineConfig } from './config/index.js';
export {
    MotifIndexError,
    InvalidIntervalError,
    MalformedInputError,
    UnknownChromosomeError,
    MissingArtifactError,
    StoreWriteError,
    StoreNotFoundError,
    ConfigError,
} from './utils/errors.js';
export { Logger, logger } from './utils/logger.js';
