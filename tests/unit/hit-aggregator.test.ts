/**
 * Unit tests for the external sorter and hit aggregator
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import path from 'path';
import { HitAggregator } from '../../src/aggregation/hit-aggregator';
import { ExternalSorter } from '../../src/aggregation/external-sorter';
import { MinHeap } from '../../src/aggregation/min-heap';
import { createPipelineConfig, datasetArtifactPath, pipelinePaths, type PipelinePaths } from '../../src/config/index';
import { formatBinRecord, type BinRecord } from '../../src/records/bin-record';
import { MissingArtifactError } from '../../src/utils/errors';
import { exists, makeTempDir, readRecords, removeDir, writeText } from '../helpers';

function record(binId: number, datasetId = 'A', start = binId * 100): BinRecord {
  return { binId, datasetId, motifId: datasetId, chromosome: 'chr1', start, end: start + 10 };
}

async function* fromArray(records: BinRecord[]): AsyncGenerator<BinRecord> {
  yield* records;
}

function artifact(records: BinRecord[]): string {
  return records.map(item => formatBinRecord(item) + '\n').join('');
}

describe('MinHeap', () => {
  it('should pop values in comparator order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const value of [5, 1, 9, 3, 7, 1]) {
      heap.push(value);
    }

    const popped: number[] = [];
    for (let value = heap.pop(); value !== undefined; value = heap.pop()) {
      popped.push(value);
    }

    expect(popped).toEqual([1, 1, 3, 5, 7, 9]);
    expect(heap.size).toBe(0);
    expect(heap.peek()).toBeUndefined();
  });
});

describe('ExternalSorter', () => {
  let dir: string;
  let scratchDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    scratchDir = path.join(dir, 'scratch');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const unsortedBins = [7, 2, 9, 0, 4, 4, 8, 1, 6, 3];

  it('should spill and merge when input exceeds the memory budget', async () => {
    const sorter = new ExternalSorter({ memoryRecords: 3, scratchDir });
    const spills: number[] = [];
    sorter.on('spill', ({ records }) => spills.push(records));
    const output = path.join(dir, 'sorted.tsv');

    const stats = await sorter.sort(fromArray(unsortedBins.map(bin => record(bin))), output);

    expect(stats.records).toBe(10);
    expect(stats.runs).toBe(4);
    expect(spills).toEqual([3, 3, 3, 1]);
    const sorted = await readRecords(output);
    expect(sorted.map(item => item.binId)).toEqual([0, 1, 2, 3, 4, 4, 6, 7, 8, 9]);
  });

  it('should sort in memory without spilling when input fits', async () => {
    const sorter = new ExternalSorter({ memoryRecords: 100, scratchDir });
    const output = path.join(dir, 'sorted.tsv');

    const stats = await sorter.sort(fromArray(unsortedBins.map(bin => record(bin))), output);

    expect(stats.runs).toBe(0);
    expect((await readRecords(output)).map(item => item.binId)).toEqual([0, 1, 2, 3, 4, 4, 6, 7, 8, 9]);
  });

  it('should produce the same records whichever path it takes', async () => {
    const input = unsortedBins.map(bin => record(bin, bin % 2 === 0 ? 'even' : 'odd'));
    const key = (item: BinRecord): string => formatBinRecord(item);

    await new ExternalSorter({ memoryRecords: 2, scratchDir }).sort(fromArray(input), path.join(dir, 'spilled.tsv'));
    await new ExternalSorter({ memoryRecords: 50, scratchDir }).sort(fromArray(input), path.join(dir, 'memory.tsv'));

    const spilled = (await readRecords(path.join(dir, 'spilled.tsv'))).map(key).sort();
    const inMemory = (await readRecords(path.join(dir, 'memory.tsv'))).map(key).sort();
    expect(spilled).toEqual(inMemory);
    expect(spilled).toEqual(input.map(key).sort());
  });

  it('should write an empty output for empty input', async () => {
    const output = path.join(dir, 'sorted.tsv');

    const stats = await new ExternalSorter({ memoryRecords: 3, scratchDir }).sort(fromArray([]), output);

    expect(stats).toMatchObject({ records: 0, runs: 0 });
    await expect(fs.readFile(output, 'utf8')).resolves.toBe('');
  });

  it('should remove its run files after sorting', async () => {
    await new ExternalSorter({ memoryRecords: 2, scratchDir })
      .sort(fromArray(unsortedBins.map(bin => record(bin))), path.join(dir, 'sorted.tsv'));

    await expect(fs.readdir(scratchDir)).resolves.toEqual([]);
  });

  it('should remove run files and leave no output when the input fails', async () => {
    async function* failing(): AsyncGenerator<BinRecord> {
      yield record(3);
      yield record(1);
      yield record(2);
      throw new Error('input broke');
    }
    const output = path.join(dir, 'sorted.tsv');

    await expect(new ExternalSorter({ memoryRecords: 2, scratchDir }).sort(failing(), output))
      .rejects.toThrow('input broke');

    expect(await exists(output)).toBe(false);
    await expect(fs.readdir(scratchDir)).resolves.toEqual([]);
  });
});

describe('HitAggregator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function setup(motifs: string[], sortMemoryRecords = 3) {
    const pipelineConfig = createPipelineConfig({
      species: 'hg38',
      windowSize: 100,
      motifs,
      workspace: dir,
      sourceDir: dir,
      sortMemoryRecords,
      concurrency: 2,
    });
    const paths = pipelinePaths(pipelineConfig);
    return { pipelineConfig, paths, aggregator: new HitAggregator(pipelineConfig, paths) };
  }

  async function writeArtifact(datasetId: string, records: BinRecord[], paths: PipelinePaths): Promise<void> {
    const target = datasetArtifactPath(paths, datasetId);
    await writeText(path.dirname(target), path.basename(target), artifact(records));
  }

  it('should concatenate and sort every configured dataset', async () => {
    const { aggregator, paths } = setup(['A', 'B']);
    await writeArtifact('A', [record(5, 'A'), record(0, 'A'), record(1, 'A')], paths);
    await writeArtifact('B', [record(2, 'B'), record(9, 'B'), record(3, 'B'), record(1, 'B')], paths);

    const stats = await aggregator.aggregate();

    expect(stats).toMatchObject({ datasets: 2, records: 7, runs: 3, outputPath: paths.combinedArtifact });
    const sorted = await readRecords(paths.combinedArtifact);
    expect(sorted.map(item => item.binId)).toEqual([0, 1, 1, 2, 3, 5, 9]);
    expect(sorted.filter(item => item.datasetId === 'A')).toHaveLength(3);
  });

  it('should keep the unsorted concatenation in dataset order', async () => {
    const { aggregator, paths } = setup(['B', 'A']);
    await writeArtifact('A', [record(1, 'A')], paths);
    await writeArtifact('B', [record(4, 'B'), record(0, 'B')], paths);

    const stats = await aggregator.concatenate();

    expect(stats).toEqual({ datasets: 2, records: 3, outputPath: paths.unsortedArtifact });
    expect((await readRecords(paths.unsortedArtifact)).map(item => `${item.datasetId}${item.binId}`))
      .toEqual(['B4', 'B0', 'A1']);
  });

  it('should sort in memory when the records fit', async () => {
    const { aggregator, paths } = setup(['A'], 1000);
    await writeArtifact('A', [record(3), record(1), record(2)], paths);

    const stats = await aggregator.aggregate();

    expect(stats.runs).toBe(0);
    expect((await readRecords(paths.combinedArtifact)).map(item => item.binId)).toEqual([1, 2, 3]);
  });

  it('should refuse to aggregate when a dataset artifact is missing', async () => {
    const { aggregator, paths } = setup(['A', 'B']);
    await writeArtifact('A', [record(1)], paths);

    expect(() => aggregator.resolveInputs()).toThrow(MissingArtifactError);
    await expect(aggregator.aggregate()).rejects.toMatchObject({
      name: 'MissingArtifactError',
      datasetId: 'B',
    });
    expect(await exists(paths.unsortedArtifact)).toBe(false);
    expect(await exists(paths.combinedArtifact)).toBe(false);
  });

  it('should refuse to sort without a concatenated artifact', async () => {
    const { aggregator } = setup(['A']);

    await expect(aggregator.sort()).rejects.toThrow(MissingArtifactError);
  });

  it('should forward spill events and report the sorted stats', async () => {
    const { aggregator, paths } = setup(['A'], 2);
    await writeArtifact('A', [record(4), record(3), record(2), record(1), record(0)], paths);
    const spills: number[] = [];
    const sortedRuns: number[] = [];
    aggregator.on('spill', ({ run }) => spills.push(run));
    aggregator.on('sorted', ({ runs }) => sortedRuns.push(runs));

    await aggregator.aggregate();

    expect(spills).toEqual([0, 1, 2]);
    expect(sortedRuns).toEqual([3]);
  });
});
