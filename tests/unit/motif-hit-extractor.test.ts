/**
 * Unit tests for motif hit extraction and the metadata table
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import path from 'path';
import { MetadataTable, formatMetadataRow, type MotifDataset } from '../../src/extraction/metadata-table';
import { MotifHitExtractor, type ExtractionStats } from '../../src/extraction/motif-hit-extractor';
import { InvalidIntervalError, MalformedInputError, UnknownChromosomeError } from '../../src/utils/errors';
import { collect, createBinner, exists, makeTempDir, removeDir, writeText } from '../helpers';

function dataset(datasetId: string, name = datasetId): MotifDataset {
  return { datasetId, species: 'hg38', name, sourceInfo: `${datasetId}.1` };
}

describe('MotifHitExtractor', () => {
  let dir: string;
  let metadata: MetadataTable;
  let extractor: MotifHitExtractor;

  beforeEach(async () => {
    dir = await makeTempDir();
    metadata = new MetadataTable(path.join(dir, 'metadata.tsv'));
    extractor = new MotifHitExtractor(createBinner(100), metadata);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('toRecords', () => {
    it('should emit one record per overlapped bin sharing the hit interval', () => {
      const records = extractor.toRecords({
        chromosome: 'chr1',
        start: 50,
        end: 150,
        strand: '+',
        datasetId: 'A',
        motifId: 'A',
        score: 4,
      });

      expect(records).toEqual([
        { binId: 0, datasetId: 'A', motifId: 'A', chromosome: 'chr1', start: 50, end: 150, score: 4 },
        { binId: 1, datasetId: 'A', motifId: 'A', chromosome: 'chr1', start: 50, end: 150, score: 4 },
      ]);
    });

    it('should leave score out when the hit has none', () => {
      const [record] = extractor.toRecords({
        chromosome: 'chr2', start: 0, end: 1, strand: '.', datasetId: 'B', motifId: 'B',
      });

      expect(record).toEqual({ binId: 10, datasetId: 'B', motifId: 'B', chromosome: 'chr2', start: 0, end: 1 });
      expect('score' in record).toBe(false);
    });
  });

  describe('records', () => {
    it('should lazily yield records in track order', async () => {
      const track = await writeText(dir, 'A.bed', 'chr1\t250\t260\nchr1\t50\t150\n');

      const records = await collect(extractor.records(dataset('A'), track));

      expect(records.map(record => record.binId)).toEqual([2, 0, 1]);
    });
  });

  describe('extract', () => {
    it('should write the artifact and append the metadata row', async () => {
      const track = await writeText(dir, 'A.bed', 'chr1\t50\t150\tA\t2\t+\nchrX\t10\t20\n');
      const artifact = path.join(dir, 'datasets', 'A.bins.tsv');

      const stats = await extractor.extract(dataset('A', 'Motif A'), track, artifact);

      expect(stats).toMatchObject({
        datasetId: 'A',
        hits: 2,
        records: 3,
        chromosomes: ['chr1', 'chrX'],
        artifactPath: artifact,
      });
      await expect(fs.readFile(artifact, 'utf8')).resolves.toBe(
        '0\tA\tA\tchr1\t50\t150\t2\n' +
        '1\tA\tA\tchr1\t50\t150\t2\n' +
        '15\tA\tA\tchrX\t10\t20\t.\n'
      );
      await expect(metadata.readRows()).resolves.toEqual([
        { datasetId: 'A', species: 'hg38', name: 'Motif A', sourceInfo: 'A.1' },
      ]);
    });

    it('should write an empty artifact for a track without hits', async () => {
      const track = await writeText(dir, 'empty.bed', '# no hits\n');
      const artifact = path.join(dir, 'empty.bins.tsv');

      const stats = await extractor.extract(dataset('empty'), track, artifact);

      expect(stats.records).toBe(0);
      await expect(fs.readFile(artifact, 'utf8')).resolves.toBe('');
      expect(metadata.appendedRows).toBe(1);
    });

    it('should leave no artifact and no metadata when a line midway is malformed', async () => {
      const lines: string[] = [];
      for (let i = 0; i < 1000; i++) {
        lines.push(i === 499 ? 'chr1\tbroken' : `chr1\t${i % 900}\t${(i % 900) + 5}`);
      }
      const track = await writeText(dir, 'bad.bed', lines.join('\n') + '\n');
      const artifact = path.join(dir, 'datasets', 'bad.bins.tsv');
      const failures: unknown[] = [];
      extractor.on('failed', failure => failures.push(failure));

      await expect(extractor.extract(dataset('bad'), track, artifact)).rejects.toMatchObject({
        name: 'MalformedInputError',
        lineNumber: 500,
      });

      expect(await exists(artifact)).toBe(false);
      expect(await exists(`${artifact}.partial`)).toBe(false);
      expect(await exists(metadata.filePath)).toBe(false);
      expect(failures).toHaveLength(1);
    });

    it('should fail on a chromosome missing from the reference', async () => {
      const track = await writeText(dir, 'A.bed', 'chr1\t0\t10\nchr9\t0\t10\n');
      const artifact = path.join(dir, 'A.bins.tsv');

      await expect(extractor.extract(dataset('A'), track, artifact)).rejects.toThrow(UnknownChromosomeError);
      expect(await exists(artifact)).toBe(false);
    });

    it('should report the original error and remove the partial file when the first hit fails', async () => {
      const track = await writeText(dir, 'A.bed', 'chrUn\t1\t2\n');
      const artifact = path.join(dir, 'A.bins.tsv');

      await expect(extractor.extract(dataset('A'), track, artifact)).rejects.toMatchObject({
        name: 'UnknownChromosomeError',
        chromosome: 'chrUn',
      });
      expect((await fs.readdir(dir)).sort()).toEqual(['A.bed']);
    });

    it('should fail on a hit past the chromosome end', async () => {
      const track = await writeText(dir, 'A.bed', 'chrX\t200\t251\n');

      await expect(extractor.extract(dataset('A'), track, path.join(dir, 'A.bins.tsv')))
        .rejects.toThrow(InvalidIntervalError);
      expect((await fs.readdir(dir)).sort()).toEqual(['A.bed']);
    });

    it('should remove a stale artifact from an earlier run when re-extraction fails', async () => {
      const artifact = await writeText(dir, 'A.bins.tsv', '0\tA\tA\tchr1\t0\t10\t.\n');
      const track = await writeText(dir, 'A.bed', 'chr1\t0\n');

      await expect(extractor.extract(dataset('A'), track, artifact)).rejects.toThrow(MalformedInputError);
      expect(await exists(artifact)).toBe(false);
    });

    it('should replace the artifact and keep the latest metadata on re-run', async () => {
      const artifact = path.join(dir, 'A.bins.tsv');
      const first = await writeText(dir, 'A-v1.bed', 'chr1\t0\t10\n');
      const second = await writeText(dir, 'A-v2.bed', 'chr2\t0\t10\n');

      await extractor.extract(dataset('A', 'first name'), first, artifact);
      await extractor.extract(dataset('A', 'second name'), second, artifact);

      await expect(fs.readFile(artifact, 'utf8')).resolves.toBe('10\tA\tA\tchr2\t0\t10\t.\n');
      await expect(metadata.readAllRows()).resolves.toHaveLength(2);
      await expect(metadata.readRows()).resolves.toEqual([
        { datasetId: 'A', species: 'hg38', name: 'second name', sourceInfo: 'A.1' },
      ]);
    });

    it('should emit start, progress and complete events', async () => {
      const progressExtractor = new MotifHitExtractor(createBinner(100), metadata, 2);
      const track = await writeText(dir, 'A.bed', 'chr1\t50\t150\nchr1\t0\t1\nchr1\t2\t3\n');
      const events: string[] = [];
      let completed: ExtractionStats | undefined;
      progressExtractor.on('start', () => events.push('start'));
      progressExtractor.on('progress', ({ hits, records }) => events.push(`progress ${hits}/${records}`));
      progressExtractor.on('complete', (stats: ExtractionStats) => {
        events.push('complete');
        completed = stats;
      });

      await progressExtractor.extract(dataset('A'), track, path.join(dir, 'A.bins.tsv'));

      expect(events).toEqual(['start', 'progress 2/3', 'complete']);
      expect(completed?.records).toBe(4);
    });
  });
});

describe('MetadataTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should format rows as tab-delimited lines, sanitizing embedded separators', () => {
    expect(formatMetadataRow({ datasetId: 'MA0001', species: 'hg38', name: 'AGL3\tvariant', sourceInfo: '' }))
      .toBe('MA0001\thg38\tAGL3 variant\t.');
  });

  it('should return no rows for a table that does not exist yet', async () => {
    await expect(new MetadataTable(path.join(dir, 'missing.tsv')).readRows()).resolves.toEqual([]);
  });

  it('should never interleave concurrent appends', async () => {
    const table = new MetadataTable(path.join(dir, 'nested', 'metadata.tsv'));
    const ids = Array.from({ length: 50 }, (_, i) => `DS${String(i).padStart(3, '0')}`);

    await Promise.all(ids.map(id => table.append(dataset(id, `name of ${id}`))));

    const rows = await table.readAllRows();
    expect(rows).toHaveLength(50);
    expect(rows.map(row => row.datasetId).sort()).toEqual(ids);
    expect(rows.every(row => row.name === `name of ${row.datasetId}`)).toBe(true);
    expect(table.appendedRows).toBe(50);
  });

  it('should keep the first-seen order when deduplicating', async () => {
    const table = new MetadataTable(path.join(dir, 'metadata.tsv'));
    await table.append(dataset('B', 'b1'));
    await table.append(dataset('A', 'a1'));
    await table.append(dataset('B', 'b2'));

    const rows = await table.readRows();

    expect(rows.map(row => [row.datasetId, row.name])).toEqual([['B', 'b2'], ['A', 'a1']]);
  });

  it('should reject rows with the wrong column count', async () => {
    const filePath = await writeText(dir, 'metadata.tsv', 'A\thg38\tname\tinfo\nB\thg38\n');

    await expect(new MetadataTable(filePath).readAllRows()).rejects.toMatchObject({
      name: 'MalformedInputError',
      lineNumber: 2,
    });
  });

  it('should clear the table after pending appends finish', async () => {
    const table = new MetadataTable(path.join(dir, 'metadata.tsv'));
    const pending = table.append(dataset('A'));

    await table.clear();
    await pending;

    expect(await exists(table.filePath)).toBe(false);
  });
});
