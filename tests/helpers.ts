import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import { ChromosomeOffsetTable } from '../src/binning/chromosome-offsets';
import { IntervalBinner } from '../src/binning/interval-binner';
import { readBinRecords, type BinRecord } from '../src/records/bin-record';

/**
 * chr1: bins 0-9, chr2: bins 10-14, chrX: bins 15-17 at a 100bp window.
 */
export const CHROM_SIZES = 'chr1\t1000\nchr2\t500\nchrX\t250\n';

export const TEST_SIZES = [
  { name: 'chr1', length: 1000 },
  { name: 'chr2', length: 500 },
  { name: 'chrX', length: 250 },
];

export function createBinner(windowSize = 100): IntervalBinner {
  return new IntervalBinner(new ChromosomeOffsetTable(TEST_SIZES, windowSize));
}

export async function makeTempDir(prefix = 'motif-index-'): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeText(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}

export async function writeGzip(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, gzipSync(Buffer.from(content, 'utf8')));
  return filePath;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export async function readRecords(filePath: string): Promise<BinRecord[]> {
  return collect(readBinRecords(filePath));
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
