import { ConfigError, InvalidIntervalError, MalformedInputError, UnknownChromosomeError } from '../utils/errors.js';
import { readLines } from '../utils/line-reader.js';

export interface ChromosomeSize {
    name: string;
    length: number;
}

export interface ChromosomeOffset extends ChromosomeSize {
    /** First bin id assigned to this chromosome */
    base: number;
    binCount: number;
}

/**
 * Chromosome name → cumulative bin-index base, in reference order.
 *
 * Chromosome `i` owns the id range `[base_i, base_i + ceil(length_i / w))`, so
 * ids sort by chromosome (in the order the reference lists them) and then by
 * position. Built once per run and shared read-only by every extraction task.
 */
export class ChromosomeOffsetTable {
    private readonly byName: ReadonlyMap<string, ChromosomeOffset>;
    private readonly ordered: readonly ChromosomeOffset[];
    readonly totalBins: number;

    constructor(sizes: readonly ChromosomeSize[], readonly windowSize: number) {
        if (!Number.isInteger(windowSize) || windowSize <= 0) {
            throw new ConfigError(`Window size must be a positive integer, got ${windowSize}`);
        }

        const byName = new Map<string, ChromosomeOffset>();
        const ordered: ChromosomeOffset[] = [];
        let base = 0;

        for (const size of sizes) {
            if (byName.has(size.name)) {
                throw new MalformedInputError(`Duplicate chromosome '${size.name}'`, 'chromosome sizes');
            }
            if (!Number.isInteger(size.length) || size.length <= 0) {
                throw new MalformedInputError(
                    `Chromosome '${size.name}' has invalid length ${size.length}`, 'chromosome sizes');
            }
            const binCount = Math.ceil(size.length / windowSize);
            const offset = Object.freeze({ name: size.name, length: size.length, base, binCount });
            byName.set(size.name, offset);
            ordered.push(offset);
            base += binCount;
        }

        this.byName = byName;
        this.ordered = Object.freeze(ordered);
        this.totalBins = base;
    }

    static async fromFile(filePath: string, windowSize: number): Promise<ChromosomeOffsetTable> {
        return new ChromosomeOffsetTable(await readChromosomeSizes(filePath), windowSize);
    }

    get(chromosome: string): ChromosomeOffset {
        const offset = this.byName.get(chromosome);
        if (!offset) {
            throw new UnknownChromosomeError(chromosome);
        }
        return offset;
    }

    has(chromosome: string): boolean {
        return this.byName.has(chromosome);
    }

    chromosomes(): readonly ChromosomeOffset[] {
        return this.ordered;
    }

    /**
     * Chromosome owning `binId`, by binary search over the bases.
     */
    chromosomeForBin(binId: number): ChromosomeOffset {
        if (!Number.isInteger(binId) || binId < 0 || binId >= this.totalBins) {
            throw new InvalidIntervalError(`Bin id ${binId} is outside [0, ${this.totalBins})`);
        }

        let lo = 0;
        let hi = this.ordered.length - 1;
        while (lo < hi) {
            const mid = (lo + hi + 1) >> 1;
            if (this.ordered[mid].base <= binId) {
                lo = mid;
            } else {
                hi = mid - 1;
            }
        }
        return this.ordered[lo];
    }
}

/**
 * Reads a `chrom.sizes` style reference: `name<TAB>length` per line.
 */
export async function readChromosomeSizes(filePath: string): Promise<ChromosomeSize[]> {
    const sizes: ChromosomeSize[] = [];
    let lineNumber = 0;

    for await (const rawLine of readLines(filePath)) {
        lineNumber++;
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;

        const columns = line.split(/\s+/);
        if (columns.length < 2 || !/^\d+$/.test(columns[1])) {
            throw new MalformedInputError('Expected "<chromosome> <length>"', filePath, lineNumber, line);
        }
        sizes.push({ name: columns[0], length: parseInt(columns[1], 10) });
    }

    if (sizes.length === 0) {
        throw new MalformedInputError('Chromosome sizes reference is empty', filePath);
    }
    return sizes;
}
