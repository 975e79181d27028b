import { ChromosomeOffsetTable } from './chromosome-offsets.js';
import { InvalidIntervalError } from '../utils/errors.js';

export interface GenomicWindow {
    binId: number;
    chromosome: string;
    start: number;
    end: number;
}

/**
 * Maps half-open intervals `[start, end)` onto fixed-size windows.
 *
 * `binId = base[chromosome] + floor(position / windowSize)`; a position on a
 * window boundary belongs to the window that starts there.
 */
export class IntervalBinner {
    constructor(private readonly offsets: ChromosomeOffsetTable) {}

    get windowSize(): number {
        return this.offsets.windowSize;
    }

    binsFor(chromosome: string, start: number, end: number): number[] {
        const [first, last] = this.binRange(chromosome, start, end);
        const bins: number[] = [];
        for (let binId = first; binId <= last; binId++) {
            bins.push(binId);
        }
        return bins;
    }

    /**
     * First and last bin id (inclusive) overlapped by `[start, end)`.
     */
    binRange(chromosome: string, start: number, end: number): [number, number] {
        if (!Number.isInteger(start) || !Number.isInteger(end)) {
            throw new InvalidIntervalError('Interval coordinates must be integers', chromosome, start, end);
        }
        if (start < 0) {
            throw new InvalidIntervalError('Interval start must be non-negative', chromosome, start, end);
        }
        if (start >= end) {
            throw new InvalidIntervalError('Interval must satisfy start < end', chromosome, start, end);
        }

        const offset = this.offsets.get(chromosome);
        if (end > offset.length) {
            throw new InvalidIntervalError(
                `Interval ends past the end of ${chromosome} (length ${offset.length})`, chromosome, start, end);
        }

        const w = this.offsets.windowSize;
        return [offset.base + Math.floor(start / w), offset.base + Math.floor((end - 1) / w)];
    }

    locate(binId: number): GenomicWindow {
        const offset = this.offsets.chromosomeForBin(binId);
        const start = (binId - offset.base) * this.offsets.windowSize;
        return {
            binId,
            chromosome: offset.name,
            start,
            end: Math.min(start + this.offsets.windowSize, offset.length),
        };
    }
}
