import { EventEmitter } from 'events';
import { MalformedInputError } from '../utils/errors.js';
import { readLines } from '../utils/line-reader.js';

export type Strand = '+' | '-' | '.';

export interface MotifHit {
    chromosome: string;
    start: number;
    end: number;
    strand: Strand;
    datasetId: string;
    motifId: string;
    score?: number;
}

export interface TrackParseProgress {
    hits: number;
    line: number;
}

const HEADER_PREFIXES = ['#', 'track', 'browser'];
const INTEGER = /^\d+$/;
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parser for BED-like motif tracks:
 * `chromosome start end [name] [score] [strand] [extra...]`, tab- or
 * whitespace-delimited, plain or gzip compressed.
 *
 * The name column becomes the motif id; rows without one fall back to the
 * dataset id. Any malformed row rejects the whole file.
 */
export class TrackParser extends EventEmitter {
    private lineNumber = 0;
    private hitCount = 0;

    constructor(
        private readonly datasetId: string,
        private readonly progressInterval: number = 100000
    ) {
        super();
    }

    async *parseFile(filePath: string): AsyncGenerator<MotifHit> {
        this.lineNumber = 0;
        this.hitCount = 0;

        for await (const line of readLines(filePath)) {
            this.lineNumber++;
            const hit = this.parseLine(line, filePath);
            if (!hit) continue;

            this.hitCount++;
            if (this.hitCount % this.progressInterval === 0) {
                this.emit('progress', { hits: this.hitCount, line: this.lineNumber } satisfies TrackParseProgress);
            }
            yield hit;
        }
    }

    parseLine(line: string, source: string = this.datasetId, lineNumber: number = this.lineNumber): MotifHit | null {
        const trimmed = line.trim();
        if (!trimmed || HEADER_PREFIXES.some(prefix => trimmed.startsWith(prefix))) {
            return null;
        }

        const columns = trimmed.split(/\s+/);
        if (columns.length < 3) {
            throw new MalformedInputError(
                `Expected at least 3 columns, found ${columns.length}`, source, lineNumber, trimmed);
        }

        const [chromosome, startText, endText, name, scoreText, strandText] = columns;
        if (!INTEGER.test(startText) || !INTEGER.test(endText)) {
            throw new MalformedInputError('Start and end must be non-negative integers', source, lineNumber, trimmed);
        }

        const hit: MotifHit = {
            chromosome,
            start: parseInt(startText, 10),
            end: parseInt(endText, 10),
            strand: '.',
            datasetId: this.datasetId,
            motifId: name !== undefined && name !== '.' ? name : this.datasetId,
        };

        if (scoreText !== undefined && scoreText !== '.') {
            if (!NUMBER.test(scoreText)) {
                throw new MalformedInputError(`Score '${scoreText}' is not numeric`, source, lineNumber, trimmed);
            }
            hit.score = parseFloat(scoreText);
        }

        if (strandText !== undefined) {
            if (strandText !== '+' && strandText !== '-' && strandText !== '.') {
                throw new MalformedInputError(`Strand '${strandText}' is not one of + - .`, source, lineNumber, trimmed);
            }
            hit.strand = strandText;
        }

        return hit;
    }

    getLineNumber(): number {
        return this.lineNumber;
    }

    getHitCount(): number {
        return this.hitCount;
    }
}
