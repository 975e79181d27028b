/**
 * Error types raised by the binning pipeline.
 *
 * Every error carries a stable `code` so the CLI and the pipeline runner can
 * report failures without string matching on messages.
 */

export type MotifIndexErrorCode =
    | 'INVALID_INTERVAL'
    | 'MALFORMED_INPUT'
    | 'UNKNOWN_CHROMOSOME'
    | 'MISSING_ARTIFACT'
    | 'STORE_WRITE'
    | 'STORE_NOT_FOUND'
    | 'CONFIG';

export class MotifIndexError extends Error {
    constructor(
        message: string,
        public readonly code: MotifIndexErrorCode,
        public readonly lineNumber?: number,
        public readonly context?: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'MotifIndexError';
    }

    override toString(): string {
        let msg = `${this.name}: ${this.message}`;
        if (this.lineNumber !== undefined) {
            msg += ` (line ${this.lineNumber})`;
        }
        if (this.context !== undefined && this.context !== '') {
            msg += `\nContext: ${this.context}`;
        }
        return msg;
    }
}

/**
 * Coordinates that cannot be binned: zero-length or inverted intervals,
 * negative or fractional positions, or an end past the chromosome length.
 */
export class InvalidIntervalError extends MotifIndexError {
    constructor(
        message: string,
        public readonly chromosome?: string,
        public readonly start?: number,
        public readonly end?: number
    ) {
        super(message, 'INVALID_INTERVAL', undefined,
            chromosome !== undefined ? `${chromosome}:${start}-${end}` : undefined);
        this.name = 'InvalidIntervalError';
    }
}

export class MalformedInputError extends MotifIndexError {
    constructor(
        message: string,
        public readonly source: string,
        lineNumber?: number,
        context?: string
    ) {
        super(message, 'MALFORMED_INPUT', lineNumber, context);
        this.name = 'MalformedInputError';
    }

    override toString(): string {
        return `${super.toString()}\nSource: ${this.source}`;
    }
}

export class UnknownChromosomeError extends MotifIndexError {
    constructor(public readonly chromosome: string) {
        super(`Chromosome '${chromosome}' is not present in the chromosome sizes reference`,
            'UNKNOWN_CHROMOSOME');
        this.name = 'UnknownChromosomeError';
    }
}

/**
 * A per-dataset artifact (or source track) that must exist before a stage
 * may start.
 */
export class MissingArtifactError extends MotifIndexError {
    constructor(message: string, public readonly path: string, public readonly datasetId?: string) {
        super(message, 'MISSING_ARTIFACT', undefined, path);
        this.name = 'MissingArtifactError';
    }
}

export class StoreWriteError extends MotifIndexError {
    constructor(message: string, public readonly storePath: string, cause?: unknown) {
        super(cause !== undefined ? `${message}: ${describeError(cause)}` : message,
            'STORE_WRITE', undefined, storePath, { cause });
        this.name = 'StoreWriteError';
    }
}

export class StoreNotFoundError extends MotifIndexError {
    constructor(public readonly storePath: string) {
        super(`No motif store found at ${storePath}`, 'STORE_NOT_FOUND', undefined, storePath);
        this.name = 'StoreNotFoundError';
    }
}

export class ConfigError extends MotifIndexError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG');
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
