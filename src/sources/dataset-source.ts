import { existsSync } from 'fs';
import path from 'path';
import type { MotifDataset } from '../extraction/metadata-table.js';
import { MalformedInputError, MissingArtifactError } from '../utils/errors.js';
import { readLines } from '../utils/line-reader.js';

export interface FetchedDataset {
    dataset: MotifDataset;
    trackPath: string;
}

/**
 * Supplies motif tracks for a species. Downloading, caching and naming
 * upstream files is the source's business; the pipeline only needs a local
 * track path and the dataset's descriptive metadata.
 */
export interface DatasetSource {
    fetch(species: string, datasetId: string): Promise<FetchedDataset>;
}

interface CatalogueEntry {
    name: string;
    sourceInfo: string;
}

const TRACK_EXTENSIONS = ['.bed', '.bed.gz'];

/**
 * Dataset source over a directory of already downloaded tracks:
 * `<dir>/<datasetId>.bed[.gz]`, with optional names and matrix ids listed
 * in `<dir>/datasets.tsv` as `dataset_id<TAB>name<TAB>source_info`.
 */
export class LocalDatasetSource implements DatasetSource {
    private catalogue: Promise<Map<string, CatalogueEntry>> | null = null;

    constructor(readonly directory: string) {}

    async fetch(species: string, datasetId: string): Promise<FetchedDataset> {
        const trackPath = this.resolveTrack(datasetId);
        const entry = (await this.loadCatalogue()).get(datasetId);

        return {
            dataset: {
                datasetId,
                species,
                name: entry?.name ?? datasetId,
                sourceInfo: entry?.sourceInfo ?? '.',
            },
            trackPath,
        };
    }

    private resolveTrack(datasetId: string): string {
        for (const extension of TRACK_EXTENSIONS) {
            const candidate = path.join(this.directory, datasetId + extension);
            if (existsSync(candidate)) {
                return candidate;
            }
        }
        throw new MissingArtifactError(
            `No track found for dataset '${datasetId}' (looked for ${TRACK_EXTENSIONS.join(', ')})`,
            path.join(this.directory, datasetId), datasetId);
    }

    private loadCatalogue(): Promise<Map<string, CatalogueEntry>> {
        if (!this.catalogue) {
            this.catalogue = readCatalogue(path.join(this.directory, 'datasets.tsv'));
        }
        return this.catalogue;
    }
}

async function readCatalogue(filePath: string): Promise<Map<string, CatalogueEntry>> {
    const entries = new Map<string, CatalogueEntry>();
    if (!existsSync(filePath)) {
        return entries;
    }

    let lineNumber = 0;
    for await (const line of readLines(filePath)) {
        lineNumber++;
        if (!line.trim() || line.startsWith('#')) continue;

        const columns = line.split('\t');
        if (columns.length < 2) {
            throw new MalformedInputError('Expected "dataset_id<TAB>name[<TAB>source_info]"', filePath, lineNumber, line);
        }
        entries.set(columns[0], { name: columns[1], sourceInfo: columns[2] ?? '.' });
    }
    return entries;
}
