import type Database from 'better-sqlite3';

export interface StoreColumn {
    name: string;
    type: 'INTEGER' | 'REAL' | 'TEXT';
    nullable?: boolean;
}

export interface StoreTable {
    name: string;
    columns: StoreColumn[];
    primaryKey?: string;
    indexes: { name: string; columns: string[] }[];
}

export const STORE_SCHEMA_VERSION = 1;

/**
 * Hit table: one row per bin record, clustered for range scans by bin id.
 */
export const MOTIF_HITS_TABLE: StoreTable = {
    name: 'motif_hits',
    columns: [
        { name: 'bin_id', type: 'INTEGER' },
        { name: 'dataset_id', type: 'TEXT' },
        { name: 'motif_id', type: 'TEXT' },
        { name: 'chromosome', type: 'TEXT' },
        { name: 'start', type: 'INTEGER' },
        { name: 'end', type: 'INTEGER' },
        { name: 'score', type: 'REAL', nullable: true },
    ],
    indexes: [
        { name: 'motif_hits_bin_idx', columns: ['bin_id'] },
    ],
};

export const MOTIF_DATASETS_TABLE: StoreTable = {
    name: 'motif_datasets',
    columns: [
        { name: 'dataset_id', type: 'TEXT' },
        { name: 'species', type: 'TEXT' },
        { name: 'name', type: 'TEXT' },
        { name: 'source_info', type: 'TEXT' },
    ],
    primaryKey: 'dataset_id',
    indexes: [],
};

export const STORE_INFO_TABLE: StoreTable = {
    name: 'store_info',
    columns: [
        { name: 'key', type: 'TEXT' },
        { name: 'value', type: 'TEXT' },
    ],
    primaryKey: 'key',
    indexes: [],
};

export const STORE_TABLES: readonly StoreTable[] = [MOTIF_HITS_TABLE, MOTIF_DATASETS_TABLE, STORE_INFO_TABLE];

function quote(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
}

export function createTableSql(table: StoreTable): string {
    const columns = table.columns.map((column) => {
        let definition = `${quote(column.name)} ${column.type}`;
        if (!column.nullable) definition += ' NOT NULL';
        if (table.primaryKey === column.name) definition += ' PRIMARY KEY';
        return definition;
    });
    return `CREATE TABLE IF NOT EXISTS ${quote(table.name)} (${columns.join(', ')})`;
}

export function createIndexSql(table: StoreTable): string[] {
    return table.indexes.map(index =>
        `CREATE INDEX IF NOT EXISTS ${quote(index.name)} ON ${quote(table.name)} (${index.columns.map(quote).join(', ')})`);
}

/**
 * Creates every store table. Indexes are created by `createStoreIndexes`
 * after bulk loading, which is cheaper than maintaining them per insert.
 */
export function createStoreTables(db: Database.Database): void {
    for (const table of STORE_TABLES) {
        db.exec(createTableSql(table));
    }
}

export function createStoreIndexes(db: Database.Database): void {
    for (const table of STORE_TABLES) {
        for (const statement of createIndexSql(table)) {
            db.exec(statement);
        }
    }
}
