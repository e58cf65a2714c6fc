import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { TABLE_NAMES, type TableName } from '../types/snapshot';
import { TableWriteError } from '../utils/errors';
import { applySchema, TABLE_COLUMNS } from './schema';

export type CellValue = string | number | null;
export type Row = Record<string, CellValue>;

/**
 * Tabular destination with create-or-replace-partition semantics
 */
export interface TableStore {
  /** Swap the rows of one `snapshot_date` partition in a single atomic step */
  replacePartition(table: TableName, snapshotDate: string, rows: Row[]): Promise<number>;
  countPartition(table: TableName, snapshotDate: string): Promise<number>;
  readPartition(table: TableName, snapshotDate: string): Promise<Row[]>;
  /** Ids in the most recent partition of `table`, or null when the table is empty */
  latestSnapshotIds(table: TableName): Promise<{ snapshotDate: string; ids: string[] } | null>;
  close(): void;
}

function assertTable(table: string): asserts table is TableName {
  if (!TABLE_NAMES.some((name) => name === table)) {
    throw new Error(`Unknown table: ${table}`);
  }
}

/**
 * SQLite-backed store. DELETE and INSERT for a partition run in one transaction,
 * so readers see either the previous rows or the new ones, never an empty partition.
 */
export class SqliteTableStore implements TableStore {
  constructor(private readonly db: Database.Database) {
    applySchema(db);
  }

  static open(dbPath: string): SqliteTableStore {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    return new SqliteTableStore(db);
  }

  async replacePartition(table: TableName, snapshotDate: string, rows: Row[]): Promise<number> {
    assertTable(table);
    const columns = TABLE_COLUMNS[table];

    const deleteStmt = this.db.prepare(`DELETE FROM ${table} WHERE snapshot_date = ?`);
    const insertStmt = this.db.prepare(
      `INSERT INTO ${table} (snapshot_date, ${columns.join(', ')})
       VALUES (@snapshot_date, ${columns.map((column) => `@${column}`).join(', ')})`
    );

    const replace = this.db.transaction((batch: Row[]) => {
      deleteStmt.run(snapshotDate);
      for (const row of batch) {
        const params: Row = { snapshot_date: snapshotDate };
        for (const column of columns) {
          params[column] = row[column] ?? null;
        }
        insertStmt.run(params);
      }
      return batch.length;
    });

    try {
      return replace(rows);
    } catch (error) {
      throw new TableWriteError(table, snapshotDate, error);
    }
  }

  async countPartition(table: TableName, snapshotDate: string): Promise<number> {
    assertTable(table);
    const row = this.db
      .prepare<[string], { total: number }>(`SELECT COUNT(*) AS total FROM ${table} WHERE snapshot_date = ?`)
      .get(snapshotDate);
    return row?.total ?? 0;
  }

  async readPartition(table: TableName, snapshotDate: string): Promise<Row[]> {
    assertTable(table);
    return this.db
      .prepare<[string], Row>(`SELECT * FROM ${table} WHERE snapshot_date = ? ORDER BY rowid`)
      .all(snapshotDate);
  }

  async latestSnapshotIds(table: TableName): Promise<{ snapshotDate: string; ids: string[] } | null> {
    assertTable(table);
    const latest = this.db
      .prepare<[], { snapshot_date: string | null }>(`SELECT MAX(snapshot_date) AS snapshot_date FROM ${table}`)
      .get();
    if (!latest?.snapshot_date) {
      return null;
    }

    const ids = this.db
      .prepare<[string], { video_id: string }>(
        `SELECT video_id, MIN(rowid) AS first_seen FROM ${table}
         WHERE snapshot_date = ? GROUP BY video_id ORDER BY first_seen`
      )
      .all(latest.snapshot_date)
      .map((row) => row.video_id);

    return { snapshotDate: latest.snapshot_date, ids };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
