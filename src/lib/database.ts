/**
 * Local SQLite database backed by sql.js (SQLite compiled to WASM).
 *
 * The database lives in memory and is persisted to a single file by
 * exporting the binary image. Passing a null path keeps it in memory only.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';

export type SqlRow = Record<string, SqlValue>;

/**
 * Synchronous statement executor. Statements issued through one executor
 * inside `transaction()` cannot interleave with other callers.
 */
export interface SqlExecutor {
  run(query: string, params?: SqlValue[]): number;
  all(query: string, params?: SqlValue[]): SqlRow[];
}

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder params array accordingly.
 */
export function convertParams(query: string, params: SqlValue[]): { query: string; params: SqlValue[] } {
  const paramRefs: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramRefs.push(parseInt(match[1], 10));
  }

  if (paramRefs.length === 0) {
    return { query, params };
  }

  const newParams = paramRefs.map(paramNum => params[paramNum - 1] ?? null);
  return { query: query.replace(/\$\d+/g, '?'), params: newParams };
}

/**
 * Transform sql.js results to array of objects.
 * sql.js returns: [{ columns: ['id', 'name'], values: [[1, 'foo'], [2, 'bar']] }]
 */
function transformResults(results: { columns: string[]; values: SqlValue[][] }[]): SqlRow[] {
  if (results.length === 0) return [];

  const { columns, values } = results[0];
  return values.map(row => {
    const obj: SqlRow = {};
    columns.forEach((col, i) => {
      obj[col] = row[i];
    });
    return obj;
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SqliteDatabase implements SqlExecutor {
  private inTransaction = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    readonly filePath: string | null
  ) {}

  /**
   * Open the database file, creating an empty database when it does not
   * exist yet. A null path opens a throwaway in-memory database.
   */
  static async open(filePath: string | null): Promise<SqliteDatabase> {
    const SQL = await initSqlJs();

    let existing: Uint8Array | null = null;
    if (filePath) {
      try {
        existing = await readFile(filePath);
      } catch (error) {
        if (!isMissingFile(error)) throw error;
      }
    }

    const db = existing ? new SQL.Database(existing) : new SQL.Database();
    return new SqliteDatabase(db, filePath);
  }

  run(query: string, params: SqlValue[] = []): number {
    const converted = convertParams(query, params);
    try {
      this.db.run(converted.query, converted.params);
      return this.db.getRowsModified();
    } catch (error) {
      console.error('[Database] SQL execute error:', error, { query });
      throw error;
    }
  }

  all(query: string, params: SqlValue[] = []): SqlRow[] {
    const converted = convertParams(query, params);
    try {
      return transformResults(this.db.exec(converted.query, converted.params));
    } catch (error) {
      console.error('[Database] SQL select error:', error, { query });
      throw error;
    }
  }

  /**
   * Execute a SQL statement (INSERT, UPDATE, DELETE, CREATE TABLE, etc.).
   */
  async execute(query: string, params: SqlValue[] = []): Promise<{ rowsAffected: number }> {
    return { rowsAffected: this.run(query, params) };
  }

  async select(query: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    return this.all(query, params);
  }

  /**
   * Run `work` between BEGIN and COMMIT. Any throw rolls the whole
   * transaction back and is rethrown.
   */
  transaction<R>(work: (executor: SqlExecutor) => R): R {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }

    this.inTransaction = true;
    this.db.run('BEGIN');
    try {
      const result = work(this);
      this.db.run('COMMIT');
      return result;
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  /**
   * Write the database image to disk. Goes through a temporary file and a
   * rename so a crash mid-write leaves the previous image intact.
   */
  async persist(): Promise<void> {
    if (!this.filePath) return;

    const data = this.db.export();
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, data);
    await rename(tempPath, this.filePath);
  }

  close(): void {
    this.db.close();
  }
}
