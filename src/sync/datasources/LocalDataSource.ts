/**
 * LocalDataSource
 *
 * SQLite-backed local store. Reads go straight to the database; sync writes
 * are staged in memory and applied together by `save()`.
 */

import type { SqlValue } from 'sql.js';
import type { SqlExecutor, SqliteDatabase } from '@/lib/database';
import { BatchCommitError, errorMessage } from '../errors';
import type { SyncEntityMap, SyncEntityType } from '../types';
import { getTable, TABLES } from './tables';
import type { ExpectedVersion, LocalFilter, LocalStore } from './types';

type StagedWrite =
  | {
      kind: 'insert' | 'update';
      tableName: string;
      id: string;
      row: Record<string, SqlValue>;
      expected?: ExpectedVersion;
    }
  | { kind: 'delete'; tableName: string; id: string };

function entityWrite<K extends SyncEntityType>(
  kind: 'insert' | 'update',
  entityType: K,
  entity: SyncEntityMap[K],
  expected?: ExpectedVersion
): StagedWrite {
  const table = getTable(entityType);
  return { kind, tableName: table.tableName, id: entity.id, row: table.toRow(entity), expected };
}

function deleteWrite(entityType: SyncEntityType, id: string): StagedWrite {
  return { kind: 'delete', tableName: getTable(entityType).tableName, id };
}

/** Apply one write; returns false when a guarded update found a newer row. */
function applyWrite(executor: SqlExecutor, write: StagedWrite): boolean {
  if (write.kind === 'delete') {
    executor.run(`DELETE FROM ${write.tableName} WHERE id = $1`, [write.id]);
    return true;
  }

  const columns = Object.keys(write.row);
  const values = columns.map(column => write.row[column]);

  if (write.kind === 'insert') {
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    executor.run(`INSERT INTO ${write.tableName} (${columns.join(', ')}) VALUES (${placeholders})`, values);
    return true;
  }

  const assignments = columns.filter(column => column !== 'id');
  const setClause = assignments.map((column, i) => `${column} = $${i + 1}`).join(', ');
  const setValues = assignments.map(column => write.row[column]);
  const params: SqlValue[] = [...setValues, write.id];
  let where = `id = $${params.length}`;

  if (write.expected) {
    params.push(write.expected.lastModified.toISOString(), write.expected.isSynced ? 1 : 0);
    where += ` AND last_modified = $${params.length - 1} AND is_synced = $${params.length}`;
  }

  const changed = executor.run(`UPDATE ${write.tableName} SET ${setClause} WHERE ${where}`, params);
  return changed > 0 || !write.expected;
}

export class LocalDataSource implements LocalStore {
  private staged = new Map<string, StagedWrite>();

  constructor(private readonly db: SqliteDatabase) {}

  async fetch<K extends SyncEntityType>(entityType: K, filter: LocalFilter = {}): Promise<SyncEntityMap[K][]> {
    const table = getTable(entityType);
    const where = filter.isSynced === undefined ? '' : 'WHERE is_synced = $1';
    const params = filter.isSynced === undefined ? [] : [filter.isSynced ? 1 : 0];

    const rows = await this.db.select(
      `SELECT * FROM ${table.tableName} ${where} ORDER BY ${table.orderBy}`,
      params
    );
    return rows.map(row => table.fromRow(row));
  }

  async getById<K extends SyncEntityType>(entityType: K, id: string): Promise<SyncEntityMap[K] | null> {
    const table = getTable(entityType);
    const rows = await this.db.select(`SELECT * FROM ${table.tableName} WHERE id = $1`, [id]);
    return rows.length > 0 ? table.fromRow(rows[0]) : null;
  }

  insert<K extends SyncEntityType>(entityType: K, entity: SyncEntityMap[K]): void {
    this.stage(entityType, entity.id, entityWrite('insert', entityType, entity));
  }

  update<K extends SyncEntityType>(entityType: K, entity: SyncEntityMap[K], expected?: ExpectedVersion): void {
    const key = `${entityType}:${entity.id}`;
    // An update to a row inserted in the same batch stays an insert
    if (this.staged.get(key)?.kind === 'insert') {
      this.stage(entityType, entity.id, entityWrite('insert', entityType, entity));
      return;
    }
    this.stage(entityType, entity.id, entityWrite('update', entityType, entity, expected));
  }

  remove(entityType: SyncEntityType, id: string): void {
    this.stage(entityType, id, deleteWrite(entityType, id));
  }

  get stagedCount(): number {
    return this.staged.size;
  }

  async save(): Promise<number> {
    if (this.staged.size === 0) return 0;

    const writes = [...this.staged.values()];
    this.staged.clear();

    let skipped = 0;
    try {
      this.db.transaction(executor => {
        for (const write of writes) {
          if (!applyWrite(executor, write)) skipped++;
        }
      });
    } catch (error) {
      console.error('[LocalDataSource] Save failed, rolled back:', error);
      throw new BatchCommitError('local', errorMessage(error), { cause: error });
    }

    if (skipped > 0) {
      console.log(`[LocalDataSource] Kept ${skipped} record(s) changed since they were staged`);
    }

    await this.db.persist();
    return skipped;
  }

  discard(): void {
    this.staged.clear();
  }

  async writeNow<K extends SyncEntityType>(
    kind: 'insert' | 'update',
    entityType: K,
    entity: SyncEntityMap[K]
  ): Promise<void> {
    this.applyNow(entityWrite(kind, entityType, entity));
    await this.db.persist();
  }

  async deleteNow(entityType: SyncEntityType, id: string): Promise<void> {
    this.applyNow(deleteWrite(entityType, id));
    await this.db.persist();
  }

  async countUnsynced(): Promise<number> {
    let total = 0;
    for (const table of Object.values(TABLES)) {
      const rows = await this.db.select(
        `SELECT COUNT(*) AS count FROM ${table.tableName} WHERE is_synced = 0`
      );
      const count = rows[0]?.count;
      total += typeof count === 'number' ? count : 0;
    }
    return total;
  }

  async getMeta(key: string): Promise<string | null> {
    const rows = await this.db.select('SELECT value FROM sync_meta WHERE key = $1', [key]);
    const value = rows[0]?.value;
    return typeof value === 'string' ? value : null;
  }

  async setMeta(key: string, value: string | null): Promise<void> {
    if (value === null) {
      await this.db.execute('DELETE FROM sync_meta WHERE key = $1', [key]);
    } else {
      await this.db.execute(
        'INSERT INTO sync_meta (key, value) VALUES ($1, $2) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
        [key, value]
      );
    }
    await this.db.persist();
  }

  private applyNow(write: StagedWrite): void {
    this.db.transaction(executor => applyWrite(executor, write));
  }

  private stage(entityType: SyncEntityType, id: string, write: StagedWrite): void {
    this.staged.set(`${entityType}:${id}`, write);
  }
}
