/**
 * DataSource Types
 *
 * Interfaces for local and remote data sources.
 * These abstractions let the sync services work against different storage backends.
 */

import type { SqlValue } from 'sql.js';
import type { SyncEntityMap, SyncEntityType, SyncableEntity } from '../types';

// ============ Local ============

export interface LocalFilter {
  /** Only records whose `is_synced` flag equals this value. */
  isSynced?: boolean;
}

/**
 * The local row an update was computed from. When the row no longer matches
 * at `save()`, the staged update is dropped and the newer row kept.
 */
export interface ExpectedVersion {
  lastModified: Date;
  isSynced: boolean;
}

/**
 * Interface for the local durable store (SQLite).
 * All reads in the app come from here.
 *
 * `insert`, `update` and `remove` only stage a mutation. Nothing is written
 * until `save()`, which applies everything staged since the previous save in
 * one transaction, or nothing at all.
 */
export interface LocalStore {
  fetch<K extends SyncEntityType>(entityType: K, filter?: LocalFilter): Promise<SyncEntityMap[K][]>;

  getById<K extends SyncEntityType>(entityType: K, id: string): Promise<SyncEntityMap[K] | null>;

  insert<K extends SyncEntityType>(entityType: K, entity: SyncEntityMap[K]): void;

  update<K extends SyncEntityType>(entityType: K, entity: SyncEntityMap[K], expected?: ExpectedVersion): void;

  remove(entityType: SyncEntityType, id: string): void;

  /** Number of staged, uncommitted mutations. */
  readonly stagedCount: number;

  /** Resolves to the number of staged writes skipped as stale. */
  save(): Promise<number>;

  /** Drop everything staged since the previous save. */
  discard(): void;

  /**
   * Write one entity immediately in its own transaction, leaving anything
   * staged untouched. Used by user-facing writes while a pass may be staging.
   */
  writeNow<K extends SyncEntityType>(kind: 'insert' | 'update', entityType: K, entity: SyncEntityMap[K]): Promise<void>;

  deleteNow(entityType: SyncEntityType, id: string): Promise<void>;

  countUnsynced(): Promise<number>;

  getMeta(key: string): Promise<string | null>;

  setMeta(key: string, value: string | null): Promise<void>;
}

/**
 * Row mapping for one entity table.
 */
export interface TableConfig<T extends SyncableEntity> {
  tableName: string;
  columns: string[];
  /** ORDER BY clause used by fetch(). */
  orderBy: string;
  toRow(entity: T): Record<string, SqlValue>;
  fromRow(row: Record<string, SqlValue>): T;
}

// ============ Remote ============

/**
 * Sentinel replaced by the remote store with its own commit time.
 * Never send the client clock as a conflict signal.
 */
export interface ServerTimestamp {
  readonly kind: 'server-timestamp';
}

export const SERVER_TIMESTAMP: ServerTimestamp = Object.freeze({ kind: 'server-timestamp' });

export function serverTimestamp(): ServerTimestamp {
  return SERVER_TIMESTAMP;
}

export function isServerTimestamp(value: unknown): value is ServerTimestamp {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'server-timestamp';
}

export type DocumentField = string | number | boolean | null | ServerTimestamp;

/** Fields written to a remote document. */
export type DocumentData = Record<string, DocumentField>;

/** A document as read back: loosely typed until the codec decodes it. */
export interface DocumentSnapshot {
  id: string;
  path: string;
  data: Record<string, unknown>;
}

export interface QueryOptions {
  orderBy?: { field: string; descending?: boolean };
}

export interface DocumentReference {
  readonly id: string;
  readonly path: string;
  /** Merge `data` into the document, creating it if needed. */
  setData(data: DocumentData): Promise<void>;
  delete(): Promise<void>;
}

export interface CollectionReference {
  readonly path: string;
  getDocuments(options?: QueryOptions): Promise<DocumentSnapshot[]>;
  document(id: string): DocumentReference;
}

/**
 * An atomic multi-document write. `commit()` applies every staged write or
 * none, and resolves to the server time stamped into server-timestamp fields.
 */
export interface WriteBatch {
  readonly size: number;
  setData(ref: DocumentReference, data: DocumentData): WriteBatch;
  delete(ref: DocumentReference): WriteBatch;
  commit(): Promise<Date>;
}

/**
 * Interface for the remote document store (Supabase).
 * Collection paths look like `users/{userId}/{collection}`.
 */
export interface RemoteStore {
  collection(path: string): CollectionReference;
  batch(): WriteBatch;
}

/** Split `users/{userId}/{collection}` into its parts. */
export function parseCollectionPath(path: string): { userId: string; collection: string } {
  const parts = path.split('/');
  if (parts.length !== 3 || parts[0] !== 'users' || !parts[1] || !parts[2]) {
    throw new Error(`Invalid collection path: ${path}`);
  }
  return { userId: parts[1], collection: parts[2] };
}
