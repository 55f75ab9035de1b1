/**
 * EntityMerger
 *
 * Last-write-wins reconciliation of one remote collection snapshot against
 * the local records of the same type. Pure: the caller stages the returned
 * inserts and updates into the local store.
 *
 * - Unknown id: materialized locally, marked synced.
 * - Known id, remote strictly newer: remote fields overwrite local, marked synced.
 * - Known id, timestamps tied or local newer: local copy kept as-is.
 * - Local records absent from the snapshot are never removed.
 */

import type {
    Account,
    Budget,
    Category,
    SyncableEntity,
    Transaction,
    UserProfile,
} from '@/lib/types';
import type { RemoteRecord } from '../types';
import type { ReferenceResolver } from './ReferenceResolver';

export interface MergeSpec<T extends SyncableEntity> {
  /** Turn a decoded remote record into a synced local entity. */
  materialize(record: RemoteRecord<T>): T;
  /** Re-link foreign keys against local records; identity when absent. */
  resolveReferences?(record: RemoteRecord<T>): RemoteRecord<T>;
}

export interface MergeResult<T extends SyncableEntity> {
  /** Local view after the merge: existing records plus inserts, in index order. */
  records: T[];
  inserted: T[];
  updated: T[];
  unchanged: number;
  /** Remote records that met an unsynced local copy. */
  conflictsResolved: number;
}

export function isRemoteNewer(remote: Pick<SyncableEntity, 'last_modified'>, local: Pick<SyncableEntity, 'last_modified'>): boolean {
  return remote.last_modified.getTime() > local.last_modified.getTime();
}

export function mergeRecords<T extends SyncableEntity>(
  remote: RemoteRecord<T>[],
  local: T[],
  spec: MergeSpec<T>
): MergeResult<T> {
  const index = new Map<string, T>();
  for (const record of local) index.set(record.id, record);

  const result: MergeResult<T> = {
    records: [],
    inserted: [],
    updated: [],
    unchanged: 0,
    conflictsResolved: 0,
  };

  for (const incoming of remote) {
    const existing = index.get(incoming.id);

    if (!existing) {
      const created = spec.materialize(resolve(incoming, spec));
      index.set(created.id, created);
      result.inserted.push(created);
      continue;
    }

    if (!existing.is_synced) {
      result.conflictsResolved++;
    }

    if (!isRemoteNewer(incoming, existing)) {
      result.unchanged++;
      continue;
    }

    const merged = spec.materialize(resolve(incoming, spec));
    index.set(merged.id, merged);

    // A record inserted earlier in this same snapshot stays an insert
    const insertedAt = result.inserted.indexOf(existing);
    if (insertedAt >= 0) {
      result.inserted[insertedAt] = merged;
    } else {
      const updatedAt = result.updated.indexOf(existing);
      if (updatedAt >= 0) {
        result.updated[updatedAt] = merged;
      } else {
        result.updated.push(merged);
      }
    }
  }

  result.records = [...index.values()];
  return result;
}

function resolve<T extends SyncableEntity>(record: RemoteRecord<T>, spec: MergeSpec<T>): RemoteRecord<T> {
  return spec.resolveReferences ? spec.resolveReferences(record) : record;
}

// ============ Per-entity merges ============

export function mergeCategories(remote: RemoteRecord<Category>[], local: Category[]): MergeResult<Category> {
  return mergeRecords(remote, local, {
    materialize: record => ({ ...record, is_synced: true }),
  });
}

export function mergeAccounts(remote: RemoteRecord<Account>[], local: Account[]): MergeResult<Account> {
  return mergeRecords(remote, local, {
    materialize: record => ({ ...record, is_synced: true }),
  });
}

/**
 * Budgets reference categories; `refs` must be built after categories were
 * merged or freshly inserted categories resolve to null.
 */
export function mergeBudgets(
  remote: RemoteRecord<Budget>[],
  local: Budget[],
  refs: ReferenceResolver
): MergeResult<Budget> {
  return mergeRecords(remote, local, {
    materialize: record => ({ ...record, is_synced: true }),
    resolveReferences: record => ({
      ...record,
      category_id: refs.resolveCategory(record.category_id),
    }),
  });
}

export function mergeTransactions(
  remote: RemoteRecord<Transaction>[],
  local: Transaction[],
  refs: ReferenceResolver
): MergeResult<Transaction> {
  return mergeRecords(remote, local, {
    materialize: record => ({ ...record, is_synced: true }),
    resolveReferences: record => ({
      ...record,
      category_id: refs.resolveCategory(record.category_id),
      account_id: refs.resolveAccount(record.account_id),
    }),
  });
}

export function mergeProfiles(remote: RemoteRecord<UserProfile>[], local: UserProfile[]): MergeResult<UserProfile> {
  return mergeRecords(remote, local, {
    materialize: record => ({ ...record, is_synced: true }),
  });
}
