/**
 * BaseRepository
 *
 * Abstract base class for entity repositories implementing the offline-first pattern:
 * - All reads come from the local store (source of truth)
 * - Writes go to the local store first, marked unsynced, then a push is scheduled
 * - Deletes are sent to the remote store directly, never queued
 * - Observable pattern for UI integration
 */

import type { IdentityProvider } from '@/lib/auth';
import { generateId } from '@/lib/types';
import type { LocalStore, RemoteStore } from '../datasources/types';
import { toSyncErrorInfo } from '../errors';
import type { ConnectivitySignal } from '../services/NetworkMonitor';
import {
    collectionPath,
    type DataListener,
    type SyncableEntity,
    type SyncEntityMap,
    type SyncEntityType,
    type SyncErrorInfo,
} from '../types';

/** Entity fields a caller provides; sync bookkeeping is filled in here. */
export type EntityInput<K extends SyncEntityType> = Omit<SyncEntityMap[K], keyof SyncableEntity>;

export type EntityChanges<K extends SyncEntityType> = Partial<EntityInput<K>>;

export interface PushScheduler {
  schedulePush(): void;
}

export interface RepositoryOptions {
  localStore: LocalStore;
  /** Null when cloud sync is not configured. */
  remoteStore: RemoteStore | null;
  identity: IdentityProvider;
  network: ConnectivitySignal;
  scheduler?: PushScheduler | null;
  now?: () => Date;
}

export interface DeleteResult {
  deleted: boolean;
  remoteDeleted: boolean;
  remoteError: SyncErrorInfo | null;
}

export abstract class BaseRepository<K extends SyncEntityType> {
  protected readonly localStore: LocalStore;
  protected readonly remoteStore: RemoteStore | null;
  protected readonly identity: IdentityProvider;
  protected readonly network: ConnectivitySignal;
  protected readonly scheduler: PushScheduler | null;
  protected readonly now: () => Date;

  protected listeners: Set<DataListener<SyncEntityMap[K]>> = new Set();

  abstract readonly entityType: K;

  constructor(options: RepositoryOptions) {
    this.localStore = options.localStore;
    this.remoteStore = options.remoteStore;
    this.identity = options.identity;
    this.network = options.network;
    this.scheduler = options.scheduler ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build the stored entity from caller fields, pending changes and sync
   * bookkeeping. Subclasses validate and normalize here.
   */
  protected abstract materialize(
    base: EntityInput<K>,
    changes: EntityChanges<K>,
    meta: SyncableEntity
  ): SyncEntityMap[K];

  // ============ Observable Pattern ============

  /**
   * Subscribe to data changes.
   * Immediately emits current data, then emits on each change.
   */
  subscribe(listener: DataListener<SyncEntityMap[K]>): () => void {
    this.listeners.add(listener);

    this.emitCurrentData(listener).catch(error => {
      console.error(`[${this.entityType}] Error emitting current data:`, error);
    });

    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Notify all listeners of data change.
   */
  async notifyListeners(): Promise<void> {
    if (this.listeners.size === 0) return;

    const data = await this.getAll();
    for (const listener of this.listeners) {
      try {
        listener(data);
      } catch (error) {
        console.error(`[${this.entityType}] Error in data listener:`, error);
      }
    }
  }

  private async emitCurrentData(listener: DataListener<SyncEntityMap[K]>): Promise<void> {
    const data = await this.getAll();
    listener(data);
  }

  // ============ Read Operations (Always from Local) ============

  async getAll(): Promise<SyncEntityMap[K][]> {
    return this.localStore.fetch(this.entityType);
  }

  async getById(id: string): Promise<SyncEntityMap[K] | null> {
    return this.localStore.getById(this.entityType, id);
  }

  async getUnsynced(): Promise<SyncEntityMap[K][]> {
    return this.localStore.fetch(this.entityType, { isSynced: false });
  }

  // ============ Write Operations ============

  /**
   * Create a new item, unsynced until the next upload.
   */
  async create(input: EntityInput<K>, id: string = generateId()): Promise<SyncEntityMap[K]> {
    const now = this.now();
    const entity = this.materialize(input, {}, {
      id,
      created_at: now,
      last_modified: now,
      is_synced: false,
    });

    await this.localStore.writeNow('insert', this.entityType, entity);
    await this.afterWrite();
    return entity;
  }

  /**
   * Update an existing item. Returns null when it does not exist.
   */
  async update(id: string, changes: EntityChanges<K>): Promise<SyncEntityMap[K] | null> {
    const existing = await this.localStore.getById(this.entityType, id);
    if (!existing) return null;

    const updated = this.materialize(existing, changes, {
      id: existing.id,
      created_at: existing.created_at,
      last_modified: this.now(),
      is_synced: false,
    });

    await this.localStore.writeNow('update', this.entityType, updated);
    await this.afterWrite();
    return updated;
  }

  /**
   * Delete locally, then delete the remote document directly when signed in
   * and online. A failed remote delete is logged and reported, not retried.
   */
  async delete(id: string): Promise<DeleteResult> {
    const existing = await this.localStore.getById(this.entityType, id);
    if (!existing) {
      return { deleted: false, remoteDeleted: false, remoteError: null };
    }

    await this.localStore.deleteNow(this.entityType, id);

    let remoteDeleted = false;
    let remoteError: SyncErrorInfo | null = null;
    const userId = this.identity.currentUserId();

    if (userId && this.remoteStore && this.network.isReachable) {
      try {
        await this.remoteStore.collection(collectionPath(userId, this.entityType)).document(id).delete();
        remoteDeleted = true;
      } catch (error) {
        console.error(`[${this.entityType}] Remote delete failed for ${id}:`, error);
        remoteError = toSyncErrorInfo(error);
      }
    }

    await this.afterWrite();
    return { deleted: true, remoteDeleted, remoteError };
  }

  private async afterWrite(): Promise<void> {
    this.scheduler?.schedulePush();
    await this.notifyListeners();
  }
}
