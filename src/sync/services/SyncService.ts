/**
 * SyncService
 *
 * Central orchestrator for all sync operations:
 * - Single-flight full passes: pull and merge per entity type, one atomic
 *   local commit, then upload of unsynced records
 * - Debounced push scheduling after local writes
 * - Connectivity, identity, foreground and periodic triggers
 * - Observable sync state for the UI
 */

import type { IdentityProvider } from '@/lib/auth';
import { decodeAll, getCodec } from '../codec/RecordCodec';
import type { LocalStore, QueryOptions, RemoteStore } from '../datasources/types';
import { NotAuthenticatedError, toSyncErrorInfo } from '../errors';
import {
    mergeAccounts,
    mergeBudgets,
    mergeCategories,
    mergeProfiles,
    mergeTransactions,
    type MergeResult,
} from '../merge/EntityMerger';
import { ReferenceResolver } from '../merge/ReferenceResolver';
import {
    collectionPath,
    SYNC_CONFIG,
    SYNC_ENTITIES,
    SYNC_META_KEYS,
    type LocalSnapshot,
    type RemoteRecord,
    type SyncEntityMap,
    type SyncEntityType,
    type SyncOutcome,
    type SyncStatistics,
    type SyncStatusListener,
    type SyncStatusState,
    type SyncTrigger,
} from '../types';
import type { ConnectivitySignal } from './NetworkMonitor';
import { emptyStatistics, SyncStateStore } from './SyncStateStore';
import { UploadQueue } from './UploadQueue';

export interface SyncServiceOptions {
  localStore: LocalStore;
  remoteStore: RemoteStore;
  identity: IdentityProvider;
  network: ConnectivitySignal;
  state?: SyncStateStore;
  uploadQueue?: UploadQueue;
  /** Let automatic triggers run on metered networks. */
  syncOnExpensiveNetwork?: boolean;
  autoSyncIntervalMs?: number;
  debounceMs?: number;
  now?: () => Date;
}

type Merge<K extends SyncEntityType> = (
  remote: RemoteRecord<SyncEntityMap[K]>[],
  local: SyncEntityMap[K][]
) => MergeResult<SyncEntityMap[K]>;

// Interface that repositories implement to hear about pulled changes
export interface SyncableRepository {
  readonly entityType: SyncEntityType;
  notifyListeners(): Promise<void>;
}

interface PullResult {
  pulled: number;
  changed: SyncEntityType[];
}

const TRANSACTIONS_QUERY: QueryOptions = { orderBy: { field: 'date', descending: true } };

export class SyncService {
  private readonly localStore: LocalStore;
  private readonly remoteStore: RemoteStore;
  private readonly identity: IdentityProvider;
  private readonly network: ConnectivitySignal;
  private readonly stateStore: SyncStateStore;
  private readonly uploadQueue: UploadQueue;
  private readonly syncOnExpensiveNetwork: boolean;
  private readonly autoSyncIntervalMs: number;
  private readonly debounceMs: number;
  private readonly now: () => Date;

  private isSyncingInner = false;
  private signedOutDuringPass = false;
  private repositories: Map<SyncEntityType, SyncableRepository> = new Map();
  private pushDebounceTimer: ReturnType<typeof setTimeout> | null = null;
  private autoSyncInterval: ReturnType<typeof setInterval> | null = null;
  private unsubscribers: (() => void)[] = [];

  constructor(options: SyncServiceOptions) {
    this.localStore = options.localStore;
    this.remoteStore = options.remoteStore;
    this.identity = options.identity;
    this.network = options.network;
    this.stateStore = options.state ?? new SyncStateStore();
    this.uploadQueue = options.uploadQueue ?? new UploadQueue(options.localStore, options.remoteStore);
    this.syncOnExpensiveNetwork = options.syncOnExpensiveNetwork ?? true;
    this.autoSyncIntervalMs = options.autoSyncIntervalMs ?? SYNC_CONFIG.AUTO_SYNC_INTERVAL_MS;
    this.debounceMs = options.debounceMs ?? SYNC_CONFIG.DEBOUNCE_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Initialize the sync service.
   * Call this once when the app starts.
   */
  async initialize(): Promise<void> {
    this.unsubscribers.push(
      this.network.onReachable(this.handleReachable),
      this.identity.onUserChange(this.handleUserChange)
    );

    await this.loadPersistedState();
    await this.refreshPendingCount();
  }

  /**
   * Cleanup the sync service.
   */
  destroy(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];

    this.cancelScheduledPush();
    this.stopAutoSync();
    this.stateStore.clearListeners();
    this.repositories.clear();
  }

  /**
   * Register a repository so its listeners see records a pass brings in.
   */
  registerRepository(repository: SyncableRepository): void {
    this.repositories.set(repository.entityType, repository);
  }

  unregisterRepository(entityType: SyncEntityType): void {
    this.repositories.delete(entityType);
  }

  // ============ Status ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  getState(): SyncStatusState {
    return this.stateStore.getState();
  }

  /**
   * Subscribe to sync status changes.
   */
  subscribe(listener: SyncStatusListener): () => void {
    return this.stateStore.subscribe(listener);
  }

  // ============ Full pass ============

  /**
   * Pull every collection, merge, commit locally in one save, then upload
   * unsynced records. Throws NotAuthenticatedError, NetworkFailureError or
   * BatchCommitError; a pass already in flight makes this a no-op.
   */
  async runFullSync(userId: string | null): Promise<SyncOutcome> {
    if (this.isSyncingInner) {
      console.log('[SyncService] Sync already in progress');
      return { kind: 'skipped', reason: 'already-syncing' };
    }

    if (!userId) {
      const error = new NotAuthenticatedError();
      this.recordFailure(error, emptyStatistics());
      throw error;
    }

    this.isSyncingInner = true;
    const startedAt = this.now();
    const stats = emptyStatistics();

    this.stateStore.update({
      state: 'syncing',
      isSyncing: true,
      lastError: null,
      progressMessage: 'Starting sync...',
    });

    try {
      const { pulled, changed } = await this.pullAll(userId, stats);
      await this.localStore.save();
      await this.notifyRepositories(changed);

      this.stateStore.update({ progressMessage: 'Uploading changes...' });
      const pushed = await this.uploadQueue.pushUnsynced(userId, await this.loadSnapshot());
      stats.uploaded = pushed;

      const finishedAt = this.now();
      stats.lastSyncDurationMs = finishedAt.getTime() - startedAt.getTime();

      await this.localStore.setMeta(SYNC_META_KEYS.LAST_SYNC_AT, finishedAt.toISOString());
      await this.localStore.setMeta(SYNC_META_KEYS.HAS_COMPLETED_INITIAL_SYNC, 'true');

      this.stateStore.update({
        state: 'idle',
        isSyncing: false,
        hasCompletedInitialSync: true,
        lastError: null,
        progressMessage: 'Up to date',
        lastSyncDate: finishedAt,
        pendingChangesCount: await this.localStore.countUnsynced(),
        statistics: stats,
      });

      console.log(
        `[SyncService] Sync complete: ${pulled} pulled, ${pushed} pushed, ` +
          `${stats.conflictsResolved} conflicts, ${stats.errors} skipped`
      );
      return { kind: 'completed', pulled, pushed };
    } catch (error) {
      this.localStore.discard();
      stats.lastSyncDurationMs = this.now().getTime() - startedAt.getTime();
      this.recordFailure(error, stats);
      throw error;
    } finally {
      this.finishPass();
    }
  }

  // ============ Boundary operations (never throw) ============

  /**
   * Run a full pass if possible. Failures end up in `lastError`.
   */
  async syncNow(trigger: SyncTrigger = 'manual'): Promise<SyncOutcome> {
    if (this.isSyncingInner) {
      return { kind: 'skipped', reason: 'already-syncing' };
    }

    if (!this.network.isReachable) {
      this.stateStore.update({ state: 'waitingForNetwork', progressMessage: 'Waiting for connection' });
      return { kind: 'skipped', reason: 'offline' };
    }

    console.log(`[SyncService] Sync triggered (${trigger})`);

    try {
      return await this.runFullSync(this.identity.currentUserId());
    } catch (error) {
      return { kind: 'failed', error: toSyncErrorInfo(error) };
    }
  }

  /**
   * Forget that the initial sync completed and pull everything again.
   */
  async forceRefresh(): Promise<SyncOutcome> {
    this.stateStore.update({ hasCompletedInitialSync: false });
    try {
      await this.localStore.setMeta(SYNC_META_KEYS.HAS_COMPLETED_INITIAL_SYNC, null);
    } catch (error) {
      console.error('[SyncService] Failed to reset initial sync flag:', error);
    }
    return this.syncNow('force-refresh');
  }

  /**
   * Upload unsynced records without pulling.
   */
  async pushPendingChanges(): Promise<SyncOutcome> {
    if (this.isSyncingInner) {
      return { kind: 'skipped', reason: 'already-syncing' };
    }

    const userId = this.identity.currentUserId();
    if (!userId) {
      return { kind: 'skipped', reason: 'not-authenticated' };
    }

    if (!this.network.isReachable) {
      return { kind: 'skipped', reason: 'offline' };
    }

    this.isSyncingInner = true;
    const previous = this.stateStore.getState().statistics;
    this.stateStore.update({ state: 'syncing', isSyncing: true, progressMessage: 'Uploading changes...' });

    try {
      const pushed = await this.uploadQueue.pushUnsynced(userId, await this.loadSnapshot());

      this.stateStore.update({
        state: 'idle',
        isSyncing: false,
        lastError: null,
        progressMessage: 'Up to date',
        pendingChangesCount: await this.localStore.countUnsynced(),
        statistics: { ...previous, uploaded: pushed },
      });
      return { kind: 'completed', pulled: 0, pushed };
    } catch (error) {
      this.recordFailure(error, previous);
      return { kind: 'failed', error: toSyncErrorInfo(error) };
    } finally {
      this.finishPass();
    }
  }

  /**
   * Schedule a push operation with debouncing.
   * Called by repositories after local writes.
   */
  schedulePush(): void {
    this.refreshPendingCount().catch(error => {
      console.error('[SyncService] Failed to refresh pending count:', error);
    });

    if (!this.network.isReachable || !this.identity.currentUserId()) return;

    this.cancelScheduledPush();
    this.pushDebounceTimer = setTimeout(() => {
      this.pushDebounceTimer = null;
      this.pushPendingChanges().catch(console.error);
    }, this.debounceMs);
  }

  // ============ Triggers ============

  async handleAppForeground(): Promise<SyncOutcome> {
    if (!this.identity.currentUserId()) {
      return { kind: 'skipped', reason: 'not-authenticated' };
    }
    return this.syncNow('app-foreground');
  }

  startAutoSync(intervalMs: number = this.autoSyncIntervalMs): void {
    this.stopAutoSync();

    this.autoSyncInterval = setInterval(() => {
      if (!this.isAutomaticSyncAllowed() || this.isSyncingInner) return;
      this.syncNow('periodic').catch(console.error);
    }, intervalMs);
    this.autoSyncInterval.unref();
  }

  stopAutoSync(): void {
    if (this.autoSyncInterval) {
      clearInterval(this.autoSyncInterval);
      this.autoSyncInterval = null;
    }
  }

  async refreshPendingCount(): Promise<number> {
    const pendingChangesCount = await this.localStore.countUnsynced();
    this.stateStore.update({ pendingChangesCount });
    return pendingChangesCount;
  }

  // ============ Private Methods ============

  private handleReachable = (): void => {
    if (!this.identity.currentUserId() || !this.isAutomaticSyncAllowed()) return;
    this.syncNow('connectivity-restored').catch(console.error);
  };

  private handleUserChange = (userId: string | null): void => {
    if (userId) {
      this.syncNow('user-changed').catch(console.error);
      return;
    }

    this.cancelScheduledPush();

    // The pass in flight reports its own end state; reset after it
    if (this.isSyncingInner) {
      this.signedOutDuringPass = true;
      return;
    }
    this.resetSignedOutState();
  };

  private resetSignedOutState(): void {
    this.stateStore.update({
      state: 'idle',
      isSyncing: false,
      lastError: null,
      progressMessage: '',
      statistics: emptyStatistics(),
    });
  }

  private finishPass(): void {
    this.isSyncingInner = false;
    if (this.signedOutDuringPass) {
      this.signedOutDuringPass = false;
      if (!this.identity.currentUserId()) this.resetSignedOutState();
    }
  }

  private async notifyRepositories(entityTypes: SyncEntityType[]): Promise<void> {
    for (const entityType of entityTypes) {
      const repository = this.repositories.get(entityType);
      if (!repository) continue;
      try {
        await repository.notifyListeners();
      } catch (error) {
        console.error(`[SyncService] Failed to notify ${entityType} listeners:`, error);
      }
    }
  }

  private isAutomaticSyncAllowed(): boolean {
    return this.network.shouldSync(this.syncOnExpensiveNetwork);
  }

  private cancelScheduledPush(): void {
    if (this.pushDebounceTimer) {
      clearTimeout(this.pushDebounceTimer);
      this.pushDebounceTimer = null;
    }
  }

  private async pullAll(userId: string, stats: SyncStatistics): Promise<PullResult> {
    const categories = await this.pullCollection(userId, SYNC_ENTITIES.CATEGORIES, stats, mergeCategories);
    const accounts = await this.pullCollection(userId, SYNC_ENTITIES.ACCOUNTS, stats, mergeAccounts);

    // Categories and accounts from this pass must be resolvable below
    const refs = ReferenceResolver.build({ categories: categories.records, accounts: accounts.records });

    const budgets = await this.pullCollection(userId, SYNC_ENTITIES.BUDGETS, stats, (remote, local) =>
      mergeBudgets(remote, local, refs)
    );
    const transactions = await this.pullCollection(
      userId,
      SYNC_ENTITIES.TRANSACTIONS,
      stats,
      (remote, local) => mergeTransactions(remote, local, refs),
      TRANSACTIONS_QUERY
    );
    const profile = await this.pullCollection(userId, SYNC_ENTITIES.PROFILE, stats, mergeProfiles);

    const counts: [SyncEntityType, number][] = [
      [SYNC_ENTITIES.CATEGORIES, categories.inserted.length + categories.updated.length],
      [SYNC_ENTITIES.ACCOUNTS, accounts.inserted.length + accounts.updated.length],
      [SYNC_ENTITIES.BUDGETS, budgets.inserted.length + budgets.updated.length],
      [SYNC_ENTITIES.TRANSACTIONS, transactions.inserted.length + transactions.updated.length],
      [SYNC_ENTITIES.PROFILE, profile.inserted.length + profile.updated.length],
    ];

    return {
      pulled: counts.reduce((total, [, count]) => total + count, 0),
      changed: counts.filter(([, count]) => count > 0).map(([entityType]) => entityType),
    };
  }

  private async pullCollection<K extends SyncEntityType>(
    userId: string,
    entityType: K,
    stats: SyncStatistics,
    merge: Merge<K>,
    options?: QueryOptions
  ): Promise<MergeResult<SyncEntityMap[K]>> {
    this.stateStore.update({ progressMessage: `Downloading ${entityType}...` });

    const snapshots = await this.remoteStore.collection(collectionPath(userId, entityType)).getDocuments(options);
    const { records, errors } = decodeAll(getCodec(entityType), snapshots);

    for (const error of errors) {
      console.warn(`[SyncService] Skipping record: ${error.message}`);
    }
    stats.errors += errors.length;

    const local = await this.localStore.fetch(entityType);
    const result = merge(records, local);
    const seen = new Map(local.map(entity => [entity.id, entity]));

    for (const entity of result.inserted) this.localStore.insert(entityType, entity);
    for (const entity of result.updated) {
      // Local writes made before save() win over this update
      const previous = seen.get(entity.id);
      this.localStore.update(
        entityType,
        entity,
        previous ? { lastModified: previous.last_modified, isSynced: previous.is_synced } : undefined
      );
    }

    stats.downloaded += result.inserted.length + result.updated.length;
    stats.conflictsResolved += result.conflictsResolved;

    return result;
  }

  private async loadSnapshot(): Promise<LocalSnapshot> {
    return {
      categories: await this.localStore.fetch(SYNC_ENTITIES.CATEGORIES),
      accounts: await this.localStore.fetch(SYNC_ENTITIES.ACCOUNTS),
      budgets: await this.localStore.fetch(SYNC_ENTITIES.BUDGETS),
      transactions: await this.localStore.fetch(SYNC_ENTITIES.TRANSACTIONS),
      profile: await this.localStore.fetch(SYNC_ENTITIES.PROFILE),
    };
  }

  private async loadPersistedState(): Promise<void> {
    try {
      const lastSyncAt = await this.localStore.getMeta(SYNC_META_KEYS.LAST_SYNC_AT);
      const completed = await this.localStore.getMeta(SYNC_META_KEYS.HAS_COMPLETED_INITIAL_SYNC);
      this.stateStore.update({
        lastSyncDate: lastSyncAt ? new Date(lastSyncAt) : null,
        hasCompletedInitialSync: completed === 'true',
      });
    } catch (error) {
      console.error('[SyncService] Failed to load sync metadata:', error);
    }
  }

  private recordFailure(error: unknown, statistics: SyncStatistics): void {
    const lastError = toSyncErrorInfo(error);
    console.error('[SyncService] Sync failed:', lastError.message);
    this.stateStore.update({
      state: 'error',
      isSyncing: false,
      lastError,
      progressMessage: lastError.message,
      statistics,
    });
  }
}
