/**
 * Sync Module Public API
 *
 * Offline-first synchronization between the local SQLite store and the
 * Supabase document store.
 *
 * Architecture:
 * - Local SQLite database is the source of truth for all reads
 * - Writes go to local first, marked unsynced, then a debounced push uploads them
 * - A full pass pulls every collection, merges last-write-wins, commits once
 *   locally, then uploads unsynced records in one atomic batch
 */

// Types
export type {
    DataListener,
    LocalSnapshot,
    RemoteRecord,
    SyncEntityMap,
    SyncEntityType,
    SyncErrorInfo,
    SyncOutcome,
    SyncPhase,
    SyncStatistics,
    SyncStatusListener,
    SyncStatusState,
    SyncTrigger,
} from './types';

export {
    collectionPath,
    SYNC_CONFIG,
    SYNC_ENTITIES,
    SYNC_ENTITY_ORDER,
    SYNC_META_KEYS,
} from './types';

// Errors
export {
    BatchCommitError,
    DataError,
    NetworkFailureError,
    NotAuthenticatedError,
    RemoteStoreError,
    SyncError,
    toSyncErrorInfo,
    type SyncErrorCode,
} from './errors';

// Codec
export { codecs, decodeAll, getCodec, type EntityCodec } from './codec/RecordCodec';
export { normalizeDecimal, parseDecimal } from './codec/decimal';
export { toDate } from './codec/timestamps';

// Merge
export {
    isRemoteNewer,
    mergeAccounts,
    mergeBudgets,
    mergeCategories,
    mergeProfiles,
    mergeRecords,
    mergeTransactions,
    type MergeResult,
    type MergeSpec,
} from './merge/EntityMerger';
export { ReferenceResolver } from './merge/ReferenceResolver';

// Services
export { NetworkMonitor, type ConnectivitySignal, type NetworkStatus } from './services/NetworkMonitor';
export { SyncService, type SyncableRepository, type SyncServiceOptions } from './services/SyncService';
export { SyncStateStore } from './services/SyncStateStore';
export { UploadQueue } from './services/UploadQueue';

// Data Sources
export { LocalDataSource } from './datasources/LocalDataSource';
export { SupabaseDocumentStore } from './datasources/RemoteDataSource';
export {
    SERVER_TIMESTAMP,
    serverTimestamp,
    type CollectionReference,
    type DocumentData,
    type DocumentReference,
    type DocumentSnapshot,
    type LocalStore,
    type RemoteStore,
    type WriteBatch,
} from './datasources/types';

// Repositories
export * from './repositories';
