/**
 * Sync Types
 *
 * Shared type definitions for the offline-first synchronization system.
 */

import type {
    Account,
    Budget,
    Category,
    SyncableEntity,
    Transaction,
    UserProfile,
} from '@/lib/types';

// Re-export entity types from lib/types for convenience
export type {
    Account,
    Budget,
    Category,
    SyncableEntity,
    Transaction,
    UserProfile,
} from '@/lib/types';

// Collection names, shared by the remote paths and the local tables registry
export const SYNC_ENTITIES = {
  CATEGORIES: 'categories',
  ACCOUNTS: 'accounts',
  BUDGETS: 'budgets',
  TRANSACTIONS: 'transactions',
  PROFILE: 'profile',
} as const;

export type SyncEntityType = typeof SYNC_ENTITIES[keyof typeof SYNC_ENTITIES];

export interface SyncEntityMap {
  categories: Category;
  accounts: Account;
  budgets: Budget;
  transactions: Transaction;
  profile: UserProfile;
}

// Reference dependency order: categories and accounts feed the reference
// maps used while merging budgets and transactions.
export const SYNC_ENTITY_ORDER: SyncEntityType[] = [
  SYNC_ENTITIES.CATEGORIES,
  SYNC_ENTITIES.ACCOUNTS,
  SYNC_ENTITIES.BUDGETS,
  SYNC_ENTITIES.TRANSACTIONS,
  SYNC_ENTITIES.PROFILE,
];

/** Remote collection path for one user's entity collection. */
export function collectionPath(userId: string, entityType: SyncEntityType): string {
  return `users/${userId}/${entityType}`;
}

// A decoded remote record: every entity field except the local sync flag
export type RemoteRecord<T extends SyncableEntity> = Omit<T, 'is_synced'>;

// Every local collection, keyed by entity type
export type LocalSnapshot = { [K in SyncEntityType]: SyncEntityMap[K][] };

// Sync status for UI
export type SyncPhase = 'idle' | 'syncing' | 'waitingForNetwork' | 'error';

export type SyncTrigger =
  | 'manual'
  | 'connectivity-restored'
  | 'user-changed'
  | 'app-foreground'
  | 'periodic'
  | 'force-refresh';

export interface SyncStatistics {
  uploaded: number;
  downloaded: number;
  conflictsResolved: number;
  errors: number;
  lastSyncDurationMs: number;
}

export interface SyncErrorInfo {
  code: string;
  message: string;
}

export interface SyncStatusState {
  state: SyncPhase;
  isSyncing: boolean;
  hasCompletedInitialSync: boolean;
  lastError: SyncErrorInfo | null;
  progressMessage: string;
  lastSyncDate: Date | null;
  pendingChangesCount: number;
  statistics: SyncStatistics;
}

// Result of a boundary sync call; never thrown
export type SyncOutcome =
  | { kind: 'completed'; pulled: number; pushed: number }
  | { kind: 'skipped'; reason: 'already-syncing' | 'offline' | 'not-authenticated' }
  | { kind: 'failed'; error: SyncErrorInfo };

// Listener types for observable pattern
export type DataListener<T> = (data: T[]) => void;
export type SyncStatusListener = (status: SyncStatusState) => void;

// Sync configuration
export const SYNC_CONFIG = {
  DEBOUNCE_MS: 2000,              // Wait 2s after last local change before pushing
  AUTO_SYNC_INTERVAL_MS: 300000,  // Full sync every 5 minutes while running
  REMOTE_PAGE_SIZE: 1000,         // Rows per read; PostgREST caps responses at max-rows (1000)
} as const;

export const SYNC_META_KEYS = {
  LAST_SYNC_AT: 'last_sync_at',
  HAS_COMPLETED_INITIAL_SYNC: 'has_completed_initial_sync',
} as const;
