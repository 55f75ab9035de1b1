/**
 * Composition root: opens the local database, wires the stores, identity,
 * connectivity, repositories and the sync service.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { type IdentityProvider, StaticIdentityProvider, SupabaseIdentityProvider } from './lib/auth';
import { type AppConfig, loadConfig } from './lib/config';
import { SqliteDatabase } from './lib/database';
import { runMigrations } from './lib/migrations';
import { createSupabaseClient } from './lib/supabase';
import { LocalDataSource } from './sync/datasources/LocalDataSource';
import { SupabaseDocumentStore } from './sync/datasources/RemoteDataSource';
import type { RemoteStore } from './sync/datasources/types';
import {
    AccountsRepository,
    BudgetsRepository,
    CategoriesRepository,
    TransactionsRepository,
    seedDefaultData,
    UserProfileRepository,
    type RepositoryOptions,
    type SeedResult,
} from './sync/repositories';
import { NetworkMonitor } from './sync/services/NetworkMonitor';
import { SyncService } from './sync/services/SyncService';

export interface LedgerSyncOptions {
  /** Defaults to `loadConfig()` over process.env. */
  config?: AppConfig;
  /** Overrides the configured path; null keeps the database in memory. */
  databasePath?: string | null;
  /** Overrides the client built from config. */
  supabaseClient?: SupabaseClient | null;
  /** Overrides the Supabase document store, e.g. with an in-process fake. */
  remoteStore?: RemoteStore | null;
  identity?: IdentityProvider;
  network?: NetworkMonitor;
  now?: () => Date;
}

export interface LedgerRepositories {
  categories: CategoriesRepository;
  accounts: AccountsRepository;
  budgets: BudgetsRepository;
  transactions: TransactionsRepository;
  profile: UserProfileRepository;
}

export interface LedgerSync {
  config: AppConfig;
  database: SqliteDatabase;
  localStore: LocalDataSource;
  remoteStore: RemoteStore | null;
  identity: IdentityProvider;
  network: NetworkMonitor;
  /** Null when cloud sync is not configured. */
  syncService: SyncService | null;
  repositories: LedgerRepositories;
  /**
   * Create default accounts and categories for a new user. Pulls first when
   * the initial sync has not completed, so cloud data is not duplicated.
   */
  initializeDefaultData(): Promise<SeedResult>;
  close(): Promise<void>;
}

export async function createLedgerSync(options: LedgerSyncOptions = {}): Promise<LedgerSync> {
  const config = options.config ?? loadConfig();
  const databasePath = options.databasePath !== undefined ? options.databasePath : config.databasePath;

  const database = await SqliteDatabase.open(databasePath);
  const migrations = await runMigrations(database);
  if (migrations.errors.length > 0) {
    database.close();
    throw new Error(`Local database migration failed: ${migrations.errors.join('; ')}`);
  }

  const localStore = new LocalDataSource(database);

  const client =
    options.supabaseClient !== undefined ? options.supabaseClient : createSupabaseClient(config.supabase);

  const remoteStore =
    options.remoteStore !== undefined ? options.remoteStore : client ? new SupabaseDocumentStore(client) : null;

  let ownedIdentity: SupabaseIdentityProvider | null = null;
  let identity: IdentityProvider;
  if (options.identity) {
    identity = options.identity;
  } else if (client) {
    ownedIdentity = new SupabaseIdentityProvider(client);
    await ownedIdentity.initialize();
    identity = ownedIdentity;
  } else {
    identity = new StaticIdentityProvider();
  }

  const network = options.network ?? new NetworkMonitor();

  const syncService = remoteStore
    ? new SyncService({
        localStore,
        remoteStore,
        identity,
        network,
        syncOnExpensiveNetwork: config.syncOnExpensiveNetwork,
        autoSyncIntervalMs: config.autoSyncIntervalMs,
        now: options.now,
      })
    : null;

  if (!syncService) {
    console.log('[LedgerSync] Cloud sync disabled, running offline-only');
  }

  const repositoryOptions: RepositoryOptions = {
    localStore,
    remoteStore,
    identity,
    network,
    scheduler: syncService,
    now: options.now,
  };

  const repositories: LedgerRepositories = {
    categories: new CategoriesRepository(repositoryOptions),
    accounts: new AccountsRepository(repositoryOptions),
    budgets: new BudgetsRepository(repositoryOptions),
    transactions: new TransactionsRepository(repositoryOptions),
    profile: new UserProfileRepository(repositoryOptions),
  };

  if (syncService) {
    for (const repository of Object.values(repositories)) {
      syncService.registerRepository(repository);
    }
    await syncService.initialize();
  }

  return {
    config,
    database,
    localStore,
    remoteStore,
    identity,
    network,
    syncService,
    repositories,
    async initializeDefaultData() {
      if (syncService && !syncService.getState().hasCompletedInitialSync) {
        await syncService.syncNow();
      }
      return seedDefaultData(repositories);
    },
    async close() {
      syncService?.destroy();
      ownedIdentity?.destroy();
      await database.persist();
      database.close();
    },
  };
}
