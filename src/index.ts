export { createLedgerSync, type LedgerRepositories, type LedgerSync, type LedgerSyncOptions } from './ledgerSync';
export { loadConfig, ConfigError, type AppConfig, type SupabaseSettings } from './lib/config';
export { SqliteDatabase } from './lib/database';
export { runMigrations, MIGRATIONS } from './lib/migrations';
export { createSupabaseClient } from './lib/supabase';
export {
    StaticIdentityProvider,
    SupabaseIdentityProvider,
    type IdentityProvider,
    type UserChangeListener,
} from './lib/auth';
export * from './lib/defaults';
export * from './lib/types';
export * from './sync';
