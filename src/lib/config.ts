// Configuration from environment variables

import { z } from 'zod';
import { SYNC_CONFIG } from '@/sync/types';

const PLACEHOLDER_URL = 'https://your-project.supabase.co';
const PLACEHOLDER_ANON_KEY = 'your-anon-key';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
  LEDGER_DB_PATH: z.string().min(1).default('ledger.sqlite'),
  SYNC_AUTO_INTERVAL_MS: z.coerce.number().int().positive().default(SYNC_CONFIG.AUTO_SYNC_INTERVAL_MS),
  SYNC_ON_EXPENSIVE_NETWORK: booleanFlag.default('true'),
});

export interface SupabaseSettings {
  url: string;
  anonKey: string;
}

export interface AppConfig {
  /** Null when cloud sync is disabled (offline-only mode). */
  supabase: SupabaseSettings | null;
  databasePath: string;
  autoSyncIntervalMs: number;
  syncOnExpensiveNetwork: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate Supabase settings. Unset or placeholder values disable cloud sync.
 */
export function validateSupabaseConfig(url: string | undefined, anonKey: string | undefined): SupabaseSettings | null {
  if (!url || url === PLACEHOLDER_URL) {
    console.warn('[Config] Supabase URL not configured. Cloud sync will be disabled.');
    return null;
  }
  if (!anonKey || anonKey === PLACEHOLDER_ANON_KEY) {
    console.warn('[Config] Supabase anon key not configured. Cloud sync will be disabled.');
    return null;
  }
  return { url, anonKey };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    supabase: validateSupabaseConfig(values.SUPABASE_URL, values.SUPABASE_ANON_KEY),
    databasePath: values.LEDGER_DB_PATH,
    autoSyncIntervalMs: values.SYNC_AUTO_INTERVAL_MS,
    syncOnExpensiveNetwork: values.SYNC_ON_EXPENSIVE_NETWORK,
  };
}
