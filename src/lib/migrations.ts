/**
 * Migration Runner for the Local SQLite Database
 *
 * Migrations are embedded as SQL strings and tracked in the _migrations
 * table. Each migration is applied in its own transaction.
 */

import type { SqliteDatabase } from './database';

export interface Migration {
  name: string;
  sql: string;
}

export const MIGRATIONS: Migration[] = [
  {
    name: '00001_initial_schema',
    sql: `
-- ============================================
-- Categories
-- ============================================
CREATE TABLE IF NOT EXISTS categories (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  icon TEXT NOT NULL,
  color_hex TEXT NOT NULL,
  is_expense_category INTEGER NOT NULL DEFAULT 1,
  sort_order INTEGER NOT NULL DEFAULT 0,
  is_default INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  last_modified TEXT NOT NULL,
  is_synced INTEGER NOT NULL DEFAULT 0
);

-- ============================================
-- Accounts
-- ============================================
CREATE TABLE IF NOT EXISTS accounts (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  initial_balance TEXT NOT NULL DEFAULT '0',
  account_type TEXT NOT NULL,
  icon TEXT NOT NULL,
  color_hex TEXT NOT NULL,
  currency_code TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified TEXT NOT NULL,
  is_synced INTEGER NOT NULL DEFAULT 0
);

-- ============================================
-- Budgets
-- ============================================
CREATE TABLE IF NOT EXISTS budgets (
  id TEXT PRIMARY KEY,
  amount TEXT NOT NULL,
  period TEXT NOT NULL,
  start_date TEXT NOT NULL,
  alert_threshold REAL NOT NULL DEFAULT 0.8,
  is_active INTEGER NOT NULL DEFAULT 1,
  category_id TEXT,
  created_at TEXT NOT NULL,
  last_modified TEXT NOT NULL,
  is_synced INTEGER NOT NULL DEFAULT 0
);

-- ============================================
-- Transactions
-- ============================================
CREATE TABLE IF NOT EXISTS transactions (
  id TEXT PRIMARY KEY,
  amount TEXT NOT NULL,
  note TEXT NOT NULL DEFAULT '',
  date TEXT NOT NULL,
  type TEXT NOT NULL,
  merchant_name TEXT,
  category_id TEXT,
  account_id TEXT,
  created_at TEXT NOT NULL,
  last_modified TEXT NOT NULL,
  is_synced INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date);
CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions(category_id);

-- ============================================
-- User profile (one row per signed-in user)
-- ============================================
CREATE TABLE IF NOT EXISTS user_profiles (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL DEFAULT '',
  display_name TEXT NOT NULL DEFAULT '',
  persona TEXT NOT NULL,
  preferred_theme TEXT NOT NULL,
  currency_code TEXT NOT NULL,
  notifications_enabled INTEGER NOT NULL DEFAULT 1,
  budget_alerts_enabled INTEGER NOT NULL DEFAULT 1,
  daily_reminder_time TEXT,
  created_at TEXT NOT NULL,
  last_modified TEXT NOT NULL,
  is_synced INTEGER NOT NULL DEFAULT 0
);

-- ============================================
-- Sync metadata (key/value)
-- ============================================
CREATE TABLE IF NOT EXISTS sync_meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`,
  },
];

/**
 * Split SQL into individual statements, handling semicolons inside strings.
 * Also strips leading comment lines from each statement.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inString = false;
  let stringChar = '';

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];
    const prevChar = i > 0 ? sql[i - 1] : '';

    if ((char === "'" || char === '"') && prevChar !== '\\') {
      if (!inString) {
        inString = true;
        stringChar = char;
      } else if (char === stringChar) {
        inString = false;
      }
    }

    if (char === ';' && !inString) {
      const stmt = current.trim();
      if (stmt) {
        statements.push(stmt);
      }
      current = '';
    } else {
      current += char;
    }
  }

  const final = current.trim();
  if (final) {
    statements.push(final);
  }

  return statements.map(stmt => {
    const lines = stmt.split('\n');
    let startIndex = 0;
    while (startIndex < lines.length) {
      const trimmed = lines[startIndex].trim();
      if (trimmed === '' || trimmed.startsWith('--')) {
        startIndex++;
      } else {
        break;
      }
    }
    return lines.slice(startIndex).join('\n').trim();
  }).filter(stmt => stmt.length > 0);
}

async function getAppliedMigrations(db: SqliteDatabase): Promise<Set<string>> {
  const rows = await db.select('SELECT name FROM _migrations');
  const names = new Set<string>();
  for (const row of rows) {
    if (typeof row.name === 'string') names.add(row.name);
  }
  return names;
}

/**
 * Run pending migrations. Stops at the first migration that fails; that
 * migration leaves no partial schema behind.
 */
export async function runMigrations(
  db: SqliteDatabase,
  migrations: Migration[] = MIGRATIONS
): Promise<{ applied: string[]; errors: string[] }> {
  const result = { applied: [] as string[], errors: [] as string[] };

  await db.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);

  const appliedMigrations = await getAppliedMigrations(db);

  for (const migration of migrations) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    console.log(`[Migrations] Applying: ${migration.name}`);

    try {
      db.transaction(executor => {
        for (const statement of splitStatements(migration.sql)) {
          executor.run(statement);
        }
        executor.run('INSERT INTO _migrations (name, applied_at) VALUES ($1, $2)', [
          migration.name,
          new Date().toISOString(),
        ]);
      });
      result.applied.push(migration.name);
      console.log(`[Migrations] Applied: ${migration.name}`);
    } catch (error) {
      const errorMsg = `Failed to apply ${migration.name}: ${error}`;
      console.error(`[Migrations] ${errorMsg}`);
      result.errors.push(errorMsg);
      break;
    }
  }

  return result;
}
