// Entity and document builders for tests

import { SqliteDatabase } from '@/lib/database';
import { runMigrations } from '@/lib/migrations';
import type { Account, Budget, Category, SyncableEntity, Transaction, UserProfile } from '@/lib/types';
import { LocalDataSource } from '@/sync/datasources/LocalDataSource';
import type { LocalStore } from '@/sync/datasources/types';
import type { LocalSnapshot, RemoteRecord } from '@/sync/types';

export const USER_ID = 'user-1';

export function at(isoTime: string): Date {
  return new Date(isoTime);
}

export function makeCategory(overrides: Partial<Category> = {}): Category {
  return {
    id: 'cat-food',
    name: 'Food',
    icon: 'fork.knife',
    color_hex: '#FF9500',
    is_expense_category: true,
    sort_order: 1,
    is_default: false,
    created_at: at('2024-01-01T09:00:00.000Z'),
    last_modified: at('2024-01-01T09:00:00.000Z'),
    is_synced: true,
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'acc-cash',
    name: 'Wallet',
    initial_balance: '250',
    account_type: 'cash',
    icon: 'banknote.fill',
    color_hex: '#34C759',
    currency_code: 'INR',
    created_at: at('2024-01-01T09:00:00.000Z'),
    last_modified: at('2024-01-01T09:00:00.000Z'),
    is_synced: true,
    ...overrides,
  };
}

export function makeBudget(overrides: Partial<Budget> = {}): Budget {
  return {
    id: 'budget-food',
    amount: '5000',
    period: 'monthly',
    start_date: at('2024-01-01T00:00:00.000Z'),
    alert_threshold: 0.8,
    is_active: true,
    category_id: 'cat-food',
    created_at: at('2024-01-01T09:00:00.000Z'),
    last_modified: at('2024-01-01T09:00:00.000Z'),
    is_synced: true,
    ...overrides,
  };
}

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 'tx-1',
    amount: '100',
    note: 'Lunch',
    date: at('2024-01-05T13:00:00.000Z'),
    type: 'expense',
    merchant_name: null,
    category_id: 'cat-food',
    account_id: 'acc-cash',
    created_at: at('2024-01-05T13:00:00.000Z'),
    last_modified: at('2024-01-05T13:00:00.000Z'),
    is_synced: true,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    id: USER_ID,
    email: 'someone@example.com',
    display_name: 'Someone',
    persona: 'professional',
    preferred_theme: 'clear',
    currency_code: 'INR',
    notifications_enabled: true,
    budget_alerts_enabled: true,
    daily_reminder_time: null,
    created_at: at('2024-01-01T09:00:00.000Z'),
    last_modified: at('2024-01-01T09:00:00.000Z'),
    is_synced: true,
    ...overrides,
  };
}

export function transactionDoc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'tx-1',
    amount: '100',
    note: 'Lunch',
    date: '2024-01-05T13:00:00.000Z',
    type: 'Expense',
    merchantName: null,
    categoryId: 'cat-food',
    accountId: 'acc-cash',
    createdAt: '2024-01-05T13:00:00.000Z',
    lastModified: '2024-01-05T13:00:00.000Z',
    isSynced: true,
    ...overrides,
  };
}

export function categoryDoc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'cat-food',
    name: 'Food',
    icon: 'fork.knife',
    colorHex: '#FF9500',
    isExpenseCategory: true,
    sortOrder: 1,
    isDefault: false,
    createdAt: '2024-01-01T09:00:00.000Z',
    lastModified: '2024-01-01T09:00:00.000Z',
    isSynced: true,
    ...overrides,
  };
}

export function budgetDoc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'budget-food',
    amount: '5000',
    period: 'Monthly',
    startDate: '2024-01-01T00:00:00.000Z',
    alertThreshold: 0.8,
    isActive: true,
    categoryId: 'cat-food',
    createdAt: '2024-01-01T09:00:00.000Z',
    lastModified: '2024-01-01T09:00:00.000Z',
    isSynced: true,
    ...overrides,
  };
}

/** A migrated in-memory database and a local store over it. */
export async function createTestLocalStore(): Promise<{ db: SqliteDatabase; store: LocalDataSource }> {
  const db = await SqliteDatabase.open(null);
  const migrations = await runMigrations(db);
  if (migrations.errors.length > 0) {
    throw new Error(migrations.errors.join('; '));
  }
  return { db, store: new LocalDataSource(db) };
}

/** A local entity as the codec would decode it from its remote document. */
export function toRemote<T extends SyncableEntity>(entity: T): RemoteRecord<T> {
  const { is_synced: _synced, ...record } = entity;
  return record;
}

/** Every local collection, as the orchestrator reads it before an upload. */
export async function loadSnapshot(store: LocalStore): Promise<LocalSnapshot> {
  return {
    categories: await store.fetch('categories'),
    accounts: await store.fetch('accounts'),
    budgets: await store.fetch('budgets'),
    transactions: await store.fetch('transactions'),
    profile: await store.fetch('profile'),
  };
}
