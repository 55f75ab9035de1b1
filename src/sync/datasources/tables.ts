/**
 * Row mapping for every synced table.
 *
 * SQLite has no boolean, date or decimal type: booleans are stored as
 * INTEGER 0/1, dates as ISO-8601 TEXT and money amounts as decimal TEXT.
 */

import type { SqlValue } from 'sql.js';
import {
    ACCOUNT_TYPES,
    APP_THEMES,
    BUDGET_PERIODS,
    TRANSACTION_TYPES,
    USER_PERSONAS,
    type Account,
    type Budget,
    type Category,
    type Transaction,
    type UserProfile,
} from '@/lib/types';
import type { SyncEntityMap, SyncEntityType } from '../types';
import type { TableConfig } from './types';

type Row = Record<string, SqlValue>;

// ============ Column readers ============

function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function readOptionalText(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return Number(value);
  return 0;
}

function readBool(row: Row, column: string): boolean {
  return readNumber(row, column) !== 0;
}

function readDate(row: Row, column: string): Date {
  return new Date(readText(row, column));
}

function readOptionalDate(row: Row, column: string): Date | null {
  const value = readOptionalText(row, column);
  return value ? new Date(value) : null;
}

function readEnum<T extends string>(row: Row, column: string, values: readonly T[], fallback: T): T {
  const value = row[column];
  return values.find(candidate => candidate === value) ?? fallback;
}

const bool = (value: boolean): number => (value ? 1 : 0);
const iso = (value: Date): string => value.toISOString();

const SYNC_COLUMNS = ['id', 'created_at', 'last_modified', 'is_synced'];

// ============ Tables ============

export const categoriesTable: TableConfig<Category> = {
  tableName: 'categories',
  columns: [...SYNC_COLUMNS, 'name', 'icon', 'color_hex', 'is_expense_category', 'sort_order', 'is_default'],
  orderBy: 'sort_order ASC, name ASC',
  toRow: category => ({
    id: category.id,
    name: category.name,
    icon: category.icon,
    color_hex: category.color_hex,
    is_expense_category: bool(category.is_expense_category),
    sort_order: category.sort_order,
    is_default: bool(category.is_default),
    created_at: iso(category.created_at),
    last_modified: iso(category.last_modified),
    is_synced: bool(category.is_synced),
  }),
  fromRow: row => ({
    id: readText(row, 'id'),
    name: readText(row, 'name'),
    icon: readText(row, 'icon'),
    color_hex: readText(row, 'color_hex'),
    is_expense_category: readBool(row, 'is_expense_category'),
    sort_order: readNumber(row, 'sort_order'),
    is_default: readBool(row, 'is_default'),
    created_at: readDate(row, 'created_at'),
    last_modified: readDate(row, 'last_modified'),
    is_synced: readBool(row, 'is_synced'),
  }),
};

export const accountsTable: TableConfig<Account> = {
  tableName: 'accounts',
  columns: [...SYNC_COLUMNS, 'name', 'initial_balance', 'account_type', 'icon', 'color_hex', 'currency_code'],
  orderBy: 'name ASC',
  toRow: account => ({
    id: account.id,
    name: account.name,
    initial_balance: account.initial_balance,
    account_type: account.account_type,
    icon: account.icon,
    color_hex: account.color_hex,
    currency_code: account.currency_code,
    created_at: iso(account.created_at),
    last_modified: iso(account.last_modified),
    is_synced: bool(account.is_synced),
  }),
  fromRow: row => ({
    id: readText(row, 'id'),
    name: readText(row, 'name'),
    initial_balance: readText(row, 'initial_balance'),
    account_type: readEnum(row, 'account_type', ACCOUNT_TYPES, 'cash'),
    icon: readText(row, 'icon'),
    color_hex: readText(row, 'color_hex'),
    currency_code: readText(row, 'currency_code'),
    created_at: readDate(row, 'created_at'),
    last_modified: readDate(row, 'last_modified'),
    is_synced: readBool(row, 'is_synced'),
  }),
};

export const budgetsTable: TableConfig<Budget> = {
  tableName: 'budgets',
  columns: [...SYNC_COLUMNS, 'amount', 'period', 'start_date', 'alert_threshold', 'is_active', 'category_id'],
  orderBy: 'start_date DESC',
  toRow: budget => ({
    id: budget.id,
    amount: budget.amount,
    period: budget.period,
    start_date: iso(budget.start_date),
    alert_threshold: budget.alert_threshold,
    is_active: bool(budget.is_active),
    category_id: budget.category_id,
    created_at: iso(budget.created_at),
    last_modified: iso(budget.last_modified),
    is_synced: bool(budget.is_synced),
  }),
  fromRow: row => ({
    id: readText(row, 'id'),
    amount: readText(row, 'amount'),
    period: readEnum(row, 'period', BUDGET_PERIODS, 'monthly'),
    start_date: readDate(row, 'start_date'),
    alert_threshold: readNumber(row, 'alert_threshold'),
    is_active: readBool(row, 'is_active'),
    category_id: readOptionalText(row, 'category_id'),
    created_at: readDate(row, 'created_at'),
    last_modified: readDate(row, 'last_modified'),
    is_synced: readBool(row, 'is_synced'),
  }),
};

export const transactionsTable: TableConfig<Transaction> = {
  tableName: 'transactions',
  columns: [...SYNC_COLUMNS, 'amount', 'note', 'date', 'type', 'merchant_name', 'category_id', 'account_id'],
  orderBy: 'date DESC',
  toRow: transaction => ({
    id: transaction.id,
    amount: transaction.amount,
    note: transaction.note,
    date: iso(transaction.date),
    type: transaction.type,
    merchant_name: transaction.merchant_name,
    category_id: transaction.category_id,
    account_id: transaction.account_id,
    created_at: iso(transaction.created_at),
    last_modified: iso(transaction.last_modified),
    is_synced: bool(transaction.is_synced),
  }),
  fromRow: row => ({
    id: readText(row, 'id'),
    amount: readText(row, 'amount'),
    note: readText(row, 'note'),
    date: readDate(row, 'date'),
    type: readEnum(row, 'type', TRANSACTION_TYPES, 'expense'),
    merchant_name: readOptionalText(row, 'merchant_name'),
    category_id: readOptionalText(row, 'category_id'),
    account_id: readOptionalText(row, 'account_id'),
    created_at: readDate(row, 'created_at'),
    last_modified: readDate(row, 'last_modified'),
    is_synced: readBool(row, 'is_synced'),
  }),
};

export const userProfilesTable: TableConfig<UserProfile> = {
  tableName: 'user_profiles',
  columns: [
    ...SYNC_COLUMNS,
    'email',
    'display_name',
    'persona',
    'preferred_theme',
    'currency_code',
    'notifications_enabled',
    'budget_alerts_enabled',
    'daily_reminder_time',
  ],
  orderBy: 'created_at ASC',
  toRow: profile => ({
    id: profile.id,
    email: profile.email,
    display_name: profile.display_name,
    persona: profile.persona,
    preferred_theme: profile.preferred_theme,
    currency_code: profile.currency_code,
    notifications_enabled: bool(profile.notifications_enabled),
    budget_alerts_enabled: bool(profile.budget_alerts_enabled),
    daily_reminder_time: profile.daily_reminder_time ? iso(profile.daily_reminder_time) : null,
    created_at: iso(profile.created_at),
    last_modified: iso(profile.last_modified),
    is_synced: bool(profile.is_synced),
  }),
  fromRow: row => ({
    id: readText(row, 'id'),
    email: readText(row, 'email'),
    display_name: readText(row, 'display_name'),
    persona: readEnum(row, 'persona', USER_PERSONAS, 'professional'),
    preferred_theme: readEnum(row, 'preferred_theme', APP_THEMES, 'clear'),
    currency_code: readText(row, 'currency_code'),
    notifications_enabled: readBool(row, 'notifications_enabled'),
    budget_alerts_enabled: readBool(row, 'budget_alerts_enabled'),
    daily_reminder_time: readOptionalDate(row, 'daily_reminder_time'),
    created_at: readDate(row, 'created_at'),
    last_modified: readDate(row, 'last_modified'),
    is_synced: readBool(row, 'is_synced'),
  }),
};

export type TableRegistry = { [K in SyncEntityType]: TableConfig<SyncEntityMap[K]> };

export const TABLES: TableRegistry = {
  categories: categoriesTable,
  accounts: accountsTable,
  budgets: budgetsTable,
  transactions: transactionsTable,
  profile: userProfilesTable,
};

export function getTable<K extends SyncEntityType>(entityType: K): TableConfig<SyncEntityMap[K]> {
  return TABLES[entityType];
}
