// Entity types matching the local SQLite schema

import { randomUUID } from 'node:crypto';

export type TransactionType = 'expense' | 'income';
export type AccountType = 'cash' | 'bank' | 'credit' | 'savings' | 'wallet';
export type BudgetPeriod = 'weekly' | 'monthly' | 'yearly';
export type UserPersona = 'student' | 'professional' | 'family';
export type AppTheme = 'light' | 'dark' | 'tinted' | 'clear';

export const TRANSACTION_TYPES: readonly TransactionType[] = ['expense', 'income'];
export const ACCOUNT_TYPES: readonly AccountType[] = ['cash', 'bank', 'credit', 'savings', 'wallet'];
export const BUDGET_PERIODS: readonly BudgetPeriod[] = ['weekly', 'monthly', 'yearly'];
export const USER_PERSONAS: readonly UserPersona[] = ['student', 'professional', 'family'];
export const APP_THEMES: readonly AppTheme[] = ['light', 'dark', 'tinted', 'clear'];

// Icon and color an account takes from its type when none is given
export const ACCOUNT_TYPE_DEFAULTS: Record<AccountType, { icon: string; colorHex: string }> = {
  cash: { icon: 'banknote.fill', colorHex: '#34C759' },
  bank: { icon: 'building.columns.fill', colorHex: '#007AFF' },
  credit: { icon: 'creditcard.fill', colorHex: '#FF9500' },
  savings: { icon: 'dollarsign.circle.fill', colorHex: '#5856D6' },
  wallet: { icon: 'wallet.pass.fill', colorHex: '#FF2D55' },
};

/**
 * Fields every cloud-synchronized entity carries.
 *
 * `last_modified` is the only conflict signal: it is bumped on every local
 * mutation and replaced by the server commit time after an upload.
 * `is_synced` is true only while the local copy matches the last confirmed
 * remote write.
 */
export interface SyncableEntity {
  id: string;
  created_at: Date;
  last_modified: Date;
  is_synced: boolean;
}

export interface Category extends SyncableEntity {
  name: string;
  icon: string;
  color_hex: string;
  is_expense_category: boolean;
  sort_order: number;
  is_default: boolean;
}

export interface Account extends SyncableEntity {
  name: string;
  /** Exact decimal, e.g. "1250.50" */
  initial_balance: string;
  account_type: AccountType;
  icon: string;
  color_hex: string;
  currency_code: string;
}

export interface Budget extends SyncableEntity {
  /** Exact decimal */
  amount: string;
  period: BudgetPeriod;
  start_date: Date;
  /** Fraction of `amount` (0-1) at which an alert fires */
  alert_threshold: number;
  is_active: boolean;
  category_id: string | null;
}

export interface Transaction extends SyncableEntity {
  /** Exact decimal */
  amount: string;
  note: string;
  date: Date;
  type: TransactionType;
  merchant_name: string | null;
  category_id: string | null;
  account_id: string | null;
}

// id is the owning user's id
export interface UserProfile extends SyncableEntity {
  email: string;
  display_name: string;
  persona: UserPersona;
  preferred_theme: AppTheme;
  currency_code: string;
  notifications_enabled: boolean;
  budget_alerts_enabled: boolean;
  daily_reminder_time: Date | null;
}

// Utility functions
export function generateId(): string {
  return randomUUID();
}
