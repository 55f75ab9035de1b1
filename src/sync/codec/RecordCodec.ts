/**
 * RecordCodec
 *
 * The only place the loosely typed wire format meets the typed entities.
 * Remote documents use camelCase keys and capitalized enum values
 * ("Expense", "Monthly"); local entities use the SQLite row naming.
 */

import { z } from 'zod';
import {
    ACCOUNT_TYPE_DEFAULTS,
    type Account,
    type Budget,
    type Category,
    type SyncableEntity,
    type Transaction,
    type UserProfile,
} from '@/lib/types';
import { DataError } from '../errors';
import {
    serverTimestamp,
    type DocumentData,
    type DocumentSnapshot,
} from '../datasources/types';
import type { RemoteRecord, SyncEntityMap, SyncEntityType } from '../types';
import { parseDecimal } from './decimal';
import { toDate, toIsoString } from './timestamps';

export interface EntityCodec<T extends SyncableEntity> {
  readonly entityType: SyncEntityType;
  /** Throws DataError when the document cannot be decoded. */
  decode(snapshot: DocumentSnapshot): RemoteRecord<T>;
  encode(entity: T): DocumentData;
}

// ============ Field schemas ============

const timestamp = z.unknown().transform((value, ctx) => {
  const date = toDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a timestamp' });
    return z.NEVER;
  }
  return date;
});

// Missing creation/occurrence dates fall back to decode time
const timestampOrNow = z.unknown().transform(value => toDate(value) ?? new Date());

const optionalTimestamp = z.unknown().transform(value => toDate(value));

const decimal = z.unknown().transform((value, ctx) => {
  const amount = parseDecimal(value);
  if (amount === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a decimal amount' });
    return z.NEVER;
  }
  return amount;
});

const text = (fallback: string) => z.string().catch(fallback);

const optionalText = z.unknown().transform(value =>
  typeof value === 'string' && value !== '' ? value : null
);

const flag = (fallback: boolean) => z.boolean().catch(fallback);

function wireEnum<U extends string, T extends Readonly<[U, ...U[]]>>(values: T, fallback: T[number]) {
  return z
    .string()
    .transform(value => value.trim().toLowerCase())
    .pipe(z.enum(values))
    .catch(fallback);
}

function toWireEnum(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============ Document schemas ============

const categorySchema: z.ZodType<RemoteRecord<Category>, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: text('Unknown'),
    icon: text('tag.fill'),
    colorHex: text('#007AFF'),
    isExpenseCategory: flag(true),
    sortOrder: z.number().int().catch(0),
    isDefault: flag(false),
    createdAt: timestampOrNow,
    lastModified: timestamp,
  })
  .transform(doc => ({
    id: doc.id,
    name: doc.name,
    icon: doc.icon,
    color_hex: doc.colorHex,
    is_expense_category: doc.isExpenseCategory,
    sort_order: doc.sortOrder,
    is_default: doc.isDefault,
    created_at: doc.createdAt,
    last_modified: doc.lastModified,
  }));

const accountSchema: z.ZodType<RemoteRecord<Account>, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: text('Unknown'),
    initialBalance: decimal,
    accountType: wireEnum(['cash', 'bank', 'credit', 'savings', 'wallet'], 'cash'),
    icon: optionalText,
    colorHex: optionalText,
    currencyCode: text('INR'),
    createdAt: timestampOrNow,
    lastModified: timestamp,
  })
  .transform(doc => ({
    id: doc.id,
    name: doc.name,
    initial_balance: doc.initialBalance,
    account_type: doc.accountType,
    icon: doc.icon ?? ACCOUNT_TYPE_DEFAULTS[doc.accountType].icon,
    color_hex: doc.colorHex ?? ACCOUNT_TYPE_DEFAULTS[doc.accountType].colorHex,
    currency_code: doc.currencyCode,
    created_at: doc.createdAt,
    last_modified: doc.lastModified,
  }));

const budgetSchema: z.ZodType<RemoteRecord<Budget>, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    amount: decimal,
    period: wireEnum(['weekly', 'monthly', 'yearly'], 'monthly'),
    startDate: timestampOrNow,
    alertThreshold: z.number().min(0).max(1).catch(0.8),
    isActive: flag(true),
    categoryId: optionalText,
    createdAt: timestampOrNow,
    lastModified: timestamp,
  })
  .transform(doc => ({
    id: doc.id,
    amount: doc.amount,
    period: doc.period,
    start_date: doc.startDate,
    alert_threshold: doc.alertThreshold,
    is_active: doc.isActive,
    category_id: doc.categoryId,
    created_at: doc.createdAt,
    last_modified: doc.lastModified,
  }));

const transactionSchema: z.ZodType<RemoteRecord<Transaction>, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    amount: decimal,
    note: text(''),
    date: timestampOrNow,
    type: wireEnum(['expense', 'income'], 'expense'),
    merchantName: optionalText,
    categoryId: optionalText,
    accountId: optionalText,
    createdAt: timestampOrNow,
    lastModified: timestamp,
  })
  .transform(doc => ({
    id: doc.id,
    amount: doc.amount,
    note: doc.note,
    date: doc.date,
    type: doc.type,
    merchant_name: doc.merchantName,
    category_id: doc.categoryId,
    account_id: doc.accountId,
    created_at: doc.createdAt,
    last_modified: doc.lastModified,
  }));

const profileSchema: z.ZodType<RemoteRecord<UserProfile>, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    email: text(''),
    displayName: text(''),
    persona: wireEnum(['student', 'professional', 'family'], 'professional'),
    preferredTheme: wireEnum(['light', 'dark', 'tinted', 'clear'], 'clear'),
    currencyCode: text('INR'),
    notificationsEnabled: flag(true),
    budgetAlertsEnabled: flag(true),
    dailyReminderTime: optionalTimestamp,
    createdAt: timestampOrNow,
    lastModified: timestamp,
  })
  .transform(doc => ({
    id: doc.id,
    email: doc.email,
    display_name: doc.displayName,
    persona: doc.persona,
    preferred_theme: doc.preferredTheme,
    currency_code: doc.currencyCode,
    notifications_enabled: doc.notificationsEnabled,
    budget_alerts_enabled: doc.budgetAlertsEnabled,
    daily_reminder_time: doc.dailyReminderTime,
    created_at: doc.createdAt,
    last_modified: doc.lastModified,
  }));

// ============ Encoders ============

function encodeCategory(category: Category): DocumentData {
  return {
    id: category.id,
    name: category.name,
    icon: category.icon,
    colorHex: category.color_hex,
    isExpenseCategory: category.is_expense_category,
    sortOrder: category.sort_order,
    isDefault: category.is_default,
    createdAt: toIsoString(category.created_at),
  };
}

function encodeAccount(account: Account): DocumentData {
  return {
    id: account.id,
    name: account.name,
    initialBalance: account.initial_balance,
    accountType: toWireEnum(account.account_type),
    icon: account.icon,
    colorHex: account.color_hex,
    currencyCode: account.currency_code,
    createdAt: toIsoString(account.created_at),
  };
}

function encodeBudget(budget: Budget): DocumentData {
  return {
    id: budget.id,
    amount: budget.amount,
    period: toWireEnum(budget.period),
    startDate: toIsoString(budget.start_date),
    alertThreshold: budget.alert_threshold,
    isActive: budget.is_active,
    categoryId: budget.category_id,
    createdAt: toIsoString(budget.created_at),
  };
}

function encodeTransaction(transaction: Transaction): DocumentData {
  return {
    id: transaction.id,
    amount: transaction.amount,
    note: transaction.note,
    date: toIsoString(transaction.date),
    type: toWireEnum(transaction.type),
    merchantName: transaction.merchant_name,
    categoryId: transaction.category_id,
    accountId: transaction.account_id,
    createdAt: toIsoString(transaction.created_at),
  };
}

function encodeProfile(profile: UserProfile): DocumentData {
  return {
    id: profile.id,
    email: profile.email,
    displayName: profile.display_name,
    persona: toWireEnum(profile.persona),
    preferredTheme: toWireEnum(profile.preferred_theme),
    currencyCode: profile.currency_code,
    notificationsEnabled: profile.notifications_enabled,
    budgetAlertsEnabled: profile.budget_alerts_enabled,
    dailyReminderTime: profile.daily_reminder_time ? toIsoString(profile.daily_reminder_time) : null,
    createdAt: toIsoString(profile.created_at),
  };
}

// ============ Codec registry ============

function createCodec<T extends SyncableEntity>(
  entityType: SyncEntityType,
  schema: z.ZodType<RemoteRecord<T>, z.ZodTypeDef, unknown>,
  encodeFields: (entity: T) => DocumentData
): EntityCodec<T> {
  return {
    entityType,

    decode(snapshot: DocumentSnapshot): RemoteRecord<T> {
      const { data } = snapshot;
      const id = typeof data.id === 'string' && data.id !== '' ? data.id : snapshot.id;
      const result = schema.safeParse({ ...data, id });

      if (!result.success) {
        const reason = result.error.issues
          .map(issue => `${issue.path.join('.') || '(document)'}: ${issue.message}`)
          .join('; ');
        throw new DataError(snapshot.path, reason);
      }

      return result.data;
    },

    encode(entity: T): DocumentData {
      return {
        ...encodeFields(entity),
        isSynced: true,
        lastModified: serverTimestamp(),
      };
    },
  };
}

export type CodecRegistry = { [K in SyncEntityType]: EntityCodec<SyncEntityMap[K]> };

export const codecs: CodecRegistry = {
  categories: createCodec<Category>('categories', categorySchema, encodeCategory),
  accounts: createCodec<Account>('accounts', accountSchema, encodeAccount),
  budgets: createCodec<Budget>('budgets', budgetSchema, encodeBudget),
  transactions: createCodec<Transaction>('transactions', transactionSchema, encodeTransaction),
  profile: createCodec<UserProfile>('profile', profileSchema, encodeProfile),
};

export function getCodec<K extends SyncEntityType>(entityType: K): EntityCodec<SyncEntityMap[K]> {
  return codecs[entityType];
}

export interface DecodedBatch<T extends SyncableEntity> {
  records: RemoteRecord<T>[];
  errors: DataError[];
}

/**
 * Decode a collection snapshot, setting aside documents that fail to decode
 * so the rest of the batch still merges.
 */
export function decodeAll<T extends SyncableEntity>(
  codec: EntityCodec<T>,
  snapshots: DocumentSnapshot[]
): DecodedBatch<T> {
  const batch: DecodedBatch<T> = { records: [], errors: [] };

  for (const snapshot of snapshots) {
    try {
      batch.records.push(codec.decode(snapshot));
    } catch (error) {
      if (!(error instanceof DataError)) throw error;
      batch.errors.push(error);
    }
  }

  return batch;
}
