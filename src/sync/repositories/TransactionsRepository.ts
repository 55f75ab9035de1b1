/**
 * TransactionsRepository
 *
 * Repository for income and expense transactions, newest first.
 */

import type { Transaction } from '@/lib/types';
import { normalizeDecimal } from '../codec/decimal';
import { SYNC_ENTITIES, type SyncableEntity } from '../types';
import { BaseRepository, type EntityChanges, type EntityInput } from './BaseRepository';

export class TransactionsRepository extends BaseRepository<'transactions'> {
  readonly entityType = SYNC_ENTITIES.TRANSACTIONS;

  protected materialize(
    base: EntityInput<'transactions'>,
    changes: EntityChanges<'transactions'>,
    meta: SyncableEntity
  ): Transaction {
    const transaction = { ...base, ...changes, ...meta };
    const amount = normalizeDecimal(transaction.amount);
    if (amount === null) {
      throw new Error(`Invalid transaction amount: ${transaction.amount}`);
    }
    return { ...transaction, amount };
  }

  // ============ Entity-Specific Queries ============

  /**
   * Transactions dated within [start, end], inclusive.
   */
  async getByDateRange(start: Date, end: Date): Promise<Transaction[]> {
    const transactions = await this.getAll();
    return transactions.filter(
      transaction =>
        transaction.date.getTime() >= start.getTime() && transaction.date.getTime() <= end.getTime()
    );
  }

  async getByCategory(categoryId: string): Promise<Transaction[]> {
    const transactions = await this.getAll();
    return transactions.filter(transaction => transaction.category_id === categoryId);
  }

  async getByAccount(accountId: string): Promise<Transaction[]> {
    const transactions = await this.getAll();
    return transactions.filter(transaction => transaction.account_id === accountId);
  }
}
