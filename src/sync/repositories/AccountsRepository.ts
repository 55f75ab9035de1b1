/**
 * AccountsRepository
 *
 * Repository for money accounts (cash, bank, cards, wallets).
 */

import type { Account, AccountType } from '@/lib/types';
import { normalizeDecimal } from '../codec/decimal';
import { SYNC_ENTITIES, type SyncableEntity } from '../types';
import { BaseRepository, type EntityChanges, type EntityInput } from './BaseRepository';

export class AccountsRepository extends BaseRepository<'accounts'> {
  readonly entityType = SYNC_ENTITIES.ACCOUNTS;

  protected materialize(
    base: EntityInput<'accounts'>,
    changes: EntityChanges<'accounts'>,
    meta: SyncableEntity
  ): Account {
    const account = { ...base, ...changes, ...meta };
    const initialBalance = normalizeDecimal(account.initial_balance);
    if (initialBalance === null) {
      throw new Error(`Invalid initial balance: ${account.initial_balance}`);
    }
    return { ...account, initial_balance: initialBalance };
  }

  async getByType(accountType: AccountType): Promise<Account[]> {
    const accounts = await this.getAll();
    return accounts.filter(account => account.account_type === accountType);
  }
}
