import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { StaticIdentityProvider } from '@/lib/auth';
import type { SqliteDatabase } from '@/lib/database';
import { MemoryRemoteStore } from '@/test/MemoryRemoteStore';
import { at, createTestLocalStore, makeTransaction, transactionDoc, USER_ID } from '@/test/fixtures';
import type { LocalDataSource } from '../datasources/LocalDataSource';
import { NetworkMonitor } from '../services/NetworkMonitor';
import { AccountsRepository } from './AccountsRepository';
import type { RepositoryOptions } from './BaseRepository';
import { BudgetsRepository } from './BudgetsRepository';
import { CategoriesRepository } from './CategoriesRepository';
import { TransactionsRepository } from './TransactionsRepository';
import { UserProfileRepository } from './UserProfileRepository';

const NOW = at('2024-03-01T09:30:00.000Z');
const TRANSACTIONS = `users/${USER_ID}/transactions`;

describe('repositories', () => {
  let db: SqliteDatabase;
  let local: LocalDataSource;
  let remote: MemoryRemoteStore;
  let network: NetworkMonitor;
  let schedulePush: Mock;
  let options: RepositoryOptions;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    ({ db, store: local } = await createTestLocalStore());
    remote = new MemoryRemoteStore();
    network = new NetworkMonitor();
    schedulePush = vi.fn();
    options = {
      localStore: local,
      remoteStore: remote,
      identity: new StaticIdentityProvider(USER_ID),
      network,
      scheduler: { schedulePush },
      now: () => NOW,
    };
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('TransactionsRepository', () => {
    const input = {
      amount: '12.50',
      note: 'Coffee',
      date: at('2024-03-01T08:00:00.000Z'),
      type: 'expense' as const,
      merchant_name: 'Corner Cafe',
      category_id: null,
      account_id: null,
    };

    it('should create unsynced records stamped with the local clock', async () => {
      const repository = new TransactionsRepository(options);

      const created = await repository.create(input, 'tx-new');

      expect(created).toEqual({
        ...input,
        amount: '12.5',
        id: 'tx-new',
        created_at: NOW,
        last_modified: NOW,
        is_synced: false,
      });
      expect(await local.getById('transactions', 'tx-new')).toEqual(created);
      expect(schedulePush).toHaveBeenCalledTimes(1);
    });

    it('should generate ids when none is given', async () => {
      const created = await new TransactionsRepository(options).create(input);
      expect(created.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });

    it('should reject invalid amounts without writing', async () => {
      const repository = new TransactionsRepository(options);

      await expect(repository.create({ ...input, amount: 'twelve' }, 'tx-bad')).rejects.toThrow(
        'Invalid transaction amount: twelve'
      );
      expect(await local.getById('transactions', 'tx-bad')).toBeNull();
      expect(schedulePush).not.toHaveBeenCalled();
    });

    it('should update fields and mark the record unsynced', async () => {
      await local.writeNow('insert', 'transactions', makeTransaction({ is_synced: true }));
      const repository = new TransactionsRepository(options);

      const updated = await repository.update('tx-1', { amount: '120.00' });

      expect(updated?.amount).toBe('120');
      expect(updated?.is_synced).toBe(false);
      expect(updated?.last_modified).toEqual(NOW);
      expect(updated?.created_at).toEqual(at('2024-01-05T13:00:00.000Z'));
      expect(updated?.note).toBe('Lunch');
    });

    it('should return null when updating a missing record', async () => {
      expect(await new TransactionsRepository(options).update('tx-missing', { note: 'x' })).toBeNull();
      expect(schedulePush).not.toHaveBeenCalled();
    });

    it('should delete locally and remotely when online', async () => {
      await local.writeNow('insert', 'transactions', makeTransaction());
      remote.seed(TRANSACTIONS, 'tx-1', transactionDoc());

      const result = await new TransactionsRepository(options).delete('tx-1');

      expect(result).toEqual({ deleted: true, remoteDeleted: true, remoteError: null });
      expect(await local.getById('transactions', 'tx-1')).toBeNull();
      expect(remote.getDocument(TRANSACTIONS, 'tx-1')).toBeUndefined();
    });

    it('should delete only locally while offline', async () => {
      network.setStatus({ connected: false });
      await local.writeNow('insert', 'transactions', makeTransaction());
      remote.seed(TRANSACTIONS, 'tx-1', transactionDoc());

      const result = await new TransactionsRepository(options).delete('tx-1');

      expect(result).toEqual({ deleted: true, remoteDeleted: false, remoteError: null });
      expect(remote.getDocument(TRANSACTIONS, 'tx-1')).toBeDefined();
    });

    it('should report a failed remote delete without undoing the local one', async () => {
      await local.writeNow('insert', 'transactions', makeTransaction());
      remote.failNextCommit();

      const result = await new TransactionsRepository(options).delete('tx-1');

      expect(result).toEqual({
        deleted: true,
        remoteDeleted: false,
        remoteError: { code: 'batch-commit-failed', message: 'Batch operation failed (remote): simulated commit failure' },
      });
      expect(await local.getById('transactions', 'tx-1')).toBeNull();
    });

    it('should report a missing record as not deleted', async () => {
      expect(await new TransactionsRepository(options).delete('tx-missing')).toEqual({
        deleted: false,
        remoteDeleted: false,
        remoteError: null,
      });
    });

    it('should filter by inclusive date range', async () => {
      await local.writeNow('insert', 'transactions', makeTransaction({ id: 'tx-a', date: at('2024-02-01T00:00:00.000Z') }));
      await local.writeNow('insert', 'transactions', makeTransaction({ id: 'tx-b', date: at('2024-02-15T00:00:00.000Z') }));
      await local.writeNow('insert', 'transactions', makeTransaction({ id: 'tx-c', date: at('2024-03-01T00:00:00.000Z') }));

      const inRange = await new TransactionsRepository(options).getByDateRange(
        at('2024-02-01T00:00:00.000Z'),
        at('2024-02-15T00:00:00.000Z')
      );

      expect(inRange.map(tx => tx.id)).toEqual(['tx-b', 'tx-a']);
    });

    it('should emit current data to new subscribers and changes afterwards', async () => {
      const repository = new TransactionsRepository(options);
      const listener = vi.fn();

      repository.subscribe(listener);
      await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
      expect(listener).toHaveBeenLastCalledWith([]);

      await repository.create(input, 'tx-new');

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener.mock.lastCall?.[0]).toHaveLength(1);
    });
  });

  describe('CategoriesRepository', () => {
    it('should require a name', async () => {
      const repository = new CategoriesRepository(options);

      await expect(
        repository.create({
          name: '  ',
          icon: 'tag.fill',
          color_hex: '#007AFF',
          is_expense_category: true,
          sort_order: 0,
          is_default: false,
        })
      ).rejects.toThrow('Category name is required');
    });

    it('should list categories by kind', async () => {
      const repository = new CategoriesRepository(options);
      const base = { icon: 'tag.fill', color_hex: '#007AFF', sort_order: 0, is_default: false };
      await repository.create({ ...base, name: 'Salary', is_expense_category: false }, 'cat-salary');
      await repository.create({ ...base, name: 'Rent', is_expense_category: true }, 'cat-rent');

      const income = await repository.getByKind(false);

      expect(income.map(category => category.id)).toEqual(['cat-salary']);
    });
  });

  describe('AccountsRepository', () => {
    it('should normalize the initial balance', async () => {
      const account = await new AccountsRepository(options).create(
        {
          name: 'Savings',
          initial_balance: '+1000.00',
          account_type: 'savings',
          icon: 'dollarsign.circle.fill',
          color_hex: '#5856D6',
          currency_code: 'INR',
        },
        'acc-savings'
      );

      expect(account.initial_balance).toBe('1000');
    });
  });

  describe('BudgetsRepository', () => {
    it('should reject thresholds outside 0-1', async () => {
      await expect(
        new BudgetsRepository(options).create({
          amount: '100',
          period: 'weekly',
          start_date: at('2024-03-01T00:00:00.000Z'),
          alert_threshold: 1.2,
          is_active: true,
          category_id: null,
        })
      ).rejects.toThrow('Alert threshold must be between 0 and 1, got 1.2');
    });
  });

  describe('UserProfileRepository', () => {
    it('should create the profile under the user id and update it afterwards', async () => {
      const repository = new UserProfileRepository(options);
      const fields = {
        email: 'someone@example.com',
        display_name: 'Someone',
        persona: 'student' as const,
        preferred_theme: 'dark' as const,
        currency_code: 'INR',
        notifications_enabled: true,
        budget_alerts_enabled: false,
        daily_reminder_time: null,
      };

      const created = await repository.save(USER_ID, fields);
      const updated = await repository.save(USER_ID, { ...fields, display_name: 'Renamed' });

      expect(created.id).toBe(USER_ID);
      expect(updated.display_name).toBe('Renamed');
      expect(await local.fetch('profile')).toHaveLength(1);
      expect((await repository.getForUser(USER_ID))?.display_name).toBe('Renamed');
    });
  });
});
