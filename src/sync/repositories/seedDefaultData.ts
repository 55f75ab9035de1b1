import {
    DEFAULT_ACCOUNTS,
    DEFAULT_CURRENCY_CODE,
    DEFAULT_EXPENSE_CATEGORIES,
    DEFAULT_INCOME_CATEGORIES,
} from '@/lib/defaults';
import type { AccountsRepository } from './AccountsRepository';
import type { CategoriesRepository } from './CategoriesRepository';

export interface SeedResult {
  accounts: number;
  categories: number;
}

/**
 * Create the default accounts and categories where none exist yet.
 * Run after the first pull, so a returning user's cloud data counts as
 * existing. Seeded records are ordinary unsynced writes.
 */
export async function seedDefaultData(repositories: {
  accounts: AccountsRepository;
  categories: CategoriesRepository;
}): Promise<SeedResult> {
  const result: SeedResult = { accounts: 0, categories: 0 };

  if ((await repositories.accounts.getAll()).length === 0) {
    for (const account of DEFAULT_ACCOUNTS) {
      await repositories.accounts.create({
        ...account,
        initial_balance: '0',
        currency_code: DEFAULT_CURRENCY_CODE,
      });
      result.accounts++;
    }
  }

  if ((await repositories.categories.getAll()).length === 0) {
    for (const category of [...DEFAULT_EXPENSE_CATEGORIES, ...DEFAULT_INCOME_CATEGORIES]) {
      await repositories.categories.create({ ...category, is_default: true });
      result.categories++;
    }
  }

  if (result.accounts > 0 || result.categories > 0) {
    console.log(`[Seed] Created ${result.accounts} default account(s), ${result.categories} default category(ies)`);
  }
  return result;
}
