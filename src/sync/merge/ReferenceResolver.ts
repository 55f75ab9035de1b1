/**
 * ReferenceResolver
 *
 * Re-links budgets and transactions to local categories and accounts by id.
 * Built once per pass, after categories and accounts have been merged, so a
 * referenced record inserted earlier in the same pass is found.
 */

import type { Account, Category } from '@/lib/types';

export interface ReferenceSources {
  categories: Iterable<Pick<Category, 'id'>>;
  accounts: Iterable<Pick<Account, 'id'>>;
}

export class ReferenceResolver {
  private readonly categoryIds: ReadonlySet<string>;
  private readonly accountIds: ReadonlySet<string>;

  private constructor(categoryIds: Set<string>, accountIds: Set<string>) {
    this.categoryIds = categoryIds;
    this.accountIds = accountIds;
  }

  static build(sources: ReferenceSources): ReferenceResolver {
    const categoryIds = new Set<string>();
    for (const category of sources.categories) categoryIds.add(category.id);

    const accountIds = new Set<string>();
    for (const account of sources.accounts) accountIds.add(account.id);

    return new ReferenceResolver(categoryIds, accountIds);
  }

  /** Returns the id when a local category exists, otherwise null. Never throws. */
  resolveCategory(id: string | null | undefined): string | null {
    return id && this.categoryIds.has(id) ? id : null;
  }

  resolveAccount(id: string | null | undefined): string | null {
    return id && this.accountIds.has(id) ? id : null;
  }
}
