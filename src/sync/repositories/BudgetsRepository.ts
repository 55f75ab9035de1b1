/**
 * BudgetsRepository
 */

import type { Budget } from '@/lib/types';
import { normalizeDecimal } from '../codec/decimal';
import { SYNC_ENTITIES, type SyncableEntity } from '../types';
import { BaseRepository, type EntityChanges, type EntityInput } from './BaseRepository';

export class BudgetsRepository extends BaseRepository<'budgets'> {
  readonly entityType = SYNC_ENTITIES.BUDGETS;

  protected materialize(
    base: EntityInput<'budgets'>,
    changes: EntityChanges<'budgets'>,
    meta: SyncableEntity
  ): Budget {
    const budget = { ...base, ...changes, ...meta };
    const amount = normalizeDecimal(budget.amount);
    if (amount === null) {
      throw new Error(`Invalid budget amount: ${budget.amount}`);
    }
    if (budget.alert_threshold < 0 || budget.alert_threshold > 1) {
      throw new Error(`Alert threshold must be between 0 and 1, got ${budget.alert_threshold}`);
    }
    return { ...budget, amount };
  }

  // ============ Entity-Specific Queries ============

  async getActive(): Promise<Budget[]> {
    const budgets = await this.getAll();
    return budgets.filter(budget => budget.is_active);
  }

  async getByCategory(categoryId: string): Promise<Budget[]> {
    const budgets = await this.getAll();
    return budgets.filter(budget => budget.category_id === categoryId);
  }
}
