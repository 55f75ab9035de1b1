/**
 * CategoriesRepository
 *
 * Repository for expense and income categories.
 */

import type { Category } from '@/lib/types';
import { SYNC_ENTITIES, type SyncableEntity } from '../types';
import { BaseRepository, type EntityChanges, type EntityInput } from './BaseRepository';

export class CategoriesRepository extends BaseRepository<'categories'> {
  readonly entityType = SYNC_ENTITIES.CATEGORIES;

  protected materialize(
    base: EntityInput<'categories'>,
    changes: EntityChanges<'categories'>,
    meta: SyncableEntity
  ): Category {
    const category = { ...base, ...changes, ...meta };
    if (category.name.trim() === '') {
      throw new Error('Category name is required');
    }
    return category;
  }

  // ============ Entity-Specific Queries ============

  /**
   * Categories of one kind, in display order.
   */
  async getByKind(isExpenseCategory: boolean): Promise<Category[]> {
    const categories = await this.getAll();
    return categories.filter(category => category.is_expense_category === isExpenseCategory);
  }

  async getDefaults(): Promise<Category[]> {
    const categories = await this.getAll();
    return categories.filter(category => category.is_default);
  }
}
