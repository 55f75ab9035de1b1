/**
 * UserProfileRepository
 *
 * One profile per user; the profile id is the user id.
 */

import type { UserProfile } from '@/lib/types';
import { SYNC_ENTITIES, type SyncableEntity } from '../types';
import { BaseRepository, type EntityChanges, type EntityInput } from './BaseRepository';

export class UserProfileRepository extends BaseRepository<'profile'> {
  readonly entityType = SYNC_ENTITIES.PROFILE;

  protected materialize(
    base: EntityInput<'profile'>,
    changes: EntityChanges<'profile'>,
    meta: SyncableEntity
  ): UserProfile {
    return { ...base, ...changes, ...meta };
  }

  async getForUser(userId: string): Promise<UserProfile | null> {
    return this.getById(userId);
  }

  /**
   * Create the user's profile or update the existing one.
   */
  async save(userId: string, fields: EntityInput<'profile'>): Promise<UserProfile> {
    const updated = await this.update(userId, fields);
    return updated ?? this.create(fields, userId);
  }
}
