/**
 * UploadQueue
 *
 * Pushes every unsynced local record to the remote store in a single atomic
 * batch. Only after the batch commits are the records marked synced, with
 * the server's commit time as their new `last_modified`; a failed commit
 * leaves the local store untouched so the next attempt selects the same set.
 */

import { getCodec } from '../codec/RecordCodec';
import type { LocalStore, RemoteStore, WriteBatch } from '../datasources/types';
import {
    collectionPath,
    SYNC_ENTITY_ORDER,
    type LocalSnapshot,
    type SyncEntityMap,
    type SyncEntityType,
} from '../types';

type MarkSynced = (commitTime: Date) => Promise<void>;

export class UploadQueue {
  constructor(
    private readonly localStore: LocalStore,
    private readonly remoteStore: RemoteStore
  ) {}

  /**
   * Upload the unsynced records of `snapshot`. Returns the uploaded count.
   * Throws NetworkFailureError or BatchCommitError when the batch fails.
   */
  async pushUnsynced(userId: string, snapshot: LocalSnapshot): Promise<number> {
    const batch = this.remoteStore.batch();
    const pending: MarkSynced[] = [];

    for (const entityType of SYNC_ENTITY_ORDER) {
      pending.push(...this.stage(batch, userId, entityType, snapshot[entityType]));
    }

    if (batch.size === 0) return 0;

    console.log(`[UploadQueue] Uploading ${batch.size} record(s)`);
    const commitTime = await batch.commit();

    for (const markSynced of pending) {
      await markSynced(commitTime);
    }
    await this.localStore.save();

    return batch.size;
  }

  private stage<K extends SyncEntityType>(
    batch: WriteBatch,
    userId: string,
    entityType: K,
    entities: SyncEntityMap[K][]
  ): MarkSynced[] {
    const codec = getCodec(entityType);
    const collection = this.remoteStore.collection(collectionPath(userId, entityType));
    const pending: MarkSynced[] = [];

    for (const entity of entities) {
      if (entity.is_synced) continue;

      batch.setData(collection.document(entity.id), codec.encode(entity));

      pending.push(async commitTime => {
        // An edit made while the batch was in flight stays unsynced
        const current = await this.localStore.getById(entityType, entity.id);
        if (!current || current.last_modified.getTime() !== entity.last_modified.getTime()) {
          return;
        }
        this.localStore.update(
          entityType,
          { ...current, is_synced: true, last_modified: commitTime },
          { lastModified: current.last_modified, isSynced: current.is_synced }
        );
      });
    }

    return pending;
  }
}
