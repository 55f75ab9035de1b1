/**
 * RemoteDataSource
 *
 * Supabase implementation of the remote document store. Every document of
 * every user lives in the `sync_documents` table, keyed by
 * (user_id, collection, id), with its fields in a `data` jsonb column.
 *
 * Multi-document writes go through the `commit_document_batch` function,
 * which applies the whole batch in one transaction and stamps
 * server-timestamp fields with its own `now()`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
    BatchCommitError,
    isNetworkErrorMessage,
    NetworkFailureError,
    RemoteStoreError,
    type SyncError,
} from '../errors';
import { toDate } from '../codec/timestamps';
import { SYNC_CONFIG } from '../types';
import {
    isServerTimestamp,
    parseCollectionPath,
    type CollectionReference,
    type DocumentData,
    type DocumentReference,
    type DocumentSnapshot,
    type QueryOptions,
    type RemoteStore,
    type WriteBatch,
} from './types';

export const DOCUMENTS_TABLE = 'sync_documents';
export const COMMIT_BATCH_FUNCTION = 'commit_document_batch';

const documentRowSchema = z.object({
  id: z.string(),
  data: z.record(z.unknown()).nullable(),
  last_modified: z.string().nullable(),
});

type DocumentRow = z.infer<typeof documentRowSchema>;

const commitResultSchema = z.string();

export interface SupabaseDocumentStoreOptions {
  /** Rows per read; must not exceed the server's max-rows. */
  pageSize?: number;
}

interface BatchWrite {
  op: 'set' | 'delete';
  user_id: string;
  collection: string;
  id: string;
  data?: Record<string, string | number | boolean | null>;
  stamp_fields?: string[];
}

interface ResponseError {
  message: string;
}

function isNetworkFailure(error: ResponseError, status: number): boolean {
  return status === 0 || isNetworkErrorMessage(error.message);
}

function toReadError(context: string, error: ResponseError, status: number): SyncError {
  if (isNetworkFailure(error, status)) {
    return new NetworkFailureError(error.message, { cause: error });
  }
  return new RemoteStoreError(`${context}: ${error.message}`, { cause: error });
}

/**
 * Split server-timestamp sentinels out of the fields. The commit function
 * fills the listed fields with the commit time.
 */
function toBatchWrite(ref: DocumentReference, data: DocumentData): BatchWrite {
  const { userId, collection } = parseCollectionPath(collectionPathOf(ref));
  const fields: Record<string, string | number | boolean | null> = {};
  const stampFields: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (isServerTimestamp(value)) {
      stampFields.push(key);
    } else {
      fields[key] = value;
    }
  }

  return { op: 'set', user_id: userId, collection, id: ref.id, data: fields, stamp_fields: stampFields };
}

function collectionPathOf(ref: DocumentReference): string {
  return ref.path.slice(0, ref.path.lastIndexOf('/'));
}

class SupabaseWriteBatch implements WriteBatch {
  private writes: BatchWrite[] = [];
  private committed = false;

  constructor(private readonly client: SupabaseClient) {}

  get size(): number {
    return this.writes.length;
  }

  setData(ref: DocumentReference, data: DocumentData): WriteBatch {
    this.writes.push(toBatchWrite(ref, data));
    return this;
  }

  delete(ref: DocumentReference): WriteBatch {
    const { userId, collection } = parseCollectionPath(collectionPathOf(ref));
    this.writes.push({ op: 'delete', user_id: userId, collection, id: ref.id });
    return this;
  }

  async commit(): Promise<Date> {
    if (this.committed) {
      throw new BatchCommitError('remote', 'batch already committed');
    }
    this.committed = true;

    const { data, error, status } = await this.client.rpc(COMMIT_BATCH_FUNCTION, { writes: this.writes });

    if (error) {
      if (isNetworkFailure(error, status)) {
        throw new NetworkFailureError(error.message, { cause: error });
      }
      throw new BatchCommitError('remote', error.message, { cause: error });
    }

    const parsed = commitResultSchema.safeParse(data);
    const committedAt = parsed.success ? toDate(parsed.data) : null;
    if (!committedAt) {
      throw new BatchCommitError('remote', 'commit returned no server timestamp');
    }
    return committedAt;
  }
}

class SupabaseDocumentReference implements DocumentReference {
  readonly path: string;

  constructor(
    private readonly client: SupabaseClient,
    private readonly collectionPath: string,
    readonly id: string
  ) {
    this.path = `${collectionPath}/${id}`;
  }

  async setData(data: DocumentData): Promise<void> {
    const batch = new SupabaseWriteBatch(this.client);
    batch.setData(this, data);
    await batch.commit();
  }

  async delete(): Promise<void> {
    const { userId, collection } = parseCollectionPath(this.collectionPath);

    const { error, status } = await this.client
      .from(DOCUMENTS_TABLE)
      .delete()
      .eq('user_id', userId)
      .eq('collection', collection)
      .eq('id', this.id);

    if (error) {
      throw toReadError(`Failed to delete ${this.path}`, error, status);
    }
  }
}

class SupabaseCollectionReference implements CollectionReference {
  private readonly userId: string;
  private readonly collection: string;

  constructor(
    private readonly client: SupabaseClient,
    readonly path: string,
    private readonly pageSize: number
  ) {
    const parts = parseCollectionPath(path);
    this.userId = parts.userId;
    this.collection = parts.collection;
  }

  /**
   * Read the whole collection, one page at a time until a short page.
   */
  async getDocuments(options: QueryOptions = {}): Promise<DocumentSnapshot[]> {
    const rows: DocumentRow[] = [];

    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.fetchPage(options, offset);
      rows.push(...page);
      if (page.length < this.pageSize) break;
    }

    if (rows.length > this.pageSize) {
      console.log(`[RemoteDataSource] Read ${rows.length} documents from ${this.path}`);
    }

    return rows.map(row => {
      const fields = row.data ?? {};
      return {
        id: row.id,
        path: `${this.path}/${row.id}`,
        data: { ...fields, lastModified: fields.lastModified ?? row.last_modified },
      };
    });
  }

  document(id: string): DocumentReference {
    return new SupabaseDocumentReference(this.client, this.path, id);
  }

  private async fetchPage(options: QueryOptions, offset: number): Promise<DocumentRow[]> {
    let query = this.client
      .from(DOCUMENTS_TABLE)
      .select('id,data,last_modified')
      .eq('user_id', this.userId)
      .eq('collection', this.collection);

    if (options.orderBy) {
      query = query.order(`data->>${options.orderBy.field}`, {
        ascending: !options.orderBy.descending,
      });
    }

    // id breaks ties so pages never overlap
    const { data, error, status } = await query
      .order('id', { ascending: true })
      .range(offset, offset + this.pageSize - 1);

    if (error) {
      throw toReadError(`Failed to read ${this.path}`, error, status);
    }

    const rows = z.array(documentRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      throw new RemoteStoreError(`Unexpected response shape for ${this.path}`, { cause: rows.error });
    }
    return rows.data;
  }
}

export class SupabaseDocumentStore implements RemoteStore {
  private readonly pageSize: number;

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseDocumentStoreOptions = {}
  ) {
    this.pageSize = options.pageSize ?? SYNC_CONFIG.REMOTE_PAGE_SIZE;
  }

  collection(path: string): CollectionReference {
    return new SupabaseCollectionReference(this.client, path, this.pageSize);
  }

  batch(): WriteBatch {
    return new SupabaseWriteBatch(this.client);
  }
}
