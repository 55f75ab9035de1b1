/**
 * In-process stand-in for the Supabase document store, used by tests.
 * Stamps server-timestamp fields with its own controllable clock.
 */

import { BatchCommitError, NetworkFailureError } from '@/sync/errors';
import {
    isServerTimestamp,
    type CollectionReference,
    type DocumentData,
    type DocumentReference,
    type DocumentSnapshot,
    type QueryOptions,
    type RemoteStore,
    type WriteBatch,
} from '@/sync/datasources/types';

type StoredDocument = Record<string, unknown>;

type PendingWrite =
  | { op: 'set'; ref: DocumentReference; data: DocumentData }
  | { op: 'delete'; ref: DocumentReference };

export class MemoryRemoteStore implements RemoteStore {
  offline = false;
  commitCount = 0;
  private collections = new Map<string, Map<string, StoredDocument>>();
  private nextCommitError: Error | null = null;
  private readFailures = new Map<string, Error>();
  private readHooks = new Map<string, () => Promise<void>>();
  private time: Date;

  constructor(now: Date = new Date('2024-03-01T12:00:00.000Z')) {
    this.time = now;
  }

  now(): Date {
    return new Date(this.time.getTime());
  }

  setTime(time: Date): void {
    this.time = time;
  }

  /** Put a document in place as-is, bypassing stamping. */
  seed(collectionPath: string, id: string, data: StoredDocument): void {
    this.documents(collectionPath).set(id, { ...data });
  }

  getDocument(collectionPath: string, id: string): StoredDocument | undefined {
    return this.collections.get(collectionPath)?.get(id);
  }

  documentCount(collectionPath: string): number {
    return this.collections.get(collectionPath)?.size ?? 0;
  }

  failNextCommit(error: Error = new BatchCommitError('remote', 'simulated commit failure')): void {
    this.nextCommitError = error;
  }

  /** Make every read of one collection fail until cleared with null. */
  failReads(collectionPath: string, error: Error | null = new NetworkFailureError('connection reset')): void {
    if (error) {
      this.readFailures.set(collectionPath, error);
    } else {
      this.readFailures.delete(collectionPath);
    }
  }

  /** Run `hook` once, the next time the collection is read. */
  onNextRead(collectionPath: string, hook: () => Promise<void>): void {
    this.readHooks.set(collectionPath, hook);
  }

  async runReadHook(collectionPath: string): Promise<void> {
    const hook = this.readHooks.get(collectionPath);
    if (!hook) return;
    this.readHooks.delete(collectionPath);
    await hook();
  }

  assertReadable(collectionPath: string): void {
    this.assertOnline();
    const error = this.readFailures.get(collectionPath);
    if (error) throw error;
  }

  collection(path: string): CollectionReference {
    return new MemoryCollection(this, path);
  }

  batch(): WriteBatch {
    return new MemoryWriteBatch(this);
  }

  assertOnline(): void {
    if (this.offline) {
      throw new NetworkFailureError('The Internet connection appears to be offline.');
    }
  }

  documents(collectionPath: string): Map<string, StoredDocument> {
    let docs = this.collections.get(collectionPath);
    if (!docs) {
      docs = new Map();
      this.collections.set(collectionPath, docs);
    }
    return docs;
  }

  /** Apply writes all at once; returns the commit time. */
  apply(writes: PendingWrite[]): Date {
    this.assertOnline();

    if (this.nextCommitError) {
      const error = this.nextCommitError;
      this.nextCommitError = null;
      throw error;
    }

    const committedAt = this.now();
    for (const write of writes) {
      const collectionPath = write.ref.path.slice(0, write.ref.path.lastIndexOf('/'));
      const docs = this.documents(collectionPath);

      if (write.op === 'delete') {
        docs.delete(write.ref.id);
        continue;
      }

      const fields: StoredDocument = {};
      for (const [key, value] of Object.entries(write.data)) {
        fields[key] = isServerTimestamp(value) ? committedAt.toISOString() : value;
      }
      docs.set(write.ref.id, { ...docs.get(write.ref.id), ...fields });
    }

    this.commitCount++;
    return committedAt;
  }
}

class MemoryCollection implements CollectionReference {
  constructor(
    private readonly store: MemoryRemoteStore,
    readonly path: string
  ) {}

  async getDocuments(options: QueryOptions = {}): Promise<DocumentSnapshot[]> {
    this.store.assertReadable(this.path);
    await this.store.runReadHook(this.path);

    const snapshots = [...this.store.documents(this.path).entries()].map(([id, data]) => ({
      id,
      path: `${this.path}/${id}`,
      data: { ...data },
    }));

    const { orderBy } = options;
    if (orderBy) {
      snapshots.sort((a, b) => {
        const left = String(a.data[orderBy.field] ?? '');
        const right = String(b.data[orderBy.field] ?? '');
        const order = left < right ? -1 : left > right ? 1 : 0;
        return orderBy.descending ? -order : order;
      });
    }

    return snapshots;
  }

  document(id: string): DocumentReference {
    return new MemoryDocument(this.store, this.path, id);
  }
}

class MemoryDocument implements DocumentReference {
  readonly path: string;

  constructor(
    private readonly store: MemoryRemoteStore,
    collectionPath: string,
    readonly id: string
  ) {
    this.path = `${collectionPath}/${id}`;
  }

  async setData(data: DocumentData): Promise<void> {
    this.store.apply([{ op: 'set', ref: this, data }]);
  }

  async delete(): Promise<void> {
    this.store.apply([{ op: 'delete', ref: this }]);
  }
}

class MemoryWriteBatch implements WriteBatch {
  private writes: PendingWrite[] = [];

  constructor(private readonly store: MemoryRemoteStore) {}

  get size(): number {
    return this.writes.length;
  }

  setData(ref: DocumentReference, data: DocumentData): WriteBatch {
    this.writes.push({ op: 'set', ref, data });
    return this;
  }

  delete(ref: DocumentReference): WriteBatch {
    this.writes.push({ op: 'delete', ref });
    return this;
  }

  async commit(): Promise<Date> {
    return this.store.apply(this.writes);
  }
}
