/**
 * Sync Errors
 *
 * Every failure the sync engine can raise carries a stable `code` so the
 * orchestrator can turn it into `lastError` without string matching.
 */

import type { SyncErrorInfo } from './types';

export type SyncErrorCode =
  | 'not-authenticated'
  | 'network-failure'
  | 'data-error'
  | 'batch-commit-failed'
  | 'remote-failure'
  | 'unknown';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
  }
}

export class NotAuthenticatedError extends SyncError {
  constructor() {
    super('not-authenticated', 'You must be signed in to sync data');
    this.name = 'NotAuthenticatedError';
  }
}

export class NetworkFailureError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('network-failure', `Network error: ${message}`, options);
    this.name = 'NetworkFailureError';
  }
}

/** The remote store rejected a read or single-document write. */
export class RemoteStoreError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('remote-failure', message, options);
    this.name = 'RemoteStoreError';
  }
}

/** A remote document that could not be decoded into an entity. */
export class DataError extends SyncError {
  readonly documentPath: string;

  constructor(documentPath: string, reason: string) {
    super('data-error', `Invalid data in ${documentPath}: ${reason}`);
    this.name = 'DataError';
    this.documentPath = documentPath;
  }
}

/** An atomic commit (local save or remote batch) failed; nothing was applied. */
export class BatchCommitError extends SyncError {
  readonly side: 'local' | 'remote';

  constructor(side: 'local' | 'remote', message: string, options?: { cause?: unknown }) {
    super('batch-commit-failed', `Batch operation failed (${side}): ${message}`, options);
    this.name = 'BatchCommitError';
    this.side = side;
  }
}

const NETWORK_ERROR_PATTERNS = [
  'fetch failed',
  'failed to fetch',
  'networkerror',
  'network request failed',
  'econnrefused',
  'econnreset',
  'enotfound',
  'etimedout',
  'eai_again',
];

export function isNetworkErrorMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some(pattern => lower.includes(pattern));
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown sync error';
}

/**
 * Convert anything thrown during a pass into the shape stored as `lastError`.
 */
export function toSyncErrorInfo(error: unknown): SyncErrorInfo {
  if (error instanceof SyncError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'unknown', message: errorMessage(error) };
}
