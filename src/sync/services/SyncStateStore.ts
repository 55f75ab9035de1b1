/**
 * SyncStateStore
 *
 * Observable sync state consumed by the UI. The orchestrator is the only
 * writer; everything else subscribes.
 */

import type { SyncStatistics, SyncStatusListener, SyncStatusState } from '../types';

export function emptyStatistics(): SyncStatistics {
  return {
    uploaded: 0,
    downloaded: 0,
    conflictsResolved: 0,
    errors: 0,
    lastSyncDurationMs: 0,
  };
}

export function initialSyncState(): SyncStatusState {
  return {
    state: 'idle',
    isSyncing: false,
    hasCompletedInitialSync: false,
    lastError: null,
    progressMessage: '',
    lastSyncDate: null,
    pendingChangesCount: 0,
    statistics: emptyStatistics(),
  };
}

export class SyncStateStore {
  private state: SyncStatusState;
  private listeners: Set<SyncStatusListener> = new Set();

  constructor(initial: Partial<SyncStatusState> = {}) {
    this.state = { ...initialSyncState(), ...initial };
  }

  getState(): SyncStatusState {
    return this.state;
  }

  update(changes: Partial<SyncStatusState>): void {
    this.state = { ...this.state, ...changes };
    this.notifyListeners();
  }

  /**
   * Subscribe to state changes. The listener is called immediately with the
   * current state.
   */
  subscribe(listener: SyncStatusListener): () => void {
    this.listeners.add(listener);
    this.callListener(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clearListeners(): void {
    this.listeners.clear();
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      this.callListener(listener);
    }
  }

  private callListener(listener: SyncStatusListener): void {
    try {
      listener(this.state);
    } catch (error) {
      console.error('[SyncStateStore] Error in sync status listener:', error);
    }
  }
}
