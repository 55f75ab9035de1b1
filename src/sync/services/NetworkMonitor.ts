/**
 * NetworkMonitor
 *
 * Connectivity signal for the sync engine. The host process feeds path
 * updates through `setStatus()`; the engine subscribes rather than polls.
 */

export interface NetworkStatus {
  connected: boolean;
  /** Metered path, e.g. cellular or a personal hotspot. */
  isExpensive: boolean;
  /** Low data mode or similar. */
  isConstrained: boolean;
}

export type NetworkStatusListener = (status: NetworkStatus) => void;

/**
 * What the orchestrator needs from a connectivity source.
 */
export interface ConnectivitySignal {
  readonly isReachable: boolean;
  /** Fires on each offline → online transition. */
  onReachable(listener: () => void): () => void;
  onStatusChange(listener: NetworkStatusListener): () => void;
  shouldSync(allowExpensive: boolean, allowConstrained?: boolean): boolean;
}

export class NetworkMonitor implements ConnectivitySignal {
  private status: NetworkStatus;
  private reachableListeners: Set<() => void> = new Set();
  private statusListeners: Set<NetworkStatusListener> = new Set();

  constructor(initial: Partial<NetworkStatus> = {}) {
    this.status = {
      connected: true,
      isExpensive: false,
      isConstrained: false,
      ...initial,
    };
  }

  get isReachable(): boolean {
    return this.status.connected;
  }

  get currentStatus(): NetworkStatus {
    return this.status;
  }

  setStatus(next: Partial<NetworkStatus>): void {
    const previous = this.status;
    this.status = { ...previous, ...next };

    const changed =
      previous.connected !== this.status.connected ||
      previous.isExpensive !== this.status.isExpensive ||
      previous.isConstrained !== this.status.isConstrained;

    if (!changed) return;

    console.log(
      `[NetworkMonitor] ${this.status.connected ? 'online' : 'offline'}` +
        (this.status.isExpensive ? ' (expensive)' : '') +
        (this.status.isConstrained ? ' (constrained)' : '')
    );

    for (const listener of this.statusListeners) {
      this.callListener(() => listener(this.status));
    }

    if (!previous.connected && this.status.connected) {
      for (const listener of this.reachableListeners) {
        this.callListener(listener);
      }
    }
  }

  onReachable(listener: () => void): () => void {
    this.reachableListeners.add(listener);
    return () => {
      this.reachableListeners.delete(listener);
    };
  }

  onStatusChange(listener: NetworkStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  /**
   * Whether a sync should run on the current path given the user's
   * preferences for metered and constrained networks.
   */
  shouldSync(allowExpensive: boolean, allowConstrained: boolean = false): boolean {
    if (!this.status.connected) return false;
    if (this.status.isExpensive && !allowExpensive) return false;
    if (this.status.isConstrained && !allowConstrained) return false;
    return true;
  }

  private callListener(listener: () => void): void {
    try {
      listener();
    } catch (error) {
      console.error('[NetworkMonitor] Error in network listener:', error);
    }
  }
}
