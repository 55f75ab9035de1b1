import type { SupabaseClient } from '@supabase/supabase-js';

export type UserChangeListener = (userId: string | null) => void;

/**
 * Who is signed in. The sync engine reads the current user id for every
 * pass and subscribes to changes to trigger one.
 */
export interface IdentityProvider {
  currentUserId(): string | null;
  onUserChange(listener: UserChangeListener): () => void;
}

/**
 * Identity held in memory and set by the host (or by tests).
 */
export class StaticIdentityProvider implements IdentityProvider {
  private listeners: Set<UserChangeListener> = new Set();

  constructor(private userId: string | null = null) {}

  currentUserId(): string | null {
    return this.userId;
  }

  setUser(userId: string | null): void {
    if (userId === this.userId) return;
    this.userId = userId;
    for (const listener of this.listeners) {
      try {
        listener(userId);
      } catch (error) {
        console.error('[Auth] Error in user change listener:', error);
      }
    }
  }

  onUserChange(listener: UserChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Identity backed by the Supabase auth session.
 */
export class SupabaseIdentityProvider extends StaticIdentityProvider {
  private unsubscribeAuth: (() => void) | null = null;

  constructor(private readonly client: SupabaseClient) {
    super(null);
  }

  /**
   * Restore the stored session and follow auth state changes.
   */
  async initialize(): Promise<void> {
    const { data, error } = await this.client.auth.getSession();
    if (error) {
      console.error('[Auth] Failed to restore session:', error.message);
    }
    this.setUser(data.session?.user.id ?? null);

    const { data: listener } = this.client.auth.onAuthStateChange((_event, session) => {
      this.setUser(session?.user.id ?? null);
    });
    this.unsubscribeAuth = () => listener.subscription.unsubscribe();
  }

  async logIn(email: string, password: string): Promise<string> {
    const { data, error } = await this.client.auth.signInWithPassword({ email, password });

    if (error) {
      throw new Error(error.message);
    }
    if (!data.user) {
      throw new Error('Login failed');
    }

    this.setUser(data.user.id);
    return data.user.id;
  }

  /**
   * Log out - clear the session locally even if the remote call fails.
   */
  async logOut(): Promise<void> {
    this.setUser(null);
    const { error } = await this.client.auth.signOut();
    if (error) {
      console.error('[Auth] Remote logout failed:', error.message);
    }
  }

  destroy(): void {
    this.unsubscribeAuth?.();
    this.unsubscribeAuth = null;
  }
}
