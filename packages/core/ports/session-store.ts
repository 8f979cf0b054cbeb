/**
 * ISessionStore Interface
 *
 * Port interface for per-user navigation session storage.
 * Defines the contract for a process-wide store with:
 * - Atomic get-or-create keyed by user identifier
 * - Serialized execution of operations for the same user
 * - Concurrent execution for different users
 *
 * Sessions live for the lifetime of the process. Navigation history is not
 * persisted across restarts.
 */

import type { NavigationSession, UserId } from '../domain/navigation.js';

// =============================================================================
// Session Statistics
// =============================================================================

/**
 * Statistics about live sessions.
 */
export interface SessionStats {
  /** Sessions created since startup */
  activeSessions: number;
  /** Sessions with a bouquet flow in progress */
  inGuidedFlow: number;
  /** Users with an operation running or queued */
  busyUsers: number;
}

// =============================================================================
// ISessionStore Interface
// =============================================================================

/**
 * Operation executed against a user's session while holding that user's slot.
 */
export type SessionOperation<T> = (session: NavigationSession) => Promise<T> | T;

export interface ISessionStore {
  /**
   * Get the session for a user, creating it on first contact.
   * Two concurrent first contacts never produce two records.
   */
  getOrCreate(userId: UserId): NavigationSession;

  /**
   * Get a session without creating it.
   *
   * @returns Session or null if the user never interacted
   */
  get(userId: UserId): NavigationSession | null;

  /**
   * Run an operation against the user's session.
   * Operations for the same user run one at a time in arrival order; a failed
   * operation rejects its own promise and does not block the next one.
   */
  withSession<T>(userId: UserId, operation: SessionOperation<T>): Promise<T>;

  /**
   * Get session statistics.
   */
  getStats(): SessionStats;

  /**
   * Drop every session. Operations already queued keep their per-user order.
   */
  clear(): void;
}
