/**
 * InMemorySessionStore
 *
 * Process-wide implementation of ISessionStore.
 * Features:
 * - Synchronous get-or-create, so concurrent first contacts share one record
 * - Per-user mailbox: operations for one user are chained, other users run
 *   concurrently
 * - No expiry; sessions live until the process exits
 */

import type { Logger } from 'pino';
import type { NavigationSession, UserId } from '@petal/core/domain';
import { createSession, toSessionKey } from '@petal/core/domain';
import type { ISessionStore, SessionOperation, SessionStats } from '@petal/core/ports';

export interface InMemorySessionStoreOptions {
  logger: Logger;
  /** Clock override for tests */
  now?: () => Date;
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, NavigationSession>();
  /** Tail of each user's operation chain */
  private readonly mailboxes = new Map<string, Promise<void>>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: InMemorySessionStoreOptions) {
    this.log = options.logger.child({ component: 'InMemorySessionStore' });
    this.now = options.now ?? (() => new Date());
  }

  getOrCreate(userId: UserId): NavigationSession {
    const key = toSessionKey(userId);
    const existing = this.sessions.get(key);
    if (existing) {
      return existing;
    }

    const session = createSession(key, this.now());
    this.sessions.set(key, session);
    this.log.info({ userId: key }, 'Navigation session created');
    return session;
  }

  get(userId: UserId): NavigationSession | null {
    return this.sessions.get(toSessionKey(userId)) ?? null;
  }

  async withSession<T>(userId: UserId, operation: SessionOperation<T>): Promise<T> {
    const key = toSessionKey(userId);
    const previous = this.mailboxes.get(key) ?? Promise.resolve();

    const run = previous.then(() => {
      const session = this.getOrCreate(key);
      session.lastActiveAt = this.now();
      return operation(session);
    });

    // The chain only tracks completion; the caller receives the failure via `run`
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.mailboxes.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.mailboxes.get(key) === tail) {
        this.mailboxes.delete(key);
      }
    }
  }

  getStats(): SessionStats {
    let inGuidedFlow = 0;
    for (const session of this.sessions.values()) {
      if (session.guidedFlow) {
        inGuidedFlow++;
      }
    }

    return {
      activeSessions: this.sessions.size,
      inGuidedFlow,
      busyUsers: this.mailboxes.size,
    };
  }

  /**
   * Drop every session. Mailboxes are kept: queued operations still run one
   * at a time and recreate their session on arrival.
   */
  clear(): void {
    const count = this.sessions.size;
    this.sessions.clear();
    this.log.info({ count }, 'Navigation sessions cleared');
  }
}
