/**
 * In-memory session state, keyed by the `sid` cookie.
 * Nothing here survives a restart.
 */

import { randomBytes } from 'crypto';
import type { SessionFields } from '../../src/types';
import { logger } from '../../src/utils/logger';

export const SESSION_COOKIE = 'sid';

const defaultFields = (): SessionFields => ({
  userId: null,
  userEmail: null,
  isSubscribed: false,
  plan: 'none',
  validUntil: null,
  lastVerifiedAt: null,
  pendingCheckoutPlan: null,
  currentJobId: null,
});

export class Session {
  readonly id: string;
  lastSeenAt: number;
  private fields: SessionFields = defaultFields();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(id: string, now: number) {
    this.id = id;
    this.lastSeenAt = now;
  }

  get<K extends keyof SessionFields>(key: K): SessionFields[K] {
    return this.fields[key];
  }

  set<K extends keyof SessionFields>(key: K, value: SessionFields[K]): void {
    this.fields[key] = value;
  }

  clear(): void {
    this.fields = defaultFields();
  }

  snapshot(): Readonly<SessionFields> {
    return { ...this.fields };
  }

  /**
   * Runs `task` after every task queued before it on this session has settled,
   * so a session is only ever mutated by one request at a time.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

export class SessionStore {
  private sessions = new Map<string, Session>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Returns the live session for `token`, or a fresh one when the token is
   * missing, unknown or idle for longer than the TTL.
   */
  open(token?: string): { session: Session; created: boolean } {
    const now = this.clock();
    this.sweep(now);

    const existing = token ? this.sessions.get(token) : undefined;
    if (existing) {
      existing.lastSeenAt = now;
      return { session: existing, created: false };
    }

    const session = new Session(randomBytes(24).toString('base64url'), now);
    this.sessions.set(session.id, session);
    logger.debug(`[session ${session.id.slice(0, 8)}] created`);
    return { session, created: true };
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  destroy(id: string): void {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private sweep(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.ttlMs) {
        this.sessions.delete(id);
        logger.debug(`[session ${id.slice(0, 8)}] expired`);
      }
    }
  }
}
