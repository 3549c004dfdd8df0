/**
 * In-memory session store
 * One MeetingSession per browser, dropped after a period without requests
 */
import { createSession, type MeetingSession } from '@meeting-briefing/agents';

interface StoredSession {
  session: MeetingSession;
  lastSeen: number;
}

export interface SessionStoreConfig {
  /** Sessions not seen for this long are dropped */
  ttlMinutes: number;
  /** Clock; defaults to the system time */
  now?: () => Date;
}

export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(config: SessionStoreConfig) {
    this.ttlMs = config.ttlMinutes * 60_000;
    this.now = config.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  get ttlSeconds(): number {
    return Math.floor(this.ttlMs / 1000);
  }

  /**
   * Session for the id, if it exists and has not expired.
   * A lookup counts as activity.
   */
  get(id: string | undefined): MeetingSession | undefined {
    if (!id) {
      return undefined;
    }

    const stored = this.sessions.get(id);
    if (!stored) {
      return undefined;
    }

    const now = this.now().getTime();
    if (this.isExpired(stored, now)) {
      this.sessions.delete(id);
      return undefined;
    }

    stored.lastSeen = now;
    return stored.session;
  }

  /**
   * Existing session for the id, or a fresh one under a new id.
   */
  getOrCreate(id: string | undefined): { session: MeetingSession; created: boolean } {
    this.prune();

    const existing = this.get(id);
    if (existing) {
      return { session: existing, created: false };
    }

    const now = this.now();
    const session = createSession(undefined, now);
    this.sessions.set(session.session_id, { session, lastSeen: now.getTime() });
    return { session, created: true };
  }

  /**
   * Count activity on a session without a lookup, e.g. when its run ends
   */
  touch(id: string): void {
    const stored = this.sessions.get(id);
    if (stored) {
      stored.lastSeen = this.now().getTime();
    }
  }

  /**
   * Drop every expired session
   *
   * @returns number of sessions removed
   */
  prune(): number {
    const now = this.now().getTime();
    let removed = 0;

    for (const [id, stored] of this.sessions) {
      if (this.isExpired(stored, now)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }

    return removed;
  }

  // A session with a run in flight is never expired
  private isExpired(stored: StoredSession, now: number): boolean {
    return stored.session.status !== 'running' && now - stored.lastSeen > this.ttlMs;
  }
}

export function createSessionStore(config: SessionStoreConfig): SessionStore {
  return new SessionStore(config);
}
