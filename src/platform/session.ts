// ──────────────────────────────────────────
// Platform: In-memory session store
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { SessionContract } from '../shared/contracts';
import { SessionNotFoundError } from '../shared/errors';
import { createLogger } from '../shared/logger';
import { AlertReport, Dataset, SessionContext, Selection } from '../shared/types';

const log = createLogger('Sessions');

export const NOT_EVALUATED: AlertReport = { status: 'not_evaluated', alerts: [] };

export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 100;

export interface SessionStoreOptions {
  /** Idle time after which a session is dropped. */
  ttlMs?: number;
  /** Beyond this many, creating a session evicts the least recently used one. */
  maxSessions?: number;
  clock?: () => Date;
}

/**
 * Owns every session's working dataset. Each mutation swaps in a new
 * context object, so a context handed out earlier is never changed under
 * its reader.
 */
export class SessionStore implements SessionContract {
  private sessions = new Map<string, SessionContext>();
  private ttlMs: number;
  private maxSessions: number;
  private clock: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.clock = options.clock ?? (() => new Date());
  }

  create(): SessionContext {
    this.sweep();
    while (this.sessions.size > 0 && this.sessions.size >= this.maxSessions) {
      this.evictLeastRecentlyUsed();
    }

    const now = this.clock();
    const session: SessionContext = {
      id: uuidv4(),
      dataset: [],
      selection: { dateRange: [], sources: [] },
      alerts: NOT_EVALUATED,
      created_at: now,
      loaded_at: null,
      last_used: now,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): SessionContext {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /**
   * Looks a session up on behalf of a caller and marks it used. Returns null
   * for unknown ids and for sessions idle past the TTL, which are dropped.
   */
  resolve(sessionId: string): SessionContext | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      log.info(`Expired session ${sessionId}`);
      return null;
    }
    return this.put({ ...session, last_used: this.clock() });
  }

  replaceDataset(sessionId: string, dataset: Dataset, selection: Selection): SessionContext {
    return this.put({
      ...this.get(sessionId),
      dataset,
      selection,
      alerts: NOT_EVALUATED,
      loaded_at: this.clock(),
    });
  }

  /** A stored report describes the old selection, so it is cleared too. */
  setSelection(sessionId: string, selection: Selection): SessionContext {
    return this.put({ ...this.get(sessionId), selection, alerts: NOT_EVALUATED });
  }

  recordAlerts(sessionId: string, report: AlertReport): void {
    this.put({ ...this.get(sessionId), alerts: report });
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drops every session idle past the TTL; returns how many went. */
  sweep(): number {
    let dropped = 0;
    for (const session of Array.from(this.sessions.values())) {
      if (this.isExpired(session)) {
        this.sessions.delete(session.id);
        dropped++;
      }
    }
    if (dropped > 0) log.info(`Expired ${dropped} idle session(s)`);
    return dropped;
  }

  private isExpired(session: SessionContext): boolean {
    return this.clock().getTime() - session.last_used.getTime() > this.ttlMs;
  }

  private evictLeastRecentlyUsed(): void {
    let oldest: SessionContext | null = null;
    for (const session of this.sessions.values()) {
      if (!oldest || session.last_used < oldest.last_used) oldest = session;
    }
    if (!oldest) return;
    this.sessions.delete(oldest.id);
    log.warn(`Session limit ${this.maxSessions} reached; evicted ${oldest.id}`);
  }

  private put(session: SessionContext): SessionContext {
    this.sessions.set(session.id, session);
    return session;
  }
}
