/**
 * Session store
 * In-memory conversation history keyed by session id, with a
 * per-session single-writer lock. Lives as long as the process.
 */

import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ChatMessage } from '../providers/types.js';

export interface Session {
  id: string;
  history: ChatMessage[];
  createdAt: Date;
  lastActiveAt: Date;
}

export interface SessionStoreOptions {
  idleTtlMs: number;
  now?: () => number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const now = new Date(this.now());
    const session: Session = { id: sessionId, history: [], createdAt: now, lastActiveAt: now };
    this.sessions.set(sessionId, session);
    logger.info({ sessionId }, 'Session created');
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Append messages to the committed history, in order
   */
  append(sessionId: string, ...messages: ChatMessage[]): void {
    const session = this.getOrCreate(sessionId);
    session.history.push(...messages);
    session.lastActiveAt = new Date(this.now());
  }

  /**
   * Snapshot of the committed history; later appends do not show through
   */
  history(sessionId: string): ChatMessage[] {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(`Session '${sessionId}'`);
    }
    return [...session.history];
  }

  delete(sessionId: string): boolean {
    this.locks.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Take the session's writer lock. Returns false if a turn is already in flight.
   */
  tryLock(sessionId: string): boolean {
    if (this.locks.has(sessionId)) {
      return false;
    }
    this.locks.add(sessionId);
    return true;
  }

  unlock(sessionId: string): void {
    this.locks.delete(sessionId);
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  /**
   * Drop sessions idle for longer than the TTL. Locked sessions are kept.
   */
  evictIdle(): number {
    const cutoff = this.now() - this.options.idleTtlMs;
    let evicted = 0;

    for (const [id, session] of this.sessions.entries()) {
      if (session.lastActiveAt.getTime() < cutoff && !this.locks.has(id)) {
        this.sessions.delete(id);
        evicted++;
      }
    }

    if (evicted > 0) {
      logger.info({ evicted, remaining: this.sessions.size }, 'Evicted idle sessions');
    }
    return evicted;
  }
}
