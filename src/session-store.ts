// Doctor Voice Onboarding - Session Store contract and in-memory backend
//
// The engine never keeps a session between calls; it fetches, mutates and puts
// back inside withLock() so that only one writer touches a session at a time.
//
// InMemorySessionStore is process-local. Sessions created in one process are
// invisible to every other process, so a replicated deployment must either pin
// session traffic to a single process or use RedisSessionStore.

import type { VoiceSession } from "./types.js";
import { KeyedMutex } from "./utils/keyed-mutex.js";

export interface SessionStore {
  /** Inserts or replaces the session under its sessionId. */
  put(session: VoiceSession): Promise<void>;
  /** Returns a copy of the stored session, or null when absent. */
  get(sessionId: string): Promise<VoiceSession | null>;
  /** Removes the session. Deleting an absent id is not an error. */
  delete(sessionId: string): Promise<void>;
  /** Ids of sessions whose expiresAt is strictly before `now`. */
  listExpired(now: Date): Promise<string[]>;
  /**
   * Runs `fn` while holding the exclusive write lock for `sessionId`.
   * Every fetch→mutate→put sequence on a session goes through here.
   */
  withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T>;
  /** Releases connections or timers held by the backend. */
  close(): Promise<void>;
}

export function cloneSession(session: VoiceSession): VoiceSession {
  return structuredClone(session);
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, VoiceSession>();
  private readonly locks = new KeyedMutex();

  async put(session: VoiceSession): Promise<void> {
    this.sessions.set(session.sessionId, cloneSession(session));
  }

  async get(sessionId: string): Promise<VoiceSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? cloneSession(session) : null;
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async listExpired(now: Date): Promise<string[]> {
    const expired: string[] = [];
    for (const [id, session] of this.sessions) {
      if (session.expiresAt.getTime() < now.getTime()) {
        expired.push(id);
      }
    }
    return expired;
  }

  withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(sessionId, fn);
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }

  /** Number of stored sessions. */
  get size(): number {
    return this.sessions.size;
  }
}
