// Doctor Voice Onboarding - Redis-backed Session Store
//
// Shares sessions across every process behind the load balancer.
//   voice:session:<id>     JSON record (key TTL = expiresAt + retention, safety net only)
//   voice:session:expiry   sorted set of ids scored by expiresAt (ms)
//   voice:lock:<id>        per-session write lock (SET NX PX + token-checked release)
// Writes that touch more than one key run as Lua scripts so they stay atomic.

import { v4 as uuidv4 } from "uuid";
import { SessionLockError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { decodeSession, encodeSession } from "./session-codec.js";
import type { SessionStore } from "./session-store.js";
import type { Clock, VoiceSession } from "./types.js";

/**
 * The slice of the ioredis client this store uses. Tests inject an in-process
 * fake; production passes the real client.
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

// ─── Lua scripts ────────────────────────────────────────────────────────────────

/** KEYS: session, expiry index. ARGV: record, expiresAtMs, ttlMs, sessionId */
export const PUT_SCRIPT = `
redis.call("SET", KEYS[1], ARGV[1], "PX", ARGV[3])
redis.call("ZADD", KEYS[2], ARGV[2], ARGV[4])
return 1
`;

/** KEYS: session, expiry index. ARGV: sessionId */
export const DELETE_SCRIPT = `
redis.call("DEL", KEYS[1])
redis.call("ZREM", KEYS[2], ARGV[1])
return 1
`;

/** KEYS: lock. ARGV: token, ttlMs */
export const ACQUIRE_LOCK_SCRIPT = `
if redis.call("SET", KEYS[1], ARGV[1], "NX", "PX", ARGV[2]) then
  return 1
end
return 0
`;

/** KEYS: lock. ARGV: token */
export const RELEASE_LOCK_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

// ─── Options ────────────────────────────────────────────────────────────────────

export interface RedisSessionStoreOptions {
  keyPrefix?: string;
  /** How long a lock is held before Redis frees it on its own. */
  lockTtlMs?: number;
  /** How long withLock() waits for a busy session before giving up. */
  lockWaitMs?: number;
  lockRetryMs?: number;
  /** Extra key lifetime past expiresAt so the sweeper can still see the record. */
  retentionMs?: number;
  clock?: Clock;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RedisSessionStore implements SessionStore {
  private readonly redis: RedisLike;
  private readonly prefix: string;
  private readonly lockTtlMs: number;
  private readonly lockWaitMs: number;
  private readonly lockRetryMs: number;
  private readonly retentionMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(redis: RedisLike, options: RedisSessionStoreOptions = {}) {
    this.redis = redis;
    this.prefix = options.keyPrefix ?? "voice";
    this.lockTtlMs = options.lockTtlMs ?? 60_000;
    this.lockWaitMs = options.lockWaitMs ?? 10_000;
    this.lockRetryMs = options.lockRetryMs ?? 50;
    this.retentionMs = options.retentionMs ?? 60 * 60 * 1000;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  private sessionKey(sessionId: string): string {
    return `${this.prefix}:session:${sessionId}`;
  }

  private get expiryKey(): string {
    return `${this.prefix}:session:expiry`;
  }

  private lockKey(sessionId: string): string {
    return `${this.prefix}:lock:${sessionId}`;
  }

  async put(session: VoiceSession): Promise<void> {
    const expiresAtMs = session.expiresAt.getTime();
    const ttlMs = Math.max(1000, expiresAtMs - this.clock().getTime() + this.retentionMs);
    await this.redis.eval(
      PUT_SCRIPT,
      2,
      this.sessionKey(session.sessionId),
      this.expiryKey,
      encodeSession(session),
      expiresAtMs,
      ttlMs,
      session.sessionId,
    );
  }

  async get(sessionId: string): Promise<VoiceSession | null> {
    const record = await this.redis.get(this.sessionKey(sessionId));
    return record === null ? null : decodeSession(record);
  }

  async delete(sessionId: string): Promise<void> {
    await this.redis.eval(DELETE_SCRIPT, 2, this.sessionKey(sessionId), this.expiryKey, sessionId);
  }

  async listExpired(now: Date): Promise<string[]> {
    // "(" makes the upper bound exclusive: expiresAt strictly before now.
    return this.redis.zrangebyscore(this.expiryKey, "-inf", `(${now.getTime()}`);
  }

  async withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const key = this.lockKey(sessionId);
    const token = uuidv4();
    const deadline = Date.now() + this.lockWaitMs;

    while (!(await this.tryAcquire(key, token))) {
      if (Date.now() >= deadline) {
        this.logger.warn(`Timed out waiting for lock on session ${sessionId}`);
        throw new SessionLockError(sessionId);
      }
      await sleep(this.lockRetryMs);
    }

    try {
      return await fn();
    } finally {
      const released = await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
      if (released !== 1) {
        this.logger.warn(`Lock on session ${sessionId} expired before release (held past ${this.lockTtlMs}ms)`);
      }
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async tryAcquire(key: string, token: string): Promise<boolean> {
    const result = await this.redis.eval(ACQUIRE_LOCK_SCRIPT, 1, key, token, this.lockTtlMs);
    return result === 1;
  }
}
