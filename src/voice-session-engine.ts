// Doctor Voice Onboarding - Voice Session Engine
// State machine over VoiceSession: start, chat turns, status, finalize, cancel,
// and the expiry sweep.
//
// The engine keeps no session in memory between calls. Every operation fetches
// the session from the store, mutates a private copy and puts it back, all
// inside store.withLock() so two requests for the same session never interleave.
//
// State machine:
//
//   ACTIVE ──(all required fields collected)──▶ COMPLETED ──finalize()──▶ (evicted)
//     │
//     ├──(now > expiresAt, seen lazily or by sweep)──▶ EXPIRED ──sweep──▶ (evicted)
//     │
//     └──cancel()──▶ CANCELLED (evicted immediately; cancel works from any state)
//
// COMPLETED sessions still accept chat turns so the doctor can correct a value;
// accepted values are never empty, so a correction cannot un-complete a session.

import { v4 as uuidv4 } from "uuid";
import {
  ExtractionError,
  InvalidTranscriptError,
  PersistenceError,
  SessionExpiredError,
  SessionLockError,
  SessionNotCompleteError,
  SessionNotFoundError,
  type MissingField,
} from "./errors.js";
import type { FieldSchemaRegistry } from "./field-registry.js";
import { isCollectedValue, matchesDeclaredType, toPlainValue } from "./field-values.js";
import { createLogger, type Logger } from "./logger.js";
import type { ProfileGateway } from "./profile-persistence.js";
import { fallbackReply, renderGreeting, resolveLanguage } from "./prompts.js";
import type { SessionStore } from "./session-store.js";
import type { TranscriptExtractorLike } from "./transcript-extractor.js";
import {
  SessionStatus,
  type ChatResponse,
  type Clock,
  type ConversationTurn,
  type ExtractionResult,
  type FieldStatusItem,
  type FinalizeResult,
  type PlainFieldValue,
  type ProfileReceipt,
  type SessionSnapshot,
  type StartSessionResult,
  type VoiceSession,
} from "./types.js";

/** Inactivity window after the last turn before a session expires. */
export const SESSION_TIMEOUT_MINUTES = 30;

/** Longest transcript accepted for a single turn. */
export const MAX_TRANSCRIPT_LENGTH = 2000;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface VoiceSessionEngineDeps {
  registry: FieldSchemaRegistry;
  extractor: TranscriptExtractorLike;
  store: SessionStore;
  gateway: ProfileGateway;
  clock?: Clock;
  logger?: Logger;
  sessionTimeoutMinutes?: number;
  /** Session id factory. Ids are capability tokens and must be unguessable. */
  generateId?: () => string;
}

export class VoiceSessionEngine {
  private readonly registry: FieldSchemaRegistry;
  private readonly extractor: TranscriptExtractorLike;
  private readonly store: SessionStore;
  private readonly gateway: ProfileGateway;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly generateId: () => string;

  constructor(deps: VoiceSessionEngineDeps) {
    this.registry = deps.registry;
    this.extractor = deps.extractor;
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? createLogger("VoiceSessionEngine");
    this.timeoutMs = (deps.sessionTimeoutMinutes ?? SESSION_TIMEOUT_MINUTES) * 60 * 1000;
    this.generateId = deps.generateId ?? uuidv4;

    if (!(this.timeoutMs > 0)) {
      throw new RangeError(`sessionTimeoutMinutes must be positive, got ${deps.sessionTimeoutMinutes}`);
    }
  }

  // ─── start ────────────────────────────────────────────────────────────────────

  /**
   * Creates a new ACTIVE session with no observations and returns the templated
   * greeting alongside the initial snapshot.
   */
  async start(language?: string): Promise<StartSessionResult> {
    const now = this.clock();
    const session: VoiceSession = {
      sessionId: this.generateId(),
      language: resolveLanguage(language),
      status: SessionStatus.ACTIVE,
      observations: {},
      turns: [],
      createdAt: now,
      updatedAt: now,
      expiresAt: this.expiryFrom(now),
    };

    await this.store.put(session);

    const required = this.registry.requiredFields();
    const greeting = renderGreeting(session.language, required[0], required.length);

    this.logger.info(`Started session ${session.sessionId} (language=${session.language})`);
    return { session: this.snapshot(session), greeting };
  }

  // ─── chat ─────────────────────────────────────────────────────────────────────

  /**
   * Applies one user transcript to the session.
   *
   * Extraction failures do not abort the turn: the transcript is recorded with
   * a fallback reply and the observations are left untouched.
   *
   * @throws InvalidTranscriptError for empty or oversized transcripts
   * @throws SessionNotFoundError, SessionExpiredError
   * @throws SessionLockError when another request wrote the session during this turn
   */
  async chat(sessionId: string, transcript: string): Promise<ChatResponse> {
    const text = transcript.trim();
    if (text.length === 0) {
      throw new InvalidTranscriptError("Transcript must not be empty");
    }
    if (text.length > MAX_TRANSCRIPT_LENGTH) {
      throw new InvalidTranscriptError(`Transcript exceeds ${MAX_TRANSCRIPT_LENGTH} characters`);
    }

    return this.store.withLock(sessionId, async () => {
      const session = await this.load(sessionId);
      await this.assertConversable(session, this.clock());
      const loadedUpdatedAt = session.updatedAt;

      const turnNumber = session.turns.length + 1;
      let extraction: ExtractionResult | null = null;
      try {
        extraction = await this.extractor.extract(session, text);
      } catch (err) {
        if (!(err instanceof ExtractionError)) throw err;
        this.logger.warn(`Extraction failed in session ${sessionId}, turn ${turnNumber}: ${err.message}`);
      }

      const finishedAt = this.clock();
      const updatedFields = extraction ? this.applyProposals(session, extraction, turnNumber) : [];
      const aiResponse = extraction ? extraction.reply : fallbackReply(session.language);

      const turn: ConversationTurn = {
        turnNumber,
        userTranscript: text,
        aiResponse,
        timestamp: finishedAt,
        extractionFailed: extraction === null,
        updatedFields,
      };
      session.turns.push(turn);

      if (session.status === SessionStatus.ACTIVE && this.missingRequired(session).length === 0) {
        session.status = SessionStatus.COMPLETED;
        this.logger.info(`Session ${sessionId} completed at turn ${turnNumber}`);
      }

      session.updatedAt = finishedAt;
      session.expiresAt = this.expiryFrom(finishedAt);
      await this.assertNotSuperseded(sessionId, turnNumber - 1, loadedUpdatedAt);
      await this.store.put(session);

      const snapshot = this.snapshot(session);
      this.logger.info(
        `Session ${sessionId}: turn ${turnNumber}, collected ${snapshot.fieldsCollected}/${snapshot.fieldsTotal}` +
        (updatedFields.length > 0 ? ` (updated: ${updatedFields.join(", ")})` : ""),
      );

      return {
        ...snapshot,
        aiResponse,
        fieldsUpdated: updatedFields,
        extractionFailed: extraction === null,
      };
    });
  }

  // ─── getStatus ────────────────────────────────────────────────────────────────

  /**
   * Read-only view of the session. A stale ACTIVE session is transitioned to
   * EXPIRED (and persisted) before the snapshot is taken.
   *
   * @throws SessionNotFoundError
   */
  async getStatus(sessionId: string): Promise<SessionSnapshot> {
    return this.store.withLock(sessionId, async () => {
      const session = await this.load(sessionId);
      await this.expireIfStale(session, this.clock());
      return this.snapshot(session);
    });
  }

  // ─── finalize ─────────────────────────────────────────────────────────────────

  /**
   * Hands a COMPLETED session to the profile gateway and evicts it. If the
   * gateway fails, the session stays in the store so finalize can be retried.
   *
   * @throws SessionNotFoundError, SessionExpiredError
   * @throws SessionNotCompleteError listing the required fields still missing
   * @throws PersistenceError when the gateway rejects
   */
  async finalize(sessionId: string): Promise<FinalizeResult> {
    return this.store.withLock(sessionId, async () => {
      const session = await this.load(sessionId);

      if (session.status !== SessionStatus.COMPLETED) {
        if (await this.expireIfStale(session, this.clock()) || session.status === SessionStatus.EXPIRED) {
          throw new SessionExpiredError(sessionId);
        }
        throw new SessionNotCompleteError(sessionId, this.missingRequired(session));
      }

      const values: Record<string, PlainFieldValue> = {};
      const confidence: Record<string, number> = {};
      for (const def of this.registry.listFields()) {
        const obs = session.observations[def.name];
        if (obs && isCollectedValue(obs.value)) {
          values[def.name] = toPlainValue(obs.value);
          confidence[def.name] = obs.confidence;
        }
      }

      let receipt: ProfileReceipt;
      try {
        receipt = await this.gateway.saveProfile({
          sessionId,
          language: session.language,
          values,
          confidence,
          collectedAt: session.updatedAt,
        });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`Finalize failed for session ${sessionId}; session kept for retry: ${reason}`);
        throw err instanceof PersistenceError
          ? err
          : new PersistenceError(`Profile gateway rejected session ${sessionId}: ${reason}`, { cause: err });
      }

      await this.store.delete(sessionId);
      this.logger.info(`Finalized session ${sessionId} → profile ${receipt.profileId}`);

      return { sessionId, values, confidence, receipt };
    });
  }

  // ─── cancel ───────────────────────────────────────────────────────────────────

  /** Removes the session whatever its state. Cancelling an unknown id is a no-op. */
  async cancel(sessionId: string): Promise<void> {
    await this.store.withLock(sessionId, async () => {
      await this.store.delete(sessionId);
    });
    this.logger.info(`Cancelled session ${sessionId}`);
  }

  // ─── sweepExpired ─────────────────────────────────────────────────────────────

  /**
   * Evicts every session whose expiresAt has passed. ACTIVE sessions are
   * marked EXPIRED first. Returns the number of sessions evicted.
   */
  async sweepExpired(): Promise<number> {
    const now = this.clock();
    const candidates = await this.store.listExpired(now);
    let evicted = 0;

    for (const sessionId of candidates) {
      try {
        const removed = await this.store.withLock(sessionId, async () => {
          const session = await this.store.get(sessionId);
          if (!session) {
            // Record already gone; clear any index entry left behind.
            await this.store.delete(sessionId);
            return false;
          }
          // A turn may have refreshed the session after listExpired ran.
          if (!this.isStale(session, now)) return false;

          if (session.status === SessionStatus.ACTIVE) {
            session.status = SessionStatus.EXPIRED;
          }
          await this.store.delete(sessionId);
          this.logger.debug(`Evicted session ${sessionId} (status=${session.status})`);
          return true;
        });
        if (removed) evicted++;
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`Sweep could not evict session ${sessionId}: ${reason}`);
      }
    }

    if (evicted > 0) {
      this.logger.info(`Swept ${evicted} expired session(s)`);
    }
    return evicted;
  }

  // ─── Snapshots ────────────────────────────────────────────────────────────────

  snapshot(session: VoiceSession): SessionSnapshot {
    const fieldsStatus: FieldStatusItem[] = [];
    const currentData: Record<string, PlainFieldValue> = {};
    let fieldsCollected = 0;
    let requiredCollected = 0;
    let requiredTotal = 0;

    for (const def of this.registry.listFields()) {
      const obs = session.observations[def.name];
      const isCollected = obs !== undefined && isCollectedValue(obs.value);
      if (def.isRequired) requiredTotal++;
      if (isCollected) {
        fieldsCollected++;
        if (def.isRequired) requiredCollected++;
        currentData[def.name] = toPlainValue(obs.value);
      }
      fieldsStatus.push({
        fieldName: def.name,
        displayName: def.displayName,
        isRequired: def.isRequired,
        isCollected,
        value: isCollected ? toPlainValue(obs.value) : null,
        confidence: isCollected ? obs.confidence : 0,
      });
    }

    const missingFields = this.missingRequired(session).map((m) => m.fieldName);

    return {
      sessionId: session.sessionId,
      status: session.status,
      language: session.language,
      fieldsCollected,
      fieldsTotal: fieldsStatus.length,
      requiredCollected,
      requiredTotal,
      fieldsStatus,
      currentData,
      missingFields,
      nextField: missingFields[0] ?? null,
      isComplete: missingFields.length === 0,
      turnNumber: session.turns.length,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      expiresAt: session.expiresAt,
    };
  }

  /** Required fields without a non-empty observation, in collection order. */
  missingRequired(session: VoiceSession): MissingField[] {
    return this.registry
      .requiredFields()
      .filter((def) => !isCollectedValue(session.observations[def.name]?.value))
      .map((def) => ({ fieldName: def.name, displayName: def.displayName }));
  }

  // ─── Internals ────────────────────────────────────────────────────────────────

  private expiryFrom(instant: Date): Date {
    return new Date(instant.getTime() + this.timeoutMs);
  }

  private isStale(session: VoiceSession, now: Date): boolean {
    return now.getTime() > session.expiresAt.getTime();
  }

  private async load(sessionId: string): Promise<VoiceSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Moves a stale ACTIVE session to EXPIRED and persists it.
   * Returns true when the transition happened.
   */
  private async expireIfStale(session: VoiceSession, now: Date): Promise<boolean> {
    if (session.status !== SessionStatus.ACTIVE || !this.isStale(session, now)) {
      return false;
    }
    session.status = SessionStatus.EXPIRED;
    await this.store.put(session);
    this.logger.info(`Session ${session.sessionId} expired (idle since ${session.updatedAt.toISOString()})`);
    return true;
  }

  /**
   * Re-reads the stored record right before a turn is written back. A Redis
   * lock lapses after its TTL even if the extractor is still running, so a
   * second writer may have stored a turn in the meantime; that turn wins and
   * this one is refused.
   */
  private async assertNotSuperseded(sessionId: string, loadedTurns: number, loadedUpdatedAt: Date): Promise<void> {
    const current = await this.store.get(sessionId);
    if (!current) {
      throw new SessionNotFoundError(sessionId);
    }
    if (current.turns.length !== loadedTurns || current.updatedAt.getTime() !== loadedUpdatedAt.getTime()) {
      this.logger.warn(`Session ${sessionId} was written by another request during turn ${loadedTurns + 1}; discarding the turn`);
      throw new SessionLockError(sessionId);
    }
  }

  /** Chat is allowed on ACTIVE and COMPLETED sessions that are not stale. */
  private async assertConversable(session: VoiceSession, now: Date): Promise<void> {
    await this.expireIfStale(session, now);
    const open = session.status === SessionStatus.ACTIVE || session.status === SessionStatus.COMPLETED;
    if (!open || this.isStale(session, now)) {
      throw new SessionExpiredError(session.sessionId);
    }
  }

  /**
   * Writes accepted proposals onto the session (last write wins per field) and
   * returns the names of the fields written, in collection order.
   */
  private applyProposals(session: VoiceSession, extraction: ExtractionResult, turnNumber: number): string[] {
    const updated: string[] = [];
    for (const def of this.registry.listFields()) {
      const proposal = extraction.proposals.get(def.name);
      if (!proposal) continue;
      if (!matchesDeclaredType(def, proposal.value) || !isCollectedValue(proposal.value)) {
        this.logger.warn(`Ignoring ${proposal.value.kind} proposal for ${def.valueType} field "${def.name}"`);
        continue;
      }
      session.observations[def.name] = {
        fieldName: def.name,
        value: proposal.value,
        confidence: proposal.confidence,
        sourceTurn: turnNumber,
      };
      updated.push(def.name);
    }
    return updated;
  }
}
