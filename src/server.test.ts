// Server Unit Tests
// Exercises the HTTP routes end to end against a real engine with an in-memory
// store and a scripted extractor, on an OS-assigned port.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createAppServer, API_PREFIX, type AppServer } from "./server.js";
import { VoiceSessionEngine } from "./voice-session-engine.js";
import { FieldSchemaRegistry } from "./field-registry.js";
import { InMemorySessionStore } from "./session-store.js";
import type { TranscriptExtractorLike } from "./transcript-extractor.js";
import type { ExtractionResult, FieldProposal, VoiceSession } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

/** Silent logger for tests */
function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Proposes both fields when the transcript mentions cardiology, nothing otherwise. */
class KeywordExtractor implements TranscriptExtractorLike {
  failWith: Error | null = null;

  async extract(_session: VoiceSession, transcript: string): Promise<ExtractionResult> {
    if (this.failWith) throw this.failWith;
    const proposals = new Map<string, FieldProposal>();
    if (transcript.includes("cardiology")) {
      proposals.set("full_name", { value: { kind: "text", value: "Dr. Rao" }, confidence: 0.9 });
      proposals.set("primary_specialization", { value: { kind: "text", value: "Cardiology" }, confidence: 0.9 });
    }
    return { proposals, reply: "Thanks!", discarded: [] };
  }
}

describe("HTTP server", () => {
  let server: AppServer;
  let engine: VoiceSessionEngine;
  let extractor: KeywordExtractor;
  let logger: ReturnType<typeof createSilentLogger>;
  let baseUrl: string;

  beforeEach(async () => {
    extractor = new KeywordExtractor();
    logger = createSilentLogger();
    engine = new VoiceSessionEngine({
      registry: new FieldSchemaRegistry([
        { name: "full_name", displayName: "Full Name", valueType: "text", isRequired: true, collectionOrder: 1 },
        { name: "primary_specialization", displayName: "Specialization", valueType: "text", isRequired: true, collectionOrder: 2 },
      ]),
      extractor,
      store: new InMemorySessionStore(),
      gateway: { saveProfile: async (s) => ({ profileId: `profile-${s.sessionId}` }) },
      logger,
    });
    server = createAppServer({ engine, logger });
    const port = await server.listen(TEST_PORT);
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.close();
  });

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    return { status: res.status, body: text.length > 0 ? JSON.parse(text) : null };
  }

  it("answers the health check", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, body: { status: "ok" } });
  });

  it("starts a session", async () => {
    const res = await call("POST", `${API_PREFIX}/start`, { language: "en" });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      greeting: expect.stringContaining("I'll need 2 details"),
      session: { status: "active", fieldsTotal: 2, requiredTotal: 2, nextField: "full_name", turnNumber: 0 },
    });
  });

  it("rejects a non-string language", async () => {
    const res = await call("POST", `${API_PREFIX}/start`, { language: 7 });
    expect(res).toEqual({
      status: 400,
      body: { error: { code: "INVALID_REQUEST", message: '"language" must be a string' } },
    });
  });

  it("runs a chat turn and returns the updated snapshot", async () => {
    const { session } = await engine.start();

    const res = await call("POST", `${API_PREFIX}/chat`, {
      sessionId: session.sessionId,
      transcript: "Dr. Rao, cardiology",
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      sessionId: session.sessionId,
      status: "completed",
      aiResponse: "Thanks!",
      fieldsUpdated: ["full_name", "primary_specialization"],
      currentData: { full_name: "Dr. Rao", primary_specialization: "Cardiology" },
      extractionFailed: false,
      turnNumber: 1,
    });
  });

  it("validates the chat body", async () => {
    const noSession = await call("POST", `${API_PREFIX}/chat`, { transcript: "hello" });
    expect(noSession.status).toBe(400);
    expect(noSession.body).toEqual({ error: { code: "INVALID_REQUEST", message: '"sessionId" must be a non-empty string' } });

    const { session } = await engine.start();
    const blank = await call("POST", `${API_PREFIX}/chat`, { sessionId: session.sessionId, transcript: "  " });
    expect(blank.status).toBe(400);
    expect(blank.body).toEqual({ error: { code: "INVALID_TRANSCRIPT", message: "Transcript must not be empty" } });
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${baseUrl}${API_PREFIX}/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { code: "INVALID_REQUEST", message: "Request body is not valid JSON" } });
  });

  it("rejects an oversized body with 413", async () => {
    const res = await call("POST", `${API_PREFIX}/chat`, { sessionId: "s1", transcript: "a".repeat(70 * 1024) });
    expect(res).toEqual({
      status: 413,
      body: { error: { code: "INVALID_REQUEST", message: "Request body exceeds 64kb" } },
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("returns 500 for a SyntaxError raised inside a handler", async () => {
    const { session } = await engine.start();
    extractor.failWith = new SyntaxError("Unexpected token in model output");

    const res = await call("POST", `${API_PREFIX}/chat`, { sessionId: session.sessionId, transcript: "hello" });

    expect(res).toEqual({ status: 500, body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } } });
  });

  it("returns 404 for unknown sessions", async () => {
    const res = await call("GET", `${API_PREFIX}/session/does-not-exist`);
    expect(res).toEqual({
      status: 404,
      body: { error: { code: "SESSION_NOT_FOUND", message: "Session not found: does-not-exist" } },
    });
  });

  it("reports missing fields when finalizing too early", async () => {
    const { session } = await engine.start();

    const res = await call("POST", `${API_PREFIX}/session/${session.sessionId}/finalize`);

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: {
        code: "SESSION_INCOMPLETE",
        details: {
          missingFields: [
            { fieldName: "full_name", displayName: "Full Name" },
            { fieldName: "primary_specialization", displayName: "Specialization" },
          ],
        },
      },
    });
  });

  it("finalizes a completed session", async () => {
    const { session } = await engine.start();
    await engine.chat(session.sessionId, "Dr. Rao, cardiology");

    const res = await call("POST", `${API_PREFIX}/session/${session.sessionId}/finalize`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      sessionId: session.sessionId,
      values: { full_name: "Dr. Rao", primary_specialization: "Cardiology" },
      confidence: { full_name: 0.9, primary_specialization: 0.9 },
      receipt: { profileId: `profile-${session.sessionId}` },
    });
  });

  it("cancels a session", async () => {
    const { session } = await engine.start();

    const res = await call("DELETE", `${API_PREFIX}/session/${session.sessionId}`);
    expect(res).toEqual({ status: 204, body: null });

    expect((await call("GET", `${API_PREFIX}/session/${session.sessionId}`)).status).toBe(404);
  });

  it("hides unexpected errors behind a 500", async () => {
    const { session } = await engine.start();
    extractor.failWith = new TypeError("cannot read properties of undefined");

    const res = await call("POST", `${API_PREFIX}/chat`, { sessionId: session.sessionId, transcript: "hello" });

    expect(res).toEqual({ status: 500, body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } } });
    expect(logger.error).toHaveBeenCalled();
  });

  it("returns 404 for unknown routes", async () => {
    const res = await call("GET", "/api/v2/anything");
    expect(res).toEqual({ status: 404, body: { error: { code: "NOT_FOUND", message: "Route not found" } } });
  });
});
