// Unit tests for InMemorySessionStore

import { describe, it, expect } from "vitest";
import { InMemorySessionStore } from "./session-store.js";
import { SessionStatus, type VoiceSession } from "./types.js";

function makeSession(id: string, expiresAt: string): VoiceSession {
  const created = new Date("2025-03-01T10:00:00.000Z");
  return {
    sessionId: id,
    language: "en",
    status: SessionStatus.ACTIVE,
    observations: {},
    turns: [],
    createdAt: created,
    updatedAt: created,
    expiresAt: new Date(expiresAt),
  };
}

describe("InMemorySessionStore", () => {
  it("returns null for unknown ids", async () => {
    const store = new InMemorySessionStore();
    expect(await store.get("missing")).toBeNull();
  });

  it("stores copies so callers cannot mutate stored state", async () => {
    const store = new InMemorySessionStore();
    const session = makeSession("s1", "2025-03-01T10:30:00.000Z");
    await store.put(session);

    session.status = SessionStatus.COMPLETED;
    const fetched = await store.get("s1");
    expect(fetched?.status).toBe(SessionStatus.ACTIVE);

    if (fetched) fetched.language = "es";
    expect((await store.get("s1"))?.language).toBe("en");
  });

  it("keeps dates as Date instances", async () => {
    const store = new InMemorySessionStore();
    await store.put(makeSession("s1", "2025-03-01T10:30:00.000Z"));
    const fetched = await store.get("s1");
    expect(fetched?.expiresAt).toBeInstanceOf(Date);
    expect(fetched?.expiresAt.toISOString()).toBe("2025-03-01T10:30:00.000Z");
  });

  it("deletes idempotently", async () => {
    const store = new InMemorySessionStore();
    await store.put(makeSession("s1", "2025-03-01T10:30:00.000Z"));
    await store.delete("s1");
    await store.delete("s1");
    expect(await store.get("s1")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("lists sessions whose expiry is strictly before now", async () => {
    const store = new InMemorySessionStore();
    await store.put(makeSession("past", "2025-03-01T10:00:00.000Z"));
    await store.put(makeSession("boundary", "2025-03-01T10:30:00.000Z"));
    await store.put(makeSession("future", "2025-03-01T11:00:00.000Z"));

    expect(await store.listExpired(new Date("2025-03-01T10:30:00.000Z"))).toEqual(["past"]);
  });

  it("serializes read-modify-write sequences on the same session", async () => {
    const store = new InMemorySessionStore();
    await store.put(makeSession("s1", "2025-03-01T10:30:00.000Z"));

    const appendTurn = (n: number) =>
      store.withLock("s1", async () => {
        const session = await store.get("s1");
        if (!session) throw new Error("missing");
        await new Promise((resolve) => setTimeout(resolve, 5));
        session.turns.push({
          turnNumber: session.turns.length + 1,
          userTranscript: `turn ${n}`,
          aiResponse: "ok",
          timestamp: new Date("2025-03-01T10:01:00.000Z"),
          extractionFailed: false,
          updatedFields: [],
        });
        await store.put(session);
      });

    await Promise.all([appendTurn(1), appendTurn(2), appendTurn(3)]);

    const turns = (await store.get("s1"))?.turns ?? [];
    expect(turns.map((t) => t.turnNumber)).toEqual([1, 2, 3]);
    expect(turns.map((t) => t.userTranscript)).toEqual(["turn 1", "turn 2", "turn 3"]);
  });

  it("clears everything on close", async () => {
    const store = new InMemorySessionStore();
    await store.put(makeSession("s1", "2025-03-01T10:30:00.000Z"));
    await store.close();
    expect(store.size).toBe(0);
  });
});
