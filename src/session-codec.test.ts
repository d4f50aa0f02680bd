// Unit tests for the session record codec

import { describe, it, expect } from "vitest";
import { SessionCodecError, decodeSession, encodeSession } from "./session-codec.js";
import { SessionStatus, type VoiceSession } from "./types.js";

function makeSession(): VoiceSession {
  return {
    sessionId: "3f1c8a52-0000-4000-8000-000000000001",
    language: "hi",
    status: SessionStatus.COMPLETED,
    observations: {
      full_name: { fieldName: "full_name", value: { kind: "text", value: "Dr. Asha Rao" }, confidence: 0.95, sourceTurn: 1 },
      years_of_experience: { fieldName: "years_of_experience", value: { kind: "number", value: 12 }, confidence: 0.8, sourceTurn: 2 },
      languages: { fieldName: "languages", value: { kind: "enum_multi", value: ["English", "Hindi"] }, confidence: 0.9, sourceTurn: 2 },
    },
    turns: [
      {
        turnNumber: 1,
        userTranscript: "I'm Dr. Asha Rao",
        aiResponse: "Thanks, Dr. Rao.",
        timestamp: new Date("2025-03-01T10:01:00.000Z"),
        extractionFailed: false,
        updatedFields: ["full_name"],
      },
    ],
    createdAt: new Date("2025-03-01T10:00:00.000Z"),
    updatedAt: new Date("2025-03-01T10:01:00.000Z"),
    expiresAt: new Date("2025-03-01T10:31:00.000Z"),
  };
}

function encodedWith(patch: (record: Record<string, unknown>) => void): string {
  const record: Record<string, unknown> = JSON.parse(encodeSession(makeSession()));
  patch(record);
  return JSON.stringify(record);
}

describe("session codec", () => {
  it("restores the session including Date fields and tagged values", () => {
    const decoded = decodeSession(encodeSession(makeSession()));
    expect(decoded).toEqual(makeSession());
    expect(decoded.turns[0].timestamp).toBeInstanceOf(Date);
  });

  it("rejects text that is not JSON", () => {
    expect(() => decodeSession("{oops")).toThrow(SessionCodecError);
    expect(() => decodeSession("{oops")).toThrow("Invalid session record: not valid JSON");
  });

  it("rejects unknown statuses", () => {
    const text = encodedWith((r) => {
      r.status = "paused";
    });
    expect(() => decodeSession(text)).toThrow('unknown status "paused"');
  });

  it("rejects values whose payload does not match their kind", () => {
    const text = encodedWith((r) => {
      r.observations = { years_of_experience: { fieldName: "years_of_experience", value: { kind: "number", value: "12" }, confidence: 0.8, sourceTurn: 1 } };
    });
    expect(() => decodeSession(text)).toThrow("observations.years_of_experience.value has an invalid \"number\" value");
  });

  it("rejects unparseable dates", () => {
    const text = encodedWith((r) => {
      r.expiresAt = "tomorrow-ish";
    });
    expect(() => decodeSession(text)).toThrow("session.expiresAt is not a valid date");
  });

  it("rejects turns with missing fields", () => {
    const text = encodedWith((r) => {
      r.turns = [{ turnNumber: 1, userTranscript: "hi", aiResponse: "hello", timestamp: "2025-03-01T10:01:00.000Z", updatedFields: [] }];
    });
    expect(() => decodeSession(text)).toThrow("turns[0].extractionFailed must be a boolean");
  });
});
