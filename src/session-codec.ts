// Doctor Voice Onboarding - Session record codec
// JSON encoding of VoiceSession for networked stores. Dates travel as ISO
// strings; decoding re-validates every field so a corrupt or foreign record
// never reaches the engine as a half-typed object.

import {
  SessionStatus,
  type ConversationTurn,
  type FieldObservation,
  type FieldValue,
  type VoiceSession,
} from "./types.js";

const STATUSES: readonly SessionStatus[] = [
  SessionStatus.ACTIVE,
  SessionStatus.COMPLETED,
  SessionStatus.EXPIRED,
  SessionStatus.CANCELLED,
];

export class SessionCodecError extends Error {
  constructor(message: string) {
    super(`Invalid session record: ${message}`);
    this.name = "SessionCodecError";
  }
}

export function encodeSession(session: VoiceSession): string {
  return JSON.stringify(session);
}

// ─── Decoding helpers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new SessionCodecError(`${where}.${key} must be a string`);
  return value;
}

function num(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SessionCodecError(`${where}.${key} must be a number`);
  }
  return value;
}

function date(obj: Record<string, unknown>, key: string, where: string): Date {
  const d = new Date(str(obj, key, where));
  if (Number.isNaN(d.getTime())) throw new SessionCodecError(`${where}.${key} is not a valid date`);
  return d;
}

function decodeFieldValue(raw: unknown, where: string): FieldValue {
  if (!isRecord(raw)) throw new SessionCodecError(`${where} must be an object`);
  const { kind, value } = raw;
  if ((kind === "text" || kind === "enum_single") && typeof value === "string") {
    return { kind, value };
  }
  if ((kind === "number" || kind === "year") && typeof value === "number") {
    return { kind, value };
  }
  if (kind === "enum_multi" && Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
    return { kind, value: [...value] };
  }
  throw new SessionCodecError(`${where} has an invalid ${JSON.stringify(kind)} value`);
}

function decodeObservation(raw: unknown, where: string): FieldObservation {
  if (!isRecord(raw)) throw new SessionCodecError(`${where} must be an object`);
  return {
    fieldName: str(raw, "fieldName", where),
    value: decodeFieldValue(raw.value, `${where}.value`),
    confidence: num(raw, "confidence", where),
    sourceTurn: num(raw, "sourceTurn", where),
  };
}

function decodeTurn(raw: unknown, where: string): ConversationTurn {
  if (!isRecord(raw)) throw new SessionCodecError(`${where} must be an object`);
  const updated = raw.updatedFields;
  if (!Array.isArray(updated) || !updated.every((f): f is string => typeof f === "string")) {
    throw new SessionCodecError(`${where}.updatedFields must be an array of strings`);
  }
  if (typeof raw.extractionFailed !== "boolean") {
    throw new SessionCodecError(`${where}.extractionFailed must be a boolean`);
  }
  return {
    turnNumber: num(raw, "turnNumber", where),
    userTranscript: str(raw, "userTranscript", where),
    aiResponse: str(raw, "aiResponse", where),
    timestamp: date(raw, "timestamp", where),
    extractionFailed: raw.extractionFailed,
    updatedFields: [...updated],
  };
}

// ─── Public API ─────────────────────────────────────────────────────────────────

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new SessionCodecError("not valid JSON");
  }
}

export function decodeSession(text: string): VoiceSession {
  const raw = parseJson(text);
  if (!isRecord(raw)) throw new SessionCodecError("root must be an object");

  const status = STATUSES.find((s) => s === raw.status);
  if (status === undefined) {
    throw new SessionCodecError(`unknown status ${JSON.stringify(raw.status)}`);
  }

  if (!isRecord(raw.observations)) throw new SessionCodecError("observations must be an object");
  const observations: Record<string, FieldObservation> = {};
  for (const [name, obs] of Object.entries(raw.observations)) {
    observations[name] = decodeObservation(obs, `observations.${name}`);
  }

  if (!Array.isArray(raw.turns)) throw new SessionCodecError("turns must be an array");
  const turns = raw.turns.map((t: unknown, i: number) => decodeTurn(t, `turns[${i}]`));

  return {
    sessionId: str(raw, "sessionId", "session"),
    language: str(raw, "language", "session"),
    status,
    observations,
    turns,
    createdAt: date(raw, "createdAt", "session"),
    updatedAt: date(raw, "updatedAt", "session"),
    expiresAt: date(raw, "expiresAt", "session"),
  };
}
