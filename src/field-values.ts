// Doctor Voice Onboarding - Field value coercion
//
// Language-model output is untyped JSON. Every proposed value is coerced into
// the tagged FieldValue for its declared type and checked against the field's
// validation rules. Anything that cannot be coerced yields null, so a
// malformed proposal counts as "not collected" instead of failing the turn.

import type { FieldDefinition, FieldValue, PlainFieldValue } from "./types.js";

const DEFAULT_YEAR_RANGE = { min: 1900, max: 2100 };

/** Separators accepted between items of a spoken list ("English, Hindi and Tamil"). */
const LIST_SEPARATOR = /\s*(?:,|;|\/|\band\b|&)\s*/i;

// ─── Scalar helpers ─────────────────────────────────────────────────────────────

/**
 * Pulls the first number out of a loosely formatted value.
 * Accepts numbers as-is and strings such as "15", "15 years", "12.5".
 */
export function extractNumber(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== "string") return null;
  const match = raw.replace(/(\d),(\d{3})\b/g, "$1$2").match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;
  const n = Number(match[0]);
  return Number.isFinite(n) ? n : null;
}

function asText(raw: unknown): string | null {
  if (typeof raw === "string") return raw;
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  return null;
}

function normalizeText(def: FieldDefinition, text: string): string {
  switch (def.normalizer) {
    case "email":
      return text.trim().toLowerCase();
    case "phone":
      return Array.from(text).filter((c) => /\d/.test(c) || c === "+").join("");
    default:
      return text.trim().replace(/\s+/g, " ");
  }
}

function countDigits(text: string): number {
  return Array.from(text).filter((c) => /\d/.test(c)).length;
}

function matchesPattern(def: FieldDefinition, text: string): boolean {
  const pattern = def.validation?.pattern;
  if (!pattern) return true;
  return new RegExp(pattern).test(text);
}

function withinBounds(def: FieldDefinition, n: number, fallback?: { min: number; max: number }): boolean {
  const min = def.validation?.min ?? fallback?.min;
  const max = def.validation?.max ?? fallback?.max;
  if (min !== undefined && n < min) return false;
  if (max !== undefined && n > max) return false;
  return true;
}

/** Maps a spoken option onto its canonical spelling; null when not allowed. */
function resolveOption(def: FieldDefinition, candidate: string): string | null {
  const trimmed = candidate.trim();
  if (trimmed.length === 0) return null;
  const options = def.validation?.options;
  if (!options || options.length === 0) return trimmed;
  const lowered = trimmed.toLowerCase();
  return options.find((o) => o.toLowerCase() === lowered) ?? null;
}

// ─── Per-type coercion ──────────────────────────────────────────────────────────

function coerceText(def: FieldDefinition, raw: unknown): FieldValue | null {
  const text = asText(raw);
  if (text === null) return null;
  const value = normalizeText(def, text);
  if (value.length === 0) return null;

  const rules = def.validation;
  if (rules?.minLength !== undefined && value.length < rules.minLength) return null;
  if (rules?.minDigits !== undefined && countDigits(value) < rules.minDigits) return null;
  if (!matchesPattern(def, value)) return null;

  return { kind: "text", value };
}

function coerceNumber(def: FieldDefinition, raw: unknown): FieldValue | null {
  const n = extractNumber(raw);
  if (n === null || !withinBounds(def, n)) return null;
  return { kind: "number", value: n };
}

function coerceYear(def: FieldDefinition, raw: unknown): FieldValue | null {
  const n = extractNumber(raw);
  if (n === null || !Number.isInteger(n)) return null;
  if (!withinBounds(def, n, DEFAULT_YEAR_RANGE)) return null;
  return { kind: "year", value: n };
}

function coerceEnumSingle(def: FieldDefinition, raw: unknown): FieldValue | null {
  const text = asText(raw);
  if (text === null) return null;
  const value = resolveOption(def, text);
  if (value === null || !matchesPattern(def, value)) return null;
  return { kind: "enum_single", value };
}

function coerceEnumMulti(def: FieldDefinition, raw: unknown): FieldValue | null {
  let candidates: unknown[];
  if (Array.isArray(raw)) {
    candidates = raw;
  } else if (typeof raw === "string") {
    candidates = raw.split(LIST_SEPARATOR);
  } else {
    return null;
  }

  const seen = new Set<string>();
  const values: string[] = [];
  for (const candidate of candidates) {
    const text = asText(candidate);
    if (text === null) continue;
    const option = resolveOption(def, text);
    if (option === null) continue;
    const key = option.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    values.push(option);
  }

  if (values.length === 0) return null;
  const maxSelections = def.validation?.maxSelections;
  if (maxSelections !== undefined && values.length > maxSelections) return null;

  return { kind: "enum_multi", value: values };
}

// ─── Public API ─────────────────────────────────────────────────────────────────

/**
 * Coerces an untrusted proposed value into the field's declared type.
 * Returns null when the value is missing, empty, or fails validation.
 */
export function coerceFieldValue(def: FieldDefinition, raw: unknown): FieldValue | null {
  if (raw === null || raw === undefined) return null;

  switch (def.valueType) {
    case "text":
      return coerceText(def, raw);
    case "number":
      return coerceNumber(def, raw);
    case "year":
      return coerceYear(def, raw);
    case "enum_single":
      return coerceEnumSingle(def, raw);
    case "enum_multi":
      return coerceEnumMulti(def, raw);
  }
}

/** True when the value counts towards completion. */
export function isCollectedValue(value: FieldValue | undefined): boolean {
  if (!value) return false;
  switch (value.kind) {
    case "text":
    case "enum_single":
      return value.value.trim().length > 0;
    case "enum_multi":
      return value.value.length > 0;
    case "number":
    case "year":
      return Number.isFinite(value.value);
  }
}

export function toPlainValue(value: FieldValue): PlainFieldValue {
  return value.kind === "enum_multi" ? [...value.value] : value.value;
}

/** Checks that a tagged value has the kind its definition declares. */
export function matchesDeclaredType(def: FieldDefinition, value: FieldValue): boolean {
  return def.valueType === value.kind;
}
