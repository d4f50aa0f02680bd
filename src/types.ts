// Doctor Voice Onboarding - Shared TypeScript interfaces and types
// Runtime code lives in the component modules; this file only declares shapes.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStatus {
  ACTIVE = "active",
  COMPLETED = "completed",
  EXPIRED = "expired",
  CANCELLED = "cancelled",
}

// ─── Field Schema ───────────────────────────────────────────────────────────────

export type FieldValueType = "text" | "number" | "enum_single" | "enum_multi" | "year";

export interface FieldValidation {
  /** Regular expression source the (string form of the) value must match. */
  pattern?: string;
  /** Inclusive lower bound for number/year fields. */
  min?: number;
  /** Inclusive upper bound for number/year fields. */
  max?: number;
  /** Minimum trimmed length for text fields. */
  minLength?: number;
  /** Minimum count of digits in a text value (phone numbers). */
  minDigits?: number;
  /** Allowed values for enumerated fields. Omitted = free-form options. */
  options?: string[];
  /** Upper bound on the number of selections for enum_multi fields. */
  maxSelections?: number;
}

export type FieldNormalizer = "email" | "phone" | "none";

export interface FieldDefinition {
  readonly name: string;
  readonly displayName: string;
  readonly valueType: FieldValueType;
  readonly isRequired: boolean;
  readonly validation?: Readonly<FieldValidation>;
  readonly collectionOrder: number;
  /** Extra text clean-up applied before validation. */
  readonly normalizer?: FieldNormalizer;
  /** Short hint for the language model describing what to listen for. */
  readonly description?: string;
}

// ─── Field Values (tagged by declared type) ─────────────────────────────────────

export type FieldValue =
  | { kind: "text"; value: string }
  | { kind: "number"; value: number }
  | { kind: "enum_single"; value: string }
  | { kind: "enum_multi"; value: string[] }
  | { kind: "year"; value: number };

/** Untagged form of a FieldValue, as handed to callers and the gateway. */
export type PlainFieldValue = string | number | string[];

// ─── Session Aggregate ──────────────────────────────────────────────────────────

export interface FieldObservation {
  fieldName: string;
  value: FieldValue;
  confidence: number;
  /** Turn number that produced (or last overwrote) this value. */
  sourceTurn: number;
}

export interface ConversationTurn {
  turnNumber: number;
  userTranscript: string;
  aiResponse: string;
  timestamp: Date;
  /** True when the extractor failed and aiResponse is the fallback reply. */
  extractionFailed: boolean;
  /** Field names written by this turn, in registry order. */
  updatedFields: string[];
}

export interface VoiceSession {
  sessionId: string;
  language: string;
  status: SessionStatus;
  observations: Record<string, FieldObservation>;
  turns: ConversationTurn[];
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

// ─── Extraction ─────────────────────────────────────────────────────────────────

export interface FieldProposal {
  value: FieldValue;
  confidence: number;
}

export interface ExtractionResult {
  proposals: Map<string, FieldProposal>;
  reply: string;
  /** Field names the model returned that were dropped (unknown, low confidence, invalid). */
  discarded: string[];
}

// ─── Snapshots returned to callers ──────────────────────────────────────────────

export interface FieldStatusItem {
  fieldName: string;
  displayName: string;
  isRequired: boolean;
  isCollected: boolean;
  value: PlainFieldValue | null;
  confidence: number;
}

export interface SessionSnapshot {
  sessionId: string;
  status: SessionStatus;
  language: string;
  fieldsCollected: number;
  fieldsTotal: number;
  requiredCollected: number;
  requiredTotal: number;
  fieldsStatus: FieldStatusItem[];
  currentData: Record<string, PlainFieldValue>;
  missingFields: string[];
  nextField: string | null;
  isComplete: boolean;
  turnNumber: number;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface StartSessionResult {
  session: SessionSnapshot;
  greeting: string;
}

export interface ChatResponse extends SessionSnapshot {
  aiResponse: string;
  fieldsUpdated: string[];
  extractionFailed: boolean;
}

// ─── Finalization ───────────────────────────────────────────────────────────────

export interface ProfileSubmission {
  sessionId: string;
  language: string;
  values: Record<string, PlainFieldValue>;
  confidence: Record<string, number>;
  collectedAt: Date;
}

export interface ProfileReceipt {
  profileId: string;
  location?: string;
}

export interface FinalizeResult {
  sessionId: string;
  values: Record<string, PlainFieldValue>;
  confidence: Record<string, number>;
  receipt: ProfileReceipt;
}

// ─── Misc ───────────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export type Clock = () => Date;
