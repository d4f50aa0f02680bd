// Doctor Voice Onboarding - Conversation text
// Templated greetings and fallback replies, plus the extraction prompt sent
// to the language model on every turn.

import type { ConversationTurn, FieldDefinition, FieldObservation, FieldValueType } from "./types.js";
import { toPlainValue } from "./field-values.js";

export const DEFAULT_LANGUAGE = "en";

// ─── Templated replies ──────────────────────────────────────────────────────────

const GREETINGS: Record<string, (firstField: string, requiredCount: number) => string> = {
  en: (firstField, n) =>
    `Hello! I'm here to help you complete your doctor registration. ` +
    `I'll need ${n} details from you, and you can share several at once. ` +
    `Let's start with your ${firstField.toLowerCase()}.`,
  es: (firstField, n) =>
    `¡Hola! Estoy aquí para ayudarle a completar su registro como médico. ` +
    `Necesitaré ${n} datos y puede darme varios a la vez. ` +
    `Empecemos con: ${firstField}.`,
  hi: (firstField, n) =>
    `नमस्ते! मैं आपका डॉक्टर पंजीकरण पूरा करने में आपकी मदद करूँगा। ` +
    `मुझे आपसे ${n} जानकारियाँ चाहिए, आप एक साथ कई बता सकते हैं। ` +
    `आइए ${firstField} से शुरू करें।`,
};

const FALLBACK_REPLIES: Record<string, string> = {
  en: "Sorry, could you repeat that?",
  es: "Perdón, ¿podría repetirlo?",
  hi: "क्षमा करें, क्या आप इसे दोहरा सकते हैं?",
};

export function supportedLanguages(): string[] {
  return Object.keys(GREETINGS);
}

/** Normalizes "en-US" / "EN" style tags onto a supported language, else English. */
export function resolveLanguage(language: string | undefined): string {
  const base = (language ?? "").trim().toLowerCase().split(/[-_]/)[0] ?? "";
  return base in GREETINGS ? base : DEFAULT_LANGUAGE;
}

export function renderGreeting(language: string, firstField: FieldDefinition | undefined, requiredCount: number): string {
  const template = GREETINGS[resolveLanguage(language)] ?? GREETINGS[DEFAULT_LANGUAGE];
  return template ? template(firstField?.displayName ?? "details", requiredCount) : "";
}

export function fallbackReply(language: string): string {
  return FALLBACK_REPLIES[resolveLanguage(language)] ?? "Sorry, could you repeat that?";
}

// ─── Extraction prompt ──────────────────────────────────────────────────────────

/** How many prior turns are replayed to the model. */
export const HISTORY_WINDOW = 6;

const TYPE_RULES: Record<FieldValueType, (def: FieldDefinition) => string> = {
  text: () => "Free text exactly as stated; do not paraphrase.",
  number: (def) => {
    const min = def.validation?.min;
    const max = def.validation?.max;
    const range = min !== undefined && max !== undefined ? ` between ${min} and ${max}` : "";
    return `A number${range}. Only extract a number the speaker actually said.`;
  },
  year: () => "A four-digit calendar year.",
  enum_single: (def) =>
    def.validation?.options
      ? `Exactly one of: ${def.validation.options.join(", ")}.`
      : "A single short value.",
  enum_multi: (def) => {
    const options = def.validation?.options ? ` chosen from: ${def.validation.options.join(", ")}` : "";
    const cap = def.validation?.maxSelections ? ` (at most ${def.validation.maxSelections})` : "";
    return `A JSON array of strings${options}${cap}.`;
  },
};

const SYSTEM_PROMPT = [
  "You are a friendly registration assistant collecting a doctor's profile over a voice conversation.",
  "Each turn you receive the fields still missing, the values already collected, recent conversation, and the doctor's latest transcribed speech.",
  "Extract only values the doctor explicitly stated. Never guess or invent values.",
  "If the doctor corrects a value that was already collected, put the new value under \"corrections\".",
  "Give each extracted or corrected field a confidence between 0 and 1.",
  "Then write a short, natural reply (one or two sentences) that acknowledges what was captured and asks for the next missing field. Do not re-ask for collected fields.",
  "Reply in the conversation language.",
  "Respond with ONLY a JSON object of the form:",
  '{ "extracted_fields": { "<field_name>": <value> }, "corrections": { "<field_name>": <value> }, "confidence": { "<field_name>": <0..1> }, "response_text": "<reply>" }',
].join("\n");

export interface ExtractionPromptInput {
  language: string;
  fields: readonly FieldDefinition[];
  missing: readonly FieldDefinition[];
  observations: Record<string, FieldObservation>;
  history: readonly ConversationTurn[];
  transcript: string;
}

function describeField(def: FieldDefinition): string {
  const required = def.isRequired ? "required" : "optional";
  const hint = def.description ? ` ${def.description}.` : "";
  return `- ${def.name} (${def.displayName}, ${required}):${hint} ${TYPE_RULES[def.valueType](def)}`;
}

export function buildExtractionPrompt(input: ExtractionPromptInput): { system: string; user: string } {
  const collected: Record<string, unknown> = {};
  for (const def of input.fields) {
    const obs = input.observations[def.name];
    if (obs) collected[def.name] = toPlainValue(obs.value);
  }

  const missingLines = input.missing.length > 0
    ? input.missing.map(describeField).join("\n")
    : "(none; all fields are collected, only apply corrections)";

  const recent = input.history.slice(-HISTORY_WINDOW);
  const historyLines = recent.length > 0
    ? recent.map((t) => `Doctor: ${t.userTranscript}\nAssistant: ${t.aiResponse}`).join("\n")
    : "(conversation just started)";

  const user = `## Conversation language
${input.language}

## Fields still missing (ask in this order)
${missingLines}

## All fields
${input.fields.map(describeField).join("\n")}

## Already collected
${JSON.stringify(collected, null, 2)}

## Recent conversation
${historyLines}

## Latest transcript
${input.transcript}`;

  return { system: SYSTEM_PROMPT, user };
}
