// Doctor Voice Onboarding - Transcript Extractor
// Turns one transcribed utterance into field proposals
// and the assistant's next reply, using OpenAI chat completions in JSON mode.
//
// The model's output is treated as untrusted input:
//   - proposals for fields outside the schema are dropped,
//   - values that fail type coercion or validation are dropped,
//   - proposals under the confidence threshold are dropped.
// Transport failures and unusable responses raise ExtractionError.
//
// The extractor holds no per-session state; everything it needs is passed in.

import { ExtractionError } from "./errors.js";
import type { FieldSchemaRegistry } from "./field-registry.js";
import { coerceFieldValue, isCollectedValue } from "./field-values.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { buildExtractionPrompt } from "./prompts.js";
import type { ExtractionResult, FieldProposal, FieldValue, VoiceSession } from "./types.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
        response_format?: { type: "json_object" | "text" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

/** Anything that can turn a transcript into proposals; the engine depends on this. */
export interface TranscriptExtractorLike {
  extract(session: VoiceSession, userTranscript: string): Promise<ExtractionResult>;
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

/** Confidence assumed when the model omits one. */
const DEFAULT_EXTRACTION_CONFIDENCE = 0.8;
const DEFAULT_CORRECTION_CONFIDENCE = 0.9;

export interface TranscriptExtractorOptions {
  model?: string;
  confidenceThreshold?: number;
  temperature?: number;
  logger?: Logger;
}

interface RawExtraction {
  extracted: Record<string, unknown>;
  corrections: Record<string, unknown>;
  confidence: Record<string, unknown>;
  reply: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clampConfidence(raw: unknown, fallback: number): number {
  const n = typeof raw === "string" ? Number(raw) : raw;
  if (typeof n !== "number" || !Number.isFinite(n)) return fallback;
  return Math.min(1, Math.max(0, n));
}

// ─── TranscriptExtractor ────────────────────────────────────────────────────────

export class TranscriptExtractor implements TranscriptExtractorLike {
  private readonly openai: OpenAIClient;
  private readonly registry: FieldSchemaRegistry;
  private readonly model: string;
  private readonly temperature: number;
  private readonly logger: Logger;
  readonly confidenceThreshold: number;

  constructor(openaiClient: OpenAIClient, registry: FieldSchemaRegistry, options: TranscriptExtractorOptions = {}) {
    this.openai = openaiClient;
    this.registry = registry;
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.3;
    this.logger = options.logger ?? silentLogger;
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;

    if (this.confidenceThreshold < 0 || this.confidenceThreshold > 1) {
      throw new RangeError(`confidenceThreshold must be within [0, 1], got ${this.confidenceThreshold}`);
    }
  }

  async extract(session: VoiceSession, userTranscript: string): Promise<ExtractionResult> {
    const fields = this.registry.listFields();
    const missing = fields.filter((f) => !isCollectedValue(session.observations[f.name]?.value));

    const prompt = buildExtractionPrompt({
      language: session.language,
      fields,
      missing,
      observations: session.observations,
      history: session.turns,
      transcript: userTranscript,
    });

    const raw = await this.callLLM(prompt);
    const parsed = this.parseResponse(raw);
    return this.filterProposals(parsed);
  }

  // ── LLM call ───────────────────────────────────────────────────────────────

  private async callLLM(prompt: { system: string; user: string }): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        response_format: { type: "json_object" },
        temperature: this.temperature,
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExtractionError(`Completion request failed: ${reason}`, { cause: err });
    }

    if (!content) {
      throw new ExtractionError("LLM returned empty response");
    }
    return content;
  }

  // ── Parsing ────────────────────────────────────────────────────────────────

  private parseResponse(raw: string): RawExtraction {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ExtractionError(`Failed to parse LLM response as JSON: ${raw.slice(0, 200)}`, { cause: err });
    }

    if (!isRecord(parsed)) {
      throw new ExtractionError("LLM response is not a JSON object");
    }

    const reply = parsed.response_text;
    if (typeof reply !== "string" || reply.trim().length === 0) {
      throw new ExtractionError("LLM response missing or invalid 'response_text' field");
    }

    return {
      extracted: isRecord(parsed.extracted_fields) ? parsed.extracted_fields : {},
      corrections: isRecord(parsed.corrections) ? parsed.corrections : {},
      confidence: isRecord(parsed.confidence) ? parsed.confidence : {},
      reply: reply.trim(),
    };
  }

  /**
   * Applies the schema, coercion and confidence rules. A correction for a
   * field takes precedence over a plain extraction of the same field; when the
   * correction fails validation the extraction is used instead.
   */
  private filterProposals(raw: RawExtraction): ExtractionResult {
    const proposals = new Map<string, FieldProposal>();
    const discarded = new Set<string>();
    const names = new Set([...Object.keys(raw.extracted), ...Object.keys(raw.corrections)]);

    for (const name of names) {
      const candidates = [
        { value: raw.corrections[name], isCorrection: true },
        { value: raw.extracted[name], isCorrection: false },
      ].filter((c) => c.value !== undefined && c.value !== null);
      if (candidates.length === 0) continue;

      if (!this.registry.hasField(name)) {
        this.logger.debug(`Dropping proposal for unknown field "${name}"`);
        discarded.add(name);
        continue;
      }

      const def = this.registry.getField(name);
      let accepted: { value: FieldValue; isCorrection: boolean } | null = null;
      for (const candidate of candidates) {
        const coerced = coerceFieldValue(def, candidate.value);
        if (coerced !== null) {
          accepted = { value: coerced, isCorrection: candidate.isCorrection };
          break;
        }
        this.logger.debug(
          `Dropping ${candidate.isCorrection ? "correction" : "extraction"} for "${name}": value failed validation`,
        );
      }
      if (accepted === null) {
        discarded.add(name);
        continue;
      }

      const confidence = clampConfidence(
        raw.confidence[name],
        accepted.isCorrection ? DEFAULT_CORRECTION_CONFIDENCE : DEFAULT_EXTRACTION_CONFIDENCE,
      );
      if (confidence < this.confidenceThreshold) {
        this.logger.debug(`Dropping proposal for "${name}": confidence ${confidence} below ${this.confidenceThreshold}`);
        discarded.add(name);
        continue;
      }

      proposals.set(name, { value: accepted.value, confidence });
    }

    return { proposals, reply: raw.reply, discarded: [...discarded].sort() };
  }
}
