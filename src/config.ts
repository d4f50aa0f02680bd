// Doctor Voice Onboarding - Configuration
// Reads the process environment (after dotenv has populated it) into a typed
// AppConfig. Anything malformed raises ConfigError; the entry point turns that
// into a fatal log line and exit code 1.

import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type SessionStoreKind = "memory" | "redis";

export interface AppConfig {
  port: number;
  openaiApiKey: string;
  openaiModel: string;
  /** Per-request deadline for a completion; the SDK default is 10 minutes. */
  openaiTimeoutSeconds: number;
  openaiMaxRetries: number;
  sessionStore: SessionStoreKind;
  redisUrl: string | null;
  sessionTtlMinutes: number;
  confidenceThreshold: number;
  sweepIntervalSeconds: number;
  /** Field schema JSON; null means the bundled config/fields.json. */
  fieldSchemaPath: string | null;
  profileOutputDir: string;
  logLevel: LogLevel;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function positiveNumber(env: Env, name: string, fallback: number, integer: boolean): number {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`${name} must be a positive ${integer ? "integer" : "number"}, got "${raw}"`);
  }
  return value;
}

function nonNegativeInteger(env: Env, name: string, fallback: number): number {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/** Slack added on top of the worst-case extraction time when sizing the Redis lock. */
const LOCK_HEADROOM_MS = 10_000;

/**
 * Redis lock TTL that outlasts one extraction, retries included, so the lock
 * cannot lapse while a turn is still waiting on the model.
 */
export function sessionLockTtlMs(config: Pick<AppConfig, "openaiTimeoutSeconds" | "openaiMaxRetries">): number {
  return config.openaiTimeoutSeconds * 1000 * (config.openaiMaxRetries + 1) + LOCK_HEADROOM_MS;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const openaiApiKey = read(env, "OPENAI_API_KEY");
  if (!openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is not set. Add it to your .env file.");
  }

  const port = positiveNumber(env, "PORT", 3000, true);
  if (port > 65535) {
    throw new ConfigError(`PORT must be at most 65535, got ${port}`);
  }

  const storeRaw = (read(env, "SESSION_STORE") ?? "memory").toLowerCase();
  if (storeRaw !== "memory" && storeRaw !== "redis") {
    throw new ConfigError(`SESSION_STORE must be "memory" or "redis", got "${storeRaw}"`);
  }
  const redisUrl = read(env, "REDIS_URL") ?? null;
  if (storeRaw === "redis" && redisUrl === null) {
    throw new ConfigError("REDIS_URL is required when SESSION_STORE=redis");
  }

  const thresholdRaw = read(env, "CONFIDENCE_THRESHOLD");
  let confidenceThreshold = 0.5;
  if (thresholdRaw !== undefined) {
    confidenceThreshold = Number(thresholdRaw);
    if (!Number.isFinite(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
      throw new ConfigError(`CONFIDENCE_THRESHOLD must be between 0 and 1, got "${thresholdRaw}"`);
    }
  }

  const levelRaw = (read(env, "LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(levelRaw)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error; got "${levelRaw}"`);
  }

  return {
    port,
    openaiApiKey,
    openaiModel: read(env, "OPENAI_MODEL") ?? "gpt-4o-mini",
    openaiTimeoutSeconds: positiveNumber(env, "OPENAI_TIMEOUT_SECONDS", 20, false),
    openaiMaxRetries: nonNegativeInteger(env, "OPENAI_MAX_RETRIES", 1),
    sessionStore: storeRaw,
    redisUrl,
    sessionTtlMinutes: positiveNumber(env, "SESSION_TTL_MINUTES", 30, false),
    confidenceThreshold,
    sweepIntervalSeconds: positiveNumber(env, "SWEEP_INTERVAL_SECONDS", 60, false),
    fieldSchemaPath: read(env, "FIELD_SCHEMA_PATH") ?? null,
    profileOutputDir: read(env, "PROFILE_OUTPUT_DIR") ?? "output",
    logLevel: levelRaw,
    nodeEnv: read(env, "NODE_ENV") ?? "development",
  };
}
