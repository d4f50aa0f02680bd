// Doctor Voice Onboarding - Entry point
// Wires up the engine dependencies and starts the server.

import "dotenv/config";
import { Redis } from "ioredis";
import OpenAI from "openai";
import { loadConfig, sessionLockTtlMs, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { ExpirySweeper } from "./expiry-sweeper.js";
import { loadFieldRegistry } from "./field-registry.js";
import { setLogLevel } from "./logger.js";
import { FileProfileGateway } from "./profile-persistence.js";
import { RedisSessionStore, type RedisLike } from "./redis-session-store.js";
import { createAppServer } from "./server.js";
import { InMemorySessionStore, type SessionStore } from "./session-store.js";
import { TranscriptExtractor, type OpenAIClient } from "./transcript-extractor.js";
import { VoiceSessionEngine } from "./voice-session-engine.js";

export const APP_NAME = "Doctor Voice Onboarding";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logWarn = (msg: string) => console.warn(`[WARN] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

function createSessionStore(config: AppConfig): SessionStore {
  if (config.sessionStore === "redis" && config.redisUrl) {
    logInit("Connecting session store to Redis...");
    const redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 3 });
    return new RedisSessionStore(redis as unknown as RedisLike, { lockTtlMs: sessionLockTtlMs(config) });
  }

  if (config.nodeEnv === "production") {
    logWarn(
      "SESSION_STORE=memory keeps sessions inside this process. Run a single " +
      "instance or set SESSION_STORE=redis; otherwise sessions are lost between replicas.",
    );
  }
  logInit("Using in-memory session store");
  return new InMemorySessionStore();
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logInit("Configuration loaded");

  // ─── Field schema ──────────────────────────────────────────────────────────

  const registry = config.fieldSchemaPath
    ? await loadFieldRegistry(config.fieldSchemaPath)
    : await loadFieldRegistry();
  logInit(`Loaded ${registry.listFields().length} field definitions (${registry.requiredFields().length} required)`);

  // ─── Engine dependencies ───────────────────────────────────────────────────

  logInit(`Creating OpenAI client (model ${config.openaiModel})...`);
  const openaiClient = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.openaiTimeoutSeconds * 1000,
    maxRetries: config.openaiMaxRetries,
  });

  const extractor = new TranscriptExtractor(openaiClient as unknown as OpenAIClient, registry, {
    model: config.openaiModel,
    confidenceThreshold: config.confidenceThreshold,
  });

  const store = createSessionStore(config);

  logInit(`Initializing FileProfileGateway (${config.profileOutputDir}/)...`);
  const gateway = new FileProfileGateway(config.profileOutputDir);

  const engine = new VoiceSessionEngine({
    registry,
    extractor,
    store,
    gateway,
    sessionTimeoutMinutes: config.sessionTtlMinutes,
  });

  const sweeper = new ExpirySweeper(engine, { intervalMs: config.sweepIntervalSeconds * 1000 });
  sweeper.start();

  // ─── Start server ──────────────────────────────────────────────────────────

  const server = createAppServer({ engine });
  const port = await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down...`);
    sweeper.stop();
    server
      .close()
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logFatal(err.message);
  } else {
    logFatal(`Startup failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  }
  process.exit(1);
});
