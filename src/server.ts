// Doctor Voice Onboarding - Express HTTP server
//
// Routes (JSON in, JSON out):
//   GET    /health
//   POST   /api/v1/voice/start                  { language? }
//   POST   /api/v1/voice/chat                   { sessionId, transcript }
//   GET    /api/v1/voice/session/:id
//   POST   /api/v1/voice/session/:id/finalize
//   DELETE /api/v1/voice/session/:id
//
// Errors render as { error: { code, message, details? } } with the status the
// error class carries. Authorization is the caller's job; any holder of a
// session id may drive that session.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { InvalidRequestError, InvalidTranscriptError, VoiceOnboardingError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { VoiceSessionEngine } from "./voice-session-engine.js";

export const API_PREFIX = "/api/v1/voice";

/** Upper bound on JSON request bodies. */
const MAX_BODY_SIZE = "64kb";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  engine: VoiceSessionEngine;
  /** Custom logger. Defaults to the console logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port (0 picks a free one). Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Stops accepting connections and waits for in-flight requests to finish. */
  close(): Promise<void>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises to the error middleware on its own. */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/** Shape of the errors express.json() passes to next(): a 4xx status and a type tag. */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err && typeof err.type === "string" &&
    "status" in err && typeof err.status === "number" &&
    err.status >= 400 && err.status < 500
  );
}

function bodyErrorMessage(err: BodyParserError): string {
  switch (err.type) {
    case "entity.parse.failed":
      return "Request body is not valid JSON";
    case "entity.too.large":
      return `Request body exceeds ${MAX_BODY_SIZE}`;
    default:
      return "Request body could not be read";
  }
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && !Array.isArray(body)) {
    return { ...body };
  }
  return {};
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidRequestError(`"${key}" must be a non-empty string`);
  }
  return value;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { engine, logger = createLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const api = express.Router();

  api.post("/start", route(async (req, res) => {
    const raw = bodyOf(req).language;
    let language: string | undefined;
    if (typeof raw === "string") {
      language = raw;
    } else if (raw !== undefined) {
      throw new InvalidRequestError('"language" must be a string');
    }
    const result = await engine.start(language);
    res.status(201).json(result);
  }));

  api.post("/chat", route(async (req, res) => {
    const body = bodyOf(req);
    const sessionId = requireString(body, "sessionId");
    const transcript = body.transcript;
    if (typeof transcript !== "string") {
      throw new InvalidTranscriptError('"transcript" must be a string');
    }
    res.json(await engine.chat(sessionId, transcript));
  }));

  api.get("/session/:id", route(async (req, res) => {
    res.json(await engine.getStatus(req.params.id));
  }));

  api.post("/session/:id/finalize", route(async (req, res) => {
    res.json(await engine.finalize(req.params.id));
  }));

  api.delete("/session/:id", route(async (req, res) => {
    await engine.cancel(req.params.id);
    res.status(204).end();
  }));

  app.use(API_PREFIX, api);

  app.use((_req, res) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: "Route not found" } });
  });

  // Express recognizes error middleware by its four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof VoiceOnboardingError) {
      if (err.httpStatus >= 500) {
        logger.error(`${err.code}: ${err.message}`);
      }
      const details = err.details();
      res.status(err.httpStatus).json({
        error: { code: err.code, message: err.message, ...(details ? { details } : {}) },
      });
      return;
    }
    if (isBodyParserError(err)) {
      res.status(err.status).json({ error: { code: "INVALID_REQUEST", message: bodyErrorMessage(err) } });
      return;
    }
    logger.error("Unhandled request error", err instanceof Error ? err.stack : err);
    res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });

  return {
    app,
    httpServer,

    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Listening on port ${boundPort}`);
          resolve(boundPort);
        });
      });
    },

    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        // Idle keep-alive sockets would otherwise hold close() open.
        httpServer.closeIdleConnections();
      });
    },
  };
}
