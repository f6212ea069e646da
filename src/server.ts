// Voice Assistant - Express Server
// HTTP surface over the ExchangePipeline: voice turns, session reset, the
// single-stage transcription and speech endpoints, and synthesized clip delivery.
//
// Uploads are held in memory (multer memory storage) and dropped after the
// request; nothing is written to disk.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { z } from "zod";
import type { AudioClipStore } from "./audio-clip-store.js";
import { APP_VERSION, type ApiKeyStatus } from "./config.js";
import type { ExchangePipeline } from "./exchange-pipeline.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { TTSEngine } from "./tts-engine.js";
import type { ErrorKind, ExchangeResult, Transcriber } from "./types.js";
import { errorMessage, isValidSessionId } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export type ResponseErrorKind = ErrorKind | "general_failure";

/** What the client says or shows when a turn fails. */
export const FALLBACK_MESSAGES: Readonly<Record<ResponseErrorKind, string>> = {
  stt_failure: "I'm having trouble understanding your voice right now. Please try again.",
  llm_failure: "I'm having trouble processing your request. Please try again.",
  tts_failure: "I'm having trouble speaking right now. Please try again.",
  config_failure: "I'm not properly configured. Please check the server setup.",
  general_failure: "I'm experiencing technical difficulties. Please try again later.",
};

const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const TtsRequestSchema = z.object({
  text: z.string().trim().min(1, "text must not be empty"),
  voice: z.string().trim().min(1).optional(),
  speed: z.number().min(0.25).max(4).optional(),
});

// ─── Response shapes ────────────────────────────────────────────────────────────

export interface ExchangeResponse {
  sessionId: string;
  transcription: string;
  replyText: string;
  audioUrl: string;
  turnCount: number;
  errorKind: ResponseErrorKind | null;
  success: boolean;
  /** Fallback line for the user when the turn failed, otherwise null. */
  message: string | null;
}

export function toExchangeResponse(result: ExchangeResult): ExchangeResponse {
  return {
    ...result,
    success: result.errorKind === null,
    message: result.errorKind ? FALLBACK_MESSAGES[result.errorKind] : null,
  };
}

function generalFailure(sessionId: string, turnCount: number): ExchangeResponse {
  return {
    sessionId,
    transcription: "",
    replyText: "",
    audioUrl: "",
    turnCount,
    errorKind: "general_failure",
    success: false,
    message: FALLBACK_MESSAGES.general_failure,
  };
}

function rejectSessionId(res: Response): void {
  res.status(400).json({
    error: "invalid_session_id",
    message: "Session id must be 1-128 characters of A-Z, a-z, 0-9, _ or -",
  });
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  pipeline: ExchangePipeline;
  clips: AudioClipStore;
  /** Backs POST /transcribe/file. */
  transcriber: Transcriber;
  /** Backs POST /tts. */
  speech: Pick<TTSEngine, "isConfigured" | "synthesize">;
  /** Reported by GET /health. */
  apiKeyStatus: ApiKeyStatus;
  maxUploadBytes?: number;
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening. Call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    pipeline,
    clips,
    transcriber,
    speech,
    apiKeyStatus,
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });

  app.use(express.static(staticDir));
  app.use(express.json());

  // ── GET /health ────────────────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      apiKeysConfigured: apiKeyStatus,
      sessions: pipeline.activeSessions(),
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    });
  });

  // ── Conversational agent ───────────────────────────────────────────────────
  app.post("/agent/chat/:sessionId", upload.single("file"), async (req, res) => {
    const { sessionId } = req.params;
    if (!isValidSessionId(sessionId)) {
      rejectSessionId(res);
      return;
    }
    if (!req.file) {
      res.status(400).json({ error: "missing_file", message: "Expected an audio upload in field 'file'" });
      return;
    }

    try {
      const result = await pipeline.run(sessionId, req.file.buffer, { mimeType: req.file.mimetype });
      res.json(toExchangeResponse(result));
    } catch (err) {
      logger.error(`Agent chat error for session ${sessionId}: ${errorMessage(err)}`);
      res.status(500).json(generalFailure(sessionId, pipeline.getTurnCount(sessionId)));
    }
  });

  app.get("/agent/chat/:sessionId", (req, res) => {
    const { sessionId } = req.params;
    if (!isValidSessionId(sessionId)) {
      rejectSessionId(res);
      return;
    }
    res.json(pipeline.getSessionInfo(sessionId));
  });

  app.delete("/agent/chat/:sessionId", (req, res) => {
    const { sessionId } = req.params;
    if (!isValidSessionId(sessionId)) {
      rejectSessionId(res);
      return;
    }
    pipeline.clearSession(sessionId);
    res.json({ message: `Session ${sessionId} cleared` });
  });

  // ── Stateless query and echo ───────────────────────────────────────────────
  app.post("/llm/query", upload.single("file"), async (req, res) => {
    if (!req.file) {
      res.status(400).json({ error: "missing_file", message: "Expected an audio upload in field 'file'" });
      return;
    }
    try {
      const result = await pipeline.runStateless(req.file.buffer, { mimeType: req.file.mimetype });
      res.json(toExchangeResponse(result));
    } catch (err) {
      logger.error(`Query error: ${errorMessage(err)}`);
      res.status(500).json(generalFailure("", 0));
    }
  });

  app.post("/tts/echo", upload.single("file"), async (req, res) => {
    if (!req.file) {
      res.status(400).json({ error: "missing_file", message: "Expected an audio upload in field 'file'" });
      return;
    }
    try {
      const result = await pipeline.runEcho(req.file.buffer, { mimeType: req.file.mimetype });
      res.json(toExchangeResponse(result));
    } catch (err) {
      logger.error(`Echo error: ${errorMessage(err)}`);
      res.status(500).json(generalFailure("", 0));
    }
  });

  // ── Single-stage endpoints ─────────────────────────────────────────────────
  app.post("/transcribe/file", upload.single("file"), async (req, res) => {
    if (!transcriber.isConfigured()) {
      res.status(503).json({ error: "stt_not_configured", message: "Speech-to-text service not configured" });
      return;
    }
    if (!req.file) {
      res.status(400).json({ error: "missing_file", message: "Expected an audio upload in field 'file'" });
      return;
    }

    try {
      const outcome = await transcriber.transcribe(req.file.buffer, req.file.mimetype);
      if (!outcome.ok) {
        logger.error(`Transcription endpoint error: ${outcome.error}`);
        res.status(500).json({ transcription: "", success: false, error: outcome.error });
        return;
      }
      res.json({ transcription: outcome.value, success: true });
    } catch (err) {
      logger.error(`Transcription endpoint error: ${errorMessage(err)}`);
      res.status(500).json(generalFailure("", 0));
    }
  });

  app.post("/tts", async (req, res) => {
    if (!speech.isConfigured()) {
      res.status(503).json({ error: "tts_not_configured", message: "Text-to-speech service not configured" });
      return;
    }

    const parsed = TtsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "invalid_request",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
      });
      return;
    }

    const { text, voice, speed } = parsed.data;
    try {
      const outcome = await speech.synthesize(text, { voice, speed });
      if (!outcome.ok) {
        logger.error(`TTS endpoint error: ${outcome.error}`);
        res.status(500).json({ audioUrl: "", success: false, error: outcome.error });
        return;
      }
      res.json({ audioUrl: outcome.value, success: true });
    } catch (err) {
      logger.error(`TTS endpoint error: ${errorMessage(err)}`);
      res.status(500).json(generalFailure("", 0));
    }
  });

  // ── Synthesized clips ──────────────────────────────────────────────────────
  app.get("/audio/:clipId", (req, res) => {
    const clip = clips.get(req.params.clipId);
    if (!clip) {
      res.status(404).json({ error: "not_found", message: "Audio clip not found or expired" });
      return;
    }
    res.setHeader("Cache-Control", "private, max-age=3600");
    res.type(clip.mimeType).send(clip.data);
  });

  // ── Error mapping (upload limits, malformed JSON) ──────────────────────────
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        res.status(413).json({ error: "file_too_large", message: `File size exceeds ${maxUploadBytes} bytes` });
        return;
      }
      res.status(400).json({ error: "upload_error", message: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json", message: "Request body is not valid JSON" });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    next(err);
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
