// Voice Assistant - Exchange Pipeline
// Central orchestrator for one voice turn:
//
//   audio → transcribe → generate (with session history) → synthesize → commit
//
// Each stage consumes the previous stage's output, so stages never overlap
// within an exchange. Exchanges for one session are serialized through
// SessionStore.runExclusive(); different sessions run concurrently.
//
// Failure policy: every stage failure maps to a stable ErrorKind and the
// pipeline always returns a well-formed ExchangeResult. Outputs obtained before
// the failing stage are kept. A synthesis failure is a degraded success: the
// turn is still committed to history.

import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import type { SessionStore } from "./session-store.js";
import type {
  ConversationTurn,
  ErrorKind,
  ExchangeOptions,
  ExchangeResult,
  ReplyGenerator,
  SessionInfo,
  SpeechSynthesizer,
  StageOutcome,
  Transcriber,
} from "./types.js";
import { errorMessage, preview, truncateForSynthesis } from "./utils.js";

const DEFAULT_MIME_TYPE = "audio/webm";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface ExchangePipelineDeps {
  store: SessionStore;
  transcriber: Transcriber;
  generator: ReplyGenerator;
  synthesizer: SpeechSynthesizer;
  /**
   * Reply text beyond this many characters is truncated before synthesis.
   * Clamped to the synthesizer's `maxInputChars` so the provider never cuts again.
   */
  maxSynthesisChars?: number;
  logger?: Logger;
}

/** How a conversational run reads and writes history. */
interface HistoryBinding {
  read(): readonly ConversationTurn[];
  commit(userText: string, replyText: string): number;
  turnCount(): number;
}

const STATELESS: HistoryBinding = {
  read: () => [],
  commit: () => 0,
  turnCount: () => 0,
};

/** Converts an unexpected throw from a capability into a failed outcome. */
async function settle<T>(stage: () => Promise<StageOutcome<T>>): Promise<StageOutcome<T>> {
  try {
    return await stage();
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

export class ExchangePipeline {
  private readonly store: SessionStore;
  private readonly transcriber: Transcriber;
  private readonly generator: ReplyGenerator;
  private readonly synthesizer: SpeechSynthesizer;
  private readonly maxSynthesisChars: number;
  private readonly logger: Logger;

  constructor(deps: ExchangePipelineDeps) {
    this.store = deps.store;
    this.transcriber = deps.transcriber;
    this.generator = deps.generator;
    this.synthesizer = deps.synthesizer;
    this.maxSynthesisChars = Math.min(
      deps.maxSynthesisChars ?? 4096,
      deps.synthesizer.maxInputChars ?? Number.POSITIVE_INFINITY,
    );
    this.logger = deps.logger ?? createConsoleLogger("ExchangePipeline");
  }

  // ── Public operations ──────────────────────────────────────────────────────

  /**
   * Runs one voice turn for a session: the transcription and reply are
   * appended to the session's history once both succeed.
   */
  run(sessionId: string, audio: Buffer, options: ExchangeOptions = {}): Promise<ExchangeResult> {
    const binding: HistoryBinding = {
      read: () => this.store.getHistory(sessionId),
      commit: (userText, replyText) => this.store.append(sessionId, userText, replyText),
      turnCount: () => this.store.turnCount(sessionId),
    };

    return this.store.runExclusive(sessionId, () =>
      this.converse(sessionId, audio, options.mimeType ?? DEFAULT_MIME_TYPE, binding),
    );
  }

  /** One-shot turn with no history: nothing is read or committed. */
  runStateless(audio: Buffer, options: ExchangeOptions = {}): Promise<ExchangeResult> {
    return this.converse("", audio, options.mimeType ?? DEFAULT_MIME_TYPE, STATELESS);
  }

  /**
   * Transcribes the audio and speaks the transcription back, skipping the
   * language model. `replyText` carries the echoed text.
   */
  async runEcho(audio: Buffer, options: ExchangeOptions = {}): Promise<ExchangeResult> {
    const result = this.emptyResult("", 0);

    if (!this.transcriber.isConfigured() || !this.synthesizer.isConfigured()) {
      return this.fail(result, "config_failure", "Required capabilities are not configured");
    }

    const transcription = await this.transcribe(audio, options.mimeType ?? DEFAULT_MIME_TYPE);
    if (!transcription.ok) {
      return this.fail(result, "stt_failure", transcription.error);
    }
    result.transcription = transcription.value;
    result.replyText = transcription.value;

    const speech = await this.speak(transcription.value);
    if (!speech.ok) {
      return this.fail(result, "tts_failure", speech.error);
    }
    result.audioUrl = speech.value;
    return result;
  }

  clearSession(sessionId: string): void {
    const turns = this.store.turnCount(sessionId);
    this.store.clear(sessionId);
    this.logger.info(`Cleared session ${sessionId} (${turns} turns)`);
  }

  getTurnCount(sessionId: string): number {
    return this.store.turnCount(sessionId);
  }

  getSessionInfo(sessionId: string): SessionInfo {
    return this.store.sessionInfo(sessionId);
  }

  activeSessions(): number {
    return this.store.size();
  }

  // ── Stages ─────────────────────────────────────────────────────────────────

  private async converse(
    sessionId: string,
    audio: Buffer,
    mimeType: string,
    history: HistoryBinding,
  ): Promise<ExchangeResult> {
    const result = this.emptyResult(sessionId, history.turnCount());
    const label = sessionId ? `session ${sessionId}` : "stateless query";

    // Stage 0: every capability must be available before anything runs
    if (!this.allConfigured()) {
      return this.fail(result, "config_failure", `Capabilities not configured for ${label}`);
    }

    // Stage 1: transcribe
    const transcription = await this.transcribe(audio, mimeType);
    if (!transcription.ok) {
      return this.fail(result, "stt_failure", `${label}: ${transcription.error}`);
    }
    result.transcription = transcription.value;
    this.logger.info(`[${label}] Transcribed ${transcription.value.length} chars: "${preview(transcription.value)}"`);

    // Stage 2: generate with the bounded history as context
    const context = history.read();
    const reply = await settle(() => this.generator.generate(transcription.value, context));
    if (!reply.ok) {
      return this.fail(result, "llm_failure", `${label}: ${reply.error}`);
    }
    result.replyText = reply.value;
    this.logger.info(`[${label}] Reply generated (${reply.value.length} chars, ${context.length} turns of context)`);

    // Stage 3: synthesize (failure here does not abort the exchange)
    const speech = await this.speak(reply.value);

    // Stage 4: commit the completed conversational turn
    result.turnCount = history.commit(transcription.value, reply.value);

    if (!speech.ok) {
      return this.fail(result, "tts_failure", `${label}: ${speech.error}`);
    }
    result.audioUrl = speech.value;
    this.logger.info(`[${label}] Exchange complete (${result.turnCount} turns stored)`);
    return result;
  }

  private async transcribe(audio: Buffer, mimeType: string): Promise<StageOutcome<string>> {
    if (audio.length === 0) {
      return { ok: false, error: "Audio input is empty" };
    }
    const outcome = await settle(() => this.transcriber.transcribe(audio, mimeType));
    if (outcome.ok && outcome.value.trim().length === 0) {
      return { ok: false, error: "Transcription is empty" };
    }
    return outcome;
  }

  private speak(text: string): Promise<StageOutcome<string>> {
    const input = truncateForSynthesis(text, this.maxSynthesisChars);
    if (input.length < text.length) {
      this.logger.warn(`Reply truncated from ${text.length} to ${input.length} chars for synthesis`);
    }
    return settle(() => this.synthesizer.synthesize(input));
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private allConfigured(): boolean {
    return (
      this.transcriber.isConfigured() &&
      this.generator.isConfigured() &&
      this.synthesizer.isConfigured()
    );
  }

  private emptyResult(sessionId: string, turnCount: number): ExchangeResult {
    return {
      sessionId,
      transcription: "",
      replyText: "",
      audioUrl: "",
      turnCount,
      errorKind: null,
    };
  }

  private fail(result: ExchangeResult, errorKind: ErrorKind, detail: string): ExchangeResult {
    if (errorKind === "tts_failure") {
      this.logger.warn(`${errorKind}: ${detail}`);
    } else {
      this.logger.error(`${errorKind}: ${detail}`);
    }
    return { ...result, errorKind };
  }
}
