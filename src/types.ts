// Voice Assistant - Shared TypeScript interfaces and types

// ─── Conversation ───────────────────────────────────────────────────────────────

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
}

export interface SessionInfo {
  sessionId: string;
  turnCount: number;
  createdAt: Date | null;
  lastActivityAt: Date | null;
}

// ─── Exchange ───────────────────────────────────────────────────────────────────

export type ErrorKind = "stt_failure" | "llm_failure" | "tts_failure" | "config_failure";

/**
 * Outcome of one voice turn. Text fields are empty strings when the stage that
 * produces them did not run or failed; `errorKind` is null on full success.
 */
export interface ExchangeResult {
  sessionId: string;
  transcription: string;
  replyText: string;
  audioUrl: string;
  turnCount: number;
  errorKind: ErrorKind | null;
}

export interface ExchangeOptions {
  /** MIME type of the recorded audio. Defaults to "audio/webm". */
  mimeType?: string;
}

// ─── Capabilities ───────────────────────────────────────────────────────────────

export type StageOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export interface Transcriber {
  isConfigured(): boolean;
  transcribe(audio: Buffer, mimeType: string): Promise<StageOutcome<string>>;
}

export interface ReplyGenerator {
  isConfigured(): boolean;
  generate(prompt: string, history: readonly ConversationTurn[]): Promise<StageOutcome<string>>;
}

export interface SpeechSynthesizer {
  isConfigured(): boolean;
  /** Longest input the provider accepts; callers cutting text must stay within it. */
  readonly maxInputChars?: number;
  /** Returns the URL the synthesized audio can be fetched from. */
  synthesize(text: string): Promise<StageOutcome<string>>;
}

// ─── Audio clips ────────────────────────────────────────────────────────────────

export interface AudioClip {
  id: string;
  data: Buffer;
  mimeType: string;
  createdAt: Date;
}
