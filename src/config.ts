// Voice Assistant - Configuration
// Reads the process environment (populated from .env by the entry point) into a
// typed, frozen AppConfig. Missing API keys are allowed: the server still boots
// and exchanges report config_failure until the keys are set.

import { z } from "zod";

export const APP_NAME = "AI Voice Assistant";
export const APP_VERSION = "1.0.0";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a friendly voice assistant. Answer conversationally, in plain sentences " +
  "that sound natural when read aloud. Do not use markdown, lists or emoji.";

// ─── Types ──────────────────────────────────────────────────────────────────────

export type SttProvider = "deepgram" | "openai";

export interface AppConfig {
  port: number;
  openaiApiKey: string | null;
  deepgramApiKey: string | null;
  sttProvider: SttProvider;
  sttModel: string;
  llmModel: string;
  systemPrompt: string;
  ttsModel: string;
  ttsVoice: string;
  ttsSpeed: number;
  /** Sliding-window bound on stored turns per session. */
  maxHistoryTurns: number;
  /** Text longer than this is truncated before synthesis. */
  maxSynthesisChars: number;
  maxUploadBytes: number;
  audioClipLimit: number;
}

export interface ApiKeyStatus {
  deepgram: boolean;
  openai: boolean;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ─── Env schema ─────────────────────────────────────────────────────────────────

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
};

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const stringWithDefault = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().trim().default(fallback));

const intFromEnv = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const EnvSchema = z.object({
  PORT: intFromEnv(3000, 1, 65535),
  OPENAI_API_KEY: optionalString,
  DEEPGRAM_API_KEY: optionalString,
  STT_PROVIDER: z.preprocess(emptyToUndefined, z.enum(["deepgram", "openai"]).default("deepgram")),
  STT_MODEL: optionalString,
  LLM_MODEL: stringWithDefault("gpt-4o-mini"),
  SYSTEM_PROMPT: optionalString,
  TTS_MODEL: stringWithDefault("tts-1"),
  TTS_VOICE: stringWithDefault("nova"),
  TTS_SPEED: z.preprocess(emptyToUndefined, z.coerce.number().min(0.25).max(4).default(1)),
  MAX_HISTORY_TURNS: intFromEnv(50, 2),
  MAX_SYNTHESIS_CHARS: intFromEnv(4096, 4),
  MAX_UPLOAD_BYTES: intFromEnv(50 * 1024 * 1024, 1),
  AUDIO_CLIP_LIMIT: intFromEnv(100, 1),
});

const DEFAULT_STT_MODELS: Record<SttProvider, string> = {
  deepgram: "nova-2",
  openai: "gpt-4o-transcribe",
};

// ─── Loading ────────────────────────────────────────────────────────────────────

/**
 * Validates the environment and returns the application configuration.
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    openaiApiKey: e.OPENAI_API_KEY ?? null,
    deepgramApiKey: e.DEEPGRAM_API_KEY ?? null,
    sttProvider: e.STT_PROVIDER,
    sttModel: e.STT_MODEL ?? DEFAULT_STT_MODELS[e.STT_PROVIDER],
    llmModel: e.LLM_MODEL,
    systemPrompt: e.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    ttsModel: e.TTS_MODEL,
    ttsVoice: e.TTS_VOICE,
    ttsSpeed: e.TTS_SPEED,
    maxHistoryTurns: e.MAX_HISTORY_TURNS,
    maxSynthesisChars: e.MAX_SYNTHESIS_CHARS,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    audioClipLimit: e.AUDIO_CLIP_LIMIT,
  });
}

export function getApiKeyStatus(config: AppConfig): ApiKeyStatus {
  return {
    deepgram: config.deepgramApiKey !== null,
    openai: config.openaiApiKey !== null,
  };
}

/** True when every key the selected providers need is present. */
export function allApisConfigured(config: AppConfig): boolean {
  const status = getApiKeyStatus(config);
  if (!status.openai) return false;
  return config.sttProvider === "openai" || status.deepgram;
}
