// TTS Engine: converts the assistant's reply to spoken audio via the OpenAI
// speech API and publishes it as a clip the browser can fetch.
//
// Length enforcement: the speech endpoint rejects long input, so text over
// `maxChars` is truncated (never rejected) before the call.

import type { AudioClipStore } from "./audio-clip-store.js";
import type { SpeechSynthesizer, StageOutcome } from "./types.js";
import { errorMessage, truncateForSynthesis } from "./utils.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

/** OpenAI's documented input limit for audio.speech. */
export const OPENAI_SPEECH_MAX_CHARS = 4096;

const AUDIO_MIME_TYPE = "audio/mpeg";

// ─── OpenAI TTS client interface (for testability / dependency injection) ────────

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: {
        model: string;
        voice: string;
        input: string;
        speed?: number;
        response_format?: "mp3";
      }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

export interface TTSEngineOptions {
  model?: string;
  voice?: string;
  speed?: number;
  maxChars?: number;
  /** Path prefix the HTTP layer serves clips under. */
  audioUrlPrefix?: string;
}

export interface VoiceOverrides {
  voice?: string;
  speed?: number;
}

export class TTSEngine implements SpeechSynthesizer {
  private readonly openai: OpenAITTSClient | null;
  private readonly clips: AudioClipStore;
  private readonly model: string;
  private readonly voice: string;
  private readonly speed: number;
  private readonly maxChars: number;
  private readonly audioUrlPrefix: string;

  constructor(openaiClient: OpenAITTSClient | null, clips: AudioClipStore, options: TTSEngineOptions = {}) {
    this.openai = openaiClient;
    this.clips = clips;
    this.model = options.model ?? "tts-1";
    this.voice = options.voice ?? "nova";
    this.speed = options.speed ?? 1.0;
    this.maxChars = options.maxChars ?? OPENAI_SPEECH_MAX_CHARS;
    this.audioUrlPrefix = options.audioUrlPrefix ?? "/audio";
  }

  isConfigured(): boolean {
    return this.openai !== null;
  }

  get maxInputChars(): number {
    return this.maxChars;
  }

  /**
   * Synthesize text and store the audio as a clip.
   * @returns The clip URL, e.g. "/audio/3f0c…".
   */
  async synthesize(text: string, overrides: VoiceOverrides = {}): Promise<StageOutcome<string>> {
    if (!this.openai) {
      return { ok: false, error: "Text-to-speech is not configured" };
    }
    if (text.trim().length === 0) {
      return { ok: false, error: "Nothing to synthesize" };
    }

    const input = truncateForSynthesis(text, this.maxChars);

    try {
      const response = await this.openai.audio.speech.create({
        model: this.model,
        voice: overrides.voice ?? this.voice,
        input,
        speed: overrides.speed ?? this.speed,
        response_format: "mp3",
      });

      const audio = Buffer.from(await response.arrayBuffer());
      if (audio.length === 0) {
        return { ok: false, error: "TTS returned no audio" };
      }

      const clip = this.clips.put(audio, AUDIO_MIME_TYPE);
      return { ok: true, value: `${this.audioUrlPrefix}/${clip.id}` };
    } catch (err) {
      return { ok: false, error: `TTS generation failed: ${errorMessage(err)}` };
    }
  }
}
