// Voice Assistant - Transcription Engine
// Turns one recorded utterance into text. Two backends:
//   1. Deepgram prerecorded transcription (default)
//   2. OpenAI audio transcription (gpt-4o-transcribe or whisper-1)
//
// Privacy: audio is sent to the selected vendor in-memory only, never written to disk.

import type { SttProvider } from "./config.js";
import type { StageOutcome, Transcriber } from "./types.js";
import { errorMessage } from "./utils.js";

// ─── Vendor client interfaces (for testability / dependency injection) ─────────

/**
 * Minimal interface for the Deepgram prerecorded API surface we use.
 * Mirrors `listen.prerecorded.transcribeFile()` from @deepgram/sdk, which
 * resolves to `{ result, error }` instead of throwing on vendor errors.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options?: {
          model?: string;
          language?: string;
          smart_format?: boolean;
          punctuate?: boolean;
        },
      ): Promise<DeepgramPrerecordedResponse>;
    };
  };
}

export interface DeepgramPrerecordedResponse {
  result: {
    results: {
      channels: Array<{
        alternatives: Array<{
          transcript: string;
          confidence: number;
        }>;
      }>;
    };
  } | null;
  error: { message: string } | null;
}

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Only the `json` response format is requested, so the response is text only.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        language?: string;
        response_format?: "json";
      }): Promise<{ text: string }>;
    };
  };
}

export interface TranscriptionEngineOptions {
  provider?: SttProvider;
  /** Vendor model. Defaults to nova-2 (Deepgram) or gpt-4o-transcribe (OpenAI). */
  model?: string;
  language?: string;
}

/** File extensions OpenAI uses to detect the container format. */
const EXTENSIONS_BY_MIME: Record<string, string> = {
  "audio/webm": "webm",
  "audio/ogg": "ogg",
  "audio/wav": "wav",
  "audio/wave": "wav",
  "audio/x-wav": "wav",
  "audio/mpeg": "mp3",
  "audio/mp3": "mp3",
  "audio/mp4": "m4a",
  "audio/x-m4a": "m4a",
  "audio/flac": "flac",
};

export function fileNameForMimeType(mimeType: string): string {
  const base = mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
  return `speech.${EXTENSIONS_BY_MIME[base] ?? "webm"}`;
}

/**
 * TranscriptionEngine wraps whichever vendor is selected. Both clients are
 * injected; the one not selected may be null.
 *
 * Vendor errors and empty transcripts come back as `{ ok: false }` outcomes,
 * never as thrown errors.
 */
export class TranscriptionEngine implements Transcriber {
  private readonly deepgramClient: DeepgramPrerecordedClient | null;
  private readonly openaiClient: OpenAITranscriptionClient | null;
  private readonly provider: SttProvider;
  private readonly model: string;
  private readonly language: string;

  constructor(
    deepgramClient: DeepgramPrerecordedClient | null,
    openaiClient?: OpenAITranscriptionClient | null,
    options: TranscriptionEngineOptions = {},
  ) {
    this.deepgramClient = deepgramClient;
    this.openaiClient = openaiClient ?? null;
    this.provider = options.provider ?? "deepgram";
    this.model = options.model ?? (this.provider === "deepgram" ? "nova-2" : "gpt-4o-transcribe");
    this.language = options.language ?? "en";
  }

  get providerName(): SttProvider {
    return this.provider;
  }

  isConfigured(): boolean {
    return this.provider === "deepgram" ? this.deepgramClient !== null : this.openaiClient !== null;
  }

  async transcribe(audio: Buffer, mimeType = "audio/webm"): Promise<StageOutcome<string>> {
    if (!this.isConfigured()) {
      return { ok: false, error: `Speech-to-text provider "${this.provider}" is not configured` };
    }
    if (audio.length === 0) {
      return { ok: false, error: "Audio input is empty" };
    }

    let text: string;
    try {
      text =
        this.provider === "deepgram"
          ? await this.transcribeWithDeepgram(audio)
          : await this.transcribeWithOpenAI(audio, mimeType);
    } catch (err) {
      return { ok: false, error: `Transcription failed: ${errorMessage(err)}` };
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return { ok: false, error: "Transcription is empty (no intelligible speech)" };
    }
    return { ok: true, value: trimmed };
  }

  // ── Backends ───────────────────────────────────────────────────────────────

  private async transcribeWithDeepgram(audio: Buffer): Promise<string> {
    if (!this.deepgramClient) {
      throw new Error("No Deepgram client configured");
    }

    const { result, error } = await this.deepgramClient.listen.prerecorded.transcribeFile(audio, {
      model: this.model,
      language: this.language,
      smart_format: true,
      punctuate: true,
    });

    if (error) {
      throw new Error(error.message);
    }
    // Deepgram returns one channel per input channel; recordings are mono.
    return result?.results.channels[0]?.alternatives[0]?.transcript ?? "";
  }

  private async transcribeWithOpenAI(audio: Buffer, mimeType: string): Promise<string> {
    if (!this.openaiClient) {
      throw new Error("No OpenAI client configured");
    }

    // Copy into a standalone Uint8Array; Buffers can share a pooled ArrayBuffer.
    const audioFile = new File([new Uint8Array(audio)], fileNameForMimeType(mimeType), { type: mimeType });

    const response = await this.openaiClient.audio.transcriptions.create({
      file: audioFile,
      model: this.model,
      language: this.language,
      response_format: "json",
    });
    return response.text;
  }
}
