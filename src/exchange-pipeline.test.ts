// Unit tests for ExchangePipeline
// Tests: full exchange, per-stage failures, truncation, ordering, stateless and echo runs

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExchangePipeline } from "./exchange-pipeline.js";
import type { Logger } from "./logger.js";
import { SessionStore } from "./session-store.js";
import type { ReplyGenerator, SpeechSynthesizer, StageOutcome, Transcriber } from "./types.js";

// ─── Mock factories ─────────────────────────────────────────────────────────────

const ok = <T>(value: T): StageOutcome<T> => ({ ok: true, value });
const failed = (error: string): StageOutcome<string> => ({ ok: false, error });

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createMockTranscriber(text = "hello") {
  return {
    isConfigured: vi.fn(() => true),
    transcribe: vi.fn(async (_audio: Buffer, _mimeType: string) => ok(text)),
  } satisfies Transcriber;
}

function createMockGenerator(reply = "hi there") {
  return {
    isConfigured: vi.fn(() => true),
    generate: vi.fn(async (_prompt: string, _history: readonly unknown[]) => ok(reply)),
  } satisfies ReplyGenerator;
}

function createMockSynthesizer(url = "https://audio/1") {
  return {
    isConfigured: vi.fn(() => true),
    synthesize: vi.fn(async (_text: string) => ok(url)),
  } satisfies SpeechSynthesizer;
}

const AUDIO = Buffer.from("fake-audio-bytes");

describe("ExchangePipeline", () => {
  let store: SessionStore;
  let transcriber: ReturnType<typeof createMockTranscriber>;
  let generator: ReturnType<typeof createMockGenerator>;
  let synthesizer: ReturnType<typeof createMockSynthesizer>;
  let pipeline: ExchangePipeline;

  beforeEach(() => {
    store = new SessionStore();
    transcriber = createMockTranscriber();
    generator = createMockGenerator();
    synthesizer = createMockSynthesizer();
    pipeline = new ExchangePipeline({ store, transcriber, generator, synthesizer, logger: createSilentLogger() });
  });

  // ── Success ────────────────────────────────────────────────────────────────

  it("runs every stage and commits the turn", async () => {
    const result = await pipeline.run("s1", AUDIO);

    expect(result).toEqual({
      sessionId: "s1",
      transcription: "hello",
      replyText: "hi there",
      audioUrl: "https://audio/1",
      turnCount: 2,
      errorKind: null,
    });
    expect(store.getHistory("s1")).toEqual([
      { role: "user", text: "hello" },
      { role: "assistant", text: "hi there" },
    ]);
  });

  it("passes the MIME type through and defaults it to audio/webm", async () => {
    await pipeline.run("s1", AUDIO, { mimeType: "audio/wav" });
    await pipeline.run("s1", AUDIO);

    expect(transcriber.transcribe).toHaveBeenNthCalledWith(1, AUDIO, "audio/wav");
    expect(transcriber.transcribe).toHaveBeenNthCalledWith(2, AUDIO, "audio/webm");
  });

  it("gives the generator the prior turns as context", async () => {
    await pipeline.run("s1", AUDIO);
    transcriber.transcribe.mockResolvedValueOnce(ok("how are you"));

    const result = await pipeline.run("s1", AUDIO);

    expect(generator.generate).toHaveBeenLastCalledWith("how are you", [
      { role: "user", text: "hello" },
      { role: "assistant", text: "hi there" },
    ]);
    expect(result.turnCount).toBe(4);
  });

  // ── Failures ───────────────────────────────────────────────────────────────

  it("keeps the reply and commits the turn when synthesis fails", async () => {
    synthesizer.synthesize.mockResolvedValueOnce(failed("TTS generation failed: quota"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result).toEqual({
      sessionId: "s1",
      transcription: "hello",
      replyText: "hi there",
      audioUrl: "",
      turnCount: 2,
      errorKind: "tts_failure",
    });
    expect(pipeline.getTurnCount("s1")).toBe(2);
  });

  it("returns stt_failure with empty fields and stores nothing when transcription fails", async () => {
    transcriber.transcribe.mockResolvedValueOnce(failed("Transcription failed: bad audio"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result).toEqual({
      sessionId: "s1",
      transcription: "",
      replyText: "",
      audioUrl: "",
      turnCount: 0,
      errorKind: "stt_failure",
    });
    expect(generator.generate).not.toHaveBeenCalled();
    expect(synthesizer.synthesize).not.toHaveBeenCalled();
    expect(pipeline.getTurnCount("s1")).toBe(0);
  });

  it("reports the existing turn count when a later exchange fails", async () => {
    await pipeline.run("s1", AUDIO);
    transcriber.transcribe.mockResolvedValueOnce(failed("no speech"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result.errorKind).toBe("stt_failure");
    expect(result.turnCount).toBe(2);
  });

  it("treats a blank transcription as stt_failure", async () => {
    transcriber.transcribe.mockResolvedValueOnce(ok("   "));

    const result = await pipeline.run("s1", AUDIO);

    expect(result.errorKind).toBe("stt_failure");
    expect(result.transcription).toBe("");
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it("treats empty audio as stt_failure without calling the provider", async () => {
    const result = await pipeline.run("s1", Buffer.alloc(0));

    expect(result.errorKind).toBe("stt_failure");
    expect(transcriber.transcribe).not.toHaveBeenCalled();
  });

  it("converts a thrown transcription error into stt_failure", async () => {
    transcriber.transcribe.mockRejectedValueOnce(new Error("socket hang up"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result.errorKind).toBe("stt_failure");
    expect(result.turnCount).toBe(0);
  });

  it("keeps the transcription and stores nothing when generation fails", async () => {
    generator.generate.mockResolvedValueOnce(failed("LLM request failed: timeout"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result).toEqual({
      sessionId: "s1",
      transcription: "hello",
      replyText: "",
      audioUrl: "",
      turnCount: 0,
      errorKind: "llm_failure",
    });
    expect(synthesizer.synthesize).not.toHaveBeenCalled();
    expect(store.turnCount("s1")).toBe(0);
  });

  it("converts a thrown generation error into llm_failure", async () => {
    generator.generate.mockRejectedValueOnce(new Error("boom"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result.errorKind).toBe("llm_failure");
    expect(result.transcription).toBe("hello");
  });

  it("converts a thrown synthesis error into tts_failure", async () => {
    synthesizer.synthesize.mockRejectedValueOnce(new Error("boom"));

    const result = await pipeline.run("s1", AUDIO);

    expect(result.errorKind).toBe("tts_failure");
    expect(result.audioUrl).toBe("");
    expect(result.turnCount).toBe(2);
  });

  it("returns config_failure without calling any capability when one is unconfigured", async () => {
    synthesizer.isConfigured.mockReturnValue(false);

    const result = await pipeline.run("s1", AUDIO);

    expect(result).toEqual({
      sessionId: "s1",
      transcription: "",
      replyText: "",
      audioUrl: "",
      turnCount: 0,
      errorKind: "config_failure",
    });
    expect(transcriber.transcribe).not.toHaveBeenCalled();
    expect(generator.generate).not.toHaveBeenCalled();
    expect(synthesizer.synthesize).not.toHaveBeenCalled();
  });

  // ── Truncation ─────────────────────────────────────────────────────────────

  it("truncates long replies for synthesis but keeps the full reply text", async () => {
    const reply = "abcdefghijklmnop";
    generator.generate.mockResolvedValueOnce(ok(reply));
    const logger = createSilentLogger();
    pipeline = new ExchangePipeline({ store, transcriber, generator, synthesizer, maxSynthesisChars: 10, logger });

    const result = await pipeline.run("s1", AUDIO);

    expect(synthesizer.synthesize).toHaveBeenCalledWith("abcdefg...");
    expect(result.replyText).toBe(reply);
    expect(store.getHistory("s1")[1]).toEqual({ role: "assistant", text: reply });
    expect(logger.warn).toHaveBeenCalledWith("Reply truncated from 16 to 10 chars for synthesis");
  });

  it("passes a reply at the bound through unchanged", async () => {
    generator.generate.mockResolvedValueOnce(ok("0123456789"));
    pipeline = new ExchangePipeline({
      store,
      transcriber,
      generator,
      synthesizer,
      maxSynthesisChars: 10,
      logger: createSilentLogger(),
    });

    await pipeline.run("s1", AUDIO);

    expect(synthesizer.synthesize).toHaveBeenCalledWith("0123456789");
  });

  it("never cuts beyond the synthesizer's own input limit", async () => {
    generator.generate.mockResolvedValueOnce(ok("abcdefghijklmnop"));
    pipeline = new ExchangePipeline({
      store,
      transcriber,
      generator,
      synthesizer: { ...synthesizer, maxInputChars: 8 },
      maxSynthesisChars: 10,
      logger: createSilentLogger(),
    });

    await pipeline.run("s1", AUDIO);

    expect(synthesizer.synthesize).toHaveBeenCalledWith("abcde...");
  });

  // ── Concurrency ────────────────────────────────────────────────────────────

  it("commits overlapping exchanges for one session in arrival order", async () => {
    transcriber.transcribe.mockImplementation(async (audio: Buffer) => {
      const text = audio.toString();
      if (text === "first") {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      return ok(text);
    });
    generator.generate.mockImplementation(async (prompt: string) => ok(`re: ${prompt}`));

    const [first, second] = await Promise.all([
      pipeline.run("s1", Buffer.from("first")),
      pipeline.run("s1", Buffer.from("second")),
    ]);

    expect(first.turnCount).toBe(2);
    expect(second.turnCount).toBe(4);
    expect(store.getHistory("s1").map((t) => t.text)).toEqual(["first", "re: first", "second", "re: second"]);
  });

  it("keeps concurrent sessions apart", async () => {
    transcriber.transcribe.mockImplementation(async (audio: Buffer) => ok(audio.toString()));

    await Promise.all([pipeline.run("s1", Buffer.from("from s1")), pipeline.run("s2", Buffer.from("from s2"))]);

    expect(store.getHistory("s1")[0]).toEqual({ role: "user", text: "from s1" });
    expect(store.getHistory("s2")[0]).toEqual({ role: "user", text: "from s2" });
    expect(store.turnCount("s1")).toBe(2);
    expect(store.turnCount("s2")).toBe(2);
  });

  // ── Session operations ─────────────────────────────────────────────────────

  it("clears a session", async () => {
    await pipeline.run("s1", AUDIO);
    pipeline.clearSession("s1");

    expect(pipeline.getTurnCount("s1")).toBe(0);
    expect(pipeline.getSessionInfo("s1").createdAt).toBeNull();
  });

  it("counts active sessions", async () => {
    await pipeline.run("s1", AUDIO);
    await pipeline.run("s2", AUDIO);
    expect(pipeline.activeSessions()).toBe(2);
  });

  // ── Stateless and echo ─────────────────────────────────────────────────────

  it("runs a stateless query with no history", async () => {
    const result = await pipeline.runStateless(AUDIO);

    expect(result).toEqual({
      sessionId: "",
      transcription: "hello",
      replyText: "hi there",
      audioUrl: "https://audio/1",
      turnCount: 0,
      errorKind: null,
    });
    expect(generator.generate).toHaveBeenCalledWith("hello", []);
    expect(pipeline.activeSessions()).toBe(0);
  });

  it("echoes the transcription without the language model", async () => {
    const result = await pipeline.runEcho(AUDIO);

    expect(result).toEqual({
      sessionId: "",
      transcription: "hello",
      replyText: "hello",
      audioUrl: "https://audio/1",
      turnCount: 0,
      errorKind: null,
    });
    expect(synthesizer.synthesize).toHaveBeenCalledWith("hello");
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it("echo works while the language model is unconfigured", async () => {
    generator.isConfigured.mockReturnValue(false);

    const result = await pipeline.runEcho(AUDIO);

    expect(result.errorKind).toBeNull();
  });

  it("echo reports tts_failure and keeps the transcription", async () => {
    synthesizer.synthesize.mockResolvedValueOnce(failed("TTS returned no audio"));

    const result = await pipeline.runEcho(AUDIO);

    expect(result.errorKind).toBe("tts_failure");
    expect(result.transcription).toBe("hello");
    expect(result.audioUrl).toBe("");
  });
});
