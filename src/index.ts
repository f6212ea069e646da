// Voice Assistant - Entry point
// Loads configuration, wires the capability adapters into the pipeline and
// starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { AudioClipStore } from "./audio-clip-store.js";
import {
  APP_NAME,
  APP_VERSION,
  allApisConfigured,
  getApiKeyStatus,
  loadConfig,
  type AppConfig,
} from "./config.js";
import { ExchangePipeline } from "./exchange-pipeline.js";
import { ResponseGenerator } from "./response-generator.js";
import type { OpenAIChatClient } from "./response-generator.js";
import { createAppServer } from "./server.js";
import { SessionStore } from "./session-store.js";
import { TranscriptionEngine } from "./transcription-engine.js";
import type { DeepgramPrerecordedClient, OpenAITranscriptionClient } from "./transcription-engine.js";
import { TTSEngine } from "./tts-engine.js";
import type { OpenAITTSClient } from "./tts-engine.js";
import { errorMessage } from "./utils.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logWarn = (msg: string) => console.warn(`[WARN] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    logFatal(errorMessage(err));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const keyStatus = getApiKeyStatus(config);
logInit(`API key status: ${JSON.stringify(keyStatus)}`);
if (!allApisConfigured(config)) {
  logWarn("Not all API keys are configured. Voice turns will report config_failure until they are set.");
}

// ─── Initialize API clients ─────────────────────────────────────────────────────

const openaiClient = config.openaiApiKey ? new OpenAI({ apiKey: config.openaiApiKey }) : null;
const deepgramClient = config.deepgramApiKey ? createDeepgramClient(config.deepgramApiKey) : null;

// ─── Initialize pipeline components ─────────────────────────────────────────────

logInit(`Initializing TranscriptionEngine (${config.sttProvider}, ${config.sttModel})...`);
const transcriptionEngine = new TranscriptionEngine(
  deepgramClient as unknown as DeepgramPrerecordedClient | null,
  openaiClient as unknown as OpenAITranscriptionClient | null,
  { provider: config.sttProvider, model: config.sttModel },
);

logInit(`Initializing ResponseGenerator (${config.llmModel})...`);
const responseGenerator = new ResponseGenerator(openaiClient as unknown as OpenAIChatClient | null, {
  model: config.llmModel,
  systemPrompt: config.systemPrompt,
});

logInit(`Initializing TTSEngine (${config.ttsModel}, voice ${config.ttsVoice})...`);
const clips = new AudioClipStore(config.audioClipLimit);
const ttsEngine = new TTSEngine(openaiClient as unknown as OpenAITTSClient | null, clips, {
  model: config.ttsModel,
  voice: config.ttsVoice,
  speed: config.ttsSpeed,
  maxChars: config.maxSynthesisChars,
});

logInit(`Wiring ExchangePipeline (history window: ${config.maxHistoryTurns} turns)...`);
const pipeline = new ExchangePipeline({
  store: new SessionStore({ maxTurns: config.maxHistoryTurns }),
  transcriber: transcriptionEngine,
  generator: responseGenerator,
  synthesizer: ttsEngine,
  maxSynthesisChars: config.maxSynthesisChars,
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  pipeline,
  clips,
  transcriber: transcriptionEngine,
  speech: ttsEngine,
  apiKeyStatus: keyStatus,
  maxUploadBytes: config.maxUploadBytes,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Pipeline: ${config.sttProvider} STT → ${config.llmModel} → ${config.ttsModel}`);
  })
  .catch((err: unknown) => {
    logFatal(`Could not start server: ${errorMessage(err)}`);
    process.exit(1);
  });

function shutdown(signal: string): void {
  logInit(`${signal} received, shutting down ${APP_NAME}`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
