// Response Generator: produces the assistant's spoken reply from the user's
// transcribed words and the session history, using OpenAI chat completions.

import type { ConversationTurn, ReplyGenerator, StageOutcome } from "./types.js";
import { errorMessage } from "./utils.js";

/** Appended to every user prompt so replies stay short enough to speak. */
export const CONCISE_REPLY_INSTRUCTION = "(Please provide a concise response under 2500 characters)";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface ResponseGeneratorOptions {
  model?: string;
  systemPrompt?: string;
  temperature?: number;
}

export class ResponseGenerator implements ReplyGenerator {
  private readonly openai: OpenAIChatClient | null;
  private readonly model: string;
  private readonly systemPrompt: string | null;
  private readonly temperature: number;

  constructor(openaiClient: OpenAIChatClient | null, options: ResponseGeneratorOptions = {}) {
    this.openai = openaiClient;
    this.model = options.model ?? "gpt-4o-mini";
    this.systemPrompt = options.systemPrompt ?? null;
    this.temperature = options.temperature ?? 0.7;
  }

  isConfigured(): boolean {
    return this.openai !== null;
  }

  /**
   * Build the chat message list: system prompt, prior turns oldest first,
   * then the new user text with the concision instruction.
   */
  buildMessages(
    prompt: string,
    history: readonly ConversationTurn[],
  ): Array<{ role: "system" | "user" | "assistant"; content: string }> {
    const messages: Array<{ role: "system" | "user" | "assistant"; content: string }> = [];
    if (this.systemPrompt) {
      messages.push({ role: "system", content: this.systemPrompt });
    }
    for (const turn of history) {
      messages.push({ role: turn.role, content: turn.text });
    }
    messages.push({ role: "user", content: `${prompt}\n\n${CONCISE_REPLY_INSTRUCTION}` });
    return messages;
  }

  async generate(
    prompt: string,
    history: readonly ConversationTurn[],
  ): Promise<StageOutcome<string>> {
    if (!this.openai) {
      return { ok: false, error: "Language model is not configured" };
    }

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: this.buildMessages(prompt, history),
        temperature: this.temperature,
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        return { ok: false, error: "LLM returned empty response" };
      }
      return { ok: true, value: content };
    } catch (err) {
      return { ok: false, error: `LLM request failed: ${errorMessage(err)}` };
    }
  }
}
