/**
 * Stub LLM adapter for local runs without API keys.
 * Deterministic: echoes a prefix of the last message so summaries and facts stay non-empty.
 */

import type { GenerationParams, LLMProvider, Message } from "./types";

const ECHO_CHARS = 120;

export interface StubLlmConfig {
  /** Fixed reply; when unset the stub echoes the last message. */
  reply?: string;
}

export class StubLLM implements LLMProvider {
  readonly name = "stub" as const;

  constructor(private readonly cfg: StubLlmConfig = {}) {}

  async generate(messages: Message[], _params: GenerationParams): Promise<string> {
    return this.replyFor(messages);
  }

  async *generateStream(messages: Message[], _params: GenerationParams, signal?: AbortSignal): AsyncIterable<string> {
    for (const word of this.replyFor(messages).split(/(?<=\s)/)) {
      if (signal?.aborted) return;
      yield word;
    }
  }

  private replyFor(messages: Message[]): string {
    if (this.cfg.reply !== undefined) return this.cfg.reply;
    const last = messages[messages.length - 1]?.content.trim() ?? "";
    const firstLine = last.split("\n").find((l) => l.trim()) ?? "";
    return `Stub reply: ${firstLine.slice(0, ECHO_CHARS)}`;
  }
}
