/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import { ProviderError } from "../../errors";
import type { GenerationParams, LLMProvider, Message } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
}

function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof Anthropic.APIUserAbortError) {
    return new ProviderError("cancelled", err.message, "anthropic");
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ProviderError("timeout", err.message, "anthropic");
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new ProviderError("network", err.message, "anthropic");
  }
  if (err instanceof Anthropic.AuthenticationError || err instanceof Anthropic.PermissionDeniedError) {
    return new ProviderError("auth", err.message, "anthropic", err.status);
  }
  if (err instanceof Anthropic.RateLimitError) {
    return new ProviderError("rate_limit", err.message, "anthropic", err.status);
  }
  if (err instanceof Anthropic.APIError) {
    return new ProviderError("upstream", err.message, "anthropic", err.status);
  }
  return new ProviderError("network", err instanceof Error ? err.message : String(err), "anthropic");
}

/** System messages are folded into Anthropic's top-level system field. */
function splitSystem(messages: Message[]): { system?: string; rest: Array<{ role: "user" | "assistant"; content: string }> } {
  const systemParts = messages.filter((m) => m.role === "system").map((m) => m.content);
  const rest: Array<{ role: "user" | "assistant"; content: string }> = [];
  for (const m of messages) {
    if (m.role === "user" || m.role === "assistant") rest.push({ role: m.role, content: m.content });
  }
  return { system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined, rest };
}

export class AnthropicLLM implements LLMProvider {
  readonly name = "anthropic" as const;
  private client: Anthropic;

  constructor(cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey, maxRetries: 1 });
  }

  async generate(messages: Message[], params: GenerationParams, signal?: AbortSignal): Promise<string> {
    const { system, rest } = splitSystem(messages);
    try {
      const response = await this.client.messages.create(
        {
          model: params.model,
          max_tokens: params.maxTokens,
          temperature: params.temperature,
          system,
          messages: rest,
        },
        { signal }
      );
      return response.content
        .map((b) => (b.type === "text" ? b.text : ""))
        .join("");
    } catch (err) {
      throw toProviderError(err);
    }
  }

  async *generateStream(messages: Message[], params: GenerationParams, signal?: AbortSignal): AsyncIterable<string> {
    const { system, rest } = splitSystem(messages);
    try {
      const streamResult = this.client.messages.stream(
        {
          model: params.model,
          max_tokens: params.maxTokens,
          temperature: params.temperature,
          system,
          messages: rest,
        },
        { signal }
      );
      for await (const event of streamResult) {
        if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield event.delta.text;
        }
      }
    } catch (err) {
      throw toProviderError(err);
    }
  }
}
