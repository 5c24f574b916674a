/**
 * OpenAI Chat Completions LLM adapter.
 * Also serves Groq and Gemini through their OpenAI-compatible endpoints (baseURL).
 */

import OpenAI from "openai";
import { ProviderError } from "../../errors";
import type { GenerationParams, LLMProvider, Message, ProviderName } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  /** Which provider this client speaks for; defaults to openai. */
  provider?: Extract<ProviderName, "openai" | "groq" | "gemini">;
  baseURL?: string;
}

export function toProviderError(err: unknown, provider: string): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof OpenAI.APIUserAbortError) {
    return new ProviderError("cancelled", err.message, provider);
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderError("timeout", err.message, provider);
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError("network", err.message, provider);
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new ProviderError("auth", err.message, provider, err.status);
  }
  if (err instanceof OpenAI.RateLimitError) {
    return new ProviderError("rate_limit", err.message, provider, err.status);
  }
  if (err instanceof OpenAI.APIError) {
    return new ProviderError("upstream", err.message, provider, err.status);
  }
  return new ProviderError("network", err instanceof Error ? err.message : String(err), provider);
}

export class OpenAILLM implements LLMProvider {
  readonly name: Extract<ProviderName, "openai" | "groq" | "gemini">;
  private client: OpenAI;

  constructor(cfg: OpenAILlmConfig) {
    this.name = cfg.provider ?? "openai";
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL, maxRetries: 1 });
  }

  async generate(messages: Message[], params: GenerationParams, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: params.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          stream: false,
        },
        { signal }
      );
      return response.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw toProviderError(err, this.name);
    }
  }

  async *generateStream(messages: Message[], params: GenerationParams, signal?: AbortSignal): AsyncIterable<string> {
    try {
      const streamResult = await this.client.chat.completions.create(
        {
          model: params.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          stream: true,
        },
        { signal }
      );
      for await (const chunk of streamResult) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } catch (err) {
      throw toProviderError(err, this.name);
    }
  }
}
