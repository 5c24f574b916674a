/**
 * LLM adapter types.
 * Implementations are swapped per session via a provider identity (OpenAI, Groq, Gemini, Anthropic, stub).
 */

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export type ProviderName = "openai" | "groq" | "gemini" | "anthropic" | "stub";

export interface GenerationParams {
  model: string;
  temperature: number;
  /** Max tokens to generate. */
  maxTokens: number;
}

/** Which backend a session is bound to, and how it generates. */
export interface ProviderIdentity extends GenerationParams {
  provider: ProviderName;
}

/**
 * LLM capability consumed by the memory core: messages in, text out.
 * Failures reject with ProviderError.
 */
export interface LLMProvider {
  readonly name: ProviderName;

  generate(messages: Message[], params: GenerationParams, signal?: AbortSignal): Promise<string>;

  /**
   * Same as generate, delivered as text fragments. Completion of the iterator is the end marker;
   * aborting the signal stops delivery.
   */
  generateStream(messages: Message[], params: GenerationParams, signal?: AbortSignal): AsyncIterable<string>;
}
