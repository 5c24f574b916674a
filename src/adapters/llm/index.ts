/**
 * LLM adapter factory: returns an implementation for a session's provider identity.
 */

import type { LlmConfig } from "../../config";
import { ValidationError } from "../../errors";
import { logger } from "../../logging";
import { PROVIDER_CATALOG } from "./catalog";
import type { LLMProvider, ProviderIdentity, ProviderName } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { LLMProvider, Message, Role, GenerationParams, ProviderIdentity, ProviderName } from "./types";
export { PROVIDER_CATALOG, PROVIDER_NAMES, isProviderName, defaultModelFor } from "./catalog";
export type { ProviderInfo } from "./catalog";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";
export { withDeadline, CallDeadline } from "./deadline";

export type ProviderFactory = (identity: ProviderIdentity) => LLMProvider;

function apiKeyFor(config: LlmConfig, provider: ProviderName): string | undefined {
  switch (provider) {
    case "openai":
      return config.apiKeys.openai;
    case "groq":
      return config.apiKeys.groq;
    case "gemini":
      return config.apiKeys.gemini;
    case "anthropic":
      return config.apiKeys.anthropic;
    case "stub":
      return undefined;
  }
}

export function createLLM(config: LlmConfig, identity: ProviderIdentity): LLMProvider {
  const { provider } = identity;
  if (provider === "stub") return new StubLLM();

  const apiKey = apiKeyFor(config, provider);
  if (!apiKey) {
    if (config.allowStubFallback) {
      logger.warn({ event: "LLM_STUB_FALLBACK", provider }, "No API key for provider; using stub");
      return new StubLLM();
    }
    throw new ValidationError(`No API key configured for ${provider} (set ${PROVIDER_CATALOG[provider].apiKeyEnv})`, { provider });
  }
  if (provider === "anthropic") {
    return new AnthropicLLM({ apiKey });
  }
  return new OpenAILLM({ apiKey, provider, baseURL: PROVIDER_CATALOG[provider].baseURL });
}

/** Bind createLLM to the loaded config for the registry. */
export function providerFactory(config: LlmConfig): ProviderFactory {
  return (identity) => createLLM(config, identity);
}
