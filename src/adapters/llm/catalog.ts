/**
 * Known providers, their defaults and the models we have tried against them.
 */

import type { ProviderName } from "./types";

export interface ProviderInfo {
  name: ProviderName;
  displayName: string;
  defaultModel: string;
  models: string[];
  /** OpenAI-compatible base URL; unset means the SDK default. */
  baseURL?: string;
  apiKeyEnv?: string;
}

export const PROVIDER_CATALOG: Record<ProviderName, ProviderInfo> = {
  openai: {
    name: "openai",
    displayName: "OpenAI",
    defaultModel: "gpt-4o",
    models: ["gpt-4o", "gpt-4o-mini", "gpt-4-turbo", "gpt-3.5-turbo"],
    apiKeyEnv: "OPENAI_API_KEY",
  },
  groq: {
    name: "groq",
    displayName: "Groq",
    defaultModel: "llama-3.3-70b-versatile",
    models: ["llama-3.3-70b-versatile", "llama-3.1-8b-instant", "openai/gpt-oss-120b", "qwen/qwen3-32b"],
    baseURL: "https://api.groq.com/openai/v1",
    apiKeyEnv: "GROQ_API_KEY",
  },
  gemini: {
    name: "gemini",
    displayName: "Google Gemini",
    defaultModel: "gemini-2.5-flash",
    models: ["gemini-2.5-pro", "gemini-2.5-flash", "gemini-2.0-flash"],
    baseURL: "https://generativelanguage.googleapis.com/v1beta/openai/",
    apiKeyEnv: "GEMINI_API_KEY",
  },
  anthropic: {
    name: "anthropic",
    displayName: "Anthropic",
    defaultModel: "claude-3-5-sonnet-20241022",
    models: ["claude-3-5-sonnet-20241022", "claude-3-5-haiku-20241022"],
    apiKeyEnv: "ANTHROPIC_API_KEY",
  },
  stub: {
    name: "stub",
    displayName: "Stub",
    defaultModel: "stub-echo",
    models: ["stub-echo"],
  },
};

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "groq", "gemini", "anthropic", "stub"];

export function isProviderName(value: unknown): value is ProviderName {
  return typeof value === "string" && PROVIDER_NAMES.some((p) => p === value);
}

export function defaultModelFor(provider: ProviderName): string {
  return PROVIDER_CATALOG[provider].defaultModel;
}
