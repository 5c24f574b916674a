/**
 * Env-based configuration for the memory service.
 * Load from .env.local (or process.env). Do not commit secrets.
 * The memory core never reads the environment; main.ts passes these values in.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import type { ProviderName } from "../adapters/llm/types";
import { isProviderName } from "../adapters/llm/catalog";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export interface LlmConfig {
  provider: ProviderName;
  /** Model override; provider default when unset. */
  model?: string;
  temperature: number;
  maxTokens: number;
  /** Timeout (ms) for each LLM call; 0 disables. */
  timeoutMs: number;
  /** Bind the stub when the selected provider has no API key. */
  allowStubFallback: boolean;
  apiKeys: {
    openai?: string;
    groq?: string;
    gemini?: string;
    anthropic?: string;
  };
}

export interface MemoryConfig {
  /** Hard cap on retained turns per session. */
  maxMessages: number;
  /** Un-summarized turn count that triggers summarization (block size). */
  summaryThreshold: number;
  /** Recent turns included in the assembled context. */
  contextWindow: number;
  /** Turns the facts cache may lag behind before it is recomputed. */
  factsDriftBound: number;
  /** Evict sessions idle this long (ms); 0 disables. */
  idleTimeoutMs: number;
}

export interface AppConfig {
  llm: LlmConfig;
  memory: MemoryConfig;
  server: {
    port: number;
  };
  /** Overrides the built-in system prompt. */
  systemPrompt?: string;
}

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  maxMessages: 50,
  summaryThreshold: 20,
  contextWindow: 10,
  factsDriftBound: 0,
  idleTimeoutMs: 0,
};

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(env: Env, key: string, defaultValue: number, min = 0): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloat(env: Env, key: string, defaultValue: number, min: number, max: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) || n < min || n > max ? defaultValue : n;
}

function getBool(env: Env, key: string): boolean {
  const v = (getEnv(env, key) ?? "").toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER (or MODEL_PROVIDER) selects the adapter (openai, groq, gemini, anthropic, stub).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const providerRaw = (getEnv(env, "LLM_PROVIDER") || getEnv(env, "MODEL_PROVIDER") || "openai").toLowerCase();
  const provider: ProviderName = isProviderName(providerRaw) ? providerRaw : "openai";

  return {
    llm: {
      provider,
      model: getEnv(env, "LLM_MODEL"),
      temperature: getFloat(env, "LLM_TEMPERATURE", 0.7, 0, 2),
      maxTokens: getInt(env, "LLM_MAX_TOKENS", 1000, 1),
      timeoutMs: getInt(env, "LLM_TIMEOUT_MS", 30_000),
      allowStubFallback: getBool(env, "LLM_ALLOW_STUB_FALLBACK"),
      apiKeys: {
        openai: getEnv(env, "OPENAI_API_KEY"),
        groq: getEnv(env, "GROQ_API_KEY"),
        gemini: getEnv(env, "GEMINI_API_KEY"),
        anthropic: getEnv(env, "ANTHROPIC_API_KEY"),
      },
    },
    memory: {
      maxMessages: getInt(env, "MAX_MESSAGES", DEFAULT_MEMORY_CONFIG.maxMessages, 1),
      summaryThreshold: getInt(env, "SUMMARY_THRESHOLD", DEFAULT_MEMORY_CONFIG.summaryThreshold, 1),
      contextWindow: getInt(env, "CONTEXT_WINDOW", DEFAULT_MEMORY_CONFIG.contextWindow),
      factsDriftBound: getInt(env, "FACTS_DRIFT_BOUND", DEFAULT_MEMORY_CONFIG.factsDriftBound),
      idleTimeoutMs: getInt(env, "SESSION_IDLE_TIMEOUT_MS", DEFAULT_MEMORY_CONFIG.idleTimeoutMs),
    },
    server: {
      port: getInt(env, "PORT", 8000),
    },
    systemPrompt: getEnv(env, "SYSTEM_PROMPT"),
  };
}
