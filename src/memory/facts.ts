/**
 * FactExtractor: cached list of key facts, recomputed by the LLM when a summary was produced
 * since the last run or the turns drifted past the configured bound.
 */

import type { LLMProvider } from "../adapters/llm/types";
import { withDeadline } from "../adapters/llm/deadline";
import { ProviderError, errorMessage } from "../errors";
import { logger, logLlmCall } from "../logging";
import { recordFactRefresh } from "../metrics";
import { buildFactExtractionMessages } from "../prompts/memory-prompts";
import type { FactsCache, Summary, Turn } from "./types";

const FACTS_TEMPERATURE = 0.2;
const FACTS_MAX_TOKENS = 500;

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+(.+)$/;

export interface FactsResult {
  facts: string[];
  /** True when the provider failed and the previous facts were returned. */
  stale: boolean;
  /** True when no provider call was needed. */
  cached: boolean;
}

export interface FactExtractionContext {
  sessionId: string;
  cache: FactsCache;
  summaries: readonly Summary[];
  turns: readonly Turn[];
  /** Highest turn id ever created in the session (0 when none). */
  lastTurnId: number;
  provider: LLMProvider;
  model: string;
  signal?: AbortSignal;
}

/** One fact per list item; unmarked replies fall back to non-heading lines. */
export function parseFacts(text: string): string[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const items: string[] = [];
  for (const line of lines) {
    const m = LIST_ITEM.exec(line);
    if (m) items.push(m[1].trim());
  }
  if (items.length > 0) return items;
  return lines.filter((l) => !l.endsWith(":"));
}

export class FactExtractor {
  constructor(private readonly cfg: { driftBound: number; timeoutMs: number }) {}

  isFresh(cache: FactsCache, summaryCount: number, lastTurnId: number): boolean {
    return cache.summaryCount === summaryCount && lastTurnId - cache.validThrough <= this.cfg.driftBound;
  }

  /**
   * Returns cached facts when fresh, otherwise asks the provider. On success the new cache is
   * returned for the caller to commit; on failure the old facts come back marked stale.
   */
  async facts(ctx: FactExtractionContext): Promise<{ result: FactsResult; cache?: FactsCache }> {
    if (this.isFresh(ctx.cache, ctx.summaries.length, ctx.lastTurnId)) {
      return { result: { facts: [...ctx.cache.facts], stale: false, cached: true } };
    }

    const messages = buildFactExtractionMessages(ctx.summaries, ctx.turns);
    const started = Date.now();
    try {
      const text = await withDeadline(ctx.provider.name, this.cfg.timeoutMs, ctx.signal, (signal) =>
        ctx.provider.generate(messages, { model: ctx.model, temperature: FACTS_TEMPERATURE, maxTokens: FACTS_MAX_TOKENS }, signal)
      );
      logLlmCall(logger, {
        purpose: "facts",
        provider: ctx.provider.name,
        model: ctx.model,
        messageCount: messages.length,
        responseLength: text.length,
        durationMs: Date.now() - started,
      });
      const facts = parseFacts(text);
      recordFactRefresh(ctx.sessionId, true, facts.length);
      logger.info({ event: "FACTS_REFRESHED", sessionId: ctx.sessionId, count: facts.length }, "Facts refreshed");
      return {
        result: { facts: [...facts], stale: false, cached: false },
        cache: { facts, validThrough: ctx.lastTurnId, summaryCount: ctx.summaries.length },
      };
    } catch (err) {
      recordFactRefresh(ctx.sessionId, false);
      const kind = err instanceof ProviderError ? err.kind : "upstream";
      logger.warn(
        { event: "FACTS_REFRESH_FAILED", sessionId: ctx.sessionId, kind, err: errorMessage(err) },
        "Fact extraction failed; returning previous facts"
      );
      return { result: { facts: [...ctx.cache.facts], stale: true, cached: false } };
    }
  }
}
