/**
 * Threshold summarization: once the un-summarized turn count reaches the threshold, the oldest
 * block is condensed by the LLM into one Summary and dropped from the store.
 * Callers hold the session lock, so at most one summarization runs per session.
 */

import type { LLMProvider } from "../adapters/llm/types";
import { withDeadline } from "../adapters/llm/deadline";
import { InternalStateError, ProviderError, errorMessage } from "../errors";
import { logger, logLlmCall } from "../logging";
import { recordSummarization } from "../metrics";
import { buildSummarizationMessages } from "../prompts/memory-prompts";
import type { MessageStore } from "./message-store";
import type { Summary, SummarizerState } from "./types";

const SUMMARY_TEMPERATURE = 0.3;
const SUMMARY_MAX_TOKENS = 500;

export interface SummarizerConfig {
  /** Block size; also the un-summarized count that triggers a run. */
  threshold: number;
  /** Per-call timeout (ms); 0 disables. */
  timeoutMs: number;
}

export interface SummarizationContext {
  sessionId: string;
  store: MessageStore;
  /** Owned by the session; the engine appends to it on commit. */
  summaries: Summary[];
  provider: LLMProvider;
  model: string;
  signal?: AbortSignal;
  now: () => number;
}

export type SummarizationOutcome =
  | { status: "idle" }
  | { status: "summarized"; created: Summary[] }
  | { status: "failed"; created: Summary[]; error: ProviderError };

export class SummarizationEngine {
  private current: SummarizerState = "accumulating";

  constructor(private readonly cfg: SummarizerConfig) {}

  get state(): SummarizerState {
    return this.current;
  }

  get threshold(): number {
    return this.cfg.threshold;
  }

  shouldSummarize(store: MessageStore): boolean {
    return store.size >= this.cfg.threshold;
  }

  /**
   * Summarize full blocks until the store is below the threshold or a call fails.
   * Provider failures are returned, not thrown; nothing is committed for a failed block.
   */
  async run(ctx: SummarizationContext): Promise<SummarizationOutcome> {
    if (!this.shouldSummarize(ctx.store)) return { status: "idle" };
    const created: Summary[] = [];
    while (this.shouldSummarize(ctx.store)) {
      this.current = "threshold_reached";
      try {
        created.push(await this.summarizeOldestBlock(ctx));
      } catch (err) {
        if (!(err instanceof ProviderError)) throw err;
        logger.warn(
          { event: "SUMMARIZATION_FAILED", sessionId: ctx.sessionId, kind: err.kind, err: err.message },
          "Summarization failed; turns kept for the next attempt"
        );
        return { status: "failed", created, error: err };
      } finally {
        this.current = "accumulating";
      }
    }
    return { status: "summarized", created };
  }

  private async summarizeOldestBlock(ctx: SummarizationContext): Promise<Summary> {
    const block = ctx.store.recent(ctx.store.size).slice(0, this.cfg.threshold);
    const first = block[0];
    const last = block[block.length - 1];
    if (!first || !last) {
      throw new InternalStateError("Summarization started on an empty store", { sessionId: ctx.sessionId });
    }
    const previous = ctx.summaries[ctx.summaries.length - 1];
    const expectedStart = previous ? previous.covers[1] + 1 : 1;
    if (first.id !== expectedStart) {
      throw new InternalStateError(`Oldest retained turn ${first.id} does not follow summarized turn ${expectedStart - 1}`, {
        sessionId: ctx.sessionId,
      });
    }

    this.current = "summarizing";
    const messages = buildSummarizationMessages(block);
    const started = Date.now();
    let text: string;
    try {
      text = await withDeadline(ctx.provider.name, this.cfg.timeoutMs, ctx.signal, (signal) =>
        ctx.provider.generate(messages, { model: ctx.model, temperature: SUMMARY_TEMPERATURE, maxTokens: SUMMARY_MAX_TOKENS }, signal)
      );
    } catch (err) {
      recordSummarization(ctx.sessionId, false, Date.now() - started);
      if (err instanceof ProviderError) throw err;
      throw new ProviderError("upstream", errorMessage(err), ctx.provider.name);
    }
    const durationMs = Date.now() - started;
    logLlmCall(logger, {
      purpose: "summarize",
      provider: ctx.provider.name,
      model: ctx.model,
      messageCount: messages.length,
      responseLength: text.length,
      durationMs,
    });

    const trimmed = text.trim();
    if (!trimmed) {
      recordSummarization(ctx.sessionId, false, durationMs);
      throw new ProviderError("upstream", "Provider returned an empty summary", ctx.provider.name);
    }

    // Commit: summary first, then drop exactly the block it covers. No await in between.
    const summary: Summary = Object.freeze({
      covers: Object.freeze([first.id, last.id] as const),
      text: trimmed,
      createdAt: ctx.now(),
    });
    ctx.summaries.push(summary);
    ctx.store.dropPrefix(block.length);
    recordSummarization(ctx.sessionId, true, durationMs, block.length);
    logger.info(
      { event: "SUMMARY_COMMITTED", sessionId: ctx.sessionId, covers: summary.covers, remaining: ctx.store.size },
      "Summary committed"
    );
    return summary;
  }
}
