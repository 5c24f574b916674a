/**
 * SessionMemory: one conversation's bounded transcript, summaries and facts, bound to one provider.
 * Every public operation runs inside the session's lock, so appends, summarization, context
 * assembly, fact extraction and search never interleave for the same session.
 */

import type { ProviderFactory } from "../adapters/llm";
import { CallDeadline, withDeadline } from "../adapters/llm/deadline";
import type { GenerationParams, LLMProvider, ProviderIdentity, Role } from "../adapters/llm/types";
import {
  CapacityViolation,
  InternalStateError,
  ProviderError,
  SessionNotFound,
  ValidationError,
  errorMessage,
} from "../errors";
import { logger, logLlmCall, type Logger } from "../logging";
import { recordReply } from "../metrics";
import { buildMemorySummaryMessages, DEFAULT_SYSTEM_PROMPT, renderTurns } from "../prompts/memory-prompts";
import { buildContext, type AssembledContext, type ContextMeasure } from "./context";
import { parseSessionExport, toSessionExport, type SessionState } from "./export";
import { FactExtractor, type FactsResult } from "./facts";
import { SessionLock } from "./lock";
import { MessageStore } from "./message-store";
import { LexicalSearch, type SearchHit, type SearchStrategy } from "./search";
import { SummarizationEngine, type SummarizationContext } from "./summarizer";
import type { FactsCache, PendingTurn, SessionExport, SessionStats, Summary, Turn } from "./types";

const NO_HISTORY = "No conversation history available.";
const SUMMARY_TEXT_RECENT_TURNS = 10;
const SUMMARY_TEXT_TEMPERATURE = 0.3;
const SUMMARY_TEXT_MAX_TOKENS = 800;
const ROLES: readonly Role[] = ["system", "user", "assistant"];

export interface SessionMemoryConfig {
  /** Max turns kept verbatim. */
  maxMessages: number;
  /** Un-summarized turns that trigger summarization of the oldest block of that size. */
  summaryThreshold: number;
  /** Recent turns included in the assembled context. */
  contextWindow: number;
  /** Turns the facts cache may lag before it is recomputed. */
  factsDriftBound: number;
  /** Timeout (ms) for each LLM call; 0 disables. */
  timeoutMs: number;
  systemPrompt?: string;
}

export interface SessionMemoryDeps {
  providerFactory: ProviderFactory;
  search?: SearchStrategy;
  now?: () => number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface AddTurnResult {
  turn: Turn;
  /** Context for the next generation call, after any summarization. */
  context: AssembledContext;
  summarized: Summary[];
  /** Non-fatal problems, e.g. a deferred summarization. */
  warnings: string[];
}

export interface ReplyOptions extends CallOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ReplyResult {
  userTurn: Turn;
  reply: Turn;
  warnings: string[];
}

export type ReplyStreamEvent =
  | { type: "chunk"; text: string }
  | { type: "done"; userTurn: Turn; reply: Turn; warnings: string[] };

export interface SummaryTextResult {
  summary: string;
  /** True when the provider failed and stored summaries were returned instead. */
  degraded: boolean;
}

export interface ContextOptions {
  budget?: number;
  measure?: ContextMeasure;
}

export function validateMemoryConfig(cfg: SessionMemoryConfig): void {
  const positive = (v: number): boolean => Number.isInteger(v) && v >= 1;
  const nonNegative = (v: number): boolean => Number.isInteger(v) && v >= 0;
  if (!positive(cfg.maxMessages)) throw new ValidationError("maxMessages must be a positive integer");
  if (!positive(cfg.summaryThreshold)) throw new ValidationError("summaryThreshold must be a positive integer");
  if (cfg.summaryThreshold > cfg.maxMessages) {
    throw new ValidationError("summaryThreshold must not exceed maxMessages", {
      summaryThreshold: cfg.summaryThreshold,
      maxMessages: cfg.maxMessages,
    });
  }
  if (!nonNegative(cfg.contextWindow)) throw new ValidationError("contextWindow must be a non-negative integer");
  if (!nonNegative(cfg.factsDriftBound)) throw new ValidationError("factsDriftBound must be a non-negative integer");
  if (!(cfg.timeoutMs >= 0)) throw new ValidationError("timeoutMs must be >= 0");
}

export class SessionMemory {
  private readonly store: MessageStore;
  private readonly summaries: Summary[] = [];
  private factsCache: FactsCache = { facts: [], validThrough: 0, summaryCount: 0 };
  private nextTurnId = 1;
  private readonly lock = new SessionLock();
  private readonly engine: SummarizationEngine;
  private readonly facts: FactExtractor;
  private readonly searchStrategy: SearchStrategy;
  private readonly now: () => number;
  private provider: LLMProvider;
  private identity: ProviderIdentity;
  private invalid: InternalStateError | undefined;
  private closed = false;
  private readonly createdAtMs: number;
  private lastActiveAtMs: number;
  private readonly log: Logger;

  constructor(
    readonly id: string,
    identity: ProviderIdentity,
    private readonly config: SessionMemoryConfig,
    private readonly deps: SessionMemoryDeps,
    restored?: SessionState
  ) {
    validateMemoryConfig(config);
    this.now = deps.now ?? Date.now;
    this.store = new MessageStore(config.maxMessages);
    this.engine = new SummarizationEngine({ threshold: config.summaryThreshold, timeoutMs: config.timeoutMs });
    this.facts = new FactExtractor({ driftBound: config.factsDriftBound, timeoutMs: config.timeoutMs });
    this.searchStrategy = deps.search ?? new LexicalSearch();
    this.identity = { ...identity };
    this.provider = deps.providerFactory(this.identity);
    this.log = logger.child({ sessionId: id });
    this.createdAtMs = restored?.createdAt ?? this.now();
    this.lastActiveAtMs = restored?.lastActiveAt ?? this.createdAtMs;

    if (restored) {
      this.summaries.push(...restored.summaries);
      for (const turn of restored.turns) this.store.append(turn);
      this.factsCache = { ...restored.factsCache, facts: [...restored.factsCache.facts] };
      const lastSummary = restored.summaries[restored.summaries.length - 1];
      this.nextTurnId = (this.store.last()?.id ?? lastSummary?.covers[1] ?? 0) + 1;
      this.checkInvariants();
    }
  }

  /** Rebuild a session from an export record; the result exports byte-identically. */
  static fromExport(data: unknown, config: SessionMemoryConfig, deps: SessionMemoryDeps): SessionMemory {
    const state = parseSessionExport(data, { maxMessages: config.maxMessages });
    return new SessionMemory(state.id, state.identity, config, deps, state);
  }

  get providerIdentity(): ProviderIdentity {
    return { ...this.identity };
  }

  get createdAt(): number {
    return this.createdAtMs;
  }

  get lastActiveAt(): number {
    return this.lastActiveAtMs;
  }

  /** An operation is running or queued. */
  get busy(): boolean {
    return this.lock.busy;
  }

  get isValid(): boolean {
    return this.invalid === undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Detach the session from its registry. Operations already queued on the lock fail with
   * SessionNotFound when their turn comes; the one running now finishes.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.log.info({ event: "SESSION_CLOSED" }, "Session closed");
  }

  /** Append a turn; summarizes the oldest block when the threshold is reached. */
  addTurn(role: Role, content: string, opts: CallOptions = {}): Promise<AddTurnResult> {
    return this.guard(async () => {
      const { turn, summarized, warnings } = await this.commitTurn(role, content, opts.signal);
      return { turn, summarized, warnings, context: this.assemble() };
    });
  }

  getContext(pendingTurn?: PendingTurn, opts: ContextOptions = {}): Promise<AssembledContext> {
    return this.guard(async () => {
      if (pendingTurn) this.validateTurnInput(pendingTurn.role, pendingTurn.content);
      if (opts.budget !== undefined && !(Number.isFinite(opts.budget) && opts.budget >= 0)) {
        throw new ValidationError("budget must be a non-negative number", { budget: opts.budget });
      }
      return this.assemble(pendingTurn, opts);
    });
  }

  /** Overview of the whole conversation; stored summaries when the provider fails. */
  getSummaryText(opts: CallOptions = {}): Promise<SummaryTextResult> {
    return this.guard(async () => {
      if (this.store.size === 0 && this.summaries.length === 0) return { summary: NO_HISTORY, degraded: false };
      const recent = this.store.recent(SUMMARY_TEXT_RECENT_TURNS);
      const messages = buildMemorySummaryMessages(this.summaries, recent);
      const started = Date.now();
      try {
        const text = await withDeadline(this.provider.name, this.config.timeoutMs, opts.signal, (signal) =>
          this.provider.generate(
            messages,
            { model: this.identity.model, temperature: SUMMARY_TEXT_TEMPERATURE, maxTokens: SUMMARY_TEXT_MAX_TOKENS },
            signal
          )
        );
        logLlmCall(this.log, {
          purpose: "summary_text",
          provider: this.provider.name,
          model: this.identity.model,
          messageCount: messages.length,
          responseLength: text.length,
          durationMs: Date.now() - started,
        });
        if (text.trim()) return { summary: text.trim(), degraded: false };
        this.log.warn({ event: "SUMMARY_TEXT_EMPTY" }, "Provider returned an empty overview; using stored summaries");
      } catch (err) {
        this.log.warn({ event: "SUMMARY_TEXT_FAILED", err: errorMessage(err) }, "Overview generation failed; using stored summaries");
      }
      const fallback = this.summaries.length > 0 ? this.summaries.map((s) => s.text).join("\n\n") : renderTurns(recent);
      return { summary: fallback, degraded: true };
    });
  }

  getFacts(opts: CallOptions = {}): Promise<FactsResult> {
    return this.guard(async () => {
      const { result, cache } = await this.facts.facts({
        sessionId: this.id,
        cache: this.factsCache,
        summaries: this.summaries,
        turns: this.store.all(),
        lastTurnId: this.nextTurnId - 1,
        provider: this.provider,
        model: this.identity.model,
        signal: opts.signal,
      });
      if (cache) this.factsCache = cache;
      return result;
    });
  }

  search(query: string, topK: number): Promise<SearchHit[]> {
    return this.guard(async () => {
      if (typeof query !== "string" || !query.trim()) throw new ValidationError("query must not be empty");
      if (!Number.isInteger(topK) || topK < 0) throw new ValidationError("top_k must be a non-negative integer", { topK });
      return this.searchStrategy.search({ turns: this.store.all(), summaries: [...this.summaries] }, query, topK);
    });
  }

  /** Retained turns, oldest first; `limit` keeps only the most recent. */
  history(limit?: number): Promise<Turn[]> {
    return this.guard(async () => {
      if (limit !== undefined && !(Number.isInteger(limit) && limit >= 0)) {
        throw new ValidationError("limit must be a non-negative integer", { limit });
      }
      return limit === undefined ? this.store.all() : this.store.recent(limit);
    });
  }

  stats(): Promise<SessionStats> {
    return this.guard(async () => ({
      sessionId: this.id,
      provider: this.identity.provider,
      model: this.identity.model,
      totalTurns: this.nextTurnId - 1,
      retainedTurns: this.store.size,
      summaries: this.summaries.length,
      maxMessages: this.config.maxMessages,
      utilization: `${((this.store.size / this.config.maxMessages) * 100).toFixed(1)}%`,
      summarizerState: this.engine.state,
      createdAt: new Date(this.createdAtMs).toISOString(),
      lastActiveAt: new Date(this.lastActiveAtMs).toISOString(),
    }));
  }

  export(): Promise<SessionExport> {
    return this.guard(async () => toSessionExport(this.snapshotState()));
  }

  /** Bind the session to another provider/model. Memory is untouched. */
  rebind(identity: ProviderIdentity): Promise<ProviderIdentity> {
    return this.guard(async () => {
      const provider = this.deps.providerFactory(identity);
      this.provider = provider;
      this.identity = { ...identity };
      this.lastActiveAtMs = this.now();
      this.log.info({ event: "SESSION_REBOUND", provider: identity.provider, model: identity.model }, "Provider rebound");
      return { ...this.identity };
    });
  }

  /**
   * Commit the user message, generate a reply from the assembled context and commit it.
   * A failed reply surfaces as ProviderError; the user turn stays committed.
   */
  generateReply(message: string, opts: ReplyOptions = {}): Promise<ReplyResult> {
    return this.guard(async () => {
      const user = await this.commitTurn("user", message, opts.signal);
      const context = this.assemble();
      const params = this.replyParams(opts);
      const started = Date.now();
      let text: string;
      try {
        text = await withDeadline(this.provider.name, this.config.timeoutMs, opts.signal, (signal) =>
          this.provider.generate(context.messages, params, signal)
        );
      } catch (err) {
        recordReply(this.id, false, Date.now() - started);
        throw err instanceof ProviderError ? err : new ProviderError("upstream", errorMessage(err), this.provider.name);
      }
      recordReply(this.id, true, Date.now() - started);
      logLlmCall(this.log, {
        purpose: "reply",
        provider: this.provider.name,
        model: params.model,
        messageCount: context.messages.length,
        responseLength: text.length,
        durationMs: Date.now() - started,
      });
      if (!text.trim()) throw new ProviderError("upstream", "Provider returned an empty reply", this.provider.name);
      const assistant = await this.commitTurn("assistant", text, opts.signal);
      return { userTurn: user.turn, reply: assistant.turn, warnings: [...user.warnings, ...assistant.warnings] };
    });
  }

  /**
   * Streaming variant of generateReply. The lock is taken when iteration starts and released when
   * the stream completes, fails or is abandoned. Nothing is committed for the reply unless the
   * stream completes.
   */
  async *streamReply(message: string, opts: ReplyOptions = {}): AsyncGenerator<ReplyStreamEvent> {
    const release = await this.lock.acquire();
    try {
      this.assertValid();
      const user = await this.fatalOnInternal(() => this.commitTurn("user", message, opts.signal));
      const context = this.assemble();
      const params = this.replyParams(opts);
      const deadline = new CallDeadline(this.provider.name, this.config.timeoutMs, opts.signal);
      const started = Date.now();
      const parts: string[] = [];
      const iterator = this.provider.generateStream(context.messages, params, deadline.signal)[Symbol.asyncIterator]();
      // Raced against every fragment so a stream that ignores the signal still stops at the deadline.
      const aborted = deadline.whenAborted();
      let finished = false;
      try {
        for (;;) {
          const step = await Promise.race([iterator.next(), aborted]);
          if (step.done) break;
          const abortErr = deadline.abortError();
          if (abortErr) throw abortErr;
          parts.push(step.value);
          yield { type: "chunk", text: step.value };
        }
        finished = true;
        const abortErr = deadline.abortError();
        if (abortErr) throw abortErr;
      } catch (err) {
        recordReply(this.id, false, Date.now() - started);
        const surfaced = deadline.abortError() ?? err;
        throw surfaced instanceof ProviderError ? surfaced : new ProviderError("upstream", errorMessage(surfaced), this.provider.name);
      } finally {
        deadline.dispose();
        if (!finished) this.closeStream(iterator);
      }
      recordReply(this.id, true, Date.now() - started);
      const text = parts.join("");
      if (!text.trim()) throw new ProviderError("upstream", "Provider returned an empty reply", this.provider.name);
      const assistant = await this.fatalOnInternal(() => this.commitTurn("assistant", text, opts.signal));
      yield { type: "done", userTurn: user.turn, reply: assistant.turn, warnings: [...user.warnings, ...assistant.warnings] };
    } finally {
      release();
    }
  }

  /** Not awaited: a stalled stream may never settle its return(). */
  private closeStream(iterator: AsyncIterator<string>): void {
    iterator.return?.().catch((err: unknown) => {
      this.log.debug({ event: "STREAM_CLOSE_FAILED", err: errorMessage(err) }, "Provider stream did not close cleanly");
    });
  }

  private replyParams(opts: ReplyOptions): GenerationParams {
    return {
      model: this.identity.model,
      temperature: opts.temperature ?? this.identity.temperature,
      maxTokens: opts.maxTokens ?? this.identity.maxTokens,
    };
  }

  private assemble(pendingTurn?: PendingTurn, opts: ContextOptions = {}): AssembledContext {
    return buildContext({
      systemPrompt: this.config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      summaries: this.summaries,
      turns: this.store.all(),
      contextWindow: this.config.contextWindow,
      pendingTurn,
      budget: opts.budget,
      measure: opts.measure,
    });
  }

  private validateTurnInput(role: unknown, content: unknown): void {
    if (!ROLES.some((r) => r === role)) throw new ValidationError(`role must be one of ${ROLES.join(", ")}`, { role });
    if (typeof content !== "string" || !content.trim()) throw new ValidationError("message content must not be empty");
  }

  /** Append under the lock. Caller must already hold it. */
  private async commitTurn(
    role: Role,
    content: string,
    signal?: AbortSignal
  ): Promise<{ turn: Turn; summarized: Summary[]; warnings: string[] }> {
    this.validateTurnInput(role, content);
    const warnings: string[] = [];
    const summarized: Summary[] = [];

    if (this.store.isFull) {
      // Earlier summarizations failed; try to make room before rejecting the turn.
      const catchUp = await this.engine.run(this.summarizationContext(signal));
      if (catchUp.status !== "idle") summarized.push(...catchUp.created);
      if (this.store.isFull) {
        const cause = catchUp.status === "failed" ? catchUp.error.message : "no summarizable block";
        throw new CapacityViolation(this.config.maxMessages, { sessionId: this.id, cause });
      }
    }

    const turn: Turn = Object.freeze({ id: this.nextTurnId, role, content: content.trim(), createdAt: this.now() });
    this.store.append(turn);
    this.nextTurnId++;
    this.lastActiveAtMs = turn.createdAt;

    const outcome = await this.engine.run(this.summarizationContext(signal));
    if (outcome.status !== "idle") summarized.push(...outcome.created);
    if (outcome.status === "failed") {
      warnings.push(`Summarization deferred: ${outcome.error.message}`);
    }
    this.checkInvariants();
    return { turn, summarized, warnings };
  }

  private summarizationContext(signal?: AbortSignal): SummarizationContext {
    return {
      sessionId: this.id,
      store: this.store,
      summaries: this.summaries,
      provider: this.provider,
      model: this.identity.model,
      signal,
      now: this.now,
    };
  }

  private checkInvariants(): void {
    if (this.store.size > this.config.maxMessages) {
      throw new InternalStateError(`Store holds ${this.store.size} turns, above ${this.config.maxMessages}`);
    }
    let expected = 1;
    for (const s of this.summaries) {
      if (s.covers[0] !== expected || s.covers[1] < s.covers[0]) {
        throw new InternalStateError(`Summary range ${s.covers[0]}-${s.covers[1]} breaks contiguity at ${expected}`);
      }
      expected = s.covers[1] + 1;
    }
    for (const t of this.store.all()) {
      if (t.id !== expected) throw new InternalStateError(`Turn id ${t.id} breaks contiguity at ${expected}`);
      expected++;
    }
    if (expected !== this.nextTurnId) {
      throw new InternalStateError(`Turn ids end at ${expected - 1} but ${this.nextTurnId - 1} were created`);
    }
  }

  private snapshotState(): SessionState {
    return {
      id: this.id,
      identity: { ...this.identity },
      turns: this.store.all(),
      summaries: [...this.summaries],
      factsCache: this.factsCache,
      createdAt: this.createdAtMs,
      lastActiveAt: this.lastActiveAtMs,
    };
  }

  private assertValid(): void {
    if (this.closed) throw new SessionNotFound(this.id);
    if (this.invalid) throw this.invalid;
  }

  private async fatalOnInternal<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof InternalStateError && !this.invalid) {
        this.invalid = err;
        this.log.error({ event: "SESSION_INVALIDATED", err: err.message }, "Session invalidated by an internal state error");
      }
      throw err;
    }
  }

  private guard<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.run(() => {
      this.assertValid();
      return this.fatalOnInternal(fn);
    });
  }
}
