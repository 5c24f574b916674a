/**
 * ChatbotEngine: the operation surface over the session registry.
 * Validates caller input, resolves provider identities and shapes results for the HTTP layer.
 */

import {
  PROVIDER_CATALOG,
  PROVIDER_NAMES,
  defaultModelFor,
  isProviderName,
  type ProviderIdentity,
  type ProviderName,
  type Role,
} from "../adapters/llm";
import type { LlmConfig } from "../config";
import { ValidationError, withSessionId } from "../errors";
import { logger } from "../logging";
import type { AssembledContext, ContextMeasure } from "../memory/context";
import type { FactsResult } from "../memory/facts";
import type { SessionRegistry, SessionSummaryInfo } from "../memory/registry";
import type { SearchHit } from "../memory/search";
import type { SessionMemory, SummaryTextResult } from "../memory/session";
import type { SessionExport, SessionStats, Turn } from "../memory/types";

const DEFAULT_TOP_K = 5;
const ROLES: readonly Role[] = ["system", "user", "assistant"];

export interface CreateSessionOptions {
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export interface SessionInfo {
  sessionId: string;
  provider: ProviderName;
  model: string;
  temperature: number;
  maxTokens: number;
  createdAt: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ChatResult {
  sessionId: string;
  response: string;
  provider: ProviderName;
  model: string;
  /** When the reply was committed (ISO). */
  timestamp: string;
  warnings: string[];
}

export type ChatStreamEvent = { type: "chunk"; sessionId: string; text: string } | ({ type: "done" } & ChatResult);

export interface AddTurnReply {
  turn: Turn;
  context: AssembledContext;
  warnings: string[];
}

export interface ProviderListing {
  name: ProviderName;
  displayName: string;
  defaultModel: string;
  models: string[];
  configured: boolean;
}

function requireSessionId(id: unknown): string {
  if (typeof id !== "string" || !id.trim()) throw new ValidationError("session id must be a non-empty string");
  return id.trim();
}

function requireMessage(message: unknown): string {
  if (typeof message !== "string" || !message.trim()) throw new ValidationError("message must not be empty");
  return message;
}

function checkTemperature(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 2) {
    throw new ValidationError("temperature must be a number in [0, 2]", { temperature: value });
  }
  return value;
}

function checkMaxTokens(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ValidationError("max_tokens must be a positive integer", { maxTokens: value });
  }
  return value;
}

function checkProvider(value: unknown): ProviderName {
  if (!isProviderName(value)) {
    throw new ValidationError(`Unknown provider: ${String(value)} (expected one of ${PROVIDER_NAMES.join(", ")})`);
  }
  return value;
}

function checkModel(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !value.trim()) throw new ValidationError("model must be a non-empty string");
  return value.trim();
}

export class ChatbotEngine {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly llm: LlmConfig
  ) {}

  listProviders(): ProviderListing[] {
    return PROVIDER_NAMES.map((name) => {
      const info = PROVIDER_CATALOG[name];
      return {
        name,
        displayName: info.displayName,
        defaultModel: info.defaultModel,
        models: [...info.models],
        configured: name === "stub" || Boolean(this.llm.apiKeys[name]),
      };
    });
  }

  createSession(opts: CreateSessionOptions = {}): SessionInfo {
    const provider = opts.provider === undefined ? this.llm.provider : checkProvider(opts.provider);
    const model =
      checkModel(opts.model) ?? (provider === this.llm.provider && this.llm.model ? this.llm.model : defaultModelFor(provider));
    const identity: ProviderIdentity = {
      provider,
      model,
      temperature: checkTemperature(opts.temperature) ?? this.llm.temperature,
      maxTokens: checkMaxTokens(opts.maxTokens) ?? this.llm.maxTokens,
    };
    if (opts.systemPrompt !== undefined && (typeof opts.systemPrompt !== "string" || !opts.systemPrompt.trim())) {
      throw new ValidationError("system_prompt must be a non-empty string");
    }
    const session = this.registry.create(identity, { systemPrompt: opts.systemPrompt });
    return this.info(session);
  }

  listSessions(): SessionSummaryInfo[] {
    return this.registry.list();
  }

  deleteSession(id: string): void {
    this.registry.delete(requireSessionId(id));
  }

  async addTurn(id: string, role: string, content: string): Promise<AddTurnReply> {
    const session = this.session(id);
    const checkedRole = ROLES.find((r) => r === role);
    if (!checkedRole) throw new ValidationError(`role must be one of ${ROLES.join(", ")}`, { role });
    const { turn, context, warnings } = await session.addTurn(checkedRole, requireMessage(content));
    return { turn, context, warnings };
  }

  /** Send a user message and get the reply. Without a session id a new session is created. */
  async chat(id: string | undefined, message: string, opts: ChatOptions = {}): Promise<ChatResult> {
    const text = requireMessage(message);
    const params = this.replyOptions(opts);
    const session = id === undefined ? this.session(this.createSession().sessionId) : this.session(id);
    try {
      const { reply, warnings } = await session.generateReply(text, params);
      return this.chatResult(session, reply, warnings);
    } catch (err) {
      // The user turn is committed; a caller that sent no id needs it to continue.
      throw id === undefined ? withSessionId(err, session.id) : err;
    }
  }

  /** Streaming chat: chunk events as fragments arrive, then one done event once the reply is committed. */
  async *chatStream(id: string | undefined, message: string, opts: ChatOptions = {}): AsyncGenerator<ChatStreamEvent> {
    const text = requireMessage(message);
    const params = this.replyOptions(opts);
    const session = id === undefined ? this.session(this.createSession().sessionId) : this.session(id);
    try {
      for await (const event of session.streamReply(text, params)) {
        if (event.type === "chunk") {
          yield { type: "chunk", sessionId: session.id, text: event.text };
        } else {
          yield { type: "done", ...this.chatResult(session, event.reply, event.warnings) };
        }
      }
    } catch (err) {
      throw id === undefined ? withSessionId(err, session.id) : err;
    }
  }

  async getContext(
    id: string,
    pendingTurn?: { role: string; content: string },
    budget?: number,
    measure?: ContextMeasure
  ): Promise<AssembledContext> {
    const session = this.session(id);
    if (pendingTurn === undefined) return session.getContext(undefined, { budget, measure });
    const role = ROLES.find((r) => r === pendingTurn.role);
    if (!role) throw new ValidationError(`role must be one of ${ROLES.join(", ")}`, { role: pendingTurn.role });
    return session.getContext({ role, content: requireMessage(pendingTurn.content) }, { budget, measure });
  }

  async getSummaryText(id: string): Promise<SummaryTextResult> {
    return this.session(id).getSummaryText();
  }

  async getFacts(id: string): Promise<FactsResult> {
    return this.session(id).getFacts();
  }

  async search(id: string, query: string, topK: number = DEFAULT_TOP_K): Promise<SearchHit[]> {
    return this.session(id).search(query, topK);
  }

  async getHistory(id: string, limit?: number): Promise<Turn[]> {
    return this.session(id).history(limit);
  }

  async getStats(id: string): Promise<SessionStats> {
    return this.session(id).stats();
  }

  async switchProvider(id: string, provider: string, model?: string): Promise<ProviderIdentity> {
    const session = this.session(id);
    const name = checkProvider(provider);
    const current = session.providerIdentity;
    const identity = await session.rebind({ ...current, provider: name, model: checkModel(model) ?? defaultModelFor(name) });
    logger.info({ event: "PROVIDER_SWITCHED", sessionId: session.id, from: current.provider, to: name }, "Provider switched");
    return identity;
  }

  async exportSession(id: string): Promise<SessionExport> {
    return this.session(id).export();
  }

  importSession(data: unknown): string {
    return this.registry.import(data).id;
  }

  private session(id: string): SessionMemory {
    return this.registry.get(requireSessionId(id));
  }

  private replyOptions(opts: ChatOptions): ChatOptions {
    return {
      temperature: checkTemperature(opts.temperature),
      maxTokens: checkMaxTokens(opts.maxTokens),
      signal: opts.signal,
    };
  }

  private chatResult(session: SessionMemory, reply: Turn, warnings: string[]): ChatResult {
    const identity = session.providerIdentity;
    return {
      sessionId: session.id,
      response: reply.content,
      provider: identity.provider,
      model: identity.model,
      timestamp: new Date(reply.createdAt).toISOString(),
      warnings,
    };
  }

  private info(session: SessionMemory): SessionInfo {
    const identity = session.providerIdentity;
    return {
      sessionId: session.id,
      provider: identity.provider,
      model: identity.model,
      temperature: identity.temperature,
      maxTokens: identity.maxTokens,
      createdAt: new Date(session.createdAt).toISOString(),
    };
  }
}
