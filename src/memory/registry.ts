/**
 * SessionRegistry: creates, finds, imports and evicts sessions.
 * Sessions live in a SessionStore; the default keeps them in process memory.
 */

import { randomUUID } from "crypto";
import type { ProviderFactory, ProviderIdentity } from "../adapters/llm";
import { SessionNotFound, ValidationError } from "../errors";
import { logger } from "../logging";
import { SessionMemory, validateMemoryConfig, type SessionMemoryConfig, type SessionMemoryDeps } from "./session";
import type { SearchStrategy } from "./search";

export interface SessionStore {
  get(id: string): SessionMemory | undefined;
  set(session: SessionMemory): void;
  delete(id: string): boolean;
  values(): SessionMemory[];
  readonly size: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionMemory>();

  get(id: string): SessionMemory | undefined {
    return this.sessions.get(id);
  }

  set(session: SessionMemory): void {
    this.sessions.set(session.id, session);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  values(): SessionMemory[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}

export interface SessionRegistryOptions {
  memory: SessionMemoryConfig;
  providerFactory: ProviderFactory;
  /** Evict sessions idle this long (ms); 0 disables. */
  idleTimeoutMs?: number;
  store?: SessionStore;
  search?: () => SearchStrategy;
  now?: () => number;
  newId?: () => string;
}

export interface SessionSummaryInfo {
  sessionId: string;
  provider: string;
  model: string;
  createdAt: string;
  lastActiveAt: string;
}

export class SessionRegistry {
  private readonly store: SessionStore;
  /** Ids that were deleted or evicted; never reused, never re-imported. */
  private readonly retired = new Set<string>();
  private readonly now: () => number;
  private readonly newId: () => string;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;

  constructor(private readonly opts: SessionRegistryOptions) {
    validateMemoryConfig(opts.memory);
    if (opts.idleTimeoutMs !== undefined && !(Number.isInteger(opts.idleTimeoutMs) && opts.idleTimeoutMs >= 0)) {
      throw new ValidationError("idleTimeoutMs must be a non-negative integer");
    }
    this.store = opts.store ?? new InMemorySessionStore();
    this.now = opts.now ?? Date.now;
    this.newId = opts.newId ?? randomUUID;
  }

  get size(): number {
    return this.store.size;
  }

  /** `systemPrompt` overrides the configured prompt for this session only. */
  create(identity: ProviderIdentity, overrides: { systemPrompt?: string } = {}): SessionMemory {
    let id = this.newId();
    while (this.store.get(id) || this.retired.has(id)) id = this.newId();
    const memory = overrides.systemPrompt ? { ...this.opts.memory, systemPrompt: overrides.systemPrompt } : this.opts.memory;
    const session = new SessionMemory(id, identity, memory, this.deps());
    this.store.set(session);
    logger.info({ event: "SESSION_CREATED", sessionId: id, provider: identity.provider, model: identity.model }, "Session created");
    return session;
  }

  /** @throws SessionNotFound */
  get(id: string): SessionMemory {
    const session = this.store.get(id);
    if (!session) throw new SessionNotFound(id);
    return session;
  }

  has(id: string): boolean {
    return this.store.get(id) !== undefined;
  }

  /** Queued operations on the session fail with SessionNotFound once it is deleted. */
  delete(id: string): void {
    const session = this.store.get(id);
    if (!session) throw new SessionNotFound(id);
    this.store.delete(id);
    session.close();
    this.retired.add(id);
    logger.info({ event: "SESSION_DELETED", sessionId: id }, "Session deleted");
  }

  /** Rebuild a session from an export record under its original id. */
  import(data: unknown): SessionMemory {
    const session = SessionMemory.fromExport(data, this.opts.memory, this.deps());
    if (this.store.get(session.id) || this.retired.has(session.id)) {
      throw new ValidationError(`Session id already in use: ${session.id}`, { sessionId: session.id });
    }
    this.store.set(session);
    logger.info({ event: "SESSION_IMPORTED", sessionId: session.id }, "Session imported");
    return session;
  }

  list(): SessionSummaryInfo[] {
    return this.store.values().map((s) => {
      const identity = s.providerIdentity;
      return {
        sessionId: s.id,
        provider: identity.provider,
        model: identity.model,
        createdAt: new Date(s.createdAt).toISOString(),
        lastActiveAt: new Date(s.lastActiveAt).toISOString(),
      };
    });
  }

  /** Drop sessions idle longer than the timeout. Sessions with an operation in flight are kept. */
  evictIdle(now: number = this.now()): string[] {
    const timeout = this.opts.idleTimeoutMs ?? 0;
    if (timeout <= 0) return [];
    const evicted: string[] = [];
    for (const session of this.store.values()) {
      if (session.busy || now - session.lastActiveAt < timeout) continue;
      this.store.delete(session.id);
      session.close();
      this.retired.add(session.id);
      evicted.push(session.id);
    }
    if (evicted.length > 0) {
      logger.info({ event: "SESSIONS_EVICTED", count: evicted.length, sessionIds: evicted }, "Idle sessions evicted");
    }
    return evicted;
  }

  /** Periodic eviction; no-op when the idle timeout is disabled. */
  startIdleSweep(intervalMs?: number): void {
    const timeout = this.opts.idleTimeoutMs ?? 0;
    if (timeout <= 0 || this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.evictIdle(), intervalMs ?? Math.max(1000, Math.floor(timeout / 2)));
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  private deps(): SessionMemoryDeps {
    return {
      providerFactory: this.opts.providerFactory,
      search: this.opts.search?.(),
      now: this.opts.now,
    };
  }
}
