/**
 * Export / import codec for the persistence handoff record.
 * parseSessionExport validates untrusted input field by field and rebuilds the internal state.
 */

import { isProviderName } from "../adapters/llm/catalog";
import type { ProviderIdentity, Role } from "../adapters/llm/types";
import { ValidationError } from "../errors";
import type { FactsCache, SessionExport, Summary, Turn } from "./types";

export interface SessionState {
  id: string;
  identity: ProviderIdentity;
  turns: Turn[];
  summaries: Summary[];
  factsCache: FactsCache;
  createdAt: number;
  lastActiveAt: number;
}

const ROLES: readonly Role[] = ["system", "user", "assistant"];

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function toSessionExport(state: SessionState): SessionExport {
  return {
    session_id: state.id,
    provider_identity: {
      provider: state.identity.provider,
      model: state.identity.model,
      temperature: state.identity.temperature,
      max_tokens: state.identity.maxTokens,
    },
    turns: state.turns.map((t) => ({ id: t.id, role: t.role, content: t.content, created_at: iso(t.createdAt) })),
    summaries: state.summaries.map((s) => ({ covers: [s.covers[0], s.covers[1]], text: s.text, created_at: iso(s.createdAt) })),
    facts_cache: {
      facts: [...state.factsCache.facts],
      valid_through: state.factsCache.validThrough,
      summary_count: state.factsCache.summaryCount,
    },
    created_at: iso(state.createdAt),
    last_active_at: iso(state.lastActiveAt),
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function fail(message: string): never {
  throw new ValidationError(`Invalid session export: ${message}`);
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== "string") fail(`${where}.${key} must be a string`);
  return v;
}

function requireInt(obj: Record<string, unknown>, key: string, where: string, min: number): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isInteger(v) || v < min) fail(`${where}.${key} must be an integer >= ${min}`);
  return v;
}

function requireTimestamp(obj: Record<string, unknown>, key: string, where: string): number {
  const ms = Date.parse(requireString(obj, key, where));
  if (Number.isNaN(ms)) fail(`${where}.${key} is not an ISO timestamp`);
  return ms;
}

function requireArray(obj: Record<string, unknown>, key: string, where: string): unknown[] {
  const v = obj[key];
  if (!Array.isArray(v)) fail(`${where}.${key} must be an array`);
  return v;
}

function parseTurn(raw: unknown, i: number): Turn {
  const where = `turns[${i}]`;
  if (!isRecord(raw)) fail(`${where} must be an object`);
  const roleRaw = raw.role;
  const role = ROLES.find((r) => r === roleRaw);
  if (!role) fail(`${where}.role must be one of ${ROLES.join(", ")}`);
  return Object.freeze({
    id: requireInt(raw, "id", where, 1),
    role,
    content: requireString(raw, "content", where),
    createdAt: requireTimestamp(raw, "created_at", where),
  });
}

function parseSummary(raw: unknown, i: number): Summary {
  const where = `summaries[${i}]`;
  if (!isRecord(raw)) fail(`${where} must be an object`);
  const covers = raw.covers;
  if (!Array.isArray(covers) || covers.length !== 2) fail(`${where}.covers must be [start, end]`);
  const start: unknown = covers[0];
  const end: unknown = covers[1];
  if (typeof start !== "number" || typeof end !== "number" || !Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
    fail(`${where}.covers must be integers with 1 <= start <= end`);
  }
  return Object.freeze({
    covers: Object.freeze([start, end] as const),
    text: requireString(raw, "text", where),
    createdAt: requireTimestamp(raw, "created_at", where),
  });
}

/**
 * Validate an export record and rebuild session state. Checks shape, roles, the contiguity of
 * summary ranges and turn ids, and the capacity limit.
 */
export function parseSessionExport(data: unknown, limits: { maxMessages: number }): SessionState {
  if (!isRecord(data)) fail("record must be an object");
  const id = requireString(data, "session_id", "record").trim();
  if (!id) fail("session_id must not be empty");

  const identityRaw = data.provider_identity;
  if (!isRecord(identityRaw)) fail("provider_identity must be an object");
  const provider = identityRaw.provider;
  if (!isProviderName(provider)) fail(`provider_identity.provider is not a known provider`);
  const temperature = identityRaw.temperature;
  if (typeof temperature !== "number" || temperature < 0 || temperature > 2) fail("provider_identity.temperature must be in [0, 2]");
  const identity: ProviderIdentity = {
    provider,
    model: requireString(identityRaw, "model", "provider_identity"),
    temperature,
    maxTokens: requireInt(identityRaw, "max_tokens", "provider_identity", 1),
  };

  const summaries = requireArray(data, "summaries", "record").map(parseSummary);
  const turns = requireArray(data, "turns", "record").map(parseTurn);
  if (turns.length > limits.maxMessages) fail(`${turns.length} turns exceed max_messages ${limits.maxMessages}`);

  let expected = 1;
  for (const s of summaries) {
    if (s.covers[0] !== expected) fail(`summary range starting at ${s.covers[0]} leaves a gap or overlap (expected ${expected})`);
    expected = s.covers[1] + 1;
  }
  for (const t of turns) {
    if (t.id !== expected) fail(`turn id ${t.id} is out of sequence (expected ${expected})`);
    expected = t.id + 1;
  }
  const lastTurnId = expected - 1;

  const factsRaw = data.facts_cache;
  if (!isRecord(factsRaw)) fail("facts_cache must be an object");
  const facts = requireArray(factsRaw, "facts", "facts_cache");
  if (!facts.every((f): f is string => typeof f === "string")) fail("facts_cache.facts must be strings");
  const factsCache: FactsCache = {
    facts,
    validThrough: requireInt(factsRaw, "valid_through", "facts_cache", 0),
    summaryCount: requireInt(factsRaw, "summary_count", "facts_cache", 0),
  };
  if (factsCache.validThrough > lastTurnId) fail("facts_cache.valid_through is ahead of the last turn");
  if (factsCache.summaryCount > summaries.length) fail("facts_cache.summary_count is ahead of the summaries");

  return {
    id,
    identity,
    turns,
    summaries,
    factsCache,
    createdAt: requireTimestamp(data, "created_at", "record"),
    lastActiveAt: requireTimestamp(data, "last_active_at", "record"),
  };
}
