/**
 * Session memory types.
 * Bounded turn buffer + chronological summaries + cached facts, per session.
 */

import type { ProviderName, Role } from "../adapters/llm/types";

export interface Turn {
  /** Per-session monotonic sequence number, starting at 1. */
  readonly id: number;
  readonly role: Role;
  readonly content: string;
  /** Epoch ms. */
  readonly createdAt: number;
}

export interface Summary {
  /** Inclusive turn id range this summary replaced. */
  readonly covers: readonly [number, number];
  readonly text: string;
  readonly createdAt: number;
}

export interface FactsCache {
  facts: string[];
  /** Last turn id the facts reflect. */
  validThrough: number;
  /** Number of summaries that existed when the facts were computed. */
  summaryCount: number;
}

/** A turn that is about to be sent but is not committed yet. */
export interface PendingTurn {
  role: Role;
  content: string;
}

export type SummarizerState = "accumulating" | "threshold_reached" | "summarizing";

/** Persistence handoff record (snake_case on the wire). */
export interface SessionExport {
  session_id: string;
  provider_identity: {
    provider: ProviderName;
    model: string;
    temperature: number;
    max_tokens: number;
  };
  turns: Array<{ id: number; role: Role; content: string; created_at: string }>;
  summaries: Array<{ covers: [number, number]; text: string; created_at: string }>;
  facts_cache: { facts: string[]; valid_through: number; summary_count: number };
  created_at: string;
  last_active_at: string;
}

export interface SessionStats {
  sessionId: string;
  provider: ProviderName;
  model: string;
  totalTurns: number;
  retainedTurns: number;
  summaries: number;
  maxMessages: number;
  /** Percentage of maxMessages in use, one decimal. */
  utilization: string;
  summarizerState: SummarizerState;
  createdAt: string;
  lastActiveAt: string;
}
