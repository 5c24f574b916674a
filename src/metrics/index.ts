/**
 * Process-wide memory metrics.
 * Counters are kept in-process and each record is logged; GET /metrics exposes a snapshot.
 */

import { logger } from "../logging";

export interface MemoryMetrics {
  summariesCreated: number;
  summarizationFailures: number;
  factRefreshes: number;
  factRefreshFailures: number;
  replies: number;
  replyFailures: number;
  /** Latency of the last summarization attempt (ms). */
  lastSummarizationMs?: number;
  /** Latency of the last reply generation (ms). */
  lastReplyMs?: number;
}

function emptyMetrics(): MemoryMetrics {
  return {
    summariesCreated: 0,
    summarizationFailures: 0,
    factRefreshes: 0,
    factRefreshFailures: 0,
    replies: 0,
    replyFailures: 0,
  };
}

let metrics: MemoryMetrics = emptyMetrics();

export function recordSummarization(sessionId: string, ok: boolean, durationMs: number, coveredTurns?: number): void {
  if (ok) metrics.summariesCreated++;
  else metrics.summarizationFailures++;
  metrics.lastSummarizationMs = durationMs;
  logger.debug(
    { event: "SUMMARIZATION_METRICS", session_id: sessionId, ok, duration_ms: durationMs, covered_turns: coveredTurns },
    "Summarization attempt"
  );
}

export function recordFactRefresh(sessionId: string, ok: boolean, factCount?: number): void {
  if (ok) metrics.factRefreshes++;
  else metrics.factRefreshFailures++;
  logger.debug({ event: "FACTS_METRICS", session_id: sessionId, ok, fact_count: factCount }, "Fact refresh attempt");
}

export function recordReply(sessionId: string, ok: boolean, durationMs: number): void {
  if (ok) metrics.replies++;
  else metrics.replyFailures++;
  metrics.lastReplyMs = durationMs;
  logger.debug({ event: "REPLY_METRICS", session_id: sessionId, ok, duration_ms: durationMs }, "Reply attempt");
}

export function getMemoryMetrics(): MemoryMetrics {
  return { ...metrics };
}

export function resetMemoryMetrics(): void {
  metrics = emptyMetrics();
}
