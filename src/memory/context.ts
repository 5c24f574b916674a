/**
 * ContextAssembler: builds the ordered prompt context for the next generation call.
 * Order: system prompt, summaries (chronological), last `contextWindow` turns, pending turn.
 * Over budget, the oldest summaries go first; turns, the pending turn and the system prompt are kept.
 */

import type { Message } from "../adapters/llm/types";
import { renderSummaryLabel } from "../prompts/memory-prompts";
import type { PendingTurn, Summary, Turn } from "./types";

/** "count": one unit per message; "chars": content length; or a custom measure. */
export type ContextMeasure = "count" | "chars" | ((message: Message) => number);

export interface BuildContextInput {
  systemPrompt?: string;
  summaries: readonly Summary[];
  /** Retained turns, oldest first. */
  turns: readonly Turn[];
  contextWindow: number;
  pendingTurn?: PendingTurn;
  budget?: number;
  measure?: ContextMeasure;
}

export interface AssembledContext {
  messages: Message[];
  /** Total size under the chosen measure. */
  size: number;
  droppedSummaries: number;
  withinBudget: boolean;
}

function sizeOf(messages: readonly Message[], measure: ContextMeasure): number {
  if (measure === "count") return messages.length;
  if (measure === "chars") return messages.reduce((n, m) => n + m.content.length, 0);
  return messages.reduce((n, m) => n + measure(m), 0);
}

export function buildContext(input: BuildContextInput): AssembledContext {
  const measure = input.measure ?? "count";
  const head: Message[] = input.systemPrompt ? [{ role: "system", content: input.systemPrompt }] : [];
  const summaryMessages: Message[] = input.summaries.map((s) => ({ role: "system", content: renderSummaryLabel(s) }));
  const window = Math.max(0, Math.floor(input.contextWindow));
  const recent = window === 0 ? [] : input.turns.slice(-window);
  const tail: Message[] = recent.map((t) => ({ role: t.role, content: t.content }));
  if (input.pendingTurn) tail.push({ role: input.pendingTurn.role, content: input.pendingTurn.content });

  const fixedSize = sizeOf(head, measure) + sizeOf(tail, measure);
  let kept = summaryMessages;
  let size = fixedSize + sizeOf(kept, measure);
  let droppedSummaries = 0;
  if (input.budget !== undefined) {
    while (size > input.budget && kept.length > 0) {
      kept = kept.slice(1);
      droppedSummaries++;
      size = fixedSize + sizeOf(kept, measure);
    }
  }

  return {
    messages: [...head, ...kept, ...tail],
    size,
    droppedSummaries,
    withinBudget: input.budget === undefined || size <= input.budget,
  };
}
