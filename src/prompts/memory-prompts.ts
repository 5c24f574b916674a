/**
 * Prompts used by the chat assistant and by the memory subsystem's internal LLM calls.
 */

import type { Message } from "../adapters/llm/types";
import type { Summary, Turn } from "../memory/types";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful assistant that remembers the conversation.",
  "You may be given summaries of earlier parts of the conversation followed by the most recent messages.",
  "Be concise and accurate. Refer back to earlier context when it helps, and ask for clarification when earlier context is unclear.",
  "Keep continuity: respect preferences and decisions the user stated before.",
].join("\n");

const SUMMARIZER_SYSTEM = [
  "You condense conversation transcripts.",
  "Write a compact account of the excerpt: main topics, key information exchanged, decisions or conclusions, and open questions.",
  "No preamble. Do not invent details.",
].join(" ");

const FACTS_SYSTEM = [
  "You extract concrete facts from a conversation: names, places, dates, numbers, technical details, stated preferences, requirements and decisions.",
  "Answer with a bullet list, one fact per line, nothing else.",
].join(" ");

const MEMORY_SUMMARY_SYSTEM = [
  "You write an overview of a whole conversation from earlier summaries and the latest messages.",
  "Cover the overall purpose, the main topics, the key information, and the current state including pending items.",
].join(" ");

export function renderTurns(turns: readonly Turn[]): string {
  return turns.map((t) => `${t.role.toUpperCase()}: ${t.content}`).join("\n");
}

export function renderSummaryLabel(summary: Summary): string {
  return `Summary of turns ${summary.covers[0]}-${summary.covers[1]}:\n${summary.text}`;
}

export function buildSummarizationMessages(block: readonly Turn[]): Message[] {
  return [
    { role: "system", content: SUMMARIZER_SYSTEM },
    { role: "user", content: `Conversation excerpt:\n${renderTurns(block)}\n\nSummary:` },
  ];
}

export function buildFactExtractionMessages(summaries: readonly Summary[], turns: readonly Turn[]): Message[] {
  const parts: string[] = [];
  if (summaries.length > 0) {
    parts.push("Earlier summaries:", ...summaries.map(renderSummaryLabel), "");
  }
  if (turns.length > 0) {
    parts.push("Recent conversation:", renderTurns(turns));
  }
  return [
    { role: "system", content: FACTS_SYSTEM },
    { role: "user", content: `${parts.join("\n")}\n\nKey facts:` },
  ];
}

export function buildMemorySummaryMessages(summaries: readonly Summary[], recent: readonly Turn[]): Message[] {
  const parts: string[] = [];
  if (summaries.length > 0) {
    parts.push("Previous summaries:", ...summaries.map((s) => s.text), "");
  }
  if (recent.length > 0) {
    parts.push("Recent conversation:", renderTurns(recent));
  }
  return [
    { role: "system", content: MEMORY_SUMMARY_SYSTEM },
    { role: "user", content: parts.join("\n") },
  ];
}
