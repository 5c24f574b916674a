/**
 * Memory search. LexicalSearch is the deterministic default; an embedding-backed
 * strategy can replace it behind the same SearchStrategy contract.
 */

import type { Summary, Turn } from "./types";

export type SearchHit =
  | { kind: "turn"; turn: Turn; score: number }
  | { kind: "summary"; summary: Summary; score: number };

export interface SearchCorpus {
  turns: readonly Turn[];
  summaries: readonly Summary[];
}

export interface SearchStrategy {
  search(corpus: SearchCorpus, query: string, topK: number): Promise<SearchHit[]>;
}

const MIN_TERM_LENGTH = 3;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Distinct query tokens of 3+ chars; all distinct tokens when none is that long. */
export function queryTerms(query: string): string[] {
  const distinct = [...new Set(tokenize(query))];
  const long = distinct.filter((t) => t.length >= MIN_TERM_LENGTH);
  return long.length > 0 ? long : distinct;
}

interface Scored {
  hit: SearchHit;
  matches: number;
  length: number;
  recency: number;
}

/**
 * Score = tokens equal to a query term / total tokens. Higher score first; equal scores
 * go to the more recent item (turn id, or the last id a summary covers).
 */
export class LexicalSearch implements SearchStrategy {
  async search(corpus: SearchCorpus, query: string, topK: number): Promise<SearchHit[]> {
    if (topK <= 0) return [];
    const terms = new Set(queryTerms(query));
    if (terms.size === 0) return [];

    const scored: Scored[] = [];
    const consider = (text: string, recency: number, makeHit: (score: number) => SearchHit): void => {
      const tokens = tokenize(text);
      const matches = tokens.filter((t) => terms.has(t)).length;
      if (matches === 0) return;
      scored.push({ hit: makeHit(matches / tokens.length), matches, length: tokens.length, recency });
    };
    for (const summary of corpus.summaries) {
      consider(summary.text, summary.covers[1], (score) => ({ kind: "summary", summary, score }));
    }
    for (const turn of corpus.turns) {
      consider(turn.content, turn.id, (score) => ({ kind: "turn", turn, score }));
    }

    // Compare matches/length exactly by cross-multiplying.
    scored.sort((a, b) => b.matches * a.length - a.matches * b.length || b.recency - a.recency);
    return scored.slice(0, Math.floor(topK)).map((s) => s.hit);
  }
}
