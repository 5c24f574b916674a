/**
 * Fixed-capacity ordered buffer of turns for one session.
 * Never evicts on its own: the summarizer removes the oldest block with dropPrefix after
 * the matching summary is committed.
 */

import { CapacityViolation, InternalStateError } from "../errors";
import type { Turn } from "./types";

export class MessageStore {
  private turns: Turn[] = [];

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.turns.length;
  }

  get isFull(): boolean {
    return this.turns.length >= this.capacity;
  }

  append(turn: Turn): void {
    if (this.isFull) {
      throw new CapacityViolation(this.capacity, { turnId: turn.id });
    }
    const last = this.last();
    if (last && turn.id !== last.id + 1) {
      throw new InternalStateError(`Turn id ${turn.id} does not follow ${last.id}`, { turnId: turn.id, lastId: last.id });
    }
    this.turns.push(turn);
  }

  /** Last n turns, oldest first; n is clamped to [0, size]. */
  recent(n: number): Turn[] {
    const count = Math.max(0, Math.min(Math.floor(n), this.turns.length));
    return count === 0 ? [] : this.turns.slice(-count);
  }

  /** Remove and return the oldest `count` turns. */
  dropPrefix(count: number): Turn[] {
    if (!Number.isInteger(count) || count < 0 || count > this.turns.length) {
      throw new InternalStateError(`Cannot drop ${count} of ${this.turns.length} turns`, { count, size: this.turns.length });
    }
    return this.turns.splice(0, count);
  }

  all(): Turn[] {
    return [...this.turns];
  }

  first(): Turn | undefined {
    return this.turns[0];
  }

  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }
}
