/**
 * Dedup & Tally Store
 *
 * Owns the per-sender history and the message tally. Every operation runs
 * inside the tally lock, so a duplicate check and its increment are one
 * atomic step and readers never see a half-applied record or reset.
 *
 * Diagnostics are logged after the lock is released; nothing here writes
 * to the console while holding it.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import { AsyncLock } from "../core/lock.js";
import { normalize } from "./normalize.js";

// ============================================
// TYPES
// ============================================

export interface TallyEntry {
  message: string;
  count: number;
}

export type RecordOutcome =
  | { kind: "duplicate"; sender: string; message: string }
  | { kind: "new"; sender: string; message: string; count: 1 }
  | { kind: "counted"; sender: string; message: string; count: number };

// ============================================
// STORE
// ============================================

export class TallyStore {
  private readonly lock = new AsyncLock();
  /** sender → canonical messages already counted for them */
  private readonly history = new Map<string, Set<string>>();
  /** canonical message → distinct-sender count, in first-seen order */
  private readonly tally = new Map<string, number>();

  constructor(private readonly log?: ILogger) {}

  async record(sender: string, rawMessage: string): Promise<RecordOutcome> {
    const message = normalize(rawMessage);

    const outcome = await this.lock.runExclusive((): RecordOutcome => {
      let seen = this.history.get(sender);
      if (!seen) {
        seen = new Set();
        this.history.set(sender, seen);
      }
      if (seen.has(message)) {
        return { kind: "duplicate", sender, message };
      }
      seen.add(message);

      const count = (this.tally.get(message) ?? 0) + 1;
      this.tally.set(message, count);
      return count === 1
        ? { kind: "new", sender, message, count: 1 }
        : { kind: "counted", sender, message, count };
    });

    switch (outcome.kind) {
      case "duplicate":
        this.log?.info(`Ignoring duplicate message from ${sender}`);
        break;
      case "new":
        this.log?.info(`Adding answer from ${sender}: ${message}`);
        break;
      case "counted":
        this.log?.debug(`Counted answer from ${sender}`, { message, count: outcome.count });
        break;
    }

    return outcome;
  }

  /**
   * Up to `n` entries, highest count first. Equal counts keep first-seen
   * order: Map iteration follows insertion and Array#sort is stable.
   */
  topN(n: number): Promise<TallyEntry[]> {
    return this.lock.runExclusive((): TallyEntry[] => {
      if (n <= 0) return [];
      return Array.from(this.tally, ([message, count]) => ({ message, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, n);
    });
  }

  /** Empties history and tally together. */
  async reset(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.history.clear();
      this.tally.clear();
    });
    this.log?.debug("Tally store reset");
  }

  /** Number of distinct canonical messages tallied */
  size(): Promise<number> {
    return this.lock.runExclusive(() => this.tally.size);
  }
}
