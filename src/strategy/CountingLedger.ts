/**
 * Counting Ledger - running count, true count and bounded undo/redo for one shoe
 *
 * Every button press or shortcut becomes a CountEntry. The aggregates are
 * derived from the active history on demand.
 */

import type { CountEntry, LedgerStats } from "../types.ts";
import { logger } from "../utils/logger.ts";
import { formatIncrement, formatTrueCount } from "../utils/formatting.ts";

export const CARDS_PER_DECK = 52;
export const DEFAULT_DECKS = 6.0;
export const DEFAULT_UNDO_BUDGET = 5;
export const DEFAULT_REDO_CAP = 20;

// True count denominator never drops below a quarter deck
export const MIN_DECKS_FOR_TRUE_COUNT = 0.25;

export interface LedgerOptions {
  decksTotal?: number;
  undoBudget?: number;
  redoCap?: number;
}

export class CountingLedger {
  readonly decksTotal: number;
  readonly undoBudget: number;
  readonly redoCap: number;

  private entries: CountEntry[] = [];
  private redoBuffer: CountEntry[] = [];
  private undosUsed: number = 0;

  constructor(options: LedgerOptions = {}) {
    const {
      decksTotal = DEFAULT_DECKS,
      undoBudget = DEFAULT_UNDO_BUDGET,
      redoCap = DEFAULT_REDO_CAP,
    } = options;

    if (!Number.isFinite(decksTotal) || decksTotal <= 0) {
      throw new Error(`Invalid deck count: ${decksTotal} (must be a positive number)`);
    }
    if (!Number.isInteger(undoBudget) || undoBudget < 0) {
      throw new Error(`Invalid undo budget: ${undoBudget} (must be a non-negative integer)`);
    }
    if (!Number.isInteger(redoCap) || redoCap < 0) {
      throw new Error(`Invalid redo cap: ${redoCap} (must be a non-negative integer)`);
    }

    this.decksTotal = decksTotal;
    this.undoBudget = undoBudget;
    this.redoCap = redoCap;
  }

  /**
   * Record an adjustment. Starts a new redo lineage and refills the undo budget.
   */
  record(label: string, value: number): CountEntry {
    const entry: CountEntry = Object.freeze({ label, value });

    this.entries.push(entry);
    this.redoBuffer = [];
    this.undosUsed = 0;

    logger.debug(`[CountingLedger] Recorded ${label}(${formatIncrement(value)}), RC: ${this.runningCount}`);
    return entry;
  }

  /**
   * Move the latest entry to the redo buffer.
   * Returns null when the history is empty or the undo budget is spent.
   */
  undo(): CountEntry | null {
    if (this.undosUsed >= this.undoBudget) {
      logger.debug(`[CountingLedger] Undo budget of ${this.undoBudget} spent`);
      return null;
    }

    const entry = this.entries.pop();
    if (entry === undefined) return null;

    this.redoBuffer.push(entry);
    if (this.redoBuffer.length > this.redoCap) {
      this.redoBuffer.shift(); // Drop oldest pending
    }
    this.undosUsed++;

    logger.debug(
      `[CountingLedger] Undid ${entry.label}(${formatIncrement(entry.value)}), ` +
      `${this.undosRemaining} undo(s) left`
    );
    return entry;
  }

  /**
   * Restore the most recently undone entry and give back one unit of undo budget.
   */
  redo(): CountEntry | null {
    const entry = this.redoBuffer.pop();
    if (entry === undefined) return null;

    this.entries.push(entry);
    if (this.undosUsed > 0) {
      this.undosUsed--;
    }

    logger.debug(`[CountingLedger] Redid ${entry.label}(${formatIncrement(entry.value)})`);
    return entry;
  }

  /**
   * Clear the shoe in place (new shoe, same session)
   */
  reset(): void {
    this.entries = [];
    this.redoBuffer = [];
    this.undosUsed = 0;

    logger.debug("[CountingLedger] Shoe reset");
  }

  get history(): readonly CountEntry[] {
    return this.entries;
  }

  get runningCount(): number {
    return this.entries.reduce((sum, entry) => sum + entry.value, 0);
  }

  get cardsSeen(): number {
    return this.entries.length;
  }

  get decksRemaining(): number {
    return Math.max(0, this.decksTotal - this.cardsSeen / CARDS_PER_DECK);
  }

  /**
   * Running count divided by decks remaining (clamped to a quarter deck)
   */
  get trueCount(): number {
    if (this.entries.length === 0) return 0;
    return this.runningCount / Math.max(MIN_DECKS_FOR_TRUE_COUNT, this.decksRemaining);
  }

  get canUndo(): boolean {
    return this.entries.length > 0 && this.undosUsed < this.undoBudget;
  }

  get canRedo(): boolean {
    return this.redoBuffer.length > 0;
  }

  get undosRemaining(): number {
    return this.undoBudget - this.undosUsed;
  }

  /**
   * Get current count statistics
   */
  getStats(): LedgerStats {
    const totalCards = this.decksTotal * CARDS_PER_DECK;

    return {
      runningCount: this.runningCount,
      trueCount: this.trueCount,
      cardsSeen: this.cardsSeen,
      decksRemaining: this.decksRemaining,
      penetration: ((this.cardsSeen / totalCards) * 100).toFixed(1) + '%',
      canUndo: this.canUndo,
      canRedo: this.canRedo,
      undosRemaining: this.undosRemaining,
    };
  }

  /**
   * Log current count status
   */
  logStatus(): void {
    const stats = this.getStats();
    logger.debug(
      `[CountingLedger] RC: ${formatIncrement(stats.runningCount)}, TC: ${formatTrueCount(stats.trueCount)}, ` +
      `Seen: ${stats.cardsSeen} (${stats.penetration}), Decks left: ${stats.decksRemaining.toFixed(2)}`
    );
  }
}
