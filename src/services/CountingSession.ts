/**
 * Counting Session - one shoe counted with one system
 *
 * Wraps a fresh CountingLedger, applies ledger commands and produces the
 * scoreboard snapshot the presentation layer displays.
 */

import type { CountingSystem, KeyCommand, SessionSnapshot } from "../types.ts";
import { CountingLedger, type LedgerOptions } from "../strategy/CountingLedger.ts";
import {
  formatCardsSeen,
  formatHistory,
  formatIncrement,
  formatTrueCount,
} from "../utils/formatting.ts";
import { logger } from "../utils/logger.ts";

export class CountingSession {
  readonly system: CountingSystem;
  readonly ledger: CountingLedger;

  constructor(system: CountingSystem, options: LedgerOptions = {}) {
    this.system = system;
    this.ledger = new CountingLedger(options);

    logger.info(
      `[CountingSession] Started ${system.name} with ${this.ledger.decksTotal} deck(s) ` +
      `(undo budget ${this.ledger.undoBudget}, redo cap ${this.ledger.redoCap})`
    );
  }

  /**
   * Apply a ledger command. Returns true when the count changed and the
   * scoreboard needs a refresh.
   */
  apply(command: KeyCommand): boolean {
    switch (command.type) {
      case "record":
        this.ledger.record(command.label, command.value);
        return true;

      case "undo":
        return this.ledger.undo() !== null;

      case "redo":
        return this.ledger.redo() !== null;

      case "reset":
        this.ledger.reset();
        logger.info(`[CountingSession] ${this.system.name} shoe reset`);
        return true;

      default:
        return false;
    }
  }

  snapshot(): SessionSnapshot {
    const ledger = this.ledger;

    return {
      system: this.system.id,
      history: formatHistory(ledger.history),
      runningCount: formatIncrement(ledger.runningCount),
      trueCount: formatTrueCount(ledger.trueCount),
      cardsSeen: formatCardsSeen(ledger.cardsSeen),
      decksRemaining: ledger.decksRemaining,
      canUndo: ledger.canUndo,
      canRedo: ledger.canRedo,
    };
  }
}
