/**
 * Count Trainer - terminal driver
 *
 * Reads key names from stdin, one or more per line, and logs the scoreboard
 * after every change.
 */

import { createInterface } from "node:readline";
import { loadConfig } from "./config.ts";
import { logger } from "./utils/logger.ts";
import { ScreenNavigator } from "./services/ScreenNavigator.ts";
import { tokenizeKeys } from "./services/KeyBindings.ts";

const QUIT_WORDS = new Set(["quit", "exit"]);

function logScreen(navigator: ScreenNavigator): void {
  const screen = navigator.activeScreen;
  const snapshot = navigator.snapshot();

  if (!snapshot) {
    const keys = Array.from(screen.keymap().keys()).join(", ");
    logger.info(`[${screen.name}] keys: ${keys}`);
    return;
  }

  navigator.activeSession?.ledger.logStatus();
  logger.info(`Previously counted: ${snapshot.history}`);
  logger.info(
    `Running: ${snapshot.runningCount}  True: ${snapshot.trueCount}  ${snapshot.cardsSeen}  ` +
    `Decks left: ${snapshot.decksRemaining.toFixed(2)}` +
    `${snapshot.canUndo ? '' : '  [undo unavailable]'}${snapshot.canRedo ? '  [redo available]' : ''}`
  );
}

function main(): void {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  logger.info("═══════════════════════════════════════════");
  logger.info("🃏 Manual Blackjack Count Trainer");
  logger.info("═══════════════════════════════════════════");
  logger.info(`  Decks: ${config.decksTotal}`);
  logger.info(`  Undo budget: ${config.undoBudget}, Redo cap: ${config.redoCap}`);
  logger.info("  Type key names (e.g. l, h, <, >, ctrl+r, menu); 'quit' to exit");
  logger.info("");

  const navigator = new ScreenNavigator({
    ledger: {
      decksTotal: config.decksTotal,
      undoBudget: config.undoBudget,
      redoCap: config.redoCap,
    },
    hiLo: { rankMode: config.hiLoRankMode },
  });

  if (config.countingSystem) {
    navigator.startMode(config.countingSystem);
  }
  logScreen(navigator);

  const rl = createInterface({ input: process.stdin });

  rl.on("line", (line) => {
    for (const token of tokenizeKeys(line)) {
      if (QUIT_WORDS.has(token.toLowerCase())) {
        rl.close();
        return;
      }

      const outcome = navigator.handleKey(token);
      if (!outcome.handled) {
        logger.warn(`Unbound key on ${navigator.activeScreen.name}: ${token}`);
      } else if (outcome.changed) {
        logScreen(navigator);
      }
    }
  });

  rl.on("close", () => {
    logger.info("🛑 Shutting down...");
    process.exit(0);
  });

  // Graceful shutdown
  process.on("SIGINT", () => {
    rl.close();
  });
}

try {
  main();
} catch (error) {
  logger.error("");
  logger.error("═══════════════════════════════════════════");
  logger.error("❌ Fatal Error");
  logger.error("═══════════════════════════════════════════");
  logger.error(error);
  process.exit(1);
}
