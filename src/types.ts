/**
 * Type definitions for the count trainer
 */

export interface CountEntry {
  readonly label: string; // rank ('2'-'10', 'J', 'Q', 'K', 'A') or "Low"/"Hi"
  readonly value: number; // signed contribution to the running count
}

export type CountingSystemId = "hi-lo" | "wong-halves";

export interface CountingAction {
  label: string;
  value: number;
}

export interface CountingSystem {
  id: CountingSystemId;
  name: string;
  actions: readonly CountingAction[];
}

export type RankCategory = "low" | "neutral" | "hi";

export interface HotkeyGroup {
  name: string;
  title: string;
  lowLabel: string;
  hiLabel: string;
  lowKeys: readonly string[];
  hiKeys: readonly string[];
}

export type ScreenName = "StartMenu" | "ModeSelection" | "HiLo" | "WongHalves";

export type KeyCommand =
  | { type: "record"; label: string; value: number }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "reset" }
  | { type: "navigate"; screen: ScreenName }
  | { type: "start"; system: CountingSystemId }
  | { type: "toggleRankMode" }
  | { type: "toggleHotkeyGroup"; group: string };

export type Keymap = ReadonlyMap<string, KeyCommand>;

export interface LedgerStats {
  runningCount: number;
  trueCount: number;
  cardsSeen: number;
  decksRemaining: number;
  penetration: string; // e.g. "12.5%"
  canUndo: boolean;
  canRedo: boolean;
  undosRemaining: number;
}

export interface SessionSnapshot {
  system: CountingSystemId;

  // Scoreboard text
  history: string;
  runningCount: string;
  trueCount: string;
  cardsSeen: string;

  // Raw aggregates
  decksRemaining: number;
  canUndo: boolean;
  canRedo: boolean;
}

export interface KeyOutcome {
  handled: boolean; // key was bound on the active screen
  changed: boolean; // counting state or active screen changed
}
