/**
 * Key Bindings - declarative key to command maps per screen
 *
 * A screen resolves its keymap when shown and again only when its own
 * options change. Maps are rebuilt, never edited in place.
 */

import type { HotkeyGroup, KeyCommand, Keymap } from "../types.ts";
import { HI_LO, WONG_HALVES, getAction, hiLoCategory } from "../strategy/CountingSystems.ts";
import { logger } from "../utils/logger.ts";

export const SHOE_KEYS = {
  reset: ["ctrl+r"],
  undo: ["<", ",", "ctrl+z"],
  redo: [">", ".", "ctrl+shift+z"],
  menu: ["menu"],
} as const;

export const HILO_HOTKEY_GROUPS: readonly HotkeyGroup[] = [
  {
    name: "letters",
    title: "Letters",
    lowLabel: "L",
    hiLabel: "H",
    lowKeys: ["l"],
    hiKeys: ["h"],
  },
  {
    name: "adjacent",
    title: "A / D",
    lowLabel: "A",
    hiLabel: "D",
    lowKeys: ["a"],
    hiKeys: ["d"],
  },
  {
    name: "symbols",
    title: "Minus / Plus",
    lowLabel: "-",
    hiLabel: "+",
    lowKeys: ["-"],
    hiKeys: ["+", "="], // '=' is unshifted '+'
  },
  {
    name: "horizontal_arrows",
    title: "Arrow Keys",
    lowLabel: "←",
    hiLabel: "→",
    lowKeys: ["left"],
    hiKeys: ["right"],
  },
  {
    name: "vertical_arrows",
    title: "Vertical Arrows",
    lowLabel: "↓",
    hiLabel: "↑",
    lowKeys: ["down"],
    hiKeys: ["up"],
  },
  {
    name: "brackets",
    title: "Brackets",
    lowLabel: "[",
    hiLabel: "]",
    lowKeys: ["["],
    hiKeys: ["]"],
  },
];

// Rank mode: number row and the letters next to it stand in for the card
export const HILO_RANK_KEYS: ReadonlyArray<readonly [key: string, rank: string]> = [
  ["2", "2"],
  ["3", "3"],
  ["4", "4"],
  ["5", "5"],
  ["6", "6"],
  ["7", "7"],
  ["8", "8"],
  ["9", "9"],
  ["0", "10"],
  ["q", "J"],
  ["w", "Q"],
  ["e", "K"],
  ["1", "A"],
];

export const WONG_HALVES_KEYS: Readonly<Record<string, readonly string[]>> = {
  "2": ["q"],
  "3": ["w"],
  "4": ["e"],
  "5": ["r"],
  "6": ["a"],
  "7": ["s"],
  "8": ["d"],
  "9": ["f"],
  "10": ["g"],
  "J": ["z"],
  "Q": ["x"],
  "K": ["c"],
  "A": ["v"],
};

export function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * Split a typed line into key tokens; "hotkeys <group>" stays one token.
 */
export function tokenizeKeys(line: string): string[] {
  const words = line.trim().split(/\s+/).filter((word) => word.length > 0);
  const tokens: string[] = [];

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (word.toLowerCase() === "hotkeys" && i + 1 < words.length) {
      tokens.push(`${word} ${words[i + 1]}`);
      i++;
    } else {
      tokens.push(word);
    }
  }

  return tokens;
}

/**
 * Collects bindings; the first binding for a key wins.
 */
export class KeymapBuilder {
  private readonly scope: string;
  private readonly bindings = new Map<string, KeyCommand>();

  constructor(scope: string) {
    this.scope = scope;
  }

  bind(keys: readonly string[], command: KeyCommand): this {
    for (const raw of keys) {
      const key = normalizeKey(raw);
      const existing = this.bindings.get(key);
      if (existing !== undefined) {
        logger.warn(`[KeyBindings] ${this.scope}: '${key}' already bound to ${existing.type}, ignoring ${command.type}`);
        continue;
      }
      this.bindings.set(key, command);
    }
    return this;
  }

  build(): Keymap {
    return new Map(this.bindings);
  }
}

function recordCommand(label: string, value: number): KeyCommand {
  return { type: "record", label, value };
}

function bindShoeKeys(builder: KeymapBuilder): KeymapBuilder {
  return builder
    .bind(SHOE_KEYS.reset, { type: "reset" })
    .bind(SHOE_KEYS.undo, { type: "undo" })
    .bind(SHOE_KEYS.redo, { type: "redo" })
    .bind(SHOE_KEYS.menu, { type: "navigate", screen: "ModeSelection" });
}

export function buildStartMenuKeymap(): Keymap {
  return new KeymapBuilder("StartMenu")
    .bind(["new", "n"], { type: "navigate", screen: "ModeSelection" })
    .build();
}

export function buildModeSelectionKeymap(): Keymap {
  return new KeymapBuilder("ModeSelection")
    .bind(["hilo", "1"], { type: "start", system: "hi-lo" })
    .bind(["wong", "2"], { type: "start", system: "wong-halves" })
    .bind(["back", "b"], { type: "navigate", screen: "StartMenu" })
    .build();
}

export interface HiLoKeymapOptions {
  enabledGroups: ReadonlySet<string>;
  rankMode: boolean;
}

export function buildHiLoKeymap(options: HiLoKeymapOptions): Keymap {
  const low = getAction(HI_LO, "Low");
  const hi = getAction(HI_LO, "Hi");
  const builder = bindShoeKeys(new KeymapBuilder("HiLo"));

  builder.bind(["rank"], { type: "toggleRankMode" });
  for (const group of HILO_HOTKEY_GROUPS) {
    builder.bind([`hotkeys ${group.name}`], { type: "toggleHotkeyGroup", group: group.name });
  }

  if (low === null || hi === null) return builder.build();

  for (const group of HILO_HOTKEY_GROUPS) {
    if (!options.enabledGroups.has(group.name)) continue;
    builder
      .bind(group.lowKeys, recordCommand(low.label, low.value))
      .bind(group.hiKeys, recordCommand(hi.label, hi.value));
  }

  if (options.rankMode) {
    for (const [key, rank] of HILO_RANK_KEYS) {
      const category = hiLoCategory(rank);
      if (category === "low") {
        builder.bind([key], recordCommand(low.label, low.value));
      } else if (category === "hi") {
        builder.bind([key], recordCommand(hi.label, hi.value));
      }
      // Neutral ranks stay unbound
    }
  }

  return builder.build();
}

export function buildWongHalvesKeymap(): Keymap {
  const builder = bindShoeKeys(new KeymapBuilder("WongHalves"));

  for (const action of WONG_HALVES.actions) {
    const keys = WONG_HALVES_KEYS[action.label] ?? [];
    builder.bind(keys, recordCommand(action.label, action.value));
  }

  return builder.build();
}
