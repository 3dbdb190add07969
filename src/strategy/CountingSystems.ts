/**
 * Counting Systems - value tables for the supported counts
 *
 * Hi-Lo records one of two adjustments; Wong Halves weights every rank.
 */

import type { CountingAction, CountingSystem, CountingSystemId, RankCategory } from "../types.ts";

export const HI_LO: CountingSystem = {
  id: "hi-lo",
  name: "Hi-Lo",
  actions: [
    { label: "Low", value: 1.0 }, // 2-6 out = favorable for player
    { label: "Hi", value: -1.0 }, // 10-A out = favorable for dealer
  ],
};

export const WONG_HALVES: CountingSystem = {
  id: "wong-halves",
  name: "Wong Halves",
  actions: [
    { label: "2", value: 0.5 },
    { label: "3", value: 1.0 },
    { label: "4", value: 1.0 },
    { label: "5", value: 1.5 },
    { label: "6", value: 1.0 },
    { label: "7", value: 0.5 },
    { label: "8", value: 0.0 },
    { label: "9", value: -0.5 },
    { label: "10", value: -1.0 },
    { label: "J", value: -1.0 },
    { label: "Q", value: -1.0 },
    { label: "K", value: -1.0 },
    { label: "A", value: -1.0 },
  ],
};

const SYSTEMS: Record<CountingSystemId, CountingSystem> = {
  "hi-lo": HI_LO,
  "wong-halves": WONG_HALVES,
};

export function isCountingSystemId(value: string): value is CountingSystemId {
  return Object.prototype.hasOwnProperty.call(SYSTEMS, value);
}

export function getCountingSystem(id: CountingSystemId): CountingSystem {
  return SYSTEMS[id];
}

/**
 * Hi-Lo bucket for a card rank. 7, 8, 9 are neutral (no change).
 */
export function hiLoCategory(rank: string): RankCategory | null {
  if (["2", "3", "4", "5", "6"].includes(rank)) return "low";
  if (["7", "8", "9"].includes(rank)) return "neutral";
  if (["10", "J", "Q", "K", "A"].includes(rank)) return "hi";
  return null;
}

export function getAction(system: CountingSystem, label: string): CountingAction | null {
  return system.actions.find((action) => action.label === label) ?? null;
}
