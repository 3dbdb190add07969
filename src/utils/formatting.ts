/**
 * Display helpers for count values
 */

import type { CountEntry } from "../types.ts";

/**
 * Round to whole cents on the exact binary value of `value`, ties to even
 * (2.675 is stored as 2.67499... and becomes 267; 0.125 becomes 12).
 */
function toCents(value: number): bigint {
  const [whole, fraction] = Math.abs(value).toFixed(20).split(".");
  const rest = fraction.slice(2);
  const half = "5".padEnd(rest.length, "0");

  let cents = BigInt(whole + fraction.slice(0, 2));
  if (rest > half || (rest === half && cents % 2n === 1n)) {
    cents += 1n;
  }
  return value < 0 ? -cents : cents;
}

function centsToText(cents: bigint): string {
  const magnitude = cents < 0n ? -cents : cents;
  return `${magnitude / 100n}.${(magnitude % 100n).toString().padStart(2, "0")}`;
}

/**
 * Format a count increment with a fixed sign and no redundant trailing zero.
 *
 * `+1`, `-0.5`, `+1.5`, `+0`.
 */
export function formatIncrement(value: number): string {
  if (!Number.isFinite(value)) return String(value);

  const cents = toCents(value);
  const sign = cents < 0n ? "-" : "+";

  if (cents % 100n === 0n) {
    const whole = cents / 100n;
    return `${sign}${whole < 0n ? -whole : whole}`;
  }

  const text = `${sign}${centsToText(cents)}`;
  return text.endsWith("0") ? text.slice(0, -1) : text;
}

export function formatTrueCount(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  return `${value < 0 ? "-" : "+"}${centsToText(toCents(value))}`;
}

export function formatHistory(entries: readonly CountEntry[]): string {
  if (entries.length === 0) return "-";
  return entries.map((entry) => `${entry.label}(${formatIncrement(entry.value)})`).join("  ");
}

export function formatCardsSeen(count: number): string {
  return `Cards seen: ${count}`;
}
