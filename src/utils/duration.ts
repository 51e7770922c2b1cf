// src/utils/duration.ts

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
const WHOLE = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;

/**
 * Parses duration strings into milliseconds.
 *
 * Examples:
 * - "500ms" → 500
 * - "90s"   → 90000
 * - "1h30m" → 5400000
 * - "0"     → 0
 *
 * Returns null when the string isn't a duration.
 */
export function parseDuration(input: string): number | null {
  const value = input.trim();
  if (value === "0") return 0;
  if (!WHOLE.test(value)) return null;

  let total = 0;
  for (const match of value.matchAll(SEGMENT)) {
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";

  const parts: string[] = [];
  let rest = ms;
  for (const unit of ["h", "m", "s"] as const) {
    const size = UNIT_MS[unit];
    const amount = Math.floor(rest / size);
    if (amount > 0) {
      parts.push(`${amount}${unit}`);
      rest -= amount * size;
    }
  }
  if (rest > 0) parts.push(`${rest}ms`);
  return parts.join("");
}
