/** Duration used when a goal names no timeframe. */
export const DEFAULT_TOTAL_DAYS = 14;

/** Upper bound on a plan's length, keeping every date within four-digit years. */
export const MAX_TOTAL_DAYS = 36500;

// Tried in this order; the first pattern that matches anywhere in the goal wins.
// `\d` is ASCII-only: digits from other scripts are not read as numbers.
const TIMEFRAME_PATTERNS: Array<{ pattern: RegExp; toDays: (n: number) => number }> = [
  { pattern: /(\d+)\s*weeks?/i, toDays: (n) => n * 7 },
  { pattern: /(\d+)\s*days?/i, toDays: (n) => n },
  { pattern: /(\d+)\s*months?/i, toDays: (n) => n * 30 },
];

/**
 * Reads a duration such as "3 weeks", "10 days" or "2 months" out of a goal.
 * Only one pattern is used: "2 weeks 3 days" is 14 days. Results are capped
 * at {@link MAX_TOTAL_DAYS}.
 */
export function extractTimeframe(goal: string): number {
  for (const { pattern, toDays } of TIMEFRAME_PATTERNS) {
    const match = pattern.exec(goal);
    if (match?.[1] !== undefined) {
      return Math.min(toDays(Number.parseInt(match[1], 10)), MAX_TOTAL_DAYS);
    }
  }
  return DEFAULT_TOTAL_DAYS;
}
