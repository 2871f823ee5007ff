/**
 * Value parsing and formatting for metadata comments
 */

const DURATION_UNITS: Record<string, number> = {
  d: 86400,
  h: 3600,
  m: 60,
  s: 1,
};

/**
 * Parse a slicer duration ("1d 2h 3m 4s", "5m 30s", "45s") to seconds
 *
 * @example
 * parseDuration("1h 2m 3s") // 3723
 * parseDuration("soon") // null
 */
export function parseDuration(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;

  const token = /(\d+)\s*([dhms])(?![a-z])/gi;
  let seconds = 0;
  let tokens = 0;
  for (const match of trimmed.matchAll(token)) {
    seconds += parseInt(match[1], 10) * DURATION_UNITS[match[2].toLowerCase()];
    tokens++;
  }

  // Anything left besides whitespace means this was not a duration
  const leftover = trimmed.replace(token, "").trim();
  if (tokens === 0 || leftover !== "") return null;

  return seconds;
}

/**
 * Format seconds the way the slicer writes them: leading zero units are
 * dropped, inner ones are kept ("1h 0m 5s")
 */
export function formatDuration(totalSeconds: number): string {
  let rest = Math.max(0, Math.round(totalSeconds));
  const days = Math.floor(rest / 86400);
  rest %= 86400;
  const hours = Math.floor(rest / 3600);
  rest %= 3600;
  const minutes = Math.floor(rest / 60);
  const seconds = rest % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m ${seconds}s`;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

/**
 * Parse a comma-separated list of per-extruder numbers
 * Currency symbols and a trailing "%" are ignored
 *
 * @example
 * parseNumberList("1.50, 0.25") // [1.5, 0.25]
 * parseNumberList("$0.07") // [0.07]
 * parseNumberList("n/a") // null
 */
export function parseNumberList(text: string): number[] | null {
  const parts = text.split(",").map((part) => part.trim());
  const values: number[] = [];

  for (const part of parts) {
    const cleaned = part.replace(/^[^\d.+-]+/, "").replace(/\s*%$/, "");
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(cleaned)) return null;
    values.push(Number(cleaned));
  }

  return values;
}

/**
 * Parse a non-negative integer
 */
export function parseCount(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}

/**
 * Round away floating point noise from sums and unit conversions
 */
export function roundQuantity(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Format a quantity with a fixed number of decimals
 */
export function formatQuantity(value: number, decimals: number = 2): string {
  return value.toFixed(decimals);
}
