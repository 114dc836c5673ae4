export const HUNDREDTHS_PER_HOUR = 100;
export const MIN_ENTRY_HUNDREDTHS = 1;
export const MAX_DAILY_HUNDREDTHS = 24 * HUNDREDTHS_PER_HOUR;

const HOURS_PATTERN = /^(\d*)(?:\.(\d+))?$/;

export type HoursParseResult =
  | { ok: true; hundredths: number }
  | { ok: false; reason: "format" | "precision" };

/**
 * Parses a decimal hour value ("8", "7.5", ".25") into integer hundredths.
 * Sums are kept in hundredths so repeated additions stay exact.
 */
export function parseHours(value: string | number): HoursParseResult {
  const text = typeof value === "number" ? String(value) : value.trim();
  const match = HOURS_PATTERN.exec(text);
  // ".5" is allowed; "" and "." are not
  if (!match || (match[1] === "" && match[2] === undefined)) return { ok: false, reason: "format" };

  const [, whole, fraction = ""] = match;
  if (fraction.length > 2) return { ok: false, reason: "precision" };

  const hundredths = Number(whole) * HUNDREDTHS_PER_HOUR + Number(fraction.padEnd(2, "0"));
  return { ok: true, hundredths };
}

/** Hundredths of a persisted `numeric(5,2)` value; throws on anything malformed. */
export function toHundredths(value: string | number): number {
  const parsed = parseHours(value);
  if (!parsed.ok) {
    throw new Error(`Malformed hours value: ${String(value)}`);
  }
  return parsed.hundredths;
}

export function formatHours(hundredths: number): string {
  return (hundredths / HUNDREDTHS_PER_HOUR).toFixed(2);
}

export function hundredthsToHours(hundredths: number): number {
  return hundredths / HUNDREDTHS_PER_HOUR;
}

export function sumHundredths(values: readonly (string | number)[]): number {
  return values.reduce<number>((total, value) => total + toHundredths(value), 0);
}

export function ratio(numerator: number, denominator: number, decimals: number = 4): number {
  if (denominator <= 0) return 0;
  const factor = 10 ** decimals;
  return Math.round((numerator / denominator) * factor) / factor;
}
