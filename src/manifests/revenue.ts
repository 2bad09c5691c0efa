/**
 * RevenueParser — normalizes hand-authored revenue values.
 *
 * Accepts "$12,500", "8500", "$21K", "1.2m", 4200. The result is always a
 * finite nonnegative amount rounded to the cent; anything unusable becomes 0
 * with `malformed: true` instead of failing the manifest.
 */

export interface RevenueParseResult {
  amount: number;
  malformed: boolean;
  reason?: string;
}

const MAGNITUDES: Record<string, number> = { k: 1_000, m: 1_000_000 };

const ZERO: RevenueParseResult = { amount: 0, malformed: false };

function malformed(reason: string): RevenueParseResult {
  return { amount: 0, malformed: true, reason };
}

/** Round to whole cents. */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function fromNumber(value: number, raw: unknown): RevenueParseResult {
  if (!Number.isFinite(value)) {
    return malformed(`revenue is not a finite number: ${String(raw)}`);
  }
  if (value < 0) {
    return malformed(`negative revenue clamped to 0: ${String(raw)}`);
  }
  return { amount: toCents(value) / 100, malformed: false };
}

function fromString(raw: string): RevenueParseResult {
  let text = raw.trim();
  if (text === "") return ZERO;

  let multiplier = 1;
  const suffix = /([km])$/i.exec(text);
  if (suffix?.[1]) {
    multiplier = MAGNITUDES[suffix[1].toLowerCase()] ?? 1;
    text = text.slice(0, -1);
  }

  const firstDigit = text.search(/\d/);
  if (firstDigit === -1) {
    return malformed(`no numeric content in revenue: "${raw}"`);
  }
  const negative = text.slice(0, firstDigit).includes("-");

  const digits = text.replace(/[^\d.]/g, "");
  if ((digits.match(/\./g) ?? []).length > 1) {
    return malformed(`ambiguous decimal separators in revenue: "${raw}"`);
  }

  const value = Number(digits) * multiplier;
  if (negative) {
    return malformed(`negative revenue clamped to 0: "${raw}"`);
  }
  return fromNumber(value, raw);
}

/** Parse a raw revenue value into a canonical amount. Never throws. */
export function parseRevenue(raw: unknown): RevenueParseResult {
  if (raw === undefined || raw === null) return ZERO;
  if (typeof raw === "number") return fromNumber(raw, raw);
  if (typeof raw === "string") return fromString(raw);
  return malformed(`unsupported revenue value of type ${typeof raw}`);
}
