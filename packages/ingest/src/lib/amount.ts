import { MAX_PLAUSIBLE_AMOUNT, MIN_PLAUSIBLE_AMOUNT } from "../config/sources";

/**
 * Dollar figure with an optional scale word: `$10M`, `10 million`,
 * `US$1.2bn`, `$50,000`, `250k USD`. Group 1 is the numeral, group 2 the scale.
 */
export const AMOUNT_PATTERN =
  /(?<!\w)(?:US\$|\$)?\s*(\d{1,3}(?:[,\s]\d{3})*(?:\.\d+)?|\d+(?:\.\d+)?)\s*(?:(billion|bn|b|million|mm|m|thousand|k)\b)?\s*(?:USD|US\s*dollars|dollars)?/gi;

const SCALES: Record<string, number> = {
  billion: 1_000_000_000,
  bn: 1_000_000_000,
  b: 1_000_000_000,
  million: 1_000_000,
  mm: 1_000_000,
  m: 1_000_000,
  thousand: 1_000,
  k: 1_000,
};

export const normalizeAmount = (numeral: string, scale?: string | null): number | null => {
  const cleaned = numeral.replace(/,/g, "").trim();
  if (!cleaned) {
    return null;
  }
  const value = Number(cleaned);
  if (!Number.isFinite(value)) {
    return null;
  }
  const multiplier = SCALES[(scale ?? "").toLowerCase()] ?? 1;
  return Math.round(value * multiplier);
};

export const isPlausibleAmount = (amount: number) =>
  amount >= MIN_PLAUSIBLE_AMOUNT && amount <= MAX_PLAUSIBLE_AMOUNT;

/** Largest plausible amount mentioned anywhere in the text, or null. */
export const findLargestAmount = (text: string): number | null => {
  let largest: number | null = null;
  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const amount = normalizeAmount(match[1], match[2]);
    if (amount === null || !isPlausibleAmount(amount)) {
      continue;
    }
    if (largest === null || amount > largest) {
      largest = amount;
    }
  }
  return largest;
};
