export const PRICE_LEVELS = ["low", "high"] as const;

export type PriceLevel = (typeof PRICE_LEVELS)[number];

export function isPriceLevel(value: unknown): value is PriceLevel {
  return value === "low" || value === "high";
}

/** Case-insensitive label lookup; `null` for anything outside the two levels. */
export function normalizePriceLevel(label: string): PriceLevel | null {
  const normalized = label.trim().toLowerCase();
  return isPriceLevel(normalized) ? normalized : null;
}

export function priceLevelValue(level: PriceLevel): 0 | 1 {
  return level === "high" ? 1 : 0;
}
