export interface StockRules {
  inStockPatterns: readonly string[];
  soldOutPatterns: readonly string[];
  assumeInStockIfNoLabel: boolean;
}

function firstMatch(text: string, patterns: readonly string[]): string | undefined {
  return patterns.find((p) => text.includes(p.toLowerCase()));
}

/**
 * Maps a free-text stock label to an in-stock verdict.
 *
 * In-stock phrases are checked before sold-out phrases, so a label carrying
 * both (e.g. "在庫" inside a longer sold-out banner) counts as in stock. A
 * label that is missing or blank falls back to `assumeInStockIfNoLabel`; any
 * other unrecognised text is treated as not in stock.
 */
export function classifyStock(label: string | null | undefined, rules: StockRules): boolean {
  const text = (label ?? '').toLowerCase();

  if (firstMatch(text, rules.inStockPatterns) !== undefined) return true;
  if (firstMatch(text, rules.soldOutPatterns) !== undefined) return false;
  if (text.trim() === '') return rules.assumeInStockIfNoLabel;
  return false;
}
