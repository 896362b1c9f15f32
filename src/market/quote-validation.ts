import type { DataQualityIssue, QuoteRecord } from "../types";

/**
 * Checks the per-batch invariants: positive prices, sell >= buy and one
 * quote per house. Returns every violation found, in input order.
 */
export function findDataQualityIssues(quotes: QuoteRecord[]): DataQualityIssue[] {
  const issues: DataQualityIssue[] = [];
  const seen = new Set<string>();

  for (const q of quotes) {
    if (seen.has(q.houseType)) {
      issues.push({
        houseType: q.houseType,
        kind: "duplicate-house",
        message: `La casa "${q.houseType}" aparece más de una vez en el lote`,
      });
    }
    seen.add(q.houseType);

    if (q.buyPrice <= 0 || q.sellPrice <= 0) {
      issues.push({
        houseType: q.houseType,
        kind: "non-positive-price",
        message: `${q.displayName}: precios no positivos (compra ${q.buyPrice}, venta ${q.sellPrice})`,
      });
    }

    if (q.sellPrice < q.buyPrice) {
      issues.push({
        houseType: q.houseType,
        kind: "inverted-prices",
        message: `${q.displayName}: venta ${q.sellPrice} menor que compra ${q.buyPrice}`,
      });
    }
  }

  return issues;
}

export function hasDuplicateHouses(issues: DataQualityIssue[]): boolean {
  return issues.some(issue => issue.kind === "duplicate-house");
}
