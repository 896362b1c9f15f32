import type {
  GapMetric,
  MarketStats,
  QuoteMetrics,
  QuoteRecord,
  RankingEntry,
  SpreadMetric,
} from "../types";

/** Rounds half away from zero to 2 decimals. */
export function round2(value: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value) * 100)) / 100;
}

export function findReference(
  quotes: QuoteRecord[],
  referenceHouse: string
): QuoteRecord | null {
  return quotes.find(q => q.houseType === referenceHouse) ?? null;
}

/**
 * Gap of every non-reference house against the reference, in percent of the
 * reference price. Buy and sell sides are computed independently.
 */
export function computeGaps(
  quotes: QuoteRecord[],
  reference: QuoteRecord
): GapMetric[] {
  return quotes
    .filter(q => q.houseType !== reference.houseType)
    .map(q => ({
      houseType: q.houseType,
      displayName: q.displayName,
      sellGapPct: percentDiff(q.sellPrice, reference.sellPrice),
      buyGapPct: percentDiff(q.buyPrice, reference.buyPrice),
      sellGapAmount: round2(q.sellPrice - reference.sellPrice),
    }));
}

function percentDiff(value: number, base: number): number {
  if (base === 0) return 0;
  return round2(((value - base) / base) * 100);
}

export function computeSpreads(quotes: QuoteRecord[]): SpreadMetric[] {
  return quotes.map(q => {
    const spread = round2(q.sellPrice - q.buyPrice);
    return {
      houseType: q.houseType,
      displayName: q.displayName,
      spread,
      spreadPct: q.buyPrice > 0 ? round2(((q.sellPrice - q.buyPrice) / q.buyPrice) * 100) : 0,
    };
  });
}

/** Sell price descending; ties broken by houseType so the order is stable. */
export function computeRanking(quotes: QuoteRecord[]): RankingEntry[] {
  return [...quotes]
    .sort(
      (a, b) =>
        b.sellPrice - a.sellPrice || a.houseType.localeCompare(b.houseType)
    )
    .map((q, i) => ({
      position: i + 1,
      houseType: q.houseType,
      displayName: q.displayName,
      sellPrice: q.sellPrice,
    }));
}

export function computeMarketStats(
  quotes: QuoteRecord[],
  gaps: GapMetric[]
): MarketStats {
  if (quotes.length === 0) {
    throw new Error("No se pueden calcular estadísticas sin cotizaciones");
  }

  const sells = quotes.map(q => q.sellPrice);
  const total = sells.reduce((sum, v) => sum + v, 0);

  let widestGap: MarketStats["widestGap"] = null;
  for (const gap of gaps) {
    if (!widestGap || Math.abs(gap.sellGapPct) > Math.abs(widestGap.sellGapPct)) {
      widestGap = { houseType: gap.houseType, sellGapPct: gap.sellGapPct };
    }
  }

  return {
    minSell: Math.min(...sells),
    maxSell: Math.max(...sells),
    averageSell: round2(total / sells.length),
    widestGap,
  };
}

export function computeMetrics(
  quotes: QuoteRecord[],
  referenceHouse: string
): { reference: QuoteRecord | null; metrics: QuoteMetrics } {
  const reference = findReference(quotes, referenceHouse);
  const gaps = reference ? computeGaps(quotes, reference) : [];
  return {
    reference,
    metrics: {
      gaps,
      spreads: computeSpreads(quotes),
      ranking: computeRanking(quotes),
      market: computeMarketStats(quotes, gaps),
    },
  };
}
