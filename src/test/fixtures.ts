import type { AnalysisReport, QuoteBatch, QuoteRecord } from "../types";

export function quote(
  houseType: string,
  buyPrice: number,
  sellPrice: number,
  displayName: string = houseType
): QuoteRecord {
  return {
    currency: "USD",
    houseType,
    displayName,
    buyPrice,
    sellPrice,
    updatedAt: "2026-10-19T14:05:00.000Z",
  };
}

export const SAMPLE_QUOTES: QuoteRecord[] = [
  quote("oficial", 1400, 1450, "Oficial"),
  quote("blue", 1420, 1440, "Blue"),
  quote("tarjeta", 1820, 1885, "Tarjeta"),
];

export function sampleBatch(quotes: QuoteRecord[] = SAMPLE_QUOTES): QuoteBatch {
  return {
    fetchedAt: "2026-10-19T14:06:00.000Z",
    source: "DolarAPI",
    total: quotes.length,
    quotes,
    issues: [],
  };
}

/** The analysis of SAMPLE_QUOTES against "oficial". */
export function sampleReport(): AnalysisReport {
  return {
    generatedAt: "2026-10-19T14:10:00.000Z",
    source: "DolarAPI",
    model: "test-model",
    batchFile: "data/quotes_2026-10-19_14-06-00.json",
    fetchedAt: "2026-10-19T14:06:00.000Z",
    referenceHouse: "oficial",
    reference: SAMPLE_QUOTES[0],
    quotes: SAMPLE_QUOTES,
    metrics: {
      gaps: [
        { houseType: "blue", displayName: "Blue", sellGapPct: -0.69, buyGapPct: 1.43, sellGapAmount: -10 },
        { houseType: "tarjeta", displayName: "Tarjeta", sellGapPct: 30, buyGapPct: 30, sellGapAmount: 435 },
      ],
      spreads: [
        { houseType: "oficial", displayName: "Oficial", spread: 50, spreadPct: 3.57 },
        { houseType: "blue", displayName: "Blue", spread: 20, spreadPct: 1.41 },
        { houseType: "tarjeta", displayName: "Tarjeta", spread: 65, spreadPct: 3.57 },
      ],
      ranking: [
        { position: 1, houseType: "tarjeta", displayName: "Tarjeta", sellPrice: 1885 },
        { position: 2, houseType: "oficial", displayName: "Oficial", sellPrice: 1450 },
        { position: 3, houseType: "blue", displayName: "Blue", sellPrice: 1440 },
      ],
      market: {
        minSell: 1440,
        maxSell: 1885,
        averageSell: 1591.67,
        widestGap: { houseType: "tarjeta", sellGapPct: 30 },
      },
    },
    narrative: {
      quotes: "Texto de cotizaciones.",
      gaps: "Texto de brechas.",
      spreads: "Texto de spreads.",
      executiveSummary: "Resumen del día.",
    },
    dataQuality: [],
  };
}
