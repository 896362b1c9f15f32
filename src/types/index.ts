/**
 * Core type definitions for the dollar quote pipeline
 */

/** One buy/sell quote of a pricing house ("casa"). */
export interface QuoteRecord {
  currency: string;
  houseType: string; // open-ended: oficial, blue, bolsa, contadoconliqui, tarjeta, ...
  displayName: string;
  buyPrice: number;
  sellPrice: number;
  updatedAt: string;
}

export type DataQualityIssueKind =
  | "inverted-prices"
  | "duplicate-house"
  | "non-positive-price";

export interface DataQualityIssue {
  houseType: string;
  kind: DataQualityIssueKind;
  message: string;
}

export interface QuoteBatch {
  fetchedAt: string;
  source: string;
  total: number;
  quotes: QuoteRecord[];
  issues: DataQualityIssue[];
}

export interface GapMetric {
  houseType: string;
  displayName: string;
  sellGapPct: number;
  buyGapPct: number;
  sellGapAmount: number;
}

export interface SpreadMetric {
  houseType: string;
  displayName: string;
  spread: number;
  spreadPct: number;
}

export interface RankingEntry {
  position: number;
  houseType: string;
  displayName: string;
  sellPrice: number;
}

export interface MarketStats {
  minSell: number;
  maxSell: number;
  averageSell: number;
  widestGap: { houseType: string; sellGapPct: number } | null;
}

export interface QuoteMetrics {
  gaps: GapMetric[];
  spreads: SpreadMetric[];
  ranking: RankingEntry[];
  market: MarketStats;
}

export interface AnalysisNarrative {
  quotes: string;
  gaps: string;
  spreads: string;
  executiveSummary: string;
}

export interface AnalysisReport {
  generatedAt: string;
  source: string;
  model: string;
  batchFile: string;
  fetchedAt: string;
  referenceHouse: string;
  reference: QuoteRecord | null;
  quotes: QuoteRecord[];
  metrics: QuoteMetrics;
  narrative: AnalysisNarrative;
  dataQuality: DataQualityIssue[];
}
