import { z } from "zod";
import type { AnalysisReport, QuoteBatch } from "./index";

/**
 * Schemas for everything that crosses a process boundary: the DolarAPI
 * response and the JSON files one stage hands to the next.
 */

export const dolarApiQuoteSchema = z.object({
  moneda: z.string().min(1),
  casa: z.string().min(1),
  nombre: z.string().min(1),
  compra: z.number(),
  venta: z.number(),
  fechaActualizacion: z.string().min(1),
});

export const dolarApiResponseSchema = z.array(dolarApiQuoteSchema);

export type DolarApiQuote = z.infer<typeof dolarApiQuoteSchema>;

export const quoteRecordSchema = z.object({
  currency: z.string(),
  houseType: z.string().min(1),
  displayName: z.string(),
  buyPrice: z.number(),
  sellPrice: z.number(),
  updatedAt: z.string(),
});

export const dataQualityIssueSchema = z.object({
  houseType: z.string(),
  kind: z.enum(["inverted-prices", "duplicate-house", "non-positive-price"]),
  message: z.string(),
});

export const quoteBatchSchema = z.object({
  fetchedAt: z.string(),
  source: z.string(),
  total: z.number().int().nonnegative(),
  quotes: z.array(quoteRecordSchema),
  issues: z.array(dataQualityIssueSchema).default([]),
}) satisfies z.ZodType<QuoteBatch, z.ZodTypeDef, unknown>;

const gapMetricSchema = z.object({
  houseType: z.string(),
  displayName: z.string(),
  sellGapPct: z.number(),
  buyGapPct: z.number(),
  sellGapAmount: z.number(),
});

const spreadMetricSchema = z.object({
  houseType: z.string(),
  displayName: z.string(),
  spread: z.number(),
  spreadPct: z.number(),
});

const rankingEntrySchema = z.object({
  position: z.number().int().positive(),
  houseType: z.string(),
  displayName: z.string(),
  sellPrice: z.number(),
});

export const analysisReportSchema = z.object({
  generatedAt: z.string(),
  source: z.string(),
  model: z.string(),
  batchFile: z.string(),
  fetchedAt: z.string(),
  referenceHouse: z.string(),
  reference: quoteRecordSchema.nullable(),
  quotes: z.array(quoteRecordSchema),
  metrics: z.object({
    gaps: z.array(gapMetricSchema),
    spreads: z.array(spreadMetricSchema),
    ranking: z.array(rankingEntrySchema),
    market: z.object({
      minSell: z.number(),
      maxSell: z.number(),
      averageSell: z.number(),
      widestGap: z
        .object({ houseType: z.string(), sellGapPct: z.number() })
        .nullable(),
    }),
  }),
  narrative: z.object({
    quotes: z.string(),
    gaps: z.string(),
    spreads: z.string(),
    executiveSummary: z.string(),
  }),
  dataQuality: z.array(dataQualityIssueSchema).default([]),
}) satisfies z.ZodType<AnalysisReport, z.ZodTypeDef, unknown>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join(".") || "(raíz)"}: ${issue.message}`)
    .join("; ");
}
