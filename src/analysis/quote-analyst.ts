import path from "path";
import type { CompletionClient } from "../llm/llm-service";
import {
  buildGapsPrompt,
  buildQuotesPrompt,
  buildSpreadsPrompt,
  buildSummaryPrompt,
  type AnalysisSection,
  type PromptPair,
} from "../llm/prompts/analyst-prompts";
import type { QuoteStore } from "../market/quote-store";
import type { AnalysisReport, QuoteMetrics, QuoteRecord } from "../types";
import { ChartUtils } from "../utils/chart-utils";
import { AnalysisError, EmptyBatchError } from "../utils/errors";
import { writeJson } from "../utils/files";
import { formatPct, formatPrice } from "../utils/format";
import { logger } from "../utils/logger";
import { formatDateForFilename } from "../utils/time";
import { computeMetrics } from "./metrics";

export const REPORT_PREFIX = "analysis_";

export interface QuoteAnalystOptions {
  llm: CompletionClient;
  store: QuoteStore;
  reportsDir: string;
  referenceHouse: string;
  /** Include the ASCII sell-price chart in the quotes prompt. */
  includeChart?: boolean;
  now?: () => Date;
}

export interface AnalystResult {
  report: AnalysisReport;
  reportPath: string;
}

/**
 * Analysis stage: numeric metrics computed locally, narrative from the LLM.
 */
export class QuoteAnalyst {
  private now: () => Date;

  constructor(private options: QuoteAnalystOptions) {
    this.now = options.now ?? (() => new Date());
  }

  public async analyze(batchPath: string): Promise<AnalysisReport> {
    const batch = await this.options.store.load(batchPath);
    if (batch.quotes.length === 0) {
      throw new EmptyBatchError(batchPath);
    }

    const { reference, metrics } = computeMetrics(
      batch.quotes,
      this.options.referenceHouse
    );
    if (!reference) {
      logger.warn(
        `[Analista] El lote no incluye la casa de referencia "${this.options.referenceHouse}"; se omiten las brechas`
      );
    }

    const asciiChart =
      (this.options.includeChart ?? true)
        ? ChartUtils.generateBarChart(
            metrics.ranking.map(r => ({ label: r.displayName, value: r.sellPrice }))
          )
        : "";

    const quotesText = await this.ask("QUOTES", buildQuotesPrompt(batch.quotes, asciiChart));
    const gapsText = await this.ask("GAPS", buildGapsPrompt(reference, metrics.gaps));
    const spreadsText = await this.ask("SPREADS", buildSpreadsPrompt(metrics.spreads));
    const summaryText = await this.ask(
      "SUMMARY",
      buildSummaryPrompt(batch.quotes, buildHighlights(metrics, reference, batch.issues.length))
    );

    return {
      generatedAt: this.now().toISOString(),
      source: batch.source,
      model: this.options.llm.model,
      batchFile: batchPath,
      fetchedAt: batch.fetchedAt,
      referenceHouse: this.options.referenceHouse,
      reference,
      quotes: batch.quotes,
      metrics,
      narrative: {
        quotes: quotesText,
        gaps: gapsText,
        spreads: spreadsText,
        executiveSummary: summaryText,
      },
      dataQuality: batch.issues,
    };
  }

  public async run(batchPath: string): Promise<AnalystResult> {
    logger.info(`[Analista] Analizando ${batchPath}...`);
    const report = await this.analyze(batchPath);

    const stamp = formatDateForFilename(this.now());
    const reportPath = path.join(this.options.reportsDir, `${REPORT_PREFIX}${stamp}.json`);
    await writeJson(reportPath, report);

    logger.info(`[Analista] Reporte guardado: ${reportPath}`);
    logger.info(
      `[Analista] Resumen: ${report.narrative.executiveSummary.slice(0, 200)}...`
    );
    return { report, reportPath };
  }

  private async ask(section: AnalysisSection, prompt: PromptPair): Promise<string> {
    logger.info(`[Analista] Consultando al modelo: ${section}`);
    try {
      return await this.options.llm.complete({ tag: section, ...prompt });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AnalysisError(`Falló la consulta ${section} al modelo: ${reason}`, {
        cause: error,
      });
    }
  }
}

export function buildHighlights(
  metrics: QuoteMetrics,
  reference: QuoteRecord | null,
  issueCount: number
): string[] {
  const highlights = [
    `Venta mínima ${formatPrice(metrics.market.minSell)}, máxima ${formatPrice(
      metrics.market.maxSell
    )}, promedio ${formatPrice(metrics.market.averageSell)}`,
  ];

  if (reference) {
    highlights.push(
      `Referencia ${reference.displayName}: venta ${formatPrice(reference.sellPrice)}`
    );
  }
  if (metrics.market.widestGap) {
    highlights.push(
      `Mayor brecha: ${metrics.market.widestGap.houseType} (${formatPct(
        metrics.market.widestGap.sellGapPct
      )})`
    );
  }
  const widestSpread = [...metrics.spreads].sort((a, b) => b.spread - a.spread)[0];
  if (widestSpread) {
    highlights.push(`Mayor spread: ${widestSpread.displayName} (${widestSpread.spread} ARS)`);
  }
  if (issueCount > 0) {
    highlights.push(`${issueCount} observaciones de calidad de datos en el lote`);
  }
  return highlights;
}
