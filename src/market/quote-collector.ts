import type { QuoteBatch } from "../types";
import { DataQualityError, QuoteFetchError } from "../utils/errors";
import { formatQuoteTable } from "../utils/format";
import { logger } from "../utils/logger";
import type { QuoteSource } from "./quote-source";
import { QuoteStore } from "./quote-store";
import { findDataQualityIssues, hasDuplicateHouses } from "./quote-validation";

export interface CollectResult {
  batch: QuoteBatch;
  jsonPath: string;
  csvPath: string;
}

/**
 * Fetch stage: pulls one batch from the source, checks it and persists it.
 */
export class QuoteCollector {
  constructor(
    private source: QuoteSource,
    private store: QuoteStore,
    private now: () => Date = () => new Date()
  ) {}

  public async collect(): Promise<CollectResult> {
    logger.info(`[Colector] Iniciando recolección desde ${this.source.name}...`);

    const quotes = await this.source.fetchQuotes();
    if (quotes.length === 0) {
      throw new QuoteFetchError(`${this.source.name} no devolvió cotizaciones`);
    }

    const issues = findDataQualityIssues(quotes);
    if (hasDuplicateHouses(issues)) {
      const houses = issues
        .filter(i => i.kind === "duplicate-house")
        .map(i => i.houseType)
        .join(", ");
      throw new DataQualityError(`Lote rechazado: casas duplicadas (${houses})`);
    }
    for (const issue of issues) {
      logger.warn(`[Colector] Calidad de datos: ${issue.message}`);
    }

    const fetchedAt = this.now();
    const batch: QuoteBatch = {
      fetchedAt: fetchedAt.toISOString(),
      source: this.source.name,
      total: quotes.length,
      quotes,
      issues,
    };

    logger.info("\n" + formatQuoteTable(quotes));

    const saved = await this.store.save(batch, fetchedAt);
    logger.info(`[Colector] JSON guardado: ${saved.jsonPath}`);
    logger.info(`[Colector] CSV guardado: ${saved.csvPath}`);
    logger.debug(`[Colector] Histórico actualizado: ${saved.historyPath}`);

    return { batch, jsonPath: saved.jsonPath, csvPath: saved.csvPath };
  }
}
