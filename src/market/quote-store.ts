import fs from "fs";
import path from "path";
import type { QuoteBatch } from "../types";
import { quoteBatchSchema } from "../types/schemas";
import { ensureDir, loadStageInput, toCsvLine, writeJson } from "../utils/files";
import { formatDateForFilename } from "../utils/time";

export const BATCH_PREFIX = "quotes_";
export const HISTORY_CSV = "quotes_history.csv";

const CSV_HEADER = [
  "fetched_at",
  "currency",
  "house_type",
  "display_name",
  "buy_price",
  "sell_price",
  "updated_at",
];

export function batchToCsvRows(batch: QuoteBatch): string[] {
  return batch.quotes.map(q =>
    toCsvLine([
      batch.fetchedAt,
      q.currency,
      q.houseType,
      q.displayName,
      q.buyPrice,
      q.sellPrice,
      q.updatedAt,
    ])
  );
}

export function batchToCsv(batch: QuoteBatch): string {
  return [toCsvLine(CSV_HEADER), ...batchToCsvRows(batch)].join("\n") + "\n";
}

export interface SavedBatch {
  jsonPath: string;
  csvPath: string;
  historyPath: string;
}

/**
 * Files of the fetch stage: one dated JSON + CSV per batch under the data
 * directory, plus an append-only history CSV.
 */
export class QuoteStore {
  constructor(private dataDir: string) {}

  public get directory(): string {
    return this.dataDir;
  }

  public async save(batch: QuoteBatch, at: Date = new Date()): Promise<SavedBatch> {
    ensureDir(this.dataDir);
    const stamp = formatDateForFilename(at);
    const jsonPath = path.join(this.dataDir, `${BATCH_PREFIX}${stamp}.json`);
    const csvPath = path.join(this.dataDir, `${BATCH_PREFIX}${stamp}.csv`);
    const historyPath = path.join(this.dataDir, HISTORY_CSV);

    await writeJson(jsonPath, batch);
    await fs.promises.writeFile(csvPath, batchToCsv(batch), "utf-8");
    this.appendHistory(historyPath, batch);

    return { jsonPath, csvPath, historyPath };
  }

  private appendHistory(historyPath: string, batch: QuoteBatch) {
    if (!fs.existsSync(historyPath)) {
      fs.writeFileSync(historyPath, toCsvLine(CSV_HEADER) + "\n", "utf8");
    }
    const rows = batchToCsvRows(batch);
    if (rows.length) {
      fs.appendFileSync(historyPath, rows.join("\n") + "\n", "utf8");
    }
  }

  public async load(filePath: string): Promise<QuoteBatch> {
    return loadStageInput(
      filePath,
      quoteBatchSchema,
      "Ejecutá primero la recolección de cotizaciones (opción 2)."
    );
  }
}
