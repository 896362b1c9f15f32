import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CompletionClient, CompletionRequest } from "../llm/llm-service";
import { QuoteStore } from "../market/quote-store";
import { SAMPLE_QUOTES, sampleBatch, sampleReport } from "../test/fixtures";
import { AnalysisError, EmptyBatchError } from "../utils/errors";
import { QuoteAnalyst, buildHighlights } from "./quote-analyst";

class FakeLLM implements CompletionClient {
  public readonly model = "test-model";
  public requests: CompletionRequest[] = [];

  constructor(private failOn?: string) {}

  public async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (request.tag === this.failOn) {
      throw new Error("quota exceeded");
    }
    return `respuesta ${request.tag}`;
  }
}

const ANALYZED_AT = new Date(2026, 9, 19, 14, 10, 0);

describe("QuoteAnalyst", () => {
  let dir: string;
  let store: QuoteStore;
  let batchPath: string;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "analyst-"));
    store = new QuoteStore(path.join(dir, "data"));
    ({ jsonPath: batchPath } = await store.save(sampleBatch(), new Date(2026, 9, 19, 14, 6, 0)));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function analyst(llm: CompletionClient, referenceHouse = "oficial") {
    return new QuoteAnalyst({
      llm,
      store,
      reportsDir: path.join(dir, "reports"),
      referenceHouse,
      now: () => ANALYZED_AT,
    });
  }

  it("asks the four sections in order and saves the report", async () => {
    const llm = new FakeLLM();

    const { report, reportPath } = await analyst(llm).run(batchPath);

    expect(llm.requests.map(r => r.tag)).toEqual(["QUOTES", "GAPS", "SPREADS", "SUMMARY"]);
    expect(reportPath).toBe(path.join(dir, "reports", "analysis_2026-10-19_14-10-00.json"));
    expect(report.metrics).toEqual(sampleReport().metrics);
    expect(report.narrative).toEqual({
      quotes: "respuesta QUOTES",
      gaps: "respuesta GAPS",
      spreads: "respuesta SPREADS",
      executiveSummary: "respuesta SUMMARY",
    });
    expect(report).toMatchObject({
      generatedAt: ANALYZED_AT.toISOString(),
      source: "DolarAPI",
      model: "test-model",
      batchFile: batchPath,
      referenceHouse: "oficial",
      reference: SAMPLE_QUOTES[0],
    });
    expect(JSON.parse(fs.readFileSync(reportPath, "utf-8"))).toEqual(report);
  });

  it("puts the ranking chart and the computed gaps in the prompts", async () => {
    const llm = new FakeLLM();

    await analyst(llm).analyze(batchPath);

    const [quotes, gaps] = llm.requests;
    expect(quotes.userPrompt).toContain("Tarjeta | 1885.00 " + "#".repeat(40));
    expect(gaps.userPrompt).toContain("Referencia: Oficial (compra 1400, venta 1450)");
    expect(gaps.userPrompt).toContain("- Blue: brecha venta -0.69% (-10 ARS), brecha compra +1.43%");
  });

  it("leaves gaps empty when the reference house is missing", async () => {
    const llm = new FakeLLM();

    const report = await analyst(llm, "mayorista").analyze(batchPath);

    expect(report.reference).toBeNull();
    expect(report.metrics.gaps).toEqual([]);
    expect(llm.requests[1].userPrompt).toContain(
      "No hay brechas calculadas: falta la cotización de referencia."
    );
  });

  it("fails with AnalysisError when a model call fails", async () => {
    const llm = new FakeLLM("GAPS");

    const pending = analyst(llm).run(batchPath);

    await expect(pending).rejects.toBeInstanceOf(AnalysisError);
    await expect(pending).rejects.toThrow("Falló la consulta GAPS al modelo: quota exceeded");
    expect(llm.requests).toHaveLength(2);
    expect(fs.existsSync(path.join(dir, "reports"))).toBe(false);
  });

  it("refuses an empty batch before calling the model", async () => {
    const { jsonPath } = await store.save(sampleBatch([]), new Date(2026, 9, 19, 15, 0, 0));
    const llm = new FakeLLM();

    await expect(analyst(llm).run(jsonPath)).rejects.toBeInstanceOf(EmptyBatchError);
    expect(llm.requests).toEqual([]);
  });
});

describe("buildHighlights", () => {
  it("lists market range, reference, widest gap and widest spread", () => {
    const { metrics, reference } = sampleReport();

    expect(buildHighlights(metrics, reference, 0)).toEqual([
      "Venta mínima $1,440.00, máxima $1,885.00, promedio $1,591.67",
      "Referencia Oficial: venta $1,450.00",
      "Mayor brecha: tarjeta (+30.00%)",
      "Mayor spread: Tarjeta (65 ARS)",
    ]);
  });

  it("mentions data quality issues", () => {
    const { metrics } = sampleReport();
    const highlights = buildHighlights(metrics, null, 2);

    expect(highlights[highlights.length - 1]).toBe("2 observaciones de calidad de datos en el lote");
    expect(highlights).not.toContain("Referencia Oficial: venta $1,450.00");
  });
});
