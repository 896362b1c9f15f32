import fs from "fs";
import path from "path";
import type { AnalysisReport } from "../types";
import { analysisReportSchema } from "../types/schemas";
import { RenderError } from "../utils/errors";
import { ensureDir, loadStageInput } from "../utils/files";
import { logger } from "../utils/logger";
import { formatDateForFilename } from "../utils/time";
import type { ChartRenderer } from "./canvas-chart-renderer";
import { buildChartSpecs } from "./chart-specs";
import type { DocumentRenderer } from "./pdf-renderer";
import { buildReportDocument, type RenderedChart } from "./report-document";

export const PDF_PREFIX = "report_";

export interface ReportRendererOptions {
  charts: ChartRenderer;
  document: DocumentRenderer;
  presentationsDir: string;
  title: string;
  company: string;
  narrativeMaxChars: number;
  now?: () => Date;
}

export interface RenderResult {
  pdfPath: string;
  chartPaths: string[];
}

/**
 * Render stage: analysis JSON in, PNG charts plus one PDF out.
 */
export class ReportRenderer {
  private now: () => Date;

  constructor(private options: ReportRendererOptions) {
    this.now = options.now ?? (() => new Date());
  }

  public async load(reportPath: string): Promise<AnalysisReport> {
    return loadStageInput(
      reportPath,
      analysisReportSchema,
      "Ejecutá primero el análisis (opción 3)."
    );
  }

  public async run(reportPath: string): Promise<RenderResult> {
    logger.info(`[Renderizador] Generando PDF desde ${reportPath}...`);
    const report = await this.load(reportPath);

    const renderedAt = this.now();
    const stamp = formatDateForFilename(renderedAt);
    const chartDir = path.join(this.options.presentationsDir, `charts_${stamp}`);
    ensureDir(chartDir);

    const charts: RenderedChart[] = [];
    const chartPaths: string[] = [];
    for (const spec of buildChartSpecs(report)) {
      let image: Buffer;
      try {
        image = await this.options.charts.render(spec);
      } catch (error) {
        throw new RenderError(`No se pudo generar el gráfico "${spec.id}": ${reason(error)}`, {
          cause: error,
        });
      }
      const chartPath = path.join(chartDir, `${spec.id}.png`);
      await fs.promises.writeFile(chartPath, image);
      chartPaths.push(chartPath);
      charts.push({ title: spec.title, description: spec.description, image });
      logger.debug(`[Renderizador] Gráfico guardado: ${chartPath}`);
    }

    const content = buildReportDocument(report, charts, {
      title: this.options.title,
      company: this.options.company,
      narrativeMaxChars: this.options.narrativeMaxChars,
      renderedAt,
    });

    let pdf: Buffer;
    try {
      pdf = await this.options.document.render(content);
    } catch (error) {
      throw new RenderError(`No se pudo componer el PDF: ${reason(error)}`, { cause: error });
    }

    const pdfPath = path.join(this.options.presentationsDir, `${PDF_PREFIX}${stamp}.pdf`);
    await fs.promises.writeFile(pdfPath, pdf);

    logger.info(`[Renderizador] ${charts.length} gráficos, PDF guardado: ${pdfPath}`);
    return { pdfPath, chartPaths };
  }
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
