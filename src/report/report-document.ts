import type { AnalysisReport } from "../types";
import { formatPct, formatPrice } from "../utils/format";
import { formatDisplayDate, shortTimestamp } from "../utils/time";

export interface RenderedChart {
  title: string;
  description: string;
  image: Buffer;
}

export interface ReportTable {
  headers: string[];
  rows: string[][];
}

export interface ReportSection {
  heading: string;
  body: string;
}

/** Layout-free content of the PDF, in reading order. */
export interface ReportDocument {
  title: string;
  subtitle: string;
  author: string;
  summary: string;
  table: ReportTable;
  charts: RenderedChart[];
  sections: ReportSection[];
  notes: string[];
  footer: string[];
}

export interface ReportDocumentOptions {
  title: string;
  company: string;
  /** 0 keeps the narrative whole. */
  narrativeMaxChars: number;
  renderedAt: Date;
}

export function truncateText(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) return text;
  return `${text.slice(0, maxChars).trimEnd()}...`;
}

export function buildQuoteTable(report: AnalysisReport): ReportTable {
  const gaps = new Map(report.metrics.gaps.map(g => [g.houseType, g]));
  const spreads = new Map(report.metrics.spreads.map(s => [s.houseType, s]));

  const rows = report.quotes.map(q => {
    const spread = spreads.get(q.houseType);
    const gap = gaps.get(q.houseType);
    let gapCell = "N/D";
    if (report.reference && q.houseType === report.reference.houseType) {
      gapCell = "Referencia";
    } else if (gap) {
      gapCell = formatPct(gap.sellGapPct);
    }
    return [
      q.displayName,
      formatPrice(q.buyPrice),
      formatPrice(q.sellPrice),
      spread ? formatPrice(spread.spread) : "N/D",
      gapCell,
      shortTimestamp(q.updatedAt),
    ];
  });

  return {
    headers: ["Casa", "Compra", "Venta", "Spread", "Brecha", "Actualización"],
    rows,
  };
}

export function buildReportDocument(
  report: AnalysisReport,
  charts: RenderedChart[],
  options: ReportDocumentOptions
): ReportDocument {
  const limit = options.narrativeMaxChars;
  const sections: ReportSection[] = [
    { heading: "Análisis de Cotizaciones", body: report.narrative.quotes },
    { heading: "Análisis de Brechas Cambiarias", body: report.narrative.gaps },
    { heading: "Análisis de Spreads y Tendencias", body: report.narrative.spreads },
  ]
    .filter(section => section.body.trim().length > 0)
    .map(section => ({ ...section, body: truncateText(section.body, limit) }));

  return {
    title: options.title,
    subtitle: `Fecha: ${formatDisplayDate(options.renderedAt)} | Fuente: ${report.source} | Datos al ${shortTimestamp(report.fetchedAt)}`,
    author: options.company,
    summary: report.narrative.executiveSummary || "No hay resumen disponible.",
    table: buildQuoteTable(report),
    charts,
    sections,
    notes: report.dataQuality.map(issue => issue.message),
    footer: [
      `Reporte generado automáticamente por ${options.company}`,
      `Modelo: ${report.model} | Análisis: ${shortTimestamp(report.generatedAt)}`,
    ],
  };
}
