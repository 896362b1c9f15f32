import type { AnalysisReport } from "../types";

export type ChartId = "quotes" | "gaps" | "spreads" | "ranking";
export type ValueFormat = "price" | "percent" | "number";

export interface ChartSeries {
  label: string;
  color: string;
  values: number[];
  /** Per-bar override of `color`, same length as `values`. */
  barColors?: string[];
}

export interface ChartPanel {
  title: string;
  axisLabel: string;
  orientation: "vertical" | "horizontal";
  valueFormat: ValueFormat;
  categories: string[];
  series: ChartSeries[];
}

export interface ChartSpec {
  id: ChartId;
  title: string;
  description: string;
  panels: ChartPanel[];
}

export const CHART_COLORS = {
  buy: "#60a5fa",
  sell: "#f87171",
  positive: "#dc2626",
  negative: "#16a34a",
  spread: "#f59e0b",
  spreadPct: "#8b5cf6",
  ranking: "#2563eb",
  reference: "#dc2626",
} as const;

/**
 * Chart definitions for a report, in the order they appear in the PDF.
 * Charts without data (gaps when the reference house is missing) are left out.
 */
export function buildChartSpecs(report: AnalysisReport): ChartSpec[] {
  const specs: ChartSpec[] = [];
  const { quotes, metrics } = report;

  if (quotes.length > 0) {
    specs.push({
      id: "quotes",
      title: "Cotizaciones del Dólar",
      description: "Precios de compra y venta por tipo de cotización",
      panels: [
        {
          title: "Compra vs Venta (ARS)",
          axisLabel: "Precio (ARS)",
          orientation: "vertical",
          valueFormat: "price",
          categories: quotes.map(q => q.displayName),
          series: [
            { label: "Compra", color: CHART_COLORS.buy, values: quotes.map(q => q.buyPrice) },
            { label: "Venta", color: CHART_COLORS.sell, values: quotes.map(q => q.sellPrice) },
          ],
        },
      ],
    });
  }

  if (metrics.gaps.length > 0) {
    const values = metrics.gaps.map(g => g.sellGapPct);
    specs.push({
      id: "gaps",
      title: "Brechas Cambiarias",
      description: `Diferencia porcentual del precio de venta respecto del dólar ${report.referenceHouse}`,
      panels: [
        {
          title: `Brecha vs ${report.reference?.displayName ?? report.referenceHouse} (%)`,
          axisLabel: "Brecha (%)",
          orientation: "vertical",
          valueFormat: "percent",
          categories: metrics.gaps.map(g => g.displayName),
          series: [
            {
              label: "Brecha venta",
              color: CHART_COLORS.positive,
              values,
              barColors: values.map(v => (v > 0 ? CHART_COLORS.positive : CHART_COLORS.negative)),
            },
          ],
        },
      ],
    });
  }

  if (metrics.spreads.length > 0) {
    const categories = metrics.spreads.map(s => s.displayName);
    specs.push({
      id: "spreads",
      title: "Spreads de Compra-Venta",
      description: "Diferencia entre precio de venta y de compra, absoluta y porcentual",
      panels: [
        {
          title: "Spreads absolutos (ARS)",
          axisLabel: "Spread (ARS)",
          orientation: "vertical",
          valueFormat: "number",
          categories,
          series: [
            { label: "Spread", color: CHART_COLORS.spread, values: metrics.spreads.map(s => s.spread) },
          ],
        },
        {
          title: "Spreads porcentuales (%)",
          axisLabel: "Spread (%)",
          orientation: "vertical",
          valueFormat: "percent",
          categories,
          series: [
            {
              label: "Spread %",
              color: CHART_COLORS.spreadPct,
              values: metrics.spreads.map(s => s.spreadPct),
            },
          ],
        },
      ],
    });
  }

  if (metrics.ranking.length > 0) {
    specs.push({
      id: "ranking",
      title: "Ranking de Precios de Venta",
      description: "Casas ordenadas por precio de venta; la referencia se destaca en rojo",
      panels: [
        {
          title: "Precio de venta (ARS)",
          axisLabel: "Precio de venta (ARS)",
          orientation: "horizontal",
          valueFormat: "price",
          categories: metrics.ranking.map(r => `${r.position}. ${r.displayName}`),
          series: [
            {
              label: "Venta",
              color: CHART_COLORS.ranking,
              values: metrics.ranking.map(r => r.sellPrice),
              barColors: metrics.ranking.map(r =>
                r.houseType === report.referenceHouse ? CHART_COLORS.reference : CHART_COLORS.ranking
              ),
            },
          ],
        },
      ],
    });
  }

  return specs;
}
