import { createCanvas, type SKRSContext2D } from "@napi-rs/canvas";
import { formatPct } from "../utils/format";
import type { ChartPanel, ChartSpec, ValueFormat } from "./chart-specs";

export interface ChartRenderer {
  /** PNG bytes of the chart. */
  render(spec: ChartSpec): Promise<Buffer>;
}

export interface CanvasChartRendererOptions {
  width?: number;
  height?: number;
}

interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

const TEXT = "#111827";
const MUTED = "#374151";
const GRID = "#e5e7eb";

export function getNiceStep(min: number, max: number, tickCount: number): number {
  const range = Math.max(0, max - min);
  if (range === 0) return 1;
  const rough = range / Math.max(1, tickCount - 1);
  const exponent = Math.floor(Math.log10(rough));
  const base = Math.pow(10, exponent);
  const fraction = rough / base;

  let niceFraction = 1;
  if (fraction <= 1) niceFraction = 1;
  else if (fraction <= 2) niceFraction = 2;
  else if (fraction <= 5) niceFraction = 5;
  else niceFraction = 10;

  return niceFraction * base;
}

export function formatChartValue(value: number, format: ValueFormat): string {
  switch (format) {
    case "price":
      return `$${Math.round(value).toLocaleString("en-US")}`;
    case "percent":
      return formatPct(value);
    default:
      return value.toFixed(2);
  }
}

/** Value range of a panel, always including zero, padded on the open sides. */
export function valueRange(panel: ChartPanel): { min: number; max: number } {
  const values = panel.series.flatMap(s => s.values);
  let min = Math.min(0, ...values);
  let max = Math.max(0, ...values);
  if (min === max) {
    max = min + 1;
  }
  const pad = (max - min) * 0.08;
  if (max > 0) max += pad;
  if (min < 0) min -= pad;
  return { min, max };
}

/**
 * Bar charts drawn on a @napi-rs/canvas surface. Panels of one spec are laid
 * out side by side under a shared title and legend.
 */
export class CanvasChartRenderer implements ChartRenderer {
  private width: number;
  private height: number;

  constructor(options: CanvasChartRendererOptions = {}) {
    this.width = options.width ?? 1200;
    this.height = options.height ?? 700;
  }

  public async render(spec: ChartSpec): Promise<Buffer> {
    if (spec.panels.length === 0) {
      throw new Error(`El gráfico "${spec.id}" no tiene paneles`);
    }

    const { width, height } = this;
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext("2d");

    ctx.fillStyle = "#ffffff";
    ctx.fillRect(0, 0, width, height);

    ctx.fillStyle = TEXT;
    ctx.font = "bold 22px sans-serif";
    ctx.fillText(spec.title, 24, 36);

    const headerBottom = this.drawLegend(ctx, spec);

    const gap = 24;
    const panelWidth = (width - gap * (spec.panels.length + 1)) / spec.panels.length;
    spec.panels.forEach((panel, i) => {
      const area: Rect = {
        left: gap + i * (panelWidth + gap),
        top: headerBottom,
        width: panelWidth,
        height: height - headerBottom - 12,
      };
      if (panel.orientation === "horizontal") {
        this.drawHorizontalPanel(ctx, panel, area);
      } else {
        this.drawVerticalPanel(ctx, panel, area);
      }
    });

    return canvas.toBuffer("image/png");
  }

  /** Legend of the first panel's series; returns the y where panels start. */
  private drawLegend(ctx: SKRSContext2D, spec: ChartSpec): number {
    const series = spec.panels[0].series;
    if (series.length < 2) return 56;

    ctx.font = "13px sans-serif";
    let x = 24;
    for (const s of series) {
      ctx.fillStyle = s.color;
      ctx.fillRect(x, 50, 14, 14);
      ctx.fillStyle = MUTED;
      ctx.fillText(s.label, x + 20, 62);
      x += 20 + ctx.measureText(s.label).width + 24;
    }
    return 76;
  }

  private drawPanelTitle(ctx: SKRSContext2D, panel: ChartPanel, area: Rect) {
    ctx.fillStyle = TEXT;
    ctx.font = "bold 15px sans-serif";
    ctx.fillText(panel.title, area.left, area.top + 16);
  }

  private drawVerticalPanel(ctx: SKRSContext2D, panel: ChartPanel, area: Rect) {
    this.drawPanelTitle(ctx, panel, area);

    const plot: Rect = {
      left: area.left + 78,
      top: area.top + 36,
      width: area.width - 78 - 8,
      height: area.height - 36 - 64,
    };
    const bottom = plot.top + plot.height;
    const { min, max } = valueRange(panel);
    const yFor = (v: number) => plot.top + ((max - v) / (max - min)) * plot.height;

    // Horizontal grid + value axis labels
    const step = getNiceStep(min, max, 7);
    ctx.font = "12px sans-serif";
    ctx.lineWidth = 1;
    for (let v = Math.ceil(min / step) * step; v <= max + 1e-9; v += step) {
      const y = yFor(v);
      ctx.strokeStyle = GRID;
      ctx.beginPath();
      ctx.moveTo(plot.left, y);
      ctx.lineTo(plot.left + plot.width, y);
      ctx.stroke();

      const label = formatChartValue(v, panel.valueFormat);
      ctx.fillStyle = MUTED;
      ctx.fillText(label, plot.left - 8 - ctx.measureText(label).width, y + 4);
    }

    const groupCount = panel.categories.length;
    const groupWidth = plot.width / Math.max(1, groupCount);
    const barWidth = (groupWidth * 0.7) / panel.series.length;
    const zeroY = yFor(0);

    panel.series.forEach((series, si) => {
      series.values.forEach((value, ci) => {
        const x = plot.left + ci * groupWidth + groupWidth * 0.15 + si * barWidth;
        const y = yFor(value);
        ctx.fillStyle = series.barColors?.[ci] ?? series.color;
        ctx.fillRect(x, Math.min(y, zeroY), barWidth, Math.max(1, Math.abs(zeroY - y)));

        ctx.fillStyle = TEXT;
        ctx.font = "11px sans-serif";
        const label = formatChartValue(value, panel.valueFormat);
        const labelWidth = ctx.measureText(label).width;
        const labelY = value >= 0 ? y - 5 : y + 14;
        ctx.fillText(label, x + barWidth / 2 - labelWidth / 2, labelY);
      });
    });

    // Axes
    ctx.strokeStyle = TEXT;
    ctx.lineWidth = 1.5;
    ctx.beginPath();
    ctx.moveTo(plot.left, plot.top);
    ctx.lineTo(plot.left, bottom);
    ctx.moveTo(plot.left, zeroY);
    ctx.lineTo(plot.left + plot.width, zeroY);
    ctx.stroke();

    // Category labels, alternating rows so long names do not collide
    ctx.font = "12px sans-serif";
    ctx.fillStyle = MUTED;
    panel.categories.forEach((category, ci) => {
      const text = fitText(ctx, category, groupWidth * 1.8);
      const w = ctx.measureText(text).width;
      const cx = plot.left + ci * groupWidth + groupWidth / 2;
      const rowY = ci % 2 === 0 ? bottom + 20 : bottom + 38;
      ctx.fillText(text, cx - w / 2, rowY);
    });

    ctx.fillStyle = MUTED;
    ctx.font = "12px sans-serif";
    ctx.fillText(panel.axisLabel, plot.left, area.top + area.height - 4);
  }

  private drawHorizontalPanel(ctx: SKRSContext2D, panel: ChartPanel, area: Rect) {
    this.drawPanelTitle(ctx, panel, area);

    const plot: Rect = {
      left: area.left + 210,
      top: area.top + 36,
      width: area.width - 210 - 90,
      height: area.height - 36 - 40,
    };
    const bottom = plot.top + plot.height;
    const { min, max } = valueRange(panel);
    const xFor = (v: number) => plot.left + ((v - min) / (max - min)) * plot.width;

    const step = getNiceStep(min, max, 7);
    ctx.font = "12px sans-serif";
    ctx.lineWidth = 1;
    for (let v = Math.ceil(min / step) * step; v <= max + 1e-9; v += step) {
      const x = xFor(v);
      ctx.strokeStyle = GRID;
      ctx.beginPath();
      ctx.moveTo(x, plot.top);
      ctx.lineTo(x, bottom);
      ctx.stroke();

      const label = formatChartValue(v, panel.valueFormat);
      ctx.fillStyle = MUTED;
      ctx.fillText(label, x - ctx.measureText(label).width / 2, bottom + 18);
    }

    const rowCount = panel.categories.length;
    const rowHeight = plot.height / Math.max(1, rowCount);
    const barHeight = (rowHeight * 0.7) / panel.series.length;
    const zeroX = xFor(0);

    panel.series.forEach((series, si) => {
      series.values.forEach((value, ci) => {
        const y = plot.top + ci * rowHeight + rowHeight * 0.15 + si * barHeight;
        const x = xFor(value);
        ctx.fillStyle = series.barColors?.[ci] ?? series.color;
        ctx.fillRect(Math.min(x, zeroX), y, Math.max(1, Math.abs(x - zeroX)), barHeight);

        ctx.fillStyle = TEXT;
        ctx.font = "bold 12px sans-serif";
        ctx.fillText(formatChartValue(value, panel.valueFormat), Math.max(x, zeroX) + 6, y + barHeight / 2 + 4);
      });
    });

    ctx.font = "13px sans-serif";
    ctx.fillStyle = MUTED;
    panel.categories.forEach((category, ci) => {
      const text = fitText(ctx, category, 200);
      const w = ctx.measureText(text).width;
      const cy = plot.top + ci * rowHeight + rowHeight / 2;
      ctx.fillText(text, plot.left - 10 - w, cy + 4);
    });

    ctx.strokeStyle = TEXT;
    ctx.lineWidth = 1.5;
    ctx.beginPath();
    ctx.moveTo(zeroX, plot.top);
    ctx.lineTo(zeroX, bottom);
    ctx.lineTo(plot.left + plot.width, bottom);
    ctx.stroke();
  }
}

function fitText(ctx: SKRSContext2D, text: string, maxWidth: number): string {
  if (ctx.measureText(text).width <= maxWidth) return text;
  let out = text;
  while (out.length > 1 && ctx.measureText(`${out}…`).width > maxWidth) {
    out = out.slice(0, -1);
  }
  return `${out}…`;
}
