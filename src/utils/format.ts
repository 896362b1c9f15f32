import type { QuoteRecord } from "../types";
import { shortTimestamp } from "./time";

const priceFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatPrice(value: number): string {
  return `$${priceFormatter.format(value)}`;
}

export function formatPct(value: number): string {
  const sign = value > 0 ? "+" : "";
  return `${sign}${value.toFixed(2)}%`;
}

/**
 * Fixed-width console table of a batch:
 *   Casa                 Compra     Venta      Actualización
 */
export function formatQuoteTable(quotes: QuoteRecord[]): string {
  const rule = "=".repeat(72);
  const lines = [
    rule,
    "COTIZACIONES DEL DÓLAR - ARGENTINA",
    rule,
    `${"Casa".padEnd(26)}${"Compra".padEnd(12)}${"Venta".padEnd(12)}Actualización`,
    "-".repeat(72),
  ];
  for (const q of quotes) {
    lines.push(
      `${q.displayName.padEnd(26)}${q.buyPrice.toFixed(2).padEnd(12)}${q.sellPrice
        .toFixed(2)
        .padEnd(12)}${shortTimestamp(q.updatedAt)}`
    );
  }
  lines.push(rule);
  return lines.join("\n");
}
