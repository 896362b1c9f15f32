import type { GapMetric, QuoteRecord, SpreadMetric } from "../../types";
import { formatPct } from "../../utils/format";

export type AnalysisSection = "QUOTES" | "GAPS" | "SPREADS" | "SUMMARY";

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export const ANALYST_SYSTEM_PROMPT = `Sos un analista financiero especializado en el mercado cambiario argentino.
Trabajás con cotizaciones del dólar de distintas casas (oficial, blue, bolsa/MEP, contado con liquidación, tarjeta, mayorista, cripto).

Reglas:
- Basate únicamente en los datos provistos; no inventes cotizaciones ni fechas.
- Las métricas numéricas ya están calculadas: citá esas cifras, no las recalcules.
- Escribí en español, en prosa clara, sin tablas markdown.
- Si un dato falta o es inconsistente, decilo explícitamente.`;

function quoteLines(quotes: QuoteRecord[]): string {
  return quotes
    .map(
      q =>
        `- ${q.displayName} (${q.houseType}): compra ${q.buyPrice}, venta ${q.sellPrice}, actualizado ${q.updatedAt}`
    )
    .join("\n");
}

export function buildQuotesPrompt(quotes: QuoteRecord[], asciiChart: string): PromptPair {
  return {
    systemPrompt: ANALYST_SYSTEM_PROMPT,
    userPrompt: `Cotizaciones del dólar en Argentina (${quotes.length} casas):
${quoteLines(quotes)}

Gráfico ASCII de precios de venta:
${asciiChart || "[gráfico deshabilitado]"}

Analizá:
1. Qué representa cada tipo de cotización.
2. Diferencias entre las cotizaciones y su significado.
3. Factores que influyen en cada una.
4. Implicaciones para inversores, empresas y consumidores.`,
  };
}

export function buildGapsPrompt(
  reference: QuoteRecord | null,
  gaps: GapMetric[]
): PromptPair {
  const gapLines = gaps.length
    ? gaps
        .map(
          g =>
            `- ${g.displayName}: brecha venta ${formatPct(g.sellGapPct)} (${g.sellGapAmount} ARS), brecha compra ${formatPct(g.buyGapPct)}`
        )
        .join("\n")
    : "- No hay brechas calculadas: falta la cotización de referencia.";

  return {
    systemPrompt: ANALYST_SYSTEM_PROMPT,
    userPrompt: `Brechas cambiarias respecto de la cotización de referencia.
Referencia: ${reference ? `${reference.displayName} (compra ${reference.buyPrice}, venta ${reference.sellPrice})` : "N/D"}

${gapLines}

Analizá:
1. Interpretación de las brechas.
2. Factores que generan estas diferencias.
3. Impacto económico.
4. Perspectivas de convergencia o divergencia.`,
  };
}

export function buildSpreadsPrompt(spreads: SpreadMetric[]): PromptPair {
  const lines = spreads
    .map(s => `- ${s.displayName}: spread ${s.spread} ARS (${s.spreadPct.toFixed(2)}% sobre compra)`)
    .join("\n");

  return {
    systemPrompt: ANALYST_SYSTEM_PROMPT,
    userPrompt: `Spreads entre compra y venta por casa:
${lines}

Analizá:
1. Qué indican los spreads sobre la liquidez de cada mercado.
2. Patrones entre las casas.
3. Perspectivas de corto y mediano plazo.`,
  };
}

export function buildSummaryPrompt(
  quotes: QuoteRecord[],
  highlights: string[]
): PromptPair {
  return {
    systemPrompt: ANALYST_SYSTEM_PROMPT,
    userPrompt: `Generá un resumen ejecutivo del mercado cambiario argentino.

Cotizaciones:
${quoteLines(quotes)}

Datos destacados:
${highlights.map(h => `- ${h}`).join("\n")}

Incluí puntos clave, conclusiones y perspectivas para el próximo período.
Formato: máximo 3 párrafos, lenguaje claro y directo.`,
  };
}
