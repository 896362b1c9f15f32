import path from "path";
import type { AppConfig } from "./config/config";
import { getStockUrl } from "./config/config";
import type { PipelineStatus } from "./pipeline";
import { RunMode } from "./pipeline";

export type CliMode = RunMode | "status";

export interface CliOptions {
  mode?: CliMode;
  offline: boolean;
  /** Raw --mode value that matched no mode. */
  invalidMode?: string;
}

export const MENU_OPTIONS: Array<{ key: string; mode: CliMode; label: string }> = [
  { key: "1", mode: RunMode.FULL, label: "Ejecutar pipeline completo" },
  { key: "2", mode: RunMode.FETCH, label: "Solo recolectar cotizaciones" },
  { key: "3", mode: RunMode.ANALYZE, label: "Solo analizar datos existentes" },
  { key: "4", mode: RunMode.RENDER, label: "Solo generar el PDF" },
  { key: "5", mode: "status", label: "Ver estado del sistema" },
];

const CLI_MODES: CliMode[] = MENU_OPTIONS.map(option => option.mode);

function isCliMode(value: string): value is CliMode {
  return CLI_MODES.some(mode => mode === value);
}

export function parseArgs(argv: string[]): CliOptions {
  const map: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      map[key] = next;
      i++;
    } else {
      map[key] = true;
    }
  }

  const options: CliOptions = {
    offline: Boolean(map["offline"] || process.env.QUOTES_OFFLINE === "true"),
  };

  const rawMode = map["mode"];
  if (typeof rawMode === "string") {
    if (isCliMode(rawMode)) {
      options.mode = rawMode;
    } else {
      options.invalidMode = rawMode;
    }
  } else if (rawMode === true) {
    options.invalidMode = "";
  }
  return options;
}

/** Maps a menu answer to its mode; null for "0", undefined for anything unknown. */
export function menuChoice(answer: string): CliMode | null | undefined {
  const key = answer.trim();
  if (key === "0") return null;
  return MENU_OPTIONS.find(option => option.key === key)?.mode;
}

export function formatMenu(): string {
  const lines = [
    "",
    "Opciones:",
    ...MENU_OPTIONS.map(option => `  ${option.key}. ${option.label}`),
    "  0. Salir",
  ];
  return lines.join("\n");
}

export function formatStatus(
  appConfig: AppConfig,
  configErrors: string[],
  status: PipelineStatus,
  offline: boolean
): string {
  const lines: string[] = ["", "ESTADO DEL SISTEMA", "=".repeat(40)];

  lines.push(
    configErrors.length === 0
      ? "Configuración: OK"
      : `Configuración: ${configErrors.length} problema(s)`
  );
  for (const error of configErrors) {
    lines.push(`  - ${error}`);
  }

  lines.push(`LLM: ${appConfig.llm.provider} (${appConfig.llm.model})`);
  lines.push(`API key: ${appConfig.llm.apiKey ? "configurada" : "NO configurada"}`);
  lines.push(`Modo sin conexión: ${offline ? "sí" : "no"}`);

  lines.push("", "Fuentes:");
  lines.push(`  - Cotizaciones: ${appConfig.sources.dolarApi}`);
  lines.push(`  - Merval: ${appConfig.sources.investingMerval}`);
  lines.push(`  - USD/ARS: ${appConfig.sources.investingUsdArs}`);

  lines.push("", `Acciones seguidas (${appConfig.trackedStocks.length}):`);
  for (const symbol of appConfig.trackedStocks) {
    lines.push(`  - ${symbol}: ${getStockUrl(appConfig, symbol)}`);
  }

  const show = (file: string | null) => (file ? path.basename(file) : "ninguno");
  lines.push("", "Archivos más recientes:");
  lines.push(`  - Lote: ${show(status.latestBatch)}`);
  lines.push(`  - Análisis: ${show(status.latestReport)}`);
  lines.push(`  - PDF: ${show(status.latestPdf)}`);

  lines.push("", "Últimas etapas:");
  if (status.recentSteps.length === 0) {
    lines.push("  (sin ejecuciones en esta sesión)");
  }
  for (const step of status.recentSteps) {
    lines.push(`  - [${step.timestamp}] ${step.step}: ${step.status} (${step.detail})`);
  }

  return lines.join("\n");
}
