import dotenv from "dotenv";
import fs from "fs";
import toml from "@iarna/toml";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../utils/errors";
import { logger } from "../utils/logger";

// Load environment variables immediately
dotenv.config();

const DEFAULT_STOCKS = [
  "GGAL",
  "PAMP",
  "TXAR",
  "YPFD",
  "MIRG",
  "BBAR",
  "CRES",
  "EDN",
  "HARG",
  "LOMA",
];

const tomlSchema = z.object({
  sources: z
    .object({
      dolar_api: z.string().url().default("https://dolarapi.com/v1/dolares"),
      investing_merval: z
        .string()
        .url()
        .default("https://es.investing.com/indices/s-and-p-merval"),
      investing_usd_ars: z
        .string()
        .url()
        .default("https://es.investing.com/currencies/usd-ars"),
      yahoo_base: z.string().url().default("https://finance.yahoo.com/quote/"),
    })
    .default({}),
  market: z
    .object({
      tracked_stocks: z.array(z.string().min(1)).default(DEFAULT_STOCKS),
    })
    .default({}),
  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(10_000),
      user_agent: z
        .string()
        .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36"),
    })
    .default({}),
  paths: z
    .object({
      data_dir: z.string().min(1).default("data"),
      reports_dir: z.string().min(1).default("reports"),
      presentations_dir: z.string().min(1).default("presentations"),
    })
    .default({}),
  analysis: z
    .object({
      reference_house: z.string().min(1).default("oficial"),
    })
    .default({}),
  llm: z
    .object({
      log_interactions: z.boolean().default(false),
      include_chart: z.boolean().default(true),
      temperature: z.number().min(0).max(2).default(0.4),
    })
    .default({}),
  report: z
    .object({
      title: z.string().default("Reporte de Cotizaciones del Dólar"),
      company: z.string().default("Sistema Multiagente de Análisis Financiero"),
      chart_width: z.number().int().min(600).default(1200),
      chart_height: z.number().int().min(400).default(700),
      narrative_max_chars: z.number().int().nonnegative().default(1000),
    })
    .default({}),
});

export type TomlConfig = z.infer<typeof tomlSchema>;

export interface AppConfig {
  // Environment Variables
  llm: {
    provider: string;
    apiKey: string;
    baseUrl: string;
    model: string;
    logInteractions: boolean;
    includeChart: boolean;
    temperature: number;
  };

  // TOML config
  sources: {
    dolarApi: string;
    investingMerval: string;
    investingUsdArs: string;
    yahooBase: string;
  };
  trackedStocks: string[];
  fetch: {
    timeoutMs: number;
    userAgent: string;
  };
  paths: {
    dataDir: string;
    reportsDir: string;
    presentationsDir: string;
  };
  analysis: {
    referenceHouse: string;
  };
  report: {
    title: string;
    company: string;
    chartWidth: number;
    chartHeight: number;
    narrativeMaxChars: number;
  };
}

export class ConfigLoader {
  private static instance: AppConfig;

  private constructor() {}

  public static getInstance(): AppConfig {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = ConfigLoader.loadConfig();
    }
    return ConfigLoader.instance;
  }

  public static readToml(configPath: string): TomlConfig {
    let raw: unknown = {};

    if (fs.existsSync(configPath)) {
      raw = toml.parse(fs.readFileSync(configPath, "utf-8"));
    } else {
      logger.warn(
        `[Config] No se encontró ${configPath}, se usan los valores por defecto.`
      );
    }

    const parsed = tomlSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(
        `config.toml inválido (${configPath}): ${details}`,
        "Corregí los valores indicados o borrá la clave para usar el valor por defecto."
      );
    }
    return parsed.data;
  }

  public static fromSources(
    tomlConfig: TomlConfig,
    env: NodeJS.ProcessEnv,
    baseDir: string = process.cwd()
  ): AppConfig {
    return {
      llm: {
        provider: env.LLM_PROVIDER || "gemini",
        apiKey: env.LLM_API_KEY || env.GOOGLE_API_KEY || "",
        baseUrl:
          env.LLM_BASE_URL ||
          "https://generativelanguage.googleapis.com/v1beta/openai/",
        model: env.LLM_MODEL || "gemini-2.5-flash-lite",
        logInteractions: tomlConfig.llm.log_interactions,
        includeChart: tomlConfig.llm.include_chart,
        temperature: tomlConfig.llm.temperature,
      },
      sources: {
        dolarApi: tomlConfig.sources.dolar_api,
        investingMerval: tomlConfig.sources.investing_merval,
        investingUsdArs: tomlConfig.sources.investing_usd_ars,
        yahooBase: tomlConfig.sources.yahoo_base,
      },
      trackedStocks: tomlConfig.market.tracked_stocks,
      fetch: {
        timeoutMs: tomlConfig.fetch.timeout_ms,
        userAgent: tomlConfig.fetch.user_agent,
      },
      paths: {
        dataDir: path.resolve(baseDir, tomlConfig.paths.data_dir),
        reportsDir: path.resolve(baseDir, tomlConfig.paths.reports_dir),
        presentationsDir: path.resolve(baseDir, tomlConfig.paths.presentations_dir),
      },
      analysis: {
        referenceHouse: tomlConfig.analysis.reference_house,
      },
      report: {
        title: tomlConfig.report.title,
        company: tomlConfig.report.company,
        chartWidth: tomlConfig.report.chart_width,
        chartHeight: tomlConfig.report.chart_height,
        narrativeMaxChars: tomlConfig.report.narrative_max_chars,
      },
    };
  }

  private static loadConfig(): AppConfig {
    const configPath = path.resolve(process.cwd(), "config.toml");
    return ConfigLoader.fromSources(ConfigLoader.readToml(configPath), process.env);
  }
}

/**
 * Returns the problems that keep the pipeline from running. Output
 * directories are created here when missing.
 */
export function validateConfig(appConfig: AppConfig): string[] {
  const errors: string[] = [];

  if (!appConfig.llm.apiKey) {
    errors.push(
      "LLM_API_KEY no configurada: creá o revisá el archivo .env (ver .env.example)"
    );
  }

  const dirs: Array<[string, string]> = [
    ["data_dir", appConfig.paths.dataDir],
    ["reports_dir", appConfig.paths.reportsDir],
    ["presentations_dir", appConfig.paths.presentationsDir],
  ];
  for (const [name, dir] of dirs) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errors.push(`No se pudo crear ${name} (${dir}): ${reason}`);
    }
  }

  return errors;
}

export function getStockUrl(appConfig: AppConfig, symbol: string): string {
  return `${appConfig.sources.yahooBase}${symbol}.BA`;
}

export const config = ConfigLoader.getInstance();
