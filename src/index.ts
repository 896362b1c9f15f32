import "dotenv/config";
import readline from "readline/promises";
import { QuoteAnalyst } from "./analysis/quote-analyst";
import { type CliMode, formatMenu, formatStatus, menuChoice, parseArgs } from "./cli";
import { type AppConfig, config, validateConfig } from "./config/config";
import { LLMService } from "./llm/llm-service";
import { MockQuoteSource } from "./market/mock-quote-source";
import { QuoteCollector } from "./market/quote-collector";
import { DolarApiSource, type QuoteSource } from "./market/quote-source";
import { QuoteStore } from "./market/quote-store";
import { Pipeline } from "./pipeline";
import { CanvasChartRenderer } from "./report/canvas-chart-renderer";
import { PdfDocumentRenderer } from "./report/pdf-renderer";
import { ReportRenderer } from "./report/report-renderer";
import { logger } from "./utils/logger";

function buildPipeline(appConfig: AppConfig, offline: boolean): Pipeline {
  const source: QuoteSource = offline
    ? new MockQuoteSource()
    : new DolarApiSource({
        url: appConfig.sources.dolarApi,
        timeoutMs: appConfig.fetch.timeoutMs,
        userAgent: appConfig.fetch.userAgent,
      });
  const store = new QuoteStore(appConfig.paths.dataDir);

  const llm = new LLMService({
    apiKey: appConfig.llm.apiKey,
    baseUrl: appConfig.llm.baseUrl,
    model: appConfig.llm.model,
    temperature: appConfig.llm.temperature,
    logInteractions: appConfig.llm.logInteractions,
  });

  return new Pipeline({
    collector: new QuoteCollector(source, store),
    analyst: new QuoteAnalyst({
      llm,
      store,
      reportsDir: appConfig.paths.reportsDir,
      referenceHouse: appConfig.analysis.referenceHouse,
      includeChart: appConfig.llm.includeChart,
    }),
    renderer: new ReportRenderer({
      charts: new CanvasChartRenderer({
        width: appConfig.report.chartWidth,
        height: appConfig.report.chartHeight,
      }),
      document: new PdfDocumentRenderer(),
      presentationsDir: appConfig.paths.presentationsDir,
      title: appConfig.report.title,
      company: appConfig.report.company,
      narrativeMaxChars: appConfig.report.narrativeMaxChars,
    }),
    dataDir: appConfig.paths.dataDir,
    reportsDir: appConfig.paths.reportsDir,
    presentationsDir: appConfig.paths.presentationsDir,
  });
}

/** Runs one mode; returns false when it failed. */
async function runMode(
  pipeline: Pipeline,
  mode: CliMode,
  configErrors: string[],
  offline: boolean
): Promise<boolean> {
  if (mode === "status") {
    console.log(formatStatus(config, configErrors, pipeline.getStatus(), offline));
    return true;
  }

  const run = await pipeline.run(mode);
  if (run.status === "completed") {
    const last = run.steps[run.steps.length - 1];
    if (last?.output) {
      logger.info(`Resultado: ${last.output}`);
    }
    return true;
  }
  for (const error of run.errors) {
    logger.error(error);
  }
  return false;
}

async function interactive(pipeline: Pipeline, configErrors: string[], offline: boolean) {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      console.log(formatMenu());
      const answer = await rl.question("Seleccioná una opción: ");
      const mode = menuChoice(answer);
      if (mode === null) {
        logger.info("Hasta luego.");
        return;
      }
      if (mode === undefined) {
        logger.warn(`Opción inválida: "${answer.trim()}"`);
        continue;
      }
      await runMode(pipeline, mode, configErrors, offline);
    }
  } finally {
    rl.close();
  }
}

async function main() {
  logger.info("=".repeat(60));
  logger.info("Pipeline de cotizaciones del dólar - Argentina");
  logger.info("=".repeat(60));

  const options = parseArgs(process.argv.slice(2));
  if (options.invalidMode !== undefined) {
    logger.error(
      `Modo inválido "${options.invalidMode}". Usá full, fetch, analyze, render o status.`
    );
    process.exitCode = 1;
    return;
  }

  const configErrors = validateConfig(config);
  for (const error of configErrors) {
    logger.warn(`[Config] ${error}`);
  }

  logger.info(`- Fuente: ${options.offline ? "datos simulados" : config.sources.dolarApi}`);
  logger.info(`- LLM: ${config.llm.provider} (${config.llm.model})`);
  logger.info(`- Salida: ${config.paths.presentationsDir}`);

  const pipeline = buildPipeline(config, options.offline);

  if (options.mode) {
    const ok = await runMode(pipeline, options.mode, configErrors, options.offline);
    if (!ok) process.exitCode = 1;
    return;
  }

  await interactive(pipeline, configErrors, options.offline);
}

main().catch(error => {
  logger.error("Error fatal:", error);
  process.exitCode = 1;
});
