import { config } from "../src/config/config";
import { MockQuoteSource } from "../src/market/mock-quote-source";
import { QuoteCollector } from "../src/market/quote-collector";
import { QuoteStore } from "../src/market/quote-store";
import { logger } from "../src/utils/logger";

async function run() {
  const collector = new QuoteCollector(
    new MockQuoteSource(),
    new QuoteStore(config.paths.dataDir)
  );
  const { batch, jsonPath, csvPath } = await collector.collect();
  logger.info(`Generadas ${batch.quotes.length} cotizaciones simuladas`);
  logger.info(`- ${jsonPath}`);
  logger.info(`- ${csvPath}`);
}

run().catch(error => {
  logger.error("No se pudieron generar los datos simulados:", error);
  process.exitCode = 1;
});
