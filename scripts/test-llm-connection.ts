import { config } from "../src/config/config";
import { LLMService } from "../src/llm/llm-service";
import { logger } from "../src/utils/logger";

async function run() {
  logger.info(`[Prueba] Proveedor: ${config.llm.provider}`);
  logger.info(`[Prueba] Endpoint: ${config.llm.baseUrl}`);

  if (!config.llm.apiKey) {
    logger.error("[Prueba] LLM_API_KEY no configurada. Revisá el archivo .env");
    process.exitCode = 1;
    return;
  }

  const llm = new LLMService({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
  });

  const ok = await llm.testConnection();
  if (!ok) {
    process.exitCode = 1;
    return;
  }

  const reply = await llm.complete({
    tag: "PING",
    systemPrompt: "Respondé en una sola línea.",
    userPrompt: "Decí 'ok' si recibís este mensaje.",
  });
  logger.info(`[Prueba] Respuesta de ${llm.model}: ${reply}`);
}

run().catch(error => {
  logger.error("[Prueba] Error inesperado:", error);
  process.exitCode = 1;
});
