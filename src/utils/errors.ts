/**
 * Errors raised by the pipeline stages. Each carries a `hint` telling the
 * operator what to fix; the orchestrator prints both.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly hint: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {}

export class QuoteFetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "Verificá la conexión a internet; la fuente puede estar caída o bloqueando accesos automatizados.",
      options
    );
  }
}

export class DataQualityError extends PipelineError {
  constructor(message: string) {
    super(message, "La fuente devolvió datos inconsistentes; reintentá más tarde.");
  }
}

export class EmptyBatchError extends PipelineError {
  constructor(file: string) {
    super(
      `El lote ${file} no contiene cotizaciones`,
      "Ejecutá nuevamente la recolección (opción 2) antes de analizar."
    );
  }
}

export class AnalysisError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "Revisá LLM_API_KEY / LLM_BASE_URL en el archivo .env y la disponibilidad del modelo.",
      options
    );
  }
}

export class RenderError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "Reinstalá las dependencias de gráficos y PDF (npm install @napi-rs/canvas pdfkit).",
      options
    );
  }
}

export class MissingInputError extends PipelineError {}

export class InvalidInputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "El archivo está dañado o es de otra versión; volvé a ejecutar la etapa anterior.",
      options
    );
  }
}

export function describeError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `${error.message}. ${error.hint}`;
  }
  return error instanceof Error ? error.message : String(error);
}
