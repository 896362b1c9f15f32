import path from "path";
import type { AnalystResult } from "./analysis/quote-analyst";
import { REPORT_PREFIX } from "./analysis/quote-analyst";
import type { CollectResult } from "./market/quote-collector";
import { BATCH_PREFIX } from "./market/quote-store";
import type { RenderResult } from "./report/report-renderer";
import { PDF_PREFIX } from "./report/report-renderer";
import { MissingInputError, PipelineError, describeError } from "./utils/errors";
import { findLatestFile, writeJson } from "./utils/files";
import { logger } from "./utils/logger";
import { formatDateForFilename } from "./utils/time";

export enum RunMode {
  FULL = "full",
  FETCH = "fetch",
  ANALYZE = "analyze",
  RENDER = "render",
}

export type StepName = "collect" | "analyze" | "render";

export interface StepResult {
  step: StepName;
  status: "success" | "failed" | "skipped";
  output?: string;
  detail: string;
  timestamp: string;
}

export interface PipelineRun {
  mode: RunMode;
  status: "completed" | "failed";
  startedAt: string;
  endedAt: string;
  durationSeconds: number;
  steps: StepResult[];
  errors: string[];
  logFile?: string;
}

export interface CollectStage {
  collect(): Promise<CollectResult>;
}

export interface AnalyzeStage {
  run(batchPath: string): Promise<AnalystResult>;
}

export interface RenderStage {
  run(reportPath: string): Promise<RenderResult>;
}

export interface PipelineOptions {
  collector: CollectStage;
  analyst: AnalyzeStage;
  renderer: RenderStage;
  dataDir: string;
  reportsDir: string;
  presentationsDir: string;
  /** Write every run to reports/execution_log_<stamp>.json (default true). */
  saveRunLogs?: boolean;
  now?: () => Date;
}

export interface PipelineStatus {
  latestBatch: string | null;
  latestReport: string | null;
  latestPdf: string | null;
  recentSteps: StepResult[];
}

const STEPS_BY_MODE: Record<RunMode, StepName[]> = {
  [RunMode.FULL]: ["collect", "analyze", "render"],
  [RunMode.FETCH]: ["collect"],
  [RunMode.ANALYZE]: ["analyze"],
  [RunMode.RENDER]: ["render"],
};

const RECENT_STEP_LIMIT = 5;

/**
 * Runs the stages in order, each one consuming the file the previous one
 * wrote. A failed stage stops the run; the remaining ones are marked skipped.
 */
export class Pipeline {
  private now: () => Date;
  private stepLog: StepResult[] = [];

  constructor(private options: PipelineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  public async run(mode: RunMode): Promise<PipelineRun> {
    const started = this.now();
    logger.info(`[Orquestador] Ejecutando modo "${mode}"`);

    const steps: StepResult[] = [];
    const errors: string[] = [];
    let handoff: string | null = null;
    let failed = false;

    for (const step of STEPS_BY_MODE[mode]) {
      if (failed) {
        steps.push(this.record(step, "skipped", "Etapa anterior fallida"));
        continue;
      }

      logger.info(`[Orquestador] ---- Etapa: ${step} ----`);
      try {
        handoff = await this.runStep(step, handoff);
        steps.push(this.record(step, "success", "OK", handoff));
      } catch (error) {
        failed = true;
        const message = describeError(error);
        errors.push(`${step}: ${message}`);
        steps.push(this.record(step, "failed", message));
        if (error instanceof PipelineError) {
          logger.error(`[Orquestador] ${step} falló: ${error.message}`);
          logger.warn(`[Orquestador] Sugerencia: ${error.hint}`);
        } else {
          logger.error(`[Orquestador] ${step} falló`, error);
        }
      }
    }

    const ended = this.now();
    const run: PipelineRun = {
      mode,
      status: failed ? "failed" : "completed",
      startedAt: started.toISOString(),
      endedAt: ended.toISOString(),
      durationSeconds: (ended.getTime() - started.getTime()) / 1000,
      steps,
      errors,
    };

    if (this.options.saveRunLogs ?? true) {
      const logFile = path.join(
        this.options.reportsDir,
        `execution_log_${formatDateForFilename(ended)}.json`
      );
      try {
        await writeJson(logFile, run);
        run.logFile = logFile;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`[Orquestador] No se pudo guardar el log de ejecución ${logFile}: ${reason}`);
      }
    }

    logger.info(
      `[Orquestador] Modo "${mode}" ${run.status === "completed" ? "completado" : "fallido"} en ${run.durationSeconds.toFixed(2)}s`
    );
    return run;
  }

  /** Runs one stage and returns the path of the file it produced. */
  private async runStep(step: StepName, input: string | null): Promise<string> {
    switch (step) {
      case "collect": {
        const result = await this.options.collector.collect();
        return result.jsonPath;
      }
      case "analyze": {
        const batchPath = input ?? this.requireLatest(
          this.options.dataDir,
          BATCH_PREFIX,
          ".json",
          "No hay lotes de cotizaciones",
          "Ejecutá primero la recolección (opción 2)."
        );
        const result = await this.options.analyst.run(batchPath);
        return result.reportPath;
      }
      case "render": {
        const reportPath = input ?? this.requireLatest(
          this.options.reportsDir,
          REPORT_PREFIX,
          ".json",
          "No hay reportes de análisis",
          "Ejecutá primero el análisis (opción 3)."
        );
        const result = await this.options.renderer.run(reportPath);
        return result.pdfPath;
      }
    }
  }

  private requireLatest(
    dir: string,
    prefix: string,
    extension: string,
    message: string,
    hint: string
  ): string {
    const latest = findLatestFile(dir, prefix, extension);
    if (!latest) {
      throw new MissingInputError(`${message} en ${dir}`, hint);
    }
    logger.info(`[Orquestador] Usando el archivo más reciente: ${latest}`);
    return latest;
  }

  private record(
    step: StepName,
    status: StepResult["status"],
    detail: string,
    output?: string
  ): StepResult {
    const entry: StepResult = {
      step,
      status,
      detail,
      timestamp: this.now().toISOString(),
      ...(output ? { output } : {}),
    };
    this.stepLog.push(entry);
    if (this.stepLog.length > RECENT_STEP_LIMIT) {
      this.stepLog.splice(0, this.stepLog.length - RECENT_STEP_LIMIT);
    }
    return entry;
  }

  public getStatus(): PipelineStatus {
    return {
      latestBatch: findLatestFile(this.options.dataDir, BATCH_PREFIX, ".json"),
      latestReport: findLatestFile(this.options.reportsDir, REPORT_PREFIX, ".json"),
      latestPdf: findLatestFile(this.options.presentationsDir, PDF_PREFIX, ".pdf"),
      recentSteps: [...this.stepLog],
    };
  }
}
