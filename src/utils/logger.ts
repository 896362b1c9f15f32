// .env must be loaded before the singleton below reads LOG_*
import "dotenv/config";
import * as fs from "fs";
import * as path from "path";
import { formatDateForFilename } from "./time";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(raw: string | undefined): LogLevel {
  const value = (raw || "").toLowerCase();
  return isLogLevel(value) ? value : "info";
}

class Logger {
  private logFilePath: string | null = null;
  private minLevel: LogLevel;

  constructor() {
    this.minLevel = parseLevel(process.env.LOG_LEVEL);

    if (process.env.LOG_TO_FILE !== "false") {
      // logs/ is created lazily on first run
      const logsDir = path.resolve(process.cwd(), process.env.LOG_DIR || "logs");
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      // log_YYYY-MM-DD_HH-mm-ss.log
      const timestamp = formatDateForFilename(new Date());
      this.logFilePath = path.join(logsDir, `log_${timestamp}.log`);
      this.write("debug", "SYSTEM", `Logger initialized. Log file: ${this.logFilePath}`);
    }
  }

  public setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  private formatMessage(label: string, message: string): string {
    const now = new Date().toISOString();
    return `[${now}] [${label}] ${message}`;
  }

  /**
   * Console always gets the filtered output; the file gets the same lines,
   * appended synchronously so nothing is lost on a crash.
   */
  private write(level: LogLevel, label: string, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const formatted = this.formatMessage(label, message);

    if (level === "error") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }

    if (!this.logFilePath) return;
    try {
      fs.appendFileSync(this.logFilePath, formatted + "\n");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  public info(message: string) {
    this.write("info", "INFO", message);
  }

  public warn(message: string) {
    this.write("warn", "WARN", message);
  }

  public error(message: string, error?: unknown) {
    let msg = message;
    if (error) {
      msg += ` | Error: ${error instanceof Error ? error.message : String(error)}`;
      if (error instanceof Error && error.stack) {
        msg += `\nStack: ${error.stack}`;
      }
    }
    this.write("error", "ERROR", msg);
  }

  public debug(message: string) {
    this.write("debug", "DEBUG", message);
  }
}

// Singleton
export const logger = new Logger();
