import { spawnSync } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

const ROOT = path.resolve(__dirname, "../..");
const TSX_CLI = path.join(ROOT, "node_modules", "tsx", "dist", "cli.mjs");
const LOGGER = path.join(ROOT, "src", "utils", "logger");

/** Runs a script in `cwd` with the LOG_* variables coming only from its .env. */
function runScript(cwd: string, source: string) {
  const script = path.join(cwd, "entry.ts");
  fs.writeFileSync(script, source);
  const env = { ...process.env };
  delete env.LOG_LEVEL;
  delete env.LOG_TO_FILE;
  delete env.LOG_DIR;
  return spawnSync(process.execPath, [TSX_CLI, script], { cwd, env, encoding: "utf-8" });
}

describe("logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it(
    "takes level and file settings from the .env file",
    () => {
      fs.writeFileSync(path.join(dir, ".env"), "LOG_TO_FILE=false\nLOG_LEVEL=error\n");

      const result = runScript(
        dir,
        `import { logger } from ${JSON.stringify(LOGGER)};\n` +
          `logger.info("linea informativa");\n` +
          `logger.error("linea de error");\n`
      );

      expect(result.status).toBe(0);
      expect(result.stdout).not.toContain("linea informativa");
      expect(result.stderr).toContain("[ERROR] linea de error");
      expect(fs.existsSync(path.join(dir, "logs"))).toBe(false);
    },
    30_000
  );

  it(
    "writes the log file under the directory named in .env",
    () => {
      fs.writeFileSync(path.join(dir, ".env"), "LOG_TO_FILE=true\nLOG_DIR=bitacora\n");

      const result = runScript(
        dir,
        `import { logger } from ${JSON.stringify(LOGGER)};\nlogger.info("guardada");\n`
      );

      expect(result.status).toBe(0);
      const files = fs.readdirSync(path.join(dir, "bitacora"));
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^log_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);
      expect(fs.readFileSync(path.join(dir, "bitacora", files[0]), "utf-8")).toContain(
        "[INFO] guardada"
      );
    },
    30_000
  );
});
