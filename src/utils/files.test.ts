import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { InvalidInputError, MissingInputError } from "./errors";
import { csvEscape, findLatestFile, loadStageInput, toCsvLine, writeJson } from "./files";

describe("csvEscape", () => {
  it("quotes only values that need it", () => {
    expect(csvEscape("Blue")).toBe("Blue");
    expect(csvEscape(1450.5)).toBe("1450.5");
    expect(csvEscape('Dólar "tarjeta"')).toBe('"Dólar ""tarjeta"""');
    expect(toCsvLine(["a,b", "c\nd"])).toBe('"a,b","c\nd"');
  });
});

describe("file helpers", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "files-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("finds the lexically newest file with the prefix and extension", () => {
    for (const name of [
      "quotes_2026-10-18_09-00-00.json",
      "quotes_2026-10-19_09-00-00.json",
      "quotes_2026-10-19_09-00-00.csv",
      "quotes_history.csv",
    ]) {
      fs.writeFileSync(path.join(dir, name), "");
    }

    expect(findLatestFile(dir, "quotes_", ".json")).toBe(
      path.join(dir, "quotes_2026-10-19_09-00-00.json")
    );
    expect(findLatestFile(dir, "analysis_", ".json")).toBeNull();
  });

  it("returns null when the directory is missing or is a file", () => {
    const file = path.join(dir, "plain.txt");
    fs.writeFileSync(file, "");

    expect(findLatestFile(path.join(dir, "missing"), "quotes_", ".json")).toBeNull();
    expect(findLatestFile(file, "quotes_", ".json")).toBeNull();
  });

  it("loads and validates a stage file", async () => {
    const schema = z.object({ total: z.number() });
    const file = path.join(dir, "nested", "batch.json");
    await writeJson(file, { total: 3 });

    expect(await loadStageInput(file, schema, "opción 2")).toEqual({ total: 3 });

    fs.writeFileSync(file, "{ no es json");
    await expect(loadStageInput(file, schema, "opción 2")).rejects.toBeInstanceOf(
      InvalidInputError
    );
    await expect(
      loadStageInput(path.join(dir, "missing.json"), schema, "opción 2")
    ).rejects.toBeInstanceOf(MissingInputError);
  });
});
