import fs from "fs";
import path from "path";
import type { z } from "zod";
import { formatZodIssues } from "../types/schemas";
import { InvalidInputError, MissingInputError } from "./errors";

export function ensureDir(dirPath: string) {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, JSON.stringify(value, null, 2), "utf-8");
}

/**
 * Reads a JSON file and validates it against `schema`. Throws with the file
 * name and the first schema issues when the content does not match.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const raw = await fs.promises.readFile(filePath, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${path.basename(filePath)} no es JSON válido: ${reason}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(
      `${path.basename(filePath)} no tiene el formato esperado: ${formatZodIssues(parsed.error)}`
    );
  }
  return parsed.data;
}

/**
 * Loads the file a previous stage wrote. A missing file raises
 * MissingInputError with `missingHint`; unreadable or mismatching content
 * raises InvalidInputError.
 */
export async function loadStageInput<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  missingHint: string
): Promise<T> {
  if (!fs.existsSync(filePath)) {
    throw new MissingInputError(`No existe el archivo ${filePath}`, missingHint);
  }
  try {
    return await readJsonFile(filePath, schema);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(reason, { cause: error });
  }
}

/**
 * Newest file in `dir` whose name starts with `prefix` and ends with
 * `extension`. Names carry a sortable timestamp, so the lexically last wins.
 */
export function findLatestFile(
  dir: string,
  prefix: string,
  extension: string
): string | null {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return null;
  const candidates = fs
    .readdirSync(dir)
    .filter(name => name.startsWith(prefix) && name.endsWith(extension))
    .sort();
  const latest = candidates[candidates.length - 1];
  return latest ? path.join(dir, latest) : null;
}

export function csvEscape(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsvLine(values: Array<string | number>): string {
  return values.map(csvEscape).join(",");
}
