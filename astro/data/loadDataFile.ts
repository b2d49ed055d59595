import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DATA_DIR = path.resolve(__dirname, "../../data");

/**
 * Read a reference table from data/ and validate it against its schema.
 */
export function loadDataFile<S extends z.ZodTypeAny>(
  fileName: string,
  schema: S
): z.output<S> {
  const filePath = path.isAbsolute(fileName) ? fileName : path.join(DATA_DIR, fileName);

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new Error(
      `Reference data file not found at ${filePath}. Tables ship in data/.`,
      { cause: e }
    );
  }

  return schema.parse(JSON.parse(raw));
}
