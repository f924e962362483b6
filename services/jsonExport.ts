import { writeFile } from "node:fs/promises";
import type { ComponentSpecRecord } from "../types.js";

/** Writes `<outputFilename>.json` (4-space indent) and returns that filename. */
export async function writeSpecsJson(
  records: ComponentSpecRecord[],
  outputFilename: string
): Promise<string> {
  const filename = `${outputFilename}.json`;
  await writeFile(filename, JSON.stringify(records, null, 4));
  return filename;
}
