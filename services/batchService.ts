// services/batchService.ts
import type {
  BatchRow,
  BatchRowResult,
  ComponentItem,
  ComponentSpecRecord,
  GenerationData
} from "../types.js";
import { buildComparisonTable } from "./comparisonTable.js";
import { ValidationError, errorMessage } from "./errors.js";
import type { WorkbookBatch } from "./excelService.js";
import type { GenerateFn } from "./generationClient.js";
import { buildComparisonPrompt } from "./promptBuilder.js";

export interface ManualComparison {
  label: string;
  items: ComponentItem[];
  data: GenerationData;
}

export async function compareManualEntry(
  partNumbers: string[],
  generate: GenerateFn
): Promise<ManualComparison> {
  const cleaned = partNumbers.map(p => p.trim()).filter(p => p !== "");
  if (cleaned.length < 2) {
    throw new ValidationError("Please provide at least two part numbers before requesting a comparison.");
  }

  const items: ComponentItem[] = cleaned.map(partNumber => ({ manufacturer: null, partNumber }));
  const data = await generate(buildComparisonPrompt(items, "Manual entry"));

  return { label: "Manual entry", items, data };
}

/**
 * Rows run one after another; a failed row keeps its error message and the
 * remaining rows still run.
 */
export async function processBatch(rows: BatchRow[], generate: GenerateFn): Promise<BatchRowResult[]> {
  const results: BatchRowResult[] = [];

  for (const row of rows) {
    console.log(`Processing row ${row.label} (${row.items.length} component(s))`);
    const prompt = buildComparisonPrompt(row.items, `CSV row ${row.label}`);

    try {
      const data = await generate(prompt);
      results.push({ label: row.label, items: row.items, data });
    } catch (err) {
      console.error(`ROW ${row.label} ERROR:`, errorMessage(err));
      results.push({ label: row.label, items: row.items, error: errorMessage(err) });
    }
  }

  return results;
}

/**
 * Turns processed rows into workbook sheets: the row's part numbers are
 * looked up in the catalog for the table, and the row's generated text
 * (or its failure) becomes the justification.
 */
export async function buildBatchWorkbookSheets(
  results: BatchRowResult[],
  fetchRecords: (partNumbers: string[]) => Promise<ComponentSpecRecord[]>
): Promise<WorkbookBatch[]> {
  const sheets: WorkbookBatch[] = [];

  for (const result of results) {
    const partNumbers = result.items.flatMap(item => (item.partNumber ? [item.partNumber] : []));
    const records = partNumbers.length > 0 ? await fetchRecords(partNumbers) : [];

    sheets.push({
      name: `Row ${result.label}`,
      table: buildComparisonTable(records),
      justification: "data" in result ? result.data.text : `Generation failed: ${result.error}`
    });
  }

  return sheets;
}
