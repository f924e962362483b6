import type { ComparisonResult, ComponentSpecRecord } from "../types.js";
import { fetchCatalogRecords } from "./catalogService.js";
import { buildComparisonTable } from "./comparisonTable.js";
import { ValidationError, errorMessage } from "./errors.js";
import { sendLlmRequest, type GenerateFn } from "./generationClient.js";
import { buildSpecPrompt } from "./promptBuilder.js";

export interface ComparisonRequest {
  partNumbers: string[];
  justify?: boolean;
}

export interface PipelineDeps {
  fetchRecords?: (partNumbers: string[]) => Promise<ComponentSpecRecord[]>;
  generate?: GenerateFn;
}

export async function runComparisonPipeline(
  request: ComparisonRequest,
  deps: PipelineDeps = {}
): Promise<ComparisonResult> {
  const fetchRecords = deps.fetchRecords ?? (pns => fetchCatalogRecords(pns));
  const generate = deps.generate ?? (prompt => sendLlmRequest(prompt));

  const partNumbers = request.partNumbers.map(p => p.trim()).filter(p => p !== "");
  if (partNumbers.length === 0) {
    throw new ValidationError("Expected at least one part number");
  }

  // 1. CATALOG
  const records = await fetchRecords(partNumbers);

  // 2. TABLE
  const table = buildComparisonTable(records);

  const result: ComparisonResult = {
    partNumbers,
    records,
    table,
    justification: null
  };

  if (!request.justify || records.length === 0) {
    return result;
  }

  // 3. JUSTIFICATION (optional, never fails the comparison)
  try {
    const data = await generate(buildSpecPrompt(records));
    result.justification = data.text;
    result.usage = data.usage;
  } catch (err) {
    console.error("JUSTIFICATION ERROR:", errorMessage(err));
    result.justificationError = errorMessage(err);
  }

  return result;
}
