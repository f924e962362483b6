import { writeFile } from "node:fs/promises";
import * as XLSX from "xlsx";
import type { ComparisonTable } from "../types.js";
import { ATTRIBUTE_COLUMN } from "./comparisonTable.js";

export const JUSTIFICATION_COLUMN = "Justification";

const MAX_SHEET_NAME = 31;

export interface WorkbookBatch {
  name: string;
  table: ComparisonTable;
  justification: string | null;
}

/**
 * One sheet per batch: attributes down the first column, one column per
 * component, and the free-text justification in the first data row of a
 * trailing column.
 */
export function buildComparisonWorkbook(batches: WorkbookBatch[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const usedNames = new Set<string>();

  batches.forEach((batch, idx) => {
    const columns = batch.table.columns.length > 0 ? batch.table.columns : [ATTRIBUTE_COLUMN];
    const header = [...columns, JUSTIFICATION_COLUMN];

    const body = batch.table.rows.map((row, rowIdx) => [
      ...columns.map(col => row[col] ?? ""),
      rowIdx === 0 ? batch.justification ?? "" : ""
    ]);
    if (body.length === 0 && batch.justification) {
      body.push([...columns.map(() => ""), batch.justification]);
    }

    const worksheet = XLSX.utils.aoa_to_sheet([header, ...body]);
    worksheet["!cols"] = header.map(col =>
      col === JUSTIFICATION_COLUMN ? { wch: 80 } : { wch: Math.max(14, col.length + 2) }
    );

    const sheetName = uniqueSheetName(batch.name, idx, usedNames);
    XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
  });

  return workbook;
}

export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}

export async function writeComparisonWorkbook(
  batches: WorkbookBatch[],
  filename = defaultWorkbookFilename()
): Promise<string> {
  await writeFile(filename, workbookToBuffer(buildComparisonWorkbook(batches)));
  return filename;
}

export function defaultWorkbookFilename(now = new Date()): string {
  const timestamp = now.toISOString().replace("T", "_").slice(0, 16).replace(/:/g, "-");
  return `Component_Comparison_${timestamp}.xlsx`;
}

export function sanitizeSheetName(name: string): string {
  return name.replace(/[\[\]:*?/\\]/g, "_").trim().slice(0, MAX_SHEET_NAME);
}

function uniqueSheetName(name: string, idx: number, used: Set<string>): string {
  const base = sanitizeSheetName(name) || `Batch ${idx + 1}`;
  let candidate = base;
  let n = 2;
  while (used.has(candidate.toLowerCase())) {
    const suffix = ` (${n++})`;
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}
