import { describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { buildComparisonTable } from "../services/comparisonTable.js";
import {
  buildComparisonWorkbook,
  defaultWorkbookFilename,
  sanitizeSheetName,
  workbookToBuffer
} from "../services/excelService.js";

const table = buildComparisonTable([
  { "Part Number": "MLX90393", "Mfr": "Melexis" },
  { "Part Number": "HMC5883L", "Interface": "I2C" }
]);

function sheetRows(workbook: XLSX.WorkBook, name: string): string[][] {
  return XLSX.utils.sheet_to_json<string[]>(workbook.Sheets[name], { header: 1, defval: "" });
}

describe("buildComparisonWorkbook", () => {
  it("lays out attributes as rows with a trailing justification column", () => {
    const workbook = buildComparisonWorkbook([
      { name: "Row 1", table, justification: "Prefer MLX90393." }
    ]);

    expect(workbook.SheetNames).toEqual(["Row 1"]);
    expect(sheetRows(workbook, "Row 1")).toEqual([
      ["Attribute", "MLX90393", "HMC5883L", "Justification"],
      ["Part Number", "MLX90393", "HMC5883L", "Prefer MLX90393."],
      ["Mfr", "Melexis", "-", ""],
      ["Interface", "-", "I2C", ""]
    ]);
  });

  it("gives every batch its own sheet with a valid unique name", () => {
    const workbook = buildComparisonWorkbook([
      { name: "Row 1", table, justification: null },
      { name: "row 1", table, justification: null },
      { name: "a/b:c", table, justification: null },
      { name: "   ", table, justification: null },
      { name: "x".repeat(40), table, justification: null },
      { name: "x".repeat(40), table, justification: null }
    ]);

    expect(workbook.SheetNames).toEqual([
      "Row 1",
      "row 1 (2)",
      "a_b_c",
      "Batch 4",
      "x".repeat(31),
      `${"x".repeat(27)} (2)`
    ]);
  });

  it("keeps the justification when the table is empty", () => {
    const workbook = buildComparisonWorkbook([
      { name: "Empty", table: { columns: [], rows: [] }, justification: "No catalog data." }
    ]);

    expect(sheetRows(workbook, "Empty")).toEqual([
      ["Attribute", "Justification"],
      ["", "No catalog data."]
    ]);
  });

  it("serialises to an xlsx (zip) buffer", () => {
    const buffer = workbookToBuffer(buildComparisonWorkbook([{ name: "Row 1", table, justification: null }]));
    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});

describe("sheet names and filenames", () => {
  it("replaces characters spreadsheets reject", () => {
    expect(sanitizeSheetName("[CSV] row 2?")).toBe("_CSV_ row 2_");
  });

  it("stamps the default filename with the date and time", () => {
    expect(defaultWorkbookFilename(new Date("2026-03-04T05:06:07Z"))).toBe(
      "Component_Comparison_2026-03-04_05-06.xlsx"
    );
  });
});
