// services/csvService.ts
import * as XLSX from "xlsx";
import type { BatchRow, ComponentItem } from "../types.js";
import { ValidationError } from "./errors.js";

const MAX_COMPONENTS_PER_ROW = 5;

/**
 * Reads an uploaded CSV (header row required). Each data row becomes a
 * batch of up to five components taken from Manf1..Manf5 style columns;
 * rows naming no component are skipped.
 */
export function parseCsv(content: Buffer | string): BatchRow[] {
  const text = (typeof content === "string" ? content : content.toString("utf8")).replace(/^\uFEFF/, "");

  const headerLine = text.split(/\r?\n/, 1)[0] ?? "";
  if (headerLine.trim() === "") {
    throw new ValidationError("CSV must include a header row with column names.");
  }

  const workbook = XLSX.read(text, { type: "string", raw: true });
  const firstSheetName = workbook.SheetNames[0];
  const worksheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!worksheet) {
    throw new ValidationError("CSV must include a header row with column names.");
  }

  const jsonData = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, {
    defval: "",
    raw: false
  });

  const rows: BatchRow[] = [];
  jsonData.forEach((record, idx) => {
    const rowNumber = idx + 1;
    const raw = Object.fromEntries(
      Object.entries(record).map(([key, value]) => [key, String(value ?? "")])
    );

    const items = extractRowItems(raw);
    if (items.length === 0) return;

    const label = (raw["SNO"] || raw["sno"] || "").trim() || String(rowNumber);
    rows.push({ label, items, raw });
  });

  return rows;
}

export function extractRowItems(row: Record<string, string | null | undefined>): ComponentItem[] {
  const normalized = new Map<string, string | null>();
  for (const [key, value] of Object.entries(row)) {
    normalized.set((key || "").trim().toLowerCase(), (value || "").trim() || null);
  }

  const items: ComponentItem[] = [];

  for (let idx = 1; idx <= MAX_COMPONENTS_PER_ROW; idx++) {
    const baseKey = `manf${idx}`;
    const manufacturer = normalized.get(baseKey) ?? null;

    const partNumber =
      normalized.get(`${baseKey}_partnumber`) ||
      normalized.get(`${baseKey}_pn`) ||
      firstPartColumn(normalized, baseKey);

    if (manufacturer || partNumber) {
      items.push({ manufacturer, partNumber: partNumber || null });
    }
  }

  return items;
}

function firstPartColumn(normalized: Map<string, string | null>, baseKey: string): string | null {
  for (const [candidate, value] of normalized) {
    if (candidate.startsWith(baseKey) && candidate.includes("part") && value) {
      return value;
    }
  }
  return null;
}
