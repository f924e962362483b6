import type { ComparisonRow, ComparisonTable, ComponentSpecRecord } from "../types.js";

export const ATTRIBUTE_COLUMN = "Attribute";
export const MISSING_VALUE = "-";

/**
 * Attributes become rows (first-seen order across all records) and each
 * record becomes a column named after its part number. Repeated part
 * numbers get a " (n)" suffix; every column name, including the
 * attribute column, is distinct.
 */
export function buildComparisonTable(records: ComponentSpecRecord[]): ComparisonTable {
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const attributes = [...new Set(records.flatMap(specs => Object.keys(specs)))];

  const usedNames = new Set<string>([ATTRIBUTE_COLUMN]);
  const columnNames = records.map((specs, idx) => {
    const name = uniqueColumnName(specs["Part Number"] ?? `Component ${idx + 1}`, usedNames);
    usedNames.add(name);
    return name;
  });

  const rows = attributes.map(attr => {
    const row: ComparisonRow = { [ATTRIBUTE_COLUMN]: attr };
    records.forEach((specs, idx) => {
      row[columnNames[idx]] = specs[attr] ?? MISSING_VALUE;
    });
    return row;
  });

  return { columns: [ATTRIBUTE_COLUMN, ...columnNames], rows };
}

function uniqueColumnName(base: string, used: Set<string>): string {
  if (!used.has(base)) return base;
  let n = 2;
  while (used.has(`${base} (${n})`)) n++;
  return `${base} (${n})`;
}
