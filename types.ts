// Attribute name -> value for one part, e.g. { "Part Number": "MLX90393", "Mfr": "Melexis" }.
export type ComponentSpecRecord = Record<string, string>;

export interface ComponentItem {
  manufacturer: string | null;
  partNumber: string | null;
}

export interface BatchRow {
  label: string;
  items: ComponentItem[];
  raw: Record<string, string>;
}

export interface GenerationData {
  text: string;
  usage: Record<string, unknown>;
}

export type BatchRowResult =
  | { label: string; items: ComponentItem[]; data: GenerationData }
  | { label: string; items: ComponentItem[]; error: string };

export type ComparisonRow = Record<string, string>;

export interface ComparisonTable {
  // First entry is always "Attribute" when the table is non-empty.
  columns: string[];
  rows: ComparisonRow[];
}

export interface ComparisonResult {
  partNumbers: string[];
  records: ComponentSpecRecord[];
  table: ComparisonTable;
  justification: string | null;
  justificationError?: string;
  usage?: Record<string, unknown>;
}
