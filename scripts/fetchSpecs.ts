/**
 * Fetch catalog specs for a comma-separated list of part numbers and save
 * them as one JSON file plus a comparison workbook.
 *
 * Run:
 *   npx tsx scripts/fetchSpecs.ts <output-name> "MLX90393, HMC5883L"
 */

import { fetchCatalogRecords, parsePartNumberList } from "../services/catalogService.js";
import { buildComparisonTable } from "../services/comparisonTable.js";
import { writeComparisonWorkbook } from "../services/excelService.js";
import { writeSpecsJson } from "../services/jsonExport.js";

async function main() {
  const [outputName, list] = process.argv.slice(2);
  if (!outputName || !list) {
    throw new Error('Usage: fetchSpecs <output-name> "<part>, <part>, ..."');
  }

  const partNumbers = parsePartNumberList(list);
  const records = await fetchCatalogRecords(partNumbers);
  const filename = await writeSpecsJson(records, outputName);

  const table = buildComparisonTable(records);
  const workbook = await writeComparisonWorkbook(
    [{ name: "Comparison", table, justification: null }],
    `${outputName}.xlsx`
  );

  console.table(table.rows);
  console.log(`Saved ${records.length} record(s) to ${filename} and ${workbook}`);
}

main().catch((err) => {
  console.error("FETCH SPECS FAILED");
  console.error(err);
  process.exit(1);
});
