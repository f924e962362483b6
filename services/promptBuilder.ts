import type { ComponentItem, ComponentSpecRecord } from "../types.js";

const COMPARE_INSTRUCTIONS =
  "You are an electronics expert. Compare the following components for resolution, " +
  "interface, supply voltage, environmental considerations, and typical use cases. " +
  "Highlight notable trade-offs or suitability for lifecycle assessment.";

const SUMMARY_INSTRUCTIONS =
  "Provide a concise table summarizing the comparison followed by key bullet points.";

export function buildComparisonPrompt(items: ComponentItem[], sourceLabel: string): string {
  const lines = items.map((item, idx) => {
    const manufacturer = item.manufacturer || "Unknown manufacturer";
    const partNumber = item.partNumber || "Unknown part number";
    return `${idx + 1}. Manufacturer: ${manufacturer}; Part number: ${partNumber}`;
  });

  return (
    `${COMPARE_INSTRUCTIONS}\n\n` +
    `Source: ${sourceLabel}\n` +
    `Components:\n${lines.join("\n")}\n\n` +
    SUMMARY_INSTRUCTIONS
  );
}

// Same request, grounded on the catalog attributes instead of bare part numbers.
export function buildSpecPrompt(records: ComponentSpecRecord[]): string {
  const blocks = records.map((specs, idx) => {
    const attrs = Object.entries(specs)
      .map(([name, value]) => `   - ${name}: ${value}`)
      .join("\n");
    return `${idx + 1}. ${specs["Part Number"] ?? `Component ${idx + 1}`}\n${attrs}`;
  });

  return (
    `${COMPARE_INSTRUCTIONS}\n\n` +
    "Source: Catalog lookup\n" +
    `Components:\n${blocks.join("\n")}\n\n` +
    `${SUMMARY_INSTRUCTIONS} End with a short justification of which component suits which use.`
  );
}
