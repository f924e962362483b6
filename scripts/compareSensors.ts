/**
 * Sample generation-service round trip: asks for a comparison of two parts.
 *
 * Run:
 *   npx tsx scripts/compareSensors.ts [partA] [partB]
 */

import { sendLlmRequest } from "../services/generationClient.js";
import { buildComparisonPrompt } from "../services/promptBuilder.js";

async function main() {
  const [partA = "MLX90393", partB = "HMC5883L"] = process.argv.slice(2);

  const prompt = buildComparisonPrompt(
    [
      { manufacturer: null, partNumber: partA },
      { manufacturer: null, partNumber: partB }
    ],
    "Manual entry"
  );

  const data = await sendLlmRequest(prompt, {
    onReady: ready => {
      console.log(`Connected to ${ready.server ?? "generation service"} with caps ${JSON.stringify(ready.capabilities)}`);
    }
  });

  console.log("\n=== LLM RESPONSE ===\n");
  console.log(data.text);
  console.log("\nUsage:", data.usage);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
