import { loadConfig } from "../config.js";
import { GeminiTextGenerator } from "../services/geminiGenerator.js";
import { startGenerationServer } from "../services/generationServer.js";

async function main() {
  const { serviceServer, gemini } = loadConfig();
  if (!gemini.apiKey) {
    throw new Error("GEMINI_API_KEY not set in environment");
  }

  const server = await startGenerationServer({
    generator: new GeminiTextGenerator(gemini.apiKey, gemini.model),
    name: serviceServer.name,
    host: serviceServer.host,
    port: serviceServer.port
  });

  console.log(`Generation service listening on ${server.url}`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("GENERATION SERVICE FAILED");
  console.error(err);
  process.exit(1);
});
