import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const { port, generation } = loadConfig();
const app = createApp();

app.listen(port, () => {
  console.log(`Backend running on port ${port}`);
  console.log(`Generation service: ${generation.url}`);
});
