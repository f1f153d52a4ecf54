import { createServer } from "node:http";
import { loadWordSet } from "../../shared/wordValidation.js";
import { createApp } from "./app.js";
import { loadServerConfig } from "./config.js";

const config = loadServerConfig();
const wordSet = loadWordSet(config.wordListPath);
console.log(`[dictionary] Loaded ${wordSet.size} words from ${config.wordListPath}`);

const app = createApp({ dictionary: wordSet, maxWordLength: config.maxWordLength });
const httpServer = createServer(app);

httpServer.listen(config.port, () => {
  console.log(`Server listening on port ${config.port}`);
});
