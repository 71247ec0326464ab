import { loadConfig } from "./config.js";
import { createInMemoryEngine } from "./core/impl/createEngine.js";
import { SAMPLE_MESSAGES_FILE, loadMessageFile } from "./ingest/messageFile.js";
import { startServer } from "./http/server.js";

const config = loadConfig();
const engine = createInMemoryEngine();

if (config.seed) await loadMessageFile(engine, SAMPLE_MESSAGES_FILE);
if (config.messageFile) {
  const { loaded, skipped } = await loadMessageFile(engine, config.messageFile);
  console.log(`loaded ${loaded} messages from ${config.messageFile} (${skipped} lines skipped)`);
}

const { server, port } = await startServer({ port: config.port, engine });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);
