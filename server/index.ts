import { createServer } from "http";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { ensureSearchIndexes, isDbReady } from "./db";
import { storage } from "./storage";
import { log } from "./log";

const config = loadConfig();

async function main(): Promise<void> {
  if (isDbReady()) {
    await ensureSearchIndexes();
  } else {
    console.log('[STARTUP] No database configured - serving listings from memory');
  }

  const app = createApp(storage, config);
  const httpServer = createServer(app);

  httpServer.listen({ port: config.port, host: config.host }, () => {
    log(`serving on port ${config.port}`);
  });
}

main().catch((error) => {
  console.error('[STARTUP] Failed to start server:', error);
  process.exit(1);
});
