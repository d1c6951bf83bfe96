import { createServer } from "http";
import path from "path";
import { existsSync } from "fs";
import { ConfigError, getConfig, type AppConfig } from "./config";
import { createApp } from "./app";
import { closeDatabase } from "./db";
import { log } from "./log";

function loadConfig(): AppConfig {
  try {
    return getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfig();
const app = createApp({ rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE });
const httpServer = createServer(app);

const dbPath = path.resolve(config.MAVENDB_PATH);
if (!existsSync(dbPath)) {
  // Not fatal: the file is copied in out of band and requests answer 503 until it lands.
  log(`⚠ ${dbPath} not found; database routes will answer 503`, "db");
}

httpServer.listen({ port: config.PORT, host: config.HOST }, () => {
  log(`serving on ${config.HOST}:${config.PORT} (${config.NODE_ENV})`);
});

function shutdown(signal: string) {
  log(`${signal} received, shutting down`);
  httpServer.close((err) => {
    closeDatabase();
    if (err) {
      console.error("Error while closing HTTP server:", err);
      process.exit(1);
    }
    process.exit(0);
  });
  // Idle keep-alive sockets can hold close() open.
  setTimeout(() => process.exit(0), 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
