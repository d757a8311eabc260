import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig, sessionTtlMs } from "./config";
import { createContext } from "./context";
import { openDatabase } from "./db";
import { logger } from "./logger";
import { seedDatabase } from "./seed";

const log = logger.child("express");

async function main(): Promise<void> {
  const config = loadConfig();

  const gateway = openDatabase(config.databasePath);
  gateway.migrate();

  const ctx = createContext(gateway, config.ai, { sessionTtlMs: sessionTtlMs(config) });
  if (config.seed.onStartup) {
    await seedDatabase(ctx, config.seed);
  }

  const app = createApp(ctx, config);
  const httpServer = createServer(app);

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log.info(`serving on port ${config.port}`, { database: config.databasePath, aiEnabled: config.ai.enabled });
  });

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      log.info(`Received ${signal}, starting graceful shutdown`);
      httpServer.close(() => {
        gateway.close();
        log.info("HTTP server closed and database released");
        process.exit(0);
      });
      setTimeout(() => {
        log.warn("Forced shutdown after timeout");
        process.exit(1);
      }, 15_000).unref();
    });
  }
}

main().catch((err: unknown) => {
  log.error("Start-up failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
