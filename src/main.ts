import { loadConfig } from "./config";
import { Logger } from "./logging/logger";
import { startServer } from "./server";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger({
    traceId: `startup-${Date.now()}`,
    path: "/startup",
    service: config.serviceName,
  });

  const running = await startServer(config, logger);
  logger.info("Server listening", { address: running.address.address, port: running.address.port });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down", { signal });
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(
    JSON.stringify({
      level: "ERROR",
      message: "Failed to start server",
      error: error instanceof Error ? error.message : String(error),
    })
  );
  process.exit(1);
});
