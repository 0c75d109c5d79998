#!/usr/bin/env node
/**
 * Order Gateway Entry Point
 */

import { GatewayServer } from "./server.js";
import { logger } from "./observability/logger.js";

const server = new GatewayServer();

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await server.stop();
    process.exit(0);
  } catch (err) {
    logger.error("Shutdown failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

// Graceful shutdown
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

// Start server
server.start().catch((err) => {
  logger.error("Failed to start server", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
