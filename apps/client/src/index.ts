#!/usr/bin/env node
/**
 * Order Client CLI Entry Point
 */

import { OrderCLI } from "./cli.js";
import { ExchangeClient } from "./client.js";

const host = process.argv[2] || "localhost";
const port = parseInt(process.argv[3] || "50052", 10);
const userId = process.env.ORDERWIRE_USER || "cli-user";

const client = new ExchangeClient({
  heartbeatIntervalMs: parseInt(process.env.HEARTBEAT_INTERVAL || "5000", 10),
  heartbeatTimeoutMs: parseInt(process.env.HEARTBEAT_TIMEOUT || "15000", 10),
});

const cli = new OrderCLI(userId, client);

cli.start(host, port).catch((err: Error) => {
  console.error("Failed to connect:", err.message);
  process.exit(1);
});
