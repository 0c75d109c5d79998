#!/usr/bin/env tsx
/**
 * Load Testing Script
 *
 * Opens many concurrent client sessions, logs each one in and streams
 * orders at a steady rate. Reports accepted/rejected counts and latency.
 */

import { ExchangeClient } from "../apps/client/src/client.js";
import { OrderSide, OrderType } from "../packages/protocol/src/constants.js";

const CONFIG = {
  host: process.env.HOST || "127.0.0.1",
  port: parseInt(process.env.PORT || "50052", 10),
  token: process.env.TOKEN || "load-token",
  clientCount: parseInt(process.env.CLIENTS || "50", 10),
  ordersPerClient: parseInt(process.env.ORDERS || "100", 10),
  orderIntervalMs: 20,
};

const SYMBOLS = ["AAPL", "GOOGL", "MSFT", "TSLA"];

interface LoadClient {
  id: number;
  client: ExchangeClient;
}

class LoadTest {
  private clients: LoadClient[] = [];
  private startTime: number = 0;
  private latencies: number[] = [];
  private stats = {
    sessions: 0,
    ordersSent: 0,
    accepted: 0,
    rejected: 0,
    errors: 0,
  };

  /**
   * Run the load test
   */
  async run(): Promise<void> {
    console.log("Load Test Starting...");
    console.log(`Clients: ${CONFIG.clientCount}`);
    console.log(`Orders per client: ${CONFIG.ordersPerClient}`);
    console.log();

    this.startTime = Date.now();

    const sessions = [];
    for (let i = 0; i < CONFIG.clientCount; i++) {
      sessions.push(this.runClient(i));
    }

    await Promise.all(sessions);

    for (const { client } of this.clients) {
      client.disconnect();
    }

    this.printStats();
  }

  /**
   * Connect, log in and stream orders for one client
   */
  private async runClient(id: number): Promise<void> {
    const client = new ExchangeClient();
    client.on("error", () => {
      this.stats.errors++;
    });
    this.clients.push({ id, client });

    try {
      await client.connect(CONFIG.host, CONFIG.port);
      await client.login(CONFIG.token);
      this.stats.sessions++;
    } catch (err) {
      this.stats.errors++;
      console.error(
        `Client ${id} failed to start:`,
        err instanceof Error ? err.message : String(err)
      );
      return;
    }

    const inflight: Promise<void>[] = [];
    for (let n = 0; n < CONFIG.ordersPerClient; n++) {
      inflight.push(this.sendOrder(client, id, n));
      await this.sleep(CONFIG.orderIntervalMs);
    }
    await Promise.all(inflight);
  }

  /**
   * Submit one order and record its round trip
   */
  private async sendOrder(
    client: ExchangeClient,
    id: number,
    n: number
  ): Promise<void> {
    const sentAt = performance.now();
    this.stats.ordersSent++;

    try {
      const response = await client.submitOrder({
        orderId: `load-${id}-${n}`,
        userId: `load-user-${id}`,
        symbol: SYMBOLS[n % SYMBOLS.length] ?? "AAPL",
        side: n % 2 === 0 ? OrderSide.BUY : OrderSide.SELL,
        orderType: OrderType.LIMIT,
        quantity: 100,
        price: 150 + (n % 10) / 4,
      });
      this.latencies.push(performance.now() - sentAt);
      if (response.accepted) {
        this.stats.accepted++;
      } else {
        this.stats.rejected++;
      }
    } catch {
      this.stats.errors++;
    }
  }

  /**
   * Sleep helper
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Latency percentile in ms
   */
  private percentile(p: number): string {
    if (this.latencies.length === 0) return "n/a";
    const sorted = [...this.latencies].sort((a, b) => a - b);
    const index = Math.min(sorted.length - 1, Math.floor(sorted.length * p));
    return `${(sorted[index] ?? 0).toFixed(2)}ms`;
  }

  /**
   * Print test statistics
   */
  private printStats(): void {
    const duration = (Date.now() - this.startTime) / 1000;

    console.log("\nLoad Test Results:");
    console.log(`  Duration:        ${duration.toFixed(2)}s`);
    console.log(`  Sessions:        ${this.stats.sessions}/${CONFIG.clientCount}`);
    console.log(`  Orders Sent:     ${this.stats.ordersSent}`);
    console.log(`  Accepted:        ${this.stats.accepted}`);
    console.log(`  Rejected:        ${this.stats.rejected}`);
    console.log(`  Errors:          ${this.stats.errors}`);
    console.log(`  Orders/sec:      ${(this.stats.ordersSent / duration).toFixed(2)}`);
    console.log(`  Latency p50:     ${this.percentile(0.5)}`);
    console.log(`  Latency p99:     ${this.percentile(0.99)}`);
    console.log();

    if (this.stats.errors > 0) {
      process.exitCode = 1;
    }
  }
}

const test = new LoadTest();
test.run().catch((err) => {
  console.error("Load test failed:", err);
  process.exit(1);
});
