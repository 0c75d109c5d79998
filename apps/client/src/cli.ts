import { ExchangeClient, type OrderRequest } from "./client.js";
import { OrderSide, OrderType } from "../../../packages/protocol/src/constants.js";
import type { OrderResponse } from "../../../packages/protocol/src/types.js";
import type { ProtocolError } from "../../../packages/protocol/src/errors.js";
import type { ConnectionError } from "../../../packages/transport/src/connection/connection.js";
import * as readline from "readline";

const ORDER_TYPES: Record<string, OrderType> = {
  market: OrderType.MARKET,
  limit: OrderType.LIMIT,
  ioc: OrderType.IOC,
  fok: OrderType.FOK,
};

export type ParsedCommand =
  | { kind: "login"; token: string }
  | { kind: "order"; order: Omit<OrderRequest, "orderId" | "userId"> }
  | { kind: "heartbeat" }
  | { kind: "status" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "invalid"; reason: string };

/**
 * Parse one line of CLI input
 */
export function parseCommand(input: string): ParsedCommand {
  const parts = input.trim().split(/\s+/);
  const command = (parts[0] ?? "").toLowerCase();
  const args = parts.slice(1);

  switch (command) {
    case "login": {
      const token = args[0];
      if (token === undefined) {
        return { kind: "invalid", reason: "Usage: login <token>" };
      }
      return { kind: "login", token };
    }

    case "buy":
    case "sell": {
      const [symbol, qty, px, typeName = "limit"] = args;
      if (symbol === undefined || qty === undefined || px === undefined) {
        return {
          kind: "invalid",
          reason: `Usage: ${command} <symbol> <quantity> <price> [limit|market|ioc|fok]`,
        };
      }

      const quantity = Number(qty);
      const price = Number(px);
      const orderType = ORDER_TYPES[typeName.toLowerCase()];

      if (!Number.isSafeInteger(quantity) || quantity <= 0) {
        return { kind: "invalid", reason: `Invalid quantity: ${qty}` };
      }
      if (!Number.isFinite(price) || price < 0) {
        return { kind: "invalid", reason: `Invalid price: ${px}` };
      }
      if (orderType === undefined) {
        return { kind: "invalid", reason: `Unknown order type: ${typeName}` };
      }

      return {
        kind: "order",
        order: {
          symbol: symbol.toUpperCase(),
          side: command === "buy" ? OrderSide.BUY : OrderSide.SELL,
          orderType,
          quantity,
          price,
        },
      };
    }

    case "heartbeat":
      return { kind: "heartbeat" };

    case "status":
      return { kind: "status" };

    case "help":
      return { kind: "help" };

    case "quit":
    case "exit":
      return { kind: "quit" };

    default:
      return {
        kind: "invalid",
        reason: `Unknown command: ${command}. Type 'help' for available commands.`,
      };
  }
}

/**
 * CLI for the order client
 */
export class OrderCLI {
  private client: ExchangeClient;
  private rl: readline.Interface;
  private userId: string;
  private orderSeq: number = 1;

  constructor(userId: string, client: ExchangeClient) {
    this.userId = userId;
    this.client = client;
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: "orderwire> ",
    });

    this.wireClient();
    this.wireReadline();
  }

  /**
   * Wire client events
   */
  private wireClient(): void {
    this.client.on("connected", () => {
      console.log("Connected to order gateway");
    });

    this.client.on("disconnected", (reason?: ProtocolError) => {
      console.log(
        reason ? `Disconnected: ${reason.message}` : "Disconnected from gateway"
      );
      this.rl.close();
    });

    this.client.on("heartbeat", () => {
      console.log("Heartbeat acknowledged");
      this.rl.prompt();
    });

    this.client.on("mismatch", (expected: string, response: OrderResponse) => {
      console.log(
        `Warning: response for ${response.orderId} arrived while ${expected} was pending`
      );
    });

    this.client.on("error", (error: ConnectionError) => {
      console.error(`Error [${error.code}]: ${error.reason}`);
    });
  }

  /**
   * Wire readline
   */
  private wireReadline(): void {
    this.rl.on("line", (input: string) => {
      const trimmed = input.trim();
      if (trimmed) {
        this.handleCommand(trimmed);
      }
      this.rl.prompt();
    });

    this.rl.on("close", () => {
      console.log("\nGoodbye!");
      this.client.disconnect();
      process.exit(0);
    });
  }

  /**
   * Handle CLI command
   */
  private handleCommand(input: string): void {
    const command = parseCommand(input);

    try {
      switch (command.kind) {
        case "login":
          this.client.login(command.token).then(
            (response) => {
              console.log(`Logged in: ${response.message}`);
              this.rl.prompt();
            },
            (err: Error) => {
              console.log(`Login failed: ${err.message}`);
            }
          );
          break;

        case "order": {
          const orderId = `${this.userId}-${this.orderSeq++}`;
          this.client
            .submitOrder({ ...command.order, orderId, userId: this.userId })
            .then(
              (response) => {
                console.log(
                  `${response.accepted ? "Accepted" : "Rejected"} ${response.orderId}: ${response.message}`
                );
                this.rl.prompt();
              },
              (err: Error) => {
                console.log(`Order ${orderId} failed: ${err.message}`);
                this.rl.prompt();
              }
            );
          break;
        }

        case "heartbeat":
          this.client.heartbeat();
          console.log("Heartbeat sent");
          break;

        case "status":
          console.log(
            `Session: ${this.client.getSessionState()}, pending orders: ${this.client.getPendingOrderCount()}`
          );
          break;

        case "quit":
          this.rl.close();
          break;

        case "help":
          this.showHelp();
          break;

        case "invalid":
          console.log(command.reason);
          break;
      }
    } catch (err) {
      console.error(
        "Command failed:",
        err instanceof Error ? err.message : String(err)
      );
    }
  }

  /**
   * Show help
   */
  private showHelp(): void {
    console.log(`
Available commands:
  login <token>                           - Authenticate the session
  buy <symbol> <qty> <price> [type]       - Submit a buy order (type: limit|market|ioc|fok)
  sell <symbol> <qty> <price> [type]      - Submit a sell order
  heartbeat                               - Send heartbeat to gateway
  status                                  - Show session state
  help                                    - Show this help
  quit / exit                             - Disconnect and exit
`);
  }

  /**
   * Connect and start
   */
  async start(host: string, port: number): Promise<void> {
    console.log(`Connecting to ${host}:${port}...`);
    await this.client.connect(host, port);
    this.showHelp();
    this.rl.prompt();
  }
}
