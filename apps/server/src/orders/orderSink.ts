import type { SubmitOrder } from "../../../../packages/protocol/src/types.js";

export type OrderResult =
  | { accepted: true }
  | { accepted: false; reason: string };

/**
 * Where decoded orders go. Matching happens in the engine behind it.
 *
 * submit() is synchronous: responses are paired with orders by position on
 * the connection, so they must be produced in submission order.
 */
export interface OrderSink {
  submit(order: SubmitOrder): OrderResult;
}

/**
 * Accepts orders for a fixed set of symbols and counts them per symbol.
 * Stands in for the engine so the gateway can run on its own.
 */
export class SymbolWhitelistSink implements OrderSink {
  private symbols: Set<string>;
  private accepted: Map<string, number> = new Map();

  constructor(symbols: readonly string[]) {
    this.symbols = new Set(symbols);
  }

  submit(order: SubmitOrder): OrderResult {
    if (!this.symbols.has(order.symbol)) {
      return { accepted: false, reason: `Unknown symbol: ${order.symbol}` };
    }

    this.accepted.set(order.symbol, (this.accepted.get(order.symbol) ?? 0) + 1);
    return { accepted: true };
  }

  /**
   * Accepted order count for a symbol
   */
  getAcceptedCount(symbol: string): number {
    return this.accepted.get(symbol) ?? 0;
  }

  getSymbols(): string[] {
    return Array.from(this.symbols);
  }
}
