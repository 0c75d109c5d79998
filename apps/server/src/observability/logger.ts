/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";
import type { Message } from "../../../../packages/protocol/src/types.js";
import { MessageType } from "../../../../packages/protocol/src/constants.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  /**
   * Format timestamp
   */
  private timestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Format log message
   */
  format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when ORDERWIRE_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  /**
   * Info logs
   */
  info(message: string, meta?: unknown): void {
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  /**
   * Warning logs
   */
  warn(message: string, meta?: unknown): void {
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  /**
   * Error logs
   */
  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log connection event
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log message details (debug only). Tokens are never printed.
   */
  message(connectionId: string, direction: "→" | "←", message: Message): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] ${direction} ${MessageType[message.type]}`, summarize(message));
  }

  /**
   * Log session state transition (debug only)
   */
  stateTransition(
    connectionId: string,
    from: string,
    to: string,
    reason?: string
  ): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${connectionId}] Session: ${from} → ${to}`,
      reason ? { reason } : undefined
    );
  }

  /**
   * Log backpressure event (debug only)
   */
  backpressure(connectionId: string, event: "detected" | "relieved"): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] Backpressure ${event}`);
  }
}

function summarize(message: Message): Record<string, unknown> | undefined {
  switch (message.type) {
    case MessageType.LOGIN_REQUEST:
      return { tokenLength: message.token.length };
    case MessageType.LOGIN_RESPONSE:
      return { success: message.success, message: message.message };
    case MessageType.SUBMIT_ORDER:
      return {
        orderId: message.orderId,
        userId: message.userId,
        symbol: message.symbol,
        side: message.side,
        orderType: message.orderType,
        quantity: message.quantity,
        price: message.price,
      };
    case MessageType.ORDER_RESPONSE:
      return {
        orderId: message.orderId,
        accepted: message.accepted,
        message: message.message,
      };
    case MessageType.HEARTBEAT:
    case MessageType.HEARTBEAT_ACK:
      return undefined;
  }
}

export const logger = new Logger();
