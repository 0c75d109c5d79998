/**
 * Gateway configuration
 */

export const DEFAULT_SYMBOLS = [
  "AAPL",
  "GOOGL",
  "MSFT",
  "TSLA",
  "AMZN",
  "META",
  "NVDA",
  "NFLX",
];

/**
 * Parse "token:userId,token2:userId2" into a lookup table
 */
export function parseTokens(raw: string | undefined): Map<string, string> {
  const tokens = new Map<string, string>();
  if (!raw) return tokens;

  for (const entry of raw.split(",")) {
    const separator = entry.lastIndexOf(":");
    if (separator <= 0) continue;

    const token = entry.slice(0, separator).trim();
    const userId = entry.slice(separator + 1).trim();
    if (token && userId) {
      tokens.set(token, userId);
    }
  }

  return tokens;
}

export function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export const config = {
  port: parseInt(process.env.PORT || "50052", 10),
  host: process.env.HOST || "0.0.0.0",
  debug: process.env.ORDERWIRE_DEBUG === "1",
  heartbeatInterval: parseInt(process.env.HEARTBEAT_INTERVAL || "5000", 10),
  idleTimeout: parseInt(process.env.IDLE_TIMEOUT || "30000", 10),
  maxFrameSize: parseInt(process.env.MAX_FRAME_SIZE || "8192", 10),
  tokens: parseTokens(process.env.AUTH_TOKENS),
  symbols: parseList(process.env.SYMBOLS, DEFAULT_SYMBOLS),
};

export type GatewayConfig = typeof config;
