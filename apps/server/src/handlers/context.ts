import type { TokenVerifier } from "../auth/tokenVerifier.js";
import type { OrderSink } from "../orders/orderSink.js";

/**
 * Shared collaborators handed to every handler
 */
export type GatewayContext = {
  verifier: TokenVerifier;
  sink: OrderSink;
  users: Map<string, string>; // connectionId → authenticated userId
};
