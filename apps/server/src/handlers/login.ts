import { Connection } from "../../../../packages/transport/src/connection/connection.js";
import { MessageType } from "../../../../packages/protocol/src/constants.js";
import type { LoginRequest } from "../../../../packages/protocol/src/types.js";
import type { GatewayContext } from "./context.js";
import { logger } from "../observability/logger.js";
import { metrics } from "../observability/metrics.js";

/**
 * Handle LOGIN_REQUEST
 *
 * Client presents a token. Server answers with LOGIN_RESPONSE; a rejected
 * login closes the session once the response is written.
 */
export function handleLogin(
  connection: Connection,
  message: LoginRequest,
  context: GatewayContext
): void {
  const result = context.verifier.verify(message.token);
  metrics.login(result.ok);

  if (!result.ok) {
    logger.warn(`[${connection.connectionId}] Login rejected: ${result.reason}`);
    connection.send({
      type: MessageType.LOGIN_RESPONSE,
      success: false,
      message: result.reason,
    });
    return;
  }

  context.users.set(connection.connectionId, result.userId);
  connection.send({
    type: MessageType.LOGIN_RESPONSE,
    success: true,
    message: "Authentication successful",
  });

  logger.connection(connection.connectionId, `Authenticated as ${result.userId}`);
}
