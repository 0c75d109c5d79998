import { Connection } from "../../../../packages/transport/src/connection/connection.js";
import { MessageType } from "../../../../packages/protocol/src/constants.js";

/**
 * Handle HEARTBEAT
 */
export function handleHeartbeat(connection: Connection): void {
  connection.send({ type: MessageType.HEARTBEAT_ACK });
}
