import { Connection } from "../../../../packages/transport/src/connection/connection.js";
import { MessageType } from "../../../../packages/protocol/src/constants.js";
import type { SubmitOrder } from "../../../../packages/protocol/src/types.js";
import type { GatewayContext } from "./context.js";
import { metrics } from "../observability/metrics.js";

/**
 * Handle SUBMIT_ORDER
 *
 * Forwards the order to the sink and answers with ORDER_RESPONSE.
 * Responses go out in the order the orders arrived.
 */
export function handleSubmitOrder(
  connection: Connection,
  order: SubmitOrder,
  context: GatewayContext
): void {
  const result = context.sink.submit(order);
  metrics.order(result.accepted);

  connection.send({
    type: MessageType.ORDER_RESPONSE,
    orderId: order.orderId,
    accepted: result.accepted,
    message: result.accepted ? "Order accepted" : result.reason,
  });
}
