/**
 * Protocol Type Definitions
 */

import { MessageType, OrderSide } from "./constants.js";

/**
 * A complete frame as it appears on the wire
 */
export type Frame = {
  length: number; // Declared total_len, counting the length field itself
  payload: Buffer; // Bytes after the length prefix (type + header + body)
  bytes: Buffer; // Complete frame including the prefix
};

export type LoginRequest = {
  type: MessageType.LOGIN_REQUEST;
  token: string;
};

export type LoginResponse = {
  type: MessageType.LOGIN_RESPONSE;
  success: boolean;
  message: string;
};

export type SubmitOrder = {
  type: MessageType.SUBMIT_ORDER;
  orderId: string;
  userId: string;
  symbol: string;
  side: OrderSide;
  orderType: number;
  quantity: number;
  price: number;
  timestampMs: number;
};

export type OrderResponse = {
  type: MessageType.ORDER_RESPONSE;
  orderId: string;
  accepted: boolean;
  message: string;
  rawPayload?: Buffer; // Body after the type byte, set on decode
};

export type Heartbeat = {
  type: MessageType.HEARTBEAT;
};

export type HeartbeatAck = {
  type: MessageType.HEARTBEAT_ACK;
};

export type Message =
  | LoginRequest
  | LoginResponse
  | SubmitOrder
  | OrderResponse
  | Heartbeat
  | HeartbeatAck;

