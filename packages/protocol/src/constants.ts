/**
 * Protocol Constants
 *
 * Defines message types, order enums, and protocol parameters.
 */

// Frame structure sizes
export const LENGTH_FIELD_SIZE = 4;
export const TYPE_FIELD_SIZE = 1;
export const PREFIX_SIZE = LENGTH_FIELD_SIZE + TYPE_FIELD_SIZE; // length(4) + type(1)
export const MAX_FRAME_SIZE = 8 * 1024; // matches the engine's read limit

// Message Types (1 byte)
export enum MessageType {
  LOGIN_REQUEST = 0x01,
  LOGIN_RESPONSE = 0x02,
  SUBMIT_ORDER = 0x03,
  ORDER_RESPONSE = 0x04,
  HEARTBEAT = 0x05,
  HEARTBEAT_ACK = 0x06,
}

export enum OrderSide {
  BUY = 0,
  SELL = 1,
}

// Order types understood by the engine; the wire carries any u8
export enum OrderType {
  MARKET = 0,
  LIMIT = 1,
  IOC = 2,
  FOK = 3,
}

export const MAX_U8 = 0xff;
export const MAX_U32 = 0xffffffff;
