/**
 * Message Encoding and Decoding
 *
 * Schema-driven codec over the registry in schema.ts. Decoding dispatches on
 * the type byte that follows the length prefix, reads the fixed fields of
 * that type, then the variable fields, and requires the frame to end exactly
 * where the last field ends.
 */

import { MAX_U32, MAX_U8, MessageType, OrderSide } from "./constants.js";
import type { Frame, Message, SubmitOrder } from "./types.js";
import { ByteCursor } from "./cursor.js";
import { encodeFrame } from "./frame.js";
import {
  FIELD_WIDTH,
  defaultRegistry,
  fixedSize,
  type FixedField,
  type MessageRegistry,
  type MessageSchema,
} from "./schema.js";
import {
  InvalidFieldError,
  TrailingBytesError,
  TruncatedMessageError,
  UnknownMessageTypeError,
  type ErrorContext,
} from "./errors.js";

/**
 * Raw field values of one message, keyed by schema field name
 */
export type WireFields = {
  fixed: Record<string, number>;
  variable: Record<string, Buffer>;
};

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode a complete frame into a typed message
 *
 * @throws TruncatedMessageError, TrailingBytesError, UnknownMessageTypeError,
 * InvalidFieldError. All of them are fatal for the connection.
 */
export function decodeMessage(
  frame: Frame,
  registry: MessageRegistry = defaultRegistry
): Message {
  const cursor = new ByteCursor(frame.payload);

  if (cursor.available === 0) {
    throw new TruncatedMessageError("Frame carries no message type", {
      frameLength: frame.length,
    });
  }

  const type = cursor.readUInt8();
  const schema = registry.get(type);

  if (!schema) {
    throw new UnknownMessageTypeError(type, frame.length);
  }

  const context: ErrorContext = { messageType: type, frameLength: frame.length };
  const headerSize = registry.headerSize(type);
  if (frame.length < headerSize) {
    throw new TruncatedMessageError(
      `${schema.name}: frame of ${frame.length} bytes is shorter than its ${headerSize}-byte header`,
      context
    );
  }

  const fields = readFields(schema, cursor, context);

  return buildMessage(schema, fields, frame.payload.subarray(1), context);
}

/**
 * Read the fixed and variable fields of `schema` from the cursor,
 * which must be positioned right after the type byte.
 */
export function readFields(
  schema: MessageSchema,
  cursor: ByteCursor,
  context: ErrorContext = {}
): WireFields {
  const fixed: Record<string, number> = {};

  for (const field of schema.fixed) {
    if (cursor.available < FIELD_WIDTH[field.kind]) {
      throw new TruncatedMessageError(
        `${schema.name}: frame ends inside fixed field '${field.name}'`,
        context
      );
    }
    fixed[field.name] = readFixed(cursor, field, context);
  }

  let declared = 0;
  for (const field of schema.variable) {
    declared += lookup(fixed, field.lengthField);
  }

  if (cursor.available < declared) {
    throw new TruncatedMessageError(
      `${schema.name}: fields declare ${declared} variable bytes, frame holds ${cursor.available}`,
      context
    );
  }

  if (cursor.available > declared) {
    throw new TrailingBytesError(cursor.available - declared, context);
  }

  const variable: Record<string, Buffer> = {};
  for (const field of schema.variable) {
    variable[field.name] = cursor.take(lookup(fixed, field.lengthField));
  }

  return { fixed, variable };
}

function readFixed(
  cursor: ByteCursor,
  field: FixedField,
  context: ErrorContext
): number {
  switch (field.kind) {
    case "u8":
      return cursor.readUInt8();
    case "u32":
      return cursor.readUInt32BE();
    case "u64": {
      const value = cursor.readUInt64BE();
      if (value === null) {
        throw new InvalidFieldError(
          field.name,
          "exceeds the largest exactly representable integer",
          true,
          context
        );
      }
      return value;
    }
    case "f64":
      return cursor.readDoubleBE();
  }
}

function buildMessage(
  schema: MessageSchema,
  { fixed, variable }: WireFields,
  body: Buffer,
  context: ErrorContext
): Message {
  switch (schema.type) {
    case MessageType.LOGIN_REQUEST:
      return {
        type: MessageType.LOGIN_REQUEST,
        token: text(variable, "token", context),
      };

    case MessageType.LOGIN_RESPONSE:
      return {
        type: MessageType.LOGIN_RESPONSE,
        success: flag(fixed, "success", context),
        message: text(variable, "message", context),
      };

    case MessageType.SUBMIT_ORDER: {
      const order: SubmitOrder = {
        type: MessageType.SUBMIT_ORDER,
        orderId: text(variable, "order_id", context),
        userId: text(variable, "user_id", context),
        symbol: text(variable, "symbol", context),
        side: side(lookup(fixed, "side"), true, context),
        orderType: lookup(fixed, "order_type"),
        quantity: lookup(fixed, "quantity"),
        price: lookup(fixed, "price"),
        timestampMs: lookup(fixed, "timestamp_ms"),
      };
      validateOrder(order, true, context);
      return order;
    }

    case MessageType.ORDER_RESPONSE:
      return {
        type: MessageType.ORDER_RESPONSE,
        orderId: text(variable, "order_id", context),
        accepted: flag(fixed, "accepted", context),
        message: text(variable, "message", context),
        rawPayload: body,
      };

    case MessageType.HEARTBEAT:
      return { type: MessageType.HEARTBEAT };

    case MessageType.HEARTBEAT_ACK:
      return { type: MessageType.HEARTBEAT_ACK };
  }
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/**
 * Encode a typed message into a complete, length-prefixed frame
 *
 * @throws InvalidFieldError (non-fatal) when a field is out of range
 */
export function encodeMessage(
  message: Message,
  registry: MessageRegistry = defaultRegistry
): Buffer {
  const schema = registry.get(message.type);

  if (!schema) {
    throw new UnknownMessageTypeError(message.type);
  }

  return encodeFrame(writeFields(schema, toWireFields(message)));
}

/**
 * Serialize type byte, fixed fields and variable fields of `schema`.
 * Length fields are filled in from the variable values they describe.
 */
export function writeFields(schema: MessageSchema, fields: WireFields): Buffer {
  const lengthOf = new Map<string, number>();
  for (const field of schema.variable) {
    const bytes = fields.variable[field.name];
    if (bytes === undefined) {
      throw new InvalidFieldError(field.name, "missing", false, {
        messageType: schema.type,
      });
    }
    lengthOf.set(field.lengthField, bytes.length);
  }

  const variableSize = Array.from(lengthOf.values()).reduce((a, b) => a + b, 0);
  const body = Buffer.alloc(1 + fixedSize(schema) + variableSize);

  let offset = body.writeUInt8(schema.type, 0);

  for (const field of schema.fixed) {
    const value = lengthOf.get(field.name) ?? fields.fixed[field.name];
    if (value === undefined) {
      throw new InvalidFieldError(field.name, "missing", false, {
        messageType: schema.type,
      });
    }
    offset = writeFixed(body, offset, field, value, schema.type);
  }

  for (const field of schema.variable) {
    const bytes = fields.variable[field.name];
    if (bytes !== undefined) {
      offset += bytes.copy(body, offset);
    }
  }

  return body;
}

function writeFixed(
  body: Buffer,
  offset: number,
  field: FixedField,
  value: number,
  messageType: MessageType
): number {
  const context: ErrorContext = { messageType };

  switch (field.kind) {
    case "u8":
      assertInteger(field.name, value, MAX_U8, context);
      return body.writeUInt8(value, offset);
    case "u32":
      assertInteger(field.name, value, MAX_U32, context);
      return body.writeUInt32BE(value, offset);
    case "u64":
      assertInteger(field.name, value, Number.MAX_SAFE_INTEGER, context);
      return body.writeBigUInt64BE(BigInt(value), offset);
    case "f64":
      return body.writeDoubleBE(value, offset);
  }
}

function toWireFields(message: Message): WireFields {
  switch (message.type) {
    case MessageType.LOGIN_REQUEST:
      return {
        fixed: {},
        variable: { token: Buffer.from(message.token, "utf8") },
      };

    case MessageType.LOGIN_RESPONSE:
      return {
        fixed: { success: message.success ? 1 : 0 },
        variable: { message: Buffer.from(message.message, "utf8") },
      };

    case MessageType.SUBMIT_ORDER:
      validateOrder(message, false, { messageType: message.type });
      return {
        fixed: {
          side: message.side,
          order_type: message.orderType,
          quantity: message.quantity,
          price: message.price,
          timestamp_ms: message.timestampMs,
        },
        variable: {
          order_id: Buffer.from(message.orderId, "utf8"),
          user_id: Buffer.from(message.userId, "utf8"),
          symbol: Buffer.from(message.symbol, "utf8"),
        },
      };

    case MessageType.ORDER_RESPONSE:
      return {
        fixed: { accepted: message.accepted ? 1 : 0 },
        variable: {
          order_id: Buffer.from(message.orderId, "utf8"),
          message: Buffer.from(message.message, "utf8"),
        },
      };

    case MessageType.HEARTBEAT:
    case MessageType.HEARTBEAT_ACK:
      return { fixed: {}, variable: {} };
  }
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

/**
 * Range checks shared by both directions. On decode a violation means the
 * peer sent garbage (fatal); on encode it is the caller's mistake.
 */
function validateOrder(
  order: SubmitOrder,
  fatal: boolean,
  context: ErrorContext
): void {
  side(order.side, fatal, context);

  if (!Number.isSafeInteger(order.quantity) || order.quantity <= 0) {
    throw new InvalidFieldError(
      "quantity",
      `must be a positive integer, got ${order.quantity}`,
      fatal,
      context
    );
  }

  if (!Number.isFinite(order.price) || order.price < 0) {
    throw new InvalidFieldError(
      "price",
      `must be a finite non-negative number, got ${order.price}`,
      fatal,
      context
    );
  }

  assertInteger("order_type", order.orderType, MAX_U8, context, fatal);
  assertInteger(
    "timestamp_ms",
    order.timestampMs,
    Number.MAX_SAFE_INTEGER,
    context,
    fatal
  );
}

function side(value: number, fatal: boolean, context: ErrorContext): OrderSide {
  if (value === OrderSide.BUY) return OrderSide.BUY;
  if (value === OrderSide.SELL) return OrderSide.SELL;
  throw new InvalidFieldError("side", `expected 0 or 1, got ${value}`, fatal, context);
}

function flag(
  fixed: Record<string, number>,
  name: string,
  context: ErrorContext
): boolean {
  const value = lookup(fixed, name);
  if (value !== 0 && value !== 1) {
    throw new InvalidFieldError(name, `expected 0 or 1, got ${value}`, true, context);
  }
  return value === 1;
}

function assertInteger(
  name: string,
  value: number,
  max: number,
  context: ErrorContext,
  fatal: boolean = false
): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidFieldError(
      name,
      `expected an integer in 0..${max}, got ${value}`,
      fatal,
      context
    );
  }
}

function lookup(fixed: Record<string, number>, name: string): number {
  const value = fixed[name];
  if (value === undefined) {
    throw new Error(`Schema has no fixed field '${name}'`);
  }
  return value;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function text(
  variable: Record<string, Buffer>,
  name: string,
  context: ErrorContext
): string {
  const bytes = variable[name];
  if (bytes === undefined) {
    throw new Error(`Schema has no variable field '${name}'`);
  }
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new InvalidFieldError(name, "not valid UTF-8", true, context);
    }
    throw err;
  }
}
