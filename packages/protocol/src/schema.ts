/**
 * Message Type Registry
 *
 * Every message starts with | total_len (4B) | type (1B) |. What follows
 * depends on the type, so each discriminant maps to its own schema:
 * fixed-width fields in declared order, then variable-length byte fields
 * whose lengths are carried by earlier u32 fixed fields.
 */

import { MessageType, PREFIX_SIZE } from "./constants.js";

export type FieldKind = "u8" | "u32" | "u64" | "f64";

export const FIELD_WIDTH: Record<FieldKind, number> = {
  u8: 1,
  u32: 4,
  u64: 8,
  f64: 8,
};

export type FixedField = {
  name: string;
  kind: FieldKind;
};

export type VariableField = {
  name: string;
  lengthField: string; // Name of the u32 fixed field holding the byte length
};

export type MessageSchema = {
  type: MessageType;
  name: string;
  fixed: readonly FixedField[];
  variable: readonly VariableField[];
};

/**
 * Bytes taken by the fixed fields of a schema
 */
export function fixedSize(schema: MessageSchema): number {
  return schema.fixed.reduce((size, field) => size + FIELD_WIDTH[field.kind], 0);
}

export class MessageRegistry {
  private schemas: Map<number, MessageSchema> = new Map();

  constructor(schemas: readonly MessageSchema[] = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  /**
   * Add a schema. Discriminants are unique and every variable field
   * must be paired with a declared u32 length field.
   */
  register(schema: MessageSchema): void {
    if (this.schemas.has(schema.type)) {
      throw new Error(
        `Duplicate discriminant ${schema.type} for ${schema.name}`
      );
    }

    const names = new Set<string>();
    for (const field of schema.fixed) {
      if (names.has(field.name)) {
        throw new Error(`${schema.name}: duplicate field '${field.name}'`);
      }
      names.add(field.name);
    }

    for (const field of schema.variable) {
      const lengthField = schema.fixed.find((f) => f.name === field.lengthField);
      if (!lengthField || lengthField.kind !== "u32") {
        throw new Error(
          `${schema.name}: '${field.name}' needs a u32 length field, got '${field.lengthField}'`
        );
      }
    }

    this.schemas.set(schema.type, schema);
  }

  /**
   * Look up the schema for a discriminant
   */
  get(type: number): MessageSchema | undefined {
    return this.schemas.get(type);
  }

  has(type: number): boolean {
    return this.schemas.has(type);
  }

  /**
   * Size of the fixed part of a message, prefix included
   */
  headerSize(type: number): number {
    const schema = this.schemas.get(type);
    if (!schema) {
      throw new Error(`No schema registered for type ${type}`);
    }
    return PREFIX_SIZE + fixedSize(schema);
  }

  types(): number[] {
    return Array.from(this.schemas.keys());
  }
}

/**
 * The wire layouts spoken by the engine's TCP endpoint
 */
export const DEFAULT_SCHEMAS: readonly MessageSchema[] = [
  {
    type: MessageType.LOGIN_REQUEST,
    name: "LoginRequest",
    fixed: [{ name: "token_len", kind: "u32" }],
    variable: [{ name: "token", lengthField: "token_len" }],
  },
  {
    type: MessageType.LOGIN_RESPONSE,
    name: "LoginResponse",
    fixed: [
      { name: "success", kind: "u8" },
      { name: "message_len", kind: "u32" },
    ],
    variable: [{ name: "message", lengthField: "message_len" }],
  },
  {
    type: MessageType.SUBMIT_ORDER,
    name: "SubmitOrder",
    fixed: [
      { name: "order_id_len", kind: "u32" },
      { name: "user_id_len", kind: "u32" },
      { name: "symbol_len", kind: "u32" },
      { name: "side", kind: "u8" },
      { name: "order_type", kind: "u8" },
      { name: "quantity", kind: "u64" },
      { name: "price", kind: "f64" },
      { name: "timestamp_ms", kind: "u64" },
    ],
    variable: [
      { name: "order_id", lengthField: "order_id_len" },
      { name: "user_id", lengthField: "user_id_len" },
      { name: "symbol", lengthField: "symbol_len" },
    ],
  },
  {
    type: MessageType.ORDER_RESPONSE,
    name: "OrderResponse",
    fixed: [
      { name: "order_id_len", kind: "u32" },
      { name: "accepted", kind: "u8" },
      { name: "message_len", kind: "u32" },
    ],
    variable: [
      { name: "order_id", lengthField: "order_id_len" },
      { name: "message", lengthField: "message_len" },
    ],
  },
  {
    type: MessageType.HEARTBEAT,
    name: "Heartbeat",
    fixed: [],
    variable: [],
  },
  {
    type: MessageType.HEARTBEAT_ACK,
    name: "HeartbeatAck",
    fixed: [],
    variable: [],
  },
];

export const defaultRegistry = new MessageRegistry(DEFAULT_SCHEMAS);
