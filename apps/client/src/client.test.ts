import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ExchangeClient, type OrderRequest } from "./client.js";
import { MemoryStream, ManualClock } from "../../../packages/transport/src/testing/fakes.js";
import { SessionState } from "../../../packages/transport/src/session/session.js";
import type { ConnectionError } from "../../../packages/transport/src/connection/connection.js";
import { encodeMessage } from "../../../packages/protocol/src/codec.js";
import { MessageType, OrderSide, OrderType } from "../../../packages/protocol/src/constants.js";
import type { OrderResponse } from "../../../packages/protocol/src/types.js";
import {
  LoginRejectedError,
  SessionClosedError,
  SessionNotAuthenticatedError,
  TransportError,
} from "../../../packages/protocol/src/errors.js";

const request = {
  orderId: "ORD-1",
  userId: "trader-7",
  symbol: "AAPL",
  side: OrderSide.BUY,
  orderType: OrderType.LIMIT,
  quantity: 100,
  price: 150.25,
  timestampMs: 1700000000000,
} satisfies OrderRequest;

function response(orderId: string, accepted: boolean, message: string): Buffer {
  return encodeMessage({ type: MessageType.ORDER_RESPONSE, orderId, accepted, message });
}

describe("ExchangeClient", () => {
  let client: ExchangeClient;
  let stream: MemoryStream;
  let errors: ConnectionError[];

  beforeEach(() => {
    client = new ExchangeClient();
    stream = new MemoryStream();
    errors = [];
    client.on("error", (error: ConnectionError) => errors.push(error));
    client.attach(stream);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function login(): Promise<void> {
    const pending = client.login("test-secret");
    stream.push(
      encodeMessage({ type: MessageType.LOGIN_RESPONSE, success: true, message: "ok" })
    );
    await pending;
    stream.takeWritten();
  }

  it("logs in with a LOGIN_REQUEST", async () => {
    const pending = client.login("test-secret");
    expect(stream.takeWritten()).toEqual(
      encodeMessage({ type: MessageType.LOGIN_REQUEST, token: "test-secret" })
    );

    stream.push(
      encodeMessage({
        type: MessageType.LOGIN_RESPONSE,
        success: true,
        message: "Authentication successful",
      })
    );

    await expect(pending).resolves.toEqual({
      type: MessageType.LOGIN_RESPONSE,
      success: true,
      message: "Authentication successful",
    });
    expect(client.getSessionState()).toBe(SessionState.AUTHENTICATED);
  });

  it("rejects a refused login and disconnects", async () => {
    const reasons: Array<Error | undefined> = [];
    client.on("disconnected", (reason?: Error) => reasons.push(reason));

    const pending = client.login("wrong");
    stream.push(
      encodeMessage({ type: MessageType.LOGIN_RESPONSE, success: false, message: "Invalid token" })
    );

    await expect(pending).rejects.toThrow(LoginRejectedError);
    await expect(pending).rejects.toThrow("Login rejected: Invalid token");
    expect(errors).toHaveLength(1);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(LoginRejectedError);
    expect(client.isConnected()).toBe(false);
  });

  it("refuses orders before login without writing", async () => {
    await expect(client.submitOrder(request)).rejects.toThrow(SessionNotAuthenticatedError);
    expect(stream.takeWritten().length).toBe(0);
    expect(client.getPendingOrderCount()).toBe(0);
  });

  it("pairs responses with orders in submission order", async () => {
    await login();

    const first = client.submitOrder(request);
    const second = client.submitOrder({ ...request, orderId: "ORD-2", symbol: "ZZZZ" });
    expect(client.getPendingOrderCount()).toBe(2);
    expect(stream.takeWritten()).toEqual(
      Buffer.concat([
        encodeMessage({ type: MessageType.SUBMIT_ORDER, ...request }),
        encodeMessage({
          type: MessageType.SUBMIT_ORDER,
          ...request,
          orderId: "ORD-2",
          symbol: "ZZZZ",
        }),
      ])
    );

    stream.push(
      Buffer.concat([
        response("ORD-1", true, "Order accepted"),
        response("ORD-2", false, "Unknown symbol: ZZZZ"),
      ])
    );

    await expect(first).resolves.toMatchObject({ orderId: "ORD-1", accepted: true });
    await expect(second).resolves.toMatchObject({
      orderId: "ORD-2",
      accepted: false,
      message: "Unknown symbol: ZZZZ",
    });
    expect(client.getPendingOrderCount()).toBe(0);
  });

  it("stamps orders without a timestamp", async () => {
    await login();
    vi.spyOn(Date, "now").mockReturnValue(1234);

    const { timestampMs: _omitted, ...rest } = request;
    void client.submitOrder(rest).catch(() => undefined);

    const bytes = stream.takeWritten();
    expect(bytes.readBigUInt64BE(35)).toBe(1234n);
  });

  it("reports a response for a different order", async () => {
    await login();
    const mismatches: Array<[string, OrderResponse]> = [];
    client.on("mismatch", (expected: string, got: OrderResponse) =>
      mismatches.push([expected, got])
    );

    const pending = client.submitOrder(request);
    stream.push(response("ORD-9", true, "Order accepted"));

    await expect(pending).resolves.toMatchObject({ orderId: "ORD-9" });
    expect(mismatches).toHaveLength(1);
    expect(mismatches[0]?.[0]).toBe("ORD-1");
  });

  it("reports a response nobody asked for", async () => {
    await login();
    const unsolicited: OrderResponse[] = [];
    client.on("unsolicited", (got: OrderResponse) => unsolicited.push(got));

    stream.push(response("ORD-5", true, "Order accepted"));

    expect(unsolicited.map((r) => r.orderId)).toEqual(["ORD-5"]);
  });

  it("fails pending orders when the connection drops", async () => {
    await login();
    const pending = client.submitOrder(request);

    stream.emit("close");

    await expect(pending).rejects.toThrow(TransportError);
    await expect(pending).rejects.toThrow("Connection closed");
    expect(client.getPendingOrderCount()).toBe(0);
    expect(client.getSessionState()).toBe(SessionState.CLOSED);
  });

  it("refuses to send once disconnected", async () => {
    client.disconnect();

    expect(stream.ended).toBe(true);
    await expect(client.login("test-secret")).rejects.toThrow(SessionClosedError);
    expect(() => client.heartbeat()).toThrow(SessionClosedError);
  });

  it("emits heartbeat acks", async () => {
    await login();
    const acks: unknown[] = [];
    client.on("heartbeat", (ack: unknown) => acks.push(ack));

    client.heartbeat();
    expect(stream.takeWritten()).toEqual(Buffer.from([0, 0, 0, 5, 5]));

    stream.push(encodeMessage({ type: MessageType.HEARTBEAT_ACK }));
    expect(acks).toEqual([{ type: MessageType.HEARTBEAT_ACK }]);
  });
});

describe("ExchangeClient without an error listener", () => {
  it("still closes after a refused login", async () => {
    const client = new ExchangeClient();
    const stream = new MemoryStream();
    client.attach(stream);

    const pending = client.login("wrong");
    expect(() =>
      stream.push(
        encodeMessage({ type: MessageType.LOGIN_RESPONSE, success: false, message: "Invalid token" })
      )
    ).not.toThrow();

    await expect(pending).rejects.toThrow(LoginRejectedError);
    expect(stream.ended).toBe(true);
    expect(client.isConnected()).toBe(false);
    expect(client.getSessionState()).toBe(SessionState.CLOSED);
  });
});

describe("ExchangeClient keep-alive", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends heartbeats on an interval after login", async () => {
    vi.useFakeTimers();
    const clock = new ManualClock();
    const client = new ExchangeClient({ heartbeatIntervalMs: 1000, clock });
    const stream = new MemoryStream();
    client.on("error", () => undefined);
    client.attach(stream);

    const pending = client.login("test-secret");
    stream.push(
      encodeMessage({ type: MessageType.LOGIN_RESPONSE, success: true, message: "ok" })
    );
    await pending;
    stream.takeWritten();

    vi.advanceTimersByTime(999);
    expect(stream.takeWritten().length).toBe(0);

    vi.advanceTimersByTime(1);
    expect(stream.takeWritten()).toEqual(Buffer.from([0, 0, 0, 5, 5]));

    client.disconnect();
  });
});
