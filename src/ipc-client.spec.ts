/**
 * Unit tests for the request/reply client.
 *
 * Tests cover:
 * - Request framing and unmodified replies
 * - Call serialization over one connection
 * - Connection loss, timeouts and reconnects
 * - Request helpers and subscription hand-off
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConnectionClosedError,
  ConnectionError,
  EncodingError,
  TimeoutError,
} from "./errors.js";
import { IpcClient, type IpcClientConfig } from "./ipc-client.js";
import { MessageType } from "./message-types.js";
import {
  type MockResponder,
  type MockSocketFactoryOptions,
  createErrnoError,
  createMockSocketFactory,
  payloadText,
  waitFor,
} from "./test-utils.js";

// ============================================================================
// Test Setup
// ============================================================================

const TEST_SOCKET_PATH = "/tmp/test-sway-ipc.sock";

/** Echoes the request kind with a fixed reply payload. */
const replyWith =
  (payload: string): MockResponder =>
  (frame, socket) =>
    socket.pushFrame(frame.kind, payload);

let client: IpcClient | undefined;

function createClient(
  factoryOptions: MockSocketFactoryOptions = {},
  config: IpcClientConfig = {}
) {
  const mock = createMockSocketFactory(factoryOptions);
  const created = new IpcClient({
    socketPath: TEST_SOCKET_PATH,
    socketFactory: mock.factory,
    ...config,
  });
  client = created;
  return { client: created, sockets: mock.sockets };
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

// ============================================================================
// Test Suite
// ============================================================================

describe("IpcClient", () => {
  describe("call", () => {
    it("should send the request and return the reply unmodified", async () => {
      const { client: c, sockets } = createClient({ responder: replyWith('[{"success":true}]') });

      const result = await c.runCommand("floating toggle");

      expect(result.kind).toBe(MessageType.RunCommand);
      expect(result.success).toBe(true);
      expect(payloadText(result)).toBe('[{"success":true}]');

      const written = sockets[0]?.writtenFrames() ?? [];
      expect(written).toHaveLength(1);
      expect(written[0]?.kind).toBe(MessageType.RunCommand);
      expect(written[0] && payloadText(written[0])).toBe("floating toggle");
    });

    it("should not check the reply kind against the request kind", async () => {
      const { client: c } = createClient({
        responder: (_frame, socket) => socket.pushFrame(MessageType.GetVersion, "{}"),
      });

      const reply = await c.call(MessageType.GetTree);

      expect(reply.kind).toBe(MessageType.GetVersion);
    });

    it("should send unknown request kinds as given", async () => {
      const { client: c, sockets } = createClient({ responder: replyWith("{}") });

      await c.call(9999, "future");

      expect(sockets[0]?.writtenFrames()[0]?.kind).toBe(9999);
    });

    it("should serialize concurrent calls so each caller reads its own reply", async () => {
      const delays: Record<string, number> = { a: 15, b: 10, c: 1 };
      const { client: c, sockets } = createClient({
        responder: (frame, socket) => {
          const text = payloadText(frame);
          setTimeout(() => socket.pushFrame(frame.kind, text), delays[text] ?? 0);
        },
      });

      const replies = await Promise.all([
        c.call(MessageType.GetMarks, "a"),
        c.call(MessageType.GetMarks, "b"),
        c.call(MessageType.GetMarks, "c"),
      ]);

      expect(replies.map(payloadText)).toEqual(["a", "b", "c"]);
      expect(sockets).toHaveLength(1);
      expect(sockets[0]?.writtenFrames().map(payloadText)).toEqual(["a", "b", "c"]);
    });

    it("should reuse one connection for sequential calls", async () => {
      const { client: c, sockets } = createClient({ responder: replyWith("{}") });

      await c.getVersion();
      await c.getTree();
      await c.getWorkspaces();

      expect(sockets).toHaveLength(1);
      expect(c.getStats()).toEqual({
        totalCalls: 3,
        failedCalls: 0,
        connections: 1,
        connected: true,
      });
    });

    it("should emit connected with the socket path", async () => {
      const { client: c } = createClient({ responder: replyWith("{}") });
      const connected = vi.fn();
      c.on("connected", connected);

      await c.getVersion();

      expect(connected).toHaveBeenCalledWith(TEST_SOCKET_PATH);
    });
  });

  describe("failures", () => {
    it("should reconnect on the next call after the connection closed", async () => {
      let requests = 0;
      const { client: c, sockets } = createClient({
        responder: (frame, socket) => {
          requests++;
          if (requests === 1) {
            socket.simulateClose();
          } else {
            socket.pushFrame(frame.kind, '{"success":true}');
          }
        },
      });
      const disconnected = vi.fn();
      c.on("disconnected", disconnected);

      await expect(c.sync()).rejects.toBeInstanceOf(ConnectionClosedError);
      const result = await c.sync();

      expect(result.success).toBe(true);
      expect(sockets).toHaveLength(2);
      expect(disconnected).toHaveBeenCalledTimes(1);
      expect(c.getStats()).toMatchObject({ totalCalls: 2, failedCalls: 1, connections: 2 });
    });

    it("should drop the connection after a reply timeout", async () => {
      let requests = 0;
      const { client: c, sockets } = createClient(
        {
          responder: (frame, socket) => {
            requests++;
            if (requests > 1) {
              socket.pushFrame(frame.kind, "{}");
            }
          },
        },
        { callTimeout: 20 }
      );

      await expect(c.getTree()).rejects.toBeInstanceOf(TimeoutError);
      expect(sockets[0]?.destroyed).toBe(true);

      const result = await c.getTree();
      expect(payloadText(result)).toBe("{}");
      expect(sockets).toHaveLength(2);
    });

    it("should report connection failures", async () => {
      const { client: c } = createClient({
        connectError: createErrnoError("ENOENT", "no such file or directory"),
      });

      await expect(c.getVersion()).rejects.toBeInstanceOf(ConnectionError);
      expect(c.getStats()).toMatchObject({ totalCalls: 1, failedCalls: 1, connections: 0 });
    });

    it("should keep the connection after an encoding error", async () => {
      const { client: c, sockets } = createClient({ responder: replyWith("{}") });

      await c.getVersion();
      await expect(c.call(-1)).rejects.toBeInstanceOf(EncodingError);
      await c.getVersion();

      expect(sockets).toHaveLength(1);
      expect(c.getStats().connections).toBe(1);
    });

    it("should fail a call waiting for its reply when closed", async () => {
      const { client: c, sockets } = createClient();

      const pending = c.getTree();
      const outcome = expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
      await waitFor(() => (sockets[0]?.written.length ?? 0) === 1);
      await c.close();

      await outcome;
    });

    it("should refuse calls after close", async () => {
      const { client: c } = createClient({ responder: replyWith("{}") });

      await c.close();

      await expect(c.getVersion()).rejects.toMatchObject({ code: "CLIENT_CLOSED" });
      await expect(c.subscribe(["window"])).rejects.toMatchObject({ code: "CLIENT_CLOSED" });
    });
  });

  describe("request helpers", () => {
    it("should send the documented kinds and payloads", async () => {
      const { client: c, sockets } = createClient({ responder: replyWith("{}") });

      await c.getBarConfig();
      await c.getBarConfig("bar-0");
      await c.sendTick("ping");
      await c.getSeats();
      await c.getInputs();

      const written = (sockets[0]?.writtenFrames() ?? []).map((frame) => [
        frame.kind,
        payloadText(frame),
      ]);
      expect(written).toEqual([
        [MessageType.GetBarConfig, ""],
        [MessageType.GetBarConfig, "bar-0"],
        [MessageType.SendTick, "ping"],
        [MessageType.GetSeats, ""],
        [MessageType.GetInputs, ""],
      ]);
    });

    it("should report whether every command succeeded", async () => {
      const { client: c } = createClient({
        responder: replyWith('[{"success":true},{"success":false,"error":"Unknown command"}]'),
      });

      expect(await c.commandSucceeds("focus left; bogus")).toBe(false);
    });

    it("should report failed replies without throwing", async () => {
      const { client: c } = createClient({
        responder: replyWith('{"success":false,"error":"No bar with id bar-9"}'),
      });

      const result = await c.getBarConfig("bar-9");

      expect(result.success).toBe(false);
      expect(payloadText(result)).toBe('{"success":false,"error":"No bar with id bar-9"}');
    });
  });

  describe("subscribe", () => {
    it("should subscribe on a separate connection", async () => {
      const { client: c, sockets } = createClient({
        responder: (frame, socket) => socket.pushFrame(frame.kind, '{"success":true}'),
      });

      await c.getVersion();
      const stream = await c.subscribe(["window", "workspace"]);

      expect(sockets).toHaveLength(2);
      const subscribeFrame = sockets[1]?.writtenFrames()[0];
      expect(subscribeFrame?.kind).toBe(MessageType.Subscribe);
      expect(subscribeFrame && payloadText(subscribeFrame)).toBe('["window","workspace"]');
      expect(stream.events).toEqual(["window", "workspace"]);

      await stream.close();
    });
  });
});
