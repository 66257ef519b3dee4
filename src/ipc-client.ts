/**
 * Request/reply client for the i3/sway IPC protocol.
 *
 * Each call writes one request frame and reads exactly one reply frame on a
 * connection the client owns. Calls are serialized, so a reply is always read
 * by the caller that sent the request. Replies are returned unparsed: turning
 * them into workspaces, outputs or trees is left to the caller.
 *
 * Subscriptions never share this connection; {@link IpcClient.subscribe}
 * opens a dedicated one.
 */

import { EventEmitter } from "node:events";
import { Mutex } from "./concurrency.js";
import { EncodingError, IpcError } from "./errors.js";
import { type EventType, MessageType } from "./message-types.js";
import { type EventStream, type SubscribeOptions, subscribe } from "./subscription.js";
import { IpcTransport, type TransportConfig } from "./transport.js";
import type { CallResult, Frame } from "./types.js";
import { replySucceeded } from "./validation.js";

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Configuration options for the IPC client.
 */
export interface IpcClientConfig extends TransportConfig {
  /** Reply timeout per call in milliseconds; 0 waits forever (default: 0) */
  readonly callTimeout?: number;
}

/**
 * Call counters for monitoring.
 */
export interface IpcClientStats {
  readonly totalCalls: number;
  readonly failedCalls: number;
  readonly connections: number;
  readonly connected: boolean;
}

// ============================================================================
// IPC Client Implementation
// ============================================================================

/**
 * IPC request/reply client.
 *
 * Emits `connected(socketPath)` whenever it opens a connection and
 * `disconnected(error)` when it drops one after a failed call.
 *
 * A failed call drops the connection (a late reply would otherwise be read
 * by the next call); the next call reconnects. Nothing is retried.
 *
 * @example
 * ```typescript
 * const client = new IpcClient();
 * const result = await client.runCommand("floating toggle");
 * if (!result.success) {
 *   console.error(result.payload.toString());
 * }
 * await client.close();
 * ```
 */
export class IpcClient extends EventEmitter {
  private readonly config: IpcClientConfig;
  private readonly callTimeout: number;
  private readonly mutex = new Mutex();
  private transport: IpcTransport | null = null;
  private closed = false;
  private readonly metrics = {
    totalCalls: 0,
    failedCalls: 0,
    connections: 0,
  };

  constructor(config: IpcClientConfig = {}) {
    super();
    this.config = config;
    this.callTimeout = config.callTimeout ?? 0;
  }

  /**
   * Sends one request and returns the reply frame as received.
   * The reply kind is not checked against the request kind.
   *
   * @param kind - Request kind, known or not
   * @param payload - Request payload
   */
  async call(kind: number, payload: string | Uint8Array = ""): Promise<Frame> {
    return this.mutex.withLock(async () => {
      if (this.closed) {
        throw new IpcError("Cannot call: client is closed", "CLIENT_CLOSED");
      }

      this.metrics.totalCalls++;
      const transport = await this.acquireTransport();

      try {
        await transport.sendFrame(kind, payload);
        return await transport.receiveFrame(
          this.callTimeout > 0 ? { timeout: this.callTimeout } : {}
        );
      } catch (error) {
        this.metrics.failedCalls++;
        if (!(error instanceof EncodingError)) {
          await this.discardTransport(transport, error);
        }
        throw error;
      }
    });
  }

  // ============================================================================
  // Request Helpers
  // ============================================================================

  /** Runs one or more commands separated by `,` or `;`. */
  async runCommand(command: string): Promise<CallResult> {
    return this.request(MessageType.RunCommand, command);
  }

  /** True when every command in `command` succeeded. */
  async commandSucceeds(command: string): Promise<boolean> {
    const result = await this.runCommand(command);
    return result.success;
  }

  async getWorkspaces(): Promise<CallResult> {
    return this.request(MessageType.GetWorkspaces);
  }

  /** Outputs, including the invisible scratchpad output. */
  async getOutputs(): Promise<CallResult> {
    return this.request(MessageType.GetOutputs);
  }

  async getTree(): Promise<CallResult> {
    return this.request(MessageType.GetTree);
  }

  async getMarks(): Promise<CallResult> {
    return this.request(MessageType.GetMarks);
  }

  /**
   * Without `barId`, the list of bar ids; with it, that bar's configuration.
   */
  async getBarConfig(barId?: string): Promise<CallResult> {
    return this.request(MessageType.GetBarConfig, barId ?? "");
  }

  async getVersion(): Promise<CallResult> {
    return this.request(MessageType.GetVersion);
  }

  async getBindingModes(): Promise<CallResult> {
    return this.request(MessageType.GetBindingModes);
  }

  async getConfig(): Promise<CallResult> {
    return this.request(MessageType.GetConfig);
  }

  /** Broadcasts a tick event with `payload` to tick subscribers. */
  async sendTick(payload = ""): Promise<CallResult> {
    return this.request(MessageType.SendTick, payload);
  }

  async sync(): Promise<CallResult> {
    return this.request(MessageType.Sync);
  }

  async getBindingState(): Promise<CallResult> {
    return this.request(MessageType.GetBindingState);
  }

  async getInputs(): Promise<CallResult> {
    return this.request(MessageType.GetInputs);
  }

  async getSeats(): Promise<CallResult> {
    return this.request(MessageType.GetSeats);
  }

  // ============================================================================
  // Subscriptions and Lifecycle
  // ============================================================================

  /**
   * Subscribes to events on a new connection configured like this client's.
   */
  async subscribe(
    events: readonly EventType[],
    options: Pick<SubscribeOptions, "ackTimeout"> = {}
  ): Promise<EventStream> {
    if (this.closed) {
      throw new IpcError("Cannot subscribe: client is closed", "CLIENT_CLOSED");
    }
    return subscribe(events, { ...this.config, ...options });
  }

  /**
   * Closes the connection. A call waiting for its reply fails with
   * `ConnectionClosedError`; later calls fail with `CLIENT_CLOSED`.
   */
  async close(): Promise<void> {
    this.closed = true;
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.close();
    }
  }

  getStats(): IpcClientStats {
    return {
      ...this.metrics,
      connected: this.transport?.isConnected() ?? false,
    };
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private async request(kind: MessageType, payload = ""): Promise<CallResult> {
    const reply = await this.call(kind, payload);
    return {
      kind: reply.kind,
      success: replySucceeded(reply.payload),
      payload: reply.payload,
    };
  }

  private async acquireTransport(): Promise<IpcTransport> {
    if (this.transport?.isConnected()) {
      return this.transport;
    }
    if (this.transport) {
      await this.discardTransport(this.transport, undefined);
    }

    const transport = new IpcTransport(this.config);
    try {
      await transport.connect();
    } catch (error) {
      this.metrics.failedCalls++;
      throw error;
    }

    this.transport = transport;
    this.metrics.connections++;
    this.emit("connected", transport.getSocketPath());
    return transport;
  }

  private async discardTransport(transport: IpcTransport, error: unknown): Promise<void> {
    if (this.transport === transport) {
      this.transport = null;
    }
    await transport.close();
    this.emit("disconnected", error);
  }
}
