/**
 * Unix domain socket transport for the i3/sway IPC protocol.
 *
 * One {@link IpcTransport} owns one connection and the bytes received on it.
 * Incoming `data` chunks are queued as they arrive and only joined once the
 * frame they belong to is complete; frames are cut from the head of the queue
 * by {@link IpcTransport.receiveFrame}, which is the only point where a caller
 * waits for the window manager.
 *
 * A transport is not a multiplexer: one reader at a time. Callers that need
 * concurrent access serialize through a single owner (see `IpcClient`).
 */

import { EventEmitter } from "node:events";
import { connect } from "node:net";
import {
  ConnectionClosedError,
  ConnectionError,
  IOError,
  IpcError,
  ProtocolError,
  TimeoutError,
} from "./errors.js";
import {
  type DecodeResult,
  HEADER_LENGTH,
  decodeFrame,
  encodeFrame,
  readFrameLength,
} from "./framing.js";
import { describeKind } from "./message-types.js";
import { type SocketDiscoveryOptions, resolveSocketPath } from "./socket-discovery.js";
import type { Frame } from "./types.js";

// ============================================================================
// Constants and Configuration
// ============================================================================

const DEFAULT_CONFIG = {
  /** Connection timeout in milliseconds */
  connectionTimeout: 5000,
  /** Read timeout in milliseconds; 0 waits forever */
  readTimeout: 0,
} as const;

const EMPTY_BUFFER = Buffer.alloc(0);

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Connection state of a transport.
 */
export enum ConnectionState {
  Disconnected = "disconnected",
  Connecting = "connecting",
  Connected = "connected",
  Closed = "closed",
}

/**
 * The part of `net.Socket` the transport relies on. Tests substitute an
 * in-process stand-in through {@link TransportConfig.socketFactory}.
 */
export interface IpcSocket {
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string, listener: (...args: never[]) => void): unknown;
  write(data: Uint8Array, callback: (error?: Error | null) => void): unknown;
  destroy(): unknown;
}

/** Opens a stream connection to `path`. */
export type SocketFactory = (path: string) => IpcSocket;

/**
 * Transport configuration. Socket path resolution options are accepted
 * directly and applied at connect time.
 */
export interface TransportConfig extends SocketDiscoveryOptions {
  /** Connection timeout in milliseconds; 0 disables it */
  readonly connectionTimeout?: number;
  /** Default read timeout for `receiveFrame` in milliseconds; 0 disables it */
  readonly readTimeout?: number;
  /** Socket constructor, `net.connect` by default */
  readonly socketFactory?: SocketFactory;
}

/** Per-call receive options. */
export interface ReceiveOptions {
  /** Read timeout in milliseconds, overriding the configured default */
  readonly timeout?: number;
}

/**
 * Transport statistics for monitoring and diagnostics.
 */
export interface TransportStats {
  readonly state: ConnectionState;
  readonly socketPath: string | undefined;
  readonly framesSent: number;
  readonly framesReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  /** Bytes received but not yet returned as a frame */
  readonly bufferedBytes: number;
}

interface PendingReceive {
  readonly resolve: (frame: Frame) => void;
  readonly reject: (error: unknown) => void;
  timer: NodeJS.Timeout | undefined;
}

const defaultSocketFactory: SocketFactory = (path) => connect(path);

// ============================================================================
// Transport Class
// ============================================================================

/**
 * A single IPC connection.
 *
 * Emits `stateChange(newState, oldState)`, `connected(socketPath)` and `closed()`.
 *
 * @example
 * ```typescript
 * const transport = new IpcTransport();
 * await transport.connect();
 * await transport.sendFrame(MessageType.GetVersion);
 * const reply = await transport.receiveFrame({ timeout: 1000 });
 * await transport.close();
 * ```
 */
export class IpcTransport extends EventEmitter {
  private readonly options: TransportConfig;
  private readonly connectionTimeout: number;
  private readonly readTimeout: number;
  private readonly socketFactory: SocketFactory;

  private socket: IpcSocket | null = null;
  private socketPath: string | undefined;
  private state: ConnectionState = ConnectionState.Disconnected;
  private connecting: Promise<void> | null = null;
  private chunks: Buffer[] = [];
  private bufferedLength = 0;
  private pending: PendingReceive | null = null;
  private failure: IpcError | null = null;
  private destroyed = false;

  private stats = {
    framesSent: 0,
    framesReceived: 0,
    bytesSent: 0,
    bytesReceived: 0,
  };

  constructor(options: TransportConfig = {}) {
    super();
    this.options = options;
    this.connectionTimeout = options.connectionTimeout ?? DEFAULT_CONFIG.connectionTimeout;
    this.readTimeout = options.readTimeout ?? DEFAULT_CONFIG.readTimeout;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  /**
   * Resolves the socket path and opens the connection.
   *
   * @throws {ConnectionError} When no path resolves, the socket is missing,
   * the connection is refused, or the connection timeout elapses
   */
  async connect(): Promise<void> {
    if (this.state === ConnectionState.Connected) {
      return;
    }
    if (this.connecting) {
      return this.connecting;
    }
    if (this.state === ConnectionState.Closed) {
      throw new ConnectionError("Cannot connect: transport is closed", "TRANSPORT_CLOSED", this.socketPath);
    }

    this.connecting = this.openConnection().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  /**
   * Encodes and writes one frame. Node's write queue flushes short writes.
   *
   * @throws {EncodingError} When the frame cannot be encoded
   * @throws {IOError} When the write fails; the transport is dead afterwards
   */
  async sendFrame(kind: number, payload: string | Uint8Array = ""): Promise<void> {
    const socket = this.requireSocket();
    const bytes = encodeFrame(kind, payload);

    await new Promise<void>((resolve, reject) => {
      socket.write(bytes, (error) => {
        if (error) {
          const failure = new IOError(
            `Failed to send ${describeKind(kind)}: ${error.message}`,
            this.socketPath
          );
          this.fail(failure);
          this.settlePending();
          reject(failure);
          return;
        }
        this.stats.framesSent++;
        this.stats.bytesSent += bytes.length;
        resolve();
      });
    });
  }

  /**
   * Waits for the next complete frame. Bytes past the frame stay buffered.
   *
   * @throws {TimeoutError} When the read timeout elapses; the connection stays usable
   * @throws {ConnectionClosedError} When the connection closed with no complete frame left
   * @throws {ProtocolError} When the stream lost frame alignment
   * @throws {IOError} When the socket failed
   */
  async receiveFrame(options: ReceiveOptions = {}): Promise<Frame> {
    if (this.pending) {
      throw new IpcError(
        "A receive is already in progress on this transport",
        "RECEIVE_IN_PROGRESS",
        this.socketPath
      );
    }
    if (!this.failure && this.state !== ConnectionState.Connected) {
      throw new IpcError("Cannot receive: socket not connected", "NOT_CONNECTED", this.socketPath);
    }

    const frame = this.takeFrame();
    if (frame) {
      return frame;
    }
    if (this.failure) {
      throw this.failure;
    }

    const timeout = options.timeout ?? this.readTimeout;
    return new Promise<Frame>((resolve, reject) => {
      const pending: PendingReceive = { resolve, reject, timer: undefined };
      if (timeout > 0) {
        pending.timer = setTimeout(() => {
          if (this.pending === pending) {
            this.pending = null;
            reject(new TimeoutError(timeout, this.socketPath));
          }
        }, timeout);
      }
      this.pending = pending;
    });
  }

  /**
   * Closes the connection. A pending receive rejects with `ConnectionClosedError`.
   */
  async close(): Promise<void> {
    if (this.state === ConnectionState.Closed) {
      return;
    }

    this.chunks = [];
    this.bufferedLength = 0;
    this.fail(new ConnectionClosedError(this.socketPath, "Connection closed locally"));
    this.settlePending();

    if (!this.socket) {
      this.setState(ConnectionState.Closed);
      return;
    }

    // A destroyed socket reports "close" asynchronously
    const stillOpen: ConnectionState = this.state;
    if (stillOpen !== ConnectionState.Closed) {
      await new Promise<void>((resolve) => {
        this.once("closed", () => resolve());
      });
    }
  }

  /** Current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Whether the connection is open and has not failed. */
  isConnected(): boolean {
    return this.state === ConnectionState.Connected && this.failure === null;
  }

  /** Socket path resolved by `connect()`. */
  getSocketPath(): string | undefined {
    return this.socketPath;
  }

  getStats(): TransportStats {
    return {
      ...this.stats,
      state: this.state,
      socketPath: this.socketPath,
      bufferedBytes: this.bufferedLength,
    };
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private async openConnection(): Promise<void> {
    this.setState(ConnectionState.Connecting);

    let socket: IpcSocket;
    try {
      const socketPath = await resolveSocketPath(this.options);
      this.socketPath = socketPath;
      socket = await this.establishConnection(socketPath);
    } catch (error) {
      // Connection errors are retryable by the caller on the same transport
      if (this.state === ConnectionState.Connecting) {
        this.setState(ConnectionState.Disconnected);
      }
      throw error;
    }

    const current: ConnectionState = this.state;
    if (current !== ConnectionState.Connecting) {
      // close() ran while the connection was being established
      socket.destroy();
      throw new ConnectionClosedError(this.socketPath, "Transport closed while connecting");
    }

    this.socket = socket;
    this.setupSocketHandlers(socket);
    this.setState(ConnectionState.Connected);
    this.emit("connected", this.socketPath);
  }

  private establishConnection(socketPath: string): Promise<IpcSocket> {
    return new Promise((resolve, reject) => {
      const socket = this.socketFactory(socketPath);
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        socket.off("connect", onConnect);
        socket.off("error", onError);
      };

      const onConnect = () => {
        cleanup();
        resolve(socket);
      };

      const onError = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(
            `Connection failed to socket ${socketPath}: ${error.message}`,
            "CONNECTION_FAILED",
            socketPath
          )
        );
      };

      if (this.connectionTimeout > 0) {
        timer = setTimeout(() => {
          cleanup();
          socket.destroy();
          reject(
            new ConnectionError(
              `Connection timeout after ${this.connectionTimeout}ms to socket: ${socketPath}`,
              "CONNECTION_TIMEOUT",
              socketPath
            )
          );
        }, this.connectionTimeout);
      }

      socket.on("connect", onConnect);
      socket.on("error", onError);
    });
  }

  private setupSocketHandlers(socket: IpcSocket): void {
    socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    socket.on("error", (error: Error) => this.handleSocketError(error));
    socket.on("close", () => this.handleSocketClose());
  }

  private handleData(chunk: Buffer): void {
    if (this.failure) {
      return;
    }
    this.stats.bytesReceived += chunk.length;
    this.chunks.push(chunk);
    this.bufferedLength += chunk.length;
    this.settlePending();
  }

  private handleSocketError(error: Error): void {
    this.fail(new IOError(`Socket error: ${error.message}`, this.socketPath));
    this.settlePending();
  }

  private handleSocketClose(): void {
    if (!this.failure) {
      this.failure = new ConnectionClosedError(this.socketPath);
    }
    this.destroyed = true;
    this.setState(ConnectionState.Closed);
    this.settlePending();
    this.emit("closed");
  }

  /**
   * Cuts the next frame off the head of the chunk queue, or returns null if it
   * is incomplete. A framing error tears the connection down.
   */
  private takeFrame(): Frame | null {
    let head = this.coalesce(Math.min(this.bufferedLength, HEADER_LENGTH));
    let result = this.decode(head);

    if (!result.frame) {
      const frameLength = readFrameLength(head);
      if (frameLength === undefined || frameLength > this.bufferedLength) {
        return null;
      }
      head = this.coalesce(frameLength);
      result = this.decode(head);
      if (!result.frame) {
        return null;
      }
    }

    const rest = head.subarray(result.consumed);
    if (rest.length > 0) {
      this.chunks[0] = rest;
    } else {
      this.chunks.shift();
    }
    this.bufferedLength -= result.consumed;
    this.stats.framesReceived++;
    return result.frame;
  }

  /**
   * Returns the first queued chunk, joining the queue into one chunk first
   * when the first is shorter than `length`.
   */
  private coalesce(length: number): Buffer {
    const first = this.chunks[0];
    if (first === undefined) {
      return EMPTY_BUFFER;
    }
    if (first.length >= length || this.chunks.length === 1) {
      return first;
    }
    const merged = Buffer.concat(this.chunks, this.bufferedLength);
    this.chunks = [merged];
    return merged;
  }

  private decode(head: Buffer): DecodeResult {
    try {
      return decodeFrame(head);
    } catch (error) {
      if (error instanceof ProtocolError) {
        const failure = new ProtocolError(error.message, this.socketPath);
        this.fail(failure);
        throw failure;
      }
      throw error;
    }
  }

  /** Resolves or rejects the waiting reader, if the buffer or a failure allows. */
  private settlePending(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    let frame: Frame | null;
    try {
      frame = this.takeFrame();
    } catch (error) {
      this.finishPending(pending);
      pending.reject(error);
      return;
    }

    if (frame) {
      this.finishPending(pending);
      pending.resolve(frame);
    } else if (this.failure) {
      this.finishPending(pending);
      pending.reject(this.failure);
    }
  }

  private finishPending(pending: PendingReceive): void {
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    this.pending = null;
  }

  /** Records the first terminal failure and tears the socket down. */
  private fail(error: IpcError): void {
    if (!this.failure) {
      this.failure = error;
    }
    if (this.socket && !this.destroyed) {
      this.destroyed = true;
      this.socket.destroy();
    }
  }

  private requireSocket(): IpcSocket {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.socket || this.state !== ConnectionState.Connected) {
      throw new IpcError("Cannot send: socket not connected", "NOT_CONNECTED", this.socketPath);
    }
    return this.socket;
  }

  private setState(newState: ConnectionState): void {
    const oldState = this.state;
    this.state = newState;
    if (oldState !== newState) {
      this.emit("stateChange", newState, oldState);
    }
  }
}
