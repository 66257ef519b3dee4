/**
 * Test utilities and fixtures
 * Provides an in-process socket stand-in and frame helpers
 */

import { EventEmitter } from "node:events";
import { decodeFrame, encodeFrame } from "./framing.js";
import type { SocketFactory } from "./transport.js";
import type { Frame } from "./types.js";

// ============================================================================
// Mock Socket
// ============================================================================

/** Answers frames written to a {@link MockSocket}. */
export type MockResponder = (frame: Frame, socket: MockSocket) => void;

/**
 * Stand-in for `net.Socket`. Everything the client writes is recorded, and
 * the test decides what the window manager sends back.
 */
export class MockSocket extends EventEmitter {
  public destroyed = false;
  public readonly written: Buffer[] = [];
  public writeError: Error | null = null;
  public responder: MockResponder | null = null;

  write(data: Uint8Array, callback: (error?: Error | null) => void): boolean {
    const bytes = Buffer.from(data);
    process.nextTick(() => {
      if (this.destroyed) {
        callback(new Error("Socket destroyed"));
        return;
      }
      if (this.writeError) {
        callback(this.writeError);
        return;
      }
      this.written.push(bytes);
      callback();

      const responder = this.responder;
      const { frame } = decodeFrame(bytes);
      if (responder && frame) {
        responder(frame, this);
      }
    });
    return true;
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    process.nextTick(() => this.emit("close", false));
  }

  // Helper methods for testing

  simulateConnect(): void {
    process.nextTick(() => this.emit("connect"));
  }

  simulateError(error: Error): void {
    this.emit("error", error);
  }

  simulateData(data: Uint8Array): void {
    this.emit("data", Buffer.from(data));
  }

  /** Sends one encoded frame to the client. */
  pushFrame(kind: number, payload: string | Uint8Array = ""): void {
    this.simulateData(encodeFrame(kind, payload));
  }

  /** The peer closes the connection. */
  simulateClose(): void {
    this.destroyed = true;
    this.emit("close", false);
  }

  /** Frames written by the client so far. */
  writtenFrames(): Frame[] {
    return this.written.flatMap((bytes) => {
      const { frame } = decodeFrame(bytes);
      return frame ? [frame] : [];
    });
  }
}

// ============================================================================
// Socket Factories
// ============================================================================

export interface MockSocketFactoryOptions {
  /** Fail the connection attempt with this error */
  readonly connectError?: Error;
  /** Never report "connect" */
  readonly hang?: boolean;
  /** Installed as the responder of every socket created */
  readonly responder?: MockResponder;
}

/**
 * Creates a socket factory that hands out auto-connecting mock sockets and
 * remembers the paths it was asked for.
 */
export function createMockSocketFactory(options: MockSocketFactoryOptions = {}): {
  readonly factory: SocketFactory;
  readonly sockets: MockSocket[];
  readonly paths: string[];
} {
  const sockets: MockSocket[] = [];
  const paths: string[] = [];

  const factory: SocketFactory = (path) => {
    const socket = new MockSocket();
    socket.responder = options.responder ?? null;
    sockets.push(socket);
    paths.push(path);

    const { connectError } = options;
    if (connectError) {
      process.nextTick(() => socket.simulateError(connectError));
    } else if (!options.hang) {
      socket.simulateConnect();
    }
    return socket;
  };

  return { factory, sockets, paths };
}

/** Error shaped like the one `net.connect` reports for a missing socket file. */
export function createErrnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: ${message}`);
  error.code = code;
  return error;
}

// ============================================================================
// Frame Helpers
// ============================================================================

/** Payload of a frame as text. */
export function payloadText(frame: Frame): string {
  return frame.payload.toString("utf8");
}

/** Splits `data` into chunks at the given offsets. */
export function splitAt(data: Buffer, ...offsets: number[]): Buffer[] {
  const chunks: Buffer[] = [];
  let start = 0;
  for (const offset of offsets) {
    chunks.push(data.subarray(start, offset));
    start = offset;
  }
  chunks.push(data.subarray(start));
  return chunks;
}

/** Lets queued `process.nextTick` callbacks and microtasks run. */
export async function flushAsync(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/** Waits until `predicate` holds, polling between event-loop turns. */
export async function waitFor(predicate: () => boolean, rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    if (predicate()) {
      return;
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error("Condition not met");
}
