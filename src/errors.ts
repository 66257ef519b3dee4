/**
 * Error taxonomy for the IPC client.
 *
 * Every failure raised by the codec, the transport, the subscription stream
 * or the dispatcher is an {@link IpcError} carrying a stable `code`, so callers
 * can branch on `error.code` or on `instanceof`.
 */

/**
 * Base IPC error.
 * Provides structured error information for protocol and socket failures.
 */
export class IpcError extends Error {
  public readonly code: string;
  public readonly socketPath?: string;

  constructor(message: string, code: string, socketPath?: string) {
    super(message);
    this.name = "IpcError";
    this.code = code;
    if (socketPath !== undefined) {
      this.socketPath = socketPath;
    }
  }
}

/**
 * Payload (or kind) cannot be framed.
 * Local and not retryable: the caller has to change what it sends.
 */
export class EncodingError extends IpcError {
  constructor(message: string) {
    super(message, "ENCODING_ERROR");
    this.name = "EncodingError";
  }
}

/**
 * The magic marker did not match.
 * Byte alignment is lost; the connection must be discarded.
 */
export class ProtocolError extends IpcError {
  constructor(message: string, socketPath?: string) {
    super(message, "PROTOCOL_ERROR", socketPath);
    this.name = "ProtocolError";
  }
}

/**
 * The connection could not be established.
 */
export class ConnectionError extends IpcError {
  constructor(message: string, code = "CONNECTION_FAILED", socketPath?: string) {
    super(message, code, socketPath);
    this.name = "ConnectionError";
  }
}

/**
 * The connection was closed, by the peer or locally, while a frame was awaited.
 */
export class ConnectionClosedError extends IpcError {
  constructor(socketPath?: string, message = "Connection closed") {
    super(message, "CONNECTION_CLOSED", socketPath);
    this.name = "ConnectionClosedError";
  }
}

/**
 * A read or write failed for a reason other than a clean close.
 */
export class IOError extends IpcError {
  constructor(message: string, socketPath?: string) {
    super(message, "IO_ERROR", socketPath);
    this.name = "IOError";
  }
}

/**
 * No frame arrived before the read timeout. The connection stays usable.
 */
export class TimeoutError extends IpcError {
  public readonly timeout: number;

  constructor(timeout: number, socketPath?: string) {
    super(`No frame received within ${timeout}ms`, "READ_TIMEOUT", socketPath);
    this.name = "TimeoutError";
    this.timeout = timeout;
  }
}

/**
 * The window manager refused a SUBSCRIBE request.
 */
export class SubscriptionError extends IpcError {
  public readonly events: readonly string[];

  constructor(events: readonly string[], socketPath?: string) {
    super(`Subscription rejected for events: ${events.join(", ")}`, "SUBSCRIBE_REJECTED", socketPath);
    this.name = "SubscriptionError";
    this.events = events;
  }
}

/**
 * An operation was called in a dispatcher state that does not allow it.
 */
export class DispatcherError extends IpcError {
  constructor(message: string) {
    super(message, "DISPATCHER_STATE");
    this.name = "DispatcherError";
  }
}
