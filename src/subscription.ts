/**
 * Event subscriptions.
 *
 * {@link subscribe} opens a dedicated connection, sends one SUBSCRIBE request
 * and hands back an {@link EventStream}: a single-use async iterable of event
 * records that lasts as long as the connection. The window manager only pushes
 * events on that connection afterwards, so it is never reused for requests.
 */

import { IpcError, ProtocolError, SubscriptionError } from "./errors.js";
import { type EventType, MessageType, describeKind, isEventKind } from "./message-types.js";
import { IpcTransport, type TransportConfig } from "./transport.js";
import type { EventRecord, Frame } from "./types.js";
import { replySucceeded } from "./validation.js";

/**
 * Subscription options. Transport options apply to the dedicated connection.
 */
export interface SubscribeOptions extends TransportConfig {
  /** How long to wait for the SUBSCRIBE acknowledgement, in milliseconds */
  readonly ackTimeout?: number;
}

/**
 * Unbounded sequence of events from one subscription connection.
 *
 * Iteration ends without error after {@link EventStream.close} (or a `break`
 * out of `for await`). If the window manager closes the connection the
 * iterator throws `ConnectionClosedError` once the buffered events are drained.
 *
 * @example
 * ```typescript
 * const stream = await subscribe(["window"]);
 * for await (const event of stream) {
 *   console.log(event.kind, event.body.toString());
 * }
 * ```
 */
export class EventStream implements AsyncIterable<EventRecord> {
  /** Event names this stream was subscribed to */
  public readonly events: readonly EventType[];

  private readonly transport: IpcTransport;
  private iterated = false;
  private closed = false;

  constructor(transport: IpcTransport, events: readonly EventType[]) {
    this.transport = transport;
    this.events = events;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<EventRecord, void, undefined> {
    if (this.iterated) {
      throw new IpcError(
        "An event stream can only be iterated once",
        "STREAM_CONSUMED",
        this.transport.getSocketPath()
      );
    }
    this.iterated = true;

    try {
      while (!this.closed) {
        let frame: Frame;
        try {
          frame = await this.transport.receiveFrame();
        } catch (error) {
          if (this.closed) {
            return;
          }
          throw error;
        }

        if (frame.kind === MessageType.Subscribe) {
          continue;
        }
        if (!isEventKind(frame.kind)) {
          throw new ProtocolError(
            `Unexpected ${describeKind(frame.kind)} frame on a subscription connection`,
            this.transport.getSocketPath()
          );
        }
        yield { kind: frame.kind, body: frame.payload };
      }
    } finally {
      await this.close();
    }
  }

  /**
   * Closes the underlying connection, releasing a pending read.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.transport.close();
  }

  /** Whether `close()` has been called. */
  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Subscribes to the given events on a new connection.
 *
 * @throws {ConnectionError} When the connection cannot be established
 * @throws {ProtocolError} When the acknowledgement is not a SUBSCRIBE reply
 * @throws {SubscriptionError} When the window manager rejects the subscription
 */
export async function subscribe(
  events: readonly EventType[],
  options: SubscribeOptions = {}
): Promise<EventStream> {
  if (events.length === 0) {
    throw new IpcError("Cannot subscribe to an empty list of events", "EMPTY_SUBSCRIPTION");
  }

  const transport = new IpcTransport(options);
  await transport.connect();

  try {
    await transport.sendFrame(MessageType.Subscribe, JSON.stringify(events));
    const ack = await transport.receiveFrame(
      options.ackTimeout !== undefined ? { timeout: options.ackTimeout } : {}
    );

    if (ack.kind !== MessageType.Subscribe) {
      throw new ProtocolError(
        `Expected a SUBSCRIBE acknowledgement, received ${describeKind(ack.kind)}`,
        transport.getSocketPath()
      );
    }
    if (!replySucceeded(ack.payload)) {
      throw new SubscriptionError(events, transport.getSocketPath());
    }
  } catch (error) {
    await transport.close();
    throw error;
  }

  return new EventStream(transport, events);
}
