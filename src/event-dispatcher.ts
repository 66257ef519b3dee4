/**
 * Event dispatch for i3/sway IPC subscriptions.
 *
 * An {@link EventDispatcher} owns one subscription connection, pulls event
 * records from it one at a time and routes each to the handlers registered for
 * its (event kind, change) pair. Handlers for one event run sequentially, in
 * registration order, before the next event is read. A failing handler is
 * reported and skipped; it never stops the loop.
 *
 * ```
 * idle ──start()──▶ running ──stop() / stream error──▶ stopped
 *   └──────────────────stop()──────────────────────────▲
 * ```
 */

import { EventEmitter } from "node:events";
import { DispatcherError } from "./errors.js";
import {
  ALL_EVENT_TYPES,
  type EventType,
  MessageType,
  type WindowChange,
  type WorkspaceChange,
  eventKindFromName,
  eventName,
} from "./message-types.js";
import { type EventStream, type SubscribeOptions, subscribe } from "./subscription.js";
import type { EventRecord } from "./types.js";
import { parsePayload, readChangeField } from "./validation.js";

// ============================================================================
// Types and Interfaces
// ============================================================================

/** Matches every change of an event kind, including events without one. */
export const ANY_CHANGE = "*";

/**
 * Dispatcher lifecycle state.
 */
export enum DispatcherState {
  Idle = "idle",
  Running = "running",
  Stopped = "stopped",
}

/**
 * An event as handed to handlers.
 */
export interface DispatchedEvent {
  /** Raw event kind */
  readonly kind: number;
  /** Subscription name, `undefined` for kinds this library does not know */
  readonly name: EventType | undefined;
  /** The body's `change` field, when it has one */
  readonly change: string | undefined;
  /** Raw event body */
  readonly body: Buffer;
  /** Parsed JSON body, `undefined` if the body is not JSON */
  readonly data: unknown;
}

/**
 * Event handler function. A returned promise is awaited before the next
 * handler runs.
 */
export type EventHandler = (event: DispatchedEvent) => void | Promise<void>;

/**
 * Decides whether a registration receives an event.
 */
export type HandlerPredicate = (kind: number, change: string | undefined) => boolean;

/**
 * Handle for a registered handler.
 */
export interface HandlerRegistration {
  readonly id: number;
  readonly predicate: HandlerPredicate;
  readonly handler: EventHandler;
  /** Removes the handler; events already being dispatched skip it too */
  readonly unregister: () => void;
  readonly isActive: () => boolean;
}

/**
 * Dispatcher configuration. Subscription and transport options are passed
 * through to the subscription connection.
 */
export interface EventDispatcherConfig extends SubscribeOptions {
  /** Events to subscribe to (default: every known event) */
  readonly events?: readonly EventType[];
}

/**
 * Dispatcher statistics.
 */
export interface DispatcherStats {
  readonly state: DispatcherState;
  readonly eventsReceived: number;
  readonly handlersInvoked: number;
  readonly handlerErrors: number;
  readonly registeredHandlers: number;
}

interface RegistrationEntry extends HandlerRegistration {
  active: boolean;
}

// ============================================================================
// Event Dispatcher Class
// ============================================================================

/**
 * Routes subscription events to registered handlers.
 *
 * Emits `stateChange(newState, oldState)`, `handlerError(error, event, registration)`,
 * `stopped(error | undefined)`, and `error(error)` when a loop started with
 * `startAsync()` fails.
 *
 * @example
 * ```typescript
 * const dispatcher = new EventDispatcher({ events: ["window"] });
 * dispatcher.onWindow("focus", (event) => {
 *   console.log("focused", event.data);
 * });
 * dispatcher.on("handlerError", (error) => console.error(error));
 * await dispatcher.start();
 * ```
 */
export class EventDispatcher extends EventEmitter {
  private readonly config: EventDispatcherConfig;
  private readonly registrations: RegistrationEntry[] = [];
  private state: DispatcherState = DispatcherState.Idle;
  private stream: EventStream | null = null;
  private opening: Promise<void> | null = null;
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  /** True while the loop is inside `dispatch` */
  private dispatching = false;
  private nextId = 1;
  private readonly stats = {
    eventsReceived: 0,
    handlersInvoked: 0,
    handlerErrors: 0,
  };

  constructor(config: EventDispatcherConfig = {}) {
    super();
    this.config = config;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Registers `handler` for one event kind and change.
   *
   * @param event - Event name or raw event kind
   * @param change - `change` value to match, or {@link ANY_CHANGE}
   */
  registerHandler(
    event: EventType | number,
    change: string,
    handler: EventHandler
  ): HandlerRegistration {
    const kind = typeof event === "number" ? event : eventKindFromName(event);
    const predicate: HandlerPredicate =
      change === ANY_CHANGE
        ? (eventKind) => eventKind === kind
        : (eventKind, eventChange) => eventKind === kind && eventChange === change;
    return this.addHandler(predicate, handler);
  }

  /**
   * Registers `handler` behind an arbitrary predicate.
   */
  addHandler(predicate: HandlerPredicate, handler: EventHandler): HandlerRegistration {
    const entry: RegistrationEntry = {
      id: this.nextId++,
      predicate,
      handler,
      active: true,
      unregister: () => this.removeRegistration(entry),
      isActive: () => entry.active,
    };
    this.registrations.push(entry);
    return entry;
  }

  /** Registers a window event handler. */
  onWindow(change: WindowChange | typeof ANY_CHANGE, handler: EventHandler): HandlerRegistration {
    return this.registerHandler(MessageType.WindowEvent, change, handler);
  }

  /** Registers a workspace event handler. */
  onWorkspace(
    change: WorkspaceChange | typeof ANY_CHANGE,
    handler: EventHandler
  ): HandlerRegistration {
    return this.registerHandler(MessageType.WorkspaceEvent, change, handler);
  }

  // ============================================================================
  // Dispatch
  // ============================================================================

  /**
   * Runs every matching handler for one event, in registration order.
   * Handler failures are reported through `handlerError` and never thrown.
   */
  async dispatch(record: EventRecord): Promise<void> {
    this.stats.eventsReceived++;

    const parsed = parsePayload(record.body);
    const data = parsed.success ? parsed.data : undefined;
    const event: DispatchedEvent = {
      kind: record.kind,
      name: eventName(record.kind),
      change: readChangeField(data),
      body: record.body,
      data,
    };

    // Snapshot: registrations added during dispatch apply from the next event
    for (const registration of [...this.registrations]) {
      if (!registration.active) {
        continue;
      }
      try {
        if (!registration.predicate(event.kind, event.change)) {
          continue;
        }
        this.stats.handlersInvoked++;
        await registration.handler(event);
      } catch (error) {
        this.stats.handlerErrors++;
        this.emit("handlerError", error, event, registration);
      }
    }
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Subscribes and runs the dispatch loop until it stops.
   *
   * @returns Resolves after `stop()`; rejects with the error that ended the loop
   * @throws {DispatcherError} When the dispatcher was already started
   */
  async start(): Promise<void> {
    await this.launch();
    return this.whenStopped();
  }

  /**
   * Subscribes and runs the dispatch loop in the background.
   * Resolves once the subscription is acknowledged. A loop failure is emitted
   * as `error` when someone listens for it; it is always reported through
   * `stopped` and `whenStopped()`.
   */
  async startAsync(): Promise<void> {
    await this.launch();
    this.whenStopped().catch((error: unknown) => {
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
    });
  }

  /**
   * Stops dispatching and closes the subscription connection. Handlers already
   * running for the current event finish first.
   *
   * While an event is being dispatched (for instance when a handler calls
   * `stop()`), it resolves once the connection is closed; the loop ends after
   * the remaining handlers for that event return. Await `whenStopped()` for
   * that point.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;

    if (this.state === DispatcherState.Idle) {
      this.setState(DispatcherState.Stopped);
      return;
    }

    if (this.opening) {
      await Promise.allSettled([this.opening]);
    }
    if (this.stream) {
      await this.stream.close();
    }
    if (this.dispatching) {
      // The loop is waiting on the handler that called us
      return;
    }
    if (this.loop) {
      await Promise.allSettled([this.loop]);
    }
  }

  /**
   * Settles when the loop ends: resolves after `stop()`, rejects with the
   * error that ended it otherwise.
   */
  whenStopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  getState(): DispatcherState {
    return this.state;
  }

  getStats(): DispatcherStats {
    return {
      ...this.stats,
      state: this.state,
      registeredHandlers: this.registrations.length,
    };
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private launch(): Promise<void> {
    if (this.state !== DispatcherState.Idle) {
      return Promise.reject(new DispatcherError(`Cannot start: dispatcher is ${this.state}`));
    }
    const opening = this.open().finally(() => {
      this.opening = null;
    });
    this.opening = opening;
    return opening;
  }

  private async open(): Promise<void> {
    this.setState(DispatcherState.Running);

    let stream: EventStream;
    try {
      stream = await subscribe(this.config.events ?? ALL_EVENT_TYPES, this.config);
    } catch (error) {
      this.setState(DispatcherState.Stopped);
      this.emit("stopped", error);
      throw error;
    }

    if (this.stopRequested) {
      await stream.close();
      this.setState(DispatcherState.Stopped);
      this.emit("stopped", undefined);
      return;
    }

    this.stream = stream;
    this.loop = this.run(stream);
  }

  private async run(stream: EventStream): Promise<void> {
    let failure: unknown;
    try {
      for await (const record of stream) {
        this.dispatching = true;
        try {
          await this.dispatch(record);
        } finally {
          this.dispatching = false;
        }
        if (this.stopRequested) {
          break;
        }
      }
    } catch (error) {
      failure = error;
      throw error;
    } finally {
      await stream.close();
      this.stream = null;
      this.setState(DispatcherState.Stopped);
      this.emit("stopped", failure);
    }
  }

  private removeRegistration(entry: RegistrationEntry): void {
    entry.active = false;
    const index = this.registrations.indexOf(entry);
    if (index >= 0) {
      this.registrations.splice(index, 1);
    }
  }

  private setState(newState: DispatcherState): void {
    const oldState = this.state;
    this.state = newState;
    if (oldState !== newState) {
      this.emit("stateChange", newState, oldState);
    }
  }
}
