/**
 * Message kinds of the i3/sway IPC protocol.
 *
 * Request kinds are small integers, each naming one RPC operation. Event kinds
 * have the high bit set (`0x80000000 + n`) and name one subscribable category.
 * Frames carry the kind as a plain `number`, so values this enum does not know
 * about (sent by newer window-manager releases) pass through untouched.
 *
 * @see {@link https://man.archlinux.org/man/sway-ipc.7.en} - sway-ipc(7)
 */

/** High bit shared by every event kind. */
export const EVENT_KIND_OFFSET = 0x80000000;

/** Largest value the 32-bit kind field can carry. */
export const MAX_KIND = 0xffffffff;

/**
 * Known message kinds.
 *
 * Event kinds are written as literals: `0x80000000 | n` would overflow into a
 * negative 32-bit integer in JavaScript.
 */
export enum MessageType {
  RunCommand = 0,
  GetWorkspaces = 1,
  Subscribe = 2,
  GetOutputs = 3,
  GetTree = 4,
  GetMarks = 5,
  GetBarConfig = 6,
  GetVersion = 7,
  GetBindingModes = 8,
  GetConfig = 9,
  SendTick = 10,
  Sync = 11,
  GetBindingState = 12,
  GetInputs = 100,
  GetSeats = 101,

  WorkspaceEvent = 0x80000000,
  ModeEvent = 0x80000002,
  WindowEvent = 0x80000003,
  BarConfigUpdateEvent = 0x80000004,
  BindingEvent = 0x80000005,
  ShutdownEvent = 0x80000006,
  TickEvent = 0x80000007,
  BarStateUpdateEvent = 0x80000014,
  InputEvent = 0x80000015,
}

/** Event names as the `SUBSCRIBE` request spells them. */
export type EventType =
  | "workspace"
  | "mode"
  | "window"
  | "barconfig_update"
  | "binding"
  | "shutdown"
  | "tick"
  | "bar_state_update"
  | "input";

const EVENT_NAMES = new Map<number, EventType>([
  [MessageType.WorkspaceEvent, "workspace"],
  [MessageType.ModeEvent, "mode"],
  [MessageType.WindowEvent, "window"],
  [MessageType.BarConfigUpdateEvent, "barconfig_update"],
  [MessageType.BindingEvent, "binding"],
  [MessageType.ShutdownEvent, "shutdown"],
  [MessageType.TickEvent, "tick"],
  [MessageType.BarStateUpdateEvent, "bar_state_update"],
  [MessageType.InputEvent, "input"],
]);

const EVENT_KINDS = new Map<EventType, number>(
  Array.from(EVENT_NAMES, ([kind, name]) => [name, kind])
);

/** Every event name known to this library, in kind order. */
export const ALL_EVENT_TYPES: readonly EventType[] = Array.from(EVENT_NAMES.values());

/** True for kinds in the event range, known or not. */
export function isEventKind(kind: number): boolean {
  return Number.isInteger(kind) && kind >= EVENT_KIND_OFFSET && kind <= MAX_KIND;
}

/** Subscription name of an event kind, or `undefined` when the kind is unknown. */
export function eventName(kind: number): EventType | undefined {
  return EVENT_NAMES.get(kind);
}

/** Event kind for a subscription name. */
export function eventKindFromName(name: EventType): number {
  const kind = EVENT_KINDS.get(name);
  if (kind === undefined) {
    throw new RangeError(`Unknown event type: ${name}`);
  }
  return kind;
}

/**
 * Human readable label for a kind, used in error messages.
 *
 * @example
 * ```typescript
 * describeKind(MessageType.GetTree); // "GetTree (4)"
 * describeKind(0x80000042); // "event 0x80000042"
 * ```
 */
export function describeKind(kind: number): string {
  const known = MessageType[kind];
  if (known !== undefined) {
    return `${known} (${isEventKind(kind) ? `0x${kind.toString(16)}` : kind})`;
  }
  return isEventKind(kind) ? `event 0x${kind.toString(16)}` : `kind ${kind}`;
}

/** `change` values of window events. */
export type WindowChange =
  | "new"
  | "close"
  | "focus"
  | "title"
  | "fullscreen_mode"
  | "move"
  | "floating"
  | "urgent"
  | "mark";

/** `change` values of workspace events. */
export type WorkspaceChange = "init" | "empty" | "focus" | "move" | "rename" | "urgent" | "reload";
