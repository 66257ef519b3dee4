import { describe, expect, it } from "vitest";
import {
  ALL_EVENT_TYPES,
  EVENT_KIND_OFFSET,
  MessageType,
  describeKind,
  eventKindFromName,
  eventName,
  isEventKind,
} from "./message-types.js";

describe("message kinds", () => {
  it("should keep request kinds in the small range", () => {
    expect(MessageType.RunCommand).toBe(0);
    expect(MessageType.GetBindingState).toBe(12);
    expect(MessageType.GetInputs).toBe(100);
    expect(MessageType.GetSeats).toBe(101);
    expect(isEventKind(MessageType.GetSeats)).toBe(false);
  });

  it("should set the high bit on event kinds without going negative", () => {
    expect(MessageType.WorkspaceEvent).toBe(EVENT_KIND_OFFSET);
    expect(MessageType.InputEvent).toBe(2147483669);
    expect(isEventKind(MessageType.InputEvent)).toBe(true);
  });

  it("should treat unknown kinds in the event range as events", () => {
    expect(isEventKind(0x80000042)).toBe(true);
    expect(eventName(0x80000042)).toBeUndefined();
  });

  it("should map event kinds to subscription names and back", () => {
    expect(eventName(MessageType.WindowEvent)).toBe("window");
    expect(eventName(MessageType.BarConfigUpdateEvent)).toBe("barconfig_update");
    expect(eventKindFromName("bar_state_update")).toBe(0x80000014);

    for (const name of ALL_EVENT_TYPES) {
      expect(eventName(eventKindFromName(name))).toBe(name);
    }
  });

  it("should list every known event", () => {
    expect(ALL_EVENT_TYPES).toEqual([
      "workspace",
      "mode",
      "window",
      "barconfig_update",
      "binding",
      "shutdown",
      "tick",
      "bar_state_update",
      "input",
    ]);
  });

  it("should describe kinds for error messages", () => {
    expect(describeKind(MessageType.GetTree)).toBe("GetTree (4)");
    expect(describeKind(MessageType.WindowEvent)).toBe("WindowEvent (0x80000003)");
    expect(describeKind(0x80000042)).toBe("event 0x80000042");
    expect(describeKind(55)).toBe("kind 55");
  });
});
