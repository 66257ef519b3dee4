/**
 * Runtime payload inspection utilities.
 * Only what the core needs is read here: the reply success flag and the
 * event `change` discriminator. Full payload parsing belongs to the caller.
 */

import type { ParseResult } from "./types.js";

// ============================================================================
// Utility Functions
// ============================================================================

/** Check if value is a non-null object */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check if value is a string */
function isString(value: unknown): value is string {
  return typeof value === "string";
}

/** Check if value is a boolean */
function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

/** Check if value is an object with a boolean `success` field */
function isResultObject(value: unknown): value is { readonly success: boolean } {
  return isObject(value) && isBoolean(value["success"]);
}

// ============================================================================
// Payload Parsing
// ============================================================================

/**
 * Parses a UTF-8 JSON payload without throwing.
 */
export function parsePayload(payload: Uint8Array): ParseResult {
  const text = Buffer.from(payload.buffer, payload.byteOffset, payload.length).toString("utf8");
  try {
    const data: unknown = JSON.parse(text);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Reads the `change` discriminator of an event body.
 * Returns `undefined` for bodies without one (tick, bar_state_update) and for
 * bodies that are not JSON objects.
 */
export function readChangeField(data: unknown): string | undefined {
  if (!isObject(data)) {
    return undefined;
  }
  const change = data["change"];
  return isString(change) ? change : undefined;
}

/**
 * Interprets a reply payload as a success indicator.
 *
 * - `{"success": false, ...}` fails
 * - an array of result objects (RUN_COMMAND) fails if any entry failed
 * - any other valid JSON reply succeeds
 * - a payload that is not JSON fails
 */
export function replySucceeded(payload: Uint8Array): boolean {
  const parsed = parsePayload(payload);
  if (!parsed.success) {
    return false;
  }

  const { data } = parsed;
  if (isResultObject(data)) {
    return data.success;
  }
  if (Array.isArray(data)) {
    return data.every((entry) => !isResultObject(entry) || entry.success);
  }
  return true;
}
