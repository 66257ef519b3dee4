/**
 * Frame codec for the i3/sway IPC wire format.
 *
 * ```
 * offset  size    field
 * 0       6       magic "i3-ipc"
 * 6       4       payload length (u32 LE)
 * 10      4       message kind (u32 LE)
 * 14      length  payload
 * ```
 *
 * These functions are pure: the transport owns the received bytes and feeds
 * them to {@link decodeFrame}, which reports at most one frame per call.
 */

import { EncodingError, ProtocolError } from "./errors.js";
import { MAX_KIND } from "./message-types.js";
import type { Frame } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

/** Protocol magic marker that opens every frame. */
export const IPC_MAGIC = Buffer.from("i3-ipc", "ascii");

/** Magic, length and kind. */
export const HEADER_LENGTH = IPC_MAGIC.length + 8;

/** Largest payload the 32-bit length field can describe. */
export const MAX_PAYLOAD_LENGTH = 0xffffffff;

const LENGTH_OFFSET = IPC_MAGIC.length;
const KIND_OFFSET = LENGTH_OFFSET + 4;

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a decode attempt. `frame` is `null` while the buffer holds only
 * part of a frame (or nothing), in which case `consumed` is 0.
 */
export interface DecodeResult {
  readonly frame: Frame | null;
  readonly consumed: number;
}

const INCOMPLETE: DecodeResult = { frame: null, consumed: 0 };

// ============================================================================
// Encoding
// ============================================================================

/**
 * Serializes one frame.
 *
 * @param kind - Raw message kind, known or not
 * @param payload - Text (encoded as UTF-8) or bytes
 * @throws {EncodingError} When the payload or kind does not fit its 32-bit field
 *
 * @example
 * ```typescript
 * const bytes = encodeFrame(MessageType.RunCommand, "floating toggle");
 * ```
 */
export function encodeFrame(kind: number, payload: string | Uint8Array = ""): Buffer {
  if (!Number.isInteger(kind) || kind < 0 || kind > MAX_KIND) {
    throw new EncodingError(`Message kind ${kind} is not an unsigned 32-bit integer`);
  }

  const body = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  if (body.length > MAX_PAYLOAD_LENGTH) {
    throw new EncodingError(
      `Payload of ${body.length} bytes exceeds the maximum of ${MAX_PAYLOAD_LENGTH} bytes`
    );
  }

  const frame = Buffer.allocUnsafe(HEADER_LENGTH + body.length);
  IPC_MAGIC.copy(frame, 0);
  frame.writeUInt32LE(body.length, LENGTH_OFFSET);
  frame.writeUInt32LE(kind, KIND_OFFSET);
  frame.set(body, HEADER_LENGTH);
  return frame;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Extracts the first frame of `buffer`, if it is complete.
 *
 * The magic is checked against however many bytes are available, so a
 * corrupted stream fails as soon as its first bytes arrive instead of
 * waiting for a full header.
 *
 * @throws {ProtocolError} When the buffer does not start with the magic marker
 */
export function decodeFrame(buffer: Uint8Array): DecodeResult {
  const available = Math.min(buffer.length, IPC_MAGIC.length);
  for (let i = 0; i < available; i++) {
    if (buffer[i] !== IPC_MAGIC[i]) {
      throw new ProtocolError(
        `Frame does not start with the "i3-ipc" magic (mismatch at byte ${i})`
      );
    }
  }

  if (buffer.length < HEADER_LENGTH) {
    return INCOMPLETE;
  }

  const view = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.length);
  const length = view.readUInt32LE(LENGTH_OFFSET);
  const kind = view.readUInt32LE(KIND_OFFSET);
  const end = HEADER_LENGTH + length;

  if (end > view.length) {
    return INCOMPLETE;
  }

  return {
    frame: { kind, payload: Buffer.from(view.subarray(HEADER_LENGTH, end)) },
    consumed: end,
  };
}

/**
 * Total size of the frame at the head of `buffer`, header included, or
 * `undefined` until the whole header has arrived. The magic is not checked.
 */
export function readFrameLength(buffer: Uint8Array): number | undefined {
  if (buffer.length < HEADER_LENGTH) {
    return undefined;
  }
  const view = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.length);
  return HEADER_LENGTH + view.readUInt32LE(LENGTH_OFFSET);
}
