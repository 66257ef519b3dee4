/**
 * Core type definitions shared by the codec, transport and dispatcher.
 */

// ============================================================================
// Wire Types
// ============================================================================

/** One complete framed message. */
export interface Frame {
  /** Raw message kind; unknown kinds are kept as-is */
  readonly kind: number;
  /** Opaque payload bytes, conventionally UTF-8 JSON */
  readonly payload: Buffer;
}

/** A frame received on a subscription connection. */
export interface EventRecord {
  /** Event kind (high bit set) */
  readonly kind: number;
  /** Raw event body */
  readonly body: Buffer;
}

// ============================================================================
// Request/Reply Types
// ============================================================================

/**
 * Reply handed to the caller of a request helper. Parsing `payload` into
 * window-manager objects is left to the caller.
 */
export interface CallResult {
  /** Kind of the reply frame */
  readonly kind: number;
  /** Whether the reply reports success (see `replySucceeded`) */
  readonly success: boolean;
  /** Reply payload, unmodified */
  readonly payload: Buffer;
}

// ============================================================================
// Validation Types
// ============================================================================

/** Outcome of parsing a payload */
export type ParseResult<T = unknown> =
  | { readonly success: true; readonly data: T; readonly error?: undefined }
  | { readonly success: false; readonly data?: undefined; readonly error: string };
