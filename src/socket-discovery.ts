/**
 * Socket path resolution for sway IPC communication.
 *
 * Resolution order:
 * 1. an explicit path passed by the caller
 * 2. the `SWAYSOCK` environment variable
 * 3. the `I3SOCK` environment variable
 * 4. the newest `sway-ipc.<uid>.<pid>.sock` in the runtime directory
 *
 * Resolution happens when a transport connects, never at import time.
 *
 * @see {@link https://man.archlinux.org/man/sway-ipc.7.en} - sway-ipc(7)
 */

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { ConnectionError } from "./errors.js";

// ============================================================================
// Constants
// ============================================================================

/** Environment variables naming the IPC socket, in priority order. */
export const SOCKET_ENV_VARS = ["SWAYSOCK", "I3SOCK"] as const;

/** `sway-ipc.<uid>.<pid>.sock`, as created by sway in its runtime directory. */
const SOCKET_FILENAME = /^sway-ipc\.(\d+)\.(\d+)\.sock$/;

// ============================================================================
// Types
// ============================================================================

/**
 * Inputs to socket resolution. Everything defaults to the current process.
 */
export interface SocketDiscoveryOptions {
  /** Explicit socket path; wins over everything else */
  readonly socketPath?: string;
  /** Environment to read, defaults to `process.env` */
  readonly env?: NodeJS.ProcessEnv;
  /** Runtime directory to scan, defaults to `XDG_RUNTIME_DIR` or `/run/user/<uid>` */
  readonly runtimeDir?: string;
  /** User id that must own the socket name, defaults to `process.getuid()` */
  readonly uid?: number;
}

// ============================================================================
// Runtime Directory Scan
// ============================================================================

function resolveRuntimeDir(options: SocketDiscoveryOptions, uid: number | undefined): string | undefined {
  if (options.runtimeDir !== undefined) {
    return options.runtimeDir;
  }
  const env = options.env ?? process.env;
  const xdg = env["XDG_RUNTIME_DIR"];
  if (xdg) {
    return xdg;
  }
  return uid === undefined ? undefined : `/run/user/${uid}`;
}

/**
 * Finds the socket sway created for `uid` in the runtime directory.
 * When several instances are running, the most recently modified socket wins.
 *
 * @returns Absolute socket path, or `undefined` if none was found
 */
export async function discoverDefaultSocket(
  options: SocketDiscoveryOptions = {}
): Promise<string | undefined> {
  const uid = options.uid ?? process.getuid?.();
  const runtimeDir = resolveRuntimeDir(options, uid);
  if (runtimeDir === undefined) {
    return undefined;
  }

  let entries: string[];
  try {
    entries = await readdir(runtimeDir);
  } catch {
    // Missing or unreadable runtime directory means no default socket
    return undefined;
  }

  let newest: { path: string; mtime: number } | undefined;
  for (const entry of entries) {
    const match = SOCKET_FILENAME.exec(entry);
    if (!match || (uid !== undefined && Number(match[1]) !== uid)) {
      continue;
    }

    const path = join(runtimeDir, entry);
    try {
      const stats = await stat(path);
      if (!newest || stats.mtimeMs > newest.mtime) {
        newest = { path, mtime: stats.mtimeMs };
      }
    } catch {
      // Socket vanished between readdir and stat
    }
  }

  return newest?.path;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Resolves the IPC socket path.
 *
 * @throws {ConnectionError} With code `NO_SOCKET_PATH` when nothing resolves
 *
 * @example
 * ```typescript
 * const path = await resolveSocketPath();
 * const explicit = await resolveSocketPath({ socketPath: "/tmp/sway.sock" });
 * ```
 */
export async function resolveSocketPath(options: SocketDiscoveryOptions = {}): Promise<string> {
  if (options.socketPath) {
    return options.socketPath;
  }

  const env = options.env ?? process.env;
  for (const name of SOCKET_ENV_VARS) {
    const value = env[name];
    if (value) {
      return value;
    }
  }

  const discovered = await discoverDefaultSocket(options);
  if (discovered !== undefined) {
    return discovered;
  }

  throw new ConnectionError(
    `No IPC socket found. Set ${SOCKET_ENV_VARS.join(" or ")}, or ensure sway is running.`,
    "NO_SOCKET_PATH"
  );
}
