/**
 * sway IPC client
 * A TypeScript client for the i3/sway IPC protocol over Unix domain sockets
 */

// Export all type definitions
export * from "./types.js";

// Export message kinds and event names
export * from "./message-types.js";

// Export error taxonomy
export * from "./errors.js";

// Export frame codec
export * from "./framing.js";

// Export payload inspection utilities
export * from "./validation.js";

// Export socket path resolution
export * from "./socket-discovery.js";

// Export socket transport
export * from "./transport.js";

// Export concurrency utilities
export * from "./concurrency.js";

// Export request/reply client
export * from "./ipc-client.js";

// Export event subscriptions
export * from "./subscription.js";

// Export event dispatch
export * from "./event-dispatcher.js";
