/**
 * Tagged stderr logging for the server and the diagnostics client.
 * Stdout is reserved for the stdio transport.
 */

/**
 * Structured log message emitted while running diagnostics.
 */
export interface ProgressMessage {
  data: string;
  level: "error" | "info" | "warn";
}

/**
 * Callback for receiving progress updates from diagnostics and transports.
 */
export type ProgressCallback = (message: ProgressMessage) => void;

/**
 * Creates a ProgressCallback that writes to stderr with a tagged prefix.
 */
export function createProgressLogger(tag: string): ProgressCallback {
  return (msg) => {
    console.error(`[${tag}] [${msg.level}] ${msg.data}`);
  };
}
