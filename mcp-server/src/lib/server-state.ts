/**
 * Process-wide readiness flag. Set once the transport is up and read
 * by the HTTP layer to turn away requests that arrive earlier.
 */

type ServerState = { readyAt: Date; status: "ready" } | { status: "booting" };

let state: ServerState = { status: "booting" };

/**
 * Returns the current server state.
 */
export function getServerState(): ServerState {
  return state;
}

export function isServerReady(): boolean {
  return state.status === "ready";
}

/**
 * Marks the server ready. Later calls keep the first timestamp.
 */
export function setServerReady(): void {
  if (state.status === "ready") {
    return;
  }
  state = { readyAt: new Date(), status: "ready" };
}

/**
 * Resets the server state to "booting" for test isolation.
 * @internal
 */
export function _resetServerStateForTesting(): void {
  state = { status: "booting" };
}
