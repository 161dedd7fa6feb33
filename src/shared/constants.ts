/**
 * Proxyhook Constants
 */

/**
 * Wire Protocol
 */
export const PROTOCOL = {
  /** Envelope version every call and reply carries */
  JSONRPC_VERSION: "2.0",
  /** Messages are newline-delimited */
  LINE_TERMINATOR: "\n",
} as const;

/**
 * Reserved metadata keys shared by hooks of one exchange
 */
export const METADATA_KEYS = {
  /** Endpoint before the first rewrite */
  ORIGINAL_ENDPOINT: "original_endpoint",
  PROVIDER: "provider",
  CACHED: "cached",
} as const;

/**
 * Host Defaults
 */
export const HOST = {
  /** Per-call timeout in milliseconds */
  CALL_TIMEOUT_MS: 5000,
  /** Grace period between closing stdin and killing the plugin */
  KILL_GRACE_MS: 1000,
} as const;

/**
 * Environment detection
 * Set PROXYHOOK_VERBOSE=1 to enable debug logging in plugin processes
 */
export function isVerbose(): boolean {
  return process.env.PROXYHOOK_VERBOSE === "1";
}
