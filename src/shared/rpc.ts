/**
 * JSON-RPC 2.0 Protocol Types
 * Shared between the plugin runtime and the daemon-side host
 */

/**
 * A numeric id JavaScript numbers cannot hold exactly (beyond 2^53, or
 * written as `1.0`, `1e3`). Its source text is echoed back unchanged.
 */
export class RawNumericId {
  constructor(readonly raw: string) {}

  toString(): string {
    return this.raw;
  }
}

export type RPCId = string | number | null | RawNumericId;

export interface RPCRequest {
  jsonrpc: "2.0";
  method: string;
  params: unknown[];
  /** Absent id marks a notification */
  id?: RPCId;
}

export interface RPCError {
  code: number;
  message: string;
  data?: unknown;
}

export type RPCResponse =
  | { jsonrpc: "2.0"; result: unknown; id: RPCId }
  | { jsonrpc: "2.0"; error: RPCError; id: RPCId };

/**
 * Error codes.
 * Every plugin-side failure is reported with PLUGIN_ERROR so a minimal host
 * only has to recognise one code; the failure kind travels in `data.kind`.
 */
export const RPCErrorCode = {
  PLUGIN_ERROR: -32000,
} as const;

/**
 * Failure kinds a plugin can report
 */
export const FailureKind = {
  PARSE_ERROR: "ParseError",
  VERSION_ERROR: "VersionError",
  METHOD_NOT_FOUND: "MethodNotFound",
  INVALID_PARAMS: "InvalidParams",
  STATE_ERROR: "StateError",
  HANDLER_ERROR: "HandlerError",
} as const;

export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind];

export interface Failure {
  kind: FailureKind;
  message: string;
}

export function createRequest(
  method: string,
  params: unknown[] = [],
  id: RPCId = Date.now()
): RPCRequest {
  return {
    jsonrpc: "2.0",
    method,
    params,
    id,
  };
}

export function createSuccessResponse(id: RPCId, result: unknown): RPCResponse {
  return {
    jsonrpc: "2.0",
    result,
    id,
  };
}

export function createErrorResponse(
  id: RPCId,
  code: number,
  message: string,
  data?: unknown
): RPCResponse {
  const error: RPCError = data === undefined ? { code, message } : { code, message, data };
  return {
    jsonrpc: "2.0",
    error,
    id,
  };
}

/**
 * Build the reply for a plugin-side failure
 */
export function createFailureResponse(id: RPCId, failure: Failure): RPCResponse {
  return createErrorResponse(id, RPCErrorCode.PLUGIN_ERROR, failure.message, {
    kind: failure.kind,
  });
}

export function isErrorResponse(
  response: RPCResponse
): response is { jsonrpc: "2.0"; error: RPCError; id: RPCId } {
  return "error" in response;
}

/**
 * Explicit success/failure value used by each decode and dispatch stage
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, failure: { kind, message } };
}
