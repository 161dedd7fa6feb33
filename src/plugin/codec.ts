/**
 * Envelope Codec
 * One JSON-RPC message per line of UTF-8 text
 */

import {
  FailureKind,
  RawNumericId,
  type Failure,
  type RPCId,
  type RPCRequest,
  type RPCResponse,
} from "@shared/rpc.ts";
import { PROTOCOL } from "@shared/constants.ts";

export type DecodeResult =
  | { ok: true; request: RPCRequest }
  | { ok: false; failure: Failure; id: RPCId };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isId(value: unknown): value is RPCId {
  return value === null || typeof value === "string" || typeof value === "number";
}

const STRING_TOKEN = /"(?:[^"\\]|\\.)*"/y;
const MEMBER_SEPARATOR = /\s*:/y;
const ID_TOKEN = /\s*("(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|null)/y;

function matchAt(pattern: RegExp, line: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(line);
}

/**
 * Source text of the top-level "id" member's value. Members of nested
 * objects are skipped; scanning stops at an unterminated string.
 */
function scanIdToken(line: string): string | null {
  const open: string[] = [];
  let token: string | null = null;
  let index = 0;

  while (index < line.length) {
    const char = line[index];
    if (char === '"') {
      if (!matchAt(STRING_TOKEN, line, index)) {
        return token;
      }
      const key = line.slice(index, STRING_TOKEN.lastIndex);
      index = STRING_TOKEN.lastIndex;
      if (key !== '"id"' || open.length !== 1 || open[0] !== "{") {
        continue;
      }
      if (!matchAt(MEMBER_SEPARATOR, line, index)) {
        continue;
      }
      const value = matchAt(ID_TOKEN, line, MEMBER_SEPARATOR.lastIndex)?.[1];
      if (value !== undefined) {
        token = value;
        index = ID_TOKEN.lastIndex;
      }
      continue;
    }
    if (char === "{" || char === "[") {
      open.push(char);
    } else if (char === "}" || char === "]") {
      open.pop();
    }
    index++;
  }
  return token;
}

function idFromToken(token: string): RPCId {
  let value: unknown;
  try {
    value = JSON.parse(token);
  } catch {
    return null;
  }
  if (typeof value === "number" && JSON.stringify(value) !== token) {
    return new RawNumericId(token);
  }
  return isId(value) ? value : null;
}

/**
 * The id of a parsed message. A number that does not print back as written
 * is kept as its source text.
 */
function resolveId(value: unknown, line: string): RPCId {
  if (typeof value === "number") {
    const token = scanIdToken(line);
    return token !== null && token !== JSON.stringify(value) ? idFromToken(token) : value;
  }
  return isId(value) ? value : null;
}

/**
 * Recover the call id from a line, even when the line is not a valid message.
 * Returns null when no id can be recovered.
 */
export function extractId(line: string): RPCId {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    const token = scanIdToken(line);
    return token === null ? null : idFromToken(token);
  }
  return isRecord(parsed) ? resolveId(parsed.id, line) : null;
}

/**
 * Decode one line into a call
 */
export function decodeLine(line: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      failure: { kind: FailureKind.PARSE_ERROR, message: `Parse error: ${reason}` },
      id: extractId(line),
    };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      failure: { kind: FailureKind.PARSE_ERROR, message: "Parse error: message is not an object" },
      id: null,
    };
  }

  const id = resolveId(parsed.id, line);

  if ("jsonrpc" in parsed && parsed.jsonrpc !== PROTOCOL.JSONRPC_VERSION) {
    return {
      ok: false,
      failure: {
        kind: FailureKind.VERSION_ERROR,
        message: `Unsupported jsonrpc version: ${JSON.stringify(parsed.jsonrpc)}`,
      },
      id,
    };
  }

  if (typeof parsed.method !== "string") {
    return {
      ok: false,
      failure: { kind: FailureKind.PARSE_ERROR, message: "Parse error: method must be a string" },
      id,
    };
  }

  let params: unknown[] = [];
  if (parsed.params !== undefined && parsed.params !== null) {
    if (!Array.isArray(parsed.params)) {
      return {
        ok: false,
        failure: { kind: FailureKind.PARSE_ERROR, message: "Parse error: params must be an array" },
        id,
      };
    }
    params = parsed.params;
  }

  const request: RPCRequest = { jsonrpc: "2.0", method: parsed.method, params };
  if ("id" in parsed) {
    request.id = id;
  }
  return { ok: true, request };
}

/**
 * Serialize a message with its id as the last member, written as received
 */
function encodeMessage(message: RPCRequest | RPCResponse): string {
  const { id, ...rest } = message;
  const body = JSON.stringify(rest);
  if (id === undefined) {
    return body + PROTOCOL.LINE_TERMINATOR;
  }
  const idText = id instanceof RawNumericId ? id.raw : JSON.stringify(id);
  return `${body.slice(0, -1)},"id":${idText}}${PROTOCOL.LINE_TERMINATOR}`;
}

/**
 * Encode a reply as a single terminated line
 */
export function encodeResponse(response: RPCResponse): string {
  return encodeMessage(response);
}

/**
 * Encode a call as a single terminated line
 */
export function encodeRequest(request: RPCRequest): string {
  return encodeMessage(request);
}
