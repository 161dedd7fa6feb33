/**
 * Body representation helpers.
 * A body is carried as a string; `body_encoding: "base64"` marks binary
 * payload. Rewrites keep whatever representation the host sent.
 */

import type { BodyEncoding } from "./protocol.ts";

interface HasBody {
  body: string;
  body_encoding?: BodyEncoding;
}

export function isBinaryBody(message: HasBody): boolean {
  return message.body_encoding === "base64";
}

/**
 * Decode the body to text
 */
export function readBodyText(message: HasBody): string {
  if (isBinaryBody(message)) {
    return Buffer.from(message.body, "base64").toString("utf-8");
  }
  return message.body;
}

/**
 * Return a copy of `message` whose body holds `text`, in the same
 * representation as the original body
 */
export function withBodyText<T extends HasBody>(message: T, text: string): T {
  const body = isBinaryBody(message) ? Buffer.from(text, "utf-8").toString("base64") : text;
  return { ...message, body };
}

/**
 * Parse the body as a JSON object. Returns null when the body is empty,
 * not JSON, or not an object.
 */
export function readJsonBody(message: HasBody): Record<string, unknown> | null {
  const text = readBodyText(message);
  if (text.trim() === "") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return null;
  } catch {
    return null;
  }
}

export function withJsonBody<T extends HasBody>(message: T, value: unknown): T {
  return withBodyText(message, JSON.stringify(value));
}

/**
 * Size of the payload in bytes
 */
export function bodySize(message: HasBody): number {
  return isBinaryBody(message)
    ? Buffer.from(message.body, "base64").length
    : Buffer.byteLength(message.body, "utf-8");
}
