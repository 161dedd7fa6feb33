/**
 * Plugin Protocol Definitions
 * Defines the hook contract between the proxy daemon and a plugin process
 */

import { z } from "zod";

const StringMapSchema = z
  .record(z.string())
  .nullish()
  .transform((value) => value ?? {});

const BodySchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

/**
 * How a body string is to be read.
 * "text" (or absent) is UTF-8 text, "base64" is binary payload.
 */
export const BodyEncodingSchema = z.enum(["text", "base64"]);

export type BodyEncoding = z.infer<typeof BodyEncodingSchema>;

/**
 * Proxy Request
 * One client request as seen by a plugin
 */
export const ProxyRequestSchema = z.object({
  method: z.string().describe("HTTP method"),
  endpoint: z.string().describe("Request path, e.g. /v1/chat/completions"),
  headers: StringMapSchema.describe("Single-valued request headers"),
  body: BodySchema.describe("Request payload"),
  body_encoding: BodyEncodingSchema.optional(),
  metadata: StringMapSchema.describe("State carried to later hooks of the same exchange"),
});

export type ProxyRequest = z.infer<typeof ProxyRequestSchema>;

/**
 * Proxy Response
 * An upstream or cached response as seen by a plugin
 */
export const ProxyResponseSchema = z.object({
  status_code: z.number().int().describe("HTTP status code"),
  headers: StringMapSchema,
  body: BodySchema,
  body_encoding: BodyEncodingSchema.optional(),
  cached: z.boolean().optional().describe("Set by the host when served from cache"),
  metadata: StringMapSchema,
});

export type ProxyResponse = z.infer<typeof ProxyResponseSchema>;

/**
 * Accepts a value sent as JSON text (the wire form) or as an
 * already-structured object, and validates it against `schema`.
 */
export function encodedParam<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value, ctx) => {
    if (typeof value !== "string") {
      return value;
    }
    try {
      return JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected JSON text" });
      return z.NEVER;
    }
  }, schema);
}

/**
 * get_info result
 */
export const PluginInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PluginInfo = z.infer<typeof PluginInfoSchema>;

/**
 * init / shutdown result
 */
export const StatusResultSchema = z.object({
  status: z.literal("ok"),
});

export type StatusResult = z.infer<typeof StatusResultSchema>;

/**
 * on_request result.
 * With `continue: false` the plugin short-circuits the exchange and
 * `response` is the final outcome returned to the client.
 */
export const OnRequestResultSchema = z
  .object({
    request: ProxyRequestSchema,
    continue: z.boolean(),
    response: ProxyResponseSchema.optional(),
  })
  .refine((result) => result.continue || result.response !== undefined, {
    message: "a short-circuited request must carry a response",
    path: ["response"],
  });

export type OnRequestResult = z.infer<typeof OnRequestResultSchema>;

/**
 * RPC Method Names
 */
export const RPCMethod = {
  GET_INFO: "get_info",
  INIT: "init",
  ON_REQUEST: "on_request",
  ON_RESPONSE: "on_response",
  ON_CACHE_HIT: "on_cache_hit",
  SHUTDOWN: "shutdown",
} as const;

export type RPCMethodName = (typeof RPCMethod)[keyof typeof RPCMethod];
