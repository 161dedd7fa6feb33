/**
 * Custom Router Plugin
 * Sends requests whose endpoint matches a configured glob to another API
 * and answers the exchange with that API's response, bypassing upstream
 * and cache.
 *
 * Example config:
 *   { "routes": { "/v1/custom/*": "https://my-api.example.com" } }
 */

import { z } from "zod";
import { minimatch } from "minimatch";
import { configSchema, definePlugin } from "@plugin/define.ts";
import { proceed, shortCircuit, withMetadata } from "@plugin/pipeline.ts";
import { isBinaryBody } from "@shared/body.ts";
import type { ProxyRequest, ProxyResponse } from "@shared/protocol.ts";

export const CustomRouterConfigSchema = configSchema({
  routes: z.record(z.string().url()).default({}),
  timeout_ms: z.number().int().positive().default(10000),
});

type FetchLike = typeof fetch;

// Headers fetch computes itself or refuses to forward
const SKIPPED_HEADERS = new Set(["host", "content-length", "connection", "transfer-encoding"]);

const TEXT_CONTENT_TYPE = /^(text\/|application\/(json|xml|javascript|x-www-form-urlencoded)|[^;]*\+(json|xml))/i;

/**
 * Literal part of a glob before its first wildcard
 */
export function staticPrefix(pattern: string): string {
  const index = pattern.search(/[*?[{]/);
  return index === -1 ? pattern : pattern.slice(0, index);
}

/**
 * Glob a route pattern is matched with. A trailing "/*" takes the rest of
 * the path, nested segments included.
 */
function routeGlob(pattern: string): string {
  return pattern.endsWith("/*") ? `${pattern}*` : pattern;
}

/**
 * First route whose pattern matches the endpoint, in configuration order
 */
export function findRoute(
  routes: Record<string, string>,
  endpoint: string
): { pattern: string; baseUrl: string } | null {
  for (const [pattern, baseUrl] of Object.entries(routes)) {
    if (pattern === endpoint || minimatch(endpoint, routeGlob(pattern))) {
      return { pattern, baseUrl };
    }
  }
  return null;
}

/**
 * Target URL: the base URL followed by the part of the endpoint the
 * pattern's literal prefix does not cover
 */
export function targetUrl(pattern: string, baseUrl: string, endpoint: string): string {
  const prefix = pattern === endpoint ? endpoint : staticPrefix(pattern);
  const rest = endpoint.slice(prefix.length).replace(/^\/+/, "");
  const base = baseUrl.replace(/\/+$/, "");
  return rest ? `${base}/${rest}` : base;
}

function forwardHeaders(headers: Record<string, string>): Record<string, string> {
  const forwarded: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!SKIPPED_HEADERS.has(name.toLowerCase())) {
      forwarded[name] = value;
    }
  }
  return forwarded;
}

function requestBody(request: ProxyRequest): string | Buffer | undefined {
  const method = request.method.toUpperCase();
  if (method === "GET" || method === "HEAD" || request.body === "") {
    return undefined;
  }
  return isBinaryBody(request) ? Buffer.from(request.body, "base64") : request.body;
}

async function toProxyResponse(response: Response): Promise<ProxyResponse> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });

  const bytes = Buffer.from(await response.arrayBuffer());
  const contentType = response.headers.get("content-type") ?? "";
  const isText = contentType === "" || TEXT_CONTENT_TYPE.test(contentType);

  return {
    status_code: response.status,
    headers,
    body: isText ? bytes.toString("utf-8") : bytes.toString("base64"),
    ...(isText ? {} : { body_encoding: "base64" as const }),
    metadata: {},
  };
}

export function createCustomRouter(options: { fetch?: FetchLike } = {}) {
  const fetchImpl: FetchLike = options.fetch ?? fetch;

  return definePlugin({
    name: "custom_router",
    version: "1.0.0",
    configSchema: CustomRouterConfigSchema,

    onInit({ config, logger }) {
      for (const [pattern, baseUrl] of Object.entries(config.routes)) {
        logger.info(`Registered route: ${pattern} -> ${baseUrl}`);
      }
    },

    async onRequest(request, { config, logger }) {
      const route = findRoute(config.routes, request.endpoint);
      if (!route) {
        return proceed(request);
      }

      const url = targetUrl(route.pattern, route.baseUrl, request.endpoint);
      logger.info(`Routing ${request.endpoint} to custom API: ${url}`);

      const upstream = await fetchImpl(url, {
        method: request.method,
        headers: forwardHeaders(request.headers),
        body: requestBody(request),
        signal: AbortSignal.timeout(config.timeout_ms),
      });
      const response = await toProxyResponse(upstream);

      const routed = withMetadata(request, {
        routed: "true",
        custom_status: String(response.status_code),
      });
      return shortCircuit(routed, withMetadata(response, { custom_api: "true" }));
    },

    onShutdown({ logger }) {
      logger.info("Shutting down");
    },
  });
}

export const customRouter = createCustomRouter();
