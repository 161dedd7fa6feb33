/**
 * OpenAI Adapter Plugin
 * Maps /v1/openai/* onto the OpenAI API: adds the bearer token, strips the
 * provider segment from the path and records token usage on the way back.
 */

import { z } from "zod";
import { configSchema, definePlugin, type PluginConfigOf } from "@plugin/define.ts";
import {
  proceed,
  rewriteEndpoint,
  withHeader,
  withMetadata,
} from "@plugin/pipeline.ts";
import { readBodyText, readJsonBody, withJsonBody } from "@shared/body.ts";
import { METADATA_KEYS } from "@shared/constants.ts";

export const OPENAI_PROVIDER = "openai";

export const OpenAIAdapterConfigSchema = configSchema({
  openai_api_key: z.string().default(""),
  default_model: z.string().default("gpt-3.5-turbo"),
  route_prefix: z.string().default("/v1/openai/"),
  upstream_prefix: z.string().default("/v1/"),
});

export type OpenAIAdapterConfig = PluginConfigOf<typeof OpenAIAdapterConfigSchema>;

export interface OpenAIAdapterOptions {
  now?: () => Date;
}

function compactDate(date: Date): string {
  const year = date.getUTCFullYear().toString();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}${month}${day}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function createOpenAIAdapter(options: OpenAIAdapterOptions = {}) {
  const now = options.now ?? (() => new Date());

  return definePlugin({
    name: "openai_adapter",
    version: "1.0.0",
    configSchema: OpenAIAdapterConfigSchema,

    onInit({ config, logger }) {
      logger.info(`Initialized OpenAI adapter (api key ${config.openai_api_key ? "set" : "not set"})`);
    },

    onRequest(request, { config, logger }) {
      if (!request.endpoint.startsWith(config.route_prefix)) {
        return proceed(request);
      }

      logger.info(`Processing OpenAI request to ${request.endpoint}`);

      let next = request;
      if (config.openai_api_key) {
        next = withHeader(next, "Authorization", `Bearer ${config.openai_api_key}`);
      }

      // /v1/openai/chat/completions -> /v1/chat/completions
      const rest = request.endpoint.slice(config.route_prefix.length);
      next = rewriteEndpoint(next, config.upstream_prefix + rest);
      next = withMetadata(next, { [METADATA_KEYS.PROVIDER]: OPENAI_PROVIDER });

      const body = readJsonBody(next);
      if (body) {
        if (!("model" in body)) {
          body.model = config.default_model;
        }
        if (body.user === undefined) {
          body.user = `proxyhook-${compactDate(now())}`;
        }
        next = withJsonBody(next, body);
        logger.debug(`Transformed request for model: ${String(body.model)}`);
      } else if (readBodyText(next).trim() !== "") {
        logger.warn("Could not parse request body as JSON");
      }

      return proceed(next);
    },

    onResponse(request, response, { logger }) {
      if (request.metadata[METADATA_KEYS.PROVIDER] !== OPENAI_PROVIDER) {
        return;
      }

      const body = readJsonBody(response);
      if (!body) {
        logger.warn("Could not parse response body as JSON");
        return;
      }

      const patch: Record<string, string> = {};
      if (isRecord(body.usage)) {
        const usage = body.usage;
        patch.tokens_used = String(usage.total_tokens ?? 0);
        patch.prompt_tokens = String(usage.prompt_tokens ?? 0);
        patch.completion_tokens = String(usage.completion_tokens ?? 0);
      }
      if (typeof body.model === "string") {
        patch.model = body.model;
      }

      logger.info(`Response processed: tokens=${patch.tokens_used ?? "unknown"}`);
      return withMetadata(response, patch);
    },

    onCacheHit(request, response, { logger }) {
      if (request.metadata[METADATA_KEYS.PROVIDER] !== OPENAI_PROVIDER) {
        return;
      }

      logger.info("Cache HIT for OpenAI request");
      return withMetadata(response, {
        [METADATA_KEYS.CACHED]: "true",
        cache_hit_at: now().toISOString(),
      });
    },

    onShutdown({ logger }) {
      logger.info("Shutting down OpenAI adapter");
    },
  });
}

export const openaiAdapter = createOpenAIAdapter();
