/**
 * Request Logger Plugin
 */

import { z } from "zod";
import { configSchema, definePlugin } from "@plugin/define.ts";
import { proceed, withHeader, withMetadata } from "@plugin/pipeline.ts";
import { bodySize } from "@shared/body.ts";

export const RequestLoggerConfigSchema = configSchema({
  header_name: z.string().min(1).default("X-Plugin-Logger"),
  header_value: z.string().default("enabled"),
});

export function createRequestLogger(options: { now?: () => Date } = {}) {
  const now = options.now ?? (() => new Date());

  return definePlugin({
    name: "request_logger",
    version: "1.0.0",
    configSchema: RequestLoggerConfigSchema,

    onInit({ config, logger }) {
      logger.info(`Initialized (tag header: ${config.header_name})`);
    },

    onRequest(request, { config, logger }) {
      logger.info(`${request.method} Request to ${request.endpoint} at ${now().toISOString()}`);
      return proceed(withHeader(request, config.header_name, config.header_value));
    },

    onResponse(request, response, { logger }) {
      logger.info(
        `Response from ${request.endpoint}: status=${response.status_code}, size=${bodySize(response)} bytes`
      );
      return withMetadata(response, { logged_at: now().toISOString() });
    },

    onCacheHit(request, _response, { logger }) {
      logger.info(`Cache HIT for ${request.method} ${request.endpoint}`);
    },

    onShutdown({ logger }) {
      logger.info("Shutting down");
    },
  });
}

export const requestLogger = createRequestLogger();
