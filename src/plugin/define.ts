/**
 * Plugin definition API.
 * A plugin declares its identity, a configuration schema and the hooks it
 * implements; the runtime takes care of the wire protocol and lifecycle.
 */

import { z } from "zod";
import type { ProxyRequest, ProxyResponse } from "@shared/protocol.ts";
import type { Logger } from "@shared/logger.ts";
import type { RequestDecision } from "./pipeline.ts";

type MaybePromise<T> = T | Promise<T>;

export interface HookContext<TConfig> {
  config: TConfig;
  logger: Logger;
}

export interface ShutdownContext<TConfig> {
  /** Null when the plugin is shut down before any init */
  config: TConfig | null;
  logger: Logger;
}

export interface PluginDefinition<TConfig> {
  name: string;
  version: string;
  /** Validates the object sent with `init` */
  configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
  /** Runs after each successful init, with the new configuration */
  onInit?(ctx: HookContext<TConfig>): MaybePromise<void>;
  /** Returning nothing lets the request continue unchanged */
  onRequest?(request: ProxyRequest, ctx: HookContext<TConfig>): MaybePromise<RequestDecision | void>;
  /** Returning nothing leaves the response unchanged */
  onResponse?(
    request: ProxyRequest,
    response: ProxyResponse,
    ctx: HookContext<TConfig>
  ): MaybePromise<ProxyResponse | void>;
  onCacheHit?(
    request: ProxyRequest,
    response: ProxyResponse,
    ctx: HookContext<TConfig>
  ): MaybePromise<ProxyResponse | void>;
  onShutdown?(ctx: ShutdownContext<TConfig>): MaybePromise<void>;
}

export function definePlugin<TConfig>(definition: PluginDefinition<TConfig>): PluginDefinition<TConfig> {
  return definition;
}

/**
 * Build a configuration schema from the keys a plugin recognises.
 * Unrecognised keys are kept, untouched, under `extra`.
 */
export function configSchema<T extends z.ZodRawShape>(shape: T) {
  const known = z.object(shape);
  return z.record(z.unknown()).transform((raw, ctx) => {
    const parsed = known.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!(key in shape)) {
        extra[key] = value;
      }
    }
    return { ...parsed.data, extra };
  });
}

export type PluginConfigOf<S extends z.ZodTypeAny> = z.output<S>;
