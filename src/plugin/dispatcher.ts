/**
 * Method Dispatcher
 * Routes a decoded call to the matching hook and turns every outcome into
 * exactly one reply. Nothing thrown by a hook escapes this boundary.
 */

import { z } from "zod";
import {
  FailureKind,
  createFailureResponse,
  createSuccessResponse,
  fail,
  succeed,
  type Outcome,
  type RPCRequest,
  type RPCResponse,
} from "@shared/rpc.ts";
import {
  ProxyRequestSchema,
  ProxyResponseSchema,
  RPCMethod,
  encodedParam,
  type RPCMethodName,
} from "@shared/protocol.ts";
import type { Logger } from "@shared/logger.ts";
import type { HookContext, PluginDefinition } from "./define.ts";
import type { PluginSession } from "./session.ts";
import { finalizeRequest, finalizeResponse } from "./pipeline.ts";

const ConfigParamSchema = z
  .record(z.unknown())
  .nullable()
  .transform((value) => value ?? {});

/**
 * Parameter schema of every method. The tuple length is the required arity;
 * extra trailing params are ignored.
 */
export const METHOD_PARAMS = {
  [RPCMethod.GET_INFO]: z.tuple([]).rest(z.unknown()),
  [RPCMethod.INIT]: z.tuple([ConfigParamSchema]).rest(z.unknown()),
  [RPCMethod.ON_REQUEST]: z.tuple([encodedParam(ProxyRequestSchema)]).rest(z.unknown()),
  [RPCMethod.ON_RESPONSE]: z
    .tuple([encodedParam(ProxyRequestSchema), encodedParam(ProxyResponseSchema)])
    .rest(z.unknown()),
  [RPCMethod.ON_CACHE_HIT]: z
    .tuple([encodedParam(ProxyRequestSchema), encodedParam(ProxyResponseSchema)])
    .rest(z.unknown()),
  [RPCMethod.SHUTDOWN]: z.tuple([]).rest(z.unknown()),
} as const;

export function isMethodName(method: string): method is RPCMethodName {
  return Object.prototype.hasOwnProperty.call(METHOD_PARAMS, method);
}

/**
 * Required number of params for a method
 */
export function arityOf(method: RPCMethodName): number {
  return METHOD_PARAMS[method].items.length;
}

function parseParams<S extends z.ZodTypeAny>(
  method: RPCMethodName,
  schema: S,
  params: unknown[]
): Outcome<z.output<S>> {
  const required = arityOf(method);
  if (params.length < required) {
    return fail(
      FailureKind.INVALID_PARAMS,
      `Invalid params for ${method}: expected ${required}, got ${params.length}`
    );
  }

  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at params.${issue.path.join(".")}` : "";
    return fail(
      FailureKind.INVALID_PARAMS,
      `Invalid params for ${method}${where}: ${issue ? issue.message : "invalid"}`
    );
  }
  return succeed(parsed.data);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface DispatchContext<TConfig> {
  plugin: PluginDefinition<TConfig>;
  session: PluginSession<TConfig>;
  logger: Logger;
}

/**
 * Run one call against the session and return its outcome
 */
export async function dispatch<TConfig>(
  ctx: DispatchContext<TConfig>,
  request: RPCRequest
): Promise<Outcome<unknown>> {
  try {
    return await route(ctx, request);
  } catch (error) {
    return fail(FailureKind.HANDLER_ERROR, describe(error));
  }
}

async function route<TConfig>(
  { plugin, session, logger }: DispatchContext<TConfig>,
  request: RPCRequest
): Promise<Outcome<unknown>> {
  const { method, params } = request;

  if (!isMethodName(method)) {
    return fail(FailureKind.METHOD_NOT_FOUND, `Method not found: ${method}`);
  }

  const hookContext = (config: TConfig): HookContext<TConfig> => ({ config, logger });

  switch (method) {
    case RPCMethod.GET_INFO: {
      const parsed = parseParams(method, METHOD_PARAMS[method], params);
      if (!parsed.ok) return parsed;
      return succeed(session.info());
    }

    case RPCMethod.INIT: {
      if (session.getState() === "terminated") {
        return fail(FailureKind.STATE_ERROR, "already shut down");
      }
      const parsed = parseParams(method, METHOD_PARAMS[method], params);
      if (!parsed.ok) return parsed;

      const [rawConfig] = parsed.value;
      const config = plugin.configSchema.safeParse(rawConfig);
      if (!config.success) {
        const issue = config.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
        return fail(
          FailureKind.INVALID_PARAMS,
          `Invalid config${where}: ${issue ? issue.message : "invalid"}`
        );
      }

      // The session keeps its previous state unless onInit accepts the config
      if (plugin.onInit) {
        await plugin.onInit(hookContext(config.data));
      }
      const initialized = session.init(config.data);
      if (!initialized.ok) return initialized;

      logger.debug(`initialized with keys: ${Object.keys(rawConfig).join(", ") || "(none)"}`);
      return succeed({ status: "ok" });
    }

    case RPCMethod.ON_REQUEST: {
      const ready = session.requireReady();
      if (!ready.ok) return ready;
      const parsed = parseParams(method, METHOD_PARAMS[method], params);
      if (!parsed.ok) return parsed;

      const [proxyRequest] = parsed.value;
      logger.hook(method, `${proxyRequest.method} ${proxyRequest.endpoint}`);
      const decision = plugin.onRequest
        ? await plugin.onRequest(proxyRequest, hookContext(ready.value))
        : undefined;
      return finalizeRequest(proxyRequest, decision);
    }

    case RPCMethod.ON_RESPONSE:
    case RPCMethod.ON_CACHE_HIT: {
      const ready = session.requireReady();
      if (!ready.ok) return ready;
      const parsed = parseParams(method, METHOD_PARAMS[method], params);
      if (!parsed.ok) return parsed;

      const [proxyRequest, proxyResponse] = parsed.value;
      logger.hook(method, `${proxyRequest.endpoint} status=${proxyResponse.status_code}`);
      const hook = method === RPCMethod.ON_RESPONSE ? plugin.onResponse : plugin.onCacheHit;
      const output = hook
        ? await hook.call(plugin, proxyRequest, proxyResponse, hookContext(ready.value))
        : undefined;
      return finalizeResponse(proxyResponse, output);
    }

    case RPCMethod.SHUTDOWN: {
      const parsed = parseParams(method, METHOD_PARAMS[method], params);
      if (!parsed.ok) return parsed;

      const terminated = session.shutdown();
      if (!terminated.ok) return terminated;
      if (plugin.onShutdown) {
        await plugin.onShutdown({ config: terminated.value, logger });
      }
      return succeed({ status: "ok" });
    }
  }
}

/**
 * Pair an outcome with the call's id
 */
export function toResponse(request: RPCRequest, outcome: Outcome<unknown>): RPCResponse {
  const id = request.id ?? null;
  return outcome.ok ? createSuccessResponse(id, outcome.value) : createFailureResponse(id, outcome.failure);
}
