/**
 * Typed client for the plugin hooks.
 * ProxyRequest/ProxyResponse travel as JSON text params; results are
 * validated before they reach the daemon.
 */

import type { z } from "zod";
import {
  OnRequestResultSchema,
  PluginInfoSchema,
  ProxyResponseSchema,
  RPCMethod,
  StatusResultSchema,
  type OnRequestResult,
  type PluginInfo,
  type ProxyRequest,
  type ProxyResponse,
} from "@shared/protocol.ts";
import { PluginCallError, type PluginCaller } from "./connection.ts";

export class PluginClient {
  constructor(private readonly caller: PluginCaller) {}

  private async invoke<S extends z.ZodTypeAny>(
    method: string,
    params: unknown[],
    schema: S
  ): Promise<z.output<S>> {
    const result = await this.caller.call(method, params);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PluginCallError(
        `${method} returned an invalid result: ${issue ? issue.message : "invalid"}`,
        method
      );
    }
    return parsed.data;
  }

  /**
   * Plugin name and version
   */
  async getInfo(): Promise<PluginInfo> {
    return this.invoke(RPCMethod.GET_INFO, [], PluginInfoSchema);
  }

  async init(config: Record<string, unknown>): Promise<void> {
    await this.invoke(RPCMethod.INIT, [config], StatusResultSchema);
  }

  async onRequest(request: ProxyRequest): Promise<OnRequestResult> {
    return this.invoke(RPCMethod.ON_REQUEST, [JSON.stringify(request)], OnRequestResultSchema);
  }

  async onResponse(request: ProxyRequest, response: ProxyResponse): Promise<ProxyResponse> {
    return this.invoke(
      RPCMethod.ON_RESPONSE,
      [JSON.stringify(request), JSON.stringify(response)],
      ProxyResponseSchema
    );
  }

  async onCacheHit(request: ProxyRequest, response: ProxyResponse): Promise<ProxyResponse> {
    return this.invoke(
      RPCMethod.ON_CACHE_HIT,
      [JSON.stringify(request), JSON.stringify(response)],
      ProxyResponseSchema
    );
  }

  async shutdown(): Promise<void> {
    await this.invoke(RPCMethod.SHUTDOWN, [], StatusResultSchema);
  }
}
