/**
 * Plugin Manager
 * Runs every configured plugin around one exchange. A plugin that fails a
 * call is skipped for that exchange: the value it was given passes on
 * unchanged and the client's API call goes ahead.
 */

import type { OnRequestResult, PluginInfo, ProxyRequest, ProxyResponse } from "@shared/protocol.ts";
import { getLogger, type Logger } from "@shared/logger.ts";
import type { HostConfig, PluginEntry } from "./config.ts";
import { spawnPlugin, type PluginHandle, type SpawnOptions } from "./process.ts";

export type PluginLauncher = (entry: PluginEntry, options: SpawnOptions) => PluginHandle;

export interface PluginManagerOptions {
  logger?: Logger;
  /** Starts one plugin; defaults to spawning its executable */
  launch?: PluginLauncher;
}

export interface LoadedPlugin {
  entry: PluginEntry;
  info: PluginInfo;
  handle: PluginHandle;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PluginManager {
  private readonly logger: Logger;
  private readonly launch: PluginLauncher;
  private plugins: LoadedPlugin[] = [];

  constructor(
    private readonly config: HostConfig,
    options: PluginManagerOptions = {}
  ) {
    this.logger = options.logger ?? getLogger();
    this.launch = options.launch ?? spawnPlugin;
  }

  /**
   * Start every enabled plugin and initialize it with its configuration.
   * A plugin that fails to start is logged and left out.
   */
  async start(): Promise<PluginInfo[]> {
    if (!this.config.enabled) {
      this.logger.debug("Plugins disabled");
      return [];
    }

    for (const entry of this.config.plugins) {
      if (!entry.enabled) {
        continue;
      }

      let handle: PluginHandle;
      try {
        handle = this.launch(entry, { timeout: this.config.call_timeout_ms, logger: this.logger });
      } catch (error) {
        this.logger.error(`Failed to start plugin ${entry.name}: ${describe(error)}`);
        continue;
      }

      try {
        const info = await handle.client.getInfo();
        await handle.client.init(entry.config);
        this.plugins.push({ entry, info, handle });
        this.logger.debug(`Loaded plugin ${info.name} ${info.version}`);
      } catch (error) {
        this.logger.error(`Failed to initialize plugin ${entry.name}: ${describe(error)}`);
        await handle.close();
      }
    }

    return this.plugins.map((plugin) => plugin.info);
  }

  loaded(): PluginInfo[] {
    return this.plugins.map((plugin) => plugin.info);
  }

  /**
   * Run on_request through the chain. The first plugin that declines to
   * continue ends the chain and supplies the response.
   */
  async onRequest(request: ProxyRequest): Promise<OnRequestResult> {
    let current = request;
    for (const plugin of this.plugins) {
      try {
        const result = await plugin.handle.client.onRequest(current);
        if (!result.continue) {
          this.logger.debug(`${plugin.info.name} short-circuited ${current.endpoint}`);
          return result;
        }
        current = result.request;
      } catch (error) {
        this.unavailable(plugin, error);
      }
    }
    return { request: current, continue: true };
  }

  async onResponse(request: ProxyRequest, response: ProxyResponse): Promise<ProxyResponse> {
    let current = response;
    for (const plugin of this.plugins) {
      try {
        current = await plugin.handle.client.onResponse(request, current);
      } catch (error) {
        this.unavailable(plugin, error);
      }
    }
    return current;
  }

  async onCacheHit(request: ProxyRequest, response: ProxyResponse): Promise<ProxyResponse> {
    let current = response;
    for (const plugin of this.plugins) {
      try {
        current = await plugin.handle.client.onCacheHit(request, current);
      } catch (error) {
        this.unavailable(plugin, error);
      }
    }
    return current;
  }

  /**
   * Shut every plugin down, in start order
   */
  async stop(): Promise<void> {
    const plugins = this.plugins;
    this.plugins = [];
    for (const plugin of plugins) {
      await plugin.handle.close();
    }
  }

  private unavailable(plugin: LoadedPlugin, error: unknown): void {
    this.logger.warn(`Plugin ${plugin.info.name} unavailable for this request: ${describe(error)}`);
  }
}
