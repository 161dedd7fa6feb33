/**
 * Bundled plugins, servable with `proxyhook serve <name>`
 */

import { servePlugin } from "@plugin/runtime.ts";
import type { PluginDefinition } from "@plugin/define.ts";
import type { PluginInfo } from "@shared/protocol.ts";
import { openaiAdapter } from "./openai-adapter.ts";
import { requestLogger } from "./request-logger.ts";
import { customRouter } from "./custom-router.ts";

export interface BundledPlugin {
  info: PluginInfo;
  description: string;
  serve(): Promise<void>;
}

function bundle<TConfig>(plugin: PluginDefinition<TConfig>, description: string): BundledPlugin {
  return {
    info: { name: plugin.name, version: plugin.version },
    description,
    serve: () => servePlugin(plugin),
  };
}

export const BUNDLED_PLUGINS: readonly BundledPlugin[] = [
  bundle(openaiAdapter, "Adapts /v1/openai/* requests to the OpenAI API and records token usage"),
  bundle(requestLogger, "Logs every hook to stderr and tags requests with a header"),
  bundle(customRouter, "Answers matching endpoints from a custom API instead of upstream"),
];

export function findBundledPlugin(name: string): BundledPlugin | undefined {
  return BUNDLED_PLUGINS.find((plugin) => plugin.info.name === name);
}

export { createOpenAIAdapter, openaiAdapter } from "./openai-adapter.ts";
export { createRequestLogger, requestLogger } from "./request-logger.ts";
export { createCustomRouter, customRouter } from "./custom-router.ts";
