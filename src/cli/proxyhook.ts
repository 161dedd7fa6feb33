#!/usr/bin/env tsx
/**
 * Proxyhook CLI
 * Serve bundled plugins and exercise plugin executables from the host side
 */

import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import { BUNDLED_PLUGINS, findBundledPlugin } from "../plugins/index.ts";
import { initLogger } from "@shared/logger.ts";
import { HOST } from "@shared/constants.ts";
import type { ProxyRequest, ProxyResponse } from "@shared/protocol.ts";
import { loadHostConfig, PluginEntrySchema, type HostConfig } from "@host/config.ts";
import { spawnPlugin } from "@host/process.ts";
import { PluginManager } from "@host/manager.ts";

const program = new Command();

const JsonObjectSchema = z.record(z.unknown());

function parseJsonObject(text: string, what: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new Error(`${what} is not valid JSON`);
  }
  const parsed = JsonObjectSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`${what} must be a JSON object`);
  }
  return parsed.data;
}

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

program
  .name("proxyhook")
  .description("Out-of-process plugins for the API caching proxy")
  .version("0.1.0")
  .option("-v, --verbose", "Enable debug output");

/**
 * proxyhook serve <plugin>
 */
program
  .command("serve")
  .description("Serve a bundled plugin over stdin/stdout")
  .argument("<plugin>", "Bundled plugin name (see `proxyhook plugins`)")
  .action(async (name: string) => {
    const plugin = findBundledPlugin(name);
    if (!plugin) {
      fail(`Unknown plugin '${name}'. Available: ${BUNDLED_PLUGINS.map((p) => p.info.name).join(", ")}`);
    }
    if (program.opts().verbose) {
      process.env.PROXYHOOK_VERBOSE = "1";
    }
    await plugin.serve();
  });

/**
 * proxyhook plugins
 */
program
  .command("plugins")
  .description("List bundled plugins")
  .action(() => {
    console.log(chalk.bold("Bundled plugins:\n"));
    for (const plugin of BUNDLED_PLUGINS) {
      console.log(`  ${plugin.info.name.padEnd(16)} ${chalk.gray(plugin.info.version)}  ${plugin.description}`);
    }
  });

/**
 * proxyhook check <command> [args...]
 */
program
  .command("check")
  .description("Start a plugin executable and run get_info, init and shutdown against it")
  .argument("<command>", "Plugin executable")
  .argument("[args...]", "Arguments for the executable")
  .option("-c, --config <json>", "Configuration object sent with init", "{}")
  .option("-t, --timeout <ms>", "Per-call timeout in milliseconds", String(HOST.CALL_TIMEOUT_MS))
  .action(async (command: string, args: string[], options: { config: string; timeout: string }) => {
    const logger = initLogger({ verbose: Boolean(program.opts().verbose) });

    let config: Record<string, unknown>;
    try {
      config = parseJsonObject(options.config, "--config");
    } catch (error) {
      fail(error instanceof Error ? error.message : String(error));
    }

    const timeout = Number.parseInt(options.timeout, 10);
    if (!Number.isFinite(timeout) || timeout <= 0) {
      fail("--timeout must be a positive number");
    }

    const entry = PluginEntrySchema.parse({ name: command, command, args, config });
    const handle = spawnPlugin(entry, { timeout, logger });

    try {
      logger.startSpinner("Querying plugin info...");
      const info = await handle.client.getInfo();
      logger.succeedSpinner(`Plugin ${chalk.cyan(info.name)} ${info.version}`);

      logger.startSpinner("Initializing...");
      await handle.client.init(entry.config);
      logger.succeedSpinner("init ok");

      logger.startSpinner("Shutting down...");
      await handle.client.shutdown();
      logger.succeedSpinner("shutdown ok");
    } catch (error) {
      logger.failSpinner(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      await handle.close();
    }
  });

/**
 * proxyhook replay <config> <endpoint>
 */
program
  .command("replay")
  .description("Run one exchange through the plugins of a host config, against a stub upstream")
  .argument("<config>", "Host configuration file (JSON)")
  .argument("<endpoint>", "Request endpoint, e.g. /v1/openai/chat/completions")
  .option("-m, --method <method>", "Request method", "POST")
  .option("-b, --body <body>", "Request body", "")
  .option("-r, --response-body <body>", "Body the stub upstream answers with", "{}")
  .option("-s, --status <code>", "Status the stub upstream answers with", "200")
  .option("--cached", "Treat the stub response as a cache hit")
  .action(
    async (
      configPath: string,
      endpoint: string,
      options: { method: string; body: string; responseBody: string; status: string; cached?: boolean }
    ) => {
      const logger = initLogger({ verbose: Boolean(program.opts().verbose) });

      let hostConfig: HostConfig;
      try {
        hostConfig = await loadHostConfig(configPath);
      } catch (error) {
        fail(error instanceof Error ? error.message : String(error));
      }

      const manager = new PluginManager(hostConfig, { logger });
      try {
        const loaded = await manager.start();
        logger.info(`Loaded ${loaded.length} plugin(s): ${loaded.map((p) => p.name).join(", ") || "none"}`);

        const request: ProxyRequest = {
          method: options.method.toUpperCase(),
          endpoint,
          headers: { "Content-Type": "application/json" },
          body: options.body,
          metadata: {},
        };

        const decision = await manager.onRequest(request);
        console.log(chalk.bold("\nRequest after on_request:"));
        console.log(JSON.stringify(decision.request, null, 2));

        let response: ProxyResponse;
        if (!decision.continue && decision.response) {
          console.log(chalk.yellow("\nShort-circuited by a plugin"));
          response = decision.response;
        } else {
          const upstream: ProxyResponse = {
            status_code: Number.parseInt(options.status, 10),
            headers: { "Content-Type": "application/json" },
            body: options.responseBody,
            cached: Boolean(options.cached),
            metadata: {},
          };
          response = options.cached
            ? await manager.onCacheHit(decision.request, upstream)
            : await manager.onResponse(decision.request, upstream);
        }

        console.log(chalk.bold("\nResponse:"));
        console.log(JSON.stringify(response, null, 2));
      } finally {
        await manager.stop();
      }
    }
  );

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  fail(error instanceof Error ? error.message : String(error));
});
