/**
 * Test helpers: capture log lines, drive a runtime call by call and run a
 * plugin in process behind the same client the daemon uses.
 */

import { PassThrough } from "node:stream";
import { stripVTControlCharacters } from "node:util";
import { Logger } from "@shared/logger.ts";
import { isErrorResponse, type RPCError, type RPCResponse } from "@shared/rpc.ts";
import type { PluginDefinition } from "@plugin/define.ts";
import { PluginRuntime } from "@plugin/runtime.ts";
import { MemoryTransport, StreamTransport } from "@plugin/transport.ts";
import { PluginClient } from "@host/client.ts";
import { PluginConnection } from "@host/connection.ts";
import type { PluginHandle } from "@host/process.ts";

export interface CapturedLogger {
  logger: Logger;
  /** Every line logged, without color codes */
  lines: string[];
}

export function captureLogger(options: { verbose?: boolean; prefix?: string } = {}): CapturedLogger {
  const lines: string[] = [];
  const logger = new Logger({
    ...options,
    sink: (line) => {
      lines.push(stripVTControlCharacters(line));
    },
  });
  return { logger, lines };
}

/**
 * A runtime over an idle in-memory transport, for calling handleLine directly
 */
export function createRuntime<TConfig>(plugin: PluginDefinition<TConfig>): PluginRuntime<TConfig> & {
  lines: string[];
} {
  const { logger, lines } = captureLogger();
  return Object.assign(new PluginRuntime(plugin, new MemoryTransport(), { logger }), { lines });
}

export function callLine(method: string, params: unknown[] = [], id: string | number | null = 1): string {
  return JSON.stringify({ jsonrpc: "2.0", method, params, id });
}

/**
 * Send one call and return its reply
 */
export async function call<TConfig>(
  runtime: PluginRuntime<TConfig>,
  method: string,
  params: unknown[] = [],
  id: string | number | null = 1
): Promise<RPCResponse> {
  const reply = await runtime.handleLine(callLine(method, params, id));
  if (!reply) {
    throw new Error(`no reply to ${method}`);
  }
  return reply;
}

export function resultOf(reply: RPCResponse): unknown {
  if (isErrorResponse(reply)) {
    throw new Error(`expected a result, got error: ${reply.error.message}`);
  }
  return reply.result;
}

export function errorOf(reply: RPCResponse): RPCError {
  if (!isErrorResponse(reply)) {
    throw new Error("expected an error reply");
  }
  return reply.error;
}

export interface InProcessPlugin<TConfig> {
  handle: PluginHandle;
  runtime: PluginRuntime<TConfig>;
  /** Resolves when the runtime's read loop ends */
  done: Promise<void>;
}

/**
 * Run `plugin` in this process, connected to a host-side client through a
 * pair of in-memory pipes
 */
export function inProcessPlugin<TConfig>(
  plugin: PluginDefinition<TConfig>,
  options: { name?: string; timeout?: number; logger?: Logger } = {}
): InProcessPlugin<TConfig> {
  const logger = options.logger ?? captureLogger().logger;
  const toPlugin = new PassThrough();
  const fromPlugin = new PassThrough();

  const runtime = new PluginRuntime(plugin, new StreamTransport(toPlugin, fromPlugin), { logger });
  const done = runtime.run();

  const name = options.name ?? plugin.name;
  const connection = new PluginConnection(toPlugin, fromPlugin, {
    name,
    timeout: options.timeout ?? 1000,
    logger,
  });
  const client = new PluginClient(connection);

  let closing: Promise<void> | null = null;
  const close = async (): Promise<void> => {
    try {
      await client.shutdown();
    } catch (error) {
      logger.debug(`${name} shutdown: ${error instanceof Error ? error.message : String(error)}`);
    }
    await connection.close();
    await done;
    fromPlugin.end();
  };

  return {
    handle: {
      name,
      client,
      close: () => {
        closing ??= close();
        return closing;
      },
    },
    runtime,
    done,
  };
}
