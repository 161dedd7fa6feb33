/**
 * Plugin Runtime
 * Single-threaded read loop: one call in, one reply out, flushed before the
 * next call is read.
 */

import { createFailureResponse, type RPCResponse } from "@shared/rpc.ts";
import { Logger } from "@shared/logger.ts";
import { isVerbose } from "@shared/constants.ts";
import { decodeLine, encodeResponse } from "./codec.ts";
import { dispatch, toResponse } from "./dispatcher.ts";
import { PluginSession } from "./session.ts";
import { StreamTransport, type Transport } from "./transport.ts";
import type { PluginDefinition } from "./define.ts";

export interface RuntimeOptions {
  logger?: Logger;
}

export class PluginRuntime<TConfig> {
  readonly session: PluginSession<TConfig>;
  private readonly logger: Logger;

  constructor(
    private readonly plugin: PluginDefinition<TConfig>,
    private readonly transport: Transport,
    options: RuntimeOptions = {}
  ) {
    this.session = new PluginSession<TConfig>({ name: plugin.name, version: plugin.version });
    this.logger =
      options.logger ?? new Logger({ stream: "stderr", prefix: plugin.name, verbose: isVerbose() });
  }

  /**
   * Process one line. Returns the reply, or null when none is owed
   * (blank line or notification).
   */
  async handleLine(line: string): Promise<RPCResponse | null> {
    if (line.trim() === "") {
      return null;
    }

    const decoded = decodeLine(line);
    if (!decoded.ok) {
      this.logger.warn(`${decoded.failure.kind}: ${decoded.failure.message}`);
      return createFailureResponse(decoded.id, decoded.failure);
    }

    const { request } = decoded;
    const outcome = await dispatch(
      { plugin: this.plugin, session: this.session, logger: this.logger },
      request
    );
    if (!outcome.ok) {
      this.logger.warn(`${request.method} failed: ${outcome.failure.kind}: ${outcome.failure.message}`);
    }

    if (request.id === undefined) {
      return null;
    }
    return toResponse(request, outcome);
  }

  /**
   * Serve calls until the input ends
   */
  async run(): Promise<void> {
    this.logger.debug(`serving ${this.plugin.name} ${this.plugin.version}`);
    for await (const line of this.transport.lines()) {
      const reply = await this.handleLine(line);
      if (reply) {
        await this.transport.write(encodeResponse(reply));
      }
    }
    this.logger.debug(`input closed (state: ${this.session.getState()})`);
  }
}

/**
 * Serve a plugin over the current process's stdin/stdout
 */
export async function servePlugin<TConfig>(plugin: PluginDefinition<TConfig>): Promise<void> {
  const runtime = new PluginRuntime(plugin, new StreamTransport(process.stdin, process.stdout));
  await runtime.run();
}
