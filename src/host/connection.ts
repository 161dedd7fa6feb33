/**
 * Plugin Connection
 * Daemon-side end of the line protocol. Calls are strictly lock-step: the
 * next call is written only after the previous one was answered or timed out.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { z } from "zod";
import { createRequest, type RPCError } from "@shared/rpc.ts";
import { HOST } from "@shared/constants.ts";
import { getLogger, type Logger } from "@shared/logger.ts";
import { encodeRequest } from "@plugin/codec.ts";

export interface PluginConnectionOptions {
  /** Label used in log lines and errors */
  name?: string;
  /** Per-call timeout in milliseconds */
  timeout?: number;
  logger?: Logger;
}

/**
 * Anything that can carry a call to a plugin
 */
export interface PluginCaller {
  call(method: string, params?: unknown[]): Promise<unknown>;
}

export class PluginCallError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly rpcError?: RPCError
  ) {
    super(message);
    this.name = "PluginCallError";
  }
}

const ReplySchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

interface PendingCall {
  id: number;
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
}

export class PluginConnection implements PluginCaller {
  private readonly name: string;
  private readonly timeout: number;
  private readonly logger: Logger;
  private requestId = 0;
  private pending: PendingCall | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly input: Writable,
    output: Readable,
    options: PluginConnectionOptions = {}
  ) {
    this.name = options.name ?? "plugin";
    this.timeout = options.timeout ?? HOST.CALL_TIMEOUT_MS;
    this.logger = options.logger ?? getLogger();

    const lines = createInterface({ input: output, crlfDelay: Infinity });
    lines.on("line", (line) => this.handleLine(line));
    lines.on("close", () => {
      this.closed = true;
      this.rejectPending(new Error(`${this.name} closed connection`));
    });
    // A plugin that closed its stdin or exited fails writes with EPIPE
    this.input.on("error", (error) => {
      this.closed = true;
      this.logger.warn(`${this.name}: input closed: ${error.message}`);
      this.rejectPending(new Error(`${this.name}: input closed: ${error.message}`));
    });
  }

  /**
   * Send a call and wait for its reply
   */
  call(method: string, params: unknown[] = []): Promise<unknown> {
    const run = () => this.send(method, params);
    const result = this.tail.then(run, run);
    this.tail = result.catch(() => undefined);
    return result;
  }

  private send(method: string, params: unknown[]): Promise<unknown> {
    if (!this.isConnected()) {
      return Promise.reject(new PluginCallError(`${this.name} is not connected`, method));
    }

    const id = ++this.requestId;
    const line = encodeRequest(createRequest(method, params, id));

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending?.id === id) {
          this.pending = null;
        }
        reject(new PluginCallError(`${this.name}: ${method} timed out after ${this.timeout}ms`, method));
      }, this.timeout);

      this.pending = {
        id,
        method,
        resolve: (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };

      this.input.write(line, (error) => {
        if (!error) {
          return;
        }
        this.closed = true;
        if (this.pending?.id === id) {
          const pending = this.pending;
          this.pending = null;
          pending.reject(new PluginCallError(`${this.name}: failed to write ${method}: ${error.message}`, method));
        }
      });
    });
  }

  private handleLine(line: string): void {
    if (line.trim() === "") {
      return;
    }

    let reply: z.infer<typeof ReplySchema>;
    try {
      const parsed = ReplySchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        this.logger.warn(`${this.name}: ignoring malformed reply: ${line}`);
        return;
      }
      reply = parsed.data;
    } catch {
      this.logger.warn(`${this.name}: ignoring non-JSON output: ${line}`);
      return;
    }

    const pending = this.pending;
    if (!pending) {
      this.logger.debug(`${this.name}: reply with no call in flight (id ${String(reply.id)})`);
      return;
    }
    // A reply without a usable id can only belong to the call in flight;
    // any other id is the late answer to a call that already timed out
    if (reply.id !== null && reply.id !== undefined && reply.id !== pending.id) {
      this.logger.debug(`${this.name}: discarding stale reply for id ${String(reply.id)}`);
      return;
    }

    this.pending = null;
    if (reply.error) {
      pending.reject(
        new PluginCallError(
          `${this.name}: ${pending.method} failed: ${reply.error.message} (code ${reply.error.code})`,
          pending.method,
          reply.error
        )
      );
    } else {
      pending.resolve(reply.result);
    }
  }

  private rejectPending(error: Error): void {
    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      pending.reject(new PluginCallError(error.message, pending.method));
    }
  }

  /**
   * Close the plugin's input. The plugin sees end of stream and exits.
   */
  async close(): Promise<void> {
    if (this.input.writableEnded || this.input.destroyed) {
      return;
    }
    return new Promise((resolve) => {
      this.input.end(() => resolve());
    });
  }

  isConnected(): boolean {
    return !this.closed && !this.input.writableEnded && !this.input.destroyed;
  }
}
