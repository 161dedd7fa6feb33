/**
 * Plugin Process
 * Starts a plugin executable with its stdio wired to a PluginConnection
 */

import { spawn, type ChildProcess } from "node:child_process";
import { createInterface } from "node:readline";
import { HOST } from "@shared/constants.ts";
import { getLogger, type Logger } from "@shared/logger.ts";
import { PluginClient } from "./client.ts";
import { PluginConnection } from "./connection.ts";
import type { PluginEntry } from "./config.ts";

/**
 * A running plugin as the manager sees it
 */
export interface PluginHandle {
  name: string;
  client: PluginClient;
  /** Send shutdown, close the stream and make sure the process is gone */
  close(): Promise<void>;
}

export interface SpawnOptions {
  timeout?: number;
  logger?: Logger;
}

function waitForExit(child: ChildProcess, ms: number): Promise<boolean> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.off("exit", onExit);
      resolve(false);
    }, ms);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once("exit", onExit);
  });
}

export function spawnPlugin(entry: PluginEntry, options: SpawnOptions = {}): PluginHandle {
  const logger = options.logger ?? getLogger();

  const child = spawn(entry.command, entry.args, {
    stdio: ["pipe", "pipe", "pipe"],
    env: { ...process.env, ...entry.env },
  });

  if (!child.stdin || !child.stdout || !child.stderr) {
    throw new Error(`Failed to open stdio pipes for plugin ${entry.name}`);
  }

  child.on("error", (error) => {
    logger.error(`Plugin ${entry.name} failed to start: ${error.message}`);
  });

  // stdout carries the protocol; plugins log on stderr
  createInterface({ input: child.stderr, crlfDelay: Infinity }).on("line", (line) => {
    logger.log(`[Plugin ${entry.name} stderr] ${line}`);
  });

  const connection = new PluginConnection(child.stdin, child.stdout, {
    name: entry.name,
    timeout: options.timeout,
    logger,
  });
  const client = new PluginClient(connection);

  let closing: Promise<void> | null = null;
  const close = async (): Promise<void> => {
    if (connection.isConnected()) {
      try {
        await client.shutdown();
      } catch (error) {
        logger.debug(`Plugin ${entry.name} shutdown: ${error instanceof Error ? error.message : error}`);
      }
      await connection.close();
    }
    if (!(await waitForExit(child, HOST.KILL_GRACE_MS))) {
      child.kill("SIGKILL");
      await waitForExit(child, HOST.KILL_GRACE_MS);
    }
  };

  return {
    name: entry.name,
    client,
    close: () => {
      closing ??= close();
      return closing;
    },
  };
}
