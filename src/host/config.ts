/**
 * Host configuration: which plugin executables to start and their configs
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { HOST } from "@shared/constants.ts";

export const PluginEntrySchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1).describe("Executable to spawn"),
  args: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  /** Sent to the plugin with init */
  config: z.record(z.unknown()).default({}),
  env: z.record(z.string()).optional().describe("Extra environment variables"),
});

export type PluginEntry = z.infer<typeof PluginEntrySchema>;

export const HostConfigSchema = z.object({
  enabled: z.boolean().default(true),
  call_timeout_ms: z.number().int().positive().default(HOST.CALL_TIMEOUT_MS),
  plugins: z.array(PluginEntrySchema).default([]),
});

export type HostConfig = z.infer<typeof HostConfigSchema>;

export class HostConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostConfigError";
  }
}

export function parseHostConfig(data: unknown): HostConfig {
  const parsed = HostConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new HostConfigError(`Invalid host config: ${where}${issue ? issue.message : "invalid"}`);
  }
  return parsed.data;
}

/**
 * Read and validate a JSON host configuration file
 */
export async function loadHostConfig(path: string): Promise<HostConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new HostConfigError(
      `Cannot read host config ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new HostConfigError(
      `Host config ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseHostConfig(data);
}
