/**
 * Plugin Session
 * Lifecycle state and configuration of the one plugin a process hosts
 */

import { FailureKind, fail, succeed, type Outcome } from "@shared/rpc.ts";
import type { PluginInfo } from "@shared/protocol.ts";

export type SessionState = "uninitialized" | "ready" | "terminated";

export class PluginSession<TConfig> {
  readonly name: string;
  readonly version: string;
  private state: SessionState = "uninitialized";
  private config: TConfig | null = null;

  constructor(info: PluginInfo) {
    this.name = info.name;
    this.version = info.version;
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Effective configuration, null until the first init
   */
  getConfig(): TConfig | null {
    return this.config;
  }

  info(): PluginInfo {
    return { name: this.name, version: this.version };
  }

  /**
   * Move to ready. A repeated init replaces the previous configuration.
   */
  init(config: TConfig): Outcome<TConfig> {
    if (this.state === "terminated") {
      return fail(FailureKind.STATE_ERROR, "already shut down");
    }
    this.config = config;
    this.state = "ready";
    return succeed(config);
  }

  /**
   * Gate for the per-exchange hooks. Yields the configuration when ready.
   */
  requireReady(): Outcome<TConfig> {
    if (this.state === "terminated") {
      return fail(FailureKind.STATE_ERROR, "already shut down");
    }
    if (this.state !== "ready" || this.config === null) {
      return fail(FailureKind.STATE_ERROR, "not initialized");
    }
    return succeed(this.config);
  }

  /**
   * Move to terminated. Allowed from uninitialized so a host can shut down
   * a plugin it never managed to initialize.
   */
  shutdown(): Outcome<TConfig | null> {
    if (this.state === "terminated") {
      return fail(FailureKind.STATE_ERROR, "already shut down");
    }
    this.state = "terminated";
    return succeed(this.config);
  }
}
