/**
 * Logger utility
 * Handles verbose mode, colors, and spinners.
 *
 * A plugin process owns stdout for the protocol, so a logger created with
 * `stream: "stderr"` routes every line to stderr.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import { format } from "node:util";

export type LogStream = "stdout" | "stderr";

export interface LoggerOptions {
  verbose?: boolean;
  /** Where info/success lines go; errors and warnings always use stderr */
  stream?: LogStream;
  /** Prefix added to every line, e.g. the plugin name */
  prefix?: string;
  /** Receives every line instead of the process streams */
  sink?: (line: string) => void;
}

export class Logger {
  private readonly verbose: boolean;
  private readonly stream: LogStream;
  private readonly prefix: string;
  private readonly sink: ((line: string) => void) | null;
  private spinner: Ora | null = null;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stream = options.stream ?? "stdout";
    this.prefix = options.prefix ? `[${options.prefix}] ` : "";
    this.sink = options.sink ?? null;
  }

  private out(line: string): void {
    if (this.sink) {
      this.sink(line);
      return;
    }
    const target = this.stream === "stderr" ? process.stderr : process.stdout;
    target.write(line + "\n");
  }

  private err(line: string): void {
    if (this.sink) {
      this.sink(line);
      return;
    }
    process.stderr.write(line + "\n");
  }

  /**
   * Log debug information (only in verbose mode)
   */
  debug(message: string): void {
    if (this.verbose) {
      this.out(chalk.gray(`[DEBUG] ${this.prefix}${message}`));
    }
  }

  /**
   * Log informational message
   */
  info(message: string): void {
    this.out(chalk.blue(`${this.prefix}${message}`));
  }

  /**
   * Log success message
   */
  success(message: string): void {
    this.out(chalk.green(`✓ ${this.prefix}${message}`));
  }

  /**
   * Log error message
   */
  error(message: string): void {
    this.err(chalk.red(`✗ ${this.prefix}${message}`));
  }

  /**
   * Log warning message
   */
  warn(message: string): void {
    this.err(chalk.yellow(`⚠ ${this.prefix}${message}`));
  }

  /**
   * Start a spinner with a message
   */
  startSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
    }

    if (!this.verbose && !this.sink) {
      this.spinner = ora({
        text: message,
        color: "cyan",
        stream: process.stderr,
      }).start();
    } else {
      // In verbose mode, just log the message
      this.info(message);
    }
  }

  /**
   * Stop spinner with success
   */
  succeedSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.verbose && message) {
      this.success(message);
    }
  }

  /**
   * Stop spinner with failure
   */
  failSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else if (message) {
      this.error(message);
    }
  }

  /**
   * Log a hook invocation (only in verbose mode)
   */
  hook(name: string, detail: string): void {
    if (this.verbose) {
      this.out(chalk.magenta(`[Hook] ${this.prefix}${name} ${detail}`));
    }
  }

  /**
   * Force log a message (ignores verbose mode), formatted like console.log
   */
  log(message: string, ...args: unknown[]): void {
    this.out(format(message, ...args));
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

/**
 * Initialize global logger
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
