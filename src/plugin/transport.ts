/**
 * Line Transports
 * The runtime reads calls and writes replies through a Transport, so the
 * protocol runs the same over a process's stdio and over in-memory buffers.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

export interface Transport {
  /** Incoming lines without their terminator; ends when the input closes */
  lines(): AsyncIterable<string>;
  /** Resolves once `line` has been handed to the underlying stream */
  write(line: string): Promise<void>;
}

/**
 * Transport over a pair of Node streams (stdin/stdout in production)
 */
export class StreamTransport implements Transport {
  constructor(
    private readonly input: Readable,
    private readonly output: Writable
  ) {}

  lines(): AsyncIterable<string> {
    return createInterface({ input: this.input, crlfDelay: Infinity });
  }

  write(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(line, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * In-memory transport. Lines given to the constructor or pushed with `send`
 * are delivered in order; `close` ends the input. Everything written is kept
 * in `written`.
 */
export class MemoryTransport implements Transport {
  readonly written: string[] = [];
  private readonly queue: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;
  private readonly listeners: Array<(line: string) => void> = [];

  constructor(lines: string[] = []) {
    this.queue.push(...lines);
  }

  send(line: string): void {
    if (this.closed) {
      throw new Error("Transport input is closed");
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(line);
    } else {
      this.queue.push(line);
    }
  }

  close(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }

  /**
   * Called with every line written
   */
  onWrite(listener: (line: string) => void): void {
    this.listeners.push(listener);
  }

  async *lines(): AsyncIterable<string> {
    while (true) {
      const next = this.queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) {
        return;
      }
      const line = await new Promise<string | null>((resolve) => {
        this.waiting = resolve;
      });
      if (line === null) {
        return;
      }
      yield line;
    }
  }

  async write(line: string): Promise<void> {
    this.written.push(line);
    for (const listener of this.listeners) {
      listener(line);
    }
  }
}
