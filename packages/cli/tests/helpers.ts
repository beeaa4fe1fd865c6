/**
 * Shared helpers for the CLI tests.
 */

import { fileURLToPath } from "node:url";
import { Writable } from "node:stream";
import { pino } from "pino";
import type { Logger } from "pino";

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export interface CapturedStream {
  readonly stream: Writable;
  text(): string;
}

/** A Writable that keeps everything written to it. */
export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, done) {
      chunks.push(chunk.toString("utf8"));
      done();
    },
  });
  return { stream, text: () => chunks.join("") };
}

/** A Writable whose every write fails with `message`. */
export function failingStream(message: string): Writable {
  return new Writable({
    write(_chunk: Buffer, _encoding, done) {
      done(new Error(message));
    },
  });
}

export interface CapturedLogger {
  readonly logger: Logger;
  /** Parsed log records, oldest first. */
  entries(): Record<string, unknown>[];
}

/** A pino logger that keeps its JSON lines in memory. */
export function captureLogger(level = "info"): CapturedLogger {
  const lines: string[] = [];
  const logger = pino({ level }, {
    write(line: string) {
      lines.push(line);
    },
  });
  return {
    logger,
    entries: () => lines.map((line) => parseLogLine(line)),
  };
}

function parseLogLine(line: string): Record<string, unknown> {
  const value: unknown = JSON.parse(line);
  if (typeof value !== "object" || value === null) {
    throw new Error(`Log line is not an object: ${line}`);
  }
  return { ...value };
}

export const silentLogger = (): Logger => pino({ level: "silent" });
