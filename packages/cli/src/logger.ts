/**
 * @settle/cli — Logger.
 *
 * stdout carries the account CSV, so every log line goes to stderr.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CliConfig } from "./config.js";

const STDERR_FD = 2;

export function createLogger(config: Pick<CliConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR_FD } },
    });
  }

  return pino(
    { level: config.LOG_LEVEL },
    pino.destination({ dest: STDERR_FD, sync: true }),
  );
}
