/**
 * @settle/cli — Command-line program.
 *
 *   settle <transactions.csv>
 *
 * Prints the final account CSV on stdout. Logs and errors go to stderr.
 * Resolves with the process exit code instead of exiting, so the whole
 * program can run inside a test.
 */

import type { Writable } from "node:stream";
import { Command, CommanderError } from "commander";
import type { Logger } from "pino";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { run } from "./run.js";

export const VERSION = "0.1.0";

export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** Input could not be read, output could not be written, or bad config */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export interface CliIo {
  readonly stdout: Writable;
  readonly stderr: Writable;
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined> | undefined;
  /** Replaces the logger built from config. */
  readonly logger?: Logger | undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the program with the arguments that follow the executable name.
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<ExitCode> {
  const program = new Command()
    .name("settle")
    .description("Settle a stream of client transactions and print final account balances")
    .version(VERSION)
    .argument("<transactions>", "CSV file with type,client,tx,amount records")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });

  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS;
    }
    throw err;
  }

  const [inputPath] = program.args;
  if (inputPath === undefined) {
    return ExitCodes.INVALID_ARGS;
  }

  try {
    const config = loadConfig(io.env ?? process.env);
    const logger = io.logger ?? createLogger(config);
    await run(inputPath, io.stdout, { logger, capacity: config.CHANNEL_CAPACITY });
    return ExitCodes.SUCCESS;
  } catch (err: unknown) {
    io.stderr.write(`Error: ${describeError(err)}\n`);
    return ExitCodes.GENERAL_ERROR;
  }
}
