/**
 * @settle/cli
 *
 * CSV front end for the payments engine.
 */

export { runCli, ExitCodes, VERSION } from "./cli.js";
export type { CliIo, ExitCode } from "./cli.js";
export { run } from "./run.js";
export type { RunOptions } from "./run.js";
export { readTransactions, readTransactionFile } from "./csv-reader.js";
export type { MalformedRecord, ReadTransactionsOptions } from "./csv-reader.js";
export {
  ACCOUNT_CSV_HEADER,
  formatAccountRow,
  formatAccountsCsv,
  writeAccountsCsv,
} from "./csv-writer.js";
export { ConfigSchema, loadConfig } from "./config.js";
export type { CliConfig } from "./config.js";
export { createLogger } from "./logger.js";
