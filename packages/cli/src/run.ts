/**
 * @settle/cli — Run a transactions file through the engine.
 *
 * Reads the CSV as a stream into a PaymentsEngine, then writes the final
 * account CSV. Malformed records and refused transactions are logged at
 * warn and never stop the run. Failing to read the input or write the
 * output rejects.
 */

import type { Writable } from "node:stream";
import type { Logger } from "pino";
import { PaymentsEngine } from "@settle/engine";
import type { EngineResult } from "@settle/engine";
import type { Rejection } from "@settle/ledger";
import { readTransactionFile } from "./csv-reader.js";
import type { MalformedRecord } from "./csv-reader.js";
import { writeAccountsCsv } from "./csv-writer.js";

export interface RunOptions {
  readonly logger: Logger;
  /** Engine channel capacity. */
  readonly capacity?: number | undefined;
}

export async function run(
  inputPath: string,
  output: Writable,
  options: RunOptions,
): Promise<EngineResult> {
  const { logger } = options;

  const source = readTransactionFile(inputPath, {
    onMalformed: (record: MalformedRecord) => {
      logger.warn({ line: record.line, reason: record.reason }, "Skipping malformed record");
    },
  });

  const result = await PaymentsEngine.process(source, {
    capacity: options.capacity,
    onReject: (rejection: Rejection) => {
      const { transaction } = rejection;
      logger.warn(
        {
          code: rejection.code,
          kind: transaction.kind,
          clientId: transaction.clientId,
          transactionId: transaction.transactionId,
        },
        rejection.message,
      );
    },
    onError: (err: unknown) => {
      logger.error({ err }, "Rejection handler failed");
    },
  });

  logger.info({ accounts: result.accounts.length, ...result.stats }, "Processing complete");

  await writeAccountsCsv(result.accounts, output);
  return result;
}
