/**
 * @settle/cli — Transaction CSV reader.
 *
 * Streams `type,client,tx,amount` records into typed transactions.
 * Fields are trimmed and the type is case-insensitive. A dispute,
 * resolve or chargeback row may leave out the amount column; any
 * amount it carries is ignored.
 *
 * Records that cannot be turned into a transaction are reported through
 * `onMalformed` and skipped. Failing to read the input is fatal and
 * surfaces as a rejection from the iterator.
 */

import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { parse } from "csv-parse";
import type { CsvError } from "csv-parse";
import { z } from "zod";
import type { Amount, Transaction } from "@settle/types";
import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  isClaimKind,
  isClientId,
  isTransactionId,
} from "@settle/types";
import { LedgerError, parseAmount } from "@settle/ledger";

// =============================================================================
// Types
// =============================================================================

export interface MalformedRecord {
  /** Input line the record ended on. */
  readonly line: number;
  readonly reason: string;
}

export interface ReadTransactionsOptions {
  readonly onMalformed?: ((record: MalformedRecord) => void) | undefined;
}

// =============================================================================
// Record schema
// =============================================================================

/** Unsigned integer text, range-checked by the matching domain guard. */
const idField = <T extends number>(isId: (value: unknown) => value is T, max: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .transform(Number)
    .pipe(z.number().refine(isId, `must be at most ${String(max)}`));

const TransactionRecordSchema = z
  .object({
    type: z
      .string()
      .transform((type) => type.toLowerCase())
      .pipe(z.enum(["deposit", "withdrawal", "dispute", "resolve", "chargeback"])),
    client: idField(isClientId, MAX_CLIENT_ID),
    tx: idField(isTransactionId, MAX_TRANSACTION_ID),
    amount: z.string().optional(),
  })
  .transform((record, ctx): Transaction => {
    if (isClaimKind(record.type)) {
      return { kind: record.type, clientId: record.client, transactionId: record.tx };
    }

    let amount: Amount | undefined;
    if (record.amount !== undefined && record.amount !== "") {
      try {
        amount = parseAmount(record.amount);
      } catch (err: unknown) {
        if (!(err instanceof LedgerError)) {
          throw err;
        }
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["amount"], message: err.message });
        return z.NEVER;
      }
    }

    return { kind: record.type, clientId: record.client, transactionId: record.tx, amount };
  });

/** csv-parse output with `info: true`. */
const ParsedRecordSchema = z.object({
  record: z.record(z.string(), z.string()),
  info: z.object({ lines: z.number() }),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Parse transactions from a CSV stream, in input order.
 */
export async function* readTransactions(
  input: Readable,
  options?: ReadTransactionsOptions,
): AsyncGenerator<Transaction> {
  const onMalformed = options?.onMalformed;
  const parser = parse({
    columns: true,
    trim: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    skip_records_with_error: true,
    info: true,
  });

  parser.on("skip", (err: CsvError) => {
    onMalformed?.({ line: parser.info.lines, reason: err.message });
  });
  input.once("error", (err: Error) => {
    parser.destroy(err);
  });
  input.pipe(parser);

  try {
    for await (const chunk of parser) {
      const parsed = ParsedRecordSchema.safeParse(chunk);
      if (!parsed.success) {
        onMalformed?.({ line: parser.info.lines, reason: describeIssues(parsed.error) });
        continue;
      }

      const { record, info } = parsed.data;
      const result = TransactionRecordSchema.safeParse(record);
      if (!result.success) {
        onMalformed?.({ line: info.lines, reason: describeIssues(result.error) });
        continue;
      }

      yield result.data;
    }
  } finally {
    input.destroy();
  }
}

/**
 * Parse transactions from a CSV file.
 */
export function readTransactionFile(
  path: string,
  options?: ReadTransactionsOptions,
): AsyncGenerator<Transaction> {
  return readTransactions(createReadStream(path), options);
}
