/**
 * @settle/cli — Account CSV writer.
 *
 * The header is always written, even when there are no accounts.
 */

import type { Writable } from "node:stream";
import type { AccountSnapshot } from "@settle/types";
import { formatAmount } from "@settle/ledger";

export const ACCOUNT_CSV_HEADER = "client,available,held,total,locked";

export function formatAccountRow(account: AccountSnapshot): string {
  return [
    String(account.clientId),
    formatAmount(account.available),
    formatAmount(account.held),
    formatAmount(account.total),
    String(account.locked),
  ].join(",");
}

export function formatAccountsCsv(accounts: readonly AccountSnapshot[]): string {
  const lines = [ACCOUNT_CSV_HEADER, ...accounts.map(formatAccountRow)];
  return `${lines.join("\n")}\n`;
}

/**
 * Write the account CSV, resolving once the stream has accepted it.
 * Rejects if the write fails; the stream's own `error` event for that
 * failure is consumed here.
 */
export function writeAccountsCsv(
  accounts: readonly AccountSnapshot[],
  output: Writable,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };
    output.once("error", onError);

    output.write(formatAccountsCsv(accounts), (err) => {
      if (err) {
        // The matching `error` event follows; onError stays attached for it.
        reject(err);
        return;
      }
      output.off("error", onError);
      resolve();
    });
  });
}
