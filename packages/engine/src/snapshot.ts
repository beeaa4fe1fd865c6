/**
 * @settle/engine — Snapshot assembly.
 *
 * Projects live accounts into the ordered, immutable view handed to
 * output adapters.
 */

import type { AccountSnapshot } from "@settle/types";
import type { ClientAccount } from "@settle/ledger";

/**
 * Snapshot every account, ascending by client ID.
 */
export function assembleSnapshot(accounts: Iterable<ClientAccount>): readonly AccountSnapshot[] {
  const snapshots: AccountSnapshot[] = [];
  for (const account of accounts) {
    snapshots.push(account.snapshot());
  }
  return snapshots.sort((a, b) => a.clientId - b.clientId);
}
