/**
 * Account Types
 *
 * What the engine hands to output adapters once a run completes,
 * and the dispute lifecycle shared by the ledger and its consumers.
 */

import type { Amount, ClientId, TransferKind } from "./financial.js";

/**
 * Adjudication state of a disputed transaction.
 *
 * Lifecycle: (none) → disputed → resolved | chargedBack.
 * Both end states are terminal.
 */
export type DisputeState = "disputed" | "resolved" | "chargedBack";

/**
 * A settled transfer recorded in an account's ledger.
 * Only successfully applied deposits and withdrawals are recorded.
 */
export interface SettledTransfer {
  readonly kind: TransferKind;
  readonly amount: Amount;
}

/**
 * Final balances of one client account.
 *
 * Invariant: total === available + held.
 */
export interface AccountSnapshot {
  readonly clientId: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  readonly total: Amount;
  readonly locked: boolean;
}
