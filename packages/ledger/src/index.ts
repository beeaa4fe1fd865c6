/**
 * @settle/ledger — Per-client settlement and dispute adjudication.
 *
 * A pure TypeScript account engine with zero runtime dependencies.
 * Enforces the account invariants:
 * - total = available + held after every operation
 * - Only settled deposits can be disputed
 * - Dispute lifecycle is forward-only (disputed → resolved | chargedBack)
 * - A chargeback freezes the account for new transfers and disputes
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Policy violations discard the transaction and are reported, never thrown
 * - Dispute records are kept for the lifetime of the account
 * - Zero runtime dependencies
 */

// Account state machine
export { ClientAccount } from "./client-account.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  ZERO_AMOUNT,
  amountFromScaled,
  amountFromNumber,
  parseAmount,
  formatAmount,
  addAmounts,
  subtractAmounts,
  compareAmounts,
  isNegativeAmount,
} from "./money-math.js";

// Types
export type {
  RejectionCode,
  Rejection,
  RejectionHandler,
  ClientAccountOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
