/**
 * @settle/types — Shared domain types for the settle payments engine.
 *
 * These types are used across all settle packages:
 * - Fixed-point amounts and identifiers
 * - Transfer and claim transactions
 * - Dispute lifecycle and account snapshots
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  Amount,
  ClientId,
  TransactionId,
  TransferKind,
  ClaimKind,
  TransactionKind,
  TransferTransaction,
  ClaimTransaction,
  Transaction,
} from "./financial.js";

export { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./financial.js";

// Account types
export type {
  DisputeState,
  SettledTransfer,
  AccountSnapshot,
} from "./account.js";

// Runtime guards
export {
  isTransferKind,
  isClaimKind,
  isTransactionKind,
  isClientId,
  isTransactionId,
  isClaim,
  isTransfer,
  isDisputeState,
  isAccountSnapshot,
} from "./guards.js";
