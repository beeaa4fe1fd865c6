/**
 * @settle/ledger — Internal types for the account engine.
 *
 * These extend the shared @settle/types with ledger-specific
 * structures: rejection reporting and the error thrown at the
 * input boundary.
 *
 * Rules:
 * - All types are readonly
 * - Policy violations are reported, never thrown
 * - Malformed values at the boundary throw LedgerError
 */

import type { Transaction } from "@settle/types";

// ─── Rejections ──────────────────────────────────────────────────────────

/** Why a transaction was discarded. */
export type RejectionCode =
  | "ACCOUNT_LOCKED"
  | "MISSING_AMOUNT"
  | "NEGATIVE_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_TRANSACTION"
  | "ALREADY_DISPUTED"
  | "NOT_DISPUTABLE"
  | "NOT_DISPUTED"
  | "DISPUTE_CLOSED"
  | "DUPLICATE_TRANSACTION_ID"
  | "UNKNOWN_CLIENT";

/**
 * A discarded transaction.
 *
 * Rejections are advisory: they are handed to a RejectionHandler for
 * logging and never change control flow.
 */
export interface Rejection {
  readonly code: RejectionCode;
  readonly message: string;
  readonly transaction: Transaction;
}

/** Receives every rejection. Must not throw. */
export type RejectionHandler = (rejection: Rejection) => void;

/** Options accepted by ClientAccount. */
export interface ClientAccountOptions {
  readonly onReject?: RejectionHandler | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode = "INVALID_AMOUNT";

/**
 * Structured error from the ledger package.
 * Only thrown when constructing amounts from untrusted input.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
