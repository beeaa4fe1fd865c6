/**
 * Financial Types
 *
 * Core primitives for the payments engine.
 *
 * Rules:
 * - Amounts are fixed-point bigints, never floating point
 * - Transaction IDs are unique across all clients
 * - Client IDs partition accounts
 */

/**
 * A precise monetary amount.
 *
 * Integer count of ten-thousandths of the currency unit:
 * 15000n is 1.5, -1n is -0.0001.
 */
export type Amount = bigint;

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier, global across clients. */
export type TransactionId = number;

/**
 * Transactions that move funds.
 */
export type TransferKind = "deposit" | "withdrawal";

/**
 * Transactions that contest, release or reverse a previous deposit.
 */
export type ClaimKind = "dispute" | "resolve" | "chargeback";

export type TransactionKind = TransferKind | ClaimKind;

/**
 * A deposit or withdrawal.
 *
 * `amount` is undefined when the source record carried none; the
 * account rejects such a transfer.
 */
export interface TransferTransaction {
  readonly kind: TransferKind;
  readonly transactionId: TransactionId;
  readonly clientId: ClientId;
  readonly amount: Amount | undefined;
}

/**
 * A dispute, resolve or chargeback.
 * References an earlier transfer by its transaction ID.
 */
export interface ClaimTransaction {
  readonly kind: ClaimKind;
  readonly transactionId: TransactionId;
  readonly clientId: ClientId;
}

/** One requested operation, immutable once constructed. */
export type Transaction = TransferTransaction | ClaimTransaction;

/** Largest valid client ID. */
export const MAX_CLIENT_ID = 0xffff;

/** Largest valid transaction ID. */
export const MAX_TRANSACTION_ID = 0xffff_ffff;
