/**
 * Runtime Type Guards
 *
 * Narrowing functions for settle domain types.
 * These enable safe runtime validation at system boundaries
 * (parsed input records, routing inside the engine).
 */

import type {
  ClaimKind,
  ClaimTransaction,
  ClientId,
  Transaction,
  TransactionId,
  TransactionKind,
  TransferKind,
  TransferTransaction,
} from "./financial.js";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./financial.js";
import type { AccountSnapshot, DisputeState } from "./account.js";

// =============================================================================
// Transaction guards
// =============================================================================

const TRANSFER_KINDS = new Set<string>(["deposit", "withdrawal"]);
const CLAIM_KINDS = new Set<string>(["dispute", "resolve", "chargeback"]);
const DISPUTE_STATES = new Set<string>(["disputed", "resolved", "chargedBack"]);

export function isTransferKind(value: unknown): value is TransferKind {
  return typeof value === "string" && TRANSFER_KINDS.has(value);
}

export function isClaimKind(value: unknown): value is ClaimKind {
  return typeof value === "string" && CLAIM_KINDS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return isTransferKind(value) || isClaimKind(value);
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTransactionId(value: unknown): value is TransactionId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TRANSACTION_ID
  );
}

/** True for dispute, resolve and chargeback. */
export function isClaim(tx: Transaction): tx is ClaimTransaction {
  return isClaimKind(tx.kind);
}

/** True for deposit and withdrawal. */
export function isTransfer(tx: Transaction): tx is TransferTransaction {
  return isTransferKind(tx.kind);
}

// =============================================================================
// Account guards
// =============================================================================

export function isDisputeState(value: unknown): value is DisputeState {
  return typeof value === "string" && DISPUTE_STATES.has(value);
}

export function isAccountSnapshot(value: unknown): value is AccountSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.clientId) &&
    typeof v.available === "bigint" &&
    typeof v.held === "bigint" &&
    typeof v.total === "bigint" &&
    typeof v.locked === "boolean"
  );
}
