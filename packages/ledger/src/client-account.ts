/**
 * @settle/ledger — Client account state machine.
 *
 * One client's balances, the ledger of transfers that settled, and the
 * adjudication state of every transaction that was ever disputed.
 *
 * API surface:
 * - settle() — Apply a deposit or withdrawal
 * - adjudicate() — Apply a dispute, resolve or chargeback
 * - getLedgerEntry() / getDisputeState() — Inspect history
 * - snapshot() — Project the balances for output
 *
 * Invariant: total === available + held after every call.
 * A rejected transaction leaves the account untouched and is reported
 * through the onReject handler.
 */

import type {
  AccountSnapshot,
  Amount,
  ClaimTransaction,
  ClientId,
  DisputeState,
  SettledTransfer,
  Transaction,
  TransactionId,
  TransferTransaction,
} from "@settle/types";
import { addAmounts, compareAmounts, isNegativeAmount, subtractAmounts, ZERO_AMOUNT } from "./money-math.js";
import type { ClientAccountOptions, RejectionCode, RejectionHandler } from "./types.js";

/**
 * Balances and dispute history for a single client.
 *
 * Accounts are only ever mutated through settle() and adjudicate().
 * Once a chargeback locks the account, new transfers and new disputes
 * are refused, but disputes opened before the freeze may still be
 * resolved or charged back.
 */
export class ClientAccount {
  private readonly _clientId: ClientId;
  private readonly _onReject: RejectionHandler | undefined;

  private _available: Amount = ZERO_AMOUNT;
  private _held: Amount = ZERO_AMOUNT;
  private _total: Amount = ZERO_AMOUNT;
  private _locked = false;

  /** Settled transfers, the source of truth for dispute amounts. */
  private readonly _ledger = new Map<TransactionId, SettledTransfer>();

  /** Dispute records are kept after they reach a terminal state. */
  private readonly _disputes = new Map<TransactionId, DisputeState>();

  constructor(clientId: ClientId, options?: ClientAccountOptions) {
    this._clientId = clientId;
    this._onReject = options?.onReject;
  }

  // ─── Accessors ───────────────────────────────────────────────────────

  get clientId(): ClientId {
    return this._clientId;
  }

  get available(): Amount {
    return this._available;
  }

  get held(): Amount {
    return this._held;
  }

  get total(): Amount {
    return this._total;
  }

  get locked(): boolean {
    return this._locked;
  }

  /** Number of settled transfers. */
  get ledgerSize(): number {
    return this._ledger.size;
  }

  getLedgerEntry(transactionId: TransactionId): SettledTransfer | undefined {
    return this._ledger.get(transactionId);
  }

  getDisputeState(transactionId: TransactionId): DisputeState | undefined {
    return this._disputes.get(transactionId);
  }

  snapshot(): AccountSnapshot {
    return {
      clientId: this._clientId,
      available: this._available,
      held: this._held,
      total: this._total,
      locked: this._locked,
    };
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Apply a deposit or withdrawal.
   *
   * Checked in order, the first failure discards the transaction:
   * 1. Account is not locked
   * 2. Amount is present
   * 3. Amount is not negative
   * 4. (withdrawal) Available funds cover the amount
   *
   * Only transfers that pass are recorded in the ledger, so a failed
   * withdrawal can never be disputed later.
   *
   * Returns true when the transfer was applied.
   */
  settle(tx: TransferTransaction): boolean {
    if (this._locked) {
      return this._reject("ACCOUNT_LOCKED", tx, `Account ${String(this._clientId)} is locked`);
    }

    const amount = tx.amount;
    if (amount === undefined) {
      return this._reject("MISSING_AMOUNT", tx, `${tx.kind} has no amount`);
    }
    if (isNegativeAmount(amount)) {
      return this._reject("NEGATIVE_AMOUNT", tx, `${tx.kind} has a negative amount`);
    }

    if (tx.kind === "deposit") {
      this._available = addAmounts(this._available, amount);
      this._total = addAmounts(this._total, amount);
    } else {
      if (compareAmounts(this._available, amount) < 0) {
        return this._reject("INSUFFICIENT_FUNDS", tx, "Withdrawal exceeds available funds");
      }
      this._available = subtractAmounts(this._available, amount);
      this._total = subtractAmounts(this._total, amount);
    }

    this._ledger.set(tx.transactionId, { kind: tx.kind, amount });
    return true;
  }

  // ─── Adjudication ────────────────────────────────────────────────────

  /**
   * Apply a dispute, resolve or chargeback to a settled deposit.
   *
   * - dispute: moves the deposit amount from available to held.
   *   Refused on a locked account, for a transaction that already has
   *   a dispute record, and for withdrawals.
   * - resolve: moves the amount back from held to available.
   * - chargeback: removes the amount from held and total and locks
   *   the account.
   *
   * Resolve and chargeback require the dispute to be exactly
   * "disputed"; both are allowed on a locked account.
   *
   * Returns true when the claim was applied.
   */
  adjudicate(tx: ClaimTransaction): boolean {
    const entry = this._ledger.get(tx.transactionId);
    if (entry === undefined) {
      return this._reject(
        "UNKNOWN_TRANSACTION",
        tx,
        `No settled transaction ${String(tx.transactionId)} for client ${String(this._clientId)}`,
      );
    }

    switch (tx.kind) {
      case "dispute":
        return this._openDispute(tx, entry);
      case "resolve":
        return this._resolveDispute(tx, entry);
      case "chargeback":
        return this._chargeBack(tx, entry);
    }
  }

  private _openDispute(tx: ClaimTransaction, entry: SettledTransfer): boolean {
    if (this._locked) {
      return this._reject("ACCOUNT_LOCKED", tx, `Account ${String(this._clientId)} is locked`);
    }
    const state = this._disputes.get(tx.transactionId);
    if (state !== undefined) {
      return this._reject("ALREADY_DISPUTED", tx, `Transaction already ${state}`);
    }
    if (entry.kind !== "deposit") {
      return this._reject("NOT_DISPUTABLE", tx, "Only deposits can be disputed");
    }

    this._available = subtractAmounts(this._available, entry.amount);
    this._held = addAmounts(this._held, entry.amount);
    this._disputes.set(tx.transactionId, "disputed");
    return true;
  }

  private _resolveDispute(tx: ClaimTransaction, entry: SettledTransfer): boolean {
    if (!this._isOpenDispute(tx)) {
      return false;
    }

    this._held = subtractAmounts(this._held, entry.amount);
    this._available = addAmounts(this._available, entry.amount);
    this._disputes.set(tx.transactionId, "resolved");
    return true;
  }

  private _chargeBack(tx: ClaimTransaction, entry: SettledTransfer): boolean {
    if (!this._isOpenDispute(tx)) {
      return false;
    }

    this._held = subtractAmounts(this._held, entry.amount);
    this._total = subtractAmounts(this._total, entry.amount);
    this._locked = true;
    this._disputes.set(tx.transactionId, "chargedBack");
    return true;
  }

  /**
   * Resolve and chargeback both require an open dispute.
   * Reports the rejection when there is none.
   */
  private _isOpenDispute(tx: ClaimTransaction): boolean {
    const state = this._disputes.get(tx.transactionId);
    if (state === undefined) {
      return this._reject("NOT_DISPUTED", tx, `Transaction ${String(tx.transactionId)} is not disputed`);
    }
    if (state !== "disputed") {
      return this._reject("DISPUTE_CLOSED", tx, `Dispute already ${state}`);
    }
    return true;
  }

  private _reject(code: RejectionCode, transaction: Transaction, message: string): false {
    this._onReject?.({ code, message, transaction });
    return false;
  }
}
