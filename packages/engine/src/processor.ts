/**
 * @settle/engine — Transaction processor.
 *
 * The aggregation state behind the engine's single consumer: every
 * client account plus the set of transaction IDs already handed to
 * settlement. Synchronous; the engine feeds it one transaction at a time.
 *
 * Routing rules:
 * - dispute / resolve / chargeback go to the client's existing account,
 *   or are rejected when the client has none
 * - deposit / withdrawal claim their transaction ID first; a reused ID is
 *   rejected before any account sees it, whichever client sent it
 *
 * An ID stays claimed even when the account then refuses the transfer.
 */

import type {
  AccountSnapshot,
  ClientId,
  Transaction,
  TransactionId,
} from "@settle/types";
import { isClaim } from "@settle/types";
import { ClientAccount } from "@settle/ledger";
import type { Rejection, RejectionCode, RejectionHandler } from "@settle/ledger";
import { assembleSnapshot } from "./snapshot.js";
import { StatsCollector } from "./stats.js";
import type { ProcessingStats, ProcessorOptions } from "./types.js";

export class TransactionProcessor {
  private readonly _accounts = new Map<ClientId, ClientAccount>();
  private readonly _processedIds = new Set<TransactionId>();
  private readonly _stats = new StatsCollector();
  private readonly _forward: RejectionHandler | undefined;
  private readonly _onError: ((err: unknown) => void) | undefined;
  private readonly _handleRejection: RejectionHandler;

  constructor(options?: ProcessorOptions) {
    this._forward = options?.onReject;
    this._onError = options?.onError;
    this._handleRejection = (rejection: Rejection): void => {
      this._stats.recordRejected(rejection.code);
      this._notify(rejection);
    };
  }

  /**
   * Route one transaction to its account.
   * Returns true when it changed account state.
   */
  apply(tx: Transaction): boolean {
    const applied = this._route(tx);
    if (applied) {
      this._stats.recordApplied();
    }
    return applied;
  }

  private _route(tx: Transaction): boolean {
    if (isClaim(tx)) {
      const account = this._accounts.get(tx.clientId);
      if (account === undefined) {
        return this._reject("UNKNOWN_CLIENT", tx, `No account for client ${String(tx.clientId)}`);
      }
      return account.adjudicate(tx);
    }

    if (this._processedIds.has(tx.transactionId)) {
      return this._reject(
        "DUPLICATE_TRANSACTION_ID",
        tx,
        `Transaction ID ${String(tx.transactionId)} was already processed`,
      );
    }
    this._processedIds.add(tx.transactionId);

    return this._accountFor(tx.clientId).settle(tx);
  }

  private _accountFor(clientId: ClientId): ClientAccount {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = new ClientAccount(clientId, { onReject: this._handleRejection });
      this._accounts.set(clientId, account);
    }
    return account;
  }

  private _notify(rejection: Rejection): void {
    if (this._forward === undefined) {
      return;
    }
    if (this._onError === undefined) {
      this._forward(rejection);
      return;
    }
    try {
      this._forward(rejection);
    } catch (err: unknown) {
      this._onError(err);
    }
  }

  private _reject(code: RejectionCode, transaction: Transaction, message: string): false {
    this._handleRejection({ code, message, transaction });
    return false;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getAccount(clientId: ClientId): ClientAccount | undefined {
    return this._accounts.get(clientId);
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  get stats(): ProcessingStats {
    return this._stats.snapshot();
  }

  /** Every account ever created, ascending by client ID. */
  snapshot(): readonly AccountSnapshot[] {
    return assembleSnapshot(this._accounts.values());
  }
}
