/**
 * Transaction builders shared by the engine tests.
 */

import type {
  ClaimTransaction,
  ClientId,
  TransactionId,
  TransferTransaction,
} from "@settle/types";
import { parseAmount } from "@settle/ledger";

export function deposit(clientId: ClientId, transactionId: TransactionId, amount: string): TransferTransaction {
  return { kind: "deposit", clientId, transactionId, amount: parseAmount(amount) };
}

export function withdrawal(clientId: ClientId, transactionId: TransactionId, amount: string): TransferTransaction {
  return { kind: "withdrawal", clientId, transactionId, amount: parseAmount(amount) };
}

export function dispute(clientId: ClientId, transactionId: TransactionId): ClaimTransaction {
  return { kind: "dispute", clientId, transactionId };
}

export function resolve(clientId: ClientId, transactionId: TransactionId): ClaimTransaction {
  return { kind: "resolve", clientId, transactionId };
}

export function chargeback(clientId: ClientId, transactionId: TransactionId): ClaimTransaction {
  return { kind: "chargeback", clientId, transactionId };
}

/** Let every pending promise callback run. */
export function flush(): Promise<void> {
  return new Promise((done) => setImmediate(done));
}
