/**
 * Tests for the ClientAccount state machine.
 *
 * Covers:
 * - Settlement of deposits and withdrawals
 * - Amount validation (missing, negative, zero)
 * - Dispute, resolve and chargeback lifecycle
 * - Freeze semantics and pre-freeze disputes
 * - Negative balances after disputes
 * - Rejection reporting
 */

import { describe, it, expect, vi } from "vitest";
import type { ClaimTransaction, TransactionId, TransferTransaction } from "@settle/types";
import { ClientAccount } from "../src/client-account.js";
import { parseAmount } from "../src/money-math.js";
import type { Rejection, RejectionHandler } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function deposit(transactionId: TransactionId, amount: string | undefined): TransferTransaction {
  return {
    kind: "deposit",
    transactionId,
    clientId: 1,
    amount: amount === undefined ? undefined : parseAmount(amount),
  };
}

function withdrawal(transactionId: TransactionId, amount: string | undefined): TransferTransaction {
  return {
    kind: "withdrawal",
    transactionId,
    clientId: 1,
    amount: amount === undefined ? undefined : parseAmount(amount),
  };
}

function dispute(transactionId: TransactionId): ClaimTransaction {
  return { kind: "dispute", transactionId, clientId: 1 };
}

function resolve(transactionId: TransactionId): ClaimTransaction {
  return { kind: "resolve", transactionId, clientId: 1 };
}

function chargeback(transactionId: TransactionId): ClaimTransaction {
  return { kind: "chargeback", transactionId, clientId: 1 };
}

function expectBalances(account: ClientAccount, available: string, held: string, total: string): void {
  expect(account.available).toBe(parseAmount(available));
  expect(account.held).toBe(parseAmount(held));
  expect(account.total).toBe(parseAmount(total));
}

/** Lock an account the only way possible: a successful chargeback. */
function lockedAccount(onReject?: (rejection: Rejection) => void): ClientAccount {
  const account = new ClientAccount(1, { onReject });
  account.settle(deposit(100, "1"));
  account.adjudicate(dispute(100));
  account.adjudicate(chargeback(100));
  return account;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("ClientAccount", () => {
  describe("construction", () => {
    it("starts empty and unlocked", () => {
      const account = new ClientAccount(7);
      expect(account.clientId).toBe(7);
      expectBalances(account, "0", "0", "0");
      expect(account.locked).toBe(false);
      expect(account.ledgerSize).toBe(0);
    });

    it("accepts the 16-bit client ID bounds", () => {
      expect(new ClientAccount(0).clientId).toBe(0);
      expect(new ClientAccount(65535).clientId).toBe(65535);
    });

    it("projects a snapshot", () => {
      const account = new ClientAccount(3);
      account.settle(deposit(1, "2.5"));
      expect(account.snapshot()).toEqual({
        clientId: 3,
        available: 25_000n,
        held: 0n,
        total: 25_000n,
        locked: false,
      });
    });
  });

  // ─── settle ──────────────────────────────────────────────────────────

  describe("settle", () => {
    it("credits available and total on deposit", () => {
      const account = new ClientAccount(1);
      expect(account.settle(deposit(1, "100"))).toBe(true);
      expectBalances(account, "100", "0", "100");
      expect(account.locked).toBe(false);
    });

    it("records the deposit in the ledger", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.getLedgerEntry(1)).toEqual({ kind: "deposit", amount: 1_000_000n });
    });

    it("debits available and total on withdrawal", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.settle(withdrawal(2, "30"))).toBe(true);
      expectBalances(account, "70", "0", "70");
      expect(account.getLedgerEntry(2)).toEqual({ kind: "withdrawal", amount: 300_000n });
    });

    it("allows withdrawing the exact balance", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(withdrawal(2, "100"));
      expectBalances(account, "0", "0", "0");
    });

    it("rejects a withdrawal exceeding available funds and does not record it", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "10"));

      expect(account.settle(withdrawal(2, "15"))).toBe(false);
      expectBalances(account, "10", "0", "10");
      expect(account.getLedgerEntry(2)).toBeUndefined();
      expect(onReject).toHaveBeenCalledOnce();
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "INSUFFICIENT_FUNDS" });
    });

    it("rejects a withdrawal from held funds", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "10"));
      account.adjudicate(dispute(1));
      expect(account.settle(withdrawal(2, "5"))).toBe(false);
      expectBalances(account, "0", "10", "10");
    });

    it("rejects a transfer without an amount", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, undefined));
      expectBalances(account, "0", "0", "0");
      expect(account.getLedgerEntry(1)).toBeUndefined();
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "MISSING_AMOUNT" });
    });

    it("rejects a withdrawal without an amount", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.settle(withdrawal(2, undefined))).toBe(false);
      expectBalances(account, "100", "0", "100");
    });

    it("rejects a negative deposit", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "-100"));
      expectBalances(account, "0", "0", "0");
      expect(account.getLedgerEntry(1)).toBeUndefined();
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "NEGATIVE_AMOUNT" });
    });

    it("rejects a negative withdrawal", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(withdrawal(2, "-50"));
      expectBalances(account, "100", "0", "100");
      expect(account.getLedgerEntry(2)).toBeUndefined();
    });

    it("accepts and records a zero deposit", () => {
      const account = new ClientAccount(1);
      expect(account.settle(deposit(1, "0"))).toBe(true);
      expectBalances(account, "0", "0", "0");
      expect(account.getLedgerEntry(1)).toEqual({ kind: "deposit", amount: 0n });
    });

    it("accepts the transaction ID bounds", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(0, "1"));
      account.settle(deposit(4294967295, "1"));
      expect(account.ledgerSize).toBe(2);
      expectBalances(account, "2", "0", "2");
    });

    it("checks the lock before the amount", () => {
      const onReject = vi.fn();
      const account = lockedAccount(onReject);
      account.settle(deposit(1, "-5"));
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "ACCOUNT_LOCKED" });
    });

    it("refuses every transfer on a locked account", () => {
      const account = lockedAccount();
      expect(account.settle(deposit(1, "50"))).toBe(false);
      expect(account.settle(withdrawal(2, "0"))).toBe(false);
      expectBalances(account, "0", "0", "0");
      expect(account.getLedgerEntry(1)).toBeUndefined();
    });

    it("applies a reused transaction ID at the account level", () => {
      // Duplicate IDs are filtered by the processor, not by the account.
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(deposit(1, "50"));
      expectBalances(account, "150", "0", "150");
      expect(account.getLedgerEntry(1)).toEqual({ kind: "deposit", amount: 500_000n });
    });
  });

  // ─── dispute ─────────────────────────────────────────────────────────

  describe("dispute", () => {
    it("moves the deposit amount from available to held", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(dispute(1))).toBe(true);
      expectBalances(account, "0", "100", "100");
      expect(account.getDisputeState(1)).toBe("disputed");
    });

    it("rejects an unknown transaction", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(dispute(999))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(account.getDisputeState(999)).toBeUndefined();
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "UNKNOWN_TRANSACTION" });
    });

    it("rejects disputing a withdrawal", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      account.settle(withdrawal(2, "30"));
      expect(account.adjudicate(dispute(2))).toBe(false);
      expectBalances(account, "70", "0", "70");
      expect(account.getDisputeState(2)).toBeUndefined();
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "NOT_DISPUTABLE" });
    });

    it("treats a failed withdrawal as unknown", () => {
      const onReject = vi.fn<RejectionHandler>();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "10"));
      account.settle(withdrawal(2, "20"));
      account.adjudicate(dispute(2));
      expect(onReject.mock.calls.map(([rejection]) => rejection.code)).toEqual([
        "INSUFFICIENT_FUNDS",
        "UNKNOWN_TRANSACTION",
      ]);
    });

    it("does not hold funds twice", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      expect(account.adjudicate(dispute(1))).toBe(false);
      expectBalances(account, "0", "100", "100");
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "ALREADY_DISPUTED" });
    });

    it("never re-opens a resolved dispute", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      account.adjudicate(resolve(1));
      expect(account.adjudicate(dispute(1))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(account.getDisputeState(1)).toBe("resolved");
    });

    it("rejects new disputes on a locked account", () => {
      const onReject = vi.fn();
      const account = lockedAccount(onReject);
      expect(account.adjudicate(dispute(100))).toBe(false);
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "ACCOUNT_LOCKED" });
    });

    it("drives available negative when funds were spent", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(withdrawal(2, "70"));
      account.adjudicate(dispute(1));
      expectBalances(account, "-70", "100", "30");
    });

    it("disputes a zero deposit", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "0"));
      expect(account.adjudicate(dispute(1))).toBe(true);
      expectBalances(account, "0", "0", "0");
      expect(account.getDisputeState(1)).toBe("disputed");
    });
  });

  // ─── resolve ─────────────────────────────────────────────────────────

  describe("resolve", () => {
    it("releases held funds back to available", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      expect(account.adjudicate(resolve(1))).toBe(true);
      expectBalances(account, "100", "0", "100");
      expect(account.getDisputeState(1)).toBe("resolved");
      expect(account.locked).toBe(false);
    });

    it("rejects an unknown transaction", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(resolve(999))).toBe(false);
      expectBalances(account, "100", "0", "100");
    });

    it("rejects a transaction that was never disputed", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(resolve(1))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "NOT_DISPUTED" });
    });

    it("does not release twice", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      account.adjudicate(resolve(1));
      expect(account.adjudicate(resolve(1))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "DISPUTE_CLOSED" });
    });

    it("resolves a pre-freeze dispute on a locked account", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "10"));
      account.settle(deposit(2, "5"));
      account.adjudicate(dispute(1));
      account.adjudicate(dispute(2));
      account.adjudicate(chargeback(1));
      expect(account.locked).toBe(true);

      expect(account.adjudicate(resolve(2))).toBe(true);
      expectBalances(account, "5", "0", "5");
      expect(account.getDisputeState(2)).toBe("resolved");
    });
  });

  // ─── chargeback ──────────────────────────────────────────────────────

  describe("chargeback", () => {
    it("removes held funds and locks the account", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      expect(account.adjudicate(chargeback(1))).toBe(true);
      expectBalances(account, "0", "0", "0");
      expect(account.getDisputeState(1)).toBe("chargedBack");
      expect(account.locked).toBe(true);
    });

    it("rejects an unknown transaction", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(chargeback(999))).toBe(false);
      expect(account.locked).toBe(false);
    });

    it("rejects a transaction that was never disputed", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      expect(account.adjudicate(chargeback(1))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(account.locked).toBe(false);
    });

    it("rejects a chargeback after resolve", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.adjudicate(dispute(1));
      account.adjudicate(resolve(1));
      expect(account.adjudicate(chargeback(1))).toBe(false);
      expectBalances(account, "100", "0", "100");
      expect(account.locked).toBe(false);
    });

    it("does not remove funds twice", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "100"));
      account.settle(deposit(2, "50"));
      account.adjudicate(dispute(1));
      account.adjudicate(chargeback(1));
      expect(account.adjudicate(chargeback(1))).toBe(false);
      expectBalances(account, "50", "0", "50");
      expect(onReject.mock.calls[0]?.[0]).toMatchObject({ code: "DISPUTE_CLOSED" });
    });

    it("charges back a pre-freeze dispute on a locked account", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(deposit(2, "50"));
      account.adjudicate(dispute(1));
      account.adjudicate(dispute(2));
      account.adjudicate(chargeback(1));
      expect(account.adjudicate(chargeback(2))).toBe(true);
      expectBalances(account, "0", "0", "0");
    });

    it("leaves the client owing money after spending", () => {
      const account = new ClientAccount(1);
      account.settle(deposit(1, "100"));
      account.settle(withdrawal(2, "70"));
      account.adjudicate(dispute(1));
      account.adjudicate(chargeback(1));
      expectBalances(account, "-70", "0", "-70");
      expect(account.locked).toBe(true);
    });
  });

  // ─── Rejection reporting ─────────────────────────────────────────────

  describe("rejection reporting", () => {
    it("passes the offending transaction and a message", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      const tx = dispute(42);
      account.adjudicate(tx);
      expect(onReject).toHaveBeenCalledWith({
        code: "UNKNOWN_TRANSACTION",
        message: "No settled transaction 42 for client 1",
        transaction: tx,
      });
    });

    it("stays silent without a handler", () => {
      const account = new ClientAccount(1);
      expect(() => account.adjudicate(dispute(1))).not.toThrow();
    });

    it("does not report successful operations", () => {
      const onReject = vi.fn();
      const account = new ClientAccount(1, { onReject });
      account.settle(deposit(1, "1"));
      account.adjudicate(dispute(1));
      account.adjudicate(resolve(1));
      expect(onReject).not.toHaveBeenCalled();
    });
  });
});
