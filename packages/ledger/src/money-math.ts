/**
 * @settle/ledger — Deterministic fixed-point arithmetic.
 *
 * Amounts are bigints scaled by 10^4 (four fractional digits).
 * Text and numbers are converted to amounts via decimal scaling,
 * rounding half away from zero. Nothing else ever rounds.
 *
 * Rules:
 * - No floating-point operations on stored values
 * - Arithmetic is exact and cannot fail
 * - Only the input conversions can throw (LedgerError)
 */

import type { Amount } from "@settle/types";
import { LedgerError } from "./types.js";

/** Number of fractional digits kept. */
export const AMOUNT_DECIMALS = 4;

const SCALE = 10n ** BigInt(AMOUNT_DECIMALS);

/** Exponents beyond this are treated as malformed input. */
const MAX_EXPONENT = 64;

/** Optional sign, digits with optional point, optional exponent. */
const AMOUNT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export const ZERO_AMOUNT: Amount = 0n;

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Create an amount from its raw scaled representation.
 *
 * 15000 → 1.5, -1n → -0.0001
 */
export function amountFromScaled(raw: bigint | number): Amount {
  if (typeof raw === "bigint") {
    return raw;
  }
  if (!Number.isSafeInteger(raw)) {
    throw new LedgerError("INVALID_AMOUNT", `Scaled amount must be a safe integer, got: ${String(raw)}`);
  }
  return BigInt(raw);
}

/**
 * Parse decimal text into an amount, rounding to four fractional digits.
 *
 * "100.50" → 1005000n
 * "1.23456" → 12346n
 * "-0.00005" → -1n
 * "2.5e-3" → 25n
 */
export function parseAmount(text: string): Amount {
  const trimmed = text.trim();
  const match = AMOUNT_PATTERN.exec(trimmed);
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [, sign, intPart = "", fracPart = "", exponentPart] = match;
  if (intPart === "" && fracPart === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const exponent = exponentPart === undefined ? 0 : Number(exponentPart);
  if (Math.abs(exponent) > MAX_EXPONENT) {
    throw new LedgerError("INVALID_AMOUNT", `Amount exponent out of range: "${trimmed}"`);
  }

  const digits = intPart + fracPart;
  const mantissa = BigInt(digits);
  const shift = AMOUNT_DECIMALS + exponent - fracPart.length;

  let magnitude: bigint;
  if (shift >= 0) {
    magnitude = mantissa * 10n ** BigInt(shift);
  } else if (-shift > digits.length) {
    // Every significant digit lies below half of the smallest unit.
    magnitude = 0n;
  } else {
    const divisor = 10n ** BigInt(-shift);
    magnitude = mantissa / divisor;
    if ((mantissa % divisor) * 2n >= divisor) {
      magnitude += 1n;
    }
  }

  return sign === "-" ? -magnitude : magnitude;
}

/**
 * Convert a number to an amount with the same rounding as parseAmount.
 * Goes through the shortest decimal text of the number, so 0.1 is
 * exactly 1000n.
 */
export function amountFromNumber(value: number): Amount {
  if (!Number.isFinite(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be finite, got: ${String(value)}`);
  }
  return parseAmount(String(value));
}

// ─── Rendering ───────────────────────────────────────────────────────────

/**
 * Render an amount as canonical decimal text.
 *
 * Trailing fractional zeros are dropped, and so is the point when
 * nothing follows it. Never uses exponent notation.
 *
 * 15000n → "1.5"
 * 1000000n → "100"
 * -1n → "-0.0001"
 */
export function formatAmount(amount: Amount): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const whole = abs / SCALE;
  const frac = abs % SCALE;

  let text = whole.toString();
  if (frac !== 0n) {
    const fracText = frac.toString().padStart(AMOUNT_DECIMALS, "0").replace(/0+$/, "");
    text = `${text}.${fracText}`;
  }

  return negative ? `-${text}` : text;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addAmounts(a: Amount, b: Amount): Amount {
  return a + b;
}

export function subtractAmounts(a: Amount, b: Amount): Amount {
  return a - b;
}

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: Amount, b: Amount): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isNegativeAmount(amount: Amount): boolean {
  return amount < 0n;
}
