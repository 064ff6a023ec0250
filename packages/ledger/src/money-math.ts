/**
 * @tallybook/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint cents internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - One currency, two decimal places
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import type { Amount } from "@tallybook/types";
import { LedgerError } from "./types.js";

/** Decimal places every amount is carried at. */
export const AMOUNT_DECIMALS = 2;

const SCALE = 100n;

/** The canonical zero amount. */
export const ZERO: Amount = "0.00";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into bigint cents.
 *
 * "100.50" → 10050n
 * "100" → 10000n
 * "-50.2" → -5020n
 * "+7.00" → 700n
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Optional sign, digits, optional decimal point + digits
  if (!/^[+-]?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = trimmed.replace(/^[+-]/, "");
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > AMOUNT_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the books allow ${String(AMOUNT_DECIMALS)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_DECIMALS, "0"));
  return negative ? -value : value;
}

/**
 * Convert bigint cents back to a canonical amount string.
 *
 * 10050n → "100.50"
 * -5n → "-0.05"
 */
export function formatAmount(cents: bigint): Amount {
  const negative = cents < 0n;
  const abs = negative ? -cents : cents;
  const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
  const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Canonicalize any accepted decimal string ("45", "+45.5", "-0") to two places.
 */
export function toAmount(value: string): Amount {
  return formatAmount(parseAmount(value));
}

export function addAmounts(a: Amount, b: Amount): Amount {
  return formatAmount(parseAmount(a) + parseAmount(b));
}

export function subtractAmounts(a: Amount, b: Amount): Amount {
  return formatAmount(parseAmount(a) - parseAmount(b));
}

export function sumAmounts(amounts: Iterable<Amount>): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount);
  }
  return formatAmount(total);
}

export function negateAmount(amount: Amount): Amount {
  return formatAmount(-parseAmount(amount));
}

export function absAmount(amount: Amount): Amount {
  const cents = parseAmount(amount);
  return formatAmount(cents < 0n ? -cents : cents);
}

export function isZero(amount: Amount): boolean {
  return parseAmount(amount) === 0n;
}

export function isPositive(amount: Amount): boolean {
  return parseAmount(amount) > 0n;
}

export function isNegative(amount: Amount): boolean {
  return parseAmount(amount) < 0n;
}

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: Amount, b: Amount): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Multiply an amount by a two-decimal quantity (hours, units),
 * rounding half away from zero back to cents.
 *
 * ("150.00", "1.50") → "225.00"
 * ("0.10", "0.25") → "0.03"
 */
export function multiplyAmount(amount: Amount, quantity: string): Amount {
  const product = parseAmount(amount) * parseAmount(quantity);
  const negative = product < 0n;
  const abs = negative ? -product : product;
  const rounded = (abs + SCALE / 2n) / SCALE;
  return formatAmount(negative ? -rounded : rounded);
}
