/**
 * Runtime Type Guards
 *
 * Narrowing functions for bookkeeping domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, statement files).
 */

import type {
  Account,
  AccountType,
  Amount,
  IsoDate,
  JournalEntry,
  JournalLine,
  SourceKind,
  SourceRef,
} from "./ledger.js";
import type { BankAccountType, SignRule } from "./banking.js";
import type { PaymentMethod } from "./billing.js";

// =============================================================================
// Ledger guards
// =============================================================================

const ACCOUNT_TYPES = new Set<string>(["asset", "liability", "equity", "income", "expense"]);
const SOURCE_KINDS = new Set<string>([
  "invoice", "payment", "bank-transaction", "bank-account", "expense",
]);

const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/** Canonical two-decimal amount string. */
export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string" || !ISO_DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPES.has(value);
}

export function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === "string" && SOURCE_KINDS.has(value);
}

export function isSourceRef(value: unknown): value is SourceRef {
  if (!isRecord(value)) return false;
  return isSourceKind(value.kind) && isId(value.id);
}

export function isAccount(value: unknown): value is Account {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.code === "string" &&
    value.code.length > 0 &&
    typeof value.name === "string" &&
    isAccountType(value.type) &&
    typeof value.active === "boolean"
  );
}

export function isJournalEntry(value: unknown): value is JournalEntry {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.postedAt === "string" &&
    (value.postedBy === null || typeof value.postedBy === "string") &&
    typeof value.description === "string" &&
    (value.source === null || isSourceRef(value.source))
  );
}

export function isJournalLine(value: unknown): value is JournalLine {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    isId(value.entryId) &&
    isId(value.accountId) &&
    isAmount(value.debit) &&
    isAmount(value.credit)
  );
}

// =============================================================================
// Banking guards
// =============================================================================

const BANK_ACCOUNT_TYPES = new Set<string>(["checking", "savings", "credit-card", "cash"]);
const SIGN_RULES = new Set<string>(["BANK_STANDARD", "CC_CHARGES_POSITIVE", "CC_CHARGES_NEGATIVE"]);

export function isBankAccountType(value: unknown): value is BankAccountType {
  return typeof value === "string" && BANK_ACCOUNT_TYPES.has(value);
}

export function isSignRule(value: unknown): value is SignRule {
  return typeof value === "string" && SIGN_RULES.has(value);
}

// =============================================================================
// Billing guards
// =============================================================================

const PAYMENT_METHODS = new Set<string>(["check", "ach", "cash", "card", "other"]);

export function isPaymentMethod(value: unknown): value is PaymentMethod {
  return typeof value === "string" && PAYMENT_METHODS.has(value);
}
