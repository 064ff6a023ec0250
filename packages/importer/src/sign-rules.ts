/**
 * @tallybook/importer — Sign normalization.
 *
 * Internally a positive amount is money in and a negative amount money
 * out. Card issuers disagree on how charges are exported:
 *
 * - BANK_STANDARD:        + deposit, − withdrawal (unchanged)
 * - CC_CHARGES_POSITIVE:  + charge,  − payment    (negated)
 * - CC_CHARGES_NEGATIVE:  − charge,  + payment    (unchanged)
 */

import type { Amount, BankAccountType, SignRule } from "@tallybook/types";
import { BooksError } from "@tallybook/books";
import { negateAmount, toAmount } from "@tallybook/ledger";

export function normalizeAmount(raw: string, rule: SignRule): Amount {
  const amount = toAmount(raw);
  return rule === "CC_CHARGES_POSITIVE" ? negateAmount(amount) : amount;
}

/**
 * The sign rule a profile uses. Bank and cash accounts default to the
 * internal convention; a card profile has to say which way it goes.
 */
export function resolveSignRule(
  accountType: BankAccountType,
  signRule: SignRule | undefined,
): SignRule {
  if (accountType !== "credit-card") {
    return signRule ?? "BANK_STANDARD";
  }
  if (signRule === undefined) {
    throw new BooksError(
      "INVALID_CONFIGURATION",
      "A credit card import profile needs an explicit sign rule",
      { accountType },
    );
  }
  return signRule;
}
