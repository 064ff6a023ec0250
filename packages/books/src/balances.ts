/**
 * @tallybook/books — Bank balances and the bank register.
 *
 * A bank account's balance is always opening balance + Σ transaction
 * amounts, computed on demand. Nothing is cached, so retags, matches and
 * deletions show up immediately.
 */

import type { IsoDate } from "@tallybook/types";
import { formatAmount, parseAmount } from "@tallybook/ledger";
import { compareTransactions } from "./banking.js";
import { assertIsoDate } from "./dates.js";
import type { BookStore } from "./store.js";
import type { BankRegister, RegisterRow } from "./types.js";

export function bankAccountBalance(store: BookStore, bankAccountId: number): string {
  const bankAccount = store.bankAccounts.require(bankAccountId);
  let cents = parseAmount(bankAccount.openingBalance);
  for (const txn of store.bankTransactions.filter((t) => t.bankAccountId === bankAccount.id)) {
    cents += parseAmount(txn.amount);
  }
  return formatAmount(cents);
}

/**
 * Register view of one account.
 *
 * Balance forward is the opening balance plus every transaction dated
 * before `from`; rows in [from, to] follow in date then insertion order.
 */
export function runningBalanceForRange(
  store: BookStore,
  bankAccountId: number,
  from?: IsoDate,
  to?: IsoDate,
): BankRegister {
  const bankAccount = store.bankAccounts.require(bankAccountId);
  const fromDate = from === undefined ? null : assertIsoDate(from, "from");
  const toDate = to === undefined ? null : assertIsoDate(to, "to");

  const transactions = [
    ...store.bankTransactions.filter((t) => t.bankAccountId === bankAccount.id),
  ].sort(compareTransactions);

  let forward = parseAmount(bankAccount.openingBalance);
  if (fromDate !== null) {
    for (const txn of transactions) {
      if (txn.date < fromDate) forward += parseAmount(txn.amount);
    }
  }

  let running = forward;
  const rows: RegisterRow[] = [];
  for (const txn of transactions) {
    if (fromDate !== null && txn.date < fromDate) continue;
    if (toDate !== null && txn.date > toDate) continue;
    running += parseAmount(txn.amount);
    rows.push({ transaction: txn, runningBalance: formatAmount(running) });
  }

  return {
    bankAccountId: bankAccount.id,
    from: fromDate,
    to: toDate,
    balanceForward: formatAmount(forward),
    rows,
    endingBalance: formatAmount(running),
  };
}
