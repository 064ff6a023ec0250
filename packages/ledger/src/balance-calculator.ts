/**
 * @tallybook/ledger — Balance calculation engine.
 *
 * Computes account balances, the trial balance and the income statement
 * straight from journal lines. Nothing here reads a cached balance.
 *
 * Rules:
 * - Range filters apply to the entry's postedAt date, inclusive at both ends
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (total debits = total credits)
 */

import type { Account, JournalEntry, JournalLine } from "@tallybook/types";
import type {
  AccountBalance,
  DateRange,
  IncomeStatement,
  IncomeStatementLine,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

/**
 * Internal accumulator for building balances.
 */
interface BalanceAccumulator {
  totalDebits: bigint;
  totalCredits: bigint;
}

/**
 * Whether an entry's posting date falls in the range.
 */
export function inRange(postedAt: string, range: DateRange | undefined): boolean {
  if (range === undefined) return true;
  const day = postedAt.slice(0, 10);
  if (range.from !== undefined && day < range.from) return false;
  if (range.to !== undefined && day > range.to) return false;
  return true;
}

/**
 * Build per-account accumulators from lines whose entry is in range.
 */
function buildAccumulators(
  entries: ReadonlyMap<number, JournalEntry>,
  lines: Iterable<JournalLine>,
  range: DateRange | undefined,
): Map<number, BalanceAccumulator> {
  const accumulators = new Map<number, BalanceAccumulator>();

  for (const line of lines) {
    const entry = entries.get(line.entryId);
    if (entry === undefined || !inRange(entry.postedAt, range)) {
      continue;
    }

    let acc = accumulators.get(line.accountId);
    if (acc === undefined) {
      acc = { totalDebits: 0n, totalCredits: 0n };
      accumulators.set(line.accountId, acc);
    }

    acc.totalDebits += parseAmount(line.debit);
    acc.totalCredits += parseAmount(line.credit);
  }

  return accumulators;
}

/**
 * Compute the balance of one account.
 */
export function computeAccountBalance(
  account: Account,
  entries: ReadonlyMap<number, JournalEntry>,
  lines: Iterable<JournalLine>,
  range?: DateRange,
): AccountBalance {
  const accountLines = [...lines].filter((l) => l.accountId === account.id);
  const acc = buildAccumulators(entries, accountLines, range).get(account.id)
    ?? { totalDebits: 0n, totalCredits: 0n };

  const net = acc.totalDebits - acc.totalCredits;
  const normal = NORMAL_BALANCE[account.type] === "debit" ? net : -net;

  return {
    accountId: account.id,
    code: account.code,
    name: account.name,
    type: account.type,
    debitSum: formatAmount(acc.totalDebits),
    creditSum: formatAmount(acc.totalCredits),
    balance: formatAmount(net),
    normalBalance: formatAmount(normal),
  };
}

/**
 * Compute the trial balance over every account in the chart.
 *
 * Each line carries the raw debit and credit column sums; the report is
 * balanced when the grand totals agree.
 */
export function computeTrialBalance(
  accounts: readonly Account[],
  entries: ReadonlyMap<number, JournalEntry>,
  lines: Iterable<JournalLine>,
  range: DateRange = {},
): TrialBalance {
  const accumulators = buildAccumulators(entries, lines, range);
  const result: TrialBalanceLine[] = [];
  let totalDebits = 0n;
  let totalCredits = 0n;

  for (const account of accounts) {
    const acc = accumulators.get(account.id) ?? { totalDebits: 0n, totalCredits: 0n };

    result.push({
      accountId: account.id,
      code: account.code,
      name: account.name,
      type: account.type,
      debitSum: formatAmount(acc.totalDebits),
      creditSum: formatAmount(acc.totalCredits),
      balance: formatAmount(acc.totalDebits - acc.totalCredits),
    });

    totalDebits += acc.totalDebits;
    totalCredits += acc.totalCredits;
  }

  return {
    range,
    lines: result,
    totalDebits: formatAmount(totalDebits),
    totalCredits: formatAmount(totalCredits),
    balanced: totalDebits === totalCredits,
  };
}

/**
 * Compute the income statement.
 *
 * Income accounts: creditSum − debitSum (revenue shown positive).
 * Expense accounts: debitSum − creditSum.
 */
export function computeIncomeStatement(
  accounts: readonly Account[],
  entries: ReadonlyMap<number, JournalEntry>,
  lines: Iterable<JournalLine>,
  range: DateRange = {},
): IncomeStatement {
  const accumulators = buildAccumulators(entries, lines, range);
  const revenue: IncomeStatementLine[] = [];
  const expenses: IncomeStatementLine[] = [];
  let revenueTotal = 0n;
  let expenseTotal = 0n;

  for (const account of accounts) {
    if (account.type !== "income" && account.type !== "expense") {
      continue;
    }

    const acc = accumulators.get(account.id) ?? { totalDebits: 0n, totalCredits: 0n };

    if (account.type === "income") {
      const amount = acc.totalCredits - acc.totalDebits;
      revenue.push(statementLine(account, amount));
      revenueTotal += amount;
    } else {
      const amount = acc.totalDebits - acc.totalCredits;
      expenses.push(statementLine(account, amount));
      expenseTotal += amount;
    }
  }

  return {
    range,
    revenue,
    expenses,
    revenueTotal: formatAmount(revenueTotal),
    expenseTotal: formatAmount(expenseTotal),
    netIncome: formatAmount(revenueTotal - expenseTotal),
  };
}

function statementLine(account: Account, amount: bigint): IncomeStatementLine {
  return {
    accountId: account.id,
    code: account.code,
    name: account.name,
    amount: formatAmount(amount),
  };
}
