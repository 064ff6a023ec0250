/**
 * zod schema for persisted books. Loading never trusts the file's shape.
 */

import { z } from "zod";
import { isAmount, isIsoDate } from "@tallybook/types";

const id = z.number().int().positive();
const amount = z.string().refine(isAmount, "expected a two-decimal amount");
const isoDate = z.string().refine(isIsoDate, "expected YYYY-MM-DD");

const table = <T extends z.ZodTypeAny>(row: T) =>
  z.object({ rows: z.array(row), nextId: id });

const AccountSchema = z.object({
  id,
  code: z.string().min(1),
  name: z.string(),
  type: z.enum(["asset", "liability", "equity", "income", "expense"]),
  active: z.boolean(),
});

const JournalEntrySchema = z.object({
  id,
  postedAt: z.string(),
  postedBy: z.string().nullable(),
  description: z.string(),
  source: z
    .object({
      kind: z.enum(["invoice", "payment", "bank-transaction", "bank-account", "expense"]),
      id,
    })
    .nullable(),
});

const JournalLineSchema = z.object({
  id,
  entryId: id,
  accountId: id,
  debit: amount,
  credit: amount,
});

const BankAccountSchema = z.object({
  id,
  accountId: id,
  type: z.enum(["checking", "savings", "credit-card", "cash"]),
  institution: z.string(),
  maskedNumber: z.string(),
  openingBalance: amount,
  createdAt: z.string(),
});

const BankTransactionSchema = z.object({
  id,
  bankAccountId: id,
  date: isoDate,
  description: z.string(),
  amount,
  offsetAccountId: id.nullable(),
  journalEntryId: id.nullable(),
  paymentId: id.nullable(),
  expenseId: id.nullable(),
  transferPairId: id.nullable(),
});

const ImportProfileSchema = z.object({
  bankAccountId: id,
  dateColumn: z.number().int().nonnegative(),
  descriptionColumn: z.number().int().nonnegative(),
  amountColumn: z.number().int().nonnegative(),
  dateFormat: z.string().min(1),
  signRule: z.enum(["BANK_STANDARD", "CC_CHARGES_POSITIVE", "CC_CHARGES_NEGATIVE"]),
  skipIfDescriptionContains: z.string().nullable(),
});

const ClientSchema = z.object({
  id,
  name: z.string(),
  paymentTermsDays: z.number().int().nonnegative(),
  active: z.boolean(),
});

const InvoiceSchema = z.object({
  id,
  clientId: id,
  invoiceNumber: z.string(),
  issueDate: isoDate,
  dueDate: isoDate,
  status: z.enum(["draft", "issued", "paid", "void"]),
  total: amount,
  postingState: z.enum(["unposted", "posted", "reversed"]),
  notes: z.string(),
});

const InvoiceLineSchema = z.object({
  id,
  invoiceId: id,
  lineType: z.enum(["time", "expense", "other"]),
  description: z.string(),
  quantity: amount,
  unitPrice: amount,
  lineTotal: amount,
});

const PaymentSchema = z.object({
  id,
  clientId: id,
  date: isoDate,
  amount,
  method: z.enum(["check", "ach", "cash", "card", "other"]),
  memo: z.string(),
  unappliedAmount: amount,
});

const PaymentApplicationSchema = z.object({ id, paymentId: id, invoiceId: id, amount });

const ExpenseCategorySchema = z.object({
  id,
  name: z.string(),
  accountId: id.nullable(),
  billableByDefault: z.boolean(),
});

const ExpenseSchema = z.object({
  id,
  clientId: id.nullable(),
  categoryId: id,
  date: isoDate,
  amount,
  description: z.string(),
  billable: z.boolean(),
  paymentAccountId: id.nullable(),
  invoiceLineId: id.nullable(),
});

export const BooksSnapshotSchema = z.object({
  version: z.literal(1),
  journal: z.object({
    version: z.literal(1),
    accounts: z.array(AccountSchema),
    entries: z.array(JournalEntrySchema),
    lines: z.array(JournalLineSchema),
    sequences: z.object({ account: id, entry: id, line: id }),
  }),
  bankAccounts: table(BankAccountSchema),
  bankTransactions: table(BankTransactionSchema),
  importProfiles: z.array(ImportProfileSchema),
  clients: table(ClientSchema),
  invoices: table(InvoiceSchema),
  invoiceLines: table(InvoiceLineSchema),
  payments: table(PaymentSchema),
  paymentApplications: table(PaymentApplicationSchema),
  expenseCategories: table(ExpenseCategorySchema),
  expenses: table(ExpenseSchema),
});
