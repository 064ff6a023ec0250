/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { isIsoDate } from "@tallybook/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal string with at most two places; the engine normalizes it. */
export const AmountSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+(\.\d{1,2})?$/, "must be a decimal amount with at most two places");

export const IsoDateSchema = z.string().refine(isIsoDate, "must be a YYYY-MM-DD date");

export const IdSchema = z.coerce.number().int().positive();

export const DateRangeQuerySchema = z.object({
  from: IsoDateSchema.optional(),
  to: IsoDateSchema.optional(),
});

export type DateRangeQuery = z.infer<typeof DateRangeQuerySchema>;

// =============================================================================
// Chart of Accounts
// =============================================================================

export const OpenAccountSchema = z.object({
  code: z.string().trim().min(1).max(16),
  name: z.string().trim().min(1).max(128),
  type: z.enum(["asset", "liability", "equity", "income", "expense"]),
});

export type OpenAccountDto = z.infer<typeof OpenAccountSchema>;

// =============================================================================
// Bank Accounts
// =============================================================================

export const CreateBankAccountSchema = z.object({
  type: z.enum(["checking", "savings", "credit-card", "cash"]),
  institution: z.string().trim().min(1).max(128),
  maskedNumber: z.string().trim().min(1).max(32),
  openingBalance: AmountSchema.default("0.00"),
});

export type CreateBankAccountDto = z.infer<typeof CreateBankAccountSchema>;

export const ImportProfileSchema = z.object({
  dateColumn: z.number().int().min(0),
  descriptionColumn: z.number().int().min(0),
  amountColumn: z.number().int().min(0),
  dateFormat: z.string().min(1).optional(),
  signRule: z.enum(["BANK_STANDARD", "CC_CHARGES_POSITIVE", "CC_CHARGES_NEGATIVE"]).optional(),
  skipIfDescriptionContains: z.string().optional(),
});

export type ImportProfileDto = z.infer<typeof ImportProfileSchema>;

export const ImportQuerySchema = z.object({
  offsetAccountId: IdSchema,
});

// =============================================================================
// Bank Transactions
// =============================================================================

export const CreateBankTransactionSchema = z.object({
  bankAccountId: IdSchema,
  date: IsoDateSchema,
  description: z.string().trim().min(1).max(512),
  amount: AmountSchema,
  offsetAccountId: IdSchema,
});

export type CreateBankTransactionDto = z.infer<typeof CreateBankTransactionSchema>;

export const ListBankTransactionsQuerySchema = z.object({
  bankAccountId: IdSchema,
});

export const OffsetAccountSchema = z.object({
  offsetAccountId: IdSchema,
});

export const LinkExpenseSchema = z.object({
  expenseId: IdSchema,
});

export const MatchTransferSchema = z.object({
  fromTransactionId: IdSchema,
  toTransactionId: IdSchema,
});

export const LinkPaymentSchema = z.object({
  paymentId: IdSchema,
});

export const PaymentMethodSchema = z.enum(["check", "ach", "cash", "card", "other"]);

export const ApplicationSchema = z.object({
  invoiceId: IdSchema,
  amount: AmountSchema,
});

export const CreatePaymentFromTransactionSchema = z.object({
  clientId: IdSchema,
  method: PaymentMethodSchema,
  memo: z.string().max(512).optional(),
  applications: z.array(ApplicationSchema).optional(),
});

export const MatchExpensesBatchSchema = z.object({
  rows: z
    .array(
      z.object({
        transactionId: IdSchema,
        expenseId: IdSchema.optional(),
        categoryId: IdSchema.optional(),
      }),
    )
    .min(1),
});

// =============================================================================
// Clients, Categories & Expenses
// =============================================================================

export const CreateClientSchema = z.object({
  name: z.string().trim().min(1).max(256),
  paymentTermsDays: z.number().int().min(0).max(365).optional(),
});

export const CreateCategorySchema = z.object({
  name: z.string().trim().min(1).max(128),
  accountId: IdSchema.nullable().optional(),
  billableByDefault: z.boolean().optional(),
});

export const CreateExpenseSchema = z.object({
  clientId: IdSchema.nullable().optional(),
  categoryId: IdSchema,
  date: IsoDateSchema,
  amount: AmountSchema,
  description: z.string().trim().min(1).max(512),
  billable: z.boolean().optional(),
});

// =============================================================================
// Invoices & Payments
// =============================================================================

export const ClientFilterQuerySchema = z.object({
  clientId: IdSchema.optional(),
});

export const CreateInvoiceSchema = z.object({
  clientId: IdSchema,
  issueDate: IsoDateSchema,
  dueDate: IsoDateSchema.optional(),
  notes: z.string().max(2048).optional(),
});

export const InvoiceLineSchema = z.object({
  lineType: z.enum(["time", "expense", "other"]).optional(),
  description: z.string().trim().min(1).max(512),
  quantity: z
    .string()
    .trim()
    .regex(/^\d+(\.\d{1,2})?$/, "must be a non-negative quantity with at most two places"),
  unitPrice: AmountSchema,
});

export const RecordPaymentSchema = z.object({
  clientId: IdSchema,
  date: IsoDateSchema,
  amount: AmountSchema,
  method: PaymentMethodSchema,
  memo: z.string().max(512).optional(),
  applications: z.array(ApplicationSchema).optional(),
});

// =============================================================================
// Reports
// =============================================================================

export const ClientBalancesQuerySchema = z.object({
  sortBy: z
    .enum(["name", "totalInvoiced", "applied", "unapplied", "outstanding", "netAr"])
    .optional(),
  descending: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export const ArAgingQuerySchema = z.object({
  asOf: IsoDateSchema.optional(),
});

export const RepairSchema = z.object({
  dryRun: z.boolean().default(false),
});
