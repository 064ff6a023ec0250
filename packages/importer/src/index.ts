/**
 * @tallybook/importer — CSV bank statement import.
 *
 * Per bank account import profiles (column indices, date format, sign
 * rule, skip text) turn a bank's CSV export into posted bank
 * transactions, all or nothing.
 */

export { StatementImporter } from "./statement-importer.js";
export { normalizeAmount, resolveSignRule } from "./sign-rules.js";
export { DEFAULT_DATE_FORMAT, assertDateFormat, parseDate } from "./date-format.js";
export { ImportError } from "./types.js";
export type {
  ImportErrorCode,
  ImportOptions,
  ImportProfileInput,
  ImportResult,
  SkipReason,
  SkippedRow,
} from "./types.js";
