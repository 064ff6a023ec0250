import type { BookStore } from "./store.js";
import type { ChartAccounts } from "./chart.js";
import type { BooksLogger } from "./types.js";

/**
 * What every engine service is constructed with.
 */
export interface BooksContext {
  readonly store: BookStore;
  readonly chart: ChartAccounts;
  readonly logger: BooksLogger;
  readonly now: () => Date;
}
