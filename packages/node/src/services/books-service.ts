/**
 * BooksService — Composition root for the engine packages.
 *
 * Route handlers reach the books, the reconciler and the statement
 * importer through this service. When a repository is configured the
 * books are loaded from it at start-up and written back by `persist()`.
 */

import type { BooksLogger, BooksRepository, StoredBooks } from "@tallybook/books";
import { Books } from "@tallybook/books";
import { StatementImporter } from "@tallybook/importer";
import { Reconciler } from "@tallybook/reconciler";

// =============================================================================
// Configuration
// =============================================================================

export interface BooksServiceConfig {
  /** Where the books live between runs; in memory only when omitted */
  readonly repository?: BooksRepository | undefined;
  readonly logger?: BooksLogger | undefined;
  readonly now?: (() => Date) | undefined;

  /** Recorded as `postedBy` on entries posted through the API */
  readonly defaultUser?: string | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class BooksService {
  readonly books: Books;
  readonly reconciler: Reconciler;
  readonly importer: StatementImporter;
  readonly user: string | null;

  private readonly _repository: BooksRepository | undefined;
  private _lastSaved: StoredBooks | undefined;

  constructor(config: BooksServiceConfig = {}) {
    const options = { logger: config.logger, now: config.now };
    this._repository = config.repository;
    this._lastSaved = this._repository?.load();

    this.books =
      this._lastSaved === undefined
        ? new Books(options)
        : Books.fromSnapshot(this._lastSaved.state, options);
    this.reconciler = new Reconciler(this.books);
    this.importer = new StatementImporter(this.books);
    this.user = config.defaultUser ?? null;
  }

  /**
   * Write the current state to the repository, if there is one.
   */
  persist(): StoredBooks | undefined {
    if (this._repository === undefined) {
      return undefined;
    }
    this._lastSaved = this._repository.save(this.books.snapshot());
    return this._lastSaved;
  }

  get lastSaved(): StoredBooks | undefined {
    return this._lastSaved;
  }

  get persistent(): boolean {
    return this._repository !== undefined;
  }
}
