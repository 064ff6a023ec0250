/**
 * @tallybook/books — Snapshot persistence.
 *
 * The whole book is saved as one canonical-JSON document with a SHA-256
 * stateHash over the canonical state. Loading verifies the hash and the
 * shape before anything is restored.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { LedgerError } from "@tallybook/ledger";
import { BooksSnapshotSchema } from "./snapshot-schema.js";
import type { BooksSnapshot } from "./types.js";

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeStateHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * A persisted snapshot with metadata.
 */
export interface StoredBooks {
  readonly savedAt: string;
  readonly stateHash: string;
  readonly state: BooksSnapshot;
}

export interface BooksRepository {
  save(state: BooksSnapshot): StoredBooks;

  /** @returns undefined when nothing has been saved yet */
  load(): StoredBooks | undefined;
}

/**
 * Verify that a stored snapshot's stateHash matches its state.
 */
export function verifyStoredBooks(stored: StoredBooks): boolean {
  return stored.stateHash !== "" && stored.stateHash === computeStateHash(stored.state);
}

function stamp(state: BooksSnapshot): StoredBooks {
  return {
    savedAt: new Date().toISOString(),
    stateHash: computeStateHash(state),
    state,
  };
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryBooksRepository implements BooksRepository {
  private _stored: StoredBooks | undefined;

  save(state: BooksSnapshot): StoredBooks {
    this._stored = stamp(state);
    return this._stored;
  }

  load(): StoredBooks | undefined {
    return this._stored;
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * Stores the books as a single JSON file. Writes go to a temporary file
 * first and are renamed into place.
 */
export class FileBooksRepository implements BooksRepository {
  constructor(private readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  save(state: BooksSnapshot): StoredBooks {
    const stored = stamp(state);
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, canonicalize(stored), "utf-8");
    renameSync(tmp, this.filePath);
    return stored;
  }

  load(): StoredBooks | undefined {
    if (!existsSync(this.filePath)) {
      return undefined;
    }

    const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
    if (typeof raw !== "object" || raw === null) {
      throw new LedgerError("INVALID_SNAPSHOT", `${this.filePath} does not hold a books snapshot`);
    }

    const savedAt = "savedAt" in raw && typeof raw.savedAt === "string" ? raw.savedAt : "";
    const stateHash = "stateHash" in raw && typeof raw.stateHash === "string" ? raw.stateHash : "";
    const state: unknown = "state" in raw ? raw.state : undefined;

    if (stateHash === "" || stateHash !== computeStateHash(state)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Books snapshot ${this.filePath} failed its integrity check`,
      );
    }

    const parsed = BooksSnapshotSchema.safeParse(state);
    if (!parsed.success) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Books snapshot ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }

    return { savedAt, stateHash, state: parsed.data };
  }

  get path(): string {
    return this.filePath;
  }
}
