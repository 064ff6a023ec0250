/**
 * An id-keyed table of immutable rows with its own id sequence.
 */

import type { TableSnapshot } from "./types.js";
import { BooksError } from "./types.js";

export class Table<T extends { readonly id: number }> {
  private readonly _rows: Map<number, T> = new Map();
  private _nextId = 1;

  /**
   * @param label - Row kind used in NOT_FOUND messages ("invoice", "bank transaction")
   */
  constructor(private readonly label: string) {}

  insert(build: (id: number) => T): T {
    const row = build(this._nextId++);
    this._rows.set(row.id, row);
    return row;
  }

  get(id: number): T | undefined {
    return this._rows.get(id);
  }

  require(id: number): T {
    const row = this._rows.get(id);
    if (row === undefined) {
      throw new BooksError("NOT_FOUND", `Unknown ${this.label}: ${String(id)}`, {
        kind: this.label,
        id,
      });
    }
    return row;
  }

  /**
   * Replace a row with a patched copy.
   */
  update(id: number, patch: Partial<Omit<T, "id">>): T {
    const updated: T = { ...this.require(id), ...patch };
    this._rows.set(id, updated);
    return updated;
  }

  delete(id: number): void {
    this.require(id);
    this._rows.delete(id);
  }

  /** Rows in id order. */
  all(): readonly T[] {
    return [...this._rows.values()].sort((a, b) => a.id - b.id);
  }

  filter(predicate: (row: T) => boolean): readonly T[] {
    return this.all().filter(predicate);
  }

  find(predicate: (row: T) => boolean): T | undefined {
    return this.all().find(predicate);
  }

  get size(): number {
    return this._rows.size;
  }

  snapshot(): TableSnapshot<T> {
    return { rows: this.all(), nextId: this._nextId };
  }

  restore(snapshot: TableSnapshot<T>): void {
    this._rows.clear();
    for (const row of snapshot.rows) {
      this._rows.set(row.id, row);
    }
    this._nextId = snapshot.nextId;
  }
}
