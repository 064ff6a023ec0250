/**
 * Calendar-date helpers. Dates are "YYYY-MM-DD" strings in UTC.
 */

import type { IsoDate } from "@tallybook/types";
import { isIsoDate } from "@tallybook/types";
import { BooksError } from "./types.js";

const MS_PER_DAY = 86_400_000;

export function assertIsoDate(value: string, field = "date"): IsoDate {
  if (!isIsoDate(value)) {
    throw new BooksError("INVALID_DATE", `Invalid ${field}: "${value}" (expected YYYY-MM-DD)`, {
      field,
      value,
    });
  }
  return value;
}

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(Date.parse(`${date}T00:00:00Z`) + days * MS_PER_DAY));
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round(
    (Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY,
  );
}
