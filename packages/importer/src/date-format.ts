/**
 * @tallybook/importer — strptime-style date parsing.
 *
 * Supported directives:
 *   %Y  four-digit year        %y  two-digit year (69–99 → 19xx, else 20xx)
 *   %m  month, 1 or 2 digits   %d  day, 1 or 2 digits
 *   %b  month name, abbreviated or full, any case
 *   %%  a literal percent sign
 * Every other character must match the input exactly.
 */

import type { IsoDate } from "@tallybook/types";
import { isIsoDate } from "@tallybook/types";
import { BooksError } from "@tallybook/books";

export const DEFAULT_DATE_FORMAT = "%Y-%m-%d";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const DIRECTIVES = new Set(["Y", "y", "m", "d", "b", "%"]);

/**
 * Reject patterns with unknown directives or without a year, month and day.
 */
export function assertDateFormat(format: string): void {
  const seen = new Set<string>();
  for (let i = 0; i < format.length; i++) {
    if (format[i] !== "%") continue;
    const directive = format[i + 1];
    if (directive === undefined || !DIRECTIVES.has(directive)) {
      throw new BooksError("INVALID_CONFIGURATION", `Unsupported date directive in "${format}"`, {
        dateFormat: format,
      });
    }
    seen.add(directive);
    i++;
  }

  const hasYear = seen.has("Y") || seen.has("y");
  const hasMonth = seen.has("m") || seen.has("b");
  if (!hasYear || !hasMonth || !seen.has("d")) {
    throw new BooksError(
      "INVALID_CONFIGURATION",
      `Date format "${format}" needs a year, a month and a day`,
      { dateFormat: format },
    );
  }
}

export function parseDate(raw: string, format: string): IsoDate {
  let pos = 0;
  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;

  function fail(): never {
    throw new BooksError("INVALID_DATE", `"${raw}" does not match date format "${format}"`, {
      value: raw,
      dateFormat: format,
    });
  }

  function digits(min: number, max: number): number {
    let end = pos;
    while (end < raw.length && end - pos < max && isDigit(raw[end])) end++;
    if (end - pos < min) fail();
    const value = Number(raw.slice(pos, end));
    pos = end;
    return value;
  }

  function monthName(): number {
    const rest = raw.slice(pos).toLowerCase();
    // Full names first so "march" is not read as "mar" + "ch".
    for (const [index, name] of MONTHS.entries()) {
      if (rest.startsWith(name)) {
        pos += name.length;
        return index + 1;
      }
    }
    for (const [index, name] of MONTHS.entries()) {
      if (rest.startsWith(name.slice(0, 3))) {
        pos += 3;
        return index + 1;
      }
    }
    return fail();
  }

  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch !== "%") {
      if (raw[pos] !== ch) fail();
      pos++;
      continue;
    }

    const directive = format[++i];
    switch (directive) {
      case "Y":
        year = digits(4, 4);
        break;
      case "y": {
        const yy = digits(2, 2);
        year = yy >= 69 ? 1900 + yy : 2000 + yy;
        break;
      }
      case "m":
        month = digits(1, 2);
        break;
      case "d":
        day = digits(1, 2);
        break;
      case "b":
        month = monthName();
        break;
      case "%":
        if (raw[pos] !== "%") fail();
        pos++;
        break;
      default:
        fail();
    }
  }

  if (pos !== raw.length || year === undefined || month === undefined || day === undefined) {
    fail();
  }

  const iso = `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
  if (!isIsoDate(iso)) fail();
  return iso;
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}
