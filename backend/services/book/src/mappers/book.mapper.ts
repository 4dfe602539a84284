// backend/services/book/src/mappers/book.mapper.ts

/**
 * Row ↔ domain conversion for the `books` table.
 * - Validate on the way out (DB → domain) so callers never see malformed data.
 * - `summary` is BYTEA in storage and UTF-8 text on the wire; NULL reads as "".
 */

import { bookRow, type Book, type BookInput } from "../contracts/book";

export function rowToDomain(row: unknown): Book {
  const r = bookRow.parse(row);
  return {
    id: r.id,
    title: r.title,
    author: r.author,
    summary: r.summary ? r.summary.toString("utf8") : "",
  };
}

/** Positional parameters for INSERT/UPDATE: [title, author, summary]. */
export function domainToParams(input: BookInput): [string, string, Buffer] {
  return [input.title, input.author, Buffer.from(input.summary, "utf8")];
}
