// backend/services/book/src/repo/errors.ts

/**
 * Persistence failures, split by where they happened:
 *  - query_failed  : connection/statement error from the driver
 *  - decode_failed : the driver answered but a row did not match the contract
 * Both surface to clients as opaque 500s; the kind is for logs and spans.
 */

export type BookRepoErrorKind = "query_failed" | "decode_failed";

export class BookRepoError extends Error {
  readonly kind: BookRepoErrorKind;

  constructor(kind: BookRepoErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BookRepoError";
    this.kind = kind;
  }
}

export function isBookRepoError(err: unknown): err is BookRepoError {
  return err instanceof BookRepoError;
}
