// backend/services/book/src/repo/bookRepo.ts
import type { Book, BookInput } from "../contracts/book";

/**
 * Persistence gateway for books. One statement per call, no retries.
 *
 * Every method takes the request's abort signal; an aborted call rejects with
 * RequestAbortedError. Failures reject with BookRepoError.
 */
export interface BookRepo {
  findAll(signal?: AbortSignal): Promise<Book[]>;
  findById(id: number, signal?: AbortSignal): Promise<Book | null>;
  /** Inserts and returns the stored row, id assigned by the database. */
  create(input: BookInput, signal?: AbortSignal): Promise<Book>;
  /** Whole-record replacement. Returns the affected-row count. */
  update(id: number, input: BookInput, signal?: AbortSignal): Promise<number>;
  /** Returns the affected-row count. */
  removeById(id: number, signal?: AbortSignal): Promise<number>;
  /** Cheap round-trip for readiness checks. */
  ping(signal?: AbortSignal): Promise<void>;
}
