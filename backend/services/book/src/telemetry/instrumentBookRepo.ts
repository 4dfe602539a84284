// backend/services/book/src/telemetry/instrumentBookRepo.ts

/**
 * Decorates a BookRepo with one span per database call. The wrapped repo's
 * results and errors pass through untouched.
 */

import { RequestAbortedError } from "../../../shared/src/middleware/requestAbort";
import type { BookRepo } from "../repo/bookRepo";
import { isBookRepoError } from "../repo/errors";
import type { SpanAttributes, Telemetry, TelemetrySpan } from "./telemetry";

function failureReason(err: unknown): string {
  if (isBookRepoError(err)) return err.kind;
  if (err instanceof RequestAbortedError) return "request_aborted";
  return "query_failed";
}

export function instrumentBookRepo(
  repo: BookRepo,
  telemetry: Telemetry
): BookRepo {
  async function traced<T>(
    name: string,
    attributes: SpanAttributes,
    call: () => Promise<T>,
    annotate: (result: T, span: TelemetrySpan) => void
  ): Promise<T> {
    const span = telemetry.startSpan(name, {
      "db.table": "books",
      ...attributes,
    });
    try {
      const result = await call();
      annotate(result, span);
      return result;
    } catch (err) {
      span.fail(failureReason(err), err);
      throw err;
    } finally {
      span.end();
    }
  }

  return {
    findAll: (signal) =>
      traced(
        "db.query.get_all_books",
        { "db.operation": "SELECT" },
        () => repo.findAll(signal),
        (books, span) => span.setAttributes({ "books.count": books.length })
      ),

    findById: (id, signal) =>
      traced(
        "db.query.get_book_by_id",
        { "db.operation": "SELECT", "db.query.id": id },
        () => repo.findById(id, signal),
        (book, span) => span.setAttributes({ "books.count": book ? 1 : 0 })
      ),

    create: (input, signal) =>
      traced(
        "db.insert.book",
        {
          "db.operation": "INSERT",
          "book.summary.length": Buffer.byteLength(input.summary, "utf8"),
        },
        () => repo.create(input, signal),
        (book, span) => span.setAttributes({ "book.id": book.id })
      ),

    update: (id, input, signal) =>
      traced(
        "db.update.book",
        { "db.operation": "UPDATE", "db.query.id": id },
        () => repo.update(id, input, signal),
        (count, span) => span.setAttributes({ "db.rows_affected": count })
      ),

    removeById: (id, signal) =>
      traced(
        "db.delete.book",
        { "db.operation": "DELETE", "db.query.id": id },
        () => repo.removeById(id, signal),
        (count, span) => span.setAttributes({ "db.rows_affected": count })
      ),

    ping: (signal) =>
      traced(
        "db.ping",
        { "db.operation": "SELECT" },
        () => repo.ping(signal),
        () => {}
      ),
  };
}
