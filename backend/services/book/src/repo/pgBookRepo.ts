// backend/services/book/src/repo/pgBookRepo.ts

/**
 * PostgreSQL implementation of BookRepo.
 *
 * Notes:
 * - Owns the pool handed to it at startup; no connection-per-request.
 * - Each call checks out a client, runs ONE parameterized statement, releases it.
 * - Insert reads the id back through RETURNING (never a "last insert id").
 * - On abort mid-statement the checked-out connection is discarded
 *   (`release(err)`), which ends the backend session running the statement.
 */

import { RequestAbortedError } from "../../../shared/src/middleware/requestAbort";
import type { Book, BookInput } from "../contracts/book";
import { domainToParams, rowToDomain } from "../mappers/book.mapper";
import type { BookRepo } from "./bookRepo";
import { BookRepoError } from "./errors";

export type SqlResult = {
  rows: unknown[];
  rowCount: number | null;
};

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(err?: Error | boolean): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
}

const COLUMNS = "id, title, author, summary";

export const BOOK_SQL = {
  findAll: `SELECT ${COLUMNS} FROM books`,
  findById: `SELECT ${COLUMNS} FROM books WHERE id = $1`,
  insert: `INSERT INTO books (title, author, summary) VALUES ($1, $2, $3) RETURNING ${COLUMNS}`,
  update: "UPDATE books SET title = $1, author = $2, summary = $3 WHERE id = $4",
  remove: "DELETE FROM books WHERE id = $1",
  ping: "SELECT 1",
} as const;

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new RequestAbortedError();
}

export class PgBookRepo implements BookRepo {
  constructor(private readonly pool: SqlPool) {}

  async findAll(signal?: AbortSignal): Promise<Book[]> {
    const { rows } = await this.run(BOOK_SQL.findAll, [], signal);
    return this.decode(rows);
  }

  async findById(id: number, signal?: AbortSignal): Promise<Book | null> {
    const { rows } = await this.run(BOOK_SQL.findById, [id], signal);
    const books = this.decode(rows);
    return books[0] ?? null;
  }

  async create(input: BookInput, signal?: AbortSignal): Promise<Book> {
    const { rows } = await this.run(
      BOOK_SQL.insert,
      domainToParams(input),
      signal
    );
    const [created] = this.decode(rows);
    if (!created) {
      throw new BookRepoError("decode_failed", "insert returned no row");
    }
    return created;
  }

  async update(
    id: number,
    input: BookInput,
    signal?: AbortSignal
  ): Promise<number> {
    const { rowCount } = await this.run(
      BOOK_SQL.update,
      [...domainToParams(input), id],
      signal
    );
    return rowCount ?? 0;
  }

  async removeById(id: number, signal?: AbortSignal): Promise<number> {
    const { rowCount } = await this.run(BOOK_SQL.remove, [id], signal);
    return rowCount ?? 0;
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.run(BOOK_SQL.ping, [], signal);
  }

  private decode(rows: unknown[]): Book[] {
    try {
      return rows.map((r) => rowToDomain(r));
    } catch (err) {
      throw new BookRepoError(
        "decode_failed",
        "failed to decode book row",
        err
      );
    }
  }

  private async run(
    text: string,
    values: unknown[],
    signal?: AbortSignal
  ): Promise<SqlResult> {
    if (signal?.aborted) throw abortReason(signal);

    const client = await this.pool.connect().catch((err: unknown) => {
      throw new BookRepoError(
        "query_failed",
        "failed to acquire connection",
        err
      );
    });

    let released = false;
    const release = (err?: Error) => {
      if (released) return;
      released = true;
      client.release(err);
    };

    // The signal may have fired while waiting for a connection.
    if (signal?.aborted) {
      release();
      throw abortReason(signal);
    }

    // The executor runs synchronously, so onAbort is bound before it is added.
    let onAbort = (): void => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => {
        const reason = signal ? abortReason(signal) : new RequestAbortedError();
        release(reason);
        reject(reason);
      };
    });
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await Promise.race([client.query(text, values), aborted]);
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      throw new BookRepoError("query_failed", "statement failed", err);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      release();
    }
  }
}
