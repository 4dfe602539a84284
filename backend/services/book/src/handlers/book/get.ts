// backend/services/book/src/handlers/book/get.ts
import type { RequestHandler } from "express";
import { requestIdOf } from "../../../../shared/src/middleware/requestId";
import { logger } from "../../../../shared/src/utils/logger";
import type { Book } from "../../contracts/book";
import type { BookRepo } from "../../repo/bookRepo";
import { isBookRepoError } from "../../repo/errors";
import { setOutcome } from "../../telemetry/middleware";
import { failPersistence, rejectRequest } from "./failures";
import { readIdParam } from "./params";

const TAG = "[BookHandlers.get]";

/**
 * GET /books          → every row, `[]` when the table is empty
 * GET /books?id=<id>  → `[book]`, or `[]` when no row has that id (not a 404)
 */
export function get(repo: BookRepo): RequestHandler {
  return async (req, res, next) => {
    const requestId = requestIdOf(req);
    const param = readIdParam(req);
    logger.debug({ requestId, param }, `${TAG} enter`);

    if (param.kind === "invalid") {
      return rejectRequest(
        req,
        res,
        TAG,
        400,
        "invalid_book_id",
        "Invalid book ID"
      );
    }

    try {
      let books: Book[];
      if (param.kind === "ok") {
        const book = await repo.findById(param.id, req.abortSignal);
        books = book ? [book] : [];
      } else {
        books = await repo.findAll(req.abortSignal);
      }

      logger.debug({ requestId, count: books.length }, `${TAG} exit`);
      setOutcome(res, "success");
      res.status(200).json(books);
    } catch (err) {
      const detail =
        isBookRepoError(err) && err.kind === "decode_failed"
          ? "Failed to decode books"
          : "Failed to query books";
      failPersistence(req, res, next, TAG, "query_failed", detail, err);
    }
  };
}

export default get;
