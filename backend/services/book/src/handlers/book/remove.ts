// backend/services/book/src/handlers/book/remove.ts
import type { RequestHandler } from "express";
import { requestIdOf } from "../../../../shared/src/middleware/requestId";
import { logger } from "../../../../shared/src/utils/logger";
import type { BookRepo } from "../../repo/bookRepo";
import { setOutcome } from "../../telemetry/middleware";
import { failPersistence, rejectRequest } from "./failures";
import { readIdParam } from "./params";

const TAG = "[BookHandlers.remove]";

/** DELETE /books?id=<id> → 204, or 404 when no row has that id. */
export function remove(repo: BookRepo): RequestHandler {
  return async (req, res, next) => {
    const requestId = requestIdOf(req);
    const param = readIdParam(req);
    logger.debug({ requestId, param }, `${TAG} enter`);

    if (param.kind === "absent") {
      return rejectRequest(
        req,
        res,
        TAG,
        400,
        "missing_book_id",
        "Missing book ID"
      );
    }
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
      const affected = await repo.removeById(param.id, req.abortSignal);
      if (affected === 0) {
        return rejectRequest(
          req,
          res,
          TAG,
          404,
          "book_not_found",
          "Book not found"
        );
      }
      logger.debug({ requestId, bookId: param.id }, `${TAG} exit`);
      setOutcome(res, "success");
      res.status(204).end();
    } catch (err) {
      failPersistence(
        req,
        res,
        next,
        TAG,
        "delete_failed",
        "Failed to delete book",
        err
      );
    }
  };
}

export default remove;
