// backend/services/book/src/handlers/book/update.ts
import type { RequestHandler } from "express";
import { requestIdOf } from "../../../../shared/src/middleware/requestId";
import { logger } from "../../../../shared/src/utils/logger";
import { bookWriteDto } from "../../contracts/book";
import type { BookRepo } from "../../repo/bookRepo";
import { setOutcome } from "../../telemetry/middleware";
import { failPersistence, rejectRequest } from "./failures";
import { hasRequestBody, readIdParam } from "./params";

const TAG = "[BookHandlers.update]";

/**
 * PUT /books?id=<id> → whole-record replacement of title, author, summary.
 * 200 with an empty body, 404 when no row has that id.
 */
export function update(repo: BookRepo): RequestHandler {
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

    const dto = bookWriteDto.safeParse(req.body);
    if (!hasRequestBody(req) || !dto.success) {
      return rejectRequest(
        req,
        res,
        TAG,
        400,
        "invalid_request_body",
        "Invalid request body"
      );
    }

    try {
      const affected = await repo.update(param.id, dto.data, req.abortSignal);
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
      logger.debug({ requestId, bookId: param.id, affected }, `${TAG} exit`);
      setOutcome(res, "success");
      res.status(200).end();
    } catch (err) {
      failPersistence(
        req,
        res,
        next,
        TAG,
        "update_failed",
        "Failed to update book",
        err
      );
    }
  };
}

export default update;
