// backend/services/book/src/handlers/book/create.ts
import type { RequestHandler } from "express";
import { requestIdOf } from "../../../../shared/src/middleware/requestId";
import { logger } from "../../../../shared/src/utils/logger";
import { bookWriteDto } from "../../contracts/book";
import type { BookRepo } from "../../repo/bookRepo";
import { setOutcome } from "../../telemetry/middleware";
import { failPersistence, rejectRequest } from "./failures";
import { hasRequestBody } from "./params";

const TAG = "[BookHandlers.create]";

/** POST /books → 201 with the stored book, id assigned by the database. */
export function create(repo: BookRepo): RequestHandler {
  return async (req, res, next) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, `${TAG} enter`);

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
      const created = await repo.create(dto.data, req.abortSignal);
      logger.debug({ requestId, bookId: created.id }, `${TAG} exit`);
      setOutcome(res, "success");
      res.status(201).json(created);
    } catch (err) {
      failPersistence(
        req,
        res,
        next,
        TAG,
        "create_failed",
        "Failed to create book",
        err
      );
    }
  };
}

export default create;
