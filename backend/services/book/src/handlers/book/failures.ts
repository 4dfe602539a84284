// backend/services/book/src/handlers/book/failures.ts
import type { NextFunction, Request, Response } from "express";
import { sendProblem } from "../../../../shared/src/middleware/problemJson";
import { RequestAbortedError } from "../../../../shared/src/middleware/requestAbort";
import { requestIdOf } from "../../../../shared/src/middleware/requestId";
import { logger } from "../../../../shared/src/utils/logger";
import { isBookRepoError } from "../../repo/errors";
import { setOutcome } from "../../telemetry/middleware";
import type { BookOutcome } from "../../telemetry/telemetry";

/** 4xx the client can fix. No escalation beyond debug. */
export function rejectRequest(
  req: Request,
  res: Response,
  tag: string,
  status: 400 | 404,
  outcome: BookOutcome,
  detail: string
): void {
  logger.debug({ requestId: requestIdOf(req), outcome }, `${tag} ${outcome}`);
  setOutcome(res, outcome);
  sendProblem(req, res, status, detail, outcome.toUpperCase());
}

/**
 * Persistence failures become an opaque 500; the cause stays in the log.
 * Aborted requests get no response (the client is gone). Anything else is
 * not ours to interpret and goes to the error formatter.
 */
export function failPersistence(
  req: Request,
  res: Response,
  next: NextFunction,
  tag: string,
  failed: BookOutcome,
  detail: string,
  err: unknown
): void {
  const requestId = requestIdOf(req);

  if (err instanceof RequestAbortedError) {
    logger.debug({ requestId }, `${tag} aborted`);
    setOutcome(res, "request_aborted");
    return;
  }

  if (isBookRepoError(err)) {
    const outcome = err.kind === "decode_failed" ? "decode_failed" : failed;
    logger.error({ requestId, kind: err.kind, err }, `${tag} ${outcome}`);
    setOutcome(res, outcome);
    sendProblem(req, res, 500, detail);
    return;
  }

  logger.error({ requestId, err }, `${tag} error`);
  setOutcome(res, failed);
  next(err);
}
