// backend/services/shared/src/middleware/requestAbort.ts

/**
 * Attaches `req.abortSignal`, which fires when the client goes away before the
 * response has been fully written. Handlers pass it down to I/O so in-flight
 * database work is cancelled with the request.
 *
 * Notes:
 * - `res` "close" fires on every response; only a close before "finish"
 *   (`!res.writableFinished`) is an abort.
 */

import type { RequestHandler } from "express";

export class RequestAbortedError extends Error {
  readonly code = "REQUEST_ABORTED";

  constructor(message = "Request aborted by client") {
    super(message);
    this.name = "RequestAbortedError";
  }
}

export function requestAbortSignal(): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    req.abortSignal = controller.signal;

    res.once("close", () => {
      if (!res.writableFinished) {
        controller.abort(new RequestAbortedError());
      }
    });

    next();
  };
}
