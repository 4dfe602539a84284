// backend/services/shared/src/middleware/requestId.ts

/**
 * Every inbound request carries a stable correlation key so logs, spans and
 * Problem+JSON bodies can be tied together.
 *
 * Notes:
 * - Order matters. Mount before the http logger and anything that logs.
 * - Never overwrite a caller-supplied ID; mint a UUID only when the request
 *   lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();

    req.id = String(id);
    res.setHeader("x-request-id", String(id));

    next();
  };
}

/** Correlation id for a request, as set by requestIdMiddleware. */
export function requestIdOf(req: { id?: unknown }): string | undefined {
  return req.id === undefined || req.id === null ? undefined : String(req.id);
}
