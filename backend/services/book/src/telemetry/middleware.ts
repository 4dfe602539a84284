// backend/services/book/src/telemetry/middleware.ts

/**
 * Request-level instrumentation as middleware, so handlers stay
 * instrumentation-agnostic. Handlers only label their result with
 * `setOutcome(res, ...)`.
 */

import type { Request, RequestHandler, Response } from "express";
import type { BookOperation, BookOutcome, Telemetry } from "./telemetry";

/** Label this response's outcome for operation metrics. */
export function setOutcome(res: Response, outcome: BookOutcome): void {
  res.locals.outcome = outcome;
}

function outcomeOf(res: Response): string {
  const labelled: unknown = res.locals.outcome;
  if (typeof labelled === "string") return labelled;
  if (!res.writableFinished) return "request_aborted";
  return res.statusCode < 400 ? "success" : `http_${res.statusCode}`;
}

/** One span per request, active for everything downstream. */
export function traceRequests(telemetry: Telemetry): RequestHandler {
  return (req, res, next) => {
    const span = telemetry.startSpan("http.request", {
      "http.method": req.method,
      "http.url": req.originalUrl,
      "http.user_agent": req.get("user-agent") ?? "",
    });

    res.once("close", () => {
      span.setAttributes({ "http.status_code": res.statusCode });
      if (!res.writableFinished) span.fail("request_aborted");
      else if (res.statusCode >= 500) span.fail(`http_${res.statusCode}`);
      span.end();
    });

    telemetry.runInSpan(span, () => next());
  };
}

type OperationResolver = BookOperation | ((req: Request) => BookOperation);

/** Counter + timer per operation, keyed by outcome. */
export function operationMetrics(
  telemetry: Telemetry,
  operation: OperationResolver
): RequestHandler {
  return (req, res, next) => {
    const started = performance.now();
    const op = typeof operation === "function" ? operation(req) : operation;

    res.once("close", () => {
      const elapsed = performance.now() - started;
      telemetry.recordOperation(op, outcomeOf(res), elapsed);
    });

    next();
  };
}
