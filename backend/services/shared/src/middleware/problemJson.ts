// backend/services/shared/src/middleware/problemJson.ts

/**
 * Error responses are RFC 7807 Problem+JSON so clients/tests can rely on a
 * stable shape across services.
 *
 * Notes:
 * - Transport-level formatting, not business logic.
 * - 5xx detail is always generic. The cause goes to the log, never the body.
 * - 404s are only formatted for known prefixes; everything else gets a bare 404.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { extractLogContext, logger } from "../utils/logger";
import { requestIdOf } from "./requestId";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type Problem = {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  code?: string;
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

export function titleFor(status: number): string {
  return (
    TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Request Error")
  );
}

/** Write a Problem+JSON response. */
export function sendProblem(
  req: Request,
  res: Response,
  status: number,
  detail: string,
  code?: string
): void {
  const body: Problem = {
    type: "about:blank",
    title: titleFor(status),
    status,
    detail,
    instance: requestIdOf(req),
    ...(code ? { code } : {}),
  };
  res.status(status).type(PROBLEM_CONTENT_TYPE).json(body);
}

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 */
export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      sendProblem(req, res, 404, "Route not found", "NOT_FOUND");
      return;
    }
    res.status(404).end();
  };
}

type ErrorFields = {
  status: number;
  expose: boolean;
  message: string;
  code?: string;
};

function errorFields(err: unknown): ErrorFields {
  if (typeof err !== "object" || err === null) {
    return { status: 500, expose: false, message: String(err) };
  }
  const statusCode: unknown = Reflect.get(err, "statusCode");
  const statusProp: unknown = Reflect.get(err, "status");
  const expose: unknown = Reflect.get(err, "expose");
  const code: unknown = Reflect.get(err, "code");
  const candidate = Number(statusCode ?? statusProp ?? 500);
  const status =
    Number.isInteger(candidate) && candidate >= 400 && candidate < 600
      ? candidate
      : 500;
  return {
    status,
    expose: expose === true && status < 500,
    message: err instanceof Error ? err.message : "Unhandled error",
    code: typeof code === "string" ? code : undefined,
  };
}

/**
 * Error formatter: converts anything passed to next(err) into Problem+JSON.
 */
export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { status, expose, message, code } = errorFields(err);

    if (status >= 500) {
      logger.error(
        { ...extractLogContext(req), status, err },
        "request error"
      );
    } else {
      logger.debug(
        { ...extractLogContext(req), status, message },
        "request rejected"
      );
    }

    const detail =
      status >= 500 ? "Unexpected error" : expose ? message : "Request Error";
    sendProblem(req, res, status, detail, status < 500 ? code : undefined);
  };
}
