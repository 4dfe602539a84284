// backend/services/shared/src/app/createServiceApp.ts

/**
 * Builds the standard service stack:
 *   requestId → http logger → abort signal → (optional) extra middleware →
 *   health → routes → 404 → error handler.
 *
 * Notes:
 * - Body parsing is left to the routes: each resource decides its own parser.
 * - Health endpoints are mounted before any service middleware that could fail.
 */

import express, { type Express, type RequestHandler } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { requestAbortSignal } from "../middleware/requestAbort";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "bookapi"). Used in logs & trace tags. */
  serviceName: string;
  /** API base path ("" mounts routes at the root). */
  apiPrefix: string;
  /**
   * Mounts the service’s routes onto the provided Router.
   * Routes are one-liners that import handlers only.
   */
  mountRoutes: (router: express.Router) => void;
  /** Route prefixes that answer unknown paths with Problem+JSON 404s. */
  routePrefixes: string[];
  /** Middleware that runs for every request after the abort signal (tracing). */
  middleware?: RequestHandler[];
  readiness?: ReadinessFn;
  version?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    apiPrefix,
    mountRoutes,
    routePrefixes,
    middleware = [],
    readiness,
    version,
  } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));
  app.use(requestAbortSignal());
  for (const mw of middleware) app.use(mw);

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness, version }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix || "/", api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(
    notFoundProblemJson([
      ...routePrefixes.map((p) => `${apiPrefix}${p}`),
      "/healthz",
      "/readyz",
    ])
  );
  app.use(errorProblemJson());

  return app;
}
