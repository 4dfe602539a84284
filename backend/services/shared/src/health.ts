// backend/services/shared/src/health.ts

/**
 * Liveness and readiness with stable URLs for ops and k8s.
 * - Liveness answers “is the process up?” (no dependencies, fixed body).
 * - Readiness answers “can this instance take traffic?” (fast, bounded checks).
 *
 * Exposes:
 *   GET /healthz -> 200 "OK" (text/plain)
 *   GET /readyz  -> 200 { ok: true, ... } | 503 { ok: false, error }
 */

import express from "express";
import { requestIdOf } from "./middleware/requestId";

export type ReadinessDetails = Record<string, string | number | boolean>;
export type ReadinessFn = (
  req: express.Request
) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  /** Optional readiness checker. Keep it fast. */
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (_req: express.Request, res: express.Response) => {
    res.status(200).type("text/plain").send("OK");
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, requestId: requestIdOf(req), ...details });
    } catch (err) {
      // 503 signals "not ready" to orchestrators.
      res.status(503).json({
        ...base,
        ok: false,
        requestId: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/healthz", liveness);
  router.get("/readyz", (req, res, next) => {
    readiness(req, res).catch(next);
  });

  return router;
}
