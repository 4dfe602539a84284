// backend/services/book/src/app.ts

/**
 * Assembles the book service on the shared builder:
 *   requestId → httpLogger → abort signal → request span → health →
 *   /books → 404 → error.
 *
 * The repo and telemetry are built by the caller (index.ts in production, the
 * tests with in-memory stand-ins) and injected here.
 */

import type { Express } from "express";
import { createServiceApp } from "../../shared/src/app/createServiceApp";
import type { BookRepo } from "./repo/bookRepo";
import { createBookRouter } from "./routes/bookRoutes";
import { guardTelemetry } from "./telemetry/guardedTelemetry";
import { traceRequests } from "./telemetry/middleware";
import { noopTelemetry, type Telemetry } from "./telemetry/telemetry";

export type BuildAppOptions = {
  repo: BookRepo;
  telemetry?: Telemetry;
  serviceName?: string;
  version?: string;
};

export function buildApp(opts: BuildAppOptions): Express {
  const { repo, serviceName = "bookapi", version } = opts;
  const telemetry = guardTelemetry(opts.telemetry ?? noopTelemetry);

  return createServiceApp({
    serviceName,
    version,
    apiPrefix: "",
    routePrefixes: ["/books"],
    middleware: [traceRequests(telemetry)],
    // Readiness only; /healthz never touches the database.
    readiness: async (req) => {
      await repo.ping(req.abortSignal);
      return { db: "ok" };
    },
    mountRoutes: (api) => {
      api.use("/books", createBookRouter({ repo, telemetry }));
    },
  });
}

export default buildApp;
