// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Starting/stopping an HTTP server is a single concern: bind, harden socket
 * timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so repeated calls don’t stack handlers.
 * - `stop()` stops accepting connections, drops idle keep-alive sockets, and
 *   gives in-flight requests `gracePeriodMs` before force-closing the rest.
 * - headersTimeout > keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";

type PinoLike = {
  info: (o: object, m?: string) => void;
  warn: (o: object, m?: string) => void;
  error: (o: object, m?: string) => void;
};

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: PinoLike;
  /** Window for in-flight requests on shutdown. Default 30s. */
  gracePeriodMs?: number;
  /** Release resources (pool, telemetry) after the server has closed. */
  onShutdown?: () => Promise<void>;
  /** Install SIGINT/SIGTERM handlers. Default true; tests turn it off. */
  handleSignals?: boolean;
}

export interface StartedService {
  server: Server;
  /** Resolves once the server is bound. */
  listening: Promise<number>;
  stop: () => Promise<void>;
}

export const DEFAULT_GRACE_PERIOD_MS = 30_000;

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const {
    app,
    port,
    serviceName,
    logger,
    gracePeriodMs = DEFAULT_GRACE_PERIOD_MS,
    onShutdown,
    handleSignals = true,
  } = opts;

  const server = app.listen(port);

  const listening = new Promise<number>((resolve, reject) => {
    server.once("listening", () => {
      const addr = server.address();
      const boundPort = typeof addr === "object" && addr ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");
      resolve(boundPort);
    });
    server.once("error", reject);
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
  });

  let stopping: Promise<void> | null = null;

  const stop = (): Promise<void> => {
    if (stopping) return stopping;
    stopping = new Promise<void>((resolve, reject) => {
      const force = setTimeout(() => {
        logger.warn(
          { service: serviceName, gracePeriodMs },
          "grace period elapsed; closing remaining connections"
        );
        server.closeAllConnections();
      }, gracePeriodMs);
      force.unref();

      server.close((err) => {
        clearTimeout(force);
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });
    return stopping;
  };

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(() => {
        logger.info({ service: serviceName }, "service exited");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err, service: serviceName }, "forced shutdown");
        process.exit(1);
      });
  };

  if (handleSignals) {
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  }

  return { server, listening, stop };
}
