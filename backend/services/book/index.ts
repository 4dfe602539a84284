// backend/services/book/index.ts

/**
 * Keep start-up boring and reliable: load env + config (bootstrap), connect
 * the pool and ping it (fail fast), then start HTTP with startHttpService.
 * Shutdown: drain HTTP within the grace period, then end the pool.
 */

import { config, SERVICE_NAME } from "./src/bootstrap";
import { startHttpService } from "../shared/src/bootstrap/startHttpService";
import { logger } from "../shared/src/utils/logger";
import { buildApp } from "./src/app";
import { asSqlPool, connectDb, createPool, disconnectDb } from "./src/db";
import { PgBookRepo } from "./src/repo/pgBookRepo";
import { instrumentBookRepo } from "./src/telemetry/instrumentBookRepo";
import { guardTelemetry } from "./src/telemetry/guardedTelemetry";
import { createOtelTelemetry } from "./src/telemetry/otelTelemetry";
import { noopTelemetry } from "./src/telemetry/telemetry";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const pool = createPool(config.databaseUrl);
  try {
    await connectDb(pool, config.databaseUrl);
  } catch (err) {
    await pool.end();
    throw err;
  }

  const telemetry = guardTelemetry(
    config.telemetryEnabled
      ? createOtelTelemetry(SERVICE_NAME, config.serviceVersion)
      : noopTelemetry
  );
  const repo = instrumentBookRepo(new PgBookRepo(asSqlPool(pool)), telemetry);

  const app = buildApp({
    repo,
    telemetry,
    serviceName: SERVICE_NAME,
    version: config.serviceVersion,
  });

  const service = startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    gracePeriodMs: config.shutdownGraceMs,
    onShutdown: () => disconnectDb(pool),
  });
  await service.listening;
}

start().catch((err: unknown) => {
  logger.fatal({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
