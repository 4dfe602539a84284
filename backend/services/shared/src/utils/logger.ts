// backend/services/shared/src/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service calls `initLogger(SERVICE_NAME, LOG_LEVEL)` at bootstrap,
 * BEFORE creating any request loggers (pino-http binds a child of `logger`).
 *
 * Usage:
 *   import { initLogger } from "../../shared/src/utils/logger";
 *   initLogger(config.serviceName, config.logLevel);
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(value: string): value is LevelWithSilent {
  return validLevels.has(value);
}

function initialLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim();
  return isLogLevel(raw) ? raw : "info";
}

// NOTE: no "service" in base until initLogger() runs.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: initialLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? logger.level,
    base: { service: SERVICE_NAME },
  });
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

/** Set level dynamically (e.g., in tests) */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
}

export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  ip: string | undefined;
  service: string | undefined;
};

export function extractLogContext(req: Request): LogContext {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const fromHeader = Array.isArray(hdr) ? hdr[0] : hdr;
  const id = req.id === undefined ? fromHeader : String(req.id);
  return {
    requestId: id || null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
