// backend/services/book/src/bootstrap.ts

/**
 * Side-effect module: load env files, then freeze the config and tag the
 * shared logger with this service's name. Import FIRST from index.ts.
 *
 * Env files are looked up in the working directory (`npm start` runs at the
 * repo root): .env.<NODE_ENV>, then .env. Injected env wins over files.
 */

import { loadEnvForService } from "../../shared/src/env";
import { initLogger, logger } from "../../shared/src/utils/logger";
import { loadConfig } from "./config";

const loadedFiles = loadEnvForService(process.cwd());

export const config = loadConfig();
export const SERVICE_NAME = config.serviceName;

initLogger(SERVICE_NAME, config.logLevel);

logger.debug({ files: loadedFiles }, `[${SERVICE_NAME}] env loaded`);
