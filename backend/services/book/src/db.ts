// backend/services/book/src/db.ts
import { Pool } from "pg";
import { logger } from "../../shared/src/utils/logger";
import type { SqlPool } from "./repo/pgBookRepo";

/**
 * The single process-wide pg pool, created explicitly at startup and handed to
 * the repo. Pooling policy is the driver's default.
 */
export function createPool(databaseUrl: string): Pool {
  const pool = new Pool({ connectionString: databaseUrl });
  // An idle client losing its connection must not crash the process.
  pool.on("error", (err) => {
    logger.error(
      { component: "postgres", err },
      "[Postgres-book] idle client error"
    );
  });
  return pool;
}

/** Narrow a pg Pool to what the repo needs. */
export function asSqlPool(pool: Pool): SqlPool {
  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
  };
}

export function redactUrl(url: string): string {
  return url.replace(/:\/\/.*@/, "://***:***@");
}

/** Fail fast: one round-trip before the HTTP server binds. */
export async function connectDb(
  pool: Pool,
  databaseUrl: string
): Promise<void> {
  try {
    await pool.query("SELECT 1");
    logger.info(
      { component: "postgres", url: redactUrl(databaseUrl) },
      "[Postgres-book] Connected"
    );
  } catch (err) {
    logger.error(
      {
        component: "postgres",
        url: redactUrl(databaseUrl),
        error: err instanceof Error ? err.message : String(err),
      },
      "[Postgres-book] Connection error"
    );
    throw err;
  }
}

export async function disconnectDb(pool: Pool): Promise<void> {
  await pool.end();
  logger.info({ component: "postgres" }, "[Postgres-book] Disconnected");
}
