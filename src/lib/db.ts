/**
 * PostgreSQL Pool Singleton
 * Ensures a single database connection pool across the application
 * Uses lazy initialization to ensure environment variables are loaded first
 */

import pg from "pg";
import { getEnvVar } from "../config/constants.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Get or create the pool
 * This ensures DATABASE_URL is available when the pool is first used
 */
export function getPool(): pg.Pool {
  if (pool) {
    return pool;
  }

  const databaseUrl = getEnvVar("DATABASE_URL");

  pool = new Pool({
    connectionString: databaseUrl,
    // Add SSL for Supabase/production
    ssl: databaseUrl.includes("supabase")
      ? { rejectUnauthorized: false }
      : undefined,
  });

  return pool;
}

/**
 * Close the pool (graceful shutdown)
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
}
