import { Pool } from "pg";

/**
 * Postgres pool. Hosted databases (railway, render) require TLS without a
 * verifiable chain.
 */
export function createPool(databaseUrl: string): Pool {
  const hosted = /railway|render\.com|sslmode=require/.test(databaseUrl);
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: hosted ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (err) => {
    console.error("[DB] Idle client error:", err.message);
  });

  return pool;
}
