import pg from "pg";

import { config } from "./env";
import { dbLogger } from "./logger";

const { Pool } = pg;

const pool = new Pool({
  connectionString: config.databaseUrl,
  ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
});

pool.on("error", (err) => {
  dbLogger.error({ err }, "Idle database client error");
});

export async function closePool(): Promise<void> {
  await pool.end();
  dbLogger.info("Database pool closed");
}

export default pool;
