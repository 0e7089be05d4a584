import type { Pool } from "pg";

import { dbLogger } from "./logger";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS countries (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    name_key TEXT NOT NULL,
    capital TEXT,
    region TEXT,
    population BIGINT NOT NULL DEFAULT 0 CHECK (population >= 0),
    currency_code TEXT,
    exchange_rate DOUBLE PRECISION CHECK (exchange_rate > 0),
    estimated_gdp DOUBLE PRECISION NOT NULL DEFAULT 0 CHECK (estimated_gdp >= 0),
    flag_url TEXT,
    last_refreshed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  -- name_key is written by the application with the same folding the
  -- reconciler matches on; LOWER() folds some letters differently
  CREATE UNIQUE INDEX IF NOT EXISTS countries_name_key_key
    ON countries (name_key);

  CREATE TABLE IF NOT EXISTS cache_status (
    id SMALLINT PRIMARY KEY CHECK (id = 1),
    last_full_refresh_at TIMESTAMPTZ
  );
`;

export const initializeDB = async (pool: Pool): Promise<void> => {
  await pool.query(SCHEMA_SQL);
  dbLogger.info("Database schema ready");
};
