import type { Pool } from "pg"

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS countries (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    capital TEXT,
    region TEXT,
    population BIGINT NOT NULL,
    currency_code TEXT,
    exchange_rate DOUBLE PRECISION,
    estimated_gdp DOUBLE PRECISION,
    flag_url TEXT,
    last_refreshed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE UNIQUE INDEX IF NOT EXISTS countries_name_key ON countries (name);
  CREATE INDEX IF NOT EXISTS countries_region_idx ON countries (region);

  CREATE TABLE IF NOT EXISTS api_status (
    id SERIAL PRIMARY KEY,
    last_updated TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`

export const initializeDB = async (pool: Pool) => {
  await pool.query(SCHEMA_SQL)
  console.log("[DB] Tables checked/created successfully")
}
