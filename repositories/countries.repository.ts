import type { Pool, PoolClient } from "pg"
import type { CountryExchangeRecord } from "../utils/fetchCountryData"

export type SortField = "name" | "population" | "estimated_gdp"
export type SortDirection = "asc" | "desc"

export interface ListCountriesQuery {
  skip: number
  limit: number
  region?: string
  currency?: string
  sortBy: SortField
  /** Overrides the field's natural direction (ascending for name, descending for numbers). */
  direction?: SortDirection
}

export interface CountryRow extends CountryExchangeRecord {
  id: number
}

export interface ApiStatusRow {
  id: number
  last_updated: string
}

export interface StatusSummary {
  status: ApiStatusRow | null
  totalCountries: number
}

export interface RefreshWriteSummary {
  inserted: number
  updated: number
  total: number
}

export interface CountryRepository {
  /** Upserts every record by name and stamps the status row, atomically. */
  saveRefresh(records: CountryExchangeRecord[], refreshedAt: Date): Promise<RefreshWriteSummary>
  list(query: ListCountriesQuery): Promise<CountryRow[]>
  findByName(name: string): Promise<CountryRow | null>
  deleteByName(name: string): Promise<boolean>
  getStatus(): Promise<StatusSummary>
  topByGdp(limit: number): Promise<CountryRow[]>
}

export const COUNTRY_COLUMNS =
  "id, name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at"

export const UPSERT_COUNTRY_SQL = `
  INSERT INTO countries
  (name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT (name)
  DO UPDATE SET
    capital = EXCLUDED.capital,
    region = EXCLUDED.region,
    population = EXCLUDED.population,
    currency_code = EXCLUDED.currency_code,
    exchange_rate = EXCLUDED.exchange_rate,
    estimated_gdp = EXCLUDED.estimated_gdp,
    flag_url = EXCLUDED.flag_url,
    last_refreshed_at = EXCLUDED.last_refreshed_at
  RETURNING (xmax = 0) AS inserted;
`

// Removes the same single row findByName would return.
export const DELETE_COUNTRY_SQL = `
  DELETE FROM countries
  WHERE id = (SELECT id FROM countries WHERE LOWER(name) = LOWER($1) ORDER BY id LIMIT 1)
`

const NATURAL_DIRECTION: Record<SortField, SortDirection> = {
  name: "asc",
  population: "desc",
  estimated_gdp: "desc",
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&")
}

export function buildListQuery(query: ListCountriesQuery): { text: string; values: unknown[] } {
  const values: unknown[] = []
  const where: string[] = []

  if (query.region) {
    values.push(`%${escapeLike(query.region)}%`)
    where.push(`region ILIKE $${values.length}`)
  }

  if (query.currency) {
    values.push(query.currency.toUpperCase())
    where.push(`currency_code = $${values.length}`)
  }

  const direction = query.direction ?? NATURAL_DIRECTION[query.sortBy]
  const nulls = query.sortBy === "name" ? "" : " NULLS LAST"
  const order = `ORDER BY ${query.sortBy} ${direction.toUpperCase()}${nulls}, id ASC`

  values.push(query.limit)
  const limit = `LIMIT $${values.length}`
  values.push(query.skip)
  const offset = `OFFSET $${values.length}`

  const text = [
    `SELECT ${COUNTRY_COLUMNS} FROM countries`,
    where.length ? "WHERE " + where.join(" AND ") : "",
    order,
    limit,
    offset,
  ]
    .filter(Boolean)
    .join(" ")

  return { text, values }
}

interface PgCountryRow {
  id: number
  name: string
  capital: string | null
  region: string | null
  // BIGINT arrives as a string from node-postgres.
  population: string | number
  currency_code: string | null
  exchange_rate: number | null
  estimated_gdp: number | null
  flag_url: string | null
  last_refreshed_at: Date | string
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString()
}

export function toCountryRow(row: PgCountryRow): CountryRow {
  return {
    id: row.id,
    name: row.name,
    capital: row.capital,
    region: row.region,
    population: Number(row.population),
    currency_code: row.currency_code,
    exchange_rate: row.exchange_rate,
    estimated_gdp: row.estimated_gdp,
    flag_url: row.flag_url,
    last_refreshed_at: toIso(row.last_refreshed_at),
  }
}

export class PgCountryRepository implements CountryRepository {
  constructor(private readonly pool: Pool) {}

  async saveRefresh(records: CountryExchangeRecord[], refreshedAt: Date): Promise<RefreshWriteSummary> {
    const client = await this.pool.connect()
    let brokenClientError: Error | undefined
    try {
      await client.query("BEGIN")

      let inserted = 0
      let updated = 0
      for (const c of records) {
        const result = await client.query<{ inserted: boolean }>(UPSERT_COUNTRY_SQL, [
          c.name,
          c.capital,
          c.region,
          c.population,
          c.currency_code,
          c.exchange_rate,
          c.estimated_gdp,
          c.flag_url,
          c.last_refreshed_at,
        ])
        if (result.rows[0]?.inserted) inserted++
        else updated++
      }

      await this.stampStatus(client, refreshedAt)

      const count = await client.query<{ total: number }>("SELECT COUNT(*)::int AS total FROM countries")
      await client.query("COMMIT")

      return { inserted, updated, total: count.rows[0]?.total ?? 0 }
    } catch (err) {
      try {
        await client.query("ROLLBACK")
      } catch (rollbackErr) {
        console.error("[DB] Rollback failed:", rollbackErr)
        // Passing an error to release() destroys the client instead of pooling it.
        brokenClientError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr))
      }
      throw err
    } finally {
      client.release(brokenClientError)
    }
  }

  private async stampStatus(client: PoolClient, refreshedAt: Date): Promise<void> {
    const existing = await client.query<{ id: number }>("SELECT id FROM api_status ORDER BY id LIMIT 1")
    const row = existing.rows[0]
    if (row) {
      await client.query("UPDATE api_status SET last_updated = $1 WHERE id = $2", [refreshedAt, row.id])
    } else {
      await client.query("INSERT INTO api_status (last_updated) VALUES ($1)", [refreshedAt])
    }
  }

  async list(query: ListCountriesQuery): Promise<CountryRow[]> {
    const { text, values } = buildListQuery(query)
    const { rows } = await this.pool.query<PgCountryRow>(text, values)
    return rows.map(toCountryRow)
  }

  async findByName(name: string): Promise<CountryRow | null> {
    const { rows } = await this.pool.query<PgCountryRow>(
      `SELECT ${COUNTRY_COLUMNS} FROM countries WHERE LOWER(name) = LOWER($1) ORDER BY id LIMIT 1`,
      [name]
    )
    const row = rows[0]
    return row ? toCountryRow(row) : null
  }

  async deleteByName(name: string): Promise<boolean> {
    const result = await this.pool.query(DELETE_COUNTRY_SQL, [name])
    return (result.rowCount ?? 0) > 0
  }

  async getStatus(): Promise<StatusSummary> {
    const [statusResult, countResult] = await Promise.all([
      this.pool.query<{ id: number; last_updated: Date | string }>(
        "SELECT id, last_updated FROM api_status ORDER BY id LIMIT 1"
      ),
      this.pool.query<{ total: number }>("SELECT COUNT(*)::int AS total FROM countries"),
    ])

    const row = statusResult.rows[0]
    return {
      status: row ? { id: row.id, last_updated: toIso(row.last_updated) } : null,
      totalCountries: countResult.rows[0]?.total ?? 0,
    }
  }

  async topByGdp(limit: number): Promise<CountryRow[]> {
    const { rows } = await this.pool.query<PgCountryRow>(
      `SELECT ${COUNTRY_COLUMNS} FROM countries
       WHERE estimated_gdp IS NOT NULL
       ORDER BY estimated_gdp DESC, id ASC
       LIMIT $1`,
      [limit]
    )
    return rows.map(toCountryRow)
  }
}
