import { Pool } from "pg"
import { configData, getDatabaseUrl } from "./env"

let pool: Pool | null = null

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: getDatabaseUrl(),
      ssl: configData.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
    })
    pool.on("error", (err) => console.error("[DB] Idle client error:", err))
  }
  return pool
}

export async function connectDB(): Promise<Pool> {
  const db = getPool()
  const client = await db.connect()
  client.release()
  console.log("[DB] Database connected successfully")
  return db
}

export async function closeDB(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}
