import { closeDB, connectDB } from "../config/db"
import { initializeDB } from "../config/initDB"
import { PgCountryRepository } from "../repositories/countries.repository"
import { refreshCountries } from "../utils/refreshCountries"

try {
  const pool = await connectDB()
  await initializeDB(pool)

  const summary = await refreshCountries({ repository: new PgCountryRepository(pool) })
  console.log("[Refresh] Last refresh time:", summary.last_refreshed_at)
} catch (err) {
  console.error("[Refresh] The refresh failed and changes were rolled back:", err)
  process.exitCode = 1
} finally {
  await closeDB()
}
