import { configData } from "./config/env"
import { connectDB } from "./config/db"
import { initializeDB } from "./config/initDB"
import { PgCountryRepository } from "./repositories/countries.repository"
import { createApp } from "./app"

const pool = await connectDB()
await initializeDB(pool)

const app = createApp({ repository: new PgCountryRepository(pool) })

app.listen(configData.PORT, () => {
  console.log(`Server is running on ${configData.PORT}`)
})
