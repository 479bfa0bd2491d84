import dotenv from "dotenv"

dotenv.config()

function getEnv(name: string, required = true): string {
  const value = process.env[name]
  if (!value && required) {
    throw new Error(`Missing environment variable: ${name}`)
  }
  return value ?? ""
}

export const configData = {
  PORT: Number(getEnv("PORT", false)) || 3000,
  DATABASE_SSL: getEnv("DATABASE_SSL", false) === "true",
  COUNTRIES_API_URL:
    getEnv("COUNTRIES_API_URL", false) ||
    "https://restcountries.com/v2/all?fields=name,capital,region,population,flag,currencies",
  EXCHANGE_RATE_API_URL:
    getEnv("EXCHANGE_RATE_API_URL", false) ||
    "https://open.er-api.com/v6/latest/USD",
  CACHE_DIR: getEnv("CACHE_DIR", false) || "cache",
  REQUEST_TIMEOUT_MS: Number(getEnv("REQUEST_TIMEOUT_MS", false)) || 10_000,
}

// Read lazily so the server can be imported (and tested) without a database.
export function getDatabaseUrl(): string {
  return getEnv("DATABASE_URL")
}
