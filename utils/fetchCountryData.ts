import { z } from "zod"
import { configData } from "../config/env"
import { ExternalServiceError } from "../middlewares/ErrorHandler"

/**
 * REST Countries v2 payload, restricted to the fields we request.
 * Optional fields are genuinely missing for some territories.
 */
export const CountrySchema = z.object({
  name: z.string().nullish(),
  capital: z.string().nullish(),
  region: z.string().nullish(),
  population: z.number().nullish(),
  flag: z.string().nullish(),
  currencies: z
    .array(
      z.object({
        code: z.string().nullish(),
        name: z.string().nullish(),
        symbol: z.string().nullish(),
      })
    )
    .nullish(),
})

export const CountriesResponseSchema = z.array(CountrySchema)

/** open.er-api.com `latest` payload; rates are units of currency per 1 unit of base. */
export const ExchangeRateResponseSchema = z.object({
  result: z.string(),
  base_code: z.string().optional(),
  time_last_update_utc: z.string().optional(),
  rates: z.record(z.string(), z.number()),
})

export type Country = z.infer<typeof CountrySchema>
export type ExchangeRateResponse = z.infer<typeof ExchangeRateResponseSchema>
export type Rates = Record<string, number>

export interface CountryExchangeRecord {
  name: string
  capital: string | null
  region: string | null
  population: number
  currency_code: string | null
  exchange_rate: number | null
  estimated_gdp: number | null
  flag_url: string | null
  last_refreshed_at: string
}

export interface BuildOptions {
  refreshedAt: Date
  /** Uniform source in [0, 1). */
  random?: () => number
}

export interface BuildResult {
  records: CountryExchangeRecord[]
  skipped: number
}

// Currencies missing from the rate table are treated as pegged to USD.
export const DEFAULT_EXCHANGE_RATE = 1.0

export function estimateGdp(population: number, exchangeRate: number, random: () => number): number {
  const factor = 0.5 + random()
  return population * exchangeRate * factor
}

export function buildCountryExchangeData(
  countries: Country[],
  rates: Rates,
  { refreshedAt, random = Math.random }: BuildOptions
): BuildResult {
  const lastRefreshedAt = refreshedAt.toISOString()
  const records: CountryExchangeRecord[] = []
  let skipped = 0

  for (const country of countries) {
    const name = (country.name ?? "").trim()
    const population = country.population
    // Must fit the BIGINT population column.
    if (!name || population == null || !Number.isInteger(population) || population < 0) {
      skipped++
      continue
    }

    const code = country.currencies?.[0]?.code ?? null
    const rate = (code !== null ? rates[code] : undefined) ?? DEFAULT_EXCHANGE_RATE

    records.push({
      name,
      capital: country.capital || null,
      region: country.region || null,
      population,
      currency_code: code,
      exchange_rate: rate,
      estimated_gdp: estimateGdp(population, rate, random),
      flag_url: country.flag || null,
      last_refreshed_at: lastRefreshedAt,
    })
  }

  return { records, skipped }
}

async function getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): Promise<T> {
  let response: Response
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(configData.REQUEST_TIMEOUT_MS) })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ExternalServiceError(`Could not fetch data from ${label}: ${reason}`)
  }

  if (!response.ok) {
    throw new ExternalServiceError(`Could not fetch data from ${label}: HTTP ${response.status}`)
  }

  let body: unknown
  try {
    body = await response.json()
  } catch {
    throw new ExternalServiceError(`Could not fetch data from ${label}: invalid JSON`)
  }

  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw new ExternalServiceError(`Unexpected response from ${label}: ${parsed.error.issues[0]?.message ?? "invalid payload"}`)
  }
  return parsed.data
}

export async function fetchCountries(url = configData.COUNTRIES_API_URL): Promise<Country[]> {
  return getJson(url, CountriesResponseSchema, "REST Countries API")
}

export async function fetchExchangeRates(url = configData.EXCHANGE_RATE_API_URL): Promise<Rates> {
  const data = await getJson(url, ExchangeRateResponseSchema, "Exchange Rates API")
  if (data.result !== "success") {
    throw new ExternalServiceError(`Exchange Rates API returned result "${data.result}"`)
  }
  return data.rates
}
