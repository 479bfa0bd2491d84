import type { CountryRepository } from "../repositories/countries.repository"
import { ExternalServiceError } from "../middlewares/ErrorHandler"
import {
  buildCountryExchangeData,
  fetchCountries,
  fetchExchangeRates,
  type Country,
  type Rates,
} from "./fetchCountryData"
import { generateSummaryImage, type SummaryInput } from "./generateSummaryImage"

export interface RefreshDeps {
  repository: CountryRepository
  fetchCountries?: () => Promise<Country[]>
  fetchExchangeRates?: () => Promise<Rates>
  renderSummary?: (input: SummaryInput) => Promise<unknown>
  now?: () => Date
  random?: () => number
}

export interface RefreshSummary {
  message: string
  inserted: number
  updated: number
  skipped: number
  total: number
  last_refreshed_at: string
}

export async function refreshCountries({
  repository,
  fetchCountries: loadCountries = () => fetchCountries(),
  fetchExchangeRates: loadRates = () => fetchExchangeRates(),
  renderSummary = (input) => generateSummaryImage(input),
  now = () => new Date(),
  random,
}: RefreshDeps): Promise<RefreshSummary> {
  const startedAt = Date.now()

  let rates: Rates = {}
  try {
    rates = await loadRates()
    console.log(`[Refresh] Exchange rates fetched (${Object.keys(rates).length} currencies)`)
  } catch (err) {
    // Every rate falls back to USD parity for this run.
    console.warn("[Refresh] Failed to fetch exchange rates:", err instanceof Error ? err.message : err)
  }

  const countries = await loadCountries()
  if (countries.length === 0) {
    throw new ExternalServiceError("REST Countries API returned no countries")
  }
  console.log(`[Refresh] Countries fetched (${countries.length} records)`)

  const refreshedAt = now()
  const { records, skipped } = buildCountryExchangeData(countries, rates, { refreshedAt, random })
  if (skipped > 0) {
    console.warn(`[Refresh] Skipped ${skipped} entries without a name or a valid population`)
  }

  const written = await repository.saveRefresh(records, refreshedAt)
  const lastRefreshedAt = refreshedAt.toISOString()

  try {
    const topCountries = await repository.topByGdp(5)
    await renderSummary({ totalCountries: written.total, topCountries, lastRefreshedAt })
  } catch (err) {
    console.error("[Image] Failed to generate summary image:", err)
  }

  console.log(
    `[Refresh] Done in ${((Date.now() - startedAt) / 1000).toFixed(2)}s: ` +
      `${written.inserted} inserted, ${written.updated} updated, ${written.total} total`
  )

  return {
    message: "Countries refreshed successfully",
    inserted: written.inserted,
    updated: written.updated,
    skipped,
    total: written.total,
    last_refreshed_at: lastRefreshedAt,
  }
}
