import type {
  ApiStatusRow,
  CountryRepository,
  CountryRow,
  ListCountriesQuery,
  RefreshWriteSummary,
  StatusSummary,
} from '../../repositories/countries.repository'
import type { CountryExchangeRecord } from '../../utils/fetchCountryData'

/** Mirrors the SQL semantics of PgCountryRepository over a plain array. */
export class InMemoryCountryRepository implements CountryRepository {
  rows: CountryRow[] = []
  status: ApiStatusRow | null = null
  failNextSave = false
  private nextId = 1

  seed(records: CountryExchangeRecord[]): CountryRow[] {
    for (const record of records) {
      this.rows.push({ id: this.nextId++, ...record })
    }
    return this.rows
  }

  async saveRefresh(records: CountryExchangeRecord[], refreshedAt: Date): Promise<RefreshWriteSummary> {
    if (this.failNextSave) {
      this.failNextSave = false
      throw new Error('connection terminated')
    }

    let inserted = 0
    let updated = 0
    for (const record of records) {
      const existing = this.rows.find((r) => r.name === record.name)
      if (existing) {
        Object.assign(existing, record)
        updated++
      } else {
        this.rows.push({ id: this.nextId++, ...record })
        inserted++
      }
    }

    this.status = { id: this.status?.id ?? 1, last_updated: refreshedAt.toISOString() }
    return { inserted, updated, total: this.rows.length }
  }

  async list(query: ListCountriesQuery): Promise<CountryRow[]> {
    const region = query.region?.toLowerCase()
    const currency = query.currency?.toUpperCase()
    const filtered = this.rows.filter(
      (r) =>
        (!region || (r.region ?? '').toLowerCase().includes(region)) &&
        (!currency || r.currency_code === currency)
    )

    const field = query.sortBy
    const direction = query.direction ?? (field === 'name' ? 'asc' : 'desc')
    const sign = direction === 'asc' ? 1 : -1

    const sorted = [...filtered].sort((a, b) => {
      const av = a[field]
      const bv = b[field]
      if (av === bv) return a.id - b.id
      if (av === null) return 1
      if (bv === null) return -1
      const cmp = typeof av === 'string' && typeof bv === 'string' ? av.localeCompare(bv) : Number(av) - Number(bv)
      return cmp * sign || a.id - b.id
    })

    return sorted.slice(query.skip, query.skip + query.limit)
  }

  async findByName(name: string): Promise<CountryRow | null> {
    return this.rows.find((r) => r.name.toLowerCase() === name.toLowerCase()) ?? null
  }

  async deleteByName(name: string): Promise<boolean> {
    const before = this.rows.length
    this.rows = this.rows.filter((r) => r.name.toLowerCase() !== name.toLowerCase())
    return this.rows.length < before
  }

  async getStatus(): Promise<StatusSummary> {
    return { status: this.status, totalCountries: this.rows.length }
  }

  async topByGdp(limit: number): Promise<CountryRow[]> {
    return this.list({ skip: 0, limit, sortBy: 'estimated_gdp' }).then((rows) =>
      rows.filter((r) => r.estimated_gdp !== null)
    )
  }
}

export function countryRecord(overrides: Partial<CountryExchangeRecord> & { name: string }): CountryExchangeRecord {
  return {
    capital: null,
    region: null,
    population: 1_000_000,
    currency_code: 'USD',
    exchange_rate: 1,
    estimated_gdp: 1_000_000,
    flag_url: null,
    last_refreshed_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}
