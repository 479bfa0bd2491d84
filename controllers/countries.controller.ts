import type { Request, Response } from "express"
import fs from "fs/promises"
import { z } from "zod"
import ErrorHandler from "../middlewares/ErrorHandler"
import type {
  CountryRepository,
  ListCountriesQuery,
  SortDirection,
  SortField,
} from "../repositories/countries.repository"
import type { RefreshSummary } from "../utils/refreshCountries"
import { summaryImagePath } from "../utils/generateSummaryImage"

export const listQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  region: z.string().trim().min(1).optional(),
  currency: z.string().trim().min(1).optional(),
  sort_by: z.enum(["name", "population", "estimated_gdp"]).optional(),
  sort: z.enum(["gdp_desc", "gdp_asc"]).optional(),
})

export type ListQueryParams = z.infer<typeof listQuerySchema>

export function toListQuery(params: ListQueryParams): ListCountriesQuery {
  let sortBy: SortField = params.sort_by ?? "population"
  let direction: SortDirection | undefined

  // `sort` is the older shorthand; `sort_by` wins when both are given.
  if (!params.sort_by && params.sort) {
    sortBy = "estimated_gdp"
    direction = params.sort === "gdp_asc" ? "asc" : "desc"
  }

  return {
    skip: params.skip,
    limit: params.limit,
    region: params.region,
    currency: params.currency,
    sortBy,
    direction,
  }
}

function validationError(error: z.ZodError): ErrorHandler {
  const details: Record<string, string> = {}
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "query"
    details[key] ??= issue.message
  }
  return new ErrorHandler("Validation failed", 400, details)
}

function nameParam(req: Request): string {
  const name = req.params.name?.trim()
  if (!name) throw new ErrorHandler("Bad request please provide name", 400)
  return name
}

export interface CountriesControllerDeps {
  repository: CountryRepository
  refresh: () => Promise<RefreshSummary>
  cacheDir?: string
}

export function createCountriesController({ repository, refresh, cacheDir }: CountriesControllerDeps) {
  async function refreshData(req: Request, res: Response) {
    const summary = await refresh()
    return res.status(200).json(summary)
  }

  async function getAllCountries(req: Request, res: Response) {
    const parsed = listQuerySchema.safeParse(req.query)
    if (!parsed.success) throw validationError(parsed.error)

    const query = toListQuery(parsed.data)
    const rows = await repository.list(query)

    if (rows.length === 0 && query.skip > 0) {
      throw new ErrorHandler("No more countries found in this range.", 404)
    }
    return res.json(rows)
  }

  async function getCountryByName(req: Request, res: Response) {
    const name = nameParam(req)
    const country = await repository.findByName(name)
    if (!country) throw new ErrorHandler(`Country '${name}' not found`, 404)
    return res.status(200).json(country)
  }

  async function deleteCountryByName(req: Request, res: Response) {
    const name = nameParam(req)
    const deleted = await repository.deleteByName(name)
    if (!deleted) throw new ErrorHandler(`Country '${name}' not found`, 404)
    return res.status(200).json({ message: "Country successfully deleted" })
  }

  async function getStatus(req: Request, res: Response) {
    const { status, totalCountries } = await repository.getStatus()
    if (!status) {
      throw new ErrorHandler(
        "API status not yet initialized. Data may be stale or empty. Run the refresh script.",
        503
      )
    }
    return res.status(200).json({ ...status, total_countries: totalCountries })
  }

  async function getSummaryImage(req: Request, res: Response) {
    const imgPath = summaryImagePath(cacheDir)
    try {
      await fs.access(imgPath)
    } catch {
      throw new ErrorHandler("Summary image not found", 404)
    }
    res.setHeader("Content-Type", "image/png")
    return res.sendFile(imgPath)
  }

  return { refreshData, getAllCountries, getCountryByName, deleteCountryByName, getStatus, getSummaryImage }
}

export type CountriesController = ReturnType<typeof createCountriesController>
