import express from "express"
import { createCountriesController } from "./controllers/countries.controller"
import errorMiddleware, { notFoundMiddleware } from "./middlewares/errorMiddleware"
import type { CountryRepository } from "./repositories/countries.repository"
import { createCountriesRouter } from "./routes/countries.routes"
import { generateSummaryImage } from "./utils/generateSummaryImage"
import { refreshCountries, type RefreshSummary } from "./utils/refreshCountries"

export interface AppOptions {
  repository: CountryRepository
  refresh?: () => Promise<RefreshSummary>
  cacheDir?: string
}

export function createApp({ repository, refresh, cacheDir }: AppOptions) {
  const app = express()

  const controller = createCountriesController({
    repository,
    refresh:
      refresh ??
      (() => refreshCountries({ repository, renderSummary: (input) => generateSummaryImage(input, cacheDir) })),
    cacheDir,
  })

  // Middleware
  app.use(express.json())
  app.use("/", createCountriesRouter(controller))
  app.use(notFoundMiddleware)
  app.use(errorMiddleware)

  return app
}
