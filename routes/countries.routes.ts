import express from "express"
import type { CountriesController } from "../controllers/countries.controller"
import TryCatch from "../utils/TryCatch"

export function createCountriesRouter(controller: CountriesController) {
  const router = express.Router()

  router.get("/countries", TryCatch(controller.getAllCountries))
  router.post("/countries/refresh", TryCatch(controller.refreshData))

  router.get("/status", TryCatch(controller.getStatus))
  router.get("/countries/image", TryCatch(controller.getSummaryImage))

  router.get("/countries/:name", TryCatch(controller.getCountryByName))
  router.delete("/countries/:name", TryCatch(controller.deleteCountryByName))

  return router
}
