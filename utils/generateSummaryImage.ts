import { createCanvas } from "@napi-rs/canvas"
import fs from "fs/promises"
import path from "path"
import { configData } from "../config/env"

export interface SummaryEntry {
  name: string
  estimated_gdp: number | null
}

export interface SummaryInput {
  totalCountries: number
  topCountries: SummaryEntry[]
  lastRefreshedAt: string
}

export const SUMMARY_IMAGE_NAME = "summary.png"

export function summaryImagePath(cacheDir = configData.CACHE_DIR): string {
  return path.resolve(cacheDir, SUMMARY_IMAGE_NAME)
}

export function formatGdp(value: number | null): string {
  if (value == null) return "N/A"
  return `$${value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`
}

/** The text block drawn under the title, one entry per line. */
export function buildSummaryLines({ totalCountries, topCountries, lastRefreshedAt }: SummaryInput): string[] {
  return [
    `Total Countries: ${totalCountries}`,
    `Last Refreshed (UTC): ${lastRefreshedAt}`,
    "Top 5 by Estimated GDP:",
    ...topCountries.slice(0, 5).map((c, i) => `${i + 1}. ${c.name} - ${formatGdp(c.estimated_gdp)}`),
  ]
}

export async function generateSummaryImage(input: SummaryInput, cacheDir = configData.CACHE_DIR): Promise<string> {
  const width = 800
  const height = 400
  const canvas = createCanvas(width, height)
  const ctx = canvas.getContext("2d")

  ctx.fillStyle = "#f7f9fb"
  ctx.fillRect(0, 0, width, height)

  ctx.fillStyle = "#003366"
  ctx.font = "bold 28px sans-serif"
  ctx.fillText("Global Country Summary", 40, 60)

  const [total, refreshed, heading, ...ranking] = buildSummaryLines(input)

  ctx.font = "20px sans-serif"
  ctx.fillStyle = "#333333"
  ctx.fillText(total ?? "", 40, 120)
  ctx.fillText(refreshed ?? "", 40, 160)
  ctx.fillText(heading ?? "", 40, 220)

  ctx.font = "18px monospace"
  ranking.forEach((line, i) => {
    ctx.fillText(line, 60, 250 + i * 25)
  })

  const imgPath = summaryImagePath(cacheDir)
  await fs.mkdir(path.dirname(imgPath), { recursive: true })
  await fs.writeFile(imgPath, await canvas.encode("png"))
  console.log("[Image] Summary image generated:", imgPath)
  return imgPath
}
