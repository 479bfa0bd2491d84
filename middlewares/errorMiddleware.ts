import type { Request, Response, NextFunction } from "express"
import ErrorHandler from "./ErrorHandler"

const errorMiddleware = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument functions as error handlers.
  _next: NextFunction
) => {
  if (err instanceof ErrorHandler) {
    const body: { error: string; details?: unknown } = { error: err.message }
    if (err.details !== undefined) body.details = err.details
    return res.status(err.status).json(body)
  }

  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, err)
  return res.status(500).json({ error: "Internal server error" })
}

export const notFoundMiddleware = (req: Request, res: Response) => {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found` })
}

export default errorMiddleware
