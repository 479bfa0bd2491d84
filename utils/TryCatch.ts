import type { Request, Response, NextFunction, RequestHandler } from "express"

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>

// Express 4 does not catch rejected handler promises on its own.
const TryCatch =
  (fn: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next)
  }

export default TryCatch
