class ErrorHandler extends Error {
  status: number
  details?: unknown

  constructor(message: string, status: number, details?: unknown) {
    super(message)
    this.status = status
    this.details = details

    Object.setPrototypeOf(this, ErrorHandler.prototype)
  }
}

/** A provider call failed or returned something unusable. */
export class ExternalServiceError extends ErrorHandler {
  constructor(details: string) {
    super("External data source unavailable", 503, details)

    Object.setPrototypeOf(this, ExternalServiceError.prototype)
  }
}

export default ErrorHandler
