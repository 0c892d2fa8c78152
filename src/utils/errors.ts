/**
 * Error taxonomy shared by the catalog clients and the upgrade engine.
 *
 * Every class carries a machine-readable `code` and the HTTP `statusCode`
 * the global error handler answers with.
 */

abstract class UpgradeError extends Error {
  abstract readonly code: string
  abstract readonly statusCode: number

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/** The catalog service could not be reached after all retries. */
export class TransportError extends UpgradeError {
  readonly code = 'TRANSPORT_ERROR'
  readonly statusCode = 502

  constructor(
    message: string,
    public readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

/** The catalog service answered with a non-2xx status after all retries. */
export class HttpStatusError extends UpgradeError {
  readonly code = 'HTTP_STATUS_ERROR'
  readonly statusCode = 502

  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
  ) {
    super(message)
  }
}

export class ValidationError extends UpgradeError {
  readonly code = 'VALIDATION_ERROR'
  readonly statusCode = 400
}

/** An episode file or episode could not be mapped to the id it needs. */
export class ResolutionError extends UpgradeError {
  readonly code = 'RESOLUTION_ERROR'
  readonly statusCode = 422
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error'
}
