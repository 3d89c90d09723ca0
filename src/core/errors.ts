interface AppErrorOptions {
  cause?: unknown
}

export class AppError extends Error {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
  }
}

export class InvalidKeyError extends AppError {
  readonly key: string

  constructor(key: string) {
    super(`Invalid cache key "${key}"`)
    this.key = key
  }
}

export interface FetchErrorOptions extends AppErrorOptions {
  url: string
  status?: number
}

export class FetchError extends AppError {
  readonly url: string
  readonly status?: number

  constructor(message: string, options: FetchErrorOptions) {
    super(message, options)
    this.url = options.url
    this.status = options.status
  }
}

export class DecodeError extends AppError {
  readonly url: string

  constructor(message: string, url: string, options: AppErrorOptions = {}) {
    super(message, options)
    this.url = url
  }
}

/** A scanner marker was not found and the caller gave no default. */
export class ExtractionError extends AppError {
  readonly marker: string

  constructor(marker: string) {
    super(`Marker not found: ${JSON.stringify(marker)}`)
    this.marker = marker
  }
}

export interface ExtractionMismatchDetails {
  field: string
  recordIndex?: number
  source?: string
}

/** The upstream page or payload no longer has the shape the extractor expects. */
export class ExtractionMismatchError extends AppError {
  readonly field: string
  readonly recordIndex?: number
  readonly source?: string

  constructor(details: ExtractionMismatchDetails, options: AppErrorOptions = {}) {
    const where = details.recordIndex === undefined ? '' : ` in record ${details.recordIndex}`
    const from = details.source ? ` (${details.source})` : ''
    super(`Missing mandatory field "${details.field}"${where}${from}`, options)
    this.field = details.field
    this.recordIndex = details.recordIndex
    this.source = details.source
  }
}

export class ListingRequestError extends AppError {}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
