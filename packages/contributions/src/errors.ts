/** Transport failure, timeout or non-success HTTP status */
export class NetworkError extends Error {
  readonly status?: number

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options)
    this.name = 'NetworkError'
    this.status = options?.status
  }
}

/** Fetched markup is missing the structure the scraper expects */
export class ParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ParseError'
  }
}
