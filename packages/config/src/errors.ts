// @tokensmith/config - Load-time configuration errors

/**
 * Thrown while building a context or token spec from invalid input.
 *
 * Only raised at load time. Request-time resolution never throws: it clamps
 * and reports warnings instead.
 */
export class ConfigurationError extends Error {
  /** The offending field, e.g. `length` or `tokens[2].ttl` */
  readonly field: string

  constructor(field: string, message: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.field = field
  }
}
