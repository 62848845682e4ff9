/**
 * Error types shared by profile loading and telegram decoding.
 */

/**
 * Raised when a profile document violates the schema.
 * Fatal for the profile: it is never activated.
 */
export class SchemaInvalidError extends Error {
  readonly issues: string[]

  constructor(origin: string, issues: string[]) {
    super(`Invalid profile ${origin}: ${issues.join('; ')}`)
    this.name = 'SchemaInvalidError'
    this.issues = issues
  }
}

export type DecodeErrorKind = 'OutOfRange' | 'UnknownType'

/**
 * Per-message decode failure. Scoped to a single telegram.
 */
export class DecodeError extends Error {
  constructor(
    readonly kind: DecodeErrorKind,
    readonly fieldName: string,
    detail: string
  ) {
    super(`${kind} in field "${fieldName}": ${detail}`)
    this.name = 'DecodeError'
  }
}
