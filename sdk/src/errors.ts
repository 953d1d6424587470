/**
 * Error thrown when a discriminator field path does not resolve on a request.
 */
export class MissingFieldError extends Error {
  readonly path: string
  readonly segment: string

  constructor(path: string, segment: string) {
    super(
      path === segment
        ? `Cannot compute bundle id: field "${path}" does not exist`
        : `Cannot compute bundle id: segment "${segment}" of "${path}" does not exist`
    )
    this.name = 'MissingFieldError'
    this.path = path
    this.segment = segment
  }
}

/**
 * Error thrown when the descriptor's bundled field on a request is not a list.
 */
export class BundledFieldError extends Error {
  readonly field: string

  constructor(field: string, actual: unknown) {
    super(`Bundled field "${field}" must be an array, got ${describe(actual)}`)
    this.name = 'BundledFieldError'
    this.field = field
  }
}

/**
 * Error delivered to every caller of a bundle whose combined call failed.
 * The original failure is kept as `cause`.
 */
export class CombinedCallError extends Error {
  constructor(cause: unknown) {
    super(`Bundled call failed: ${errorMessage(cause)}`)
    this.name = 'CombinedCallError'
    this.cause = cause
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
