/**
 * Error types surfaced to the UI loop
 * None of them is fatal: each ends up as a log line and/or a status notice
 */

/**
 * A referenced event or room is no longer cached
 */
export class NotFoundError extends Error {
  name = 'NotFoundError'

  constructor(readonly id: string, options?: ErrorOptions) {
    super(`Not cached: ${id}`, options)
  }
}

/**
 * External editor or file picker exited non-zero, failed to spawn, or was cancelled
 */
export class ExternalProcessError extends Error {
  name = 'ExternalProcessError'

  constructor(message: string, readonly exitCode: number | null = null, options?: ErrorOptions) {
    super(message, options)
  }
}

/**
 * The protocol delivered something out of order
 */
export class InconsistentStateError extends Error {
  name = 'InconsistentStateError'
}

/**
 * The config file could not be parsed or failed validation
 */
export class ConfigError extends Error {
  name = 'ConfigError'

  constructor(message: string, readonly path: string, options?: ErrorOptions) {
    super(message, options)
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
