/**
 * Crawler Error Classes
 *
 * Transport failures never surface as exceptions: the fetch layer returns
 * them as results and they degrade a single record. The classes here are the
 * failures that stop a run (or a command) before it produces wrong output.
 */

export const ERROR_CODES = {
  LISTING_FAILED: 'LISTING_FAILED',
  CHECKPOINT_CORRUPT: 'CHECKPOINT_CORRUPT',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNKNOWN_SOURCE: 'UNKNOWN_SOURCE',
  INVALID_INPUT: 'INVALID_INPUT',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class CrawlerError extends Error {
  readonly code: ErrorCode
  readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'CrawlerError'
    this.code = code
    this.details = options.details
  }
}

/**
 * The listing could not be fetched or parsed completely.
 * Cursor semantics need the full ordered list, so this aborts the run.
 */
export class ListingError extends CrawlerError {
  constructor(sourceId: string, message: string, cause?: unknown) {
    super(ERROR_CODES.LISTING_FAILED, `[${sourceId}] ${message}`, {
      details: { sourceId },
      cause,
    })
    this.name = 'ListingError'
  }
}

export class CheckpointCorruptError extends CrawlerError {
  constructor(path: string, message: string, cause?: unknown) {
    super(ERROR_CODES.CHECKPOINT_CORRUPT, `Checkpoint ${path} is unreadable: ${message}`, {
      details: { path },
      cause,
    })
    this.name = 'CheckpointCorruptError'
  }
}

export class ConfigError extends CrawlerError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(ERROR_CODES.CONFIGURATION_ERROR, `Invalid configuration: ${issues.join('; ')}`, {
      details: { issues },
    })
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class UnknownSourceError extends CrawlerError {
  constructor(sourceId: string, known: string[]) {
    super(
      ERROR_CODES.UNKNOWN_SOURCE,
      `Unknown source '${sourceId}'. Known sources: ${known.join(', ')}`,
      { details: { sourceId, known } }
    )
    this.name = 'UnknownSourceError'
  }
}

export function isCrawlerError(error: unknown): error is CrawlerError {
  return error instanceof CrawlerError
}

/**
 * Exit code a CLI command should end with for a thrown value.
 */
export function exitCodeFor(error: unknown): number {
  if (!isCrawlerError(error)) return 1
  switch (error.code) {
    case ERROR_CODES.CONFIGURATION_ERROR:
    case ERROR_CODES.UNKNOWN_SOURCE:
    case ERROR_CODES.INVALID_INPUT:
      return 2
    default:
      return 1
  }
}

/**
 * Log metadata for a thrown value: the error code and its details.
 */
export function errorLogContext(error: unknown): Record<string, unknown> {
  if (!isCrawlerError(error)) return {}
  return { errorCode: error.code, ...error.details }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
