/**
 * Error taxonomy
 *
 * Listing-time errors (invalid locator, auth, rate limit, not found, transport)
 * abort a run. Per-file errors (download, I/O, path traversal) are recorded in
 * the run result and the run continues.
 */

export type ErrorCode =
  | 'INVALID_LOCATOR'
  | 'AUTH_REQUIRED'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'TRANSPORT_FAILURE'
  | 'DOWNLOAD_FAILED'
  | 'IO_ERROR'
  | 'PATH_TRAVERSAL'
  | 'CONFIG_LOAD'

interface DirpullErrorOptions {
  hint?: string
  cause?: unknown
}

/**
 * Base class for every error the tool reports
 */
export abstract class DirpullError extends Error {
  abstract readonly code: ErrorCode
  readonly hint?: string

  constructor(message: string, options: DirpullErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.hint = options.hint
  }
}

export class InvalidLocatorError extends DirpullError {
  readonly code = 'INVALID_LOCATOR'

  constructor(public readonly locator: string, hint: string) {
    super(`invalid locator: ${locator}`, { hint })
  }
}

export class AuthRequiredError extends DirpullError {
  readonly code = 'AUTH_REQUIRED'

  constructor() {
    super('authentication required for private repository', {
      hint: 'Provide a personal access token with --token or GITHUB_TOKEN'
    })
  }
}

export class RateLimitedError extends DirpullError {
  readonly code = 'RATE_LIMITED'

  constructor(public readonly resetTime: string) {
    super(`rate limit exceeded, resets at ${resetTime}`, {
      hint: 'Authenticated requests get a higher limit; try --token'
    })
  }
}

export class NotFoundError extends DirpullError {
  readonly code = 'NOT_FOUND'

  constructor(public readonly owner: string, public readonly repo: string) {
    super(`repository not found: ${owner}/${repo}`, {
      hint: 'Check that the repository, branch and directory exist'
    })
  }
}

export class TransportFailureError extends DirpullError {
  readonly code = 'TRANSPORT_FAILURE'

  constructor(
    public readonly endpoint: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(
      status === undefined
        ? `request failed: ${endpoint}`
        : `request failed with status ${status}: ${endpoint}`,
      { cause }
    )
  }
}

export class DownloadFailedError extends DirpullError {
  readonly code = 'DOWNLOAD_FAILED'

  constructor(public readonly path: string, cause: unknown) {
    super(`failed to download ${path}`, { cause })
  }
}

export class IoError extends DirpullError {
  readonly code = 'IO_ERROR'

  constructor(public readonly path: string, cause: unknown) {
    super(`failed to save file ${path}`, { cause })
  }
}

export class PathTraversalError extends DirpullError {
  readonly code = 'PATH_TRAVERSAL'

  constructor(public readonly path: string) {
    super(`path traversal detected: ${path}`, {
      hint: 'The path attempts to escape the output directory'
    })
  }
}

export class ConfigLoadError extends DirpullError {
  readonly code = 'CONFIG_LOAD'

  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
  }
}

export function isDirpullError(value: unknown): value is DirpullError {
  return value instanceof DirpullError
}

/**
 * Wrap anything thrown while handling `path` into a per-file error
 */
export function toDirpullError(error: unknown, path: string): DirpullError {
  return isDirpullError(error) ? error : new DownloadFailedError(path, error)
}

/**
 * Render an error, its hint and its cause chain as display lines
 */
export function describeError(error: unknown): string[] {
  if (!(error instanceof Error)) {
    return [String(error)]
  }

  const lines = [error.message]
  let cause: unknown = error.cause
  while (cause !== undefined) {
    if (cause instanceof Error) {
      lines.push(`caused by: ${cause.message}`)
      cause = cause.cause
    } else {
      lines.push(`caused by: ${String(cause)}`)
      cause = undefined
    }
  }

  if (isDirpullError(error) && error.hint) {
    lines.push(`hint: ${error.hint}`)
  }

  return lines
}
