import type { z } from 'zod'
import { withRetry, DEFAULT_RETRY_OPTIONS } from '../../utils/retry.js'
import { createLogger } from '../../utils/logger.js'
import {
  AuthRequiredError,
  DownloadFailedError,
  NotFoundError,
  RateLimitedError,
  TransportFailureError,
  type DirpullError,
  type RepoLocator
} from '../../types/index.js'
import { effectiveRef } from '../locator/index.js'

/**
 * The subset of `fetch` the client needs; injectable for tests
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

/**
 * Options for the hosting API client
 */
export interface ApiClientOptions {
  /** Bearer credential sent on every request */
  token?: string

  /** REST API root, e.g. https://api.github.com */
  apiBaseUrl?: string

  /** Raw file content root, e.g. https://raw.githubusercontent.com */
  rawBaseUrl?: string

  /** Large-object (LFS) media root, e.g. https://media.githubusercontent.com */
  mediaBaseUrl?: string

  /** Per-request timeout in milliseconds */
  timeout?: number

  /** Retries for transient failures */
  retries?: number

  /** First retry delay in milliseconds */
  retryDelay?: number

  userAgent?: string

  fetch?: FetchFn
}

/**
 * Repository an API request is about, used to report NotFound
 */
export interface RequestContext {
  owner: string
  repo: string
}

type ResolvedClientOptions = Required<Omit<ApiClientOptions, 'token' | 'fetch'>>

const DEFAULT_CLIENT_OPTIONS: ResolvedClientOptions = {
  apiBaseUrl: 'https://api.github.com',
  rawBaseUrl: 'https://raw.githubusercontent.com',
  mediaBaseUrl: 'https://media.githubusercontent.com',
  timeout: 30_000,
  retries: DEFAULT_RETRY_OPTIONS.retries,
  retryDelay: DEFAULT_RETRY_OPTIONS.baseDelay,
  userAgent: 'dirpull/0.1.0'
}

/** Gateway statuses that are worth another attempt */
const RETRYABLE_STATUSES = new Set([502, 503, 504])

const logger = createLogger('http')

/**
 * A transient gateway status, retried before it is reported
 */
class RetryableStatusError extends Error {
  constructor(public readonly status: number) {
    super(`retryable status ${status}`)
    this.name = 'RetryableStatusError'
  }
}

/**
 * Network failures and timeouts surface as TypeError / TimeoutError from fetch
 */
function isTransientError(error: unknown): boolean {
  if (error instanceof RetryableStatusError || error instanceof TypeError) {
    return true
  }
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

/**
 * Percent-encode each segment of a slash-separated path, keeping the slashes
 */
export function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/')
}

/**
 * Render an epoch-seconds reset header as an ISO timestamp
 */
function formatResetTime(value: string | null): string {
  if (value === null) {
    return 'unknown'
  }
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || value.trim() === '') {
    return value
  }
  return new Date(seconds * 1000).toISOString()
}

/**
 * Map a non-success API response onto the error taxonomy
 *
 * - 403 with an exhausted rate limit: RateLimited (reset time)
 * - other 403, and 401: AuthRequired
 * - 429: RateLimited (retry-after)
 * - 404: NotFound
 * - anything else: TransportFailure
 */
export function mapErrorStatus(
  response: Response,
  endpoint: string,
  context: RequestContext
): DirpullError {
  const { status, headers } = response

  if (status === 403) {
    if (headers.get('x-ratelimit-remaining') === '0') {
      return new RateLimitedError(formatResetTime(headers.get('x-ratelimit-reset')))
    }
    return new AuthRequiredError()
  }

  if (status === 401) {
    return new AuthRequiredError()
  }

  if (status === 429) {
    const retryAfter = headers.get('retry-after')
    return new RateLimitedError(retryAfter === null ? 'unknown' : `${retryAfter}s from now`)
  }

  if (status === 404) {
    return new NotFoundError(context.owner, context.repo)
  }

  return new TransportFailureError(endpoint, status)
}

/**
 * HTTP client for a GitHub-compatible hosting service
 */
export class HostingApiClient {
  readonly options: ResolvedClientOptions
  private readonly token?: string
  private readonly fetchImpl: FetchFn

  constructor(options: ApiClientOptions = {}) {
    this.options = {
      apiBaseUrl: options.apiBaseUrl ?? DEFAULT_CLIENT_OPTIONS.apiBaseUrl,
      rawBaseUrl: options.rawBaseUrl ?? DEFAULT_CLIENT_OPTIONS.rawBaseUrl,
      mediaBaseUrl: options.mediaBaseUrl ?? DEFAULT_CLIENT_OPTIONS.mediaBaseUrl,
      timeout: options.timeout ?? DEFAULT_CLIENT_OPTIONS.timeout,
      retries: options.retries ?? DEFAULT_CLIENT_OPTIONS.retries,
      retryDelay: options.retryDelay ?? DEFAULT_CLIENT_OPTIONS.retryDelay,
      userAgent: options.userAgent ?? DEFAULT_CLIENT_OPTIONS.userAgent
    }
    this.token = options.token || undefined
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
  }

  /**
   * Whether a credential is attached to requests
   */
  get authenticated(): boolean {
    return this.token !== undefined
  }

  apiUrl(endpoint: string): string {
    return `${trimSlash(this.options.apiBaseUrl)}/${endpoint}`
  }

  rawUrl(locator: RepoLocator, path: string): string {
    return `${trimSlash(this.options.rawBaseUrl)}/${this.contentPath(locator, path)}`
  }

  mediaUrl(locator: RepoLocator, path: string): string {
    return `${trimSlash(this.options.mediaBaseUrl)}/media/${this.contentPath(locator, path)}`
  }

  /**
   * GET a JSON API endpoint and validate the body against `schema`
   */
  async getJson<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    context: RequestContext
  ): Promise<z.output<S>> {
    const url = this.apiUrl(endpoint)
    let response: Response

    try {
      response = await this.send(url, { Accept: 'application/vnd.github+json' })
    } catch (error) {
      const status = error instanceof RetryableStatusError ? error.status : undefined
      throw new TransportFailureError(endpoint, status, error)
    }

    if (!response.ok) {
      await discardBody(response)
      throw mapErrorStatus(response, endpoint, context)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new TransportFailureError(endpoint, response.status, error)
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new TransportFailureError(endpoint, response.status, parsed.error)
    }
    return parsed.data
  }

  /**
   * GET raw file bytes; any failure is reported against `path`
   */
  async getRaw(url: string, path: string): Promise<Response> {
    let response: Response

    try {
      // Content-Length must be the stored size for the LFS pointer window check
      response = await this.send(url, { 'Accept-Encoding': 'identity' })
    } catch (error) {
      const status = error instanceof RetryableStatusError ? error.status : undefined
      throw new DownloadFailedError(path, new TransportFailureError(url, status, error))
    }

    if (!response.ok) {
      await discardBody(response)
      throw new DownloadFailedError(path, new TransportFailureError(url, response.status))
    }

    return response
  }

  private contentPath(locator: RepoLocator, path: string): string {
    return [
      encodeURIComponent(locator.owner),
      encodeURIComponent(locator.repo),
      encodePath(effectiveRef(locator)),
      encodePath(path)
    ].join('/')
  }

  private headers(extra: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      ...extra
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }
    return headers
  }

  private async send(url: string, extra: Record<string, string> = {}): Promise<Response> {
    return withRetry(
      async () => {
        logger.debug(`GET ${url}`)
        const response = await this.fetchImpl(url, {
          headers: this.headers(extra),
          redirect: 'follow',
          signal: AbortSignal.timeout(this.options.timeout)
        })
        if (RETRYABLE_STATUSES.has(response.status)) {
          await discardBody(response)
          throw new RetryableStatusError(response.status)
        }
        return response
      },
      {
        retries: this.options.retries,
        baseDelay: this.options.retryDelay,
        maxDelay: DEFAULT_RETRY_OPTIONS.maxDelay,
        shouldRetry: error => {
          const retry = isTransientError(error)
          if (retry) {
            logger.debug(`retrying ${url}: ${error instanceof Error ? error.message : String(error)}`)
          }
          return retry
        }
      }
    )
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '')
}

/**
 * Release the connection of a response whose body is not needed
 */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel()
  }
}
