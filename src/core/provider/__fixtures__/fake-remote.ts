import type { FetchFn } from '../client.js'

/**
 * Canned response for one URL
 */
export interface FakeResponse {
  status?: number
  body?: string | Uint8Array
  headers?: Record<string, string>
}

type Route = FakeResponse | (() => FakeResponse | Promise<FakeResponse>)

/**
 * Recorded request
 */
export interface RecordedRequest {
  url: string
  headers: Headers
}

export const API = 'https://api.test'
export const RAW = 'https://raw.test'
export const MEDIA = 'https://media.test'

/**
 * In-process stand-in for the hosting service, served through `fetch`
 *
 * Unknown URLs answer 404.
 */
export class FakeRemote {
  readonly requests: RecordedRequest[] = []
  private readonly routes = new Map<string, Route>()

  on(url: string, route: Route): this {
    this.routes.set(url, route)
    return this
  }

  json(url: string, body: unknown, status = 200): this {
    return this.on(url, {
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json' }
    })
  }

  file(url: string, content: string | Uint8Array): this {
    const bytes = typeof content === 'string' ? new TextEncoder().encode(content) : content
    return this.on(url, {
      body: bytes,
      headers: { 'content-length': String(bytes.length) }
    })
  }

  /** Serve a tree listing for owner/repo at `ref` */
  tree(owner: string, repo: string, ref: string, paths: string[], truncated = false): this {
    return this.json(`${API}/repos/${owner}/${repo}/git/trees/${ref}?recursive=1`, {
      sha: 'abc123',
      tree: paths.map(path => ({ type: path.endsWith('/') ? 'tree' : 'blob', path: path.replace(/\/$/, '') })),
      truncated
    })
  }

  /** Serve raw content of one file */
  raw(owner: string, repo: string, ref: string, path: string, content: string | Uint8Array): this {
    return this.file(`${RAW}/${owner}/${repo}/${ref}/${path}`, content)
  }

  count(url: string): number {
    return this.requests.filter(request => request.url === url).length
  }

  readonly fetch: FetchFn = async (url, init) => {
    this.requests.push({ url, headers: new Headers(init?.headers) })

    const route = this.routes.get(url)
    if (route === undefined) {
      return new Response(JSON.stringify({ message: 'Not Found' }), { status: 404 })
    }

    const response = typeof route === 'function' ? await route() : route
    return new Response(response.body ?? null, {
      status: response.status ?? 200,
      headers: response.headers
    })
  }
}
