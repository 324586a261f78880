import { InvalidLocatorError, type RepoLocator } from '../../types/index.js'

/** Path segment that marks a directory view: /owner/repo/tree/<ref>/<dir> */
export const TREE_MARKER = 'tree'

/** Path segment that marks a single-file view: /owner/repo/blob/<ref>/<file> */
export const BLOB_MARKER = 'blob'

const EXPECTED_FORMAT = 'Expected format: https://github.com/owner/repo[/tree/ref][/path]'

/**
 * Split a locator into its host-independent path
 *
 * Accepts full URLs, scheme-less `host/owner/repo/...` and bare
 * `owner/repo/...`. The host itself is never checked.
 */
function extractPath(input: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
    try {
      return new URL(input).pathname
    } catch {
      throw new InvalidLocatorError(input, EXPECTED_FORMAT)
    }
  }

  const withoutQuery = input.split(/[?#]/, 1)[0] ?? ''
  const segments = withoutQuery.split('/')
  const first = segments[0] ?? ''

  // A leading segment with a dot or port is a host: github.com, git.example.org:8443
  if (first.includes('.') || first.includes(':')) {
    return segments.slice(1).join('/')
  }

  return withoutQuery
}

/**
 * Split a path into decoded, non-empty segments
 *
 * Encoded separators (`%2F`) become real separators so that they take part in
 * ref disambiguation and the output containment check like any other `/`.
 */
function splitSegments(input: string, path: string): string[] {
  const decoded: string[] = []

  for (const raw of path.split('/')) {
    if (!raw) {
      continue
    }

    let segment: string
    try {
      segment = decodeURIComponent(raw)
    } catch {
      throw new InvalidLocatorError(input, `Malformed percent-encoding in segment '${raw}'`)
    }

    decoded.push(...segment.split('/').filter(part => part.length > 0))
  }

  return decoded
}

/**
 * Parse a repository URL or `owner/repo/...` shorthand into a locator
 *
 * - `owner/repo` alone targets the repository root on the default branch
 * - `owner/repo/tree/<ref>/<dir...>` targets `<dir>` at `<ref>`
 * - `owner/repo/<dir...>` targets `<dir>` on the default branch
 * - `owner/repo/blob/...` is rejected: only directories can be downloaded
 *
 * A ref containing `/` cannot be told apart from a directory here. The first
 * segment after `tree` is taken as the ref; the listing step moves further
 * segments onto it when the remote reports the ref as unknown.
 */
export function parseLocator(input: string): RepoLocator {
  const trimmed = input.trim()
  if (!trimmed) {
    throw new InvalidLocatorError(input, EXPECTED_FORMAT)
  }

  const parts = splitSegments(trimmed, extractPath(trimmed))

  if (parts.length < 2) {
    throw new InvalidLocatorError(
      input,
      'Locator must include owner and repo: https://github.com/owner/repo'
    )
  }

  const [owner, rawRepo, marker, ...rest] = parts
  const repo = rawRepo.endsWith('.git') ? rawRepo.slice(0, -'.git'.length) : rawRepo

  if (!repo) {
    throw new InvalidLocatorError(input, 'Repository name is empty')
  }

  if (marker === BLOB_MARKER) {
    throw new InvalidLocatorError(
      input,
      "Use '/tree/' for directories, not '/blob/' (which is for single files)"
    )
  }

  if (marker === TREE_MARKER) {
    const [ref, ...dir] = rest
    if (ref === undefined) {
      throw new InvalidLocatorError(input, `Missing ref after /${TREE_MARKER}/`)
    }
    return { owner, repo, ref, dir: dir.join('/') }
  }

  const dir = marker === undefined ? [] : [marker, ...rest]
  return { owner, repo, dir: dir.join('/') }
}

/**
 * Last segment of the locator's directory, used to re-root output paths
 *
 * Empty for the repository root.
 */
export function baseDirAnchor(locator: RepoLocator): string {
  const segments = locator.dir.split('/').filter(segment => segment.length > 0)
  return segments[segments.length - 1] ?? ''
}

/**
 * Ref to address content with; `HEAD` when none was resolved
 */
export function effectiveRef(locator: RepoLocator): string {
  return locator.ref ?? 'HEAD'
}

/**
 * Human-readable form: owner/repo@ref:dir
 */
export function formatLocator(locator: RepoLocator): string {
  const ref = locator.ref ? `@${locator.ref}` : ''
  const dir = locator.dir ? `:${locator.dir}` : ''
  return `${locator.owner}/${locator.repo}${ref}${dir}`
}
