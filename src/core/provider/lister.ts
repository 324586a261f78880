import { minimatch } from 'minimatch'
import { createLogger } from '../../utils/logger.js'
import { NotFoundError, type RepoLocator } from '../../types/index.js'
import { effectiveRef } from '../locator/index.js'
import { encodePath, type HostingApiClient } from './client.js'
import {
  ContentsResponseSchema,
  RepositorySchema,
  TreeResponseSchema,
  type TreeEntry
} from './schemas.js'

const logger = createLogger('list')

/**
 * Result of one fast (tree) listing call
 */
export interface TreeListing {
  entries: TreeEntry[]
  truncated: boolean
}

/**
 * Outcome of probing one ref: a listing or the error the call raised
 */
export type ProbeOutcome =
  | { ok: true; listing: TreeListing }
  | { ok: false; error: unknown }

/**
 * Ref disambiguation state
 *
 * `probing` holds the ref being tried and the directory segments not yet
 * moved onto it. A not-found probe moves the first segment onto the ref.
 */
export type ProbeState =
  | { kind: 'probing'; ref: string; segments: string[]; attempts: number }
  | { kind: 'resolved'; ref: string; dir: string; listing: TreeListing; attempts: number }
  | { kind: 'exhausted'; error: unknown; attempts: number }

/**
 * Start probing with the ref and directory as parsed
 */
export function initialProbeState(ref: string, dir: string): ProbeState {
  return {
    kind: 'probing',
    ref,
    segments: dir.split('/').filter(segment => segment.length > 0),
    attempts: 0
  }
}

/**
 * Advance the probe after a listing call for `state.ref`
 */
export function nextProbeState(
  state: Extract<ProbeState, { kind: 'probing' }>,
  outcome: ProbeOutcome
): ProbeState {
  const attempts = state.attempts + 1

  if (outcome.ok) {
    return {
      kind: 'resolved',
      ref: state.ref,
      dir: state.segments.join('/'),
      listing: outcome.listing,
      attempts
    }
  }

  if (!(outcome.error instanceof NotFoundError)) {
    return { kind: 'exhausted', error: outcome.error, attempts }
  }

  const [next, ...remaining] = state.segments
  if (next === undefined) {
    return { kind: 'exhausted', error: outcome.error, attempts }
  }

  return {
    kind: 'probing',
    ref: `${state.ref}/${next}`,
    segments: remaining,
    attempts
  }
}

/**
 * Run the probe until it resolves or runs out of segments
 */
export async function resolveRef(
  ref: string,
  dir: string,
  listTree: (ref: string) => Promise<TreeListing>
): Promise<Exclude<ProbeState, { kind: 'probing' }>> {
  let state: ProbeState = initialProbeState(ref, dir)

  for (;;) {
    if (state.kind !== 'probing') {
      return state
    }

    let outcome: ProbeOutcome
    try {
      outcome = { ok: true, listing: await listTree(state.ref) }
    } catch (error) {
      outcome = { ok: false, error }
    }
    state = nextProbeState(state, outcome)
    if (state.kind === 'probing') {
      logger.debug(`ref not found, trying '${state.ref}'`)
    }
  }
}

/**
 * Keep file entries under `dir`; an empty `dir` keeps everything
 */
export function filterTreeEntries(entries: TreeEntry[], dir: string): string[] {
  const prefix = dir ? `${dir.replace(/\/+$/, '')}/` : ''
  return entries
    .filter(entry => entry.type === 'blob' && entry.path.startsWith(prefix))
    .map(entry => entry.path)
}

/**
 * Drop files whose path below `dir` matches one of `patterns`
 */
export function applyExcludes(files: string[], dir: string, patterns: string[]): string[] {
  if (patterns.length === 0) {
    return files
  }

  const prefix = dir ? `${dir}/` : ''
  return files.filter(file => {
    const relative = file.startsWith(prefix) ? file.slice(prefix.length) : file
    return !patterns.some(pattern => minimatch(relative, pattern, { dot: true, matchBase: true }))
  })
}

/**
 * Enumerates the files of a remote directory
 */
export class RepositoryLister {
  constructor(private readonly client: HostingApiClient) {}

  /**
   * List every file below `locator.dir`
   *
   * Resolves the default branch when no ref is set, then works out where a
   * slash-containing ref ends. `locator` is updated in place with the
   * resolved ref and directory.
   */
  async listFiles(locator: RepoLocator): Promise<string[]> {
    if (locator.ref === undefined) {
      locator.ref = await this.fetchDefaultBranch(locator)
      logger.debug(`using default branch '${locator.ref}'`)
    }

    const state = await resolveRef(locator.ref, locator.dir, ref => this.listTree(locator, ref))
    if (state.kind === 'exhausted') {
      throw state.error
    }

    locator.ref = state.ref
    locator.dir = state.dir

    const files = filterTreeEntries(state.listing.entries, state.dir)
    if (files.length > 0 || !state.listing.truncated) {
      return files
    }

    // The tree listing hit its entry ceiling before reaching this directory
    logger.debug('tree listing truncated, walking directory contents')
    return this.listContents(locator, locator.dir)
  }

  /**
   * Look up the repository's default branch
   */
  async fetchDefaultBranch(locator: RepoLocator): Promise<string> {
    const endpoint = `repos/${encodeURIComponent(locator.owner)}/${encodeURIComponent(locator.repo)}`
    const repository = await this.client.getJson(endpoint, RepositorySchema, locator)
    return repository.default_branch
  }

  /**
   * Fast listing: the whole recursive tree in a single call
   */
  async listTree(locator: RepoLocator, ref: string): Promise<TreeListing> {
    const endpoint =
      `repos/${encodeURIComponent(locator.owner)}/${encodeURIComponent(locator.repo)}` +
      `/git/trees/${encodePath(ref)}?recursive=1`
    const response = await this.client.getJson(endpoint, TreeResponseSchema, locator)
    return { entries: response.tree, truncated: response.truncated }
  }

  /**
   * Exhaustive listing: one contents call per directory level
   */
  async listContents(locator: RepoLocator, dir: string): Promise<string[]> {
    const ref = effectiveRef(locator)
    const endpoint =
      `repos/${encodeURIComponent(locator.owner)}/${encodeURIComponent(locator.repo)}` +
      `/contents/${encodePath(dir)}?ref=${encodeURIComponent(ref)}`
    const entries = await this.client.getJson(endpoint, ContentsResponseSchema, locator)
    const files: string[] = []

    for (const entry of entries) {
      if (entry.type === 'file') {
        files.push(entry.path)
      } else if (entry.type === 'dir') {
        files.push(...await this.listContents(locator, entry.path))
      }
    }

    return files
  }
}
