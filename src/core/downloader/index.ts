import pMap from 'p-map'
import { createLogger } from '../../utils/logger.js'
import {
  toDirpullError,
  type DownloadOutcome,
  type DownloadResult,
  type RepoLocator
} from '../../types/index.js'
import type { FileSource } from '../provider/index.js'
import { pathExists, resolveOutputPath, saveFile } from '../writer/index.js'
import { OutcomeAggregator } from './aggregator.js'
import type { CancellationContext } from './cancellation.js'

export { CancellationContext, cancelOnSignal } from './cancellation.js'
export { OutcomeAggregator, type OutcomeMessage } from './aggregator.js'

const logger = createLogger('download')

/**
 * Options for one download run
 */
export interface DownloadOptions {
  /** Resolved locator; its ref addresses the content */
  locator: RepoLocator

  /** Repository paths to download */
  files: readonly string[]

  /** Component output paths are re-rooted at, see extractRelativePath */
  anchor: string

  /** Local output root */
  outputDir: string

  /** Maximum number of files in flight */
  concurrency: number

  /** Skip files that already exist at their output path */
  resume: boolean

  cancellation: CancellationContext

  source: FileSource

  /** Called once for every outcome recorded in the result */
  onOutcome?: (path: string, outcome: DownloadOutcome) => void
}

/**
 * Fetch and write one file once it holds a concurrency slot
 */
async function downloadOne(path: string, options: DownloadOptions): Promise<DownloadOutcome> {
  try {
    if (options.resume) {
      const target = resolveOutputPath(options.anchor, path, options.outputDir)
      if (await pathExists(target)) {
        return { status: 'skipped', outputPath: target }
      }
    }

    const content = await options.source.fetchFile(path, options.locator)
    const outputPath = await saveFile(options.anchor, path, content, options.outputDir)
    return { status: 'downloaded', outputPath }
  } catch (error) {
    logger.debug(`${path}: ${error instanceof Error ? error.message : String(error)}`)
    return { status: 'failed', error: toDirpullError(error, path) }
  }
}

/**
 * Download `files` with at most `concurrency` in flight
 *
 * Per-file failures are recorded and do not stop the run. When the
 * cancellation context fires, files still waiting for a slot are recorded as
 * cancelled without touching the network, and the result is returned without
 * waiting for files already in flight; those finish in the background and
 * their writes are kept.
 */
export async function downloadFiles(options: DownloadOptions): Promise<DownloadResult> {
  const { files, concurrency, cancellation } = options

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
  }

  const aggregator = new OutcomeAggregator(files.length)
  const record = (path: string, outcome: DownloadOutcome): void => {
    if (aggregator.post({ path, outcome })) {
      options.onOutcome?.(path, outcome)
    }
  }

  // p-map pulls the next file only when a slot frees up, so this check runs
  // before a slot is taken and a cancelled file never consumes one
  function* admitted(): Generator<string> {
    for (const path of files) {
      if (cancellation.cancelled) {
        record(path, { status: 'cancelled' })
        continue
      }
      yield path
    }
  }

  const run = pMap(
    admitted(),
    async path => {
      // The run may have been cancelled while this file waited for its slot
      if (cancellation.cancelled) {
        record(path, { status: 'cancelled' })
        return
      }
      aggregator.start()
      record(path, await downloadOne(path, options))
    },
    { concurrency }
  )

  let removeListener: () => void = () => {}
  const interrupted = new Promise<void>(resolve => {
    removeListener = cancellation.onCancel(resolve)
  })

  try {
    await Promise.race([run, interrupted])
  } finally {
    removeListener()
  }

  return aggregator.seal(cancellation.cancelled)
}
