/**
 * get command implementation
 *
 * Orchestrates one download:
 * Locator → Config/Token → Listing → Excludes → Download (bounded, cancellable) → Summary
 */

import { resolve } from 'path'
import { InvalidArgumentError, type Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, success } from '../../utils/logger.js'
import { maskSecret } from '../../utils/mask.js'
import { createConfigLoader } from '../../core/config/index.js'
import { parseLocator, baseDirAnchor, formatLocator } from '../../core/locator/index.js'
import {
  HostingApiClient,
  RepositoryLister,
  ContentFetcher,
  applyExcludes,
  type FetchFn
} from '../../core/provider/index.js'
import { resolveOutputPath } from '../../core/writer/index.js'
import { downloadFiles, cancelOnSignal, CancellationContext } from '../../core/downloader/index.js'
import { DownloadProgress, type ProgressStream } from '../../core/progress/index.js'
import { describeError, type DownloadResult, type RepoLocator } from '../../types/index.js'

const logger = createLogger('get')

/**
 * Concurrency above which the API rate limit is likely to be hit
 */
export const CONCURRENCY_WARNING_THRESHOLD = 100

/**
 * get command options
 */
export interface GetOptions {
  output?: string
  limit?: number
  dryRun?: boolean
  resume?: boolean
  token?: string
  exclude?: string[]
  progress?: boolean
}

/**
 * Collaborators replaced in tests
 */
export interface GetDependencies {
  fetch?: FetchFn
  env?: NodeJS.ProcessEnv
  homeDir?: string
  cancellation?: CancellationContext
  progressStream?: ProgressStream
}

/**
 * Parse the --limit value
 */
export function parseLimit(value: string): number {
  const limit = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return limit
}

/**
 * Print where each file would be written, without fetching anything
 */
function printPlan(files: string[], anchor: string, outputDir: string, quiet: boolean): number {
  let rejected = 0
  for (const file of files) {
    try {
      const target = resolveOutputPath(anchor, file, outputDir)
      if (!quiet) {
        console.log(`${file} -> ${target}`)
      }
    } catch (error) {
      rejected++
      logger.error(`${file}: ${describeError(error).join('; ')}`)
    }
  }
  return rejected
}

/**
 * Report the run result
 */
function printSummary(result: DownloadResult, outputDir: string, globalOptions: GlobalOptions): void {
  const parts = [`${result.downloaded} downloaded`]
  if (result.skipped > 0) {
    parts.push(`${result.skipped} skipped`)
  }
  if (result.failed > 0) {
    parts.push(`${result.failed} failed`)
  }

  if (result.cancelled) {
    logger.warn(`Cancelled: ${parts.join(', ')}, ${result.incomplete} of ${result.total} not completed`)
  } else if (result.failed === 0) {
    success(`✓ ${parts.join(', ')} → ${outputDir}`)
  } else {
    logger.error(`${parts.join(', ')} → ${outputDir}`)
  }

  for (const failure of result.errors) {
    const [message, ...details] = describeError(failure.error)
    logger.error(`  ${failure.path}: ${message}`)
    if (globalOptions.verbose) {
      for (const detail of details) {
        logger.error(`    ${detail}`)
      }
    }
  }
}

/**
 * Execute get command
 */
export async function executeGet(
  url: string,
  options: GetOptions,
  globalOptions: GlobalOptions,
  deps: GetDependencies = {}
): Promise<number> {
  const quiet = globalOptions.quiet === true
  const verbose = globalOptions.verbose === true

  try {
    // 1. Locator
    const locator: RepoLocator = parseLocator(url)

    // 2. Configuration and credentials
    const loader = createConfigLoader({ env: deps.env, homeDir: deps.homeDir })
    const config = await loader.resolve(globalOptions.config)
    const token = await loader.resolveToken(config, options.token)
    if (token) {
      logger.debug(`Using token ${maskSecret(token)}`)
    }

    const concurrency = options.limit ?? config.concurrency
    if (concurrency > CONCURRENCY_WARNING_THRESHOLD) {
      logger.warn(`A limit of ${concurrency} concurrent downloads may trigger API rate limiting`)
    }

    const client = new HostingApiClient({
      token,
      apiBaseUrl: config.apiBaseUrl,
      rawBaseUrl: config.rawBaseUrl,
      mediaBaseUrl: config.mediaBaseUrl,
      timeout: config.timeout,
      retries: config.retries,
      fetch: deps.fetch
    })

    // 3. Listing; resolves the ref and directory in place
    const listed = await new RepositoryLister(client).listFiles(locator)
    const files = applyExcludes(listed, locator.dir, [...config.exclude, ...(options.exclude ?? [])])
    logger.debug(`Listed ${listed.length} files in ${formatLocator(locator)}, ${files.length} after excludes`)

    if (files.length === 0) {
      logger.warn(`No files found in ${formatLocator(locator)}`)
      return ExitCode.SUCCESS
    }

    const anchor = baseDirAnchor(locator)
    const outputDir = resolve(options.output ?? '.')

    // 4. Dry run stops before any content request
    if (options.dryRun) {
      const rejected = printPlan(files, anchor, outputDir, quiet)
      return rejected > 0 ? ExitCode.ERROR : ExitCode.SUCCESS
    }

    // 5. Download
    const cancellation = deps.cancellation ?? new CancellationContext()
    const progress = new DownloadProgress(files.length, {
      quiet,
      verbose,
      enabled: options.progress !== false,
      stream: deps.progressStream
    })
    const dispose = cancelOnSignal(cancellation, 'SIGINT', () => {
      logger.warn('Interrupted, stopping after files in flight')
    })

    let result: DownloadResult
    try {
      result = await downloadFiles({
        locator,
        files,
        anchor,
        outputDir,
        concurrency,
        resume: options.resume === true,
        cancellation,
        source: new ContentFetcher(client),
        onOutcome: (path, outcome) => progress.update(path, outcome.status)
      })
    } finally {
      dispose()
    }

    if (result.cancelled) {
      progress.abandon()
    } else {
      progress.finish()
    }

    // 6. Summary
    printSummary(result, outputDir, globalOptions)

    // Per-file failures are reported in the summary, not in the exit code
    return result.cancelled ? ExitCode.CANCELLED : ExitCode.SUCCESS
  } catch (error) {
    const [message, ...details] = describeError(error)
    logger.error(message)
    for (const detail of details) {
      logger.error(`  ${detail}`)
    }
    return ExitCode.ERROR
  }
}

/**
 * Register get command on the program
 */
export function registerGetCommand(program: Command): void {
  program
    .command('get <url>', { isDefault: true })
    .description('Download one directory of a remote repository')
    .option('-o, --output <dir>', 'Output directory', '.')
    .option('-l, --limit <n>', 'Maximum concurrent downloads (default: from config)', parseLimit)
    .option('-n, --dry-run', 'List the files and their target paths without downloading')
    .option('-r, --resume', 'Skip files that already exist in the output directory')
    .option('-t, --token <token>', 'Access token (default: GITHUB_TOKEN, then the token file)')
    .option('--exclude <glob...>', 'Leave out files matching a glob, relative to the directory')
    .option('--no-progress', 'Hide the progress bar')
    .action(async (url: string, options: GetOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeGet(url, options, globalOpts)
      process.exit(exitCode)
    })
}
