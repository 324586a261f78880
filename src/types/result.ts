import type { DirpullError } from './errors.js'

/**
 * What happened to one listed file
 */
export type DownloadOutcome =
  | { status: 'downloaded'; outputPath: string }
  | { status: 'skipped'; outputPath: string }
  | { status: 'failed'; error: DirpullError }
  | { status: 'cancelled' }

export type DownloadStatus = DownloadOutcome['status']

/**
 * A file that could not be downloaded and why
 */
export interface FailedDownload {
  path: string
  error: DirpullError
}

/**
 * Aggregate of one download run
 */
export interface DownloadResult {
  /** Number of files submitted to the run */
  total: number
  downloaded: number
  skipped: number
  failed: number

  /** Files that never started because the run was cancelled first */
  notStarted: number

  /** Whether the run was interrupted */
  cancelled: boolean

  /** Files not on disk at the end of the run: total - downloaded - skipped */
  incomplete: number

  /** Failures in the order they were recorded */
  errors: readonly FailedDownload[]
}
