import type { DownloadOutcome, DownloadResult, FailedDownload } from '../../types/index.js'

/**
 * One completed unit of work
 */
export interface OutcomeMessage {
  path: string
  outcome: DownloadOutcome
}

/**
 * Sole owner of a run's result
 *
 * Units of work post one message each, in whatever order they finish. After
 * `seal` the result is frozen and further messages are dropped. A file counts
 * as not started unless it was marked started or posted a finished outcome,
 * so files a cancelled run never reached are counted without posting.
 */
export class OutcomeAggregator {
  private downloaded = 0
  private skipped = 0
  private failed = 0
  private started = 0
  private readonly errors: FailedDownload[] = []
  private sealed = false

  constructor(private readonly total: number) {}

  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Note that a file has taken a slot and begun its download
   */
  start(): void {
    if (!this.sealed) {
      this.started++
    }
  }

  /**
   * Record one outcome
   *
   * @returns false if the result was already sealed and the message dropped
   */
  post(message: OutcomeMessage): boolean {
    if (this.sealed) {
      return false
    }

    const { outcome } = message
    switch (outcome.status) {
      case 'downloaded':
        this.downloaded++
        break
      case 'skipped':
        this.skipped++
        break
      case 'failed':
        this.failed++
        this.errors.push({ path: message.path, error: outcome.error })
        break
      case 'cancelled':
        break
    }
    return true
  }

  /**
   * Freeze and return the result
   */
  seal(cancelled: boolean): DownloadResult {
    this.sealed = true
    const finished = this.downloaded + this.skipped + this.failed
    return Object.freeze({
      total: this.total,
      downloaded: this.downloaded,
      skipped: this.skipped,
      failed: this.failed,
      notStarted: this.total - Math.max(this.started, finished),
      cancelled,
      incomplete: this.total - this.downloaded - this.skipped,
      errors: Object.freeze([...this.errors])
    })
  }
}
