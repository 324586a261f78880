import chalk from 'chalk'
import type { DownloadStatus } from '../../types/index.js'

const ELLIPSIS = '…/'
const DEFAULT_PATH_WIDTH = 40
const BAR_WIDTH = 20

/**
 * Minimal writable the progress display draws on
 */
export interface ProgressStream {
  write(chunk: string): boolean
  isTTY?: boolean
}

export interface ProgressOptions {
  /** Draw nothing */
  quiet?: boolean

  /** Print one line per completed file instead of a bar */
  verbose?: boolean

  /** Draw the bar when the stream is a terminal; ignored in quiet and verbose mode */
  enabled?: boolean

  stream?: ProgressStream
}

type ProgressMode = 'hidden' | 'bar' | 'lines'

const MARKS: Record<DownloadStatus, () => string> = {
  downloaded: () => chalk.green('✓'),
  skipped: () => chalk.cyan('skipped'),
  failed: () => chalk.red('✗'),
  cancelled: () => chalk.gray('cancelled')
}

/**
 * Shorten `path` to at most `maxLength` characters, keeping its tail
 *
 * The cut is moved forward to the next separator when there is one, so the
 * result starts at a whole path component.
 */
export function truncatePath(path: string, maxLength = DEFAULT_PATH_WIDTH): string {
  if (path.length <= maxLength) {
    return path
  }

  const available = maxLength - ELLIPSIS.length
  const tail = path.slice(path.length - available)
  const separator = tail.indexOf('/')
  return separator === -1
    ? `${ELLIPSIS}${tail}`
    : `${ELLIPSIS}${tail.slice(separator + 1)}`
}

/**
 * Terminal progress for one download run
 *
 * Counts are tracked in every mode; only the drawing changes.
 */
export class DownloadProgress {
  private completed = 0
  private lastLineLength = 0
  private closed = false
  private readonly mode: ProgressMode
  private readonly stream: ProgressStream

  constructor(
    readonly total: number,
    options: ProgressOptions = {}
  ) {
    this.stream = options.stream ?? process.stderr
    if (options.quiet) {
      this.mode = 'hidden'
    } else if (options.verbose) {
      this.mode = 'lines'
    } else {
      // Bars only on terminals
      this.mode = options.enabled !== false && this.stream.isTTY === true ? 'bar' : 'hidden'
    }

    if (this.mode === 'lines') {
      this.stream.write(`Downloading ${total} files...\n`)
    }
  }

  get count(): number {
    return this.completed
  }

  /**
   * Record one completed file
   */
  update(path: string, status: DownloadStatus): void {
    if (this.closed) {
      return
    }
    this.completed++

    switch (this.mode) {
      case 'lines':
        this.stream.write(`  [${this.completed}/${this.total}] ${path} ${MARKS[status]()}\n`)
        break
      case 'bar':
        this.draw(truncatePath(path))
        break
      case 'hidden':
        break
    }
  }

  /**
   * Clear the bar after a completed run
   */
  finish(): void {
    if (this.close() && this.lastLineLength > 0) {
      this.stream.write(`\r${' '.repeat(this.lastLineLength)}\r`)
    }
  }

  /**
   * Leave the bar where it stopped, for an interrupted run
   */
  abandon(): void {
    if (this.close() && this.lastLineLength > 0) {
      this.stream.write('\n')
    }
  }

  private close(): boolean {
    if (this.closed) {
      return false
    }
    this.closed = true
    return this.mode === 'bar'
  }

  private draw(message: string): void {
    const filled = this.total === 0
      ? BAR_WIDTH
      : Math.round((this.completed / this.total) * BAR_WIDTH)
    const bar = chalk.cyan('█'.repeat(filled)) + chalk.dim('░'.repeat(BAR_WIDTH - filled))
    const line = `Downloading [${bar}] ${this.completed}/${this.total}  ${message}`
    const padding = ' '.repeat(Math.max(0, this.lastLineLength - line.length))
    this.stream.write(`\r${line}${padding}`)
    this.lastLineLength = line.length
  }
}
