import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import chalk, { type ColorSupportLevel } from 'chalk'
import { DownloadProgress, truncatePath, type ProgressStream } from './index.js'

class CaptureStream implements ProgressStream {
  readonly chunks: string[] = []

  constructor(readonly isTTY: boolean) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk)
    return true
  }

  get output(): string {
    return this.chunks.join('')
  }
}

describe('truncatePath', () => {
  it('should keep short paths unchanged', () => {
    expect(truncatePath('docs/readme.md')).toBe('docs/readme.md')
    expect(truncatePath('a'.repeat(40))).toBe('a'.repeat(40))
  })

  it('should cut at the next separator', () => {
    const path = 'very/long/directory/structure/for/testing/file.txt'

    expect(truncatePath(path)).toBe('…/structure/for/testing/file.txt')
  })

  it('should cut mid-component when the tail has no separator', () => {
    expect(truncatePath('x'.repeat(50))).toBe(`…/${'x'.repeat(38)}`)
  })

  it('should honour a custom width', () => {
    expect(truncatePath('one/two/three/four.txt', 12)).toBe('…/four.txt')
  })
})

describe('DownloadProgress', () => {
  let level: ColorSupportLevel

  beforeEach(() => {
    level = chalk.level
    chalk.level = 0
  })

  afterEach(() => {
    chalk.level = level
  })

  it('should print one line per file in verbose mode', () => {
    const stream = new CaptureStream(false)
    const progress = new DownloadProgress(2, { verbose: true, stream })

    progress.update('docs/a.md', 'downloaded')
    progress.update('docs/b.md', 'failed')
    progress.finish()

    expect(stream.chunks).toEqual([
      'Downloading 2 files...\n',
      '  [1/2] docs/a.md ✓\n',
      '  [2/2] docs/b.md ✗\n'
    ])
  })

  it('should draw nothing when quiet', () => {
    const stream = new CaptureStream(true)
    const progress = new DownloadProgress(3, { quiet: true, verbose: true, stream })

    progress.update('docs/a.md', 'downloaded')
    progress.finish()

    expect(stream.chunks).toEqual([])
    expect(progress.count).toBe(1)
  })

  it('should draw nothing on a stream that is not a terminal', () => {
    const stream = new CaptureStream(false)
    const progress = new DownloadProgress(1, { stream })

    progress.update('docs/a.md', 'downloaded')
    progress.finish()

    expect(stream.chunks).toEqual([])
  })

  it('should draw nothing when disabled', () => {
    const stream = new CaptureStream(true)
    const progress = new DownloadProgress(1, { enabled: false, stream })

    progress.update('docs/a.md', 'downloaded')

    expect(stream.chunks).toEqual([])
  })

  it('should redraw a single bar line on a terminal', () => {
    const stream = new CaptureStream(true)
    const progress = new DownloadProgress(2, { stream })

    progress.update('docs/a.md', 'downloaded')
    progress.update('docs/b.md', 'skipped')

    expect(stream.chunks[0]).toBe(`\rDownloading [${'█'.repeat(10)}${'░'.repeat(10)}] 1/2  docs/a.md`)
    expect(stream.chunks[1]).toBe(`\rDownloading [${'█'.repeat(20)}] 2/2  docs/b.md`)
  })

  it('should clear the bar on finish', () => {
    const stream = new CaptureStream(true)
    const progress = new DownloadProgress(1, { stream })
    progress.update('a', 'downloaded')
    const drawn = stream.chunks[0].length - 1

    progress.finish()
    progress.finish()

    expect(stream.chunks).toHaveLength(2)
    expect(stream.chunks[1]).toBe(`\r${' '.repeat(drawn)}\r`)
  })

  it('should keep the bar and end the line on abandon', () => {
    const stream = new CaptureStream(true)
    const progress = new DownloadProgress(4, { stream })
    progress.update('a', 'downloaded')

    progress.abandon()
    progress.update('b', 'downloaded')

    expect(stream.chunks.at(-1)).toBe('\n')
    expect(progress.count).toBe(1)
  })
})
