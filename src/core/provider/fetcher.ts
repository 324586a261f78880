import { createLogger } from '../../utils/logger.js'
import { DownloadFailedError, type RepoLocator } from '../../types/index.js'
import type { HostingApiClient } from './client.js'

/** Git LFS pointer files are small text stubs of roughly this size */
export const LFS_POINTER_MIN_BYTES = 128
export const LFS_POINTER_MAX_BYTES = 140

/** First line of every Git LFS pointer file */
export const LFS_POINTER_SIGNATURE = 'version https://git-lfs.github.com/spec/v1'

const SIGNATURE_BYTES = new TextEncoder().encode(LFS_POINTER_SIGNATURE)

const logger = createLogger('fetch')

/**
 * Anything that can produce the bytes of one repository file
 */
export interface FileSource {
  fetchFile(path: string, locator: RepoLocator): Promise<Uint8Array>
}

/**
 * Whether a response of this length could be an LFS pointer
 *
 * Bodies outside the window are returned without being inspected.
 */
export function mightBeLfsPointer(contentLength: number | undefined): boolean {
  return (
    contentLength !== undefined &&
    contentLength >= LFS_POINTER_MIN_BYTES &&
    contentLength <= LFS_POINTER_MAX_BYTES
  )
}

/**
 * Whether a body starts with the LFS pointer signature
 */
export function isLfsPointer(body: Uint8Array): boolean {
  if (body.length < SIGNATURE_BYTES.length) {
    return false
  }
  return SIGNATURE_BYTES.every((byte, index) => body[index] === byte)
}

function parseContentLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return undefined
  }
  return Number(value)
}

/**
 * Downloads raw file content, following LFS pointers to the media endpoint
 */
export class ContentFetcher implements FileSource {
  constructor(private readonly client: HostingApiClient) {}

  async fetchFile(path: string, locator: RepoLocator): Promise<Uint8Array> {
    const response = await this.client.getRaw(this.client.rawUrl(locator, path), path)
    const contentLength = parseContentLength(response.headers.get('content-length'))

    if (!mightBeLfsPointer(contentLength)) {
      return readBody(response, path)
    }

    const body = await readBody(response, path)
    if (!isLfsPointer(body)) {
      return body
    }

    logger.debug(`${path} is an LFS pointer, fetching media content`)
    const media = await this.client.getRaw(this.client.mediaUrl(locator, path), path)
    return readBody(media, path)
  }
}

async function readBody(response: Response, path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await response.arrayBuffer())
  } catch (error) {
    throw new DownloadFailedError(path, error)
  }
}
