import { mkdir, stat, writeFile } from 'fs/promises'
import { dirname, join, normalize, parse, resolve, sep } from 'path'
import { IoError, PathTraversalError } from '../../types/index.js'

/**
 * Remote paths always use forward slashes
 */
function remoteSegments(path: string): string[] {
  return path.split('/').filter(segment => segment !== '' && segment !== '.')
}

/**
 * Cut `filePath` down to the part starting at the `anchor` component
 *
 * `path/to/nvim/lua/init.lua` anchored at `nvim` gives `nvim/lua/init.lua`.
 * A path equal to the anchor gives the empty string. An empty anchor (a
 * repository-root download) keeps the path as it is. A path that does not
 * contain the anchor as a whole component cannot be placed and is rejected.
 */
export function extractRelativePath(anchor: string, filePath: string): string {
  const segments = remoteSegments(filePath)
  const anchorSegments = remoteSegments(anchor)

  if (anchorSegments.length === 0) {
    return segments.join('/')
  }

  if (anchorSegments.length > 1) {
    throw new PathTraversalError(`anchor ${anchor} must be a single path component`)
  }

  const [anchorName] = anchorSegments
  if (segments.length === 1 && segments[0] === anchorName) {
    return ''
  }

  const index = segments.indexOf(anchorName)
  if (index === -1) {
    throw new PathTraversalError(`base directory ${anchor} not found in file path ${filePath}`)
  }

  return segments.slice(index).join('/')
}

/**
 * Resolve `.` and `..` lexically, without touching the filesystem
 *
 * Leading `..` components of a relative path are kept; `..` at the root of an
 * absolute path is dropped.
 */
export function normalizePath(path: string): string {
  return normalize(path)
}

/**
 * Split a local path into its root followed by its named components
 */
function localComponents(path: string): string[] {
  const { root } = parse(path)
  const rest = path.slice(root.length).split(sep).filter(part => part !== '' && part !== '.')
  return [root, ...rest]
}

/**
 * Whether every component of `root` is matched, in order, at the start of `path`
 */
export function isContained(root: string, path: string): boolean {
  const rootComponents = localComponents(normalizePath(root))
  const pathComponents = localComponents(normalizePath(path))

  if (pathComponents.length < rootComponents.length) {
    return false
  }
  return rootComponents.every((component, index) => pathComponents[index] === component)
}

/**
 * Absolute output path for a remote file, or PathTraversal if it would land
 * outside `outputDir`
 */
export function resolveOutputPath(anchor: string, filePath: string, outputDir: string): string {
  const relativePath = extractRelativePath(anchor, filePath)
  const root = resolve(outputDir)
  const target = normalizePath(join(root, ...relativePath.split('/')))

  if (!isContained(root, target)) {
    throw new PathTraversalError(`${filePath} is outside output directory ${outputDir}`)
  }

  return target
}

/**
 * Whether something already exists at `path`
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false
    }
    throw new IoError(path, error)
  }
}

/**
 * Write `content` for a remote file below `outputDir`, overwriting any
 * existing file
 *
 * @returns the absolute path written
 */
export async function saveFile(
  anchor: string,
  filePath: string,
  content: Uint8Array,
  outputDir: string
): Promise<string> {
  const target = resolveOutputPath(anchor, filePath, outputDir)
  const parent = dirname(target)

  try {
    await mkdir(parent, { recursive: true })
  } catch (error) {
    throw new IoError(parent, error)
  }

  try {
    await writeFile(target, content)
  } catch (error) {
    throw new IoError(target, error)
  }

  return target
}
