/**
 * Library entry point
 *
 * Download one directory of a remote repository without cloning it.
 *
 * @example
 * ```ts
 * import {
 *   parseLocator, baseDirAnchor, HostingApiClient, RepositoryLister,
 *   ContentFetcher, downloadFiles, CancellationContext
 * } from 'dirpull'
 *
 * const locator = parseLocator('https://github.com/owner/repo/tree/main/docs')
 * const client = new HostingApiClient({ token: process.env.GITHUB_TOKEN })
 * const files = await new RepositoryLister(client).listFiles(locator)
 * const result = await downloadFiles({
 *   locator,
 *   files,
 *   anchor: baseDirAnchor(locator),
 *   outputDir: './out',
 *   concurrency: 5,
 *   resume: false,
 *   cancellation: new CancellationContext(),
 *   source: new ContentFetcher(client)
 * })
 * ```
 */

export * from './types/index.js'
export * from './core/locator/index.js'
export * from './core/provider/index.js'
export * from './core/writer/index.js'
export * from './core/downloader/index.js'
export * from './core/progress/index.js'
export * from './core/config/index.js'
