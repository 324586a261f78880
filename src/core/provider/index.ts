export {
  HostingApiClient,
  mapErrorStatus,
  encodePath,
  type ApiClientOptions,
  type FetchFn,
  type RequestContext
} from './client.js'
export {
  RepositoryLister,
  resolveRef,
  initialProbeState,
  nextProbeState,
  filterTreeEntries,
  applyExcludes,
  type ProbeOutcome,
  type ProbeState,
  type TreeListing
} from './lister.js'
export {
  ContentFetcher,
  isLfsPointer,
  mightBeLfsPointer,
  LFS_POINTER_SIGNATURE,
  type FileSource
} from './fetcher.js'
export type { TreeEntry, ContentEntry } from './schemas.js'
