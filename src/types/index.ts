export type { RepoLocator } from './locator.js'
export type {
  DownloadOutcome,
  DownloadStatus,
  DownloadResult,
  FailedDownload
} from './result.js'
export {
  DirpullError,
  InvalidLocatorError,
  AuthRequiredError,
  RateLimitedError,
  NotFoundError,
  TransportFailureError,
  DownloadFailedError,
  IoError,
  PathTraversalError,
  ConfigLoadError,
  isDirpullError,
  toDirpullError,
  describeError,
  type ErrorCode
} from './errors.js'
