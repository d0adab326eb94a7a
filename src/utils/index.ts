export {
  ErrorHandler,
  SpotifyMetadataError,
  AuthenticationFailedError,
  TrackNotFoundError,
  MalformedResponseError,
  UnsupportedDatePrecisionError,
  NetworkError,
  ServiceUnavailableError
} from './ErrorHandler.js';
export type { ClientOperation } from './ErrorHandler.js';
export { ErrorLogger } from './ErrorLogger.js';
export type { ErrorLogEntry } from './ErrorLogger.js';
export { formatDuration, formatReleaseDate, isReleaseDatePrecision } from './formatters.js';
export { ConfigPaths } from './ConfigPaths.js';
