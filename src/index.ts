/**
 * crdb-version - CockroachDB release version parsing and ordering
 * Main entry point for the package
 */

// Value types - public API
export {
  Version,
  MajorVersion,
  NullVersion,
  ReleasePhase,
  type Ordering,
  type ParseResult,
  type VersionJSON,
  type NullVersionJSON,
  type DriverValue
} from './version';

// Errors - public API
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  CrdbVersionError,
  ValidationError,
  AdapterError,
  SerializationError,
  StateError,
  ConfigurationError,
  ProgrammingError,
  InternalError,
  isCrdbVersionError,
  extractErrorDetails,
  VERSION_ERROR_CODES,
  type ErrorCode
} from './errors';

// Configuration - public API
export {
  getConfig,
  setConfig,
  resetConfig,
  loadConfigFromEnv,
  type VersionLibConfig,
  type LogLevelName
} from './core/config';

export { getLogger, setLogVerbosity, type Logger } from './log/utils';
