/**
 * crdb-version error system module
 * Tree-shakable exports for error handling
 */

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
  createError,
  isCrdbVersionError,
  extractErrorDetails,
  renderMessage,
  type ErrorCode
} from '../core/errors/taxonomy';

export {
  VERSION_ERROR_CODES,
  type VersionErrorCodeName
} from '../core/errors/codes';

export { versionError } from '../core/errors/raise';
