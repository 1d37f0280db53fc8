/**
 * crdb-version core module
 * Tree-shakable exports for configuration and error infrastructure
 */

// Configuration
export {
  DEFAULT_CONFIG,
  LOG_LEVELS,
  VersionLibConfigSchema,
  loadConfigFromEnv,
  getConfig,
  setConfig,
  resetConfig,
  onConfigChange,
  type VersionLibConfig,
  type LogLevelName
} from './config';

// Error taxonomy
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  CrdbVersionError,
  createError,
  isCrdbVersionError,
  extractErrorDetails,
  type ErrorCode
} from './errors/taxonomy';

export { VERSION_ERROR_CODES } from './errors/codes';
