/**
 * Error code catalogue, registered on load
 */

import { ErrorCategory, ErrorCodeRegistry, ErrorSeverity, type ErrorCode } from './taxonomy';

export const VERSION_ERROR_CODES = {
  VERSION_MALFORMED_INPUT: {
    code: 'VERSION_MALFORMED_INPUT',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: "invalid version string '{input}'",
    prodMessage: 'Invalid version string',
    possibleCauses: ['Missing leading "v"', 'Missing patch number', 'Unsupported suffix'],
    suggestions: ['Use a version like "v24.1.0", "v24.1.0-rc.1" or "v24.1.0-12-gabcdef"']
  },
  MAJOR_VERSION_MALFORMED_INPUT: {
    code: 'MAJOR_VERSION_MALFORMED_INPUT',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'not a valid CockroachDB major version: {input}',
    prodMessage: 'Invalid major version string',
    suggestions: ['Use a release series like "v25.1"']
  },
  VERSION_UNKNOWN_PHASE: {
    code: 'VERSION_UNKNOWN_PHASE',
    category: ErrorCategory.INTERNAL,
    severity: ErrorSeverity.CRITICAL,
    devMessage: "unknown phase '{phase}' in version '{input}'",
    prodMessage: 'Unknown release phase'
  },
  VERSION_TYPE_MISMATCH: {
    code: 'VERSION_TYPE_MISMATCH',
    category: ErrorCategory.ADAPTER,
    severity: ErrorSeverity.ERROR,
    devMessage: 'cannot convert {type} to {target}',
    prodMessage: 'Stored value has the wrong type',
    suggestions: ['Store versions in a text column']
  },
  VERSION_REQUIRED_VALUE_MISSING: {
    code: 'VERSION_REQUIRED_VALUE_MISSING',
    category: ErrorCategory.ADAPTER,
    severity: ErrorSeverity.ERROR,
    devMessage: 'non-nil Version string required',
    prodMessage: 'Version value is required',
    suggestions: ['Use NullVersion for nullable columns']
  },
  VERSION_JSON_INVALID: {
    code: 'VERSION_JSON_INVALID',
    category: ErrorCategory.SERIALIZATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'cannot parse {payload} as Version: {reason}',
    prodMessage: 'Invalid Version JSON',
    suggestions: ['Encode versions as {"$raw": "v24.1.0"}']
  },
  NULL_VERSION_JSON_INVALID: {
    code: 'NULL_VERSION_JSON_INVALID',
    category: ErrorCategory.SERIALIZATION,
    severity: ErrorSeverity.ERROR,
    devMessage: "cannot parse '{payload}' as NullVersion",
    prodMessage: 'Invalid NullVersion JSON',
    suggestions: ['Encode as {"Valid": false} or {"Valid": true, "Version": {"$raw": "v24.1.0"}}']
  },
  VERSION_NOT_STABLE: {
    code: 'VERSION_NOT_STABLE',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'version {version} is not a stable version',
    prodMessage: 'Version is not a stable version'
  },
  VERSION_NOT_PRERELEASE: {
    code: 'VERSION_NOT_PRERELEASE',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'version {version} is not a prerelease',
    prodMessage: 'Version is not a prerelease'
  },
  VERSION_MODIFIED_PRERELEASE: {
    code: 'VERSION_MODIFIED_PRERELEASE',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'only unmodified CRDB versions are supported, got {version}',
    prodMessage: 'Only unmodified prerelease versions can be incremented'
  },
  VERSION_MUST_PARSE_FAILED: {
    code: 'VERSION_MUST_PARSE_FAILED',
    category: ErrorCategory.PROGRAMMING,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'mustParse called with invalid input: {reason}',
    prodMessage: 'Invalid version literal'
  },
  FORMAT_UNKNOWN_PLACEHOLDER: {
    code: 'FORMAT_UNKNOWN_PLACEHOLDER',
    category: ErrorCategory.PROGRAMMING,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'unknown placeholders in format string: {placeholders}',
    prodMessage: 'Invalid version format string',
    suggestions: ['Supported placeholders: %X %Y %Z %P %p %o %s %n %%']
  },
  CONFIG_INVALID: {
    code: 'CONFIG_INVALID',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'invalid crdb-version configuration: {issues}',
    prodMessage: 'Invalid configuration'
  }
} as const satisfies Record<string, ErrorCode>;

export type VersionErrorCodeName = keyof typeof VERSION_ERROR_CODES;

for (const errorCode of Object.values(VERSION_ERROR_CODES)) {
  ErrorCodeRegistry.register(errorCode);
}
