import { getConfig } from '../config'
import { VERSION_ERROR_CODES, type VersionErrorCodeName } from './codes'
import { createError, type CrdbVersionError } from './taxonomy'

/**
 * Build a catalogued error using the message environment of the active configuration
 */
export function versionError(
  name: VersionErrorCodeName,
  context: Record<string, unknown> = {},
  originalError?: Error
): CrdbVersionError {
  return createError(VERSION_ERROR_CODES[name], context, originalError, getConfig().environment);
}
