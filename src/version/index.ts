/**
 * Version value types and their SQL/JSON adapters
 */

export { Version, parseJSONText } from './version'
export { MajorVersion } from './major-version'
export { NullVersion } from './null-version'
export { ReleasePhase, phaseFromName, phaseName } from './phase'
export { VERSION_PATTERNS, MAJOR_VERSION_PATTERN, type VersionPattern } from './patterns'
export { VersionJSONSchema, NullVersionJSONSchema } from './schemas'
export type {
    Ordering,
    ParseResult,
    VersionFields,
    VersionJSON,
    NullVersionJSON,
    DriverValue,
} from './types'
