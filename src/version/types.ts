import type { CrdbVersionError } from '../core/errors/taxonomy'
import type { ReleasePhase } from './phase'

export type Ordering = -1 | 0 | 1

export type ParseResult<T> =
    | { success: true; data: T }
    | { success: false; error: CrdbVersionError }

/**
 * Every field of a Version, in comparison priority order, plus the raw text
 */
export interface VersionFields {
    year: number
    ordinal: number
    patch: number
    phase: ReleasePhase
    phaseOrdinal: number
    phaseSubOrdinal: number
    customOrdinal: number
    adhocLabel: string
    raw: string
}

export interface VersionJSON {
    $raw: string
}

export type NullVersionJSON =
    | { Valid: false }
    | { Valid: true; Version: VersionJSON }

/** Value written to, or read from, a database column */
export type DriverValue = string | null
