import { versionError } from '../core/errors/raise'
import { isCrdbVersionError } from '../core/errors/taxonomy'
import { MAJOR_VERSION_PATTERN } from './patterns'
import { compareNumbers } from './ordering'
import { parseDigits } from './digits'
import type { Ordering, ParseResult } from './types'

/**
 * A CockroachDB major version or release series, ie "v25.1"
 */
export class MajorVersion {
    /** The zero value, used as "no series" */
    static readonly EMPTY = new MajorVersion(0, 0)

    constructor(readonly year: number, readonly ordinal: number) {
        Object.freeze(this)
    }

    /**
     * @throws ValidationError unless the input is exactly `v<year>.<ordinal>`, with both
     * numbers no larger than `Number.MAX_SAFE_INTEGER`
     */
    static parse(input: string): MajorVersion {
        const match = MAJOR_VERSION_PATTERN.exec(input)
        const year = parseDigits(match?.[1])
        const ordinal = parseDigits(match?.[2])
        if (!match || year === undefined || ordinal === undefined) {
            throw versionError('MAJOR_VERSION_MALFORMED_INPUT', { input })
        }
        return new MajorVersion(year, ordinal)
    }

    /**
     * Like parse, but bad input is treated as a programming error.
     * Meant for literals and module-level constants.
     */
    static mustParse(input: string): MajorVersion {
        try {
            return MajorVersion.parse(input)
        } catch (error) {
            if (isCrdbVersionError(error)) {
                throw versionError('VERSION_MUST_PARSE_FAILED', { input, reason: error.message }, error)
            }
            throw error
        }
    }

    static safeParse(input: string): ParseResult<MajorVersion> {
        try {
            return { success: true, data: MajorVersion.parse(input) }
        } catch (error) {
            if (isCrdbVersionError(error)) {
                return { success: false, error }
            }
            throw error
        }
    }

    static compare(a: MajorVersion, b: MajorVersion): Ordering {
        return a.compare(b)
    }

    compare(other: MajorVersion): Ordering {
        return compareNumbers(this.year, other.year) || compareNumbers(this.ordinal, other.ordinal)
    }

    equals(other: MajorVersion): boolean {
        return this.compare(other) === 0
    }

    lessThan(other: MajorVersion): boolean {
        return this.compare(other) < 0
    }

    atLeast(other: MajorVersion): boolean {
        return this.compare(other) >= 0
    }

    isEmpty(): boolean {
        return this.equals(MajorVersion.EMPTY)
    }

    /** Canonical `v<year>.<ordinal>`, not the parsed text */
    toString(): string {
        return `v${this.year}.${this.ordinal}`
    }
}
