import { versionError } from '../core/errors/raise'
import { isCrdbVersionError } from '../core/errors/taxonomy'
import { getLogger } from '../log/utils'
import { MajorVersion } from './major-version'
import { compareNumbers, compareStrings } from './ordering'
import { parseDigits } from './digits'
import { VERSION_PATTERNS } from './patterns'
import { ReleasePhase, phaseFromName, phaseName } from './phase'
import { VersionJSONSchema, describeIssues, describePayload } from './schemas'
import type { Ordering, ParseResult, VersionFields, VersionJSON } from './types'

const logger = getLogger('version')

const EMPTY_FIELDS: VersionFields = {
    year: 0,
    ordinal: 0,
    patch: 0,
    phase: ReleasePhase.Unset,
    phaseOrdinal: 0,
    phaseSubOrdinal: 0,
    customOrdinal: 0,
    adhocLabel: '',
    raw: '',
}

// A lone trailing "%" matches with an empty key and is kept as written
const PLACEHOLDER_RE = /%([\s\S]?)/g

function groupInt(raw: string, value: string | undefined): number {
    const parsed = parseDigits(value)
    if (parsed === undefined) {
        logger.debug(`Version ${raw} has a number out of range: ${value}`)
        throw versionError('VERSION_MALFORMED_INPUT', { input: raw })
    }
    return parsed
}

/**
 * A CockroachDB (binary) version.
 *
 * Versions have a major version ("vX.Y", typically the year and the release number
 * within the year), a patch version (the "Z" in "vX.Y.Z"), and sometimes a phase,
 * sub-phase and other suffixes. These are not semantic versions: use this class to
 * parse and compare them so that every current and historical shape orders correctly.
 *
 * Instances are immutable. Equality and ordering use the parsed fields only; the raw
 * text is kept for display and round-tripping.
 */
export class Version {
    /** The zero value, used as "no version" where a value is required */
    static readonly EMPTY = new Version(EMPTY_FIELDS)

    readonly year: number
    readonly ordinal: number
    readonly patch: number
    readonly phase: ReleasePhase
    readonly phaseOrdinal: number
    readonly phaseSubOrdinal: number
    readonly customOrdinal: number
    readonly adhocLabel: string
    /** The text this version was parsed from, or rendered for a derived version */
    readonly raw: string

    private constructor(fields: VersionFields) {
        this.year = fields.year
        this.ordinal = fields.ordinal
        this.patch = fields.patch
        this.phase = fields.phase
        this.phaseOrdinal = fields.phaseOrdinal
        this.phaseSubOrdinal = fields.phaseSubOrdinal
        this.customOrdinal = fields.customOrdinal
        this.adhocLabel = fields.adhocLabel
        this.raw = fields.raw
        Object.freeze(this)
    }

    /**
     * Parse a version string. Accepted shapes, tried in this order:
     *
     * - `v24.1.0` (optionally `-fips`)
     * - `v24.1.0-rc.1` for alpha, beta, rc and cloudonly (optionally `-fips`)
     * - `v24.1.0-12-gabcdef` adhoc build: commit count past the tag and a short SHA
     * - `v24.1.0-rc.2-14-gabcdef` pre-release with an adhoc build on top
     * - `v24.1.0-beta.1-cloudonly-rc2` / `v24.1.0-beta.1-cloudonly.2`
     * - `v24.1.0-cloudonly-rc2`, `v24.1.0-cloudonly`, `v24.1.0-cloudonly2` (legacy)
     * - `v24.1.0-<label>` any other label, sorting after v24.1.0
     * - `sha256:<hash>:latest-v24.1-build` (legacy container tags, patch 0)
     *
     * @throws ValidationError when nothing matches or a number is past Number.MAX_SAFE_INTEGER
     */
    static parse(input: string): Version {
        for (const { name, pattern } of VERSION_PATTERNS) {
            const match = pattern.exec(input)
            if (match?.groups) {
                logger.debug(`Version ${input} matched pattern ${name}`)
                return Version.fromGroups(input, match.groups)
            }
        }

        logger.debug(`Version ${input} matched no pattern`)
        throw versionError('VERSION_MALFORMED_INPUT', { input })
    }

    private static fromGroups(raw: string, groups: Record<string, string | undefined>): Version {
        let phase = ReleasePhase.Stable
        let phaseOrdinal = 0
        let phaseSubOrdinal = 0
        let adhocLabel = ''

        if (groups.phase) {
            const named = phaseFromName(groups.phase)
            if (named === undefined) {
                throw versionError('VERSION_UNKNOWN_PHASE', { phase: groups.phase, input: raw })
            }
            phase = named
            phaseOrdinal = groupInt(raw, groups.phaseOrdinal)
            phaseSubOrdinal = groupInt(raw, groups.phaseSubOrdinal)
        }

        if (groups.adhocLabel) {
            phase = ReleasePhase.Adhoc
            adhocLabel = groups.adhocLabel
        }

        return new Version({
            year: groupInt(raw, groups.year),
            ordinal: groupInt(raw, groups.ordinal),
            patch: groupInt(raw, groups.patch),
            phase,
            phaseOrdinal,
            phaseSubOrdinal,
            customOrdinal: groupInt(raw, groups.customOrdinal),
            adhocLabel,
            raw,
        })
    }

    /**
     * Like parse, but bad input is treated as a programming error.
     * Meant for literals and module-level constants, never for untrusted input.
     */
    static mustParse(input: string): Version {
        try {
            return Version.parse(input)
        } catch (error) {
            if (isCrdbVersionError(error)) {
                throw versionError('VERSION_MUST_PARSE_FAILED', { input, reason: error.message }, error)
            }
            throw error
        }
    }

    static safeParse(input: string): ParseResult<Version> {
        try {
            return { success: true, data: Version.parse(input) }
        } catch (error) {
            if (isCrdbVersionError(error)) {
                return { success: false, error }
            }
            throw error
        }
    }

    /**
     * Comparator for `Array.prototype.sort`
     */
    static compare(a: Version, b: Version): Ordering {
        return a.compare(b)
    }

    /**
     * Returns -1, 0 or 1 for the relative order of two versions.
     *
     * Fields are compared in order: year, ordinal, patch, phase, phase ordinal, phase
     * sub-ordinal, adhoc build ordinal, adhoc label. Phases order as alpha < beta < rc
     * < cloudonly < stable < adhoc, so "v24.1.0-rc.1" < "v24.1.0" < "v24.1.0-1-gabcdef".
     * When a version has both a pre-release and an adhoc build suffix, the pre-release
     * part wins: "v24.1.0-rc.2-14-gabcdef" sorts after rc.2 and before rc.3.
     */
    compare(other: Version): Ordering {
        return (
            compareNumbers(this.year, other.year) ||
            compareNumbers(this.ordinal, other.ordinal) ||
            compareNumbers(this.patch, other.patch) ||
            compareNumbers(this.phase, other.phase) ||
            compareNumbers(this.phaseOrdinal, other.phaseOrdinal) ||
            compareNumbers(this.phaseSubOrdinal, other.phaseSubOrdinal) ||
            compareNumbers(this.customOrdinal, other.customOrdinal) ||
            compareStrings(this.adhocLabel, other.adhocLabel)
        )
    }

    equals(other: Version): boolean {
        return this.compare(other) === 0
    }

    lessThan(other: Version): boolean {
        return this.compare(other) < 0
    }

    atLeast(other: Version): boolean {
        return this.compare(other) >= 0
    }

    isEmpty(): boolean {
        return this.equals(Version.EMPTY)
    }

    /** Compares release series only, ignoring patch and suffixes */
    compareSeries(other: Version): Ordering {
        return this.major().compare(other.major())
    }

    major(): MajorVersion {
        return new MajorVersion(this.year, this.ordinal)
    }

    /** Alpha, beta and rc. Cloud-only builds are stable releases with a restricted audience. */
    isPrerelease(): boolean {
        return this.phase < ReleasePhase.CloudOnly && !this.isEmpty()
    }

    isCustomBuild(): boolean {
        return this.customOrdinal > 0
    }

    isAdhocBuild(): boolean {
        return this.adhocLabel !== ''
    }

    isCustomOrAdhocBuild(): boolean {
        return this.isCustomBuild() || this.isAdhocBuild()
    }

    isCloudOnlyBuild(): boolean {
        return this.phase === ReleasePhase.CloudOnly
    }

    /**
     * Render parts of the version into a template:
     *
     * - %X: year
     * - %Y: ordinal
     * - %Z: patch
     * - %P: phase name (alpha, beta, rc, cloudonly; empty otherwise)
     * - %p: phase sort rank
     * - %o: phase ordinal (the 1 in "v24.1.0-rc.1")
     * - %s: phase sub-ordinal (the 2 in "v24.1.0-rc.1-cloudonly.2")
     * - %n: adhoc build ordinal (the 12 in "v24.1.0-12-gabcdef")
     * - %%: literal "%"
     *
     * @throws ProgrammingError on any other placeholder
     */
    format(template: string): string {
        const values: Record<string, string> = {
            X: String(this.year),
            Y: String(this.ordinal),
            Z: String(this.patch),
            P: phaseName(this.phase),
            p: String(this.phase),
            o: String(this.phaseOrdinal),
            s: String(this.phaseSubOrdinal),
            n: String(this.customOrdinal),
            '%': '%',
        }

        const unknown = Array.from(template.matchAll(PLACEHOLDER_RE))
            .filter(([, key]) => key !== '' && !Object.hasOwn(values, key))
            .map(([placeholder]) => placeholder)
        if (unknown.length > 0) {
            throw versionError('FORMAT_UNKNOWN_PLACEHOLDER', { placeholders: unknown.join(', '), template })
        }

        return template.replace(PLACEHOLDER_RE, (placeholder: string, key: string) =>
            key === '' ? placeholder : values[key]
        )
    }

    /** The original text passed to parse */
    toString(): string {
        return this.raw
    }

    /**
     * Next patch release of a stable version, eg v24.1.0 -> v24.1.1
     *
     * @throws StateError unless the version is stable
     */
    incPatch(): Version {
        if (this.phase !== ReleasePhase.Stable) {
            throw versionError('VERSION_NOT_STABLE', { version: this.raw })
        }
        const next = new Version({
            ...EMPTY_FIELDS,
            year: this.year,
            ordinal: this.ordinal,
            patch: this.patch + 1,
            phase: this.phase,
        })
        return next.withRaw(next.format('v%X.%Y.%Z'))
    }

    /**
     * Next pre-release in the same phase, eg v24.1.0-rc.1 -> v24.1.0-rc.2
     *
     * @throws StateError for non-prereleases, and for cloud-only sub-releases or adhoc builds
     */
    incPreRelease(): Version {
        if (!this.isPrerelease()) {
            throw versionError('VERSION_NOT_PRERELEASE', { version: this.raw })
        }
        if (this.phaseSubOrdinal > 0 || this.customOrdinal > 0) {
            throw versionError('VERSION_MODIFIED_PRERELEASE', { version: this.raw })
        }
        const next = new Version({ ...this.fields(), phaseOrdinal: this.phaseOrdinal + 1 })
        return next.withRaw(next.format('v%X.%Y.%Z-%P.%o'))
    }

    private fields(): VersionFields {
        return {
            year: this.year,
            ordinal: this.ordinal,
            patch: this.patch,
            phase: this.phase,
            phaseOrdinal: this.phaseOrdinal,
            phaseSubOrdinal: this.phaseSubOrdinal,
            customOrdinal: this.customOrdinal,
            adhocLabel: this.adhocLabel,
            raw: this.raw,
        }
    }

    private withRaw(raw: string): Version {
        return new Version({ ...this.fields(), raw })
    }

    // ---------- SQL column adapter ----------

    /** Stored form: the raw text, "" for the empty version */
    value(): string {
        return this.raw
    }

    /**
     * Read a stored column value. An empty string is the empty version; NULL is
     * rejected, use NullVersion for nullable columns.
     *
     * @throws AdapterError for NULL or non-string values
     * @throws ValidationError when the string does not parse
     */
    static scan(value: unknown): Version {
        if (value === null || value === undefined) {
            logger.debug('Rejected NULL for a non-nullable version column')
            throw versionError('VERSION_REQUIRED_VALUE_MISSING')
        }
        if (typeof value !== 'string') {
            logger.debug(`Rejected ${typeof value} for a version column`)
            throw versionError('VERSION_TYPE_MISMATCH', { type: typeof value, target: 'Version' })
        }
        // parse never accepts "", but a stored "" is the empty version
        return value === '' ? Version.EMPTY : Version.parse(value)
    }

    // ---------- JSON adapter ----------

    /**
     * Wrapped as {"$raw": ...} so a version is never mistaken for a plain string field
     */
    toJSON(): VersionJSON {
        return { $raw: this.raw }
    }

    /**
     * @throws SerializationError when the $raw key is missing or not a string
     * @throws ValidationError when $raw does not parse
     */
    static fromJSON(value: unknown): Version {
        const parsed = VersionJSONSchema.safeParse(value)
        if (!parsed.success) {
            logger.debug(`Rejected Version JSON ${describePayload(value)}`)
            throw versionError(
                'VERSION_JSON_INVALID',
                { payload: describePayload(value), reason: describeIssues(parsed.error) },
                parsed.error
            )
        }
        return Version.parse(parsed.data.$raw)
    }

    static unmarshalJSON(text: string): Version {
        return Version.fromJSON(parseJSONText(text, 'VERSION_JSON_INVALID'))
    }
}

/**
 * JSON.parse with syntax errors reported as SerializationError
 */
export function parseJSONText(text: string, code: 'VERSION_JSON_INVALID' | 'NULL_VERSION_JSON_INVALID'): unknown {
    try {
        return JSON.parse(text)
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        throw versionError(code, { payload: text, reason }, error instanceof Error ? error : undefined)
    }
}
