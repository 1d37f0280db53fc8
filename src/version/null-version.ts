import { versionError } from '../core/errors/raise'
import { getLogger } from '../log/utils'
import { NullVersionJSONSchema, describePayload } from './schemas'
import type { DriverValue, NullVersionJSON } from './types'
import { Version, parseJSONText } from './version'

const logger = getLogger('null-version')

/**
 * A nullable Version for database columns and JSON payloads.
 *
 * `valid` is false for an absent version. The default instance serializes as database
 * NULL and vice versa. A stored empty string reads back as valid-but-empty, which is
 * not the same value as NULL.
 */
export class NullVersion {
    static readonly NULL = new NullVersion()

    constructor(readonly valid: boolean = false, readonly version: Version = Version.EMPTY) {
        Object.freeze(this)
    }

    /** Valid unless the version is empty */
    static of(version: Version): NullVersion {
        return new NullVersion(!version.isEmpty(), version)
    }

    equals(other: NullVersion): boolean {
        return this.valid === other.valid && this.version.equals(other.version)
    }

    // ---------- SQL column adapter ----------

    value(): DriverValue {
        return this.valid ? this.version.toString() : null
    }

    /**
     * @throws AdapterError for non-string values
     * @throws ValidationError when the string does not parse
     */
    static scan(value: unknown): NullVersion {
        if (value === null || value === undefined) {
            return NullVersion.NULL
        }
        return new NullVersion(true, Version.scan(value))
    }

    // ---------- JSON adapter ----------

    toJSON(): NullVersionJSON {
        if (!this.valid) {
            return { Valid: false }
        }
        return { Valid: true, Version: this.version.toJSON() }
    }

    /**
     * Decoding needs its own path: an absent NullVersion holds the empty Version, and
     * Version.fromJSON rejects an empty $raw just as parse rejects "".
     *
     * @throws SerializationError for any shape other than {"Valid": false} or
     * {"Valid": true, "Version": {"$raw": string}}
     * @throws ValidationError when the nested $raw does not parse
     */
    static fromJSON(value: unknown): NullVersion {
        const parsed = NullVersionJSONSchema.safeParse(value)
        if (!parsed.success) {
            logger.debug(`Rejected NullVersion JSON ${describePayload(value)}`)
            throw versionError('NULL_VERSION_JSON_INVALID', { payload: describePayload(value) }, parsed.error)
        }
        if (!parsed.data.Valid) {
            return NullVersion.NULL
        }
        return new NullVersion(true, Version.parse(parsed.data.Version.$raw))
    }

    static unmarshalJSON(text: string): NullVersion {
        return NullVersion.fromJSON(parseJSONText(text, 'NULL_VERSION_JSON_INVALID'))
    }
}
