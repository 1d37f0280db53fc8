/**
 * Zod schemas for the JSON wire shapes of Version and NullVersion
 */

import { z } from 'zod'

const RawVersionSchema = z.object({
    $raw: z.string(),
})

// A Version document is a map of strings; keys other than $raw are ignored
export const VersionJSONSchema = z.record(z.string()).pipe(RawVersionSchema)

// Valid is the discriminant: an absent NullVersion never needs a Version key
export const NullVersionJSONSchema = z.discriminatedUnion('Valid', [
    z.object({ Valid: z.literal(false) }),
    z.object({ Valid: z.literal(true), Version: RawVersionSchema }),
])

/**
 * Render any value for an error message, never throwing
 */
export function describePayload(value: unknown): string {
    try {
        return JSON.stringify(value) ?? String(value)
    } catch {
        return String(value)
    }
}

export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')
}
