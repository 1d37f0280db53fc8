/**
 * Read a captured digit run. A group that did not take part reads as 0.
 *
 * Returns undefined when the number is past `Number.MAX_SAFE_INTEGER`, where distinct
 * digit runs would read back as the same number.
 */
export function parseDigits(value: string | undefined): number | undefined {
    if (!value) {
        return 0
    }
    const parsed = Number.parseInt(value, 10)
    return Number.isSafeInteger(parsed) ? parsed : undefined
}
