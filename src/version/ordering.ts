import type { Ordering } from './types'

export function compareNumbers(a: number, b: number): Ordering {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

export function compareStrings(a: string, b: string): Ordering {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}
