/**
 * Release phases with an explicit sort rank.
 *
 * Stable sorts above every named pre-release phase and below adhoc, so an adhoc build
 * of vX.Y.Z sorts after the vX.Y.Z release. `Unset` only appears in the empty version.
 */
export enum ReleasePhase {
    Unset = 0,
    Alpha = 1,
    Beta = 2,
    Rc = 3,
    CloudOnly = 4,
    Stable = 5,
    Adhoc = 6,
}

const NAMED_PHASES: ReadonlyMap<string, ReleasePhase> = new Map([
    ['alpha', ReleasePhase.Alpha],
    ['beta', ReleasePhase.Beta],
    ['rc', ReleasePhase.Rc],
    ['cloudonly', ReleasePhase.CloudOnly],
])

/**
 * Look up a phase by its suffix name. Only the four named phases have one.
 */
export function phaseFromName(name: string): ReleasePhase | undefined {
    return NAMED_PHASES.get(name)
}

/**
 * Suffix name of a phase, or "" for stable, adhoc and unset
 */
export function phaseName(phase: ReleasePhase): string {
    switch (phase) {
        case ReleasePhase.Alpha:
            return 'alpha'
        case ReleasePhase.Beta:
            return 'beta'
        case ReleasePhase.Rc:
            return 'rc'
        case ReleasePhase.CloudOnly:
            return 'cloudonly'
        case ReleasePhase.Unset:
        case ReleasePhase.Stable:
        case ReleasePhase.Adhoc:
            return ''
    }
}
