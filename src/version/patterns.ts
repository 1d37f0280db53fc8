/**
 * Version grammar
 * Patterns are compiled once, fully anchored, and tried in the order listed
 */

export interface VersionPattern {
    /** Shape name, used in debug logs */
    readonly name: string;
    readonly pattern: RegExp;
}

const YEAR = '(?<year>[1-9][0-9]*)'
const ORDINAL = '(?<ordinal>[1-9][0-9]*)'
const PATCH = '(?<patch>(?:[1-9][0-9]*|0))'
const PREFIX = `^v${YEAR}\\.${ORDINAL}\\.${PATCH}`
const PHASE = '(?<phase>alpha|beta|rc|cloudonly)'
const FIPS = '(?:-fips)?'

/**
 * Roughly in "how often we expect to see them" order. Candidates overlap for some
 * inputs (the catch-all label accepts most suffixes), so the order decides the match.
 */
export const VERSION_PATTERNS: readonly VersionPattern[] = [
    // v24.1.0, v24.1.0-fips
    { name: 'release', pattern: new RegExp(`${PREFIX}${FIPS}$`) },
    // v24.1.0-rc.1
    { name: 'phase', pattern: new RegExp(`${PREFIX}-${PHASE}\\.(?<phaseOrdinal>[0-9]+)${FIPS}$`) },
    // v24.1.0-12-gabcdef
    { name: 'adhoc-build', pattern: new RegExp(`${PREFIX}-(?<customOrdinal>(?:[1-9][0-9]*|0))-g[a-f0-9]+${FIPS}$`) },
    // v24.1.0-rc.2-14-gabcdef
    {
        name: 'phase-adhoc-build',
        pattern: new RegExp(`${PREFIX}-${PHASE}\\.(?<phaseOrdinal>[0-9]+)-(?<customOrdinal>(?:[1-9][0-9]*|0))-g[a-f0-9]+${FIPS}$`),
    },
    // v24.1.0-beta.1-cloudonly-rc2, v24.1.0-beta.1-cloudonly.2
    {
        name: 'phase-cloudonly',
        pattern: new RegExp(`${PREFIX}-${PHASE}\\.(?<phaseOrdinal>[0-9]+)-cloudonly(?:-rc|\\.)(?<phaseSubOrdinal>(?:[1-9][0-9]*|0))$`),
    },
    // v24.1.0-cloudonly-rc2
    { name: 'legacy-cloudonly-rc', pattern: new RegExp(`${PREFIX}-(?<phase>cloudonly)-rc(?<phaseOrdinal>[0-9]+)$`) },
    // v24.1.0-cloudonly, v24.1.0-cloudonly2
    { name: 'legacy-cloudonly', pattern: new RegExp(`${PREFIX}-(?<phase>cloudonly)(?<phaseOrdinal>[0-9]+)?$`) },
    // v24.1.0-<anything> sorts after the corresponding plain v24.1.0
    { name: 'adhoc-label', pattern: new RegExp(`${PREFIX}-(?<adhocLabel>[-a-zA-Z0-9.+]+)$`) },
    // sha256:<hash>:latest-v24.1-build sorts just after v24.1.0, before v24.1.1
    {
        name: 'legacy-container-tag',
        pattern: new RegExp(`^sha256:(?<adhocLabel>[^:]+):latest-v${YEAR}\\.${ORDINAL}-build$`),
    },
]

/** Release series such as v25.1; year 0 is allowed */
export const MAJOR_VERSION_PATTERN = /^v(0|[1-9][0-9]*)\.([1-9][0-9]*)$/
