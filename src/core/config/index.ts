/**
 * Library configuration
 *
 * @description Environment-driven settings for error message verbosity and log level.
 * Values are validated with zod at the boundary.
 */

import { z } from 'zod'
import { ErrorEnvironment, createError } from '../errors/taxonomy'
import { VERSION_ERROR_CODES } from '../errors/codes'

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const

export type LogLevelName = typeof LOG_LEVELS[number]

export const VersionLibConfigSchema = z.object({
    environment: z.nativeEnum(ErrorEnvironment),
    logLevel: z.enum(LOG_LEVELS),
})

export type VersionLibConfig = z.infer<typeof VersionLibConfigSchema>

export const DEFAULT_CONFIG: Readonly<VersionLibConfig> = {
    environment: ErrorEnvironment.DEVELOPMENT,
    logLevel: 'info',
}

const EnvSchema = z.object({
    NODE_ENV: z.string().optional(),
    CRDB_VERSION_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
})

function environmentFromNodeEnv(nodeEnv: string | undefined): ErrorEnvironment {
    switch (nodeEnv) {
        case 'production':
            return ErrorEnvironment.PRODUCTION
        case 'test':
            return ErrorEnvironment.TEST
        default:
            return ErrorEnvironment.DEVELOPMENT
    }
}

function invalidConfig(error: z.ZodError): Error {
    const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    return createError(VERSION_ERROR_CODES.CONFIG_INVALID, { issues }, error)
}

/**
 * Build a configuration from environment variables, falling back to defaults.
 *
 * @throws ConfigurationError when a variable is set to an unusable value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VersionLibConfig {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        throw invalidConfig(parsed.error)
    }

    return {
        environment: environmentFromNodeEnv(parsed.data.NODE_ENV),
        logLevel: parsed.data.CRDB_VERSION_LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    }
}

type ConfigListener = (config: VersionLibConfig) => void

const listeners: ConfigListener[] = []

let activeConfig: VersionLibConfig = loadConfigFromEnv()

export function getConfig(): VersionLibConfig {
    return activeConfig
}

/**
 * Override part of the active configuration. The merged result is validated.
 */
export function setConfig(overrides: Partial<VersionLibConfig>): VersionLibConfig {
    const parsed = VersionLibConfigSchema.safeParse({ ...activeConfig, ...overrides })
    if (!parsed.success) {
        throw invalidConfig(parsed.error)
    }
    activeConfig = parsed.data
    for (const listener of listeners) {
        listener(activeConfig)
    }
    return activeConfig
}

/**
 * Restore the configuration read from the environment
 */
export function resetConfig(env: NodeJS.ProcessEnv = process.env): VersionLibConfig {
    return setConfig(loadConfigFromEnv(env))
}

/**
 * Register a callback run after every configuration change
 */
export function onConfigChange(listener: ConfigListener): void {
    listeners.push(listener)
}
