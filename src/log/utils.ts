import { Logger as TsLogger, type ILogObj } from 'tslog'
import { getConfig, onConfigChange, type LogLevelName } from '../core/config'

export type Logger = TsLogger<ILogObj>

const LOG_LEVEL_IDS: Record<LogLevelName, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
}

const mainLogger: Logger = new TsLogger<ILogObj>({
    name: 'crdb-version',
    type: 'pretty',
    minLevel: LOG_LEVEL_IDS[getConfig().logLevel],
})

// Sub-loggers copy their settings when created, so level changes are pushed to each
const subLoggers = new Map<string, Logger>()

export function setLogVerbosity(level: LogLevelName): void {
    for (const logger of [mainLogger, ...subLoggers.values()]) {
        logger.settings.minLevel = LOG_LEVEL_IDS[level]
    }
}

onConfigChange(config => setLogVerbosity(config.logLevel))

/**
 * Sub-logger sharing the main logger's settings. One logger per name.
 */
export function getLogger(name: string): Logger {
    const existing = subLoggers.get(name)
    if (existing) {
        return existing
    }
    const logger = mainLogger.getSubLogger({ name })
    subLoggers.set(name, logger)
    return logger
}
