import { describe, it, before, beforeEach, afterEach } from 'mocha'
import { expect } from 'chai'
import sinon from 'sinon'
import { Logger } from 'tslog'
import { getLogger, setLogVerbosity } from '../../../src/log/utils'
import { getConfig, setConfig, type VersionLibConfig } from '../../../src/core/config'
import { Version } from '../../../src/version'

describe('Logging', () => {
    let sandbox: sinon.SinonSandbox
    let initialConfig: VersionLibConfig

    before(() => {
        initialConfig = getConfig()
    })

    beforeEach(() => {
        sandbox = sinon.createSandbox()
    })

    afterEach(() => {
        sandbox.restore()
        setConfig(initialConfig)
    })

    it('should log which pattern matched at debug level', () => {
        const debug = sandbox.spy(Logger.prototype, 'debug')
        Version.parse('v24.1.0-rc.1')
        expect(debug.calledWith('Version v24.1.0-rc.1 matched pattern phase')).to.equal(true)
    })

    it('should log a failed match before throwing', () => {
        const debug = sandbox.spy(Logger.prototype, 'debug')
        expect(Version.safeParse('v24.1').success).to.equal(false)
        expect(debug.calledWith('Version v24.1 matched no pattern')).to.equal(true)
    })

    it('should hand out one logger per name', () => {
        expect(getLogger('logging-spec-shared')).to.equal(getLogger('logging-spec-shared'))
        expect(getLogger('logging-spec-shared')).to.not.equal(getLogger('logging-spec-other'))
    })

    it('should push level changes to existing sub-loggers', () => {
        const logger = getLogger('logging-spec')
        setLogVerbosity('error')
        expect(logger.settings.minLevel).to.equal(5)
        setLogVerbosity('silly')
        expect(logger.settings.minLevel).to.equal(0)
    })

    it('should follow the configured log level', () => {
        const logger = getLogger('logging-spec-config')
        setConfig({ logLevel: 'warn' })
        expect(logger.settings.minLevel).to.equal(4)
        setConfig({ logLevel: 'debug' })
        expect(logger.settings.minLevel).to.equal(2)
    })
})
