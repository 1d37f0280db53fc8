import { describe, it } from 'mocha'
import { expect } from 'chai'
import * as crdbVersion from '../../src'

describe('Package entry point', () => {
    it('should expose the value types', () => {
        const v = crdbVersion.Version.parse('v24.1.0-rc.1')
        expect(v.phase).to.equal(crdbVersion.ReleasePhase.Rc)
        expect(v.major().equals(crdbVersion.MajorVersion.parse('v24.1'))).to.equal(true)
        expect(crdbVersion.NullVersion.of(v).value()).to.equal('v24.1.0-rc.1')
    })

    it('should expose the error classes', () => {
        const result = crdbVersion.Version.safeParse('v1.0')
        expect(result.success).to.equal(false)
        if (!result.success) {
            expect(result.error).to.be.instanceOf(crdbVersion.ValidationError)
            expect(crdbVersion.isCrdbVersionError(result.error)).to.equal(true)
        }
    })

    it('should expose configuration and logging', () => {
        expect(crdbVersion.getConfig().logLevel).to.be.oneOf(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'])
        expect(crdbVersion.getLogger('entry-point').settings.name).to.equal('entry-point')
    })
})
