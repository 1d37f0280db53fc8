import { describe, it } from 'mocha';
import { expect } from 'chai';
import { MajorVersion } from '../../../src/version';
import { ProgrammingError, ValidationError } from '../../../src/errors';

describe('MajorVersion', () => {

  describe('parse', () => {
    it('should parse a release series', () => {
      const m = MajorVersion.parse('v25.1');
      expect(m.year).to.equal(25);
      expect(m.ordinal).to.equal(1);
    });

    it('should allow year zero', () => {
      const m = MajorVersion.parse('v0.3');
      expect(m.year).to.equal(0);
      expect(m.ordinal).to.equal(3);
    });

    it('should reject anything but v<year>.<ordinal>', () => {
      for (const input of ['v25.0', 'v25.1.0', '25.1', 'v025.1', 'v25', '', ' v25.1']) {
        expect(() => MajorVersion.parse(input), input).to.throw(ValidationError);
      }
    });

    it('should reject numbers past the largest safe integer', () => {
      expect(MajorVersion.parse('v9007199254740991.1').year).to.equal(Number.MAX_SAFE_INTEGER);
      for (const input of ['v9007199254740993.1', 'v24.9007199254740992']) {
        expect(() => MajorVersion.parse(input), input)
          .to.throw(ValidationError, `not a valid CockroachDB major version: ${input}`);
      }
    });

    it('should name the offending input in the error', () => {
      expect(() => MajorVersion.parse('v25.1.0'))
        .to.throw(ValidationError, 'not a valid CockroachDB major version: v25.1.0')
        .with.property('code', 'MAJOR_VERSION_MALFORMED_INPUT');
    });

    it('should treat a bad literal as a programming error in mustParse', () => {
      expect(MajorVersion.mustParse('v24.2').equals(new MajorVersion(24, 2))).to.equal(true);
      expect(() => MajorVersion.mustParse('nope'))
        .to.throw(ProgrammingError, 'mustParse called with invalid input: not a valid CockroachDB major version: nope');
    });

    it('should return results from safeParse', () => {
      const ok = MajorVersion.safeParse('v23.2');
      expect(ok.success).to.equal(true);

      const bad = MajorVersion.safeParse('23.2');
      expect(bad.success).to.equal(false);
      if (!bad.success) {
        expect(bad.error.code).to.equal('MAJOR_VERSION_MALFORMED_INPUT');
      }
    });
  });

  describe('compare', () => {
    it('should compare year, then ordinal', () => {
      expect(MajorVersion.parse('v24.2').compare(MajorVersion.parse('v25.1'))).to.equal(-1);
      expect(MajorVersion.parse('v24.2').compare(MajorVersion.parse('v24.1'))).to.equal(1);
      expect(MajorVersion.parse('v24.2').compare(new MajorVersion(24, 2))).to.equal(0);
    });

    it('should derive equals, lessThan and atLeast', () => {
      const a = MajorVersion.parse('v24.1');
      const b = MajorVersion.parse('v24.3');
      expect(a.equals(b)).to.equal(false);
      expect(a.lessThan(b)).to.equal(true);
      expect(b.atLeast(a)).to.equal(true);
      expect(a.atLeast(a)).to.equal(true);
    });

    it('should sort with the static comparator', () => {
      const sorted = ['v25.1', 'v9.1', 'v24.3', 'v24.1'].map(s => MajorVersion.parse(s)).sort(MajorVersion.compare);
      expect(sorted.map(m => m.toString())).to.deep.equal(['v9.1', 'v24.1', 'v24.3', 'v25.1']);
    });
  });

  describe('isEmpty and toString', () => {
    it('should treat only {0,0} as empty', () => {
      expect(MajorVersion.EMPTY.isEmpty()).to.equal(true);
      expect(new MajorVersion(0, 0).isEmpty()).to.equal(true);
      expect(MajorVersion.parse('v0.1').isEmpty()).to.equal(false);
    });

    it('should render canonically', () => {
      expect(new MajorVersion(25, 1).toString()).to.equal('v25.1');
      expect(MajorVersion.EMPTY.toString()).to.equal('v0.0');
    });
  });
});
