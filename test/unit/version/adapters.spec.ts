/**
 * SQL column and JSON adapters for Version
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';
import { Version } from '../../../src/version';
import { AdapterError, SerializationError, ValidationError } from '../../../src/errors';

describe('Version adapters', () => {
  const version = Version.mustParse('v20.1.2-alpha.3-cloudonly.4');

  describe('SQL', () => {
    it('should store the raw text', () => {
      expect(version.value()).to.equal('v20.1.2-alpha.3-cloudonly.4');
      expect(Version.parse('v24.1.0-fips').value()).to.equal('v24.1.0-fips');
    });

    it('should store the empty version as an empty string', () => {
      expect(Version.EMPTY.value()).to.equal('');
    });

    it('should scan a stored version', () => {
      const scanned = Version.scan(version.toString());
      expect(scanned).to.deep.equal(version);
    });

    it('should scan an empty string as the empty version', () => {
      const scanned = Version.scan('');
      expect(scanned.isEmpty()).to.equal(true);
      expect(scanned).to.equal(Version.EMPTY);
    });

    it('should reject NULL', () => {
      for (const value of [null, undefined]) {
        expect(() => Version.scan(value))
          .to.throw(AdapterError, 'non-nil Version string required')
          .with.property('code', 'VERSION_REQUIRED_VALUE_MISSING');
      }
    });

    it('should reject non-string values', () => {
      expect(() => Version.scan(42))
        .to.throw(AdapterError, 'cannot convert number to Version')
        .with.property('code', 'VERSION_TYPE_MISMATCH');
      expect(() => Version.scan(Buffer.from('v24.1.0'))).to.throw(AdapterError, 'cannot convert object to Version');
    });

    it('should propagate parse errors', () => {
      expect(() => Version.scan('v24.1')).to.throw(ValidationError, "invalid version string 'v24.1'");
    });
  });

  describe('JSON', () => {
    it('should serialize as a $raw wrapper', () => {
      expect(JSON.stringify(version)).to.equal('{"$raw":"v20.1.2-alpha.3-cloudonly.4"}');
      expect(version.toJSON()).to.deep.equal({ $raw: 'v20.1.2-alpha.3-cloudonly.4' });
    });

    it('should round-trip through JSON text', () => {
      const parsed = Version.unmarshalJSON(JSON.stringify(version));
      expect(parsed).to.deep.equal(version);
    });

    it('should round-trip when nested in a larger document', () => {
      const doc = JSON.parse(JSON.stringify({ name: 'node-1', binary: Version.parse('v24.1.0-rc.2') }));
      expect(Version.fromJSON(doc.binary).toString()).to.equal('v24.1.0-rc.2');
    });

    it('should require the $raw key', () => {
      expect(() => Version.fromJSON({}))
        .to.throw(SerializationError, 'cannot parse {} as Version: $raw: Required')
        .with.property('code', 'VERSION_JSON_INVALID');
      expect(() => Version.fromJSON({ $raw: 5 })).to.throw(SerializationError);
      expect(() => Version.fromJSON('v24.1.0')).to.throw(SerializationError);
      expect(() => Version.fromJSON(null)).to.throw(SerializationError);
    });

    it('should ignore extra string keys', () => {
      expect(Version.fromJSON({ $raw: 'v24.1.0', source: 'release-notes' }).toString()).to.equal('v24.1.0');
    });

    it('should reject values that are not strings', () => {
      expect(() => Version.fromJSON({ $raw: 'v24.1.0', count: 1 }))
        .to.throw(SerializationError, 'cannot parse {"$raw":"v24.1.0","count":1} as Version: count: Expected string, received number')
        .with.property('code', 'VERSION_JSON_INVALID');
      expect(() => Version.unmarshalJSON('{"$raw":"v24.1.0","nested":{}}')).to.throw(SerializationError);
      expect(() => Version.fromJSON(['v24.1.0'])).to.throw(SerializationError);
    });

    it('should require $raw to parse', () => {
      expect(() => Version.fromJSON({ $raw: '' })).to.throw(ValidationError, "invalid version string ''");
      expect(() => Version.unmarshalJSON('{"$raw":"24.1.0"}')).to.throw(ValidationError);
    });

    it('should report JSON syntax errors as serialization errors', () => {
      try {
        Version.unmarshalJSON('{"$raw":');
        expect.fail('expected unmarshalJSON to throw');
      } catch (error) {
        expect(error).to.be.instanceOf(SerializationError);
        if (error instanceof SerializationError) {
          expect(error.code).to.equal('VERSION_JSON_INVALID');
          expect(error.originalError).to.be.instanceOf(SyntaxError);
        }
      }
    });
  });
});
