import { expect } from 'chai';
import { describe, it } from 'mocha';
import { VersionParseFailure } from '../src/errors';
import { parseLicenseListVersion, reconcileLicenseListVersion } from '../src/merge/licenseListVersion';
import { makeDocument } from './fixtures';

function withVersion(licenseListVersion?: string) {
    return makeDocument({ creationInfo: { created: '2024-01-01T00:00:00Z', licenseListVersion } });
}

describe('License list version', () => {
    describe('parseLicenseListVersion', () => {
        it('should pad two-part versions', () => {
            expect(parseLicenseListVersion('3.19').version).to.equal('3.19.0');
            expect(parseLicenseListVersion('v3').version).to.equal('3.0.0');
        });

        it('should keep full semantic versions', () => {
            expect(parseLicenseListVersion('3.21.1').version).to.equal('3.21.1');
        });

        it('should throw VersionParseFailure for other values', () => {
            expect(() => parseLicenseListVersion('latest')).to.throw(VersionParseFailure, 'Cannot parse license list version "latest"');
        });
    });

    describe('reconcileLicenseListVersion', () => {
        it('should use the baseline when no input declares a version', () => {
            expect(reconcileLicenseListVersion([])).to.equal('3.19');
            expect(reconcileLicenseListVersion([withVersion(undefined), makeDocument({ creationInfo: undefined })])).to.equal('3.19');
        });

        it('should return a single declared version as is', () => {
            expect(reconcileLicenseListVersion([withVersion('3.21')])).to.equal('3.21');
            expect(reconcileLicenseListVersion([withVersion('3.21'), withVersion('3.21')])).to.equal('3.21');
        });

        it('should not parse a single declared version', () => {
            expect(reconcileLicenseListVersion([withVersion('latest')])).to.equal('latest');
        });

        it('should pick the lowest of several versions', () => {
            expect(reconcileLicenseListVersion([withVersion('3.19'), withVersion('3.20')])).to.equal('3.19');
            expect(reconcileLicenseListVersion([withVersion('3.20'), withVersion('3.19')])).to.equal('3.19');
        });

        it('should compare numerically rather than as text', () => {
            expect(reconcileLicenseListVersion([withVersion('3.10'), withVersion('3.9')])).to.equal('3.9');
        });

        it('should fail when one of several versions cannot be parsed', () => {
            expect(() => reconcileLicenseListVersion([withVersion('3.19'), withVersion('latest')])).to.throw(VersionParseFailure);
        });
    });
});
