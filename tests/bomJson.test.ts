import { expect } from 'chai';
import { describe, it } from 'mocha';
import { BomDecodeError, decodeBomJson, encodeBomJson, parseCreator, parseSupplier } from '../src/bom/bomJson';

function sampleJson() {
    return {
        spdxVersion: 'SPDX-2.3',
        dataLicense: 'CC0-1.0',
        SPDXID: 'SPDXRef-DOCUMENT',
        name: 'sample',
        documentNamespace: 'https://example.com/sample',
        creationInfo: {
            created: '2024-01-01T00:00:00Z',
            creators: ['Tool: syft-1.0', 'Organization: Acme (ops@acme.example)'],
            licenseListVersion: '3.20',
        },
        documentDescribes: ['SPDXRef-app'],
        packages: [
            {
                SPDXID: 'SPDXRef-app',
                name: 'app',
                versionInfo: '1.0.0',
                supplier: 'Organization: Acme',
                downloadLocation: 'NOASSERTION',
                filesAnalyzed: false,
                checksums: [{ algorithm: 'SHA256', checksumValue: 'abc' }],
                externalRefs: [{ referenceCategory: 'PACKAGE-MANAGER', referenceType: 'purl', referenceLocator: 'pkg:npm/app@1.0.0' }],
                primaryPackagePurpose: 'APPLICATION',
                sourceInfo: 'built from git',
            },
            { SPDXID: 'SPDXRef-lib', name: 'lib' },
        ],
        relationships: [
            { spdxElementId: 'SPDXRef-app', relatedSpdxElement: 'SPDXRef-lib', relationshipType: 'DEPENDS_ON' },
        ],
        files: [{ fileName: './README.md', SPDXID: 'SPDXRef-File-readme' }],
        snippets: [],
    };
}

describe('SPDX JSON codec', () => {
    describe('decodeBomJson', () => {
        it('should decode document fields and creation info', () => {
            const doc = decodeBomJson(sampleJson());
            expect(doc.id).to.equal('SPDXRef-DOCUMENT');
            expect(doc.namespace).to.equal('https://example.com/sample');
            expect(doc.creationInfo).to.deep.equal({
                created: '2024-01-01T00:00:00Z',
                creators: [
                    { type: 'Tool', name: 'syft-1.0' },
                    { type: 'Organization', name: 'Acme (ops@acme.example)' },
                ],
                licenseListVersion: '3.20',
            });
            expect(doc.files).to.deep.equal([{ fileName: './README.md', SPDXID: 'SPDXRef-File-readme' }]);
            expect(doc.extras).to.deep.equal({ snippets: [] });
        });

        it('should decode packages and keep unknown package keys', () => {
            const [app, lib] = decodeBomJson(sampleJson()).components;
            expect(app).to.deep.equal({
                id: 'SPDXRef-app',
                name: 'app',
                version: '1.0.0',
                supplier: { type: 'Organization', name: 'Acme' },
                downloadLocation: 'NOASSERTION',
                filesAnalyzed: false,
                checksums: [{ algorithm: 'SHA256', value: 'abc' }],
                externalRefs: [{ category: 'PACKAGE-MANAGER', type: 'purl', locator: 'pkg:npm/app@1.0.0' }],
                primaryPurpose: 'APPLICATION',
                extras: { sourceInfo: 'built from git' },
            });
            expect(lib).to.deep.equal({ id: 'SPDXRef-lib', name: 'lib', extras: {} });
        });

        it('should turn documentDescribes into DESCRIBES relationships', () => {
            const doc = decodeBomJson(sampleJson());
            expect(doc.relationships).to.deep.equal([
                { refA: 'SPDXRef-app', refB: 'SPDXRef-lib', type: 'DEPENDS_ON' },
                { refA: 'SPDXRef-DOCUMENT', refB: 'SPDXRef-app', type: 'DESCRIBES' },
            ]);
        });

        it('should not duplicate a DESCRIBES relationship that is already listed', () => {
            const json = sampleJson();
            json.relationships.push({ spdxElementId: 'SPDXRef-DOCUMENT', relatedSpdxElement: 'SPDXRef-app', relationshipType: 'DESCRIBES' });
            const doc = decodeBomJson(json);
            expect(doc.relationships.filter(r => r.type === 'DESCRIBES')).to.have.lengthOf(1);
        });

        it('should keep a primary purpose outside the vocabulary as an extra', () => {
            const json = sampleJson();
            const [appJson, libJson] = json.packages;
            const [app] = decodeBomJson({ ...json, packages: [{ ...appJson, primaryPackagePurpose: 'WIDGET' }, libJson] }).components;
            expect(app.primaryPurpose).to.be.undefined;
            expect(app.extras).to.deep.equal({ sourceInfo: 'built from git', primaryPackagePurpose: 'WIDGET' });
        });

        it('should reject a value that is not an object', () => {
            expect(() => decodeBomJson([])).to.throw(BomDecodeError, 'document must be a JSON object');
        });

        it('should reject a package without SPDXID', () => {
            const json = { ...sampleJson(), packages: [{ name: 'nameless' }] };
            expect(() => decodeBomJson(json)).to.throw(BomDecodeError, 'packages[0] has no SPDXID');
        });

        it('should reject a malformed creator', () => {
            const json = sampleJson();
            json.creationInfo.creators = ['syft'];
            expect(() => decodeBomJson(json)).to.throw(BomDecodeError, 'creators[0]');
        });

        it('should reject an incomplete relationship', () => {
            const json = { ...sampleJson(), relationships: [{ spdxElementId: 'SPDXRef-app', relationshipType: 'DEPENDS_ON' }] };
            expect(() => decodeBomJson(json)).to.throw(BomDecodeError, 'relationships[0] needs');
        });
    });

    describe('encodeBomJson', () => {
        it('should encode a decoded package back to the same JSON', () => {
            const encoded = encodeBomJson(decodeBomJson(sampleJson()));
            const packages = encoded.packages;
            expect(Array.isArray(packages)).to.be.true;
            if (Array.isArray(packages)) {
                expect(packages[0]).to.deep.equal(sampleJson().packages[0]);
            }
        });

        it('should write relationships instead of documentDescribes', () => {
            const encoded = encodeBomJson(decodeBomJson(sampleJson()));
            expect(encoded.documentDescribes).to.be.undefined;
            expect(encoded.relationships).to.deep.equal([
                { spdxElementId: 'SPDXRef-app', relatedSpdxElement: 'SPDXRef-lib', relationshipType: 'DEPENDS_ON' },
                { spdxElementId: 'SPDXRef-DOCUMENT', relatedSpdxElement: 'SPDXRef-app', relationshipType: 'DESCRIBES' },
            ]);
        });

        it('should encode creators and keep document extras', () => {
            const encoded = encodeBomJson(decodeBomJson(sampleJson()));
            expect(encoded.creationInfo).to.deep.equal(sampleJson().creationInfo);
            expect(encoded.snippets).to.deep.equal([]);
            expect(encoded.hasExtractedLicensingInfos).to.be.undefined;
        });
    });

    describe('creators and suppliers', () => {
        it('should parse a creator line', () => {
            expect(parseCreator('Person: Jane Doe (jane@example.com)')).to.deep.equal({ type: 'Person', name: 'Jane Doe (jane@example.com)' });
        });

        it('should reject unknown creator types and empty names', () => {
            expect(parseCreator('Robot: r2')).to.be.null;
            expect(parseCreator('Tool:')).to.be.null;
        });

        it('should parse NOASSERTION as a supplier', () => {
            expect(parseSupplier('NOASSERTION')).to.deep.equal({ type: 'NOASSERTION', name: 'NOASSERTION' });
        });

        it('should not accept a tool as a supplier', () => {
            expect(parseSupplier('Tool: syft-1.0')).to.be.null;
        });
    });
});
