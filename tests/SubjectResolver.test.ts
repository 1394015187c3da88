import { expect } from 'chai';
import { describe, it } from 'mocha';
import { resolveSubject } from '../src/edit/SubjectResolver';
import { describes, makeAppDocument, makeComponent, makeDocument } from './fixtures';

describe('resolveSubject', () => {
    it('should return the document itself for the document subject', () => {
        const doc = makeAppDocument();
        const target = resolveSubject(doc, { subject: 'document' });
        expect(target.kind).to.equal('document');
        expect(target.document).to.equal(doc);
    });

    it('should find the single package the document describes', () => {
        const doc = makeAppDocument();
        const target = resolveSubject(doc, { subject: 'primary-component' });
        expect(target.kind).to.equal('component');
        if (target.kind === 'component') {
            expect(target.component).to.equal(doc.components[0]);
        }
    });

    it('should count repeated DESCRIBES of the same package once', () => {
        const doc = makeAppDocument();
        doc.relationships.push(describes('SPDXRef-app'));
        expect(resolveSubject(doc, { subject: 'primary-component' }).kind).to.equal('component');
    });

    it('should ignore DESCRIBES relationships that do not start at the document', () => {
        const doc = makeAppDocument();
        doc.relationships.push(describes('SPDXRef-lib', 'SPDXRef-app'));
        expect(resolveSubject(doc, { subject: 'primary-component' }).kind).to.equal('component');
    });

    it('should report not-found when nothing is described', () => {
        const doc = makeDocument({ components: [makeComponent('SPDXRef-app', 'app')] });
        const target = resolveSubject(doc, { subject: 'primary-component' });
        expect(target).to.deep.equal({ kind: 'not-found', document: doc, reason: 'document has no DESCRIBES relationship' });
    });

    it('should report not-found when several packages are described', () => {
        const doc = makeAppDocument();
        doc.relationships.push(describes('SPDXRef-lib'));
        const target = resolveSubject(doc, { subject: 'primary-component' });
        expect(target.kind).to.equal('not-found');
        if (target.kind === 'not-found') {
            expect(target.reason).to.equal('document describes 2 elements: SPDXRef-app, SPDXRef-lib');
        }
    });

    it('should report not-found when the described element is not a package', () => {
        const doc = makeDocument({ relationships: [describes('SPDXRef-File-readme')] });
        const target = resolveSubject(doc, { subject: 'primary-component' });
        expect(target.kind).to.equal('not-found');
        if (target.kind === 'not-found') {
            expect(target.reason).to.equal('described element SPDXRef-File-readme is not a package');
        }
    });

    it('should find a package by name and version', () => {
        const doc = makeAppDocument();
        const target = resolveSubject(doc, { subject: 'component-name-version', name: 'left-pad', version: '1.3.0' });
        expect(target.kind).to.equal('component');
        if (target.kind === 'component') {
            expect(target.component.id).to.equal('SPDXRef-lib');
        }
    });

    it('should match any version when none is given', () => {
        const doc = makeAppDocument();
        const target = resolveSubject(doc, { subject: 'component-name-version', name: 'left-pad' });
        expect(target.kind).to.equal('component');
    });

    it('should report not-found for a version mismatch', () => {
        const doc = makeAppDocument();
        const target = resolveSubject(doc, { subject: 'component-name-version', name: 'left-pad', version: '2.0.0' });
        expect(target.kind).to.equal('not-found');
        if (target.kind === 'not-found') {
            expect(target.reason).to.equal('no package named left-pad@2.0.0');
        }
    });

    it('should report not-found without a name to search for', () => {
        const target = resolveSubject(makeAppDocument(), { subject: 'component-name-version' });
        expect(target.kind).to.equal('not-found');
        if (target.kind === 'not-found') {
            expect(target.reason).to.equal('no component name to search for');
        }
    });
});
