import { expect } from 'chai';
import { describe, it } from 'mocha';
import { ExternalRef } from '../src/bom/bom_types';
import { appendPolicy, missingPolicy, overwritePolicy, policyFor } from '../src/edit/policy';

const purl = (locator: string): ExternalRef => ({ category: 'PACKAGE-MANAGER', type: 'purl', locator });
const cpe = (locator: string): ExternalRef => ({ category: 'SECURITY', type: 'cpe23Type', locator });

describe('Edit policies', () => {
    it('policyFor should map every policy name to its strategy', () => {
        expect(policyFor('missing')).to.equal(missingPolicy);
        expect(policyFor('append')).to.equal(appendPolicy);
        expect(policyFor('overwrite')).to.equal(overwritePolicy);
    });

    describe('missing', () => {
        it('should keep a non-empty scalar and fill a blank one', () => {
            expect(missingPolicy.scalar('Existing', 'widget')).to.equal('Existing');
            expect(missingPolicy.scalar('', 'widget')).to.equal('widget');
            expect(missingPolicy.scalar<string>(undefined, 'widget')).to.equal('widget');
        });

        it('should fill only absent or empty lists', () => {
            expect(missingPolicy.list(['a'], ['b'])).to.deep.equal(['a']);
            expect(missingPolicy.list([], ['b'])).to.deep.equal(['b']);
            expect(missingPolicy.list<string>(undefined, ['b'])).to.deep.equal(['b']);
        });

        it('should be idempotent', () => {
            const once = missingPolicy.list<string>(undefined, ['x', 'y']);
            const twice = missingPolicy.list(once, ['x', 'y']);
            expect(twice).to.deep.equal(once);
            expect(missingPolicy.scalar(missingPolicy.scalar('', 'v'), 'v')).to.equal('v');
        });

        it('should add an external reference only when none of that kind exists', () => {
            expect(missingPolicy.externalRef([cpe('cpe:a')], purl('pkg:npm/a@1'))).to.deep.equal([cpe('cpe:a'), purl('pkg:npm/a@1')]);
            expect(missingPolicy.externalRef([purl('pkg:npm/old@1')], purl('pkg:npm/a@1'))).to.deep.equal([purl('pkg:npm/old@1')]);
        });
    });

    describe('append', () => {
        it('should concatenate lists, keeping every existing entry', () => {
            const before = ['a', 'b'];
            const after = appendPolicy.list(before, ['b', 'c']);
            expect(after).to.deep.equal(['a', 'b', 'b', 'c']);
            expect(after).to.include.members(before);
            expect(before).to.deep.equal(['a', 'b']);
        });

        it('should replace scalars', () => {
            expect(appendPolicy.scalar('old', 'new')).to.equal('new');
        });

        it('keeps duplicate references of the same kind (documented quirk)', () => {
            const refs = appendPolicy.externalRef([purl('pkg:npm/a@1')], purl('pkg:npm/a@2'));
            expect(refs.filter(r => r.type === 'purl')).to.have.lengthOf(2);
        });
    });

    describe('overwrite', () => {
        it('should replace scalars and lists', () => {
            expect(overwritePolicy.scalar('old', 'new')).to.equal('new');
            expect(overwritePolicy.list(['a', 'b'], ['c'])).to.deep.equal(['c']);
        });

        it('should leave exactly one reference of the kind and keep other kinds', () => {
            const refs = overwritePolicy.externalRef(
                [purl('pkg:npm/a@1'), cpe('cpe:a'), purl('pkg:npm/a@2')],
                purl('pkg:npm/a@3'),
            );
            expect(refs).to.deep.equal([cpe('cpe:a'), purl('pkg:npm/a@3')]);
        });
    });
});
