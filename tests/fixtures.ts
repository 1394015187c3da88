import { BomComponent, BomDocument, BomRelationship } from '../src/bom/bom_types';

export const DOC_ID = 'SPDXRef-DOCUMENT';

export function makeComponent(id: string, name: string, fields: Partial<BomComponent> = {}): BomComponent {
    return { id, name, extras: {}, ...fields };
}

export function describes(refB: string, refA: string = DOC_ID): BomRelationship {
    return { refA, refB, type: 'DESCRIBES' };
}

export function makeDocument(fields: Partial<BomDocument> = {}): BomDocument {
    return {
        spdxVersion: 'SPDX-2.3',
        dataLicense: 'CC0-1.0',
        id: DOC_ID,
        name: 'sample',
        namespace: 'https://example.com/sample',
        creationInfo: { created: '2020-01-01T00:00:00Z', creators: [{ type: 'Tool', name: 'generator-1.0' }] },
        components: [],
        files: [],
        relationships: [],
        otherLicenses: [],
        externalDocumentRefs: [],
        extras: {},
        ...fields,
    };
}

/** A document whose single described package is `SPDXRef-app` named "Existing". */
export function makeAppDocument(): BomDocument {
    return makeDocument({
        components: [
            makeComponent('SPDXRef-app', 'Existing', { version: '1.0.0' }),
            makeComponent('SPDXRef-lib', 'left-pad', { version: '1.3.0' }),
        ],
        relationships: [
            describes('SPDXRef-app'),
            { refA: 'SPDXRef-app', refB: 'SPDXRef-lib', type: 'DEPENDS_ON' },
        ],
    });
}

/** Resolves with whatever the promise rejects with, or undefined when it fulfils. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    return undefined;
}
