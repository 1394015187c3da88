import { BomComponent, Checksum, ExternalRef, NOASSERTION, Supplier } from '../bom/bom_types';
import { CPE_REF_KIND, PURL_REF_KIND, lookupHashAlgorithm, lookupPrimaryPurpose } from '../bom/vocabulary';
import { WarnFn, warn } from '../utils';
import { AppMetadata, Contact } from './mergeTypes';

export function formatContact(contact: Contact): string {
    return `${contact.name} (${contact.email})`;
}

export function hasContact(contact: Contact): boolean {
    return contact.name !== '' || contact.email !== '';
}

function rootSupplier(app: AppMetadata): Supplier {
    return hasContact(app.supplier)
        ? { type: 'Organization', name: formatContact(app.supplier) }
        : { type: NOASSERTION, name: NOASSERTION };
}

function rootChecksums(app: AppMetadata, warnFn: WarnFn): Checksum[] {
    const checksums: Checksum[] = [];
    for (const c of app.checksums) {
        if (c.value.length === 0) continue;
        const algorithm = lookupHashAlgorithm(c.algorithm);
        if (!algorithm) {
            warnFn(`Skipping root checksum with unknown algorithm "${c.algorithm}"`);
            continue;
        }
        checksums.push({ algorithm, value: c.value });
    }
    return checksums;
}

/**
 * Builds the package that the merged document describes and that contains
 * the described packages of every input.
 */
export function buildRootComponent(app: AppMetadata, id: string, warnFn: WarnFn = warn): BomComponent {
    const root: BomComponent = {
        id,
        name: app.name,
        version: app.version,
        supplier: rootSupplier(app),
        downloadLocation: NOASSERTION,
        filesAnalyzed: false,
        copyrightText: app.copyright !== '' ? app.copyright : NOASSERTION,
        description: app.description,
        extras: {},
    };

    if (app.checksums.length > 0) {
        root.checksums = rootChecksums(app, warnFn);
    }

    const { id: licenseId, expression } = app.license;
    if (expression !== '' && licenseId === '') {
        // a bare expression is not asserted
        root.licenseConcluded = NOASSERTION;
        root.licenseDeclared = NOASSERTION;
    } else if (expression !== '' || licenseId !== '') {
        const license = expression !== '' ? expression : licenseId;
        root.licenseConcluded = license;
        root.licenseDeclared = license;
    }

    if (app.primaryPurpose !== '') {
        const purpose = lookupPrimaryPurpose(app.primaryPurpose);
        if (purpose) {
            root.primaryPurpose = purpose;
        } else {
            warnFn(`Ignoring unknown primary purpose "${app.primaryPurpose}" for the root package`);
        }
    }

    const refs: ExternalRef[] = [];
    if (app.purl !== '') refs.push({ ...PURL_REF_KIND, locator: app.purl });
    if (app.cpe !== '') refs.push({ ...CPE_REF_KIND, locator: app.cpe });
    if (refs.length > 0) root.externalRefs = refs;

    return root;
}
