import { PrimaryPurpose } from './vocabulary';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

export const NOASSERTION = 'NOASSERTION';

export const RELATIONSHIP_DESCRIBES = 'DESCRIBES';
export const RELATIONSHIP_CONTAINS = 'CONTAINS';

export type SupplierType = 'Organization' | 'Person' | typeof NOASSERTION;
export type CreatorType = 'Person' | 'Organization' | 'Tool';

export interface Supplier {
    type: SupplierType;
    /** Display string, e.g. `Acme Corp (https://acme.example)`. Equals NOASSERTION for the sentinel. */
    name: string;
}

export interface Creator {
    type: CreatorType;
    name: string;
}

export interface ExternalRef {
    /** e.g. `PACKAGE-MANAGER`, `SECURITY` */
    category: string;
    /** e.g. `purl`, `cpe23Type` */
    type: string;
    locator: string;
    comment?: string;
}

export interface Checksum {
    algorithm: string;
    value: string;
}

export interface CreationInfo {
    created: string;
    creators?: Creator[];
    comment?: string;
    licenseListVersion?: string;
}

/**
 * A single package entry. List-valued fields are optional so that an absent
 * list can be told apart from an empty one when the document is written back.
 */
export interface BomComponent {
    id: string;
    name: string;
    version?: string;
    supplier?: Supplier;
    externalRefs?: ExternalRef[];
    licenseConcluded?: string;
    licenseDeclared?: string;
    copyrightText?: string;
    description?: string;
    downloadLocation?: string;
    checksums?: Checksum[];
    primaryPurpose?: PrimaryPurpose;
    filesAnalyzed?: boolean;
    /** Package keys this model does not interpret, carried through untouched. */
    extras: JsonObject;
}

export interface BomRelationship {
    refA: string;
    refB: string;
    type: string;
    comment?: string;
}

export interface BomDocument {
    spdxVersion: string;
    dataLicense: string;
    id: string;
    name: string;
    namespace: string;
    creationInfo?: CreationInfo;
    components: BomComponent[];
    files: JsonObject[];
    relationships: BomRelationship[];
    otherLicenses: JsonObject[];
    externalDocumentRefs: JsonObject[];
    comment?: string;
    /** Top-level keys this model does not interpret, carried through untouched. */
    extras: JsonObject;
}

export function isDescribes(rel: BomRelationship): boolean {
    return rel.type === RELATIONSHIP_DESCRIBES;
}
