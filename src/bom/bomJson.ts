import {
    BomComponent,
    BomDocument,
    BomRelationship,
    Checksum,
    CreationInfo,
    Creator,
    CreatorType,
    ExternalRef,
    JsonObject,
    JsonValue,
    NOASSERTION,
    RELATIONSHIP_DESCRIBES,
    Supplier,
} from './bom_types';
import { isPrimaryPurpose } from './vocabulary';
import { isRecord } from '../utils';

/**
 * Raised when a parsed JSON value does not have the shape of an SPDX 2.x JSON document.
 */
export class BomDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BomDecodeError';
    }
}

const DOCUMENT_KEYS = new Set([
    'SPDXID', 'spdxVersion', 'dataLicense', 'name', 'documentNamespace', 'creationInfo', 'packages',
    'files', 'relationships', 'hasExtractedLicensingInfos', 'externalDocumentRefs', 'comment', 'documentDescribes',
]);

const PACKAGE_KEYS = new Set([
    'SPDXID', 'name', 'versionInfo', 'supplier', 'externalRefs', 'licenseConcluded', 'licenseDeclared',
    'copyrightText', 'description', 'downloadLocation', 'checksums', 'primaryPackagePurpose', 'filesAnalyzed',
]);

const CREATOR_TYPES: ReadonlyArray<CreatorType> = ['Person', 'Organization', 'Tool'];

/**
 * Narrows an arbitrary parsed value to a JSON value. Anything JSON.parse
 * cannot produce (undefined, functions) collapses to null.
 */
export function toJsonValue(value: unknown): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(toJsonValue);
    }
    if (isRecord(value)) {
        return toJsonObject(value);
    }
    return null;
}

function toJsonObject(value: Record<string, unknown>): JsonObject {
    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        out[key] = toJsonValue(entry);
    }
    return out;
}

function collectExtras(value: Record<string, unknown>, known: Set<string>): JsonObject {
    const extras: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        if (!known.has(key)) {
            extras[key] = toJsonValue(entry);
        }
    }
    return extras;
}

function optionalString(value: Record<string, unknown>, key: string, where: string): string | undefined {
    const raw = value[key];
    if (raw === undefined || raw === null) return undefined;
    if (typeof raw !== 'string') {
        throw new BomDecodeError(`${where}: "${key}" must be a string`);
    }
    return raw;
}

function optionalArray(value: Record<string, unknown>, key: string, where: string): unknown[] | undefined {
    const raw = value[key];
    if (raw === undefined || raw === null) return undefined;
    if (!Array.isArray(raw)) {
        throw new BomDecodeError(`${where}: "${key}" must be an array`);
    }
    return raw;
}

function objectList(value: Record<string, unknown>, key: string, where: string): JsonObject[] {
    const list = optionalArray(value, key, where) ?? [];
    return list.map((entry, index) => {
        if (!isRecord(entry)) {
            throw new BomDecodeError(`${where}: ${key}[${index}] must be an object`);
        }
        return toJsonObject(entry);
    });
}

/**
 * Splits `Type: display name` into its parts.
 */
export function parseCreator(raw: string): Creator | null {
    const separator = raw.indexOf(':');
    if (separator <= 0) return null;
    const type = raw.slice(0, separator).trim();
    const name = raw.slice(separator + 1).trim();
    const creatorType = CREATOR_TYPES.find(t => t === type);
    if (!creatorType || name.length === 0) return null;
    return { type: creatorType, name };
}

export function formatCreator(creator: Creator): string {
    return `${creator.type}: ${creator.name}`;
}

export function parseSupplier(raw: string): Supplier | null {
    if (raw.trim() === NOASSERTION) {
        return { type: NOASSERTION, name: NOASSERTION };
    }
    const parsed = parseCreator(raw);
    if (!parsed || parsed.type === 'Tool') return null;
    return { type: parsed.type, name: parsed.name };
}

export function formatSupplier(supplier: Supplier): string {
    return supplier.type === NOASSERTION ? NOASSERTION : `${supplier.type}: ${supplier.name}`;
}

function decodeCreationInfo(raw: unknown): CreationInfo {
    if (!isRecord(raw)) {
        throw new BomDecodeError('creationInfo must be an object');
    }
    const info: CreationInfo = { created: optionalString(raw, 'created', 'creationInfo') ?? '' };

    const creators = optionalArray(raw, 'creators', 'creationInfo');
    if (creators) {
        info.creators = creators.map((entry, index) => {
            const creator = typeof entry === 'string' ? parseCreator(entry) : null;
            if (!creator) {
                throw new BomDecodeError(`creationInfo: creators[${index}] is not of the form "Person|Organization|Tool: name"`);
            }
            return creator;
        });
    }

    const comment = optionalString(raw, 'comment', 'creationInfo');
    if (comment !== undefined) info.comment = comment;
    const licenseListVersion = optionalString(raw, 'licenseListVersion', 'creationInfo');
    if (licenseListVersion !== undefined) info.licenseListVersion = licenseListVersion;
    return info;
}

function decodeExternalRef(raw: unknown, where: string): ExternalRef {
    if (!isRecord(raw)) {
        throw new BomDecodeError(`${where} must be an object`);
    }
    const ref: ExternalRef = {
        category: optionalString(raw, 'referenceCategory', where) ?? '',
        type: optionalString(raw, 'referenceType', where) ?? '',
        locator: optionalString(raw, 'referenceLocator', where) ?? '',
    };
    const comment = optionalString(raw, 'comment', where);
    if (comment !== undefined) ref.comment = comment;
    return ref;
}

function decodeChecksum(raw: unknown, where: string): Checksum {
    if (!isRecord(raw)) {
        throw new BomDecodeError(`${where} must be an object`);
    }
    return {
        algorithm: optionalString(raw, 'algorithm', where) ?? '',
        value: optionalString(raw, 'checksumValue', where) ?? '',
    };
}

function decodeComponent(raw: unknown, index: number): BomComponent {
    const where = `packages[${index}]`;
    if (!isRecord(raw)) {
        throw new BomDecodeError(`${where} must be an object`);
    }
    const id = optionalString(raw, 'SPDXID', where);
    if (!id) {
        throw new BomDecodeError(`${where} has no SPDXID`);
    }

    const component: BomComponent = {
        id,
        name: optionalString(raw, 'name', where) ?? '',
        extras: collectExtras(raw, PACKAGE_KEYS),
    };

    const version = optionalString(raw, 'versionInfo', where);
    if (version !== undefined) component.version = version;

    const supplier = optionalString(raw, 'supplier', where);
    if (supplier !== undefined) {
        const parsed = parseSupplier(supplier);
        if (!parsed) {
            throw new BomDecodeError(`${where}: supplier "${supplier}" is not of the form "Organization|Person: name" or NOASSERTION`);
        }
        component.supplier = parsed;
    }

    const refs = optionalArray(raw, 'externalRefs', where);
    if (refs) component.externalRefs = refs.map((ref, i) => decodeExternalRef(ref, `${where}.externalRefs[${i}]`));

    const checksums = optionalArray(raw, 'checksums', where);
    if (checksums) component.checksums = checksums.map((c, i) => decodeChecksum(c, `${where}.checksums[${i}]`));

    const licenseConcluded = optionalString(raw, 'licenseConcluded', where);
    if (licenseConcluded !== undefined) component.licenseConcluded = licenseConcluded;
    const licenseDeclared = optionalString(raw, 'licenseDeclared', where);
    if (licenseDeclared !== undefined) component.licenseDeclared = licenseDeclared;
    const copyrightText = optionalString(raw, 'copyrightText', where);
    if (copyrightText !== undefined) component.copyrightText = copyrightText;
    const description = optionalString(raw, 'description', where);
    if (description !== undefined) component.description = description;
    const downloadLocation = optionalString(raw, 'downloadLocation', where);
    if (downloadLocation !== undefined) component.downloadLocation = downloadLocation;

    const purpose = optionalString(raw, 'primaryPackagePurpose', where);
    if (purpose !== undefined) {
        if (isPrimaryPurpose(purpose)) {
            component.primaryPurpose = purpose;
        } else {
            // keep values outside the vocabulary verbatim rather than dropping them
            component.extras.primaryPackagePurpose = purpose;
        }
    }

    const filesAnalyzed = raw.filesAnalyzed;
    if (typeof filesAnalyzed === 'boolean') {
        component.filesAnalyzed = filesAnalyzed;
    } else if (filesAnalyzed !== undefined) {
        throw new BomDecodeError(`${where}: "filesAnalyzed" must be a boolean`);
    }

    return component;
}

function decodeRelationship(raw: unknown, index: number): BomRelationship {
    const where = `relationships[${index}]`;
    if (!isRecord(raw)) {
        throw new BomDecodeError(`${where} must be an object`);
    }
    const refA = optionalString(raw, 'spdxElementId', where);
    const refB = optionalString(raw, 'relatedSpdxElement', where);
    const type = optionalString(raw, 'relationshipType', where);
    if (!refA || !refB || !type) {
        throw new BomDecodeError(`${where} needs spdxElementId, relatedSpdxElement and relationshipType`);
    }
    const rel: BomRelationship = { refA, refB, type };
    const comment = optionalString(raw, 'comment', where);
    if (comment !== undefined) rel.comment = comment;
    return rel;
}

/**
 * Decodes a parsed SPDX 2.x JSON document into the in-memory model.
 * Legacy `documentDescribes` entries become DESCRIBES relationships from the
 * document unless an equivalent relationship is already listed.
 * @throws BomDecodeError when the value does not have the expected shape.
 */
export function decodeBomJson(value: unknown): BomDocument {
    if (!isRecord(value)) {
        throw new BomDecodeError('document must be a JSON object');
    }
    const where = 'document';
    const id = optionalString(value, 'SPDXID', where) ?? 'SPDXRef-DOCUMENT';

    const document: BomDocument = {
        spdxVersion: optionalString(value, 'spdxVersion', where) ?? '',
        dataLicense: optionalString(value, 'dataLicense', where) ?? '',
        id,
        name: optionalString(value, 'name', where) ?? '',
        namespace: optionalString(value, 'documentNamespace', where) ?? '',
        components: (optionalArray(value, 'packages', where) ?? []).map(decodeComponent),
        files: objectList(value, 'files', where),
        relationships: (optionalArray(value, 'relationships', where) ?? []).map(decodeRelationship),
        otherLicenses: objectList(value, 'hasExtractedLicensingInfos', where),
        externalDocumentRefs: objectList(value, 'externalDocumentRefs', where),
        extras: collectExtras(value, DOCUMENT_KEYS),
    };

    if (value.creationInfo !== undefined && value.creationInfo !== null) {
        document.creationInfo = decodeCreationInfo(value.creationInfo);
    }
    const comment = optionalString(value, 'comment', where);
    if (comment !== undefined) document.comment = comment;

    const describes = optionalArray(value, 'documentDescribes', where) ?? [];
    for (const target of describes) {
        if (typeof target !== 'string') {
            throw new BomDecodeError('document: documentDescribes entries must be strings');
        }
        const listed = document.relationships.some(r =>
            r.type === RELATIONSHIP_DESCRIBES && r.refA === id && r.refB === target);
        if (!listed) {
            document.relationships.push({ refA: id, refB: target, type: RELATIONSHIP_DESCRIBES });
        }
    }

    return document;
}

function encodeComponent(component: BomComponent): JsonObject {
    const out: JsonObject = { SPDXID: component.id, name: component.name };
    if (component.version !== undefined) out.versionInfo = component.version;
    if (component.supplier) out.supplier = formatSupplier(component.supplier);
    if (component.downloadLocation !== undefined) out.downloadLocation = component.downloadLocation;
    if (component.filesAnalyzed !== undefined) out.filesAnalyzed = component.filesAnalyzed;
    if (component.checksums) {
        out.checksums = component.checksums.map(c => ({ algorithm: c.algorithm, checksumValue: c.value }));
    }
    if (component.licenseConcluded !== undefined) out.licenseConcluded = component.licenseConcluded;
    if (component.licenseDeclared !== undefined) out.licenseDeclared = component.licenseDeclared;
    if (component.copyrightText !== undefined) out.copyrightText = component.copyrightText;
    if (component.description !== undefined) out.description = component.description;
    if (component.primaryPurpose !== undefined) out.primaryPackagePurpose = component.primaryPurpose;
    if (component.externalRefs) {
        out.externalRefs = component.externalRefs.map(ref => {
            const encoded: JsonObject = {
                referenceCategory: ref.category,
                referenceType: ref.type,
                referenceLocator: ref.locator,
            };
            if (ref.comment !== undefined) encoded.comment = ref.comment;
            return encoded;
        });
    }
    return { ...component.extras, ...out };
}

function encodeCreationInfo(info: CreationInfo): JsonObject {
    const out: JsonObject = { created: info.created };
    if (info.creators) out.creators = info.creators.map(formatCreator);
    if (info.comment !== undefined) out.comment = info.comment;
    if (info.licenseListVersion !== undefined) out.licenseListVersion = info.licenseListVersion;
    return out;
}

/**
 * Encodes the model as an SPDX 2.3 JSON object.
 */
export function encodeBomJson(document: BomDocument): JsonObject {
    const out: JsonObject = {
        SPDXID: document.id,
        spdxVersion: document.spdxVersion,
    };
    if (document.creationInfo) out.creationInfo = encodeCreationInfo(document.creationInfo);
    out.name = document.name;
    out.dataLicense = document.dataLicense;
    out.documentNamespace = document.namespace;
    if (document.comment !== undefined) out.comment = document.comment;
    if (document.externalDocumentRefs.length > 0) out.externalDocumentRefs = document.externalDocumentRefs;
    if (document.otherLicenses.length > 0) out.hasExtractedLicensingInfos = document.otherLicenses;
    out.packages = document.components.map(encodeComponent);
    if (document.files.length > 0) out.files = document.files;
    out.relationships = document.relationships.map(rel => {
        const encoded: JsonObject = {
            spdxElementId: rel.refA,
            relatedSpdxElement: rel.refB,
            relationshipType: rel.type,
        };
        if (rel.comment !== undefined) encoded.comment = rel.comment;
        return encoded;
    });
    return { ...document.extras, ...out };
}
