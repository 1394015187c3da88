// Closed vocabularies shared by the edit and merge engines.

export const PRIMARY_PURPOSES = [
    'APPLICATION',
    'FRAMEWORK',
    'LIBRARY',
    'CONTAINER',
    'OPERATING-SYSTEM',
    'DEVICE',
    'FIRMWARE',
    'SOURCE',
    'ARCHIVE',
    'FILE',
    'INSTALL',
    'OTHER',
] as const;

export type PrimaryPurpose = typeof PRIMARY_PURPOSES[number];

/**
 * Case-insensitive lookup of a primary purpose. Accepts `operating_system`
 * as a spelling of `OPERATING-SYSTEM`.
 * @returns the canonical purpose, or undefined when the value is not in the vocabulary.
 */
export function lookupPrimaryPurpose(value: string): PrimaryPurpose | undefined {
    const normalized = value.trim().toUpperCase().replace(/_/g, '-');
    return PRIMARY_PURPOSES.find(p => p === normalized);
}

export function isPrimaryPurpose(value: string): value is PrimaryPurpose {
    return PRIMARY_PURPOSES.some(p => p === value);
}

// SPDX checksum algorithms keyed by their hyphen-free upper-case spelling
const HASH_ALGORITHMS: Record<string, string> = {
    SHA1: 'SHA1',
    SHA224: 'SHA224',
    SHA256: 'SHA256',
    SHA384: 'SHA384',
    SHA512: 'SHA512',
    SHA3256: 'SHA3-256',
    SHA3384: 'SHA3-384',
    SHA3512: 'SHA3-512',
    BLAKE2B256: 'BLAKE2b-256',
    BLAKE2B384: 'BLAKE2b-384',
    BLAKE2B512: 'BLAKE2b-512',
    BLAKE3: 'BLAKE3',
    MD2: 'MD2',
    MD4: 'MD4',
    MD5: 'MD5',
    MD6: 'MD6',
    ADLER32: 'ADLER32',
};

/**
 * Maps `SHA-256`, `sha256` or `SHA256` to the SPDX algorithm name `SHA256`.
 */
export function lookupHashAlgorithm(value: string): string | undefined {
    const key = value.trim().toUpperCase().replace(/[-_]/g, '');
    return HASH_ALGORITHMS[key];
}

export const REF_CATEGORY_PACKAGE_MANAGER = 'PACKAGE-MANAGER';
export const REF_CATEGORY_SECURITY = 'SECURITY';
export const REF_TYPE_PURL = 'purl';
export const REF_TYPE_CPE23 = 'cpe23Type';

export interface ExternalRefKind {
    category: string;
    type: string;
}

export const PURL_REF_KIND: ExternalRefKind = { category: REF_CATEGORY_PACKAGE_MANAGER, type: REF_TYPE_PURL };
export const CPE_REF_KIND: ExternalRefKind = { category: REF_CATEGORY_SECURITY, type: REF_TYPE_CPE23 };
