import * as semver from 'semver';
import { BomDocument } from '../bom/bom_types';
import { DEFAULT_LICENSE_LIST_VERSION } from '../config';
import { VersionParseFailure } from '../errors';

const PARTIAL_VERSION = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?((?:-|\+)[0-9A-Za-z.+-]+)?$/;

/**
 * Parses a license list version. Two-part versions such as `3.19` are read as `3.19.0`.
 * @throws VersionParseFailure when the value is not a semantic version.
 */
export function parseLicenseListVersion(version: string): semver.SemVer {
    const match = PARTIAL_VERSION.exec(version.trim());
    const parsed = match
        ? semver.parse(`${match[1]}.${match[2] ?? '0'}.${match[3] ?? '0'}${match[4] ?? ''}`)
        : null;
    if (!parsed) {
        throw new VersionParseFailure(version);
    }
    return parsed;
}

/**
 * Picks the license list version for a merged document: the baseline when no
 * input declares one, the single declared value verbatim, or the lowest of
 * several declared values.
 * @throws VersionParseFailure if any of several distinct values cannot be parsed.
 */
export function reconcileLicenseListVersion(inputs: BomDocument[]): string {
    const versions = Array.from(new Set(
        inputs
            .map(doc => doc.creationInfo?.licenseListVersion?.trim() ?? '')
            .filter(v => v.length > 0)
    ));

    if (versions.length === 0) return DEFAULT_LICENSE_LIST_VERSION;
    if (versions.length === 1) return versions[0];

    const parsed = versions.map(v => ({ original: v, version: parseLicenseListVersion(v) }));
    parsed.sort((a, b) => semver.compare(a.version, b.version));
    return parsed[0].original;
}
