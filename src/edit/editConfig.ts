import { ConfigError } from '../errors';
import { lookupHashAlgorithm } from '../bom/vocabulary';
import {
    EDIT_SUBJECTS,
    EditConfig,
    EditPolicy,
    HashSpec,
    NameValue,
    SUBJECT_COMPONENT_NAME_VERSION,
    SUBJECT_PRIMARY_COMPONENT,
} from './editTypes';

/** Raw option values as collected by the `edit` command. */
export interface EditCommandOptions {
    subject?: string;
    searchName?: string;
    searchVersion?: string;
    missing?: boolean;
    append?: boolean;
    name?: string;
    version?: string;
    supplier?: string;
    author?: string[];
    purl?: string;
    cpe?: string;
    license?: string[];
    hash?: string[];
    tool?: string[];
    copyright?: string;
    lifecycle?: string[];
    description?: string;
    repository?: string;
    type?: string;
}

const NAME_VALUE_PATTERN = /^(.*?)\s*\(([^()]*)\)\s*$/;

/**
 * Parses `Jane Doe (jane@example.com)` into its name and value. A string
 * without a parenthesised part becomes a name with an empty value.
 */
export function parseNameValue(raw: string): NameValue {
    const match = NAME_VALUE_PATTERN.exec(raw.trim());
    if (!match) {
        return { name: raw.trim(), value: '' };
    }
    return { name: match[1].trim(), value: match[2].trim() };
}

/**
 * Parses `SHA256 (abc123)` or `SHA-256:abc123`.
 * @throws ConfigError when the algorithm is unknown.
 */
export function parseHash(raw: string): HashSpec {
    const colon = raw.indexOf(':');
    const parsed = !raw.includes('(') && colon > 0
        ? { name: raw.slice(0, colon).trim(), value: raw.slice(colon + 1).trim() }
        : parseNameValue(raw);
    if (!lookupHashAlgorithm(parsed.name)) {
        throw new ConfigError(`Unknown hash algorithm "${parsed.name}" in --hash ${raw}`);
    }
    return { algorithm: parsed.name, value: parsed.value };
}

function splitList(values: string[] | undefined): string[] | undefined {
    if (!values) return undefined;
    return values.flatMap(v => v.split(',')).map(v => v.trim()).filter(v => v.length > 0);
}

function resolvePolicy(options: EditCommandOptions): EditPolicy {
    if (options.missing && options.append) {
        throw new ConfigError('--missing and --append cannot be used together');
    }
    if (options.missing) return 'missing';
    if (options.append) return 'append';
    return 'overwrite';
}

/**
 * Validates edit options and turns them into an engine configuration.
 * The subject defaults to the document's primary component.
 * @throws ConfigError on contradictory or malformed options.
 */
export function buildEditConfig(options: EditCommandOptions): EditConfig {
    const subjectName = options.subject ?? SUBJECT_PRIMARY_COMPONENT;
    const subject = EDIT_SUBJECTS.find(s => s === subjectName);
    if (!subject) {
        throw new ConfigError(`Unknown subject "${subjectName}". Expected one of: ${EDIT_SUBJECTS.join(', ')}`);
    }
    if (subject === SUBJECT_COMPONENT_NAME_VERSION && !options.searchName) {
        throw new ConfigError(`--search-name is required with --subject ${SUBJECT_COMPONENT_NAME_VERSION}`);
    }

    const config: EditConfig = {
        search: { subject, name: options.searchName, version: options.searchVersion },
        policy: resolvePolicy(options),
        name: options.name,
        version: options.version,
        supplier: options.supplier !== undefined ? parseNameValue(options.supplier) : undefined,
        authors: options.author?.map(parseNameValue),
        purl: options.purl,
        cpe: options.cpe,
        licenses: options.license,
        hashes: options.hash?.map(parseHash),
        tools: options.tool?.map(parseNameValue),
        copyright: options.copyright,
        lifecycles: splitList(options.lifecycle),
        description: options.description,
        repository: options.repository,
        primaryPurpose: options.type,
    };
    return config;
}
