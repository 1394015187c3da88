import { BomComponent, BomDocument } from '../bom/bom_types';

export const SUBJECT_DOCUMENT = 'document';
export const SUBJECT_PRIMARY_COMPONENT = 'primary-component';
export const SUBJECT_COMPONENT_NAME_VERSION = 'component-name-version';

export type EditSubject =
    | typeof SUBJECT_DOCUMENT
    | typeof SUBJECT_PRIMARY_COMPONENT
    | typeof SUBJECT_COMPONENT_NAME_VERSION;

export const EDIT_SUBJECTS: ReadonlyArray<EditSubject> = [
    SUBJECT_DOCUMENT,
    SUBJECT_PRIMARY_COMPONENT,
    SUBJECT_COMPONENT_NAME_VERSION,
];

export type EditPolicy = 'missing' | 'append' | 'overwrite';

export interface SearchSpec {
    subject: EditSubject;
    name?: string;
    version?: string;
}

/** A display name paired with a contact, URL or version, e.g. `Jane Doe (jane@example.com)`. */
export interface NameValue {
    name: string;
    value: string;
}

export interface HashSpec {
    algorithm: string;
    value: string;
}

/**
 * Requested edits. A field left undefined (or an empty list) is not configured
 * and its handler reports `no-configuration`.
 */
export interface EditConfig {
    search: SearchSpec;
    policy: EditPolicy;
    name?: string;
    version?: string;
    supplier?: NameValue;
    authors?: NameValue[];
    purl?: string;
    cpe?: string;
    licenses?: string[];
    hashes?: HashSpec[];
    tools?: NameValue[];
    copyright?: string;
    lifecycles?: string[];
    description?: string;
    repository?: string;
    primaryPurpose?: string;
}

export type FieldName =
    | 'name'
    | 'version'
    | 'supplier'
    | 'authors'
    | 'purl'
    | 'cpe'
    | 'licenses'
    | 'hashes'
    | 'tools'
    | 'copyright'
    | 'lifecycle-stages'
    | 'description'
    | 'repository'
    | 'primary-purpose'
    | 'timestamp';

export type FieldOutcome = 'applied' | 'no-configuration' | 'not-supported' | 'invalid-input' | 'not-found';

export interface FieldReport {
    field: FieldName;
    outcome: FieldOutcome;
}

export type DocumentTarget = { kind: 'document'; document: BomDocument };
export type ComponentTarget = { kind: 'component'; document: BomDocument; component: BomComponent };
export type UnresolvedTarget = { kind: 'not-found'; document: BomDocument; reason: string };

/** What an edit run operates on, as decided by the subject resolver. */
export type EditTarget = DocumentTarget | ComponentTarget | UnresolvedTarget;
