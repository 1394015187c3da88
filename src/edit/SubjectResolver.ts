import { BomDocument, isDescribes } from '../bom/bom_types';
import {
    EditTarget,
    SUBJECT_COMPONENT_NAME_VERSION,
    SUBJECT_DOCUMENT,
    SUBJECT_PRIMARY_COMPONENT,
    SearchSpec,
} from './editTypes';

/**
 * Locates the edit target. A component that cannot be found yields a
 * `not-found` target rather than an error: document-scoped edits still run.
 */
export function resolveSubject(document: BomDocument, search: SearchSpec): EditTarget {
    switch (search.subject) {
        case SUBJECT_DOCUMENT:
            return { kind: 'document', document };
        case SUBJECT_PRIMARY_COMPONENT:
            return resolvePrimaryComponent(document);
        case SUBJECT_COMPONENT_NAME_VERSION:
            return resolveByNameVersion(document, search.name, search.version);
    }
}

function resolvePrimaryComponent(document: BomDocument): EditTarget {
    const described = Array.from(new Set(
        document.relationships
            .filter(rel => isDescribes(rel) && rel.refA === document.id)
            .map(rel => rel.refB)
    ));

    if (described.length === 0) {
        return { kind: 'not-found', document, reason: 'document has no DESCRIBES relationship' };
    }
    if (described.length > 1) {
        return { kind: 'not-found', document, reason: `document describes ${described.length} elements: ${described.join(', ')}` };
    }

    const component = document.components.find(c => c.id === described[0]);
    if (!component) {
        return { kind: 'not-found', document, reason: `described element ${described[0]} is not a package` };
    }
    return { kind: 'component', document, component };
}

function resolveByNameVersion(document: BomDocument, name?: string, version?: string): EditTarget {
    if (!name) {
        return { kind: 'not-found', document, reason: 'no component name to search for' };
    }
    const component = document.components.find(c =>
        c.name === name && (!version || c.version === version));
    if (!component) {
        const label = version ? `${name}@${version}` : name;
        return { kind: 'not-found', document, reason: `no package named ${label}` };
    }
    return { kind: 'component', document, component };
}
