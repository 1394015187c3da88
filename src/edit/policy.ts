import { ExternalRef } from '../bom/bom_types';
import { EditPolicy } from './editTypes';

/**
 * How a configured value is reconciled with what the document already holds.
 * Field handlers delegate every missing/append/overwrite decision here.
 */
export interface PolicyStrategy {
    readonly name: EditPolicy;
    /** Reconciles a single value. Blank strings count as missing. */
    scalar<T>(current: T | undefined, next: T): T;
    /** Reconciles a list. Absent and empty lists count as missing. */
    list<T>(current: T[] | undefined, next: T[]): T[];
    /**
     * Reconciles an external reference whose kind (category + type) should
     * normally appear once. `append` adds even when one of the kind exists.
     */
    externalRef(current: ExternalRef[] | undefined, next: ExternalRef): ExternalRef[];
}

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || value === '';
}

function isSameKind(a: ExternalRef, b: ExternalRef): boolean {
    return a.type === b.type && a.category === b.category;
}

export const missingPolicy: PolicyStrategy = {
    name: 'missing',
    scalar: (current, next) => (current === undefined || isBlank(current) ? next : current),
    list: (current, next) => (current && current.length > 0 ? current : [...next]),
    externalRef: (current, next) => {
        const refs = current ?? [];
        return refs.some(ref => isSameKind(ref, next)) ? refs : [...refs, next];
    },
};

export const appendPolicy: PolicyStrategy = {
    name: 'append',
    // a single value has nothing to append to
    scalar: (_current, next) => next,
    list: (current, next) => [...(current ?? []), ...next],
    // Duplicates of the same kind are kept on purpose; only overwrite enforces one per kind.
    externalRef: (current, next) => [...(current ?? []), next],
};

export const overwritePolicy: PolicyStrategy = {
    name: 'overwrite',
    scalar: (_current, next) => next,
    list: (_current, next) => [...next],
    externalRef: (current, next) => [...(current ?? []).filter(ref => !isSameKind(ref, next)), next],
};

export function policyFor(policy: EditPolicy): PolicyStrategy {
    switch (policy) {
        case 'missing':
            return missingPolicy;
        case 'append':
            return appendPolicy;
        case 'overwrite':
            return overwritePolicy;
    }
}
