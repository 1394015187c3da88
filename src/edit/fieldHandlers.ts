import { BomDocument, Checksum, CreationInfo, Creator, ExternalRef } from '../bom/bom_types';
import { CPE_REF_KIND, ExternalRefKind, PURL_REF_KIND, lookupHashAlgorithm, lookupPrimaryPurpose } from '../bom/vocabulary';
import { ToolIdentity, toolCreatorName } from '../utils';
import { ComponentTarget, DocumentTarget, EditConfig, EditTarget, FieldName, FieldOutcome, NameValue } from './editTypes';
import { PolicyStrategy } from './policy';

/** Everything a handler needs besides the target itself. */
export interface FieldContext {
    config: EditConfig;
    policy: PolicyStrategy;
    tool: ToolIdentity;
    /** Current UTC time as stamped into creation info. */
    now: () => string;
}

/**
 * - `component`: only a resolved component.
 * - `document`: only when the subject is the document.
 * - `either`: writes to whichever subject was resolved.
 * - `always`: runs against the document whatever the subject, and is never policy-gated on configuration.
 */
export type FieldScope = 'component' | 'document' | 'either' | 'always';

type ResolvedTarget = DocumentTarget | ComponentTarget;

export abstract class FieldHandler {
    abstract readonly field: FieldName;
    protected abstract readonly scope: FieldScope;

    protected abstract isConfigured(config: EditConfig): boolean;
    protected abstract update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome;

    apply(target: EditTarget, ctx: FieldContext): FieldOutcome {
        if (this.scope === 'always') {
            return this.update({ kind: 'document', document: target.document }, ctx);
        }
        if (!this.isConfigured(ctx.config)) {
            return 'no-configuration';
        }
        if (this.scope === 'document') {
            return target.kind === 'document' ? this.update(target, ctx) : 'not-supported';
        }
        if (this.scope === 'component' && target.kind === 'document') {
            return 'not-supported';
        }
        if (target.kind === 'not-found') {
            return 'not-found';
        }
        return this.update(target, ctx);
    }
}

function hasText(value: string | undefined): value is string {
    return value !== undefined && value !== '';
}

function hasEntries<T>(value: T[] | undefined): value is T[] {
    return value !== undefined && value.length > 0;
}

function ensureCreationInfo(document: BomDocument): CreationInfo {
    if (!document.creationInfo) {
        document.creationInfo = { created: '' };
    }
    return document.creationInfo;
}

export function formatNameValue(entry: NameValue): string {
    return `${entry.name} (${entry.value})`;
}

/**
 * Combines configured licenses into one expression. Compound expressions are
 * parenthesised before being joined with AND.
 */
export function composeLicenseExpression(licenses: string[]): string {
    const parts = licenses.map(l => l.trim()).filter(l => l.length > 0);
    if (parts.length <= 1) return parts[0] ?? '';
    return parts.map(p => (/\s/.test(p) ? `(${p})` : p)).join(' AND ');
}

type ConfigTextKey = 'name' | 'version' | 'copyright' | 'repository';
type ComponentTextKey = 'name' | 'version' | 'copyrightText' | 'description' | 'downloadLocation' | 'licenseConcluded';

/** A string field on a component, e.g. name or download location. */
class ComponentTextHandler extends FieldHandler {
    protected readonly scope = 'component';

    constructor(
        readonly field: FieldName,
        private readonly configKey: ConfigTextKey,
        private readonly componentKey: ComponentTextKey,
    ) {
        super();
    }

    protected isConfigured(config: EditConfig): boolean {
        return hasText(config[this.configKey]);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const next = ctx.config[this.configKey];
        if (target.kind !== 'component' || next === undefined) return 'not-supported';
        const component = target.component;
        component[this.componentKey] = ctx.policy.scalar(component[this.componentKey], next);
        return 'applied';
    }
}

/** A string written to the document when it is the subject, otherwise to the component. */
class SubjectTextHandler extends FieldHandler {
    protected readonly scope = 'either';

    constructor(
        readonly field: FieldName,
        private readonly compose: (config: EditConfig) => string | undefined,
        private readonly documentKey: 'comment' | 'dataLicense',
        private readonly componentKey: ComponentTextKey,
    ) {
        super();
    }

    protected isConfigured(config: EditConfig): boolean {
        return hasText(this.compose(config));
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const next = this.compose(ctx.config);
        if (next === undefined) return 'no-configuration';
        if (target.kind === 'document') {
            target.document[this.documentKey] = ctx.policy.scalar(target.document[this.documentKey], next);
        } else {
            target.component[this.componentKey] = ctx.policy.scalar(target.component[this.componentKey], next);
        }
        return 'applied';
    }
}

class SupplierHandler extends FieldHandler {
    readonly field = 'supplier';
    protected readonly scope = 'component';

    protected isConfigured(config: EditConfig): boolean {
        return config.supplier !== undefined && (hasText(config.supplier.name) || hasText(config.supplier.value));
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const supplier = ctx.config.supplier;
        if (target.kind !== 'component' || !supplier) return 'not-supported';
        target.component.supplier = ctx.policy.scalar(target.component.supplier, {
            type: 'Organization',
            name: formatNameValue(supplier),
        });
        return 'applied';
    }
}

class AuthorsHandler extends FieldHandler {
    readonly field = 'authors';
    protected readonly scope = 'document';

    protected isConfigured(config: EditConfig): boolean {
        return hasEntries(config.authors);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const authors: Creator[] = (ctx.config.authors ?? []).map(a => ({ type: 'Person', name: formatNameValue(a) }));
        const info = ensureCreationInfo(target.document);
        info.creators = ctx.policy.list(info.creators, authors);
        return 'applied';
    }
}

class ExternalRefHandler extends FieldHandler {
    protected readonly scope = 'component';

    constructor(
        readonly field: FieldName,
        private readonly kind: ExternalRefKind,
        private readonly configKey: 'purl' | 'cpe',
    ) {
        super();
    }

    protected isConfigured(config: EditConfig): boolean {
        return hasText(config[this.configKey]);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const locator = ctx.config[this.configKey];
        if (target.kind !== 'component' || locator === undefined) return 'not-supported';
        const ref: ExternalRef = { category: this.kind.category, type: this.kind.type, locator };
        target.component.externalRefs = ctx.policy.externalRef(target.component.externalRefs, ref);
        return 'applied';
    }
}

class HashesHandler extends FieldHandler {
    readonly field = 'hashes';
    protected readonly scope = 'component';

    protected isConfigured(config: EditConfig): boolean {
        return hasEntries(config.hashes);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        if (target.kind !== 'component') return 'not-supported';
        const checksums: Checksum[] = [];
        for (const hash of ctx.config.hashes ?? []) {
            if (hash.value === '') continue;
            const algorithm = lookupHashAlgorithm(hash.algorithm);
            if (!algorithm) return 'invalid-input';
            checksums.push({ algorithm, value: hash.value });
        }
        target.component.checksums = ctx.policy.list(target.component.checksums, checksums);
        return 'applied';
    }
}

/**
 * Adds configured tools and stamps the running tool. Any Tool creator already
 * carrying the running tool's name is replaced, so exactly one self entry remains.
 */
class ToolsHandler extends FieldHandler {
    readonly field = 'tools';
    protected readonly scope = 'always';

    protected isConfigured(config: EditConfig): boolean {
        return hasEntries(config.tools);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const info = ensureCreationInfo(target.document);
        const toolName = ctx.tool.name;
        const configured: Creator[] = (ctx.config.tools ?? []).map(t => ({ type: 'Tool', name: `${t.name}-${t.value}` }));

        // an explicitly configured entry for this tool takes the place of the default stamp
        const self: Creator = configured.find(t => isSelfEntry(t, toolName))
            ?? { type: 'Tool', name: toolCreatorName(ctx.tool) };
        const others = configured.filter(t => !isSelfEntry(t, toolName));

        // every policy adds only display strings not yet listed
        const creators = mergeUniqueCreators((info.creators ?? []).filter(c => !isSelfEntry(c, toolName)), others);
        info.creators = [...creators, self];
        return 'applied';
    }
}

function isSelfEntry(creator: Creator, toolName: string): boolean {
    return creator.type === 'Tool' && (creator.name === toolName || creator.name.startsWith(`${toolName}-`));
}

/** Appends creators whose display string is not yet present. */
export function mergeUniqueCreators(existing: Creator[], additions: Creator[]): Creator[] {
    const seen = new Set(existing.map(c => c.name));
    const merged = [...existing];
    for (const creator of additions) {
        if (!seen.has(creator.name)) {
            seen.add(creator.name);
            merged.push(creator);
        }
    }
    return merged;
}

class LifecycleHandler extends FieldHandler {
    readonly field = 'lifecycle-stages';
    protected readonly scope = 'document';

    protected isConfigured(config: EditConfig): boolean {
        return hasEntries(config.lifecycles);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        const comment = `lifecycle: ${(ctx.config.lifecycles ?? []).join(',')}`;
        const info = ensureCreationInfo(target.document);
        info.comment = ctx.policy.scalar(info.comment, comment);
        return 'applied';
    }
}

class PrimaryPurposeHandler extends FieldHandler {
    readonly field = 'primary-purpose';
    protected readonly scope = 'component';

    protected isConfigured(config: EditConfig): boolean {
        return hasText(config.primaryPurpose);
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        if (target.kind !== 'component') return 'not-supported';
        const purpose = lookupPrimaryPurpose(ctx.config.primaryPurpose ?? '');
        if (!purpose) return 'invalid-input';
        target.component.primaryPurpose = ctx.policy.scalar(target.component.primaryPurpose, purpose);
        return 'applied';
    }
}

class TimestampHandler extends FieldHandler {
    readonly field = 'timestamp';
    protected readonly scope = 'always';

    protected isConfigured(): boolean {
        return true;
    }

    protected update(target: ResolvedTarget, ctx: FieldContext): FieldOutcome {
        ensureCreationInfo(target.document).created = ctx.now();
        return 'applied';
    }
}

/**
 * Field handlers in the order they are applied.
 */
export function createFieldHandlers(): FieldHandler[] {
    return [
        new ComponentTextHandler('name', 'name', 'name'),
        new ComponentTextHandler('version', 'version', 'version'),
        new SupplierHandler(),
        new AuthorsHandler(),
        new ExternalRefHandler('purl', PURL_REF_KIND, 'purl'),
        new ExternalRefHandler('cpe', CPE_REF_KIND, 'cpe'),
        new SubjectTextHandler('licenses', c => (c.licenses ? composeLicenseExpression(c.licenses) : undefined), 'dataLicense', 'licenseConcluded'),
        new HashesHandler(),
        new ToolsHandler(),
        new ComponentTextHandler('copyright', 'copyright', 'copyrightText'),
        new LifecycleHandler(),
        new SubjectTextHandler('description', c => c.description, 'comment', 'description'),
        new ComponentTextHandler('repository', 'repository', 'downloadLocation'),
        new PrimaryPurposeHandler(),
        new TimestampHandler(),
    ];
}
