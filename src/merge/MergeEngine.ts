import {
    BomComponent,
    BomDocument,
    BomRelationship,
    Creator,
    RELATIONSHIP_CONTAINS,
    RELATIONSHIP_DESCRIBES,
    isDescribes,
} from '../bom/bom_types';
import { OutputDestination, destinationFromPath } from '../bom/BomService';
import {
    DEFAULT_NAMESPACE_BASE,
    DOCUMENT_ID,
    OUTPUT_DATA_LICENSE,
    OUTPUT_SPDX_VERSION,
} from '../config';
import { UnimplementedError, describeError } from '../errors';
import {
    DEFAULT_TOOL_IDENTITY,
    DbgFn,
    ToolIdentity,
    WarnFn,
    dbg,
    newElementId,
    newUuid,
    toolCreatorName,
    utcNow,
    warn,
} from '../utils';
import { reconcileLicenseListVersion } from './licenseListVersion';
import { MergeSettings } from './mergeTypes';
import { buildRootComponent, formatContact, hasContact } from './rootComponent';

export type MergeStage = 'init' | 'synthesize-root' | 'ingest' | 'finalize' | 'serialize' | 'done' | 'aborted';

/** The part of BomService the merge needs. */
export interface DocumentWriter {
    write(document: BomDocument, destination: OutputDestination): Promise<number>;
}

export interface MergeEngineDependencies {
    writer: DocumentWriter;
    tool?: ToolIdentity;
    now?: () => string;
    uuidFn?: () => string;
    cloneFn?: (component: BomComponent) => BomComponent;
    dbgFn?: DbgFn;
    warnFn?: WarnFn;
}

export interface MergeResult {
    document: BomDocument;
    rootId: string;
    cloneFailures: number;
    charactersWritten: number;
}

/**
 * Combines several BOM documents under a newly synthesized root package.
 * Inputs are never modified: components are deep-copied and relationships
 * copied before their endpoints are rewritten.
 */
export class MergeEngine {
    private currentStage: MergeStage = 'init';
    private readonly tool: ToolIdentity;
    private readonly now: () => string;
    private readonly uuidFn: () => string;
    private readonly cloneFn: (component: BomComponent) => BomComponent;
    private readonly dbg: DbgFn;
    private readonly warn: WarnFn;

    constructor(private readonly settings: MergeSettings, private readonly deps: MergeEngineDependencies) {
        this.tool = deps.tool ?? DEFAULT_TOOL_IDENTITY;
        this.now = deps.now ?? (() => utcNow());
        this.uuidFn = deps.uuidFn ?? newUuid;
        this.cloneFn = deps.cloneFn ?? (component => structuredClone(component));
        this.dbg = deps.dbgFn ?? dbg;
        this.warn = deps.warnFn ?? warn;
    }

    get stage(): MergeStage {
        return this.currentStage;
    }

    /**
     * Runs the configured merge mode and writes the result.
     */
    async run(inputs: BomDocument[]): Promise<MergeResult> {
        return this.settings.mode === 'flat' ? this.flatMerge(inputs) : this.merge(inputs);
    }

    /**
     * Hierarchical merge: a root package DESCRIBED by the output document
     * CONTAINS every package the inputs described.
     * @throws VersionParseFailure before anything is written, WriteFailure from the writer.
     */
    async merge(inputs: BomDocument[]): Promise<MergeResult> {
        try {
            this.currentStage = 'init';
            const out = this.initOutput(inputs);

            this.currentStage = 'synthesize-root';
            const root = buildRootComponent(this.settings.app, newElementId('RootPackage', this.uuidFn), this.warn);
            this.dbg(`MergeEngine: root package id ${root.id}`);
            out.components.push(root);
            out.relationships.push({ refA: out.id, refB: root.id, type: RELATIONSHIP_DESCRIBES });

            this.currentStage = 'ingest';
            let cloneFailures = 0;
            for (const input of inputs) {
                cloneFailures += this.ingest(out, root.id, input);
            }

            this.currentStage = 'finalize';
            this.dbg(`MergeEngine: merged ${inputs.length} documents into ${out.components.length} packages, ${out.relationships.length} relationships, ${out.files.length} files.`);

            this.currentStage = 'serialize';
            const charactersWritten = await this.deps.writer.write(out, destinationFromPath(this.settings.outputFile));

            this.currentStage = 'done';
            return { document: out, rootId: root.id, cloneFailures, charactersWritten };
        } catch (error) {
            this.currentStage = 'aborted';
            throw error;
        }
    }

    /**
     * Merging into a single namespace without a root package is not supported.
     */
    async flatMerge(_inputs: BomDocument[]): Promise<never> {
        this.currentStage = 'aborted';
        throw new UnimplementedError('Flat merge of SPDX documents');
    }

    private initOutput(inputs: BomDocument[]): BomDocument {
        const { app } = this.settings;

        const creators: Creator[] = app.authors
            .filter(hasContact)
            .map(author => ({ type: 'Organization', name: formatContact(author) }));
        creators.push({ type: 'Tool', name: toolCreatorName(this.tool) });

        return {
            spdxVersion: OUTPUT_SPDX_VERSION,
            dataLicense: OUTPUT_DATA_LICENSE,
            id: DOCUMENT_ID,
            name: app.name,
            namespace: `${DEFAULT_NAMESPACE_BASE}/${encodeURIComponent(app.name)}-${this.uuidFn()}`,
            creationInfo: {
                created: this.now(),
                creators,
                comment: `Generated by ${toolCreatorName(this.tool)} using ${inputs.length} sboms`,
                licenseListVersion: reconcileLicenseListVersion(inputs),
            },
            components: [],
            files: [],
            relationships: [],
            otherLicenses: [],
            externalDocumentRefs: inputs.flatMap(doc => doc.externalDocumentRefs.map(ref => structuredClone(ref))),
            extras: {},
        };
    }

    /**
     * Appends one input's packages, relationships, files and other licenses.
     * @returns the number of packages skipped because they could not be copied.
     */
    private ingest(out: BomDocument, rootId: string, input: BomDocument): number {
        this.dbg(`MergeEngine: processing ${input.id}-${input.name} with packages:${input.components.length}, files:${input.files.length}, relationships:${input.relationships.length}, otherLicenses:${input.otherLicenses.length}, externalDocumentRefs:${input.externalDocumentRefs.length}`);

        const described = new Set(input.relationships.filter(isDescribes).map(rel => rel.refB));
        const relationships: BomRelationship[] = input.relationships.map(rel => ({ ...rel }));
        let failures = 0;

        for (const component of input.components) {
            let copy: BomComponent;
            try {
                copy = this.cloneFn(component);
            } catch (error) {
                this.warn(`Failed to clone package ${component.id} (${component.name}): ${describeError(error)}`);
                failures++;
                continue;
            }

            if (described.has(component.id)) {
                copy.id = newElementId('Package', this.uuidFn);
                out.relationships.push({ refA: rootId, refB: copy.id, type: RELATIONSHIP_CONTAINS });
                for (const rel of relationships) {
                    if (rel.refA === component.id) rel.refA = copy.id;
                    if (rel.refB === component.id) rel.refB = copy.id;
                }
            }
            out.components.push(copy);
        }

        out.relationships.push(...relationships.filter(rel => !isDescribes(rel)));
        out.files.push(...input.files.map(file => structuredClone(file)));
        out.otherLicenses.push(...input.otherLicenses.map(license => structuredClone(license)));
        return failures;
    }
}
