import { BomDocument } from '../bom/bom_types';
import { DEFAULT_TOOL_IDENTITY, DbgFn, SayFn, ToolIdentity, WarnFn, dbg, say, utcNow, warn } from '../utils';
import { EditConfig, EditTarget, FieldReport } from './editTypes';
import { FieldContext, FieldHandler, createFieldHandlers } from './fieldHandlers';
import { policyFor } from './policy';
import { resolveSubject } from './SubjectResolver';

export interface EditEngineDependencies {
    tool?: ToolIdentity;
    now?: () => string;
    handlers?: FieldHandler[];
    sayFn?: SayFn;
    dbgFn?: DbgFn;
    warnFn?: WarnFn;
}

/**
 * Applies the configured field edits to one document, in place.
 * The subject is resolved once at construction; each field is then applied
 * independently so that one unsupported or invalid field never stops the rest.
 */
export class EditEngine {
    readonly target: EditTarget;
    private readonly ctx: FieldContext;
    private readonly handlers: FieldHandler[];
    private readonly say: SayFn;
    private readonly dbg: DbgFn;
    private readonly warn: WarnFn;

    constructor(readonly document: BomDocument, config: EditConfig, deps: EditEngineDependencies = {}) {
        this.handlers = deps.handlers ?? createFieldHandlers();
        this.say = deps.sayFn ?? say;
        this.dbg = deps.dbgFn ?? dbg;
        this.warn = deps.warnFn ?? warn;
        this.ctx = {
            config,
            policy: policyFor(config.policy),
            tool: deps.tool ?? DEFAULT_TOOL_IDENTITY,
            now: deps.now ?? (() => utcNow()),
        };
        this.target = resolveSubject(document, config.search);
        if (this.target.kind === 'not-found') {
            this.warn(`EditEngine: ${config.search.subject} not found (${this.target.reason}); component edits are skipped.`);
        }
    }

    update(): FieldReport[] {
        this.dbg(`EditEngine: updating document ${this.document.name || this.document.id} with policy ${this.ctx.policy.name}`);
        const reports: FieldReport[] = [];
        for (const handler of this.handlers) {
            const outcome = handler.apply(this.target, this.ctx);
            switch (outcome) {
                case 'not-supported':
                    this.say(`Field ${handler.field} is not supported for subject ${this.ctx.config.search.subject}; skipped.`);
                    break;
                case 'invalid-input':
                    this.warn(`Field ${handler.field} has an invalid value; left unchanged.`);
                    break;
                case 'not-found':
                    this.warn(`Field ${handler.field} skipped: no component to edit.`);
                    break;
                default:
                    this.dbg(`EditEngine: ${handler.field} -> ${outcome}`);
            }
            reports.push({ field: handler.field, outcome });
        }
        return reports;
    }
}
