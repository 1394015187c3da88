import * as uuid from 'uuid';
import { DEBUG_ENV_VAR, TOOL_NAME, TOOL_VERSION } from './config';

export type SayFn = (s: string) => void;
export type DbgFn = (s: string) => void;
export type WarnFn = (s: string) => void;

/** Name and version the tool stamps into creation info. */
export interface ToolIdentity {
    name: string;
    version: string;
}

export const DEFAULT_TOOL_IDENTITY: ToolIdentity = { name: TOOL_NAME, version: TOOL_VERSION };

// Diagnostics go to stderr; stdout is reserved for document output.
export function dbg(s: string) {
    if (process.env[DEBUG_ENV_VAR] === '1' || process.env[DEBUG_ENV_VAR] === 'true') {
        console.error(`[debug] ${s}`);
    }
}

export function say(s: string) {
    console.error(s);
}

export function warn(s: string) {
    console.warn(`[warn] ${s}`);
}

export function newUuid(): string {
    return uuid.v4();
}

/**
 * Returns a fresh element identifier of the form `SPDXRef-<prefix>-<uuid>`.
 */
export function newElementId(prefix: string, uuidFn: () => string = newUuid): string {
    return `SPDXRef-${prefix}-${uuidFn()}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Current UTC time with second precision, e.g. `2024-05-01T10:20:30Z`.
 */
export function utcNow(now: () => Date = () => new Date()): string {
    return now().toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Formats a tool identity the way it appears in a Tool creator entry.
 */
export function toolCreatorName(tool: ToolIdentity): string {
    return `${tool.name}-${tool.version}`;
}
