/**
 * Failures that terminate an edit or merge run. Field-level and
 * component-level problems are reported as outcomes and log lines instead.
 */

export class BomwrightError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A document could not be read, parsed or decoded. */
export class LoadFailure extends BomwrightError {
    constructor(readonly path: string, reason: string, cause?: unknown) {
        super(`Failed to load BOM from ${path}: ${reason}`, { cause });
    }
}

/** A license list version could not be parsed while reconciling merge inputs. */
export class VersionParseFailure extends BomwrightError {
    constructor(readonly version: string) {
        super(`Cannot parse license list version "${version}" as a semantic version`);
    }
}

/** The finished document could not be written to its destination. */
export class WriteFailure extends BomwrightError {
    constructor(readonly destination: string, cause?: unknown) {
        super(`Failed to write BOM to ${destination}: ${describeError(cause)}`, { cause });
    }
}

export class UnimplementedError extends BomwrightError {
    constructor(feature: string) {
        super(`${feature} is not implemented`);
    }
}

/** Invalid command-line options or configuration file content. */
export class ConfigError extends BomwrightError {}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
