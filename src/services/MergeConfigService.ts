import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from '../errors';
import { MergeConfigFile, MergeConfigFileSchema, MergeMode, MergeSettings } from '../merge/mergeTypes';

export interface MergeConfigServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
}

/** Values given on the command line; they take precedence over the config file. */
export interface MergeOverrides {
    inputs: string[];
    name?: string;
    version?: string;
    output?: string;
    flat?: boolean;
}

/**
 * One line per issue, prefixed with the dotted path of the offending value.
 */
export function formatConfigIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const where = issue.path.join('.');
        return where ? `${where}: ${issue.message}` : issue.message;
    });
}

/**
 * Builds merge settings from an optional JSON configuration file (see
 * `MergeConfigFileSchema`) and command-line overrides.
 */
export class MergeConfigService {
    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;

    constructor(deps?: MergeConfigServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
    }

    /**
     * @throws ConfigError when the file cannot be read or parsed, or required values are missing.
     */
    async loadSettings(configFilePath: string | undefined, overrides: MergeOverrides): Promise<MergeSettings> {
        const file = configFilePath ? await this.readConfigFile(configFilePath) : MergeConfigFileSchema.parse({});

        const app = { ...file.app };
        if (overrides.name) app.name = overrides.name;
        if (overrides.version) app.version = overrides.version;

        if (!app.name) {
            throw new ConfigError('A product name is required (app.name in the config file or --name)');
        }
        if (!app.version) {
            throw new ConfigError('A product version is required (app.version in the config file or --version)');
        }
        if (overrides.inputs.length === 0) {
            throw new ConfigError('At least one input document is required');
        }

        const mode: MergeMode = overrides.flat || file.merge.flat ? 'flat' : 'hierarchical';
        const outputFile = overrides.output || file.output.file || undefined;

        return { app, inputFiles: [...overrides.inputs], outputFile, mode };
    }

    private async readConfigFile(configFilePath: string): Promise<MergeConfigFile> {
        const resolved = this.resolvePathFn(configFilePath);
        let parsed: unknown;
        try {
            parsed = JSON.parse(await this.readFileFn(resolved, 'utf-8'));
        } catch (error) {
            throw new ConfigError(`Failed to load or parse merge configuration file: ${resolved}. Original error: ${describeError(error)}`);
        }

        const result = MergeConfigFileSchema.safeParse(parsed);
        if (!result.success) {
            throw new ConfigError(`Invalid merge configuration file ${resolved}: ${formatConfigIssues(result.error).join('; ')}`, { cause: result.error });
        }
        return result.data;
    }
}
