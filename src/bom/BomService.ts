import * as fs from 'fs/promises';
import * as path from 'path';
import { BomDocument } from './bom_types';
import { BomDecodeError, decodeBomJson, encodeBomJson } from './bomJson';
import { LoadFailure, WriteFailure, describeError } from '../errors';
import { DbgFn, dbg } from '../utils';

type ReadFileFn = (path: string) => Promise<string>;
type WriteFileFn = (path: string, data: string) => Promise<void>;
type WriteStdoutFn = (data: string) => Promise<void>;

/** Where a finished document goes: a file path, or standard output when absent. */
export type OutputDestination = { kind: 'file'; path: string } | { kind: 'stdout' };

export const STDOUT_DESTINATION: OutputDestination = { kind: 'stdout' };

export function destinationFromPath(outputPath?: string): OutputDestination {
    return outputPath ? { kind: 'file', path: outputPath } : STDOUT_DESTINATION;
}

export function describeDestination(destination: OutputDestination): string {
    return destination.kind === 'file' ? destination.path : 'stdout';
}

export interface BomServiceDependencies {
    readFile?: ReadFileFn;
    writeFile?: WriteFileFn;
    writeStdout?: WriteStdoutFn;
    resolvePath?: (...paths: string[]) => string;
    dbgFn?: DbgFn;
}

function writeToStdout(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
        process.stdout.write(data, error => (error ? reject(error) : resolve()));
    });
}

/**
 * Loads BOM documents from and writes them to SPDX JSON files.
 * File access is injected so tests never touch the disk.
 */
export class BomService {
    private readonly readFile: ReadFileFn;
    private readonly writeFile: WriteFileFn;
    private readonly writeStdout: WriteStdoutFn;
    private readonly resolvePath: (...paths: string[]) => string;
    private readonly dbg: DbgFn;

    constructor(deps: BomServiceDependencies = {}) {
        this.readFile = deps.readFile ?? ((p: string) => fs.readFile(p, 'utf-8'));
        this.writeFile = deps.writeFile ?? ((p: string, data: string) => fs.writeFile(p, data, 'utf-8'));
        this.writeStdout = deps.writeStdout ?? writeToStdout;
        this.resolvePath = deps.resolvePath ?? path.resolve;
        this.dbg = deps.dbgFn ?? dbg;
    }

    /**
     * Reads and decodes one SPDX JSON document.
     * @throws LoadFailure on I/O errors, malformed JSON or an unexpected document shape.
     */
    async load(filePath: string): Promise<BomDocument> {
        const resolved = this.resolvePath(filePath);
        let content: string;
        try {
            content = await this.readFile(resolved);
        } catch (error) {
            throw new LoadFailure(resolved, describeError(error), error);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new LoadFailure(resolved, `invalid JSON (${describeError(error)})`, error);
        }

        try {
            const document = decodeBomJson(parsed);
            this.dbg(`BomService: loaded ${resolved} with ${document.components.length} packages and ${document.relationships.length} relationships.`);
            return document;
        } catch (error) {
            if (error instanceof BomDecodeError) {
                throw new LoadFailure(resolved, error.message, error);
            }
            throw error;
        }
    }

    /**
     * Serializes the document as pretty-printed JSON in a single write.
     * @returns the number of characters written.
     * @throws WriteFailure when the destination cannot be written.
     */
    async write(document: BomDocument, destination: OutputDestination): Promise<number> {
        const data = this.serialize(document);
        const target = describeDestination(destination);
        try {
            if (destination.kind === 'file') {
                await this.writeFile(this.resolvePath(destination.path), data);
            } else {
                await this.writeStdout(data);
            }
        } catch (error) {
            throw new WriteFailure(target, error);
        }
        this.dbg(`BomService: wrote ${data.length} characters to ${target}.`);
        return data.length;
    }

    serialize(document: BomDocument): string {
        return JSON.stringify(encodeBomJson(document), null, 2);
    }
}
