import { BomService, destinationFromPath, describeDestination } from '../bom/BomService';
import { EditEngine, EditEngineDependencies } from '../edit/EditEngine';
import { EditCommandOptions, buildEditConfig } from '../edit/editConfig';
import { FieldReport } from '../edit/editTypes';
import { SayFn, dbg, say } from '../utils';

/**
 * Runs the edit flow: load one document, apply the configured field edits in
 * place, and write the result to the output file or standard output.
 *
 * @param inputPath Path of the SPDX JSON document to edit.
 * @param options Raw command options; validated by `buildEditConfig`.
 * @param outputPath Where to write the edited document. Standard output when absent.
 * @param bomService Loader and writer. Injected for testing.
 * @param engineDeps Tool identity, clock and loggers passed through to the engine.
 * @returns the outcome of every field handler, in application order.
 * @throws ConfigError, LoadFailure or WriteFailure. Nothing is written unless loading and editing succeeded.
 */
export async function runEdit(
    inputPath: string,
    options: EditCommandOptions,
    outputPath?: string,
    bomService: BomService = new BomService(),
    engineDeps: EditEngineDependencies = {},
    sayFn: SayFn = say
): Promise<FieldReport[]> {
    const config = buildEditConfig(options);
    dbg(`Editing ${inputPath}: subject=${config.search.subject}, policy=${config.policy}`);

    const document = await bomService.load(inputPath);
    const engine = new EditEngine(document, config, engineDeps);
    const reports = engine.update();

    const destination = destinationFromPath(outputPath);
    await bomService.write(document, destination);

    const applied = reports.filter(r => r.outcome === 'applied').map(r => r.field);
    sayFn(`Edited ${inputPath} (${applied.join(', ')}); written to ${describeDestination(destination)}`);
    return reports;
}
