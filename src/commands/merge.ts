import { BomDocument } from '../bom/bom_types';
import { BomService, describeDestination, destinationFromPath } from '../bom/BomService';
import { MergeEngine, MergeEngineDependencies, MergeResult } from '../merge/MergeEngine';
import { MergeConfigService, MergeOverrides } from '../services/MergeConfigService';
import { SayFn, dbg, say } from '../utils';

/**
 * Runs the merge flow: build settings, load every input in order, merge and
 * write once. Any load failure aborts before the engine runs.
 *
 * @param configFilePath Optional JSON configuration file with the root package metadata.
 * @param overrides Input paths and command-line overrides.
 * @param bomService Loader and writer. Injected for testing.
 * @param configService Settings loader. Injected for testing.
 * @param engineDeps Tool identity, clock, id source and loggers for the engine; the writer is always `bomService`.
 */
export async function runMerge(
    configFilePath: string | undefined,
    overrides: MergeOverrides,
    bomService: BomService = new BomService(),
    configService: MergeConfigService = new MergeConfigService(),
    engineDeps: Omit<MergeEngineDependencies, 'writer'> = {},
    sayFn: SayFn = say
): Promise<MergeResult> {
    const settings = await configService.loadSettings(configFilePath, overrides);
    dbg(`Merging ${settings.inputFiles.length} documents in ${settings.mode} mode as ${settings.app.name}-${settings.app.version}`);

    const inputs: BomDocument[] = [];
    for (const inputPath of settings.inputFiles) {
        inputs.push(await bomService.load(inputPath));
    }

    const engine = new MergeEngine(settings, { ...engineDeps, writer: bomService });
    const result = await engine.run(inputs);

    if (result.cloneFailures > 0) {
        sayFn(`Warning: ${result.cloneFailures} packages could not be copied and were left out.`);
    }
    sayFn(`Merged ${inputs.length} documents into ${result.document.components.length} packages; written to ${describeDestination(destinationFromPath(settings.outputFile))}`);
    return result;
}
