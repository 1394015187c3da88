#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { TOOL_NAME, TOOL_VERSION } from './config';
import { runEdit } from './commands/edit';
import { runMerge } from './commands/merge';
import { EditCommandOptions } from './edit/editConfig';
import { EDIT_SUBJECTS } from './edit/editTypes';
import { describeError } from './errors';
import { dbg, say } from './utils';

const GENERAL_ERROR = 1;
const EDIT_ERROR = 2;
const MERGE_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

interface EditCliOptions extends EditCommandOptions {
    output?: string;
}

interface MergeCliOptions {
    config?: string;
    name?: string;
    version?: string;
    output?: string;
    flat?: boolean;
}

async function main() {
    const program = new Command();

    program
        .name(TOOL_NAME)
        .version(TOOL_VERSION)
        .description('Edit and merge SPDX bill-of-materials documents')
        // keeps the subcommands' own --version options from reaching the program
        .enablePositionalOptions();

    program
        .command('edit')
        .description('Edit fields of an SPDX document or one of its packages')
        .argument('<input>', 'SPDX JSON document to edit')
        .option('-o, --output <path>', 'Write the edited document here instead of stdout')
        .option('--subject <subject>', `What to edit: ${EDIT_SUBJECTS.join(', ')}`, 'primary-component')
        .option('--search-name <name>', 'Package name to find with component-name-version')
        .option('--search-version <version>', 'Package version to find with component-name-version')
        .option('--missing', 'Only fill fields that are empty')
        .option('--append', 'Add to list fields instead of replacing them')
        .option('--name <name>', 'Package name')
        .option('--version <version>', 'Package version')
        .option('--supplier <supplier>', 'Supplier as "Name (url or email)"')
        .option('--author <author>', 'Document author as "Name (email)"; repeatable', collect, [])
        .option('--purl <purl>', 'Package URL')
        .option('--cpe <cpe>', 'CPE 2.3 identifier')
        .option('--license <license>', 'License id or expression; repeatable', collect, [])
        .option('--hash <hash>', 'Checksum as "ALGO (value)" or "ALGO:value"; repeatable', collect, [])
        .option('--tool <tool>', 'Tool as "name (version)"; repeatable', collect, [])
        .option('--copyright <text>', 'Copyright text')
        .option('--lifecycle <stage>', 'Lifecycle stage; repeatable or comma-separated', collect, [])
        .option('--description <text>', 'Package description, or document comment with --subject document')
        .option('--repository <url>', 'Download location')
        .option('--type <purpose>', 'Primary package purpose, e.g. application or library')
        .action(async (input: string, options: EditCliOptions) => {
            try {
                await runEdit(input, options, options.output);
                dbg('Edit command finished successfully.');
            } catch (error) {
                say(`Edit failed: ${describeError(error)}`);
                process.exit(EDIT_ERROR);
            }
        });

    program
        .command('merge')
        .description('Merge SPDX documents under a new root package')
        .argument('<inputs...>', 'SPDX JSON documents to merge, in order')
        .option('-c, --config <path>', 'JSON file with the root package metadata')
        .option('--name <name>', 'Product name of the root package')
        .option('--version <version>', 'Product version of the root package')
        .option('-o, --output <path>', 'Write the merged document here instead of stdout')
        .option('--flat', 'Merge without a root package (not implemented)')
        .action(async (inputs: string[], options: MergeCliOptions) => {
            try {
                await runMerge(options.config, {
                    inputs,
                    name: options.name,
                    version: options.version,
                    output: options.output,
                    flat: options.flat,
                });
                dbg('Merge command finished successfully.');
            } catch (error) {
                say(`Merge failed: ${describeError(error)}`);
                process.exit(MERGE_ERROR);
            }
        });

    if (process.argv.length <= 2) {
        program.help();
    }

    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        dbg(`Error during command parsing or execution: ${describeError(error)}`);
        process.exit(COMMAND_PARSING_ERROR);
    }
}

main().catch(error => {
    say(`Unhandled application error: ${describeError(error)}`);
    process.exit(error instanceof Error ? UNHANDLED_ERROR : GENERAL_ERROR);
});
