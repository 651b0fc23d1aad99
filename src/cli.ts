/**
 * Command line entry point.
 *
 * ```
 * cosmic-cfp <config.yaml|config.json> [-o report.xlsx] [--parser auto|builtin|library] [--system-sheet] [--verbose]
 * cosmic-cfp inspect <report.xlsx>
 * ```
 *
 * @module cli
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { CosmicReporter } from './CosmicReporter';
import { readWorkbook } from './readers/WorkbookReader';
import type { CosmicConfig, ParserPreference } from './types';
import { errorMessage } from './utils/errorUtils';

const DEFAULT_OUTPUT = 'cosmic_measurement.xlsx';

const USAGE = `Usage:
  cosmic-cfp <config> [--output <file.xlsx>] [--parser auto|builtin|library] [--system-sheet] [--verbose]
  cosmic-cfp inspect <file.xlsx>`;

const PARSER_PREFERENCES: readonly ParserPreference[] = ['auto', 'builtin', 'library'];

const isParserPreference = (value: string): value is ParserPreference =>
    PARSER_PREFERENCES.some(preference => preference === value);

/**
 * Runs the CLI with the given arguments (without the node and script paths).
 *
 * @returns The process exit code
 */
export const run = async (argv: string[]): Promise<number> => {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            output: { type: 'string', short: 'o', default: DEFAULT_OUTPUT },
            parser: { type: 'string', default: 'auto' },
            'system-sheet': { type: 'boolean', default: false },
            verbose: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });

    if (values.help || positionals.length === 0) {
        console.log(USAGE);
        return positionals.length === 0 && !values.help ? 1 : 0;
    }

    const parser = values.parser ?? 'auto';
    if (!isParserPreference(parser)) {
        console.error(`Unknown parser '${parser}'. Expected one of: ${PARSER_PREFERENCES.join(', ')}.`);
        return 1;
    }
    const config: CosmicConfig = {
        parser,
        includeSystemSheet: values['system-sheet'],
        outputErrorToConsole: values.verbose
    };

    try {
        if (positionals[0] === 'inspect') {
            if (!positionals[1]) {
                console.log(USAGE);
                return 1;
            }
            const contents = await readWorkbook(positionals[1], config);
            for (const sheet of contents.sheets) {
                console.log(`${sheet.name}: ${sheet.rows.length} rows`);
            }
            return 0;
        }

        const output = await CosmicReporter.generateReport(positionals[0], values.output ?? DEFAULT_OUTPUT, config);
        console.log(`Excel report generated at: ${path.resolve(output)}`);
        return 0;
    } catch (error: unknown) {
        console.error(errorMessage(error));
        return 1;
    }
};
