/**
 * Configuration Parser Selection
 *
 * Three interchangeable {@link ConfigParser}s read measurement configurations:
 * - `builtin` - the indentation parser in {@link SimpleYamlParser}, always available
 * - `yaml` - the full `yaml` package, an optional dependency
 * - `json` - `JSON.parse`, used for `.json` files whatever the preference
 *
 * The `yaml` package is probed once per process; later lookups reuse the result.
 *
 * @module ConfigParsers
 */

import type { ConfigFormat, ConfigParser, CosmicConfig } from '../types';
import { CosmicErrorType, getCosmicError, logWarning } from '../utils/errorUtils';
import { fromPlainValue } from './parsedValue';
import { builtinYamlParser } from './SimpleYamlParser';

type YamlModule = typeof import('yaml');

let yamlModule: Promise<YamlModule | null> | undefined;

/**
 * Loads the `yaml` package, resolving to null when it is not installed.
 */
const loadYamlModule = (config: CosmicConfig): Promise<YamlModule | null> => {
    if (!yamlModule) {
        yamlModule = import('yaml').catch((error: unknown) => {
            logWarning("The 'yaml' package is not available, falling back to the built-in parser.", config, error);
            return null;
        });
    }
    return yamlModule;
};

export const jsonParser: ConfigParser = {
    name: 'json',
    parse: (text: string) => fromPlainValue(JSON.parse(text))
};

/**
 * Wraps the `yaml` package as a {@link ConfigParser}.
 */
export const createLibraryYamlParser = (yaml: YamlModule): ConfigParser => ({
    name: 'yaml',
    parse: (text: string) => fromPlainValue(yaml.parse(text))
});

/**
 * Picks the parser for a configuration format.
 *
 * @param format - The configuration format, usually derived from the file extension
 * @param config - Configuration (the `parser` preference)
 * @returns The parser to use
 * @throws {CosmicError} PARSER_UNAVAILABLE if `parser` is 'library' and `yaml` cannot be loaded
 */
export const resolveConfigParser = async (format: ConfigFormat, config: CosmicConfig): Promise<ConfigParser> => {
    if (format === 'json') return jsonParser;

    const preference = config.parser ?? 'auto';
    if (preference === 'builtin') return builtinYamlParser;

    const yaml = await loadYamlModule(config);
    if (yaml) return createLibraryYamlParser(yaml);
    if (preference === 'library') {
        throw getCosmicError(CosmicErrorType.PARSER_UNAVAILABLE, config);
    }
    return builtinYamlParser;
};

/**
 * Maps a file extension (with or without the dot) to a configuration format.
 * Returns null for unsupported extensions.
 */
export const formatFromExtension = (ext: string): ConfigFormat | null => {
    switch (ext.replace(/^\./, '').toLowerCase()) {
        case 'yaml':
        case 'yml':
            return 'yaml';
        case 'json':
            return 'json';
        default:
            return null;
    }
};
