/**
 * Cosmic Reporter - Main Entry Point
 *
 * This module provides the main `CosmicReporter` class whose static methods load a
 * COSMIC measurement configuration and export it as an Excel workbook.
 *
 * **Supported Configuration Formats:**
 * - YAML (`.yaml`, `.yml`) - read by the `yaml` package when installed, otherwise by the built-in parser
 * - JSON (`.json`)
 *
 * **Usage:**
 * ```typescript
 * import { CosmicReporter } from 'cosmic-cfp';
 *
 * // Configuration file to workbook in one step
 * const output = await CosmicReporter.generateReport('measurement.yaml', 'report.xlsx');
 *
 * // Or load, inspect and export separately
 * const measurement = await CosmicReporter.loadMeasurement('measurement.yaml', { parser: 'builtin' });
 * await CosmicReporter.exportWorkbook(measurement, 'report.xlsx', { includeSystemSheet: true });
 * ```
 *
 * @module CosmicReporter
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildMeasurement } from './model/measurement';
import { buildReportSheets } from './model/report';
import { formatFromExtension, resolveConfigParser } from './parsers/ConfigParsers';
import type { ConfigFormat, CosmicConfig, ParsedValue, SystemMeasurement } from './types';
import { CosmicErrorType, errorMessage, getCosmicError } from './utils/errorUtils';
import { writeWorkbook } from './writers/WorkbookPackager';

/**
 * Applies defaults for every omitted option.
 */
export const resolveConfig = (config: CosmicConfig = {}): Required<CosmicConfig> => ({
    outputErrorToConsole: false,
    parser: 'auto',
    summarySheetName: 'Summary',
    processSheetName: 'Functional Processes',
    movementSheetName: 'Data Movements',
    includeSystemSheet: false,
    reportDate: null,
    ...config
});

/**
 * Main class providing measurement loading and workbook export.
 */
export class CosmicReporter {
    /**
     * Loads a measurement from a configuration file.
     *
     * The format follows the file extension. Parse failures are reported with the file path
     * and the parser's own message.
     *
     * @param file - Path of a .yaml, .yml or .json configuration file
     * @param config - Optional configuration object
     * @returns A promise resolving to the measurement
     * @throws {CosmicError} FILE_DOES_NOT_EXIST, LOCATION_NOT_FOUND, FILE_UNREADABLE,
     * EXTENSION_UNSUPPORTED, PARSE_FAILED, or a measurement validation error
     */
    public static async loadMeasurement(file: string, config?: CosmicConfig): Promise<SystemMeasurement> {
        const internalConfig = resolveConfig(config);

        if (!file || typeof file !== 'string') {
            throw getCosmicError(CosmicErrorType.IMPROPER_ARGUMENTS, internalConfig);
        }
        if (!fs.existsSync(file)) {
            throw getCosmicError(CosmicErrorType.FILE_DOES_NOT_EXIST, internalConfig, file);
        }
        if (fs.lstatSync(file).isDirectory()) {
            throw getCosmicError(CosmicErrorType.LOCATION_NOT_FOUND, internalConfig, file);
        }

        const ext = path.extname(file);
        const format = formatFromExtension(ext);
        if (!format) {
            throw getCosmicError(CosmicErrorType.EXTENSION_UNSUPPORTED, internalConfig, ext || file);
        }

        let raw: string;
        try {
            raw = await fs.promises.readFile(file, 'utf8');
        } catch (error: unknown) {
            throw getCosmicError(CosmicErrorType.FILE_UNREADABLE, internalConfig, `'${file}': ${errorMessage(error)}`, error);
        }

        return CosmicReporter.parseMeasurement(raw, internalConfig, format, file);
    }

    /**
     * Loads a measurement from configuration text.
     *
     * @param text - The configuration text
     * @param config - Optional configuration object
     * @param format - The text format, YAML by default
     * @param source - Name used in error messages
     * @returns A promise resolving to the measurement
     */
    public static async parseMeasurement(text: string, config?: CosmicConfig, format: ConfigFormat = 'yaml', source = '<text>'): Promise<SystemMeasurement> {
        const internalConfig = resolveConfig(config);
        const parser = await resolveConfigParser(format, internalConfig);

        let root: ParsedValue;
        try {
            root = parser.parse(text);
        } catch (error: unknown) {
            throw getCosmicError(CosmicErrorType.PARSE_FAILED, internalConfig, `'${source}': ${errorMessage(error)}`, error);
        }
        return buildMeasurement(root, internalConfig);
    }

    /**
     * Exports a measurement as an Excel workbook, creating or replacing `outputPath`.
     *
     * @param measurement - The measurement to report
     * @param outputPath - Path of the .xlsx file to write
     * @param config - Optional configuration object (sheet names, system sheet, report date)
     * @returns A promise resolving to the absolute path of the written workbook
     * @throws {CosmicError} WRITE_FAILED
     */
    public static async exportWorkbook(measurement: SystemMeasurement, outputPath: string, config?: CosmicConfig): Promise<string> {
        const internalConfig = resolveConfig(config);
        if (!outputPath) {
            throw getCosmicError(CosmicErrorType.IMPROPER_ARGUMENTS, internalConfig);
        }
        return writeWorkbook(buildReportSheets(measurement, internalConfig), outputPath, internalConfig);
    }

    /**
     * Loads a configuration file and exports its workbook.
     *
     * @returns A promise resolving to the absolute path of the written workbook
     */
    public static async generateReport(configPath: string, outputPath: string, config?: CosmicConfig): Promise<string> {
        const measurement = await CosmicReporter.loadMeasurement(configPath, config);
        return CosmicReporter.exportWorkbook(measurement, outputPath, config);
    }
}
