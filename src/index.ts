/**
 * cosmic-cfp - COSMIC Function Point measurement reports
 *
 * Reads a measurement configuration (YAML or JSON) describing the functional processes of a
 * system and their data movements, counts Cosmic Function Points, and writes an Excel workbook
 * with a summary, one row per functional process and one row per data movement.
 *
 * **Quick Start:**
 * ```typescript
 * import { CosmicReporter } from 'cosmic-cfp';
 *
 * const output = await CosmicReporter.generateReport('measurement.yaml', 'report.xlsx');
 * ```
 *
 * The building blocks are exported too: the built-in YAML subset parser, the parser
 * selection, the SpreadsheetML writer and packager, and the workbook reader.
 *
 * @packageDocumentation
 * @module cosmic-cfp
 */

import { CosmicReporter, resolveConfig } from './CosmicReporter';

export { CosmicReporter, resolveConfig };
export * from './types';
export { CosmicError, CosmicErrorType } from './utils/errorUtils';
export { builtinYamlParser, coerceScalar, parseBlock, parseDocument, preprocessLines } from './parsers/SimpleYamlParser';
export type { BlockResult } from './parsers/SimpleYamlParser';
export { createLibraryYamlParser, formatFromExtension, jsonParser, resolveConfigParser } from './parsers/ConfigParsers';
export { fromPlainValue, toCanonicalString, toPlainValue } from './parsers/parsedValue';
export { buildWorkbookParts, columnLetter, encodeCell, excelDateSerial } from './writers/ExcelWriter';
export { packageWorkbook, writeWorkbook } from './writers/WorkbookPackager';
export { readWorkbook } from './readers/WorkbookReader';
export { buildMeasurement } from './model/measurement';
export { summarizeMeasurement, summarizeProcess, totalCfp } from './model/calculator';
export { buildReportSheets } from './model/report';

export const generateReport = CosmicReporter.generateReport;
export default CosmicReporter;
