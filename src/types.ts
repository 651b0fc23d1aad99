/**
 * Configuration options for cosmic-cfp.
 */
export interface CosmicConfig {
    /**
     * Flag to show all the logs to console in case of an error irrespective of your own handling.
     * Default is false.
     */
    outputErrorToConsole?: boolean;
    /**
     * Which parser reads YAML configuration files.
     * - `auto`: the `yaml` library when it can be loaded, otherwise the built-in parser
     * - `builtin`: always the built-in indentation parser
     * - `library`: always the `yaml` library (fails when it cannot be loaded)
     *
     * Default is 'auto'. JSON files are always read with the JSON parser.
     */
    parser?: ParserPreference;
    /**
     * Name of the sheet holding the system totals.
     * Default is 'Summary'.
     */
    summarySheetName?: string;
    /**
     * Name of the sheet with one row per functional process.
     * Default is 'Functional Processes'.
     */
    processSheetName?: string;
    /**
     * Name of the sheet with one row per data movement.
     * Default is 'Data Movements'.
     */
    movementSheetName?: string;
    /**
     * Flag to append a "System" sheet listing the boundary, actors, persistence resources
     * and objects of interest of the measured system.
     * Default is false.
     */
    includeSystemSheet?: boolean;
    /**
     * When set, the summary sheet gets a "Report Date" row written as a date cell.
     * Default is null.
     */
    reportDate?: Date | null;
}

/**
 * Parser selection preference.
 */
export type ParserPreference = 'auto' | 'builtin' | 'library';

/**
 * Configuration file formats accepted by the loader.
 */
export type ConfigFormat = 'yaml' | 'json';

/**
 * A non-blank, non-comment line of a configuration file.
 */
export interface LineRecord {
    /** Number of leading spaces. */
    indent: number;
    /** The line with its indentation and trailing whitespace removed. */
    content: string;
    /** 1-based line number in the original text. */
    lineNumber: number;
}

/**
 * Leaf values a configuration can hold.
 */
export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
    type: 'scalar';
    value: ScalarValue;
}

export interface ListNode {
    type: 'list';
    items: ParsedValue[];
}

/**
 * Keys are unique and iterate in the order they were first written.
 */
export interface MappingNode {
    type: 'mapping';
    entries: Map<string, ParsedValue>;
}

/**
 * The tree produced by every configuration parser.
 */
export type ParsedValue = ScalarNode | ListNode | MappingNode;

/**
 * Plain JavaScript rendering of a {@link ParsedValue}.
 */
export type PlainValue = ScalarValue | PlainValue[] | { [key: string]: PlainValue };

/**
 * A parser turning configuration text into a {@link ParsedValue}.
 * All implementations honour the same contract so they can replace one another.
 */
export interface ConfigParser {
    /** Short identifier, e.g. "builtin", "yaml", "json". */
    name: string;
    parse(text: string): ParsedValue;
}

/**
 * A spreadsheet cell value. `null` and `undefined` produce an empty cell.
 * Values of any other type are written as text.
 */
export type CellValue = string | number | Date | boolean | null | undefined;

/**
 * A single worksheet: its tab name and its rows, first row first.
 */
export interface SheetData {
    name: string;
    rows: CellValue[][];
}

/**
 * One file inside the workbook container.
 */
export interface WorkbookPart {
    /**
     * The path of the part within the archive.
     * @example "xl/workbook.xml", "xl/worksheets/sheet1.xml"
     */
    path: string;
    /** The XML text of the part. */
    content: string;
}

/**
 * The four COSMIC data movement types, keyed by their one-letter code.
 */
export enum DataMovementType {
    ENTRY = 'E',
    EXIT = 'X',
    READ = 'R',
    WRITE = 'W'
}

/**
 * A single classified data transfer within a functional process.
 */
export interface DataMovement {
    movementType: DataMovementType;
    description: string;
    objectOfInterest?: string;
    trigger?: string;
    codeReference?: string;
    notes?: string;
}

/**
 * A named unit of behaviour made of an ordered set of data movements.
 */
export interface FunctionalProcess {
    name: string;
    description?: string;
    trigger?: string;
    objectOfInterest?: string;
    dataMovements: DataMovement[];
}

/**
 * A full measurement for one system boundary.
 */
export interface SystemMeasurement {
    name: string;
    boundary?: string;
    description?: string;
    persistenceResources: string[];
    externalActors: string[];
    objectsOfInterest: string[];
    functionalProcesses: FunctionalProcess[];
}

/**
 * Aggregated counts for one functional process.
 */
export interface FunctionalProcessSummary {
    name: string;
    entryCount: number;
    exitCount: number;
    readCount: number;
    writeCount: number;
    /** One CFP per data movement. */
    totalCfp: number;
    trigger?: string;
    objectOfInterest?: string;
    description?: string;
}

/**
 * Contents of a workbook read back from an archive.
 */
export interface WorkbookContents {
    /** Every entry path in the archive, in archive order. */
    parts: string[];
    sheets: SheetData[];
}
