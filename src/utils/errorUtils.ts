/**
 * Error Handling Utilities
 *
 * This module provides centralized error management for cosmic-cfp.
 * It defines standard error types, messages, and handling logic to ensure
 * consistent error reporting across the parsers, the report writer and the CLI.
 */

import type { CosmicConfig } from '../types';

/** Error header prefix for all error messages */
const ERRORHEADER = "[CosmicCFP]: ";

/**
 * Standard error types for cosmic-cfp.
 * Every thrown {@link CosmicError} carries one of these in its `type` field.
 */
export enum CosmicErrorType {
    /** Configuration file extension is not yaml, yml or json */
    EXTENSION_UNSUPPORTED = 'EXTENSION_UNSUPPORTED',
    /** File could not be found at the specified path */
    FILE_DOES_NOT_EXIST = 'FILE_DOES_NOT_EXIST',
    /** Specified location is a directory */
    LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
    /** File exists but could not be read */
    FILE_UNREADABLE = 'FILE_UNREADABLE',
    /** Configuration text could not be parsed */
    PARSE_FAILED = 'PARSE_FAILED',
    /** List items and mapping entries share one indentation level */
    STRUCTURE_MIXED = 'STRUCTURE_MIXED',
    /** A list item continuation is not a mapping */
    LIST_ITEM_NOT_MAPPING = 'LIST_ITEM_NOT_MAPPING',
    /** Tab characters used for indentation */
    TAB_INDENTATION = 'TAB_INDENTATION',
    /** The document root is a list or a scalar */
    ROOT_NOT_MAPPING = 'ROOT_NOT_MAPPING',
    /** A required measurement field is absent */
    MISSING_FIELD = 'MISSING_FIELD',
    /** A data movement type is not one of E, X, R, W */
    INVALID_MOVEMENT_TYPE = 'INVALID_MOVEMENT_TYPE',
    /** A measurement field has the wrong shape */
    INVALID_FIELD = 'INVALID_FIELD',
    /** The yaml library was requested but cannot be loaded */
    PARSER_UNAVAILABLE = 'PARSER_UNAVAILABLE',
    /** The workbook archive could not be written */
    WRITE_FAILED = 'WRITE_FAILED',
    /** File appears to be corrupted or malformed */
    FILE_CORRUPTED = 'FILE_CORRUPTED',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** Input type is not a supported type (string path or Buffer) */
    INVALID_INPUT = 'INVALID_INPUT'
}

type MessageBuilder = (info: string) => string;

/**
 * Lookup table for error messages.
 * Function entries build the message from the extra information passed by the caller.
 */
const ERROR_MESSAGES: Record<CosmicErrorType, string | MessageBuilder> = {
    [CosmicErrorType.EXTENSION_UNSUPPORTED]: (ext) => `Unsupported configuration format '${ext}'. Use a .yaml, .yml or .json file.`,
    [CosmicErrorType.FILE_DOES_NOT_EXIST]: (filepath) => `File '${filepath}' does not exist.`,
    [CosmicErrorType.LOCATION_NOT_FOUND]: (location) => `Entered location ${location} is a directory, not a file.`,
    [CosmicErrorType.FILE_UNREADABLE]: (detail) => `Failed to read file ${detail}`,
    [CosmicErrorType.PARSE_FAILED]: (detail) => `Failed to parse configuration file ${detail}`,
    [CosmicErrorType.STRUCTURE_MIXED]: (line) => `Mixed list and mapping structures are not supported (line ${line}).`,
    [CosmicErrorType.LIST_ITEM_NOT_MAPPING]: (line) => `List item mappings must contain dictionary structures at consistent indentation (line ${line}).`,
    [CosmicErrorType.TAB_INDENTATION]: (line) => `Tab characters are not supported for indentation (line ${line}). Indent with spaces.`,
    [CosmicErrorType.ROOT_NOT_MAPPING]: `Measurement configuration must define a mapping with 'system' and 'functional_processes' keys.`,
    [CosmicErrorType.MISSING_FIELD]: (detail) => detail,
    [CosmicErrorType.INVALID_MOVEMENT_TYPE]: (value) => `Unsupported data movement type '${value}'. Expected one of: E, X, R, W.`,
    [CosmicErrorType.INVALID_FIELD]: (detail) => detail,
    [CosmicErrorType.PARSER_UNAVAILABLE]: `The 'yaml' package could not be loaded. Install it or use the built-in parser.`,
    [CosmicErrorType.WRITE_FAILED]: (detail) => `Failed to write workbook ${detail}`,
    [CosmicErrorType.FILE_CORRUPTED]: (filepath) => `Your file ${filepath} seems to be corrupted or is not a workbook archive.`,
    [CosmicErrorType.IMPROPER_ARGUMENTS]: `Improper arguments`,
    [CosmicErrorType.INVALID_INPUT]: `Invalid input type: Expected a Buffer or a valid file path`
};

/**
 * Error raised by every part of cosmic-cfp.
 */
export class CosmicError extends Error {
    public readonly type: CosmicErrorType;

    constructor(type: CosmicErrorType, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'CosmicError';
        this.type = type;
    }
}

/**
 * Creates the message for a specific error type, without the header.
 *
 * @param type - The type of error
 * @param info - Optional additional information (e.g., filepath, line number)
 */
export const createErrorMessage = (type: CosmicErrorType, info?: string | number): string => {
    const msg = ERROR_MESSAGES[type];
    return typeof msg === 'function' ? msg(String(info ?? '')) : msg;
};

/**
 * Creates, optionally logs to console, and returns a formatted error.
 *
 * @param type - The type of error
 * @param config - Configuration (checks outputErrorToConsole)
 * @param info - Optional additional information
 * @param cause - The underlying error, if any
 * @returns The error to be thrown
 */
export const getCosmicError = (type: CosmicErrorType, config: CosmicConfig, info?: string | number, cause?: unknown): CosmicError => {
    const message = createErrorMessage(type, info);
    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new CosmicError(type, ERRORHEADER + message, cause);
};

/**
 * Error raised by the configuration parsers, which run without a configuration.
 */
export const parseError = (type: CosmicErrorType, line?: number): CosmicError => {
    return new CosmicError(type, ERRORHEADER + createErrorMessage(type, line));
};

/**
 * Returns the message of an unknown thrown value without the header.
 */
export const errorMessage = (error: unknown): string => {
    const message = error instanceof Error ? error.message : String(error);
    return message.startsWith(ERRORHEADER) ? message.slice(ERRORHEADER.length) : message;
};

/**
 * Wraps an existing error with cosmic-cfp context and performs corruption detection.
 * Errors that already are {@link CosmicError}s pass through unchanged.
 * Optionally logs the error to console.
 *
 * @param error - The original error object
 * @param config - Configuration
 * @param filePath - Optional file path for context
 * @returns The wrapped error to be thrown
 */
export const getWrappedError = (error: unknown, config: CosmicConfig, filePath?: string): CosmicError => {
    if (error instanceof CosmicError) {
        return error;
    }
    let message = errorMessage(error);
    let type = CosmicErrorType.FILE_UNREADABLE;

    // Detect archive corruption from common library error messages
    if (filePath && (
        message.includes('end of central directory record') ||
        message.includes('invalid XML') ||
        message.includes('Failed to open zip file') ||
        message.includes('invalid distance too far back')
    )) {
        type = CosmicErrorType.FILE_CORRUPTED;
        message = createErrorMessage(CosmicErrorType.FILE_CORRUPTED, filePath);
    }

    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new CosmicError(type, ERRORHEADER + message, error);
};

/**
 * Conditionally logs a warning message to the console.
 * Used for non-fatal conditions that shouldn't stop processing.
 *
 * @param message - The warning message
 * @param config - Configuration
 * @param error - Optional original error object for more context
 */
export const logWarning = (message: string, config: CosmicConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};
