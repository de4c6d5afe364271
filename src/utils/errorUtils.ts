/**
 * Error Handling Utilities
 *
 * This module provides centralized error management for the package core.
 * It defines standard error types, messages, and handling logic to ensure
 * consistent error reporting across the container, its backends and the CLI.
 */

import type { OdfContainerConfig } from '../types';

/** Error header prefix for all error and warning messages */
const ERRORHEADER = '[odfpack]: ';

/**
 * Standard error types.
 * Use these to identify the kind of error being reported.
 */
export enum OdfErrorType {
    /** Source path could not be found */
    FILE_DOES_NOT_EXIST = 'FILE_DOES_NOT_EXIST',
    /** Archive appears to be corrupted or malformed */
    FILE_CORRUPTED = 'FILE_CORRUPTED',
    /** Source is neither a ZIP archive nor a folder */
    INVALID_INPUT = 'INVALID_INPUT',
    /** The mimetype part is not one of the known ODF media types */
    UNKNOWN_MIMETYPE = 'UNKNOWN_MIMETYPE',
    /** The mimetype part is absent or deleted */
    MIMETYPE_MISSING = 'MIMETYPE_MISSING',
    /** A mimetype was assigned something other than a string or bytes */
    INVALID_MIMETYPE_VALUE = 'INVALID_MIMETYPE_VALUE',
    /** Packaging other than zip or folder */
    PACKAGING_UNSUPPORTED = 'PACKAGING_UNSUPPORTED',
    /** Folder packaging was requested onto a stream */
    FOLDER_TO_STREAM = 'FOLDER_TO_STREAM',
    /** Read of a part marked for deletion */
    PART_DELETED = 'PART_DELETED',
    /** No such file entry in the manifest */
    MANIFEST_ENTRY_NOT_FOUND = 'MANIFEST_ENTRY_NOT_FOUND',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** Error occurred while reading an archive or a folder */
    READ_FAILED = 'READ_FAILED',
}

/**
 * Lookup table for error messages.
 * Every entry takes the offending path or value.
 */
const ERROR_MESSAGES: Record<OdfErrorType, (info: string) => string> = {
    [OdfErrorType.FILE_DOES_NOT_EXIST]: (filepath) => `File ${filepath} could not be found! Check if the file exists or verify if the relative path to the file is correct from your terminal's location.`,
    [OdfErrorType.FILE_CORRUPTED]: (filepath) => `Your file ${filepath} seems to be corrupted.`,
    [OdfErrorType.INVALID_INPUT]: (kind) => `Document format not managed: ${kind}. Expected a path to an ODF file or folder, a Buffer, an ArrayBuffer or a readable stream`,
    [OdfErrorType.UNKNOWN_MIMETYPE]: (mimetype) => `Document of unknown type "${mimetype}"`,
    [OdfErrorType.MIMETYPE_MISSING]: (location) => `Mimetype is not defined in ${location}`,
    [OdfErrorType.INVALID_MIMETYPE_VALUE]: (value) => `Wrong mimetype "${value}"`,
    [OdfErrorType.PACKAGING_UNSUPPORTED]: (packaging) => `Packaging of type "${packaging}" is not supported`,
    [OdfErrorType.FOLDER_TO_STREAM]: (target) => `Saving in folder format requires a folder name, not ${target}`,
    [OdfErrorType.PART_DELETED]: (part) => `Part "${part}" is deleted`,
    [OdfErrorType.MANIFEST_ENTRY_NOT_FOUND]: (fullPath) => `Path not found in manifest: "${fullPath}"`,
    [OdfErrorType.IMPROPER_ARGUMENTS]: (detail) => `Improper arguments: ${detail}`,
    [OdfErrorType.READ_FAILED]: (detail) => `Error occured while reading the package: ${detail}`,
};

/**
 * Error raised by the package core.
 * `type` tells callers which of the failures listed in `OdfErrorType` occurred.
 */
export class OdfError extends Error {
    readonly type: OdfErrorType;

    constructor(type: OdfErrorType, message: string) {
        super(message);
        this.name = 'OdfError';
        this.type = type;
    }
}

/**
 * Creates, optionally logs to console, and returns a formatted error.
 *
 * @param type - The type of error
 * @param config - Container configuration (checks outputErrorToConsole)
 * @param info - The offending path or value, quoted in the message
 * @returns The OdfError object to be thrown
 */
export const getOdfError = (type: OdfErrorType, config: OdfContainerConfig, info = ''): OdfError => {
    const message = ERROR_MESSAGES[type](info);
    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new OdfError(type, ERRORHEADER + message);
};

/**
 * Wraps an error coming from yauzl or fs with the package prefix.
 * Errors that are already OdfErrors are returned as they are.
 *
 * @param error - The original error object
 * @param config - Container configuration
 * @param filePath - Optional file path, used to report corruption
 */
export const getWrappedError = (error: unknown, config: OdfContainerConfig, filePath?: string): OdfError => {
    if (error instanceof OdfError) return error;

    if (filePath && isCorruptionError(error)) {
        return getOdfError(OdfErrorType.FILE_CORRUPTED, config, filePath);
    }

    const message = error instanceof Error ? error.message : String(error);
    return getOdfError(OdfErrorType.READ_FAILED, config, message);
};

/**
 * Detects archive corruption from the messages yauzl and zlib produce.
 */
export const isCorruptionError = (error: unknown): boolean => {
    const message = error instanceof Error ? error.message : String(error);
    return message.includes('end of central directory record') ||
        message.includes('invalid central directory file header') ||
        message.includes('invalid local file header') ||
        message.includes('invalid comment length') ||
        message.includes('invalid distance too far back') ||
        message.includes('unexpected end of file');
};

/**
 * Conditionally logs a warning message to the console.
 * Used for non-fatal conditions that shouldn't stop the current operation.
 *
 * @param message - The warning message
 * @param config - Container configuration
 * @param error - Optional original error object for more context
 */
export const logWarning = (message: string, config: OdfContainerConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};
