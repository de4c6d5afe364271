/**
 * `odf-folder`: converts an ODF file to a folder, or a folder back to an ODF file.
 *
 * ```
 * odf-folder report.odt          # writes report.odt.folder/
 * odf-folder report.odt.folder   # writes report.odt
 * ```
 *
 * An expanded package is handy for version control and for inspecting the XML parts.
 *
 * @module cli
 */

import * as fs from 'fs';
import * as path from 'path';
import { OdfContainer } from './OdfContainer';
import type { Packaging } from './types';
import { getOdfError, OdfErrorType } from './utils/errorUtils';

export const PROG = 'odf-folder';

const USAGE = `Usage: ${PROG} [--help] [--version] <file_or_folder>

Convert a standard ODF file (zip archive) to a folder structure,
or convert a folder structure back to an ODF file.`;

const readVersion = (): string => {
    const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
        return packageJson.version;
    }
    return '0.0.0';
};

/**
 * Saves a file as `<file>.folder`, or a folder as the file it was expanded from.
 * @throws {OdfError} `FILE_DOES_NOT_EXIST` when the path is neither a file nor a folder
 */
export const convertFolder = async (pathStr: string): Promise<void> => {
    let outPackaging: Packaging;
    try {
        outPackaging = fs.statSync(pathStr).isDirectory() ? 'zip' : 'folder';
    } catch {
        throw getOdfError(OdfErrorType.FILE_DOES_NOT_EXIST, { outputErrorToConsole: false }, pathStr);
    }
    const container = await OdfContainer.open(pathStr);
    await container.save(undefined, { packaging: outPackaging });
};

/**
 * Runs the command line and resolves to the process exit code.
 *
 * @param args - Arguments without the node executable and script path
 */
export const main = async (args: string[]): Promise<number> => {
    if (args.includes('--help') || args.includes('-h')) {
        console.log(USAGE);
        return 0;
    }
    if (args.includes('--version')) {
        console.log(`${PROG} v${readVersion()}`);
        return 0;
    }

    const [target] = args.filter(arg => !arg.startsWith('-'));
    try {
        if (!target) {
            throw getOdfError(OdfErrorType.IMPROPER_ARGUMENTS, { outputErrorToConsole: false }, 'missing file or folder');
        }
        await convertFolder(target);
        return 0;
    } catch (error) {
        console.error(USAGE);
        console.error('');
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
};
