/**
 * ZIP Archive Utilities
 *
 * Reading and writing of the ZIP archives ODF packages are made of.
 *
 * ODF Package Structure:
 * - `mimetype`: first member, STORED (no compression)
 * - `content.xml`, `styles.xml`, `meta.xml`, `settings.xml`: DEFLATED
 * - `META-INF/manifest.xml`: list of every member and its media type
 * - `Pictures/*`, `Thumbnails/*`, ...: any other member
 *
 * Reading goes through yauzl, one archive open per call; nothing keeps a file
 * descriptor open between calls. Writing goes through fflate's `zipSync`, which
 * emits members in the insertion order of the object it is given and writes CRC
 * and sizes in every local header (no data descriptors).
 *
 * @module zipUtils
 */

import yauzl from 'yauzl';
import concat from 'concat-stream';
import { zipSync } from 'fflate';
import type { Zippable } from 'fflate';
import * as fs from 'fs';

/**
 * Represents a file extracted from a ZIP archive.
 */
export interface ZipFileContent {
    /**
     * The relative path of the member within the ZIP archive.
     * @example "content.xml", "Pictures/logo.png", "Configurations2/"
     */
    path: string;

    /**
     * The member content. Empty for directory entries.
     */
    content: Buffer;
}

/**
 * A member to write with `createZip`.
 */
export interface ZipEntryInput {
    path: string;
    content: Uint8Array;
    /** Write with the STORE method instead of DEFLATE. */
    store?: boolean;
}

/** Local file header signature, "PK\x03\x04". */
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

/** Compression level for deflated members. */
const DEFLATE_LEVEL = 6;

/**
 * Tells whether the input starts with a ZIP local file header.
 * A path is probed by reading its first four bytes; directories and missing files are not ZIPs.
 *
 * @param input - A file path or the archive bytes
 */
export const isZipFile = (input: string | Buffer): boolean => {
    if (Buffer.isBuffer(input)) {
        return input.length >= ZIP_MAGIC.length && input.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC);
    }

    let stats: fs.Stats;
    try {
        stats = fs.statSync(input);
    } catch {
        return false;
    }
    if (!stats.isFile()) return false;

    const head = Buffer.alloc(ZIP_MAGIC.length);
    const fd = fs.openSync(input, 'r');
    try {
        const bytesRead = fs.readSync(fd, head, 0, head.length, 0);
        return bytesRead === head.length && head.equals(ZIP_MAGIC);
    } finally {
        fs.closeSync(fd);
    }
};

const openZip = (input: string | Buffer, callback: (err: Error | null, zipfile?: yauzl.ZipFile) => void): void => {
    // lazyEntries: true means we manually control when to read each entry
    const options: yauzl.Options = { lazyEntries: true, autoClose: true };
    if (Buffer.isBuffer(input)) {
        yauzl.fromBuffer(input, options, callback);
    } else {
        yauzl.open(input, options, callback);
    }
};

/**
 * Extracts members from a ZIP archive with optional filtering.
 *
 * This function:
 * 1. Opens the archive from a path or a Buffer
 * 2. Iterates through all entries in the archive
 * 3. Applies a filter function to determine which members to extract
 * 4. Extracts matching members and returns them in archive order
 *
 * @param zipInput - The archive path or the archive bytes
 * @param filterFn - Receives the member name and returns true to extract it
 * @returns A promise resolving to the extracted members
 * @throws {Error} If the archive cannot be opened or an entry cannot be read
 *
 * @example
 * ```typescript
 * // Read the whole package at once
 * const all = await extractFiles(odtBuffer, () => true);
 *
 * // Read a single member
 * const [content] = await extractFiles('report.odt', (name) => name === 'content.xml');
 * ```
 */
export const extractFiles = (zipInput: string | Buffer, filterFn: (fileName: string) => boolean): Promise<ZipFileContent[]> => {
    return new Promise((resolve, reject) => {
        openZip(zipInput, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error('Failed to open zip file'));

            const extractedFiles: ZipFileContent[] = [];

            zipfile.readEntry();

            zipfile.on('entry', (entry: yauzl.Entry) => {
                if (!filterFn(entry.fileName)) {
                    zipfile.readEntry();
                    return;
                }
                zipfile.openReadStream(entry, (err, readStream) => {
                    if (err) return reject(err);
                    if (!readStream) return reject(new Error('Failed to open read stream'));

                    readStream.on('error', reject);
                    // Collect the chunks into a single Buffer, empty for directory entries
                    readStream.pipe(concat({ encoding: 'buffer' }, (data: Buffer) => {
                        extractedFiles.push({
                            path: entry.fileName,
                            content: data
                        });
                        zipfile.readEntry();
                    }));
                });
            });

            zipfile.on('end', () => resolve(extractedFiles));
            zipfile.on('error', reject);
        });
    });
};

/**
 * Lists the member names of a ZIP archive, directory entries included, without reading any data.
 *
 * @param zipInput - The archive path or the archive bytes
 */
export const listEntries = (zipInput: string | Buffer): Promise<string[]> => {
    return new Promise((resolve, reject) => {
        openZip(zipInput, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error('Failed to open zip file'));

            const names: string[] = [];
            zipfile.readEntry();
            zipfile.on('entry', (entry: yauzl.Entry) => {
                names.push(entry.fileName);
                zipfile.readEntry();
            });
            zipfile.on('end', () => resolve(names));
            zipfile.on('error', reject);
        });
    });
};

/**
 * Writes a ZIP archive holding the given members, in the given order.
 * Members flagged `store` use the STORE method, every other one is deflated.
 *
 * Object keys that are array indices (`"0"`, `"12"`) are enumerated before
 * any other key, so such a member name would move to the front of the archive.
 *
 * @example
 * ```typescript
 * const bytes = createZip([
 *     { path: 'mimetype', content: Buffer.from('application/vnd.oasis.opendocument.text'), store: true },
 *     { path: 'content.xml', content: contentXml },
 * ]);
 * ```
 */
export const createZip = (entries: ZipEntryInput[]): Buffer => {
    const files: Zippable = {};
    for (const entry of entries) {
        files[entry.path] = [entry.content, { level: entry.store ? 0 : DEFLATE_LEVEL }];
    }
    return Buffer.from(zipSync(files));
};
