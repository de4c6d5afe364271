import type { Readable, Writable } from 'stream';

/**
 * Configuration options for an OdfContainer.
 */
export interface OdfContainerConfig {
    /**
     * Flag to show warnings and errors on the console irrespective of your own handling.
     * Warnings cover missing structural parts at save time and failed backup/cleanup steps.
     * Default is true.
     */
    outputErrorToConsole?: boolean;
}

/**
 * How a container is packaged on disk.
 * - `zip`: a single ZIP archive (the regular `.odt`, `.ods`, ... file)
 * - `folder`: an expanded directory tree, one file per part
 */
export type Packaging = 'zip' | 'folder';

/**
 * Anything `OdfContainer.open` accepts: a path to a file or a folder, raw bytes, or a stream.
 */
export type ContainerSource = string | Buffer | Uint8Array | ArrayBuffer | Readable;

/**
 * Anything `OdfContainer.save` can write to.
 * Folder packaging only accepts a path.
 */
export type SaveTarget = string | Writable;

/**
 * Options for `OdfContainer.save`.
 */
export interface SaveOptions {
    /**
     * Output packaging. Defaults to the packaging the container was opened with.
     * Accepts any casing and surrounding whitespace, e.g. `' ZIP '`.
     */
    packaging?: string;
    /**
     * Move an existing target aside to `<stem>.backup<suffix>` instead of replacing it.
     * Default is false.
     */
    backup?: boolean;
}

/**
 * Known ODF document media types.
 */
export type OdfMimeType =
    | 'application/vnd.oasis.opendocument.text'
    | 'application/vnd.oasis.opendocument.text-template'
    | 'application/vnd.oasis.opendocument.text-master'
    | 'application/vnd.oasis.opendocument.text-master-template'
    | 'application/vnd.oasis.opendocument.text-web'
    | 'application/vnd.oasis.opendocument.spreadsheet'
    | 'application/vnd.oasis.opendocument.spreadsheet-template'
    | 'application/vnd.oasis.opendocument.presentation'
    | 'application/vnd.oasis.opendocument.presentation-template'
    | 'application/vnd.oasis.opendocument.graphics'
    | 'application/vnd.oasis.opendocument.graphics-template'
    | 'application/vnd.oasis.opendocument.chart'
    | 'application/vnd.oasis.opendocument.chart-template'
    | 'application/vnd.oasis.opendocument.formula'
    | 'application/vnd.oasis.opendocument.formula-template'
    | 'application/vnd.oasis.opendocument.image'
    | 'application/vnd.oasis.opendocument.image-template'
    | 'application/vnd.oasis.opendocument.database';

/**
 * A single `manifest:file-entry` of `META-INF/manifest.xml`.
 */
export interface ManifestEntry {
    /** @example "content.xml", "Pictures/logo.png", "/" */
    fullPath: string;
    /** Empty string when the entry declares no media type. */
    mediaType: string;
}
