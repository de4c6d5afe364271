/**
 * Well-known ODF part names and media types.
 *
 * @module constants
 */

import type { OdfMimeType, Packaging } from './types';

export const ODF_MIMETYPE = 'mimetype';
export const ODF_CONTENT = 'content.xml';
export const ODF_META = 'meta.xml';
export const ODF_SETTINGS = 'settings.xml';
export const ODF_STYLES = 'styles.xml';
export const ODF_MANIFEST = 'META-INF/manifest.xml';

/** XML parts written right after `mimetype` in a ZIP package, in this order. */
export const ODF_XML_PARTS = [ODF_CONTENT, ODF_META, ODF_SETTINGS, ODF_STYLES] as const;

export const PACKAGINGS: readonly Packaging[] = ['zip', 'folder'];

export const FOLDER_SUFFIX = '.folder';

/**
 * File extension to media type.
 * Every value of this table is a mimetype `OdfContainer.open` accepts.
 */
export const ODF_EXTENSIONS: Readonly<Record<string, OdfMimeType>> = {
    odt: 'application/vnd.oasis.opendocument.text',
    ott: 'application/vnd.oasis.opendocument.text-template',
    odm: 'application/vnd.oasis.opendocument.text-master',
    otm: 'application/vnd.oasis.opendocument.text-master-template',
    oth: 'application/vnd.oasis.opendocument.text-web',
    ods: 'application/vnd.oasis.opendocument.spreadsheet',
    ots: 'application/vnd.oasis.opendocument.spreadsheet-template',
    odp: 'application/vnd.oasis.opendocument.presentation',
    otp: 'application/vnd.oasis.opendocument.presentation-template',
    odg: 'application/vnd.oasis.opendocument.graphics',
    otg: 'application/vnd.oasis.opendocument.graphics-template',
    odc: 'application/vnd.oasis.opendocument.chart',
    otc: 'application/vnd.oasis.opendocument.chart-template',
    odf: 'application/vnd.oasis.opendocument.formula',
    otf: 'application/vnd.oasis.opendocument.formula-template',
    odi: 'application/vnd.oasis.opendocument.image',
    oti: 'application/vnd.oasis.opendocument.image-template',
    odb: 'application/vnd.oasis.opendocument.database',
};

const KNOWN_MIMETYPES: ReadonlySet<string> = new Set(Object.values(ODF_EXTENSIONS));

export const isOdfMimeType = (value: string): value is OdfMimeType => KNOWN_MIMETYPES.has(value);
