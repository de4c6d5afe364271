/**
 * odfpack - OpenDocument package core
 *
 * Reads, mutates and writes ODF packages (ODT, ODS, ODP, ODG, ... and their
 * templates) as collections of named parts, backed by a ZIP archive or by an
 * expanded folder, with conversion between the two on save.
 *
 * **Quick Start:**
 * ```typescript
 * import { OdfContainer } from 'odfpack';
 *
 * const container = await OdfContainer.open('letter.odt');
 * console.log(container.mimetype);          // application/vnd.oasis.opendocument.text
 * console.log(await container.getParts());  // ['mimetype', 'content.xml', ...]
 *
 * container.setPart('Pictures/logo.png', logoBytes);
 * await container.save('letter-with-logo.odt');
 * ```
 *
 * @packageDocumentation
 * @module odfpack
 */
import { OdfContainer } from './OdfContainer';

export { OdfContainer };
export { Manifest, MANIFEST_NAMESPACE } from './Manifest';
export type { PartAccess } from './Manifest';
export {
    ODF_CONTENT,
    ODF_EXTENSIONS,
    ODF_MANIFEST,
    ODF_META,
    ODF_MIMETYPE,
    ODF_SETTINGS,
    ODF_STYLES,
    isOdfMimeType,
} from './constants';
export { normalizePartPath } from './store/PartStore';
export { OdfError, OdfErrorType } from './utils/errorUtils';
export type { ContainerSource, ManifestEntry, OdfContainerConfig, OdfMimeType, Packaging, SaveOptions, SaveTarget } from './types';
export default OdfContainer;
