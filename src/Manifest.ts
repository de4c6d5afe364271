/**
 * Structured view of `META-INF/manifest.xml`.
 *
 * The container itself keeps the manifest as opaque bytes and only cares that
 * it is written last. This class is for callers that add or remove parts and
 * need the manifest to list them.
 *
 * @module Manifest
 */

import { ODF_MANIFEST } from './constants';
import type { ManifestEntry, OdfContainerConfig } from './types';
import { getOdfError, OdfErrorType } from './utils/errorUtils';
import { getElementsByTagName, parseXmlString, serializeXml } from './utils/xmlUtils';

export const MANIFEST_NAMESPACE = 'urn:oasis:names:tc:opendocument:xmlns:manifest:1.0';

const ROOT_TAG = 'manifest:manifest';
const ENTRY_TAG = 'manifest:file-entry';
const FULL_PATH = 'manifest:full-path';
const MEDIA_TYPE = 'manifest:media-type';

/**
 * What the manifest needs from a container: read and replace one part.
 */
export interface PartAccess {
    getPart(partPath: string): Promise<Buffer | undefined>;
    setPart(partPath: string, data: Buffer | Uint8Array | string): void;
}

export class Manifest {
    private constructor(private readonly doc: Document, private readonly config: OdfContainerConfig) {}

    /**
     * Parses a manifest.
     * @throws {OdfError} `IMPROPER_ARGUMENTS` when the root element is not `manifest:manifest`
     */
    static parse(xml: string | Buffer, config: OdfContainerConfig = {}): Manifest {
        const doc = parseXmlString(typeof xml === 'string' ? xml : xml.toString('utf8'));
        const root = doc.documentElement;
        if (!root || root.tagName !== ROOT_TAG) {
            throw getOdfError(OdfErrorType.IMPROPER_ARGUMENTS, config, `${ODF_MANIFEST} has no ${ROOT_TAG} root`);
        }
        return new Manifest(doc, config);
    }

    /**
     * A new manifest with a single root entry `/` of the given media type.
     */
    static create(mimetype: string, config: OdfContainerConfig = {}): Manifest {
        const manifest = Manifest.parse(
            '<?xml version="1.0" encoding="UTF-8"?>\n' +
            `<${ROOT_TAG} xmlns:manifest="${MANIFEST_NAMESPACE}" manifest:version="1.2"></${ROOT_TAG}>`,
            config
        );
        manifest.addFullPath('/', mimetype);
        return manifest;
    }

    /**
     * Reads the manifest part of a container. Resolves to `undefined` when the container has none.
     */
    static async fromContainer(container: PartAccess, config: OdfContainerConfig = {}): Promise<Manifest | undefined> {
        const data = await container.getPart(ODF_MANIFEST);
        return data ? Manifest.parse(data, config) : undefined;
    }

    /** Every `manifest:full-path`, in document order. */
    getPaths(): string[] {
        return this.entries().map(entry => entry.fullPath);
    }

    /** Every entry with its media type, in document order. */
    getPathMedias(): ManifestEntry[] {
        return this.entries();
    }

    /** Media type declared for `fullPath`, or `undefined` when it has no entry. */
    getMediaType(fullPath: string): string | undefined {
        const element = this.findEntry(fullPath);
        return element ? element.getAttribute(MEDIA_TYPE) ?? '' : undefined;
    }

    /**
     * @throws {OdfError} `MANIFEST_ENTRY_NOT_FOUND`
     */
    setMediaType(fullPath: string, mediaType: string): void {
        const element = this.findEntry(fullPath);
        if (!element) {
            throw getOdfError(OdfErrorType.MANIFEST_ENTRY_NOT_FOUND, this.config, fullPath);
        }
        element.setAttribute(MEDIA_TYPE, mediaType);
    }

    /**
     * Adds an entry for `fullPath`, or updates its media type when it already has one.
     */
    addFullPath(fullPath: string, mediaType = ''): void {
        if (this.findEntry(fullPath)) {
            this.setMediaType(fullPath, mediaType);
            return;
        }
        const element = this.doc.createElementNS(MANIFEST_NAMESPACE, ENTRY_TAG);
        element.setAttributeNS(MANIFEST_NAMESPACE, FULL_PATH, fullPath);
        element.setAttributeNS(MANIFEST_NAMESPACE, MEDIA_TYPE, mediaType);
        this.root().appendChild(element);
    }

    /**
     * @throws {OdfError} `MANIFEST_ENTRY_NOT_FOUND`
     */
    delFullPath(fullPath: string): void {
        const element = this.findEntry(fullPath);
        if (!element || !element.parentNode) {
            throw getOdfError(OdfErrorType.MANIFEST_ENTRY_NOT_FOUND, this.config, fullPath);
        }
        element.parentNode.removeChild(element);
    }

    serialize(): Buffer {
        return Buffer.from(serializeXml(this.doc), 'utf8');
    }

    /** Writes the manifest back as the container's `META-INF/manifest.xml`. */
    saveTo(container: PartAccess): void {
        container.setPart(ODF_MANIFEST, this.serialize());
    }

    private root(): Element {
        // parse() refuses documents without a root element
        const root = this.doc.documentElement;
        if (!root) {
            throw getOdfError(OdfErrorType.IMPROPER_ARGUMENTS, this.config, `${ODF_MANIFEST} has no ${ROOT_TAG} root`);
        }
        return root;
    }

    private entries(): ManifestEntry[] {
        return getElementsByTagName(this.doc, ENTRY_TAG).map(element => ({
            fullPath: element.getAttribute(FULL_PATH) ?? '',
            mediaType: element.getAttribute(MEDIA_TYPE) ?? '',
        }));
    }

    private findEntry(fullPath: string): Element | undefined {
        return getElementsByTagName(this.doc, ENTRY_TAG).find(element => element.getAttribute(FULL_PATH) === fullPath);
    }
}
