/**
 * XML Parsing Utilities
 *
 * Provides helper functions for parsing, navigating and serializing the XML
 * parts of an ODF package. The package core treats parts as opaque bytes; these
 * helpers are used where a part is read as a structure, such as the manifest.
 *
 * @module xmlUtils
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';

/**
 * Parses an XML string into a DOM Document object.
 *
 * Uses the @xmldom/xmldom library to parse XML strings in a Node.js environment.
 * This is necessary because Node.js doesn't have a built-in DOM parser like browsers do.
 *
 * @param xml - The XML content as a string
 * @returns A Document object that can be queried using standard DOM methods
 */
export const parseXmlString = (xml: string): Document => {
    const parser = new DOMParser();
    return parser.parseFromString(xml, 'text/xml');
};

/**
 * Serializes a document back to a string, keeping its XML declaration if it has one.
 */
export const serializeXml = (doc: Document): string => {
    return new XMLSerializer().serializeToString(doc);
};

/**
 * Gets all elements with a specific tag name and returns them as an array.
 *
 * @param element - The element or document to search within
 * @param tagName - The qualified tag name to search for (e.g., 'manifest:file-entry')
 * @returns An array of matching elements (empty array if none found)
 */
export const getElementsByTagName = (element: Element | Document, tagName: string): Element[] => {
    return Array.from(element.getElementsByTagName(tagName));
};
