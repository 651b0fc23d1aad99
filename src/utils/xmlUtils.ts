/**
 * XML Utilities
 *
 * Helpers for writing and reading the XML parts of a SpreadsheetML package.
 * Writing is plain string assembly; reading uses @xmldom/xmldom since Node.js
 * doesn't have a built-in DOM parser like browsers do.
 *
 * @module xmlUtils
 */

import { DOMParser } from '@xmldom/xmldom';

/** Declaration opening every XML part. */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const XML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&apos;'
};

/**
 * Escapes text for use in XML element content or attribute values.
 *
 * @example
 * ```typescript
 * escapeXml('R&D <"core">'); // 'R&amp;D &lt;&quot;core&quot;&gt;'
 * ```
 */
export const escapeXml = (text: string): string => text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

/**
 * Parses an XML string into a DOM Document object.
 *
 * @param xml - The XML content as a string
 * @returns A Document object that can be queried using standard DOM methods
 */
export const parseXmlString = (xml: string): Document => {
    const parser = new DOMParser();
    return parser.parseFromString(xml, "text/xml");
};

/**
 * Gets all elements with a specific tag name and returns them as an array.
 *
 * @param element - The element or document to search within
 * @param tagName - The tag name to search for (e.g., 'row', 'c', 'sheet')
 * @returns An array of matching elements (empty array if none found)
 */
export const getElementsByTagName = (element: Element | Document, tagName: string): Element[] => {
    return Array.from(element.getElementsByTagName(tagName));
};

/**
 * Gets direct child elements with a specific tag name.
 * Unlike getElementsByTagName, this does not search recursively.
 *
 * @param parent - The parent element
 * @param tagName - The tag name to search for
 * @returns An array of matching direct child elements
 */
export const getDirectChildren = (parent: Element, tagName: string): Element[] => {
    const result: Element[] = [];
    if (!parent.childNodes) return result;

    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (isElement(child) && child.tagName === tagName) {
            result.push(child);
        }
    }
    return result;
};

const isElement = (node: Node): node is Element => node.nodeType === 1; // 1 = ELEMENT_NODE
