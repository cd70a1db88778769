/**
 * XML parsing utility functions.
 */

import { JSDOM } from 'jsdom';

let parserWindow: JSDOM | null = null;

/** DOMParser of a shared, empty jsdom window */
function getDOMParser(): DOMParser {
    if (!parserWindow) parserWindow = new JSDOM('');
    return new parserWindow.window.DOMParser();
}

/** Parse XML string to Document */
export function parseXML(xmlString: string): Document {
    const doc = getDOMParser().parseFromString(xmlString, 'text/xml');

    // Check for parse errors
    const parseError = doc.getElementsByTagName('parsererror')[0];
    if (parseError) {
        throw new Error(`XML parse error: ${parseError.textContent ?? 'unknown error'}`);
    }

    return doc;
}

/** Element children in document order (text and comments skipped) */
export function childElements(parent: Element): Element[] {
    return Array.from(parent.children);
}

/** Attribute value, or the default when absent */
export function getAttribute(el: Element, name: string, defaultValue = ''): string {
    return el.getAttribute(name) ?? defaultValue;
}

/** All attributes except the excluded ones, in document order */
export function attributeMap(el: Element, exclude: ReadonlySet<string>): Map<string, string> {
    const result = new Map<string, string>();
    for (const attr of Array.from(el.attributes)) {
        if (!exclude.has(attr.name)) result.set(attr.name, attr.value);
    }
    return result;
}
