/**
 * @file xml-tree.ts
 * @module doxygen/xml-tree
 * @license MIT
 *
 * @fileoverview Parses Doxygen XML with cheerio and exposes the small set of
 * tree queries the database and renderer need.
 */

import * as cheerio from 'cheerio';
import { isCDATA, isTag, isText, type AnyNode } from 'domhandler';
import type { DoxyElement, DoxyNode } from './types.js';

/** Tag of the synthetic element wrapping the top-level XML nodes. */
export const DOCUMENT_TAG = '#document';

/**
 * Parse an XML document into an immutable {@link DoxyElement} tree.
 *
 * Comments, processing instructions and the XML declaration are dropped.
 * CDATA sections become plain text.
 */
export function parseXml(xml: string): DoxyElement {
    const $ = cheerio.load(xml, { xml: true });
    return {
        type: 'element',
        tag: DOCUMENT_TAG,
        attrs: {},
        children: convertAll($.root().contents().toArray()),
    };
}

function convertAll(nodes: AnyNode[]): DoxyNode[] {
    const result: DoxyNode[] = [];
    for (const node of nodes) {
        if (isText(node)) {
            result.push({ type: 'text', text: node.data });
        } else if (isCDATA(node)) {
            result.push(...convertAll(node.children));
        } else if (isTag(node)) {
            result.push({
                type: 'element',
                tag: node.name,
                attrs: { ...node.attribs },
                children: convertAll(node.children),
            });
        }
    }
    return result;
}

export function isElement(node: DoxyNode): node is DoxyElement {
    return node.type === 'element';
}

/**
 * Concatenated character data of a node and all its descendants.
 */
export function textOf(node: DoxyNode): string {
    if (node.type === 'text') {
        return node.text;
    }
    return node.children.map(textOf).join('');
}

export function attr(element: DoxyElement, name: string): string | undefined {
    return element.attrs[name];
}

export function childElements(element: DoxyElement): DoxyElement[] {
    return element.children.filter(isElement);
}

/**
 * First direct child with the given tag.
 */
export function child(element: DoxyElement, tag: string): DoxyElement | undefined {
    return childElements(element).find(c => c.tag === tag);
}

/**
 * First descendant (document order, the element itself excluded) with the
 * given tag.
 */
export function find(element: DoxyElement, tag: string): DoxyElement | undefined {
    for (const c of childElements(element)) {
        if (c.tag === tag) {
            return c;
        }
        const nested = find(c, tag);
        if (nested) {
            return nested;
        }
    }
    return undefined;
}

/**
 * Every descendant with the given tag, in document order.
 */
export function findAll(element: DoxyElement, tag: string): DoxyElement[] {
    const result: DoxyElement[] = [];
    for (const c of childElements(element)) {
        if (c.tag === tag) {
            result.push(c);
        }
        result.push(...findAll(c, tag));
    }
    return result;
}
