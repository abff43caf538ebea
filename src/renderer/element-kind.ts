/**
 * @file element-kind.ts
 * @module renderer/element-kind
 * @license MIT
 *
 * @fileoverview Classifies Doxygen XML elements into the closed set of cases
 * the reStructuredText renderer handles.
 */

import { attr } from '../doxygen/xml-tree.js';
import type { DoxyElement } from '../doxygen/types.js';
import type { RenderContext } from './render-context.js';

/**
 * Every way an element can be rendered.
 *
 * `skip` covers metadata Doxygen attaches to a symbol that never appears
 * in prose (types, locations, member listings). `passthrough` is anything
 * else not listed here: its children are rendered with nothing added.
 */
export type ElementKind =
    | 'declaration'
    | 'enum-name'
    | 'enumvalue'
    | 'definition'
    | 'argsstring'
    | 'briefdescription'
    | 'detaileddescription'
    | 'templateparamlist'
    | 'computeroutput'
    | 'formula'
    | 'title'
    | 'para'
    | 'simplesect-return'
    | 'simplesect-par'
    | 'simplesect-see'
    | 'parameterlist-templateparam'
    | 'parameterlist-param'
    | 'parameterlist-exception'
    | 'ref'
    | 'emphasis'
    | 'bold'
    | 'compoundname'
    | 'ulink'
    | 'itemizedlist'
    | 'listitem'
    | 'programlisting'
    | 'codeline'
    | 'highlight'
    | 'sp'
    | 'skip'
    | 'passthrough';

export const SKIPPED_TAGS: ReadonlySet<string> = new Set([
    'name',
    'enumvalue',
    'type',
    'location',
    'param',
    'declname',
    'defname',
    'defval',
    'initializer',
    'inbodydescription',
    'qualifiedname',
    'sectiondef',
    'listofallmembers',
    'includes',
    'innerclass',
    'innernamespace',
    'innerfile',
    'basecompoundref',
    'derivedcompoundref',
    'inheritancegraph',
    'collaborationgraph',
    'incdepgraph',
    'invincdepgraph',
    'reimplements',
    'reimplementedby',
    'references',
    'referencedby',
    'anchor',
]);

const SIMPLE_TAGS: ReadonlyMap<string, ElementKind> = new Map<string, ElementKind>([
    ['compounddef', 'declaration'],
    ['memberdef', 'declaration'],
    ['definition', 'definition'],
    ['argsstring', 'argsstring'],
    ['briefdescription', 'briefdescription'],
    ['detaileddescription', 'detaileddescription'],
    ['templateparamlist', 'templateparamlist'],
    ['computeroutput', 'computeroutput'],
    ['formula', 'formula'],
    ['title', 'title'],
    ['para', 'para'],
    ['ref', 'ref'],
    ['emphasis', 'emphasis'],
    ['bold', 'bold'],
    ['compoundname', 'compoundname'],
    ['ulink', 'ulink'],
    ['itemizedlist', 'itemizedlist'],
    ['listitem', 'listitem'],
    ['programlisting', 'programlisting'],
    ['codeline', 'codeline'],
    ['highlight', 'highlight'],
    ['sp', 'sp'],
]);

/**
 * Decide how to render `element` given where it sits.
 */
export function classifyElement(element: DoxyElement, context: RenderContext): ElementKind {
    if (context.has('enum')) {
        if (element.tag === 'name') {
            return 'enum-name';
        }
        if (element.tag === 'enumvalue') {
            return 'enumvalue';
        }
    }

    if (element.tag === 'simplesect') {
        switch (attr(element, 'kind')) {
            case 'return':
                return 'simplesect-return';
            case 'par':
                return 'simplesect-par';
            case 'see':
                return 'simplesect-see';
            default:
                return 'passthrough';
        }
    }

    if (element.tag === 'parameterlist') {
        switch (attr(element, 'kind')) {
            case 'templateparam':
                return 'parameterlist-templateparam';
            case 'param':
                return 'parameterlist-param';
            case 'exception':
                return 'parameterlist-exception';
            default:
                return 'passthrough';
        }
    }

    const simple = SIMPLE_TAGS.get(element.tag);
    if (simple !== undefined) {
        return simple;
    }
    return SKIPPED_TAGS.has(element.tag) ? 'skip' : 'passthrough';
}
