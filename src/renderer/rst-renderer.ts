/**
 * @file rst-renderer.ts
 * @module renderer/rst-renderer
 * @license MIT
 *
 * @fileoverview Renders Doxygen XML descriptors as reStructuredText for the
 * Sphinx C++ domain.
 */

import { attr, child, find, findAll, textOf } from '../doxygen/xml-tree.js';
import type { DoxyElement, DoxyNode } from '../doxygen/types.js';
import { classifyElement, type ElementKind } from './element-kind.js';
import { RenderContext } from './render-context.js';

/**
 * Directive opening a rendered `compounddef` or `memberdef`, by `kind`.
 */
export const DIRECTIVE_PREFIXES: ReadonlyMap<string, string> = new Map([
    ['class', '.. cpp:class:: '],
    ['struct', '.. cpp:struct:: '],
    ['union', '.. cpp:union:: '],
    ['namespace', '.. cpp:namespace:: '],
    ['function', '.. cpp:function:: '],
    ['friend', '.. cpp:function:: '],
    ['enum', '.. cpp:enum:: '],
    ['typedef', '.. cpp:type:: '],
    ['variable', '.. cpp:member:: '],
]);

/**
 * Converts Doxygen XML elements to reStructuredText.
 *
 * Rendering is a recursive walk. Each element is classified with
 * {@link classifyElement} and the matching case emits markup around its
 * recursively rendered children. Indentation follows the
 * {@link RenderContext}, which always returns to its previous depth.
 *
 * @example
 * ```typescript
 * const renderer = new RstRenderer('libsemigroups');
 * const brief = child(memberdef, 'briefdescription');
 * if (brief) {
 *     console.log(renderer.render(brief));
 * }
 * ```
 */
export class RstRenderer {
    private namespace: string;

    /**
     * @param namespace - Root library namespace; return types are qualified
     * up to and including it
     */
    constructor(namespace: string) {
        this.namespace = namespace;
    }

    render(element: DoxyElement, context: RenderContext = new RenderContext()): string {
        const tags = attr(element, 'kind') === 'enum' ? [element.tag, 'enum'] : [element.tag];
        let result = context.within(tags, () => this.renderElement(element, context));
        if (element.tag === 'itemizedlist') {
            result += '\n\n' + context.indent();
        }
        return result;
    }

    private renderElement(element: DoxyElement, context: RenderContext): string {
        let result = '';
        let children: readonly DoxyNode[] = element.children;

        if (element.tag === 'compounddef' || element.tag === 'memberdef') {
            result += DIRECTIVE_PREFIXES.get(attr(element, 'kind') ?? '') ?? '';
        }
        if (element.tag === 'compounddef') {
            children = templateParamsFirst(children);
        }
        if (attr(element, 'kind') === 'enum') {
            children = nameAndBriefFirst(element);
        }

        for (const node of children) {
            result += node.type === 'text'
                ? renderText(node.text)
                : this.renderChild(node, classifyElement(node, context), context);
        }
        return result;
    }

    private renderChild(element: DoxyElement, kind: ElementKind, context: RenderContext): string {
        switch (kind) {
            case 'declaration':
                return this.render(element, context);
            case 'enum-name':
                return textOf(element).trim();
            case 'enumvalue':
                return '\n\n' + context.indent() + '.. cpp:enumerator:: ' + this.render(element, context);
            case 'definition':
                return this.renderDefinition(textOf(element));
            case 'argsstring':
                return textOf(element);
            case 'briefdescription':
                return '\n\n' + context.indent() + this.render(element, context);
            case 'detaileddescription':
                return '\n' + context.indent() + this.render(element, context);
            case 'templateparamlist':
                return renderTemplateParams(element);
            case 'computeroutput': {
                const text = textOf(element);
                return text.length !== 0 ? ' ``' + text + '``' : '';
            }
            case 'formula':
                return ' :math:`' + textOf(element).replace(/\$/g, '') + '`';
            case 'title':
                return '\n\n' + context.indent() + ':' + textOf(element).toLowerCase() + ': ';
            case 'para': {
                let result = this.render(element, context);
                const top = context.top();
                if (top === 'detaileddescription' || top === 'briefdescription') {
                    result += '\n\n' + context.indent();
                }
                return result;
            }
            case 'simplesect-return':
                return '\n\n' + context.indent() + ':returns: ' + this.render(element, context);
            case 'simplesect-par':
                return this.render(element, context);
            case 'simplesect-see':
                return '\n\n' + context.indent() + '.. seealso:: ' + this.render(element, context);
            case 'parameterlist-templateparam':
                return this.renderFieldList(element, 'tparam', context);
            case 'parameterlist-param':
                return this.renderFieldList(element, 'param', context);
            case 'parameterlist-exception':
                return this.renderExceptions(element, context);
            case 'ref': {
                const role = attr(element, 'kindref') === 'member' ? 'member' : 'any';
                return ` :cpp:${role}:\`${textOf(element)}\` `;
            }
            case 'emphasis':
                return ` *${textOf(element)}*`;
            case 'bold':
                return '\n\n' + context.indent() + `**${textOf(element)}**`;
            case 'compoundname':
                return afterLastScope(textOf(element));
            case 'ulink':
                return ` \`${textOf(element)} <${attr(element, 'url') ?? ''}>\`_`;
            case 'itemizedlist':
                return '\n' + this.render(element, context);
            case 'listitem':
                return '\n' + context.indent() + '* ' + this.render(element, context);
            case 'programlisting':
                return '\n\n' + context.indent() + '.. code-block::\n' + this.render(element, context);
            case 'codeline':
                return '\n' + context.indent() + this.render(element, context);
            case 'highlight':
                return this.render(element, context);
            case 'sp':
                return ' ';
            case 'skip':
                return '';
            case 'passthrough':
                return this.renderElement(element, context);
            default: {
                const unhandled: never = kind;
                throw new Error(`unhandled element kind: ${String(unhandled)}`);
            }
        }
    }

    /**
     * One `:tparam name: ...` or `:param name: ...` field per parameter
     * item, each paired with its own description.
     */
    private renderFieldList(list: DoxyElement, field: 'tparam' | 'param', context: RenderContext): string {
        let result = '';
        for (const item of findAll(list, 'parameteritem')) {
            result += '\n\n' + context.indent();
            const name = find(item, 'parametername');
            const description = find(item, 'parameterdescription');
            result += `:${field} ${name ? textOf(name) : ''}: `;
            result += description ? this.render(description, context) : '';
        }
        return result;
    }

    private renderExceptions(list: DoxyElement, context: RenderContext): string {
        let result = '';
        for (const item of findAll(list, 'parameteritem')) {
            result += '\n\n' + context.indent();
            result += ':throws:\n' + context.indent() + ' '.repeat(3);
            const name = find(item, 'parametername');
            const description = find(item, 'parameterdescription');
            result += name ? this.render(name, context) : '';
            result += description ? this.render(description, context) : '';
        }
        return result;
    }

    /**
     * Render the text of a `definition` element as a declaration:
     *
     * - `using` aliases as `name = target`, or just `name` when the target
     *   lives in a `detail` namespace
     * - copy/move assignment as `Type &operator=`
     * - constructors (last scope starts with the member name) unqualified
     * - everything else with the return type qualified up to the root
     *   namespace, followed by the unqualified name
     */
    renderDefinition(definition: string): string {
        if (definition.startsWith('using')) {
            return renderAlias(definition);
        }
        const scopes = definition.split('::');
        const name = scopes[scopes.length - 1];
        if (scopes.length === 1) {
            return definition;
        }
        let result = '';
        if (name === 'operator=') {
            result += scopes[0].slice(0, scopes[0].indexOf('&') + 1);
        } else if (!scopes[scopes.length - 2].startsWith(name)) {
            const qualified: string[] = [];
            for (const scope of scopes) {
                qualified.push(scope);
                if (scope.endsWith(this.namespace)) {
                    break;
                }
            }
            const returnType = qualified.join('::');
            result += returnType.slice(0, returnType.lastIndexOf(' ') + 1);
        }
        return result + name;
    }
}

/**
 * A text leaf: trimmed, and separated from what precedes it by a space
 * unless it is empty, a full stop, or starts with an uppercase letter.
 */
export function renderText(text: string): string {
    const trimmed = text.trim();
    if (trimmed === '') {
        return '';
    }
    const separate = trimmed !== '.' && !/^\p{Lu}/u.test(trimmed);
    return (separate ? ' ' : '') + trimmed;
}

function renderTemplateParams(list: DoxyElement): string {
    const params = findAll(list, 'param').map(param => {
        const type = find(param, 'type');
        const declname = find(param, 'declname');
        let result = type ? textOf(type) : '';
        if (declname) {
            result += ' ' + textOf(declname);
        }
        return result;
    });
    return 'template <' + params.join(', ') + '>';
}

function renderAlias(definition: string): string {
    const eq = definition.indexOf('=');
    const lhsRaw = eq === -1 ? definition : definition.slice(0, eq);
    const lhs = lhsRaw.includes('::')
        ? afterLastScope(lhsRaw).trim()
        : lhsRaw.replace(/^using/, '').trim();
    if (eq === -1) {
        return lhs;
    }
    const rhs = definition.slice(eq + 1);
    if (rhs.includes('detail::')) {
        return lhs.replace(/using/g, '').trim();
    }
    const target = rhs.replace(/typename/g, '').trim().replace(/typedef/g, '').trim();
    return lhs + ' = ' + target;
}

function afterLastScope(name: string): string {
    const pos = name.lastIndexOf('::');
    return pos === -1 ? name : name.slice(pos + 2);
}

function templateParamsFirst(children: readonly DoxyNode[]): readonly DoxyNode[] {
    const index = children.findIndex(c => c.type === 'element' && c.tag === 'templateparamlist');
    if (index === -1) {
        return children;
    }
    return [children[index], ...children.filter((_, i) => i !== index)];
}

/**
 * Children of an enum with its name and brief description moved to the
 * front, so the directive line and summary precede the enumerators.
 */
function nameAndBriefFirst(element: DoxyElement): readonly DoxyNode[] {
    const name = child(element, 'name');
    const brief = child(element, 'briefdescription');
    const rest = element.children.filter(
        c => c.type === 'text' || (c.tag !== 'name' && c.tag !== 'briefdescription')
    );
    const first: DoxyNode[] = [];
    if (name) {
        first.push(name);
    }
    if (brief) {
        first.push(brief);
    }
    return [...first, ...rest];
}
