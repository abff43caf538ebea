/**
 * @file rst.ts
 * @module generator/rst
 * @license MIT
 *
 * @fileoverview Small reStructuredText building blocks shared by the page
 * generators.
 */

/**
 * A section title underlined with `symbol`, surrounded by newlines.
 */
export function rstSection(title: string, symbol: string = '='): string {
    return '\n' + title + '\n' + symbol.repeat(title.length) + '\n';
}

/**
 * A Breathe directive pulling in a symbol's full documentation, e.g.
 * `.. doxygenclass:: libsemigroups::WordGraph`.
 *
 * @param kind - Doxygen kind (`class`, `function`, `typedef`, ...)
 * @param scope - Qualified name of the primary symbol
 * @param member - Member signature relative to `scope`, if any
 * @param project - Breathe project name
 */
export function rstDoxygenDirective(kind: string, scope: string, member: string | null, project: string): string {
    const target = member !== null ? `${scope}::${member}` : scope;
    return `\n.. doxygen${kind}:: ${target}\n   :project: ${project}\n`;
}

export const LIST_TABLE_HEADER = '.. list-table::\n   :widths: 50 50\n   :header-rows: 0\n\n';

export const HIDDEN_TOCTREE_HEADER = '\n.. toctree::\n   :hidden:\n';

/**
 * One two-column row of a `list-table`.
 */
export function listTableRow(left: string, right: string): string {
    return `   * - ${left}\n     - ${right}\n`;
}
