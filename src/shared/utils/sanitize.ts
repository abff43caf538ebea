/**
 * @file sanitize.ts
 * @module utils/sanitize
 * @license MIT
 *
 * @fileoverview Maps qualified C++ names to output filenames and display names.
 */

/**
 * A named rewrite applied to a qualified name before the generic
 * non-word character replacement.
 */
export interface NameRule {
    /** Short identifier, used in tests and diagnostics */
    name: string;
    pattern: RegExp;
    replacement: string;
}

/**
 * Operator spellings that would otherwise collapse into runs of underscores.
 *
 * Order matters: `operator<` only matches at the end of a name so that it
 * does not shadow `operator<<`.
 */
export const OPERATOR_RULES: readonly NameRule[] = [
    { name: 'dereference', pattern: /operator\s*\*/g, replacement: 'operator_star' },
    { name: 'inequality', pattern: /operator!=/g, replacement: 'operator_not_eq' },
    { name: 'call', pattern: /operator\(\)/g, replacement: 'call_operator' },
    { name: 'less', pattern: /operator<$/g, replacement: 'operator_less' },
    { name: 'insertion', pattern: /operator<</g, replacement: 'insertion_operator' },
    { name: 'increment', pattern: /operator\+\+/g, replacement: 'operator_increment' },
    { name: 'equality', pattern: /operator==/g, replacement: 'operator_equal_to' },
    { name: 'greater', pattern: /operator>/g, replacement: 'operator_greater' },
];

/**
 * Convert a qualified C++ name into a lowercase, filesystem-safe identifier.
 *
 * @example
 * ```typescript
 * filenameFromCppName('libsemigroups::Presentation::operator==');
 * // 'libsemigroups__presentation__operator_equal_to'
 * ```
 */
export function filenameFromCppName(name: string): string {
    let result = name;
    for (const rule of OPERATOR_RULES) {
        result = result.replace(rule.pattern, rule.replacement);
    }
    return result.replace(/\W/g, '_').toLowerCase();
}

/**
 * Filename (without directory) of the overview page for a primary symbol.
 */
export function overviewFilename(name: string): string {
    return filenameFromCppName(name) + '.rst';
}

/**
 * Filename (without directory) of the subpage for one section of a symbol.
 */
export function subpageFilename(className: string, section: string): string {
    return filenameFromCppName(`${className}::${section}`) + '.rst';
}

/**
 * Drop a leading `namespace::` from a qualified name.
 *
 * @example
 * ```typescript
 * stripNamespacePrefix('libsemigroups::WordGraph', 'libsemigroups'); // 'WordGraph'
 * stripNamespacePrefix('std::vector', 'libsemigroups');              // 'std::vector'
 * ```
 */
export function stripNamespacePrefix(name: string, namespace: string): string {
    if (name.length === 0) {
        return name;
    }
    const segments = name.split('::');
    if (segments[0] === namespace) {
        return segments.slice(1).join('::');
    }
    return name;
}

export function unqualifiedName(name: string): string {
    const segments = name.split('::');
    return segments[segments.length - 1];
}

/**
 * The part of a Doxygen compound filename derived from the compound name,
 * e.g. `libsemigroups::WordGraph` → `libsemigroups_1_1_word_graph`.
 */
export function doxygenRefId(name: string): string {
    return name
        .replace(/_/g, '__')
        .replace(/::/g, '_1_1')
        .replace(/([A-Z])/g, '_$1')
        .toLowerCase();
}
