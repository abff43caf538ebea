/**
 * @file cross-check.ts
 * @module generator/cross-check
 * @license MIT
 *
 * @fileoverview Finds documented members that a page spec forgot to list.
 */

import type { SymbolInspector } from '../doxygen/symbol-inspector.js';
import type { Reporter } from '../shared/reporter.js';
import { extractSignature } from '../shared/utils/signature.js';
import { unqualifiedName } from '../shared/utils/sanitize.js';
import type { PageSpec } from '../spec/page-spec.js';

/**
 * Keys that never need a page-spec entry: destructors, the `A::::b`
 * artifacts Doxygen produces for some nested names, and pure virtual
 * declarations.
 */
export function isNoise(key: string, symbol: string): boolean {
    const destructor = '~' + unqualifiedName(symbol);
    return key.includes(destructor) || key.includes('::::') || key.endsWith('= 0');
}

/**
 * Keys the page spec references, in the form the database produces them:
 * `Scope::name` followed by the parameter signature, if any.
 */
export function referencedKeys(spec: PageSpec): Set<string> {
    const keys = new Set<string>([spec.symbol]);
    for (const section of spec.sections ?? []) {
        for (const member of section.members ?? []) {
            const [name, params] = extractSignature(member);
            keys.add(`${spec.symbol}::${name}${params ?? ''}`);
        }
    }
    return keys;
}

/**
 * Warn about every member under the page spec's symbol that the database
 * knows but the page spec does not list.
 *
 * @returns The unlisted keys, sorted
 */
export function crossCheck(spec: PageSpec, inspector: SymbolInspector, reporter: Reporter): string[] {
    if (!inspector.lookup(spec.symbol).ok) {
        return [];
    }
    const referenced = referencedKeys(spec);
    const missing = inspector
        .getDatabase()
        .keysUnder(spec.symbol)
        .filter(key => !isNoise(key, spec.symbol) && !referenced.has(key))
        .sort();
    for (const key of missing) {
        reporter.warn(spec.file, `missing doc, found "${key}" in doxygen output but not in yml file`);
    }
    return missing;
}
