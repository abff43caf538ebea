/**
 * @file describe.ts
 * @module generator/describe
 * @license MIT
 *
 * @fileoverview Plain-text report on a single symbol, for `yml2rst show`.
 */

import { describeFailure, type SymbolInspector } from '../doxygen/symbol-inspector.js';
import type { LookupFailure } from '../doxygen/types.js';
import { err, ok, type Result } from '../shared/result.js';

function flag(value: Result<boolean, unknown>): string {
    if (!value.ok) {
        return 'unknown';
    }
    return value.value ? 'yes' : 'no';
}

/**
 * Kind, flags and full rendering of one symbol.
 *
 * @example
 * ```typescript
 * const report = describeSymbol(inspector, 'libsemigroups::WordGraph::target', '(node_type,label_type) const');
 * if (report.ok) {
 *     console.log(report.value);
 * }
 * ```
 */
export function describeSymbol(
    inspector: SymbolInspector,
    name: string,
    params: string | null = null
): Result<string, LookupFailure> {
    const rendered = inspector.renderFull(name, params);
    if (!rendered.ok) {
        return err(rendered.error);
    }
    const kind = inspector.kind(name, params);
    const lines = [
        name + (params ?? ''),
        `kind:       ${kind.ok ? kind.value : describeFailure(kind.error)}`,
        `typedef:    ${flag(inspector.isTypedef(name, params))}`,
        `inherited:  ${flag(inspector.isInherited(name, params))}`,
        `deprecated: ${inspector.isDeprecated(name, params) ? 'yes' : 'no'}`,
        '',
        rendered.value,
    ];
    return ok(lines.join('\n'));
}

/**
 * Message for a failed {@link describeSymbol}.
 */
export function describeLookupFailure(failure: LookupFailure): string {
    const symbol = failure.name + (failure.params ?? '');
    switch (failure.reason) {
        case 'not-found':
            return `no doxygen output found for ${symbol}`;
        case 'overloaded':
            return `${failure.name} is overloaded, give the parameters as well`;
        case 'not-overloaded':
            return `${failure.name} is not overloaded, leave out the parameters`;
    }
}
