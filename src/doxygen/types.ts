/**
 * @file types.ts
 * @module doxygen/types
 * @license MIT
 *
 * @fileoverview Tree representation of Doxygen XML and symbol database entries.
 */

/**
 * Character data between tags. Whitespace-only runs are kept, the renderer
 * decides what to do with them.
 */
export interface DoxyText {
    readonly type: 'text';
    readonly text: string;
}

/**
 * A tagged element with its attributes and ordered children.
 */
export interface DoxyElement {
    readonly type: 'element';
    readonly tag: string;
    readonly attrs: Readonly<Record<string, string>>;
    readonly children: readonly DoxyNode[];
}

export type DoxyNode = DoxyText | DoxyElement;

/**
 * Member kinds as written in `memberdef`/`compounddef` `kind` attributes.
 * Doxygen emits more than these; unknown kinds are carried as plain strings.
 */
export type SymbolKind =
    | 'class'
    | 'struct'
    | 'namespace'
    | 'function'
    | 'friend'
    | 'enum'
    | 'typedef'
    | 'variable'
    | 'define'
    | (string & {});

/**
 * What the symbol database holds for one qualified name: a single
 * descriptor, or one descriptor per parameter signature for overloaded
 * functions.
 */
export type SymbolEntry =
    | { readonly type: 'single'; readonly node: DoxyElement }
    | { readonly type: 'overloads'; readonly overloads: ReadonlyMap<string, DoxyElement> };

/**
 * Why a lookup did not produce a descriptor.
 *
 * - `not-found`: no entry for the name, or no overload for the signature
 * - `overloaded`: the name is an overload set and no signature was given
 * - `not-overloaded`: a signature was given for a name with a single entry
 */
export interface LookupFailure {
    reason: 'not-found' | 'overloaded' | 'not-overloaded';
    name: string;
    params: string | null;
}

/**
 * A property of a symbol that could not be read from its descriptor.
 */
export interface DeterminationFailure {
    what: 'kind' | 'inherited' | 'typedef';
    name: string;
    params: string | null;
    cause: LookupFailure | null;
}
