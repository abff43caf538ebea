/**
 * @file symbol-inspector.ts
 * @module doxygen/symbol-inspector
 * @license MIT
 *
 * @fileoverview Derived, memoised facts about symbols in the database: kind,
 * return type, template prefix and rendered brief description.
 */

import { err, ok, type Result } from '../shared/result.js';
import type { Reporter } from '../shared/reporter.js';
import type { RstRenderer } from '../renderer/rst-renderer.js';
import type { SymbolDatabase } from './symbol-database.js';
import { attr, child, find, findAll, textOf } from './xml-tree.js';
import type { DeterminationFailure, DoxyElement, LookupFailure } from './types.js';

/**
 * Answers questions about symbols for one page spec file at a time.
 *
 * Every query is cached per `(name, params)`; the database underneath
 * is itself populated once per key. Lookups that fail while building
 * link targets or briefs are reported through the {@link Reporter} as a
 * single "no doxygen output found" warning per key.
 *
 * @example
 * ```typescript
 * const inspector = new SymbolInspector(db, renderer, reporter, 'libsemigroups');
 * const kind = inspector.kind('libsemigroups::WordGraph');
 * if (kind.ok) {
 *     console.log(kind.value); // 'class'
 * }
 * ```
 */
export class SymbolInspector {
    private db: SymbolDatabase;
    private renderer: RstRenderer;
    private reporter: Reporter;
    private namespace: string;
    private lookups = new Memo<Result<DoxyElement, LookupFailure>>();
    private kinds = new Memo<Result<string, DeterminationFailure>>();
    private inherited = new Memo<Result<boolean, DeterminationFailure>>();
    private typedefs = new Memo<Result<boolean, DeterminationFailure>>();
    private deprecated = new Memo<boolean>();
    private returnTypes = new Memo<string>();
    private templatePrefixes = new Memo<string>();
    private briefs = new Memo<string | null>();

    constructor(db: SymbolDatabase, renderer: RstRenderer, reporter: Reporter, namespace: string) {
        this.db = db;
        this.renderer = renderer;
        this.reporter = reporter;
        this.namespace = namespace;
    }

    getDatabase(): SymbolDatabase {
        return this.db;
    }

    lookup(name: string, params: string | null = null): Result<DoxyElement, LookupFailure> {
        return this.lookups.get(name, params, () => this.db.lookup(name, params));
    }

    /**
     * The descriptor's `kind` attribute; friends count as functions.
     */
    kind(name: string, params: string | null = null): Result<string, DeterminationFailure> {
        return this.kinds.get(name, params, () => {
            const found = this.lookup(name, params);
            if (!found.ok) {
                return err({ what: 'kind', name, params, cause: found.error });
            }
            const kind = attr(found.value, 'kind');
            if (kind === undefined) {
                return err({ what: 'kind', name, params, cause: null });
            }
            return ok(kind === 'friend' ? 'function' : kind);
        });
    }

    /**
     * Whether a member is declared in a base class rather than in the
     * scope it was looked up in.
     */
    isInherited(name: string, params: string | null = null): Result<boolean, DeterminationFailure> {
        return this.inherited.get(name, params, () => {
            const found = this.lookup(name, params);
            const definition = found.ok ? find(found.value, 'definition') : undefined;
            if (!definition) {
                return err({ what: 'inherited', name, params, cause: found.ok ? null : found.error });
            }
            const words = textOf(definition).split(' ');
            const declared = words.length === 1 ? words[0] : words[1];
            const scope = name.split('::').slice(0, -1).join('::') + '::';
            return ok(!declared.startsWith(scope));
        });
    }

    isTypedef(name: string, params: string | null = null): Result<boolean, DeterminationFailure> {
        return this.typedefs.get(name, params, () => {
            const found = this.lookup(name, params);
            if (!found.ok) {
                return err({ what: 'typedef', name, params, cause: found.error });
            }
            return ok(attr(found.value, 'kind') === 'typedef');
        });
    }

    /**
     * Whether the definition carries the library's deprecation macro,
     * e.g. `LIBSEMIGROUPS_DEPRECATED`.
     */
    isDeprecated(name: string, params: string | null = null): boolean {
        return this.deprecated.get(name, params, () => {
            const found = this.lookup(name, params);
            const definition = found.ok ? find(found.value, 'definition') : undefined;
            if (!definition) {
                return false;
            }
            return textOf(definition).startsWith(`${this.namespace.toUpperCase()}_DEPRECATED`);
        });
    }

    /**
     * Declared return type, empty for typedefs and descriptors without one.
     */
    returns(name: string, params: string | null = null): string {
        return this.returnTypes.get(name, params, () => {
            const found = this.lookup(name, params);
            if (!found.ok) {
                return '';
            }
            if (attr(found.value, 'kind') === 'typedef') {
                return '';
            }
            const type = child(found.value, 'type');
            return type ? textOf(type) : '';
        });
    }

    /**
     * `template <typename T, size_t N = 0> RET ` for templated members,
     * used as a link target in front of the member signature; empty
     * otherwise. A missing descriptor is reported against `file`.
     */
    templatePrefix(file: string, name: string, params: string | null = null): string {
        return this.templatePrefixes.get(name, params, () => {
            const found = this.lookup(name, params);
            if (!found.ok) {
                this.reporter.warnMissing(file, name, params);
                return '';
            }
            const list = find(found.value, 'templateparamlist');
            if (!list) {
                return '';
            }
            const tparams = findAll(list, 'param').map(param => {
                const type = find(param, 'type');
                const declname = find(param, 'declname');
                const defval = find(param, 'defval');
                let result = type ? textOf(type) : '';
                if (declname) {
                    result += ' ' + textOf(declname);
                }
                if (defval) {
                    result += ' = ' + textOf(defval);
                }
                return result;
            });
            return `template <${tparams.join(', ')}> ${this.returns(name, params)} `;
        });
    }

    /**
     * Rendered brief description, or null (with a warning against `file`)
     * when the symbol has no descriptor or no brief.
     */
    brief(file: string, name: string, params: string | null = null): string | null {
        return this.briefs.get(name, params, () => {
            const found = this.lookup(name, params);
            const brief = found.ok ? child(found.value, 'briefdescription') : undefined;
            if (!brief) {
                this.reporter.warnMissing(file, name, params);
                return null;
            }
            return this.renderer.render(brief);
        });
    }

    /**
     * Full rendering of a descriptor, directive included.
     */
    renderFull(name: string, params: string | null = null): Result<string, LookupFailure> {
        const found = this.lookup(name, params);
        return found.ok ? ok(this.renderer.render(found.value)) : found;
    }
}

/**
 * Values computed once per `(name, params)`.
 */
class Memo<T> {
    private values: Map<string, T> = new Map();

    get(name: string, params: string | null, compute: () => T): T {
        const key = params === null ? name : `${name}\u0000${params}`;
        if (this.values.has(key)) {
            const cached = this.values.get(key);
            if (cached !== undefined) {
                return cached;
            }
        }
        const value = compute();
        this.values.set(key, value);
        return value;
    }
}

/**
 * One-line description of a failed determination, for warnings.
 */
export function describeFailure(failure: DeterminationFailure): string {
    const symbol = failure.name + (failure.params ?? '');
    switch (failure.what) {
        case 'kind':
            return `could not determine the kind of ${symbol}`;
        case 'inherited':
            return `could not determine if ${symbol} is inherited`;
        case 'typedef':
            return `could not determine if ${symbol} is a typedef`;
    }
}
