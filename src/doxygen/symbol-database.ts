/**
 * @file symbol-database.ts
 * @module doxygen/symbol-database
 * @license MIT
 *
 * @fileoverview Lazily built index from qualified C++ names to the Doxygen
 * XML elements describing them.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { doxygenRefId } from '../shared/utils/sanitize.js';
import { err, ok, type Result } from '../shared/result.js';
import { attr, find, findAll, parseXml, textOf } from './xml-tree.js';
import type { DoxyElement, LookupFailure, SymbolEntry } from './types.js';

/**
 * Raised when the XML on disk cannot be indexed at all.
 */
export class SymbolDatabaseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SymbolDatabaseError';
    }
}

export interface SymbolDatabaseOptions {
    /** Reads an XML file; defaults to a UTF-8 `readFileSync` */
    readFile?: (path: string) => string;
}

/**
 * How a second descriptor for an already indexed key is treated.
 * Compound files must not repeat non-function keys; the namespace scan
 * keeps the first descriptor and notes the clash.
 */
type DuplicatePolicy = 'reject' | 'keep-first';

/**
 * Symbol database over a Doxygen XML directory.
 *
 * Nothing is read up front. The first lookup of a name finds the closest
 * enclosing class or struct with a compound file (`class<id>.xml` or
 * `struct<id>.xml`), parses it once and indexes the compound and its public
 * members. Names inside no such compound are looked up in the namespace
 * files, which are scanned once per database.
 *
 * Functions are keyed by name and then by parameter signature, e.g.
 * `libsemigroups::WordGraph::target` → `(node_type,label_type) const`.
 *
 * @example
 * ```typescript
 * const db = new SymbolDatabase('docs/build/xml');
 * const result = db.lookup('libsemigroups::WordGraph::target', '(node_type,label_type) const');
 * if (result.ok) {
 *     console.log(result.value.attrs.kind); // 'function'
 * }
 * ```
 */
export class SymbolDatabase {
    private xmlDir: string;
    private readFile: (path: string) => string;
    private singles: Map<string, DoxyElement> = new Map();
    private overloads: Map<string, Map<string, DoxyElement>> = new Map();
    private compoundFiles: Map<string, string | null> = new Map();
    private loadedCompounds: Set<string> = new Set();
    private namespacesScanned = false;
    private clashes: Set<string> = new Set();
    /** Compound or namespace each indexed key was read from */
    private owners: Map<string, string> = new Map();
    private filesRead = 0;

    constructor(xmlDir: string, options: SymbolDatabaseOptions = {}) {
        this.xmlDir = xmlDir;
        this.readFile = options.readFile ?? (path => readFileSync(path, 'utf-8'));
    }

    /**
     * Find the descriptor for a name, disambiguated by parameter signature
     * when the name is an overload set.
     *
     * @param name - Fully qualified name
     * @param params - Normalized signature as produced by `extractSignature`
     */
    lookup(name: string, params: string | null = null): Result<DoxyElement, LookupFailure> {
        const entry = this.entry(name);
        if (!entry) {
            return err({ reason: 'not-found', name, params });
        }
        if (params === null) {
            return entry.type === 'single'
                ? ok(entry.node)
                : err({ reason: 'overloaded', name, params });
        }
        if (entry.type === 'single') {
            return err({ reason: 'not-overloaded', name, params });
        }
        const node = entry.overloads.get(params);
        return node ? ok(node) : err({ reason: 'not-found', name, params });
    }

    /**
     * The raw entry for a name, loading whatever file may define it.
     */
    entry(name: string): SymbolEntry | undefined {
        this.ensureLoaded(name);
        const node = this.singles.get(name);
        if (node) {
            return { type: 'single', node };
        }
        const overloads = this.overloads.get(name);
        if (overloads) {
            return { type: 'overloads', overloads };
        }
        return undefined;
    }

    /**
     * Every key indexed from the compound or namespace `scope` itself, with
     * the parameter signature appended for functions. Members of nested
     * compounds are not included, even once their files are loaded.
     */
    keysUnder(scope: string): string[] {
        const keys: string[] = [];
        for (const key of this.singles.keys()) {
            if (this.owners.get(key) === scope) {
                keys.push(key);
            }
        }
        for (const [key, overloads] of this.overloads) {
            if (this.owners.get(key) === scope) {
                for (const params of overloads.keys()) {
                    keys.push(key + params);
                }
            }
        }
        return keys;
    }

    /**
     * Keys for which the namespace scan found more than one differing
     * descriptor; lookups of these return the first one found.
     */
    ambiguities(): string[] {
        return [...this.clashes].sort();
    }

    /**
     * Number of XML files parsed so far.
     */
    getFilesRead(): number {
        return this.filesRead;
    }

    /**
     * Path of the compound file for a class or struct name, or null.
     */
    compoundFile(name: string): string | null {
        const cached = this.compoundFiles.get(name);
        if (cached !== undefined) {
            return cached;
        }
        const id = doxygenRefId(name);
        let path: string | null = null;
        for (const prefix of ['class', 'struct']) {
            const candidate = join(this.xmlDir, `${prefix}${id}.xml`);
            if (existsSync(candidate)) {
                path = candidate;
                break;
            }
        }
        this.compoundFiles.set(name, path);
        return path;
    }

    private ensureLoaded(name: string): void {
        if (this.singles.has(name) || this.overloads.has(name)) {
            return;
        }
        let scope = name;
        while (scope.includes('::') && this.compoundFile(scope) === null) {
            scope = scope.slice(0, scope.lastIndexOf('::'));
        }
        const file = this.compoundFile(scope);
        if (file !== null) {
            if (!this.loadedCompounds.has(scope)) {
                this.loadCompound(scope, file);
            }
        } else if (!this.namespacesScanned) {
            this.scanNamespaces();
        }
    }

    private parse(path: string): DoxyElement {
        this.filesRead++;
        return parseXml(this.readFile(path));
    }

    private loadCompound(scope: string, file: string): void {
        this.loadedCompounds.add(scope);
        const doc = this.parse(file);
        const compound = find(doc, 'compounddef');
        if (!compound) {
            throw new SymbolDatabaseError(`no compounddef in ${file}`);
        }
        this.singles.set(scope, compound);
        for (const member of findAll(doc, 'memberdef')) {
            if (!isPublic(member)) {
                continue;
            }
            this.index(scope, `${scope}::${memberName(member)}`, member, 'reject');
        }
    }

    private scanNamespaces(): void {
        this.namespacesScanned = true;
        if (!existsSync(this.xmlDir)) {
            return;
        }
        const files = readdirSync(this.xmlDir)
            .filter(f => f.startsWith('namespace') && f.endsWith('.xml'))
            .sort();
        for (const file of files) {
            const doc = this.parse(join(this.xmlDir, file));
            const compoundName = find(doc, 'compoundname');
            if (!compoundName) {
                continue;
            }
            const namespace = textOf(compoundName).trim();
            const compound = find(doc, 'compounddef');
            if (compound && !this.singles.has(namespace)) {
                this.singles.set(namespace, compound);
            }
            for (const member of findAll(doc, 'memberdef')) {
                if (!isPublic(member)) {
                    continue;
                }
                this.index(namespace, `${namespace}::${memberName(member)}`, member, 'keep-first');
            }
        }
    }

    private index(scope: string, key: string, member: DoxyElement, policy: DuplicatePolicy): void {
        if (!this.owners.has(key)) {
            this.owners.set(key, scope);
        }
        const kind = attr(member, 'kind');
        const isFunction = kind === undefined || kind === 'function' || kind === 'friend';

        if (!isFunction) {
            const existing = this.singles.get(key);
            if (existing || this.overloads.has(key)) {
                this.duplicate(key, existing, member, policy);
                return;
            }
            this.singles.set(key, member);
            return;
        }

        const existingSingle = this.singles.get(key);
        if (existingSingle) {
            this.duplicate(key, existingSingle, member, policy);
            return;
        }
        let overloads = this.overloads.get(key);
        if (!overloads) {
            overloads = new Map();
            this.overloads.set(key, overloads);
        }
        const params = parameterSignature(member);
        const existing = overloads.get(params);
        if (existing && policy === 'keep-first') {
            // Doxygen repeats some members verbatim; only differing ones clash.
            if (definitionOf(existing) !== definitionOf(member)) {
                this.clashes.add(key + params);
            }
            return;
        }
        overloads.set(params, member);
    }

    private duplicate(
        key: string,
        existing: DoxyElement | undefined,
        member: DoxyElement,
        policy: DuplicatePolicy
    ): void {
        if (policy === 'reject') {
            throw new SymbolDatabaseError(`unexpected duplicate key ${key}`);
        }
        if (!existing || definitionOf(existing) !== definitionOf(member)) {
            this.clashes.add(key);
        }
    }
}

function isPublic(member: DoxyElement): boolean {
    const prot = attr(member, 'prot');
    return prot === undefined || prot === 'public';
}

function memberName(member: DoxyElement): string {
    const name = find(member, 'name');
    return name ? textOf(name).trim() : '';
}

function definitionOf(member: DoxyElement): string {
    const definition = find(member, 'definition');
    const args = find(member, 'argsstring');
    return (definition ? textOf(definition) : '') + (args ? textOf(args) : '');
}

function paramType(param: DoxyElement): string {
    const type = find(param, 'type');
    return type ? textOf(type).trim() : '';
}

/**
 * The signature a function is keyed by: parameter types (template
 * parameters excluded) followed by the qualifiers Doxygen reports.
 */
export function parameterSignature(member: DoxyElement): string {
    const templateParams = find(member, 'templateparamlist');
    const templateTypes = templateParams ? findAll(templateParams, 'param').map(paramType) : [];
    const types = findAll(member, 'param')
        .map(paramType)
        .filter(type => !templateTypes.includes(type));

    const argsNode = find(member, 'argsstring');
    const args = argsNode ? textOf(argsNode) : '';

    let signature = '(' + types.join(',') + ')';
    if (attr(member, 'const') === 'yes' || args.endsWith(' const')) {
        signature += ' const';
    }
    if (attr(member, 'noexcept') === 'yes') {
        signature += ' noexcept';
    }
    if (args.endsWith('=default')) {
        signature += ' = default';
    }
    if (args.endsWith('=delete')) {
        signature += ' = delete';
    }
    if (args.endsWith(' override')) {
        signature += ' override';
    }
    if (args.endsWith('=0')) {
        signature += ' = 0';
    }
    return signature;
}
