/**
 * @file page-assembler.ts
 * @module generator/page-assembler
 * @license MIT
 *
 * @fileoverview Composes the overview page and section subpages for one
 * page spec.
 */

import type { SymbolInspector } from '../doxygen/symbol-inspector.js';
import type { GeneratorConfig } from '../shared/config.js';
import type { PathResolver } from '../shared/path-resolver.js';
import type { Reporter } from '../shared/reporter.js';
import { extractSignature } from '../shared/utils/signature.js';
import { stripNamespacePrefix, unqualifiedName } from '../shared/utils/sanitize.js';
import { sortedMembers, type PageSpec } from '../spec/page-spec.js';
import {
    HIDDEN_TOCTREE_HEADER,
    LIST_TABLE_HEADER,
    listTableRow,
    rstDoxygenDirective,
    rstSection,
} from './rst.js';

/** Shown in place of a brief description that could not be found. */
export const NO_DOCUMENTATION = 'No documentation found.';

/**
 * Breathe matches an overload taking a `bool(*)()` only when the pointer
 * parameter is spelled as declared, `bool (*func)()`.
 */
export const FUNCTION_POINTER_PARAMS = '(bool(*)())';

/**
 * Member as written in a section page's directive; the page spec's
 * spelling except for {@link FUNCTION_POINTER_PARAMS}.
 */
export function directiveMember(member: string, name: string, params: string | null): string {
    return params === FUNCTION_POINTER_PARAMS ? `${name}(bool (*func)())` : member;
}

/**
 * A page ready to be written.
 */
export interface GeneratedPage {
    path: string;
    content: string;
}

/**
 * Builds page contents in memory; writing them is up to the caller.
 *
 * The overview page holds the symbol's own documentation, one table per
 * section mapping member signatures to brief descriptions, and a hidden
 * table of contents over the section pages. Each section page holds one
 * Breathe directive per member.
 */
export class PageAssembler {
    private config: GeneratorConfig;
    private inspector: SymbolInspector;
    private paths: PathResolver;
    private reporter: Reporter;

    constructor(config: GeneratorConfig, inspector: SymbolInspector, paths: PathResolver, reporter: Reporter) {
        this.config = config;
        this.inspector = inspector;
        this.paths = paths;
        this.reporter = reporter;
    }

    /**
     * The overview page, or null when the primary symbol has no
     * descriptor (reported as a warning).
     */
    overview(spec: PageSpec): GeneratedPage | null {
        const { symbol, file } = spec;
        let out = this.config.header;
        out += rstSection(stripNamespacePrefix(symbol, this.config.namespace));

        const kind = this.inspector.kind(symbol);
        if (!kind.ok) {
            this.reporter.warn(file, `no doxygen output found for ${symbol}`);
            return null;
        }
        out += rstDoxygenDirective(kind.value, symbol, null, this.config.project);
        out += `\n.. cpp:namespace:: ${symbol}\n\n`;

        if (spec.sections !== null) {
            let toc = HIDDEN_TOCTREE_HEADER;
            for (const section of spec.sections) {
                out += rstSection(section.name, '-');
                if (section.members === null) {
                    continue;
                }
                toc += '\n   ' + this.paths.tocEntry(this.paths.subpagePath(symbol, section.name));
                const members = sortedMembers(section);
                if (members.length > 0) {
                    out += LIST_TABLE_HEADER;
                    for (const member of members) {
                        out += this.overviewRow(spec, member);
                    }
                }
            }
            out += toc + '\n';
        }

        return { path: this.paths.overviewPath(symbol), content: out };
    }

    /**
     * One page per section that lists members or prose.
     */
    subpages(spec: PageSpec): GeneratedPage[] {
        const { symbol, file } = spec;
        if (spec.sections === null) {
            return [];
        }
        const pages: GeneratedPage[] = [];
        for (const section of spec.sections) {
            if (section.members === null) {
                continue;
            }
            let out = this.config.header + rstSection(section.name);
            out += `.. cpp:namespace:: ${this.config.namespace}\n\n`;
            if (section.prose !== null) {
                out += section.prose + '\n\n';
            }
            out += '.. cpp:namespace-pop::\n\n';
            for (const member of sortedMembers(section)) {
                const [name, params] = extractSignature(member);
                const qualified = `${symbol}::${name}`;
                const kind = this.inspector.kind(qualified, params);
                if (!kind.ok) {
                    this.reporter.warnMissing(file, qualified, params);
                    continue;
                }
                out += rstDoxygenDirective(kind.value, symbol, directiveMember(member, name, params), this.config.project);
            }
            pages.push({ path: this.paths.subpagePath(symbol, section.name), content: out });
        }
        return pages;
    }

    /**
     * Table row linking a member to its documentation, next to its brief.
     *
     * The default constructor and templated members need the link target
     * spelled out separately from the displayed title; for templated
     * members the first `<` of the title is escaped.
     */
    private overviewRow(spec: PageSpec, member: string): string {
        const [name, params] = extractSignature(member);
        let target = member;
        let title = '';
        if (member === unqualifiedName(spec.symbol) + '()') {
            title = member;
            target = `${name}::${member}`;
        }
        const qualified = `${spec.symbol}::${name}`;
        const templatePrefix = this.inspector.templatePrefix(spec.file, qualified, params);
        if (templatePrefix !== '') {
            title = target.replace('<', '\\<');
        }
        const brief = this.inspector.brief(spec.file, qualified, params) ?? NO_DOCUMENTATION;
        const link = title !== ''
            ? `:cpp:member:\`${title} <${templatePrefix}${target}>\``
            : `:cpp:member:\`${target}\``;
        return listTableRow(link, brief);
    }
}
