/**
 * @file rst-generator.ts
 * @module generator/rst-generator
 * @license MIT
 *
 * @fileoverview Runs a complete generation: optional Doxygen step, every page
 * spec in the YAML directory, orphan removal and the closing summary.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { join, relative } from 'node:path';
import {
    checkRegeneration,
    reportRegenerationCheck,
    runDoxygen,
} from '../doxygen/doxygen-runner.js';
import { SymbolDatabase, type SymbolDatabaseOptions } from '../doxygen/symbol-database.js';
import { SymbolInspector } from '../doxygen/symbol-inspector.js';
import { RstRenderer } from '../renderer/rst-renderer.js';
import type { GeneratorConfig } from '../shared/config.js';
import { FileWriter } from '../shared/file-writer.js';
import { PathResolver } from '../shared/path-resolver.js';
import type { Reporter } from '../shared/reporter.js';
import { loadPageSpec, PageSpecError, type PageSpec } from '../spec/page-spec.js';
import { crossCheck } from './cross-check.js';
import { PageAssembler } from './page-assembler.js';

/**
 * Outcome of {@link RstGenerator.generate}.
 */
export interface GenerationResult {
    /** Pages produced, written or not */
    attempted: number;
    /** Pages whose content changed */
    rewritten: number;
    /** Stale pages removed */
    deleted: number;
    warnings: number;
}

export interface RstGeneratorOptions {
    /** Passed to the {@link SymbolDatabase} */
    database?: SymbolDatabaseOptions;
}

/**
 * Generates the reStructuredText pages for every page spec.
 *
 * One generator owns one symbol database, so each XML file is parsed at
 * most once per run however many page specs refer to it.
 *
 * @example
 * ```typescript
 * const generator = new RstGenerator(resolveConfig({ doxygen: false }), new Reporter());
 * const result = generator.generate();
 * console.log(`${result.rewritten} / ${result.attempted} files rewritten`);
 * ```
 */
export class RstGenerator {
    private config: GeneratorConfig;
    private reporter: Reporter;
    private db: SymbolDatabase;
    private inspector: SymbolInspector;
    private writer: FileWriter;
    private assembler: PageAssembler;

    constructor(config: GeneratorConfig, reporter: Reporter, options: RstGeneratorOptions = {}) {
        this.config = config;
        this.reporter = reporter;
        this.db = new SymbolDatabase(config.xmlDir, options.database);
        this.inspector = new SymbolInspector(this.db, new RstRenderer(config.namespace), reporter, config.namespace);
        this.writer = new FileWriter(config.outputDir, reporter);
        this.assembler = new PageAssembler(config, this.inspector, new PathResolver(config.outputDir), reporter);
    }

    getInspector(): SymbolInspector {
        return this.inspector;
    }

    /**
     * Regenerate the XML if it is stale and a Doxygen command is configured.
     *
     * @returns true if Doxygen was run
     */
    refreshXml(): boolean {
        const command = this.config.doxygenCommand;
        if (command !== null) {
            const check = checkRegeneration(this.config.headersDir, this.config.xmlDir);
            reportRegenerationCheck(check, this.reporter);
            if (check.needed) {
                runDoxygen(command, this.config.doxygenCwd, this.config.xmlDir, this.reporter);
                return true;
            }
        }
        this.reporter.info('Not running doxygen!');
        return false;
    }

    /**
     * Produce every page, delete pages no page spec produced any more, and
     * print the summary.
     */
    generate(): GenerationResult {
        this.refreshXml();
        this.reporter.info(`Generating reStructuredText files from ${this.display(this.config.ymlDir)} . . .`);
        this.writer.ensureOutputDir();

        for (const path of this.pageSpecFiles()) {
            const display = this.display(path);
            this.reporter.info(`Processing ${display} . . .`);
            this.withPageSpec(path, display, spec => {
                const overview = this.assembler.overview(spec);
                if (overview === null) {
                    return;
                }
                this.writer.writeIfChanged(overview.path, overview.content);
                for (const page of this.assembler.subpages(spec)) {
                    this.writer.writeIfChanged(page.path, page.content);
                }
                crossCheck(spec, this.inspector, this.reporter);
            });
        }

        this.reportAmbiguities();
        this.writer.removeOrphans();

        const stats = this.writer.getStats();
        if (this.config.verbose) {
            this.reporter.info(`Parsed ${this.db.getFilesRead()} XML files`);
        }
        this.reporter.summary(stats.rewritten, stats.attempted);
        return { ...stats, warnings: this.reporter.getWarningCount() };
    }

    /**
     * Only report members missing from the page specs; writes nothing.
     *
     * @returns Number of warnings issued
     */
    check(): number {
        for (const path of this.pageSpecFiles()) {
            const display = this.display(path);
            this.withPageSpec(path, display, spec => {
                if (!this.inspector.lookup(spec.symbol).ok) {
                    this.reporter.warnMissing(display, spec.symbol, null);
                    return;
                }
                crossCheck(spec, this.inspector, this.reporter);
            });
        }
        this.reportAmbiguities();
        return this.reporter.getWarningCount();
    }

    /**
     * YAML files in the page spec directory, sorted, hidden files excluded.
     */
    pageSpecFiles(): string[] {
        const dir = this.config.ymlDir;
        if (!existsSync(dir)) {
            return [];
        }
        return readdirSync(dir)
            .filter(name => !name.startsWith('.') && /\.ya?ml$/.test(name))
            .sort()
            .map(name => join(dir, name))
            .filter(path => statSync(path).isFile());
    }

    /**
     * Load a page spec and hand it to `action`; any error raised on the
     * way becomes a warning against that file.
     */
    private withPageSpec(path: string, display: string, action: (spec: PageSpec) => void): void {
        try {
            action(loadPageSpec(path, display));
        } catch (error) {
            if (error instanceof PageSpecError) {
                this.reporter.warn(display, error.detail);
            } else if (error instanceof Error) {
                this.reporter.warn(display, error.message);
            } else {
                throw error;
            }
        }
    }

    private reportAmbiguities(): void {
        for (const key of this.db.ambiguities()) {
            this.reporter.warn(
                this.display(this.config.xmlDir),
                `"${key}" is described more than once in the namespace files, using the first`
            );
        }
    }

    private display(path: string): string {
        return relative(process.cwd(), path) || path;
    }
}
