/**
 * @file file-writer.ts
 * @module shared/file-writer
 * @license MIT
 *
 * @fileoverview Writes generated pages only when their content changed and
 * removes pages that a run did not produce.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, unlinkSync, writeFileSync } from 'node:fs';
import { join, relative } from 'node:path';
import type { Reporter } from './reporter.js';

/**
 * Statistics about write operations.
 */
export interface WriteStats {
    /** Files the run produced, changed or not */
    attempted: number;
    /** Files whose content changed and were written */
    rewritten: number;
    /** Stale files removed from the output directory */
    deleted: number;
}

/**
 * Writes generated pages into one output directory.
 *
 * Content is compared with what is on disk first, so an unchanged page
 * keeps its timestamp and Sphinx does not rebuild it. Every path handed
 * to {@link FileWriter.writeIfChanged} is remembered;
 * {@link FileWriter.removeOrphans} deletes everything else in the directory.
 *
 * @example
 * ```typescript
 * const writer = new FileWriter('./source/_generated', reporter);
 * writer.writeIfChanged('./source/_generated/word_graph.rst', content);
 * writer.removeOrphans();
 * console.log(writer.getStats()); // { attempted: 1, rewritten: 1, deleted: 0 }
 * ```
 */
export class FileWriter {
    private outputDir: string;
    private reporter: Reporter;
    private written: Set<string> = new Set();
    private stats: WriteStats = {
        attempted: 0,
        rewritten: 0,
        deleted: 0,
    };

    /**
     * @param outputDir - Directory all generated pages live in
     * @param reporter - Receives one line per rewritten or deleted file
     */
    constructor(outputDir: string, reporter: Reporter) {
        this.outputDir = outputDir;
        this.reporter = reporter;
    }

    /**
     * Create the output directory if it does not exist yet.
     */
    ensureOutputDir(): void {
        if (!existsSync(this.outputDir)) {
            mkdirSync(this.outputDir, { recursive: true });
        }
    }

    /**
     * Write `content` to `filePath` unless the file already holds exactly
     * that content.
     *
     * @returns true if the file was (re)written
     */
    writeIfChanged(filePath: string, content: string): boolean {
        this.stats.attempted++;
        this.written.add(filePath);

        if (existsSync(filePath) && statSync(filePath).isFile()) {
            if (readFileSync(filePath, 'utf-8') === content) {
                return false;
            }
        }

        this.reporter.info(`Rewriting ${this.display(filePath)} ...`);
        writeFileSync(filePath, content, 'utf-8');
        this.stats.rewritten++;
        return true;
    }

    /**
     * Delete every file in the output directory not written this run.
     *
     * @returns Paths of the deleted files
     */
    removeOrphans(): string[] {
        if (!existsSync(this.outputDir)) {
            return [];
        }
        const deleted: string[] = [];
        for (const name of readdirSync(this.outputDir).sort()) {
            const filePath = join(this.outputDir, name);
            if (this.written.has(filePath) || !statSync(filePath).isFile()) {
                continue;
            }
            this.reporter.info('deleting!!!', this.display(filePath));
            unlinkSync(filePath);
            deleted.push(filePath);
            this.stats.deleted++;
        }
        return deleted;
    }

    hasWritten(filePath: string): boolean {
        return this.written.has(filePath);
    }

    getStats(): WriteStats {
        return { ...this.stats };
    }

    private display(filePath: string): string {
        return relative(process.cwd(), filePath) || filePath;
    }
}
