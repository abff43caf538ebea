/**
 * @file path-resolver.ts
 * @module shared/path-resolver
 * @license MIT
 *
 * @fileoverview Maps symbols and sections to page paths in the output directory.
 */

import { basename, join } from 'node:path';
import { overviewFilename, subpageFilename } from './utils/sanitize.js';

/**
 * Resolves output paths for generated pages.
 *
 * @example
 * ```typescript
 * const resolver = new PathResolver('/docs/source/_generated');
 * resolver.overviewPath('libsemigroups::WordGraph');
 * // '/docs/source/_generated/libsemigroups__wordgraph.rst'
 * resolver.subpagePath('libsemigroups::WordGraph', 'Member functions');
 * // '/docs/source/_generated/libsemigroups__wordgraph__member_functions.rst'
 * ```
 */
export class PathResolver {
    private outputDir: string;

    constructor(outputDir: string) {
        this.outputDir = outputDir;
    }

    getOutputDir(): string {
        return this.outputDir;
    }

    overviewPath(symbol: string): string {
        return join(this.outputDir, overviewFilename(symbol));
    }

    subpagePath(symbol: string, section: string): string {
        return join(this.outputDir, subpageFilename(symbol, section));
    }

    /**
     * Entry for a `toctree` directive: the page filename relative to the
     * overview page, which lives in the same directory.
     */
    tocEntry(filePath: string): string {
        return basename(filePath);
    }
}
