/**
 * @file config.ts
 * @module shared/config
 * @license MIT
 *
 * @fileoverview Generator configuration assembled from command-line options.
 */

import { resolve } from 'node:path';

/**
 * Settings shared by every component of a run. All paths are absolute.
 */
export interface GeneratorConfig {
    /** Directory holding the YAML page specs */
    ymlDir: string;
    /** Doxygen XML output directory */
    xmlDir: string;
    /** Directory the generated .rst files are written to */
    outputDir: string;
    /** Headers whose timestamps decide whether Doxygen must run again */
    headersDir: string;
    /** Root library namespace, e.g. `libsemigroups` */
    namespace: string;
    /** Breathe project name used in `:project:` */
    project: string;
    /** Command that regenerates the XML, or null to never run it */
    doxygenCommand: string | null;
    /** Working directory for the Doxygen command */
    doxygenCwd: string;
    /** Comment block placed at the top of every generated file */
    header: string;
    verbose: boolean;
}

/**
 * Options as commander hands them over; everything is optional.
 */
export interface ConfigOptions {
    yml?: string;
    xml?: string;
    output?: string;
    headers?: string;
    namespace?: string;
    project?: string;
    doxygen?: string | false;
    verbose?: boolean;
}

export const DEFAULT_NAMESPACE = 'libsemigroups';

/** Comment placed at the top of every generated page */
export const DEFAULT_HEADER = '.. This file was auto-generated by yml2rst, do not edit.\n';

/**
 * Build a {@link GeneratorConfig}, resolving relative paths against `cwd`.
 *
 * Defaults match running from a project's `docs/` directory:
 * `yml/`, `build/xml/`, `source/_generated/` and `../include/`.
 */
export function resolveConfig(options: ConfigOptions, cwd: string = process.cwd()): GeneratorConfig {
    const namespace = options.namespace ?? DEFAULT_NAMESPACE;
    return {
        ymlDir: resolve(cwd, options.yml ?? 'yml'),
        xmlDir: resolve(cwd, options.xml ?? 'build/xml'),
        outputDir: resolve(cwd, options.output ?? 'source/_generated'),
        headersDir: resolve(cwd, options.headers ?? '../include'),
        namespace,
        project: options.project ?? namespace,
        doxygenCommand: options.doxygen === false ? null : options.doxygen ?? 'doxygen',
        doxygenCwd: cwd,
        header: DEFAULT_HEADER,
        verbose: options.verbose ?? false,
    };
}
