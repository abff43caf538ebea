#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @license MIT
 *
 * @fileoverview CLI entry point for generating Sphinx reStructuredText pages
 * from YAML page specs and Doxygen XML.
 */

/**
 * @example
 * ```bash
 * # Generate every page, run from the project's docs/ directory
 * yml2rst
 *
 * # Use existing XML and a different output directory
 * yml2rst --no-doxygen --output ./source/api
 *
 * # Show what the XML says about one member
 * yml2rst show libsemigroups::WordGraph::target "(node_type, label_type) const"
 *
 * # Only list members the page specs do not mention
 * yml2rst check
 * ```
 */

import { program } from 'commander';

import { describeLookupFailure, describeSymbol } from './generator/describe.js';
import { RstGenerator } from './generator/rst-generator.js';
import { resolveConfig, type ConfigOptions } from './shared/config.js';
import { Reporter } from './shared/reporter.js';
import { extractSignature } from './shared/utils/signature.js';

const MINIMUM_NODE_MAJOR = 20;

/**
 * Exit with an error on Node.js releases older than {@link MINIMUM_NODE_MAJOR}.
 */
function checkNodeVersion() {
    const major = Number(process.versions.node.split('.')[0]);
    if (!Number.isInteger(major) || major < MINIMUM_NODE_MAJOR) {
        console.error(`Error: Node.js ${MINIMUM_NODE_MAJOR} or later is required, found ${process.versions.node}`);
        process.exit(1);
    }
}

/**
 * CLI entry point.
 *
 * The default action generates every page; `show` and `check` share its
 * options.
 */
function main() {
    checkNodeVersion();

    program
        .name('yml2rst')
        .description('Generate Sphinx reStructuredText pages from YAML page specs and Doxygen XML')
        .version('1.0.0')
        .option('--yml <dir>', 'Directory containing the YAML page specs', 'yml')
        .option('--xml <dir>', 'Doxygen XML output directory', 'build/xml')
        .option('-o, --output <dir>', 'Directory for the generated .rst files', 'source/_generated')
        .option('--headers <dir>', 'Header directory checked for changes since the XML was built', '../include')
        .option('--namespace <ns>', 'Root library namespace', 'libsemigroups')
        .option('--project <name>', 'Breathe project name (defaults to the namespace)')
        .option('--doxygen <cmd>', 'Command that regenerates the XML (default: doxygen)')
        .option('--no-doxygen', 'Never run Doxygen, use the XML as it is')
        .option('-v, --verbose', 'Enable verbose output')
        .action(generate);

    program
        .command('show')
        .description('Show the kind, flags and rendering of one symbol')
        .argument('<name>', 'Fully qualified name')
        .argument('[params]', 'Parameter list for overloaded functions, e.g. "(size_t) const"')
        .action(show);

    program
        .command('check')
        .description('Report documented members that no page spec lists')
        .action(check);

    program.parse();
}

function globalOptions(): ConfigOptions {
    return program.opts<ConfigOptions>();
}

/**
 * Generate every page and print the summary. Warnings do not change the
 * exit status.
 */
function generate() {
    const config = resolveConfig(globalOptions());
    const reporter = new Reporter();
    new RstGenerator(config, reporter).generate();
}

/**
 * Print everything known about one symbol.
 *
 * @param name - Fully qualified name
 * @param params - Parameter list, normalized before the lookup
 */
function show(name: string, params: string | undefined) {
    const options = globalOptions();
    const config = resolveConfig({ ...options, doxygen: false });
    const generator = new RstGenerator(config, new Reporter());
    const normalized = params === undefined ? null : extractSignature(`f${params}`)[1];

    const report = describeSymbol(generator.getInspector(), name, normalized);
    if (!report.ok) {
        console.error(`Error: ${describeLookupFailure(report.error)}`);
        process.exit(1);
    }
    console.log(report.value);
}

/**
 * Cross-check the page specs against the XML without writing anything.
 */
function check() {
    const config = resolveConfig({ ...globalOptions(), doxygen: false });
    const reporter = new Reporter();
    const warnings = new RstGenerator(config, reporter).check();
    reporter.info(`${warnings} warnings`);
}

main();
