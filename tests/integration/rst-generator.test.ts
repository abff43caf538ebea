/**
 * @file rst-generator.test.ts
 * @module tests/integration/rst-generator
 * @license MIT
 *
 * @fileoverview Integration tests running complete generations over the
 * fixture page specs and XML.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join, relative } from 'node:path';
import { RstGenerator } from '../../src/generator/rst-generator.js';
import { resolveConfig } from '../../src/shared/config.js';
import {
  HEADER,
  XML_DIR,
  YML_DIR,
  captureReporter,
  fixtureConfig,
  makeTempDir,
} from '../setup.js';

function display(name: string): string {
  return relative(process.cwd(), join(YML_DIR, name));
}

describe('RstGenerator', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = join(makeTempDir('generate'), '_generated');
  });

  afterEach(() => {
    rmSync(join(outputDir, '..'), { recursive: true, force: true });
  });

  describe('pageSpecFiles', () => {
    it('should list the YAML files in order, without hidden ones', () => {
      const { reporter } = captureReporter();
      const generator = new RstGenerator(fixtureConfig(outputDir), reporter);

      expect(generator.pageSpecFiles()).toEqual([
        join(YML_DIR, 'broken.yml'),
        join(YML_DIR, 'unknown.yml'),
        join(YML_DIR, 'word-graph.yml'),
      ]);
    });
  });

  describe('generate', () => {
    it('should write the overview and every section page', () => {
      const { reporter } = captureReporter();

      const result = new RstGenerator(fixtureConfig(outputDir), reporter).generate();

      expect(result).toEqual({ attempted: 6, rewritten: 6, deleted: 0, warnings: 4 });
      expect(readdirSync(outputDir).sort()).toEqual([
        'toylib__wordgraph.rst',
        'toylib__wordgraph__constructors.rst',
        'toylib__wordgraph__deprecated.rst',
        'toylib__wordgraph__friends.rst',
        'toylib__wordgraph__member_functions.rst',
        'toylib__wordgraph__member_types.rst',
      ]);
      expect(readFileSync(join(outputDir, 'toylib__wordgraph__deprecated.rst'), 'utf-8')).toBe(
        HEADER
        + '\nDeprecated\n==========\n'
        + '.. cpp:namespace:: toylib\n\n'
        + '.. cpp:namespace-pop::\n\n'
        + '\n.. doxygenfunction:: toylib::WordGraph::degree() const\n   :project: toylib\n'
      );
    });

    it('should warn once per problem, in page spec order', () => {
      const { reporter, logger } = captureReporter();

      new RstGenerator(fixtureConfig(outputDir), reporter).generate();

      expect(logger.errors).toEqual([
        `WARNING in ${display('broken.yml')}: invalid page spec:\n`
          + '  - a page spec must be a mapping with exactly one key',
        `WARNING in ${display('unknown.yml')}: no doxygen output found for toylib::Nope`,
        `WARNING in ${display('word-graph.yml')}: no doxygen output found for toylib::WordGraph::missing_member()`,
        `WARNING in ${display('word-graph.yml')}: missing doc, found "toylib::WordGraph::number_of_nodes() const"`
          + ' in doxygen output but not in yml file',
      ]);
    });

    it('should report progress and finish with the summary', () => {
      const { reporter, logger } = captureReporter();

      new RstGenerator(fixtureConfig(outputDir), reporter).generate();

      expect(logger.lines.slice(0, 2)).toEqual([
        'Not running doxygen!',
        `Generating reStructuredText files from ${relative(process.cwd(), YML_DIR)} . . .`,
      ]);
      expect(logger.lines.filter(line => line.startsWith('Processing'))).toEqual([
        `Processing ${display('broken.yml')} . . .`,
        `Processing ${display('unknown.yml')} . . .`,
        `Processing ${display('word-graph.yml')} . . .`,
      ]);
      expect(logger.lines[logger.lines.length - 1]).toBe('Summary: 6 / 6 files rewritten and 4 warnings!!');
    });

    it('should not rewrite unchanged pages on a second run', () => {
      new RstGenerator(fixtureConfig(outputDir), captureReporter().reporter).generate();
      const { reporter, logger } = captureReporter();

      const result = new RstGenerator(fixtureConfig(outputDir), reporter).generate();

      expect(result).toEqual({ attempted: 6, rewritten: 0, deleted: 0, warnings: 4 });
      expect(logger.lines[logger.lines.length - 1]).toBe('Summary: 0 / 6 files rewritten and 4 warnings!!');
    });

    it('should delete pages that no page spec produces', () => {
      mkdirSync(outputDir, { recursive: true });
      writeFileSync(join(outputDir, 'toylib__oldclass.rst'), 'stale');

      const result = new RstGenerator(fixtureConfig(outputDir), captureReporter().reporter).generate();

      expect(result.deleted).toBe(1);
      expect(existsSync(join(outputDir, 'toylib__oldclass.rst'))).toBe(false);
    });

    it('should mention the number of parsed files when verbose', () => {
      const { reporter, logger } = captureReporter();
      const config = { ...fixtureConfig(outputDir), verbose: true };

      new RstGenerator(config, reporter).generate();

      expect(logger.lines).toContain('Parsed 2 XML files');
    });
  });

  describe('nested compounds', () => {
    it('should not report members of a nested struct listed in the page spec', () => {
      const ymlDir = join(outputDir, '..', 'yml');
      mkdirSync(ymlDir, { recursive: true });
      writeFileSync(
        join(ymlDir, 'wg.yml'),
        'toylib::WordGraph:\n  - Types:\n      - Edge\n      - node_type\n      - edge_kind\n'
      );
      const { reporter, logger } = captureReporter();
      const config = { ...fixtureConfig(outputDir), ymlDir };

      const result = new RstGenerator(config, reporter).generate();

      expect(logger.errors.filter(line => line.includes('::Edge::'))).toEqual([]);
      expect(result.warnings).toBe(8);
      expect(readFileSync(join(outputDir, 'toylib__wordgraph__types.rst'), 'utf-8')).toContain(
        '\n.. doxygenstruct:: toylib::WordGraph::Edge\n   :project: toylib\n'
      );
    });
  });

  describe('check', () => {
    it('should report missing members without writing anything', () => {
      const { reporter, logger } = captureReporter();

      const warnings = new RstGenerator(fixtureConfig(outputDir), reporter).check();

      expect(warnings).toBe(3);
      expect(logger.errors[2]).toBe(
        `WARNING in ${display('word-graph.yml')}: missing doc, found "toylib::WordGraph::number_of_nodes() const"`
          + ' in doxygen output but not in yml file'
      );
      expect(existsSync(outputDir)).toBe(false);
    });
  });

  describe('refreshXml', () => {
    it('should do nothing when Doxygen is disabled', () => {
      const { reporter, logger } = captureReporter();

      expect(new RstGenerator(fixtureConfig(outputDir), reporter).refreshXml()).toBe(false);
      expect(logger.lines).toEqual(['Not running doxygen!']);
    });

    it('should leave up-to-date XML alone', () => {
      const { reporter, logger } = captureReporter();
      const headers = join(outputDir, '..', 'include');
      mkdirSync(headers, { recursive: true });
      const config = resolveConfig({ yml: YML_DIR, xml: XML_DIR, output: outputDir, headers, doxygen: 'exit 0' });

      expect(new RstGenerator(config, reporter).refreshXml()).toBe(false);
      expect(logger.lines).not.toContain('Running doxygen!');
      expect(logger.lines[logger.lines.length - 1]).toBe('Not running doxygen!');
    });

    it('should run the command when there is no XML yet', () => {
      const { reporter, logger } = captureReporter();
      const root = join(outputDir, '..');
      const config = resolveConfig(
        { yml: YML_DIR, xml: 'xml', output: outputDir, headers: 'include', doxygen: 'exit 0' },
        root
      );

      expect(new RstGenerator(config, reporter).refreshXml()).toBe(true);
      expect(logger.lines).toEqual([
        'No generated XML found!',
        'The last changed header file is:\t\nLast modified:\t\t\t\tN/A',
        'The first built xml file is:\t\t\nlast modified:\t\t\t\tN/A',
        'Running doxygen!',
      ]);
    });
  });
});
