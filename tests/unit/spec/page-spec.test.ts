/**
 * @file page-spec.test.ts
 * @module tests/unit/spec/page-spec
 * @license MIT
 *
 * @fileoverview Unit tests for loading and validating YAML page specs.
 */

import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { PageSpecError, loadPageSpec, sortedMembers, toPageSpec } from '../../../src/spec/page-spec.js';
import { YML_DIR, makeTempDir } from '../../setup.js';

describe('page specs', () => {
  describe('toPageSpec', () => {
    it('should read sections, prose and members', () => {
      const spec = toPageSpec('a.yml', {
        'toylib::Word': [
          { Constructors: [['Words can be copied.'], 'Word()', 'Word(Word const&)'] },
          { Operators: ['operator==(Word const&) const'] },
          { Later: null },
        ],
      });

      expect(spec).toEqual({
        file: 'a.yml',
        symbol: 'toylib::Word',
        sections: [
          { name: 'Constructors', prose: 'Words can be copied.', members: ['Word()', 'Word(Word const&)'] },
          { name: 'Operators', prose: null, members: ['operator==(Word const&) const'] },
          { name: 'Later', prose: null, members: null },
        ],
      });
    });

    it('should accept a symbol without sections', () => {
      expect(toPageSpec('a.yml', { 'toylib::Word': null })).toEqual({
        file: 'a.yml',
        symbol: 'toylib::Word',
        sections: null,
      });
    });

    it('should reject documents with more than one symbol', () => {
      expect(() => toPageSpec('a.yml', { A: null, B: null })).toThrow(
        'a.yml: invalid page spec:\n  - a page spec must be a mapping with exactly one key'
      );
    });

    it('should reject sections with more than one name', () => {
      expect(() => toPageSpec('a.yml', { A: [{ One: ['x'], Two: ['y'] }] })).toThrow(
        '  - A.0: each section must be a mapping with exactly one key'
      );
    });

    it('should only allow prose as the first entry', () => {
      expect(() => toPageSpec('a.yml', { A: [{ One: ['x', ['prose']] }] })).toThrow(
        'only the first entry of a section may be a prose list'
      );
    });

    it('should reject non-string members', () => {
      expect(() => toPageSpec('a.yml', { A: [{ One: [42] }] })).toThrow(PageSpecError);
    });

    it('should reject scalars', () => {
      expect(() => toPageSpec('a.yml', 'toylib::Word')).toThrow(PageSpecError);
    });
  });

  describe('loadPageSpec', () => {
    it('should load the fixture page spec', () => {
      const spec = loadPageSpec(join(YML_DIR, 'word-graph.yml'), 'word-graph.yml');

      expect(spec.symbol).toBe('toylib::WordGraph');
      expect(spec.sections?.map(section => section.name)).toEqual([
        'Constructors',
        'Member functions',
        'Member types',
        'Friends',
        'Deprecated',
        'Iterators',
      ]);
      expect(spec.sections?.[0].prose).toBe('Word graphs can be built empty or with a given number of nodes.');
      expect(spec.sections?.[5].members).toBeNull();
    });

    it('should report YAML syntax errors against the display name', () => {
      const dir = makeTempDir('spec');
      try {
        const path = join(dir, 'bad.yml');
        writeFileSync(path, 'toylib::Word: [unclosed\n');

        expect(() => loadPageSpec(path, 'yml/bad.yml')).toThrow(/^yml\/bad\.yml: invalid YAML: /);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('sortedMembers', () => {
    it('should sort member references', () => {
      expect(sortedMembers({ name: 'S', prose: null, members: ['size() const', 'at(size_t)', 'Word()'] })).toEqual([
        'Word()',
        'at(size_t)',
        'size() const',
      ]);
    });

    it('should return nothing for sections without members', () => {
      expect(sortedMembers({ name: 'S', prose: null, members: null })).toEqual([]);
    });
  });
});
