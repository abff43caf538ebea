/**
 * @file sanitize.test.ts
 * @module tests/unit/shared/sanitize
 * @license MIT
 *
 * @fileoverview Unit tests for C++ name to filename conversion.
 */

import {
  OPERATOR_RULES,
  doxygenRefId,
  filenameFromCppName,
  overviewFilename,
  stripNamespacePrefix,
  subpageFilename,
  unqualifiedName,
} from '../../../src/shared/utils/sanitize.js';

describe('sanitize', () => {
  describe('filenameFromCppName', () => {
    it('should replace scope separators and lower-case the result', () => {
      expect(filenameFromCppName('toylib::WordGraph')).toBe('toylib__wordgraph');
    });

    it.each([
      ['toylib::WordGraph::operator*', 'toylib__wordgraph__operator_star'],
      ['toylib::WordGraph::operator *', 'toylib__wordgraph__operator_star'],
      ['Word::operator!=', 'word__operator_not_eq'],
      ['Word::operator()', 'word__call_operator'],
      ['Word::operator<', 'word__operator_less'],
      ['Word::operator<<', 'word__insertion_operator'],
      ['Iterator::operator++', 'iterator__operator_increment'],
      ['Word::operator==', 'word__operator_equal_to'],
      ['Word::operator>', 'word__operator_greater'],
    ])('should name %s as %s', (name, expected) => {
      expect(filenameFromCppName(name)).toBe(expected);
    });

    it('should only treat a trailing operator< as less-than', () => {
      expect(filenameFromCppName('operator<<')).toBe('insertion_operator');
    });

    it('should replace every other non-word character', () => {
      expect(filenameFromCppName('toylib::WordGraph::Member functions')).toBe('toylib__wordgraph__member_functions');
    });

    it('should be idempotent', () => {
      const names = ['toylib::WordGraph', 'Word::operator==', 'A::operator()', 'x::Member types'];
      for (const name of names) {
        const once = filenameFromCppName(name);
        expect(filenameFromCppName(once)).toBe(once);
      }
    });

    it('should name every operator rule', () => {
      expect(OPERATOR_RULES.map(rule => rule.name)).toEqual([
        'dereference',
        'inequality',
        'call',
        'less',
        'insertion',
        'increment',
        'equality',
        'greater',
      ]);
    });
  });

  describe('page filenames', () => {
    it('should add .rst to the overview page name', () => {
      expect(overviewFilename('toylib::WordGraph')).toBe('toylib__wordgraph.rst');
    });

    it('should combine class and section for a subpage', () => {
      expect(subpageFilename('toylib::WordGraph', 'Constructors')).toBe('toylib__wordgraph__constructors.rst');
    });
  });

  describe('stripNamespacePrefix', () => {
    it('should drop a leading root namespace', () => {
      expect(stripNamespacePrefix('toylib::WordGraph', 'toylib')).toBe('WordGraph');
    });

    it('should keep names in other namespaces', () => {
      expect(stripNamespacePrefix('std::vector', 'toylib')).toBe('std::vector');
    });

    it('should not strip a namespace that only starts with the prefix', () => {
      expect(stripNamespacePrefix('toylibx::Word', 'toylib')).toBe('toylibx::Word');
    });

    it('should leave the empty name alone', () => {
      expect(stripNamespacePrefix('', 'toylib')).toBe('');
    });
  });

  describe('unqualifiedName', () => {
    it('should return the last segment', () => {
      expect(unqualifiedName('toylib::WordGraph::Edge')).toBe('Edge');
      expect(unqualifiedName('WordGraph')).toBe('WordGraph');
    });
  });

  describe('doxygenRefId', () => {
    it('should mangle scopes and uppercase letters', () => {
      expect(doxygenRefId('toylib::WordGraph')).toBe('toylib_1_1_word_graph');
      expect(doxygenRefId('toylib::WordGraph::Edge')).toBe('toylib_1_1_word_graph_1_1_edge');
    });

    it('should double underscores', () => {
      expect(doxygenRefId('toylib::word_graph')).toBe('toylib_1_1word__graph');
    });
  });
});
