/**
 * @file element-kind.test.ts
 * @module tests/unit/renderer/element-kind
 * @license MIT
 *
 * @fileoverview Unit tests for element classification.
 */

import { classifyElement } from '../../../src/renderer/element-kind.js';
import { RenderContext } from '../../../src/renderer/render-context.js';
import type { DoxyElement } from '../../../src/doxygen/types.js';

function element(tag: string, attrs: Record<string, string> = {}): DoxyElement {
  return { type: 'element', tag, attrs, children: [] };
}

describe('classifyElement', () => {
  let context: RenderContext;

  beforeEach(() => {
    context = new RenderContext();
  });

  it('should map plain tags onto their own case', () => {
    expect(classifyElement(element('para'), context)).toBe('para');
    expect(classifyElement(element('computeroutput'), context)).toBe('computeroutput');
    expect(classifyElement(element('memberdef'), context)).toBe('declaration');
  });

  it('should split simplesect and parameterlist by kind', () => {
    expect(classifyElement(element('simplesect', { kind: 'return' }), context)).toBe('simplesect-return');
    expect(classifyElement(element('simplesect', { kind: 'see' }), context)).toBe('simplesect-see');
    expect(classifyElement(element('simplesect', { kind: 'note' }), context)).toBe('passthrough');
    expect(classifyElement(element('parameterlist', { kind: 'exception' }), context)).toBe('parameterlist-exception');
    expect(classifyElement(element('parameterlist', { kind: 'retval' }), context)).toBe('passthrough');
  });

  it('should skip metadata', () => {
    expect(classifyElement(element('location'), context)).toBe('skip');
    expect(classifyElement(element('name'), context)).toBe('skip');
    expect(classifyElement(element('enumvalue'), context)).toBe('skip');
  });

  it('should render names and values inside enums', () => {
    context.push('memberdef');
    context.push('enum');

    expect(classifyElement(element('name'), context)).toBe('enum-name');
    expect(classifyElement(element('enumvalue'), context)).toBe('enumvalue');
  });

  it('should pass unknown tags through', () => {
    expect(classifyElement(element('mystery'), context)).toBe('passthrough');
  });

  it('should not mistake object properties for tags', () => {
    expect(classifyElement(element('constructor'), context)).toBe('passthrough');
    expect(classifyElement(element('toString'), context)).toBe('passthrough');
  });
});
