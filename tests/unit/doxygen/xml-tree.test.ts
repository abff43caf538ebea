/**
 * @file xml-tree.test.ts
 * @module tests/unit/doxygen/xml-tree
 * @license MIT
 *
 * @fileoverview Unit tests for the Doxygen XML tree and its queries.
 */

import {
  DOCUMENT_TAG,
  attr,
  child,
  childElements,
  find,
  findAll,
  parseXml,
  textOf,
} from '../../../src/doxygen/xml-tree.js';

describe('xml-tree', () => {
  const xml = `<?xml version='1.0' encoding='UTF-8'?>
<doxygen version="1.9.8">
  <compounddef id="c1" kind="class">
    <compoundname>toylib::Word</compoundname>
    <sectiondef kind="public-func">
      <memberdef kind="function" prot="public"><name>size</name><type>size_t</type></memberdef>
      <memberdef kind="function" prot="public"><name>operator&lt;&lt;</name></memberdef>
    </sectiondef>
    <briefdescription><para>A <![CDATA[word]]> of letters.</para></briefdescription>
  </compounddef>
</doxygen>`;

  it('should wrap the document in a synthetic root', () => {
    const doc = parseXml(xml);

    expect(doc.tag).toBe(DOCUMENT_TAG);
    expect(childElements(doc).map(el => el.tag)).toEqual(['doxygen']);
  });

  it('should keep attributes', () => {
    const compound = find(parseXml(xml), 'compounddef');

    expect(compound).toBeDefined();
    expect(compound && attr(compound, 'kind')).toBe('class');
    expect(compound && attr(compound, 'missing')).toBeUndefined();
  });

  it('should decode entities', () => {
    const names = findAll(parseXml(xml), 'name').map(textOf);

    expect(names).toEqual(['size', 'operator<<']);
  });

  it('should turn CDATA into text', () => {
    const para = find(parseXml(xml), 'para');

    expect(para && textOf(para)).toBe('A word of letters.');
  });

  it('should only return direct children from child', () => {
    const compound = find(parseXml(xml), 'compounddef');

    expect(compound && child(compound, 'memberdef')).toBeUndefined();
    expect(compound && child(compound, 'compoundname')?.tag).toBe('compoundname');
  });

  it('should find descendants in document order', () => {
    const members = findAll(parseXml(xml), 'memberdef');

    expect(members).toHaveLength(2);
    expect(members.map(m => textOf(m.children[0]))).toEqual(['size', 'operator<<']);
  });

  it('should keep whitespace text between elements', () => {
    const compound = find(parseXml(xml), 'compounddef');
    const first = compound?.children[0];

    expect(first?.type).toBe('text');
  });
});
