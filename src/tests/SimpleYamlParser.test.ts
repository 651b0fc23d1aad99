import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { toCanonicalString, toPlainValue } from '../parsers/parsedValue';
import { coerceScalar, parseBlock, parseDocument, preprocessLines } from '../parsers/SimpleYamlParser';
import { CosmicErrorType } from '../utils/errorUtils';

const parse = (text: string) => toPlainValue(parseDocument(text));

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('preprocessLines', () => {
  it('drops blank and comment lines and records indentation', () => {
    expect(preprocessLines('a: 1\n\n  # comment\n  b: two   \n')).toEqual([
      { indent: 0, content: 'a: 1', lineNumber: 1 },
      { indent: 2, content: 'b: two', lineNumber: 4 },
    ]);
  });

  it('handles CRLF line endings', () => {
    expect(preprocessLines('a: 1\r\nb: 2\r\n')).toEqual([
      { indent: 0, content: 'a: 1', lineNumber: 1 },
      { indent: 0, content: 'b: 2', lineNumber: 2 },
    ]);
  });

  it('splits on bare carriage returns', () => {
    expect(preprocessLines('a: 1\rb: 2')).toEqual([
      { indent: 0, content: 'a: 1', lineNumber: 1 },
      { indent: 0, content: 'b: 2', lineNumber: 2 },
    ]);
  });

  it('keeps a hash that is not at the start of the line', () => {
    expect(preprocessLines('note: "# not a comment"')[0].content).toBe('note: "# not a comment"');
  });

  it('rejects tab indentation with the line number', () => {
    const error = thrownBy(() => preprocessLines('a:\n\tb: 1'));
    expect(error).toMatchObject({ type: CosmicErrorType.TAB_INDENTATION });
    expect(String(error)).toContain('(line 2)');
  });

  it('allows tabs after the indentation', () => {
    expect(preprocessLines('a: x\ty')[0].content).toBe('a: x\ty');
  });
});

describe('coerceScalar', () => {
  it('parses integers and floats', () => {
    expect(coerceScalar('42')).toBe(42);
    expect(coerceScalar('-7')).toBe(-7);
    expect(coerceScalar('3.14')).toBe(3.14);
    expect(coerceScalar('.5')).toBe(0.5);
  });

  it('keeps integers beyond the safe range as text', () => {
    expect(coerceScalar('9007199254740991')).toBe(9007199254740991);
    expect(coerceScalar('12345678901234567891')).toBe('12345678901234567891');
    expect(coerceScalar('-9007199254740993')).toBe('-9007199254740993');
  });

  it('parses booleans and null case-insensitively', () => {
    expect(coerceScalar('true')).toBe(true);
    expect(coerceScalar('TRUE')).toBe(true);
    expect(coerceScalar('False')).toBe(false);
    expect(coerceScalar('null')).toBeNull();
    expect(coerceScalar('NULL')).toBeNull();
  });

  it('unwraps matching quotes verbatim', () => {
    expect(coerceScalar("'42'")).toBe('42');
    expect(coerceScalar('"hello world"')).toBe('hello world');
    expect(coerceScalar('"true"')).toBe('true');
    expect(coerceScalar("''")).toBe('');
  });

  it('falls back to the token itself', () => {
    expect(coerceScalar('1.2.3')).toBe('1.2.3');
    expect(coerceScalar('1e5')).toBe('1e5');
    expect(coerceScalar('Order Service')).toBe('Order Service');
    expect(coerceScalar(`'mixed"`)).toBe(`'mixed"`);
  });
});

describe('parseDocument', () => {
  it('parses a flat mapping in key order', () => {
    const value = parse('name: Order Service\ncount: 3\nratio: 0.5\nactive: yes');
    expect(value).toEqual({ name: 'Order Service', count: 3, ratio: 0.5, active: 'yes' });
    expect(Object.keys(value ?? {})).toEqual(['name', 'count', 'ratio', 'active']);
  });

  it('parses a list of scalars', () => {
    expect(parse('- a\n- b\n- c')).toEqual(['a', 'b', 'c']);
  });

  it('parses nested mappings and lists', () => {
    const text = [
      'system:',
      '  name: Svc',
      '  actors:',
      '    - A',
      '    - B',
      'empty:',
    ].join('\n');
    expect(parse(text)).toEqual({ system: { name: 'Svc', actors: ['A', 'B'] }, empty: null });
  });

  it('merges multi-line list item mappings', () => {
    const text = [
      'items:',
      '  - name: one',
      '    size: 1',
      '  - name: two',
    ].join('\n');
    expect(parse(text)).toEqual({ items: [{ name: 'one', size: 1 }, { name: 'two' }] });
  });

  it('merges continuation blocks after a nested list item key', () => {
    const text = [
      '- config:',
      '    depth: 2',
      '  label: x',
    ].join('\n');
    expect(parse(text)).toEqual([{ config: { depth: 2 }, label: 'x' }]);
  });

  it('wraps a scalar item followed by a mapping', () => {
    expect(parse('- parent\n  child: 1')).toEqual([{ parent: { child: 1 } }]);
    expect(parse('- 5\n  x: 1')).toEqual([{ '5': { x: 1 } }]);
  });

  it('flattens a scalar item followed by a list', () => {
    expect(parse('- head\n  - a\n  - b')).toEqual([['head', 'a', 'b']]);
  });

  it('reads bare dashes as null or as the nested block', () => {
    expect(parse('-\n- ')).toEqual([null, null]);
    expect(parse('-\n  a: 1')).toEqual([{ a: 1 }]);
  });

  it('accepts any deeper indentation for nested blocks', () => {
    expect(parse('a:\n   b: 1\n   c: 2\nd: 3')).toEqual({ a: { b: 1, c: 2 }, d: 3 });
  });

  it('starts the root at the first line indentation', () => {
    expect(parse('  a: 1\n  b: 2')).toEqual({ a: 1, b: 2 });
  });

  it('splits on the first colon only', () => {
    expect(parse('url: http://example.test:80')).toEqual({ url: 'http://example.test:80' });
  });

  it('keeps the first position of a repeated key with its last value', () => {
    const value = parse('a: 1\nb: 2\na: 3');
    expect(value).toEqual({ a: 3, b: 2 });
    expect(Object.keys(value ?? {})).toEqual(['a', 'b']);
  });

  it('returns an empty mapping for documents without content', () => {
    expect(parseDocument('')).toEqual({ type: 'mapping', entries: new Map() });
    expect(parse('# only a comment\n\n')).toEqual({});
  });

  it('returns a list root without failing', () => {
    expect(parseDocument('- a').type).toBe('list');
  });

  it('rejects a mapping entry after list items', () => {
    const error = thrownBy(() => parseDocument('- item\nkey: value'));
    expect(error).toMatchObject({ type: CosmicErrorType.STRUCTURE_MIXED });
    expect(String(error)).toContain('Mixed list and mapping structures');
  });

  it('rejects a list item after mapping entries', () => {
    expect(thrownBy(() => parseDocument('key: value\n- item'))).toMatchObject({ type: CosmicErrorType.STRUCTURE_MIXED });
  });

  it('rejects list item continuations that are not mappings', () => {
    const error = thrownBy(() => parseDocument('- key: v\n  - x'));
    expect(error).toMatchObject({ type: CosmicErrorType.LIST_ITEM_NOT_MAPPING });
    expect(String(error)).toContain('(line 2)');
  });

  it('gives the same tree on every parse', () => {
    const text = fs.readFileSync(path.join(__dirname, 'fixtures', 'example_measurement.yaml'), 'utf8');
    expect(toCanonicalString(parseDocument(text))).toBe(toCanonicalString(parseDocument(text)));
  });
});

describe('parseBlock', () => {
  it('parses a sub-range and reports where it stopped', () => {
    const lines = preprocessLines('a: 1\nb:\n  c: 2\nd: 4');
    const result = parseBlock(lines, 2, 2);
    expect(toPlainValue(result.value)).toEqual({ c: 2 });
    expect(result.next).toBe(3);
  });

  it('stops at a shallower line', () => {
    const lines = preprocessLines('x:\n  - 1\n  - 2\ny: 3');
    const result = parseBlock(lines, 1, 2);
    expect(toPlainValue(result.value)).toEqual([1, 2]);
    expect(result.next).toBe(3);
  });
});
