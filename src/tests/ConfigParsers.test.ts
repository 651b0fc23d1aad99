import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatFromExtension, jsonParser, resolveConfigParser } from '../parsers/ConfigParsers';
import { fromPlainValue, toCanonicalString, toPlainValue } from '../parsers/parsedValue';
import { parseDocument } from '../parsers/SimpleYamlParser';
import { CosmicErrorType } from '../utils/errorUtils';

const fixture = fs.readFileSync(path.join(__dirname, 'fixtures', 'example_measurement.yaml'), 'utf8');

describe('resolveConfigParser', () => {
  it('always reads JSON with the JSON parser', async () => {
    expect((await resolveConfigParser('json', { parser: 'builtin' })).name).toBe('json');
  });

  it('honours the builtin preference', async () => {
    expect((await resolveConfigParser('yaml', { parser: 'builtin' })).name).toBe('builtin');
  });

  it('uses the yaml package when it is installed', async () => {
    expect((await resolveConfigParser('yaml', {})).name).toBe('yaml');
    expect((await resolveConfigParser('yaml', { parser: 'library' })).name).toBe('yaml');
  });

  it('gives the same tree from the built-in parser and the yaml package', async () => {
    const builtin = await resolveConfigParser('yaml', { parser: 'builtin' });
    const library = await resolveConfigParser('yaml', { parser: 'library' });
    expect(toCanonicalString(builtin.parse(fixture))).toBe(toCanonicalString(library.parse(fixture)));

    const scalars = "a: 42\nb: 3.14\nc: true\nd: null\ne: '42'\nf: plain text";
    expect(toPlainValue(builtin.parse(scalars))).toEqual(toPlainValue(library.parse(scalars)));
  });
});

describe('resolveConfigParser without the yaml package', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.doMock('yaml', () => {
      throw new Error("Cannot find module 'yaml'");
    });
  });

  afterEach(() => {
    vi.doUnmock('yaml');
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('falls back to the built-in parser and warns', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const parsers = await import('../parsers/ConfigParsers');

    expect((await parsers.resolveConfigParser('yaml', { outputErrorToConsole: true })).name).toBe('builtin');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("[CosmicCFP]: The 'yaml' package is not available, falling back to the built-in parser.");
  });

  it('stays quiet unless errors go to the console', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const parsers = await import('../parsers/ConfigParsers');

    expect((await parsers.resolveConfigParser('yaml', {})).name).toBe('builtin');
    expect(warn).not.toHaveBeenCalled();
  });

  it('rejects the library preference', async () => {
    const parsers = await import('../parsers/ConfigParsers');
    await expect(parsers.resolveConfigParser('yaml', { parser: 'library' })).rejects.toMatchObject({
      type: CosmicErrorType.PARSER_UNAVAILABLE,
    });
  });
});

describe('jsonParser', () => {
  it('keeps key order', () => {
    const value = jsonParser.parse('{"b": 1, "a": [true, null, "x"]}');
    expect(toCanonicalString(value)).toBe('{"b":1,"a":[true,null,"x"]}');
  });
});

describe('fromPlainValue', () => {
  it('converts dates and maps', () => {
    const value = fromPlainValue(new Map<string, unknown>([['when', new Date(Date.UTC(2024, 0, 1))]]));
    expect(toPlainValue(value)).toEqual({ when: '2024-01-01T00:00:00.000Z' });
  });
});

describe('toPlainValue', () => {
  it('keeps __proto__ as an own key', () => {
    const plain = toPlainValue(parseDocument('__proto__:\n  ooi: Injected\nname: x'));
    expect(Object.keys(plain ?? {})).toEqual(['__proto__', 'name']);
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    expect(Reflect.get(Object.prototype, 'ooi')).toBeUndefined();
    expect(toCanonicalString(parseDocument('__proto__:\n  ooi: Injected\nname: x'))).toBe(
      '{"__proto__":{"ooi":"Injected"},"name":"x"}'
    );
  });
});

describe('formatFromExtension', () => {
  it('maps extensions case-insensitively', () => {
    expect(formatFromExtension('.YML')).toBe('yaml');
    expect(formatFromExtension('yaml')).toBe('yaml');
    expect(formatFromExtension('.json')).toBe('json');
    expect(formatFromExtension('.txt')).toBeNull();
  });
});
