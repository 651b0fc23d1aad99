/**
 * Helpers for building, converting and inspecting {@link ParsedValue} trees.
 *
 * @module parsedValue
 */

import type { ListNode, MappingNode, ParsedValue, PlainValue, ScalarNode, ScalarValue } from '../types';

export const scalarNode = (value: ScalarValue): ScalarNode => ({ type: 'scalar', value });

export const listNode = (items: ParsedValue[] = []): ListNode => ({ type: 'list', items });

export const mappingNode = (entries: Iterable<[string, ParsedValue]> = []): MappingNode => ({
    type: 'mapping',
    entries: new Map(entries)
});

/**
 * Converts a tree to plain objects, arrays and scalars.
 * Keys are defined as own properties, so `__proto__` stays an ordinary key.
 */
export const toPlainValue = (value: ParsedValue): PlainValue => {
    switch (value.type) {
        case 'scalar':
            return value.value;
        case 'list':
            return value.items.map(toPlainValue);
        case 'mapping': {
            const plain: { [key: string]: PlainValue } = {};
            for (const [key, entry] of value.entries) {
                Object.defineProperty(plain, key, {
                    value: toPlainValue(entry),
                    enumerable: true,
                    writable: true,
                    configurable: true
                });
            }
            return plain;
        }
    }
};

/**
 * Converts the output of an external parser into a tree.
 * Dates become ISO strings, bigints become numbers and any other
 * non-JSON value becomes its string form.
 */
export const fromPlainValue = (value: unknown): ParsedValue => {
    if (value === null || value === undefined) return scalarNode(null);
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return scalarNode(value);
    }
    if (typeof value === 'bigint') return scalarNode(Number(value));
    if (value instanceof Date) return scalarNode(value.toISOString());
    if (Array.isArray(value)) return listNode(value.map(fromPlainValue));
    if (value instanceof Map) {
        return mappingNode(Array.from(value, ([key, entry]): [string, ParsedValue] => [String(key), fromPlainValue(entry)]));
    }
    if (typeof value === 'object') {
        return mappingNode(Object.entries(value).map(([key, entry]): [string, ParsedValue] => [key, fromPlainValue(entry)]));
    }
    return scalarNode(String(value));
};

/**
 * Serialises a tree to a stable string, keeping mapping key order.
 */
export const toCanonicalString = (value: ParsedValue): string => JSON.stringify(toPlainValue(value));
