/**
 * Built-in YAML Subset Parser
 *
 * Reads the restricted YAML dialect used by measurement configuration files
 * when the full `yaml` library is not used.
 *
 * **Supported Syntax:**
 * ```yaml
 * # comment lines
 * system:
 *   name: Order Service
 *   external_actors:
 *     - Customer
 * functional_processes:
 *   - name: Submit Order
 *     data_movements:
 *       - type: E
 *         description: "Order details"
 * ```
 *
 * - Indentation (number of leading spaces) is the only nesting signal
 * - `key: value` and `key:` mapping entries
 * - `- ` list items holding scalars, single `key: value` pairs or multi-line mappings
 * - Scalars: quoted strings, true/false/null, integers, floats, bare strings
 *
 * **Not Supported:** flow collections, anchors and aliases, block scalars (`|`, `>`),
 * tags, multiple documents, inline comments, tab indentation.
 *
 * **Parser Architecture:**
 * 1. **Line Phase** (`preprocessLines`): drops blank and comment lines and splits indentation from content
 * 2. **Tree Phase** (`parseBlock`): recursively builds the value tree, one call per indentation block
 *
 * @module SimpleYamlParser
 */

import type { ConfigParser, LineRecord, ListNode, MappingNode, ParsedValue, ScalarValue } from '../types';
import { CosmicErrorType, parseError } from '../utils/errorUtils';
import { listNode, mappingNode, scalarNode } from './parsedValue';

const INTEGER_PATTERN = /^[+-]?\d+(?:_\d+)*$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+(?:_\d+)*\.(?:\d+(?:_\d+)*)?|\.\d+(?:_\d+)*)(?:[eE][+-]?\d+)?$/;

/**
 * Result of parsing one indentation block.
 */
export interface BlockResult {
    value: ParsedValue;
    /** Index of the first line that does not belong to the block. */
    next: number;
}

/**
 * Splits raw configuration text into indentation-tagged lines.
 * Blank lines and lines starting with `#` are dropped; there is no inline comment stripping.
 *
 * @param text - The raw file text
 * @returns One record per remaining line, in file order
 * @throws {CosmicError} TAB_INDENTATION if a tab appears in a line's indentation
 */
export const preprocessLines = (text: string): LineRecord[] => {
    const records: LineRecord[] = [];
    const rawLines = text.split(/\r\n|\r|\n/);

    for (let i = 0; i < rawLines.length; i++) {
        const line = rawLines[i].trimEnd();
        if (!line) continue;
        if (line.trimStart().startsWith('#')) continue;

        const leading = /^[ \t]*/.exec(line)?.[0] ?? '';
        if (leading.includes('\t')) {
            throw parseError(CosmicErrorType.TAB_INDENTATION, i + 1);
        }

        records.push({
            indent: leading.length,
            content: line.slice(leading.length),
            lineNumber: i + 1
        });
    }
    return records;
};

/**
 * Converts a raw token into a typed scalar.
 *
 * Precedence: matching quotes, booleans, null, integer, float (only when the token contains a `.`),
 * then the token itself. Never throws; anything unrecognised stays a string.
 *
 * @example
 * ```typescript
 * coerceScalar("42");    // 42
 * coerceScalar("3.14");  // 3.14
 * coerceScalar("TRUE");  // true
 * coerceScalar("'42'");  // "42"
 * ```
 */
export const coerceScalar = (token: string): ScalarValue => {
    if (token.length >= 2) {
        const first = token[0];
        if ((first === '"' || first === "'") && token[token.length - 1] === first) {
            return token.slice(1, -1);
        }
    }

    const lowered = token.toLowerCase();
    if (lowered === 'true' || lowered === 'false') return lowered === 'true';
    if (lowered === 'null') return null;

    if (INTEGER_PATTERN.test(token)) {
        const integer = Number.parseInt(token.replace(/_/g, ''), 10);
        // beyond 2^53 the digits would change
        return Number.isSafeInteger(integer) ? integer : token;
    }
    if (token.includes('.') && FLOAT_PATTERN.test(token)) {
        return Number.parseFloat(token.replace(/_/g, ''));
    }
    return token;
};

/**
 * Splits `key: rest` on the first colon. Returns null when the text has no colon.
 */
const splitKeyValue = (text: string): { key: string; rest: string } | null => {
    const colon = text.indexOf(':');
    if (colon === -1) return null;
    return {
        key: text.slice(0, colon).trim(),
        rest: text.slice(colon + 1).trimStart()
    };
};

const isListItem = (content: string): boolean => content === '-' || content.startsWith('- ');

/**
 * True if the line at `index` exists and is indented deeper than `indent`.
 */
const deeperAt = (lines: LineRecord[], index: number, indent: number): boolean =>
    index < lines.length && lines[index].indent > indent;

/**
 * Builds the value of a list item that starts with `key:`, merging every further
 * mapping block that continues the item on deeper-indented lines.
 */
const parseListItemMapping = (lines: LineRecord[], start: number, itemIndent: number, key: string, rest: string): BlockResult => {
    const item = mappingNode();
    let index = start;

    if (rest) {
        item.entries.set(key, scalarNode(coerceScalar(rest)));
    } else if (deeperAt(lines, index, itemIndent)) {
        const nested = parseBlock(lines, index, lines[index].indent);
        item.entries.set(key, nested.value);
        index = nested.next;
    } else {
        item.entries.set(key, scalarNode(null));
    }

    while (deeperAt(lines, index, itemIndent)) {
        const lineNumber = lines[index].lineNumber;
        const extra = parseBlock(lines, index, lines[index].indent);
        if (extra.value.type !== 'mapping') {
            throw parseError(CosmicErrorType.LIST_ITEM_NOT_MAPPING, lineNumber);
        }
        for (const [extraKey, extraValue] of extra.value.entries) {
            item.entries.set(extraKey, extraValue);
        }
        index = extra.next;
    }
    return { value: item, next: index };
};

/**
 * Builds the value of a list item holding a bare scalar, wrapping any deeper continuation:
 * a mapping becomes `{ scalar: mapping }`, anything else `[scalar, ...continuation]`.
 */
const parseListItemScalar = (lines: LineRecord[], start: number, itemIndent: number, text: string): BlockResult => {
    const scalar = coerceScalar(text);
    if (!deeperAt(lines, start, itemIndent)) {
        return { value: scalarNode(scalar), next: start };
    }

    const nested = parseBlock(lines, start, lines[start].indent);
    if (nested.value.type === 'mapping') {
        return { value: mappingNode([[String(scalar), nested.value]]), next: nested.next };
    }
    const rest = nested.value.type === 'list' ? nested.value.items : [nested.value];
    return { value: listNode([scalarNode(scalar), ...rest]), next: nested.next };
};

/**
 * Parses one indentation block.
 *
 * Reads lines from `start` while their indentation is at least `indent`. A block holds either
 * list items or mapping entries; mixing both at one level is an error. Nested blocks start at
 * the indentation of their first line, which only has to be deeper than the parent line.
 * A block without any line yields an empty mapping.
 *
 * @param lines - Output of {@link preprocessLines}
 * @param start - Index of the first line of the block
 * @param indent - Minimum indentation of lines belonging to the block
 * @returns The block value and the index of the first line after it
 * @throws {CosmicError} STRUCTURE_MIXED or LIST_ITEM_NOT_MAPPING
 */
export const parseBlock = (lines: LineRecord[], start: number, indent: number): BlockResult => {
    let result: ListNode | MappingNode | null = null;
    let index = start;

    while (index < lines.length) {
        const { indent: currentIndent, content, lineNumber } = lines[index];
        if (currentIndent < indent) break;

        if (isListItem(content)) {
            if (result === null) {
                result = listNode();
            } else if (result.type !== 'list') {
                throw parseError(CosmicErrorType.STRUCTURE_MIXED, lineNumber);
            }
            const itemText = content.slice(1).trim();
            index++;

            let item: BlockResult;
            if (!itemText) {
                item = deeperAt(lines, index, currentIndent)
                    ? parseBlock(lines, index, lines[index].indent)
                    : { value: scalarNode(null), next: index };
            } else {
                const pair = splitKeyValue(itemText);
                item = pair
                    ? parseListItemMapping(lines, index, currentIndent, pair.key, pair.rest)
                    : parseListItemScalar(lines, index, currentIndent, itemText);
            }
            result.items.push(item.value);
            index = item.next;
            continue;
        }

        if (result === null) {
            result = mappingNode();
        } else if (result.type !== 'mapping') {
            throw parseError(CosmicErrorType.STRUCTURE_MIXED, lineNumber);
        }
        const pair = splitKeyValue(content) ?? { key: content.trim(), rest: '' };
        index++;

        if (pair.rest) {
            result.entries.set(pair.key, scalarNode(coerceScalar(pair.rest)));
        } else if (deeperAt(lines, index, currentIndent)) {
            const nested = parseBlock(lines, index, lines[index].indent);
            result.entries.set(pair.key, nested.value);
            index = nested.next;
        } else {
            result.entries.set(pair.key, scalarNode(null));
        }
    }

    return { value: result ?? mappingNode(), next: index };
};

/**
 * Parses a whole document. The root block starts at the indentation of the first line.
 * The root may be a list; rejecting non-mapping roots is left to the caller.
 */
export const parseDocument = (text: string): ParsedValue => {
    const lines = preprocessLines(text);
    return parseBlock(lines, 0, lines.length > 0 ? lines[0].indent : 0).value;
};

/**
 * The built-in parser as a {@link ConfigParser}.
 */
export const builtinYamlParser: ConfigParser = {
    name: 'builtin',
    parse: parseDocument
};
