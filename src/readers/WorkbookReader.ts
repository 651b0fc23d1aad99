/**
 * Workbook Reader
 *
 * Reads back the sheets of an XLSX archive, such as one produced by {@link WorkbookPackager}.
 * Only cell values are read: numbers (date cells included, as serial numbers), inline strings,
 * shared strings and booleans. Gaps in sparse rows are filled with null.
 *
 * @module WorkbookReader
 */

import * as fileType from 'file-type';
import * as fs from 'fs';
import type { CellValue, CosmicConfig, SheetData, WorkbookContents } from '../types';
import { CosmicErrorType, getCosmicError, getWrappedError } from '../utils/errorUtils';
import { getDirectChildren, getElementsByTagName, parseXmlString } from '../utils/xmlUtils';
import { extractFiles } from '../utils/zipUtils';

/**
 * Converts column letters to a 1-based column index ("A" → 1, "AA" → 27).
 */
export const columnIndex = (letters: string): number => {
    let index = 0;
    for (const ch of letters.toUpperCase()) {
        index = index * 26 + (ch.charCodeAt(0) - 64);
    }
    return index;
};

const readCellValue = (cell: Element, sharedStrings: string[]): CellValue => {
    const type = cell.getAttribute('t');
    if (type === 'inlineStr') {
        return getElementsByTagName(cell, 't').map(t => t.textContent ?? '').join('');
    }
    const v = getDirectChildren(cell, 'v')[0];
    if (!v || v.textContent === null) return null;

    switch (type) {
        case 's':
            return sharedStrings[Number(v.textContent)] ?? null;
        case 'str':
            return v.textContent;
        case 'b':
            return v.textContent === '1';
        default:
            return Number(v.textContent);
    }
};

const readSheetRows = (xml: string, sharedStrings: string[]): CellValue[][] => {
    const doc = parseXmlString(xml);
    const rows: CellValue[][] = [];

    for (const row of getElementsByTagName(doc, 'row')) {
        const rowNumber = Number(row.getAttribute('r') ?? rows.length + 1);
        const values: CellValue[] = [];
        for (const cell of getDirectChildren(row, 'c')) {
            const ref = /^([A-Z]+)/i.exec(cell.getAttribute('r') ?? '');
            const column = ref ? columnIndex(ref[1]) : values.length + 1;
            while (values.length < column - 1) values.push(null);
            values[column - 1] = readCellValue(cell, sharedStrings);
        }
        while (rows.length < rowNumber - 1) rows.push([]);
        rows[rowNumber - 1] = values;
    }
    return rows;
};

const readSharedStrings = (xml: string | undefined): string[] => {
    if (!xml) return [];
    return getElementsByTagName(parseXmlString(xml), 'si').map(si =>
        getElementsByTagName(si, 't').map(t => t.textContent ?? '').join('')
    );
};

/**
 * Reads the parts and sheets of a workbook archive.
 *
 * @param file - Path of an .xlsx file, or its contents
 * @param config - Configuration
 * @returns The entry paths and the sheets in workbook order
 * @throws {CosmicError} FILE_DOES_NOT_EXIST, LOCATION_NOT_FOUND, FILE_CORRUPTED or INVALID_INPUT
 */
export const readWorkbook = async (file: string | Buffer, config: CosmicConfig = {}): Promise<WorkbookContents> => {
    let filePath: string | undefined;

    try {
        let buffer: Buffer;
        if (Buffer.isBuffer(file)) {
            buffer = file;
            const type = await fileType.fromBuffer(buffer);
            if (!type || (type.ext !== 'xlsx' && type.ext !== 'zip')) {
                throw getCosmicError(CosmicErrorType.FILE_CORRUPTED, config, 'buffer');
            }
        } else if (typeof file === 'string') {
            filePath = file;
            if (!fs.existsSync(file)) {
                throw getCosmicError(CosmicErrorType.FILE_DOES_NOT_EXIST, config, file);
            }
            if (fs.lstatSync(file).isDirectory()) {
                throw getCosmicError(CosmicErrorType.LOCATION_NOT_FOUND, config, file);
            }
            buffer = fs.readFileSync(file);
        } else {
            throw getCosmicError(CosmicErrorType.INVALID_INPUT, config);
        }

        const files = await extractFiles(buffer, () => true);
        const text = (partPath: string): string | undefined =>
            files.find(f => f.path === partPath)?.content.toString('utf8');

        const workbookXml = text('xl/workbook.xml');
        if (!workbookXml) {
            throw getCosmicError(CosmicErrorType.FILE_CORRUPTED, config, filePath ?? 'buffer');
        }

        const targets = new Map<string, string>();
        const relsXml = text('xl/_rels/workbook.xml.rels');
        if (relsXml) {
            for (const rel of getElementsByTagName(parseXmlString(relsXml), 'Relationship')) {
                targets.set(rel.getAttribute('Id') ?? '', rel.getAttribute('Target') ?? '');
            }
        }

        const sharedStrings = readSharedStrings(text('xl/sharedStrings.xml'));
        const sheets: SheetData[] = getElementsByTagName(parseXmlString(workbookXml), 'sheet').map((sheet, i) => {
            const target = targets.get(sheet.getAttribute('r:id') ?? '') ?? `worksheets/sheet${i + 1}.xml`;
            const sheetXml = text(target.startsWith('/') ? target.slice(1) : `xl/${target}`);
            return {
                name: sheet.getAttribute('name') ?? `Sheet${i + 1}`,
                rows: sheetXml ? readSheetRows(sheetXml, sharedStrings) : []
            };
        });

        return { parts: files.map(f => f.path), sheets };
    } catch (error: unknown) {
        throw getWrappedError(error, config, filePath);
    }
};
