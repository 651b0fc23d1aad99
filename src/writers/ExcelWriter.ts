/**
 * Excel Spreadsheet (XLSX) Writer
 *
 * Assembles a minimal SpreadsheetML package from plain sheet data, without a spreadsheet library.
 *
 * **Package Structure:**
 * - `[Content_Types].xml` - Content type of every part
 * - `_rels/.rels` - Points at the workbook part
 * - `xl/workbook.xml` - Sheet list (name, sheetId, relationship id)
 * - `xl/_rels/workbook.xml.rels` - Maps `rIdN` to `worksheets/sheetN.xml`
 * - `xl/styles.xml` - Two cell formats: 0 general, 1 date
 * - `xl/worksheets/sheetN.xml` - One per sheet, in workbook order
 *
 * **Cells:**
 * - `<c r="A1"/>` - Empty cell
 * - `<c r="B1"><v>42</v></c>` - Number
 * - `<c r="C1" s="1"><v>45292</v></c>` - Date serial with the date style
 * - `<c r="D1" t="inlineStr"><is><t xml:space="preserve">text</t></is></c>` - Inline string
 *
 * Sheets are sparse: only the rows and cells present in the data are written.
 *
 * @module ExcelWriter
 * @see https://www.ecma-international.org/publications-and-standards/standards/ecma-376/
 */

import type { CellValue, SheetData, WorkbookPart } from '../types';
import { escapeXml, XML_DECLARATION } from '../utils/xmlUtils';

const NS_MAIN = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const NS_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const NS_PKG_REL = 'http://schemas.openxmlformats.org/package/2006/relationships';
const NS_CONTENT_TYPES = 'http://schemas.openxmlformats.org/package/2006/content-types';

const REL_OFFICE_DOCUMENT = `${NS_REL}/officeDocument`;
const REL_WORKSHEET = `${NS_REL}/worksheet`;
const REL_STYLES = `${NS_REL}/styles`;

const CT_RELATIONSHIPS = 'application/vnd.openxmlformats-package.relationships+xml';
const CT_WORKBOOK = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml';
const CT_WORKSHEET = 'application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml';
const CT_STYLES = 'application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml';

/** Fixed part paths. */
export const CONTENT_TYPES_PATH = '[Content_Types].xml';
export const ROOT_RELS_PATH = '_rels/.rels';
export const WORKBOOK_PATH = 'xl/workbook.xml';
export const WORKBOOK_RELS_PATH = 'xl/_rels/workbook.xml.rels';
export const STYLES_PATH = 'xl/styles.xml';

/** Style index of the date cell format in styles.xml. */
export const DATE_STYLE_INDEX = 1;

/** Day zero of the 1900 date system: 1899-12-30, so that 1900-03-01 onward match Excel. */
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Path of the n-th worksheet (1-based) inside the archive.
 */
export const sheetPath = (index: number): string => `xl/worksheets/sheet${index}.xml`;

/**
 * Converts a 1-based column index to its letters.
 *
 * @example
 * ```typescript
 * columnLetter(1);   // "A"
 * columnLetter(27);  // "AA"
 * columnLetter(702); // "ZZ"
 * ```
 */
export const columnLetter = (index: number): string => {
    let letters = '';
    let remaining = index;
    while (remaining > 0) {
        const remainder = (remaining - 1) % 26;
        letters = String.fromCharCode(65 + remainder) + letters;
        remaining = Math.floor((remaining - 1) / 26);
    }
    return letters;
};

/**
 * Whole days between the spreadsheet epoch and the UTC calendar date of `date`.
 */
export const excelDateSerial = (date: Date): number => {
    const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
    return Math.round((day - EXCEL_EPOCH_MS) / MS_PER_DAY);
};

/**
 * Encodes one cell.
 *
 * @param value - The cell value
 * @param row - 1-based row number
 * @param column - 1-based column number
 * @returns The `<c>` element
 */
export const encodeCell = (value: CellValue, row: number, column: number): string => {
    const ref = `${columnLetter(column)}${row}`;

    if (value === null || value === undefined) {
        return `<c r="${ref}"/>`;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return `<c r="${ref}"><v>${String(value)}</v></c>`;
    }
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
        return `<c r="${ref}" s="${DATE_STYLE_INDEX}"><v>${excelDateSerial(value)}</v></c>`;
    }
    return `<c r="${ref}" t="inlineStr"><is><t xml:space="preserve">${escapeXml(String(value))}</t></is></c>`;
};

/**
 * Builds a worksheet part. Rows are numbered from 1 in the order given.
 */
export const buildSheetXml = (sheet: SheetData): string => {
    const rows = sheet.rows.map((row, rowIndex) => {
        const cells = row.map((value, columnIndex) => encodeCell(value, rowIndex + 1, columnIndex + 1)).join('');
        return `<row r="${rowIndex + 1}">${cells}</row>`;
    });
    return XML_DECLARATION +
        `<worksheet xmlns="${NS_MAIN}" xmlns:r="${NS_REL}">` +
        `<sheetData>${rows.join('')}</sheetData>` +
        `</worksheet>`;
};

/**
 * Builds the workbook part. Sheet ids and relationship ids follow list position, from 1.
 */
export const buildWorkbookXml = (sheets: SheetData[]): string => {
    const entries = sheets.map((sheet, i) =>
        `<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`
    );
    return XML_DECLARATION +
        `<workbook xmlns="${NS_MAIN}" xmlns:r="${NS_REL}">` +
        `<sheets>${entries.join('')}</sheets>` +
        `</workbook>`;
};

/**
 * Builds the workbook relationships: `rId1..rIdN` for the sheets, then one for the styles.
 */
export const buildWorkbookRelsXml = (sheetCount: number): string => {
    const relationships: string[] = [];
    for (let i = 1; i <= sheetCount; i++) {
        relationships.push(`<Relationship Id="rId${i}" Type="${REL_WORKSHEET}" Target="worksheets/sheet${i}.xml"/>`);
    }
    relationships.push(`<Relationship Id="rId${sheetCount + 1}" Type="${REL_STYLES}" Target="styles.xml"/>`);
    return XML_DECLARATION +
        `<Relationships xmlns="${NS_PKG_REL}">${relationships.join('')}</Relationships>`;
};

export const buildRootRelsXml = (): string =>
    XML_DECLARATION +
    `<Relationships xmlns="${NS_PKG_REL}">` +
    `<Relationship Id="rId1" Type="${REL_OFFICE_DOCUMENT}" Target="${WORKBOOK_PATH}"/>` +
    `</Relationships>`;

export const buildContentTypesXml = (sheetCount: number): string => {
    const overrides: string[] = [
        `<Override PartName="/${WORKBOOK_PATH}" ContentType="${CT_WORKBOOK}"/>`,
        `<Override PartName="/${STYLES_PATH}" ContentType="${CT_STYLES}"/>`
    ];
    for (let i = 1; i <= sheetCount; i++) {
        overrides.push(`<Override PartName="/${sheetPath(i)}" ContentType="${CT_WORKSHEET}"/>`);
    }
    return XML_DECLARATION +
        `<Types xmlns="${NS_CONTENT_TYPES}">` +
        `<Default Extension="rels" ContentType="${CT_RELATIONSHIPS}"/>` +
        `<Default Extension="xml" ContentType="application/xml"/>` +
        overrides.join('') +
        `</Types>`;
};

/**
 * Builds the style sheet: cell format 0 is General, cell format 1 uses the
 * built-in short date number format (numFmtId 14).
 */
export const buildStylesXml = (): string =>
    XML_DECLARATION +
    `<styleSheet xmlns="${NS_MAIN}">` +
    `<fonts count="1"><font><sz val="11"/><name val="Calibri"/><family val="2"/></font></fonts>` +
    `<fills count="2"><fill><patternFill patternType="none"/></fill><fill><patternFill patternType="gray125"/></fill></fills>` +
    `<borders count="1"><border><left/><right/><top/><bottom/><diagonal/></border></borders>` +
    `<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>` +
    `<cellXfs count="2">` +
    `<xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/>` +
    `<xf numFmtId="14" fontId="0" fillId="0" borderId="0" xfId="0" applyNumberFormat="1"/>` +
    `</cellXfs>` +
    `<cellStyles count="1"><cellStyle name="Normal" xfId="0" builtinId="0"/></cellStyles>` +
    `</styleSheet>`;

/**
 * Builds every part of the package, in archive order: content types, root relationships,
 * workbook, workbook relationships, styles, then the sheets in workbook order.
 */
export const buildWorkbookParts = (sheets: SheetData[]): WorkbookPart[] => [
    { path: CONTENT_TYPES_PATH, content: buildContentTypesXml(sheets.length) },
    { path: ROOT_RELS_PATH, content: buildRootRelsXml() },
    { path: WORKBOOK_PATH, content: buildWorkbookXml(sheets) },
    { path: WORKBOOK_RELS_PATH, content: buildWorkbookRelsXml(sheets.length) },
    { path: STYLES_PATH, content: buildStylesXml() },
    ...sheets.map((sheet, i) => ({ path: sheetPath(i + 1), content: buildSheetXml(sheet) }))
];
