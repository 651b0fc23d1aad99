/**
 * Workbook Packager
 *
 * Compresses the parts built by {@link ExcelWriter} into an XLSX archive and publishes it on disk.
 * The archive is assembled in memory and written to a temporary sibling file that is renamed
 * onto the target, so a failed export never leaves a truncated workbook at the output path.
 *
 * @module WorkbookPackager
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CosmicConfig, SheetData } from '../types';
import { CosmicErrorType, errorMessage, getCosmicError } from '../utils/errorUtils';
import { createZipBuffer } from '../utils/zipUtils';
import { buildWorkbookParts } from './ExcelWriter';

/**
 * Builds the XLSX archive for the given sheets.
 * Identical sheets always give identical bytes.
 *
 * @param sheets - Sheets in tab order
 * @returns A promise resolving to the archive
 */
export const packageWorkbook = (sheets: SheetData[]): Promise<Buffer> => {
    const files = buildWorkbookParts(sheets).map(part => ({
        path: part.path,
        content: Buffer.from(part.content, 'utf8')
    }));
    return createZipBuffer(files);
};

/**
 * Writes the XLSX archive for the given sheets, creating or replacing `outputPath`.
 *
 * @param sheets - Sheets in tab order
 * @param outputPath - Target file path
 * @param config - Configuration
 * @returns A promise resolving to the absolute path of the written file
 * @throws {CosmicError} WRITE_FAILED naming the target path and the underlying cause
 */
export const writeWorkbook = async (sheets: SheetData[], outputPath: string, config: CosmicConfig): Promise<string> => {
    const target = path.resolve(outputPath);
    const archive = await packageWorkbook(sheets);
    const tempPath = `${target}.${process.pid}.tmp`;

    try {
        await fs.promises.writeFile(tempPath, archive);
        await fs.promises.rename(tempPath, target);
    } catch (error: unknown) {
        await fs.promises.rm(tempPath, { force: true });
        throw getCosmicError(CosmicErrorType.WRITE_FAILED, config, `'${target}': ${errorMessage(error)}`, error);
    }
    return target;
};
