/**
 * ZIP Archive Utilities
 *
 * Provides functions for building ZIP archives in memory and extracting files from them.
 * A workbook (XLSX) is a ZIP archive of XML parts, e.g. xl/workbook.xml and xl/worksheets/sheet1.xml.
 *
 * @module zipUtils
 */

import concat from 'concat-stream';
import yauzl from 'yauzl';
import yazl from 'yazl';

/**
 * Represents a file stored in a ZIP archive.
 */
export interface ZipFileContent {
    /**
     * The relative path of the file within the ZIP archive.
     * @example "xl/workbook.xml", "xl/worksheets/sheet1.xml"
     */
    path: string;

    /**
     * The file content as a Node.js Buffer.
     */
    content: Buffer;
}

/**
 * Modification time stamped on every entry. Fixed, so that the same
 * entries always produce the same archive bytes.
 */
const ENTRY_MTIME = new Date(1980, 0, 1, 0, 0, 0);

/**
 * Builds a deflate-compressed ZIP archive in memory.
 * Entries are written in the order given.
 *
 * @param files - The entries to store
 * @returns A promise resolving to the complete archive
 *
 * @example
 * ```typescript
 * const archive = await createZipBuffer([
 *   { path: 'xl/workbook.xml', content: Buffer.from(workbookXml) }
 * ]);
 * ```
 */
export const createZipBuffer = (files: ZipFileContent[]): Promise<Buffer> => {
    return new Promise((resolve, reject) => {
        const zipfile = new yazl.ZipFile();

        zipfile.outputStream.on('error', reject);
        zipfile.outputStream.pipe(concat((data: Buffer) => resolve(data)));

        for (const file of files) {
            zipfile.addBuffer(file.content, file.path, {
                mtime: ENTRY_MTIME,
                mode: 0o100644,
                compress: true
            });
        }
        zipfile.end();
    });
};

/**
 * Extracts files from a ZIP archive with optional filtering.
 *
 * Uses lazy entry reading, one entry at a time, and returns the files in archive order.
 *
 * @param zipInput - The ZIP file as a Node.js Buffer
 * @param filterFn - A predicate deciding which files to extract from their file name
 * @returns A promise resolving to an array of extracted files
 * @throws {Error} If the ZIP file cannot be opened or an entry cannot be read
 *
 * @example
 * ```typescript
 * const sheets = await extractFiles(xlsxBuffer, (fileName) => fileName.startsWith('xl/worksheets/'));
 * ```
 *
 * @see https://pkware.cachefly.net/webdocs/casestudies/APPNOTE.TXT ZIP file format specification
 */
export const extractFiles = (zipInput: Buffer, filterFn: (fileName: string) => boolean): Promise<ZipFileContent[]> => {
    return new Promise((resolve, reject) => {
        // lazyEntries: true means we manually control when to read each entry
        yauzl.fromBuffer(zipInput, { lazyEntries: true }, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error("Failed to open zip file"));

            const extractedFiles: ZipFileContent[] = [];

            zipfile.readEntry();

            zipfile.on('entry', (entry: yauzl.Entry) => {
                if (!filterFn(entry.fileName)) {
                    zipfile.readEntry();
                    return;
                }
                zipfile.openReadStream(entry, (err, readStream) => {
                    if (err) return reject(err);
                    if (!readStream) return reject(new Error("Failed to open read stream"));

                    readStream.on('error', reject);
                    // Collect the chunks into a single Buffer before moving on
                    readStream.pipe(concat((data: Buffer) => {
                        extractedFiles.push({
                            path: entry.fileName,
                            content: data
                        });
                        zipfile.readEntry();
                    }));
                });
            });

            zipfile.on('end', () => resolve(extractedFiles));
            zipfile.on('error', reject);
        });
    });
};
