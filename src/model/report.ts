/**
 * Report Sheets
 *
 * Lays a measurement out as the sheets of the exported workbook:
 * - Summary: `Metric` / `Value` pairs, starting with the total CFP
 * - Functional Processes: one row per process with its E/X/R/W counts
 * - Data Movements: one row per movement, numbered within its process
 * - System (optional): boundary, actors, persistence resources, objects of interest
 *
 * @module report
 */

import type { CellValue, CosmicConfig, SheetData, SystemMeasurement } from '../types';
import { summarizeMeasurement, totalCfp } from './calculator';

export const PROCESS_HEADER = [
    'Functional Process',
    'Trigger',
    'Object of Interest',
    'Description',
    'Entry (E)',
    'Exit (X)',
    'Read (R)',
    'Write (W)',
    'Total CFP'
];

export const MOVEMENT_HEADER = [
    'Functional Process',
    'Sequence',
    'Movement Type',
    'Description',
    'Object of Interest',
    'Trigger',
    'Code Reference',
    'Notes'
];

export const buildSummaryRows = (measurement: SystemMeasurement, reportDate?: Date | null): CellValue[][] => {
    const rows: CellValue[][] = [
        ['Metric', 'Value'],
        ['Total CFP', totalCfp(measurement)],
        ['System', measurement.name],
        ['Functional Processes', measurement.functionalProcesses.length]
    ];
    if (reportDate) rows.push(['Report Date', reportDate]);
    return rows;
};

export const buildProcessRows = (measurement: SystemMeasurement): CellValue[][] => [
    PROCESS_HEADER,
    ...summarizeMeasurement(measurement).map(summary => [
        summary.name,
        summary.trigger,
        summary.objectOfInterest,
        summary.description,
        summary.entryCount,
        summary.exitCount,
        summary.readCount,
        summary.writeCount,
        summary.totalCfp
    ])
];

/**
 * Movement rows fall back to the process trigger and object of interest when they have none.
 */
export const buildMovementRows = (measurement: SystemMeasurement): CellValue[][] => {
    const rows: CellValue[][] = [MOVEMENT_HEADER];
    for (const process of measurement.functionalProcesses) {
        process.dataMovements.forEach((movement, i) => {
            rows.push([
                process.name,
                i + 1,
                movement.movementType,
                movement.description,
                movement.objectOfInterest ?? process.objectOfInterest,
                movement.trigger ?? process.trigger,
                movement.codeReference,
                movement.notes
            ]);
        });
    }
    return rows;
};

/**
 * One `Field` / `Value` row per system attribute; list attributes get one row per element.
 */
export const buildSystemRows = (measurement: SystemMeasurement): CellValue[][] => {
    const rows: CellValue[][] = [
        ['Field', 'Value'],
        ['Name', measurement.name],
        ['Boundary', measurement.boundary],
        ['Description', measurement.description]
    ];
    const lists: [string, string[]][] = [
        ['Persistence Resource', measurement.persistenceResources],
        ['External Actor', measurement.externalActors],
        ['Object of Interest', measurement.objectsOfInterest]
    ];
    for (const [label, values] of lists) {
        for (const value of values) rows.push([label, value]);
    }
    return rows;
};

/**
 * Builds every report sheet, in tab order.
 */
export const buildReportSheets = (measurement: SystemMeasurement, config: CosmicConfig = {}): SheetData[] => {
    const sheets: SheetData[] = [
        { name: config.summarySheetName ?? 'Summary', rows: buildSummaryRows(measurement, config.reportDate) },
        { name: config.processSheetName ?? 'Functional Processes', rows: buildProcessRows(measurement) },
        { name: config.movementSheetName ?? 'Data Movements', rows: buildMovementRows(measurement) }
    ];
    if (config.includeSystemSheet) {
        sheets.push({ name: 'System', rows: buildSystemRows(measurement) });
    }
    return sheets;
};
