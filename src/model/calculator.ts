/**
 * CFP aggregation. One Cosmic Function Point per data movement.
 *
 * @module calculator
 */

import { DataMovementType } from '../types';
import type { FunctionalProcess, FunctionalProcessSummary, SystemMeasurement } from '../types';

export const countMovements = (process: FunctionalProcess, movementType: DataMovementType): number =>
    process.dataMovements.filter(movement => movement.movementType === movementType).length;

export const processCfp = (process: FunctionalProcess): number => process.dataMovements.length;

export const summarizeProcess = (process: FunctionalProcess): FunctionalProcessSummary => ({
    name: process.name,
    entryCount: countMovements(process, DataMovementType.ENTRY),
    exitCount: countMovements(process, DataMovementType.EXIT),
    readCount: countMovements(process, DataMovementType.READ),
    writeCount: countMovements(process, DataMovementType.WRITE),
    totalCfp: processCfp(process),
    trigger: process.trigger,
    objectOfInterest: process.objectOfInterest,
    description: process.description
});

/**
 * Summaries of every functional process, in configuration order.
 */
export const summarizeMeasurement = (measurement: SystemMeasurement): FunctionalProcessSummary[] =>
    measurement.functionalProcesses.map(summarizeProcess);

export const totalCfp = (measurement: SystemMeasurement): number =>
    measurement.functionalProcesses.reduce((sum, process) => sum + processCfp(process), 0);
