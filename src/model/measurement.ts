/**
 * Measurement Model Builder
 *
 * Turns a parsed configuration tree into a {@link SystemMeasurement}.
 *
 * **Configuration Layout:**
 * ```yaml
 * system:
 *   name: Order Service
 *   boundary: Web shop back end
 *   persistence_resources: [...]
 *   external_actors: [...]
 * objects_of_interest: [...]      # or "objects"
 * functional_processes:
 *   - name: Submit Order
 *     trigger: Customer submits   # optional
 *     ooi: Order                  # or "object_of_interest"
 *     purpose: ...                # or "description"
 *     data_movements:
 *       - type: E                 # E, X, R, W or entry, exit, read, write
 *         description: Order details
 *         code_reference: ...     # optional
 *         notes: ...              # or "additional_notes"
 * ```
 *
 * Fields with several accepted names list them in {@link FIELD_ALIASES}; the first alias
 * holding a non-empty value wins.
 *
 * @module measurement
 */

import { z } from 'zod';
import { toPlainValue } from '../parsers/parsedValue';
import { DataMovementType } from '../types';
import type { CosmicConfig, DataMovement, FunctionalProcess, ParsedValue, PlainValue, SystemMeasurement } from '../types';
import { CosmicErrorType, getCosmicError } from '../utils/errorUtils';

/**
 * Accepted names per field, in lookup order.
 */
export const FIELD_ALIASES = {
    objectOfInterest: ['object_of_interest', 'ooi'],
    notes: ['notes', 'additional_notes'],
    processDescription: ['description', 'purpose'],
    objects: ['objects', 'objects_of_interest']
} as const;

const MOVEMENT_TYPE_NAMES: Record<string, DataMovementType> = {
    E: DataMovementType.ENTRY,
    ENTRY: DataMovementType.ENTRY,
    X: DataMovementType.EXIT,
    EXIT: DataMovementType.EXIT,
    R: DataMovementType.READ,
    READ: DataMovementType.READ,
    W: DataMovementType.WRITE,
    WRITE: DataMovementType.WRITE
};

type PlainRecord = { [key: string]: PlainValue };

const text = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value).trim());
const optionalText = text.nullish().transform(value => value || undefined);
const textList = z.array(text).nullish().transform(value => value ?? []);
const recordList = z.array(z.record(z.unknown())).nullish().transform(value => value ?? []);

const movementSchema = z.object({
    type: text,
    description: text,
    objectOfInterest: optionalText,
    trigger: optionalText,
    code_reference: optionalText,
    notes: optionalText
});

const processSchema = z.object({
    name: text,
    description: optionalText,
    trigger: optionalText,
    objectOfInterest: optionalText,
    data_movements: recordList
});

const systemSchema = z.object({
    name: optionalText,
    boundary: optionalText,
    description: optionalText,
    persistence_resources: textList,
    external_actors: textList
});

const rootSchema = z.object({
    system: z.record(z.unknown()).nullish(),
    objects: textList,
    functional_processes: recordList
});

const isPlainRecord = (value: unknown): value is PlainRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Returns the value of the first alias holding a non-empty value.
 * Only own keys count; inherited properties are never aliases.
 */
export const resolveAlias = (payload: { [key: string]: unknown }, aliases: readonly string[]): unknown => {
    for (const alias of aliases) {
        if (!Object.hasOwn(payload, alias)) continue;
        const value = payload[alias];
        if (value !== undefined && value !== null && value !== '') return value;
    }
    return undefined;
};

/**
 * Follows `keys` into nested objects and arrays. Null counts as absent.
 */
const valueAt = (payload: unknown, keys: (string | number)[]): unknown => {
    let current = payload;
    for (const key of keys) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, key);
    }
    return current ?? undefined;
};

/**
 * Validates `payload` against `schema`, turning the first issue into a {@link CosmicError}.
 */
const validate = <T extends z.ZodTypeAny>(schema: T, payload: unknown, label: string, config: CosmicConfig): z.output<T> => {
    const result = schema.safeParse(payload);
    if (result.success) return result.data;

    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    if (valueAt(payload, issue.path) === undefined) {
        throw getCosmicError(CosmicErrorType.MISSING_FIELD, config, `${label} definition must include a '${field}' field.`);
    }
    throw getCosmicError(CosmicErrorType.INVALID_FIELD, config, `${label} field '${field}' is invalid: ${issue.message}.`);
};

/**
 * Parses a data movement type code, case-insensitively.
 *
 * @throws {CosmicError} INVALID_MOVEMENT_TYPE for anything but E, X, R, W or their names
 */
export const parseMovementType = (value: string, config: CosmicConfig = {}): DataMovementType => {
    const movementType = MOVEMENT_TYPE_NAMES[value.trim().toUpperCase()];
    if (!movementType) {
        throw getCosmicError(CosmicErrorType.INVALID_MOVEMENT_TYPE, config, value);
    }
    return movementType;
};

export const buildDataMovement = (payload: { [key: string]: unknown }, config: CosmicConfig = {}): DataMovement => {
    const movement = validate(movementSchema, {
        ...payload,
        objectOfInterest: resolveAlias(payload, FIELD_ALIASES.objectOfInterest),
        notes: resolveAlias(payload, FIELD_ALIASES.notes)
    }, 'Data movement', config);

    return {
        movementType: parseMovementType(movement.type, config),
        description: movement.description,
        objectOfInterest: movement.objectOfInterest,
        trigger: movement.trigger,
        codeReference: movement.code_reference,
        notes: movement.notes
    };
};

export const buildFunctionalProcess = (payload: { [key: string]: unknown }, config: CosmicConfig = {}): FunctionalProcess => {
    const parsed = validate(processSchema, {
        ...payload,
        description: resolveAlias(payload, FIELD_ALIASES.processDescription),
        objectOfInterest: resolveAlias(payload, FIELD_ALIASES.objectOfInterest)
    }, 'Functional process', config);

    return {
        name: parsed.name,
        description: parsed.description,
        trigger: parsed.trigger,
        objectOfInterest: parsed.objectOfInterest,
        dataMovements: parsed.data_movements.map(item => buildDataMovement(item, config))
    };
};

/**
 * Builds a measurement from a parsed configuration.
 *
 * @param root - The parsed configuration; must be a mapping
 * @param config - Configuration
 * @throws {CosmicError} ROOT_NOT_MAPPING, MISSING_FIELD, INVALID_FIELD or INVALID_MOVEMENT_TYPE
 */
export const buildMeasurement = (root: ParsedValue, config: CosmicConfig = {}): SystemMeasurement => {
    const payload = toPlainValue(root);
    if (root.type !== 'mapping' || !isPlainRecord(payload)) {
        throw getCosmicError(CosmicErrorType.ROOT_NOT_MAPPING, config);
    }

    const measurement = validate(rootSchema, {
        ...payload,
        objects: resolveAlias(payload, FIELD_ALIASES.objects)
    }, 'Measurement', config);
    const system = validate(systemSchema, measurement.system ?? {}, 'System', config);

    return {
        name: system.name ?? 'Unnamed System',
        boundary: system.boundary,
        description: system.description,
        persistenceResources: system.persistence_resources,
        externalActors: system.external_actors,
        objectsOfInterest: measurement.objects,
        functionalProcesses: measurement.functional_processes.map(item => buildFunctionalProcess(item, config))
    };
};
