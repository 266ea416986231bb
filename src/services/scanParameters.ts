import type { Position, ScanParameters } from '@/types';

import { InvalidParameterError } from './scanErrors';

export interface ParameterError {
    field: string;
    message: string;
}

export type ScanParametersParseResult =
    | { ok: true; value: ScanParameters }
    | { ok: false; error: ParameterError };

type IntegerField = { field: string; min: number };

const EXTENSION: IntegerField = { field: 'extension', min: 0 };
const CENTER_X: IntegerField = { field: 'center.x', min: Number.MIN_SAFE_INTEGER };
const CENTER_Y: IntegerField = { field: 'center.y', min: Number.MIN_SAFE_INTEGER };
const STEPSIZE: IntegerField = { field: 'stepsize', min: 1 };
const DELAY_MS: IntegerField = { field: 'delayMs', min: 0 };
const SPEED: IntegerField = { field: 'speed', min: 1 };

const INTEGER_TEXT = /^[+-]?\d+$/;

const toInteger = (value: unknown): number | null => {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) ? value : null;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (!INTEGER_TEXT.test(trimmed)) {
            return null;
        }
        const parsed = Number.parseInt(trimmed, 10);
        return Number.isSafeInteger(parsed) ? parsed : null;
    }
    return null;
};

const readInteger = (
    value: unknown,
    { field, min }: IntegerField,
): { ok: true; value: number } | { ok: false; error: ParameterError } => {
    const parsed = toInteger(value);
    if (parsed === null) {
        return { ok: false, error: { field, message: `${field} must be an integer` } };
    }
    if (parsed < min) {
        return { ok: false, error: { field, message: `${field} must be at least ${min}` } };
    }
    return { ok: true, value: parsed };
};

const asRecord = (value: unknown): Record<string, unknown> =>
    value !== null && typeof value === 'object' ? Object.fromEntries(Object.entries(value)) : {};

/**
 * Parse scan parameters from loosely typed input, such as the text of form
 * fields. Nothing is coerced beyond trimming and integer parsing.
 */
export const parseScanParameters = (input: unknown): ScanParametersParseResult => {
    const raw = asRecord(input);
    const center = asRecord(raw['center']);

    const extension = readInteger(raw['extension'], EXTENSION);
    if (!extension.ok) return extension;
    const x = readInteger(center['x'], CENTER_X);
    if (!x.ok) return x;
    const y = readInteger(center['y'], CENTER_Y);
    if (!y.ok) return y;
    const stepsize = readInteger(raw['stepsize'], STEPSIZE);
    if (!stepsize.ok) return stepsize;
    const delayMs = readInteger(raw['delayMs'], DELAY_MS);
    if (!delayMs.ok) return delayMs;
    const speed = readInteger(raw['speed'], SPEED);
    if (!speed.ok) return speed;

    return {
        ok: true,
        value: {
            extension: extension.value,
            center: { x: x.value, y: y.value },
            stepsize: stepsize.value,
            delayMs: delayMs.value,
            speed: speed.value,
        },
    };
};

/** Throws `InvalidParameterError` for the first invalid field. */
export const validateScanParameters = (params: ScanParameters): ScanParameters => {
    const result = parseScanParameters(params);
    if (!result.ok) {
        throw new InvalidParameterError(result.error.field, result.error.message);
    }
    return result.value;
};

export const validateRegion = (center: Position, extension: number): void => {
    const x = readInteger(center.x, CENTER_X);
    if (!x.ok) throw new InvalidParameterError(x.error.field, x.error.message);
    const y = readInteger(center.y, CENTER_Y);
    if (!y.ok) throw new InvalidParameterError(y.error.field, y.error.message);
    const ext = readInteger(extension, EXTENSION);
    if (!ext.ok) throw new InvalidParameterError(ext.error.field, ext.error.message);
};

/** Number of rows, and of columns per row, visited by one raster scan. */
export const computeRasterCount = (extension: number, stepsize: number): number =>
    Math.floor((2 * extension) / stepsize) + 1;
