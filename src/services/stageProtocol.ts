import type { Axis } from '@/types';

import { InvalidParameterError } from './scanErrors';

const assertInteger = (field: string, value: number): void => {
    if (!Number.isSafeInteger(value)) {
        throw new InvalidParameterError(field, `${field} must be an integer, got ${value}`);
    }
};

/** Encode a relative move, e.g. `x+10` or `y-2`. */
export const formatMoveCommand = (axis: Axis, delta: number): string => {
    assertInteger('delta', delta);
    if (delta === 0) {
        throw new InvalidParameterError('delta', 'A move command needs a non-zero delta');
    }
    const sign = delta > 0 ? '+' : '-';
    return `${axis}${sign}${Math.abs(delta)}`;
};

export const formatSpeedCommand = (speed: number): string => {
    assertInteger('speed', speed);
    return `set speed=${speed}`;
};

export const formatSettleDelayCommand = (delayMs: number): string => {
    assertInteger('delayMs', delayMs);
    return `set tau=${delayMs}`;
};

const MOVE_COMMAND_PATTERN = /^([xy])([+-])(\d+)$/;

export interface ParsedMoveCommand {
    axis: Axis;
    delta: number;
}

export const parseMoveCommand = (command: string): ParsedMoveCommand | null => {
    const match = MOVE_COMMAND_PATTERN.exec(command.trim());
    if (!match) {
        return null;
    }
    const axis: Axis = match[1] === 'x' ? 'x' : 'y';
    const magnitude = Number.parseInt(match[3] ?? '', 10);
    if (!Number.isSafeInteger(magnitude) || magnitude === 0) {
        return null;
    }
    return { axis, delta: match[2] === '-' ? -magnitude : magnitude };
};
