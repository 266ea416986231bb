import { ACK_MARKER, ADC_VALUE_PATTERN } from '@/constants/control';

export type LineClassification =
    | { kind: 'ack' }
    | { kind: 'sample'; value: number }
    | { kind: 'unrecognized'; line: string };

export interface LineClassifierOptions {
    ackMarker?: string;
    valuePattern?: RegExp;
}

/**
 * Classify one line from the stage firmware.
 *
 * Sample lines win over acknowledgements, so a line that carries both a value
 * and the ack marker is always reported as a sample whichever wait reads it.
 */
export const classifyLine = (
    line: string,
    options: LineClassifierOptions = {},
): LineClassification => {
    const ackMarker = options.ackMarker ?? ACK_MARKER;
    const valuePattern = options.valuePattern ?? ADC_VALUE_PATTERN;

    const match = valuePattern.exec(line);
    if (match) {
        const value = Number.parseInt(match[1] ?? '', 10);
        if (Number.isSafeInteger(value)) {
            return { kind: 'sample', value };
        }
    }

    if (ackMarker.length > 0 && line.includes(ackMarker)) {
        return { kind: 'ack' };
    }

    return { kind: 'unrecognized', line };
};
