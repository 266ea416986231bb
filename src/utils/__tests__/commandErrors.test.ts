import { describe, expect, it } from 'vitest';

import {
    AckTimeoutError,
    ConnectionError,
    InvalidParameterError,
    ScanBusyError,
} from '../../services/scanErrors';
import { extractScanErrorDetail, normalizeScanError } from '../commandErrors';

describe('normalizeScanError', () => {
    it('keeps the kind of scan failures', () => {
        expect(normalizeScanError(new ScanBusyError())).toEqual({
            message: 'Stage is busy with another request',
            kind: 'busy',
        });
    });

    it('falls back for plain errors and unknown values', () => {
        expect(normalizeScanError(new Error('boom'))).toEqual({ message: 'boom', kind: 'error' });
        expect(normalizeScanError('lost')).toEqual({ message: 'lost', kind: 'error' });
        expect(normalizeScanError(undefined)).toEqual({ message: 'Scan failed', kind: 'error' });
    });
});

describe('extractScanErrorDetail', () => {
    it('records the unacknowledged command', () => {
        const detail = extractScanErrorDetail(new AckTimeoutError('x+1', 5_000), {
            axis: 'x',
            position: { x: 3, y: 4 },
        });

        expect(detail).toEqual({
            kind: 'ack-timeout',
            message: 'No acknowledgement for "x+1" within 5000 ms',
            command: 'x+1',
            axis: 'x',
            position: { x: 3, y: 4 },
        });
    });

    it('records the port of a connection failure', () => {
        const detail = extractScanErrorDetail(new ConnectionError('COM7', 'Unable to open COM7'));

        expect(detail).toMatchObject({ kind: 'connection', port: 'COM7' });
    });

    it('records the invalid field', () => {
        const detail = extractScanErrorDetail(
            new InvalidParameterError('stepsize', 'stepsize must be at least 1'),
        );

        expect(detail).toMatchObject({
            kind: 'invalid-parameter',
            field: 'stepsize',
            message: 'stepsize must be at least 1',
        });
    });
});
