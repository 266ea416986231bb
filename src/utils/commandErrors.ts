import {
    AckTimeoutError,
    ConnectionError,
    InvalidParameterError,
    isScanFailure,
} from '../services/scanErrors';
import type { Axis, Position } from '../types';
import type { ScanErrorDetail } from '../types/commandError';

export interface NormalizedScanError {
    message: string;
    kind: string;
}

export const normalizeScanError = (error: unknown): NormalizedScanError => {
    if (isScanFailure(error)) {
        return {
            message: error.message,
            kind: error.kind,
        };
    }

    if (error instanceof Error) {
        return {
            message: error.message,
            kind: 'error',
        };
    }

    return {
        message: typeof error === 'string' && error.length > 0 ? error : 'Scan failed',
        kind: 'error',
    };
};

/**
 * Extract structured failure information for the log. Context carries what the
 * error itself does not know, such as the stage position at the time.
 */
export function extractScanErrorDetail(
    error: unknown,
    context?: {
        axis?: Axis;
        position?: Position;
    },
): ScanErrorDetail {
    const { message, kind } = normalizeScanError(error);
    const detail: ScanErrorDetail = {
        kind,
        message,
        axis: context?.axis,
        position: context?.position,
    };

    if (error instanceof AckTimeoutError) {
        detail.command = error.command;
    } else if (error instanceof ConnectionError) {
        detail.port = error.port;
    } else if (error instanceof InvalidParameterError) {
        detail.field = error.field;
    }

    return detail;
}
