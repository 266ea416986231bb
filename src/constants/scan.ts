import type { ScanParameters } from '@/types';

import {
    COMMAND_ACK_TIMEOUT_MS,
    MOVE_ACK_TIMEOUT_MS,
    SAMPLE_TIMEOUT_MS,
} from './control';

export const DEFAULT_WORKSPACE_SIZE = 200;

export const DEFAULT_SCAN_PARAMETERS: ScanParameters = {
    extension: 10,
    center: { x: 100, y: 100 },
    stepsize: 1,
    delayMs: 100,
    speed: 1_000,
};

export interface ScanControllerSettings {
    ackTimeoutMs: number;
    moveAckTimeoutMs: number;
    /** Base sample timeout; the configured settle delay is added per request. */
    sampleTimeoutMs: number;
    /** Copy each sample over the stepsize-wide block of cells it stands for. */
    fillSampleBlock: boolean;
}

export const DEFAULT_SCAN_CONTROLLER_SETTINGS: ScanControllerSettings = {
    ackTimeoutMs: COMMAND_ACK_TIMEOUT_MS,
    moveAckTimeoutMs: MOVE_ACK_TIMEOUT_MS,
    sampleTimeoutMs: SAMPLE_TIMEOUT_MS,
    fillSampleBlock: true,
};
