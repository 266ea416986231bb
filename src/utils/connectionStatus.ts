import type { LinkState, ScanPhase } from '../types';

const statusLabel: Record<LinkState['status'], string> = {
    closed: 'Disconnected',
    opening: 'Connecting…',
    open: 'Connected',
};

export const getLinkStatusLabel = (state: LinkState): string => {
    const label = statusLabel[state.status] ?? state.status;
    if (state.status === 'closed' && state.lastError) {
        return `Error: ${state.lastError}`;
    }
    return state.status === 'open' ? `${label} to ${state.port}` : label;
};

const phaseLabel: Record<ScanPhase, string> = {
    idle: 'Idle',
    configuring: 'Configuring stage…',
    homing: 'Moving to start…',
    scanning: 'Scanning',
    returning: 'Returning to center…',
    aborted: 'Aborted',
    failed: 'Failed',
};

export const getScanPhaseLabel = (phase: ScanPhase): string => phaseLabel[phase] ?? phase;

export const isLinkOffline = (state: LinkState): boolean => state.status !== 'open';
