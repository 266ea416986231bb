import { describe, expect, it } from 'vitest';

import { getLinkStatusLabel, getScanPhaseLabel, isLinkOffline } from '../connectionStatus';

describe('getLinkStatusLabel', () => {
    it('names the port once connected', () => {
        expect(getLinkStatusLabel({ status: 'open', port: 'COM3', baudRate: 115_200 })).toBe(
            'Connected to COM3',
        );
    });

    it('shows the last open error while disconnected', () => {
        expect(
            getLinkStatusLabel({
                status: 'closed',
                port: 'COM3',
                baudRate: 115_200,
                lastError: 'Access denied',
            }),
        ).toBe('Error: Access denied');
        expect(getLinkStatusLabel({ status: 'closed', port: 'COM3', baudRate: 115_200 })).toBe(
            'Disconnected',
        );
    });

    it('reports a pending open', () => {
        const state = { status: 'opening', port: 'COM3', baudRate: 115_200 } as const;

        expect(getLinkStatusLabel(state)).toBe('Connecting…');
        expect(isLinkOffline(state)).toBe(true);
    });
});

describe('getScanPhaseLabel', () => {
    it('labels each phase', () => {
        expect(getScanPhaseLabel('homing')).toBe('Moving to start…');
        expect(getScanPhaseLabel('returning')).toBe('Returning to center…');
        expect(getScanPhaseLabel('idle')).toBe('Idle');
    });
});
