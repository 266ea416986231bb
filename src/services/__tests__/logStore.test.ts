// @vitest-environment node
import { afterEach, describe, expect, it, vi } from 'vitest';

import { LogStore, type LogEntry } from '../logStore';

describe('LogStore', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('keeps entries newest first', () => {
        const store = new LogStore();

        store.logInfo('link', 'first');
        store.logWarning('scan', 'second', { row: 1 });
        store.logError('scan', 'third');

        expect(
            store.getEntries().map(({ scope, severity, message, metadata }) => ({
                scope,
                severity,
                message,
                metadata,
            })),
        ).toEqual([
            { scope: 'scan', severity: 'error', message: 'third', metadata: undefined },
            { scope: 'scan', severity: 'warning', message: 'second', metadata: { row: 1 } },
            { scope: 'link', severity: 'info', message: 'first', metadata: undefined },
        ]);
    });

    it('drops the oldest entries past the cap', () => {
        const store = new LogStore({ maxEntries: 2 });

        store.logInfo('scan', 'a');
        store.logInfo('scan', 'b');
        store.logInfo('scan', 'c');

        expect(store.getEntries().map((entry) => entry.message)).toEqual(['c', 'b']);
    });

    it('assigns unique ids and honors an explicit timestamp', () => {
        const store = new LogStore();

        const first = store.append({ scope: 'scan', severity: 'info', message: 'x', timestamp: 42 });
        const second = store.append({ scope: 'scan', severity: 'info', message: 'y' });

        expect(first.timestamp).toBe(42);
        expect(first.id).not.toBe(second.id);
    });

    it('notifies subscribers until they unsubscribe', () => {
        const store = new LogStore();
        const received: LogEntry[] = [];
        const unsubscribe = store.subscribe((entry) => received.push(entry));

        store.logInfo('link', 'one');
        unsubscribe();
        store.logInfo('link', 'two');

        expect(received.map((entry) => entry.message)).toEqual(['one']);
    });

    it('clears all entries', () => {
        const store = new LogStore();
        store.logInfo('link', 'one');

        store.clear();

        expect(store.getEntries()).toEqual([]);
    });

    it('mirrors entries to the console when asked', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const store = new LogStore({ console: true });

        store.logWarning('scan', 'Sample missed', { row: 2 });
        store.logInfo('link', 'Closed');

        expect(warn).toHaveBeenCalledWith('[scan] Sample missed', { row: 2 });
        expect(info).toHaveBeenCalledWith('[link] Closed');
    });

    it('stays quiet on the console by default', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

        new LogStore().logInfo('link', 'Closed');

        expect(info).not.toHaveBeenCalled();
    });
});
