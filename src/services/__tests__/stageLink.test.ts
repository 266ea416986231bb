// @vitest-environment node
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { TransportRequest } from '../lineTransport';
import { LogStore } from '../logStore';
import { ConnectionError } from '../scanErrors';
import { StageLink } from '../stageLink';

import { ScriptedLineTransport, createStageResponder } from './helpers/scriptedTransport';

const createLink = (transport: ScriptedLineTransport, logger = new LogStore()) =>
    new StageLink({
        settings: { port: 'test-port', resetSettleMs: 0 },
        createTransport: () => transport,
        logger,
    });

describe('StageLink connection', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('opens the transport at the configured port and baud rate', async () => {
        const requests: TransportRequest[] = [];
        const transport = new ScriptedLineTransport();
        const link = new StageLink({
            settings: { port: 'test-port', baudRate: 9_600, resetSettleMs: 0 },
            createTransport: (request) => {
                requests.push(request);
                return transport;
            },
        });

        await link.open();

        expect(requests).toEqual([{ path: 'test-port', baudRate: 9_600 }]);
        expect(link.isOpen()).toBe(true);
        expect(link.getState()).toMatchObject({ status: 'open', port: 'test-port' });
    });

    it('waits for the device reset before reporting open', async () => {
        const transport = new ScriptedLineTransport();
        const link = new StageLink({
            settings: { port: 'test-port', resetSettleMs: 2_000 },
            createTransport: () => transport,
        });
        vi.useFakeTimers();

        const opening = link.open();
        await vi.advanceTimersByTimeAsync(1_999);
        expect(link.getState().status).toBe('opening');

        await vi.advanceTimersByTimeAsync(1);
        await opening;
        expect(link.getState().status).toBe('open');
    });

    it('discards lines received while the device resets', async () => {
        const transport = new ScriptedLineTransport({ bootLines: ['boot OK', 'ADC: 3'] });
        const link = createLink(transport);

        await link.open();

        await expect(link.readLine(20)).resolves.toBeNull();
    });

    it('rejects with ConnectionError when the transport cannot be opened', async () => {
        const transport = new ScriptedLineTransport({ openError: new Error('port busy') });
        const link = createLink(transport);

        await expect(link.open()).rejects.toBeInstanceOf(ConnectionError);
        expect(link.isOpen()).toBe(false);
        expect(link.getState()).toMatchObject({ status: 'closed', lastError: 'port busy' });
    });

    it('treats close as a no-op when not open', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);

        await link.close();
        await link.open();
        await link.close();
        await link.close();

        expect(transport.closeCalls).toBe(1);
        expect(link.getState().status).toBe('closed');
    });

    it('reopens on the new port when the port changes while open', async () => {
        const paths: string[] = [];
        const link = new StageLink({
            settings: { port: 'first', resetSettleMs: 0 },
            createTransport: (request) => {
                paths.push(request.path);
                return new ScriptedLineTransport();
            },
        });

        await link.open();
        await link.setPort('second');

        expect(paths).toEqual(['first', 'second']);
        expect(link.isOpen()).toBe(true);
        expect(link.getState().port).toBe('second');
    });

    it('keeps a closed link closed when the port changes', async () => {
        const paths: string[] = [];
        const link = new StageLink({
            settings: { port: 'first', resetSettleMs: 0 },
            createTransport: (request) => {
                paths.push(request.path);
                return new ScriptedLineTransport();
            },
        });

        await link.setPort('second');

        expect(paths).toEqual([]);
        expect(link.isOpen()).toBe(false);
        expect(link.getState().port).toBe('second');
    });

    it('publishes state changes to listeners', async () => {
        const link = createLink(new ScriptedLineTransport());
        const statuses: string[] = [];
        link.onStateChange((state) => statuses.push(state.status));

        await link.open();
        await link.close();

        expect(statuses).toEqual(['closed', 'opening', 'open', 'closed']);
    });
});

describe('StageLink commands', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('terminates each command with a newline', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();

        await link.sendCommand('x+10');

        expect(transport.rawWrites).toEqual(['x+10\n']);
    });

    it('refuses to send when the link is closed', async () => {
        const link = createLink(new ScriptedLineTransport());

        await expect(link.sendCommand('adc on')).rejects.toBeInstanceOf(ConnectionError);
    });

    it('returns the first non-empty line, trimmed', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();

        transport.push('');
        transport.push('   ');
        transport.push('  hello  \r');

        await expect(link.readLine(50)).resolves.toBe('hello');
    });

    it('keeps a wall-clock deadline while blank lines arrive', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();
        vi.useFakeTimers();

        const reading = link.readLine(100);
        transport.push('');
        await vi.advanceTimersByTimeAsync(60);
        transport.push(' ');
        await vi.advanceTimersByTimeAsync(40);

        await expect(reading).resolves.toBeNull();
    });

    it('waits past an empty read for a line that arrives later', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();
        vi.useFakeTimers();

        const reading = link.readLine(100);
        transport.push('');
        await vi.advanceTimersByTimeAsync(50);
        transport.push('ready');

        await expect(reading).resolves.toBe('ready');
    });

    it('skips unrelated lines until the acknowledgement', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();

        transport.push('dbg: stepping');
        transport.push('move done OK');

        await expect(link.waitForAck(50)).resolves.toBe(true);
    });

    it('reports a missing acknowledgement as false, not an exception', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();

        transport.push('busy');
        transport.push('ADC: 5');

        await expect(link.waitForAck(100)).resolves.toBe(false);
    });

    it('extracts a signed value and ignores other lines', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();

        transport.push('OK');
        transport.push('ADC:');
        transport.push('ADC:   -42');

        await expect(link.waitForAdcValue(50)).resolves.toBe(-42);
    });

    it('requests a sample and returns its value', async () => {
        const transport = new ScriptedLineTransport({
            respond: createStageResponder({ sample: () => 512 }),
        });
        const link = createLink(transport);
        await link.open();

        await expect(link.requestAdcValue(50)).resolves.toBe(512);
        expect(transport.commands).toEqual(['adc read']);
    });

    it('logs a missed sample instead of throwing', async () => {
        const logger = new LogStore();
        const transport = new ScriptedLineTransport({
            respond: createStageResponder({ sample: () => null }),
        });
        const link = createLink(transport, logger);
        await link.open();

        await expect(link.requestAdcValue(20)).resolves.toBeNull();
        expect(logger.getEntries()[0]).toMatchObject({
            scope: 'link',
            severity: 'warning',
            message: 'Failed to read ADC value',
        });
    });

    it('logs sent and received lines', async () => {
        const logger = new LogStore();
        const transport = new ScriptedLineTransport();
        const link = createLink(transport, logger);
        await link.open();

        await link.sendCommand('y-2');
        await link.waitForAck(50);

        const messages = logger.getEntries().map((entry) => entry.message);
        expect(messages.slice(0, 2)).toEqual(['<<< OK', '>>> y-2']);
    });
});

describe('StageLink device loss', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('closes with the reason and wakes a pending wait when the device goes away', async () => {
        const logger = new LogStore();
        const transport = new ScriptedLineTransport({ respond: () => undefined });
        const link = createLink(transport, logger);
        await link.open();

        const waiting = link.waitForAck(5_000);
        transport.disconnect(new Error('cable pulled'));

        await expect(waiting).resolves.toBe(false);
        expect(link.isOpen()).toBe(false);
        expect(link.getState()).toMatchObject({ status: 'closed', lastError: 'cable pulled' });
        expect(transport.closeCalls).toBe(1);
        expect(logger.getEntries()[0]).toMatchObject({
            severity: 'error',
            message: 'Lost connection to test-port',
        });
    });

    it('reopens after the device was lost', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();
        transport.disconnect();

        await link.open();

        expect(transport.openCalls).toBe(2);
        expect(link.getState()).toMatchObject({ status: 'open', lastError: undefined });
        await link.sendCommand('adc on');
        await expect(link.waitForAck(50)).resolves.toBe(true);
    });

    it('ignores a disconnect from a transport it already closed', async () => {
        const transport = new ScriptedLineTransport();
        const link = createLink(transport);
        await link.open();
        await link.close();

        transport.disconnect(new Error('late event'));

        expect(link.getState().lastError).toBeUndefined();
    });
});

describe('StageLink concurrent open', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('shares one attempt between concurrent callers', async () => {
        const created: ScriptedLineTransport[] = [];
        const link = new StageLink({
            settings: { port: 'test-port', resetSettleMs: 0 },
            createTransport: () => {
                const transport = new ScriptedLineTransport();
                created.push(transport);
                return transport;
            },
        });

        await Promise.all([link.open(), link.open(), link.open()]);

        expect(created).toHaveLength(1);
        expect(link.isOpen()).toBe(true);
    });

    it('does not report open when closed during the reset delay', async () => {
        const transport = new ScriptedLineTransport();
        const link = new StageLink({
            settings: { port: 'test-port', resetSettleMs: 1_000 },
            createTransport: () => transport,
        });
        vi.useFakeTimers();

        const outcome = link.open().then(
            () => null,
            (error: unknown) => error,
        );
        await vi.advanceTimersByTimeAsync(10);
        await link.close();
        await vi.advanceTimersByTimeAsync(1_000);

        const error = await outcome;
        expect(error).toBeInstanceOf(ConnectionError);
        expect(error).toMatchObject({
            message: 'Connection to test-port was closed while the device was resetting',
        });
        expect(link.getState().status).toBe('closed');
        expect(link.isOpen()).toBe(false);
    });
});
